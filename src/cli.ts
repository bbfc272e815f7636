#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { loadConfig, type Config } from './config.js';
import { FlightStore } from './db.js';
import { describeError, ValidationError } from './errors.js';
import { FlightFetcher } from './fetcher.js';
import { levelFromVerbosity, logger } from './logger.js';
import { createOpenSkyClient } from './opensky.js';
import { startServer } from './server.js';
import type { FlightFilters, FlightKind } from './types.js';
import { parseDateInput, requireAirports, requireCredentials, validateRange } from './validation.js';

const usage = (config: Config) => `
Usage: flight-ingest <command> [options]

Commands:
  departure    Fetch departures for airports over a date range
  destination  Fetch arrivals for airports over a date range
  export FILE  Export stored flights to CSV or Arrow
  stats        Show database statistics
  serve        Run the scheduled fetcher and query API

Fetch options:
  -a, --airports         Comma-separated ICAO codes (e.g. KMCO,KJFK)
  -s, --start-date       YYYY-MM-DD or 'YYYY-MM-DD HH:MM:SS' (UTC)
  -e, --end-date         YYYY-MM-DD or 'YYYY-MM-DD HH:MM:SS' (UTC)
  -c, --max-concurrent   Maximum concurrent requests (default ${config.maxConcurrent})
  -r, --rate-limit-delay Minimum seconds between requests (default ${config.rateLimitDelay})
      --no-skip-existing Re-fetch dates already in the database
      --client-id / --client-secret  OAuth credentials (or OPENSKY_CLIENT_ID / OPENSKY_CLIENT_SECRET)

Export options:
  -f, --format           csv or arrow (default csv)
      --from             Departure airport filter
      --to               Arrival airport filter
  -k, --kind             departure or destination
  -s, --start-date / -e, --end-date  Inclusive date filter

Common:
  -d, --db-path          Database file (default ${config.dbPath})
  -v, --verbose          -v for info, -vv for debug
  -q, --quiet            Suppress log output
`;

const options = {
  airports: { type: 'string', short: 'a' },
  'start-date': { type: 'string', short: 's' },
  'end-date': { type: 'string', short: 'e' },
  'db-path': { type: 'string', short: 'd' },
  'client-id': { type: 'string' },
  'client-secret': { type: 'string' },
  'max-concurrent': { type: 'string', short: 'c' },
  'rate-limit-delay': { type: 'string', short: 'r' },
  'no-skip-existing': { type: 'boolean' },
  format: { type: 'string', short: 'f' },
  from: { type: 'string' },
  to: { type: 'string' },
  kind: { type: 'string', short: 'k' },
  verbose: { type: 'boolean', short: 'v', multiple: true },
  quiet: { type: 'boolean', short: 'q' },
  help: { type: 'boolean', short: 'h' },
} as const;

type Parsed = ReturnType<typeof parseArgs<{ options: typeof options; allowPositionals: true; strict: true }>>;
type Values = Parsed['values'];

function positiveNumber(raw: string | undefined, name: string, fallback: number, integer = false): number {
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0 || (integer && (!Number.isInteger(n) || n < 1))) {
    throw new ValidationError(`Invalid --${name}: '${raw}'`);
  }
  return n;
}

async function fetchCommand(kind: FlightKind, values: Values, config: Config) {
  const { clientId, clientSecret } = requireCredentials(values['client-id'] ?? config.opensky.clientId, values['client-secret'] ?? config.opensky.clientSecret);
  if (!values.airports) throw new ValidationError('--airports is required');
  if (!values['start-date'] || !values['end-date']) throw new ValidationError('--start-date and --end-date are required');

  const airports = requireAirports(values.airports);
  const start = parseDateInput(values['start-date']);
  const end = parseDateInput(values['end-date']);
  validateRange(start, end);
  const maxConcurrent = positiveNumber(values['max-concurrent'], 'max-concurrent', config.maxConcurrent, true);
  const rateLimitDelay = positiveNumber(values['rate-limit-delay'], 'rate-limit-delay', config.rateLimitDelay);

  const client = createOpenSkyClient({
    clientId,
    clientSecret,
    authUrl: config.opensky.authUrl,
    apiBase: config.opensky.apiBase,
    timeoutMs: config.opensky.timeoutMs,
    maxConcurrent,
    rateLimitDelay,
  });
  const store = new FlightStore(values['db-path'] ?? config.dbPath);
  try {
    const fetcher = new FlightFetcher(store, client);
    const summary = await fetcher.run({ airports, start, end, kind, skipExisting: !values['no-skip-existing'] });
    if (!values.quiet) {
      console.log(`Total: ${summary.total} | Skipped: ${summary.skipped} | Fetched: ${summary.fetched} | Failed: ${summary.failed} | Flights: ${summary.flights}`);
    }
  } finally {
    store.close();
  }
}

async function exportCommand(outputFile: string | undefined, values: Values, config: Config) {
  if (!outputFile) throw new ValidationError('Missing output file: flight-ingest export <file>');
  const dbPath = values['db-path'] ?? config.dbPath;
  if (!fs.existsSync(dbPath)) throw new ValidationError(`Database file '${dbPath}' does not exist`);

  const format = (values.format ?? 'csv').toLowerCase();
  if (format !== 'csv' && format !== 'arrow') throw new ValidationError(`Unsupported format '${format}' (use csv or arrow)`);

  const filters: FlightFilters = {};
  if (values.from) filters.departureAirports = requireAirports(values.from, 'departure airport');
  if (values.to) filters.arrivalAirports = requireAirports(values.to, 'arrival airport');
  if (values.kind) {
    if (values.kind !== 'departure' && values.kind !== 'destination') throw new ValidationError(`Invalid --kind '${values.kind}'`);
    filters.kind = values.kind;
  }
  const start = values['start-date'] ? parseDateInput(values['start-date']) : undefined;
  const end = values['end-date'] ? parseDateInput(values['end-date']) : undefined;
  if (start && end) validateRange(start, end);
  if (start) filters.startDate = start.date;
  if (end) filters.endDate = end.date;

  const store = new FlightStore(dbPath);
  try {
    const rows = store.export(outputFile, format, filters);
    if (!values.quiet) console.log(`Exported ${rows.toLocaleString('en-US')} rows to ${outputFile}`);
  } finally {
    store.close();
  }
}

async function statsCommand(values: Values, config: Config) {
  const store = new FlightStore(values['db-path'] ?? config.dbPath);
  try {
    const s = store.stats();
    console.log(`Raw responses: ${s.rawResponses}`);
    console.log(`Flights: ${s.flights}`);
    console.log(`Airports: ${s.airports}`);
    console.log(`Date range: ${s.firstDate ?? '-'} to ${s.lastDate ?? '-'}`);
  } finally {
    store.close();
  }
}

/** Returns the process exit code. */
export async function main(argv: string[]): Promise<number> {
  let parsed: Parsed;
  try {
    parsed = parseArgs({ args: argv, options, allowPositionals: true, strict: true });
  } catch (e) {
    console.error(`Error: ${describeError(e)}`);
    return 1;
  }
  const { values, positionals } = parsed;
  const [command, ...rest] = positionals;

  let config: Config;
  try {
    config = loadConfig();
  } catch (e) {
    console.error(`Error: ${describeError(e)}`);
    return 1;
  }
  logger.setLevel(levelFromVerbosity(values.verbose?.length ?? 0, values.quiet ?? false, config.logLevel));

  if (values.help || !command) {
    console.log(usage(config));
    return values.help ? 0 : 1;
  }

  try {
    switch (command) {
      case 'departure':
      case 'destination':
        await fetchCommand(command, values, config);
        return 0;
      case 'export':
        await exportCommand(rest[0], values, config);
        return 0;
      case 'stats':
        await statsCommand(values, config);
        return 0;
      case 'serve':
        await startServer(config);
        return 0;
      default:
        console.error(`Unknown command '${command}'`);
        console.log(usage(config));
        return 1;
    }
  } catch (e) {
    console.error(`Error: ${describeError(e)}`);
    return 1;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return path.resolve(entry) === fileURLToPath(import.meta.url);
  }
}

if (invokedDirectly()) {
  main(process.argv.slice(2))
    .then((code) => {
      if (code !== 0) process.exit(code);
    })
    .catch((err) => {
      console.error('Error:', err);
      process.exit(1);
    });
}
