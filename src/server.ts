import express from 'express';
import cron from 'node-cron';
import { z } from 'zod';
import type { Config } from './config.js';
import { ymd } from './dates.js';
import { FlightStore } from './db.js';
import { describeError } from './errors.js';
import { FlightFetcher, type FetchRequest } from './fetcher.js';
import { logger } from './logger.js';
import { createOpenSkyClient } from './opensky.js';
import type { FlightFilters, FlightKind, RunSummary } from './types.js';
import { parseAirports } from './validation.js';

const dateParam = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const flightsQuerySchema = z.object({
  from: z.string().optional(),
  to: z.string().optional(),
  start: dateParam.optional(),
  end: dateParam.optional(),
  kind: z.enum(['departure', 'destination']).optional(),
  limit: z.coerce.number().int().min(1).max(10000).default(1000),
});

export function parseFlightsQuery(query: unknown): { filters: FlightFilters; limit: number } | { error: string } {
  const parsed = flightsQuerySchema.safeParse(query);
  if (!parsed.success) {
    return { error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  const q = parsed.data;
  const filters: FlightFilters = {};
  if (q.from !== undefined) {
    filters.departureAirports = parseAirports(q.from);
    if (!filters.departureAirports.length) return { error: 'from: no valid 4-letter airport code' };
  }
  if (q.to !== undefined) {
    filters.arrivalAirports = parseAirports(q.to);
    if (!filters.arrivalAirports.length) return { error: 'to: no valid 4-letter airport code' };
  }
  if (q.start) filters.startDate = q.start;
  if (q.end) filters.endDate = q.end;
  if (q.kind) filters.kind = q.kind;
  return { filters, limit: q.limit };
}

/** Requests for the previous UTC day, one per kind. */
export function scheduledRequests(now: Date, airports: string[], kinds: FlightKind[]): FetchRequest[] {
  const yesterday = ymd(new Date(now.getTime() - 24 * 60 * 60 * 1000));
  return kinds.map((kind) => ({
    airports,
    start: { date: yesterday },
    end: { date: yesterday },
    kind,
    skipExisting: true,
  }));
}

export type RunStatus = {
  running: boolean;
  lastRunAt: string | null;
  lastSummary: Partial<Record<FlightKind, RunSummary>>;
  lastError: string | null;
};

export function createApp(store: FlightStore, status: RunStatus) {
  const app = express();

  app.get('/healthz', (_req, res) => res.json({ ok: true }));

  app.get('/api/status', (_req, res) => {
    res.json({ ...status, stats: store.stats() });
  });

  app.get('/api/flights', (req, res) => {
    const parsed = parseFlightsQuery(req.query);
    if ('error' in parsed) return res.status(400).json({ error: parsed.error });
    try {
      res.json(store.query(parsed.filters, parsed.limit));
    } catch (e) {
      res.status(500).json({ error: describeError(e) });
    }
  });

  app.get('/api/raw/:airport/:date/:kind', (req, res) => {
    const kind = z.enum(['departure', 'destination']).safeParse(req.params.kind);
    if (!kind.success || !dateParam.safeParse(req.params.date).success) {
      return res.status(400).json({ error: 'invalid params' });
    }
    const raw = store.getRaw(req.params.airport.toUpperCase(), req.params.date, kind.data);
    if (!raw) return res.status(404).json({ error: 'not found' });
    res.json(raw);
  });

  return app;
}

export async function runScheduledFetch(
  fetcher: FlightFetcher,
  status: RunStatus,
  watch: Config['watch'],
  now = new Date(),
) {
  if (status.running) {
    logger.warn('Previous scheduled fetch still running, skipping this tick');
    return;
  }
  status.running = true;
  status.lastError = null;
  try {
    for (const request of scheduledRequests(now, watch.airports, watch.kinds)) {
      status.lastSummary[request.kind] = await fetcher.run(request);
    }
  } catch (e) {
    status.lastError = describeError(e);
    logger.error(`Scheduled fetch failed: ${status.lastError}`);
  } finally {
    status.running = false;
    status.lastRunAt = now.toISOString();
  }
}

export async function startServer(config: Config) {
  const store = new FlightStore(config.dbPath);
  const status: RunStatus = { running: false, lastRunAt: null, lastSummary: {}, lastError: null };
  const app = createApp(store, status);

  const { clientId, clientSecret } = config.opensky;
  if (clientId && clientSecret && config.watch.airports.length) {
    const client = createOpenSkyClient({
      clientId,
      clientSecret,
      authUrl: config.opensky.authUrl,
      apiBase: config.opensky.apiBase,
      timeoutMs: config.opensky.timeoutMs,
      maxConcurrent: config.maxConcurrent,
      rateLimitDelay: config.rateLimitDelay,
    });
    const fetcher = new FlightFetcher(store, client);
    cron.schedule(config.cron, () => {
      runScheduledFetch(fetcher, status, config.watch).catch((e) => logger.error(`job error: ${describeError(e)}`));
    }, { timezone: 'UTC' });
    logger.info(`Scheduled fetch for ${config.watch.airports.join(',')} on '${config.cron}'`);
  } else {
    logger.warn('No credentials or WATCH_AIRPORTS configured; scheduled fetch disabled');
  }

  await new Promise<void>((resolve) => {
    app.listen(config.port, '0.0.0.0', () => {
      console.log(`flight-ingest listening on http://0.0.0.0:${config.port}`);
      resolve();
    });
  });
}
