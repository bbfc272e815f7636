import Database from 'better-sqlite3';
import fs from 'fs';
import { Float64, Table, Utf8, Vector, tableToIPC, vectorFromArray } from 'apache-arrow';
import { StorageError, describeError } from './errors.js';
import { logger } from './logger.js';
import type { ExportFormat, FlightFilters, FlightKind, FlightPayload, FlightRow } from './types.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS raw_responses (
  airport TEXT NOT NULL,
  date TEXT NOT NULL,
  kind TEXT NOT NULL,
  request_timestamp TEXT NOT NULL DEFAULT (datetime('now')),
  raw_json TEXT NOT NULL,
  PRIMARY KEY (airport, date, kind)
);

CREATE TABLE IF NOT EXISTS flights (
  airport TEXT NOT NULL,
  date TEXT NOT NULL,
  kind TEXT NOT NULL,
  icao24 TEXT NOT NULL,
  first_seen INTEGER NOT NULL,
  last_seen INTEGER,
  est_departure_airport TEXT,
  est_arrival_airport TEXT,
  callsign TEXT,
  est_departure_airport_horiz_distance INTEGER,
  est_departure_airport_vert_distance INTEGER,
  est_arrival_airport_horiz_distance INTEGER,
  est_arrival_airport_vert_distance INTEGER,
  departure_airport_candidates_count INTEGER,
  arrival_airport_candidates_count INTEGER,
  PRIMARY KEY (airport, date, kind, icao24, first_seen)
);

CREATE INDEX IF NOT EXISTS idx_flights_airport_date ON flights(airport, date);
CREATE INDEX IF NOT EXISTS idx_flights_icao24 ON flights(icao24);
CREATE INDEX IF NOT EXISTS idx_flights_callsign ON flights(callsign);
CREATE INDEX IF NOT EXISTS idx_flights_departure_airport ON flights(est_departure_airport);
CREATE INDEX IF NOT EXISTS idx_flights_arrival_airport ON flights(est_arrival_airport);
`;

export const FLIGHT_COLUMNS = [
  'airport',
  'date',
  'kind',
  'icao24',
  'first_seen',
  'last_seen',
  'est_departure_airport',
  'est_arrival_airport',
  'callsign',
  'est_departure_airport_horiz_distance',
  'est_departure_airport_vert_distance',
  'est_arrival_airport_horiz_distance',
  'est_arrival_airport_vert_distance',
  'departure_airport_candidates_count',
  'arrival_airport_candidates_count',
] as const satisfies readonly (keyof FlightRow)[];

const TEXT_COLUMNS = new Set<keyof FlightRow>(['airport', 'date', 'kind', 'icao24', 'est_departure_airport', 'est_arrival_airport', 'callsign']);

// Where a row's departure/arrival airport lives depends on which side it was fetched from.
const DEPARTURE_AIRPORT_SQL = "CASE kind WHEN 'departure' THEN airport ELSE est_departure_airport END";
const ARRIVAL_AIRPORT_SQL = "CASE kind WHEN 'destination' THEN airport ELSE est_arrival_airport END";

export type PutFlightsResult = {
  inserted: number;
  dropped: number;
};

export type StoreStats = {
  rawResponses: number;
  flights: number;
  airports: number;
  firstDate: string | null;
  lastDate: string | null;
};

function toRow(airport: string, date: string, kind: FlightKind, f: FlightPayload): FlightRow | null {
  if (!f.icao24 || f.firstSeen === null || f.firstSeen === undefined) return null;
  return {
    airport,
    date,
    kind,
    icao24: f.icao24,
    first_seen: f.firstSeen,
    last_seen: f.lastSeen ?? null,
    est_departure_airport: f.estDepartureAirport ?? null,
    est_arrival_airport: f.estArrivalAirport ?? null,
    // OpenSky pads callsigns to 8 characters
    callsign: f.callsign?.trim() || null,
    est_departure_airport_horiz_distance: f.estDepartureAirportHorizDistance ?? null,
    est_departure_airport_vert_distance: f.estDepartureAirportVertDistance ?? null,
    est_arrival_airport_horiz_distance: f.estArrivalAirportHorizDistance ?? null,
    est_arrival_airport_vert_distance: f.estArrivalAirportVertDistance ?? null,
    departure_airport_candidates_count: f.departureAirportCandidatesCount ?? null,
    arrival_airport_candidates_count: f.arrivalAirportCandidatesCount ?? null,
  };
}

export function buildFilterQuery(filters: FlightFilters = {}): { sql: string; params: Array<string> } {
  const conditions: string[] = [];
  const params: string[] = [];

  if (filters.departureAirports?.length) {
    conditions.push(`${DEPARTURE_AIRPORT_SQL} IN (${filters.departureAirports.map(() => '?').join(',')})`);
    params.push(...filters.departureAirports);
  }
  if (filters.arrivalAirports?.length) {
    conditions.push(`${ARRIVAL_AIRPORT_SQL} IN (${filters.arrivalAirports.map(() => '?').join(',')})`);
    params.push(...filters.arrivalAirports);
  }
  if (filters.startDate) {
    conditions.push('date >= ?');
    params.push(filters.startDate);
  }
  if (filters.endDate) {
    conditions.push('date <= ?');
    params.push(filters.endDate);
  }
  if (filters.kind) {
    conditions.push('kind = ?');
    params.push(filters.kind);
  }

  let sql = `SELECT ${FLIGHT_COLUMNS.join(', ')} FROM flights`;
  if (conditions.length) sql += ' WHERE ' + conditions.join(' AND ');
  sql += ' ORDER BY date, airport, first_seen';
  return { sql, params };
}

function csvCell(value: string | number | null): string {
  if (value === null) return '';
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(rows: FlightRow[]): string {
  const lines = [FLIGHT_COLUMNS.join(',')];
  for (const r of rows) {
    lines.push(FLIGHT_COLUMNS.map((c) => csvCell(r[c])).join(','));
  }
  return lines.join('\n') + '\n';
}

export function toArrowTable(rows: FlightRow[]): Table {
  const columns: Record<string, Vector> = {};
  for (const c of FLIGHT_COLUMNS) {
    if (TEXT_COLUMNS.has(c)) {
      columns[c] = vectorFromArray(rows.map((r) => { const v = r[c]; return typeof v === 'string' ? v : null; }), new Utf8());
    } else {
      columns[c] = vectorFromArray(rows.map((r) => { const v = r[c]; return typeof v === 'number' ? v : null; }), new Float64());
    }
  }
  return new Table(columns);
}

/**
 * SQLite-backed store for raw OpenSky responses and normalized flight rows.
 * Writes open a transaction lazily; `commit()` ends it.
 */
export class FlightStore {
  private readonly db: Database.Database;

  constructor(public readonly path: string = 'flights.sqlite') {
    try {
      this.db = new Database(path);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (e) {
      throw new StorageError(`Failed to open database '${path}': ${describeError(e)}`, { cause: e });
    }
    logger.debug(`Database opened at ${path}`);
  }

  exists(airport: string, date: string, kind: FlightKind): boolean {
    return this.guard('exists', () => {
      const row = this.db
        .prepare('SELECT 1 AS found FROM raw_responses WHERE airport=? AND date=? AND kind=?')
        .get(airport, date, kind);
      return row !== undefined;
    });
  }

  putRaw(airport: string, date: string, kind: FlightKind, payload: unknown) {
    this.guard('putRaw', () => {
      this.begin();
      this.db
        .prepare(`INSERT INTO raw_responses (airport, date, kind, request_timestamp, raw_json)
          VALUES (?, ?, ?, datetime('now'), ?)
          ON CONFLICT(airport, date, kind) DO UPDATE SET request_timestamp=excluded.request_timestamp, raw_json=excluded.raw_json`)
        .run(airport, date, kind, JSON.stringify(payload));
    });
  }

  getRaw(airport: string, date: string, kind: FlightKind): { requestTimestamp: string; payload: unknown } | undefined {
    return this.guard('getRaw', () => {
      const row = this.db
        .prepare<[string, string, string], { request_timestamp: string; raw_json: string }>(
          'SELECT request_timestamp, raw_json FROM raw_responses WHERE airport=? AND date=? AND kind=?',
        )
        .get(airport, date, kind);
      if (!row) return undefined;
      const payload: unknown = JSON.parse(row.raw_json);
      return { requestTimestamp: row.request_timestamp, payload };
    });
  }

  /**
   * Replaces every flight stored for the key. Rows without icao24 or firstSeen
   * are dropped; `inserted` counts the rows actually stored.
   */
  putFlights(airport: string, date: string, kind: FlightKind, flights: FlightPayload[]): PutFlightsResult {
    return this.guard('putFlights', () => {
      this.begin();
      this.db.prepare('DELETE FROM flights WHERE airport=? AND date=? AND kind=?').run(airport, date, kind);

      const insert = this.db.prepare(`INSERT OR REPLACE INTO flights (${FLIGHT_COLUMNS.join(', ')})
        VALUES (${FLIGHT_COLUMNS.map((c) => '@' + c).join(', ')})`);
      // repeated (icao24, first_seen) pairs collapse into one row, the last one wins
      const keys = new Set<string>();
      let dropped = 0;
      for (const f of flights) {
        const row = toRow(airport, date, kind, f);
        if (!row) {
          dropped++;
          continue;
        }
        insert.run(row);
        keys.add(`${row.icao24}\u0000${row.first_seen}`);
      }
      if (dropped) logger.debug(`Dropped ${dropped} flights without icao24/firstSeen for ${airport} ${date} ${kind}`);
      return { inserted: keys.size, dropped };
    });
  }

  commit() {
    this.guard('commit', () => {
      if (this.db.inTransaction) this.db.exec('COMMIT');
    });
  }

  /** Discards writes since the last commit. */
  rollback() {
    if (this.db.open && this.db.inTransaction) this.db.exec('ROLLBACK');
  }

  query(filters: FlightFilters = {}, limit?: number): FlightRow[] {
    const { sql, params } = buildFilterQuery(filters);
    return this.guard('query', () => {
      const stmt = this.db.prepare<unknown[], FlightRow>(limit === undefined ? sql : `${sql} LIMIT ?`);
      return limit === undefined ? stmt.all(...params) : stmt.all(...params, limit);
    });
  }

  /** Writes matching flights to `outputPath` and returns the row count. */
  export(outputPath: string, format: ExportFormat, filters: FlightFilters = {}): number {
    const rows = this.query(filters);
    try {
      if (format === 'csv') {
        fs.writeFileSync(outputPath, toCsv(rows));
      } else {
        fs.writeFileSync(outputPath, tableToIPC(toArrowTable(rows), 'file'));
      }
    } catch (e) {
      throw new StorageError(`Export to ${outputPath} failed: ${describeError(e)}`, { cause: e });
    }
    logger.info(`Exported ${rows.length} rows to ${outputPath} (${format.toUpperCase()})`);
    return rows.length;
  }

  stats(): StoreStats {
    return this.guard('stats', () => {
      const raw = this.db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM raw_responses').get();
      const agg = this.db
        .prepare<[], { n: number; airports: number; first_date: string | null; last_date: string | null }>(
          'SELECT COUNT(*) AS n, COUNT(DISTINCT airport) AS airports, MIN(date) AS first_date, MAX(date) AS last_date FROM flights',
        )
        .get();
      return {
        rawResponses: raw?.n ?? 0,
        flights: agg?.n ?? 0,
        airports: agg?.airports ?? 0,
        firstDate: agg?.first_date ?? null,
        lastDate: agg?.last_date ?? null,
      };
    });
  }

  /** Uncommitted writes are rolled back. */
  close() {
    if (!this.db.open) return;
    this.rollback();
    this.db.close();
  }

  private begin() {
    if (!this.db.inTransaction) this.db.exec('BEGIN');
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof StorageError) throw e;
      throw new StorageError(`Storage ${op} failed: ${describeError(e)}`, { cause: e });
    }
  }
}
