import fs from 'fs';
import os from 'os';
import path from 'path';
import { tableFromIPC } from 'apache-arrow';
import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { FLIGHT_COLUMNS, FlightStore } from '../src/db.js';
import { StorageError } from '../src/errors.js';
import { logger } from '../src/logger.js';

let store: FlightStore;
let tmpDir: string;

beforeAll(() => logger.setLevel('silent'));

beforeEach(() => {
  store = new FlightStore(':memory:');
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flight-store-'));
});

afterEach(() => {
  store.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function seed() {
  store.putRaw('KMCO', '2024-01-01', 'departure', []);
  store.putFlights('KMCO', '2024-01-01', 'departure', [
    { icao24: 'a1', firstSeen: 1704070000, estArrivalAirport: 'KLAX' },
    { icao24: 'a2', firstSeen: 1704068000, estArrivalAirport: 'KJFK' },
  ]);
  store.putFlights('KMCO', '2024-01-02', 'departure', [{ icao24: 'a3', firstSeen: 1704160000, estArrivalAirport: 'KLAX' }]);
  store.putFlights('KLAX', '2024-01-01', 'departure', [{ icao24: 'b1', firstSeen: 1704069000, estArrivalAirport: 'KMCO' }]);
  store.commit();
}

const icaos = (rows: { icao24: string }[]) => rows.map((r) => r.icao24);

describe('FlightStore raw responses', () => {
  it('reports existence as soon as the raw payload is written', () => {
    expect(store.exists('KMCO', '2024-01-01', 'departure')).toBe(false);
    store.putRaw('KMCO', '2024-01-01', 'departure', []);
    expect(store.exists('KMCO', '2024-01-01', 'departure')).toBe(true);
    expect(store.exists('KMCO', '2024-01-01', 'destination')).toBe(false);
  });

  it('keeps one row per key holding the latest payload', () => {
    store.putRaw('KMCO', '2024-01-01', 'departure', [{ icao24: 'old' }]);
    store.putRaw('KMCO', '2024-01-01', 'departure', [{ icao24: 'new' }]);
    store.commit();
    expect(store.getRaw('KMCO', '2024-01-01', 'departure')?.payload).toEqual([{ icao24: 'new' }]);
    expect(store.stats().rawResponses).toBe(1);
  });

  it('returns undefined for a missing key', () => {
    expect(store.getRaw('KMCO', '2024-01-01', 'departure')).toBeUndefined();
  });
});

describe('FlightStore flights', () => {
  it('replaces the whole batch for a key', () => {
    store.putFlights('KMCO', '2024-01-01', 'departure', [
      { icao24: 'a1', firstSeen: 1 },
      { icao24: 'a2', firstSeen: 2 },
    ]);
    store.putFlights('KMCO', '2024-01-01', 'departure', [{ icao24: 'a3', firstSeen: 3 }]);
    store.commit();
    expect(icaos(store.query())).toEqual(['a3']);
  });

  it('does not touch other kinds for the same airport and date', () => {
    store.putFlights('KMCO', '2024-01-01', 'departure', [{ icao24: 'a1', firstSeen: 1 }]);
    store.putFlights('KMCO', '2024-01-01', 'destination', [{ icao24: 'c1', firstSeen: 2 }]);
    store.putFlights('KMCO', '2024-01-01', 'departure', []);
    expect(icaos(store.query())).toEqual(['c1']);
  });

  it('drops flights without icao24 or firstSeen', () => {
    const result = store.putFlights('KMCO', '2024-01-01', 'departure', [
      { icao24: 'abc123', firstSeen: 100 },
      { firstSeen: 200 },
      { icao24: 'def456' },
      { icao24: '', firstSeen: 300 },
      { icao24: 'zero00', firstSeen: 0, lastSeen: null },
    ]);
    expect(result).toEqual({ inserted: 2, dropped: 3 });

    const rows = store.query();
    expect(icaos(rows)).toEqual(['zero00', 'abc123']);
    expect(rows[1]).toEqual({
      airport: 'KMCO',
      date: '2024-01-01',
      kind: 'departure',
      icao24: 'abc123',
      first_seen: 100,
      last_seen: null,
      est_departure_airport: null,
      est_arrival_airport: null,
      callsign: null,
      est_departure_airport_horiz_distance: null,
      est_departure_airport_vert_distance: null,
      est_arrival_airport_horiz_distance: null,
      est_arrival_airport_vert_distance: null,
      departure_airport_candidates_count: null,
      arrival_airport_candidates_count: null,
    });
  });

  it('counts repeated flights once', () => {
    const result = store.putFlights('KMCO', '2024-01-01', 'departure', [
      { icao24: 'a1', firstSeen: 1, callsign: 'OLD' },
      { icao24: 'a1', firstSeen: 1, callsign: 'NEW' },
      { icao24: 'a1', firstSeen: 2 },
    ]);
    expect(result).toEqual({ inserted: 2, dropped: 0 });

    const rows = store.query();
    expect(rows).toHaveLength(2);
    expect(rows[0].callsign).toBe('NEW');
  });

  it('trims padded callsigns', () => {
    store.putFlights('KMCO', '2024-01-01', 'departure', [{ icao24: 'a1', firstSeen: 1, callsign: 'DAL123  ' }]);
    expect(store.query()[0].callsign).toBe('DAL123');
  });
});

describe('FlightStore commit', () => {
  it('makes writes durable across connections', () => {
    const dbPath = path.join(tmpDir, 'flights.sqlite');
    const first = new FlightStore(dbPath);
    first.putRaw('KMCO', '2024-01-01', 'departure', []);
    first.commit();
    first.putRaw('KMCO', '2024-01-02', 'departure', []);
    first.close();

    const second = new FlightStore(dbPath);
    expect(second.exists('KMCO', '2024-01-01', 'departure')).toBe(true);
    expect(second.exists('KMCO', '2024-01-02', 'departure')).toBe(false);
    second.close();
  });

  it('discards uncommitted writes on rollback', () => {
    store.putRaw('KMCO', '2024-01-01', 'departure', []);
    store.rollback();
    expect(store.exists('KMCO', '2024-01-01', 'departure')).toBe(false);
  });

  it('wraps driver failures in StorageError', () => {
    store.close();
    expect(() => store.exists('KMCO', '2024-01-01', 'departure')).toThrow(StorageError);
  });
});

describe('FlightStore query filters', () => {
  beforeEach(seed);

  it('orders by date, airport and first seen', () => {
    expect(icaos(store.query())).toEqual(['b1', 'a2', 'a1', 'a3']);
  });

  it('filters by departure airport', () => {
    expect(icaos(store.query({ departureAirports: ['KMCO'] }))).toEqual(['a2', 'a1', 'a3']);
  });

  it('combines departure airport with a date range', () => {
    expect(icaos(store.query({ departureAirports: ['KMCO'], startDate: '2024-01-02', endDate: '2024-01-02' }))).toEqual(['a3']);
  });

  it('filters by arrival airport', () => {
    expect(icaos(store.query({ arrivalAirports: ['KLAX'] }))).toEqual(['a1', 'a3']);
  });

  it('uses the queried airport as the arrival side of destination rows', () => {
    store.putFlights('KLAX', '2024-01-01', 'destination', [{ icao24: 'c1', firstSeen: 1704080000, estDepartureAirport: 'KMCO' }]);
    expect(icaos(store.query({ departureAirports: ['KMCO'], startDate: '2024-01-01', endDate: '2024-01-01' }))).toEqual(['c1', 'a2', 'a1']);
    expect(icaos(store.query({ arrivalAirports: ['KLAX'], kind: 'destination' }))).toEqual(['c1']);
  });

  it('returns nothing for unknown airports', () => {
    expect(store.query({ departureAirports: ['EGLL'] })).toEqual([]);
  });

  it('applies a limit', () => {
    expect(icaos(store.query({}, 2))).toEqual(['b1', 'a2']);
  });

  it('summarises the stored data', () => {
    expect(store.stats()).toEqual({ rawResponses: 1, flights: 4, airports: 2, firstDate: '2024-01-01', lastDate: '2024-01-02' });
  });
});

describe('FlightStore export', () => {
  it('writes CSV with a header and quoted cells', () => {
    store.putFlights('KMCO', '2024-01-01', 'departure', [{ icao24: 'a1', firstSeen: 100, callsign: 'AB,C' }]);
    store.putFlights('KLAX', '2024-01-01', 'departure', [{ icao24: 'b1', firstSeen: 200, callsign: 'SAY "HI"' }]);
    store.commit();
    const out = path.join(tmpDir, 'out.csv');

    expect(store.export(out, 'csv', { departureAirports: ['KMCO'] })).toBe(1);
    expect(fs.readFileSync(out, 'utf8')).toBe(
      `${FLIGHT_COLUMNS.join(',')}\nKMCO,2024-01-01,departure,a1,100,,,,"AB,C",,,,,,\n`,
    );

    expect(store.export(out, 'csv', { departureAirports: ['KLAX'] })).toBe(1);
    expect(fs.readFileSync(out, 'utf8').split('\n')[1]).toBe('KLAX,2024-01-01,departure,b1,200,,,,"SAY ""HI""",,,,,,');
  });

  it('writes only the header when nothing matches', () => {
    const out = path.join(tmpDir, 'empty.csv');
    expect(store.export(out, 'csv', { departureAirports: ['EGLL'] })).toBe(0);
    expect(fs.readFileSync(out, 'utf8')).toBe(`${FLIGHT_COLUMNS.join(',')}\n`);
  });

  it('writes an Arrow IPC file', () => {
    seed();
    const out = path.join(tmpDir, 'out.arrow');

    expect(store.export(out, 'arrow', { departureAirports: ['KMCO'] })).toBe(3);

    const table = tableFromIPC(fs.readFileSync(out));
    expect(table.numRows).toBe(3);
    expect(table.schema.fields.map((f) => f.name)).toEqual([...FLIGHT_COLUMNS]);
    expect(table.getChild('icao24')?.get(0)).toBe('a2');
    expect(table.getChild('first_seen')?.get(0)).toBe(1704068000);
    expect(table.getChild('last_seen')?.get(0)).toBeNull();
  });

  it('raises StorageError when the file cannot be written', () => {
    expect(() => store.export(path.join(tmpDir, 'missing', 'out.csv'), 'csv')).toThrow(StorageError);
  });
});
