import { generateDateRange, windowForDate, type DateInput } from './dates.js';
import { AuthError, describeError } from './errors.js';
import { logger } from './logger.js';
import type { FlightStore } from './db.js';
import type { FetchUnit, FlightKind, FlightPayload, RunSummary, TimeWindow } from './types.js';

export type FlightSource = {
  fetchFlights(kind: FlightKind, airport: string, window: TimeWindow, signal?: AbortSignal): Promise<FlightPayload[]>;
};

export type FetchRequest = {
  airports: string[];
  start: DateInput;
  end: DateInput;
  kind: FlightKind;
  skipExisting: boolean;
};

export type UnitResult =
  | { status: 'fetched'; count: number }
  | { status: 'failed'; reason: string }
  | { status: 'abandoned' };

export interface FetchObserver {
  runStarted?(info: { total: number; skipped: number; queued: number }): void;
  unitSkipped?(unit: FetchUnit): void;
  unitStarted?(unit: FetchUnit, window: TimeWindow): void;
  unitSucceeded?(unit: FetchUnit, count: number): void;
  unitFailed?(unit: FetchUnit, reason: string): void;
  runFinished?(summary: RunSummary): void;
}

export const loggingObserver: FetchObserver = {
  runStarted({ total, skipped, queued }) {
    if (skipped > 0) logger.info(`Skipped ${skipped} airport-date combinations (already in database)`);
    if (queued === 0) logger.info('No new data to fetch (all dates already exist in database)');
    else logger.info(`Total requests: ${total} | Cached (skipped): ${skipped} | Will fetch: ${queued}`);
  },
  unitSkipped(unit) {
    logger.debug(`Skipping ${unit.airport} ${unit.date} (already exists)`);
  },
  unitStarted(unit) {
    logger.debug(`Starting fetch for ${unit.airport} ${unit.date}`);
  },
  unitSucceeded(unit, count) {
    logger.info(`Fetched ${unit.airport} ${unit.date}: ${count} flights`);
  },
  unitFailed(unit, reason) {
    logger.error(`Error fetching ${unit.airport} ${unit.date}: ${reason}`);
  },
  runFinished(s) {
    logger.info(`Done! fetched=${s.fetched} failed=${s.failed} skipped=${s.skipped} flights=${s.flights}`);
  },
};

/**
 * Expands airports × dates into fetch units and runs them concurrently.
 * Concurrency and request spacing are enforced by the source's rate gate.
 */
export class FlightFetcher {
  constructor(
    private readonly store: FlightStore,
    private readonly source: FlightSource,
    private readonly observer: FetchObserver = loggingObserver,
  ) {}

  planUnits(request: FetchRequest): { units: FetchUnit[]; skipped: FetchUnit[] } {
    const dates = generateDateRange(request.start.date, request.end.date);
    const units: FetchUnit[] = [];
    const skipped: FetchUnit[] = [];
    for (const airport of request.airports) {
      for (const date of dates) {
        const unit: FetchUnit = { airport, date, kind: request.kind };
        if (request.skipExisting && this.store.exists(airport, date, request.kind)) {
          skipped.push(unit);
        } else {
          units.push(unit);
        }
      }
    }
    return { units, skipped };
  }

  async run(request: FetchRequest): Promise<RunSummary> {
    const { units, skipped } = this.planUnits(request);
    skipped.forEach((u) => this.observer.unitSkipped?.(u));
    this.observer.runStarted?.({ total: units.length + skipped.length, skipped: skipped.length, queued: units.length });

    const abort = new AbortController();
    const results = await Promise.all(units.map((unit) => this.runUnit(unit, request, abort)));

    if (abort.signal.aborted) {
      const reason: unknown = abort.signal.reason;
      throw reason instanceof AuthError ? reason : new AuthError(describeError(reason), { cause: reason });
    }

    const summary: RunSummary = { total: units.length + skipped.length, skipped: skipped.length, fetched: 0, failed: 0, flights: 0 };
    for (const r of results) {
      if (r.status === 'fetched') {
        summary.fetched++;
        summary.flights += r.count;
      } else if (r.status === 'failed') {
        summary.failed++;
      }
    }
    this.observer.runFinished?.(summary);
    return summary;
  }

  private async runUnit(unit: FetchUnit, request: FetchRequest, abort: AbortController): Promise<UnitResult> {
    if (abort.signal.aborted) return { status: 'abandoned' };
    const window = windowForDate(unit.date, request.start, request.end);
    this.observer.unitStarted?.(unit, window);

    let flights: FlightPayload[];
    try {
      flights = await this.source.fetchFlights(unit.kind, unit.airport, window, abort.signal);
    } catch (e) {
      if (e instanceof AuthError) {
        if (!abort.signal.aborted) abort.abort(e);
        return { status: 'abandoned' };
      }
      return this.fail(unit, e);
    }

    // No await from here on: the three writes and the commit land together.
    try {
      this.store.putRaw(unit.airport, unit.date, unit.kind, flights);
      const { inserted } = this.store.putFlights(unit.airport, unit.date, unit.kind, flights);
      this.store.commit();
      this.observer.unitSucceeded?.(unit, inserted);
      return { status: 'fetched', count: inserted };
    } catch (e) {
      this.store.rollback();
      return this.fail(unit, e);
    }
  }

  private fail(unit: FetchUnit, error: unknown): UnitResult {
    const reason = describeError(error);
    this.observer.unitFailed?.(unit, reason);
    return { status: 'failed', reason };
  }
}
