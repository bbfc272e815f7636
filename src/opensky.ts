import { z } from 'zod';
import { dateToTimestamps } from './dates.js';
import { HttpError, ParseError, describeError } from './errors.js';
import { RateGate } from './gate.js';
import { logger } from './logger.js';
import { TokenManager } from './token.js';
import type { FlightKind, FlightPayload, TimeWindow } from './types.js';

const ENDPOINTS: Record<FlightKind, string> = {
  departure: '/flights/departure',
  destination: '/flights/arrival',
};

const nullableNumber = z.number().nullish();
const nullableString = z.string().nullish();

const flightPayloadSchema = z
  .object({
    icao24: nullableString,
    firstSeen: nullableNumber,
    lastSeen: nullableNumber,
    estDepartureAirport: nullableString,
    estArrivalAirport: nullableString,
    callsign: nullableString,
    estDepartureAirportHorizDistance: nullableNumber,
    estDepartureAirportVertDistance: nullableNumber,
    estArrivalAirportHorizDistance: nullableNumber,
    estArrivalAirportVertDistance: nullableNumber,
    departureAirportCandidatesCount: nullableNumber,
    arrivalAirportCandidatesCount: nullableNumber,
  })
  .passthrough();

export type OpenSkyClientOptions = {
  tokens: TokenManager;
  gate: RateGate;
  apiBase?: string;
  timeoutMs?: number;
};

export class OpenSkyClient {
  static readonly API_BASE = 'https://opensky-network.org/api';

  private readonly apiBase: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: OpenSkyClientOptions) {
    this.apiBase = (options.apiBase ?? OpenSkyClient.API_BASE).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  static dateToTimestamps = dateToTimestamps;

  fetchDepartures(airport: string, window: TimeWindow, signal?: AbortSignal): Promise<FlightPayload[]> {
    return this.fetchFlights('departure', airport, window, signal);
  }

  fetchDestinations(airport: string, window: TimeWindow, signal?: AbortSignal): Promise<FlightPayload[]> {
    return this.fetchFlights('destination', airport, window, signal);
  }

  /** `signal` abandons the call if it fires while waiting for the gate. */
  async fetchFlights(kind: FlightKind, airport: string, window: TimeWindow, signal?: AbortSignal): Promise<FlightPayload[]> {
    const url = new URL(this.apiBase + ENDPOINTS[kind]);
    url.searchParams.set('airport', airport);
    url.searchParams.set('begin', String(window.begin));
    url.searchParams.set('end', String(window.end));

    logger.debug(`Fetching ${kind}s for ${airport} (begin=${window.begin}, end=${window.end})`);
    const flights = await this.options.gate.run(() => {
      signal?.throwIfAborted();
      return this.getJson(url.toString());
    });
    logger.debug(`Retrieved ${flights.length} flights for ${airport}`);
    return flights;
  }

  private async getJson(url: string): Promise<FlightPayload[]> {
    const token = await this.options.tokens.getToken();

    let resp: Response;
    let text: string;
    try {
      resp = await fetch(url, {
        headers: { Authorization: `Bearer ${token.value}`, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await resp.text();
    } catch (e) {
      throw new HttpError(`Request to ${url} failed: ${describeError(e)}`, url, undefined, { cause: e });
    }
    logger.debug(`Request completed with status ${resp.status}`);

    // OpenSky answers 404 when the window holds no flights
    if (resp.status === 404) return [];
    if (!resp.ok) {
      throw new HttpError(`HTTP ${resp.status} from ${url}: ${text.slice(0, 200)}`, url, resp.status);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (e) {
      throw new ParseError(`Invalid JSON from ${url}`, { cause: e });
    }
    const parsed = z.array(flightPayloadSchema).safeParse(json);
    if (!parsed.success) {
      throw new ParseError(`Unexpected payload shape from ${url}: ${parsed.error.issues[0]?.message ?? 'not an array'}`);
    }
    return parsed.data;
  }
}

export type ClientSettings = {
  clientId: string;
  clientSecret: string;
  authUrl?: string;
  apiBase?: string;
  timeoutMs?: number;
  maxConcurrent?: number;
  rateLimitDelay?: number; // seconds
};

export const DEFAULT_AUTH_URL = 'https://auth.opensky-network.org/auth/realms/opensky-network/protocol/openid-connect/token';

export function createOpenSkyClient(settings: ClientSettings): OpenSkyClient {
  const tokens = new TokenManager({
    clientId: settings.clientId,
    clientSecret: settings.clientSecret,
    authUrl: settings.authUrl ?? DEFAULT_AUTH_URL,
    timeoutMs: settings.timeoutMs,
  });
  const gate = new RateGate({
    maxConcurrent: settings.maxConcurrent,
    delayMs: settings.rateLimitDelay === undefined ? undefined : settings.rateLimitDelay * 1000,
  });
  return new OpenSkyClient({ tokens, gate, apiBase: settings.apiBase, timeoutMs: settings.timeoutMs });
}
