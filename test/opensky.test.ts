import { afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { AuthError, HttpError, ParseError } from '../src/errors.js';
import { RateGate } from '../src/gate.js';
import { logger } from '../src/logger.js';
import { OpenSkyClient } from '../src/opensky.js';
import { TokenManager } from '../src/token.js';

const AUTH_URL = 'https://auth.test/token';
const API_BASE = 'https://api.test';
const WINDOW = { begin: 1704067200, end: 1704153599 };

const flights = [
  { icao24: 'a1b2c3', firstSeen: 1704070000, lastSeen: 1704080000, estDepartureAirport: 'KMCO', estArrivalAirport: 'KLAX', callsign: 'DAL123  ' },
  { icao24: 'd4e5f6', firstSeen: 1704071000, estArrivalAirport: null },
];

function json(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function stubApi(api: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    const url = String(input);
    if (url === AUTH_URL) return json({ access_token: 'test-token', expires_in: 3600 });
    return api(url, init);
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function makeClient(timeoutMs = 1000) {
  const tokens = new TokenManager({ clientId: 'test-id', clientSecret: 'test-secret', authUrl: AUTH_URL });
  return new OpenSkyClient({ tokens, gate: new RateGate({ maxConcurrent: 2, delayMs: 0 }), apiBase: API_BASE, timeoutMs });
}

beforeAll(() => logger.setLevel('silent'));

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenSkyClient', () => {
  it('fetches departures with the window and a bearer token', async () => {
    const fetchMock = stubApi(() => json(flights));

    const result = await makeClient().fetchDepartures('KMCO', WINDOW);

    expect(result).toEqual(flights);
    const call = fetchMock.mock.calls.find(([input]) => String(input) !== AUTH_URL);
    expect(String(call?.[0])).toBe('https://api.test/flights/departure?airport=KMCO&begin=1704067200&end=1704153599');
    expect(call?.[1]?.headers).toMatchObject({ Authorization: 'Bearer test-token' });
  });

  it('fetches destinations from the arrival endpoint', async () => {
    const fetchMock = stubApi(() => json([]));
    await makeClient().fetchDestinations('KLAX', WINDOW);
    const urls = fetchMock.mock.calls.map(([input]) => String(input));
    expect(urls).toContain('https://api.test/flights/arrival?airport=KLAX&begin=1704067200&end=1704153599');
  });

  it('fetches the token once for several requests', async () => {
    const fetchMock = stubApi(() => json([]));
    const client = makeClient();
    await Promise.all([client.fetchDepartures('KMCO', WINDOW), client.fetchDepartures('KJFK', WINDOW)]);
    expect(fetchMock.mock.calls.filter(([input]) => String(input) === AUTH_URL)).toHaveLength(1);
  });

  it('treats 404 as an empty window', async () => {
    stubApi(() => new Response('', { status: 404 }));
    await expect(makeClient().fetchDepartures('KMCO', WINDOW)).resolves.toEqual([]);
  });

  it('raises HttpError on other error statuses', async () => {
    stubApi(() => new Response('server on fire', { status: 503 }));
    const err = await makeClient().fetchDepartures('KMCO', WINDOW).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: 503, code: 'http' });
  });

  it('raises HttpError when the request itself fails', async () => {
    stubApi(() => {
      throw new DOMException('The operation was aborted due to timeout', 'TimeoutError');
    });
    const err = await makeClient().fetchDepartures('KMCO', WINDOW).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: undefined });
  });

  it('gives up on a request that outlives the timeout', async () => {
    let seen: AbortSignal | undefined;
    // never settles unless the request carries a signal that fires
    stubApi(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (!signal) return;
          seen = signal;
          signal.addEventListener('abort', () => reject(signal.reason));
        }),
    );
    const err = await makeClient(50).fetchDepartures('KMCO', WINDOW).catch((e: unknown) => e);
    expect(seen?.aborted).toBe(true);
    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ status: undefined, url: 'https://api.test/flights/departure?airport=KMCO&begin=1704067200&end=1704153599' });
  });

  it('raises ParseError on malformed JSON', async () => {
    stubApi(() => new Response('[{"icao24":', { status: 200 }));
    await expect(makeClient().fetchDepartures('KMCO', WINDOW)).rejects.toBeInstanceOf(ParseError);
  });

  it('raises ParseError when the body is not an array of flights', async () => {
    stubApi(() => json({ flights: [] }));
    await expect(makeClient().fetchDepartures('KMCO', WINDOW)).rejects.toBeInstanceOf(ParseError);

    stubApi(() => json([{ icao24: 42 }]));
    await expect(makeClient().fetchDepartures('KMCO', WINDOW)).rejects.toBeInstanceOf(ParseError);
  });

  it('propagates AuthError from the token exchange', async () => {
    vi.stubGlobal('fetch', vi.fn<typeof fetch>(async () => json({ error: 'invalid_client' }, 401)));
    await expect(makeClient().fetchDepartures('KMCO', WINDOW)).rejects.toBeInstanceOf(AuthError);
  });

  it('does not call the API once the signal has fired', async () => {
    const fetchMock = stubApi(() => json([]));
    const abort = new AbortController();
    abort.abort(new AuthError('gone'));
    await expect(makeClient().fetchDepartures('KMCO', WINDOW, abort.signal)).rejects.toThrow('gone');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('exposes the UTC day conversion', () => {
    expect(OpenSkyClient.dateToTimestamps('2024-01-01')).toEqual(WINDOW);
  });
});
