import { z } from 'zod';
import { ymd, type DateInput } from './dates.js';
import { ValidationError } from './errors.js';
import { logger } from './logger.js';

const airportCode = z.string().length(4);

const DATE_INPUT = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2}):(\d{2})Z?)?$/;

/**
 * Splits a comma-separated list, upper-cases each code and drops anything
 * that isn't exactly 4 characters.
 */
export function parseAirports(raw: string): string[] {
  const codes: string[] = [];
  for (const part of raw.split(',')) {
    const code = part.trim().toUpperCase();
    if (!code) continue;
    if (!airportCode.safeParse(code).success) {
      logger.warn(`Invalid airport code '${code}' (must be exactly 4 characters) - skipping`);
      continue;
    }
    codes.push(code);
  }
  return codes;
}

export function requireAirports(raw: string, label = 'airport'): string[] {
  const codes = parseAirports(raw);
  if (codes.length === 0) {
    throw new ValidationError(`No valid ${label} codes provided. Airport codes must be exactly 4 characters.`);
  }
  return codes;
}

/**
 * Accepts `YYYY-MM-DD`, `YYYY-MM-DD HH:MM:SS` or `YYYY-MM-DDTHH:MM:SS`.
 * Times are read as UTC.
 */
export function parseDateInput(raw: string): DateInput {
  const match = DATE_INPUT.exec(raw.trim());
  if (!match) {
    throw new ValidationError(
      `Invalid date/datetime format: '${raw}'. Use YYYY-MM-DD, 'YYYY-MM-DD HH:MM:SS', or 'YYYY-MM-DDTHH:MM:SS'`,
    );
  }

  const [, y, mo, d, h, mi, s] = match;
  const hasTime = h !== undefined;
  const ms = Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h ?? 0), Number(mi ?? 0), Number(s ?? 0));
  const instant = new Date(ms);
  const date = `${y}-${mo}-${d}`;

  // Date.UTC rolls 2024-13-45 over into a later date; reject instead
  const outOfRange = Number(h ?? 0) > 23 || Number(mi ?? 0) > 59 || Number(s ?? 0) > 59;
  if (Number.isNaN(ms) || ymd(instant) !== date || outOfRange) {
    throw new ValidationError(`Invalid date/datetime value: '${raw}'`);
  }
  return hasTime ? { date, instant } : { date };
}

function startOf(input: DateInput): number {
  return input.instant ? input.instant.getTime() : Date.parse(`${input.date}T00:00:00Z`);
}

function endOf(input: DateInput): number {
  return input.instant ? input.instant.getTime() : Date.parse(`${input.date}T23:59:59Z`);
}

export function validateRange(start: DateInput, end: DateInput) {
  if (startOf(start) > endOf(end)) {
    throw new ValidationError('Start date must be before or equal to end date');
  }
}

export function requireCredentials(clientId?: string, clientSecret?: string): { clientId: string; clientSecret: string } {
  if (!clientId || !clientSecret) {
    throw new ValidationError(
      'OAuth credentials required. Set OPENSKY_CLIENT_ID and OPENSKY_CLIENT_SECRET environment variables or use --client-id and --client-secret options.',
    );
  }
  return { clientId, clientSecret };
}
