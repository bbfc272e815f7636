import dotenv from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import { DEFAULT_AUTH_URL, OpenSkyClient } from './opensky.js';
import { FLIGHT_KINDS } from './types.js';
import { parseAirports } from './validation.js';

dotenv.config();

const list = (raw: string) => raw.split(',').map((s) => s.trim()).filter(Boolean);

const envSchema = z.object({
  OPENSKY_CLIENT_ID: z.string().optional(),
  OPENSKY_CLIENT_SECRET: z.string().optional(),
  OPENSKY_AUTH_URL: z.string().url().default(DEFAULT_AUTH_URL),
  OPENSKY_API_BASE: z.string().url().default(OpenSkyClient.API_BASE),
  DB_PATH: z.string().min(1).default('flights.sqlite'),
  MAX_CONCURRENT: z.coerce.number().int().min(1).default(5),
  RATE_LIMIT_DELAY: z.coerce.number().min(0).default(0.5),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  PORT: z.coerce.number().int().min(0).default(8080),
  CRON_SCHEDULE: z.string().default('0 3 * * *'),
  WATCH_AIRPORTS: z.string().default(''),
  WATCH_KINDS: z.string().default(FLIGHT_KINDS.join(',')).transform(list).pipe(z.array(z.enum(['departure', 'destination']))),
});

export type Config = ReturnType<typeof toConfig>;

function toConfig(env: z.infer<typeof envSchema>) {
  return {
    opensky: {
      clientId: env.OPENSKY_CLIENT_ID || undefined,
      clientSecret: env.OPENSKY_CLIENT_SECRET || undefined,
      authUrl: env.OPENSKY_AUTH_URL,
      apiBase: env.OPENSKY_API_BASE,
      timeoutMs: env.HTTP_TIMEOUT_MS,
    },
    dbPath: env.DB_PATH,
    maxConcurrent: env.MAX_CONCURRENT,
    rateLimitDelay: env.RATE_LIMIT_DELAY,
    logLevel: env.LOG_LEVEL,
    port: env.PORT,
    cron: env.CRON_SCHEDULE,
    watch: {
      airports: parseAirports(env.WATCH_AIRPORTS),
      kinds: env.WATCH_KINDS,
    },
  };
}

/** Reads settings from the environment (after `.env`); throws ValidationError on bad values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid configuration: ${issues}`);
  }
  return toConfig(parsed.data);
}
