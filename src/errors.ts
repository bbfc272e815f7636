export type FetchErrorCode = 'validation' | 'auth' | 'http' | 'parse' | 'storage';

export class FetchError extends Error {
  constructor(public readonly code: FetchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad input shape; raised before any network or storage work. */
export class ValidationError extends FetchError {
  constructor(message: string) {
    super('validation', message);
  }
}

/** Token exchange failed. No unit can proceed without a token. */
export class AuthError extends FetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('auth', message, options);
  }
}

export class HttpError extends FetchError {
  constructor(message: string, public readonly url: string, public readonly status?: number, options?: { cause?: unknown }) {
    super('http', message, options);
  }
}

export class ParseError extends FetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('parse', message, options);
  }
}

export class StorageError extends FetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage', message, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'An unknown error occurred';
}
