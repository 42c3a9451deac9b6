/**
 * Error taxonomy for the price resolver.
 *
 * TransientError never leaves the HTTP client: it is retried and, once
 * retries run out, wrapped in a PermanentError. Everything the arbitration
 * engine sees from a source is a PermanentError (or null for "not found").
 */

export interface ResolverErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class PriceResolverError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, options: ResolverErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details;

    Error.captureStackTrace(this, new.target);
  }
}

export class TransientError extends PriceResolverError {
  public readonly status?: number;
  public readonly retryAfterMs?: number;

  constructor(
    message: string,
    options: ResolverErrorOptions & { status?: number; retryAfterMs?: number } = {}
  ) {
    super(message, options.status === 429 ? 'RATE_LIMITED' : 'TRANSIENT', options);
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class PermanentError extends PriceResolverError {
  public readonly status?: number;

  constructor(message: string, options: ResolverErrorOptions & { status?: number; code?: string } = {}) {
    super(message, options.code ?? 'PERMANENT', options);
    this.status = options.status;
  }
}

/** Raised by an adapter whose query shape cannot be built from the identity it was given. */
export class AdapterConfigError extends PermanentError {
  constructor(sourceId: string, message: string) {
    super(`${sourceId}: ${message}`, { code: 'ADAPTER_CONFIG', details: { sourceId } });
  }
}

export class InvalidIdentityError extends PriceResolverError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid item identity: ${issues.join('; ')}`, 'INVALID_IDENTITY');
    this.issues = issues;
  }
}

export class InvalidContextError extends PriceResolverError {
  constructor(issues: string[]) {
    super(`Invalid market context: ${issues.join('; ')}`, 'INVALID_CONTEXT', { details: { issues } });
  }
}

export class ConfigError extends PriceResolverError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG');
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
