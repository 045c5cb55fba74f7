// =============================================================================
// Gateway errors — what the rate-limited API gateways throw
// =============================================================================
// Transient failures (429, 5xx, network) are retried inside the gateway and
// only surface here once retries run out. Permanent 4xx responses surface
// immediately so callers can branch on them (404 → stale mapping recovery).
// =============================================================================
import type { ExternalSystem } from '../types';

export class GatewayError extends Error {
  public readonly system: ExternalSystem;
  /** HTTP status, or undefined for network / timeout failures */
  public readonly status: number | undefined;
  public readonly method: string;
  public readonly path: string;
  /** First part of the response body, for diagnostics */
  public readonly responseBody: string;

  constructor(
    system: ExternalSystem,
    method: string,
    path: string,
    status: number | undefined,
    responseBody = '',
    message?: string,
  ) {
    super(
      message ??
        `${system} ${method.toUpperCase()} ${path} failed${status !== undefined ? ` (${status})` : ''}` +
          (responseBody ? `: ${responseBody}` : ''),
    );
    this.name = 'GatewayError';
    this.system = system;
    this.status = status;
    this.method = method.toUpperCase();
    this.path = path;
    this.responseBody = responseBody;

    Object.setPrototypeOf(this, GatewayError.prototype);
  }
}

/** 404 — the record does not exist (or no longer exists) remotely. */
export class NotFoundError extends GatewayError {
  constructor(system: ExternalSystem, method: string, path: string, responseBody = '') {
    super(system, method, path, 404, responseBody, `${system} record not found: ${method.toUpperCase()} ${path}`);
    this.name = 'NotFoundError';

    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

/** 429 kept coming back until the attempt budget ran out. */
export class RateLimitExhaustedError extends GatewayError {
  public readonly attempts: number;

  constructor(system: ExternalSystem, method: string, path: string, attempts: number) {
    super(system, method, path, 429, '', `${system} rate limit still exceeded after ${attempts} attempts`);
    this.name = 'RateLimitExhaustedError';
    this.attempts = attempts;

    Object.setPrototypeOf(this, RateLimitExhaustedError.prototype);
  }
}
