// =============================================================================
// Rate-Limited API Gateway — throttle + retry around one remote API
// =============================================================================
// request(method, path, options)
//   → Waits out the per-system minimum spacing, sends the call, and retries:
//       • HTTP 429        — Retry-After header (seconds) when present,
//                           else 1.5^attempt s capped at the 429 ceiling
//       • HTTP 5xx        — 1.5^attempt s capped at the 5xx ceiling
//       • network/timeout — same as 5xx
//     Any other 4xx is permanent and thrown at once as a typed error
//     (NotFoundError for 404). Out of attempts on 429 → RateLimitExhaustedError.
//
// Calls are sequential: a sync cycle never fans out, so the
// spacing here is the only rate limiter.
// =============================================================================
import axios, { AxiosInstance, Method } from 'axios';
import type { ExternalSystem } from '../types';
import { GatewayError, NotFoundError, RateLimitExhaustedError } from '../utils/GatewayError';
import logger from '../utils/logger';

export interface GatewayPolicy {
  /** Minimum spacing between two consecutive calls */
  minIntervalMs: number;
  maxAttempts: number;
  backoffFactor: number;
  /** Ceiling for computed 429 back-off (Retry-After is honoured as sent) */
  rateLimitCapMs: number;
  serverErrorCapMs: number;
  timeoutMs: number;
  /** Response headers read, in order, for a server-provided wait in seconds */
  retryAfterHeaders: string[];
}

/** The slice of an axios instance the gateway needs */
export type HttpTransport = Pick<AxiosInstance, 'request'>;

export interface RateLimitedHttpOptions {
  system: ExternalSystem;
  baseURL: string;
  token: string;
  policy: GatewayPolicy;
  transport?: HttpTransport;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface RequestOptions {
  params?: Record<string, string | number | boolean>;
  data?: unknown;
  headers?: Record<string, string>;
}

/** Promise-based sleep */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class RateLimitedHttp {
  readonly system: ExternalSystem;
  private readonly policy: GatewayPolicy;
  private readonly transport: HttpTransport;
  private readonly wait: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastRequestAt = Number.NEGATIVE_INFINITY;

  constructor(options: RateLimitedHttpOptions) {
    this.system = options.system;
    this.policy = options.policy;
    this.wait = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.transport =
      options.transport ??
      axios.create({
        baseURL: options.baseURL,
        timeout: options.policy.timeoutMs,
        headers: {
          Authorization: `Bearer ${options.token}`,
          Accept: 'application/json',
        },
      });
  }

  /**
   * Sends one request under the retry policy and returns the response body.
   *
   * @throws NotFoundError           on 404
   * @throws RateLimitExhaustedError when attempts run out on a 429
   * @throws GatewayError            on any other permanent or exhausted failure
   */
  async request<T>(method: Method, path: string, options: RequestOptions = {}): Promise<T> {
    const { maxAttempts } = this.policy;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      await this.throttle();

      try {
        const response = await this.transport.request<T>({
          method,
          url: path,
          params: options.params,
          data: options.data,
          headers: options.headers,
        });
        return response.data;
      } catch (err) {
        if (!axios.isAxiosError(err)) throw err;

        const status = err.response?.status;
        const isLast = attempt === maxAttempts - 1;

        // ── Rate limited (429) ────────────────────────────────────────────
        if (status === 429) {
          if (isLast) {
            logger.error(`${this.system} API call failed after all retry attempts`, { method, path, maxAttempts });
            throw new RateLimitExhaustedError(this.system, method, path, maxAttempts);
          }
          const waitMs =
            this.retryAfterMs(err.response?.headers) ?? this.backoffMs(attempt, this.policy.rateLimitCapMs);
          logger.warn(`${this.system} rate limit hit (429) — backing off`, {
            method,
            path,
            attempt: attempt + 1,
            waitMs,
          });
          await this.wait(waitMs);
          continue;
        }

        // ── Server error (5xx) or network / timeout ──────────────────────
        if (status === undefined || status >= 500) {
          const failure =
            status === undefined
              ? new GatewayError(this.system, method, path, undefined, '', `${this.system} ${method} ${path} failed: ${err.message}`)
              : new GatewayError(this.system, method, path, status, describeBody(err.response?.data));
          if (isLast) {
            logger.error(`${this.system} API call failed after all retry attempts`, { method, path, maxAttempts });
            throw failure;
          }

          const waitMs = this.backoffMs(attempt, this.policy.serverErrorCapMs);
          logger.warn(`${this.system} ${status ?? err.code ?? 'network'} error — retrying in ${waitMs}ms`, {
            method,
            path,
            attempt: attempt + 1,
          });
          await this.wait(waitMs);
          continue;
        }

        // ── Client error (4xx except 429) — never retried ────────────────
        const body = describeBody(err.response?.data);
        if (status === 404) throw new NotFoundError(this.system, method, path, body);

        logger.error(`${this.system} client error — not retrying`, { method, path, status, body });
        throw new GatewayError(this.system, method, path, status, body);
      }
    }

    throw new RateLimitExhaustedError(this.system, method, path, maxAttempts);
  }

  // ── Internal helpers ──────────────────────────────────────────────────────

  private async throttle(): Promise<void> {
    const waitMs = this.lastRequestAt + this.policy.minIntervalMs - this.now();
    if (waitMs > 0) await this.wait(waitMs);
    this.lastRequestAt = this.now();
  }

  private backoffMs(attempt: number, capMs: number): number {
    return Math.min(Math.round(Math.pow(this.policy.backoffFactor, attempt) * 1000), capMs);
  }

  private retryAfterMs(headers: Record<string, unknown> | undefined): number | undefined {
    if (!headers) return undefined;
    for (const name of this.policy.retryAfterHeaders) {
      const raw = headers[name];
      if (typeof raw !== 'string' && typeof raw !== 'number') continue;
      const seconds = Number(raw);
      if (Number.isFinite(seconds) && seconds > 0) return seconds * 1000;
    }
    return undefined;
  }
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null || data === '') return '';
  const text = typeof data === 'string' ? data : JSON.stringify(data);
  return text.slice(0, 300);
}
