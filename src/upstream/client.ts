// This module wraps data-API calls with timeout, permit pool, retry, and content-type aware decoding.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import type { UpstreamSettings } from '../config/settings.js';
import type { QueryParams, UpstreamTextPayload } from '../types/domain.js';
import { AppError, PermanentUpstreamError, TransientUpstreamError, errorMessage } from '../utils/errors.js';
import { tryParseJson } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { PermitPool } from '../utils/permit-pool.js';

// This key marks guest access on the data API, which must not send an Authorization header.
export const GUEST_ACCESS_KEY = 'not_required_guest_access';

export interface UpstreamClientOptions {
  settings: UpstreamSettings;
  userAgent: string;
  logger?: FastifyBaseLogger;
  // Tests replace the backoff wait so retries run instantly.
  wait?: (delayMs: number) => Promise<void>;
}

// This capability is all the data tools need from the backing API.
export interface DataApi {
  get(endpoint: string, params?: QueryParams): Promise<unknown>;
}

// This helper reports whether an HTTP status should be retried.
function isTransientStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

// This class executes read requests against the backing data API.
export class UpstreamClient implements DataApi {
  private readonly settings: UpstreamSettings;
  private readonly userAgent: string;
  private readonly logger?: FastifyBaseLogger;
  private readonly pool: PermitPool;
  private readonly wait: (delayMs: number) => Promise<void>;

  public constructor(options: UpstreamClientOptions) {
    this.settings = options.settings;
    this.userAgent = options.userAgent;
    this.logger = options.logger?.child({
      component: 'upstream_client'
    });
    this.pool = new PermitPool({
      permits: options.settings.rateLimit,
      maxWaitMs: options.settings.permitWaitMs
    });
    this.wait = options.wait ?? ((delayMs) => sleep(delayMs));
  }

  // This helper writes one structured client event only when a logger is available.
  private log(
    level: 'debug' | 'info' | 'warn' | 'error',
    event: string,
    details?: Record<string, unknown>
  ): void {
    const sanitized = sanitizeForLog(details ?? {});
    this.logger?.[level](
      {
        event,
        details: sanitized
      },
      event
    );
  }

  // This helper computes the capped exponential backoff before the next attempt.
  private backoffDelay(attempt: number): number {
    return Math.min(this.settings.retryBaseDelayMs * 2 ** attempt, this.settings.retryMaxDelayMs);
  }

  // This helper joins base URL and endpoint, keeping dotted method prefixes intact.
  private buildUrl(endpoint: string, params?: QueryParams): URL {
    const baseUrl = this.settings.baseUrl;
    if (!baseUrl) {
      throw new AppError(503, 'upstream_not_configured', 'External API base URL is not configured.');
    }

    const joined = baseUrl.endsWith('.')
      ? `${baseUrl}${endpoint}`
      : `${baseUrl.replace(/\/+$/, '')}/${endpoint.replace(/^\/+/, '')}`;
    const url = new URL(joined);

    if (params) {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url;
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'User-Agent': this.userAgent
    };

    const apiKey = this.settings.apiKey;
    if (apiKey && apiKey !== GUEST_ACCESS_KEY) {
      headers.Authorization = `Bearer ${apiKey}`;
    }

    return headers;
  }

  // This helper performs one attempt and classifies its failure as transient or permanent.
  private async attempt(url: URL): Promise<unknown> {
    const abortController = new AbortController();
    const timer = setTimeout(() => abortController.abort(), this.settings.timeoutMs);

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: this.buildHeaders(),
        signal: abortController.signal
      });

      // The timeout stays armed while the body streams in.
      const body = await response.text();

      if (!response.ok) {
        const message = `External API returned HTTP ${response.status}${body ? `: ${body}` : ''}`;
        if (isTransientStatus(response.status)) {
          throw new TransientUpstreamError(message, response.status);
        }
        throw new PermanentUpstreamError(message, response.status);
      }

      const contentType = response.headers.get('content-type') ?? '';
      if (!contentType.includes('application/json')) {
        const text: UpstreamTextPayload = {
          content: body,
          status_code: response.status
        };
        return text;
      }

      const parsed = tryParseJson(body);
      if (!parsed.ok) {
        throw new PermanentUpstreamError(`External API returned invalid JSON: ${parsed.error}`, response.status);
      }
      return parsed.value;
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }

      // Network failures and timeouts during the request or the body read are retried.
      const reason = abortController.signal.aborted
        ? `timed out after ${this.settings.timeoutMs}ms`
        : errorMessage(error);
      throw new TransientUpstreamError(`External API request failed: ${reason}`);
    } finally {
      clearTimeout(timer);
    }
  }

  // This method executes one GET with a permit held and bounded retries for transient failures.
  public async get(endpoint: string, params?: QueryParams): Promise<unknown> {
    const url = this.buildUrl(endpoint, params);
    const maxAttempts = Math.max(1, this.settings.maxAttempts);
    const startedAt = Date.now();

    this.log('info', 'upstream_request_started', {
      endpoint,
      params,
      maxAttempts
    });

    return this.pool.run(async () => {
      for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
        const attemptNumber = attempt + 1;
        try {
          const payload = await this.attempt(url);
          this.log('info', 'upstream_request_completed', {
            endpoint,
            attemptsUsed: attemptNumber,
            durationMs: Date.now() - startedAt
          });
          return payload;
        } catch (error) {
          if (!(error instanceof TransientUpstreamError)) {
            this.log('error', 'upstream_request_failed_permanent', {
              endpoint,
              attempt: attemptNumber,
              error: errorForLog(error)
            });
            throw error;
          }

          if (attemptNumber >= maxAttempts) {
            this.log('error', 'upstream_request_failed_after_retries', {
              endpoint,
              attempts: attemptNumber,
              totalDurationMs: Date.now() - startedAt,
              error: errorForLog(error)
            });
            throw new PermanentUpstreamError(
              `${error.message} (after ${attemptNumber} attempts)`,
              error.upstreamStatus
            );
          }

          const delayMs = this.backoffDelay(attempt);
          this.log('warn', 'upstream_request_retry_scheduled', {
            endpoint,
            attempt: attemptNumber,
            status: error.upstreamStatus,
            delayMs
          });
          await this.wait(delayMs);
        }
      }

      throw new PermanentUpstreamError('External API request failed after retries.');
    });
  }
}
