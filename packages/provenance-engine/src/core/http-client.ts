/**
 * HTTP Client for Collaborator Services
 *
 * Shared transport for the retrieval, verification and descriptor services:
 * - Exponential backoff with jitter on retryable statuses
 * - Per-request timeouts via AbortController
 * - Typed errors that the resilience layer can classify
 *
 * Uses the native fetch API.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 60000 });
 * const body = await client.postJSON('http://retrieval:8001/search', { image_id: 'img-1', top_k: 10 });
 * ```
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts (default: 2) */
  readonly maxRetries: number;

  /** Initial delay before first retry in milliseconds (default: 500) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 10000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  /** User-Agent header */
  readonly userAgent: string;

  /** Jitter factor to prevent thundering herd (0-1, default: 0.1) */
  readonly jitterFactor: number;
}

/**
 * Per-request fetch options (override client defaults)
 */
export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly retries?: number;
  readonly headers?: Record<string, string>;
  readonly method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  readonly body?: string;
  readonly signal?: AbortSignal;
}

// ============================================================================
// Error Types
// ============================================================================

/**
 * HTTP error response (4xx, 5xx)
 */
export class HTTPError extends Error {
  readonly statusCode: number;
  readonly url: string;
  readonly detail: string | null;

  constructor(message: string, statusCode: number, url: string, detail: string | null = null) {
    super(message);
    this.name = 'HTTPError';
    this.statusCode = statusCode;
    this.url = url;
    this.detail = detail;
  }
}

/**
 * Request timeout error (AbortController triggered)
 */
export class HTTPTimeoutError extends Error {
  readonly url: string;
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Network error (connection refused, DNS resolution, etc.)
 */
export class HTTPNetworkError extends Error {
  readonly url: string;

  constructor(url: string, cause: Error) {
    super(`Network error: ${cause.message}`, { cause });
    this.name = 'HTTPNetworkError';
    this.url = url;
  }
}

/**
 * JSON parse error
 */
export class HTTPJSONParseError extends Error {
  readonly url: string;
  readonly responseText: string;

  constructor(url: string, responseText: string, cause: Error) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.name = 'HTTPJSONParseError';
    this.url = url;
    this.responseText = responseText.slice(0, 500);
  }
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 2,
      initialDelayMs: 500,
      backoffMultiplier: 2,
      maxDelayMs: 10000,
      timeoutMs: 60000,
      userAgent: 'provenance-engine/1.0',
      jitterFactor: 0.1,
      ...config,
    };
  }

  /**
   * Fetch and parse JSON response
   *
   * @throws {HTTPError} For HTTP error responses (4xx, 5xx)
   * @throws {HTTPTimeoutError} If request exceeds timeout
   * @throws {HTTPNetworkError} For network failures
   * @throws {HTTPJSONParseError} If response is not valid JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<unknown> {
    const response = await this.fetchWithRetry(url, options);
    const text = await response.text();

    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (error) {
      throw new HTTPJSONParseError(
        url,
        text,
        error instanceof Error ? error : new Error(String(error))
      );
    }
  }

  /**
   * POST a JSON body and parse the JSON response
   */
  async postJSON(url: string, body: unknown, options?: FetchOptions): Promise<unknown> {
    return this.fetchJSON(url, {
      ...options,
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...options?.headers },
      body: JSON.stringify(body),
    });
  }

  /**
   * Fetch raw response with retry logic
   */
  async fetchWithRetry(url: string, options?: FetchOptions): Promise<Response> {
    const maxRetries = options?.retries ?? this.config.maxRetries;
    let lastError: Error = new Error('Unknown error');

    for (let attempt = 1; attempt <= maxRetries + 1; attempt++) {
      const isLastAttempt = attempt === maxRetries + 1;

      try {
        const response = await this.fetchWithTimeout(url, options);

        if (response.ok) {
          return response;
        }

        const detail = await readErrorDetail(response);
        throw new HTTPError(
          `HTTP ${response.status}: ${detail ?? response.statusText}`,
          response.status,
          url,
          detail
        );
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryableError(lastError) || isLastAttempt) {
          throw lastError;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          error: lastError.message,
          url,
        });
      }

      await this.sleep(this.calculateBackoffDelay(attempt));
    }

    throw lastError;
  }

  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<Response> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const signal = options?.signal
        ? this.mergeAbortSignals([controller.signal, options.signal])
        : controller.signal;

      return await fetch(url, {
        method: options?.method ?? 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        body: options?.body,
        signal,
      });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        if (controller.signal.aborted) {
          throw new HTTPTimeoutError(url, timeoutMs);
        }
        // External signal aborted
        throw error;
      }

      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryableStatus(status: number): boolean {
    return (
      status === 408 ||
      status === 429 ||
      status === 500 ||
      status === 502 ||
      status === 503 ||
      status === 504
    );
  }

  private isRetryableError(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return this.isRetryableStatus(error.statusCode);
    }
    // Parse errors and unknown errors are deterministic: fail fast
    return false;
  }

  /**
   * The merged signal aborts when ANY of the input signals abort.
   */
  private mergeAbortSignals(signals: readonly AbortSignal[]): AbortSignal {
    const controller = new AbortController();

    for (const signal of signals) {
      if (signal.aborted) {
        controller.abort();
        break;
      }
      signal.addEventListener('abort', () => controller.abort(), { once: true });
    }

    return controller.signal;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Pull `detail` out of a JSON error body, falling back to the raw text
 */
async function readErrorDetail(response: Response): Promise<string | null> {
  let text: string;
  try {
    text = await response.text();
  } catch {
    return null;
  }
  if (text.length === 0) {
    return null;
  }
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text.slice(0, 500);
  }
  if (typeof body === 'object' && body !== null && 'detail' in body) {
    const detail: unknown = body.detail;
    return typeof detail === 'string' ? detail : JSON.stringify(detail);
  }
  return text.slice(0, 500);
}

/**
 * Create HTTP client with custom config
 */
export function createHTTPClient(config?: Partial<HTTPClientConfig>): HTTPClient {
  return new HTTPClient(config);
}
