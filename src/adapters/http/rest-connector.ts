import { z } from 'zod';
import { ApiCredentials, AppConfig } from '../../config/app.config';
import { Result } from '../../types/result.types';
import { createLogger, errorMessage, Logger } from '../../utils/logger';
import {
  HttpError,
  isRetryableRequestError,
  RetryExhaustedError,
  retryWithBackoff
} from '../../utils/retry.util';

export type HttpMethod = 'GET' | 'POST' | 'PUT';

export interface RequestOptions {
  query?: Record<string, string | number | boolean>;
  body?: unknown;
}

export interface ConnectionCheck {
  ok: boolean;
  message: string;
}

/**
 * Credentialed JSON-over-HTTP client shared by the inventory, transport and
 * weather connectors. Every call is retried with backoff and resolves to a
 * Result; nothing here throws to the caller.
 */
export abstract class RestConnector {
  protected readonly logger: Logger;

  protected constructor(
    protected readonly name: string,
    protected readonly credentials: ApiCredentials,
    protected readonly config: AppConfig
  ) {
    this.logger = createLogger(name);
  }

  /** Adds credentials to an outgoing request. */
  protected abstract authenticate(url: URL, headers: Record<string, string>): void;

  protected async call<T>(
    method: HttpMethod,
    endpoint: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<Result<T>> {
    const attempts = this.config.http.retry.maxRetries + 1;
    try {
      const payload = await retryWithBackoff<unknown>(
        () => this.request(method, endpoint, options),
        this.config.http.retry,
        isRetryableRequestError,
        (error, attempt, delayMs) => {
          this.logger.warn(
            `${method} ${endpoint} failed (attempt ${attempt}/${attempts}): ${error.message}; retrying in ${Math.round(delayMs)}ms`
          );
        }
      );

      const validation = schema.safeParse(payload);
      if (!validation.success) {
        const issues = validation.error.issues
          .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join(', ');
        return {
          success: false,
          message: `${this.name} returned an unexpected response for ${endpoint}: ${issues}`
        };
      }

      return {
        success: true,
        data: validation.data,
        message: `${method} ${endpoint} succeeded`
      };
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        return {
          success: false,
          message: `${method} ${endpoint} failed after ${error.attempts} attempts: ${error.lastError.message}`
        };
      }

      return {
        success: false,
        message: `${method} ${endpoint} failed: ${errorMessage(error)}`
      };
    }
  }

  /**
   * Call whose response body is not needed.
   */
  protected async execute(
    method: HttpMethod,
    endpoint: string,
    options: RequestOptions = {}
  ): Promise<Result<void>> {
    const result = await this.call(method, endpoint, z.unknown(), options);
    if (!result.success) {
      return result;
    }
    return { success: true, message: result.message };
  }

  /**
   * Single authenticated GET of the base URL, without retries.
   * 401/403 means the credentials were rejected; 5xx or a network failure
   * means the API is unreachable. Anything else counts as reachable.
   */
  async checkConnection(): Promise<ConnectionCheck> {
    try {
      await this.request('GET', '', {});
      return { ok: true, message: `${this.name} reachable at ${this.credentials.url}` };
    } catch (error) {
      if (error instanceof HttpError) {
        if (error.statusCode === 401 || error.statusCode === 403) {
          return { ok: false, message: `${this.name} rejected the configured credentials (HTTP ${error.statusCode})` };
        }
        if (error.statusCode < 500) {
          return { ok: true, message: `${this.name} reachable at ${this.credentials.url} (HTTP ${error.statusCode})` };
        }
      }
      return { ok: false, message: `${this.name} unreachable at ${this.credentials.url}: ${errorMessage(error)}` };
    }
  }

  private async request(method: HttpMethod, endpoint: string, options: RequestOptions): Promise<unknown> {
    const url = this.buildUrl(endpoint, options.query);
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    this.authenticate(url, headers);

    this.logger.debug(`${method} ${url.pathname}`);
    const response = await fetch(url.toString(), {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
      signal: AbortSignal.timeout(this.config.http.timeoutMs)
    });

    // Check HTTP status first (for retryability)
    if (!response.ok) {
      throw new HttpError(response.status, response.statusText);
    }

    if (response.status === 204) {
      return {};
    }
    const data: unknown = await response.json();
    return data;
  }

  private buildUrl(endpoint: string, query?: RequestOptions['query']): URL {
    const base = this.credentials.url.endsWith('/') ? this.credentials.url : `${this.credentials.url}/`;
    const url = new URL(endpoint, base);
    for (const [key, value] of Object.entries(query ?? {})) {
      url.searchParams.set(key, String(value));
    }
    return url;
  }
}
