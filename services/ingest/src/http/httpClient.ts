import { Agent, fetch as undiciFetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import { computeExponentialBackoff, retryPolicyToBackoff, sleep as defaultSleep } from '@gridlake/shared';
import type { RetryPolicy, Sleep } from '@gridlake/shared';
import { AuthenticationError, HttpRequestError, MalformedResponseError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { TokenProvider } from './tokens';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | undefined;

export type HttpAuth =
  | { type: 'basic'; username: string; password?: string }
  | { type: 'bearer'; tokens: TokenProvider };

export type HttpClientOptions = {
  baseUrl: string;
  auth?: HttpAuth;
  timeoutMs?: number;
  retry?: RetryPolicy;
  userAgent?: string;
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  logger?: Logger;
};

const DEFAULT_RETRY: RetryPolicy = { attempts: 3, baseMs: 500, factor: 2, maxMs: 10_000, jitterRatio: 0.2 };
const BODY_EXCERPT_LENGTH = 500;

/**
 * JSON-over-HTTP session for one vendor API. Owns its connection pool until
 * `close()`; retries network errors, 429 and 5xx responses with exponential
 * backoff, and re-authenticates once on 401/403 when the token provider can refresh.
 */
export class HttpClient {
  private readonly baseUrl: string;
  private readonly auth?: HttpAuth;
  private readonly timeoutMs: number;
  private readonly retry: RetryPolicy;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly random?: () => number;
  private readonly logger?: Logger;
  private readonly agent: Agent | null;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.auth = options.auth;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.retry = options.retry ?? DEFAULT_RETRY;
    this.userAgent = options.userAgent ?? 'gridlake-ingest';
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random;
    this.logger = options.logger;
    if (options.fetchImpl) {
      this.fetchImpl = options.fetchImpl;
      this.agent = null;
    } else {
      const agent = new Agent({ keepAliveTimeout: 10_000 });
      this.agent = agent;
      this.fetchImpl = (url, init) => undiciFetch(url, { ...init, dispatcher: agent });
    }
  }

  buildUrl(path: string, query?: Record<string, QueryValue>): string {
    const url = /^https?:\/\//i.test(path) ? new URL(path) : new URL(`${this.baseUrl}/${path.replace(/^\/+/, '')}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }
    return url.toString();
  }

  /** `path` may be absolute, as returned in pagination links. */
  async getJson(path: string, query?: Record<string, QueryValue>): Promise<unknown> {
    const url = this.buildUrl(path, query);
    let reauthenticated = false;
    let attempt = 1;

    for (;;) {
      let response: Response;
      try {
        response = await this.send(url);
      } catch (error) {
        if (error instanceof AuthenticationError) {
          throw error;
        }
        const failure = new HttpRequestError({
          method: 'GET',
          url,
          status: null,
          cause: error,
          message: `GET ${url} failed: ${errorMessage(error)}`
        });
        if (attempt < this.retry.attempts) {
          await this.backoff(attempt, failure);
          attempt += 1;
          continue;
        }
        throw failure;
      }

      if (response.status === 401 || response.status === 403) {
        await response.body?.cancel();
        const tokens = this.auth?.type === 'bearer' ? this.auth.tokens : null;
        if (!reauthenticated && tokens?.refresh) {
          reauthenticated = true;
          this.logger?.info({ url, status: response.status }, 're-authenticating after rejected credentials');
          await tokens.refresh();
          continue;
        }
        throw new AuthenticationError(`GET ${url} was rejected with status ${response.status}`, { status: response.status });
      }

      const text = await response.text();
      if (!response.ok) {
        const failure = new HttpRequestError({
          method: 'GET',
          url,
          status: response.status,
          body: text.slice(0, BODY_EXCERPT_LENGTH)
        });
        if (failure.transient && attempt < this.retry.attempts) {
          await this.backoff(attempt, failure);
          attempt += 1;
          continue;
        }
        throw failure;
      }

      if (text.trim().length === 0) {
        throw new MalformedResponseError(`GET ${url} returned an empty body`, url, { status: response.status });
      }
      try {
        return JSON.parse(text);
      } catch (error) {
        throw new MalformedResponseError(`GET ${url} returned a body that is not JSON`, url, {
          status: response.status,
          reason: errorMessage(error),
          body: text.slice(0, BODY_EXCERPT_LENGTH)
        });
      }
    }
  }

  async close(): Promise<void> {
    if (this.agent) {
      await this.agent.close();
    }
  }

  private async send(url: string): Promise<Response> {
    const headers = new Headers({ Accept: 'application/json', 'User-Agent': this.userAgent });
    const authorization = await this.authorization();
    if (authorization) {
      headers.set('Authorization', authorization);
    }
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchImpl(url, { method: 'GET', headers, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async authorization(): Promise<string | null> {
    if (!this.auth) {
      return null;
    }
    if (this.auth.type === 'basic') {
      const credentials = Buffer.from(`${this.auth.username}:${this.auth.password ?? ''}`, 'utf8').toString('base64');
      return `Basic ${credentials}`;
    }
    return `Bearer ${await this.auth.tokens.getToken()}`;
  }

  private async backoff(attempt: number, failure: HttpRequestError): Promise<void> {
    const delay = computeExponentialBackoff(attempt, { ...retryPolicyToBackoff(this.retry), random: this.random });
    this.logger?.warn(
      { url: failure.url, status: failure.status, attempt, delayMs: delay },
      'transient request failure, retrying'
    );
    await this.sleep(delay);
  }
}
