import { fetch as undiciFetch } from 'undici';
import { z } from 'zod';
import { AuthenticationError, HttpRequestError, MalformedResponseError, errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { SecretStore } from '../secrets/secretStore';
import type { FetchLike } from './httpClient';

export interface TokenProvider {
  getToken(): Promise<string>;
  /** Forces new credentials; present only on providers that can renew them. */
  refresh?(): Promise<string>;
}

export class StaticTokenProvider implements TokenProvider {
  private readonly token: string;

  constructor(token: string) {
    this.token = token;
  }

  async getToken(): Promise<string> {
    return this.token;
  }
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive().optional()
});

export type RefreshTokenProviderOptions = {
  tokenUrl: string;
  clientId: string;
  secrets: SecretStore;
  secretName: string;
  /** Fraction of the token lifetime after which it is renewed ahead of use. */
  refreshRatio?: number;
  defaultLifetimeSeconds?: number;
  fetchImpl?: FetchLike;
  now?: () => number;
  logger?: Logger;
};

/**
 * OAuth refresh-token grant. The refresh token is read from the secret store and
 * every rotated refresh token the server hands back is written back to it.
 */
export class RefreshTokenProvider implements TokenProvider {
  private readonly options: RefreshTokenProviderOptions;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private accessToken: string | null = null;
  private renewAt = 0;
  private inflight: Promise<string> | null = null;

  constructor(options: RefreshTokenProviderOptions) {
    this.options = options;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => undiciFetch(url, init));
    this.now = options.now ?? Date.now;
  }

  async getToken(): Promise<string> {
    if (this.accessToken && this.now() < this.renewAt) {
      return this.accessToken;
    }
    return this.refresh();
  }

  refresh(): Promise<string> {
    if (!this.inflight) {
      this.inflight = this.exchange().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async exchange(): Promise<string> {
    const { tokenUrl, clientId, secrets, secretName, logger } = this.options;
    const refreshToken = await secrets.get(secretName);
    if (!refreshToken) {
      throw new AuthenticationError(`No refresh token stored under '${secretName}'; re-run the device authorization`);
    }

    const url = new URL(tokenUrl);
    url.searchParams.set('client_id', clientId);
    url.searchParams.set('grant_type', 'refresh_token');
    url.searchParams.set('refresh_token', refreshToken);

    const response = await this.fetchImpl(url.toString(), { method: 'POST', headers: { Accept: 'application/json' } });
    const text = await response.text();
    if (response.status === 400 || response.status === 401 || response.status === 403) {
      throw new AuthenticationError(`Refresh token was rejected with status ${response.status}`, {
        status: response.status
      });
    }
    if (!response.ok) {
      throw new HttpRequestError({ method: 'POST', url: tokenUrl, status: response.status, body: text.slice(0, 500) });
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new MalformedResponseError(`Token response is not JSON: ${errorMessage(error)}`, tokenUrl);
    }
    const parsed = tokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new MalformedResponseError('Token response is missing access_token', tokenUrl);
    }

    const lifetimeSeconds = parsed.data.expires_in ?? this.options.defaultLifetimeSeconds ?? 600;
    const ratio = this.options.refreshRatio ?? 0.8;
    this.accessToken = parsed.data.access_token;
    this.renewAt = this.now() + lifetimeSeconds * ratio * 1000;

    const rotated = parsed.data.refresh_token;
    if (rotated && rotated !== refreshToken) {
      await secrets.set(secretName, rotated);
      logger?.info({ secretName }, 'stored rotated refresh token');
    }
    return parsed.data.access_token;
  }
}
