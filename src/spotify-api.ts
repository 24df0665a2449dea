import { z } from 'zod';
import { Response } from 'node-fetch';
import { Credential } from './types';
import { RetrievalError, TransientAuthError } from './errors';
import { OAuthClient } from './oauth-client';
import { HttpFetch, defaultFetch, errorMessage } from './http';
import { config } from './config';
import logger from './logger';

export interface ApiResult<T> {
  data: T;
  credential: Credential;  // The credential the request succeeded with, possibly refreshed
}

export interface SpotifyApiOptions {
  fetch?: HttpFetch;
  timeoutMs?: number;
}

/**
 * Authenticated GET against the Spotify Web API.
 *
 * An expired credential is refreshed before the request goes out. A 401 gets
 * exactly one refresh-and-retry; nothing else is retried.
 */
export class SpotifyApi {
  private fetch: HttpFetch;
  private timeoutMs: number;

  constructor(private oauth: OAuthClient, options: SpotifyApiOptions = {}) {
    this.fetch = options.fetch ?? defaultFetch;
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutMs;
  }

  async get<T>(url: string, credential: Credential, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ApiResult<T>> {
    let current = credential;

    if (this.oauth.isExpired(current)) {
      logger.debug('Access token expired, refreshing before request', { url });
      current = await this.oauth.refresh(current);
    }

    try {
      return { data: await this.request(url, current, schema), credential: current };
    } catch (error) {
      if (!(error instanceof TransientAuthError)) {
        throw error;
      }
      logger.info('Access token rejected, refreshing and retrying once', { url });
    }

    current = await this.oauth.refresh(current);

    try {
      return { data: await this.request(url, current, schema), credential: current };
    } catch (error) {
      if (error instanceof TransientAuthError) {
        throw new RetrievalError('Spotify rejected the refreshed access token', 401, { cause: error });
      }
      throw error;
    }
  }

  private async request<T>(url: string, credential: Credential, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    let response: Response;
    try {
      response = await this.fetch(url, {
        headers: {
          Authorization: `Bearer ${credential.access_token}`,
          Accept: 'application/json'
        },
        timeout: this.timeoutMs
      });
    } catch (error) {
      throw new RetrievalError(`Spotify API request failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (response.status === 401) {
      throw new TransientAuthError('Spotify rejected the access token');
    }

    if (response.status === 429) {
      const retryAfter = response.headers.get('Retry-After') ?? 'a few';
      throw new RetrievalError(`Spotify rate limit reached. Retry after ${retryAfter} second(s).`, 429);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new RetrievalError(`Spotify API request failed (${response.status}): ${text}`, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new RetrievalError('Spotify returned a response that is not JSON', response.status, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      logger.debug('Malformed Spotify response', { url, issues });
      throw new RetrievalError(`Malformed response from Spotify: ${issues.join('; ')}`, response.status);
    }

    return parsed.data;
  }
}
