import { randomBytes } from 'crypto';
import { Response } from 'node-fetch';
import { Credential, SpotifyConfig } from './types';
import { TokenResponseSchema, TokenErrorSchema } from './api-schemas';
import { AuthorizationError } from './errors';
import { TokenStore } from './token-store';
import { HttpFetch, defaultFetch, errorMessage } from './http';
import { config } from './config';
import logger from './logger';

// Refresh a little before the real expiry so a request never races it
export const EXPIRY_MARGIN_MS = 30 * 1000;

/**
 * Supplies the redirect URL the user lands on after approving access.
 * The console implementation reads a pasted URL; tests return a fixed one.
 */
export interface AuthorizationInput {
  awaitRedirectUrl(authorizationUrl: string): Promise<string>;
}

export interface OAuthClientOptions {
  fetch?: HttpFetch;
  now?: () => number;
  authUrl?: string;
  tokenUrl?: string;
  scope?: string;
  timeoutMs?: number;
}

export class OAuthClient {
  private fetch: HttpFetch;
  private now: () => number;
  private authUrl: string;
  private tokenUrl: string;
  private scope: string;
  private timeoutMs: number;

  constructor(
    private spotify: SpotifyConfig,
    private store: TokenStore,
    options: OAuthClientOptions = {}
  ) {
    this.fetch = options.fetch ?? defaultFetch;
    this.now = options.now ?? Date.now;
    this.authUrl = options.authUrl ?? config.authUrl;
    this.tokenUrl = options.tokenUrl ?? config.tokenUrl;
    this.scope = options.scope ?? config.scope;
    this.timeoutMs = options.timeoutMs ?? config.requestTimeoutMs;
  }

  buildAuthorizationUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.spotify.clientId,
      response_type: 'code',
      redirect_uri: this.spotify.redirectUri,
      scope: this.scope,
      state,
      show_dialog: 'false'
    });

    return `${this.authUrl}?${params.toString()}`;
  }

  /**
   * Run the interactive authorization-code flow and persist the result.
   */
  async authorize(input: AuthorizationInput): Promise<Credential> {
    const state = randomBytes(16).toString('hex');
    const authorizationUrl = this.buildAuthorizationUrl(state);

    logger.info('Spotify authorization required');
    const redirectUrl = await input.awaitRedirectUrl(authorizationUrl);
    const code = this.extractAuthorizationCode(redirectUrl, state);

    const credential = await this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.spotify.redirectUri
    });

    logger.info('Saved new Spotify credential');
    return credential;
  }

  async refresh(credential: Credential): Promise<Credential> {
    const refreshed = await this.requestToken(
      {
        grant_type: 'refresh_token',
        refresh_token: credential.refresh_token
      },
      credential.refresh_token
    );

    logger.info('Refreshed Spotify access token', {
      expiresAt: new Date(refreshed.expires_at).toISOString()
    });
    return refreshed;
  }

  isExpired(credential: Credential): boolean {
    return this.now() >= credential.expires_at - EXPIRY_MARGIN_MS;
  }

  /**
   * Stored credential if still valid, refreshed if expired, otherwise a fresh
   * authorization.
   */
  async ensureCredential(input: AuthorizationInput): Promise<Credential> {
    const stored = this.store.load();

    if (!stored) {
      return this.authorize(input);
    }

    if (this.isExpired(stored)) {
      logger.debug('Stored access token expired', {
        expiresAt: new Date(stored.expires_at).toISOString()
      });
      return this.refresh(stored);
    }

    return stored;
  }

  extractAuthorizationCode(redirectUrl: string, expectedState: string): string {
    let url: URL;
    try {
      url = new URL(redirectUrl.trim());
    } catch (error) {
      throw new AuthorizationError('The pasted redirect URL is not a valid URL', 'invalid_redirect', { cause: error });
    }

    const denied = url.searchParams.get('error');
    if (denied) {
      throw new AuthorizationError(`Authorization denied: ${denied}`, denied);
    }

    if (url.searchParams.get('state') !== expectedState) {
      throw new AuthorizationError('The state parameter in the redirect URL did not match', 'state_mismatch');
    }

    const code = url.searchParams.get('code');
    if (!code) {
      throw new AuthorizationError("Could not find a 'code' parameter in the redirect URL", 'missing_code');
    }

    return code;
  }

  private async requestToken(params: Record<string, string>, existingRefreshToken?: string): Promise<Credential> {
    const basic = Buffer.from(`${this.spotify.clientId}:${this.spotify.clientSecret}`).toString('base64');

    let response: Response;
    try {
      response = await this.fetch(this.tokenUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Authorization: `Basic ${basic}`
        },
        body: new URLSearchParams(params).toString(),
        timeout: this.timeoutMs
      });
    } catch (error) {
      throw new AuthorizationError(`Spotify token request failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!response.ok) {
      let text: string;
      try {
        text = await response.text();
      } catch (error) {
        throw new AuthorizationError(
          `Spotify token request failed (${response.status}): ${errorMessage(error)}`,
          undefined,
          { cause: error }
        );
      }
      const providerError = parseTokenError(text);
      throw new AuthorizationError(
        `Spotify token request failed (${response.status}): ${providerError?.error_description ?? providerError?.error ?? text}`,
        providerError?.error
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new AuthorizationError('Spotify returned a token response that is not JSON', 'invalid_response', { cause: error });
    }

    const parsed = TokenResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.debug('Unexpected token response', { issues: parsed.error.issues });
      throw new AuthorizationError('Spotify returned an unexpected token response', 'invalid_response');
    }

    const refreshToken = parsed.data.refresh_token ?? existingRefreshToken;
    if (!refreshToken) {
      throw new AuthorizationError(
        'Spotify did not return a refresh token. Please run again to authorize.',
        'missing_refresh_token'
      );
    }

    const credential: Credential = {
      access_token: parsed.data.access_token,
      refresh_token: refreshToken,
      expires_at: this.now() + parsed.data.expires_in * 1000,
      scope: parsed.data.scope ?? this.scope
    };

    this.store.save(credential);
    return credential;
  }
}

function parseTokenError(text: string): { error: string; error_description?: string } | undefined {
  try {
    const parsed = TokenErrorSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}
