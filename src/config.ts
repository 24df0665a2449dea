import { Config, SpotifyConfig, TimeWindow } from './types';
import { ConfigurationError } from './errors';
import * as path from 'path';

export const APP_NAME = 'listening-stats';
export const APP_VERSION = '1.0.0';

// Window length in days, subtracted from "now" to get the cutoff
export const TIME_WINDOWS: Record<TimeWindow, number> = {
  '24h': 1,
  '1week': 7,
  '1month': 30,
  '3months': 90,
  '6months': 180,
};

export const config: Config = {
  tokensFilePath: process.env.TOKENS_FILE_PATH || path.join(process.cwd(), 'tokens.json'),
  tokensEncryptionKey: process.env.TOKENS_ENCRYPTION_KEY || undefined,
  authUrl: 'https://accounts.spotify.com/authorize',
  tokenUrl: 'https://accounts.spotify.com/api/token',
  apiBaseUrl: 'https://api.spotify.com/v1',
  scope: 'user-read-recently-played',
  requestTimeoutMs: parseInt(process.env.REQUEST_TIMEOUT_MS || '30000', 10),
  pageSize: 50,
  defaultMaxPages: 20,
  defaultTimeWindow: '1month',
  logDir: process.env.LOG_DIR || 'logs',
};

const REQUIRED_ENV = {
  clientId: 'SPOTIFY_CLIENT_ID',
  clientSecret: 'SPOTIFY_CLIENT_SECRET',
  redirectUri: 'SPOTIFY_REDIRECT_URI',
} as const;

/**
 * Read the Spotify app credentials from the environment.
 * Throws ConfigurationError naming every missing variable.
 */
export function loadSpotifyConfig(env: NodeJS.ProcessEnv = process.env): SpotifyConfig {
  const clientId = env[REQUIRED_ENV.clientId]?.trim();
  const clientSecret = env[REQUIRED_ENV.clientSecret]?.trim();
  const redirectUri = env[REQUIRED_ENV.redirectUri]?.trim();

  if (!clientId || !clientSecret || !redirectUri) {
    const missing: string[] = [];
    if (!clientId) missing.push(REQUIRED_ENV.clientId);
    if (!clientSecret) missing.push(REQUIRED_ENV.clientSecret);
    if (!redirectUri) missing.push(REQUIRED_ENV.redirectUri);
    throw new ConfigurationError(missing);
  }

  return { clientId, clientSecret, redirectUri };
}
