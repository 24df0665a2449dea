export interface Credential {
  access_token: string;
  refresh_token: string;
  expires_at: number;  // Epoch milliseconds when the access token stops working
  scope?: string;
}

interface PlayEventBase {
  name: string;
  performerNames: string[];
  durationSeconds: number;
  playedAt: Date;
}

export interface TrackPlay extends PlayEventBase {
  type: 'track';
  albumName?: string;
}

export interface EpisodePlay extends PlayEventBase {
  type: 'episode';
  showName: string;
}

export type PlayEvent = TrackPlay | EpisodePlay;

export type TimeWindow = '24h' | '1week' | '1month' | '3months' | '6months';

export type Weekday =
  | 'Monday'
  | 'Tuesday'
  | 'Wednesday'
  | 'Thursday'
  | 'Friday'
  | 'Saturday'
  | 'Sunday';

export interface AggregateReport {
  artists: Map<string, number>;
  podcasts: Map<string, number>;
  weekdays: Map<Weekday, number>;
  hours: Map<number, number>;
  totalPlays: number;
  totalDurationSeconds: number;
}

export interface RankedTotal {
  name: string;
  seconds: number;
}

export interface SpotifyConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface Config {
  tokensFilePath: string;
  tokensEncryptionKey?: string;
  authUrl: string;
  tokenUrl: string;
  apiBaseUrl: string;
  scope: string;
  requestTimeoutMs: number;
  pageSize: number;
  defaultMaxPages: number;
  defaultTimeWindow: TimeWindow;
  logDir: string;
}
