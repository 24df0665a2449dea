import moment from 'moment';
import { Credential, PlayEvent, TimeWindow } from './types';
import {
  Playable,
  PlayHistoryItem,
  RecentlyPlayedResponse,
  RecentlyPlayedResponseSchema
} from './api-schemas';
import { RetrievalError } from './errors';
import { SpotifyApi } from './spotify-api';
import { TIME_WINDOWS, config } from './config';
import logger from './logger';

export const UNKNOWN_ARTIST = 'Unknown Artist';
export const UNKNOWN_HOST = 'Unknown Host';
export const UNKNOWN_PODCAST = 'Unknown Podcast';

export interface FetchResult {
  events: PlayEvent[];
  credential: Credential;
  cutoff: Date;
  pagesRequested: number;
  complete: boolean;
  error?: RetrievalError;
}

export interface HistoryFetcherOptions {
  apiBaseUrl?: string;
  pageSize?: number;
  now?: () => Date;
}

export function windowCutoff(window: TimeWindow, now: Date): Date {
  return moment.utc(now).subtract(TIME_WINDOWS[window], 'days').toDate();
}

/**
 * Parse a played_at timestamp. Values without a zone are taken as UTC.
 */
export function parsePlayedAt(value: string): Date | null {
  const parsed = moment.utc(value, moment.ISO_8601, true);
  return parsed.isValid() ? parsed.toDate() : null;
}

function isEpisode(playable: Playable): boolean {
  if (playable.type) {
    return playable.type === 'episode';
  }
  return playable.show !== undefined && playable.show !== null;
}

export function normalizePlay(playable: Playable, playedAt: Date): PlayEvent {
  const durationSeconds = Math.round(playable.duration_ms / 1000);

  if (isEpisode(playable)) {
    return {
      type: 'episode',
      name: playable.name || 'Unknown Episode',
      performerNames: [playable.show?.publisher || UNKNOWN_HOST],
      showName: playable.show?.name || UNKNOWN_PODCAST,
      durationSeconds,
      playedAt
    };
  }

  const artists = playable.artists ?? [];
  return {
    type: 'track',
    name: playable.name || 'Unknown Track',
    performerNames: artists.length > 0
      ? artists.map(artist => artist.name || UNKNOWN_ARTIST)
      : [UNKNOWN_ARTIST],
    albumName: playable.album?.name || undefined,
    durationSeconds,
    playedAt
  };
}

interface NormalizedPage {
  events: PlayEvent[];
  oldest: Date | null;
}

function normalizePage(items: PlayHistoryItem[]): NormalizedPage {
  const events: PlayEvent[] = [];
  let oldest: Date | null = null;

  for (const item of items) {
    const playedAt = parsePlayedAt(item.played_at);
    if (!playedAt) {
      throw new RetrievalError(`Malformed played_at timestamp from Spotify: ${item.played_at}`);
    }

    if (oldest === null || playedAt.getTime() < oldest.getTime()) {
      oldest = playedAt;
    }

    // Items whose track was removed come back with neither payload
    const playable = item.track ?? item.episode;
    if (playable) {
      events.push(normalizePlay(playable, playedAt));
    }
  }

  return { events, oldest };
}

export class HistoryFetcher {
  private apiBaseUrl: string;
  private pageSize: number;
  private now: () => Date;

  constructor(private api: SpotifyApi, options: HistoryFetcherOptions = {}) {
    this.apiBaseUrl = options.apiBaseUrl ?? config.apiBaseUrl;
    this.pageSize = options.pageSize ?? config.pageSize;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Walk the recently-played listing newest first until the provider runs out
   * of pages, maxPages requests have gone out, or a page reaches past the
   * window cutoff.
   */
  async fetch(credential: Credential, window: TimeWindow, maxPages: number): Promise<FetchResult> {
    const cutoff = windowCutoff(window, this.now());
    const collected: PlayEvent[] = [];
    let current = credential;
    let nextUrl: string | null = this.pageUrl();
    let pagesRequested = 0;
    let error: RetrievalError | undefined;

    logger.info('Fetching recently played history', {
      window,
      cutoff: cutoff.toISOString(),
      maxPages
    });

    while (nextUrl && pagesRequested < maxPages) {
      const currentUrl: string = nextUrl;
      pagesRequested++;

      let page: RecentlyPlayedResponse;
      let normalized: NormalizedPage;
      try {
        const result = await this.api.get(currentUrl, current, RecentlyPlayedResponseSchema);
        current = result.credential;
        page = result.data;
        normalized = normalizePage(page.items);
      } catch (err) {
        if (!(err instanceof RetrievalError)) {
          throw err;
        }
        error = err;
        logger.error('Stopped fetching history', {
          page: pagesRequested,
          status: err.status,
          error: err.message
        });
        break;
      }

      collected.push(...normalized.events);
      logger.debug('Fetched history page', {
        page: pagesRequested,
        items: page.items.length,
        oldest: normalized.oldest?.toISOString()
      });

      nextUrl = this.nextPageUrl(page);

      if (page.items.length === 0) {
        nextUrl = null;
      } else if (normalized.oldest && normalized.oldest.getTime() <= cutoff.getTime()) {
        // Pages are newest first, so nothing further back can be in the window
        logger.debug('Reached plays older than the window cutoff');
        nextUrl = null;
      } else if (nextUrl === currentUrl) {
        logger.warn('Spotify returned the same page twice, stopping', { url: currentUrl });
        nextUrl = null;
      }
    }

    if (!error && nextUrl && pagesRequested >= maxPages) {
      logger.info(`Stopped after ${maxPages} page(s); older history was not fetched`);
    }

    // Responses are not guaranteed to be strictly ordered
    const events = collected.filter(event => event.playedAt.getTime() >= cutoff.getTime());

    return {
      events,
      credential: current,
      cutoff,
      pagesRequested,
      complete: error === undefined,
      error
    };
  }

  private pageUrl(before?: string): string {
    const params = new URLSearchParams({ limit: String(this.pageSize) });
    if (before) {
      params.set('before', before);
    }
    return `${this.apiBaseUrl}/me/player/recently-played?${params.toString()}`;
  }

  private nextPageUrl(page: RecentlyPlayedResponse): string | null {
    if (page.next) {
      return page.next;
    }
    if (page.cursors?.before) {
      return this.pageUrl(page.cursors.before);
    }
    return null;
  }
}
