import { HistoryFetcher, normalizePlay, parsePlayedAt, windowCutoff } from './history-fetcher';
import { OAuthClient } from './oauth-client';
import { SpotifyApi } from './spotify-api';
import { Response } from 'node-fetch';
import { AuthorizationError, RetrievalError } from './errors';
import { Credential } from './types';
import {
  FIRST_PAGE_URL,
  FakeSpotify,
  MemoryTokenStore,
  TEST_SPOTIFY,
  episodeItem,
  historyPage,
  jsonResponse,
  rejectionOf,
  tokenResponse,
  trackItem
} from './tests/fake-spotify';

const NOW = new Date('2024-03-01T12:00:00Z');
const PAGE_2 = `${FIRST_PAGE_URL}&before=2`;
const PAGE_3 = `${FIRST_PAGE_URL}&before=3`;

describe('windowCutoff', () => {
  it('should subtract whole days from now', () => {
    expect(windowCutoff('24h', NOW).toISOString()).toBe('2024-02-29T12:00:00.000Z');
    expect(windowCutoff('1week', NOW).toISOString()).toBe('2024-02-23T12:00:00.000Z');
    expect(windowCutoff('1month', NOW).toISOString()).toBe('2024-01-31T12:00:00.000Z');
  });
});

describe('parsePlayedAt', () => {
  it('should parse zoned timestamps', () => {
    expect(parsePlayedAt('2024-02-29T10:00:00.123Z')?.toISOString()).toBe('2024-02-29T10:00:00.123Z');
  });

  it('should treat timestamps without a zone as UTC', () => {
    expect(parsePlayedAt('2024-02-29T10:00:00')?.toISOString()).toBe('2024-02-29T10:00:00.000Z');
  });

  it('should reject values that are not timestamps', () => {
    expect(parsePlayedAt('yesterday')).toBeNull();
  });
});

describe('normalizePlay', () => {
  const playedAt = new Date('2024-02-29T10:00:00Z');

  it('should label a track with no artists as Unknown Artist', () => {
    const event = normalizePlay({ type: 'track', name: 'Lost', duration_ms: 200400, artists: [] }, playedAt);

    expect(event).toEqual({
      type: 'track',
      name: 'Lost',
      performerNames: ['Unknown Artist'],
      albumName: undefined,
      durationSeconds: 200,
      playedAt
    });
  });

  it('should recognise an episode by its show when the type is missing', () => {
    const event = normalizePlay({ name: 'Ep 1', duration_ms: 1800000, show: { name: 'Show Z', publisher: 'Host Y' } }, playedAt);

    expect(event).toEqual({
      type: 'episode',
      name: 'Ep 1',
      performerNames: ['Host Y'],
      showName: 'Show Z',
      durationSeconds: 1800,
      playedAt
    });
  });

  it('should fill in missing episode details', () => {
    const event = normalizePlay({ type: 'episode', name: null, duration_ms: 0, show: null }, playedAt);

    expect(event).toMatchObject({
      type: 'episode',
      name: 'Unknown Episode',
      performerNames: ['Unknown Host'],
      showName: 'Unknown Podcast'
    });
  });
});

describe('HistoryFetcher', () => {
  let spotify: FakeSpotify;
  let store: MemoryTokenStore;
  let fetcher: HistoryFetcher;
  let credential: Credential;

  beforeEach(() => {
    spotify = new FakeSpotify();
    credential = {
      access_token: 'access-1',
      refresh_token: 'refresh-1',
      expires_at: NOW.getTime() + 3600 * 1000
    };
    store = new MemoryTokenStore(credential);
    const oauth = new OAuthClient(TEST_SPOTIFY, store, {
      fetch: spotify.fetch,
      now: () => NOW.getTime()
    });
    fetcher = new HistoryFetcher(new SpotifyApi(oauth, { fetch: spotify.fetch }), { now: () => NOW });
  });

  it('should follow next links until the listing ends', async () => {
    spotify.queueApi(
      historyPage([
        trackItem('2024-03-01T10:00:00Z', 'Song A', ['Artist X'], 120000),
        trackItem('2024-03-01T09:00:00Z', 'Song B', ['Artist Y'], 95000)
      ], PAGE_2),
      historyPage([
        trackItem('2024-02-28T20:00:00Z', 'Song C', ['Artist X'], 180000)
      ])
    );

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(result.events.map(event => event.name)).toEqual(['Song A', 'Song B', 'Song C']);
    expect(result.pagesRequested).toBe(2);
    expect(result.complete).toBe(true);
    expect(result.error).toBeUndefined();
    expect(spotify.apiRequests.map(request => request.url)).toEqual([FIRST_PAGE_URL, PAGE_2]);
    expect(spotify.apiRequests[0].authorization).toBe('Bearer access-1');
  });

  it('should stop after maxPages requests', async () => {
    spotify.queueApi(
      historyPage([trackItem('2024-03-01T10:00:00Z', 'Song A', ['Artist X'], 120000)], PAGE_2),
      historyPage([trackItem('2024-03-01T09:00:00Z', 'Song B', ['Artist X'], 120000)], PAGE_3),
      historyPage([trackItem('2024-03-01T08:00:00Z', 'Song C', ['Artist X'], 120000)])
    );

    const result = await fetcher.fetch(credential, '1week', 2);

    expect(result.pagesRequested).toBe(2);
    expect(spotify.apiRequests).toHaveLength(2);
    expect(result.events.map(event => event.name)).toEqual(['Song A', 'Song B']);
    expect(result.complete).toBe(true);
  });

  it('should stop once a page reaches past the cutoff and drop older plays', async () => {
    spotify.queueApi(
      historyPage([
        trackItem('2024-02-29T00:00:00Z', 'Recent', ['Artist X'], 120000),
        trackItem('2024-02-20T00:00:00Z', 'Old', ['Artist X'], 120000)
      ], PAGE_2)
    );

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(spotify.apiRequests).toHaveLength(1);
    expect(result.events.map(event => event.name)).toEqual(['Recent']);
    expect(result.cutoff.toISOString()).toBe('2024-02-23T12:00:00.000Z');
  });

  it('should filter out-of-window plays from an unordered page', async () => {
    spotify.queueApi(
      historyPage([
        trackItem('2024-02-29T00:00:00Z', 'First', ['Artist X'], 60000),
        trackItem('2024-02-10T00:00:00Z', 'Stale', ['Artist X'], 60000),
        trackItem('2024-02-28T00:00:00Z', 'Third', ['Artist X'], 60000)
      ])
    );

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(result.events.map(event => event.name)).toEqual(['First', 'Third']);
    for (const event of result.events) {
      expect(event.playedAt.getTime()).toBeGreaterThanOrEqual(result.cutoff.getTime());
    }
  });

  it('should normalize episodes and skip items without a payload', async () => {
    spotify.queueApi(
      historyPage([
        episodeItem('2024-03-01T09:05:00Z', 'Ep 1', 'Show Z', 'Host Y', 1800000),
        { played_at: '2024-03-01T09:00:00Z', track: null },
        trackItem('2024-03-01T08:00:00Z', 'Song A', [], 120400)
      ])
    );

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(result.events).toEqual([
      {
        type: 'episode',
        name: 'Ep 1',
        performerNames: ['Host Y'],
        showName: 'Show Z',
        durationSeconds: 1800,
        playedAt: new Date('2024-03-01T09:05:00Z')
      },
      {
        type: 'track',
        name: 'Song A',
        performerNames: ['Unknown Artist'],
        albumName: 'Song A (Album)',
        durationSeconds: 120,
        playedAt: new Date('2024-03-01T08:00:00Z')
      }
    ]);
  });

  it('should fall back to the before cursor when next is missing', async () => {
    spotify.queueApi(
      historyPage([trackItem('2024-03-01T10:00:00Z', 'Song A', ['Artist X'], 120000)], null, '1709200000000'),
      historyPage([])
    );

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(spotify.apiRequests.map(request => request.url)).toEqual([
      FIRST_PAGE_URL,
      `${FIRST_PAGE_URL}&before=1709200000000`
    ]);
    expect(result.pagesRequested).toBe(2);
    expect(result.events).toHaveLength(1);
  });

  it('should stop when the same page comes back twice', async () => {
    spotify.queueApi(
      historyPage([trackItem('2024-03-01T10:00:00Z', 'Song A', ['Artist X'], 120000)], PAGE_2),
      historyPage([trackItem('2024-03-01T09:00:00Z', 'Song B', ['Artist X'], 120000)], PAGE_2)
    );

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(result.pagesRequested).toBe(2);
    expect(result.complete).toBe(true);
  });

  it('should refresh once and retry after a 401', async () => {
    spotify
      .queueApi(
        jsonResponse({ error: { status: 401, message: 'The access token expired' } }, 401),
        historyPage([trackItem('2024-03-01T10:00:00Z', 'Song A', ['Artist X'], 120000)])
      )
      .queueToken(tokenResponse('access-2'));

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(spotify.tokenRequests).toHaveLength(1);
    expect(spotify.apiRequests.map(request => request.authorization)).toEqual(['Bearer access-1', 'Bearer access-2']);
    expect(result.credential.access_token).toBe('access-2');
    expect(result.credential.refresh_token).toBe('refresh-1');
    expect(store.saved).toHaveLength(1);
    expect(result.events).toHaveLength(1);
    expect(result.complete).toBe(true);
  });

  it('should fail with an authorization error when the refresh returns a non-JSON body', async () => {
    spotify
      .queueApi(jsonResponse({}, 401))
      .queueToken(new Response('<html>gateway</html>', { status: 200 }));

    const error = await rejectionOf(fetcher.fetch(credential, '1week', 20), AuthorizationError);

    expect(error.code).toBe('invalid_response');
    expect(spotify.apiRequests).toHaveLength(1);
  });

  it('should refresh an expired credential before the first request', async () => {
    const expired: Credential = { ...credential, expires_at: NOW.getTime() - 1000 };
    spotify
      .queueToken(tokenResponse('access-2'))
      .queueApi(historyPage([]));

    const result = await fetcher.fetch(expired, '1week', 20);

    expect(spotify.requests.map(request => request.method)).toEqual(['POST', 'GET']);
    expect(spotify.apiRequests[0].authorization).toBe('Bearer access-2');
    expect(result.credential.expires_at).toBe(NOW.getTime() + 3600 * 1000);
  });

  it('should give up when the refreshed token is rejected too', async () => {
    spotify
      .queueApi(jsonResponse({}, 401), jsonResponse({}, 401))
      .queueToken(tokenResponse('access-2'));

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(spotify.tokenRequests).toHaveLength(1);
    expect(result.complete).toBe(false);
    expect(result.error).toBeInstanceOf(RetrievalError);
    expect(result.error?.status).toBe(401);
    expect(result.events).toEqual([]);
  });

  it('should keep earlier pages when a later page fails', async () => {
    spotify.queueApi(
      historyPage([trackItem('2024-03-01T10:00:00Z', 'Song A', ['Artist X'], 120000)], PAGE_2),
      jsonResponse({ error: { status: 500, message: 'Server error' } }, 500)
    );

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(result.events.map(event => event.name)).toEqual(['Song A']);
    expect(result.pagesRequested).toBe(2);
    expect(result.complete).toBe(false);
    expect(result.error?.status).toBe(500);
  });

  it('should report a rate limit without retrying', async () => {
    spotify.queueApi(jsonResponse({}, 429, { 'Retry-After': '7' }));

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(spotify.apiRequests).toHaveLength(1);
    expect(result.error?.status).toBe(429);
    expect(result.error?.message).toBe('Spotify rate limit reached. Retry after 7 second(s).');
  });

  it('should report a network failure as a retrieval error', async () => {
    spotify.queueApi(new Error('socket hang up'));

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(result.error?.message).toBe('Spotify API request failed: socket hang up');
    expect(result.pagesRequested).toBe(1);
  });

  it('should reject a page with a malformed shape', async () => {
    spotify.queueApi(jsonResponse({ next: null }));

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(result.complete).toBe(false);
    expect(result.error?.message).toBe('Malformed response from Spotify: items: Required');
  });

  it('should reject a page with a malformed timestamp', async () => {
    spotify.queueApi(historyPage([trackItem('last tuesday', 'Song A', ['Artist X'], 120000)]));

    const result = await fetcher.fetch(credential, '1week', 20);

    expect(result.error?.message).toBe('Malformed played_at timestamp from Spotify: last tuesday');
    expect(result.events).toEqual([]);
  });
});
