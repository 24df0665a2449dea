import { z } from 'zod';

// ============================================================================
// Accounts service
// ============================================================================

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().int().positive().default(3600),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional()
});

export const TokenErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional()
});

// ============================================================================
// Stored credential
// ============================================================================

export const CredentialSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1),
  expires_at: z.number(),
  scope: z.string().optional()
});

export const EncryptedCredentialSchema = z.object({
  version: z.literal(1),
  iv: z.string(),
  tag: z.string(),
  data: z.string()
});

// ============================================================================
// Recently played
// ============================================================================

const ArtistSchema = z.object({
  name: z.string().nullish()
}).passthrough();

const ShowSchema = z.object({
  name: z.string().nullish(),
  publisher: z.string().nullish()
}).passthrough();

// Tracks and episodes share the "track" slot; the shape tells them apart
export const PlayableSchema = z.object({
  type: z.string().optional(),
  name: z.string().nullish(),
  duration_ms: z.number().nonnegative().default(0),
  artists: z.array(ArtistSchema).optional(),
  album: z.object({ name: z.string().nullish() }).passthrough().nullish(),
  show: ShowSchema.nullish()
}).passthrough();

export const PlayHistoryItemSchema = z.object({
  played_at: z.string(),
  track: PlayableSchema.nullish(),
  episode: PlayableSchema.nullish()
}).passthrough();

export const RecentlyPlayedResponseSchema = z.object({
  items: z.array(PlayHistoryItemSchema),
  next: z.string().nullish(),
  cursors: z.object({
    after: z.string().nullish(),
    before: z.string().nullish()
  }).nullish(),
  limit: z.number().optional()
});

// ============================================================================
// CLI
// ============================================================================

export const TimeWindowSchema = z.enum(['24h', '1week', '1month', '3months', '6months']);

export const CliOptionsSchema = z.object({
  timeRange: TimeWindowSchema.default('1month'),
  export: z.string().min(1).optional(),
  maxPages: z.coerce.number().int().min(1).default(20),
  browser: z.boolean().default(true),
  logout: z.boolean().default(false),
  debug: z.boolean().default(false)
});

export type Playable = z.infer<typeof PlayableSchema>;
export type PlayHistoryItem = z.infer<typeof PlayHistoryItemSchema>;
export type RecentlyPlayedResponse = z.infer<typeof RecentlyPlayedResponseSchema>;
