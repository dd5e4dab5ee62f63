/**
 * Zod schemas shared by commands, events and configuration
 */

import { z } from 'zod';
import { AUDIO_CHANNELS, ENGINE_STATES } from '../types/engine';

// ============================================================================
// Configuration Schemas
// ============================================================================

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const PlayerConfigSchema = z
  .object({
    commandBufferSize: z.number().int().positive(),
    eventBufferSize: z.number().int().positive(),
    releaseMaxAttempts: z.number().int().positive(),
    releasePollIntervalMs: z.number().int().nonnegative(),
    autoAdvance: z.boolean(),
    logLevel: LogLevelSchema,
  })
  .strict();

// ============================================================================
// Track & Queue Schemas
// ============================================================================

export const TrackSchema = z
  .object({
    id: z.string().min(1),
    mrl: z.string().min(1),
    metadata: z.record(z.string()).optional(),
    duration: z.number().nonnegative().optional(),
  })
  .strict();

export const RepeatModeSchema = z
  .enum(['none', 'track', 'list'])
  .describe('The repeat mode for the playback queue');

export const QueueSnapshotSchema = z.object({
  history: z.array(TrackSchema).readonly(),
  current: TrackSchema.optional(),
  upcoming: z.array(TrackSchema).readonly(),
});

// ============================================================================
// Engine Schemas
// ============================================================================

export const EngineStateSchema = z.enum(ENGINE_STATES);

export const AudioChannelSchema = z.enum(AUDIO_CHANNELS);

export const EqualizerSchema = z
  .object({
    preamp: z.number().min(-20).max(20),
    bands: z.array(z.number().min(-20).max(20)),
  })
  .strict();

/**
 * Locators accepted by path-taking commands
 */
export const LocatorListSchema = z.array(z.string().min(1));
