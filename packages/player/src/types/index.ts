/**
 * Core type definitions for the player
 */

import type { LevelWithSilent } from 'pino';

// ============================================================================
// Tracks & Queue
// ============================================================================

/**
 * An immutable, playable queue entry
 */
export interface Track {
  /** Stable identifier, unique within a queue */
  readonly id: string;
  /** Media resource locator handed to the engine */
  readonly mrl: string;
  /** Free-form tags such as title, artist, album */
  readonly metadata?: Readonly<Record<string, string>>;
  /** Duration in milliseconds, when known */
  readonly duration?: number;
}

/**
 * Repeat mode
 */
export type RepeatMode = 'none' | 'track' | 'list';

/**
 * Called once for every track that leaves the queue
 */
export type TrackCleanup = (track: Track) => void;

/**
 * Read-only view of the queue segments
 */
export interface QueueSnapshot {
  history: readonly Track[];
  current: Track | undefined;
  upcoming: readonly Track[];
}

// ============================================================================
// Configuration
// ============================================================================

export interface PlayerConfig {
  /** Capacity of the command channel before the oldest command is dropped */
  commandBufferSize?: number;
  /** Capacity of the event channel before the oldest event is dropped */
  eventBufferSize?: number;
  /** How many times release() stops the engine before giving up on waiting */
  releaseMaxAttempts?: number;
  /** Delay between engine state polls during release(), in ms */
  releasePollIntervalMs?: number;
  /** Advance the queue when the engine reports the track finished */
  autoAdvance?: boolean;
  /** Log level for the default logger */
  logLevel?: LevelWithSilent;
}

export * from './errors';
export * from './engine';
