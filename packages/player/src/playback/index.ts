/**
 * Playback Module
 *
 * Porcelain command handlers backed by the live queue
 */

export { PlaybackController } from './PlaybackController';
export type { PlaybackControllerOptions } from './PlaybackController';
