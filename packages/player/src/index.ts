/**
 * @spindle/player
 *
 * Headless audio playback controller: a queue with unified indexing, a
 * command bus, an event bus and the playback logic that ties them to a
 * native engine.
 *
 * @packageDocumentation
 */

// Player
export { Player, createPlayer, resolveConfig } from './player';
export type {
  PlayerOptions,
  Current,
  CurrentTrack,
  LoadedMedia,
  PlaybackStatus,
} from './player';

// Queue
export { Queue, sameTrack, sameTracks, sameSnapshot } from './queue';

// Commands
export {
  COMMAND_SCHEMAS,
  COMMAND_ALIASES,
  NATIVE_COMMANDS,
  PORCELAIN_COMMANDS,
  resolveAlias,
  validateCommand,
  explainCommand,
  ensureValidCommand,
  isNativeCommand,
  isPorcelainCommand,
  isCommandName,
  isAlias,
  describeCommands,
  nativeHandlers,
} from './commands';
export type {
  Command,
  CommandAlias,
  CommandDescription,
  CommandInput,
  CommandMap,
  CommandName,
  NativeCommand,
  NativeCommandName,
  PorcelainCommand,
  PorcelainCommandName,
} from './commands';

// Events
export {
  EVENT_SCHEMAS,
  NATIVE_EVENTS,
  DOMAIN_EVENTS,
  exact,
  anyOf,
  custom,
  matches,
  parseNativeEvent,
} from './events';
export type {
  DomainEvent,
  DomainEventName,
  EventMap,
  EventName,
  EventPredicate,
  NativeEvent,
  NativeEventName,
  PlayerEvent,
} from './events';

// Buses
export { CommandBus, EventBus } from './bus';
export type { EventCallback, PorcelainHandlers } from './bus';

// Playback
export { PlaybackController } from './playback';

// Media
export { BasicMediaResolver } from './media';
export type { MediaResolver } from './media';

// Errors
export {
  PlayerError,
  ValidationError,
  UnknownCommandError,
  PlayerReleasedError,
  CommandDroppedError,
  MediaResolutionError,
  NativeCommandError,
  SubscriberError,
} from './types/errors';

// Types
export { ENGINE_STATES, AUDIO_CHANNELS, MEDIA_TYPES } from './types';
export type {
  Track,
  RepeatMode,
  TrackCleanup,
  QueueSnapshot,
  PlayerConfig,
  ValidationIssue,
  EngineState,
  AudioChannel,
  Equalizer,
  AudioDevice,
  AudioTrackInfo,
  MediaStatistics,
  MediaType,
  EngineListener,
  NativeEngine,
} from './types';

// Utilities
export { validate, validateSafe, isValidationError } from './utils/validation';
export { createRootLogger } from './utils/logger';
export type { Logger } from './utils/logger';
