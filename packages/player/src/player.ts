/**
 * Player - entry point of the package
 *
 * Wires an engine to the command bus, the event bus and the playback
 * controller. Commands go through the bus; queries read the engine and the
 * queue directly.
 *
 * @example
 * ```typescript
 * const player = createPlayer({ engine });
 *
 * player.subscribe(exact('playback.current-track-changed'), (event) => {
 *   console.log('Now playing', event);
 * });
 *
 * await player.execute({ command: 'playback.append', paths: ['/music/a.flac'] });
 * player.dispatch({ command: 'playback.play' });
 *
 * await player.release();
 * ```
 */

import { CommandBus } from './bus/CommandBus';
import { EventBus, type EventCallback } from './bus/EventBus';
import type { CommandInput } from './commands';
import type { EventPredicate } from './events';
import { BasicMediaResolver, type MediaResolver } from './media/MediaResolver';
import { PlaybackController } from './playback/PlaybackController';
import type {
  AudioChannel,
  AudioDevice,
  AudioTrackInfo,
  EngineState,
  Equalizer,
  MediaStatistics,
  MediaType,
  NativeEngine,
  PlayerConfig,
  QueueSnapshot,
  RepeatMode,
  Track,
  TrackCleanup,
} from './types';
import { PlayerReleasedError } from './types/errors';
import { createLogger, createRootLogger, logError, type Logger } from './utils/logger';
import { validate } from './utils/validation';
import { LogLevelSchema, PlayerConfigSchema } from './utils/validators';
import type { Queue } from './queue';

export interface PlayerOptions {
  engine: NativeEngine;
  /** Turns locators into tracks; defaults to BasicMediaResolver */
  resolver?: MediaResolver;
  config?: PlayerConfig;
  /** Parent logger; a new pino logger is created when omitted */
  logger?: Logger;
  /** Called once for every track that leaves the queue */
  cleanup?: TrackCleanup;
}

/**
 * The engine's view of whatever is playing
 */
export interface PlaybackStatus {
  state: EngineState;
  /** Fraction of the media played, 0 to 1 */
  position: number;
  /** Milliseconds played */
  time: number;
}

/**
 * The queue's current track together with the engine's view of it
 */
export interface CurrentTrack extends Track, PlaybackStatus {
  source: 'queue';
  /** Track length in milliseconds */
  length: number;
}

/**
 * Media the engine has loaded outside the queue, such as after media.play
 */
export interface LoadedMedia extends PlaybackStatus {
  source: 'engine';
  mrl: string;
  /** Milliseconds, or null if unknown */
  duration: number | null;
}

export type Current = CurrentTrack | LoadedMedia;

/**
 * Fill in defaults and validate
 *
 * @throws ValidationError if a value is out of range
 */
export function resolveConfig(config: PlayerConfig = {}): Required<PlayerConfig> {
  const resolved: Required<PlayerConfig> = {
    commandBufferSize: config.commandBufferSize ?? 32,
    eventBufferSize: config.eventBufferSize ?? 32,
    releaseMaxAttempts: config.releaseMaxAttempts ?? 20,
    releasePollIntervalMs: config.releasePollIntervalMs ?? 50,
    autoAdvance: config.autoAdvance ?? true,
    logLevel: config.logLevel ?? LogLevelSchema.catch('info').parse(process.env.LOG_LEVEL),
  };
  return validate(PlayerConfigSchema, resolved, 'player config');
}

export class Player {
  private readonly config: Required<PlayerConfig>;
  private readonly engine: NativeEngine;
  private readonly log: Logger;
  private readonly commands: CommandBus;
  private readonly events: EventBus;
  private readonly controller: PlaybackController;
  private released = false;
  private releasing: Promise<void> | null = null;

  constructor(options: PlayerOptions) {
    this.config = resolveConfig(options.config);
    this.engine = options.engine;
    this.log = createLogger(
      { module: 'Player' },
      options.logger ?? createRootLogger(this.config.logLevel)
    );

    this.commands = new CommandBus({
      engine: this.engine,
      capacity: this.config.commandBufferSize,
      logger: this.log,
    });
    this.events = new EventBus({ capacity: this.config.eventBufferSize, logger: this.log });
    this.controller = new PlaybackController({
      engine: this.engine,
      commands: this.commands,
      events: this.events,
      resolver: options.resolver ?? new BasicMediaResolver(),
      logger: this.log,
      autoAdvance: this.config.autoAdvance,
      cleanup: options.cleanup,
    });

    this.events.attach(this.engine);
    this.controller.start();
    this.events.start();
    this.commands.start();

    this.log.debug({ config: this.config }, 'Initialized');
  }

  // ============================================================================
  // Commands & Events
  // ============================================================================

  /**
   * Queue a command without waiting for it
   *
   * @throws PlayerReleasedError after release
   * @throws ValidationError if the command is unknown or malformed
   */
  dispatch(command: CommandInput): void {
    this.commands.dispatch(command);
  }

  /**
   * Queue a command and wait until it has been handled
   */
  execute(command: CommandInput): Promise<void> {
    return this.commands.execute(command);
  }

  /**
   * Call `callback` for every event matching `predicate`
   *
   * @returns Subscription id
   */
  subscribe(predicate: EventPredicate, callback: EventCallback): string {
    this.ensureActive();
    return this.events.subscribe(predicate, callback);
  }

  unsubscribe(subscriptionId: string): boolean {
    return this.events.unsubscribe(subscriptionId);
  }

  // ============================================================================
  // Queries
  // ============================================================================

  getState(): EngineState {
    return this.query().getState();
  }

  getTime(): number {
    return this.query().getTime();
  }

  getPosition(): number {
    return this.query().getPosition();
  }

  getLength(): number {
    return this.query().getLength();
  }

  getRate(): number {
    return this.query().getRate();
  }

  getVolume(): number {
    return this.query().getVolume();
  }

  isMuted(): boolean {
    return this.query().isMuted();
  }

  /**
   * Whether the engine itself repeats the loaded media
   */
  getRepeat(): boolean {
    return this.query().getRepeat();
  }

  /**
   * The queue's repeat mode
   */
  getRepeatMode(): RepeatMode {
    this.ensureActive();
    return this.controller.queue.repeat;
  }

  getChannel(): AudioChannel {
    return this.query().getChannel();
  }

  getDelay(): number {
    return this.query().getDelay();
  }

  getEqualizer(): Equalizer | null {
    return this.query().getEqualizer();
  }

  getOutputDevice(): string | null {
    return this.query().getOutputDevice();
  }

  getOutputDevices(): AudioDevice[] {
    return this.query().getOutputDevices();
  }

  isPlaying(): boolean {
    return this.query().isPlaying();
  }

  isPlayable(): boolean {
    return this.query().isPlayable();
  }

  isSeekable(): boolean {
    return this.query().isSeekable();
  }

  canPause(): boolean {
    return this.query().canPause();
  }

  getMediaMrl(): string | null {
    return this.query().getMediaMrl();
  }

  getMediaType(): MediaType | null {
    return this.query().getMediaType();
  }

  getMediaDuration(): number | null {
    return this.query().getMediaDuration();
  }

  getAudioTracks(): AudioTrackInfo[] {
    return this.query().getAudioTracks();
  }

  getMediaStatistics(): MediaStatistics | null {
    return this.query().getMediaStatistics();
  }

  /**
   * The queue's current track with the engine's playback state. Without one,
   * whatever media the engine has loaded; undefined if there is none.
   */
  getCurrent(): Current | undefined {
    this.ensureActive();
    const status: PlaybackStatus = {
      state: this.engine.getState(),
      position: this.engine.getPosition(),
      time: this.engine.getTime(),
    };

    const track = this.controller.getCurrent();
    if (track) {
      return { ...track, ...status, source: 'queue', length: this.engine.getLength() };
    }

    const mrl = this.engine.getMediaMrl();
    if (mrl === null) return undefined;
    return { ...status, source: 'engine', mrl, duration: this.engine.getMediaDuration() };
  }

  listQueue(): QueueSnapshot {
    this.ensureActive();
    return this.controller.listQueue();
  }

  /**
   * The live queue value. Queues are immutable; later commands swap in a new one.
   */
  getQueue(): Queue {
    this.ensureActive();
    return this.controller.queue;
  }

  get isReleased(): boolean {
    return this.released;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Stop both loops, empty the queue, stop the engine and release it.
   * Safe to call more than once.
   */
  release(): Promise<void> {
    if (!this.releasing) {
      this.releasing = this.performRelease();
    }
    return this.releasing;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async performRelease(): Promise<void> {
    this.released = true;
    this.log.info('Releasing player');

    await Promise.all([this.commands.stop(), this.events.stop()]);
    this.controller.release();
    await this.stopEngine();
    await this.engine.release();

    this.log.info('Player released');
  }

  /**
   * Stop the engine and wait for it to settle, up to releaseMaxAttempts polls
   */
  private async stopEngine(): Promise<void> {
    const { releaseMaxAttempts, releasePollIntervalMs } = this.config;

    for (let attempt = 1; attempt <= releaseMaxAttempts; attempt++) {
      const state = this.engine.getState();
      if (isSettled(state)) return;

      this.log.debug({ state, attempt }, 'Waiting for engine to stop');
      try {
        await this.engine.stop();
      } catch (error) {
        logError(this.log, error, 'Engine stop failed during release', { attempt });
      }
      await new Promise((resolve) => setTimeout(resolve, releasePollIntervalMs));
    }

    if (!isSettled(this.engine.getState())) {
      this.log.warn({ attempts: releaseMaxAttempts }, 'Engine did not stop, releasing anyway');
    }
  }

  private ensureActive(): void {
    if (this.released) {
      throw new PlayerReleasedError();
    }
  }

  private query(): NativeEngine {
    this.ensureActive();
    return this.engine;
  }
}

function isSettled(state: EngineState): boolean {
  return state === 'stopped' || state === 'error' || state === 'idle';
}

/**
 * Create a player and start its loops
 */
export function createPlayer(options: PlayerOptions): Player {
  return new Player(options);
}
