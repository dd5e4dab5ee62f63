/**
 * PlaybackController - porcelain command handlers
 *
 * Owns the live queue. Each queue command swaps in a new Queue, publishes
 * `playback.*` events for whatever changed, and tells the engine to play or
 * stop when the current track changed.
 */

import type { CommandBus, PorcelainHandlers } from '../bus/CommandBus';
import type { EventBus } from '../bus/EventBus';
import { exact } from '../events';
import type { MediaResolver } from '../media/MediaResolver';
import { Queue, sameSnapshot, sameTrack } from '../queue';
import type { EngineState, NativeEngine, QueueSnapshot, Track, TrackCleanup } from '../types';
import { MediaResolutionError, PlayerError } from '../types/errors';
import { Atom } from '../utils/atom';
import { createLogger, type Logger } from '../utils/logger';

/** Engine states from which `play` restarts the current track */
const RESTARTABLE_STATES: ReadonlySet<EngineState> = new Set<EngineState>([
  'idle',
  'stopped',
  'ended',
  'error',
]);

export interface PlaybackControllerOptions {
  engine: NativeEngine;
  commands: CommandBus;
  events: EventBus;
  resolver: MediaResolver;
  logger: Logger;
  /** Advance when the engine reports the track finished */
  autoAdvance: boolean;
  cleanup?: TrackCleanup;
}

interface ApplyOptions {
  /** Restart the current track even if it did not change */
  replay?: boolean;
}

export class PlaybackController {
  private readonly engine: NativeEngine;
  private readonly commands: CommandBus;
  private readonly events: EventBus;
  private readonly resolver: MediaResolver;
  private readonly log: Logger;
  private readonly autoAdvance: boolean;
  private readonly state: Atom<Queue>;
  private finishedSubscription: string | null = null;

  constructor(options: PlaybackControllerOptions) {
    this.engine = options.engine;
    this.commands = options.commands;
    this.events = options.events;
    this.resolver = options.resolver;
    this.autoAdvance = options.autoAdvance;
    this.log = createLogger({ module: 'PlaybackController' }, options.logger);
    this.state = new Atom(Queue.create(options.cleanup));
  }

  /**
   * Register the porcelain handlers and, if enabled, auto-advance
   */
  start(): void {
    this.commands.registerPorcelain(this.handlers());

    if (this.autoAdvance && !this.finishedSubscription) {
      this.finishedSubscription = this.events.subscribe(exact('engine.finished'), () => {
        if (this.commands.isReleased) return;
        this.log.debug('Track finished, advancing');
        this.commands.dispatch({ command: 'playback.advance' });
      });
    }
  }

  /**
   * Drop auto-advance and empty the queue. The engine is not notified.
   */
  release(): void {
    if (this.finishedSubscription) {
      this.events.unsubscribe(this.finishedSubscription);
      this.finishedSubscription = null;
    }
    this.state.swap((queue) => queue.clearAll());
  }

  // ============================================================================
  // Queries
  // ============================================================================

  get queue(): Queue {
    return this.state.get();
  }

  getCurrent(): Track | undefined {
    return this.state.get().getCurrent();
  }

  listQueue(): QueueSnapshot {
    return this.state.get().listAll();
  }

  // ============================================================================
  // Handlers
  // ============================================================================

  handlers(): PorcelainHandlers {
    return {
      'playback.advance': async () => this.advance(),
      'playback.next-track': async () => this.apply((queue) => queue.nextTrack()),
      'playback.previous-track': async () => this.apply((queue) => queue.prevTrack()),

      'playback.append': async (cmd) => {
        const tracks = await this.resolve(cmd.paths);
        this.apply((queue) => queue.append(tracks));
      },
      'playback.add-next': async (cmd) => {
        const tracks = await this.resolve(cmd.paths);
        this.apply((queue) => queue.addNext(tracks));
      },
      'playback.insert-at': async (cmd) => {
        const tracks = await this.resolve(cmd.paths);
        this.apply((queue) => queue.insertAt(cmd.position, tracks));
      },
      'playback.replace-at': async (cmd) => {
        const tracks = await this.resolve(cmd.paths);
        this.apply((queue) => queue.replaceAt(cmd.position, tracks));
      },

      'playback.remove-at': async (cmd) => this.apply((queue) => queue.removeAt([cmd.position])),
      'playback.move': async (cmd) => this.apply((queue) => queue.move(cmd.from, cmd.to)),
      'playback.set-shuffle': async (cmd) => this.apply((queue) => queue.setShuffle(cmd.shuffle)),
      'playback.set-repeat': async (cmd) => this.apply((queue) => queue.setRepeat(cmd.mode)),
      'playback.clear-upcoming': async () => this.apply((queue) => queue.clearUpcoming()),
      'playback.clear-all': async () => {
        this.apply((queue) => queue.clearAll());
        this.commands.dispatch({ command: 'media.reset' });
      },
      'playback.play-from': async (cmd) => this.apply((queue) => queue.playFrom(cmd.position)),

      'playback.play': async () => this.play(),
      'playback.stop': async () => {
        this.commands.dispatch({ command: 'controls.stop' });
      },
    };
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private advance(): void {
    const replay = this.state.get().repeat === 'track';
    this.apply((queue) => queue.advance(), { replay });
  }

  private play(): void {
    const queue = this.state.get();
    const current = queue.getCurrent();
    const engineState = this.engine.getState();

    if (current && engineState === 'paused') {
      this.commands.dispatch({ command: 'controls.play' });
    } else if (current && RESTARTABLE_STATES.has(engineState)) {
      this.startTrack(current);
    } else if (!current && queue.canAdvance()) {
      this.advance();
    } else {
      this.log.debug({ engineState, hasCurrent: Boolean(current) }, 'Nothing to play');
    }
  }

  /**
   * Swap in the updated queue, publish what changed and notify the engine
   */
  private apply(update: (queue: Queue) => Queue, options: ApplyOptions = {}): void {
    const { before, after } = this.state.swap(update);
    this.publishChanges(before, after);

    const currentChanged = !sameTrack(before.current, after.current);
    if (currentChanged || (options.replay && after.current)) {
      this.notifyEngine(after.current);
    }
  }

  private publishChanges(before: Queue, after: Queue): void {
    if (before === after) return;

    const snapshotBefore = before.listAll();
    const snapshotAfter = after.listAll();
    if (!sameSnapshot(snapshotBefore, snapshotAfter)) {
      this.events.publish({
        event: 'playback.queue-changed',
        before: snapshotBefore,
        after: snapshotAfter,
      });
    }
    if (!sameTrack(before.current, after.current)) {
      this.events.publish({
        event: 'playback.current-track-changed',
        before: before.current,
        after: after.current,
      });
    }
    if (before.repeat !== after.repeat) {
      this.events.publish({ event: 'playback.repeat-changed', before: before.repeat, after: after.repeat });
    }
    if (before.shuffle !== after.shuffle) {
      this.events.publish({
        event: 'playback.shuffle-changed',
        before: before.shuffle,
        after: after.shuffle,
      });
    }
  }

  private notifyEngine(current: Track | undefined): void {
    if (current) {
      this.startTrack(current);
    } else {
      this.commands.dispatch({ command: 'controls.stop' });
    }
  }

  private startTrack(track: Track): void {
    this.log.debug({ trackId: track.id, mrl: track.mrl }, 'Starting track');
    this.commands.dispatch({ command: 'media.play', mrl: track.mrl });
  }

  private async resolve(paths: readonly string[]): Promise<Track[]> {
    try {
      return await this.resolver.resolve(paths);
    } catch (error) {
      if (error instanceof PlayerError) throw error;
      throw new MediaResolutionError('Failed to resolve media', error, { paths });
    }
  }
}
