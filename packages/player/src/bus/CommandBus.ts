/**
 * CommandBus - the write side of the player
 *
 * Commands are validated on the caller's side, then queued on a bounded
 * channel. A single control loop takes them in order:
 * - native commands are handed to the native context, a one-at-a-time task
 *   queue, and the loop moves on without waiting for them
 * - porcelain commands run inline; the loop waits for each one
 *
 * When the channel is full the oldest queued command is dropped.
 */

import PQueue from 'p-queue';
import {
  ensureValidCommand,
  isNativeCommand,
  resolveAlias,
  runNative,
  type Command,
  type CommandInput,
  type CommandMap,
  type NativeCommand,
  type PorcelainCommandName,
} from '../commands';
import {
  CommandDroppedError,
  NativeCommandError,
  PlayerReleasedError,
  UnknownCommandError,
} from '../types/errors';
import type { NativeEngine } from '../types/engine';
import { SlidingChannel } from '../utils/channel';
import { Deferred } from '../utils/deferred';
import { createLogger, logError, type Logger } from '../utils/logger';

export type PorcelainHandler<K extends PorcelainCommandName> = (
  cmd: CommandMap[K]
) => Promise<void>;

export type PorcelainHandlers = { [K in PorcelainCommandName]: PorcelainHandler<K> };

interface Envelope {
  command: Command;
  /** Present when a caller awaits the outcome */
  deferred?: Deferred<void>;
}

export interface CommandBusOptions {
  engine: NativeEngine;
  capacity: number;
  logger: Logger;
}

export class CommandBus {
  private readonly engine: NativeEngine;
  private readonly log: Logger;
  private readonly channel: SlidingChannel<Envelope>;
  private readonly native = new PQueue({ concurrency: 1 });
  private porcelain: PorcelainHandlers | null = null;
  private loop: Promise<void> | null = null;
  private released = false;

  constructor(options: CommandBusOptions) {
    this.engine = options.engine;
    this.log = createLogger({ module: 'CommandBus' }, options.logger);
    this.channel = new SlidingChannel<Envelope>({
      capacity: options.capacity,
      onDrop: (envelope) => this.handleDrop(envelope),
    });
  }

  /**
   * Install the porcelain handlers. Until then porcelain commands fail with
   * UnknownCommandError.
   */
  registerPorcelain(handlers: PorcelainHandlers): void {
    this.porcelain = handlers;
  }

  /**
   * Start the control loop
   */
  start(): void {
    if (this.loop || this.released) return;
    this.loop = this.run();
  }

  get isReleased(): boolean {
    return this.released;
  }

  // ============================================================================
  // Submitting Commands
  // ============================================================================

  /**
   * Queue a command without waiting for it
   *
   * @throws PlayerReleasedError after release
   * @throws ValidationError if the command is unknown or malformed
   */
  dispatch(input: CommandInput): void {
    this.enqueue({ command: this.prepare(input) });
  }

  /**
   * Queue a command and wait until it has been handled
   *
   * Rejects with the command's own failure, or with CommandDroppedError if it
   * was pushed out of a full channel.
   */
  async execute(input: CommandInput): Promise<void> {
    const deferred = new Deferred<void>();
    this.enqueue({ command: this.prepare(input), deferred });
    return deferred.promise;
  }

  /**
   * Stop the loop. Queued commands are discarded and their callers get
   * PlayerReleasedError. Resolves once in-flight work has finished.
   */
  async stop(): Promise<void> {
    if (this.released) return;
    this.released = true;

    const undelivered = this.channel.close();
    undelivered.forEach(({ command, deferred }) => {
      deferred?.reject(new PlayerReleasedError({ command: command.command }));
    });
    if (undelivered.length > 0) {
      this.log.debug({ count: undelivered.length }, 'Discarded queued commands');
    }

    await this.loop;
    await this.native.onIdle();
    this.log.debug('Stopped');
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private prepare(input: CommandInput): Command {
    if (this.released) {
      throw new PlayerReleasedError({ command: input.command });
    }
    return ensureValidCommand(resolveAlias(input));
  }

  private enqueue(envelope: Envelope): void {
    if (!this.channel.put(envelope)) {
      throw new PlayerReleasedError({ command: envelope.command.command });
    }
  }

  private handleDrop({ command, deferred }: Envelope): void {
    this.log.warn({ command: command.command }, 'Command channel full, dropped oldest command');
    deferred?.reject(new CommandDroppedError(command.command));
  }

  private async run(): Promise<void> {
    for (;;) {
      const next = await this.channel.take();
      if (next.done) return;
      await this.handle(next.value);
    }
  }

  private async handle({ command, deferred }: Envelope): Promise<void> {
    if (isNativeCommand(command)) {
      this.submitNative(command, deferred);
      return;
    }

    try {
      await this.runPorcelain(command);
      deferred?.resolve();
    } catch (error) {
      if (error instanceof PlayerReleasedError) {
        this.log.debug({ command: command.command }, 'Porcelain command cut short by release');
      } else {
        logError(this.log, error, 'Porcelain command failed', { command: command.command });
      }
      deferred?.reject(error);
    }
  }

  private submitNative(command: NativeCommand, deferred: Deferred<void> | undefined): void {
    void this.native
      .add(async () => {
        if (this.released) {
          throw new PlayerReleasedError({ command: command.command });
        }
        try {
          await runNative(this.engine, command);
        } catch (error) {
          throw new NativeCommandError(command.command, error);
        }
      })
      .then(
        () => deferred?.resolve(),
        (error: unknown) => {
          if (error instanceof PlayerReleasedError) {
            this.log.debug({ command: command.command }, 'Skipped native command after release');
          } else {
            logError(this.log, error, 'Native command failed', { command: command.command });
          }
          deferred?.reject(error);
        }
      );
  }

  private runPorcelain<K extends PorcelainCommandName>(
    cmd: CommandMap[K] & { command: K }
  ): Promise<void> {
    if (!this.porcelain) {
      throw new UnknownCommandError(cmd.command);
    }
    const handler: PorcelainHandler<K> = this.porcelain[cmd.command];
    return handler(cmd);
  }
}
