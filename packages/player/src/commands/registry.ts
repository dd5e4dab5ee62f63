/**
 * Command registry
 *
 * Every command is a plain object `{ command: <name>, ...payload }` checked
 * against a strict zod schema: unknown keys and missing fields are rejected.
 *
 * Native commands (`media.*`, `controls.*`, `audio.*`) drive the engine
 * directly. Porcelain commands (`playback.*`) work on the queue and issue
 * native commands of their own. A few native commands are also exposed under
 * friendlier porcelain names through the alias table.
 */

import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../types/errors';
import { explain, validate } from '../utils/validation';
import {
  AudioChannelSchema,
  EqualizerSchema,
  LocatorListSchema,
  RepeatModeSchema,
} from '../utils/validators';

function command<N extends string, S extends z.ZodRawShape>(name: N, description: string, shape: S) {
  return z
    .object({ command: z.literal(name), ...shape })
    .strict()
    .describe(description);
}

const index = z.number().int();

// ============================================================================
// Native Commands
// ============================================================================

export const MEDIA_COMMANDS = {
  'media.play': command('media.play', 'Set new media and play it', {
    mrl: z.string().min(1).describe('media resource locator'),
    options: z.array(z.string()).optional().describe('options attached to the new media'),
  }),
  'media.prepare': command('media.prepare', 'Set new media without playing it', {
    mrl: z.string().min(1).describe('media resource locator'),
    options: z.array(z.string()).optional().describe('options attached to the new media'),
  }),
  'media.reset': command('media.reset', 'Unset the media', {}),
};

export const CONTROLS_COMMANDS = {
  'controls.play': command(
    'controls.play',
    'Begin playback, resuming from the current position when paused',
    {}
  ),
  'controls.pause': command('controls.pause', 'Toggle pause', {}),
  'controls.set-pause': command('controls.set-pause', 'Pause or resume', {
    paused: z.boolean().describe('true to pause, false to resume'),
  }),
  'controls.stop': command(
    'controls.stop',
    'Stop playback. A subsequent play starts from the beginning',
    {}
  ),
  'controls.skip-time': command('controls.skip-time', 'Skip forward or backward in time', {
    deltaMs: z.number().int().describe('delta in milliseconds, negative to skip backward'),
  }),
  'controls.skip-position': command(
    'controls.skip-position',
    'Skip forward or backward by a change in position',
    {
      delta: z.number().describe('fraction of the track, negative to skip backward'),
    }
  ),
  'controls.set-time': command('controls.set-time', 'Jump to a moment in the track', {
    timeMs: z.number().int().describe('time since the beginning in milliseconds'),
  }),
  'controls.set-position': command('controls.set-position', 'Jump to a position in the track', {
    position: z.number().describe('fraction of the track, e.g. 0.15 is 15%'),
  }),
  'controls.set-repeat': command(
    'controls.set-repeat',
    'Replay the media automatically when it finishes',
    {
      repeat: z.boolean(),
    }
  ),
};

export const AUDIO_COMMANDS = {
  'audio.mute': command('audio.mute', 'Toggle mute', {}),
  'audio.set-mute': command('audio.set-mute', 'Mute or unmute', {
    muted: z.boolean(),
  }),
  'audio.set-volume': command('audio.set-volume', 'Set the volume', {
    level: z.number().int().min(0).max(200).describe('percentage of full volume, 0 to 200'),
  }),
  'audio.set-channel': command('audio.set-channel', 'Set the audio channel', {
    channel: AudioChannelSchema,
  }),
  'audio.set-delay': command('audio.set-delay', 'Set the audio delay for the current media', {
    delay: z.number().int().describe('delay in microseconds'),
  }),
  'audio.set-equalizer': command('audio.set-equalizer', 'Set or disable the equalizer', {
    equalizer: EqualizerSchema.nullable(),
  }),
  'audio.set-output': command('audio.set-output', 'Set the audio output', {
    output: z.string().min(1),
  }),
  'audio.set-output-device': command('audio.set-output-device', 'Set the audio output device', {
    output: z.string().min(1),
    deviceId: z.string().min(1),
  }),
};

export const NATIVE_COMMANDS = {
  ...MEDIA_COMMANDS,
  ...CONTROLS_COMMANDS,
  ...AUDIO_COMMANDS,
};

// ============================================================================
// Porcelain Commands
// ============================================================================

export const PORCELAIN_COMMANDS = {
  'playback.advance': command('playback.advance', 'Advance the queue respecting repeat mode', {}),
  'playback.next-track': command(
    'playback.next-track',
    'Play the next track regardless of repeat mode',
    {}
  ),
  'playback.previous-track': command(
    'playback.previous-track',
    'Play the previously played track',
    {}
  ),
  'playback.append': command('playback.append', 'Append tracks to the end of the queue', {
    paths: LocatorListSchema.describe('locators of the tracks to append'),
  }),
  'playback.add-next': command('playback.add-next', 'Add tracks to the end of the play-next list', {
    paths: LocatorListSchema.describe('locators of the tracks to add'),
  }),
  'playback.insert-at': command('playback.insert-at', 'Insert tracks at a queue position', {
    position: index.describe('the position to insert at'),
    paths: LocatorListSchema.describe('locators of the tracks to insert'),
  }),
  'playback.replace-at': command('playback.replace-at', 'Replace the track at a queue position', {
    position: index.describe('the position to replace'),
    paths: LocatorListSchema.describe('locators of the replacement tracks'),
  }),
  'playback.remove-at': command('playback.remove-at', 'Remove the track at a queue position', {
    position: index.describe('the position to remove'),
  }),
  'playback.move': command('playback.move', 'Move a track to a new queue position', {
    from: index.describe('the current position of the track'),
    to: index.describe('the new position of the track'),
  }),
  'playback.set-shuffle': command('playback.set-shuffle', 'Enable or disable shuffle', {
    shuffle: z.boolean(),
  }),
  'playback.set-repeat': command('playback.set-repeat', 'Set the queue repeat mode', {
    mode: RepeatModeSchema,
  }),
  'playback.clear-upcoming': command('playback.clear-upcoming', 'Clear the upcoming tracks', {}),
  'playback.clear-all': command('playback.clear-all', 'Clear the whole queue', {}),
  'playback.play': command(
    'playback.play',
    'Resume playback, play the current track, or start the next one',
    {}
  ),
  'playback.stop': command('playback.stop', 'Stop playback', {}),
  'playback.play-from': command('playback.play-from', 'Jump to a queue position and play it', {
    position: index.describe('the position to play'),
  }),
};

export const COMMAND_SCHEMAS = {
  ...NATIVE_COMMANDS,
  ...PORCELAIN_COMMANDS,
};

/**
 * Convenience names for native commands
 */
export const COMMAND_ALIASES = {
  'mixer.mute': 'audio.mute',
  'mixer.set-mute': 'audio.set-mute',
  'mixer.set-volume': 'audio.set-volume',
  'playback.pause': 'controls.pause',
  'playback.set-pause': 'controls.set-pause',
  'playback.skip-time': 'controls.skip-time',
  'playback.skip-position': 'controls.skip-position',
  'playback.set-position': 'controls.set-position',
} as const satisfies Record<string, NativeCommandName>;

// ============================================================================
// Types
// ============================================================================

export type CommandName = keyof typeof COMMAND_SCHEMAS;
export type NativeCommandName = keyof typeof NATIVE_COMMANDS;
export type PorcelainCommandName = keyof typeof PORCELAIN_COMMANDS;
export type CommandAlias = keyof typeof COMMAND_ALIASES;

export type CommandMap = {
  [K in CommandName]: z.infer<(typeof COMMAND_SCHEMAS)[K]>;
};

export type Command = CommandMap[CommandName];
export type NativeCommand = CommandMap[NativeCommandName];
export type PorcelainCommand = CommandMap[PorcelainCommandName];

/**
 * Anything shaped like a command; validated before use
 */
export interface CommandInput {
  command: string;
  [key: string]: unknown;
}

export interface CommandDescription {
  command: string;
  description: string;
  payload: string[];
  aliasOf?: string;
}

// ============================================================================
// Lookup
// ============================================================================

function hasKey<T extends object>(record: T, key: PropertyKey): key is keyof T {
  return Object.prototype.hasOwnProperty.call(record, key);
}

export function isCommandName(name: string): name is CommandName {
  return hasKey(COMMAND_SCHEMAS, name);
}

export function isAlias(name: string): name is CommandAlias {
  return hasKey(COMMAND_ALIASES, name);
}

export function isNativeCommand(cmd: Command): cmd is NativeCommand {
  return hasKey(NATIVE_COMMANDS, cmd.command);
}

export function isPorcelainCommand(cmd: Command): cmd is PorcelainCommand {
  return hasKey(PORCELAIN_COMMANDS, cmd.command);
}

/**
 * Rewrite an alias to its canonical command name. The payload is untouched.
 */
export function resolveAlias<T extends CommandInput>(cmd: T): T {
  return isAlias(cmd.command) ? { ...cmd, command: COMMAND_ALIASES[cmd.command] } : cmd;
}

function unknownCommand(name: string | undefined, cmd: unknown): ValidationError {
  const message = `Unknown command: ${String(name)}`;
  return new ValidationError(message, [{ path: 'command', message }], { receivedData: cmd });
}

function commandNameOf(cmd: unknown): string | undefined {
  if (typeof cmd !== 'object' || cmd === null || !('command' in cmd)) return undefined;
  return typeof cmd.command === 'string' ? cmd.command : undefined;
}

function schemaFor(cmd: unknown) {
  const name = commandNameOf(cmd);
  if (name === undefined || !isCommandName(name)) {
    throw unknownCommand(name, cmd);
  }
  return COMMAND_SCHEMAS[name];
}

// ============================================================================
// Validation
// ============================================================================

/**
 * True if the command matches its schema
 *
 * @throws ValidationError if the command name is unknown
 */
export function validateCommand(cmd: unknown): boolean {
  return schemaFor(cmd).safeParse(cmd).success;
}

/**
 * Why a command is invalid, or null when it is valid
 */
export function explainCommand(cmd: unknown): ValidationIssue[] | null {
  const name = commandNameOf(cmd);
  if (name === undefined || !isCommandName(name)) {
    return [{ path: 'command', message: `Unknown command: ${String(name)}` }];
  }
  return explain(COMMAND_SCHEMAS[name], cmd);
}

/**
 * Validate a canonical command and return it typed
 *
 * @throws ValidationError if the name is unknown or the payload does not match
 */
export function ensureValidCommand(cmd: unknown): Command {
  return validate(schemaFor(cmd), cmd, `command ${String(commandNameOf(cmd))}`);
}

// ============================================================================
// Documentation
// ============================================================================

function payloadKeys(schema: z.AnyZodObject): string[] {
  return Object.keys(schema.shape).filter((key) => key !== 'command');
}

/**
 * Porcelain commands and their payload keys, aliases included
 */
export function describeCommands(): CommandDescription[] {
  const porcelain = Object.values(PORCELAIN_COMMANDS).map((schema) => ({
    command: schema.shape.command.value,
    description: schema.description ?? '',
    payload: payloadKeys(schema),
  }));

  const aliases = Object.entries(COMMAND_ALIASES).map(([alias, target]) => {
    const schema = NATIVE_COMMANDS[target];
    return {
      command: alias,
      description: schema.description ?? '',
      payload: payloadKeys(schema),
      aliasOf: target,
    };
  });

  return [...porcelain, ...aliases].sort((a, b) => a.command.localeCompare(b.command));
}
