/**
 * Native command handlers
 *
 * One entry per native command. The mapped type makes a missing handler a
 * compile error.
 */

import type { NativeEngine } from '../types/engine';
import type { CommandMap, NativeCommandName } from './registry';

export type NativeHandler<K extends NativeCommandName> = (
  engine: NativeEngine,
  cmd: CommandMap[K]
) => void | Promise<void>;

export type NativeHandlers = { [K in NativeCommandName]: NativeHandler<K> };

export const nativeHandlers: NativeHandlers = {
  // Media
  'media.play': (engine, cmd) => engine.playMedia(cmd.mrl, cmd.options),
  'media.prepare': (engine, cmd) => engine.prepareMedia(cmd.mrl, cmd.options),
  'media.reset': (engine) => engine.resetMedia(),

  // Controls
  'controls.play': (engine) => engine.play(),
  'controls.pause': (engine) => engine.pause(),
  'controls.set-pause': (engine, cmd) => engine.setPause(cmd.paused),
  'controls.stop': (engine) => engine.stop(),
  'controls.skip-time': (engine, cmd) => engine.skipTime(cmd.deltaMs),
  'controls.skip-position': (engine, cmd) => engine.skipPosition(cmd.delta),
  'controls.set-time': (engine, cmd) => engine.setTime(cmd.timeMs),
  'controls.set-position': (engine, cmd) => engine.setPosition(cmd.position),
  'controls.set-repeat': (engine, cmd) => engine.setRepeat(cmd.repeat),

  // Audio
  'audio.mute': (engine) => engine.mute(),
  'audio.set-mute': (engine, cmd) => engine.setMute(cmd.muted),
  'audio.set-volume': (engine, cmd) => engine.setVolume(cmd.level),
  'audio.set-channel': (engine, cmd) => engine.setChannel(cmd.channel),
  'audio.set-delay': (engine, cmd) => engine.setDelay(cmd.delay),
  'audio.set-equalizer': (engine, cmd) => engine.setEqualizer(cmd.equalizer),
  'audio.set-output': (engine, cmd) => engine.setOutput(cmd.output),
  'audio.set-output-device': (engine, cmd) => engine.setOutputDevice(cmd.output, cmd.deviceId),
};

/**
 * Run a native command against the engine
 */
export function runNative<K extends NativeCommandName>(
  engine: NativeEngine,
  cmd: CommandMap[K] & { command: K }
): void | Promise<void> {
  const handler: NativeHandler<K> = nativeHandlers[cmd.command];
  return handler(engine, cmd);
}
