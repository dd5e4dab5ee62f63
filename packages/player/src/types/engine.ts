/**
 * Native engine contract
 *
 * The engine decodes and outputs audio. This package never talks to it from
 * more than one place at a time: commands reach it through the command bus's
 * serialized native context, and its events flow out through the event bus.
 */

export const ENGINE_STATES = [
  'idle',
  'opening',
  'buffering',
  'playing',
  'paused',
  'stopped',
  'ended',
  'error',
] as const;

export type EngineState = (typeof ENGINE_STATES)[number];

export const AUDIO_CHANNELS = [
  'stereo',
  'reverse-stereo',
  'left',
  'right',
  'dolby-surround',
  'headphones',
  'mono',
] as const;

export type AudioChannel = (typeof AUDIO_CHANNELS)[number];

export interface Equalizer {
  /** Pre-amplification in dB */
  preamp: number;
  /** Band amplitudes in dB, lowest frequency first */
  bands: number[];
}

export interface AudioDevice {
  deviceId: string;
  description: string;
}

export const MEDIA_TYPES = ['unknown', 'file', 'directory', 'disc', 'stream', 'playlist'] as const;

export type MediaType = (typeof MEDIA_TYPES)[number];

/**
 * An audio elementary stream of the loaded media
 */
export interface AudioTrackInfo {
  id: number;
  codec: string;
  language?: string;
  description?: string;
  channels: number;
  /** Sample rate in Hz */
  rate: number;
  bitrate?: number;
}

/**
 * Input and decoder counters for the loaded media
 */
export interface MediaStatistics {
  readBytes: number;
  inputBitrate: number;
  demuxReadBytes: number;
  demuxBitrate: number;
  demuxCorrupted: number;
  demuxDiscontinuity: number;
  decodedAudio: number;
  playedAudioBuffers: number;
  lostAudioBuffers: number;
}

export type EngineListener = (event: unknown) => void;

export interface NativeEngine {
  // Media
  playMedia(mrl: string, options?: readonly string[]): void | Promise<void>;
  prepareMedia(mrl: string, options?: readonly string[]): void | Promise<void>;
  resetMedia(): void | Promise<void>;

  // Controls
  play(): void | Promise<void>;
  pause(): void | Promise<void>;
  setPause(paused: boolean): void | Promise<void>;
  stop(): void | Promise<void>;
  skipTime(deltaMs: number): void | Promise<void>;
  skipPosition(delta: number): void | Promise<void>;
  setTime(timeMs: number): void | Promise<void>;
  setPosition(position: number): void | Promise<void>;
  setRepeat(repeat: boolean): void | Promise<void>;

  // Audio
  mute(): void | Promise<void>;
  setMute(muted: boolean): void | Promise<void>;
  setVolume(level: number): void | Promise<void>;
  setChannel(channel: AudioChannel): void | Promise<void>;
  setDelay(delay: number): void | Promise<void>;
  setEqualizer(equalizer: Equalizer | null): void | Promise<void>;
  setOutput(output: string): void | Promise<void>;
  setOutputDevice(output: string, deviceId: string): void | Promise<void>;

  // Queries
  getState(): EngineState;
  getTime(): number;
  getPosition(): number;
  getLength(): number;
  getRate(): number;
  getVolume(): number;
  isMuted(): boolean;
  getRepeat(): boolean;
  getChannel(): AudioChannel;
  getDelay(): number;
  getEqualizer(): Equalizer | null;
  getOutputDevice(): string | null;
  getOutputDevices(): AudioDevice[];
  isPlaying(): boolean;
  isPlayable(): boolean;
  isSeekable(): boolean;
  canPause(): boolean;

  // Loaded media
  /** Locator of the loaded media, or null when nothing is loaded */
  getMediaMrl(): string | null;
  getMediaType(): MediaType | null;
  /** Duration of the loaded media in milliseconds, or null if unknown */
  getMediaDuration(): number | null;
  getAudioTracks(): AudioTrackInfo[];
  /** Null when nothing is loaded or the engine cannot report statistics */
  getMediaStatistics(): MediaStatistics | null;

  /**
   * Attach a listener to the engine's event stream
   *
   * @returns A function that detaches the listener
   */
  subscribe(listener: EngineListener): () => void;

  /** Free the native resources. Called once, after playback has stopped. */
  release(): void | Promise<void>;
}
