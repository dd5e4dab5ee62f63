/**
 * Event registry
 *
 * Events are plain objects `{ event: <name>, ...payload }`. Engine events
 * (`engine.*`) come from the native engine and are validated on the way in.
 * Playback events (`playback.*`) are published by the controller and carry
 * the value before and after the change.
 */

import { z } from 'zod';
import {
  EngineStateSchema,
  QueueSnapshotSchema,
  RepeatModeSchema,
  TrackSchema,
} from '../utils/validators';
import { explain, validateSafe } from '../utils/validation';
import type { ValidationIssue } from '../types/errors';

function event<N extends string, S extends z.ZodRawShape>(name: N, shape: S) {
  return z.object({ event: z.literal(name), ...shape }).strict();
}

function change<N extends string, T extends z.ZodTypeAny>(name: N, value: T) {
  return event(name, { before: value, after: value });
}

// ============================================================================
// Engine Events
// ============================================================================

export const NATIVE_EVENTS = {
  'engine.opening': event('engine.opening', {}),
  'engine.buffering': event('engine.buffering', { cache: z.number() }),
  'engine.playing': event('engine.playing', {}),
  'engine.paused': event('engine.paused', {}),
  'engine.stopped': event('engine.stopped', {}),
  'engine.finished': event('engine.finished', {}),
  'engine.error': event('engine.error', { message: z.string().optional() }),
  'engine.time-changed': event('engine.time-changed', { time: z.number() }),
  'engine.position-changed': event('engine.position-changed', { position: z.number() }),
  'engine.length-changed': event('engine.length-changed', { length: z.number() }),
  'engine.media-changed': event('engine.media-changed', { mrl: z.string().optional() }),
  'engine.muted': event('engine.muted', { muted: z.boolean() }),
  'engine.volume-changed': event('engine.volume-changed', { volume: z.number() }),
  'engine.audio-device-changed': event('engine.audio-device-changed', {
    device: z.string().nullable(),
  }),
  'engine.seekable-changed': event('engine.seekable-changed', { seekable: z.boolean() }),
  'engine.pausable-changed': event('engine.pausable-changed', { pausable: z.boolean() }),
  'engine.media-duration-changed': event('engine.media-duration-changed', {
    duration: z.number(),
  }),
  'engine.media-state-changed': event('engine.media-state-changed', {
    state: EngineStateSchema,
  }),
};

// ============================================================================
// Playback Events
// ============================================================================

export const DOMAIN_EVENTS = {
  'playback.queue-changed': change('playback.queue-changed', QueueSnapshotSchema),
  'playback.current-track-changed': change('playback.current-track-changed', TrackSchema.optional()),
  'playback.repeat-changed': change('playback.repeat-changed', RepeatModeSchema),
  'playback.shuffle-changed': change('playback.shuffle-changed', z.boolean()),
};

export const EVENT_SCHEMAS = {
  ...NATIVE_EVENTS,
  ...DOMAIN_EVENTS,
};

// ============================================================================
// Types
// ============================================================================

export type EventName = keyof typeof EVENT_SCHEMAS;
export type NativeEventName = keyof typeof NATIVE_EVENTS;
export type DomainEventName = keyof typeof DOMAIN_EVENTS;

export type EventMap = {
  [K in EventName]: z.infer<(typeof EVENT_SCHEMAS)[K]>;
};

export type NativeEvent = EventMap[NativeEventName];
export type DomainEvent = EventMap[DomainEventName];
export type PlayerEvent = NativeEvent | DomainEvent;

/**
 * Which events a subscriber receives
 */
export type EventPredicate =
  | { kind: 'exact'; event: EventName }
  | { kind: 'any-of'; events: readonly EventName[] }
  | { kind: 'custom'; test: (event: PlayerEvent) => boolean };

export function exact(name: EventName): EventPredicate {
  return { kind: 'exact', event: name };
}

export function anyOf(...names: EventName[]): EventPredicate {
  return { kind: 'any-of', events: names };
}

export function custom(test: (event: PlayerEvent) => boolean): EventPredicate {
  return { kind: 'custom', test };
}

export function matches(predicate: EventPredicate, event: PlayerEvent): boolean {
  switch (predicate.kind) {
    case 'exact':
      return predicate.event === event.event;
    case 'any-of':
      return predicate.events.includes(event.event);
    case 'custom':
      return predicate.test(event);
  }
}

// ============================================================================
// Validation
// ============================================================================

function isNativeEventName(name: unknown): name is NativeEventName {
  return typeof name === 'string' && Object.prototype.hasOwnProperty.call(NATIVE_EVENTS, name);
}

function eventNameOf(data: unknown): unknown {
  return typeof data === 'object' && data !== null && 'event' in data ? data.event : undefined;
}

/**
 * Parse an engine event, or null if it is unknown or malformed
 */
export function parseNativeEvent(data: unknown): NativeEvent | null {
  const name = eventNameOf(data);
  if (!isNativeEventName(name)) return null;
  return validateSafe(NATIVE_EVENTS[name], data);
}

/**
 * Why an engine event was rejected, or null when it is valid
 */
export function explainNativeEvent(data: unknown): ValidationIssue[] | null {
  const name = eventNameOf(data);
  if (!isNativeEventName(name)) {
    return [{ path: 'event', message: `Unknown event: ${String(name)}` }];
  }
  return explain(NATIVE_EVENTS[name], data);
}
