import type { QueueSnapshot, Track } from '../types';

/**
 * Value equality for tracks
 */
export function sameTrack(a: Track | undefined, b: Track | undefined): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  return (
    a.id === b.id &&
    a.mrl === b.mrl &&
    a.duration === b.duration &&
    sameMetadata(a.metadata, b.metadata)
  );
}

export function sameTracks(a: readonly Track[], b: readonly Track[]): boolean {
  if (a === b) return true;
  return a.length === b.length && a.every((track, i) => sameTrack(track, b[i]));
}

export function sameSnapshot(a: QueueSnapshot, b: QueueSnapshot): boolean {
  return (
    sameTrack(a.current, b.current) &&
    sameTracks(a.history, b.history) &&
    sameTracks(a.upcoming, b.upcoming)
  );
}

function sameMetadata(
  a: Readonly<Record<string, string>> | undefined,
  b: Readonly<Record<string, string>> | undefined
): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key]);
}
