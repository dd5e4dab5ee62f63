/**
 * Queue - immutable playback queue with unified indexing
 *
 * Segments:
 * - history: previously played tracks, oldest first
 * - current: the selected track, if any
 * - priority: "play next" tracks, first in first out
 * - normal: the regular upcoming tracks
 *
 * Unified index: 0 is current, -1 the most recently played track, 1 the next
 * track to play. Positive indices run through priority, then normal. Every
 * operation returns a new Queue; segments that did not change are shared.
 *
 * The cleanup callback runs once for every track that leaves the queue
 * (remove, replace, clear). Tracks that are only repositioned (advance, prev,
 * move, shuffle) are not cleaned up.
 */

import type { QueueSnapshot, RepeatMode, Track, TrackCleanup } from '../types';

type Segment = 'history' | 'priority' | 'normal';

type Location = { segment: 'current' } | { segment: Segment; offset: number };

interface QueueState {
  history: readonly Track[];
  current: Track | undefined;
  priority: readonly Track[];
  normal: readonly Track[];
  shuffle: boolean;
  repeat: RepeatMode;
  cleanup: TrackCleanup | undefined;
}

export class Queue {
  readonly history: readonly Track[];
  readonly current: Track | undefined;
  readonly priority: readonly Track[];
  readonly normal: readonly Track[];
  readonly shuffle: boolean;
  readonly repeat: RepeatMode;
  private readonly cleanup: TrackCleanup | undefined;

  private constructor(state: QueueState) {
    this.history = state.history;
    this.current = state.current;
    this.priority = state.priority;
    this.normal = state.normal;
    this.shuffle = state.shuffle;
    this.repeat = state.repeat;
    this.cleanup = state.cleanup;
  }

  /**
   * Create an empty queue
   *
   * @param cleanup - Called with each track removed from the queue, e.g. to
   * free engine-side media handles
   */
  static create(cleanup?: TrackCleanup): Queue {
    return new Queue({
      history: [],
      current: undefined,
      priority: [],
      normal: [],
      shuffle: false,
      repeat: 'none',
      cleanup,
    });
  }

  // ============================================================================
  // Lookup
  // ============================================================================

  getCurrent(): Track | undefined {
    return this.current;
  }

  /**
   * Track at a unified index, or undefined when nothing lives there
   */
  getAt(index: number): Track | undefined {
    const location = this.locate(index);
    if (!location) return undefined;
    return location.segment === 'current' ? this.current : this[location.segment][location.offset];
  }

  /**
   * Tracks for the unified range [start, end), skipping empty slots
   */
  getSlice(start: number, end: number): Track[] {
    const from = Math.max(start, -this.history.length);
    const to = Math.min(end, this.futureSize() + 1);
    const tracks: Track[] = [];
    for (let index = from; index < to; index++) {
      const track = this.getAt(index);
      if (track) tracks.push(track);
    }
    return tracks;
  }

  listAll(): QueueSnapshot {
    return {
      history: this.history,
      current: this.current,
      upcoming: [...this.priority, ...this.normal],
    };
  }

  // ============================================================================
  // Adding tracks
  // ============================================================================

  /**
   * Add tracks to the end of the normal segment
   */
  append(tracks: readonly Track[]): Queue {
    if (tracks.length === 0) return this;
    return this.with({ normal: [...this.normal, ...tracks] });
  }

  /**
   * Add tracks to the end of the priority segment, after earlier add-next calls
   */
  addNext(tracks: readonly Track[]): Queue {
    if (tracks.length === 0) return this;
    return this.with({ priority: [...this.priority, ...tracks] });
  }

  /**
   * Insert tracks at a unified index
   *
   * At index 0 the first track becomes current and the rest, followed by the
   * old current, move to the front of priority. Past the end, tracks are
   * appended to normal.
   */
  insertAt(index: number, tracks: readonly Track[]): Queue {
    if (tracks.length === 0 || !Number.isInteger(index)) return this;

    if (index === 0) {
      const [first, ...rest] = tracks;
      const demoted = this.current ? [this.current] : [];
      return this.with({ current: first, priority: [...rest, ...demoted, ...this.priority] });
    }

    if (index < 0) {
      const offset = this.history.length + index;
      if (offset < 0) return this;
      return this.with({ history: spliceIn(this.history, offset, tracks) });
    }

    const offset = index - 1;
    if (offset <= this.priority.length) {
      return this.with({ priority: spliceIn(this.priority, offset, tracks) });
    }
    const normalOffset = Math.min(offset - this.priority.length, this.normal.length);
    return this.with({ normal: spliceIn(this.normal, normalOffset, tracks) });
  }

  // ============================================================================
  // Navigation
  // ============================================================================

  /**
   * Move forward, respecting the repeat mode
   */
  advance(): Queue {
    const { current, priority, normal } = this;

    if (!current) {
      if (priority.length > 0) {
        return this.with({ current: priority[0], priority: priority.slice(1) });
      }
      if (normal.length > 0) {
        return this.with({ current: normal[0], normal: normal.slice(1) });
      }
      return this;
    }

    if (this.repeat === 'track') return this;

    if (priority.length > 0) {
      return this.with({
        history: [...this.history, current],
        current: priority[0],
        priority: priority.slice(1),
      });
    }

    if (normal.length > 0) {
      return this.with({
        history: [...this.history, current],
        current: normal[0],
        normal: normal.slice(1),
      });
    }

    if (this.repeat === 'list') {
      // Nothing upcoming: wrap around to the oldest track.
      const [first, ...rest] = [...this.history, current];
      if (rest.length === 0) return this;
      return this.with({ history: [], current: first, priority: [], normal: rest });
    }

    return this;
  }

  /**
   * Move forward ignoring repeat mode
   */
  nextTrack(): Queue {
    return this.with({ repeat: 'none' }).advance().with({ repeat: this.repeat });
  }

  /**
   * Move back to the most recently played track
   */
  prevTrack(): Queue {
    if (this.history.length === 0) return this;
    const demoted = this.current ? [this.current] : [];
    return this.with({
      history: this.history.slice(0, -1),
      current: this.history[this.history.length - 1],
      priority: [...demoted, ...this.priority],
    });
  }

  /**
   * Make the track at `index` current by stepping forward or back
   */
  playFrom(index: number): Queue {
    if (index === 0 || !this.getAt(index)) return this;

    if (index < 0) {
      let queue = this.prevTrack();
      for (let step = -1; step > index; step--) {
        queue = queue.prevTrack();
      }
      return queue;
    }

    let queue = this.with({ repeat: 'none' });
    for (let step = 0; step < index; step++) {
      queue = queue.advance();
    }
    return queue.with({ repeat: this.repeat });
  }

  /**
   * True if advance() can select a track (or replay the current one)
   */
  canAdvance(): boolean {
    const hasUpcoming = this.priority.length > 0 || this.normal.length > 0;
    if (!this.current) return hasUpcoming;
    return hasUpcoming || this.repeat === 'track' || this.repeat === 'list';
  }

  canRewind(): boolean {
    return this.history.length > 0;
  }

  // ============================================================================
  // Modes
  // ============================================================================

  /**
   * Enabling shuffle folds priority into normal and randomizes the order.
   * Disabling only flips the flag.
   */
  setShuffle(enabled: boolean, random: () => number = Math.random): Queue {
    if (!enabled) return this.with({ shuffle: false });
    return this.with({
      shuffle: true,
      priority: [],
      normal: shuffleArray([...this.priority, ...this.normal], random),
    });
  }

  setRepeat(mode: RepeatMode): Queue {
    return this.with({ repeat: mode });
  }

  // ============================================================================
  // Removing & replacing
  // ============================================================================

  /**
   * Remove the tracks at the given unified indices
   *
   * Indices are resolved against this queue before anything is removed.
   * Removing current promotes the next upcoming track.
   */
  removeAt(indices: readonly number[]): Queue {
    const locations = this.locateAll(indices);
    if (locations.length === 0) return this;
    this.cleanupTracks(locations.map((location) => this.trackAt(location)));
    return this.without(locations);
  }

  /**
   * Replace the track at `index` with zero or more tracks
   */
  replaceAt(index: number, tracks: readonly Track[]): Queue {
    const location = this.locate(index);
    if (!location) return this;
    if (tracks.length === 0) return this.removeAt([index]);

    this.cleanupTracks([this.trackAt(location)]);

    if (location.segment === 'current') {
      const [first, ...rest] = tracks;
      return this.with({ current: first, priority: [...rest, ...this.priority] });
    }
    const segment = this[location.segment];
    return this.withSegment(location.segment, [
      ...segment.slice(0, location.offset),
      ...tracks,
      ...segment.slice(location.offset + 1),
    ]);
  }

  /**
   * Relocate a track. The track stays in the queue, so it is not cleaned up.
   */
  move(from: number, to: number): Queue {
    if (from === to) return this;
    const location = this.locate(from);
    if (!location) return this;
    return this.without([location]).insertAt(to, [this.trackAt(location)]);
  }

  /**
   * Drop every upcoming track; current and history are kept
   */
  clearUpcoming(): Queue {
    this.cleanupTracks([...this.priority, ...this.normal]);
    return this.with({ priority: [], normal: [] });
  }

  /**
   * Drop every track and return a fresh queue with the same cleanup callback
   */
  clearAll(): Queue {
    const { history, current, priority, normal } = this;
    this.cleanupTracks([...history, ...(current ? [current] : []), ...priority, ...normal]);
    return Queue.create(this.cleanup);
  }

  // ============================================================================
  // Sizes & indices
  // ============================================================================

  isEmpty(): boolean {
    return this.current === undefined;
  }

  totalSize(): number {
    return this.history.length + (this.current ? 1 : 0) + this.futureSize();
  }

  futureSize(): number {
    return this.priority.length + this.normal.length;
  }

  historySize(): number {
    return this.history.length;
  }

  currentIndex(): number | undefined {
    return this.current ? 0 : undefined;
  }

  nextIndex(): number | undefined {
    return this.canAdvance() ? 1 : undefined;
  }

  prevIndex(): number | undefined {
    return this.canRewind() ? -1 : undefined;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private with(changes: Partial<QueueState>): Queue {
    return new Queue({
      history: this.history,
      current: this.current,
      priority: this.priority,
      normal: this.normal,
      shuffle: this.shuffle,
      repeat: this.repeat,
      cleanup: this.cleanup,
      ...changes,
    });
  }

  private withSegment(segment: Segment, tracks: readonly Track[]): Queue {
    switch (segment) {
      case 'history':
        return this.with({ history: tracks });
      case 'priority':
        return this.with({ priority: tracks });
      case 'normal':
        return this.with({ normal: tracks });
    }
  }

  private locate(index: number): Location | undefined {
    if (!Number.isInteger(index)) return undefined;

    if (index === 0) {
      return this.current ? { segment: 'current' } : undefined;
    }

    if (index < 0) {
      const offset = this.history.length + index;
      return offset >= 0 ? { segment: 'history', offset } : undefined;
    }

    const offset = index - 1;
    if (offset < this.priority.length) {
      return { segment: 'priority', offset };
    }
    const normalOffset = offset - this.priority.length;
    return normalOffset < this.normal.length ? { segment: 'normal', offset: normalOffset } : undefined;
  }

  private locateAll(indices: readonly number[]): Location[] {
    const locations: Location[] = [];
    new Set(indices).forEach((index) => {
      const location = this.locate(index);
      if (location) locations.push(location);
    });
    return locations;
  }

  private trackAt(location: Location): Track {
    if (location.segment === 'current') {
      if (!this.current) throw new RangeError('Queue has no current track');
      return this.current;
    }
    return this[location.segment][location.offset];
  }

  /**
   * Remove located tracks without cleanup
   */
  private without(locations: readonly Location[]): Queue {
    const doomed = new Set(
      locations.map((location) =>
        location.segment === 'current' ? 'current' : `${location.segment}:${location.offset}`
      )
    );
    const keep = (segment: Segment) =>
      this[segment].filter((_, offset) => !doomed.has(`${segment}:${offset}`));

    const remaining = this.with({
      history: keep('history'),
      priority: keep('priority'),
      normal: keep('normal'),
    });
    if (!doomed.has('current')) return remaining;

    // Promote the next upcoming track into the vacated current slot.
    if (remaining.priority.length > 0) {
      return remaining.with({
        current: remaining.priority[0],
        priority: remaining.priority.slice(1),
      });
    }
    if (remaining.normal.length > 0) {
      return remaining.with({ current: remaining.normal[0], normal: remaining.normal.slice(1) });
    }
    return remaining.with({ current: undefined });
  }

  private cleanupTracks(tracks: readonly Track[]): void {
    if (!this.cleanup) return;
    tracks.forEach((track) => this.cleanup?.(track));
  }
}

function spliceIn(list: readonly Track[], at: number, tracks: readonly Track[]): Track[] {
  return [...list.slice(0, at), ...tracks, ...list.slice(at)];
}

function shuffleArray<T>(array: readonly T[], random: () => number): T[] {
  const shuffled = [...array];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}
