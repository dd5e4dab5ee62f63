/**
 * Tests for Queue
 */

import { describe, it, expect, vi } from 'vitest';
import { Queue } from '../Queue';
import type { Track, TrackCleanup } from '../../types';

function track(id: string): Track {
  return { id, mrl: `file:///music/${id}.flac`, metadata: { title: id } };
}

function ids(tracks: readonly Track[]): string[] {
  return tracks.map((t) => t.id);
}

interface Layout {
  history?: Track[];
  current?: Track;
  priority?: Track[];
  normal?: Track[];
}

/**
 * Build a queue with the given segments using only public operations
 */
function queueOf(layout: Layout, cleanup?: TrackCleanup): Queue {
  const played = [...(layout.history ?? []), ...(layout.current ? [layout.current] : [])];
  let queue = Queue.create(cleanup).append(played);
  for (let i = 0; i < played.length; i++) {
    queue = queue.advance();
  }
  return queue.append(layout.normal ?? []).addNext(layout.priority ?? []);
}

const [a, b, c, d] = ['a', 'b', 'c', 'd'].map(track);
const [h1, h2, h3] = ['h1', 'h2', 'h3'].map(track);
const [p1, p2] = ['p1', 'p2'].map(track);
const [n1, n2, n3] = ['n1', 'n2', 'n3'].map(track);
const [x, y] = ['x', 'y'].map(track);

describe('Queue', () => {
  describe('create', () => {
    it('should start empty', () => {
      const queue = Queue.create();
      expect(queue.isEmpty()).toBe(true);
      expect(queue.getCurrent()).toBeUndefined();
      expect(queue.totalSize()).toBe(0);
      expect(queue.shuffle).toBe(false);
      expect(queue.repeat).toBe('none');
    });
  });

  describe('getAt', () => {
    const queue = queueOf({ history: [h1, h2], current: c, priority: [p1], normal: [n1, n2] });

    it('should map the unified index onto every segment', () => {
      expect(queue.getAt(-2)).toBe(h1);
      expect(queue.getAt(-1)).toBe(h2);
      expect(queue.getAt(0)).toBe(c);
      expect(queue.getAt(1)).toBe(p1);
      expect(queue.getAt(2)).toBe(n1);
      expect(queue.getAt(3)).toBe(n2);
    });

    it('should return undefined out of range', () => {
      expect(queue.getAt(4)).toBeUndefined();
      expect(queue.getAt(-3)).toBeUndefined();
    });

    it('should return undefined for non-integer indices', () => {
      expect(queue.getAt(1.5)).toBeUndefined();
      expect(queue.getAt(Number.NaN)).toBeUndefined();
      expect(queue.getAt(Number.POSITIVE_INFINITY)).toBeUndefined();
    });

    it('should never throw', () => {
      for (let i = -20; i <= 20; i++) {
        expect(() => queue.getAt(i)).not.toThrow();
      }
      expect(() => Queue.create().getAt(-1)).not.toThrow();
    });

    it('should treat index 0 as absent when there is no current track', () => {
      const noCurrent = Queue.create().append([a, b]);
      expect(noCurrent.getAt(0)).toBeUndefined();
      expect(noCurrent.getAt(1)).toBe(a);
      expect(noCurrent.getAt(2)).toBe(b);
    });
  });

  describe('append and addNext', () => {
    it('should select the first appended track on advance', () => {
      const queue = Queue.create().append([a, b]).advance();
      expect(queue.current).toBe(a);
      expect(ids(queue.normal)).toEqual(['b']);
    });

    it('should keep add-next tracks in FIFO order across calls', () => {
      const queue = queueOf({ current: a }).addNext([x]).addNext([y]);
      expect(ids(queue.priority)).toEqual(['x', 'y']);
    });

    it('should not modify the original queue', () => {
      const original = queueOf({ current: a });
      const appended = original.append([b]);
      expect(original.normal).toEqual([]);
      expect(ids(appended.normal)).toEqual(['b']);
    });

    it('should return the same queue when nothing is added', () => {
      const queue = queueOf({ current: a });
      expect(queue.append([])).toBe(queue);
      expect(queue.addNext([])).toBe(queue);
    });
  });

  describe('advance', () => {
    it('should take from priority before normal', () => {
      const c1 = track('c1');
      const c2 = track('c2');
      const c3 = track('c3');
      const queue = queueOf({ current: c1, priority: [c2], normal: [c3] }).advance();

      expect(queue.current).toBe(c2);
      expect(ids(queue.history)).toEqual(['c1']);
      expect(queue.priority).toEqual([]);
      expect(ids(queue.normal)).toEqual(['c3']);
    });

    it('should be undone by prevTrack when repeat is none', () => {
      const before = queueOf({ history: [h1], current: a, normal: [b] });
      const after = before.advance().prevTrack();

      expect(after.current).toBe(before.current);
      expect(ids(after.history)).toEqual(ids(before.history));
    });

    it('should do nothing at the end of the queue', () => {
      const queue = queueOf({ current: a });
      expect(queue.advance()).toBe(queue);
    });

    it('should keep the current track with repeat track', () => {
      const queue = queueOf({ current: a, normal: [b] }).setRepeat('track');
      const advanced = queue.advance().advance();

      expect(advanced.current).toBe(a);
      expect(advanced.history).toEqual([]);
      expect(ids(advanced.normal)).toEqual(['b']);
    });

    it('should cycle through every track in order with repeat list', () => {
      let queue = Queue.create().append([a, b, c]).advance().setRepeat('list');
      const played: string[] = [];
      for (let i = 0; i < 6; i++) {
        queue = queue.advance();
        played.push(queue.current?.id ?? '');
      }
      expect(played).toEqual(['b', 'c', 'a', 'b', 'c', 'a']);
    });

    it('should reset history when repeat list wraps around', () => {
      const queue = queueOf({ history: [a, b], current: c }).setRepeat('list').advance();

      expect(queue.current).toBe(a);
      expect(queue.history).toEqual([]);
      expect(queue.priority).toEqual([]);
      expect(ids(queue.normal)).toEqual(['b', 'c']);
    });

    it('should not wrap a single track with repeat list', () => {
      const queue = queueOf({ current: a }).setRepeat('list');
      expect(queue.advance()).toBe(queue);
    });
  });

  describe('nextTrack', () => {
    it('should move forward even with repeat track', () => {
      const queue = queueOf({ current: a, normal: [b] }).setRepeat('track').nextTrack();

      expect(queue.current).toBe(b);
      expect(ids(queue.history)).toEqual(['a']);
      expect(queue.repeat).toBe('track');
    });

    it('should not wrap with repeat list', () => {
      const queue = queueOf({ history: [a], current: b }).setRepeat('list').nextTrack();

      expect(queue.current).toBe(b);
      expect(queue.repeat).toBe('list');
    });
  });

  describe('prevTrack', () => {
    it('should push the current track to the front of priority', () => {
      const queue = queueOf({ history: [a], current: b, priority: [x] }).prevTrack();

      expect(queue.current).toBe(a);
      expect(queue.history).toEqual([]);
      expect(ids(queue.priority)).toEqual(['b', 'x']);
    });

    it('should do nothing without history', () => {
      const queue = queueOf({ current: a, normal: [b] });
      expect(queue.prevTrack()).toBe(queue);
    });
  });

  describe('playFrom', () => {
    const queue = queueOf({ current: a, normal: [b, c, d] });

    it('should step forward to a positive index', () => {
      const result = queue.playFrom(3);

      expect(result.current).toBe(d);
      expect(ids(result.history)).toEqual(['a', 'b', 'c']);
      expect(result.normal).toEqual([]);
    });

    it('should step back to a negative index', () => {
      const result = queue.playFrom(3).playFrom(-2);

      expect(result.current).toBe(b);
      expect(ids(result.history)).toEqual(['a']);
      expect(ids(result.priority)).toEqual(['c', 'd']);
    });

    it('should ignore repeat track while stepping', () => {
      const result = queue.setRepeat('track').playFrom(2);

      expect(result.current).toBe(c);
      expect(result.repeat).toBe('track');
    });

    it('should do nothing for index 0 or an empty slot', () => {
      expect(queue.playFrom(0)).toBe(queue);
      expect(queue.playFrom(9)).toBe(queue);
      expect(queue.playFrom(-1)).toBe(queue);
    });
  });

  describe('insertAt', () => {
    it('should replace current at index 0 and demote it to priority', () => {
      const queue = queueOf({ current: a, normal: [b] }).insertAt(0, [x, y]);

      expect(queue.current).toBe(x);
      expect(ids(queue.priority)).toEqual(['y', 'a']);
      expect(ids(queue.normal)).toEqual(['b']);
    });

    it('should set current at index 0 when there is none', () => {
      const queue = Queue.create().append([b]).insertAt(0, [x]);

      expect(queue.current).toBe(x);
      expect(queue.priority).toEqual([]);
      expect(ids(queue.normal)).toEqual(['b']);
    });

    it('should splice into priority', () => {
      const queue = queueOf({ current: a, priority: [p1, p2] });

      expect(ids(queue.insertAt(2, [x]).priority)).toEqual(['p1', 'x', 'p2']);
      expect(ids(queue.insertAt(3, [x]).priority)).toEqual(['p1', 'p2', 'x']);
    });

    it('should splice into normal past the priority segment', () => {
      const queue = queueOf({ current: a, normal: [n1, n2] });

      expect(ids(queue.insertAt(2, [x]).normal)).toEqual(['n1', 'x', 'n2']);
    });

    it('should append when the index is past the end', () => {
      const queue = queueOf({ current: a, normal: [n1, n2] }).insertAt(10, [x]);
      expect(ids(queue.normal)).toEqual(['n1', 'n2', 'x']);
    });

    it('should splice into history for negative indices', () => {
      const queue = queueOf({ history: [h1, h2], current: a }).insertAt(-1, [x]);

      expect(ids(queue.history)).toEqual(['h1', 'x', 'h2']);
      expect(queue.getAt(-2)).toBe(x);
    });

    it('should ignore out-of-range negative indices and empty input', () => {
      const queue = queueOf({ history: [h1], current: a });
      expect(queue.insertAt(-5, [x])).toBe(queue);
      expect(queue.insertAt(1, [])).toBe(queue);
    });
  });

  describe('removeAt', () => {
    it('should clean up each distinct resolved track exactly once', () => {
      const cleanup = vi.fn();
      const queue = queueOf({ current: a, priority: [p1], normal: [n1, n2] }, cleanup);
      const result = queue.removeAt([1, 3, 3, 99]);

      expect(cleanup).toHaveBeenCalledTimes(2);
      expect(cleanup).toHaveBeenCalledWith(p1);
      expect(cleanup).toHaveBeenCalledWith(n2);
      expect(result.current).toBe(a);
      expect(result.priority).toEqual([]);
      expect(ids(result.normal)).toEqual(['n1']);
    });

    it('should promote the next priority track when removing current', () => {
      const cleanup = vi.fn();
      const result = queueOf({ current: a, priority: [p1], normal: [n1] }, cleanup).removeAt([0]);

      expect(result.current).toBe(p1);
      expect(result.priority).toEqual([]);
      expect(ids(result.normal)).toEqual(['n1']);
      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(cleanup).toHaveBeenCalledWith(a);
    });

    it('should promote from normal when priority is removed too', () => {
      const result = queueOf({ current: a, priority: [p1], normal: [n1] }).removeAt([0, 1]);

      expect(result.current).toBe(n1);
      expect(result.priority).toEqual([]);
      expect(result.normal).toEqual([]);
    });

    it('should resolve several history indices against the original queue', () => {
      const result = queueOf({ history: [h1, h2, h3], current: a }).removeAt([-1, -2]);
      expect(ids(result.history)).toEqual(['h1']);
    });

    it('should leave no current when the last track is removed', () => {
      const result = queueOf({ current: a }).removeAt([0]);

      expect(result.current).toBeUndefined();
      expect(result.isEmpty()).toBe(true);
    });

    it('should do nothing for out-of-range indices', () => {
      const cleanup = vi.fn();
      const queue = queueOf({ current: a }, cleanup);

      expect(queue.removeAt([5, -5])).toBe(queue);
      expect(cleanup).not.toHaveBeenCalled();
    });
  });

  describe('replaceAt', () => {
    it('should replace current and queue the remaining tracks next', () => {
      const cleanup = vi.fn();
      const result = queueOf({ current: a, priority: [p1] }, cleanup).replaceAt(0, [x, y]);

      expect(result.current).toBe(x);
      expect(ids(result.priority)).toEqual(['y', 'p1']);
      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(cleanup).toHaveBeenCalledWith(a);
    });

    it('should replace in place within a segment', () => {
      const cleanup = vi.fn();
      const result = queueOf({ current: a, normal: [n1, n2] }, cleanup).replaceAt(2, [x]);

      expect(ids(result.normal)).toEqual(['n1', 'x']);
      expect(cleanup).toHaveBeenCalledWith(n2);
    });

    it('should remove the track when given no replacements', () => {
      const cleanup = vi.fn();
      const result = queueOf({ current: a, normal: [n1, n2] }, cleanup).replaceAt(1, []);

      expect(ids(result.normal)).toEqual(['n2']);
      expect(cleanup).toHaveBeenCalledTimes(1);
      expect(cleanup).toHaveBeenCalledWith(n1);
    });

    it('should do nothing for an empty slot', () => {
      const cleanup = vi.fn();
      const queue = queueOf({ current: a }, cleanup);

      expect(queue.replaceAt(4, [x])).toBe(queue);
      expect(cleanup).not.toHaveBeenCalled();
    });
  });

  describe('move', () => {
    it('should relocate a track within priority', () => {
      const result = queueOf({ current: a, priority: [b, c, d] }).move(1, 3);
      expect(ids(result.priority)).toEqual(['c', 'd', 'b']);
    });

    it('should not clean up the moved track', () => {
      const cleanup = vi.fn();
      const queue = queueOf({ current: a, priority: [b, c, d] }, cleanup);
      const result = queue.move(1, 3);

      expect(cleanup).not.toHaveBeenCalled();
      expect(result.totalSize()).toBe(queue.totalSize());
    });

    it('should do nothing for an empty source slot', () => {
      const queue = queueOf({ current: a, normal: [b] });
      expect(queue.move(5, 1)).toBe(queue);
    });
  });

  describe('setShuffle', () => {
    const queue = queueOf({ current: a, priority: [p1, p2], normal: [n1, n2, n3] });

    it('should fold priority into a shuffled normal segment', () => {
      const result = queue.setShuffle(true, () => 0);

      expect(result.shuffle).toBe(true);
      expect(result.priority).toEqual([]);
      expect(ids(result.normal)).toEqual(['p2', 'n1', 'n2', 'n3', 'p1']);
      expect(result.current).toBe(a);
    });

    it('should keep every upcoming track exactly once', () => {
      const result = queue.setShuffle(true);
      expect(ids(result.normal).sort()).toEqual(['n1', 'n2', 'n3', 'p1', 'p2']);
    });

    it('should only clear the flag when disabling', () => {
      const result = queue.setShuffle(true, () => 0).setShuffle(false);

      expect(result.shuffle).toBe(false);
      expect(ids(result.normal)).toEqual(['p2', 'n1', 'n2', 'n3', 'p1']);
    });
  });

  describe('clearing', () => {
    it('should clean up every track on clearAll and keep the callback', () => {
      const cleanup = vi.fn();
      const queue = queueOf({ history: [h1], current: a, priority: [p1], normal: [n1] }, cleanup);
      const cleared = queue.clearAll();

      expect(cleanup).toHaveBeenCalledTimes(4);
      expect(cleared.totalSize()).toBe(0);
      expect(cleared.isEmpty()).toBe(true);

      cleared.append([x]).removeAt([1]);
      expect(cleanup).toHaveBeenCalledTimes(5);
      expect(cleanup).toHaveBeenLastCalledWith(x);
    });

    it('should clean up only upcoming tracks on clearUpcoming', () => {
      const cleanup = vi.fn();
      const queue = queueOf({ history: [h1], current: a, priority: [p1], normal: [n1] }, cleanup);
      const cleared = queue.clearUpcoming();

      expect(cleanup).toHaveBeenCalledTimes(2);
      expect(cleanup).toHaveBeenCalledWith(p1);
      expect(cleanup).toHaveBeenCalledWith(n1);
      expect(cleared.current).toBe(a);
      expect(ids(cleared.history)).toEqual(['h1']);
      expect(cleared.futureSize()).toBe(0);
    });
  });

  describe('sizes and indices', () => {
    const queue = queueOf({ history: [h1], current: a, priority: [p1], normal: [n1, n2] });

    it('should count each segment', () => {
      expect(queue.totalSize()).toBe(5);
      expect(queue.futureSize()).toBe(3);
      expect(queue.historySize()).toBe(1);
    });

    it('should report navigable indices', () => {
      expect(queue.currentIndex()).toBe(0);
      expect(queue.nextIndex()).toBe(1);
      expect(queue.prevIndex()).toBe(-1);
      expect(queue.canAdvance()).toBe(true);
      expect(queue.canRewind()).toBe(true);
    });

    it('should report no indices on an empty queue', () => {
      const empty = Queue.create();
      expect(empty.currentIndex()).toBeUndefined();
      expect(empty.nextIndex()).toBeUndefined();
      expect(empty.prevIndex()).toBeUndefined();
    });

    it('should allow advancing a lone track only with a repeat mode', () => {
      const lone = queueOf({ current: a });
      expect(lone.canAdvance()).toBe(false);
      expect(lone.setRepeat('track').canAdvance()).toBe(true);
      expect(lone.setRepeat('list').canAdvance()).toBe(true);
    });

    it('should slice across segments', () => {
      expect(ids(queue.getSlice(-1, 2))).toEqual(['h1', 'a', 'p1']);
      expect(ids(queue.getSlice(-10, 10))).toEqual(['h1', 'a', 'p1', 'n1', 'n2']);
    });

    it('should list all segments', () => {
      const snapshot = queue.listAll();
      expect(ids(snapshot.history)).toEqual(['h1']);
      expect(snapshot.current).toBe(a);
      expect(ids(snapshot.upcoming)).toEqual(['p1', 'n1', 'n2']);
    });
  });
});
