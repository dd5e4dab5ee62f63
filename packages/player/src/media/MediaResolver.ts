/**
 * Media resolution
 *
 * Porcelain commands take locators (file paths or URLs). A resolver turns
 * them into tracks before anything touches the queue.
 */

import { randomUUID } from 'crypto';
import { basename, extname } from 'path';
import { pathToFileURL } from 'url';
import type { Track } from '../types';
import { MediaResolutionError } from '../types/errors';

export interface MediaResolver {
  /**
   * Resolve every locator to a track, in order
   *
   * @throws MediaResolutionError if any locator cannot be resolved
   */
  resolve(locators: readonly string[]): Promise<Track[]>;
}

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Resolves locators without probing the media
 *
 * File paths become file:// URLs and URLs pass through unchanged. The
 * title is taken from the file name.
 */
export class BasicMediaResolver implements MediaResolver {
  async resolve(locators: readonly string[]): Promise<Track[]> {
    return locators.map((locator) => this.resolveOne(locator));
  }

  private resolveOne(locator: string): Track {
    const trimmed = locator.trim();
    if (!trimmed) {
      throw new MediaResolutionError('Cannot resolve an empty locator', undefined, { locator });
    }

    if (SCHEME.test(trimmed)) {
      try {
        return this.track(trimmed, nameOf(decodeURIComponent(new URL(trimmed).pathname)));
      } catch (error) {
        throw new MediaResolutionError(`Invalid media URL: ${trimmed}`, error, { locator });
      }
    }

    // Relative paths resolve against the working directory.
    return this.track(pathToFileURL(trimmed).href, nameOf(trimmed));
  }

  private track(mrl: string, title: string): Track {
    return {
      id: randomUUID(),
      mrl,
      metadata: title ? { title } : {},
    };
  }
}

function nameOf(path: string): string {
  const file = basename(path);
  return basename(file, extname(file));
}
