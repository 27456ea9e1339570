/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Vertical extent lookup for building stories.
 */

import { InvalidStoryDefinitionError, type StoryDefinition } from '@stb-ifc/data';

/** Story height used when a definition omits it (mm) */
export const DEFAULT_STORY_HEIGHT = 3000;

/** Half-open interval [baseZ, topZ) */
export interface StoryInterval {
  readonly name: string;
  readonly baseZ: number;
  readonly topZ: number;
}

/**
 * Ordered, immutable set of story intervals. Lookups walk the stories in
 * registration order, so overlapping definitions resolve to the earliest.
 */
export class StoryIndex {
  private readonly intervals: readonly StoryInterval[];
  private readonly byName: ReadonlyMap<string, StoryInterval>;

  /**
   * @throws InvalidStoryDefinitionError for duplicate or empty names and for
   *   non-finite or negative extents
   */
  constructor(stories: readonly StoryDefinition[]) {
    const intervals: StoryInterval[] = [];
    const byName = new Map<string, StoryInterval>();

    for (const story of stories) {
      if (!story.name) {
        throw new InvalidStoryDefinitionError('Story definition without a name');
      }
      if (byName.has(story.name)) {
        throw new InvalidStoryDefinitionError(`Duplicate story name "${story.name}"`, story.name);
      }
      const height = story.height ?? DEFAULT_STORY_HEIGHT;
      if (!Number.isFinite(story.elevation) || !Number.isFinite(height)) {
        throw new InvalidStoryDefinitionError(`Story "${story.name}" has a non-finite elevation or height`, story.name);
      }
      if (height < 0) {
        throw new InvalidStoryDefinitionError(`Story "${story.name}" has a negative height (${height})`, story.name);
      }

      const interval: StoryInterval = Object.freeze({
        name: story.name,
        baseZ: story.elevation,
        topZ: story.elevation + height,
      });
      intervals.push(interval);
      byName.set(story.name, interval);
    }

    this.intervals = intervals;
    this.byName = byName;
  }

  get size(): number {
    return this.intervals.length;
  }

  /** Story names in registration order */
  names(): string[] {
    return this.intervals.map(i => i.name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): StoryInterval | undefined {
    return this.byName.get(name);
  }

  /** First story (registration order) whose interval contains z */
  findContaining(z: number): StoryInterval | undefined {
    return this.intervals.find(i => i.baseZ <= z && z < i.topZ);
  }

  entries(): readonly StoryInterval[] {
    return this.intervals;
  }
}
