/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { InvalidStoryDefinitionError } from '@stb-ifc/data';
import { DEFAULT_STORY_HEIGHT, StoryIndex } from './story-index.js';

describe('StoryIndex', () => {
  const index = new StoryIndex([
    { name: 'GL', elevation: 0 },
    { name: '2F', elevation: 3000, height: 3500 },
  ]);

  it('should apply the default height when none is given', () => {
    expect(DEFAULT_STORY_HEIGHT).toBe(3000);
    expect(index.get('GL')).toEqual({ name: 'GL', baseZ: 0, topZ: 3000 });
    expect(index.get('2F')).toEqual({ name: '2F', baseZ: 3000, topZ: 6500 });
  });

  it('should keep registration order', () => {
    expect(index.names()).toEqual(['GL', '2F']);
    expect(index.size).toBe(2);
  });

  it('should treat intervals as half-open', () => {
    expect(index.findContaining(0)?.name).toBe('GL');
    expect(index.findContaining(2999.9)?.name).toBe('GL');
    expect(index.findContaining(3000)?.name).toBe('2F');
    expect(index.findContaining(6500)).toBeUndefined();
    expect(index.findContaining(-1)).toBeUndefined();
  });

  it('should resolve overlaps to the earliest story', () => {
    const overlapping = new StoryIndex([
      { name: 'A', elevation: 0, height: 4000 },
      { name: 'B', elevation: 3000, height: 3000 },
    ]);
    expect(overlapping.findContaining(3500)?.name).toBe('A');
  });

  it('should reject duplicate names', () => {
    expect(() => new StoryIndex([
      { name: 'GL', elevation: 0 },
      { name: 'GL', elevation: 3000 },
    ])).toThrow('Duplicate story name "GL"');
  });

  it('should reject malformed extents', () => {
    expect(() => new StoryIndex([{ name: 'GL', elevation: 0, height: -1 }]))
      .toThrow(InvalidStoryDefinitionError);
    expect(() => new StoryIndex([{ name: 'GL', elevation: Number.NaN }]))
      .toThrow(InvalidStoryDefinitionError);
    expect(() => new StoryIndex([{ name: '', elevation: 0 }]))
      .toThrow(InvalidStoryDefinitionError);
  });

  it('should accept an empty story list', () => {
    const empty = new StoryIndex([]);
    expect(empty.size).toBe(0);
    expect(empty.findContaining(0)).toBeUndefined();
  });
});
