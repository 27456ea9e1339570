/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { countElements, createEmptyStatistics, isElementType, iterateElementGroups } from './types.js';
import { ElementCreationError, UnsupportedModeError, errorMessage } from './errors.js';

describe('element groups', () => {
  it('should count definitions across types', () => {
    expect(countElements({ beam: [{ id: 'B1' }, { id: 'B2' }], column: [{ id: 'C1' }], wall: [] })).toBe(3);
  });

  it('should iterate non-empty groups in key order', () => {
    const groups = [...iterateElementGroups({ slab: [{ id: 'S1' }], beam: [], column: [{ id: 'C1' }] })];
    expect(groups.map(([type]) => type)).toEqual(['slab', 'column']);
  });

  it('should recognise element types', () => {
    expect(isElementType('foundation_column')).toBe(true);
    expect(isElementType('truss')).toBe(false);
  });

  it('should start statistics at zero', () => {
    expect(createEmptyStatistics()).toEqual({
      totalElements: 0,
      createdElements: 0,
      duplicateElements: 0,
      failedElements: 0,
      unclassifiedElements: 0,
      elementTypeCounts: {},
      analysisMethodCounts: {},
      duplicatesByStage: { id: 0, name: 0, hash: 0 },
      processingTimeMs: 0,
    });
  });
});

describe('errors', () => {
  it('should name each error class', () => {
    const error = new ElementCreationError('bad section', 'B1', 'beam');
    expect(error.name).toBe('ElementCreationError');
    expect(error.elementId).toBe('B1');
    expect(new UnsupportedModeError('fast').message).toBe('Unsupported conversion mode: "fast"');
  });

  it('should read messages from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
