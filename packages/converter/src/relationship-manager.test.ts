/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { RelationshipManager } from './relationship-manager.js';
import { FakeBuilder, makeRecord } from '../test/fake-builder.js';

describe('RelationshipManager', () => {
  it('should create one relationship per story', () => {
    const builder = new FakeBuilder();
    const manager = new RelationshipManager(builder);
    manager.register(makeRecord('B1', 'GL'), 'GL');
    manager.register(makeRecord('B2', 'GL'), 'GL');
    manager.register(makeRecord('B3', '2F'), '2F');

    const relationships = manager.materialize(new Map([['GL', 'story:GL'], ['2F', 'story:2F']]));

    expect(relationships).toEqual(['rel:story:GL', 'rel:story:2F']);
    expect(builder.relationships).toEqual([
      { story: 'story:GL', elements: ['beam:B1', 'beam:B2'] },
      { story: 'story:2F', elements: ['beam:B3'] },
    ]);
    expect(manager.validate()).toEqual({
      isValid: true,
      orphanedElements: [],
      duplicateRelationships: [],
      missingStories: [],
      warnings: [],
    });
  });

  it('should reject a second registration of an element id', () => {
    const manager = new RelationshipManager(new FakeBuilder());
    expect(manager.register(makeRecord('B1', 'GL'), 'GL')).toBe(true);
    expect(manager.register(makeRecord('B1', '2F'), '2F')).toBe(false);

    expect(manager.getTotalRegisteredElements()).toBe(1);
    expect(manager.getStoryNames()).toEqual(['GL']);

    manager.materialize(new Map([['GL', 'story:GL']]));
    const validation = manager.validate();
    expect(validation.isValid).toBe(false);
    expect(validation.duplicateRelationships).toEqual(['B1']);
  });

  it('should report stories that were never materialized', () => {
    const builder = new FakeBuilder();
    const manager = new RelationshipManager(builder);
    const orphan = makeRecord('B2', '3F');
    manager.register(makeRecord('B1', 'GL'), 'GL');
    manager.register(orphan, '3F');

    manager.materialize(new Map([['GL', 'story:GL']]));
    const validation = manager.validate();

    expect(builder.relationships).toHaveLength(1);
    expect(validation.isValid).toBe(false);
    expect(validation.missingStories).toEqual(['3F']);
    expect(validation.orphanedElements).toEqual([orphan]);
  });

  it('should leave a story unmaterialized when the builder throws', () => {
    const builder = new FakeBuilder();
    builder.createSpatialRelationship = () => {
      throw new Error('Story handle is stale');
    };
    const manager = new RelationshipManager(builder);
    manager.register(makeRecord('B1', 'GL'), 'GL');

    expect(manager.materialize(new Map([['GL', 'story:GL']]))).toEqual([]);
    expect(manager.validate().missingStories).toEqual(['GL']);
  });

  it('should warn about an empty registry', () => {
    const manager = new RelationshipManager(new FakeBuilder());
    const validation = manager.validate();
    expect(validation.isValid).toBe(true);
    expect(validation.warnings).toEqual(['No elements registered']);
  });

  it('should warn about low-confidence assignments', () => {
    const manager = new RelationshipManager(new FakeBuilder());
    manager.register(makeRecord('B1', 'GL', { confidence: 0.6, analysisMethod: 'coordinate' }), 'GL');
    manager.register(makeRecord('B2', 'GL', { confidence: 0.8, analysisMethod: 'node-reference' }), 'GL');
    manager.register(makeRecord('B3', 'GL', { confidence: null, analysisMethod: null }), 'GL');

    expect(manager.validate().warnings).toEqual(['1 elements assigned with low confidence (< 0.7)']);
  });

  it('should summarise each story', () => {
    const manager = new RelationshipManager(new FakeBuilder());
    manager.register(makeRecord('B1', 'GL', { confidence: 1.0 }), 'GL');
    manager.register(makeRecord('C1', 'GL', { elementType: 'column', confidence: 0.6 }), 'GL');
    manager.register(makeRecord('B2', '2F', { confidence: null, analysisMethod: null }), '2F');

    const stats = manager.getStoryStatistics();
    expect(stats.get('GL')).toEqual({
      storyName: 'GL',
      elementCount: 2,
      elementTypes: { beam: 1, column: 1 },
      confidenceAverage: 0.8,
    });
    expect(stats.get('2F')?.confidenceAverage).toBeNull();
  });

  it('should forget everything on clear', () => {
    const manager = new RelationshipManager(new FakeBuilder());
    manager.register(makeRecord('B1', 'GL'), 'GL');
    manager.materialize(new Map([['GL', 'story:GL']]));
    manager.clear();

    expect(manager.getTotalRegisteredElements()).toBe(0);
    expect(manager.getRelationships()).toEqual([]);
    expect(manager.register(makeRecord('B1', 'GL'), 'GL')).toBe(true);
  });
});
