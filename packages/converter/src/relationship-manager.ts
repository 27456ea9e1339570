/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Story ↔ element containment.
 *
 * Elements are registered against a story name, then materialized as one
 * containment relationship per story (not per element).
 */

import {
  createLogger,
  errorMessage,
  type ElementBuilder,
  type ElementRecord,
  type ElementType,
} from '@stb-ifc/data';

const log = createLogger('RelationshipManager');

/** Elements below this confidence are reported by validate() */
export const LOW_CONFIDENCE_THRESHOLD = 0.7;

export interface ValidationResult<H> {
  isValid: boolean;
  /** Elements whose story was never materialized */
  orphanedElements: ElementRecord<H>[];
  /** Element ids registered more than once */
  duplicateRelationships: string[];
  /** Story names with registered elements but no materialized story */
  missingStories: string[];
  warnings: string[];
}

export interface StoryStatistics {
  storyName: string;
  elementCount: number;
  elementTypes: Partial<Record<ElementType, number>>;
  /** Mean confidence of classified elements, null when none were classified */
  confidenceAverage: number | null;
}

export class RelationshipManager<H> {
  private readonly storyElements = new Map<string, ElementRecord<H>[]>();
  private readonly registeredIds = new Set<string>();
  private readonly rejectedIds: string[] = [];
  private readonly materializedStories = new Set<string>();
  private relationships: H[] = [];

  constructor(private readonly builder: ElementBuilder<H>) {}

  /**
   * Register an element under a story. A second registration of the same
   * element id is rejected with a warning.
   */
  register(record: ElementRecord<H>, storyName: string): boolean {
    if (this.registeredIds.has(record.elementId)) {
      log.warn(`Element already registered, ignoring registration under "${storyName}"`, {
        operation: 'register',
        elementId: record.elementId,
        elementType: record.elementType,
      });
      this.rejectedIds.push(record.elementId);
      return false;
    }

    const group = this.storyElements.get(storyName);
    if (group) {
      group.push(record);
    } else {
      this.storyElements.set(storyName, [record]);
    }
    this.registeredIds.add(record.elementId);
    return true;
  }

  /**
   * Create one containment relationship per non-empty story that has an
   * output-side handle.
   */
  materialize(storyHandles: ReadonlyMap<string, H>): H[] {
    const created: H[] = [];

    for (const [storyName, records] of this.storyElements) {
      if (records.length === 0) continue;

      const story = storyHandles.get(storyName);
      if (story === undefined) {
        log.warn(`No story "${storyName}" to contain ${records.length} elements`, { operation: 'materialize' });
        continue;
      }

      try {
        const relationship = this.builder.createSpatialRelationship(story, records.map(r => r.handle));
        created.push(relationship);
        this.materializedStories.add(storyName);
        log.debug(`Contained ${records.length} elements in "${storyName}"`, undefined, { operation: 'materialize' });
      } catch (error) {
        log.warn(`Containment for "${storyName}" failed: ${errorMessage(error)}`, { operation: 'materialize' });
      }
    }

    this.relationships = created;
    log.info(`Created ${created.length} containment relationships`);
    return created;
  }

  validate(): ValidationResult<H> {
    const orphanedElements: ElementRecord<H>[] = [];
    const missingStories: string[] = [];
    const warnings: string[] = [];

    for (const [storyName, records] of this.storyElements) {
      if (!this.materializedStories.has(storyName)) {
        missingStories.push(storyName);
        orphanedElements.push(...records);
      }
    }

    const duplicateRelationships = [...new Set(this.rejectedIds)];

    const total = this.getTotalRegisteredElements();
    if (total === 0) {
      warnings.push('No elements registered');
    }

    let lowConfidence = 0;
    for (const records of this.storyElements.values()) {
      for (const record of records) {
        if (record.confidence !== null && record.confidence < LOW_CONFIDENCE_THRESHOLD) lowConfidence++;
      }
    }
    if (lowConfidence > 0) {
      warnings.push(`${lowConfidence} elements assigned with low confidence (< ${LOW_CONFIDENCE_THRESHOLD})`);
    }

    const isValid = orphanedElements.length === 0
      && duplicateRelationships.length === 0
      && missingStories.length === 0;

    if (!isValid) {
      log.warn(`Integrity problems: ${orphanedElements.length} orphaned, ${duplicateRelationships.length} duplicate, ${missingStories.length} missing stories`);
    }

    return { isValid, orphanedElements, duplicateRelationships, missingStories, warnings };
  }

  getElementsByStory(storyName: string): ElementRecord<H>[] {
    return this.storyElements.get(storyName) ?? [];
  }

  getStoryStatistics(): Map<string, StoryStatistics> {
    const stats = new Map<string, StoryStatistics>();

    for (const [storyName, records] of this.storyElements) {
      if (records.length === 0) continue;

      const elementTypes: Partial<Record<ElementType, number>> = {};
      let confidenceSum = 0;
      let classified = 0;
      for (const record of records) {
        elementTypes[record.elementType] = (elementTypes[record.elementType] ?? 0) + 1;
        if (record.confidence !== null) {
          confidenceSum += record.confidence;
          classified++;
        }
      }

      stats.set(storyName, {
        storyName,
        elementCount: records.length,
        elementTypes,
        confidenceAverage: classified > 0 ? confidenceSum / classified : null,
      });
    }
    return stats;
  }

  getStoryNames(): string[] {
    return [...this.storyElements.keys()];
  }

  getTotalRegisteredElements(): number {
    let total = 0;
    for (const records of this.storyElements.values()) total += records.length;
    return total;
  }

  getRelationships(): readonly H[] {
    return this.relationships;
  }

  clear(): void {
    this.storyElements.clear();
    this.registeredIds.clear();
    this.rejectedIds.length = 0;
    this.materializedStories.clear();
    this.relationships = [];
  }
}
