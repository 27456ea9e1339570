/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Story-by-story conversion, the way the converter worked before story
 * analysis existed.
 *
 * Each story is created in turn and takes the elements whose floor resolves
 * to it: the floor attribute, else the story of the element's first mapped
 * node. Elements resolving to nothing go to the first story. Elements whose
 * floor names a story that does not exist end up in a "GL" story at
 * elevation 0, created on demand. Only element ids are deduplicated.
 */

import {
  ElementCreationError,
  createEmptyStatistics,
  createLogger,
  errorMessage,
  iterateElementGroups,
  type ConversionInput,
  type ConversionResult,
  type ElementBuilder,
  type ElementDefinition,
  type ElementRecord,
  type ElementType,
} from '@stb-ifc/data';
import { defaultClock, type Clock } from './element-centric-converter.js';

const log = createLogger('LegacyStoryConverter');

/** Story that collects elements whose floor was never created */
export const FALLBACK_STORY_NAME = 'GL';

export interface LegacyConverter<H> {
  convert(input: ConversionInput, builder: ElementBuilder<H>): ConversionResult<H>;
}

interface PendingElement {
  elementType: ElementType;
  definition: ElementDefinition;
  index: number;
  floor: string | undefined;
}

function resolveFloor(definition: ElementDefinition, nodeStoryMap: ReadonlyMap<string, string>): string | undefined {
  if (definition.floor) return definition.floor;
  const candidates = [
    definition.bottomNodeId,
    definition.startNodeId,
    definition.primaryNodeId,
    definition.nodeIds?.[0],
  ];
  for (const nodeId of candidates) {
    if (!nodeId) continue;
    const story = nodeStoryMap.get(nodeId);
    if (story) return story;
  }
  return undefined;
}

export class LegacyStoryConverter<H> implements LegacyConverter<H> {
  constructor(private readonly clock: Clock = defaultClock) {}

  /**
   * @throws when the builder cannot create a story; per-element failures are
   *   counted instead
   */
  convert(input: ConversionInput, builder: ElementBuilder<H>): ConversionResult<H> {
    const start = this.clock();
    const statistics = createEmptyStatistics();
    const warnings: string[] = [];
    const createdStories = new Map<string, H>();
    const createdIds = new Set<string>();
    const records: ElementRecord<H>[] = [];
    let anonymousCount = 0;

    const pending: PendingElement[] = [];
    for (const [elementType, definitions] of iterateElementGroups(input.elements)) {
      definitions.forEach((definition, index) => {
        pending.push({ elementType, definition, index, floor: resolveFloor(definition, input.nodeStoryMap) });
      });
    }
    statistics.totalElements = pending.length;

    const process = (element: PendingElement, storyName: string): void => {
      const { elementType, definition } = element;
      const elementId = definition.id ?? `${elementType}#${++anonymousCount}`;

      if (definition.id && createdIds.has(definition.id)) {
        statistics.duplicateElements++;
        statistics.duplicatesByStage.id++;
        return;
      }

      try {
        const creator = builder.getCreator(elementType);
        if (!creator) {
          throw new ElementCreationError(`No creator for element type "${elementType}"`, elementId, elementType);
        }
        const handle = creator.create(definition);
        if (definition.id) createdIds.add(definition.id);
        records.push({
          elementId,
          elementType,
          handle,
          storyName,
          definition,
          createdAt: new Date(),
          confidence: null,
          analysisMethod: null,
        });
        statistics.createdElements++;
        statistics.elementTypeCounts[elementType] = (statistics.elementTypeCounts[elementType] ?? 0) + 1;
      } catch (error) {
        statistics.failedElements++;
        const message = `Failed to create ${elementType} ${elementId}: ${errorMessage(error)}`;
        log.warn(message, { operation: 'create', elementId, elementType });
        warnings.push(message);
      }
    };

    // Story passes
    const storyNames = new Set(input.stories.map(s => s.name));
    input.stories.forEach((story, storyIndex) => {
      createdStories.set(story.name, builder.materializeStory(story));
      log.info(`Story "${story.name}"`, { operation: 'convert' });

      for (const element of pending) {
        const takesUnresolved = storyIndex === 0 && element.floor === undefined;
        if (element.floor === story.name || takesUnresolved) {
          process(element, story.name);
        }
      }
    });

    // Elements whose floor names a story that was never created
    for (const element of pending) {
      const unresolvedWithoutStories = element.floor === undefined && input.stories.length === 0;
      if ((element.floor !== undefined && !storyNames.has(element.floor)) || unresolvedWithoutStories) {
        process(element, element.floor ?? FALLBACK_STORY_NAME);
      }
    }

    const spatialRelationships = this.associate(records, createdStories, builder, warnings);

    statistics.processingTimeMs = this.clock() - start;
    log.info(`Created ${statistics.createdElements}/${statistics.totalElements} elements in ${statistics.processingTimeMs.toFixed(2)}ms`);

    return {
      createdElements: records,
      createdStories,
      spatialRelationships,
      statistics,
      errors: [],
      warnings,
    };
  }

  /** One containment per story; unknown floors are routed to GL */
  private associate(
    records: ElementRecord<H>[],
    createdStories: Map<string, H>,
    builder: ElementBuilder<H>,
    warnings: string[]
  ): H[] {
    const grouped = new Map<string, H[]>();

    records.forEach((record, i) => {
      let storyName = record.storyName;
      if (!createdStories.has(storyName)) {
        if (!createdStories.has(FALLBACK_STORY_NAME)) {
          log.info(`Creating "${FALLBACK_STORY_NAME}" story at elevation 0 for elements without a known story`);
          createdStories.set(FALLBACK_STORY_NAME, builder.materializeStory({ name: FALLBACK_STORY_NAME, elevation: 0 }));
        }
        if (storyName !== FALLBACK_STORY_NAME) {
          warnings.push(`Element ${record.elementId} has unknown story "${storyName}"; placed in "${FALLBACK_STORY_NAME}"`);
          storyName = FALLBACK_STORY_NAME;
          records[i] = { ...record, storyName };
        }
      }
      const group = grouped.get(storyName);
      if (group) {
        group.push(record.handle);
      } else {
        grouped.set(storyName, [record.handle]);
      }
    });

    const relationships: H[] = [];
    for (const [storyName, handles] of grouped) {
      const story = createdStories.get(storyName);
      if (story === undefined) continue;
      relationships.push(builder.createSpatialRelationship(story, handles));
    }
    return relationships;
  }
}
