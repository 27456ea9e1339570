/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ElementCentricConverter - classify every element first, then build.
 *
 * Run order:
 *   (a) story intervals
 *   (b) story analysis, grouped by story then element type
 *   (c) per group: deduplicate, then hand survivors to the builder
 *   (d) statistics
 *   (e) stories and containment through the RelationshipManager, if attached
 *
 * A failure of one element never stops the run. A failure of the run as a
 * whole (bad story list, builder unable to create a story) yields a result
 * with `errors` set and no elements.
 */

import {
  ElementCreationError,
  createEmptyStatistics,
  createLogger,
  errorMessage,
  type ClassifiedDefinition,
  type ConversionResult,
  type ConversionStatistics,
  type ElementBuilder,
  type ElementDefinitionsByType,
  type ElementRecord,
  type ElementType,
  type StoryDefinition,
} from '@stb-ifc/data';
import { Deduplicator } from './deduplicator.js';
import type { RelationshipManager } from './relationship-manager.js';
import { StoryAnalyzer, type StoryAnalyzerOptions } from './story-analyzer.js';
import { StoryIndex } from './story-index.js';

const log = createLogger('ElementCentricConverter');

/** Millisecond clock */
export type Clock = () => number;

export const defaultClock: Clock = () => performance.now();

export interface ElementCentricConverterOptions<H> {
  relationshipManager?: RelationshipManager<H>;
  analyzer?: StoryAnalyzerOptions;
  clock?: Clock;
}

export class ElementCentricConverter<H> {
  private readonly deduplicator = new Deduplicator();
  private readonly relationshipManager?: RelationshipManager<H>;
  private readonly analyzerOptions: StoryAnalyzerOptions;
  private readonly clock: Clock;
  private statistics: ConversionStatistics = createEmptyStatistics();
  private anonymousCount = 0;

  constructor(
    private readonly builder: ElementBuilder<H>,
    private readonly nodeStoryMap: ReadonlyMap<string, string>,
    options: ElementCentricConverterOptions<H> = {}
  ) {
    this.relationshipManager = options.relationshipManager;
    this.analyzerOptions = options.analyzer ?? {};
    this.clock = options.clock ?? defaultClock;
  }

  convert(stories: readonly StoryDefinition[], elements: ElementDefinitionsByType): ConversionResult<H> {
    this.resetRun();
    const start = this.clock();
    const warnings: string[] = [];

    log.info(`Converting ${stories.length} stories`, { operation: 'convert' });

    try {
      // (a)
      const index = new StoryIndex(stories);

      // (b)
      const analyzer = new StoryAnalyzer(this.nodeStoryMap, index, this.analyzerOptions);
      const batch = analyzer.classifyAll(elements);
      for (const rejection of batch.rejected) {
        warnings.push(rejection.message);
      }
      this.statistics.unclassifiedElements = batch.rejected.length;
      this.statistics.totalElements = batch.total - batch.rejected.length;

      // (c) + (d)
      const createdElements: ElementRecord<H>[] = [];
      for (const [storyName, byType] of batch.byStory) {
        for (const [elementType, definitions] of byType) {
          const unique = this.deduplicator.dedupe(definitions);
          this.statistics.duplicateElements += definitions.length - unique.length;
          createdElements.push(...this.createBatch(unique, elementType, storyName, warnings));
        }
      }
      this.statistics.duplicatesByStage = { ...this.deduplicator.duplicatesByStage };

      // (e)
      const createdStories = new Map<string, H>();
      let spatialRelationships: H[] = [];
      if (this.relationshipManager) {
        for (const story of stories) {
          createdStories.set(story.name, this.builder.materializeStory(story));
        }
        spatialRelationships = this.relate(this.relationshipManager, createdElements, createdStories, warnings);
      }

      this.statistics.processingTimeMs = this.clock() - start;
      log.info(
        `Created ${this.statistics.createdElements}, duplicates ${this.statistics.duplicateElements}, ` +
        `failed ${this.statistics.failedElements} in ${this.statistics.processingTimeMs.toFixed(2)}ms`
      );

      return {
        createdElements,
        createdStories,
        spatialRelationships,
        statistics: this.statistics,
        errors: [],
        warnings,
      };
    } catch (error) {
      const message = `Element-centric conversion failed: ${errorMessage(error)}`;
      log.error('Element-centric conversion failed', error, { operation: 'convert' });

      this.statistics = createEmptyStatistics();
      this.statistics.processingTimeMs = this.clock() - start;
      return {
        createdElements: [],
        createdStories: new Map(),
        spatialRelationships: [],
        statistics: this.statistics,
        errors: [message],
        warnings,
      };
    }
  }

  /** Statistics of the most recent run */
  getStatistics(): ConversionStatistics {
    return this.statistics;
  }

  private createBatch(
    definitions: readonly ClassifiedDefinition[],
    elementType: ElementType,
    storyName: string,
    warnings: string[]
  ): ElementRecord<H>[] {
    const created: ElementRecord<H>[] = [];
    const creator = this.builder.getCreator(elementType);

    for (const definition of definitions) {
      const elementId = definition.id ?? `${elementType}#${++this.anonymousCount}`;
      try {
        if (!creator) {
          throw new ElementCreationError(`No creator for element type "${elementType}"`, elementId, elementType);
        }
        const handle = creator.create(definition);

        created.push({
          elementId,
          elementType,
          handle,
          storyName,
          definition,
          createdAt: new Date(),
          confidence: definition.analysisConfidence,
          analysisMethod: definition.analysisMethod,
        });

        const stats = this.statistics;
        stats.createdElements++;
        stats.elementTypeCounts[elementType] = (stats.elementTypeCounts[elementType] ?? 0) + 1;
        stats.analysisMethodCounts[definition.analysisMethod] = (stats.analysisMethodCounts[definition.analysisMethod] ?? 0) + 1;
      } catch (error) {
        this.statistics.failedElements++;
        const message = `Failed to create ${elementType} ${elementId}: ${errorMessage(error)}`;
        log.warn(message, { operation: 'create', elementId, elementType });
        warnings.push(message);
      }
    }

    return created;
  }

  private relate(
    manager: RelationshipManager<H>,
    records: readonly ElementRecord<H>[],
    stories: ReadonlyMap<string, H>,
    warnings: string[]
  ): H[] {
    for (const record of records) {
      manager.register(record, record.storyName);
    }
    const relationships = manager.materialize(stories);

    const validation = manager.validate();
    for (const storyName of validation.missingStories) {
      const orphans = validation.orphanedElements.filter(r => r.storyName === storyName).length;
      warnings.push(`Story "${storyName}" was never materialized; ${orphans} elements are not contained in any story`);
    }
    for (const elementId of validation.duplicateRelationships) {
      warnings.push(`Element ${elementId} was registered more than once`);
    }
    warnings.push(...validation.warnings);

    return relationships;
  }

  private resetRun(): void {
    this.deduplicator.reset();
    this.relationshipManager?.clear();
    this.statistics = createEmptyStatistics();
    this.anonymousCount = 0;
  }
}
