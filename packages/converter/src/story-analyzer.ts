/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * StoryAnalyzer - decides which story an element belongs to.
 *
 * Classification is an ordered list of stages. Each stage either returns a
 * result or declines; the first result wins and later stages never run:
 *
 *   1. floor attribute   confidence 1.0
 *   2. anchor node       confidence 0.8
 *   3. Z coordinate      confidence 0.6
 *
 * An element that every stage declines is rejected with
 * UnclassifiableElementError, never silently dropped.
 */

import {
  CONFIDENCE,
  UnclassifiableElementError,
  createLogger,
  iterateElementGroups,
  type AnalysisMethod,
  type ClassifiedDefinition,
  type Confidence,
  type ElementDefinition,
  type ElementDefinitionsByType,
  type ElementType,
  type NodeField,
  type PointField,
} from '@stb-ifc/data';
import type { StoryIndex } from './story-index.js';

const log = createLogger('StoryAnalyzer');

// ============================================================================
// Types
// ============================================================================

/** What a classification decision was based on */
export type AnalysisEvidence =
  | { kind: 'attribute'; value: string }
  | { kind: 'node'; nodeId: string }
  | { kind: 'coordinate'; z: number };

export interface AnalysisResult {
  storyName: string;
  confidence: Confidence;
  method: AnalysisMethod;
  evidence: AnalysisEvidence;
}

/** One stage of the cascade; returns undefined to decline */
export type ClassificationStage = (
  definition: ElementDefinition,
  elementType: ElementType
) => AnalysisResult | undefined;

/** An anchor is either a node field or a position in the nodeIds list */
export type AnchorRef = NodeField | { list: 'nodeIds'; index: number };

export type AnchorRules = Partial<Record<ElementType, readonly AnchorRef[]>>;

/**
 * Which node represents an element's location, per element type:
 * linear members use their start node, vertical members their bottom node,
 * area members their first outline node.
 */
export const DEFAULT_ANCHOR_RULES: AnchorRules = {
  beam: ['startNodeId'],
  girder: ['startNodeId'],
  brace: ['startNodeId'],
  column: ['bottomNodeId'],
  pile: ['bottomNodeId'],
  foundation_column: ['bottomNodeId'],
  wall: [{ list: 'nodeIds', index: 0 }, 'primaryNodeId'],
  slab: [{ list: 'nodeIds', index: 0 }, 'primaryNodeId'],
  footing: [{ list: 'nodeIds', index: 0 }, 'primaryNodeId'],
};

const SINGLE_POINT_FIELDS: readonly PointField[] = ['centerPoint', 'point', 'position', 'startPoint', 'bottomPoint'];

export interface StoryAnalyzerOptions {
  /** Override the per-type anchor node rules */
  anchorRules?: AnchorRules;
}

/** Grouped output of a batch classification */
export interface BatchClassification {
  /** story name → element type → classified definitions, in input order */
  byStory: Map<string, Map<ElementType, ClassifiedDefinition[]>>;
  rejected: UnclassifiableElementError[];
  total: number;
}

// ============================================================================
// Stages
// ============================================================================

export function floorAttributeStage(): ClassificationStage {
  return (definition) => {
    if (!definition.floor) return undefined;
    return {
      storyName: definition.floor,
      confidence: CONFIDENCE['floor-attribute'],
      method: 'floor-attribute',
      evidence: { kind: 'attribute', value: definition.floor },
    };
  };
}

export function nodeReferenceStage(
  nodeStoryMap: ReadonlyMap<string, string>,
  anchorRules: AnchorRules = DEFAULT_ANCHOR_RULES
): ClassificationStage {
  return (definition, elementType) => {
    const rule = anchorRules[elementType];
    if (!rule) return undefined;

    for (const nodeId of anchorNodeIds(definition, rule)) {
      const storyName = nodeStoryMap.get(nodeId);
      if (storyName !== undefined) {
        return {
          storyName,
          confidence: CONFIDENCE['node-reference'],
          method: 'node-reference',
          evidence: { kind: 'node', nodeId },
        };
      }
    }
    return undefined;
  };
}

export function coordinateStage(stories: StoryIndex): ClassificationStage {
  return (definition) => {
    const z = representativeZ(definition);
    if (z === undefined) return undefined;

    const story = stories.findContaining(z);
    if (!story) return undefined;
    return {
      storyName: story.name,
      confidence: CONFIDENCE['coordinate'],
      method: 'coordinate',
      evidence: { kind: 'coordinate', z },
    };
  };
}

/** Anchor node ids of a definition, in rule order, empty ids skipped */
export function anchorNodeIds(definition: ElementDefinition, rule: readonly AnchorRef[]): string[] {
  const ids: string[] = [];
  for (const ref of rule) {
    const id = typeof ref === 'string' ? definition[ref] : definition[ref.list]?.[ref.index];
    if (id) ids.push(id);
  }
  return ids;
}

/**
 * Representative Z of an element: the midpoint of start/end, else the
 * midpoint of bottom/top, else the first single point present.
 */
export function representativeZ(definition: ElementDefinition): number | undefined {
  if (definition.startPoint && definition.endPoint) {
    return (definition.startPoint[2] + definition.endPoint[2]) / 2;
  }
  if (definition.bottomPoint && definition.topPoint) {
    return (definition.bottomPoint[2] + definition.topPoint[2]) / 2;
  }
  for (const field of SINGLE_POINT_FIELDS) {
    const p = definition[field];
    if (p) return p[2];
  }
  return undefined;
}

/** Identifier used in log lines and warnings for a possibly id-less element */
export function describeElement(definition: ElementDefinition, elementType: ElementType, index: number): string {
  return definition.id ?? `${elementType}[${index}]`;
}

// ============================================================================
// StoryAnalyzer
// ============================================================================

export class StoryAnalyzer {
  private readonly stages: readonly ClassificationStage[];

  constructor(
    nodeStoryMap: ReadonlyMap<string, string>,
    stories: StoryIndex,
    options: StoryAnalyzerOptions = {}
  ) {
    this.stages = [
      floorAttributeStage(),
      nodeReferenceStage(nodeStoryMap, options.anchorRules ?? DEFAULT_ANCHOR_RULES),
      coordinateStage(stories),
    ];
    log.info(`Initialised with ${nodeStoryMap.size} mapped nodes and ${stories.size} stories`);
  }

  /**
   * Classify one element.
   * @throws UnclassifiableElementError when every stage declines
   */
  classify(definition: ElementDefinition, elementType: ElementType, index = 0): AnalysisResult {
    for (const stage of this.stages) {
      const result = stage(definition, elementType);
      if (result) {
        log.debug(`${result.method} → ${result.storyName}`, result.evidence, {
          operation: 'classify',
          elementId: definition.id,
          elementType,
        });
        return result;
      }
    }
    throw new UnclassifiableElementError(describeElement(definition, elementType, index), elementType);
  }

  /**
   * Classify every element and group survivors by story, then by type.
   * Each survivor is a frozen copy carrying its assignment; inputs are not
   * touched.
   */
  classifyAll(elements: ElementDefinitionsByType): BatchClassification {
    const byStory = new Map<string, Map<ElementType, ClassifiedDefinition[]>>();
    const rejected: UnclassifiableElementError[] = [];
    let total = 0;

    for (const [elementType, definitions] of iterateElementGroups(elements)) {
      definitions.forEach((definition, index) => {
        total++;
        let result: AnalysisResult;
        try {
          result = this.classify(definition, elementType, index);
        } catch (error) {
          if (!(error instanceof UnclassifiableElementError)) throw error;
          log.warn(error.message, { operation: 'classifyAll', elementType });
          rejected.push(error);
          return;
        }

        const classified: ClassifiedDefinition = Object.freeze({
          ...definition,
          assignedStory: result.storyName,
          analysisConfidence: result.confidence,
          analysisMethod: result.method,
        });

        let byType = byStory.get(result.storyName);
        if (!byType) {
          byType = new Map();
          byStory.set(result.storyName, byType);
        }
        const group = byType.get(elementType);
        if (group) {
          group.push(classified);
        } else {
          byType.set(elementType, [classified]);
        }
      });
    }

    log.info(`Classified ${total - rejected.length}/${total} elements into ${byStory.size} stories`);
    return { byStory, rejected, total };
  }
}
