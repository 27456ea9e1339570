/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Structural model types shared by the definition source, the converter
 * and the IFC builder.
 *
 * All lengths are in millimetres, as in STB.
 */

// ============================================================================
// Geometry primitives
// ============================================================================

/** 3D point [x, y, z] in millimetres */
export type Point3D = [number, number, number];

// ============================================================================
// Element definitions
// ============================================================================

export const ELEMENT_TYPES = [
  'beam',
  'girder',
  'brace',
  'column',
  'pile',
  'foundation_column',
  'wall',
  'slab',
  'footing',
] as const;

export type ElementType = typeof ELEMENT_TYPES[number];

/** Node-reference fields an element may carry */
export type NodeField =
  | 'startNodeId'
  | 'endNodeId'
  | 'bottomNodeId'
  | 'topNodeId'
  | 'primaryNodeId';

/** Single-point fields an element may carry */
export type PointField =
  | 'startPoint'
  | 'endPoint'
  | 'bottomPoint'
  | 'topPoint'
  | 'centerPoint'
  | 'point'
  | 'position';

/**
 * One parsed structural member.
 *
 * The key set is closed: the definition source validates it on ingestion and
 * nothing downstream reads a key that is not declared here.
 */
export interface ElementDefinition {
  id?: string;
  name?: string;
  /** Explicit story name from the source model */
  floor?: string;

  sectionName?: string;
  stbSectionName?: string;
  sectionId?: string;

  startNodeId?: string;
  endNodeId?: string;
  bottomNodeId?: string;
  topNodeId?: string;
  primaryNodeId?: string;
  /** Ordered outline nodes of area elements */
  nodeIds?: string[];

  startPoint?: Point3D;
  endPoint?: Point3D;
  bottomPoint?: Point3D;
  topPoint?: Point3D;
  centerPoint?: Point3D;
  point?: Point3D;
  position?: Point3D;
  /** Ordered outline points of area elements */
  outline?: Point3D[];

  width?: number;
  depth?: number;
  thickness?: number;
  height?: number;
  length?: number;
}

export type ElementDefinitionsByType = Partial<Record<ElementType, ElementDefinition[]>>;

// ============================================================================
// Stories
// ============================================================================

export interface StoryDefinition {
  /** Unique story name */
  name: string;
  /** Base elevation (Z of the story floor) */
  elevation: number;
  /** Story height; the story spans [elevation, elevation + height) */
  height?: number;
  /** Nodes that the source model lists as belonging to this story */
  nodeIds?: string[];
}

/** Grid axis line, parallel to the global X or Y axis */
export interface AxisDefinition {
  name: string;
  /** 'X' axes run along X at a fixed Y offset; 'Y' axes along Y at a fixed X offset */
  direction: 'X' | 'Y';
  offset: number;
}

/** Everything the converter needs from a parsed model */
export interface ConversionInput {
  stories: StoryDefinition[];
  elements: ElementDefinitionsByType;
  /** Node id → story name */
  nodeStoryMap: ReadonlyMap<string, string>;
  axes?: AxisDefinition[];
}

// ============================================================================
// Story analysis
// ============================================================================

export type AnalysisMethod = 'floor-attribute' | 'node-reference' | 'coordinate';

/** Fixed confidence per analysis method */
export const CONFIDENCE = {
  'floor-attribute': 1.0,
  'node-reference': 0.8,
  'coordinate': 0.6,
} as const satisfies Record<AnalysisMethod, number>;

export type Confidence = typeof CONFIDENCE[AnalysisMethod];

/** Definition augmented with its story assignment */
export interface ClassifiedDefinition extends ElementDefinition {
  readonly assignedStory: string;
  readonly analysisConfidence: Confidence;
  readonly analysisMethod: AnalysisMethod;
}

/** Elements with no classification stay as plain definitions (legacy path) */
export type ConvertedDefinition = ElementDefinition | ClassifiedDefinition;

/**
 * A created element. The handle belongs to the element builder; this record
 * only references it.
 */
export interface ElementRecord<H> {
  readonly elementId: string;
  readonly elementType: ElementType;
  readonly handle: H;
  readonly storyName: string;
  readonly definition: ConvertedDefinition;
  readonly createdAt: Date;
  /** null when the element was placed without classification */
  readonly confidence: Confidence | null;
  readonly analysisMethod: AnalysisMethod | null;
}

// ============================================================================
// Conversion results
// ============================================================================

export interface ConversionStatistics {
  totalElements: number;
  createdElements: number;
  duplicateElements: number;
  failedElements: number;
  /** Rejected by story analysis; not part of totalElements */
  unclassifiedElements: number;
  elementTypeCounts: Partial<Record<ElementType, number>>;
  analysisMethodCounts: Partial<Record<AnalysisMethod, number>>;
  duplicatesByStage: { id: number; name: number; hash: number };
  processingTimeMs: number;
}

export interface ConversionResult<H> {
  createdElements: ElementRecord<H>[];
  /** Story name → story handle */
  createdStories: Map<string, H>;
  spatialRelationships: H[];
  statistics: ConversionStatistics;
  errors: string[];
  warnings: string[];
}

export function createEmptyStatistics(): ConversionStatistics {
  return {
    totalElements: 0,
    createdElements: 0,
    duplicateElements: 0,
    failedElements: 0,
    unclassifiedElements: 0,
    elementTypeCounts: {},
    analysisMethodCounts: {},
    duplicatesByStage: { id: 0, name: 0, hash: 0 },
    processingTimeMs: 0,
  };
}

/** Total number of element definitions across all types */
export function countElements(elements: ElementDefinitionsByType): number {
  let total = 0;
  for (const defs of Object.values(elements)) {
    total += defs?.length ?? 0;
  }
  return total;
}

/** Iterate non-empty element groups in input key order */
export function* iterateElementGroups(
  elements: ElementDefinitionsByType
): Generator<[ElementType, ElementDefinition[]]> {
  for (const [type, defs] of Object.entries(elements)) {
    if (isElementType(type) && defs && defs.length > 0) {
      yield [type, defs];
    }
  }
}

export function isElementType(value: string): value is ElementType {
  return (ELEMENT_TYPES as readonly string[]).includes(value);
}
