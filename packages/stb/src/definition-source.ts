/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Definition source - turn a JSON model document into converter input
 *
 * Validation happens once, here. Downstream code trusts the closed
 * ElementDefinition key set.
 */

import * as fs from 'fs';
import type { z } from 'zod';
import {
  ConversionError,
  ModelValidationError,
  createLogger,
  errorMessage,
  iterateElementGroups,
  type ConversionInput,
  type ElementDefinition,
  type ElementDefinitionsByType,
  type NodeField,
  type Point3D,
  type PointField,
  type StoryDefinition,
} from '@stb-ifc/data';
import { modelSchema, type ModelDocument } from './model-schema.js';

const log = createLogger('DefinitionSource');

/** Point field filled from each node reference when the model omits it */
const NODE_POINT_FIELDS: ReadonlyArray<readonly [NodeField, PointField]> = [
  ['startNodeId', 'startPoint'],
  ['endNodeId', 'endPoint'],
  ['bottomNodeId', 'bottomPoint'],
  ['topNodeId', 'topPoint'],
  ['primaryNodeId', 'point'],
];

export interface ParsedModel extends ConversionInput {
  name?: string;
  /** Node id → coordinates */
  nodes: ReadonlyMap<string, Point3D>;
}

function formatIssues(issues: z.ZodIssue[]): string[] {
  return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Node → story map. Story node lists come first, a later story taking a
 * node listed twice; the explicit map then overrides both.
 */
export function buildNodeStoryMap(
  stories: readonly StoryDefinition[],
  explicit: Readonly<Record<string, string>> = {}
): Map<string, string> {
  const map = new Map<string, string>();
  for (const story of stories) {
    for (const nodeId of story.nodeIds ?? []) {
      const previous = map.get(nodeId);
      if (previous !== undefined && previous !== story.name) {
        log.debug(`Node ${nodeId} listed in "${previous}" and "${story.name}"`, undefined, { operation: 'nodeStoryMap' });
      }
      map.set(nodeId, story.name);
    }
  }
  for (const [nodeId, storyName] of Object.entries(explicit)) {
    map.set(nodeId, storyName);
  }
  return map;
}

/** Copy of a definition with point fields filled from referenced nodes */
export function fillPoints(definition: ElementDefinition, nodes: ReadonlyMap<string, Point3D>): ElementDefinition {
  const filled: ElementDefinition = { ...definition };

  for (const [nodeField, pointField] of NODE_POINT_FIELDS) {
    const nodeId = definition[nodeField];
    if (nodeId === undefined || filled[pointField] !== undefined) continue;
    const point = nodes.get(nodeId);
    if (point) filled[pointField] = [...point];
  }

  if (definition.nodeIds && !definition.outline) {
    const outline: Point3D[] = [];
    for (const nodeId of definition.nodeIds) {
      const point = nodes.get(nodeId);
      if (!point) break;
      outline.push([...point]);
    }
    if (outline.length === definition.nodeIds.length) filled.outline = outline;
  }

  return filled;
}

function toInput(doc: ModelDocument): ParsedModel {
  const nodes = new Map<string, Point3D>();
  for (const node of doc.nodes ?? []) {
    nodes.set(node.id, [node.x, node.y, node.z]);
  }

  const elements: ElementDefinitionsByType = {};
  for (const [type, definitions] of iterateElementGroups(doc.elements)) {
    elements[type] = definitions.map(d => fillPoints(d, nodes));
  }

  return {
    name: doc.name,
    stories: doc.stories,
    elements,
    nodeStoryMap: buildNodeStoryMap(doc.stories, doc.nodeStoryMap),
    axes: doc.axes,
    nodes,
  };
}

/**
 * Validate a parsed JSON document and build converter input from it.
 * @throws ModelValidationError listing every schema issue by path
 */
export function parseModel(json: unknown, source = 'model'): ParsedModel {
  const parsed = modelSchema.safeParse(json);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error.issues);
    throw new ModelValidationError(`Invalid ${source}: ${issues.join('; ')}`, issues);
  }

  const model = toInput(parsed.data);
  log.info(`Parsed ${source}: ${model.stories.length} stories, ${model.nodes.size} nodes, ${model.nodeStoryMap.size} mapped nodes`);
  return model;
}

export function parseModelText(text: string, source = 'model'): ParsedModel {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new ModelValidationError(`Invalid JSON in ${source}: ${errorMessage(error)}`);
  }
  return parseModel(json, source);
}

export function loadModelFile(file: string): ParsedModel {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ConversionError(`Cannot read model file ${file}: ${errorMessage(error)}`);
  }
  return parseModelText(text, file);
}
