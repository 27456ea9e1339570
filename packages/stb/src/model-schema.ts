/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * JSON model document schema.
 *
 * Element definitions are strict: a key the converter does not know is a
 * validation error, not something carried along silently.
 */

import { z } from 'zod';

const point3D = z.tuple([z.number().finite(), z.number().finite(), z.number().finite()]);
const id = z.string().min(1);
const length = z.number().finite().nonnegative();

export const elementDefinitionSchema = z.object({
  id: id.optional(),
  name: z.string().optional(),
  floor: z.string().min(1).optional(),

  sectionName: z.string().optional(),
  stbSectionName: z.string().optional(),
  sectionId: z.string().optional(),

  startNodeId: id.optional(),
  endNodeId: id.optional(),
  bottomNodeId: id.optional(),
  topNodeId: id.optional(),
  primaryNodeId: id.optional(),
  nodeIds: z.array(id).optional(),

  startPoint: point3D.optional(),
  endPoint: point3D.optional(),
  bottomPoint: point3D.optional(),
  topPoint: point3D.optional(),
  centerPoint: point3D.optional(),
  point: point3D.optional(),
  position: point3D.optional(),
  outline: z.array(point3D).optional(),

  width: length.optional(),
  depth: length.optional(),
  thickness: length.optional(),
  height: length.optional(),
  length: length.optional(),
}).strict();

const definitions = z.array(elementDefinitionSchema).optional();

export const elementsSchema = z.object({
  beam: definitions,
  girder: definitions,
  brace: definitions,
  column: definitions,
  pile: definitions,
  foundation_column: definitions,
  wall: definitions,
  slab: definitions,
  footing: definitions,
}).strict();

export const storySchema = z.object({
  name: z.string().min(1),
  elevation: z.number().finite(),
  height: z.number().finite().positive().optional(),
  nodeIds: z.array(id).optional(),
}).strict();

export const nodeSchema = z.object({
  id,
  x: z.number().finite(),
  y: z.number().finite(),
  z: z.number().finite(),
}).strict();

export const axisSchema = z.object({
  name: z.string().min(1),
  direction: z.enum(['X', 'Y']),
  offset: z.number().finite(),
}).strict();

export const modelSchema = z.object({
  name: z.string().optional(),
  stories: z.array(storySchema),
  nodes: z.array(nodeSchema).optional(),
  elements: elementsSchema,
  nodeStoryMap: z.record(id, z.string().min(1)).optional(),
  axes: z.array(axisSchema).optional(),
}).strict();

export type ModelDocument = z.infer<typeof modelSchema>;
export type NodeDefinition = z.infer<typeof nodeSchema>;
