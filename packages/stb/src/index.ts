/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @stb-ifc/stb - JSON structural model ingestion
 */

export {
  parseModel,
  parseModelText,
  loadModelFile,
  buildNodeStoryMap,
  fillPoints,
  type ParsedModel,
} from './definition-source.js';
export {
  modelSchema,
  elementDefinitionSchema,
  type ModelDocument,
  type NodeDefinition,
} from './model-schema.js';
