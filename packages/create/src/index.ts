/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @stb-ifc/create - IFC4 output for structural models
 *
 * `IfcCreator` writes STEP files entity by entity; `IfcElementBuilder`
 * drives it from converter element definitions.
 *
 * ```ts
 * import { IfcCreator } from '@stb-ifc/create';
 *
 * const creator = new IfcCreator({ Name: 'My Project' });
 * const storey = creator.addStorey({ Name: '1F', Elevation: 0 });
 * const beam = creator.addBeam({
 *   Start: [0, 0, 3000], End: [6000, 0, 3000],
 *   Width: 300, Depth: 600,
 * });
 * creator.addSpatialContainment(storey, [beam]);
 * const { content } = creator.toIfc();
 * ```
 */

export { IfcCreator } from './ifc-creator.js';
export { IfcElementBuilder, ELEMENT_PSET_NAME, GRID_EXTENSION } from './element-builder.js';

export type {
  // Geometry primitives
  Point3D,
  Point2D,
  Placement3D,

  // Element parameters
  ElementAttributes,
  LinearMemberParams,
  BeamParams,
  MemberParams,
  ColumnParams,
  PileParams,
  WallParams,
  SlabParams,
  FootingParams,

  // Grid
  GridAxisDef,
  GridParams,

  // Properties
  PropertyType,
  PropertyDef,
  PropertySetDef,

  // Spatial structure
  ProjectParams,
  StoreyParams,

  // Results
  CreatedEntity,
  CreateResult,
} from './types.js';
