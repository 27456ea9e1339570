/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Types for writing structural IFC models.
 *
 * Coordinates are in the project length unit (millimetres by default).
 * Uses IFC PascalCase names for entity parameters.
 */

import type { Point3D } from '@stb-ifc/data';

export type { Point3D };

// ============================================================================
// Geometry primitives
// ============================================================================

/** 2D point [x, y] */
export type Point2D = [number, number];

/** Placement: origin + optional Z direction + optional X direction */
export interface Placement3D {
  Location: Point3D;
  Axis?: Point3D;        // Z direction, default [0,0,1]
  RefDirection?: Point3D; // X direction, default [1,0,0]
}

// ============================================================================
// Structural element parameters
// ============================================================================

/** Common attributes shared by all elements */
export interface ElementAttributes {
  Name?: string;
  Description?: string;
  ObjectType?: string;
  Tag?: string;
}

/**
 * Member along an axis with a rectangular section centred on it.
 * Beams, braces, columns and piles all take this shape; for vertical
 * members Start is the base.
 */
export interface LinearMemberParams extends ElementAttributes {
  Start: Point3D;
  End: Point3D;
  /** Section width */
  Width: number;
  /** Section depth */
  Depth: number;
}

export type BeamParams = LinearMemberParams;
export type MemberParams = LinearMemberParams;
export type ColumnParams = LinearMemberParams;
export type PileParams = LinearMemberParams;

/** Wall: Start/End define the centreline in plan, extruded upward */
export interface WallParams extends ElementAttributes {
  Start: Point3D;
  End: Point3D;
  Thickness: number;
  Height: number;
}

/** Slab: closed outline relative to Position, extruded upward by Thickness */
export interface SlabParams extends ElementAttributes {
  Position: Point3D;
  Thickness: number;
  /** Width (X dimension), used when Profile is omitted */
  Width?: number;
  /** Depth (Y dimension), used when Profile is omitted */
  Depth?: number;
  /** Outline relative to Position (overrides Width/Depth) */
  Profile?: Point2D[];
}

/** Pad footing: box centred on Position in plan, extruded upward */
export interface FootingParams extends ElementAttributes {
  Position: Point3D;
  Width: number;
  Depth: number;
  Height: number;
}

// ============================================================================
// Grid
// ============================================================================

export interface GridAxisDef {
  Tag: string;
  Start: Point2D;
  End: Point2D;
}

export interface GridParams {
  Name?: string;
  /** Elevation of the grid plane */
  Elevation?: number;
  UAxes: GridAxisDef[];
  VAxes: GridAxisDef[];
}

// ============================================================================
// Properties
// ============================================================================

/** IFC property value types */
export type PropertyType = 'IfcLabel' | 'IfcText' | 'IfcIdentifier' | 'IfcReal' | 'IfcInteger' | 'IfcBoolean';

/** Single property definition */
export interface PropertyDef {
  Name: string;
  NominalValue: string | number | boolean;
  /** Defaults to IfcLabel for strings, IfcReal/IfcInteger for numbers, IfcBoolean for booleans */
  Type?: PropertyType;
}

/** Property set to attach to an element */
export interface PropertySetDef {
  Name: string;
  Properties: PropertyDef[];
}

// ============================================================================
// Spatial structure
// ============================================================================

/** Project-level options */
export interface ProjectParams {
  Name?: string;
  Description?: string;
  /** Length unit: 'MILLIMETRE' (default) or 'METRE' */
  LengthUnit?: 'MILLIMETRE' | 'METRE';
  Author?: string;
  Organization?: string;
  /** FILE_NAME name field */
  FileName?: string;
}

/** Building storey (floor) options */
export interface StoreyParams {
  Name?: string;
  Description?: string;
  Elevation: number;
}

// ============================================================================
// Creation result
// ============================================================================

/** Reference to a created entity (expressId within the created file) */
export interface CreatedEntity {
  expressId: number;
  type: string;
  Name?: string;
}

/** Result of toIfc() */
export interface CreateResult {
  /** Complete IFC STEP file content */
  content: string;
  /** All created entities */
  entities: CreatedEntity[];
  stats: {
    entityCount: number;
    fileSize: number;
  };
}
