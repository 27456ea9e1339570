/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * IfcElementBuilder - the converter's element builder over IfcCreator.
 *
 * Handles are IFC express ids. Element geometry comes from the point fields
 * of each definition; section sizes fall back to per-type defaults when the
 * model does not carry them.
 *
 * ```ts
 * const builder = new IfcElementBuilder({ Name: 'Office' });
 * const result = service.convert(input, builder);
 * fs.writeFileSync('office.ifc', builder.toIfc().content);
 * ```
 */

import {
  ElementCreationError,
  createLogger,
  type AxisDefinition,
  type ClassifiedDefinition,
  type ConvertedDefinition,
  type ElementBuilder,
  type ElementCreator,
  type ElementType,
  type Point3D,
  type StoryDefinition,
} from '@stb-ifc/data';
import { IfcCreator } from './ifc-creator.js';
import type { CreateResult, ElementAttributes, GridAxisDef, Point2D, ProjectParams, PropertyDef } from './types.js';

const log = createLogger('IfcElementBuilder');

/** Property set written on every element */
export const ELEMENT_PSET_NAME = 'Pset_StbElement';

/** Grid lines extend this far past the outermost crossing axis */
export const GRID_EXTENSION = 1000;

/** Section [width, depth] used when a definition carries none */
const DEFAULT_SECTIONS: Record<'beam' | 'girder' | 'brace' | 'column' | 'pile' | 'foundation_column', [number, number]> = {
  beam: [300, 600],
  girder: [400, 800],
  brace: [150, 150],
  column: [600, 600],
  foundation_column: [800, 800],
  pile: [1000, 1000],
};

const DEFAULT_WALL_THICKNESS = 250;
const DEFAULT_WALL_HEIGHT = 4500;
const DEFAULT_SLAB_THICKNESS = 150;

function isClassified(definition: ConvertedDefinition): definition is ClassifiedDefinition {
  return 'assignedStory' in definition;
}

function same(a: Point3D, b: Point3D): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2];
}

export class IfcElementBuilder implements ElementBuilder<number> {
  private creator: IfcCreator;
  private readonly creators: Partial<Record<ElementType, ElementCreator<number>>>;

  constructor(private readonly project: ProjectParams = {}) {
    this.creator = new IfcCreator(project);
    this.creators = {
      beam: { create: d => this.createLinear('beam', d, (c, p) => c.addBeam(p)) },
      girder: { create: d => this.createLinear('girder', d, (c, p) => c.addBeam(p)) },
      brace: { create: d => this.createLinear('brace', d, (c, p) => c.addBrace(p)) },
      column: { create: d => this.createVertical('column', d, (c, p) => c.addColumn(p)) },
      foundation_column: { create: d => this.createVertical('foundation_column', d, (c, p) => c.addColumn(p)) },
      pile: { create: d => this.createVertical('pile', d, (c, p) => c.addPile(p)) },
      wall: { create: d => this.createWall(d) },
      slab: { create: d => this.createSlab(d) },
      footing: { create: d => this.createFooting(d) },
    };
  }

  getCreator(type: ElementType): ElementCreator<number> | undefined {
    return this.creators[type];
  }

  materializeStory(story: StoryDefinition): number {
    return this.creator.addStorey({ Name: story.name, Elevation: story.elevation });
  }

  createSpatialRelationship(story: number, elements: readonly number[]): number {
    return this.creator.addSpatialContainment(story, elements);
  }

  /**
   * X axes become U axes, Y axes V axes. Each line spans the offsets of the
   * crossing direction plus GRID_EXTENSION on both ends.
   */
  createGrid(axes: readonly AxisDefinition[]): number {
    const xAxes = axes.filter(a => a.direction === 'X');
    const yAxes = axes.filter(a => a.direction === 'Y');
    if (xAxes.length === 0 || yAxes.length === 0) {
      throw new ElementCreationError(`A grid needs X and Y axes (got ${xAxes.length} X, ${yAxes.length} Y)`);
    }

    const [minX, maxX] = extent(yAxes);
    const [minY, maxY] = extent(xAxes);

    const uAxes: GridAxisDef[] = xAxes.map(a => ({
      Tag: a.name,
      Start: [minX - GRID_EXTENSION, a.offset],
      End: [maxX + GRID_EXTENSION, a.offset],
    }));
    const vAxes: GridAxisDef[] = yAxes.map(a => ({
      Tag: a.name,
      Start: [a.offset, minY - GRID_EXTENSION],
      End: [a.offset, maxY + GRID_EXTENSION],
    }));

    return this.creator.addGrid({ UAxes: uAxes, VAxes: vAxes });
  }

  reset(): void {
    log.debug('Discarding built entities');
    this.creator = new IfcCreator(this.project);
  }

  toIfc(): CreateResult {
    return this.creator.toIfc();
  }

  // ============================================================================
  // Element creators
  // ============================================================================

  private createLinear(
    type: keyof typeof DEFAULT_SECTIONS,
    d: ConvertedDefinition,
    add: (creator: IfcCreator, params: { Start: Point3D; End: Point3D; Width: number; Depth: number } & ElementAttributes) => number
  ): number {
    const start = d.startPoint;
    const end = d.endPoint;
    if (!start || !end) {
      throw new ElementCreationError(`${type} needs startPoint and endPoint`, d.id, type);
    }
    return this.finish(d, add(this.creator, { ...this.attributes(d), ...this.section(type, d, start, end) }));
  }

  /** Columns and piles: bottom to top, falling back to start/end */
  private createVertical(
    type: keyof typeof DEFAULT_SECTIONS,
    d: ConvertedDefinition,
    add: (creator: IfcCreator, params: { Start: Point3D; End: Point3D; Width: number; Depth: number } & ElementAttributes) => number
  ): number {
    const top = d.topPoint ?? d.endPoint;
    let bottom = d.bottomPoint ?? d.startPoint;
    if (!bottom && top && d.length !== undefined) {
      bottom = [top[0], top[1], top[2] - d.length];
    }
    if (!bottom || !top) {
      throw new ElementCreationError(`${type} needs bottomPoint and topPoint`, d.id, type);
    }
    return this.finish(d, add(this.creator, { ...this.attributes(d), ...this.section(type, d, bottom, top) }));
  }

  /** Wall along startPoint→endPoint, or along the first edge of its outline */
  private createWall(d: ConvertedDefinition): number {
    let start = d.startPoint;
    let end = d.endPoint;
    let height = d.height;
    if ((!start || !end) && d.outline && d.outline.length >= 3) {
      const zs = d.outline.map(p => p[2]);
      const base = Math.min(...zs);
      start = [d.outline[0][0], d.outline[0][1], base];
      end = [d.outline[1][0], d.outline[1][1], base];
      height ??= Math.max(...zs) - base;
    }
    if (!start || !end) {
      throw new ElementCreationError('wall needs startPoint and endPoint or an outline', d.id, 'wall');
    }
    if (same(start, end)) {
      throw new ElementCreationError('wall has zero length', d.id, 'wall');
    }

    const id = this.creator.addWall({
      ...this.attributes(d),
      Start: start,
      End: end,
      Thickness: d.thickness ?? DEFAULT_WALL_THICKNESS,
      Height: height ?? DEFAULT_WALL_HEIGHT,
    });
    return this.finish(d, id);
  }

  /**
   * Slab whose top face lies at its outline (or position) elevation, so the
   * solid hangs Thickness below it.
   */
  private createSlab(d: ConvertedDefinition): number {
    const thickness = d.thickness ?? DEFAULT_SLAB_THICKNESS;
    const attrs = this.attributes(d);

    if (d.outline && d.outline.length >= 3) {
      const [ox, oy, oz] = d.outline[0];
      const profile: Point2D[] = d.outline.map(p => [p[0] - ox, p[1] - oy]);
      return this.finish(d, this.creator.addSlab({
        ...attrs,
        Position: [ox, oy, oz - thickness],
        Thickness: thickness,
        Profile: profile,
      }));
    }

    const center = d.centerPoint ?? d.position;
    if (!center || d.width === undefined || d.depth === undefined) {
      throw new ElementCreationError('slab needs an outline, or centerPoint with width and depth', d.id, 'slab');
    }
    return this.finish(d, this.creator.addSlab({
      ...attrs,
      Position: [center[0] - d.width / 2, center[1] - d.depth / 2, center[2] - thickness],
      Thickness: thickness,
      Width: d.width,
      Depth: d.depth,
    }));
  }

  private createFooting(d: ConvertedDefinition): number {
    const position = d.position ?? d.centerPoint ?? d.point ?? d.bottomPoint;
    if (!position) {
      throw new ElementCreationError('footing needs a position', d.id, 'footing');
    }
    if (d.width === undefined || d.depth === undefined || d.height === undefined) {
      throw new ElementCreationError('footing needs width, depth and height', d.id, 'footing');
    }
    return this.finish(d, this.creator.addFooting({
      ...this.attributes(d),
      Position: position,
      Width: d.width,
      Depth: d.depth,
      Height: d.height,
    }));
  }

  // ============================================================================
  // Shared
  // ============================================================================

  private section(
    type: keyof typeof DEFAULT_SECTIONS,
    d: ConvertedDefinition,
    start: Point3D,
    end: Point3D
  ): { Start: Point3D; End: Point3D; Width: number; Depth: number } {
    if (same(start, end)) {
      throw new ElementCreationError(`${type} has zero length`, d.id, type);
    }
    const [width, depth] = DEFAULT_SECTIONS[type];
    return { Start: start, End: end, Width: d.width ?? width, Depth: d.depth ?? depth };
  }

  private attributes(d: ConvertedDefinition): ElementAttributes {
    return {
      Name: d.name ?? d.id,
      ObjectType: d.stbSectionName ?? d.sectionName,
      Tag: d.id,
    };
  }

  /** Attach Pset_StbElement and return the element id */
  private finish(d: ConvertedDefinition, elementId: number): number {
    const properties: PropertyDef[] = [];
    if (d.id) properties.push({ Name: 'Id', NominalValue: d.id, Type: 'IfcIdentifier' });

    const sectionName = d.stbSectionName ?? d.sectionName;
    if (sectionName) properties.push({ Name: 'SectionName', NominalValue: sectionName });

    if (isClassified(d)) {
      properties.push(
        { Name: 'AssignedStory', NominalValue: d.assignedStory },
        { Name: 'AnalysisMethod', NominalValue: d.analysisMethod },
        // 1.0 would otherwise serialize as an integer
        { Name: 'Confidence', NominalValue: d.analysisConfidence, Type: 'IfcReal' },
      );
    }

    if (properties.length > 0) {
      this.creator.addPropertySet(elementId, { Name: ELEMENT_PSET_NAME, Properties: properties });
    }
    return elementId;
  }
}

function extent(axes: readonly AxisDefinition[]): [number, number] {
  const offsets = axes.map(a => a.offset);
  return [Math.min(...offsets), Math.max(...offsets)];
}
