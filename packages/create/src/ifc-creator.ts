/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * IfcCreator - write IFC4 STEP files for structural models.
 *
 * Coordinate convention:
 * - Linear members (beams, braces, columns, piles): Start/End define the
 *   member axis. Cross-section (Width × Depth) centred on the axis.
 * - Walls: Start/End define the centreline in plan, extruded up by Height.
 * - Slabs: Position is the outline origin; Thickness extruded along +Z.
 * - Footings: Position is the base centre.
 *
 * Elements are created unplaced in the spatial structure. Containment is
 * written explicitly with addSpatialContainment(), one relationship per
 * call. Storeys and grids are aggregated into the building by toIfc().
 *
 * All values in millimetres unless LengthUnit is overridden.
 */

import type {
  Point3D, Point2D, Placement3D,
  LinearMemberParams, BeamParams, MemberParams, ColumnParams, PileParams,
  WallParams, SlabParams, FootingParams, GridParams, GridAxisDef,
  ProjectParams, StoreyParams,
  PropertySetDef, PropertyDef,
  CreatedEntity, CreateResult,
} from './types.js';

// ============================================================================
// Internal helpers
// ============================================================================

const GLOBAL_ID_CHARS = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz_$';

/** Generate a 22-character IFC GlobalId (base64-ish) */
function newGlobalId(): string {
  let result = '';
  for (let i = 0; i < 22; i++) {
    result += GLOBAL_ID_CHARS[Math.floor(Math.random() * 64)];
  }
  return result;
}

/** Escape a string for STEP format */
function esc(str: string): string {
  return str.replace(/\\/g, '\\\\').replace(/'/g, "''");
}

/** Optional STEP string attribute */
function optStr(value: string | undefined): string {
  return value ? `'${esc(value)}'` : '$';
}

/** Format a STEP line: #ID=TYPE(args); */
function stepLine(id: number, type: string, args: string): string {
  return `#${id}=${type}(${args});`;
}

/** Serialize a number in STEP format (always with decimal point) */
function num(v: number): string {
  const s = v.toString();
  return s.includes('.') || s.includes('e') ? s : s + '.';
}

function refs(ids: readonly number[]): string {
  return ids.map(id => `#${id}`).join(',');
}

/** Vector length */
function vecLen(v: Point3D): number {
  return Math.sqrt(v[0] * v[0] + v[1] * v[1] + v[2] * v[2]);
}

/** Normalize vector */
function vecNorm(v: Point3D): Point3D {
  const len = vecLen(v);
  if (len === 0) return [1, 0, 0];
  return [v[0] / len, v[1] / len, v[2] / len];
}

/** Cross product */
function vecCross(a: Point3D, b: Point3D): Point3D {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/** IFC entity name, CreatedEntity type and predefined type of a linear member */
interface MemberKind {
  entity: string;
  type: string;
  defaultName: string;
  /** Trailing attributes after Tag, e.g. '.BEAM.' */
  tail: string;
}

const BEAM: MemberKind = { entity: 'IFCBEAM', type: 'IfcBeam', defaultName: 'Beam', tail: '.BEAM.' };
const BRACE: MemberKind = { entity: 'IFCMEMBER', type: 'IfcMember', defaultName: 'Brace', tail: '.BRACE.' };
const COLUMN: MemberKind = { entity: 'IFCCOLUMN', type: 'IfcColumn', defaultName: 'Column', tail: '.COLUMN.' };
// IfcPile: PredefinedType, ConstructionType
const PILE: MemberKind = { entity: 'IFCPILE', type: 'IfcPile', defaultName: 'Pile', tail: '.NOTDEFINED.,$' };

// ============================================================================
// IfcCreator
// ============================================================================

export class IfcCreator {
  private nextId = 1;
  private lines: string[] = [];
  private entities: CreatedEntity[] = [];
  private finalized = false;

  // Shared entity IDs (created in constructor)
  private projectId = 0;
  private siteId = 0;
  private buildingId = 0;
  private ownerHistoryId = 0;
  private contextId = 0;
  private subContextBody = 0;
  private dirZ = 0;
  private worldPlacementId = 0;
  private unitAssignmentId = 0;

  // Tracking for spatial aggregation
  private storeyIds: number[] = [];
  private gridIds: number[] = [];

  private projectParams: ProjectParams;

  constructor(params: ProjectParams = {}) {
    this.projectParams = params;
    this.buildPreamble(params);
  }

  get lengthUnit(): 'MILLIMETRE' | 'METRE' {
    return this.projectParams.LengthUnit ?? 'MILLIMETRE';
  }

  // ============================================================================
  // Public API - Spatial Structure
  // ============================================================================

  /** Add a building storey. Returns the storey expressId. */
  addStorey(params: StoreyParams): number {
    const id = this.id();
    const name = params.Name ?? 'Storey';

    this.line(id, 'IFCBUILDINGSTOREY',
      `'${newGlobalId()}',#${this.ownerHistoryId},'${esc(name)}',${optStr(params.Description)},$,#${this.worldPlacementId},$,$,.ELEMENT.,${num(params.Elevation)}`);

    this.storeyIds.push(id);
    this.entities.push({ expressId: id, type: 'IfcBuildingStorey', Name: name });
    return id;
  }

  /** Contain elements in a storey. Returns the relationship expressId. */
  addSpatialContainment(storeyId: number, elementIds: readonly number[]): number {
    if (elementIds.length === 0) {
      throw new Error(`Spatial containment for #${storeyId} needs at least one element`);
    }
    const relId = this.id();
    this.line(relId, 'IFCRELCONTAINEDINSPATIALSTRUCTURE',
      `'${newGlobalId()}',#${this.ownerHistoryId},$,$,(${refs(elementIds)}),#${storeyId}`);
    return relId;
  }

  /**
   * Add a structural grid. U axes and V axes are 2D lines in the grid plane;
   * the grid is contained in the building.
   */
  addGrid(params: GridParams): number {
    if (params.UAxes.length === 0 || params.VAxes.length === 0) {
      throw new Error('A grid needs at least one U axis and one V axis');
    }

    const placementId = this.addLocalPlacement(this.worldPlacementId, {
      Location: [0, 0, params.Elevation ?? 0],
    });
    const uIds = params.UAxes.map(axis => this.addGridAxis(axis));
    const vIds = params.VAxes.map(axis => this.addGridAxis(axis));

    const gridId = this.id();
    const name = params.Name ?? 'Grid';
    this.line(gridId, 'IFCGRID',
      `'${newGlobalId()}',#${this.ownerHistoryId},'${esc(name)}',$,$,#${placementId},$,(${refs(uIds)}),(${refs(vIds)}),$,.RECTANGULAR.`);

    this.gridIds.push(gridId);
    this.entities.push({ expressId: gridId, type: 'IfcGrid', Name: name });
    return gridId;
  }

  // ============================================================================
  // Public API - Structural Elements
  // ============================================================================

  addBeam(params: BeamParams): number {
    return this.addLinearMember(BEAM, params);
  }

  /** Brace, written as IfcMember .BRACE. */
  addBrace(params: MemberParams): number {
    return this.addLinearMember(BRACE, params);
  }

  addColumn(params: ColumnParams): number {
    return this.addLinearMember(COLUMN, params);
  }

  addPile(params: PileParams): number {
    return this.addLinearMember(PILE, params);
  }

  /**
   * Create a wall from Start to End with given Thickness and Height.
   *
   * Geometry: placement at Start. Profile offset so the solid extends
   * exactly from Start to End, centred on the thickness axis.
   */
  addWall(params: WallParams): number {
    const delta: Point3D = [
      params.End[0] - params.Start[0],
      params.End[1] - params.Start[1],
      params.End[2] - params.Start[2],
    ];
    const wallLen = vecLen(delta);

    const placementId = this.addLocalPlacement(this.worldPlacementId, {
      Location: params.Start,
      RefDirection: vecNorm(delta),
    });

    // Spans 0..wallLen along local X and ±thickness/2 along local Y
    const profileId = this.addRectangleProfile(wallLen, params.Thickness, [wallLen / 2, 0]);
    const solidId = this.addExtrudedAreaSolid(profileId, params.Height);

    return this.addElement('IFCWALL', 'IfcWall', params.Name ?? 'Wall', params, placementId, solidId, '.STANDARD.');
  }

  /**
   * Create a slab. The outline is relative to Position; without one, a
   * Width × Depth rectangle starting at Position.
   */
  addSlab(params: SlabParams): number {
    const placementId = this.addLocalPlacement(this.worldPlacementId, {
      Location: params.Position,
    });

    let profileId: number;
    if (params.Profile && params.Profile.length >= 3) {
      profileId = this.addArbitraryProfile(params.Profile);
    } else {
      const w = params.Width ?? 1000;
      const d = params.Depth ?? 1000;
      profileId = this.addRectangleProfile(w, d, [w / 2, d / 2]);
    }
    const solidId = this.addExtrudedAreaSolid(profileId, params.Thickness);

    return this.addElement('IFCSLAB', 'IfcSlab', params.Name ?? 'Slab', params, placementId, solidId, '.FLOOR.');
  }

  /** Create a pad footing. Position is the base centre. */
  addFooting(params: FootingParams): number {
    const placementId = this.addLocalPlacement(this.worldPlacementId, {
      Location: params.Position,
    });
    const profileId = this.addRectangleProfile(params.Width, params.Depth);
    const solidId = this.addExtrudedAreaSolid(profileId, params.Height);

    return this.addElement('IFCFOOTING', 'IfcFooting', params.Name ?? 'Footing', params, placementId, solidId, '.PAD_FOOTING.');
  }

  // ============================================================================
  // Public API - Properties
  // ============================================================================

  /** Attach a property set to an element */
  addPropertySet(elementId: number, pset: PropertySetDef): number {
    const propIds: number[] = [];

    for (const prop of pset.Properties) {
      const propId = this.id();
      this.line(propId, 'IFCPROPERTYSINGLEVALUE',
        `'${esc(prop.Name)}',$,${this.serializePropertyValue(prop)},$`);
      propIds.push(propId);
    }

    const psetId = this.id();
    this.line(psetId, 'IFCPROPERTYSET',
      `'${newGlobalId()}',#${this.ownerHistoryId},'${esc(pset.Name)}',$,(${refs(propIds)})`);

    const relId = this.id();
    this.line(relId, 'IFCRELDEFINESBYPROPERTIES',
      `'${newGlobalId()}',#${this.ownerHistoryId},$,$,(#${elementId}),#${psetId}`);

    return psetId;
  }

  // ============================================================================
  // Public API - Export
  // ============================================================================

  /** Generate the complete IFC STEP file */
  toIfc(): CreateResult {
    if (!this.finalized) {
      this.finalizeRelationships();
      this.finalized = true;
    }

    const header = this.buildHeader();
    const data = this.lines.join('\n');
    const content = `${header}DATA;\n${data}\nENDSEC;\nEND-ISO-10303-21;\n`;

    return {
      content,
      entities: [...this.entities],
      stats: {
        entityCount: this.lines.length,
        fileSize: new TextEncoder().encode(content).length,
      },
    };
  }

  private buildHeader(): string {
    const now = new Date().toISOString().replace(/[-:]/g, '').split('.')[0];
    const author = this.projectParams.Author ?? '';
    const org = this.projectParams.Organization ?? '';
    const app = 'stb-ifc';
    const filename = this.projectParams.FileName ?? 'model.ifc';

    return `ISO-10303-21;
HEADER;
FILE_DESCRIPTION(('ViewDefinition [ReferenceView]'),'2;1');
FILE_NAME('${esc(filename)}','${now}',('${esc(author)}'),('${esc(org)}'),'${app}','${app}','');
FILE_SCHEMA(('IFC4'));
ENDSEC;
`;
  }

  // ============================================================================
  // Internal - Preamble (project, site, building, contexts, units)
  // ============================================================================

  private buildPreamble(params: ProjectParams): void {
    const personId = this.id();
    this.line(personId, 'IFCPERSON', "$,$,'',$,$,$,$,$");

    const orgId = this.id();
    this.line(orgId, 'IFCORGANIZATION', `$,'${esc(params.Organization ?? 'stb-ifc')}',$,$,$`);

    const personOrgId = this.id();
    this.line(personOrgId, 'IFCPERSONANDORGANIZATION', `#${personId},#${orgId},$`);

    const appId = this.id();
    this.line(appId, 'IFCAPPLICATION', `#${orgId},'1.0','stb-ifc','stb-ifc'`);

    this.ownerHistoryId = this.id();
    const timestamp = Math.floor(Date.now() / 1000);
    this.line(this.ownerHistoryId, 'IFCOWNERHISTORY',
      `#${personOrgId},#${appId},$,.NOCHANGE.,$,$,$,${timestamp}`);

    // Shared geometry primitives
    const originId = this.addCartesianPoint([0, 0, 0]);
    this.dirZ = this.addDirection([0, 0, 1]);
    const dirX = this.addDirection([1, 0, 0]);

    const worldAxisId = this.id();
    this.line(worldAxisId, 'IFCAXIS2PLACEMENT3D', `#${originId},#${this.dirZ},#${dirX}`);

    this.worldPlacementId = this.id();
    this.line(this.worldPlacementId, 'IFCLOCALPLACEMENT', `$,#${worldAxisId}`);

    this.contextId = this.id();
    this.line(this.contextId, 'IFCGEOMETRICREPRESENTATIONCONTEXT',
      `$,'Model',3,1.0E-5,#${worldAxisId},$`);

    this.subContextBody = this.id();
    this.line(this.subContextBody, 'IFCGEOMETRICREPRESENTATIONSUBCONTEXT',
      `$,'Body',*,*,*,*,#${this.contextId},$,.MODEL_VIEW.,$`);

    this.unitAssignmentId = this.buildUnits(this.lengthUnit);

    this.projectId = this.id();
    const projectName = params.Name ?? 'Project';
    this.line(this.projectId, 'IFCPROJECT',
      `'${newGlobalId()}',#${this.ownerHistoryId},'${esc(projectName)}',${optStr(params.Description)},$,$,$,(#${this.contextId}),#${this.unitAssignmentId}`);
    this.entities.push({ expressId: this.projectId, type: 'IfcProject', Name: projectName });

    this.siteId = this.id();
    this.line(this.siteId, 'IFCSITE',
      `'${newGlobalId()}',#${this.ownerHistoryId},'Site',$,$,#${this.worldPlacementId},$,$,.ELEMENT.,$,$,$,$,$`);
    this.entities.push({ expressId: this.siteId, type: 'IfcSite', Name: 'Site' });

    this.buildingId = this.id();
    this.line(this.buildingId, 'IFCBUILDING',
      `'${newGlobalId()}',#${this.ownerHistoryId},'Building',$,$,#${this.worldPlacementId},$,$,.ELEMENT.,$,$,$`);
    this.entities.push({ expressId: this.buildingId, type: 'IfcBuilding', Name: 'Building' });
  }

  private buildUnits(lengthUnit: 'MILLIMETRE' | 'METRE'): number {
    const lengthUnitId = this.id();
    if (lengthUnit === 'MILLIMETRE') {
      this.line(lengthUnitId, 'IFCSIUNIT', `*,.LENGTHUNIT.,.MILLI.,.METRE.`);
    } else {
      this.line(lengthUnitId, 'IFCSIUNIT', `*,.LENGTHUNIT.,$,.METRE.`);
    }

    const siAreaId = this.id();
    this.line(siAreaId, 'IFCSIUNIT', `*,.AREAUNIT.,$,.SQUARE_METRE.`);

    const siVolumeId = this.id();
    this.line(siVolumeId, 'IFCSIUNIT', `*,.VOLUMEUNIT.,$,.CUBIC_METRE.`);

    const siAngleId = this.id();
    this.line(siAngleId, 'IFCSIUNIT', `*,.PLANEANGLEUNIT.,$,.RADIAN.`);

    const assignmentId = this.id();
    this.line(assignmentId, 'IFCUNITASSIGNMENT',
      `(#${lengthUnitId},#${siAreaId},#${siVolumeId},#${siAngleId})`);

    return assignmentId;
  }

  // ============================================================================
  // Internal - Elements
  // ============================================================================

  /**
   * Member along Start→End. Local Z = member direction, so the extrusion
   * runs along the member; local X and Y span the section.
   */
  private addLinearMember(kind: MemberKind, params: LinearMemberParams): number {
    const delta: Point3D = [
      params.End[0] - params.Start[0],
      params.End[1] - params.Start[1],
      params.End[2] - params.Start[2],
    ];
    const length = vecLen(delta);
    const dir = vecNorm(delta);

    const placementId = this.addLocalPlacement(this.worldPlacementId, {
      Location: params.Start,
      Axis: dir,
      RefDirection: this.computeRefDirection(dir),
    });

    const profileId = this.addRectangleProfile(params.Width, params.Depth);
    const solidId = this.addExtrudedAreaSolid(profileId, length);

    return this.addElement(kind.entity, kind.type, params.Name ?? kind.defaultName, params, placementId, solidId, kind.tail);
  }

  private addElement(
    entity: string,
    type: string,
    name: string,
    attrs: { Description?: string; ObjectType?: string; Tag?: string },
    placementId: number,
    solidId: number,
    tail: string
  ): number {
    const shapeId = this.addShapeRepresentation([solidId]);
    const prodShapeId = this.addProductDefinitionShape([shapeId]);

    const elementId = this.id();
    this.line(elementId, entity,
      `'${newGlobalId()}',#${this.ownerHistoryId},'${esc(name)}',${optStr(attrs.Description)},${optStr(attrs.ObjectType)},#${placementId},#${prodShapeId},${optStr(attrs.Tag)},${tail}`);

    this.entities.push({ expressId: elementId, type, Name: name });
    return elementId;
  }

  private addGridAxis(axis: GridAxisDef): number {
    const startId = this.addCartesianPoint2D(axis.Start);
    const endId = this.addCartesianPoint2D(axis.End);
    const curveId = this.id();
    this.line(curveId, 'IFCPOLYLINE', `(#${startId},#${endId})`);

    const id = this.id();
    this.line(id, 'IFCGRIDAXIS', `'${esc(axis.Tag)}',#${curveId},.T.`);
    return id;
  }

  // ============================================================================
  // Internal - Geometry helpers
  // ============================================================================

  private addCartesianPoint(p: Point3D): number {
    const id = this.id();
    this.line(id, 'IFCCARTESIANPOINT', `(${num(p[0])},${num(p[1])},${num(p[2])})`);
    return id;
  }

  private addCartesianPoint2D(p: Point2D): number {
    const id = this.id();
    this.line(id, 'IFCCARTESIANPOINT', `(${num(p[0])},${num(p[1])})`);
    return id;
  }

  private addDirection(d: Point3D): number {
    const id = this.id();
    this.line(id, 'IFCDIRECTION', `(${num(d[0])},${num(d[1])},${num(d[2])})`);
    return id;
  }

  private addAxis2Placement3D(originId: number, axisId?: number, refDirId?: number): number {
    const id = this.id();
    const axis = axisId ? `#${axisId}` : '$';
    const refDir = refDirId ? `#${refDirId}` : '$';
    this.line(id, 'IFCAXIS2PLACEMENT3D', `#${originId},${axis},${refDir}`);
    return id;
  }

  private addLocalPlacement(relativeTo: number, placement: Placement3D): number {
    const originId = this.addCartesianPoint(placement.Location);
    const axisId = placement.Axis ? this.addDirection(placement.Axis) : undefined;
    const refDirId = placement.RefDirection ? this.addDirection(placement.RefDirection) : undefined;

    const axis2Id = this.addAxis2Placement3D(originId, axisId, refDirId);

    const id = this.id();
    this.line(id, 'IFCLOCALPLACEMENT', `#${relativeTo},#${axis2Id}`);
    return id;
  }

  /**
   * Create a rectangle profile.
   * @param center Optional 2D offset for the profile centre. Default [0,0] = centred at origin.
   */
  private addRectangleProfile(xDim: number, yDim: number, center?: Point2D): number {
    const cx = center?.[0] ?? 0;
    const cy = center?.[1] ?? 0;
    const profileOriginId = this.addCartesianPoint2D([cx, cy]);
    const profileAxis2dId = this.id();
    this.line(profileAxis2dId, 'IFCAXIS2PLACEMENT2D', `#${profileOriginId},$`);

    const id = this.id();
    this.line(id, 'IFCRECTANGLEPROFILEDEF', `.AREA.,$,#${profileAxis2dId},${num(xDim)},${num(yDim)}`);
    return id;
  }

  private addArbitraryProfile(points: Point2D[]): number {
    const pointIds = points.map(p => this.addCartesianPoint2D(p));
    pointIds.push(pointIds[0]); // close the polyline
    const polylineId = this.id();
    this.line(polylineId, 'IFCPOLYLINE', `(${refs(pointIds)})`);

    const id = this.id();
    this.line(id, 'IFCARBITRARYCLOSEDPROFILEDEF', `.AREA.,$,#${polylineId}`);
    return id;
  }

  private addExtrudedAreaSolid(profileId: number, depth: number): number {
    const originId = this.addCartesianPoint([0, 0, 0]);
    const axis2Id = this.addAxis2Placement3D(originId);

    const id = this.id();
    this.line(id, 'IFCEXTRUDEDAREASOLID',
      `#${profileId},#${axis2Id},#${this.dirZ},${num(depth)}`);
    return id;
  }

  private addShapeRepresentation(itemIds: number[]): number {
    const repId = this.id();
    this.line(repId, 'IFCSHAPEREPRESENTATION',
      `#${this.subContextBody},'Body','SweptSolid',(${refs(itemIds)})`);
    return repId;
  }

  private addProductDefinitionShape(repIds: number[]): number {
    const id = this.id();
    this.line(id, 'IFCPRODUCTDEFINITIONSHAPE', `$,$,(${refs(repIds)})`);
    return id;
  }

  // ============================================================================
  // Internal - Property serialization
  // ============================================================================

  private serializePropertyValue(prop: PropertyDef): string {
    const val = prop.NominalValue;
    if (typeof val === 'string') {
      const typeName = prop.Type ?? 'IfcLabel';
      return `${typeName.toUpperCase()}('${esc(val)}')`;
    }
    if (typeof val === 'number') {
      const typeName = prop.Type ?? (Number.isInteger(val) ? 'IfcInteger' : 'IfcReal');
      if (typeName === 'IfcInteger') {
        return `IFCINTEGER(${Math.round(val)})`;
      }
      return `IFCREAL(${num(val)})`;
    }
    return `IFCBOOLEAN(${val ? '.T.' : '.F.'})`;
  }

  // ============================================================================
  // Internal - Relationship finalization
  // ============================================================================

  private finalizeRelationships(): void {
    this.addRelAggregates(this.projectId, [this.siteId]);
    this.addRelAggregates(this.siteId, [this.buildingId]);

    if (this.storeyIds.length > 0) {
      this.addRelAggregates(this.buildingId, this.storeyIds);
    }
    if (this.gridIds.length > 0) {
      this.addSpatialContainment(this.buildingId, this.gridIds);
    }
  }

  private addRelAggregates(relatingId: number, relatedIds: number[]): void {
    const relId = this.id();
    this.line(relId, 'IFCRELAGGREGATES',
      `'${newGlobalId()}',#${this.ownerHistoryId},$,$,#${relatingId},(${refs(relatedIds)})`);
  }

  // ============================================================================
  // Internal - Utilities
  // ============================================================================

  private id(): number {
    return this.nextId++;
  }

  private line(id: number, type: string, args: string): void {
    this.lines.push(stepLine(id, type, args));
  }

  /** Compute a stable RefDirection perpendicular to a given Axis */
  private computeRefDirection(axis: Point3D): Point3D {
    const up: Point3D = Math.abs(axis[2]) < 0.9 ? [0, 0, 1] : [1, 0, 0];
    return vecNorm(vecCross(up, axis));
  }
}
