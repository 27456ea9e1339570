/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect } from 'vitest';
import { ELEMENT_TYPES, ElementCreationError, type ClassifiedDefinition, type ElementDefinition, type ElementType } from '@stb-ifc/data';
import { IfcElementBuilder } from './element-builder.js';

function create(builder: IfcElementBuilder, type: ElementType, definition: ElementDefinition): number {
  const creator = builder.getCreator(type);
  if (!creator) throw new Error(`no creator for ${type}`);
  return creator.create(definition);
}

describe('IfcElementBuilder', () => {
  it('should provide a creator for every element type', () => {
    const builder = new IfcElementBuilder();
    for (const type of ELEMENT_TYPES) {
      expect(builder.getCreator(type)).toBeDefined();
    }
  });

  it('should write a classified beam with its property set', () => {
    const builder = new IfcElementBuilder();
    const beam: ClassifiedDefinition = {
      id: 'B1',
      name: 'G1',
      stbSectionName: 'SG1',
      startPoint: [0, 0, 3000],
      endPoint: [6000, 0, 3000],
      assignedStory: '2F',
      analysisConfidence: 0.8,
      analysisMethod: 'node-reference',
    };
    const handle = create(builder, 'beam', beam);
    const { content } = builder.toIfc();

    expect(content).toMatch(new RegExp(`#${handle}=IFCBEAM\\('[^']{22}',#5,'G1',\\$,'SG1',#\\d+,#\\d+,'B1',\\.BEAM\\.\\);`));
    expect(content).toContain('IFCRECTANGLEPROFILEDEF(.AREA.,$,#27,300.,600.);');
    expect(content).toContain("IFCPROPERTYSINGLEVALUE('Id',$,IFCIDENTIFIER('B1'),$);");
    expect(content).toContain("IFCPROPERTYSINGLEVALUE('SectionName',$,IFCLABEL('SG1'),$);");
    expect(content).toContain("IFCPROPERTYSINGLEVALUE('AssignedStory',$,IFCLABEL('2F'),$);");
    expect(content).toContain("IFCPROPERTYSINGLEVALUE('AnalysisMethod',$,IFCLABEL('node-reference'),$);");
    expect(content).toContain("IFCPROPERTYSINGLEVALUE('Confidence',$,IFCREAL(0.8),$);");
    expect(content).toMatch(/IFCPROPERTYSET\('[^']{22}',#5,'Pset_StbElement',\$,\(#\d+,#\d+,#\d+,#\d+,#\d+\)\);/);
  });

  it('should write confidence 1.0 as a real', () => {
    const builder = new IfcElementBuilder();
    const column: ClassifiedDefinition = {
      id: 'C1',
      bottomPoint: [0, 0, 0],
      topPoint: [0, 0, 3000],
      assignedStory: '1F',
      analysisConfidence: 1.0,
      analysisMethod: 'floor-attribute',
    };
    create(builder, 'column', column);

    expect(builder.toIfc().content).toContain("IFCPROPERTYSINGLEVALUE('Confidence',$,IFCREAL(1.),$);");
  });

  it('should leave story properties off unclassified elements', () => {
    const builder = new IfcElementBuilder();
    create(builder, 'girder', { id: 'G1', startPoint: [0, 0, 0], endPoint: [8000, 0, 0] });
    const { content } = builder.toIfc();

    expect(content).toContain('IFCRECTANGLEPROFILEDEF(.AREA.,$,#27,400.,800.);');
    expect(content).toContain("IFCPROPERTYSINGLEVALUE('Id',$,IFCIDENTIFIER('G1'),$);");
    expect(content).not.toContain('AssignedStory');
  });

  it('should write braces as members', () => {
    const builder = new IfcElementBuilder();
    create(builder, 'brace', { id: 'V1', startPoint: [0, 0, 0], endPoint: [4000, 0, 3000], width: 200, depth: 200 });

    expect(builder.toIfc().content).toMatch(/IFCMEMBER\([^;]*'V1',\.BRACE\.\);/);
  });

  it('should hang a pile below its top by its length', () => {
    const builder = new IfcElementBuilder();
    create(builder, 'pile', { id: 'P1', topPoint: [0, 0, -1000], length: 12000 });
    const { content } = builder.toIfc();

    expect(content).toContain('#21=IFCCARTESIANPOINT((0.,0.,-13000.));');
    expect(content).toMatch(/IFCEXTRUDEDAREASOLID\(#\d+,#\d+,#7,12000\.\);/);
    expect(content).toMatch(/IFCPILE\([^;]*'P1',\.NOTDEFINED\.,\$\);/);
  });

  it('should build a wall from the first edge of its outline', () => {
    const builder = new IfcElementBuilder();
    create(builder, 'wall', {
      id: 'W1',
      outline: [[0, 0, 0], [4000, 0, 0], [4000, 0, 3000], [0, 0, 3000]],
    });
    const { content } = builder.toIfc();

    expect(content).toMatch(/IFCRECTANGLEPROFILEDEF\(\.AREA\.,\$,#\d+,4000\.,250\.\);/);
    expect(content).toMatch(/IFCEXTRUDEDAREASOLID\(#\d+,#\d+,#7,3000\.\);/);
    expect(content).toMatch(/IFCWALL\([^;]*'W1',\.STANDARD\.\);/);
  });

  it('should put the top face of an outlined slab at the outline elevation', () => {
    const builder = new IfcElementBuilder();
    create(builder, 'slab', {
      id: 'S1',
      thickness: 200,
      outline: [[1000, 1000, 3000], [7000, 1000, 3000], [7000, 5000, 3000], [1000, 5000, 3000]],
    });
    const { content } = builder.toIfc();

    expect(content).toContain('#21=IFCCARTESIANPOINT((1000.,1000.,2800.));');
    expect(content).toContain('IFCCARTESIANPOINT((6000.,4000.));');
    expect(content).toContain('IFCARBITRARYCLOSEDPROFILEDEF');
    expect(content).toMatch(/IFCEXTRUDEDAREASOLID\(#\d+,#\d+,#7,200\.\);/);
  });

  it('should centre a rectangular slab on its centre point', () => {
    const builder = new IfcElementBuilder();
    create(builder, 'slab', { id: 'S2', centerPoint: [3000, 2000, 3000], width: 6000, depth: 4000 });

    expect(builder.toIfc().content).toContain('#21=IFCCARTESIANPOINT((0.,0.,2850.));');
  });

  it('should reject definitions without usable geometry', () => {
    const builder = new IfcElementBuilder();

    expect(() => create(builder, 'beam', { id: 'B1', startPoint: [0, 0, 0] })).toThrow(ElementCreationError);
    expect(() => create(builder, 'beam', { id: 'B1', startPoint: [0, 0, 0] })).toThrow('beam needs startPoint and endPoint');
    expect(() => create(builder, 'column', { id: 'C1', bottomPoint: [0, 0, 0], topPoint: [0, 0, 0] }))
      .toThrow('column has zero length');
    expect(() => create(builder, 'slab', { id: 'S1' })).toThrow('slab needs an outline, or centerPoint with width and depth');
    expect(() => create(builder, 'footing', { id: 'F1', position: [0, 0, 0], width: 2000 }))
      .toThrow('footing needs width, depth and height');
  });

  it('should carry the element id on creation errors', () => {
    const builder = new IfcElementBuilder();
    try {
      create(builder, 'wall', { id: 'W9' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ElementCreationError);
      if (error instanceof ElementCreationError) {
        expect(error.elementId).toBe('W9');
        expect(error.elementType).toBe('wall');
      }
    }
  });

  it('should contain elements in materialized stories', () => {
    const builder = new IfcElementBuilder();
    const story = builder.materializeStory({ name: '1F', elevation: 0 });
    const footing = create(builder, 'footing', { id: 'F1', position: [0, 0, -1500], width: 2000, depth: 2000, height: 800 });
    const rel = builder.createSpatialRelationship(story, [footing]);
    const { content } = builder.toIfc();

    expect(content).toMatch(new RegExp(`#${story}=IFCBUILDINGSTOREY\\('[^']{22}',#5,'1F',`));
    expect(content).toMatch(new RegExp(`#${rel}=IFCRELCONTAINEDINSPATIALSTRUCTURE\\('[^']{22}',#5,\\$,\\$,\\(#${footing}\\),#${story}\\);`));
  });

  it('should lay grid lines across the crossing axes', () => {
    const builder = new IfcElementBuilder();
    builder.createGrid([
      { name: 'Y1', direction: 'X', offset: 0 },
      { name: 'Y2', direction: 'X', offset: 6000 },
      { name: 'X1', direction: 'Y', offset: 0 },
      { name: 'X2', direction: 'Y', offset: 8000 },
    ]);
    const { content } = builder.toIfc();

    // Y1: from X = -1000 to X = 9000
    expect(content).toContain('#24=IFCCARTESIANPOINT((-1000.,0.));');
    expect(content).toContain('#25=IFCCARTESIANPOINT((9000.,0.));');
    expect(content).toContain("#27=IFCGRIDAXIS('Y1',#26,.T.);");
    // X1: from Y = -1000 to Y = 7000
    expect(content).toContain('#32=IFCCARTESIANPOINT((0.,-1000.));');
    expect(content).toContain('#33=IFCCARTESIANPOINT((0.,7000.));');
    expect(content).toContain("#35=IFCGRIDAXIS('X1',#34,.T.);");
  });

  it('should reject a grid with axes in one direction only', () => {
    const builder = new IfcElementBuilder();
    expect(() => builder.createGrid([{ name: 'Y1', direction: 'X', offset: 0 }]))
      .toThrow('A grid needs X and Y axes (got 1 X, 0 Y)');
  });

  it('should discard built entities on reset', () => {
    const builder = new IfcElementBuilder({ Name: 'Frame' });
    builder.materializeStory({ name: '1F', elevation: 0 });
    create(builder, 'beam', { id: 'B1', startPoint: [0, 0, 0], endPoint: [5000, 0, 0] });
    builder.reset();
    const result = builder.toIfc();

    expect(result.content).not.toContain('IFCBEAM');
    expect(result.content).toContain("'Frame'");
    expect(result.stats.entityCount).toBe(22);
  });
});
