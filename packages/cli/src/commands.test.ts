/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { UnsupportedModeError } from '@stb-ifc/data';
import { compareCommand, configCommand, convertCommand, defaultOutputPath } from './commands.js';

const frame = {
  name: 'Frame',
  stories: [
    { name: '1F', elevation: 0, nodeIds: ['N1', 'N2'] },
    { name: '2F', elevation: 3000, nodeIds: ['N3', 'N4'] },
  ],
  nodes: [
    { id: 'N1', x: 0, y: 0, z: 0 },
    { id: 'N2', x: 6000, y: 0, z: 0 },
    { id: 'N3', x: 0, y: 0, z: 3000 },
    { id: 'N4', x: 6000, y: 0, z: 3000 },
  ],
  elements: {
    column: [{ id: 'C1', bottomNodeId: 'N1', topNodeId: 'N3' }],
    beam: [{ id: 'B1', startNodeId: 'N3', endNodeId: 'N4', stbSectionName: 'G1' }],
  },
  axes: [
    { name: 'X1', direction: 'Y', offset: 0 },
    { name: 'Y1', direction: 'X', offset: 0 },
  ],
};

describe('CLI commands', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stb-ifc-cli-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeModel(model: unknown, name = 'frame.json'): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, JSON.stringify(model));
    return file;
  }

  describe('convertCommand', () => {
    it('should write an IFC file beside the model', () => {
      const file = writeModel(frame);
      const { lines, exitCode, outputPath } = convertCommand(file, { env: {} });

      expect(exitCode).toBe(0);
      expect(outputPath).toBe(path.join(dir, 'frame.ifc'));
      expect(lines.slice(0, 5)).toEqual([
        `Model: ${file} (2 stories, 2 elements)`,
        'Mode: hybrid',
        'Used: element-centric',
        'Elements: 2/2 created, 0 duplicates, 0 failed, 0 unclassified',
        'Stories: 2',
      ]);
      expect(lines[lines.length - 1]).toMatch(/^Wrote .*frame\.ifc \(\d+ entities, \d+ bytes\)$/);

      const content = fs.readFileSync(path.join(dir, 'frame.ifc'), 'utf-8');
      expect(content).toContain("FILE_NAME('frame.ifc'");
      expect(content).toMatch(/IFCPROJECT\('[^']{22}',#5,'Frame',/);
      expect(content).toMatch(/IFCCOLUMN\([^;]*'C1',\.COLUMN\.\);/);
      expect(content).toMatch(/IFCBEAM\([^;]*'G1'[^;]*'B1',\.BEAM\.\);/);
      expect(content).toContain("IFCPROPERTYSINGLEVALUE('AssignedStory',$,IFCLABEL('2F'),$);");
      expect(content).toContain("IFCGRIDAXIS('Y1',");
    });

    it('should honour an explicit output path and mode', () => {
      const file = writeModel(frame);
      const output = path.join(dir, 'out.ifc');
      const { lines, outputPath } = convertCommand(file, { env: {}, output, mode: 'Legacy' });

      expect(outputPath).toBe(output);
      expect(lines[1]).toBe('Mode: legacy');
      expect(lines[2]).toBe('Used: legacy');
      expect(fs.existsSync(output)).toBe(true);
    });

    it('should report the mode auto picked', () => {
      const { lines } = convertCommand(writeModel(frame), { env: {}, mode: 'auto' });

      expect(lines[1]).toBe('Mode: auto (selected legacy)');
      expect(lines[2]).toBe('Used: legacy');
    });

    it('should report a fallback and its warnings', () => {
      const model = {
        ...frame,
        elements: { ...frame.elements, beam: [...frame.elements.beam, { id: 'B2', startNodeId: 'N1' }] },
      };
      const { lines, exitCode } = convertCommand(writeModel(model), { env: {} });

      expect(exitCode).toBe(0);
      expect(lines.slice(2, 7)).toEqual([
        'Used: legacy (fallback)',
        'Elements: 2/3 created, 0 duplicates, 1 failed, 0 unclassified',
        'Stories: 2',
        'Warning: Fell back to legacy conversion: Quality gate failed: 1 elements failed',
        'Warning: Failed to create beam B2: beam needs startPoint and endPoint',
      ]);
    });

    it('should not write a file when the conversion has errors', () => {
      const model = { ...frame, stories: [frame.stories[0], { name: '1F', elevation: 3000 }] };
      const file = writeModel(model);
      const { lines, exitCode, outputPath } = convertCommand(file, { env: {}, mode: 'element-centric', fallback: false });

      expect(exitCode).toBe(1);
      expect(outputPath).toBeUndefined();
      expect(lines).toContain('Error: Element-centric conversion failed: Duplicate story name "1F"');
      expect(lines[lines.length - 1]).toBe('No IFC file written');
      expect(fs.existsSync(defaultOutputPath(file))).toBe(false);
    });

    it('should reject an unknown mode', () => {
      expect(() => convertCommand(writeModel(frame), { env: {}, mode: 'fastest' })).toThrow(UnsupportedModeError);
    });
  });

  describe('compareCommand', () => {
    it('should print both measurements and a recommendation', () => {
      const { lines, exitCode } = compareCommand(writeModel(frame), { env: {} });

      expect(exitCode).toBe(0);
      expect(lines).toHaveLength(4);
      expect(lines[0]).toMatch(/^Legacy: \d+\.\dms, 2 created, 0 duplicates, 0 failed$/);
      expect(lines[1]).toMatch(/^Element-centric: \d+\.\dms, 2 created, 0 duplicates, 0 failed$/);
      expect(lines[2]).toMatch(/^Improvement: -?\d+\.\d%$/);
      expect(lines[3]).toMatch(/^Recommendation: (legacy|hybrid|element-centric)$/);
    });
  });

  describe('configCommand', () => {
    it('should print the effective configuration', () => {
      const { lines } = configCommand({ env: { STB_IFC_MODE: 'AUTO' }, fallback: false });

      expect(JSON.parse(lines.join('\n'))).toEqual({
        mode: 'auto',
        enableFallback: false,
        fallbackThresholdMs: 5000,
        duplicateTolerance: 0,
        confidenceThreshold: 0.7,
      });
    });

    it('should let the mode flag win over the config file', () => {
      const config = path.join(dir, 'config.json');
      fs.writeFileSync(config, JSON.stringify({ mode: 'legacy', duplicateTolerance: 2 }));
      const { lines } = configCommand({ env: {}, config, mode: 'hybrid' });

      expect(JSON.parse(lines.join('\n'))).toMatchObject({ mode: 'hybrid', duplicateTolerance: 2 });
    });

    it('should append configuration warnings', () => {
      const { lines } = configCommand({ env: { STB_IFC_CONFIDENCE_THRESHOLD: '1.5' } });
      expect(lines[lines.length - 1]).toBe('Warning: confidenceThreshold should be between 0 and 1 (got 1.5)');
    });
  });
});

describe('defaultOutputPath', () => {
  it('should swap the extension for .ifc', () => {
    expect(defaultOutputPath(path.join('models', 'tower.json'))).toBe(path.join('models', 'tower.ifc'));
  });
});
