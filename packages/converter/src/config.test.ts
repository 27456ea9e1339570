/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConversionError, UnsupportedModeError } from '@stb-ifc/data';
import {
  DEFAULT_INTEGRATION_CONFIG,
  loadIntegrationConfig,
  parseMode,
  validateConfig,
} from './config.js';

describe('loadIntegrationConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stb-ifc-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, JSON.stringify(content));
    return file;
  }

  it('should return the defaults without file or variables', () => {
    expect(loadIntegrationConfig({ env: {} })).toEqual({
      mode: 'hybrid',
      enableFallback: true,
      fallbackThresholdMs: 5000,
      duplicateTolerance: 0,
      confidenceThreshold: 0.7,
    });
  });

  it('should read environment variables', () => {
    const config = loadIntegrationConfig({
      env: {
        STB_IFC_MODE: 'AUTO',
        STB_IFC_ENABLE_FALLBACK: 'no',
        STB_IFC_FALLBACK_THRESHOLD_MS: '2500',
        STB_IFC_DUPLICATE_TOLERANCE: '2',
        STB_IFC_CONFIDENCE_THRESHOLD: '0.9',
      },
    });

    expect(config).toEqual({
      mode: 'auto',
      enableFallback: false,
      fallbackThresholdMs: 2500,
      duplicateTolerance: 2,
      confidenceThreshold: 0.9,
    });
  });

  it('should ignore empty variables', () => {
    expect(loadIntegrationConfig({ env: { STB_IFC_MODE: '', STB_IFC_DUPLICATE_TOLERANCE: ' ' } }))
      .toEqual(DEFAULT_INTEGRATION_CONFIG);
  });

  it('should layer file, environment and overrides', () => {
    const file = writeConfig({ mode: 'legacy', duplicateTolerance: 3, confidenceThreshold: 0.5 });
    const config = loadIntegrationConfig({
      file,
      env: { STB_IFC_DUPLICATE_TOLERANCE: '4' },
      overrides: { enableFallback: false },
    });

    expect(config).toEqual({
      mode: 'legacy',
      enableFallback: false,
      fallbackThresholdMs: 5000,
      duplicateTolerance: 4,
      confidenceThreshold: 0.5,
    });
  });

  it('should freeze the result', () => {
    expect(Object.isFrozen(loadIntegrationConfig({ env: {} }))).toBe(true);
  });

  it('should reject an unknown mode', () => {
    expect(() => loadIntegrationConfig({ env: { STB_IFC_MODE: 'fastest' } })).toThrow(UnsupportedModeError);
    expect(() => loadIntegrationConfig({ env: { STB_IFC_MODE: 'fastest' } })).toThrow('Unsupported conversion mode: "fastest"');
  });

  it('should name the variable holding a malformed value', () => {
    expect(() => loadIntegrationConfig({ env: { STB_IFC_FALLBACK_THRESHOLD_MS: 'soon' } }))
      .toThrow(/STB_IFC_FALLBACK_THRESHOLD_MS/);
    expect(() => loadIntegrationConfig({ env: { STB_IFC_ENABLE_FALLBACK: 'maybe' } }))
      .toThrow(/STB_IFC_ENABLE_FALLBACK/);
  });

  it('should reject unknown keys in the config file', () => {
    const file = writeConfig({ mode: 'hybrid', retries: 3 });
    expect(() => loadIntegrationConfig({ file, env: {} })).toThrow(ConversionError);
  });

  it('should report an unreadable config file', () => {
    const file = path.join(dir, 'missing.json');
    expect(() => loadIntegrationConfig({ file, env: {} })).toThrow(`Cannot read config file ${file}`);
  });
});

describe('parseMode', () => {
  it('should accept every mode case-insensitively', () => {
    expect(parseMode('legacy')).toBe('legacy');
    expect(parseMode(' Element-Centric ')).toBe('element-centric');
    expect(parseMode('HYBRID')).toBe('hybrid');
  });
});

describe('validateConfig', () => {
  it('should have nothing to say about the defaults', () => {
    expect(validateConfig(DEFAULT_INTEGRATION_CONFIG)).toEqual([]);
  });

  it('should flag out-of-range values', () => {
    expect(validateConfig({ ...DEFAULT_INTEGRATION_CONFIG, confidenceThreshold: 1.5, duplicateTolerance: -1 })).toEqual([
      'confidenceThreshold should be between 0 and 1 (got 1.5)',
      'duplicateTolerance should not be negative (got -1)',
    ]);
  });
});
