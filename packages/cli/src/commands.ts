/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Command bodies for the stb-ifc CLI. Each returns the lines to print and
 * an exit code; cli.ts only wires them to commander.
 */

import * as fs from 'fs';
import * as path from 'path';
import { countElements, type ConversionResult } from '@stb-ifc/data';
import {
  IntegrationService,
  loadIntegrationConfig,
  parseMode,
  validateConfig,
  type ConversionMode,
  type IntegrationConfig,
  type StrategyMeasurement,
} from '@stb-ifc/converter';
import { IfcElementBuilder } from '@stb-ifc/create';
import { loadModelFile } from '@stb-ifc/stb';

export interface CommandResult {
  lines: string[];
  exitCode: number;
}

export interface ConfigOptions {
  /** JSON config file */
  config?: string;
  mode?: string;
  /** false disables the legacy fallback */
  fallback?: boolean;
  env?: Record<string, string | undefined>;
}

export interface ConvertOptions extends ConfigOptions {
  output?: string;
}

export interface ConvertCommandResult extends CommandResult {
  /** Set when the IFC file was written */
  outputPath?: string;
}

/** Effective configuration: file, environment, then command line flags */
export function resolveConfig(options: ConfigOptions): IntegrationConfig {
  const overrides: { mode?: ConversionMode; enableFallback?: boolean } = {};
  if (options.mode !== undefined) overrides.mode = parseMode(options.mode);
  if (options.fallback === false) overrides.enableFallback = false;

  return loadIntegrationConfig({
    file: options.config,
    env: options.env ?? process.env,
    overrides,
  });
}

/** model.json → model.ifc beside it */
export function defaultOutputPath(modelPath: string): string {
  const parsed = path.parse(modelPath);
  return path.join(parsed.dir, `${parsed.name}.ifc`);
}

function resultLines(result: ConversionResult<number>): string[] {
  const s = result.statistics;
  return [
    `Elements: ${s.createdElements}/${s.totalElements} created, ${s.duplicateElements} duplicates, ` +
      `${s.failedElements} failed, ${s.unclassifiedElements} unclassified`,
    `Stories: ${result.createdStories.size}`,
    ...result.warnings.map(w => `Warning: ${w}`),
    ...result.errors.map(e => `Error: ${e}`),
  ];
}

export function convertCommand(modelPath: string, options: ConvertOptions = {}): ConvertCommandResult {
  const config = resolveConfig(options);
  const model = loadModelFile(modelPath);
  const outputPath = options.output ?? defaultOutputPath(modelPath);

  const builder = new IfcElementBuilder({
    Name: model.name ?? path.parse(modelPath).name,
    FileName: path.basename(outputPath),
  });
  const service = new IntegrationService<number>(config);
  const result = service.convert(model, builder);
  const [record] = service.getConversionHistory();

  const lines = [
    `Model: ${modelPath} (${model.stories.length} stories, ${countElements(model.elements)} elements)`,
    config.mode === 'auto' ? `Mode: auto (selected ${record.mode})` : `Mode: ${config.mode}`,
    `Used: ${record.usedMode}${record.fallbackUsed ? ' (fallback)' : ''}`,
    ...resultLines(result),
    `Time: ${record.processingTimeMs.toFixed(1)}ms`,
  ];

  if (result.errors.length > 0) {
    lines.push('No IFC file written');
    return { lines, exitCode: 1 };
  }

  const { content, stats } = builder.toIfc();
  fs.writeFileSync(outputPath, content);
  lines.push(`Wrote ${outputPath} (${stats.entityCount} entities, ${stats.fileSize} bytes)`);
  return { lines, exitCode: 0, outputPath };
}

function measurementLine(label: string, m: StrategyMeasurement): string {
  const errors = m.errors.length > 0 ? `, ${m.errors.length} errors` : '';
  return `${label}: ${m.processingTimeMs.toFixed(1)}ms, ${m.createdElements} created, ` +
    `${m.duplicateElements} duplicates, ${m.failedElements} failed${errors}`;
}

export function compareCommand(modelPath: string, options: ConfigOptions = {}): CommandResult {
  const config = resolveConfig(options);
  const model = loadModelFile(modelPath);
  const service = new IntegrationService<number>(config);
  const comparison = service.comparePerformance(model, new IfcElementBuilder());

  return {
    lines: [
      measurementLine('Legacy', comparison.legacy),
      measurementLine('Element-centric', comparison.elementCentric),
      `Improvement: ${comparison.improvementPercent.toFixed(1)}%`,
      `Recommendation: ${comparison.recommendation}`,
    ],
    exitCode: 0,
  };
}

export function configCommand(options: ConfigOptions = {}): CommandResult {
  const config = resolveConfig(options);
  return {
    lines: [
      ...JSON.stringify(config, null, 2).split('\n'),
      ...validateConfig(config).map(w => `Warning: ${w}`),
    ],
    exitCode: 0,
  };
}
