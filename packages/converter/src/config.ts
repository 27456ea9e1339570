/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Integration configuration.
 *
 * Layers, later wins: defaults, JSON config file, STB_IFC_* environment
 * variables, explicit overrides. The result is frozen.
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConversionError, UnsupportedModeError, createLogger, errorMessage } from '@stb-ifc/data';

const log = createLogger('Config');

export const CONVERSION_MODES = ['legacy', 'element-centric', 'hybrid', 'auto'] as const;

export type ConversionMode = typeof CONVERSION_MODES[number];

/** A mode that runs a conversion strategy directly */
export type StrategyMode = Exclude<ConversionMode, 'auto'>;

export interface IntegrationConfig {
  readonly mode: ConversionMode;
  /** Hybrid may fall back to legacy when the element-centric result is rejected */
  readonly enableFallback: boolean;
  /** Element-centric runs slower than this are reported in the warnings */
  readonly fallbackThresholdMs: number;
  /** Duplicates the quality gate accepts */
  readonly duplicateTolerance: number;
  /** Minimum share of elements placed with better than coordinate confidence */
  readonly confidenceThreshold: number;
}

export const DEFAULT_INTEGRATION_CONFIG: IntegrationConfig = Object.freeze({
  mode: 'hybrid',
  enableFallback: true,
  fallbackThresholdMs: 5000,
  duplicateTolerance: 0,
  confidenceThreshold: 0.7,
});

export const CONFIG_ENV_VARS = {
  mode: 'STB_IFC_MODE',
  enableFallback: 'STB_IFC_ENABLE_FALLBACK',
  fallbackThresholdMs: 'STB_IFC_FALLBACK_THRESHOLD_MS',
  duplicateTolerance: 'STB_IFC_DUPLICATE_TOLERANCE',
  confidenceThreshold: 'STB_IFC_CONFIDENCE_THRESHOLD',
} as const satisfies Record<keyof IntegrationConfig, string>;

const modeSchema = z.enum(CONVERSION_MODES);

const booleanString = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off']))
  .transform(value => value === 'true' || value === '1' || value === 'yes' || value === 'on');

const fileSchema = z.object({
  mode: z.string().optional(),
  enableFallback: z.boolean().optional(),
  fallbackThresholdMs: z.number().finite().nonnegative().optional(),
  duplicateTolerance: z.number().int().optional(),
  confidenceThreshold: z.number().finite().optional(),
}).strict();

const envSchema = z.object({
  STB_IFC_MODE: z.string().optional(),
  STB_IFC_ENABLE_FALLBACK: booleanString.optional(),
  STB_IFC_FALLBACK_THRESHOLD_MS: z.coerce.number().finite().nonnegative().optional(),
  STB_IFC_DUPLICATE_TOLERANCE: z.coerce.number().int().optional(),
  STB_IFC_CONFIDENCE_THRESHOLD: z.coerce.number().finite().optional(),
});

type ConfigLayer = Partial<Omit<IntegrationConfig, 'mode'>> & { mode?: string };

export interface LoadConfigOptions {
  /** Path of a JSON config file */
  file?: string;
  /** Environment to read STB_IFC_* variables from; defaults to process.env */
  env?: Readonly<Record<string, string | undefined>>;
  /** Applied last, e.g. from command line flags */
  overrides?: Partial<IntegrationConfig>;
}

/**
 * Parse a mode name, case-insensitively.
 * @throws UnsupportedModeError
 */
export function parseMode(value: string): ConversionMode {
  const parsed = modeSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new UnsupportedModeError(value);
  }
  return parsed.data;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function readFileLayer(file: string): ConfigLayer {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConversionError(`Cannot read config file ${file}: ${errorMessage(error)}`);
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConversionError(`Invalid config file ${file}: ${formatIssues(parsed.error.issues)}`);
  }
  return parsed.data;
}

function readEnvLayer(env: Readonly<Record<string, string | undefined>>): ConfigLayer {
  // Empty variables count as unset
  const present: Record<string, string> = {};
  for (const name of Object.values(CONFIG_ENV_VARS)) {
    const value = env[name];
    if (value !== undefined && value.trim() !== '') present[name] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConversionError(`Invalid environment: ${formatIssues(parsed.error.issues)}`);
  }

  const data = parsed.data;
  return {
    mode: data.STB_IFC_MODE,
    enableFallback: data.STB_IFC_ENABLE_FALLBACK,
    fallbackThresholdMs: data.STB_IFC_FALLBACK_THRESHOLD_MS,
    duplicateTolerance: data.STB_IFC_DUPLICATE_TOLERANCE,
    confidenceThreshold: data.STB_IFC_CONFIDENCE_THRESHOLD,
  };
}

function applyLayer(config: IntegrationConfig, layer: ConfigLayer): IntegrationConfig {
  return {
    mode: layer.mode !== undefined ? parseMode(layer.mode) : config.mode,
    enableFallback: layer.enableFallback ?? config.enableFallback,
    fallbackThresholdMs: layer.fallbackThresholdMs ?? config.fallbackThresholdMs,
    duplicateTolerance: layer.duplicateTolerance ?? config.duplicateTolerance,
    confidenceThreshold: layer.confidenceThreshold ?? config.confidenceThreshold,
  };
}

/**
 * Build the effective configuration.
 *
 * @throws UnsupportedModeError for an unknown mode
 * @throws ConversionError for an unreadable file or a malformed value
 */
export function loadIntegrationConfig(options: LoadConfigOptions = {}): IntegrationConfig {
  let config: IntegrationConfig = DEFAULT_INTEGRATION_CONFIG;

  if (options.file) {
    config = applyLayer(config, readFileLayer(options.file));
  }
  config = applyLayer(config, readEnvLayer(options.env ?? process.env));
  if (options.overrides) {
    config = applyLayer(config, options.overrides);
  }

  for (const warning of validateConfig(config)) {
    log.warn(warning);
  }
  log.info(`Mode ${config.mode}, fallback ${config.enableFallback ? 'on' : 'off'}`);
  return Object.freeze(config);
}

/** Values that load but make little sense */
export function validateConfig(config: IntegrationConfig): string[] {
  const warnings: string[] = [];

  if (config.confidenceThreshold < 0 || config.confidenceThreshold > 1) {
    warnings.push(`confidenceThreshold should be between 0 and 1 (got ${config.confidenceThreshold})`);
  }
  if (config.duplicateTolerance < 0) {
    warnings.push(`duplicateTolerance should not be negative (got ${config.duplicateTolerance})`);
  }
  if (config.fallbackThresholdMs === 0) {
    warnings.push('fallbackThresholdMs is 0; every element-centric run will be reported as slow');
  }

  return warnings;
}
