/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * IntegrationService - choose a conversion strategy and police its output
 *
 * Modes:
 * - legacy: story-by-story conversion
 * - element-centric: classify, deduplicate, build, relate
 * - hybrid: element-centric, falling back to legacy once when the result
 *   fails the quality gate
 * - auto: pick one of the above from the model's size
 */

import {
  IntegrationModeError,
  countElements,
  createEmptyStatistics,
  createLogger,
  errorMessage,
  type ConversionInput,
  type ConversionResult,
  type ConversionStatistics,
  type ElementBuilder,
} from '@stb-ifc/data';
import {
  DEFAULT_INTEGRATION_CONFIG,
  type IntegrationConfig,
  type StrategyMode,
} from './config.js';
import { ElementCentricConverter, defaultClock, type Clock } from './element-centric-converter.js';
import { LegacyStoryConverter, type LegacyConverter } from './legacy-story-converter.js';
import { RelationshipManager } from './relationship-manager.js';
import type { StoryAnalyzerOptions } from './story-analyzer.js';

const log = createLogger('IntegrationService');

// ============================================================================
// Types
// ============================================================================

/** Model size limits used by auto mode */
export const AUTO_MODE_LIMITS = {
  /** Above this many elements, element-centric */
  largeElementCount: 1000,
  /** Above this many stories, element-centric */
  largeStoryCount: 10,
  /** Below this many elements (and stories), legacy */
  smallElementCount: 100,
  smallStoryCount: 3,
} as const;

export interface IntegrationServiceOptions<H> {
  /** Story-by-story converter; defaults to LegacyStoryConverter */
  legacy?: LegacyConverter<H>;
  clock?: Clock;
  analyzer?: StoryAnalyzerOptions;
}

export interface ConversionRecord {
  requestedMode: IntegrationConfig['mode'];
  /** Strategy run for the request; auto resolved */
  mode: StrategyMode;
  /** Strategy whose result was returned */
  usedMode: StrategyMode;
  fallbackUsed: boolean;
  processingTimeMs: number;
  createdElements: number;
  errors: number;
  timestamp: Date;
}

export interface IntegrationStatistics {
  totalConversions: number;
  fallbackCount: number;
  /** fallbackCount / totalConversions, 0 before the first conversion */
  fallbackRate: number;
  averageProcessingTimeMs: number;
  modeUsage: Record<StrategyMode, number>;
  /** Improvement percentages from comparePerformance, oldest first */
  performanceImprovements: number[];
}

export interface StrategyMeasurement {
  processingTimeMs: number;
  createdElements: number;
  duplicateElements: number;
  failedElements: number;
  errors: string[];
}

export interface PerformanceComparison {
  legacy: StrategyMeasurement;
  elementCentric: StrategyMeasurement;
  /** (legacy - elementCentric) / legacy * 100 */
  improvementPercent: number;
  recommendation: StrategyMode;
}

interface Outcome<H> {
  result: ConversionResult<H>;
  usedMode: StrategyMode;
  fallbackUsed: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

/** Strategy auto mode picks for a model */
export function selectMode(input: ConversionInput): StrategyMode {
  const elementCount = countElements(input.elements);
  const storyCount = input.stories.length;

  if (elementCount > AUTO_MODE_LIMITS.largeElementCount || storyCount > AUTO_MODE_LIMITS.largeStoryCount) {
    return 'element-centric';
  }
  if (elementCount < AUTO_MODE_LIMITS.smallElementCount && storyCount < AUTO_MODE_LIMITS.smallStoryCount) {
    return 'legacy';
  }
  return 'hybrid';
}

/**
 * Reasons an element-centric result is not good enough; empty when it
 * passes. Only coordinate-placed elements count as low confidence.
 */
export function evaluateQuality(statistics: ConversionStatistics, config: IntegrationConfig): string[] {
  const reasons: string[] = [];

  if (statistics.failedElements > 0) {
    reasons.push(`${statistics.failedElements} elements failed`);
  }
  if (statistics.duplicateElements > config.duplicateTolerance) {
    reasons.push(`${statistics.duplicateElements} duplicates exceed tolerance ${config.duplicateTolerance}`);
  }
  if (statistics.createdElements > 0) {
    const lowConfidence = statistics.analysisMethodCounts.coordinate ?? 0;
    const ratio = lowConfidence / statistics.createdElements;
    if (ratio > 1 - config.confidenceThreshold) {
      reasons.push(`${(ratio * 100).toFixed(1)}% of elements placed by coordinate only`);
    }
  }

  return reasons;
}

function failedResult<H>(errors: string[], processingTimeMs = 0): ConversionResult<H> {
  const statistics = createEmptyStatistics();
  statistics.processingTimeMs = processingTimeMs;
  return {
    createdElements: [],
    createdStories: new Map(),
    spatialRelationships: [],
    statistics,
    errors,
    warnings: [],
  };
}

function measure<H>(result: ConversionResult<H>, processingTimeMs: number): StrategyMeasurement {
  return {
    processingTimeMs,
    createdElements: result.statistics.createdElements,
    duplicateElements: result.statistics.duplicateElements,
    failedElements: result.statistics.failedElements,
    errors: [...result.errors],
  };
}

// ============================================================================
// IntegrationService
// ============================================================================

export class IntegrationService<H> {
  private readonly config: IntegrationConfig;
  private readonly legacy: LegacyConverter<H>;
  private readonly clock: Clock;
  private readonly analyzerOptions: StoryAnalyzerOptions;

  private readonly history: ConversionRecord[] = [];
  private readonly improvements: number[] = [];
  private fallbackCount = 0;

  constructor(config: IntegrationConfig = DEFAULT_INTEGRATION_CONFIG, options: IntegrationServiceOptions<H> = {}) {
    this.config = Object.freeze({ ...config });
    this.clock = options.clock ?? defaultClock;
    this.legacy = options.legacy ?? new LegacyStoryConverter<H>(this.clock);
    this.analyzerOptions = options.analyzer ?? {};
  }

  getConfig(): IntegrationConfig {
    return this.config;
  }

  /**
   * Convert a model with the configured mode.
   *
   * @throws IntegrationModeError when hybrid's element-centric attempt and
   *   its legacy fallback both fail
   */
  convert(input: ConversionInput, builder: ElementBuilder<H>): ConversionResult<H> {
    const requestedMode = this.config.mode;
    const mode = requestedMode === 'auto' ? selectMode(input) : requestedMode;
    if (requestedMode === 'auto') {
      log.info(`Auto mode selected ${mode}`, { operation: 'convert' });
    }

    const start = this.clock();
    let outcome: Outcome<H>;
    try {
      outcome = this.dispatch(mode, input, builder);
    } catch (error) {
      const bothFailed = error instanceof IntegrationModeError;
      this.history.push({
        requestedMode,
        mode,
        usedMode: bothFailed ? 'legacy' : mode,
        fallbackUsed: bothFailed,
        processingTimeMs: this.clock() - start,
        createdElements: 0,
        errors: 1,
        timestamp: new Date(),
      });
      throw error;
    }
    const elapsed = this.clock() - start;

    this.history.push({
      requestedMode,
      mode,
      usedMode: outcome.usedMode,
      fallbackUsed: outcome.fallbackUsed,
      processingTimeMs: elapsed,
      createdElements: outcome.result.statistics.createdElements,
      errors: outcome.result.errors.length,
      timestamp: new Date(),
    });

    log.info(`${mode} conversion produced ${outcome.result.statistics.createdElements} elements via ${outcome.usedMode}`);
    return outcome.result;
  }

  /**
   * Run legacy then element-centric on the same input and compare timings.
   * The builder is reset before each run.
   */
  comparePerformance(input: ConversionInput, builder: ElementBuilder<H>): PerformanceComparison {
    builder.reset();
    const legacyStart = this.clock();
    const legacyResult = this.legacy.convert(input, builder);
    const legacyTime = this.clock() - legacyStart;

    builder.reset();
    const ecStart = this.clock();
    const ecResult = this.runElementCentric(input, builder);
    const ecTime = this.clock() - ecStart;

    const improvementPercent = legacyTime > 0 ? ((legacyTime - ecTime) / legacyTime) * 100 : 0;
    this.improvements.push(improvementPercent);

    let recommendation: StrategyMode;
    if (improvementPercent > 30 && ecResult.statistics.duplicateElements === 0) {
      recommendation = 'element-centric';
    } else if (improvementPercent > 10) {
      recommendation = 'hybrid';
    } else {
      recommendation = 'legacy';
    }

    log.info(`Legacy ${legacyTime.toFixed(2)}ms, element-centric ${ecTime.toFixed(2)}ms, recommend ${recommendation}`, {
      operation: 'comparePerformance',
    });

    return {
      legacy: measure(legacyResult, legacyTime),
      elementCentric: measure(ecResult, ecTime),
      improvementPercent,
      recommendation,
    };
  }

  getIntegrationStatistics(): IntegrationStatistics {
    const modeUsage: Record<StrategyMode, number> = { 'legacy': 0, 'element-centric': 0, 'hybrid': 0 };
    let totalTime = 0;
    for (const record of this.history) {
      modeUsage[record.mode]++;
      totalTime += record.processingTimeMs;
    }

    const total = this.history.length;
    return {
      totalConversions: total,
      fallbackCount: this.fallbackCount,
      fallbackRate: total > 0 ? this.fallbackCount / total : 0,
      averageProcessingTimeMs: total > 0 ? totalTime / total : 0,
      modeUsage,
      performanceImprovements: [...this.improvements],
    };
  }

  getConversionHistory(): readonly ConversionRecord[] {
    return this.history;
  }

  // --------------------------------------------------------------------------
  // Modes
  // --------------------------------------------------------------------------

  private dispatch(mode: StrategyMode, input: ConversionInput, builder: ElementBuilder<H>): Outcome<H> {
    switch (mode) {
      case 'legacy':
        return this.runLegacyMode(input, builder);
      case 'element-centric':
        return this.runElementCentricMode(input, builder);
      case 'hybrid':
        return this.runHybridMode(input, builder);
    }
  }

  private runLegacyMode(input: ConversionInput, builder: ElementBuilder<H>): Outcome<H> {
    try {
      return { result: this.legacy.convert(input, builder), usedMode: 'legacy', fallbackUsed: false };
    } catch (error) {
      const message = `Legacy conversion failed: ${errorMessage(error)}`;
      log.error('Legacy conversion failed', error, { operation: 'convert' });
      return { result: failedResult([message]), usedMode: 'legacy', fallbackUsed: false };
    }
  }

  private runElementCentricMode(input: ConversionInput, builder: ElementBuilder<H>): Outcome<H> {
    let result: ConversionResult<H>;
    try {
      result = this.runElementCentric(input, builder);
    } catch (error) {
      result = failedResult([`Element-centric conversion failed: ${errorMessage(error)}`]);
    }
    if (result.errors.length === 0) {
      return { result, usedMode: 'element-centric', fallbackUsed: false };
    }

    if (!this.config.enableFallback) {
      this.discardPartial(builder);
      return { result, usedMode: 'element-centric', fallbackUsed: false };
    }

    const reason = result.errors.join('; ');
    try {
      return this.fallBack(input, builder, reason);
    } catch (error) {
      const message = `Legacy fallback failed: ${errorMessage(error)}`;
      log.error('Legacy fallback failed', error, { operation: 'fallback' });
      return { result: failedResult([...result.errors, message]), usedMode: 'legacy', fallbackUsed: true };
    }
  }

  private runHybridMode(input: ConversionInput, builder: ElementBuilder<H>): Outcome<H> {
    let result: ConversionResult<H> | undefined;
    let reason: string | undefined;

    try {
      result = this.runElementCentric(input, builder);
      if (result.errors.length > 0) {
        reason = result.errors.join('; ');
      } else {
        const problems = evaluateQuality(result.statistics, this.config);
        if (problems.length > 0) reason = `Quality gate failed: ${problems.join(', ')}`;
      }
    } catch (error) {
      reason = `Element-centric conversion failed: ${errorMessage(error)}`;
    }

    if (reason === undefined && result) {
      return { result, usedMode: 'element-centric', fallbackUsed: false };
    }
    reason ??= 'Element-centric conversion produced no result';

    if (!this.config.enableFallback) {
      log.warn(`${reason}; fallback disabled`, { operation: 'hybrid' });
      if (!result || result.errors.length > 0) this.discardPartial(builder);
      const kept = result ?? failedResult<H>([reason]);
      kept.warnings.push(`${reason}; fallback disabled, keeping element-centric result`);
      return { result: kept, usedMode: 'element-centric', fallbackUsed: false };
    }

    try {
      return this.fallBack(input, builder, reason);
    } catch (error) {
      const fallbackMessage = errorMessage(error);
      throw new IntegrationModeError(
        `Hybrid conversion failed: ${reason}; legacy fallback failed: ${fallbackMessage}`,
        reason,
        fallbackMessage
      );
    }
  }

  /** Reset the builder and run legacy once */
  private fallBack(input: ConversionInput, builder: ElementBuilder<H>, reason: string): Outcome<H> {
    this.fallbackCount++;
    log.warn(`Falling back to legacy conversion: ${reason}`, { operation: 'fallback' });

    builder.reset();
    const result = this.legacy.convert(input, builder);
    result.warnings.unshift(`Fell back to legacy conversion: ${reason}`);
    return { result, usedMode: 'legacy', fallbackUsed: true };
  }

  /** A fatal run returns empty lists; the builder must not keep its grid or partial elements */
  private discardPartial(builder: ElementBuilder<H>): void {
    log.debug('Discarding output of a failed element-centric run', { operation: 'convert' });
    builder.reset();
  }

  /** Fresh converter and relationship manager over the given builder */
  private runElementCentric(input: ConversionInput, builder: ElementBuilder<H>): ConversionResult<H> {
    const relationshipManager = new RelationshipManager(builder);
    const converter = new ElementCentricConverter(builder, input.nodeStoryMap, {
      relationshipManager,
      analyzer: this.analyzerOptions,
      clock: this.clock,
    });

    let gridWarning: string | undefined;
    if (input.axes && input.axes.length > 0) {
      try {
        builder.createGrid(input.axes);
      } catch (error) {
        gridWarning = `Grid creation failed: ${errorMessage(error)}`;
        log.warn(gridWarning, { operation: 'grid' });
      }
    }

    const result = converter.convert(input.stories, input.elements);
    if (gridWarning) result.warnings.push(gridWarning);
    if (result.statistics.processingTimeMs > this.config.fallbackThresholdMs) {
      result.warnings.push(
        `Element-centric conversion took ${result.statistics.processingTimeMs.toFixed(0)}ms, ` +
        `over the ${this.config.fallbackThresholdMs}ms threshold`
      );
    }
    return result;
  }
}
