/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @stb-ifc/converter - Element-to-story classification and integration
 *
 * ```ts
 * import { IntegrationService, loadIntegrationConfig } from '@stb-ifc/converter';
 *
 * const service = new IntegrationService(loadIntegrationConfig());
 * const result = service.convert(model, builder);
 * ```
 */

export { StoryIndex, DEFAULT_STORY_HEIGHT, type StoryInterval } from './story-index.js';

export {
  StoryAnalyzer,
  DEFAULT_ANCHOR_RULES,
  floorAttributeStage,
  nodeReferenceStage,
  coordinateStage,
  anchorNodeIds,
  representativeZ,
  describeElement,
  type AnalysisEvidence,
  type AnalysisResult,
  type AnchorRef,
  type AnchorRules,
  type BatchClassification,
  type ClassificationStage,
  type StoryAnalyzerOptions,
} from './story-analyzer.js';

export {
  Deduplicator,
  contentHash,
  displayName,
  type DedupeDecision,
  type DuplicateStage,
} from './deduplicator.js';

export {
  RelationshipManager,
  LOW_CONFIDENCE_THRESHOLD,
  type StoryStatistics,
  type ValidationResult,
} from './relationship-manager.js';

export {
  ElementCentricConverter,
  defaultClock,
  type Clock,
  type ElementCentricConverterOptions,
} from './element-centric-converter.js';

export {
  LegacyStoryConverter,
  FALLBACK_STORY_NAME,
  type LegacyConverter,
} from './legacy-story-converter.js';

export {
  IntegrationService,
  AUTO_MODE_LIMITS,
  evaluateQuality,
  selectMode,
  type ConversionRecord,
  type IntegrationServiceOptions,
  type IntegrationStatistics,
  type PerformanceComparison,
  type StrategyMeasurement,
} from './integration-service.js';

export {
  CONFIG_ENV_VARS,
  CONVERSION_MODES,
  DEFAULT_INTEGRATION_CONFIG,
  loadIntegrationConfig,
  parseMode,
  validateConfig,
  type ConversionMode,
  type IntegrationConfig,
  type LoadConfigOptions,
  type StrategyMode,
} from './config.js';
