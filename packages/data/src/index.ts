/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @stb-ifc/data - Shared structural model types, builder contract, errors
 * and logging
 */

export * from './types.js';
export type { ElementBuilder, ElementCreator } from './builder.js';
export {
  ConversionError,
  UnclassifiableElementError,
  ElementCreationError,
  InvalidStoryDefinitionError,
  IntegrationModeError,
  UnsupportedModeError,
  ModelValidationError,
  errorMessage,
} from './errors.js';
export { createLogger, isDebugEnabled, type Logger, type LogContext, type LogLevel } from './logger.js';
