/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Conversion error taxonomy
 *
 * Recoverable per-element errors (UnclassifiableElementError,
 * ElementCreationError) are caught by the converter and folded into
 * statistics and warnings. The others end a run.
 */

import type { ElementType } from './types.js';

export class ConversionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversionError';
  }
}

/** All three story analysis stages failed for an element */
export class UnclassifiableElementError extends ConversionError {
  constructor(
    public readonly elementId: string,
    public readonly elementType: ElementType
  ) {
    super(`Element ${elementId} (${elementType}) could not be assigned to a story: no floor attribute, mapped anchor node or contained Z coordinate`);
    this.name = 'UnclassifiableElementError';
  }
}

/** The element builder rejected a definition */
export class ElementCreationError extends ConversionError {
  constructor(
    message: string,
    public readonly elementId?: string,
    public readonly elementType?: ElementType
  ) {
    super(message);
    this.name = 'ElementCreationError';
  }
}

/** The story list cannot be turned into vertical intervals */
export class InvalidStoryDefinitionError extends ConversionError {
  constructor(
    message: string,
    public readonly storyName?: string
  ) {
    super(message);
    this.name = 'InvalidStoryDefinitionError';
  }
}

/** A conversion mode failed and its fallback failed too */
export class IntegrationModeError extends ConversionError {
  constructor(
    message: string,
    public readonly primaryError: string,
    public readonly fallbackError?: string
  ) {
    super(message);
    this.name = 'IntegrationModeError';
  }
}

/** Configuration named a mode that does not exist */
export class UnsupportedModeError extends ConversionError {
  constructor(public readonly mode: string) {
    super(`Unsupported conversion mode: "${mode}"`);
    this.name = 'UnsupportedModeError';
  }
}

/** A model document failed schema validation */
export class ModelValidationError extends ConversionError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ModelValidationError';
  }
}

/** Message of an unknown thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
