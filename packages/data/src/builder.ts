/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Element builder contract.
 *
 * The converter never builds output entities itself. It hands definitions to
 * a builder and keeps the opaque handles it gets back (`H`, e.g. an IFC
 * express id). Handles are owned by the builder.
 */

import type {
  AxisDefinition,
  ConvertedDefinition,
  ElementType,
  StoryDefinition,
} from './types.js';

/** Turns one definition of a single element type into a built element */
export interface ElementCreator<H> {
  /** @throws ElementCreationError on malformed geometry or section data */
  create(definition: ConvertedDefinition): H;
}

export interface ElementBuilder<H> {
  /** Creator for an element type, or undefined when the type is not supported */
  getCreator(type: ElementType): ElementCreator<H> | undefined;

  /** Create the output-side story for a story definition */
  materializeStory(story: StoryDefinition): H;

  /** Create one containment relationship between a story and many elements */
  createSpatialRelationship(story: H, elements: readonly H[]): H;

  /** Create a structural grid from axis lines */
  createGrid(axes: readonly AxisDefinition[]): H;

  /** Discard everything built so far */
  reset(): void;
}
