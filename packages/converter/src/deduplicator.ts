/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Duplicate element suppression.
 *
 * Checks run in a fixed order and the first hit wins:
 *   1. id already seen
 *   2. display name already seen
 *   3. content hash (positions, sections, node references) already seen
 *
 * The registries are shared by every batch of one conversion run and only
 * grow during it. `reset()` starts a new run.
 */

import { createHash } from 'crypto';
import { createLogger, type ElementDefinition } from '@stb-ifc/data';

const log = createLogger('Deduplicator');

export type DuplicateStage = 'id' | 'name' | 'hash';

export type DedupeDecision =
  | { unique: true }
  | { unique: false; stage: DuplicateStage; key: string };

const NAME_FIELDS = ['name', 'stbSectionName', 'sectionName', 'id'] as const;

const POSITION_FIELDS = ['startPoint', 'endPoint', 'bottomPoint', 'topPoint', 'centerPoint', 'point', 'position'] as const;
const SECTION_FIELDS = ['sectionName', 'stbSectionName', 'sectionId'] as const;
const NODE_FIELDS = ['startNodeId', 'endNodeId', 'bottomNodeId', 'topNodeId', 'primaryNodeId', 'nodeIds'] as const;

const HASH_FIELDS = [...POSITION_FIELDS, ...SECTION_FIELDS, ...NODE_FIELDS] as const;

/** First present of name, section name, id */
export function displayName(definition: ElementDefinition): string | undefined {
  for (const field of NAME_FIELDS) {
    const value = definition[field];
    if (value) return value;
  }
  return undefined;
}

/**
 * SHA-256 over the position, section and node fields, in that order.
 * Returns undefined when the definition carries none of them.
 */
export function contentHash(definition: ElementDefinition): string | undefined {
  const parts: string[] = [];
  for (const field of HASH_FIELDS) {
    const value = definition[field];
    if (value !== undefined) {
      parts.push(`${field}=${JSON.stringify(value)}`);
    }
  }
  if (parts.length === 0) return undefined;
  return createHash('sha256').update(parts.join('|'), 'utf8').digest('hex');
}

export class Deduplicator {
  private readonly seenIds = new Set<string>();
  private readonly seenNames = new Set<string>();
  private readonly seenHashes = new Set<string>();
  private readonly stageCounts: Record<DuplicateStage, number> = { id: 0, name: 0, hash: 0 };

  /**
   * Decide whether a definition is new. A new definition's id, name and hash
   * are registered together; a duplicate registers nothing.
   */
  check(definition: ElementDefinition): DedupeDecision {
    const id = definition.id;
    if (id && this.seenIds.has(id)) {
      return this.duplicate('id', id);
    }

    const name = displayName(definition);
    if (name && this.seenNames.has(name)) {
      return this.duplicate('name', name);
    }

    const hash = contentHash(definition);
    if (hash && this.seenHashes.has(hash)) {
      return this.duplicate('hash', hash);
    }

    if (id) this.seenIds.add(id);
    if (name) this.seenNames.add(name);
    if (hash) this.seenHashes.add(hash);
    return { unique: true };
  }

  /** Unique subset of a batch, in input order */
  dedupe<T extends ElementDefinition>(definitions: readonly T[]): T[] {
    const unique = definitions.filter(definition => {
      const decision = this.check(definition);
      if (!decision.unique) {
        log.debug(`Skipping ${decision.stage} duplicate`, decision.key.slice(0, 16), {
          operation: 'dedupe',
          elementId: definition.id,
        });
      }
      return decision.unique;
    });

    const skipped = definitions.length - unique.length;
    if (skipped > 0) {
      log.info(`Removed ${skipped} duplicates (id: ${this.stageCounts.id}, name: ${this.stageCounts.name}, hash: ${this.stageCounts.hash} so far)`);
    }
    return unique;
  }

  /** Duplicates found per stage since the last reset */
  get duplicatesByStage(): Readonly<Record<DuplicateStage, number>> {
    return { ...this.stageCounts };
  }

  get registrySizes(): { ids: number; names: number; hashes: number } {
    return { ids: this.seenIds.size, names: this.seenNames.size, hashes: this.seenHashes.size };
  }

  reset(): void {
    this.seenIds.clear();
    this.seenNames.clear();
    this.seenHashes.clear();
    this.stageCounts.id = 0;
    this.stageCounts.name = 0;
    this.stageCounts.hash = 0;
  }

  private duplicate(stage: DuplicateStage, key: string): DedupeDecision {
    this.stageCounts[stage]++;
    return { unique: false, stage, key };
  }
}
