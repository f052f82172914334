/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

import {classify} from './classify.js';
import {type EmissionBlock, TestSuiteEmitter} from './emit.js';
import {DuplicateIdentifierError, InvalidIdentifierError} from './errors.js';
import {isValidIdentifier, sanitize} from './sanitize.js';
import {type FixtureFile, scanFixtures} from './scan.js';

export interface GeneratorOptions {
  /**
   * The directory holding the `y_`, `n_` and `i_` fixtures. Relative paths
   * resolve against the working directory, and fixture paths are embedded in
   * the generated tests as scanned, so the generated suite must run from the
   * same directory.
   */
  inputDir?: string;
  /**
   * The module specifier the generated tests import `parse` and `Options`
   * from.
   */
  parserModule?: string;
}

export const DEFAULT_OPTIONS: Readonly<Required<GeneratorOptions>> = {
  inputDir: 'tests/inputs',
  parserModule: '../src/index.js',
};

export interface SuitePlan {
  /** Emission blocks, sorted by fixture path. */
  blocks: EmissionBlock[];
  /** Paths of scanned files that aren't fixtures, sorted. */
  skipped: string[];
}

export interface GeneratedSuite extends SuitePlan {
  text: string;
  testCount: number;
}

function byPath(a: FixtureFile, b: FixtureFile): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/**
 * Classifies and names the given fixtures.
 *
 * Fixtures are sorted by path first, so the plan doesn't depend on the order
 * the directory listing came back in. Throws if a fixture's identifier is
 * invalid or collides with another's.
 */
export function planSuite(fixtures: Iterable<FixtureFile>): SuitePlan {
  const blocks: EmissionBlock[] = [];
  const skipped: string[] = [];
  const owners = new Map<string, string>();
  for (const fixture of [...fixtures].sort(byPath)) {
    const classification = classify(fixture.path);
    if (classification === undefined) {
      skipped.push(fixture.path);
      continue;
    }
    const identifier = sanitize(classification.stem);
    if (!isValidIdentifier(identifier)) {
      throw new InvalidIdentifierError(fixture.path, identifier);
    }
    const owner = owners.get(identifier);
    if (owner !== undefined) {
      throw new DuplicateIdentifierError(identifier, owner, fixture.path);
    }
    owners.set(identifier, fixture.path);
    blocks.push({
      identifier,
      category: classification.category,
      filePath: fixture.path,
    });
  }
  return {blocks, skipped};
}

/**
 * Scans `inputDir` and renders a complete test module for it.
 */
export function generateSuite(options?: GeneratorOptions): GeneratedSuite {
  const inputDir = options?.inputDir ?? DEFAULT_OPTIONS.inputDir;
  const parserModule = options?.parserModule ?? DEFAULT_OPTIONS.parserModule;
  const plan = planSuite(scanFixtures(inputDir));
  const emitter = new TestSuiteEmitter(parserModule);
  for (const block of plan.blocks) {
    emitter.add(block);
  }
  return {...plan, text: emitter.toString(), testCount: emitter.testCount};
}
