/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

import * as path from 'node:path';

/**
 * The conformance class of a fixture.
 *
 * - `Y`: must be accepted by a strict parser.
 * - `N`: must be rejected by a strict parser.
 * - `I`: implementation defined. Must be accepted in flexible mode and
 *   rejected in strict mode.
 */
export type Category = 'Y' | 'N' | 'I';

export interface Classification {
  readonly category: Category;
  /** The base name without its `.json` suffix, prefix included. */
  readonly stem: string;
}

const fixtureName = /^([yni])_.*\.json$/s;

function categoryForPrefix(prefix: string): Category | undefined {
  switch (prefix) {
    case 'y':
      return 'Y';
    case 'n':
      return 'N';
    case 'i':
      return 'I';
    default:
      return undefined;
  }
}

/**
 * Derives a fixture's category from the last component of its path.
 *
 * Returns undefined for anything that isn't exactly `y_*.json`, `n_*.json`
 * or `i_*.json`. Matching is case sensitive.
 */
export function classify(filePath: string): Classification | undefined {
  const baseName = path.basename(filePath);
  const match = fixtureName.exec(baseName);
  if (match === null) {
    return undefined;
  }
  const category = categoryForPrefix(match[1] ?? '');
  if (category === undefined) {
    return undefined;
  }
  return {category, stem: baseName.slice(0, -'.json'.length)};
}
