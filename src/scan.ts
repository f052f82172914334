/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

import {type Dirent, readdirSync, statSync} from 'node:fs';
import * as path from 'node:path';
import {FixtureScanError} from './errors.js';

export interface FixtureFile {
  readonly path: string;
  readonly baseName: string;
}

function isLinkToDirectory(entry: Dirent, entryPath: string): boolean {
  if (!entry.isSymbolicLink()) {
    return false;
  }
  // Dangling links are kept; the generated test reports them when it runs.
  return statSync(entryPath, {throwIfNoEntry: false})?.isDirectory() ?? false;
}

/**
 * Lists the files directly inside `directory`, without recursing.
 * Subdirectories, and symbolic links that resolve to one, are left out.
 *
 * Entries come back in whatever order the file system reports them.
 * Throws a FixtureScanError if the directory can't be read.
 */
export function scanFixtures(directory: string): FixtureFile[] {
  let entries;
  try {
    entries = readdirSync(directory, {withFileTypes: true});
  } catch (e) {
    throw new FixtureScanError(directory, e);
  }
  const fixtures: FixtureFile[] = [];
  for (const entry of entries) {
    const entryPath = path.join(directory, entry.name);
    let skip;
    try {
      skip = entry.isDirectory() || isLinkToDirectory(entry, entryPath);
    } catch (e) {
      throw new FixtureScanError(directory, e);
    }
    if (!skip) {
      fixtures.push({path: entryPath, baseName: entry.name});
    }
  }
  return fixtures;
}
