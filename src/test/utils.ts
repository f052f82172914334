/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

import {mkdirSync, mkdtempSync, rmSync, writeFileSync} from 'node:fs';
import {tmpdir} from 'node:os';
import {join} from 'node:path';
import type {CliIo} from '../cli.js';

/**
 * A directory entry: a bare name, or a name with the file's contents.
 */
export type FixtureEntry = string | readonly [string, string | Uint8Array];

/**
 * Creates a temporary directory holding the given entries, runs `fn` with
 * its path, and removes it afterwards. Names ending in `/` become
 * subdirectories; bare names become a small JSON file.
 */
export function withFixtureDir<T>(
  entries: readonly FixtureEntry[],
  fn: (dir: string) => T,
): T {
  const dir = mkdtempSync(join(tmpdir(), 'json-conformance-gen-'));
  try {
    for (const entry of entries) {
      if (typeof entry !== 'string') {
        writeFileSync(join(dir, entry[0]), entry[1]);
      } else if (entry.endsWith('/')) {
        mkdirSync(join(dir, entry));
      } else {
        writeFileSync(join(dir, entry), '[]');
      }
    }
    return fn(dir);
  } finally {
    rmSync(dir, {recursive: true, force: true});
  }
}

export class CapturedIo implements CliIo {
  out = '';
  err = '';

  stdout(text: string): void {
    this.out += text;
  }
  stderr(text: string): void {
    this.err += text;
  }
}
