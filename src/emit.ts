/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

import * as path from 'node:path';
import type {Category} from './classify.js';

/**
 * One fixture's worth of generated output.
 */
export interface EmissionBlock {
  readonly identifier: string;
  readonly category: Category;
  readonly filePath: string;
}

export type Mode = 'strict' | 'flexible';

/**
 * A single generated test: parse `filePath` in `mode` and expect the parser
 * to either accept or reject it.
 */
export interface TestProcedure {
  readonly name: string;
  readonly filePath: string;
  readonly mode: Mode;
  readonly expectation: 'accept' | 'reject';
}

export function proceduresFor(block: EmissionBlock): TestProcedure[] {
  const {identifier, filePath} = block;
  switch (block.category) {
    case 'Y':
      return [
        {name: identifier, filePath, mode: 'strict', expectation: 'accept'},
      ];
    case 'N':
      return [
        {name: identifier, filePath, mode: 'strict', expectation: 'reject'},
      ];
    case 'I':
      return [
        {
          name: `flexible_${identifier}`,
          filePath,
          mode: 'flexible',
          expectation: 'accept',
        },
        {
          name: `strict_${identifier}`,
          filePath,
          mode: 'strict',
          expectation: 'reject',
        },
      ];
    default: {
      const never: never = block.category;
      throw new Error(`Unreachable: ${JSON.stringify(never)}`);
    }
  }
}

const escapes: Record<string, string> = {
  '\\': '\\\\',
  "'": "\\'",
  '\n': '\\n',
  '\r': '\\r',
  '\u2028': '\\u2028',
  '\u2029': '\\u2029',
};

/**
 * Renders `text` as a single-quoted TypeScript string literal.
 */
export function quote(text: string): string {
  return `'${text.replace(/[\\'\n\r\u2028\u2029]/g, (c) => escapes[c] ?? c)}'`;
}

/**
 * Fixture paths are embedded with forward slashes so the generated module
 * reads the same on every platform.
 */
function portablePath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

export function renderPreamble(parserModule: string): string {
  return `// Generated by json-conformance-gen. Do not edit.

import * as assert from 'node:assert/strict';
import {readFileSync} from 'node:fs';
import {test} from 'node:test';
import {Options, parse} from ${quote(parserModule)};

interface Span {
  start: number;
  end: number;
}

function* decodedChars(input: string): IterableIterator<[string, Span]> {
  let offset = 0;
  for (const char of input) {
    const end = offset + Buffer.byteLength(char, 'utf8');
    yield [char, {start: offset, end}];
    offset = end;
  }
}

function check(filename: string, options: Options): void {
  const buffer = readFileSync(filename);
  const input = new TextDecoder('utf-8', {
    fatal: !options.acceptInvalidCodepoints,
    ignoreBOM: true,
  }).decode(buffer);
  const result = parse(filename, decodedChars(input), options);
  if (!result.ok) {
    throw new Error(\`parse error in \${filename}\`, {cause: result.error});
  }
}
`;
}

export function renderProcedure(procedure: TestProcedure): string {
  const filePath = quote(portablePath(procedure.filePath));
  const call = `check(${filePath}, Options.${procedure.mode}())`;
  const body =
    procedure.expectation === 'accept' ? call : `assert.throws(() => ${call})`;
  return `test(${quote(procedure.name)}, () => {
  ${body};
});
`;
}

/**
 * Accumulates the text of a generated test module: the preamble, then one
 * or two procedures per emission block in the order they're added.
 */
export class TestSuiteEmitter {
  private readonly chunks: string[];
  private procedureCount = 0;

  constructor(parserModule: string) {
    this.chunks = [renderPreamble(parserModule)];
  }

  add(block: EmissionBlock): this {
    for (const procedure of proceduresFor(block)) {
      this.chunks.push('\n', renderProcedure(procedure));
      this.procedureCount++;
    }
    return this;
  }

  get testCount(): number {
    return this.procedureCount;
  }

  toString(): string {
    return this.chunks.join('');
  }
}
