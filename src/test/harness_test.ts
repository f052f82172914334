/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

import * as assert from 'node:assert/strict';
import {spawnSync} from 'node:child_process';
import {readFileSync} from 'node:fs';
import {join} from 'node:path';
import {suite, test} from 'node:test';
import {run} from '../cli.js';
import {CapturedIo, type FixtureEntry, withFixtureDir} from './utils.js';

/**
 * Source of a parser module backed by JSON.parse. It records the characters
 * and spans it was given in `<fixture>.chars` so tests can inspect them.
 */
function parserSource(strictAcceptsInvalidCodepoints: boolean): string {
  return `import {writeFileSync} from 'node:fs';

export class Options {
  constructor(acceptInvalidCodepoints) {
    this.acceptInvalidCodepoints = acceptInvalidCodepoints;
  }
  static strict() {
    return new Options(${strictAcceptsInvalidCodepoints});
  }
  static flexible() {
    return new Options(true);
  }
}

export function parse(filename, chars) {
  const seen = [...chars];
  writeFileSync(filename + '.chars', JSON.stringify(seen));
  try {
    return {ok: true, value: JSON.parse(seen.map(([c]) => c).join(''))};
  } catch (error) {
    return {ok: false, error};
  }
}
`;
}

function fixtures(strictAcceptsInvalidCodepoints: boolean): FixtureEntry[] {
  return [
    ['package.json', '{"type": "module"}'],
    ['fake_parser.mjs', parserSource(strictAcceptsInvalidCodepoints)],
    ['y_ok.json', '[1]'],
    ['n_bad.json', '[1,]'],
    ['i_invalid_utf8.json', new Uint8Array([0x5b, 0x22, 0xff, 0x22, 0x5d])],
    ['y_spans.json', '["é😀"]'],
  ];
}

/**
 * Generates a suite for `dir`, runs it in a fresh node:test process and
 * returns the TAP result lines.
 */
function generateAndRun(dir: string): string[] {
  const suitePath = join(dir, 'parse_test.ts');
  const io = new CapturedIo();
  const args = ['-i', dir, '-o', suitePath, '-p', './fake_parser.mjs', '-q'];
  assert.equal(run(args, io), 0, io.err);

  const env = {...process.env};
  // Otherwise the nested runner reports to this one instead of printing TAP.
  delete env['NODE_TEST_CONTEXT'];
  const result = spawnSync(
    process.execPath,
    ['--import', 'tsx', '--test', '--test-reporter=tap', suitePath],
    {encoding: 'utf8', env, timeout: 60000},
  );
  return result.stdout
    .split('\n')
    .filter((line) => line.startsWith('ok ') || line.startsWith('not ok '));
}

function readChars(path: string): unknown {
  return JSON.parse(readFileSync(`${path}.chars`, 'utf8'));
}

suite('generated harness', () => {
  test('passes against a conforming parser', () => {
    withFixtureDir(fixtures(false), (dir) => {
      assert.deepEqual(generateAndRun(dir), [
        'ok 1 - flexible_i_invalid_utf8',
        'ok 2 - strict_i_invalid_utf8',
        'ok 3 - n_bad',
        'ok 4 - y_ok',
        'ok 5 - y_spans',
      ]);
    });
  });

  test('feeds each code point with its UTF-8 byte span', () => {
    withFixtureDir(fixtures(false), (dir) => {
      generateAndRun(dir);
      assert.deepEqual(readChars(join(dir, 'y_spans.json')), [
        ['[', {start: 0, end: 1}],
        ['"', {start: 1, end: 2}],
        ['é', {start: 2, end: 4}],
        ['😀', {start: 4, end: 8}],
        ['"', {start: 8, end: 9}],
        [']', {start: 9, end: 10}],
      ]);
    });
  });

  test('substitutes U+FFFD for invalid UTF-8 in flexible mode', () => {
    withFixtureDir(fixtures(false), (dir) => {
      generateAndRun(dir);
      assert.deepEqual(readChars(join(dir, 'i_invalid_utf8.json')), [
        ['[', {start: 0, end: 1}],
        ['"', {start: 1, end: 2}],
        ['\uFFFD', {start: 2, end: 5}],
        ['"', {start: 5, end: 6}],
        [']', {start: 6, end: 7}],
      ]);
    });
  });

  test('decodes strictly according to the parser options', () => {
    withFixtureDir(fixtures(true), (dir) => {
      assert.deepEqual(generateAndRun(dir), [
        'ok 1 - flexible_i_invalid_utf8',
        'not ok 2 - strict_i_invalid_utf8',
        'ok 3 - n_bad',
        'ok 4 - y_ok',
        'ok 5 - y_spans',
      ]);
    });
  });
});
