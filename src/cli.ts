/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

import {readFileSync, writeFileSync} from 'node:fs';
import {Command, CommanderError} from 'commander';
import {GeneratorError} from './errors.js';
import {
  DEFAULT_OPTIONS,
  type GeneratedSuite,
  generateSuite,
} from './generate.js';

/**
 * Where the CLI writes. Generated source goes to `stdout`; everything else,
 * including commander's usage errors, goes to `stderr`.
 */
export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

const consoleIo: CliIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    console.error(text.replace(/\n$/, ''));
  },
};

type CliOptions = {
  input: string;
  output?: string;
  parser: string;
  check?: boolean;
  quiet?: boolean;
};

export function createProgram(io: CliIo): Command {
  return new Command()
    .name('json-conformance-gen')
    .description(
      'Generate node:test conformance tests for a JSON parser from y_/n_/i_ fixture files',
    )
    .option('-i, --input <dir>', 'fixture directory', DEFAULT_OPTIONS.inputDir)
    .option(
      '-o, --output <file>',
      'write the suite to a file instead of stdout',
    )
    .option(
      '-p, --parser <module>',
      'module the generated tests import parse and Options from',
      DEFAULT_OPTIONS.parserModule,
    )
    .option(
      '--check',
      'fail if --output is not up to date instead of writing it',
    )
    .option('-q, --quiet', 'do not print a summary')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });
}

function readExisting(file: string): string | undefined {
  try {
    return readFileSync(file, 'utf8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      return undefined;
    }
    throw new GeneratorError(`Could not read ${file}`, {cause: e});
  }
}

function write(file: string, text: string) {
  try {
    writeFileSync(file, text);
  } catch (e) {
    throw new GeneratorError(`Could not write ${file}`, {cause: e});
  }
}

function summarize(suite: GeneratedSuite): string {
  return `generated ${suite.testCount} tests from ${suite.blocks.length} fixtures (${suite.skipped.length} skipped)\n`;
}

function execute(options: CliOptions, io: CliIo): number {
  if (options.check && options.output === undefined) {
    io.stderr('error: --check requires --output\n');
    return 1;
  }
  const suite = generateSuite({
    inputDir: options.input,
    parserModule: options.parser,
  });
  if (options.output === undefined) {
    io.stdout(suite.text);
  } else if (options.check) {
    if (readExisting(options.output) !== suite.text) {
      io.stderr(
        `error: ${options.output} is out of date, run without --check to regenerate it\n`,
      );
      return 1;
    }
    if (!options.quiet) {
      io.stderr(`${options.output} is up to date\n`);
    }
    return 0;
  } else {
    write(options.output, suite.text);
  }
  if (!options.quiet) {
    io.stderr(summarize(suite));
  }
  return 0;
}

/**
 * Runs the generator with command line arguments (not including the node
 * binary and script) and returns the process exit code.
 */
export function run(argv: readonly string[], io: CliIo = consoleIo): number {
  const program = createProgram(io);
  try {
    program.parse([...argv], {from: 'user'});
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode;
    }
    throw e;
  }
  try {
    return execute(program.opts<CliOptions>(), io);
  } catch (e) {
    if (e instanceof GeneratorError) {
      io.stderr(`error: ${e.message}\n`);
      return 1;
    }
    throw e;
  }
}
