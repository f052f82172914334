/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

export {classify} from './classify.js';
export type {Category, Classification} from './classify.js';
export {
  proceduresFor,
  quote,
  renderPreamble,
  renderProcedure,
  TestSuiteEmitter,
} from './emit.js';
export type {EmissionBlock, Mode, TestProcedure} from './emit.js';
export {
  DuplicateIdentifierError,
  FixtureScanError,
  GeneratorError,
  InvalidIdentifierError,
} from './errors.js';
export {DEFAULT_OPTIONS, generateSuite, planSuite} from './generate.js';
export type {GeneratedSuite, GeneratorOptions, SuitePlan} from './generate.js';
export {isValidIdentifier, sanitize} from './sanitize.js';
export {scanFixtures} from './scan.js';
export type {FixtureFile} from './scan.js';
export {createProgram, run} from './cli.js';
export type {CliIo} from './cli.js';
