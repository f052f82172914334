/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

/**
 * Base class for every error that aborts a generation run.
 */
export class GeneratorError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FixtureScanError extends GeneratorError {
  readonly directory: string;

  constructor(directory: string, cause: unknown) {
    super(
      `Could not read fixture directory ${directory}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      {cause},
    );
    this.directory = directory;
  }
}

/**
 * A fixture name that sanitizes to something that is not a valid test
 * identifier. Unknown punctuation is rejected rather than guessed at.
 */
export class InvalidIdentifierError extends GeneratorError {
  readonly fixturePath: string;
  readonly identifier: string;

  constructor(fixturePath: string, identifier: string) {
    super(
      `Fixture ${fixturePath} produces the invalid test identifier ${JSON.stringify(identifier)}`,
    );
    this.fixturePath = fixturePath;
    this.identifier = identifier;
  }
}

export class DuplicateIdentifierError extends GeneratorError {
  readonly identifier: string;
  readonly fixturePaths: readonly [string, string];

  constructor(identifier: string, first: string, second: string) {
    super(
      `Fixtures ${first} and ${second} both produce the test identifier ${identifier}`,
    );
    this.identifier = identifier;
    this.fixturePaths = [first, second];
  }
}
