/**
 * @license
 * Copyright Google LLC
 * SPDX-License-Identifier: BSD-3-Clause
 */

/**
 * Turns a fixture stem into a test identifier.
 *
 * The substitutions run in order; later steps clean up the underscores that
 * earlier ones introduce. The result is stable under a second application.
 *
 * Characters other than letters, digits and `._+#-` are left alone, so the
 * result isn't guaranteed to be a valid identifier. Check it with
 * isValidIdentifier.
 */
export function sanitize(text: string): string {
  return text
    .replaceAll('UTF-8', 'utf8')
    .replaceAll('U+', 'u')
    .replaceAll('+', '_plus_')
    .replaceAll('-', '_minus_')
    .replace(/[.#]/g, '_')
    .replace(/_+/g, '_')
    .toLowerCase();
}

const identifier = /^[a-z_][a-z0-9_]*$/;

export function isValidIdentifier(text: string): boolean {
  return identifier.test(text);
}
