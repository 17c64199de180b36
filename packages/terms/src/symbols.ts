/**
 * SMT-LIB symbol lexing rules.
 */

import { TermError } from "./errors.js";

const SIMPLE_SYMBOL_RE = /^[A-Za-z~!@$%^&*_\-+=<>.?/][A-Za-z0-9~!@$%^&*_\-+=<>.?/]*$/;

/** Reserved words of SMT-LIB 2.6; they can only appear as symbols when quoted. */
const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "!",
  "_",
  "as",
  "BINARY",
  "DECIMAL",
  "exists",
  "forall",
  "HEXADECIMAL",
  "let",
  "match",
  "NUMERAL",
  "par",
  "STRING",
]);

export function isSimpleSymbol(name: string): boolean {
  return SIMPLE_SYMBOL_RE.test(name) && !RESERVED_WORDS.has(name);
}

/**
 * Whether `name` can be written as an SMT-LIB symbol, bare or quoted.
 */
export function isWritableSymbol(name: string): boolean {
  return name.length > 0 && (isSimpleSymbol(name) || !/[|\\]/.test(name));
}

/**
 * Render a user symbol, quoting it with `|...|` when it is not simple.
 *
 * @throws {TermError} If the name is empty or contains `|` or `\`
 */
export function renderSymbol(name: string): string {
  if (name.length === 0) {
    throw new TermError("Symbol name must be non-empty");
  }
  if (isSimpleSymbol(name)) {
    return name;
  }
  if (/[|\\]/.test(name)) {
    throw new TermError(`Symbol '${name}' cannot be quoted: it contains '|' or '\\'`);
  }
  return `|${name}|`;
}
