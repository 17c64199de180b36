/**
 * Thrown when a term cannot be built or rendered: non-finite numerals,
 * empty or unquotable symbols, binders without variables.
 */
export class TermError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TermError";
  }
}
