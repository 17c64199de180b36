/**
 * A definition form that does not have the shape
 * `(name, [[param, sort], ...], result, body)`.
 *
 * Raised before anything is sent to a solver.
 */
export class DefinitionSyntaxError extends Error {
  constructor(
    /** Where in the form matching failed, e.g. "params[1]" */
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`Malformed definition at ${path}: ${reason}`);
    this.name = "DefinitionSyntaxError";
  }
}
