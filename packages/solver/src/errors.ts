/**
 * Session Error Types
 */

/**
 * The solver rejected a command. Carries the SMT-LIB text that was sent and
 * the raw response.
 */
export class SolverError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly response: string
  ) {
    super(message);
    this.name = "SolverError";
  }
}

/**
 * Thrown when popping more assertion levels than were pushed.
 */
export class ScopeError extends Error {
  constructor(
    public readonly requested: number,
    public readonly depth: number
  ) {
    super(`Cannot pop ${requested} level(s): only ${depth} pushed`);
    this.name = "ScopeError";
  }
}

/**
 * Thrown by any command issued after `dispose()`.
 */
export class SessionDisposedError extends Error {
  constructor(command: string) {
    super(`Session is disposed; cannot run ${command}`);
    this.name = "SessionDisposedError";
  }
}

const ERROR_RESPONSE_RE = /\(error\s+"((?:[^"]|"")*)"\)/;

/**
 * Extract the message of the first `(error "...")` in a solver response.
 */
export function parseErrorResponse(response: string): string | undefined {
  const match = ERROR_RESPONSE_RE.exec(response);
  return match ? match[1].replace(/""/g, '"') : undefined;
}
