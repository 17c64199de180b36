/**
 * In-process session that records commands without a solver behind it.
 *
 * Useful for inspecting what a definition sends, and as a stand-in solver in
 * tests: a `responder` can answer individual commands.
 */

import type { Command } from "./commands.js";
import { SolverError, parseErrorResponse } from "./errors.js";
import { BaseSession, type SessionOptions } from "./session.js";

/**
 * Answers one command. Returning `undefined` falls back to the default
 * response; returning an `(error "...")` response makes the command fail.
 */
export type Responder = (
  command: Command,
  text: string
) => string | undefined | Promise<string | undefined>;

export interface ScriptSessionOptions extends SessionOptions {
  responder?: Responder;
}

export class ScriptSession extends BaseSession {
  private readonly responder: Responder | undefined;

  constructor(options: ScriptSessionOptions = {}) {
    super(options);
    this.responder = options.responder;
  }

  protected async send(command: Command, text: string): Promise<string> {
    const answer = this.responder ? await this.responder(command, text) : undefined;
    const response = answer ?? defaultResponse(command);
    const error = parseErrorResponse(response);
    if (error !== undefined) {
      throw new SolverError(error, text, response);
    }
    return response;
  }

  protected async close(): Promise<void> {
    // nothing to release
  }
}

function defaultResponse(command: Command): string {
  return command.kind === "check-sat" ? "unknown" : "";
}
