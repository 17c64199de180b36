/**
 * @smtkit/solver - SMT-LIB command layer
 *
 * Commands, sessions that send them, and the Z3 backend.
 */

export * from "./commands.js";
export * from "./errors.js";
export * from "./session.js";
export * from "./script-session.js";
export * from "./z3-session.js";
