/**
 * Run-time expansion target: definitions become `declare-fun` and `assert`
 * commands over `@smtkit/terms` values.
 */

import type { Sort, Term } from "@smtkit/terms";
import { app, eq, forall, sym } from "@smtkit/terms";
import type { AssertCommand, DeclareFunCommand } from "@smtkit/solver";
import { assertCommand, declareFunCommand } from "@smtkit/solver";
import type { ExpansionTarget } from "./expand.js";

export const commandTarget: ExpansionTarget<Term, Sort, DeclareFunCommand, AssertCommand> = {
  variable: (name) => sym(name),
  apply: (name, args) => app(name, ...args),
  eq: (left, right) => eq(left, right),
  forall: (params, body) => forall(params, body),
  declareFun: (name, argSorts, result) => declareFunCommand(name, argSorts, result),
  assert: (formula) => assertCommand(formula),
};
