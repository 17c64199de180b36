/**
 * SMT-LIB Commands
 *
 * One variant per command the sessions speak. Every command renders to a
 * single line of SMT-LIB 2.
 */

import type { Sort, Term } from "@smtkit/terms";
import { renderSymbol, sortToSmtLib, toSmtLib } from "@smtkit/terms";

// ============================================================================
// Command Types
// ============================================================================

export type OptionValue = boolean | number | string;

export interface SetLogicCommand {
  readonly kind: "set-logic";
  readonly logic: string;
}

export interface SetOptionCommand {
  readonly kind: "set-option";
  /** Option keyword without the leading colon, e.g. "produce-models" */
  readonly option: string;
  readonly value: OptionValue;
}

export interface DeclareSortCommand {
  readonly kind: "declare-sort";
  readonly name: string;
  readonly arity: number;
}

export interface DeclareFunCommand {
  readonly kind: "declare-fun";
  readonly name: string;
  readonly argSorts: readonly Sort[];
  readonly resultSort: Sort;
}

export interface DeclareConstCommand {
  readonly kind: "declare-const";
  readonly name: string;
  readonly sort: Sort;
}

export interface AssertCommand {
  readonly kind: "assert";
  readonly formula: Term;
}

export interface PushCommand {
  readonly kind: "push";
  readonly levels: number;
}

export interface PopCommand {
  readonly kind: "pop";
  readonly levels: number;
}

export interface CheckSatCommand {
  readonly kind: "check-sat";
}

export interface GetModelCommand {
  readonly kind: "get-model";
}

export interface GetValueCommand {
  readonly kind: "get-value";
  readonly terms: readonly Term[];
}

export interface ResetCommand {
  readonly kind: "reset";
}

export type Command =
  | SetLogicCommand
  | SetOptionCommand
  | DeclareSortCommand
  | DeclareFunCommand
  | DeclareConstCommand
  | AssertCommand
  | PushCommand
  | PopCommand
  | CheckSatCommand
  | GetModelCommand
  | GetValueCommand
  | ResetCommand;

export type CommandKind = Command["kind"];

// ============================================================================
// Constructors
// ============================================================================

export function setLogicCommand(logic: string): SetLogicCommand {
  return { kind: "set-logic", logic };
}

export function setOptionCommand(option: string, value: OptionValue): SetOptionCommand {
  return { kind: "set-option", option: option.replace(/^:/, ""), value };
}

export function declareSortCommand(name: string, arity = 0): DeclareSortCommand {
  if (!Number.isInteger(arity) || arity < 0) {
    throw new RangeError(`Sort arity must be a non-negative integer, got ${arity}`);
  }
  return { kind: "declare-sort", name, arity };
}

export function declareFunCommand(
  name: string,
  argSorts: readonly Sort[],
  resultSort: Sort
): DeclareFunCommand {
  return { kind: "declare-fun", name, argSorts, resultSort };
}

export function declareConstCommand(name: string, sort: Sort): DeclareConstCommand {
  return { kind: "declare-const", name, sort };
}

export function assertCommand(formula: Term): AssertCommand {
  return { kind: "assert", formula };
}

export function pushCommand(levels = 1): PushCommand {
  return { kind: "push", levels: checkLevels(levels) };
}

export function popCommand(levels = 1): PopCommand {
  return { kind: "pop", levels: checkLevels(levels) };
}

export const checkSatCommand: CheckSatCommand = { kind: "check-sat" };

export const getModelCommand: GetModelCommand = { kind: "get-model" };

export function getValueCommand(terms: readonly Term[]): GetValueCommand {
  if (terms.length === 0) {
    throw new RangeError("get-value needs at least one term");
  }
  return { kind: "get-value", terms };
}

export const resetCommand: ResetCommand = { kind: "reset" };

function checkLevels(levels: number): number {
  if (!Number.isInteger(levels) || levels < 0) {
    throw new RangeError(`Scope levels must be a non-negative integer, got ${levels}`);
  }
  return levels;
}

// ============================================================================
// Rendering
// ============================================================================

export function renderCommand(command: Command): string {
  switch (command.kind) {
    case "set-logic":
      return `(set-logic ${renderSymbol(command.logic)})`;
    case "set-option":
      return `(set-option :${command.option} ${renderOptionValue(command.value)})`;
    case "declare-sort":
      return `(declare-sort ${renderSymbol(command.name)} ${command.arity})`;
    case "declare-fun":
      return `(declare-fun ${renderSymbol(command.name)} (${command.argSorts
        .map(sortToSmtLib)
        .join(" ")}) ${sortToSmtLib(command.resultSort)})`;
    case "declare-const":
      return `(declare-const ${renderSymbol(command.name)} ${sortToSmtLib(command.sort)})`;
    case "assert":
      return `(assert ${toSmtLib(command.formula)})`;
    case "push":
      return `(push ${command.levels})`;
    case "pop":
      return `(pop ${command.levels})`;
    case "check-sat":
      return "(check-sat)";
    case "get-model":
      return "(get-model)";
    case "get-value":
      return `(get-value (${command.terms.map(toSmtLib).join(" ")}))`;
    case "reset":
      return "(reset)";
  }
}

function renderOptionValue(value: OptionValue): string {
  if (typeof value === "string") {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return String(value);
}

/**
 * Render a sequence of commands as an SMT-LIB script, one command per line.
 */
export function renderScript(commands: readonly Command[]): string {
  return commands.map(renderCommand).join("\n");
}
