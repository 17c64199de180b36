/**
 * Solver Sessions
 *
 * A session is one logical solver instance with an ordered log of
 * declarations and assertions. `BaseSession` turns the typed command methods
 * into `Command` values, serializes them through a promise queue and keeps
 * the transcript; subclasses only implement `send()`.
 */

import type { Sort, Term } from "@smtkit/terms";
import { config } from "@smtkit/core";
import {
  type Command,
  type OptionValue,
  assertCommand,
  checkSatCommand,
  declareConstCommand,
  declareFunCommand,
  declareSortCommand,
  getModelCommand,
  getValueCommand,
  popCommand,
  pushCommand,
  renderCommand,
  resetCommand,
  setLogicCommand,
  setOptionCommand,
} from "./commands.js";
import { ScopeError, SessionDisposedError, SolverError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

export type CheckSatResult = "sat" | "unsat" | "unknown";

export interface SessionOptions {
  /** Log every command and response (default: config `debug`) */
  verbose?: boolean;
}

/**
 * The primitive command layer. Every method resolves once the solver has
 * accepted the command and rejects with the solver's error otherwise.
 */
export interface SolverSession {
  /** Number of `push` levels currently open */
  readonly scopeDepth: number;

  /** Send one command and resolve to the raw response text */
  execute(command: Command): Promise<string>;

  setLogic(logic: string): Promise<void>;
  setOption(option: string, value: OptionValue): Promise<void>;
  declareSort(name: string, arity?: number): Promise<void>;
  declareFun(name: string, argSorts: readonly Sort[], resultSort: Sort): Promise<void>;
  declareConst(name: string, sort: Sort): Promise<void>;
  assert(formula: Term): Promise<void>;
  push(levels?: number): Promise<void>;
  pop(levels?: number): Promise<void>;
  checkSat(): Promise<CheckSatResult>;

  /** Raw `(get-model)` response */
  getModel(): Promise<string>;

  /** Raw `(get-value ...)` response */
  getValue(terms: readonly Term[]): Promise<string>;

  reset(): Promise<void>;

  /** Commands sent so far, in order */
  commands(): readonly Command[];

  /** The SMT-LIB script of every command sent so far */
  transcript(): string;

  dispose(): Promise<void>;
}

interface SentCommand {
  command: Command;
  text: string;
}

// ============================================================================
// Base Implementation
// ============================================================================

export abstract class BaseSession implements SolverSession {
  private queue: Promise<void> = Promise.resolve();
  private readonly sent: SentCommand[] = [];
  private depth = 0;
  private disposed = false;
  protected readonly verbose: boolean;

  constructor(options: SessionOptions = {}) {
    this.verbose = options.verbose ?? config.get("debug");
  }

  /**
   * Deliver one rendered command to the solver and return its response.
   * Implementations throw `SolverError` when the solver reports an error.
   */
  protected abstract send(command: Command, text: string): Promise<string>;

  /** Release solver resources. Called once, from `dispose()`. */
  protected abstract close(): Promise<void>;

  get scopeDepth(): number {
    return this.depth;
  }

  execute(command: Command): Promise<string> {
    const result = this.queue.then(() => this.run(command));
    // Keep the queue alive after a failure; the caller sees it through `result`.
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async run(command: Command): Promise<string> {
    const text = renderCommand(command);
    if (this.disposed) {
      throw new SessionDisposedError(text);
    }
    if (command.kind === "pop" && command.levels > this.depth) {
      throw new ScopeError(command.levels, this.depth);
    }

    if (this.verbose) {
      console.log(`[smtkit] > ${text}`);
    }
    this.sent.push({ command, text });

    const response = await this.send(command, text);

    if (this.verbose && response.length > 0) {
      console.log(`[smtkit] < ${response}`);
    }
    this.track(command);
    return response;
  }

  private track(command: Command): void {
    switch (command.kind) {
      case "push":
        this.depth += command.levels;
        break;
      case "pop":
        this.depth -= command.levels;
        break;
      case "reset":
        this.depth = 0;
        break;
    }
  }

  async setLogic(logic: string): Promise<void> {
    await this.execute(setLogicCommand(logic));
  }

  async setOption(option: string, value: OptionValue): Promise<void> {
    await this.execute(setOptionCommand(option, value));
  }

  async declareSort(name: string, arity = 0): Promise<void> {
    await this.execute(declareSortCommand(name, arity));
  }

  async declareFun(name: string, argSorts: readonly Sort[], resultSort: Sort): Promise<void> {
    await this.execute(declareFunCommand(name, argSorts, resultSort));
  }

  async declareConst(name: string, sort: Sort): Promise<void> {
    await this.execute(declareConstCommand(name, sort));
  }

  async assert(formula: Term): Promise<void> {
    await this.execute(assertCommand(formula));
  }

  async push(levels = 1): Promise<void> {
    await this.execute(pushCommand(levels));
  }

  async pop(levels = 1): Promise<void> {
    await this.execute(popCommand(levels));
  }

  async checkSat(): Promise<CheckSatResult> {
    const response = await this.execute(checkSatCommand);
    return parseCheckSatResponse(response);
  }

  getModel(): Promise<string> {
    return this.execute(getModelCommand);
  }

  getValue(terms: readonly Term[]): Promise<string> {
    return this.execute(getValueCommand(terms));
  }

  async reset(): Promise<void> {
    await this.execute(resetCommand);
  }

  commands(): readonly Command[] {
    return this.sent.map((s) => s.command);
  }

  transcript(): string {
    return this.sent.map((s) => s.text).join("\n");
  }

  dispose(): Promise<void> {
    const result = this.queue.then(async () => {
      if (this.disposed) return;
      this.disposed = true;
      await this.close();
    });
    this.queue = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

const CHECK_SAT_RESULTS: ReadonlySet<string> = new Set<CheckSatResult>(["sat", "unsat", "unknown"]);

function isCheckSatResult(value: string): value is CheckSatResult {
  return CHECK_SAT_RESULTS.has(value);
}

export function parseCheckSatResponse(response: string): CheckSatResult {
  const first = response.trim().split(/\s+/)[0] ?? "";
  if (isCheckSatResult(first)) {
    return first;
  }
  throw new SolverError(`Unexpected check-sat response: '${response.trim()}'`, "(check-sat)", response);
}

// ============================================================================
// Scopes
// ============================================================================

/**
 * Run `body` inside a `push`/`pop` pair. The scope is popped even when
 * `body` throws.
 */
export async function withScope<T>(
  session: SolverSession,
  body: (session: SolverSession) => Promise<T>
): Promise<T> {
  await session.push();
  try {
    return await body(session);
  } finally {
    await session.pop();
  }
}
