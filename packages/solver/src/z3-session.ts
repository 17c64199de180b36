/**
 * Z3 Session
 *
 * Backs a session with the Z3 WASM build from `z3-solver`. Commands are fed
 * to Z3 as SMT-LIB text through the low-level API, one context per session.
 *
 * ```typescript
 * const session = await Z3Session.create({ timeout: 2000 });
 * await session.declareFun("max", [Int, Int], Int);
 * await session.checkSat(); // "sat"
 * await session.dispose();
 * ```
 */

import type { init } from "z3-solver";
import { config } from "@smtkit/core";
import type { Command } from "./commands.js";
import { SolverError, parseErrorResponse } from "./errors.js";
import { BaseSession, type SessionOptions } from "./session.js";

type Z3Module = Awaited<ReturnType<typeof init>>;
type Z3Api = Z3Module["Z3"];
type Z3ContextPtr = ReturnType<Z3Api["mk_context_rc"]>;

export interface Z3SessionOptions extends SessionOptions {
  /** Per-check timeout in milliseconds (default: config `solver.timeout`) */
  timeout?: number;
  /** Enable Z3's macro finder (default: config `solver.macroFinder`, true) */
  macroFinder?: boolean;
  /** Logic to set on creation (default: config `solver.logic`) */
  logic?: string;
}

// ============================================================================
// Module Initialization
// ============================================================================

let z3: Z3Module | null = null;
let initPromise: Promise<Z3Module> | null = null;
let initError: Error | null = null;

async function doInit(): Promise<Z3Module> {
  if (initError) throw initError;
  try {
    const module = await import("z3-solver");
    z3 = await module.init();
    return z3;
  } catch (error) {
    initError = error instanceof Error ? error : new Error(String(error));
    throw initError;
  }
}

async function ensureInit(): Promise<Z3Module> {
  if (z3) return z3;
  if (!initPromise) {
    initPromise = doInit();
  }
  return initPromise;
}

/**
 * Load the Z3 WASM module ahead of the first session.
 */
export async function initZ3(): Promise<void> {
  await ensureInit();
}

export function isZ3Ready(): boolean {
  return z3 !== null;
}

// ============================================================================
// Session
// ============================================================================

export class Z3Session extends BaseSession {
  private constructor(
    private readonly api: Z3Api,
    private readonly ctx: Z3ContextPtr,
    options: SessionOptions
  ) {
    super(options);
  }

  static async create(options: Z3SessionOptions = {}): Promise<Z3Session> {
    const { Z3 } = await ensureInit();
    const cfg = Z3.mk_config();
    const ctx = Z3.mk_context_rc(cfg);
    Z3.del_config(cfg);

    const session = new Z3Session(Z3, ctx, options);

    const macroFinder = options.macroFinder ?? config.get("solver.macroFinder");
    const timeout = options.timeout ?? config.get("solver.timeout");
    const logic = options.logic ?? config.get("solver.logic");

    try {
      if (macroFinder) {
        await session.setOption("smt.macro_finder", true);
      }
      if (timeout !== undefined) {
        await session.setOption("timeout", timeout);
      }
      if (logic !== undefined) {
        await session.setLogic(logic);
      }
    } catch (error) {
      // The caller never sees the session, so release its context here
      await session.dispose();
      throw error;
    }
    return session;
  }

  protected async send(_command: Command, text: string): Promise<string> {
    let response: string;
    try {
      response = await this.api.eval_smtlib2_string(this.ctx, text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SolverError(`Z3 failed on ${text}: ${message}`, text, message);
    }

    const error = parseErrorResponse(response);
    if (error !== undefined) {
      throw new SolverError(error, text, response);
    }
    return response.trim();
  }

  protected async close(): Promise<void> {
    this.api.del_context(this.ctx);
  }
}
