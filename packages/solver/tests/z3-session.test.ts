/**
 * Runs real commands against the Z3 WASM build.
 */

import { describe, it, expect, beforeAll, afterAll, afterEach, vi } from "vitest";
import { Int, app, eq, forall, gt, ite, sym } from "@smtkit/terms";
import { BaseSession, SolverError, Z3Session, initZ3, isZ3Ready } from "../src/index.js";

describe("Z3Session", () => {
  let session: Z3Session;

  beforeAll(async () => {
    await initZ3();
    session = await Z3Session.create({ timeout: 10000, verbose: false });
  }, 30000); // Z3 WASM can take a while to load

  afterAll(async () => {
    await session.dispose();
  });

  it("is initialized", () => {
    expect(isZ3Ready()).toBe(true);
  });

  it("sends the configured options first", () => {
    expect(session.transcript()).toBe(
      "(set-option :smt.macro_finder true)\n(set-option :timeout 10000)"
    );
  });

  it("decides formulas over a quantified definition", async () => {
    const a = sym("a");
    const b = sym("b");
    await session.declareFun("max", [Int, Int], Int);
    await session.assert(
      forall(
        [
          ["a", Int],
          ["b", Int],
        ],
        eq(app("max", a, b), ite(gt(a, b), a, b))
      )
    );

    await session.push();
    await session.assert(gt(app("max", 2, 7), 7));
    await expect(session.checkSat()).resolves.toBe("unsat");
    await session.pop();

    await session.push();
    await session.declareConst("x", Int);
    await session.assert(eq(app("max", sym("x"), 3), 5));
    await expect(session.checkSat()).resolves.toBe("sat");
    await expect(session.getValue([sym("x")])).resolves.toBe("((x 5))");
    await session.pop();
  });

  it("surfaces solver errors", async () => {
    await expect(session.assert(gt(sym("undeclared"), 0))).rejects.toBeInstanceOf(SolverError);
  });
});

describe("Z3Session.create", () => {
  beforeAll(async () => {
    await initZ3();
  }, 30000);

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("releases the context when setup fails", async () => {
    const rejected = new SolverError(
      "unsupported logic",
      "(set-logic NOPE)",
      '(error "unsupported logic")'
    );
    vi.spyOn(BaseSession.prototype, "setLogic").mockRejectedValueOnce(rejected);
    const dispose = vi.spyOn(BaseSession.prototype, "dispose");

    await expect(
      Z3Session.create({ logic: "NOPE", macroFinder: false, verbose: false })
    ).rejects.toBe(rejected);
    expect(dispose).toHaveBeenCalledTimes(1);
  });
});
