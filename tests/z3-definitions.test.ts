/**
 * Definitions checked by the real Z3 WASM build.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import {
  Int,
  SolverError,
  Z3Session,
  add,
  app,
  defineFun,
  eq,
  ge,
  gt,
  initZ3,
  ite,
  le,
  lt,
  sym,
  withScope,
} from "../src/index.js";

describe("definitions in Z3", () => {
  let session: Z3Session;

  beforeAll(async () => {
    await initZ3();
    session = await Z3Session.create({ timeout: 10000, verbose: false });
    await session.declareConst("x", Int);

    await defineFun(session, "min", [["a", Int], ["b", Int]], Int, (a, b) => ite(lt(a, b), a, b));
    await defineFun(session, "max", [["a", Int], ["b", Int]], Int, (a, b) => ite(gt(a, b), a, b));
    await defineFun(session, "clamp", [["v", Int], ["lo", Int], ["hi", Int]], Int, (v, lo, hi) =>
      app("max", lo, app("min", v, hi))
    );
    await defineFun(session, "ten", [], Int, 10);
  }, 60000);

  afterAll(async () => {
    await session.dispose();
  });

  it("proves max is an upper bound", async () => {
    await withScope(session, async () => {
      await session.assert(lt(app("max", sym("x"), 3), 3));
      await expect(session.checkSat()).resolves.toBe("unsat");
    });
  });

  it("finds a model through a constant definition", async () => {
    await withScope(session, async () => {
      await session.assert(eq(add(sym("x"), 1), app("ten")));
      await expect(session.checkSat()).resolves.toBe("sat");
      await expect(session.getValue([sym("x")])).resolves.toBe("((x 9))");
    });
  });

  it("keeps clamp within its bounds", async () => {
    await withScope(session, async () => {
      const c = app("clamp", sym("x"), 0, 9);
      await session.assert(ite(ge(c, 0), ite(le(c, 9), false, true), true));
      await expect(session.checkSat()).resolves.toBe("unsat");
    });
  });

  it("reports a body that mentions an undeclared name from the solver", async () => {
    await withScope(session, async () => {
      await expect(
        defineFun(session, "broken", [["a", Int]], Int, (a) => add(a, sym("nowhere")))
      ).rejects.toBeInstanceOf(SolverError);
    });
  });
});
