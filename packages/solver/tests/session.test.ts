import { describe, it, expect, vi, afterEach } from "vitest";
import { Int, app, eq, forall, gt, ite, sym } from "@smtkit/terms";
import {
  ScopeError,
  ScriptSession,
  SessionDisposedError,
  SolverError,
  parseCheckSatResponse,
  parseErrorResponse,
  withScope,
} from "../src/index.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("ScriptSession", () => {
  it("records a transcript of every command", async () => {
    const session = new ScriptSession({ verbose: false });
    await session.declareFun("max", [Int, Int], Int);
    await session.assert(
      forall(
        [
          ["a", Int],
          ["b", Int],
        ],
        eq(app("max", sym("a"), sym("b")), ite(gt(sym("a"), sym("b")), sym("a"), sym("b")))
      )
    );

    expect(session.transcript()).toBe(
      "(declare-fun max (Int Int) Int)\n" +
        "(assert (forall ((a Int) (b Int)) (= (max a b) (ite (> a b) a b))))"
    );
    expect(session.commands().map((c) => c.kind)).toEqual(["declare-fun", "assert"]);
  });

  it("answers check-sat with unknown by default", async () => {
    const session = new ScriptSession({ verbose: false });
    await expect(session.checkSat()).resolves.toBe("unknown");
  });

  it("uses the responder's answers", async () => {
    const session = new ScriptSession({
      verbose: false,
      responder: (command) => (command.kind === "check-sat" ? "sat\n" : undefined),
    });
    await expect(session.checkSat()).resolves.toBe("sat");
  });

  it("rejects commands the responder reports as errors and keeps them in the transcript", async () => {
    const session = new ScriptSession({
      verbose: false,
      responder: (command) =>
        command.kind === "assert" ? '(error "line 1 column 10: unknown constant y")' : undefined,
    });

    const failure = session.assert(gt(sym("y"), 0));
    await expect(failure).rejects.toBeInstanceOf(SolverError);
    await expect(failure).rejects.toThrow("line 1 column 10: unknown constant y");
    expect(session.transcript()).toBe("(assert (> y 0))");

    // The queue keeps going after a failure
    await session.declareConst("y", Int);
    expect(session.transcript()).toBe("(assert (> y 0))\n(declare-const y Int)");
  });

  it("runs commands one at a time in call order", async () => {
    const events: string[] = [];
    const session = new ScriptSession({
      verbose: false,
      responder: async (_command, text) => {
        events.push(`start ${text}`);
        await new Promise((resolve) => setTimeout(resolve, text === "(push 1)" ? 20 : 0));
        events.push(`end ${text}`);
        return undefined;
      },
    });

    await Promise.all([session.push(), session.declareConst("x", Int)]);

    expect(events).toEqual([
      "start (push 1)",
      "end (push 1)",
      "start (declare-const x Int)",
      "end (declare-const x Int)",
    ]);
  });

  it("tracks scope depth", async () => {
    const session = new ScriptSession({ verbose: false });
    await session.push(2);
    expect(session.scopeDepth).toBe(2);
    await session.pop();
    expect(session.scopeDepth).toBe(1);
    await session.reset();
    expect(session.scopeDepth).toBe(0);
  });

  it("refuses to pop more levels than were pushed", async () => {
    const session = new ScriptSession({ verbose: false });
    await session.push();

    const failure = session.pop(2);
    await expect(failure).rejects.toBeInstanceOf(ScopeError);
    await expect(failure).rejects.toThrow("Cannot pop 2 level(s): only 1 pushed");
    expect(session.transcript()).toBe("(push 1)");
    expect(session.scopeDepth).toBe(1);
  });

  it("rejects commands after dispose", async () => {
    const session = new ScriptSession({ verbose: false });
    await session.dispose();
    await session.dispose();

    const failure = session.checkSat();
    await expect(failure).rejects.toBeInstanceOf(SessionDisposedError);
    await expect(failure).rejects.toThrow("Session is disposed; cannot run (check-sat)");
  });

  it("logs commands and responses when verbose", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const session = new ScriptSession({ verbose: true });

    await session.declareConst("x", Int);
    await session.checkSat();

    expect(log.mock.calls).toEqual([
      ["[smtkit] > (declare-const x Int)"],
      ["[smtkit] > (check-sat)"],
      ["[smtkit] < unknown"],
    ]);
  });
});

describe("withScope", () => {
  it("pops the scope after the body returns", async () => {
    const session = new ScriptSession({ verbose: false });
    const result = await withScope(session, async (s) => {
      await s.declareConst("x", Int);
      return s.scopeDepth;
    });

    expect(result).toBe(1);
    expect(session.scopeDepth).toBe(0);
    expect(session.transcript()).toBe("(push 1)\n(declare-const x Int)\n(pop 1)");
  });

  it("pops the scope when the body throws", async () => {
    const session = new ScriptSession({ verbose: false });
    await expect(
      withScope(session, async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(session.scopeDepth).toBe(0);
  });
});

describe("response parsing", () => {
  it("reads check-sat answers", () => {
    expect(parseCheckSatResponse("unsat\n")).toBe("unsat");
    expect(() => parseCheckSatResponse("maybe")).toThrow("Unexpected check-sat response: 'maybe'");
  });

  it("extracts error messages", () => {
    expect(parseErrorResponse('(error "bad ""quoted"" name")')).toBe('bad "quoted" name');
    expect(parseErrorResponse("sat")).toBeUndefined();
  });
});
