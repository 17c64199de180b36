import { describe, it, expect } from "vitest";
import { Int, Bool, ArraySort, sym, app, eq, gt } from "@smtkit/terms";
import {
  assertCommand,
  checkSatCommand,
  declareConstCommand,
  declareFunCommand,
  declareSortCommand,
  getValueCommand,
  popCommand,
  pushCommand,
  renderCommand,
  renderScript,
  resetCommand,
  setLogicCommand,
  setOptionCommand,
} from "../src/index.js";

describe("SMT-LIB commands", () => {
  it("renders declarations", () => {
    expect(renderCommand(declareFunCommand("max", [Int, Int], Int))).toBe(
      "(declare-fun max (Int Int) Int)"
    );
    expect(renderCommand(declareFunCommand("ten", [], Int))).toBe("(declare-fun ten () Int)");
    expect(renderCommand(declareConstCommand("mem", ArraySort(Int, Bool)))).toBe(
      "(declare-const mem (Array Int Bool))"
    );
    expect(renderCommand(declareSortCommand("Pair", 2))).toBe("(declare-sort Pair 2)");
  });

  it("quotes declared names that are not simple symbols", () => {
    expect(renderCommand(declareFunCommand("max of", [Int], Int))).toBe(
      "(declare-fun |max of| (Int) Int)"
    );
  });

  it("renders options and logic", () => {
    expect(renderCommand(setOptionCommand(":timeout", 5000))).toBe("(set-option :timeout 5000)");
    expect(renderCommand(setOptionCommand("smt.macro_finder", true))).toBe(
      "(set-option :smt.macro_finder true)"
    );
    expect(renderCommand(setOptionCommand("regular-output-channel", 'a"b'))).toBe(
      '(set-option :regular-output-channel "a""b")'
    );
    expect(renderCommand(setLogicCommand("QF_LIA"))).toBe("(set-logic QF_LIA)");
  });

  it("renders assertions and queries", () => {
    expect(renderCommand(assertCommand(gt(app("max", 2, 7), 7)))).toBe("(assert (> (max 2 7) 7))");
    expect(renderCommand(getValueCommand([sym("x"), app("ten")]))).toBe("(get-value (x ten))");
    expect(renderCommand(checkSatCommand)).toBe("(check-sat)");
    expect(renderCommand(resetCommand)).toBe("(reset)");
  });

  it("renders scripts one command per line", () => {
    expect(
      renderScript([pushCommand(), assertCommand(eq(sym("x"), 1)), popCommand(2)])
    ).toBe("(push 1)\n(assert (= x 1))\n(pop 2)");
  });

  it("validates counts", () => {
    expect(() => pushCommand(-1)).toThrow(RangeError);
    expect(() => popCommand(1.5)).toThrow("Scope levels must be a non-negative integer, got 1.5");
    expect(() => declareSortCommand("S", -2)).toThrow(RangeError);
    expect(() => getValueCommand([])).toThrow("get-value needs at least one term");
  });
});
