import { describe, it, expect } from "vitest";
import {
  Int,
  Real,
  Bool,
  ArraySort,
  sort,
  sortToSmtLib,
  toSmtLib,
  renderSymbol,
  int_,
  real_,
  sym,
  app,
  and_,
  or_,
  implies,
  eq,
  distinct,
  ite,
  gt,
  le,
  sub,
  mul,
  div,
  intDiv,
  mod,
  neg,
  select,
  store,
  forall,
  exists,
  let_,
  true_,
  TermError,
} from "../src/index.js";

describe("SMT-LIB rendering", () => {
  describe("sorts", () => {
    it("renders built-in sorts", () => {
      expect(sortToSmtLib(Int)).toBe("Int");
      expect(sortToSmtLib(Real)).toBe("Real");
      expect(sortToSmtLib(Bool)).toBe("Bool");
    });

    it("renders compound sorts", () => {
      expect(sortToSmtLib(ArraySort(Int, ArraySort(Int, Bool)))).toBe("(Array Int (Array Int Bool))");
      expect(sortToSmtLib(sort("Pair", Int, Real))).toBe("(Pair Int Real)");
      expect(sortToSmtLib(sort("Color"))).toBe("Color");
    });
  });

  describe("literals", () => {
    it("renders negative numerals as applications of minus", () => {
      expect(toSmtLib(int_(-5))).toBe("(- 5)");
      expect(toSmtLib(real_(-0.25))).toBe("(- 0.25)");
      expect(toSmtLib(int_(0))).toBe("0");
    });

    it("renders booleans", () => {
      expect(toSmtLib(true_)).toBe("true");
    });
  });

  describe("symbols", () => {
    it("leaves simple symbols bare", () => {
      expect(renderSymbol("x")).toBe("x");
      expect(renderSymbol("max-of?")).toBe("max-of?");
    });

    it("quotes symbols that are not simple", () => {
      expect(renderSymbol("two words")).toBe("|two words|");
      expect(renderSymbol("1st")).toBe("|1st|");
      expect(renderSymbol("forall")).toBe("|forall|");
    });

    it("rejects symbols that cannot be quoted", () => {
      expect(() => renderSymbol("a|b")).toThrow(TermError);
      expect(() => toSmtLib(sym("back\\slash"))).toThrow(TermError);
    });
  });

  describe("applications", () => {
    it("renders operators", () => {
      const a = sym("a");
      const b = sym("b");
      expect(toSmtLib(ite(gt(a, b), a, b))).toBe("(ite (> a b) a b)");
      expect(toSmtLib(and_(le(a, 10), or_(eq(a, b), distinct(a, b, 0))))).toBe(
        "(and (<= a 10) (or (= a b) (distinct a b 0)))"
      );
      expect(toSmtLib(implies(true, neg(a)))).toBe("(=> true (- a))");
      expect(toSmtLib(sub(mul(a, 2), div(b, 0.5), intDiv(a, 3), mod(b, 4)))).toBe(
        "(- (* a 2) (/ b 0.5) (div a 3) (mod b 4))"
      );
    });

    it("renders nullary applications as bare names", () => {
      expect(toSmtLib(eq(app("ten"), 10))).toBe("(= ten 10)");
    });

    it("renders array operations", () => {
      expect(toSmtLib(select(store(sym("arr"), 0, 7), 0))).toBe("(select (store arr 0 7) 0)");
    });
  });

  describe("binders", () => {
    it("renders quantifiers", () => {
      const t = forall(
        [
          ["a", Int],
          ["b", Int],
        ],
        eq(app("max", sym("a"), sym("b")), ite(gt(sym("a"), sym("b")), sym("a"), sym("b")))
      );
      expect(toSmtLib(t)).toBe("(forall ((a Int) (b Int)) (= (max a b) (ite (> a b) a b)))");
      expect(toSmtLib(exists([["r", Real]], gt(sym("r"), 0)))).toBe("(exists ((r Real)) (> r 0))");
    });

    it("renders let", () => {
      expect(toSmtLib(let_([["y", int_(2)]], mul(sym("y"), sym("y"))))).toBe("(let ((y 2)) (* y y))");
    });
  });
});
