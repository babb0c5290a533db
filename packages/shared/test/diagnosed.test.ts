import { describe, it, expect } from "vitest";
import {
  collect,
  DiagnosticAccumulator,
  isStub,
  pure,
  stubCause,
  withDiags,
  withStub,
} from "../src/diagnosed.js";
import { buildDiagnostic } from "../src/diagnostics.js";

const error = buildDiagnostic({ code: "e", message: "bad", stage: "model" });
const warning = buildDiagnostic({ code: "w", message: "meh", stage: "model", severity: "warning" });

describe("collect", () => {
  it("visits every item even after an error", () => {
    const seen: number[] = [];
    const result = collect([1, 2, 3], (n) => {
      seen.push(n);
      return n === 2 ? withDiags(n, [error]) : pure(n);
    });
    expect(seen).toEqual([1, 2, 3]);
    expect(result.value).toEqual([1, 2, 3]);
    expect(result.diagnostics).toEqual([error]);
  });
});

describe("stubs", () => {
  it("brands objects without changing their fields", () => {
    const value = withStub({ body: "text" }, error);
    expect(isStub(value)).toBe(true);
    expect(stubCause(value)).toBe(error);
    expect(Object.keys(value)).toEqual(["body"]);
  });

  it("treats plain values as non-stubs", () => {
    expect(isStub({ body: "text" })).toBe(false);
    expect(isStub(null)).toBe(false);
    expect(isStub("text")).toBe(false);
    expect(stubCause({})).toBe(undefined);
  });
});

describe("DiagnosticAccumulator", () => {
  it("merges results and keeps their order", () => {
    const acc = new DiagnosticAccumulator();
    expect(acc.merge(withDiags(1, [warning]))).toBe(1);
    acc.push(error);
    expect(acc.diagnostics).toEqual([warning, error]);
  });

  it("wrap copies the current diagnostics", () => {
    const acc = new DiagnosticAccumulator();
    acc.push(warning);
    const wrapped = acc.wrap("v");
    acc.push(error);
    expect(wrapped.diagnostics).toEqual([warning]);
  });
});
