/**
 * Values that travel with their diagnostics.
 *
 * A build stage never stops at the first broken document: it returns what it could
 * produce plus every diagnostic it found, and the caller decides when to abort.
 * A value recovered from an error is branded as a stub so later stages skip it
 * instead of reporting follow-on problems.
 */

import type { Diagnostic } from "./diagnostics.js";

export interface Diagnosed<T, D extends Diagnostic = Diagnostic> {
  readonly value: T;
  readonly diagnostics: readonly D[];
}

const STUB: unique symbol = Symbol("sssg.stub");

type Stubbed = { readonly [STUB]: Diagnostic };

export function isStub<T>(value: T): value is T & Stubbed {
  return value !== null && typeof value === "object" && STUB in value;
}

/** The diagnostic a stub was recovered from. */
export function stubCause(value: unknown): Diagnostic | undefined {
  return isStub(value) ? value[STUB] : undefined;
}

/** Brand `value` as recovered from `cause`. */
export function withStub<T extends object>(value: T, cause: Diagnostic): T {
  return Object.assign(value, { [STUB]: cause });
}

export function pure<T>(value: T): Diagnosed<T, never> {
  return { value, diagnostics: [] };
}

export function withDiags<T, D extends Diagnostic>(value: T, diagnostics: readonly D[]): Diagnosed<T, D> {
  return { value, diagnostics };
}

/** Join per-item results in item order, keeping every diagnostic. */
export function collect<T, U, D extends Diagnostic>(
  items: readonly T[],
  f: (item: T, index: number) => Diagnosed<U, D>,
): Diagnosed<U[], D> {
  const values: U[] = [];
  const diagnostics: D[] = [];
  items.forEach((item, i) => {
    const result = f(item, i);
    values.push(result.value);
    diagnostics.push(...result.diagnostics);
  });
  return { value: values, diagnostics };
}

/** Collects diagnostics while a stage runs imperatively. */
export class DiagnosticAccumulator<D extends Diagnostic = Diagnostic> {
  readonly #diagnostics: D[] = [];

  push(d: D): void {
    this.#diagnostics.push(d);
  }

  /** Keep the diagnostics of `result` and hand back its value. */
  merge<T>(result: Diagnosed<T, D>): T {
    this.#diagnostics.push(...result.diagnostics);
    return result.value;
  }

  get diagnostics(): readonly D[] {
    return this.#diagnostics;
  }

  /** Snapshot: later pushes do not show up in the returned result. */
  wrap<T>(value: T): Diagnosed<T, D> {
    return { value, diagnostics: [...this.#diagnostics] };
  }
}
