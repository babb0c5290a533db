/* =======================================================================================
 * DIAGNOSTIC MODEL
 * ---------------------------------------------------------------------------------------
 * Envelope for every problem a build can report. Location is expressed in terms an
 * author can act on: the source file, the front-matter field, and the line.
 * ======================================================================================= */

export type DiagnosticSeverity = "error" | "warning" | "info";

/** Pipeline stage that produced the diagnostic. */
export type DiagnosticStage = "load" | "model" | "render" | "emit";

export interface Diagnostic<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity: DiagnosticSeverity;
  /** Source path relative to the content root, when the problem belongs to one file. */
  source?: string;
  /** Front-matter key involved, if any. */
  field?: string;
  /** 1-based line within the source file. */
  line?: number;
  data?: Readonly<TData>;
}

export interface BuildDiagnosticInput<
  TCode extends string = string,
  TData extends Record<string, unknown> = Record<string, unknown>,
> {
  code: TCode;
  message: string;
  stage: DiagnosticStage;
  severity?: DiagnosticSeverity;
  source?: string | null;
  field?: string | null;
  line?: number | null;
  data?: Readonly<TData>;
}

/** Centralized diagnostic builder; drops absent location parts so envelopes compare cleanly. */
export function buildDiagnostic<
  TCode extends string,
  TData extends Record<string, unknown> = Record<string, unknown>,
>(input: BuildDiagnosticInput<TCode, TData>): Diagnostic<TCode, TData> {
  return {
    code: input.code,
    message: input.message,
    stage: input.stage,
    severity: input.severity ?? "error",
    ...(input.source ? { source: input.source } : {}),
    ...(input.field ? { field: input.field } : {}),
    ...(input.line != null ? { line: input.line } : {}),
    ...(input.data ? { data: input.data } : {}),
  };
}

/**
 * Stable ordering for reporting: by source, then line, then code.
 * Project-wide diagnostics (no source) come first.
 */
export function sortDiagnostics<T extends Diagnostic>(ds: readonly T[]): T[] {
  return [...ds].sort((a, b) => {
    const sa = a.source ?? "";
    const sb = b.source ?? "";
    if (sa !== sb) return sa < sb ? -1 : 1;
    const la = a.line ?? 0;
    const lb = b.line ?? 0;
    if (la !== lb) return la - lb;
    if (a.code !== b.code) return a.code < b.code ? -1 : 1;
    return 0;
  });
}

/**
 * Render a diagnostic as a single line.
 *
 * `posts/hello.md:3 error [sssg/missing-field] title: required field is missing`
 */
export function formatDiagnostic(d: Diagnostic): string {
  const location = d.source
    ? `${d.source}${d.line != null ? `:${d.line}` : ""} `
    : "";
  const field = d.field ? `${d.field}: ` : "";
  return `${location}${d.severity} [${d.code}] ${field}${d.message}`;
}
