import { formatDiagnostic, sortDiagnostics } from "@sssg/shared";
import { kindOf, type SiteDiagnostic, type SiteErrorKind } from "./diagnostics.js";

/**
 * Base class for every build failure. Carries the diagnostics that caused it,
 * plus any others collected in the same pass, so one run reports everything.
 */
export abstract class SiteError extends Error {
  abstract readonly kind: SiteErrorKind;
  readonly diagnostics: readonly SiteDiagnostic[];

  constructor(summary: string, diagnostics: readonly SiteDiagnostic[], options?: { cause?: unknown }) {
    const sorted = sortDiagnostics(diagnostics);
    super(composeMessage(summary, sorted), options);
    this.name = new.target.name;
    this.diagnostics = sorted;
  }
}

export class MalformedFrontMatterError extends SiteError {
  override readonly kind = "MalformedFrontMatter";
}

export class ContentReadError extends SiteError {
  override readonly kind = "ContentReadError";
}

export class ValidationError extends SiteError {
  override readonly kind = "ValidationError";
}

export class RenderError extends SiteError {
  override readonly kind = "RenderError";
}

export class OutputWriteError extends SiteError {
  override readonly kind = "OutputWriteError";
}

const ERROR_CLASSES: Record<SiteErrorKind, new (summary: string, diagnostics: readonly SiteDiagnostic[]) => SiteError> = {
  MalformedFrontMatter: MalformedFrontMatterError,
  ContentReadError,
  ValidationError,
  RenderError,
  OutputWriteError,
};

/** Stage order used to pick which error class represents a mixed batch. */
const KIND_PRIORITY: readonly SiteErrorKind[] = [
  "ContentReadError",
  "MalformedFrontMatter",
  "ValidationError",
  "RenderError",
  "OutputWriteError",
];

/**
 * Turn a batch of diagnostics into the error of the earliest failing stage.
 * Returns null when no diagnostic has error severity.
 */
export function errorFromDiagnostics(diagnostics: readonly SiteDiagnostic[]): SiteError | null {
  const errors = diagnostics.filter((d) => d.severity === "error");
  if (errors.length === 0) return null;

  const kinds = new Set(errors.map(kindOf));
  const kind = KIND_PRIORITY.find((k) => kinds.has(k)) ?? "ValidationError";
  const noun = errors.length === 1 ? "error" : "errors";
  const ErrorClass = ERROR_CLASSES[kind];
  return new ErrorClass(`Build failed with ${errors.length} ${noun}`, diagnostics);
}

export function isSiteError(value: unknown): value is SiteError {
  return value instanceof SiteError;
}

function composeMessage(summary: string, diagnostics: readonly SiteDiagnostic[]): string {
  if (diagnostics.length === 0) return summary;
  return [summary, ...diagnostics.map((d) => `  ${formatDiagnostic(d)}`)].join("\n");
}
