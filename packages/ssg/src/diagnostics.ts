import {
  buildDiagnostic,
  type Diagnostic,
  type DiagnosticSeverity,
  type DiagnosticStage,
} from "@sssg/shared";

/** Error kind a diagnostic rolls up into when the build fails. */
export type SiteErrorKind =
  | "MalformedFrontMatter"
  | "ContentReadError"
  | "ValidationError"
  | "RenderError"
  | "OutputWriteError";

interface DiagnosticEntry {
  kind: SiteErrorKind;
  stage: DiagnosticStage;
  defaultSeverity: DiagnosticSeverity;
  description: string;
}

export const siteDiagnostics = {
  "sssg/malformed-front-matter": {
    kind: "MalformedFrontMatter",
    stage: "load",
    defaultSeverity: "error",
    description: "The front-matter block is unterminated or contains a line that is not a key = \"value\" assignment.",
  },
  "sssg/duplicate-key": {
    kind: "MalformedFrontMatter",
    stage: "load",
    defaultSeverity: "warning",
    description: "A front-matter key is assigned more than once; the last assignment wins.",
  },
  "sssg/content-read": {
    kind: "ContentReadError",
    stage: "load",
    defaultSeverity: "error",
    description: "A file or directory under the content root could not be read.",
  },
  "sssg/missing-field": {
    kind: "ValidationError",
    stage: "model",
    defaultSeverity: "error",
    description: "A required front-matter field is missing or blank.",
  },
  "sssg/invalid-date": {
    kind: "ValidationError",
    stage: "model",
    defaultSeverity: "error",
    description: "The date field is not a recognized calendar date.",
  },
  "sssg/invalid-field": {
    kind: "ValidationError",
    stage: "model",
    defaultSeverity: "error",
    description: "A front-matter field has a value outside its accepted set.",
  },
  "sssg/duplicate-identifier": {
    kind: "ValidationError",
    stage: "model",
    defaultSeverity: "error",
    description: "Two sources derive the same identifier or slug and would overwrite each other.",
  },
  "sssg/output-collision": {
    kind: "ValidationError",
    stage: "render",
    defaultSeverity: "error",
    description: "A generated page and a copied asset map to the same output path.",
  },
  "sssg/render-failed": {
    kind: "RenderError",
    stage: "render",
    defaultSeverity: "error",
    description: "Markdown or template rendering threw for a document.",
  },
  "sssg/output-write": {
    kind: "OutputWriteError",
    stage: "emit",
    defaultSeverity: "error",
    description: "The output tree could not be written.",
  },
} as const satisfies Record<string, DiagnosticEntry>;

export type SiteDiagnosticCode = keyof typeof siteDiagnostics;

export type SiteDiagnostic = Diagnostic<SiteDiagnosticCode>;

export interface SiteDiagnosticInput {
  message: string;
  severity?: DiagnosticSeverity;
  source?: string | null;
  field?: string | null;
  line?: number | null;
  data?: Readonly<Record<string, unknown>>;
}

/** Build a diagnostic with stage and severity taken from the catalog. */
export function siteDiagnostic(code: SiteDiagnosticCode, input: SiteDiagnosticInput): SiteDiagnostic {
  const entry: DiagnosticEntry = siteDiagnostics[code];
  return buildDiagnostic({
    code,
    stage: entry.stage,
    severity: input.severity ?? entry.defaultSeverity,
    message: input.message,
    source: input.source,
    field: input.field,
    line: input.line,
    ...(input.data ? { data: input.data } : {}),
  });
}

export function kindOf(d: SiteDiagnostic): SiteErrorKind {
  return siteDiagnostics[d.code].kind;
}
