/**
 * Document Model Builder
 *
 * Validates loader output into Documents and assembles the Site. Every problem in
 * the batch is collected; nothing here throws for bad content.
 */

import { DiagnosticAccumulator, debug, isStub, stubCause, type Diagnosed } from "@sssg/shared";
import type { ContentSource } from "../content/loader.js";
import { siteDiagnostic, type SiteDiagnostic } from "../diagnostics.js";
import { compareCalendarDates, parseCalendarDate } from "./date.js";
import { DEFAULT_EXCERPT_LENGTH, excerpt } from "./excerpt.js";
import { slugify, slugSegment } from "./slug.js";
import type { Document, Site, SiteMetadata } from "./types.js";

export const DEFAULT_SITE_METADATA: SiteMetadata = {
  title: "Home",
  description: "",
  baseUrl: null,
  author: null,
};

export interface BuildSiteOptions {
  metadata?: Partial<SiteMetadata>;
  /** Upper bound for derived summaries. */
  excerptLength?: number;
  /** Keep documents marked `draft = "true"`. */
  includeDrafts?: boolean;
}

const REQUIRED_FIELDS = ["title", "date"] as const;

/** Date descending, then identifier ascending. */
export function compareDocuments(a: Document, b: Document): number {
  const byDate = compareCalendarDates(b.date, a.date);
  if (byDate !== 0) return byDate;
  return a.identifier < b.identifier ? -1 : a.identifier > b.identifier ? 1 : 0;
}

/**
 * Turn parsed sources into the Site.
 *
 * Sources whose front matter failed to parse are stubs: they take part in the
 * identifier check but get no field diagnostics, since their mapping is empty only
 * because of the parse error already reported.
 */
export function buildSite(
  sources: readonly ContentSource[],
  options: BuildSiteOptions = {},
): Diagnosed<Site, SiteDiagnostic> {
  const acc = new DiagnosticAccumulator<SiteDiagnostic>();
  const excerptLength = options.excerptLength ?? DEFAULT_EXCERPT_LENGTH;

  checkUniqueness(sources, acc);

  const documents: Document[] = [];
  for (const source of sources) {
    if (isStub(source.parsed)) {
      debug.model("document.skip-stub", { source: source.sourcePath, cause: stubCause(source.parsed)?.code });
      continue;
    }
    const doc = toDocument(source, excerptLength, acc);
    if (!doc) continue;
    if (doc.draft && !options.includeDrafts) {
      debug.model("document.draft", { identifier: doc.identifier });
      continue;
    }
    documents.push(doc);
  }

  documents.sort(compareDocuments);
  const site: Site = {
    metadata: Object.freeze({ ...DEFAULT_SITE_METADATA, ...options.metadata }),
    documents: Object.freeze(documents),
    tags: groupByTag(documents),
  };
  debug.model("site", {
    documents: site.documents.length,
    tags: site.tags.size,
    diagnostics: acc.diagnostics.length,
  });
  return acc.wrap(site);
}

function toDocument(
  source: ContentSource,
  excerptLength: number,
  acc: DiagnosticAccumulator<SiteDiagnostic>,
): Document | null {
  const fm = source.parsed.frontMatter;
  const at = source.sourcePath;
  let valid = true;

  for (const field of REQUIRED_FIELDS) {
    if ((fm[field] ?? "").trim() === "") {
      valid = false;
      acc.push(siteDiagnostic("sssg/missing-field", {
        message: source.parsed.hasFrontMatter
          ? "required field is missing"
          : "required field is missing (the file has no front-matter block)",
        source: at,
        field,
      }));
    }
  }

  const rawDate = fm["date"];
  const date = rawDate && rawDate.trim() ? parseCalendarDate(rawDate) : null;
  if (rawDate && rawDate.trim() && !date) {
    valid = false;
    acc.push(siteDiagnostic("sssg/invalid-date", {
      message: `"${rawDate}" is not a recognized date (expected e.g. "May 1, 2020" or "2020-05-01")`,
      source: at,
      field: "date",
    }));
  }

  const draft = parseBoolean(fm["draft"]);
  if (draft === null) {
    valid = false;
    acc.push(siteDiagnostic("sssg/invalid-field", {
      message: `expected "true" or "false", got "${fm["draft"] ?? ""}"`,
      source: at,
      field: "draft",
    }));
  }

  const tags = parseTags(fm["tags"]);
  for (const bad of tags.rejected) {
    valid = false;
    acc.push(siteDiagnostic("sssg/invalid-field", {
      message: `tag "${bad}" has no URL-safe characters`,
      source: at,
      field: "tags",
    }));
  }

  const slug = slugify(source.identifier);
  if (!slug) {
    valid = false;
    acc.push(siteDiagnostic("sssg/invalid-field", {
      message: `file name "${source.sourcePath}" has no URL-safe characters to build a page name from`,
      source: at,
    }));
  }

  if (!valid || !date || draft === null) return null;

  const summary = fm["summary"];
  const hasSummary = summary !== undefined && summary.trim() !== "";
  const doc: Document = {
    identifier: source.identifier,
    slug,
    sourcePath: source.sourcePath,
    title: (fm["title"] ?? "").trim(),
    date: Object.freeze(date),
    summary: hasSummary ? summary.trim() : excerpt(source.parsed.body, excerptLength),
    summarySource: hasSummary ? "front-matter" : "excerpt",
    body: source.parsed.body,
    tags: Object.freeze(tags.accepted),
    draft,
    frontMatter: Object.freeze({ ...fm }),
  };
  return Object.freeze(doc);
}

/** Absent means false; anything other than "true"/"false" is rejected. */
function parseBoolean(value: string | undefined): boolean | null {
  if (value === undefined) return false;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true") return true;
  if (normalized === "false" || normalized === "") return false;
  return null;
}

function parseTags(value: string | undefined): { accepted: string[]; rejected: string[] } {
  const accepted = new Set<string>();
  const rejected: string[] = [];
  for (const raw of (value ?? "").split(",")) {
    const trimmed = raw.trim();
    if (!trimmed) continue;
    const tag = slugSegment(trimmed);
    if (tag) accepted.add(tag);
    else rejected.push(trimmed);
  }
  return { accepted: [...accepted].sort(), rejected };
}

/**
 * Every source whose identifier or slug is shared with another source gets a
 * diagnostic naming all of them, since their pages would overwrite each other.
 * Slugs differing only in case collide on case-insensitive filesystems.
 */
function checkUniqueness(sources: readonly ContentSource[], acc: DiagnosticAccumulator<SiteDiagnostic>): void {
  const bySlug = new Map<string, ContentSource[]>();
  for (const source of sources) {
    const slug = slugify(source.identifier).toLowerCase();
    if (!slug) continue;
    const group = bySlug.get(slug);
    if (group) group.push(source);
    else bySlug.set(slug, [source]);
  }

  for (const [slug, group] of bySlug) {
    if (group.length < 2) continue;
    const sameIdentifier = group.every((s) => s.identifier === group[0]?.identifier);
    const what = sameIdentifier ? `identifier "${group[0]?.identifier ?? slug}"` : `slug "${slug}"`;
    for (const source of group) {
      const others = group.filter((s) => s !== source).map((s) => s.sourcePath);
      acc.push(siteDiagnostic("sssg/duplicate-identifier", {
        message: `derives the same ${what} as ${others.join(", ")}`,
        source: source.sourcePath,
        data: { slug, sources: group.map((s) => s.sourcePath) },
      }));
    }
  }
}

function groupByTag(documents: readonly Document[]): ReadonlyMap<string, readonly Document[]> {
  const groups = new Map<string, Document[]>();
  for (const doc of documents) {
    for (const tag of doc.tags) {
      const group = groups.get(tag);
      if (group) group.push(doc);
      else groups.set(tag, [doc]);
    }
  }
  const sorted = new Map<string, readonly Document[]>();
  for (const tag of [...groups.keys()].sort()) {
    sorted.set(tag, Object.freeze(groups.get(tag) ?? []));
  }
  return sorted;
}
