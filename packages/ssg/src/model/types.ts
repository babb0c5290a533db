import type { FrontMatterData } from "../front-matter/index.js";
import type { CalendarDate } from "./date.js";

/** One validated post. Frozen once built; rendering never writes to it. */
export interface Document {
  /** Relative source path without extension, `/`-separated. Unique in the site. */
  readonly identifier: string;
  /** URL-safe form of the identifier; names the output page. */
  readonly slug: string;
  /** Source path relative to the content root. */
  readonly sourcePath: string;
  readonly title: string;
  readonly date: CalendarDate;
  readonly summary: string;
  /** Whether `summary` came from front matter or was derived from the body. */
  readonly summarySource: "front-matter" | "excerpt";
  /** Raw Markdown body. */
  readonly body: string;
  /** Normalized tag names, sorted. */
  readonly tags: readonly string[];
  readonly draft: boolean;
  /** Every front-matter key, including ones the generator does not interpret. */
  readonly frontMatter: FrontMatterData;
}

export interface SiteMetadata {
  readonly title: string;
  readonly description: string;
  /** Absolute URL the site is served from, without trailing slash. Needed for feeds. */
  readonly baseUrl: string | null;
  readonly author: string | null;
}

/**
 * The ordered document collection plus derived views.
 */
export interface Site {
  readonly metadata: SiteMetadata;
  /** Date descending, ties by identifier ascending. */
  readonly documents: readonly Document[];
  /** Tag name -> documents in site order; keys in ascending order. */
  readonly tags: ReadonlyMap<string, readonly Document[]>;
}
