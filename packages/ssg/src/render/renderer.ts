/**
 * Site Renderer
 *
 * Turns the Site into an in-memory output plan: one page per document, the index,
 * tag pages and the optional feed, plus the assets to copy. Nothing touches the
 * disk here, so a failed render never leaves files behind.
 */

import pLimit from "p-limit";
import { collect, debug, DiagnosticAccumulator, pure, withDiags, type Diagnosed } from "@sssg/shared";
import type { AssetFile } from "../content/loader.js";
import { siteDiagnostic, type SiteDiagnostic } from "../diagnostics.js";
import { formatCalendarDate, slugSegment, type Document, type Site } from "../model/index.js";
import { buildJsonFeed, serializeFeed, DEFAULT_FEED_LIMIT, FEED_PATH, type FeedEntry } from "./feed.js";
import { rootPrefix } from "./html.js";
import type { MarkdownRenderer } from "./markdown.js";
import type { ListingEntry, PageTemplate, TagLink } from "./template.js";

export const INDEX_PATH = "index.html";
export const DEFAULT_RENDER_CONCURRENCY = 4;

/** A generated file, path relative to the output root, `/`-separated. */
export interface OutputPage {
  readonly path: string;
  readonly contents: string;
  /** Content file the page was rendered from; absent for aggregate pages. */
  readonly source?: string;
}

export interface RenderPlan {
  /** Sorted by path. */
  readonly pages: readonly OutputPage[];
  readonly assets: readonly AssetFile[];
}

export interface FeedOptions {
  /** Absolute site URL the feed links point at. */
  readonly baseUrl: string;
  readonly limit?: number;
}

export interface RenderSiteOptions {
  markdown: MarkdownRenderer;
  template: PageTemplate;
  /** Upper bound on documents rendered at once. */
  concurrency?: number;
  /** Emit feed.json; omitted when null. */
  feed?: FeedOptions | null;
}

interface RenderedDocument {
  readonly document: Document;
  readonly path: string;
  readonly html: string;
  readonly page: string;
}

export function postPath(doc: Document): string {
  return `${doc.slug}.html`;
}

export function tagPath(tag: string): string {
  return `tags/${slugSegment(tag)}.html`;
}

/**
 * Render every document, then the aggregate pages. A document whose Markdown or
 * template throws gets a render-failed diagnostic; the others still render.
 */
export async function renderSite(
  site: Site,
  assets: readonly AssetFile[],
  options: RenderSiteOptions,
): Promise<Diagnosed<RenderPlan, SiteDiagnostic>> {
  const acc = new DiagnosticAccumulator<SiteDiagnostic>();
  const limit = pLimit(Math.max(1, options.concurrency ?? DEFAULT_RENDER_CONCURRENCY));

  // Each task owns its result; failures are joined after all tasks settle.
  const results = await Promise.all(
    site.documents.map((doc) => limit(() => renderDocument(site, doc, options))),
  );
  const rendered = acc
    .merge(collect(results, (r) => r))
    .filter((r): r is RenderedDocument => r !== null);

  const pages: OutputPage[] = rendered.map((r) => ({
    path: r.path,
    contents: r.page,
    source: r.document.sourcePath,
  }));

  const index = acc.merge(renderAggregate(INDEX_PATH, () => options.template.index({
    site: site.metadata,
    entries: listingEntries(site.documents, ""),
    tags: tagLinks(site, ""),
    root: "",
  })));
  if (index !== null) pages.push({ path: INDEX_PATH, contents: index });

  for (const [tag, documents] of site.tags) {
    const path = tagPath(tag);
    const root = rootPrefix(path);
    const html = acc.merge(renderAggregate(path, () => options.template.tag({
      site: site.metadata,
      tag,
      entries: listingEntries(documents, root),
      root,
    })));
    if (html !== null) pages.push({ path, contents: html });
  }

  if (options.feed) {
    const entries: FeedEntry[] = rendered.map((r) => ({ document: r.document, html: r.html, path: r.path }));
    const feed = buildJsonFeed(site.metadata, options.feed.baseUrl, entries, options.feed.limit ?? DEFAULT_FEED_LIMIT);
    pages.push({ path: FEED_PATH, contents: serializeFeed(feed) });
    debug.render("feed", { items: feed.items.length });
  }

  pages.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  checkCollisions(pages, assets, acc);

  debug.render("done", { pages: pages.length, assets: assets.length, diagnostics: acc.diagnostics.length });
  return acc.wrap({ pages, assets });
}

async function renderDocument(
  site: Site,
  document: Document,
  options: RenderSiteOptions,
): Promise<Diagnosed<RenderedDocument | null, SiteDiagnostic>> {
  const path = postPath(document);
  try {
    const html = await options.markdown(document.body);
    const page = options.template.post({
      site: site.metadata,
      document,
      html,
      displayDate: formatCalendarDate(document.date),
      root: rootPrefix(path),
    });
    debug.render("document", { identifier: document.identifier, path, bytes: page.length });
    return pure({ document, path, html, page });
  } catch (error) {
    debug.render("document.failed", { identifier: document.identifier });
    return withDiags(null, [
      siteDiagnostic("sssg/render-failed", {
        message: error instanceof Error ? error.message : String(error),
        source: document.sourcePath,
      }),
    ]);
  }
}

function renderAggregate(path: string, render: () => string): Diagnosed<string | null, SiteDiagnostic> {
  try {
    return pure(render());
  } catch (error) {
    return withDiags(null, [
      siteDiagnostic("sssg/render-failed", {
        message: `${path}: ${error instanceof Error ? error.message : String(error)}`,
      }),
    ]);
  }
}

function listingEntries(documents: readonly Document[], root: string): ListingEntry[] {
  return documents.map((doc) => ({
    title: doc.title,
    href: `${root}${postPath(doc)}`,
    isoDate: doc.date.iso,
    displayDate: formatCalendarDate(doc.date),
    summary: doc.summary,
  }));
}

function tagLinks(site: Site, root: string): TagLink[] {
  return [...site.tags].map(([name, documents]) => ({
    name,
    href: `${root}${tagPath(name)}`,
    count: documents.length,
  }));
}

/**
 * Two outputs must never claim the same path: a post named like an aggregate page,
 * or an asset named like any generated page.
 */
function checkCollisions(
  pages: readonly OutputPage[],
  assets: readonly AssetFile[],
  acc: DiagnosticAccumulator<SiteDiagnostic>,
): void {
  const generated = new Map<string, OutputPage>();
  for (const page of pages) {
    const existing = generated.get(page.path);
    if (existing) {
      const owner = page.source ?? existing.source;
      acc.push(siteDiagnostic("sssg/output-collision", {
        message: `page ${page.path} is generated twice; rename the source file`,
        source: owner,
      }));
      continue;
    }
    generated.set(page.path, page);
  }
  for (const asset of assets) {
    if (generated.has(asset.relativePath)) {
      acc.push(siteDiagnostic("sssg/output-collision", {
        message: `asset would overwrite the generated page ${asset.relativePath}`,
        source: asset.relativePath,
      }));
    }
  }
}
