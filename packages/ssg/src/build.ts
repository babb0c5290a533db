/**
 * Build orchestration
 *
 * load -> model -> render (memory) -> emit (disk). Content and validation problems
 * are collected across the whole batch and reported together; nothing is written
 * unless every earlier stage came out clean.
 */

import { debug, DiagnosticAccumulator } from "@sssg/shared";
import type { ResolvedSiteConfig } from "./config.js";
import { loadContent } from "./content/index.js";
import type { SiteDiagnostic } from "./diagnostics.js";
import { emitSite } from "./emit/index.js";
import { errorFromDiagnostics } from "./errors.js";
import { buildSite, type Site } from "./model/index.js";
import {
  createDefaultTemplate,
  createMarkdownRenderer,
  renderSite,
  type MarkdownRenderer,
  type PageTemplate,
} from "./render/index.js";

/** Rendering capabilities; defaults are remark for Markdown and the stock template. */
export interface BuildCollaborators {
  markdown?: MarkdownRenderer;
  template?: PageTemplate;
}

export interface BuildResult {
  readonly outDir: string;
  readonly site: Site;
  /** Relative paths of the generated pages. */
  readonly pages: readonly string[];
  /** Relative paths of the copied assets. */
  readonly assets: readonly string[];
  /** Non-fatal diagnostics (warnings) from the run. */
  readonly diagnostics: readonly SiteDiagnostic[];
}

/**
 * Run one full build.
 *
 * @throws ContentReadError | OutputWriteError immediately on I/O failure
 * @throws MalformedFrontMatterError | ValidationError | RenderError after the batch,
 *   carrying every diagnostic collected so far
 */
export async function build(config: ResolvedSiteConfig, collaborators: BuildCollaborators = {}): Promise<BuildResult> {
  const acc = new DiagnosticAccumulator<SiteDiagnostic>();
  debug.build("start", { contentDir: config.contentDir, outDir: config.outDir });

  const content = acc.merge(await loadContent({
    contentDir: config.contentDir,
    extensions: config.extensions,
    exclude: [config.outDir],
  }));

  const site = acc.merge(buildSite(content.sources, {
    metadata: config.metadata,
    excerptLength: config.excerptLength,
    includeDrafts: config.includeDrafts,
  }));
  failOnErrors(acc.diagnostics, "model");

  const plan = acc.merge(await renderSite(site, content.assets, {
    markdown: collaborators.markdown ?? createMarkdownRenderer(),
    template: collaborators.template ?? createDefaultTemplate({ comments: config.comments }),
    concurrency: config.concurrency,
    feed: config.feed,
  }));
  failOnErrors(acc.diagnostics, "render");

  const emitted = await emitSite(plan, config.outDir);
  debug.build("done", { pages: emitted.pages.length, assets: emitted.assets.length });

  return {
    outDir: emitted.outDir,
    site,
    pages: emitted.pages,
    assets: emitted.assets,
    diagnostics: acc.diagnostics,
  };
}

function failOnErrors(diagnostics: readonly SiteDiagnostic[], stage: string): void {
  const error = errorFromDiagnostics(diagnostics);
  if (error) {
    debug.build("failed", { stage, kind: error.kind, diagnostics: error.diagnostics.length });
    throw error;
  }
}
