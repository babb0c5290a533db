import type { Document, SiteMetadata } from "../model/index.js";
import { escapeHtml } from "./html.js";

/** One row of a listing page. `href` is relative to the page it appears on. */
export interface ListingEntry {
  readonly title: string;
  readonly href: string;
  readonly isoDate: string;
  readonly displayDate: string;
  readonly summary: string;
}

export interface TagLink {
  readonly name: string;
  readonly href: string;
  readonly count: number;
}

export interface PostPageContext {
  readonly site: SiteMetadata;
  readonly document: Document;
  /** Rendered body. */
  readonly html: string;
  readonly displayDate: string;
  /** Relative prefix back to the site root ("" or "../"...). */
  readonly root: string;
}

export interface IndexPageContext {
  readonly site: SiteMetadata;
  readonly entries: readonly ListingEntry[];
  readonly tags: readonly TagLink[];
  readonly root: string;
}

export interface TagPageContext {
  readonly site: SiteMetadata;
  readonly tag: string;
  readonly entries: readonly ListingEntry[];
  readonly root: string;
}

/**
 * Templating capability: structured page context in, complete HTML document out.
 * Implementations must be deterministic (no clocks, no randomness).
 */
export interface PageTemplate {
  post(context: PostPageContext): string;
  index(context: IndexPageContext): string;
  tag(context: TagPageContext): string;
}

/** utteranc.es comment thread settings. */
export interface CommentsOptions {
  readonly repo: string;
  readonly issueTerm: string;
  readonly label: string;
  readonly theme: string;
}

export interface DefaultTemplateOptions {
  /** Comment thread under each post; omitted when null. */
  comments?: CommentsOptions | null;
}

const STYLESHEET = `<link rel="stylesheet" href="https://cdnjs.cloudflare.com/ajax/libs/github-markdown-css/5.1.0/github-markdown.min.css" integrity="sha512-KUoB3bZ1XRBYj1QcH4BHCQjurAZnCO3WdrswyLDtp7BMwCw7dPZngSLqILf68SGgvnWHTD5pPaYrXi6wiRJ65g==" crossorigin="anonymous" referrerpolicy="no-referrer" />`;

const LAYOUT_STYLE = `<style>
.markdown-body {
  box-sizing: border-box;
  min-width: 200px;
  max-width: 980px;
  margin: 0 auto;
  padding: 45px;
}

@media (max-width: 767px) {
  .markdown-body {
    padding: 15px;
  }
}
</style>`;

// GitHub light palette for the hljs-* token classes the renderer emits.
const HIGHLIGHT_STYLE = `<style>
.hljs-comment, .hljs-code, .hljs-formula { color: #6a737d; }
.hljs-keyword, .hljs-doctag, .hljs-template-tag, .hljs-template-variable, .hljs-type, .hljs-variable.language_ { color: #d73a49; }
.hljs-title, .hljs-title.class_, .hljs-title.class_.inherited__, .hljs-title.function_ { color: #6f42c1; }
.hljs-attr, .hljs-attribute, .hljs-literal, .hljs-meta, .hljs-number, .hljs-operator, .hljs-selector-attr, .hljs-selector-class, .hljs-selector-id, .hljs-variable { color: #005cc5; }
.hljs-regexp, .hljs-string, .hljs-meta .hljs-string { color: #032f62; }
.hljs-built_in, .hljs-symbol { color: #e36209; }
.hljs-name, .hljs-quote, .hljs-selector-tag, .hljs-selector-pseudo { color: #22863a; }
.hljs-emphasis { font-style: italic; }
.hljs-strong { font-weight: bold; }
.hljs-section { color: #005cc5; font-weight: bold; }
.hljs-bullet { color: #735c0f; }
.hljs-addition { color: #22863a; background-color: #f0fff4; }
.hljs-deletion { color: #b31d28; background-color: #ffeef0; }
</style>`;

function head(title: string, description: string): string {
  const lines = [
    "<head>",
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(title)}</title>`,
  ];
  if (description) {
    lines.push(`<meta name="description" content="${escapeHtml(description)}">`);
  }
  lines.push(STYLESHEET, LAYOUT_STYLE, HIGHLIGHT_STYLE, "</head>");
  return lines.join("\n");
}

function page(title: string, description: string, body: string): string {
  return [
    "<!doctype html>",
    '<html lang="en">',
    head(title, description),
    "<body>",
    body,
    "</body>",
    "</html>",
    "",
  ].join("\n");
}

function listing(entries: readonly ListingEntry[]): string {
  if (entries.length === 0) {
    return "<p>No posts yet.</p>";
  }
  const items = entries.map((entry) => {
    const summary = entry.summary ? `\n<p>${escapeHtml(entry.summary)}</p>` : "";
    return `<li>\n<a href="${escapeHtml(entry.href)}">${escapeHtml(entry.title)}</a>\n<time datetime="${entry.isoDate}">${escapeHtml(entry.displayDate)}</time>${summary}\n</li>`;
  });
  return `<ul class="post-list">\n${items.join("\n")}\n</ul>`;
}

function commentsBlock(comments: CommentsOptions): string {
  return [
    '<script src="https://utteranc.es/client.js"',
    `        repo="${escapeHtml(comments.repo)}"`,
    `        issue-term="${escapeHtml(comments.issueTerm)}"`,
    `        label="${escapeHtml(comments.label)}"`,
    `        theme="${escapeHtml(comments.theme)}"`,
    '        crossorigin="anonymous"',
    "        async>",
    "</script>",
  ].join("\n");
}

/**
 * The stock blog look: GitHub Markdown styling around an article, with an optional
 * utterances comment thread under each post.
 */
export function createDefaultTemplate(options: DefaultTemplateOptions = {}): PageTemplate {
  const comments = options.comments ?? null;

  return {
    post({ site, document, html, displayDate, root }) {
      const body = [
        '<article class="markdown-body">',
        `<p class="post-meta"><a href="${root}index.html">${escapeHtml(site.title)}</a> · <time datetime="${document.date.iso}">${escapeHtml(displayDate)}</time></p>`,
        html.trimEnd(),
        "</article>",
        ...(comments ? [commentsBlock(comments)] : []),
      ].join("\n");
      return page(`${document.title} | ${site.title}`, document.summary, body);
    },

    index({ site, entries, tags }) {
      const tagNav = tags.length > 0
        ? `\n<nav class="tags">\n${tags.map((t) => `<a href="${escapeHtml(t.href)}">${escapeHtml(t.name)}</a> (${t.count})`).join("\n")}\n</nav>`
        : "";
      const intro = site.description ? `\n<p>${escapeHtml(site.description)}</p>` : "";
      const body = [
        '<main class="markdown-body">',
        `<h1>${escapeHtml(site.title)}</h1>${intro}`,
        listing(entries) + tagNav,
        "</main>",
      ].join("\n");
      return page(site.title, site.description, body);
    },

    tag({ site, tag, entries, root }) {
      const body = [
        '<main class="markdown-body">',
        `<p><a href="${root}index.html">${escapeHtml(site.title)}</a></p>`,
        `<h1>Posts tagged “${escapeHtml(tag)}”</h1>`,
        listing(entries),
        "</main>",
      ].join("\n");
      return page(`${tag} | ${site.title}`, "", body);
    },
  };
}
