import rehypeHighlight from "rehype-highlight";
import rehypeStringify from "rehype-stringify";
import { remark } from "remark";
import remarkGfm from "remark-gfm";
import remarkRehype from "remark-rehype";

/**
 * Markdown -> HTML capability. Injected into the renderer so tests and other
 * dialects can swap it out; a throw or rejection fails only that document.
 */
export type MarkdownRenderer = (markdown: string) => string | Promise<string>;

/**
 * Default renderer: GitHub Flavored Markdown (tables, strikethrough, task lists,
 * autolinks) through remark, then rehype for code highlighting. Raw HTML in posts
 * is kept; content is author-controlled.
 *
 * Fenced code is highlighted with highlight.js classes (`hljs`, `hljs-*`). A fence
 * without a language tag has its language detected.
 */
export function createMarkdownRenderer(): MarkdownRenderer {
  const processor = remark()
    .use(remarkGfm)
    .use(remarkRehype, { allowDangerousHtml: true })
    .use(rehypeHighlight, { detect: true })
    .use(rehypeStringify, { allowDangerousHtml: true });

  return async (markdown: string): Promise<string> => {
    const file = await processor.process(markdown);
    return String(file);
  };
}
