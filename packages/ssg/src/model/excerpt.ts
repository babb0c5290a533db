import { remark } from "remark";
import { toString } from "mdast-util-to-string";
import type { Paragraph, RootContent } from "mdast";

export const DEFAULT_EXCERPT_LENGTH = 200;

const ELLIPSIS = "…";

const markdown = remark();

function isParagraph(node: RootContent): node is Paragraph {
  return node.type === "paragraph";
}

/**
 * Plain text of the first top-level paragraph, whitespace collapsed.
 * Longer text is cut at the last word boundary that fits, and ends in "…";
 * the result never exceeds `maxLength` characters. Empty when there is no paragraph.
 */
export function excerpt(body: string, maxLength = DEFAULT_EXCERPT_LENGTH): string {
  const tree = markdown.parse(body);
  const paragraph = tree.children.find(isParagraph);
  if (!paragraph) return "";
  return truncateAtWord(toString(paragraph).replace(/\s+/g, " ").trim(), maxLength);
}

export function truncateAtWord(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;

  const head = text.slice(0, maxLength);
  const space = head.lastIndexOf(" ");
  const cut = space > 0 ? head.slice(0, space) : head.slice(0, Math.max(0, maxLength - 1));
  return `${cut.replace(/[\s,;:]+$/, "")}${ELLIPSIS}`;
}
