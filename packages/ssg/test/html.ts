/**
 * Small parse5 helpers for asserting on generated pages by structure rather than
 * by string matching.
 */

import { parse, type DefaultTreeAdapterMap } from "parse5";

type Node = DefaultTreeAdapterMap["node"];
export type Element = DefaultTreeAdapterMap["element"];

function isElement(node: Node): node is Element {
  return "tagName" in node;
}

function childrenOf(node: Node): Node[] {
  return "childNodes" in node ? node.childNodes : [];
}

export function parseHtml(html: string): Node {
  return parse(html);
}

/** Every element with the given tag name, in document order. */
export function findAll(root: Node, tagName: string): Element[] {
  const found: Element[] = [];
  const visit = (node: Node): void => {
    if (isElement(node) && node.tagName === tagName) found.push(node);
    childrenOf(node).forEach(visit);
  };
  visit(root);
  return found;
}

export function attr(element: Element, name: string): string | undefined {
  return element.attrs.find((a) => a.name === name)?.value;
}

export function textOf(node: Node): string {
  if (node.nodeName === "#text" && "value" in node) return node.value;
  return childrenOf(node).map(textOf).join("");
}
