export { createMarkdownRenderer, type MarkdownRenderer } from "./markdown.js";
export {
  createDefaultTemplate,
  type CommentsOptions,
  type DefaultTemplateOptions,
  type IndexPageContext,
  type ListingEntry,
  type PageTemplate,
  type PostPageContext,
  type TagLink,
  type TagPageContext,
} from "./template.js";
export { buildJsonFeed, serializeFeed, DEFAULT_FEED_LIMIT, FEED_PATH, type JsonFeed, type JsonFeedItem } from "./feed.js";
export {
  renderSite,
  postPath,
  tagPath,
  INDEX_PATH,
  DEFAULT_RENDER_CONCURRENCY,
  type FeedOptions,
  type OutputPage,
  type RenderPlan,
  type RenderSiteOptions,
} from "./renderer.js";
export { escapeHtml, rootPrefix } from "./html.js";
