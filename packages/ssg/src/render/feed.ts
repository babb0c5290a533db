import type { Document, SiteMetadata } from "../model/index.js";

export const FEED_PATH = "feed.json";
export const DEFAULT_FEED_LIMIT = 20;

/** JSON Feed 1.1 (https://jsonfeed.org/version/1.1), the fields this site fills in. */
export interface JsonFeed {
  version: "https://jsonfeed.org/version/1.1";
  title: string;
  home_page_url: string;
  feed_url: string;
  description?: string;
  authors?: { name: string }[];
  items: JsonFeedItem[];
}

export interface JsonFeedItem {
  id: string;
  url: string;
  title: string;
  summary?: string;
  content_html: string;
  date_published: string;
  tags?: string[];
}

export interface FeedEntry {
  readonly document: Document;
  readonly html: string;
  /** Page path relative to the site root. */
  readonly path: string;
}

/**
 * Build the feed for the most recent entries. `entries` must already be in site
 * order; dates are published as midnight UTC so output does not depend on the clock.
 */
export function buildJsonFeed(
  metadata: SiteMetadata,
  baseUrl: string,
  entries: readonly FeedEntry[],
  limit = DEFAULT_FEED_LIMIT,
): JsonFeed {
  const base = baseUrl.replace(/\/+$/, "");
  const feed: JsonFeed = {
    version: "https://jsonfeed.org/version/1.1",
    title: metadata.title,
    home_page_url: `${base}/`,
    feed_url: `${base}/${FEED_PATH}`,
    ...(metadata.description ? { description: metadata.description } : {}),
    ...(metadata.author ? { authors: [{ name: metadata.author }] } : {}),
    items: entries.slice(0, limit).map(({ document, html, path }) => {
      const url = `${base}/${path}`;
      return {
        id: url,
        url,
        title: document.title,
        ...(document.summary ? { summary: document.summary } : {}),
        content_html: html,
        date_published: `${document.date.iso}T00:00:00Z`,
        ...(document.tags.length > 0 ? { tags: [...document.tags] } : {}),
      };
    }),
  };
  return feed;
}

export function serializeFeed(feed: JsonFeed): string {
  return `${JSON.stringify(feed, null, 2)}\n`;
}
