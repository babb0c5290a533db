/**
 * Site configuration
 *
 * 1. Defaults for every option
 * 2. The `sssg.config.json` schema and loader
 * 3. Resolution: defaults <- config file <- command-line overrides
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { isAbsolute, relative, resolve } from "node:path";
import { z } from "zod";
import { debug } from "@sssg/shared";
import { DEFAULT_CONTENT_EXTENSIONS } from "./content/index.js";
import { DEFAULT_EXCERPT_LENGTH, DEFAULT_SITE_METADATA, type SiteMetadata } from "./model/index.js";
import {
  DEFAULT_FEED_LIMIT,
  DEFAULT_RENDER_CONCURRENCY,
  type CommentsOptions,
  type FeedOptions,
} from "./render/index.js";

// ============================================================================
// Default Values
// ============================================================================

export const CONFIG_FILE_NAME = "sssg.config.json";
export const DEFAULT_CONTENT_DIR = "posts";
export const DEFAULT_OUT_DIR = "_site";

export const DEFAULT_COMMENTS: Omit<CommentsOptions, "repo"> = {
  issueTerm: "pathname",
  label: "comment",
  theme: "preferred-color-scheme",
};

// ============================================================================
// Schema
// ============================================================================

const commentsSchema = z.object({
  repo: z.string().regex(/^[\w.-]+\/[\w.-]+$/, "expected owner/name"),
  issueTerm: z.string().min(1).optional(),
  label: z.string().min(1).optional(),
  theme: z.string().min(1).optional(),
}).strict();

export const siteConfigSchema = z.object({
  contentDir: z.string().min(1).optional(),
  outDir: z.string().min(1).optional(),
  extensions: z.array(z.string().regex(/^\.[A-Za-z0-9]+$/, "expected an extension like .md")).min(1).optional(),
  site: z.object({
    title: z.string().min(1).optional(),
    description: z.string().optional(),
    baseUrl: z.string().url().optional(),
    author: z.string().min(1).optional(),
  }).strict().optional(),
  excerptLength: z.number().int().min(20).optional(),
  concurrency: z.number().int().positive().optional(),
  includeDrafts: z.boolean().optional(),
  feed: z.union([
    z.boolean(),
    z.object({ limit: z.number().int().positive().optional() }).strict(),
  ]).optional(),
  comments: commentsSchema.optional(),
}).strict();

/** Contents of `sssg.config.json`. */
export type SiteConfig = z.infer<typeof siteConfigSchema>;

/** Values given on the command line; each wins over the config file. */
export interface ConfigOverrides {
  contentDir?: string;
  outDir?: string;
  includeDrafts?: boolean;
  concurrency?: number;
}

export interface ResolvedSiteConfig {
  /** Directory relative paths resolve against. */
  root: string;
  contentDir: string;
  outDir: string;
  extensions: readonly string[];
  metadata: SiteMetadata;
  excerptLength: number;
  includeDrafts: boolean;
  concurrency: number;
  feed: FeedOptions | null;
  comments: CommentsOptions | null;
}

/** Invalid configuration or command-line usage; not a content problem. */
export class ConfigError extends Error {
  constructor(message: string, readonly issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}\n${issues.map((i) => `  ${i}`).join("\n")}` : message);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read and validate the config file.
 *
 * @param root - Project root, searched for `sssg.config.json`
 * @param explicitPath - A path given with --config; must exist
 * @returns The parsed config, or null when no file was given and none exists
 */
export async function loadConfigFile(root: string, explicitPath?: string): Promise<SiteConfig | null> {
  const path = explicitPath ? resolve(root, explicitPath) : resolve(root, CONFIG_FILE_NAME);
  if (!explicitPath && !existsSync(path)) {
    debug.config("file.none", { path });
    return null;
  }

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const parsed = siteConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid config file ${path}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`),
    );
  }
  debug.config("file.loaded", { path, keys: Object.keys(parsed.data) });
  return parsed.data;
}

// ============================================================================
// Resolution
// ============================================================================

export function resolveConfig(
  root: string,
  file: SiteConfig | null,
  overrides: ConfigOverrides = {},
): ResolvedSiteConfig {
  const rootDir = resolve(root);
  const config: SiteConfig = file ?? {};

  const metadata: SiteMetadata = {
    title: config.site?.title ?? DEFAULT_SITE_METADATA.title,
    description: config.site?.description ?? DEFAULT_SITE_METADATA.description,
    baseUrl: config.site?.baseUrl?.replace(/\/+$/, "") ?? DEFAULT_SITE_METADATA.baseUrl,
    author: config.site?.author ?? DEFAULT_SITE_METADATA.author,
  };

  const concurrency = overrides.concurrency ?? config.concurrency ?? DEFAULT_RENDER_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const resolved: ResolvedSiteConfig = {
    root: rootDir,
    contentDir: resolveFrom(rootDir, overrides.contentDir ?? config.contentDir ?? DEFAULT_CONTENT_DIR),
    outDir: resolveFrom(rootDir, overrides.outDir ?? config.outDir ?? DEFAULT_OUT_DIR),
    extensions: (config.extensions ?? DEFAULT_CONTENT_EXTENSIONS).map((e) => e.toLowerCase()),
    metadata,
    excerptLength: config.excerptLength ?? DEFAULT_EXCERPT_LENGTH,
    includeDrafts: overrides.includeDrafts ?? config.includeDrafts ?? false,
    concurrency,
    feed: resolveFeed(config.feed, metadata.baseUrl),
    comments: config.comments
      ? {
          repo: config.comments.repo,
          issueTerm: config.comments.issueTerm ?? DEFAULT_COMMENTS.issueTerm,
          label: config.comments.label ?? DEFAULT_COMMENTS.label,
          theme: config.comments.theme ?? DEFAULT_COMMENTS.theme,
        }
      : null,
  };

  // The output directory is replaced wholesale on every build.
  if (resolved.outDir === resolved.contentDir || isInside(resolved.contentDir, resolved.outDir)) {
    throw new ConfigError(`outDir ${resolved.outDir} must not contain the content directory`);
  }
  if (resolved.outDir === rootDir || isInside(rootDir, resolved.outDir)) {
    throw new ConfigError(`outDir ${resolved.outDir} must not contain the project root`);
  }

  debug.config("resolved", {
    contentDir: resolved.contentDir,
    outDir: resolved.outDir,
    feed: resolved.feed !== null,
    comments: resolved.comments !== null,
  });
  return resolved;
}

function resolveFeed(feed: SiteConfig["feed"], baseUrl: string | null): FeedOptions | null {
  if (!feed) return null;
  if (!baseUrl) {
    throw new ConfigError("feed requires site.baseUrl so item links can be absolute");
  }
  return {
    baseUrl,
    limit: typeof feed === "object" ? feed.limit ?? DEFAULT_FEED_LIMIT : DEFAULT_FEED_LIMIT,
  };
}

/** True when `child` lies strictly below `parent`. */
function isInside(child: string, parent: string): boolean {
  const rel = relative(parent, child);
  return rel !== "" && !rel.startsWith("..") && !isAbsolute(rel);
}

function resolveFrom(root: string, path: string): string {
  return isAbsolute(path) ? resolve(path) : resolve(root, path);
}
