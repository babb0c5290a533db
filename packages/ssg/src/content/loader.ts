/**
 * Content Loader
 *
 * Walks the content root, reads every content file through the front-matter parser
 * and records everything else as an asset to copy through. Enumeration is sorted by
 * relative path so two runs over the same tree see files in the same order.
 */

import { readdir, readFile, stat } from "node:fs/promises";
import { extname, join, relative, resolve, sep } from "node:path";
import type { Dirent } from "node:fs";
import { DiagnosticAccumulator, debug, type Diagnosed } from "@sssg/shared";
import { siteDiagnostic, type SiteDiagnostic } from "../diagnostics.js";
import { ContentReadError } from "../errors.js";
import { parseFrontMatter, type ParsedSource } from "../front-matter/index.js";

export const DEFAULT_CONTENT_EXTENSIONS: readonly string[] = [".md", ".markdown"];

export interface LoadContentOptions {
  /** Absolute path of the content root. */
  contentDir: string;
  /** Extensions (with leading dot) that mark a file as content. */
  extensions?: readonly string[];
  /** Absolute paths to leave out of the walk, e.g. an output directory inside the root. */
  exclude?: readonly string[];
}

/** One content file, parsed but not yet validated. */
export interface ContentSource {
  /** Relative path without extension, `/`-separated. */
  readonly identifier: string;
  /** Relative path with extension, `/`-separated. */
  readonly sourcePath: string;
  readonly absolutePath: string;
  /** Parser output; a stub when the front matter was malformed. */
  readonly parsed: ParsedSource;
}

export interface AssetFile {
  readonly relativePath: string;
  readonly absolutePath: string;
}

export interface LoadedContent {
  readonly sources: readonly ContentSource[];
  readonly assets: readonly AssetFile[];
}

interface WalkEntry {
  relativePath: string;
  absolutePath: string;
}

/**
 * Derive a document identifier from its relative source path.
 *
 * - "hello.md" -> "hello"
 * - "notes/tools.markdown" -> "notes/tools"
 */
export function identifierFromPath(relativePath: string): string {
  const ext = extname(relativePath);
  return toPosix(ext ? relativePath.slice(0, -ext.length) : relativePath);
}

/**
 * Discover and read all sources under the content root.
 *
 * @throws ContentReadError when the root or any file under it cannot be read
 */
export async function loadContent(options: LoadContentOptions): Promise<Diagnosed<LoadedContent, SiteDiagnostic>> {
  const root = resolve(options.contentDir);
  const extensions = new Set((options.extensions ?? DEFAULT_CONTENT_EXTENSIONS).map((e) => e.toLowerCase()));
  const exclude = new Set((options.exclude ?? []).map((p) => resolve(p)));

  const entries = await walk(root, root, exclude);
  entries.sort((a, b) => (a.relativePath < b.relativePath ? -1 : a.relativePath > b.relativePath ? 1 : 0));

  const acc = new DiagnosticAccumulator<SiteDiagnostic>();
  const sources: ContentSource[] = [];
  const assets: AssetFile[] = [];

  for (const entry of entries) {
    if (!extensions.has(extname(entry.relativePath).toLowerCase())) {
      debug.load("file.asset", { path: entry.relativePath });
      assets.push(entry);
      continue;
    }

    const text = await readText(entry);
    const parsed = acc.merge(parseFrontMatter(text, entry.relativePath));
    const identifier = identifierFromPath(entry.relativePath);
    debug.load("file.content", { path: entry.relativePath, identifier, keys: Object.keys(parsed.frontMatter) });
    sources.push({
      identifier,
      sourcePath: entry.relativePath,
      absolutePath: entry.absolutePath,
      parsed,
    });
  }

  debug.load("done", { sources: sources.length, assets: assets.length });
  return acc.wrap({ sources, assets });
}

async function walk(root: string, dir: string, exclude: ReadonlySet<string>): Promise<WalkEntry[]> {
  let dirents: Dirent[];
  try {
    dirents = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    throw readError(root, dir, error);
  }

  const found: WalkEntry[] = [];
  for (const dirent of dirents) {
    if (dirent.name.startsWith(".")) continue;
    const absolutePath = join(dir, dirent.name);
    if (exclude.has(absolutePath)) {
      debug.load("walk.excluded", { path: absolutePath });
      continue;
    }

    const kind = await entryKind(root, absolutePath, dirent);
    if (kind === "directory") {
      found.push(...(await walk(root, absolutePath, exclude)));
    } else if (kind === "file") {
      found.push({ relativePath: toPosix(relative(root, absolutePath)), absolutePath });
    }
  }
  return found;
}

async function entryKind(root: string, absolutePath: string, dirent: Dirent): Promise<"file" | "directory" | "other"> {
  if (dirent.isDirectory()) return "directory";
  if (dirent.isFile()) return "file";
  if (!dirent.isSymbolicLink()) return "other";
  try {
    const target = await stat(absolutePath);
    return target.isDirectory() ? "directory" : target.isFile() ? "file" : "other";
  } catch (error) {
    throw readError(root, absolutePath, error);
  }
}

async function readText(entry: WalkEntry): Promise<string> {
  try {
    return await readFile(entry.absolutePath, "utf-8");
  } catch (error) {
    throw new ContentReadError(`Cannot read ${entry.relativePath}`, [
      siteDiagnostic("sssg/content-read", {
        message: describe(error),
        source: entry.relativePath,
      }),
    ], { cause: error });
  }
}

function readError(root: string, path: string, error: unknown): ContentReadError {
  const rel = toPosix(relative(root, path)) || ".";
  return new ContentReadError(`Cannot read content directory ${rel === "." ? root : rel}`, [
    siteDiagnostic("sssg/content-read", {
      message: describe(error),
      source: rel === "." ? null : rel,
    }),
  ], { cause: error });
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}
