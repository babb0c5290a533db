/**
 * Configuration loading and resolution
 */

import { describe, it, beforeEach, afterEach, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigError, loadConfigFile, resolveConfig } from "../src/config.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "sssg-config-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function failure(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => null,
    (e: unknown) => e,
  );
}

describe("loadConfigFile", () => {
  it("returns null when there is no config file", async () => {
    expect(await loadConfigFile(dir)).toBe(null);
  });

  it("reads sssg.config.json from the root", async () => {
    await writeFile(join(dir, "sssg.config.json"), JSON.stringify({ site: { title: "Blog" }, includeDrafts: true }));
    expect(await loadConfigFile(dir)).toEqual({ site: { title: "Blog" }, includeDrafts: true });
  });

  it("fails when an explicit config file is missing", async () => {
    expect(await failure(loadConfigFile(dir, "other.json"))).toBeInstanceOf(ConfigError);
  });

  it("fails on invalid JSON", async () => {
    await writeFile(join(dir, "sssg.config.json"), "{ nope");
    const error = await failure(loadConfigFile(dir));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof Error && error.message.startsWith(`Config file ${join(dir, "sssg.config.json")} is not valid JSON`)).toBe(true);
  });

  it("lists every schema problem", async () => {
    await writeFile(join(dir, "sssg.config.json"), JSON.stringify({ concurrency: 0, colour: "blue" }));
    const error = await failure(loadConfigFile(dir));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.issues).toHaveLength(2);
    expect(error instanceof ConfigError && error.issues.some((i) => i.startsWith("concurrency: "))).toBe(true);
  });
});

describe("resolveConfig", () => {
  it("fills every default", () => {
    const config = resolveConfig(dir, null);
    expect(config).toEqual({
      root: dir,
      contentDir: join(dir, "posts"),
      outDir: join(dir, "_site"),
      extensions: [".md", ".markdown"],
      metadata: { title: "Home", description: "", baseUrl: null, author: null },
      excerptLength: 200,
      includeDrafts: false,
      concurrency: 4,
      feed: null,
      comments: null,
    });
  });

  it("lets command-line overrides win over the file", () => {
    const config = resolveConfig(
      dir,
      { contentDir: "content", outDir: "public", concurrency: 8, includeDrafts: false },
      { outDir: "dist", concurrency: 2, includeDrafts: true },
    );
    expect(config.contentDir).toBe(join(dir, "content"));
    expect(config.outDir).toBe(join(dir, "dist"));
    expect(config.concurrency).toBe(2);
    expect(config.includeDrafts).toBe(true);
  });

  it("enables the feed and comments with defaults", () => {
    const config = resolveConfig(dir, {
      site: { baseUrl: "https://blog.example.test/" },
      feed: true,
      comments: { repo: "someone/blog" },
    });
    expect(config.metadata.baseUrl).toBe("https://blog.example.test");
    expect(config.feed).toEqual({ baseUrl: "https://blog.example.test", limit: 20 });
    expect(config.comments).toEqual({
      repo: "someone/blog",
      issueTerm: "pathname",
      label: "comment",
      theme: "preferred-color-scheme",
    });
  });

  it("needs a base URL for the feed", () => {
    expect(() => resolveConfig(dir, { feed: { limit: 5 } })).toThrow(ConfigError);
  });

  it("refuses an output directory that would swallow the content or the root", () => {
    expect(() => resolveConfig(dir, null, { contentDir: "site/posts", outDir: "site" })).toThrow(ConfigError);
    expect(() => resolveConfig(dir, null, { outDir: "posts" })).toThrow(ConfigError);
    expect(() => resolveConfig(join(dir, "project"), null, { outDir: ".." })).toThrow(ConfigError);
  });
});
