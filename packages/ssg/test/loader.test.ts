/**
 * Content Loader Tests
 *
 * Runs against throwaway directories under the OS temp dir.
 */

import { describe, it, beforeEach, afterEach, expect } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { isStub } from "@sssg/shared";
import { ContentReadError } from "../src/errors.js";
import { identifierFromPath, loadContent } from "../src/content/index.js";

let dir: string;

async function put(relativePath: string, contents: string): Promise<void> {
  const path = join(dir, relativePath);
  await mkdir(join(path, ".."), { recursive: true });
  await writeFile(path, contents, "utf-8");
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "sssg-loader-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("identifierFromPath", () => {
  it("drops the extension", () => {
    expect(identifierFromPath("hello.md")).toBe("hello");
    expect(identifierFromPath("notes/tools.markdown")).toBe("notes/tools");
    expect(identifierFromPath("README")).toBe("README");
  });
});

describe("loadContent", () => {
  it("returns sources and assets in sorted path order", async () => {
    await put("zeta.md", '---\ntitle = "Z"\n---\n\nz');
    await put("alpha.md", '---\ntitle = "A"\n---\n\na');
    await put("notes/beta.markdown", "beta body");
    await put("images/cat.png", "png");
    await put("CNAME", "example.test");

    const { value, diagnostics } = await loadContent({ contentDir: dir });

    expect(diagnostics).toEqual([]);
    expect(value.sources.map((s) => s.identifier)).toEqual(["alpha", "notes/beta", "zeta"]);
    expect(value.sources.map((s) => s.sourcePath)).toEqual(["alpha.md", "notes/beta.markdown", "zeta.md"]);
    expect(value.sources[0]?.parsed.frontMatter).toEqual({ title: "A" });
    expect(value.sources[1]?.parsed.hasFrontMatter).toBe(false);
    expect(value.assets.map((a) => a.relativePath)).toEqual(["CNAME", "images/cat.png"]);
    expect(value.assets[1]?.absolutePath).toBe(join(dir, "images", "cat.png"));
  });

  it("skips dotfiles and excluded paths", async () => {
    await put(".draft.md", "hidden");
    await put(".git/config", "x");
    await put("_site/index.html", "old output");
    await put("post.md", "body");

    const { value } = await loadContent({ contentDir: dir, exclude: [join(dir, "_site")] });

    expect(value.sources.map((s) => s.sourcePath)).toEqual(["post.md"]);
    expect(value.assets).toEqual([]);
  });

  it("honours custom extensions case-insensitively", async () => {
    await put("a.txt", "text");
    await put("b.MD", "markdown");

    const { value } = await loadContent({ contentDir: dir, extensions: [".txt"] });

    expect(value.sources.map((s) => s.sourcePath)).toEqual(["a.txt"]);
    expect(value.assets.map((a) => a.relativePath)).toEqual(["b.MD"]);
  });

  it("keeps loading past malformed front matter", async () => {
    await put("bad.md", '---\ntitle = "never closed"\n');
    await put("good.md", '---\ntitle = "Fine"\n---\n');

    const { value, diagnostics } = await loadContent({ contentDir: dir });

    expect(value.sources).toHaveLength(2);
    expect(isStub(value.sources[0]?.parsed)).toBe(true);
    expect(diagnostics.map((d) => [d.code, d.source])).toEqual([["sssg/malformed-front-matter", "bad.md"]]);
  });

  it("throws ContentReadError when the root does not exist", async () => {
    const missing = join(dir, "missing");
    const error = await loadContent({ contentDir: missing }).then(
      () => null,
      (e: unknown) => e,
    );
    expect(error).toBeInstanceOf(ContentReadError);
    expect(error instanceof ContentReadError && error.diagnostics[0]?.code).toBe("sssg/content-read");
  });
});
