/**
 * CLI Tests
 */

import { describe, it, beforeEach, afterEach, expect } from "vitest";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { ConfigError } from "../src/config.js";
import { EXIT_BUILD_FAILED, EXIT_OK, EXIT_USAGE, parseCliArgs, run, type CliIO } from "../src/cli.js";

let root: string;
let out: string[];
let err: string[];
let io: CliIO;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "sssg-cli-"));
  await mkdir(join(root, "posts"));
  out = [];
  err = [];
  io = { stdout: (line) => out.push(line), stderr: (line) => err.push(line), cwd: root };
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

describe("parseCliArgs", () => {
  it("reads both flag forms", () => {
    expect(parseCliArgs(["--src", "content", "--dst=public", "--drafts", "--concurrency", "3"])).toEqual({
      help: false,
      root: undefined,
      config: undefined,
      overrides: { contentDir: "content", outDir: "public", includeDrafts: true, concurrency: 3 },
    });
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseCliArgs(["--watch"])).toThrow(ConfigError);
    expect(() => parseCliArgs(["--src"])).toThrow("--src needs a value");
    expect(() => parseCliArgs(["--src", "--drafts"])).toThrow("--src needs a value");
    expect(() => parseCliArgs(["--concurrency=0"])).toThrow("--concurrency must be a positive integer, got 0");
  });
});

describe("run", () => {
  it("prints help", async () => {
    expect(await run(["--help"], io)).toBe(EXIT_OK);
    expect(out[0]).toContain("Usage:");
  });

  it("builds and summarizes", async () => {
    await writeFile(join(root, "posts", "hello.md"), '---\ntitle = "Hi"\ndate = "May 1, 2020"\n---\n\nBody text\n');
    await writeFile(join(root, "posts", "cat.png"), "png");

    expect(await run([], io)).toBe(EXIT_OK);
    expect(out).toEqual(["Built 2 pages and copied 1 assets into _site"]);
    expect(err).toEqual([]);
  });

  it("lists every problem and exits 1 on a failed build", async () => {
    await writeFile(join(root, "posts", "a.md"), '---\ndate = "May 1, 2020"\n---\n');
    await writeFile(join(root, "posts", "b.md"), '---\ntitle = "B"\ndate = "soon"\n---\n');

    expect(await run([], io)).toBe(EXIT_BUILD_FAILED);
    expect(err).toEqual([
      "a.md error [sssg/missing-field] title: required field is missing",
      'b.md error [sssg/invalid-date] date: "soon" is not a recognized date (expected e.g. "May 1, 2020" or "2020-05-01")',
      "ValidationError: build failed with 2 errors; nothing was written",
    ]);
    expect(await readdir(root)).toEqual(["posts"]);
  });

  it("exits 2 on a bad argument", async () => {
    expect(await run(["--nope"], io)).toBe(EXIT_USAGE);
    expect(err[0]).toBe("Unknown argument: --nope");
  });

  it("exits 2 on an invalid config file", async () => {
    await writeFile(join(root, "sssg.config.json"), JSON.stringify({ concurrency: "lots" }));
    expect(await run([], io)).toBe(EXIT_USAGE);
    expect(err[0]?.startsWith(`Invalid config file ${join(root, "sssg.config.json")}`)).toBe(true);
  });

  it("resolves paths against --root", async () => {
    const project = join(root, "project");
    await mkdir(join(project, "content"), { recursive: true });
    await writeFile(join(project, "content", "a.md"), '---\ntitle = "A"\ndate = "2020-01-01"\n---\n');

    expect(await run(["--root", project, "--src", "content", "--dst", "public"], io)).toBe(EXIT_OK);
    expect(out).toEqual(["Built 2 pages and copied 0 assets into project/public"]);
  });
});
