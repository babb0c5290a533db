/**
 * Site Renderer Tests
 *
 * Markdown and templating are stubbed so each assertion sees exact strings.
 */

import { describe, it, expect } from "vitest";
import type { AssetFile, ContentSource } from "../src/content/index.js";
import { parseFrontMatter } from "../src/front-matter/index.js";
import { buildSite, type Site } from "../src/model/index.js";
import { renderSite, type MarkdownRenderer, type PageTemplate } from "../src/render/index.js";

function post(sourcePath: string, fields: Record<string, string>, body: string): ContentSource {
  const lines = Object.entries(fields).map(([k, v]) => `${k} = "${v}"`);
  return {
    identifier: sourcePath.replace(/\.[^.]+$/, ""),
    sourcePath,
    absolutePath: `/content/${sourcePath}`,
    parsed: parseFrontMatter(["---", ...lines, "---", "", body].join("\n"), sourcePath).value,
  };
}

function site(...sources: ContentSource[]): Site {
  const { value, diagnostics } = buildSite(sources, { metadata: { title: "Blog" } });
  expect(diagnostics).toEqual([]);
  return value;
}

const markdown: MarkdownRenderer = (text) => `<p>${text.trim()}</p>`;

const template: PageTemplate = {
  post: ({ document, html, displayDate, root }) => `post:${document.title}:${displayDate}:${root}:${html}`,
  index: ({ entries }) => `index:${entries.map((e) => `${e.title}@${e.href}`).join(",")}`,
  tag: ({ tag, entries, root }) => `tag:${tag}:${root}:${entries.map((e) => e.href).join(",")}`,
};

describe("renderSite", () => {
  it("plans one page per document plus the index, sorted by path", async () => {
    const input = site(
      post("hello.md", { title: "Hi", date: "May 1, 2020" }, "Body text"),
      post("notes/later.md", { title: "Later", date: "2021-01-01" }, "More"),
    );

    const { value, diagnostics } = await renderSite(input, [], { markdown, template });

    expect(diagnostics).toEqual([]);
    expect(value.pages.map((p) => [p.path, p.contents])).toEqual([
      ["hello.html", "post:Hi:May 1, 2020::<p>Body text</p>"],
      ["index.html", "index:Later@notes/later.html,Hi@hello.html"],
      ["notes/later.html", "post:Later:January 1, 2021:../:<p>More</p>"],
    ]);
    expect(value.pages[0]?.source).toBe("hello.md");
    expect(value.pages[1]?.source).toBe(undefined);
  });

  it("renders tag pages with links relative to the tags directory", async () => {
    const input = site(post("a.md", { title: "A", date: "2020-01-01", tags: "Notes" }, "x"));

    const { value } = await renderSite(input, [], { markdown, template });

    expect(value.pages.find((p) => p.path === "tags/notes.html")?.contents).toBe("tag:notes:../:../a.html");
  });

  it("keeps rendering the other documents when one fails", async () => {
    const input = site(
      post("good.md", { title: "Good", date: "2020-01-02" }, "fine"),
      post("bad.md", { title: "Bad", date: "2020-01-01" }, "explode"),
    );
    const failing: MarkdownRenderer = async (text) => {
      if (text.includes("explode")) throw new Error("renderer blew up");
      return `<p>${text}</p>`;
    };

    const { value, diagnostics } = await renderSite(input, [], { markdown: failing, template });

    expect(diagnostics).toEqual([
      {
        code: "sssg/render-failed",
        message: "renderer blew up",
        stage: "render",
        severity: "error",
        source: "bad.md",
      },
    ]);
    expect(value.pages.map((p) => p.path)).toEqual(["good.html", "index.html"]);
  });

  it("reports a failing aggregate template against the page path", async () => {
    const input = site(post("a.md", { title: "A", date: "2020-01-01" }, "x"));
    const broken: PageTemplate = {
      ...template,
      index: () => {
        throw new Error("no layout");
      },
    };

    const { diagnostics } = await renderSite(input, [], { markdown, template: broken });

    expect(diagnostics.map((d) => d.message)).toEqual(["index.html: no layout"]);
  });

  it("never runs more renders at once than the concurrency limit", async () => {
    const input = site(
      ...["a", "b", "c", "d", "e"].map((name, i) => post(`${name}.md`, { title: name, date: `2020-01-0${i + 1}` }, name)),
    );
    let active = 0;
    let peak = 0;
    const slow: MarkdownRenderer = async (text) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
      return text;
    };

    await renderSite(input, [], { markdown: slow, template, concurrency: 2 });

    expect(peak).toBe(2);
  });

  it("flags an asset that would overwrite a generated page", async () => {
    const input = site(post("hello.md", { title: "Hi", date: "2020-01-01" }, "x"));
    const assets: AssetFile[] = [
      { relativePath: "hello.html", absolutePath: "/content/hello.html" },
      { relativePath: "cat.png", absolutePath: "/content/cat.png" },
    ];

    const { value, diagnostics } = await renderSite(input, assets, { markdown, template });

    expect(diagnostics.map((d) => [d.code, d.source, d.message])).toEqual([
      ["sssg/output-collision", "hello.html", "asset would overwrite the generated page hello.html"],
    ]);
    expect(value.assets).toBe(assets);
  });

  it("flags a post that lands on the index page", async () => {
    const input = site(post("index.md", { title: "Index", date: "2020-01-01" }, "x"));

    const { diagnostics } = await renderSite(input, [], { markdown, template });

    expect(diagnostics.map((d) => [d.code, d.source, d.message])).toEqual([
      ["sssg/output-collision", "index.md", "page index.html is generated twice; rename the source file"],
    ]);
  });

  it("writes a JSON feed when configured", async () => {
    const input = site(
      post("a.md", { title: "A", date: "2020-01-01", tags: "x" }, "alpha"),
      post("b.md", { title: "B", date: "2020-02-01", summary: "Bee" }, "beta"),
    );

    const { value } = await renderSite(input, [], {
      markdown,
      template,
      feed: { baseUrl: "https://blog.example.test/", limit: 1 },
    });

    const feedPage = value.pages.find((p) => p.path === "feed.json");
    expect(feedPage).toBeDefined();
    const feed: unknown = JSON.parse(feedPage?.contents ?? "null");
    expect(feed).toEqual({
      version: "https://jsonfeed.org/version/1.1",
      title: "Blog",
      home_page_url: "https://blog.example.test/",
      feed_url: "https://blog.example.test/feed.json",
      items: [
        {
          id: "https://blog.example.test/b.html",
          url: "https://blog.example.test/b.html",
          title: "B",
          summary: "Bee",
          content_html: "<p>beta</p>",
          date_published: "2020-02-01T00:00:00Z",
        },
      ],
    });
    expect(feedPage?.contents.endsWith("}\n")).toBe(true);
  });

  it("writes no feed by default", async () => {
    const input = site(post("a.md", { title: "A", date: "2020-01-01" }, "x"));
    const { value } = await renderSite(input, [], { markdown, template });
    expect(value.pages.some((p) => p.path === "feed.json")).toBe(false);
  });
});
