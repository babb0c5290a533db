import { describe, it, expect } from "vitest";
import { pageSegment, slugify, slugSegment } from "../src/model/slug.js";

describe("slugSegment", () => {
  it("lowercases and joins words with dashes", () => {
    expect(slugSegment("Hello World")).toBe("hello-world");
    expect(slugSegment("  C++ & Rust!  ")).toBe("c-rust");
  });

  it("folds accents", () => {
    expect(slugSegment("Café_notes")).toBe("cafe-notes");
  });

  it("returns an empty string when nothing URL-safe remains", () => {
    expect(slugSegment("!!!")).toBe("");
  });
});

describe("pageSegment", () => {
  it("keeps case and underscores", () => {
    expect(pageSegment("My_Post")).toBe("My_Post");
  });

  it("folds accents and dashes everything else", () => {
    expect(pageSegment("Café notes (draft)")).toBe("Cafe-notes-draft");
  });
});

describe("slugify", () => {
  it("keeps directory structure and the names' case", () => {
    expect(slugify("Notes/My First Post")).toBe("Notes/My-First-Post");
  });

  it("leaves an existing permalink unchanged", () => {
    expect(slugify("My_Post")).toBe("My_Post");
  });

  it("drops segments that slug to nothing", () => {
    expect(slugify("???/post")).toBe("post");
  });
});
