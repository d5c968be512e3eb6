import * as fs from "node:fs";
import * as path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ArticleCursor, wiki2csv, flattenArticle } from "@wikicorpus/wikitext";
import { tempDir, removeDir, writeTree, articleOf } from "./fixtures.js";

let root: string;
let out: string;

beforeEach(() => {
  root = tempDir();
  out = tempDir();
});

afterEach(() => {
  removeDir(root);
  removeDir(out);
});

function words(prefix: string, n: number): string {
  return Array.from({ length: n }, (_, i) => `${prefix}${i}`).join(" ");
}

describe("flattenArticle", () => {
  it("trims paragraphs and counts them like the writer", () => {
    expect(flattenArticle("  x y  \n z")).toEqual({ body: "x y\nz", tokenCount: 3 + 2 });
  });
});

describe("wiki2csv", () => {
  it("writes one quoted row per accepted article", async () => {
    const p1 = words("p", 60);
    const p2 = words("q", 50);
    writeTree(root, {
      "AA/wiki_00": [{ title: "Long", text: `${p1}\n${p2}` }, articleOf("Short", 20)],
    });
    const file = path.join(out, "wiki.csv");
    const stats = await wiki2csv(file, ArticleCursor.open(root));
    expect(stats).toEqual({ documents: 1, tokens: 61 + 51 + 1 });
    expect(fs.readFileSync(file, "utf-8")).toBe(`"${p1}\n${p2}"\n`);
  });

  it("stops once the budget is exceeded", async () => {
    writeTree(root, {
      "AA/wiki_00": [articleOf("A", 100), articleOf("B", 100), articleOf("C", 100)],
    });
    const file = path.join(out, "wiki.csv");
    const stats = await wiki2csv(file, ArticleCursor.open(root), 150);
    expect(stats).toEqual({ documents: 2, tokens: 202 });
  });

  it("reports progress every interval of pulled articles, short ones included", async () => {
    writeTree(root, {
      "AA/wiki_00": [
        articleOf("A", 100),
        articleOf("B", 10),
        articleOf("C", 100),
        articleOf("D", 100),
        articleOf("E", 10),
      ],
    });
    const onProgress = vi.fn();
    const stats = await wiki2csv(path.join(out, "wiki.csv"), ArticleCursor.open(root), undefined, onProgress, 2);
    expect(stats).toEqual({ documents: 3, tokens: 303 });
    // fires before the pulled article is counted
    expect(onProgress.mock.calls).toEqual([
      [2, 101],
      [4, 202],
    ]);
  });
});
