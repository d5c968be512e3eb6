import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Article } from "@wikicorpus/core";

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "wikicorpus-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * A single-paragraph article whose whitespace token count is exactly
 * `tokenCount` (the paragraph holds `tokenCount - 1` words).
 */
export function articleOf(title: string, tokenCount: number): Article {
  const words: string[] = [];
  for (let i = 0; i < tokenCount - 1; i++) words.push(`${title.toLowerCase()}${i}`);
  return { title, text: words.join(" ") };
}

/**
 * Write a shard tree: `{ "AA/wiki_00": [articles or raw lines] }`.
 * Returns the root.
 */
export function writeTree(root: string, files: Record<string, Array<Article | string>>): string {
  for (const [rel, records] of Object.entries(files)) {
    const file = path.join(root, rel);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const lines = records.map((r) => (typeof r === "string" ? r : JSON.stringify({ id: "1", ...r })));
    fs.writeFileSync(file, lines.join("\n") + "\n", "utf-8");
  }
  return root;
}

/** Titles of the `= title =` headers in a tokens file, in order. */
export function headers(file: string): string[] {
  const out: string[] = [];
  for (const line of fs.readFileSync(file, "utf-8").split("\n")) {
    const m = /^= (.*) =$/.exec(line);
    if (m) out.push(m[1]);
  }
  return out;
}
