import * as fs from "node:fs";
import * as path from "node:path";
import * as readline from "node:readline";
import { SourceError, type Article, type MalformedPolicy } from "@wikicorpus/core";

/**
 * Shard files under `root`, in enumeration order: the root's subdirectories
 * sorted by name, then each one's files sorted by name. Other entries are
 * ignored at both levels.
 */
export function listShardFiles(root: string): string[] {
  const files: string[] = [];
  const shards = fs
    .readdirSync(root, { withFileTypes: true })
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort(byCodeUnit);
  for (const shard of shards) {
    const dir = path.join(root, shard);
    const names = fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((e) => e.isFile())
      .map((e) => e.name)
      .sort(byCodeUnit);
    for (const name of names) files.push(path.join(dir, name));
  }
  return files;
}

function byCodeUnit(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Parse one record line. Returns undefined when it is not a usable record. */
export function parseRecord(line: string): Article | undefined {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (typeof data !== "object" || data === null) return undefined;
  const title: unknown = Reflect.get(data, "title");
  const text: unknown = Reflect.get(data, "text");
  if (typeof title !== "string" || typeof text !== "string") return undefined;
  return { title, text };
}

/** Placeholder records whose body is just the title. */
export function isStub(article: Article): boolean {
  return article.text.trim() === article.title.trim();
}

export interface ReadArticlesOptions {
  /** Default "fail". */
  onMalformed?: MalformedPolicy;
  /** Called for every record dropped under the "skip" policy. */
  onSkip?: (file: string, line: number) => void;
}

/**
 * Lazily stream every non-stub article under `root`.
 * Only the file currently being read is open.
 */
export async function* readArticles(
  root: string,
  options: ReadArticlesOptions = {},
): AsyncGenerator<Article, void, undefined> {
  const policy = options.onMalformed ?? "fail";

  for (const file of listShardFiles(root)) {
    const input = fs.createReadStream(file, { encoding: "utf-8" });
    const rl = readline.createInterface({ input, crlfDelay: Infinity });
    try {
      let lineNo = 0;
      for await (const line of rl) {
        lineNo++;
        if (line.trim().length === 0) continue;
        const article = parseRecord(line);
        if (!article) {
          if (policy === "fail") {
            throw new SourceError({ message: `Malformed record at ${file}:${lineNo}`, path: file, line: lineNo });
          }
          options.onSkip?.(file, lineNo);
          continue;
        }
        if (isStub(article)) continue;
        yield article;
      }
    } finally {
      rl.close();
      input.destroy();
    }
  }
}

/**
 * Shared single-pass position over an article stream.
 *
 * Consumers pull with `next()` rather than `for await`, because leaving a
 * `for await` loop early closes the underlying generator and the next
 * consumer would find the stream finished.
 */
export class ArticleCursor {
  private readonly _iter: AsyncIterator<Article, void, undefined>;
  private _exhausted = false;
  private _consumed = 0;
  private _skipped = 0;

  constructor(iter: AsyncIterator<Article, void, undefined>) {
    this._iter = iter;
  }

  /** Cursor over `readArticles(root)`, counting skipped records. */
  static open(root: string, onMalformed: MalformedPolicy = "fail"): ArticleCursor {
    let cursor: ArticleCursor | undefined;
    const iter = readArticles(root, {
      onMalformed,
      onSkip: () => {
        if (cursor) cursor._skipped++;
      },
    });
    cursor = new ArticleCursor(iter);
    return cursor;
  }

  /** Next article, or undefined once the stream is exhausted. */
  async next(): Promise<Article | undefined> {
    if (this._exhausted) return undefined;
    const res = await this._iter.next();
    if (res.done) {
      this._exhausted = true;
      return undefined;
    }
    this._consumed++;
    return res.value;
  }

  get exhausted(): boolean {
    return this._exhausted;
  }

  /** Articles handed out so far. */
  get consumed(): number {
    return this._consumed;
  }

  /** Malformed records dropped under the "skip" policy. */
  get skipped(): number {
    return this._skipped;
  }

  /** Release the open file, if any. Idempotent. */
  async close(): Promise<void> {
    if (this._exhausted) return;
    this._exhausted = true;
    await this._iter.return?.();
  }
}
