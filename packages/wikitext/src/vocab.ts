import * as fs from "node:fs";
import * as readline from "node:readline";

/** Frequency of every whitespace-delimited token in a file. */
export async function countTokenFrequencies(filePath: string): Promise<Map<string, number>> {
  const counts = new Map<string, number>();
  const input = fs.createReadStream(filePath, { encoding: "utf-8" });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) {
      for (const tok of line.trim().split(/\s+/)) {
        if (tok.length === 0) continue;
        counts.set(tok, (counts.get(tok) ?? 0) + 1);
      }
    }
  } finally {
    rl.close();
    input.destroy();
  }
  return counts;
}

/** Vocabulary size of a file. */
export async function countUnique(filePath: string): Promise<number> {
  return (await countTokenFrequencies(filePath)).size;
}
