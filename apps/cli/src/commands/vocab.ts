/**
 * Command: wikicorpus vocab <file...>
 */
import { ConfigError } from "@wikicorpus/core";
import { countUnique } from "@wikicorpus/wikitext";
import { positionals } from "../parse.js";

export async function vocabCmd(args: string[]): Promise<void> {
  const files = positionals(args);
  if (files.length === 0) {
    throw new ConfigError({ message: "Usage: wikicorpus vocab <file...>" });
  }
  for (const file of files) {
    console.log(`Unique tokens ${file} - ${await countUnique(file)}`);
  }
}
