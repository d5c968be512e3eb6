#!/usr/bin/env node
/**
 * wikicorpus CLI — the main entry point.
 *
 * Commands: build, csv, vocab
 */
import { loadEnvFile } from "./env.js";
import { buildCmd } from "./commands/build.js";
import { csvCmd } from "./commands/csv.js";
import { vocabCmd } from "./commands/vocab.js";

const USAGE = `
wikicorpus — token-budgeted train/valid/test corpora from extracted wiki articles

Commands:
  build            Write <lang>.wiki.{train,valid,test}.tokens
  csv              Export accepted articles as one-column CSV
  vocab            Count distinct tokens in finished files

Options (build):
  --input, -i      Directory of article shards (required)
  --output, -o     Output root; files go to <output>/<lang>/ (required)
  --lang, -l       Language code, e.g. en, hi (required)
  --tokens, -t     Total token budget; omitted: scan the input first
  --tokenizer      segmenter (default) | whitespace
  --onMalformed    fail (default) | skip
  --config         JSON file of defaults for the options above
  --logLevel       debug | info | warn | error
  --help, -h       Show this help

Examples:
  wikicorpus build -i data/wiki_extr/hi -o data/wiki -l hi -t 13000000
  wikicorpus csv --input=data/wiki_extr/hi --out=data/hi.csv
  wikicorpus vocab data/wiki/hi/hi.wiki.train.tokens
`.trim();

async function main() {
  loadEnvFile();
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    process.exit(0);
  }

  const command = args[0];

  if (command === "build") {
    await buildCmd(args.slice(1));
  } else if (command === "csv") {
    await csvCmd(args.slice(1));
  } else if (command === "vocab") {
    await vocabCmd(args.slice(1));
  } else {
    console.error(`Unknown command: ${args.join(" ")}`);
    console.log(USAGE);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
