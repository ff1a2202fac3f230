#!/usr/bin/env node
/**
 * lexembed CLI entry point.
 *
 * Commands: vocab build, train, transform, convert
 */
import { vocabBuildCmd } from "./commands/vocab-build.js";
import { trainCmd } from "./commands/train.js";
import { transformCmd } from "./commands/transform.js";
import { convertCmd } from "./commands/convert.js";
import { listImplementations } from "./resolve.js";

const USAGE = `
lexembed: sub-word vocabularies and per-token classifier embeddings

Commands:
  vocab build      Build a fixed-size sub-word vocabulary from a corpus
  train            Train one linear classifier per feasible token
  transform        Encode records with a trained model
  convert          Re-encode a model's coefficients at another precision

Options:
  --help, -h       Show this help
  --config=FILE    JSON file of defaults; --key=value arguments override it

Examples:
  lexembed vocab build --input=data/corpus.json.gz --lang=es --sizeExponent=13
  lexembed train --input=data/corpus.json.gz --vocabulary=seqtm_es_13.json.gz --out=model.json.gz --minPos=512
  lexembed transform --model=model.json.gz --input=data/labeled.json --out=vectors.json
  lexembed transform --model=model.json.gz --input=data/labeled.json --out=scores.json --kfold=5
  lexembed convert --input=model.json.gz --out=model-f16.json.gz --from=f32 --to=f16
`.trim();

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    console.log(`\n${listImplementations()}`);
    process.exit(0);
  }

  const command = args[0];

  if (command === "vocab" && args[1] === "build") {
    await vocabBuildCmd(args.slice(2));
  } else if (command === "train") {
    await trainCmd(args.slice(1));
  } else if (command === "transform") {
    await transformCmd(args.slice(1));
  } else if (command === "convert") {
    await convertCmd(args.slice(1));
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
