/**
 * Command: lexembed vocab build
 */
import { Effect } from "effect";
import { defaultVocabularyConfig, textModelParams } from "@lexembed/core";
import { withLogging } from "@lexembed/effect-runtime";
import {
  SeqTokenizer,
  TextModel,
  buildVocabulary,
  computeBaseVocabulary,
  saveVocabulary,
} from "@lexembed/tokenizers";
import { readTexts } from "@lexembed/train";
import { parseKV, requireArg, intArg, strArg, boolArg, loadConfig } from "../parse.js";

export async function vocabBuildCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const inputPath = requireArg(kv, "input", "newline-delimited corpus");
  const lang = strArg(kv, "lang", "es");
  const sizeExponent = intArg(kv, "sizeExponent", defaultVocabularyConfig.sizeExponent);
  const limit = kv["limit"] ? intArg(kv, "limit", 0) : undefined;
  const prefixSuffix = boolArg(kv, "prefixSuffix", defaultVocabularyConfig.prefixSuffix);
  const logLevel = strArg(kv, "log", "info");

  console.log(`Building ${lang} vocabulary from ${inputPath} (2^${sizeExponent} tokens)`);

  const program = Effect.gen(function* () {
    const texts = yield* readTexts(inputPath, { limit });
    const base = yield* computeBaseVocabulary(texts, new TextModel(textModelParams(lang)));
    const report = yield* buildVocabulary(base, texts, { sizeExponent, prefixSuffix, limit });
    const tokenizer = SeqTokenizer.fromArtifact(report.artifact, { sizeExponent });
    const outPath = strArg(kv, "out", `${tokenizer.identifier}.json.gz`);
    yield* saveVocabulary(outPath, report.artifact);
    return { outPath, size: tokenizer.vocabSize, records: report.records };
  });

  const result = await Effect.runPromise(program.pipe(withLogging(logLevel)));
  console.log(`Vocabulary built: ${result.size} tokens from ${result.records} records`);
  console.log(`Saved to ${result.outPath}`);
}
