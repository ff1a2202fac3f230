/**
 * Command: lexembed train
 */
import { Effect } from "effect";
import { defaultTrainConfig, validateTrainConfig, type TrainConfig } from "@lexembed/core";
import { ClassifierFrom, withLogging } from "@lexembed/effect-runtime";
import { Vocabulary, loadVocabulary, projectionFor } from "@lexembed/tokenizers";
import {
  encodeCorpus,
  feasibleTokens,
  readTexts,
  saveModelArtifact,
  trainTokens,
} from "@lexembed/train";
import {
  parseKV,
  requireArg,
  intArg,
  floatArg,
  strArg,
  boolArg,
  precisionArg,
  projectionArg,
  loadConfig,
} from "../parse.js";
import { resolveClassifier, resolveTokenizer, listImplementations } from "../resolve.js";

function logLevelArg(value: string): TrainConfig["logLevel"] {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return defaultTrainConfig.logLevel;
  }
}

export async function trainCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  if (kv["list"]) {
    console.log(listImplementations());
    return;
  }

  const inputPath = requireArg(kv, "input", "newline-delimited corpus");
  const vocabPath = requireArg(kv, "vocabulary", "vocabulary artifact");
  const outPath = requireArg(kv, "out", "output model artifact");

  const config: TrainConfig = {
    minPos: intArg(kv, "minPos", defaultTrainConfig.minPos),
    maxPos: intArg(kv, "maxPos", defaultTrainConfig.maxPos),
    negativeCap: intArg(kv, "negativeCap", defaultTrainConfig.negativeCap),
    precision: precisionArg(kv, "precision", defaultTrainConfig.precision),
    projection: projectionArg(kv, "projection", defaultTrainConfig.projection),
    fitIntercept: boolArg(kv, "intercept", defaultTrainConfig.fitIntercept),
    classifier: strArg(kv, "classifier", defaultTrainConfig.classifier),
    concurrency: intArg(kv, "concurrency", defaultTrainConfig.concurrency),
    seed: intArg(kv, "seed", defaultTrainConfig.seed),
    logLevel: logLevelArg(strArg(kv, "log", defaultTrainConfig.logLevel)),
  };
  validateTrainConfig(config);

  const classifier = resolveClassifier(config.classifier, {
    C: floatArg(kv, "C", 1),
    fitIntercept: config.fitIntercept,
    classWeight: "balanced",
    seed: config.seed,
  });
  const tokenizerName = strArg(kv, "tokenizer", "seq");

  console.log(`── lexembed training ──`);
  console.log(`corpus: ${inputPath} | vocabulary: ${vocabPath}`);
  console.log(`classifier: ${classifier.name} | tokenizer: ${tokenizerName} | precision: ${config.precision}`);
  console.log(`min_pos: ${config.minPos} | max_pos: ${config.maxPos} | concurrency: ${config.concurrency}`);

  const program = Effect.gen(function* () {
    const artifact = yield* loadVocabulary(vocabPath);
    const vocabulary = Vocabulary.fromArtifact(artifact);
    const tokenizer = resolveTokenizer(tokenizerName)(artifact);
    const texts = yield* readTexts(inputPath);
    const corpus = encodeCorpus(tokenizer, texts);
    const tokens = feasibleTokens(vocabulary, corpus.counts, config.minPos);
    yield* Effect.logInfo("corpus encoded").pipe(
      Effect.annotateLogs({ records: corpus.records.length, feasible: tokens.length }),
    );

    const trained = yield* trainTokens(
      tokens,
      {
        vocabulary,
        records: corpus.records,
        projection: projectionFor(config.projection, vocabulary),
        config,
      },
      { concurrency: config.concurrency, seed: config.seed },
    );
    yield* saveModelArtifact(outPath, { vocabulary: artifact, tokens: trained }, config.precision);
    return trained.length;
  });

  const count = await Effect.runPromise(
    program.pipe(Effect.provide(ClassifierFrom(classifier)), withLogging(config.logLevel)),
  );
  console.log(`Trained ${count} token classifiers`);
  console.log(`Saved to ${outPath}`);
}
