/**
 * Command: lexembed transform
 *
 * Writes one JSON array per input record. With --kfold, writes out-of-fold
 * decision scores instead (records need labels).
 */
import { Effect } from "effect";
import { ClassifierError, ConfigError, defaultEmbeddingOptions, toArrays, type Label } from "@lexembed/core";
import { withLogging } from "@lexembed/effect-runtime";
import { loadEmbeddingModel } from "@lexembed/embedding";
import { readRecords, writeJsonLines } from "@lexembed/train";
import { parseKV, requireArg, intArg, strArg, boolArg, precisionArg, projectionArg, loadConfig } from "../parse.js";

export async function transformCmd(args: string[]): Promise<void> {
  const kv = await loadConfig(parseKV(args));
  const modelPath = requireArg(kv, "model", "model artifact");
  const inputPath = requireArg(kv, "input", "newline-delimited records");
  const outPath = requireArg(kv, "out", "output path");
  const precision = precisionArg(kv, "precision", defaultEmbeddingOptions.precision);
  const stored = precisionArg(kv, "stored", precision);
  const intercept = boolArg(kv, "intercept", defaultEmbeddingOptions.intercept);
  const options = {
    precision,
    intercept,
    mergeIdf: boolArg(kv, "mergeIdf", !intercept && defaultEmbeddingOptions.mergeIdf),
    forceToken: boolArg(kv, "forceToken", defaultEmbeddingOptions.forceToken),
    projection: projectionArg(kv, "projection", defaultEmbeddingOptions.projection),
  };
  const k = kv["kfold"] ? intArg(kv, "kfold", 5) : undefined;
  const fill = boolArg(kv, "fill", false);

  const program = Effect.gen(function* () {
    const model = yield* loadEmbeddingModel(modelPath, options, { stored });
    if (fill) model.fill({ inPlace: true });
    const records = yield* readRecords(inputPath);
    const texts = records.map((r) => r.text);

    if (k === undefined) {
      const rows = toArrays(model.transform(texts));
      yield* writeJsonLines(outPath, rows);
      return rows.length;
    }

    const labels: Label[] = [];
    for (const [i, r] of records.entries()) {
      if (r.label === undefined) {
        return yield* Effect.fail(new ConfigError({ message: `Record ${i + 1} has no label` }));
      }
      labels.push(r.label);
    }
    const scores = yield* Effect.try({
      try: () => model.trainPredictDecisionFunction(texts, labels, { k, seed: intArg(kv, "seed", 0) }),
      catch: (cause) => new ClassifierError({ message: `Out-of-fold prediction failed: ${String(cause)}`, cause }),
    });
    const rows = toArrays(scores);
    yield* writeJsonLines(outPath, rows);
    return rows.length;
  });

  const n = await Effect.runPromise(program.pipe(withLogging(strArg(kv, "log", "info"))));
  console.log(`Wrote ${n} rows to ${outPath}`);
}
