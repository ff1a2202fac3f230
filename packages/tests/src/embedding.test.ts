import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { defaultTextModelParams, type EmbeddingOptions } from "@lexembed/core";
import { SilentLogging } from "@lexembed/effect-runtime";
import { EmbeddingModel, loadEmbeddingModel, stratifiedKFold } from "@lexembed/embedding";
import { saveModelArtifact, type ModelArtifact, type TrainedTokenArtifact } from "@lexembed/train";

// idf = [2, 3, 1, 3]
const vocabulary = {
  params: defaultTextModelParams,
  counter: { dict: { a: 2, b: 1, c: 4, d: 1 }, update_calls: 8 },
};

const token = (label: string, coef: number[], intercept: number): TrainedTokenArtifact => ({
  label,
  N: 10,
  coef: Float64Array.from(coef),
  intercept,
});

const artifact: ModelArtifact = {
  vocabulary,
  tokens: [token("a", [0, 1, 2, 0], 0.5), token("c", [1, 0, -1, 0], -0.5)],
};

const raw: Partial<EmbeddingOptions> = { precision: "f64", mergeIdf: false, forceToken: false };

describe("EmbeddingModel.assemble", () => {
  it("merges IDF then forces own columns by default", () => {
    const model = EmbeddingModel.assemble(artifact);
    expect(model.names).toEqual(["a", "c"]);
    expect([...model.weights.data]).toEqual([3, 3, 2, 0, 2, 0, 2, 0]);
    expect([...model.bias]).toEqual([0.5, -0.5]);
  });

  it("keeps raw rows when asked", () => {
    const model = EmbeddingModel.assemble(artifact, raw);
    expect([...model.weights.data]).toEqual([0, 1, 2, 0, 1, 0, -1, 0]);
  });

  it("refuses intercept mode with merged IDF", () => {
    expect(() => EmbeddingModel.assemble(artifact, { intercept: true, mergeIdf: true })).toThrow(/intercept/);
  });

  it("rejects rows that do not fit the vocabulary", () => {
    expect(() =>
      EmbeddingModel.assemble({ vocabulary, tokens: [token("zz", [0, 0, 0, 0], 0)] }, raw),
    ).toThrow(/not in the vocabulary/);
    expect(() => EmbeddingModel.assemble({ vocabulary, tokens: [token("a", [0, 0, 0], 0)] }, raw)).toThrow(
      /has 3 coefficients/,
    );
  });
});

describe("weight adjustments", () => {
  it("scales rows by IDF", () => {
    const model = EmbeddingModel.assemble(artifact, raw);
    expect([...model.mergeIdf().data]).toEqual([0, 3, 2, 0, 2, 0, -1, 0]);
    expect([...model.weights.data]).toEqual([0, 1, 2, 0, 1, 0, -1, 0]);
  });

  it("forces each row's own column to the row maximum", () => {
    const model = EmbeddingModel.assemble(artifact, raw);
    expect([...model.forceTokenWeights().data]).toEqual([2, 1, 2, 0, 1, 0, 1, 0]);
    expect([...model.forceTokenWeights({ idf: true }).data]).toEqual([1.5, 1, 2, 0, 1, 0, 2, 0]);
  });

  it("fills one row per vocabulary token", () => {
    const model = EmbeddingModel.assemble(artifact, raw);
    const filled = model.fill();
    expect([filled.rows, filled.cols]).toEqual([4, 4]);
    expect([...filled.data]).toEqual([0, 1, 2, 0, 0, 0, 0, 0, 1, 0, -1, 0, 0, 0, 0, 0]);
    expect(model.weights.rows).toBe(2);

    model.fill({ inPlace: true });
    expect(model.names).toEqual(["a", "b", "c", "d"]);
    expect([...model.bias]).toEqual([0.5, 0, -0.5, 0]);
    expect(model.weights.rows).toBe(4);
  });
});

describe("encoding", () => {
  const model = EmbeddingModel.assemble(artifact, raw);

  it("gathers token columns in text order", () => {
    const m = model.encode("a b a");
    expect([m.rows, m.cols]).toEqual([2, 3]);
    expect([...m.data]).toEqual([0, 1, 0, 1, 0, 1]);
  });

  it("falls back to a ones column", () => {
    const m = model.encode("zzz");
    expect([m.rows, m.cols]).toEqual([2, 1]);
    expect([...m.data]).toEqual([1, 1]);
  });

  it("sums and normalizes", () => {
    const out = model.transform(["a b a", "zzz", "d"]);
    expect([out.rows, out.cols]).toEqual([3, 2]);
    expect(out.data[0]).toBeCloseTo(1 / Math.sqrt(5), 12);
    expect(out.data[1]).toBeCloseTo(2 / Math.sqrt(5), 12);
    expect(out.data[2]).toBeCloseTo(Math.SQRT1_2, 12);
    expect(out.data[3]).toBeCloseTo(Math.SQRT1_2, 12);
    expect([out.data[4], out.data[5]]).toEqual([0, 0]);
  });

  it("applies the affine map in intercept mode", () => {
    const affine = EmbeddingModel.assemble(artifact, { ...raw, intercept: true });
    const out = affine.transform(["a b a"]);
    expect(out.data[0]).toBeCloseTo(1.5 / Math.sqrt(2.5), 12);
    expect(out.data[1]).toBeCloseTo(0.5 / Math.sqrt(2.5), 12);
  });

  it("clones independently", () => {
    const original = EmbeddingModel.assemble(artifact, raw);
    const copy = original.clone();
    copy.fill({ inPlace: true });
    expect(copy.weights.rows).toBe(4);
    expect(original.weights.rows).toBe(2);
    expect(copy.tokenizer).not.toBe(original.tokenizer);
    expect(copy.tokenizer.tokenize("a b")).toEqual(original.tokenizer.tokenize("a b"));
  });
});

describe("downstream classification", () => {
  it("fits and predicts through the estimator", () => {
    const model = EmbeddingModel.assemble(artifact, raw);
    model.fit(["a", "a a", "b", "b b"], ["x", "x", "y", "y"]);
    expect(model.predict(["a", "b"])).toEqual(["x", "y"]);
    const scores = model.decisionFunction(["a", "b"]);
    expect([scores.rows, scores.cols]).toEqual([2, 1]);
  });

  it("scores every text out of fold", () => {
    const model = EmbeddingModel.assemble(artifact, raw);
    const texts = ["a", "a a", "a a a", "b", "b b", "b b b"];
    const scores = model.trainPredictDecisionFunction(texts, [0, 0, 0, 1, 1, 1], { k: 3 });
    expect([scores.rows, scores.cols]).toEqual([6, 1]);
    for (let i = 0; i < 3; i++) expect(scores.data[i]).toBeLessThan(0);
    for (let i = 3; i < 6; i++) expect(scores.data[i]).toBeGreaterThan(0);
  });

  it("keeps one column per class above two classes", () => {
    const model = EmbeddingModel.assemble(artifact, raw);
    const texts = ["a", "a a", "b", "b b", "d", "d d"];
    const scores = model.trainPredictDecisionFunction(texts, [0, 0, 1, 1, 2, 2], { k: 2 });
    expect([scores.rows, scores.cols]).toEqual([6, 3]);
  });

  it("requires one label per text", () => {
    const model = EmbeddingModel.assemble(artifact, raw);
    expect(() => model.trainPredictDecisionFunction(["a", "b"], [0])).toThrow(/2 texts but 1 labels/);
  });
});

describe("stratifiedKFold", () => {
  const labels = [0, 0, 0, 0, 1, 1, 1, 1, 1, 1];

  it("deals classes round-robin across folds", () => {
    const folds = stratifiedKFold(labels, { k: 3, shuffle: false });
    expect(folds.map((f) => f.test)).toEqual([
      [0, 3, 6, 9],
      [1, 4, 7],
      [2, 5, 8],
    ]);
  });

  it("holds every index out exactly once", () => {
    const folds = stratifiedKFold(labels, { k: 3, seed: 5 });
    expect(folds.map((f) => f.test.length)).toEqual([4, 3, 3]);
    const held = folds.flatMap((f) => f.test).sort((a, b) => a - b);
    expect(held).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    for (const f of folds) {
      expect([...f.train, ...f.test].sort((a, b) => a - b)).toEqual(held);
    }
  });

  it("validates k", () => {
    expect(() => stratifiedKFold(labels, { k: 1 })).toThrow(/k must be an integer >= 2/);
    expect(() => stratifiedKFold([0, 1], { k: 3 })).toThrow(/cannot exceed/);
  });
});

describe("loadEmbeddingModel", () => {
  it("assembles a stored artifact", async () => {
    const dir = await mkdtemp(join(tmpdir(), "lexembed-embed-"));
    try {
      const path = join(dir, "model.json.gz");
      await Effect.runPromise(saveModelArtifact(path, artifact, "f32"));
      const model = await Effect.runPromise(
        loadEmbeddingModel(path, raw, { stored: "f32" }).pipe(Effect.provide(SilentLogging)),
      );
      expect([...model.weights.data]).toEqual([0, 1, 2, 0, 1, 0, -1, 0]);
      expect(model.tokenizer.identifier).toBe("seqtm_es_2");
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
