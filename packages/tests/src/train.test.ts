import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { Effect } from "effect";
import {
  SeededRng,
  defaultTextModelParams,
  fromRows,
  sparse,
  zeros,
  type DenseMatrix,
  type Label,
  type LinearClassifier,
} from "@lexembed/core";
import { ClassifierFrom, SilentLogging } from "@lexembed/effect-runtime";
import { Counter, SeqTokenizer, Vocabulary, indicatorProjection } from "@lexembed/tokenizers";
import {
  LinearSvm,
  buildDataset,
  classifierRegistry,
  encodeCorpus,
  feasibleTokens,
  readRecords,
  trainToken,
  trainTokens,
  uniqueLabels,
  writeJsonLines,
  type TokenTrainingInput,
} from "@lexembed/train";

const sorted = (rows: string[][]): string[][] => rows.map((r) => [...r].sort()).sort();

describe("records", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "lexembed-records-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads strings and labelled objects", async () => {
    const path = join(dir, "data.json.gz");
    const rows = ["hola", { text: "x", label: 1 }, { text: "y", klass: "pos" }];
    const records = await Effect.runPromise(Effect.zipRight(writeJsonLines(path, rows), readRecords(path)));
    expect(records).toEqual([{ text: "hola" }, { text: "x", label: 1 }, { text: "y", label: "pos" }]);
  });

  it("honours the limit and skips blank lines", async () => {
    const path = join(dir, "blank.json");
    await writeFile(path, '"a"\n\n"b"\n"c"\n');
    const records = await Effect.runPromise(readRecords(path, { limit: 2 }));
    expect(records).toEqual([{ text: "a" }, { text: "b" }]);
  });

  it("reports the offending line", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, '"ok"\n{bad\n');
    const error = await Effect.runPromise(Effect.flip(readRecords(path)));
    expect(error._tag).toBe("RecordError");
    expect(error.line).toBe(2);
    expect(error.path).toBe(path);
  });
});

describe("buildDataset", () => {
  it("balances positives against sampled negatives", () => {
    const records = [["a", "b"], ["c"], ["a"], ["d"], ["e"], ["a", "a", "f"]];
    const ds = buildDataset("a", records, { maxPos: 10, negativeCap: 1, rng: new SeededRng(0) });
    expect(ds).not.toBeNull();
    if (ds === null) return;
    expect(ds.positives).toEqual([["b"], [], ["f"]]);
    expect(sorted(ds.negatives)).toEqual([["c"], ["d"], ["e"]]);
  });

  it("bounds the negative pool by the running positive count", () => {
    const records = [["a"], ...Array.from({ length: 50 }, (_, i) => [`n${i}`])];
    const sizes: [number, number][] = [];
    const ds = buildDataset("a", records, {
      maxPos: 10,
      negativeCap: 3,
      rng: new SeededRng(1),
      onScan: (pos, neg) => sizes.push([pos, neg]),
    });
    expect(sizes).toHaveLength(51);
    for (const [pos, neg] of sizes) expect(neg).toBeLessThanOrEqual(pos + 3);
    expect(sizes[50]).toEqual([1, 4]);
    expect(ds?.positives).toHaveLength(1);
    expect(ds?.negatives).toHaveLength(1);
  });

  it("stops scanning once positives exceed the cap", () => {
    const records = [["a"], ["b"], ["a"], ["c"], ["a"], ["d"], ["a"]];
    let scanned = 0;
    const ds = buildDataset("a", records, {
      maxPos: 2,
      negativeCap: 10,
      rng: new SeededRng(2),
      onScan: () => scanned++,
    });
    expect(scanned).toBe(5);
    expect(ds?.positives).toHaveLength(2);
    expect(sorted(ds?.negatives ?? [])).toEqual([["b"], ["c"]]);
  });

  it("returns null when a class is empty", () => {
    const opts = { maxPos: 10, negativeCap: 10, rng: new SeededRng(0) };
    expect(buildDataset("z", [["a"], ["b"]], opts)).toBeNull();
    expect(buildDataset("a", [["a"], ["a", "b"]], opts)).toBeNull();
  });
});

describe("LinearSvm", () => {
  const x = fromRows([
    [2, 0],
    [1, 0],
    [0, 1],
    [0, 2],
  ]);
  const y = ["pos", "pos", "neg", "neg"];

  it("separates two classes", () => {
    const svm = new LinearSvm().fit(x, y);
    expect(svm.classes).toEqual(["neg", "pos"]);
    expect(svm.predict(x)).toEqual(y);
    expect(svm.coef.rows).toBe(1);
    expect(svm.coef.data[0]).toBeGreaterThan(0);
    expect(svm.coef.data[1]).toBeLessThan(0);
    const scores = svm.decisionFunction(x);
    expect([scores.rows, scores.cols]).toEqual([4, 1]);
  });

  it("fits sparse rows like dense ones", () => {
    const rows = [
      { indices: Int32Array.from([0]), values: Float64Array.from([2]) },
      { indices: Int32Array.from([0]), values: Float64Array.from([1]) },
      { indices: Int32Array.from([1]), values: Float64Array.from([1]) },
      { indices: Int32Array.from([1]), values: Float64Array.from([2]) },
    ];
    const svm = new LinearSvm({ loss: "hinge" }).fit(sparse(rows, 2), y);
    expect(svm.predict(x)).toEqual(y);
  });

  it("goes one-vs-rest above two classes", () => {
    const xm = fromRows([
      [1, 0, 0],
      [2, 0, 0],
      [0, 1, 0],
      [0, 2, 0],
      [0, 0, 1],
      [0, 0, 2],
    ]);
    const ym = [0, 0, 1, 1, 2, 2];
    const svm = new LinearSvm().fit(xm, ym);
    expect(svm.classes).toEqual([0, 1, 2]);
    expect(svm.predict(xm)).toEqual(ym);
    const scores = svm.decisionFunction(xm);
    expect([scores.rows, scores.cols]).toEqual([6, 3]);
  });

  it("rejects degenerate input", () => {
    expect(() => new LinearSvm().fit(x, ["a", "a", "a", "a"])).toThrow(/at least two classes/);
    expect(() => new LinearSvm().fit(x, ["a", "b"])).toThrow(/4 rows but y has 2/);
    expect(() => new LinearSvm().decisionFunction(x)).toThrow(/not fitted/);
    expect(() => new LinearSvm({ C: 0 })).toThrow(/C must be > 0/);
  });

  it("clones unfitted with the same configuration", () => {
    const svm = new LinearSvm({ C: 3 }).fit(x, y);
    const copy = svm.clone();
    expect(copy.classes).toEqual([]);
    expect(copy.config).toEqual(svm.config);
  });

  it("is registered by name", () => {
    const c = classifierRegistry.get("svm-hinge")({ C: 2 });
    expect(c instanceof LinearSvm && c.config.loss).toBe("hinge");
    expect(c instanceof LinearSvm && c.config.C).toBe(2);
    expect(() => classifierRegistry.get("forest")).toThrow(/Unknown implementation "forest"/);
  });

  it("orders mixed labels", () => {
    expect(uniqueLabels([3, 1, 3, 2])).toEqual([1, 2, 3]);
    expect(uniqueLabels(["b", "a", "b"])).toEqual(["a", "b"]);
  });
});

describe("corpus encoding", () => {
  const vocab = {
    params: defaultTextModelParams,
    counter: { dict: { hola: 1, mundo: 1, gato: 1 }, update_calls: 1 },
  };

  it("counts every occurrence", () => {
    const tok = SeqTokenizer.fromArtifact(vocab);
    const { records, counts } = encodeCorpus(tok, ["hola hola mundo", "gato"]);
    expect(records).toEqual([["hola", "hola", "mundo"], ["gato"]]);
    expect(counts.get("hola")).toBe(2);
    expect(counts.updateCalls).toBe(2);
  });

  it("keeps tokens above the threshold in sorted order", () => {
    const counts = new Counter([
      ["hola", 5],
      ["mundo", 1],
      ["gato", 3],
    ]);
    expect(feasibleTokens(Vocabulary.fromArtifact(vocab), counts, 3)).toEqual([
      { index: 0, label: "gato", count: 3 },
      { index: 1, label: "hola", count: 5 },
    ]);
  });
});

class Exploding implements LinearClassifier {
  readonly name = "exploding";
  readonly classes: readonly Label[] = [];
  readonly coef: DenseMatrix = zeros(0, 0);
  readonly intercept = new Float64Array(0);

  fit(): LinearClassifier {
    throw new Error("boom");
  }

  decisionFunction(): DenseMatrix {
    return zeros(0, 0);
  }

  predict(): Label[] {
    return [];
  }

  clone(): LinearClassifier {
    return this;
  }
}

describe("token training", () => {
  const vocabulary = Vocabulary.fromArtifact({
    params: defaultTextModelParams,
    counter: { dict: { hola: 3, mundo: 3, adios: 3, gato: 3 }, update_calls: 6 },
  });
  const records = [
    ["hola", "mundo"],
    ["hola", "gato"],
    ["adios", "gato"],
    ["adios", "mundo"],
    ["hola", "mundo"],
    ["adios", "gato"],
  ];
  const input: TokenTrainingInput = {
    vocabulary,
    records,
    projection: indicatorProjection(vocabulary),
    config: { maxPos: 100, negativeCap: 100, precision: "f32" },
  };
  const counts = new Counter();
  for (const r of records) counts.update(r);
  const feasible = feasibleTokens(vocabulary, counts, 3);

  it("fits one balanced classifier per token", async () => {
    const art = await Effect.runPromise(
      trainToken("hola", input, new LinearSvm({ fitIntercept: false }), new SeededRng(0)).pipe(
        Effect.provide(SilentLogging),
      ),
    );
    expect(art).not.toBeNull();
    if (art === null) return;
    expect(art.label).toBe("hola");
    expect(art.N).toBe(6);
    expect(art.coef).toHaveLength(4);
    expect(art.intercept).toBe(0);
    expect(art.coef[vocabulary.id("adios") ?? -1]).toBeLessThan(0);
    for (const v of art.coef) expect(v).toBe(Math.fround(v));
  });

  it("skips a token without positives", async () => {
    const art = await Effect.runPromise(
      trainToken("zorro", input, new LinearSvm(), new SeededRng(0)).pipe(Effect.provide(SilentLogging)),
    );
    expect(art).toBeNull();
  });

  it("trains every feasible token from the provided prototype", async () => {
    expect(feasible.map((t) => t.label)).toEqual(["adios", "gato", "hola", "mundo"]);
    const trained = await Effect.runPromise(
      trainTokens(feasible, input, { concurrency: 2, seed: 0 }).pipe(
        Effect.provide(ClassifierFrom(new LinearSvm({ fitIntercept: false }))),
        Effect.provide(SilentLogging),
      ),
    );
    expect(trained.map((t) => t.label)).toEqual(["adios", "gato", "hola", "mundo"]);
    for (const t of trained) expect(t.N).toBe(6);
  });

  it("surfaces classifier failures with the token", async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        trainTokens(feasible, input, { concurrency: 1, seed: 0 }).pipe(
          Effect.provide(ClassifierFrom(new Exploding())),
          Effect.provide(SilentLogging),
        ),
      ),
    );
    expect(error._tag).toBe("ClassifierError");
    expect(error.label).toBe("adios");
    expect(error.message).toContain("boom");
  });
});
