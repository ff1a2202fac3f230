import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { Effect } from "effect";
import { defaultTextModelParams, type VocabularyArtifact } from "@lexembed/core";
import { SilentLogging } from "@lexembed/effect-runtime";
import {
  TextModel,
  Vocabulary,
  buildVocabulary,
  computeBaseVocabulary,
  loadVocabulary,
  noSymbols,
  parseVocabularyArtifact,
  prefixSuffix,
  saveVocabulary,
  type VocabularyBuildOptions,
} from "@lexembed/tokenizers";

function base(texts: string[], tokenList: number[]): VocabularyArtifact {
  return Effect.runSync(computeBaseVocabulary(texts, new TextModel({ tokenList })));
}

function build(texts: string[], tokenList: number[], options: VocabularyBuildOptions) {
  return Effect.runSync(
    buildVocabulary(base(texts, tokenList), texts, options).pipe(Effect.provide(SilentLogging)),
  );
}

describe("computeBaseVocabulary", () => {
  it("counts each token once per record", () => {
    const art = base(["a b a", "a"], [-1]);
    expect(art.counter.dict).toEqual({ a: 2, b: 1 });
    expect(art.counter.update_calls).toBe(2);
  });

  it("honours the record limit", () => {
    const art = Effect.runSync(computeBaseVocabulary(["a", "b", "c"], new TextModel({ tokenList: [-1] }), 2));
    expect(art.counter.dict).toEqual({ a: 1, b: 1 });
  });
});

describe("Vocabulary", () => {
  const art: VocabularyArtifact = {
    params: defaultTextModelParams,
    counter: { dict: { a: 4, b: 1, zero: 0 }, update_calls: 8 },
  };

  it("assigns ids in entry order", () => {
    const v = Vocabulary.fromArtifact(art);
    expect(v.tokens).toEqual(["a", "b", "zero"]);
    expect(v.id("b")).toBe(1);
    expect(v.id("nope")).toBeUndefined();
    expect(v.frequency("a")).toBe(4);
    expect(v.frequency("nope")).toBe(0);
  });

  it("computes log2 IDF weights", () => {
    const v = Vocabulary.fromArtifact(art);
    expect([...v.idf]).toEqual([1, 3, 0]);
  });

  it("round-trips its artifact", () => {
    expect(Vocabulary.fromArtifact(art).toArtifact()).toEqual(art);
  });
});

describe("buildVocabulary", () => {
  it("keeps whole words when they cover the corpus", () => {
    const texts = ["ab ab", "ab cd", "cd"];
    const report = build(texts, [-1, 3], { sizeExponent: 1, prefixSuffix: false, symbols: noSymbols });
    expect(report.artifact.counter.dict).toEqual({ ab: 2, cd: 2 });
    expect(report.artifact.counter.update_calls).toBe(3);
    expect(report.records).toBe(3);
    expect(report.uncovered.get(3)).toBe(0);
  });

  it("lets a shared prefix displace rare words", () => {
    const texts = ["abx", "aby", "abz", "abw"];
    const report = build(texts, [-1, 3], { sizeExponent: 1, prefixSuffix: false, symbols: noSymbols });
    expect(Object.keys(report.artifact.counter.dict)).toEqual(["q:~ab", "abx"]);
    expect(report.artifact.counter.dict).toEqual({ "q:~ab": 3, abx: 1 });
    expect(report.artifact.counter.update_calls).toBe(4);
    expect(report.uncovered.get(3)).toBe(2);
  });

  it("never exceeds the size budget", () => {
    const texts = ["uno dos tres", "cuatro cinco seis", "siete ocho nueve diez", "once doce"];
    const report = build(texts, [-1, 2, 3, 4], { sizeExponent: 2, prefixSuffix: true, symbols: noSymbols });
    expect(Object.keys(report.artifact.counter.dict).length).toBeLessThanOrEqual(4);
    expect([...report.uncovered.keys()]).toEqual([4, 3, 2]);
  });

  it("keeps the base parameters", () => {
    const report = build(["hola"], [-1, 2], { sizeExponent: 3, prefixSuffix: false, symbols: noSymbols });
    expect(report.artifact.params.tokenList).toEqual([-1, 2]);
  });

  it("rejects a bad size exponent", () => {
    const error = Effect.runSync(
      Effect.flip(buildVocabulary(base(["a"], [-1]), ["a"], { sizeExponent: 0, prefixSuffix: false })),
    );
    expect(error._tag).toBe("ConfigError");
  });
});

describe("prefixSuffix", () => {
  it("admits short q-grams only at a boundary", () => {
    expect(prefixSuffix("abc", 3)).toBe(false);
    expect(prefixSuffix("~ab", 3)).toBe(true);
    expect(prefixSuffix("ab~", 3)).toBe(true);
    expect(prefixSuffix("abcd", 4)).toBe(true);
  });
});

describe("vocabulary persistence", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "lexembed-vocab-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("saves and loads gzipped artifacts", async () => {
    const art = base(["hola mundo", "hola"], [-1, 3]);
    const path = join(dir, "nested", "vocab.json.gz");
    const loaded = await Effect.runPromise(
      Effect.zipRight(saveVocabulary(path, art), loadVocabulary(path)),
    );
    expect(loaded).toEqual(art);
  });

  it("fills missing params with defaults", () => {
    const art = parseVocabularyArtifact({ params: { lang: "en" }, counter: { dict: { a: 1 }, update_calls: 1 } });
    expect(art.params).toEqual({ ...defaultTextModelParams, lang: "en" });
  });

  it("rejects malformed artifacts", () => {
    expect(() => parseVocabularyArtifact({ params: {}, counter: { dict: { a: "x" }, update_calls: 1 } })).toThrow(
      /Invalid frequency/,
    );
    expect(() => parseVocabularyArtifact({ params: {}, counter: { dict: {} } })).toThrow(/update_calls/);
  });

  it("reports the path of an unreadable file", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{not json");
    const error = await Effect.runPromise(Effect.flip(loadVocabulary(path)));
    expect(error._tag).toBe("ArtifactError");
    expect(error.path).toBe(path);
  });
});
