/**
 * Subsystem interfaces (ports). Every pluggable collaborator implements one
 * of these.
 */
import { Context } from "effect";
import type { DenseMatrix, FeatureMatrix } from "./matrix.js";
import type { TextModelParams } from "./types.js";

// ── Base tokenizer ─────────────────────────────────────────────────────────

/**
 * Word/punctuation tokenizer that produces the raw candidate strings a
 * vocabulary is counted from.
 */
export interface BaseTokenizer {
  readonly params: TextModelParams;
  /** Normalized text with words joined and wrapped by the boundary marker. */
  normalize(text: string): string;
  /** Words and `q:`-prefixed q-grams, in text order. */
  tokenize(text: string): string[];
}

// ── Sub-word tokenizer ─────────────────────────────────────────────────────
export interface Tokenizer {
  readonly name: string;
  readonly vocabSize: number;
  /** Canonical tokens, out-of-vocabulary surfaces included. */
  tokenize(text: string): string[];
  /** Vocabulary ids; out-of-vocabulary tokens are dropped. */
  encode(text: string): Int32Array;
}

// ── Linear classifier ──────────────────────────────────────────────────────
export type Label = number | string;

export interface LinearClassifier {
  readonly name: string;
  /** Sorted distinct labels seen by the last `fit`. */
  readonly classes: readonly Label[];
  /** One row per binary problem: a single row when there are two classes. */
  readonly coef: DenseMatrix;
  readonly intercept: Float64Array;
  /** Fits in place and returns `this`. Throws when the data cannot be fit. */
  fit(x: FeatureMatrix, y: readonly Label[]): LinearClassifier;
  /** `n × 1` for two classes, `n × k` otherwise. */
  decisionFunction(x: FeatureMatrix): DenseMatrix;
  predict(x: FeatureMatrix): Label[];
  /** Unfitted copy with the same configuration. */
  clone(): LinearClassifier;
}

/** Prototype classifier; consumers clone it before fitting. */
export class ClassifierService extends Context.Tag("ClassifierService")<
  ClassifierService,
  LinearClassifier
>() {}

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  next(): number;
  nextInt(n: number): number;
  state(): number;
  seed(s: number): void;
}
