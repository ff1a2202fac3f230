/**
 * Core types and configuration records for the lexembed system.
 */

// ── Precision ──────────────────────────────────────────────────────────────
export type Precision = "f16" | "f32" | "f64";

export function precisionBytes(p: Precision): number {
  switch (p) {
    case "f16": return 2;
    case "f32": return 4;
    case "f64": return 8;
  }
}

export function isPrecision(value: unknown): value is Precision {
  return value === "f16" || value === "f32" || value === "f64";
}

// ── Base text model ────────────────────────────────────────────────────────

/**
 * Configuration of the base tokenizer. Persisted verbatim as the `params`
 * field of every vocabulary artifact.
 *
 * `tokenList` entries: `-1` emits whole words, `q > 0` emits boundary-wrapped
 * character q-grams of length `q`.
 */
export interface TextModelParams {
  readonly lang: string;
  readonly lowercase: boolean;
  readonly stripDiacritics: boolean;
  readonly stripPunctuation: boolean;
  readonly deleteUrls: boolean;
  readonly deleteUsers: boolean;
  readonly tokenList: readonly number[];
}

export const defaultTextModelParams: TextModelParams = {
  lang: "es",
  lowercase: true,
  stripDiacritics: true,
  stripPunctuation: true,
  deleteUrls: true,
  deleteUsers: true,
  tokenList: [-1, 2, 3, 4, 5, 6, 7, 8],
};

// ── Persisted vocabulary ───────────────────────────────────────────────────
export interface CounterRecord {
  readonly dict: Readonly<Record<string, number>>;
  readonly update_calls: number;
}

export interface VocabularyArtifact {
  readonly params: TextModelParams;
  readonly counter: CounterRecord;
}

// ── Vocabulary building ────────────────────────────────────────────────────
export interface VocabularyConfig {
  /** Vocabulary size is at most 2^sizeExponent. */
  readonly sizeExponent: number;
  /** Restrict short q-grams to those touching a word boundary. */
  readonly prefixSuffix: boolean;
  /** Maximum number of corpus records to read (undefined = all). */
  readonly limit?: number;
}

export const defaultVocabularyConfig: VocabularyConfig = {
  sizeExponent: 13,
  prefixSuffix: false,
};

// ── Classifier capability ──────────────────────────────────────────────────
export type SvmLoss = "squared_hinge" | "hinge";

export interface ClassifierConfig {
  readonly C: number;
  readonly loss: SvmLoss;
  readonly fitIntercept: boolean;
  readonly classWeight: "balanced" | "none";
  readonly tol: number;
  readonly maxIter: number;
  readonly seed: number;
}

export const defaultClassifierConfig: ClassifierConfig = {
  C: 1.0,
  loss: "squared_hinge",
  fitIntercept: true,
  classWeight: "balanced",
  tol: 1e-4,
  maxIter: 1000,
  seed: 0,
};

// ── Token classifier training ──────────────────────────────────────────────
export type ProjectionKind = "indicator" | "tfidf";

export interface TrainConfig {
  /** Tokens with fewer corpus occurrences are never attempted. */
  readonly minPos: number;
  /** Scanning stops once positives exceed this count. */
  readonly maxPos: number;
  /** Negative reservoir capacity, relative to the running positive count. */
  readonly negativeCap: number;
  readonly precision: Precision;
  readonly projection: ProjectionKind;
  readonly fitIntercept: boolean;
  readonly classifier: string;
  readonly concurrency: number;
  readonly seed: number;
  readonly logLevel: "debug" | "info" | "warn" | "error";
}

export const defaultTrainConfig: TrainConfig = {
  minPos: 512,
  maxPos: 2 ** 13,
  negativeCap: 1024,
  precision: "f32",
  projection: "indicator",
  fitIntercept: false,
  classifier: "svm",
  concurrency: 4,
  seed: 0,
  logLevel: "info",
};

// ── Embedding model ────────────────────────────────────────────────────────
export interface EmbeddingOptions {
  readonly precision: Precision;
  /** Rescale every row by the vocabulary IDF weights. */
  readonly mergeIdf: boolean;
  /** Overwrite each row's own column with the row maximum. */
  readonly forceToken: boolean;
  /** Affine transform (projection × Wᵀ + bias) instead of sum pooling. */
  readonly intercept: boolean;
  readonly projection: ProjectionKind;
}

export const defaultEmbeddingOptions: EmbeddingOptions = {
  precision: "f32",
  mergeIdf: true,
  forceToken: true,
  intercept: false,
  projection: "indicator",
};

export interface KFoldOptions {
  readonly k: number;
  readonly shuffle: boolean;
  readonly seed: number;
}

export const defaultKFoldOptions: KFoldOptions = {
  k: 5,
  shuffle: true,
  seed: 0,
};
