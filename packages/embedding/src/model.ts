/**
 * Embedding model: per-token classifier weights stacked into a matrix.
 *
 * Row `r` holds the coefficients of the classifier trained for token
 * `names[r]`; columns follow the vocabulary. A text is represented by pooling
 * the columns of its tokens, or in intercept mode by an affine map of its
 * bag-of-tokens vector, and then scaled to unit length.
 *
 * Adjustments (`mergeIdf`, `forceTokenWeights`, `fill`) return a new matrix
 * unless asked to work in place; the vocabulary never changes.
 */
import {
  ArtifactError,
  ClassifierError,
  castTo,
  cloneMatrix,
  defaultEmbeddingOptions,
  full,
  normalizeRows,
  roundTo,
  row,
  selectRows,
  validateEmbeddingOptions,
  zeros,
  type DenseMatrix,
  type EmbeddingOptions,
  type KFoldOptions,
  type Label,
  type LinearClassifier,
  type VocabularyArtifact,
} from "@lexembed/core";
import { SeqTokenizer, projectionFor, type Projection, type SymbolTable } from "@lexembed/tokenizers";
import { LinearSvm, uniqueLabels, type ModelArtifact } from "@lexembed/train";
import { stratifiedKFold } from "./kfold.js";

export interface AdjustOptions {
  /** Replace the model's own buffers instead of returning new ones. */
  readonly inPlace?: boolean;
}

export interface ForceTokenOptions extends AdjustOptions {
  /** Take the row maximum over the IDF-scaled row. */
  readonly idf?: boolean;
}

export interface EmbeddingModelDeps {
  /** Downstream classifier used by fit/predict; balanced `LinearSvm` by default. */
  readonly estimator?: LinearClassifier;
  readonly symbols?: SymbolTable;
}

interface ModelState {
  readonly vocabulary: VocabularyArtifact;
  readonly weights: DenseMatrix;
  readonly bias: Float64Array;
  readonly names: readonly string[];
  readonly options: EmbeddingOptions;
  readonly estimator: LinearClassifier;
  readonly symbols?: SymbolTable;
}

export class EmbeddingModel {
  readonly options: EmbeddingOptions;
  readonly tokenizer: SeqTokenizer;

  private readonly _source: VocabularyArtifact;
  private readonly _symbols: SymbolTable | undefined;
  private readonly _projection: Projection;
  private _weights: DenseMatrix;
  private _bias: Float64Array;
  private _names: readonly string[];
  private readonly _estimator: LinearClassifier;

  private constructor(state: ModelState) {
    this.options = state.options;
    this._source = state.vocabulary;
    this._symbols = state.symbols;
    this.tokenizer = SeqTokenizer.fromArtifact(state.vocabulary, state.symbols ? { symbols: state.symbols } : {});
    this._projection = projectionFor(state.options.projection, this.tokenizer.vocabulary);
    this._weights = state.weights;
    this._bias = state.bias;
    this._names = state.names;
    this._estimator = state.estimator;
  }

  /**
   * Stack the trained rows in the order given. With `mergeIdf` every row is
   * scaled by the vocabulary IDF; `forceToken` then fills each row's own
   * column (against the IDF-scaled row in intercept mode).
   */
  static assemble(
    model: ModelArtifact,
    options: Partial<EmbeddingOptions> = {},
    deps: EmbeddingModelDeps = {},
  ): EmbeddingModel {
    const opts: EmbeddingOptions = { ...defaultEmbeddingOptions, ...options };
    validateEmbeddingOptions(opts);

    const dimension = Object.keys(model.vocabulary.counter.dict).length;
    const weights = zeros(model.tokens.length, dimension);
    const bias = new Float64Array(model.tokens.length);
    model.tokens.forEach((t, r) => {
      if (t.coef.length !== dimension) {
        throw new ArtifactError({
          message: `Token "${t.label}" has ${t.coef.length} coefficients, vocabulary has ${dimension}`,
        });
      }
      weights.data.set(castTo(t.coef, opts.precision), r * dimension);
      bias[r] = roundTo(t.intercept, opts.precision);
    });

    const out = new EmbeddingModel({
      vocabulary: model.vocabulary,
      weights,
      bias,
      names: model.tokens.map((t) => t.label),
      options: opts,
      estimator: deps.estimator ?? new LinearSvm({ classWeight: "balanced" }),
      symbols: deps.symbols,
    });
    for (const name of out._names) {
      if (!out.tokenizer.vocabulary.has(name)) {
        throw new ArtifactError({ message: `Trained token "${name}" is not in the vocabulary` });
      }
    }
    if (opts.mergeIdf) out.mergeIdf({ inPlace: true });
    if (opts.forceToken) out.forceTokenWeights({ idf: opts.intercept, inPlace: true });
    return out;
  }

  // ── Accessors ────────────────────────────────────────────────────────────

  get weights(): DenseMatrix {
    return this._weights;
  }

  get bias(): Float64Array {
    return this._bias;
  }

  get names(): readonly string[] {
    return this._names;
  }

  get estimator(): LinearClassifier {
    return this._estimator;
  }

  get vocabularyArtifact(): VocabularyArtifact {
    return this._source;
  }

  /** Vocabulary column of every row. */
  private _columns(): number[] {
    const vocab = this.tokenizer.vocabulary;
    return this._names.map((name) => {
      const id = vocab.id(name);
      if (id === undefined) throw new ArtifactError({ message: `Trained token "${name}" is not in the vocabulary` });
      return id;
    });
  }

  // ── Adjustments ──────────────────────────────────────────────────────────

  /** Every row scaled element-wise by the vocabulary IDF. */
  mergeIdf(options: AdjustOptions = {}): DenseMatrix {
    const idf = this.tokenizer.vocabulary.idf;
    const w = cloneMatrix(this._weights);
    for (let r = 0; r < w.rows; r++) {
      const v = row(w, r);
      for (let c = 0; c < v.length; c++) v[c] = roundTo(v[c] * idf[c], this.options.precision);
    }
    if (options.inPlace) this._weights = w;
    return w;
  }

  /**
   * Overwrite each row's own column with the row maximum. With `idf` the
   * maximum is taken over the IDF-scaled row and divided back by the own
   * column's IDF (the plain maximum when that IDF is 0).
   */
  forceTokenWeights(options: ForceTokenOptions = {}): DenseMatrix {
    const idf = this.tokenizer.vocabulary.idf;
    const cols = this._columns();
    const w = cloneMatrix(this._weights);
    for (let r = 0; r < w.rows; r++) {
      const v = row(w, r);
      const own = cols[r];
      let max = -Infinity;
      if (options.idf && idf[own] !== 0) {
        for (let c = 0; c < v.length; c++) max = Math.max(max, v[c] * idf[c]);
        max /= idf[own];
      } else {
        for (let c = 0; c < v.length; c++) max = Math.max(max, v[c]);
      }
      if (v.length > 0) v[own] = roundTo(max, this.options.precision);
    }
    if (options.inPlace) this._weights = w;
    return w;
  }

  /**
   * One row per vocabulary token: trained rows copied to their token's slot,
   * every other row exactly zero. In place, names become the vocabulary and
   * the bias is expanded with zeros.
   */
  fill(options: AdjustOptions = {}): DenseMatrix {
    const vocab = this.tokenizer.vocabulary;
    const cols = this._columns();
    const w = zeros(vocab.size, this._weights.cols);
    const bias = new Float64Array(vocab.size);
    cols.forEach((slot, r) => {
      w.data.set(row(this._weights, r), slot * w.cols);
      bias[slot] = this._bias[r];
    });
    if (options.inPlace) {
      this._weights = w;
      this._bias = bias;
      this._names = [...vocab.tokens];
    }
    return w;
  }

  // ── Encoding ─────────────────────────────────────────────────────────────

  /**
   * Weight columns of the text's in-vocabulary tokens, in text order with
   * duplicates kept. A single all-ones column when no token maps.
   */
  encode(text: string): DenseMatrix {
    const ids = this.tokenizer.encode(text);
    const w = this._weights;
    if (ids.length === 0) {
      return full(w.rows, 1, 1);
    }
    const out = zeros(w.rows, ids.length);
    for (let r = 0; r < w.rows; r++) {
      for (let j = 0; j < ids.length; j++) out.data[r * ids.length + j] = w.data[r * w.cols + ids[j]];
    }
    return out;
  }

  /** One unit-length row per text; all-zero rows are left as they are. */
  transform(texts: readonly string[]): DenseMatrix {
    const w = this._weights;
    const out = zeros(texts.length, w.rows);

    texts.forEach((text, t) => {
      const v = row(out, t);
      if (this.options.intercept) {
        const bow = this._projection(this.tokenizer.tokenize(text));
        for (let r = 0; r < w.rows; r++) {
          let s = this._bias[r];
          for (let k = 0; k < bow.indices.length; k++) s += bow.values[k] * w.data[r * w.cols + bow.indices[k]];
          v[r] = s;
        }
        return;
      }
      const encoded = this.encode(text);
      for (let r = 0; r < encoded.rows; r++) {
        let s = 0;
        for (let j = 0; j < encoded.cols; j++) s += encoded.data[r * encoded.cols + j];
        v[r] = s;
      }
    });

    return normalizeRows(out);
  }

  // ── Downstream classification ────────────────────────────────────────────

  fit(texts: readonly string[], labels: readonly Label[]): this {
    this._estimator.fit(this.transform(texts), labels);
    return this;
  }

  predict(texts: readonly string[]): Label[] {
    return this._estimator.predict(this.transform(texts));
  }

  /** Always two-dimensional: `n × 1` for two classes. */
  decisionFunction(texts: readonly string[]): DenseMatrix {
    return this._estimator.decisionFunction(this.transform(texts));
  }

  /**
   * Out-of-fold decision scores: each row is scored by a clone of the
   * estimator fit on the folds that exclude it.
   */
  trainPredictDecisionFunction(
    texts: readonly string[],
    labels: readonly Label[],
    kfold: Partial<KFoldOptions> = {},
  ): DenseMatrix {
    if (texts.length !== labels.length) {
      throw new ClassifierError({ message: `${texts.length} texts but ${labels.length} labels` });
    }
    const nClass = uniqueLabels(labels).length;
    const x = this.transform(texts);
    const out = zeros(texts.length, nClass === 2 ? 1 : nClass);

    for (const fold of stratifiedKFold(labels, kfold)) {
      const estimator = this._estimator.clone();
      estimator.fit(selectRows(x, fold.train), fold.train.map((i) => labels[i]));
      const scores = estimator.decisionFunction(selectRows(x, fold.test));
      if (scores.cols !== out.cols) {
        throw new ClassifierError({
          message: `Fold produced ${scores.cols} score columns, expected ${out.cols}; a class is missing from a training partition`,
        });
      }
      fold.test.forEach((i, j) => out.data.set(row(scores, j), i * out.cols));
    }
    return out;
  }

  /** Independent copy: buffers duplicated, tokenizer rebuilt, estimator unfitted. */
  clone(): EmbeddingModel {
    return new EmbeddingModel({
      vocabulary: this._source,
      weights: cloneMatrix(this._weights),
      bias: new Float64Array(this._bias),
      names: [...this._names],
      options: { ...this.options },
      estimator: this._estimator.clone(),
      symbols: this._symbols,
    });
  }
}
