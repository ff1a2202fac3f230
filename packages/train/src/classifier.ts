/**
 * Linear support vector classifier.
 *
 * Dual coordinate descent on the L2-regularized hinge or squared-hinge loss,
 * one-vs-rest above two classes. The intercept is learned as the weight of an
 * extra constant feature, so it is regularized like any other weight.
 */
import {
  ClassifierError,
  Registry,
  at,
  SeededRng,
  defaultClassifierConfig,
  rowDot,
  rowAxpy,
  rowSquaredNorm,
  shuffle,
  validateClassifierConfig,
  zeros,
  type ClassifierConfig,
  type DenseMatrix,
  type FeatureMatrix,
  type Label,
  type LinearClassifier,
} from "@lexembed/core";

export function compareLabels(a: Label, b: Label): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

/** Sorted distinct labels. */
export function uniqueLabels(y: readonly Label[]): Label[] {
  return [...new Set(y)].sort(compareLabels);
}

interface BinaryFit {
  readonly w: Float64Array;
  readonly b: number;
}

export class LinearSvm implements LinearClassifier {
  readonly name = "svm";
  readonly config: ClassifierConfig;

  private _classes: Label[] = [];
  private _coef: DenseMatrix = zeros(0, 0);
  private _intercept = new Float64Array(0);

  constructor(config: Partial<ClassifierConfig> = {}) {
    this.config = { ...defaultClassifierConfig, ...config };
    validateClassifierConfig(this.config);
  }

  get classes(): readonly Label[] {
    return this._classes;
  }

  get coef(): DenseMatrix {
    return this._coef;
  }

  get intercept(): Float64Array {
    return this._intercept;
  }

  fit(x: FeatureMatrix, y: readonly Label[]): LinearSvm {
    if (x.rows !== y.length) {
      throw new ClassifierError({ message: `X has ${x.rows} rows but y has ${y.length} labels` });
    }
    const classes = uniqueLabels(y);
    if (classes.length < 2) {
      throw new ClassifierError({ message: `Need at least two classes, got ${classes.length}` });
    }

    // One problem with classes[1] as the positive class, else one per class.
    const positives = classes.length === 2 ? [classes[1]] : classes;
    const rng = new SeededRng(this.config.seed);
    const coef = zeros(positives.length, x.cols);
    const intercept = new Float64Array(positives.length);
    positives.forEach((pos, p) => {
      const signs = Int8Array.from(y, (label) => (label === pos ? 1 : -1));
      const { w, b } = this._solve(x, signs, rng);
      coef.data.set(w, p * x.cols);
      intercept[p] = b;
    });

    this._classes = classes;
    this._coef = coef;
    this._intercept = intercept;
    return this;
  }

  decisionFunction(x: FeatureMatrix): DenseMatrix {
    if (this._classes.length === 0) throw new ClassifierError({ message: "Classifier is not fitted" });
    if (x.cols !== this._coef.cols) {
      throw new ClassifierError({ message: `X has ${x.cols} features, classifier expects ${this._coef.cols}` });
    }
    const k = this._coef.rows;
    const out = zeros(x.rows, k);
    for (let p = 0; p < k; p++) {
      const w = this._coef.data.subarray(p * x.cols, (p + 1) * x.cols);
      for (let r = 0; r < x.rows; r++) out.data[r * k + p] = rowDot(x, r, w) + this._intercept[p];
    }
    return out;
  }

  predict(x: FeatureMatrix): Label[] {
    const scores = this.decisionFunction(x);
    const out: Label[] = [];
    for (let r = 0; r < scores.rows; r++) {
      if (scores.cols === 1) {
        out.push(scores.data[r] > 0 ? this._classes[1] : this._classes[0]);
        continue;
      }
      let best = 0;
      for (let c = 1; c < scores.cols; c++) {
        if (at(scores, r, c) > at(scores, r, best)) best = c;
      }
      out.push(this._classes[best]);
    }
    return out;
  }

  clone(): LinearSvm {
    return new LinearSvm(this.config);
  }

  // ── Solver ───────────────────────────────────────────────────────────────

  private _solve(x: FeatureMatrix, signs: Int8Array, rng: SeededRng): BinaryFit {
    const { C, loss, fitIntercept, classWeight, tol, maxIter } = this.config;
    const n = x.rows;
    const bias = fitIntercept ? 1 : 0;

    let nPos = 0;
    for (const s of signs) if (s > 0) nPos++;
    const nNeg = n - nPos;
    const weightOf = (s: number): number => {
      if (classWeight === "none") return 1;
      return s > 0 ? n / (2 * nPos) : n / (2 * nNeg);
    };

    const diag = new Float64Array(n);
    const upper = new Float64Array(n);
    const qd = new Float64Array(n);
    for (let i = 0; i < n; i++) {
      const Ci = C * weightOf(signs[i]);
      diag[i] = loss === "squared_hinge" ? 0.5 / Ci : 0;
      upper[i] = loss === "squared_hinge" ? Infinity : Ci;
      qd[i] = diag[i] + rowSquaredNorm(x, i) + bias;
    }

    const w = new Float64Array(x.cols);
    let b = 0;
    const alpha = new Float64Array(n);
    const order = Array.from({ length: n }, (_, i) => i);

    for (let iter = 0; iter < maxIter; iter++) {
      shuffle(order, rng);
      let pgMax = -Infinity;
      let pgMin = Infinity;

      for (const i of order) {
        if (qd[i] <= 0) continue;
        const yi = signs[i];
        const g = yi * (rowDot(x, i, w) + b * bias) - 1 + diag[i] * alpha[i];

        let pg = g;
        if (alpha[i] === 0) pg = Math.min(g, 0);
        else if (alpha[i] === upper[i]) pg = Math.max(g, 0);
        pgMax = Math.max(pgMax, pg);
        pgMin = Math.min(pgMin, pg);

        if (Math.abs(pg) > 1e-12) {
          const old = alpha[i];
          alpha[i] = Math.min(Math.max(old - g / qd[i], 0), upper[i]);
          const d = (alpha[i] - old) * yi;
          rowAxpy(x, i, d, w);
          b += d * bias;
        }
      }

      if (pgMax - pgMin <= tol) break;
    }

    return { w, b };
  }
}

export type ClassifierFactory = (config: Partial<ClassifierConfig>) => LinearClassifier;

/**
 * Pre-registered implementations:
 * - `"svm"`       -- squared-hinge loss
 * - `"svm-hinge"` -- hinge loss
 */
export const classifierRegistry = new Registry<ClassifierFactory>("classifier");

classifierRegistry.register("svm", (config) => new LinearSvm(config));
classifierRegistry.register("svm-hinge", (config) => new LinearSvm({ ...config, loss: "hinge" }));
