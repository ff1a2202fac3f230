/**
 * Minimal row-major matrix handles shared by the trainer and the encoder.
 *
 * Dense matrices back the embedding weights and encoded features; sparse
 * matrices back bag-of-tokens feature rows, which are mostly zeros over the
 * vocabulary dimension.
 */

export interface DenseMatrix {
  readonly kind: "dense";
  readonly rows: number;
  readonly cols: number;
  readonly data: Float64Array;
}

export interface SparseRow {
  /** Strictly increasing column indices. */
  readonly indices: Int32Array;
  readonly values: Float64Array;
}

export interface SparseMatrix {
  readonly kind: "sparse";
  readonly rows: number;
  readonly cols: number;
  readonly data: readonly SparseRow[];
}

export type FeatureMatrix = DenseMatrix | SparseMatrix;

// ── Construction ───────────────────────────────────────────────────────────

export function zeros(rows: number, cols: number): DenseMatrix {
  return { kind: "dense", rows, cols, data: new Float64Array(rows * cols) };
}

export function full(rows: number, cols: number, value: number): DenseMatrix {
  const m = zeros(rows, cols);
  m.data.fill(value);
  return m;
}

export function fromRows(rows: readonly ArrayLike<number>[], cols?: number): DenseMatrix {
  const nCols = cols ?? (rows.length > 0 ? rows[0].length : 0);
  const m = zeros(rows.length, nCols);
  for (let r = 0; r < rows.length; r++) {
    const row = rows[r];
    if (row.length !== nCols) {
      throw new RangeError(`Row ${r} has ${row.length} columns, expected ${nCols}`);
    }
    for (let c = 0; c < nCols; c++) m.data[r * nCols + c] = row[c];
  }
  return m;
}

export function sparse(rows: readonly SparseRow[], cols: number): SparseMatrix {
  return { kind: "sparse", rows: rows.length, cols, data: rows };
}

export function cloneMatrix(m: DenseMatrix): DenseMatrix {
  return { kind: "dense", rows: m.rows, cols: m.cols, data: new Float64Array(m.data) };
}

// ── Access ─────────────────────────────────────────────────────────────────

export function at(m: DenseMatrix, r: number, c: number): number {
  return m.data[r * m.cols + c];
}

/** View (not a copy) of one dense row. */
export function row(m: DenseMatrix, r: number): Float64Array {
  return m.data.subarray(r * m.cols, (r + 1) * m.cols);
}

export function toArrays(m: DenseMatrix): number[][] {
  const out: number[][] = [];
  for (let r = 0; r < m.rows; r++) out.push(Array.from(row(m, r)));
  return out;
}

// ── Row kernels used by the solvers ────────────────────────────────────────

/** x_r · w */
export function rowDot(x: FeatureMatrix, r: number, w: ArrayLike<number>): number {
  let s = 0;
  if (x.kind === "sparse") {
    const { indices, values } = x.data[r];
    for (let k = 0; k < indices.length; k++) s += values[k] * w[indices[k]];
    return s;
  }
  const off = r * x.cols;
  for (let c = 0; c < x.cols; c++) s += x.data[off + c] * w[c];
  return s;
}

/** w += alpha * x_r */
export function rowAxpy(x: FeatureMatrix, r: number, alpha: number, w: Float64Array): void {
  if (x.kind === "sparse") {
    const { indices, values } = x.data[r];
    for (let k = 0; k < indices.length; k++) w[indices[k]] += alpha * values[k];
    return;
  }
  const off = r * x.cols;
  for (let c = 0; c < x.cols; c++) w[c] += alpha * x.data[off + c];
}

export function rowSquaredNorm(x: FeatureMatrix, r: number): number {
  let s = 0;
  if (x.kind === "sparse") {
    for (const v of x.data[r].values) s += v * v;
    return s;
  }
  const off = r * x.cols;
  for (let c = 0; c < x.cols; c++) s += x.data[off + c] ** 2;
  return s;
}

export function selectRows<M extends FeatureMatrix>(x: M, indices: readonly number[]): M;
export function selectRows(x: FeatureMatrix, indices: readonly number[]): FeatureMatrix {
  if (x.kind === "sparse") {
    return sparse(indices.map((i) => x.data[i]), x.cols);
  }
  const out = zeros(indices.length, x.cols);
  for (let i = 0; i < indices.length; i++) {
    out.data.set(row(x, indices[i]), i * x.cols);
  }
  return out;
}

/**
 * Scale every row to unit L2 norm. Rows whose norm is exactly zero are left
 * as they are.
 */
export function normalizeRows(m: DenseMatrix): DenseMatrix {
  const out = cloneMatrix(m);
  for (let r = 0; r < out.rows; r++) {
    const v = row(out, r);
    let s = 0;
    for (let c = 0; c < v.length; c++) s += v[c] * v[c];
    if (s === 0) continue;
    const inv = 1 / Math.sqrt(s);
    for (let c = 0; c < v.length; c++) v[c] *= inv;
  }
  return out;
}
