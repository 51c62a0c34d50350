export type Matrix = ReadonlyArray<ReadonlyArray<number>>;

export function matVec(m: Matrix, v: ReadonlyArray<number>): number[] {
  return m.map((row) => {
    let sum = 0;
    for (let j = 0; j < row.length; j++) {
      sum += row[j] * (v[j] ?? 0);
    }
    return sum;
  });
}

export function transpose(m: Matrix): number[][] {
  const rows = m.length;
  const cols = rows > 0 ? m[0].length : 0;
  const out: number[][] = [];
  for (let j = 0; j < cols; j++) {
    const row: number[] = [];
    for (let i = 0; i < rows; i++) {
      row.push(m[i][j]);
    }
    out.push(row);
  }
  return out;
}

export function norm(v: ReadonlyArray<number>): number {
  let sum = 0;
  for (const x of v) {
    sum += x * x;
  }
  return Math.sqrt(sum);
}

/**
 * Largest singular value of `m`, by power iteration on mᵀm. The spectral norm
 * bounds the spectral radius from above.
 */
export function spectralNorm(m: Matrix, iterations = 100): number {
  const cols = m.length > 0 ? m[0].length : 0;
  if (cols === 0) {
    return 0;
  }
  const mt = transpose(m);
  let v: number[] = new Array<number>(cols).fill(1 / Math.sqrt(cols));
  let sigma = 0;
  for (let k = 0; k < iterations; k++) {
    const w = matVec(mt, matVec(m, v));
    const size = norm(w);
    if (size === 0) {
      return 0;
    }
    v = w.map((x) => x / size);
    const next = Math.sqrt(size);
    if (Math.abs(next - sigma) < 1e-12 * Math.max(1, next)) {
      return next;
    }
    sigma = next;
  }
  return sigma;
}

/**
 * Solve A·X = B for X by Gaussian elimination with partial pivoting.
 * `a` is n×n, `b` is n×k. Throws on a singular system.
 */
export function solve(a: Matrix, b: Matrix): number[][] {
  const n = a.length;
  const aug = a.map((row, i) => [...row, ...b[i]]);
  const k = n > 0 ? aug[0].length - n : 0;

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(aug[r][col]) > Math.abs(aug[pivot][col])) {
        pivot = r;
      }
    }
    if (Math.abs(aug[pivot][col]) < 1e-12) {
      throw new Error("singular system");
    }
    [aug[col], aug[pivot]] = [aug[pivot], aug[col]];

    const lead = aug[col][col];
    for (let r = 0; r < n; r++) {
      if (r === col) {
        continue;
      }
      const factor = aug[r][col] / lead;
      if (factor === 0) {
        continue;
      }
      for (let c = col; c < n + k; c++) {
        aug[r][c] -= factor * aug[col][c];
      }
    }
  }

  return aug.map((row, i) => row.slice(n).map((x) => x / row[i]));
}

/**
 * Ridge regression: W = (XᵀX + λI)⁻¹ XᵀY. Returns one row per output column
 * of Y, each with one weight per feature column of X.
 */
export function ridgeRegression(x: Matrix, y: Matrix, lambda: number): number[][] {
  const features = x.length > 0 ? x[0].length : 0;
  const outputs = y.length > 0 ? y[0].length : 0;

  const xtx: number[][] = [];
  for (let i = 0; i < features; i++) {
    const row = new Array<number>(features).fill(0);
    for (let j = 0; j < features; j++) {
      let sum = 0;
      for (const sample of x) {
        sum += sample[i] * sample[j];
      }
      row[j] = sum + (i === j ? lambda : 0);
    }
    xtx.push(row);
  }

  const xty: number[][] = [];
  for (let i = 0; i < features; i++) {
    const row = new Array<number>(outputs).fill(0);
    for (let s = 0; s < x.length; s++) {
      for (let o = 0; o < outputs; o++) {
        row[o] += x[s][i] * y[s][o];
      }
    }
    xty.push(row);
  }

  return transpose(solve(xtx, xty));
}
