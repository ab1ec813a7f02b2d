export type Matrix = number[][];

/** Gaussian elimination with partial pivoting. Throws on a singular system. */
export function solveLinearSystem(a: Matrix, b: number[]): number[] {
  const n = a.length;
  if (b.length !== n) {
    throw new Error(`Dimension mismatch: ${n}x${n} system with ${b.length} right-hand values`);
  }
  const m = a.map((row, i) => [...row, b[i]]);

  for (let col = 0; col < n; col += 1) {
    let pivot = col;
    for (let row = col + 1; row < n; row += 1) {
      if (Math.abs(m[row][col]) > Math.abs(m[pivot][col])) pivot = row;
    }
    if (Math.abs(m[pivot][col]) < 1e-12) {
      throw new Error("Singular matrix");
    }
    if (pivot !== col) {
      const tmp = m[col];
      m[col] = m[pivot];
      m[pivot] = tmp;
    }
    for (let row = col + 1; row < n; row += 1) {
      const factor = m[row][col] / m[col][col];
      if (factor === 0) continue;
      for (let k = col; k <= n; k += 1) {
        m[row][k] -= factor * m[col][k];
      }
    }
  }

  const x = new Array<number>(n).fill(0);
  for (let row = n - 1; row >= 0; row -= 1) {
    let acc = m[row][n];
    for (let k = row + 1; k < n; k += 1) acc -= m[row][k] * x[k];
    x[row] = acc / m[row][row];
  }
  return x;
}

export function invertMatrix(a: Matrix): Matrix {
  const n = a.length;
  const columns: number[][] = [];
  for (let col = 0; col < n; col += 1) {
    const unit = new Array<number>(n).fill(0);
    unit[col] = 1;
    columns.push(solveLinearSystem(a, unit));
  }
  return a.map((_, row) => columns.map((column) => column[row]));
}

export function gramMatrix(design: Matrix): Matrix {
  const p = design[0]?.length ?? 0;
  const gram: Matrix = Array.from({ length: p }, () => new Array<number>(p).fill(0));
  for (const row of design) {
    for (let i = 0; i < p; i += 1) {
      for (let j = i; j < p; j += 1) {
        gram[i][j] += row[i] * row[j];
      }
    }
  }
  for (let i = 0; i < p; i += 1) {
    for (let j = 0; j < i; j += 1) gram[i][j] = gram[j][i];
  }
  return gram;
}

/**
 * Least squares with an optional ridge penalty per coefficient
 * (penalties[i] is added to the i-th diagonal of X'X).
 */
export function leastSquares(design: Matrix, target: number[], penalties?: number[]): number[] {
  if (design.length !== target.length) {
    throw new Error(`Dimension mismatch: ${design.length} rows with ${target.length} targets`);
  }
  const gram = gramMatrix(design);
  const p = gram.length;
  const rhs = new Array<number>(p).fill(0);
  design.forEach((row, r) => {
    for (let i = 0; i < p; i += 1) rhs[i] += row[i] * target[r];
  });
  if (penalties) {
    for (let i = 0; i < p; i += 1) gram[i][i] += penalties[i] ?? 0;
  }
  return solveLinearSystem(gram, rhs);
}

export function dot(a: readonly number[], b: readonly number[]): number {
  let acc = 0;
  for (let i = 0; i < a.length; i += 1) acc += a[i] * (b[i] ?? 0);
  return acc;
}
