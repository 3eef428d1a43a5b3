// ============================================================================
// FOILGEN — Dense Linear Solve
// Pure TypeScript, small square systems only.
// ============================================================================

/**
 * Solve A·x = b by Gaussian elimination with partial pivoting.
 *
 * A pivot whose magnitude falls below `tolerance` times the largest entry of
 * A marks the system as singular. Returns null in that case, and when the
 * solution is not finite. Inputs are not modified.
 */
export function solveLinearSystem(
  a: readonly (readonly number[])[],
  b: readonly number[],
  tolerance: number,
): number[] | null {
  const n = b.length;
  if (a.length !== n || a.some((row) => row.length !== n)) {
    throw new Error(`Expected a ${n}x${n} matrix`);
  }

  // Augmented working copy [A | b]
  const m = a.map((row, i) => [...row, b[i]]);

  let scale = 0;
  for (const row of a) {
    for (const v of row) scale = Math.max(scale, Math.abs(v));
  }
  if (!Number.isFinite(scale) || scale === 0) return null;
  const threshold = tolerance * scale;

  for (let col = 0; col < n; col++) {
    let pivotRow = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(m[r][col]) > Math.abs(m[pivotRow][col])) pivotRow = r;
    }
    if (!(Math.abs(m[pivotRow][col]) > threshold)) return null;
    if (pivotRow !== col) {
      [m[col], m[pivotRow]] = [m[pivotRow], m[col]];
    }

    for (let r = col + 1; r < n; r++) {
      const factor = m[r][col] / m[col][col];
      if (factor === 0) continue;
      for (let c = col; c <= n; c++) {
        m[r][c] -= factor * m[col][c];
      }
    }
  }

  // Back substitution
  const x = new Array<number>(n).fill(0);
  for (let r = n - 1; r >= 0; r--) {
    let sum = m[r][n];
    for (let c = r + 1; c < n; c++) sum -= m[r][c] * x[c];
    x[r] = sum / m[r][r];
  }

  return x.every(Number.isFinite) ? x : null;
}
