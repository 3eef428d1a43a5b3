// ============================================================================
// FOILGEN — PARSEC Surface Solver
// Pure TypeScript, no store dependencies.
// ============================================================================
//
// Each surface is the sum of six half-integer power terms:
//
//   y(x) = Σ_{i=0..5} k_i · x^(i + 0.5)
//
// The coefficients are fixed by six boundary conditions, written as A·k = B:
//
//   row 0   y(1)         = trailing edge height ± half thickness
//   row 1   y(x_c)       = crest height
//   row 2   y'(1)        = tan(trailing edge angle ∓ half wedge)
//   row 3   y'(x_c)      = 0                  (the crest is an extremum)
//   row 4   y''(x_c)     = crest curvature
//   row 5   k_0          = ±√(2 · leading edge radius)
//
// Reference: H. Sobieczky, "Parametric Airfoils and Wings".
// ============================================================================

import type { ParsecParams, Point, Side, SurfaceCoefficients } from '../types/airfoil';
import { getSingularityTolerance, isDebugLogging } from './config';
import { NumericalError } from './errors';
import { solveLinearSystem } from './linalg';

const TERM_COUNT = 6;

/** Exponent of term i. */
function exponent(i: number): number {
  return i + 0.5;
}

/** +1 for the upper surface, -1 for the lower. */
export function sideSign(side: Side): 1 | -1 {
  return side === 'upper' ? 1 : -1;
}

// ---------------------------------------------------------------------------
// Linear System
// ---------------------------------------------------------------------------

/** The A matrix. Depends only on the crest position of the surface. */
export function buildMatrix(crestX: number): number[][] {
  const terms = Array.from({ length: TERM_COUNT }, (_, i) => exponent(i));
  return [
    terms.map(() => 1),
    terms.map((p) => crestX ** p),
    terms.map((p) => p),
    terms.map((p) => p * crestX ** (p - 1)),
    terms.map((p) => p * (p - 1) * crestX ** (p - 2)),
    terms.map((_, i) => (i === 0 ? 1 : 0)),
  ];
}

/** The B vector for one surface. */
export function buildRhs(params: ParsecParams, side: Side): number[] {
  const sign = sideSign(side);
  const upper = side === 'upper';
  return [
    // teThickness = 1 means 1% chord, half of it on each side
    params.teZ + 0.005 * sign * params.teThickness,
    upper ? params.upperZ : params.lowerZ,
    Math.tan(params.teAlpha - sign * 0.5 * params.teBeta),
    0.0,
    upper ? params.upperC : params.lowerC,
    sign * Math.sqrt(2 * params.leRadius),
  ];
}

function toCoefficients(k: readonly number[]): SurfaceCoefficients | null {
  if (k.length !== TERM_COUNT) return null;
  const [k0, k1, k2, k3, k4, k5] = k;
  return [k0, k1, k2, k3, k4, k5];
}

/**
 * Solve the boundary-condition system for one surface.
 *
 * @throws NumericalError when the system is singular or the solution is not finite.
 */
export function solveCoefficients(
  params: ParsecParams,
  side: Side,
  tolerance: number = getSingularityTolerance(),
): SurfaceCoefficients {
  const crestX = side === 'upper' ? params.upperX : params.lowerX;
  const solution = solveLinearSystem(buildMatrix(crestX), buildRhs(params, side), tolerance);
  const coefficients = solution ? toCoefficients(solution) : null;
  if (!coefficients) {
    throw new NumericalError(
      side,
      `PARSEC system for the ${side} surface is singular at crest x=${crestX}; adjust the crest position or leading edge radius`,
    );
  }
  if (isDebugLogging()) {
    console.debug(`[foilgen] ${side} coefficients`, coefficients);
  }
  return coefficients;
}

// ---------------------------------------------------------------------------
// Surface Evaluation
// ---------------------------------------------------------------------------

/** Surface height y(x). */
export function evaluateSurface(k: SurfaceCoefficients, x: number): number {
  return k.reduce((sum, ki, i) => sum + ki * x ** exponent(i), 0);
}

/** First derivative dy/dx. Unbounded at x = 0. */
export function surfaceSlope(k: SurfaceCoefficients, x: number): number {
  return k.reduce((sum, ki, i) => {
    const p = exponent(i);
    return sum + ki * p * x ** (p - 1);
  }, 0);
}

/** Second derivative d²y/dx², the PARSEC crest "curvature". */
export function surfaceCurvature(k: SurfaceCoefficients, x: number): number {
  return k.reduce((sum, ki, i) => {
    const p = exponent(i);
    return sum + ki * p * (p - 1) * x ** (p - 2);
  }, 0);
}

// ---------------------------------------------------------------------------
// Sampling
// ---------------------------------------------------------------------------

/** n cosine-spaced stations over [0, 1], clustered at both edges. */
export function cosineSpacing(n: number): number[] {
  return Array.from({ length: n }, (_, i) => 0.5 * (1 + Math.cos(Math.PI * (1 - i / (n - 1)))));
}

export function sampleSurface(k: SurfaceCoefficients, xs: readonly number[]): Point[] {
  return xs.map((x): Point => [x, evaluateSurface(k, x)]);
}

export interface ParsecGeometry {
  /** Leading edge to trailing edge. */
  upperSurface: readonly Point[];
  /** Leading edge to trailing edge. */
  lowerSurface: readonly Point[];
  /**
   * Clockwise outline starting at the leading edge: the upper surface, then
   * the lower surface back towards the nose without its trailing-edge and
   * leading-edge stations. 2n - 2 points.
   */
  coordinates: readonly Point[];
}

export function sampleParsec(
  upper: SurfaceCoefficients,
  lower: SurfaceCoefficients,
  numPoints: number,
): ParsecGeometry {
  const xs = cosineSpacing(numPoints);
  const upperSurface = sampleSurface(upper, xs);
  const lowerSurface = sampleSurface(lower, xs);
  const lowerInterior = lowerSurface.slice(1, -1).reverse();
  return {
    upperSurface,
    lowerSurface,
    coordinates: [...upperSurface, ...lowerInterior],
  };
}
