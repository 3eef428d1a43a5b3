// ============================================================================
// FOILGEN — NACA Four-Digit Sections
// Pure TypeScript, no store dependencies.
// ============================================================================

import type { NacaGeometry, NacaSection, Point } from '../types/airfoil';
import { ValidationError } from './errors';

/** M, P and two thickness digits. */
export const NACA_DESIGNATION_PATTERN = /^[0-9][0-9][0-9]{2}$/;

/** Thickness polynomial coefficients a0..a3. */
const THICKNESS_COEFFICIENTS = [0.2969, -0.126, -0.3516, 0.2843] as const;
/** x⁴ coefficient for a blunt trailing edge. */
export const A4_FINITE_TE = -0.1015;
/** x⁴ coefficient that closes the trailing edge. */
export const A4_CLOSED_TE = -0.1036;

/**
 * Decode an MPTT designation.
 *
 * @throws ValidationError quoting the designation when it is not four digits.
 */
export function parseNacaDesignation(name: string): NacaSection {
  if (typeof name !== 'string' || !NACA_DESIGNATION_PATTERN.test(name)) {
    throw new ValidationError('name', name, `Invalid NACA 4-digit designation: "${String(name)}"`);
  }
  const camberMax = Number(name[0]) / 100;
  const camberPos = Number(name[1]) / 10;
  const thickness = Number(name.slice(2)) / 100;

  // A camber position of 0 makes the section symmetric regardless of M
  if (camberPos === 0 && camberMax !== 0) {
    console.warn(
      `[foilgen] NACA ${name}: camber position 0 with ${name[0]}% camber, treating the section as symmetric`,
    );
  }
  return { camberMax, camberPos, thickness };
}

export function describeNacaSection(name: string, section: NacaSection): string {
  const pct = (v: number) => `${Math.round(v * 100)}%`;
  if (section.camberPos === 0 || section.camberMax === 0) {
    return `NACA ${name}: symmetric section, ${pct(section.thickness)} thick`;
  }
  return (
    `NACA ${name}: ${pct(section.camberMax)} camber at ${Math.round(section.camberPos * 100)}% chord, ` +
    `${pct(section.thickness)} thick`
  );
}

// ---------------------------------------------------------------------------
// Section Shape
// ---------------------------------------------------------------------------

/** Half-thickness t(x) normal to the camber line. */
export function nacaThickness(x: number, thickness: number, finiteTrailingEdge: boolean): number {
  const [a0, a1, a2, a3] = THICKNESS_COEFFICIENTS;
  const a4 = finiteTrailingEdge ? A4_FINITE_TE : A4_CLOSED_TE;
  return 5 * thickness * (a0 * Math.sqrt(x) + a1 * x + a2 * x ** 2 + a3 * x ** 3 + a4 * x ** 4);
}

/** Mean camber line height and slope at x. */
export function nacaCamber(x: number, section: NacaSection): { yc: number; slope: number } {
  const { camberMax: m, camberPos: p } = section;
  if (p === 0) return { yc: 0, slope: 0 };
  if (x < p) {
    return {
      yc: (m / p ** 2) * (2 * p * x - x ** 2),
      slope: ((2 * m) / p ** 2) * (p - x),
    };
  }
  return {
    yc: (m / (1 - p) ** 2) * (1 - 2 * p + 2 * p * x - x ** 2),
    slope: ((2 * m) / (1 - p) ** 2) * (p - x),
  };
}

/** n stations over [0, 1] from the half-cosine distribution. */
export function halfCosineSpacing(n: number): number[] {
  return Array.from({ length: n }, (_, i) => 0.5 * (1 - Math.cos((Math.PI * i) / (n - 1))));
}

/**
 * Sample the section. The outline runs from the upper trailing edge forward
 * to the leading edge and back along the lower surface; the leading-edge
 * station appears once, so the outline has 2n - 1 points.
 */
export function nacaGeometry(
  section: NacaSection,
  numPoints: number,
  finiteTrailingEdge: boolean,
): NacaGeometry {
  const meanCamber: number[] = [];
  const upperSurface: Point[] = [];
  const lowerSurface: Point[] = [];

  for (const x of halfCosineSpacing(numPoints)) {
    const t = nacaThickness(x, section.thickness, finiteTrailingEdge);
    const { yc, slope } = nacaCamber(x, section);
    const theta = Math.atan(slope);
    meanCamber.push(yc);
    upperSurface.push([x - t * Math.sin(theta), yc + t * Math.cos(theta)]);
    lowerSurface.push([x + t * Math.sin(theta), yc - t * Math.cos(theta)]);
  }

  return {
    meanCamber,
    upperSurface,
    lowerSurface,
    coordinates: [...[...upperSurface].reverse(), ...lowerSurface.slice(1)],
  };
}
