// ============================================================================
// FOILGEN — Angle Unit Utilities
// ============================================================================
//
// PARSEC trailing-edge angles are stored and solved in radians.
// Presets and callers often think in degrees; these convert at the boundary.
// ============================================================================

/** Radians per degree. */
export const RAD_PER_DEG = Math.PI / 180;

/** Convert degrees to radians. */
export function degToRad(deg: number): number {
  return deg * RAD_PER_DEG;
}

/** Convert radians to degrees. */
export function radToDeg(rad: number): number {
  return rad / RAD_PER_DEG;
}
