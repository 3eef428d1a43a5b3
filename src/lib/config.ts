// ============================================================================
// FOILGEN — Runtime Configuration Helpers
// ============================================================================

/** Default relative pivot tolerance below which a system counts as singular. */
export const DEFAULT_SINGULAR_TOLERANCE = 1e-12;

/**
 * Whether recompute traces are logged.
 *
 * Uses FOILGEN_DEBUG env var ('1' or 'true'); off by default.
 */
export function isDebugLogging(): boolean {
  const flag = process.env.FOILGEN_DEBUG?.toLowerCase();
  return flag === '1' || flag === 'true';
}

/**
 * Relative pivot tolerance for the PARSEC solve.
 *
 * Uses FOILGEN_SINGULAR_TOL env var if set to a positive number, otherwise
 * DEFAULT_SINGULAR_TOLERANCE.
 */
export function getSingularityTolerance(): number {
  const raw = process.env.FOILGEN_SINGULAR_TOL;
  if (!raw) return DEFAULT_SINGULAR_TOLERANCE;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_SINGULAR_TOLERANCE;
}
