// ============================================================================
// FOILGEN — Canonical Type Definitions
// ============================================================================

// ---------------------------------------------------------------------------
// Geometry Primitives
// ---------------------------------------------------------------------------

/** A single outline point in chord-normalised coordinates. */
export type Point = readonly [x: number, y: number];

/** Surface side of an airfoil. */
export type Side = 'upper' | 'lower';

/** Airfoil family discriminant. */
export type AirfoilKind = 'parsec' | 'simplified-parsec' | 'naca';

/**
 * Coefficients k0..k5 of one PARSEC surface:
 *   y(x) = Σ k_i · x^(i + 0.5)
 */
export type SurfaceCoefficients = readonly [number, number, number, number, number, number];

// ---------------------------------------------------------------------------
// Parameter Metadata
// ---------------------------------------------------------------------------

/** Declared bounds and metadata for one scalar parameter. */
export interface ParamSpec {
  min: number;
  max: number;
  default: number;
  /** Reject non-integral values. */
  integer?: boolean;
  /** Human-readable help text. */
  help: string;
}

// ---------------------------------------------------------------------------
// PARSEC Parameters
// ---------------------------------------------------------------------------

/**
 * Full PARSEC shape parameter set. Angles in radians; positions and
 * curvatures in chord units.
 */
export interface ParsecParams {
  /** Upper crest horizontal position. @min 0.01 @max 1.0 @default 0.4 */
  upperX: number;
  /** Upper crest vertical position. @min -1 @max 1 @default 0.075 */
  upperZ: number;
  /** Upper crest curvature. @min -1 @max 1 @default -0.1 */
  upperC: number;
  /** Lower crest horizontal position. @min 0.01 @max 1.0 @default 0.4 */
  lowerX: number;
  /** Lower crest vertical position. @min -1 @max 1 @default -0.075 */
  lowerZ: number;
  /** Lower crest curvature. @min -1 @max 1 @default 0.1 */
  lowerC: number;
  /** Leading edge radius. @min 0 @max 1 @default 0.01 */
  leRadius: number;
  /** Trailing edge vertical position. @min 0 @max 1 @default 0 */
  teZ: number;
  /** Trailing edge direction angle. @unit rad @min -π @max π @default 0 */
  teAlpha: number;
  /** Trailing edge wedge angle. @unit rad @min -π @max π @default 20° */
  teBeta: number;
  /** Trailing edge thickness. 1.0 = 1% chord. @min 0 @max 1 @default 0 */
  teThickness: number;
  /** Number of samples per surface. @min 50 @max 1000 @default 200 @integer */
  numPoints: number;
}

export type ParsecParamKey = keyof ParsecParams;

/** Intuitive inputs of the simplified PARSEC airfoil. */
export interface SimplifiedParams {
  /** Camber. @min -1 @max 1 @default 0 */
  camber: number;
  /** Crest horizontal position, shared by both surfaces. @min 0.01 @max 0.99 @default 0.4 */
  crestX: number;
  /** Thickness. @min 0.01 @max 0.30 @default 0.15 */
  thickness: number;
}

export type SimplifiedParamKey = keyof SimplifiedParams;

/** PARSEC parameters the simplified mapper derives instead of taking as input. */
export type MappedParamKey = 'upperX' | 'upperZ' | 'lowerX' | 'lowerZ';

/** PARSEC parameters the simplified airfoil accepts directly. */
export type SharedParamKey = Exclude<ParsecParamKey, MappedParamKey>;

/** Everything a simplified airfoil accepts through setParam. */
export type SimplifiedAirfoilParams = SimplifiedParams & Pick<ParsecParams, SharedParamKey>;

export type SimplifiedAirfoilParamKey = keyof SimplifiedAirfoilParams;

// ---------------------------------------------------------------------------
// NACA Four-Digit
// ---------------------------------------------------------------------------

/** Section properties decoded from an MPTT designation. */
export interface NacaSection {
  /** Maximum camber as a fraction of chord (M / 100). */
  camberMax: number;
  /** Chordwise position of maximum camber (P / 10). */
  camberPos: number;
  /** Maximum thickness as a fraction of chord (TT / 100). */
  thickness: number;
}

/** Sampled NACA geometry. */
export interface NacaGeometry {
  /** Mean camber line ordinates, one per sampled x. */
  meanCamber: readonly number[];
  /** Leading edge to trailing edge. */
  upperSurface: readonly Point[];
  /** Leading edge to trailing edge. */
  lowerSurface: readonly Point[];
  /** Upper trailing edge → leading edge → lower trailing edge. */
  coordinates: readonly Point[];
}

export interface NacaParams {
  numPoints: number;
  /** Blunt trailing edge (a4 = -0.1015) instead of the closed one. */
  finiteTrailingEdge: boolean;
}

// ---------------------------------------------------------------------------
// Presets
// ---------------------------------------------------------------------------

/** PARSEC preset names. 'Custom' auto-selected when any param is manually edited. */
export type PresetName = 'Default' | 'Symmetric' | 'Cambered' | 'ThickTrailingEdge' | 'Custom';
