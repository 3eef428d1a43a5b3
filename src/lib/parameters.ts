// ============================================================================
// FOILGEN — Parameter Declarations and Bounds Validation
// ============================================================================

import type {
  ParamSpec,
  ParsecParamKey,
  ParsecParams,
  SimplifiedAirfoilParamKey,
  SimplifiedAirfoilParams,
} from '../types/airfoil';
import { ValidationError } from './errors';
import { degToRad } from './units';

// ---------------------------------------------------------------------------
// PARSEC
// ---------------------------------------------------------------------------

const NUM_POINTS_SPEC: ParamSpec = {
  min: 50, max: 1000, default: 200, integer: true,
  help: 'The number of horizontally distributed points to use per surface',
};

export const PARSEC_PARAM_SPECS: Record<ParsecParamKey, ParamSpec> = {
  upperX: { min: 0.01, max: 1.0, default: 0.4, help: 'Upper crest location horizontal coordinate' },
  upperZ: { min: -1.0, max: 1.0, default: 0.075, help: 'Upper crest location vertical coordinate' },
  upperC: { min: -1.0, max: 1.0, default: -0.1, help: 'Upper crest location curvature' },
  lowerX: { min: 0.01, max: 1.0, default: 0.4, help: 'Lower crest location horizontal coordinate' },
  lowerZ: { min: -1.0, max: 1.0, default: -0.075, help: 'Lower crest location vertical coordinate' },
  lowerC: { min: -1.0, max: 1.0, default: 0.1, help: 'Lower crest location curvature' },
  leRadius: { min: 0.0, max: 1.0, default: 0.01, help: 'Leading edge radius' },
  teZ: { min: 0.0, max: 1.0, default: 0.0, help: 'Trailing edge vertical coordinate' },
  teAlpha: { min: -Math.PI, max: Math.PI, default: 0.0, help: 'Trailing edge direction angle' },
  teBeta: { min: -Math.PI, max: Math.PI, default: degToRad(20), help: 'Trailing edge wedge angle' },
  teThickness: {
    min: 0.0, max: 1.0, default: 0.0,
    help: 'Trailing edge thickness, max=1.0 equates to a thickness of 1% chord',
  },
  numPoints: NUM_POINTS_SPEC,
};

/**
 * Bounds for the simplified airfoil. The mapped crest positions stop short of
 * the trailing edge, where the PARSEC system degenerates.
 */
export const SIMPLIFIED_PARSEC_PARAM_SPECS: Record<ParsecParamKey, ParamSpec> = {
  ...PARSEC_PARAM_SPECS,
  upperX: { ...PARSEC_PARAM_SPECS.upperX, max: 0.99 },
  lowerX: { ...PARSEC_PARAM_SPECS.lowerX, max: 0.99 },
};

/** Inputs accepted by the simplified airfoil (own + shared PARSEC params). */
export const SIMPLIFIED_PARAM_SPECS: Record<SimplifiedAirfoilParamKey, ParamSpec> = {
  camber: { min: -1.0, max: 1.0, default: 0.0, help: 'Camber, shifts both crests vertically by 1% per unit' },
  crestX: { min: 0.01, max: 0.99, default: 0.4, help: 'Crest location horizontal coordinate, both surfaces' },
  thickness: { min: 0.01, max: 0.3, default: 0.15, help: 'Maximum thickness as a fraction of chord' },
  upperC: PARSEC_PARAM_SPECS.upperC,
  lowerC: PARSEC_PARAM_SPECS.lowerC,
  leRadius: PARSEC_PARAM_SPECS.leRadius,
  teZ: PARSEC_PARAM_SPECS.teZ,
  teAlpha: PARSEC_PARAM_SPECS.teAlpha,
  teBeta: PARSEC_PARAM_SPECS.teBeta,
  teThickness: PARSEC_PARAM_SPECS.teThickness,
  numPoints: NUM_POINTS_SPEC,
};

export const NACA_NUM_POINTS_SPEC: ParamSpec = NUM_POINTS_SPEC;

/** PARSEC parameter names in declaration order. */
export const PARSEC_PARAM_KEYS: readonly ParsecParamKey[] = [
  'upperX', 'upperZ', 'upperC', 'lowerX', 'lowerZ', 'lowerC',
  'leRadius', 'teZ', 'teAlpha', 'teBeta', 'teThickness', 'numPoints',
];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function createDefaultParsecParams(): ParsecParams {
  const s = PARSEC_PARAM_SPECS;
  return {
    upperX: s.upperX.default,
    upperZ: s.upperZ.default,
    upperC: s.upperC.default,
    lowerX: s.lowerX.default,
    lowerZ: s.lowerZ.default,
    lowerC: s.lowerC.default,
    leRadius: s.leRadius.default,
    teZ: s.teZ.default,
    teAlpha: s.teAlpha.default,
    teBeta: s.teBeta.default,
    teThickness: s.teThickness.default,
    numPoints: s.numPoints.default,
  };
}

export function createDefaultSimplifiedParams(): SimplifiedAirfoilParams {
  const s = SIMPLIFIED_PARAM_SPECS;
  return {
    camber: s.camber.default,
    crestX: s.crestX.default,
    thickness: s.thickness.default,
    upperC: s.upperC.default,
    lowerC: s.lowerC.default,
    leRadius: s.leRadius.default,
    teZ: s.teZ.default,
    teAlpha: s.teAlpha.default,
    teBeta: s.teBeta.default,
    teThickness: s.teThickness.default,
    numPoints: s.numPoints.default,
  };
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

/** Narrow an arbitrary string to a declared parameter key. */
export function isParamKey<K extends string>(
  specs: Record<K, ParamSpec>,
  key: string,
): key is K {
  return Object.hasOwn(specs, key);
}

/** Check one value against its `ParamSpec`; returns the value unchanged. */
export function checkBounds(field: string, spec: ParamSpec, value: number): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ValidationError(field, value, `${field} must be a finite number, got ${String(value)}`);
  }
  if (spec.integer && !Number.isInteger(value)) {
    throw new ValidationError(field, value, `${field} must be an integer, got ${value}`);
  }
  if (value < spec.min || value > spec.max) {
    throw new ValidationError(
      field,
      value,
      `${field}=${value} is outside [${spec.min}, ${spec.max}]`,
      { min: spec.min, max: spec.max },
    );
  }
  return value;
}

/** Validate a single named write. Unknown names are rejected too. */
export function validateParam<K extends string>(
  specs: Record<K, ParamSpec>,
  key: string,
  value: number,
): number {
  if (!isParamKey(specs, key)) {
    throw new ValidationError(key, value, `Unknown parameter: ${key}`);
  }
  return checkBounds(key, specs[key], value);
}

/**
 * Validate a batch of writes in full and return the merged parameter set.
 * Nothing is merged unless every entry passes.
 */
export function applyParams<K extends string>(
  specs: Record<K, ParamSpec>,
  current: Record<K, number>,
  changes: Partial<Record<K, number>>,
): { next: Record<K, number>; changed: K[] } {
  const next: Record<K, number> = { ...current };
  const changed: K[] = [];
  for (const key of Object.keys(changes)) {
    if (!isParamKey(specs, key)) {
      throw new ValidationError(key, undefined, `Unknown parameter: ${key}`);
    }
    const value = changes[key];
    if (value === undefined) continue;
    checkBounds(key, specs[key], value);
    if (next[key] !== value) {
      next[key] = value;
      changed.push(key);
    }
  }
  return { next, changed };
}
