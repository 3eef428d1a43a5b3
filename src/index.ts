// ============================================================================
// FOILGEN — Public API
// ============================================================================

export type * from './types/airfoil';

export { AirfoilError, ValidationError, NumericalError, formatAirfoilError } from './lib/errors';
export { DEFAULT_SINGULAR_TOLERANCE, getSingularityTolerance, isDebugLogging } from './lib/config';
export { degToRad, radToDeg } from './lib/units';
export {
  PARSEC_PARAM_SPECS,
  PARSEC_PARAM_KEYS,
  SIMPLIFIED_PARAM_SPECS,
  SIMPLIFIED_PARSEC_PARAM_SPECS,
  createDefaultParsecParams,
  createDefaultSimplifiedParams,
  validateParam,
} from './lib/parameters';
export {
  buildMatrix,
  buildRhs,
  solveCoefficients,
  evaluateSurface,
  surfaceSlope,
  surfaceCurvature,
  cosineSpacing,
  sampleParsec,
  type ParsecGeometry,
} from './lib/parsec';
export {
  NACA_DESIGNATION_PATTERN,
  parseNacaDesignation,
  describeNacaSection,
  nacaThickness,
  nacaCamber,
  halfCosineSpacing,
  nacaGeometry,
} from './lib/naca';
export { mapSimplifiedParams, toParsecParams } from './lib/simplified';
export { RecomputeGraph, topologicalOrder, type DependencyTable, type NodeComputers } from './lib/recomputeGraph';
export {
  PARSEC_DEPENDENCIES,
  PARSEC_GRAPH,
  NACA_DEPENDENCIES,
  NACA_GRAPH,
  computeParsecDerived,
  recomputeParsec,
  type ParsecDerived,
  type ParsecUpdate,
  type NacaDerived,
} from './lib/pipeline';
export {
  PRESET_DESCRIPTIONS,
  PRESET_FACTORIES,
  createParamsFromPreset,
  detectPreset,
  type BuiltinPresetName,
} from './lib/presets';

export {
  createParsecAirfoil,
  type ParsecAirfoilState,
  type ParsecAirfoilStore,
  type ParsecAirfoilOptions,
} from './store/parsecStore';
export {
  createSimplifiedParsecAirfoil,
  type SimplifiedParsecAirfoilState,
  type SimplifiedParsecAirfoilStore,
  type SimplifiedParsecAirfoilOptions,
} from './store/simplifiedParsecStore';
export {
  createNacaAirfoil,
  type NacaAirfoilState,
  type NacaAirfoilStore,
  type NacaAirfoilOptions,
} from './store/nacaStore';
export { watchParam } from './store/watch';
