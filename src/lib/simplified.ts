// ============================================================================
// FOILGEN — Simplified PARSEC Parameter Mapping
// ============================================================================

import type { MappedParamKey, ParsecParams, SimplifiedAirfoilParams, SimplifiedParams } from '../types/airfoil';
import { checkBounds, SIMPLIFIED_PARSEC_PARAM_SPECS } from './parameters';

/**
 * Project camber / crest / thickness onto the PARSEC crest coordinates.
 *
 *   upperZ =  thickness / 2 + camber / 100
 *   lowerZ = -thickness / 2 + camber / 100
 *   upperX = lowerX = crestX
 */
export function mapSimplifiedParams(simplified: SimplifiedParams): Pick<ParsecParams, MappedParamKey> {
  const offset = 0.01 * simplified.camber;
  return {
    upperX: simplified.crestX,
    lowerX: simplified.crestX,
    upperZ: 0.5 * simplified.thickness + offset,
    lowerZ: -0.5 * simplified.thickness + offset,
  };
}

/**
 * Full PARSEC parameter set for a simplified airfoil. The mapped values go
 * through the same bounds checks as direct PARSEC writes.
 */
export function toParsecParams(params: SimplifiedAirfoilParams): ParsecParams {
  const mapped = mapSimplifiedParams(params);
  for (const key of ['upperX', 'lowerX', 'upperZ', 'lowerZ'] as const) {
    checkBounds(key, SIMPLIFIED_PARSEC_PARAM_SPECS[key], mapped[key]);
  }
  return {
    ...mapped,
    upperC: params.upperC,
    lowerC: params.lowerC,
    leRadius: params.leRadius,
    teZ: params.teZ,
    teAlpha: params.teAlpha,
    teBeta: params.teBeta,
    teThickness: params.teThickness,
    numPoints: params.numPoints,
  };
}
