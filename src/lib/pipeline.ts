// ============================================================================
// FOILGEN — Parameter → Geometry Pipelines
// ============================================================================
//
// Declares the dependency tables of each airfoil family and the evaluators
// behind every derived node. Stores call into here; nothing in this module
// holds state.
// ============================================================================

import type {
  NacaGeometry,
  NacaParams,
  NacaSection,
  ParsecParamKey,
  ParsecParams,
  Point,
  SimplifiedAirfoilParamKey,
  SurfaceCoefficients,
} from '../types/airfoil';
import { isDebugLogging } from './config';
import { describeNacaSection, nacaGeometry, parseNacaDesignation } from './naca';
import { sampleParsec, solveCoefficients } from './parsec';
import { RecomputeGraph, type DependencyTable, type NodeComputers } from './recomputeGraph';

// ---------------------------------------------------------------------------
// PARSEC
// ---------------------------------------------------------------------------

export type ParsecNode = 'upperCoefficients' | 'lowerCoefficients' | 'coordinates';

/** Everything derived from a PARSEC parameter set. */
export interface ParsecDerived {
  upperCoefficients: SurfaceCoefficients;
  lowerCoefficients: SurfaceCoefficients;
  upperSurface: readonly Point[];
  lowerSurface: readonly Point[];
  coordinates: readonly Point[];
}

const TRAILING_EDGE_DEPS = ['leRadius', 'teZ', 'teAlpha', 'teBeta', 'teThickness'] as const;

export const PARSEC_DEPENDENCIES: DependencyTable<ParsecParamKey, ParsecNode> = {
  upperCoefficients: ['upperX', 'upperZ', 'upperC', ...TRAILING_EDGE_DEPS],
  lowerCoefficients: ['lowerX', 'lowerZ', 'lowerC', ...TRAILING_EDGE_DEPS],
  coordinates: ['numPoints', 'upperCoefficients', 'lowerCoefficients'],
};

export const PARSEC_GRAPH = new RecomputeGraph(PARSEC_DEPENDENCIES);

const PARSEC_COMPUTERS: NodeComputers<ParsecNode, ParsecParams, ParsecDerived> = {
  upperCoefficients: (params) => ({ upperCoefficients: solveCoefficients(params, 'upper') }),
  lowerCoefficients: (params) => ({ lowerCoefficients: solveCoefficients(params, 'lower') }),
  coordinates: (params, derived) =>
    sampleParsec(derived.upperCoefficients, derived.lowerCoefficients, params.numPoints),
};

/** Solve both surfaces and sample the outline in one pass. */
export function computeParsecDerived(params: ParsecParams): ParsecDerived {
  const upperCoefficients = solveCoefficients(params, 'upper');
  const lowerCoefficients = solveCoefficients(params, 'lower');
  return {
    upperCoefficients,
    lowerCoefficients,
    ...sampleParsec(upperCoefficients, lowerCoefficients, params.numPoints),
  };
}

/**
 * How a PARSEC-family airfoil brings its derived state up to date.
 *
 * - `graph`: per-field propagation through PARSEC_GRAPH; only stale nodes run.
 * - `mapper`: the simplified airfoil's one-shot path; both surfaces and the
 *   outline are rebuilt together after the mapped parameters change.
 */
export type ParsecUpdate =
  | { kind: 'graph'; changed: readonly ParsecParamKey[] }
  | { kind: 'mapper'; changed: readonly SimplifiedAirfoilParamKey[] };

export function recomputeParsec(
  update: ParsecUpdate,
  params: ParsecParams,
  derived: ParsecDerived,
): ParsecDerived {
  if (update.changed.length === 0) return derived;
  if (isDebugLogging()) {
    const nodes = update.kind === 'graph' ? PARSEC_GRAPH.affected(update.changed) : PARSEC_GRAPH.order;
    console.debug(`[foilgen] ${update.kind} recompute [${update.changed.join(', ')}] -> [${nodes.join(', ')}]`);
  }
  switch (update.kind) {
    case 'graph':
      return PARSEC_GRAPH.propagate(params, derived, update.changed, PARSEC_COMPUTERS);
    case 'mapper':
      return computeParsecDerived(params);
  }
}

// ---------------------------------------------------------------------------
// NACA Four-Digit
// ---------------------------------------------------------------------------

export type NacaSourceKey = 'name' | keyof NacaParams;
export type NacaNode = 'section' | 'coordinates';

export interface NacaInputs extends NacaParams {
  name: string;
}

export interface NacaDerived extends NacaGeometry {
  section: NacaSection;
  description: string;
}

export const NACA_DEPENDENCIES: DependencyTable<NacaSourceKey, NacaNode> = {
  section: ['name'],
  coordinates: ['section', 'numPoints', 'finiteTrailingEdge'],
};

export const NACA_GRAPH = new RecomputeGraph(NACA_DEPENDENCIES);

const NACA_COMPUTERS: NodeComputers<NacaNode, NacaInputs, NacaDerived> = {
  section: (inputs) => {
    const section = parseNacaDesignation(inputs.name);
    return { section, description: describeNacaSection(inputs.name, section) };
  },
  coordinates: (inputs, derived) =>
    nacaGeometry(derived.section, inputs.numPoints, inputs.finiteTrailingEdge),
};

export function computeNacaDerived(inputs: NacaInputs): NacaDerived {
  const section = parseNacaDesignation(inputs.name);
  return {
    section,
    description: describeNacaSection(inputs.name, section),
    ...nacaGeometry(section, inputs.numPoints, inputs.finiteTrailingEdge),
  };
}

export function recomputeNaca(
  changed: readonly NacaSourceKey[],
  inputs: NacaInputs,
  derived: NacaDerived,
): NacaDerived {
  return NACA_GRAPH.propagate(inputs, derived, changed, NACA_COMPUTERS);
}
