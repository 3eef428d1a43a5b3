import { produce } from 'immer';
import type { ParsecParams, PresetName } from '../types/airfoil';
import { createDefaultParsecParams, PARSEC_PARAM_KEYS } from './parameters';
import { degToRad } from './units';

export type BuiltinPresetName = Exclude<PresetName, 'Custom'>;

// ---------------------------------------------------------------------------
// Preset Descriptions
// ---------------------------------------------------------------------------

export const PRESET_DESCRIPTIONS: Record<BuiltinPresetName, string> = {
  Default: 'Moderately thick section with crests at 40% chord and a sharp trailing edge',
  Symmetric: 'Mirror-image surfaces about the chord line, forward crests',
  Cambered: 'Lifting section with a high upper crest and a shallow lower crest',
  ThickTrailingEdge: 'Default section with a 0.5% chord blunt trailing edge',
};

// ---------------------------------------------------------------------------
// Preset Factories
// ---------------------------------------------------------------------------

function createSymmetric(): ParsecParams {
  return produce(createDefaultParsecParams(), (p) => {
    p.upperX = 0.3;
    p.lowerX = 0.3;
    p.upperZ = 0.06;
    p.lowerZ = -0.06;
    p.upperC = -0.45;
    p.lowerC = 0.45;
    p.leRadius = 0.015;
    p.teBeta = degToRad(10);
  });
}

function createCambered(): ParsecParams {
  return produce(createDefaultParsecParams(), (p) => {
    p.upperX = 0.35;
    p.upperZ = 0.09;
    p.upperC = -0.6;
    p.lowerX = 0.4;
    p.lowerZ = -0.03;
    p.lowerC = 0.3;
    p.leRadius = 0.012;
    p.teAlpha = degToRad(-8);
    p.teBeta = degToRad(12);
  });
}

function createThickTrailingEdge(): ParsecParams {
  return produce(createDefaultParsecParams(), (p) => {
    p.teThickness = 0.5;
  });
}

export const PRESET_FACTORIES: Record<BuiltinPresetName, () => ParsecParams> = {
  Default: createDefaultParsecParams,
  Symmetric: createSymmetric,
  Cambered: createCambered,
  ThickTrailingEdge: createThickTrailingEdge,
};

/** Default preset used on new airfoils. */
export const DEFAULT_PRESET: BuiltinPresetName = 'Default';

/** Fresh parameter set for the named preset. */
export function createParamsFromPreset(name: BuiltinPresetName): ParsecParams {
  return PRESET_FACTORIES[name]();
}

/** The preset whose every parameter matches, or 'Custom'. */
export function detectPreset(params: ParsecParams): PresetName {
  for (const [name, factory] of Object.entries(PRESET_FACTORIES)) {
    const ref = factory();
    if (PARSEC_PARAM_KEYS.every((k) => params[k] === ref[k])) {
      return isBuiltinPreset(name) ? name : 'Custom';
    }
  }
  return 'Custom';
}

export function isBuiltinPreset(name: string): name is BuiltinPresetName {
  return Object.hasOwn(PRESET_FACTORIES, name);
}
