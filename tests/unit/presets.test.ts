// ============================================================================
// FOILGEN — Preset configuration unit tests
// ============================================================================

import { describe, it, expect } from 'vitest';
import {
  createParamsFromPreset,
  detectPreset,
  isBuiltinPreset,
  PRESET_DESCRIPTIONS,
  PRESET_FACTORIES,
  type BuiltinPresetName,
} from '@/lib/presets';
import { checkBounds, PARSEC_PARAM_KEYS, PARSEC_PARAM_SPECS } from '@/lib/parameters';
import { computeParsecDerived } from '@/lib/pipeline';
import { degToRad } from '@/lib/units';

const ALL_PRESET_NAMES: BuiltinPresetName[] = ['Default', 'Symmetric', 'Cambered', 'ThickTrailingEdge'];

describe('presets', () => {
  it('has a description and a factory for every preset', () => {
    for (const name of ALL_PRESET_NAMES) {
      expect(PRESET_DESCRIPTIONS[name]).toBeTruthy();
      expect(typeof PRESET_FACTORIES[name]).toBe('function');
    }
  });

  it.each(ALL_PRESET_NAMES)('%s stays within the declared bounds', (name) => {
    const params = createParamsFromPreset(name);
    for (const key of PARSEC_PARAM_KEYS) {
      expect(() => checkBounds(key, PARSEC_PARAM_SPECS[key], params[key])).not.toThrow();
    }
  });

  it.each(ALL_PRESET_NAMES)('%s solves without a numerical failure', (name) => {
    expect(() => computeParsecDerived(createParamsFromPreset(name))).not.toThrow();
  });

  it('Default preset matches the declared defaults', () => {
    const p = createParamsFromPreset('Default');
    expect(p.upperX).toBe(0.4);
    expect(p.upperZ).toBe(0.075);
    expect(p.lowerZ).toBe(-0.075);
    expect(p.leRadius).toBe(0.01);
    expect(p.teBeta).toBeCloseTo(degToRad(20), 15);
    expect(p.numPoints).toBe(200);
  });

  it('Symmetric preset mirrors the crests', () => {
    const p = createParamsFromPreset('Symmetric');
    expect(p.upperX).toBe(p.lowerX);
    expect(p.upperZ).toBe(-p.lowerZ);
    expect(p.upperC).toBe(-p.lowerC);
    expect(p.teAlpha).toBe(0);
  });

  it('ThickTrailingEdge differs from Default only in teThickness', () => {
    const thick = createParamsFromPreset('ThickTrailingEdge');
    const base = createParamsFromPreset('Default');
    const differing = PARSEC_PARAM_KEYS.filter((k) => thick[k] !== base[k]);
    expect(differing).toEqual(['teThickness']);
  });

  it('returns a fresh object on every call', () => {
    expect(createParamsFromPreset('Cambered')).not.toBe(createParamsFromPreset('Cambered'));
  });

  // ── detectPreset ────────────────────────────────────────────────────

  it.each(ALL_PRESET_NAMES)('detects %s from its own parameters', (name) => {
    expect(detectPreset(createParamsFromPreset(name))).toBe(name);
  });

  it('detects Custom after any change', () => {
    const p = { ...createParamsFromPreset('Default'), upperZ: 0.08 };
    expect(detectPreset(p)).toBe('Custom');
  });

  it('isBuiltinPreset recognises preset names only', () => {
    expect(isBuiltinPreset('Symmetric')).toBe(true);
    expect(isBuiltinPreset('Custom')).toBe(false);
    expect(isBuiltinPreset('toString')).toBe(false);
  });
});
