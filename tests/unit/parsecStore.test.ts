// ============================================================================
// FOILGEN — parsecStore unit tests
// ============================================================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createParsecAirfoil, type ParsecAirfoilStore } from '@/store/parsecStore';
import { watchParam } from '@/store/watch';
import { NumericalError, ValidationError } from '@/lib/errors';
import { evaluateSurface, surfaceCurvature } from '@/lib/parsec';

describe('parsecStore', () => {
  let airfoil: ParsecAirfoilStore;

  beforeEach(() => {
    airfoil = createParsecAirfoil();
  });

  // ── Initial state ──────────────────────────────────────────────────

  it('starts from the Default preset', () => {
    const { kind, name, description, activePreset, params } = airfoil.getState();
    expect(kind).toBe('parsec');
    expect(name).toBe('PARSEC');
    expect(description).toBe('A PARametric SECtion (PARSEC) airfoil');
    expect(activePreset).toBe('Default');
    expect(params.upperX).toBe(0.4);
    expect(params.numPoints).toBe(200);
  });

  it('computes coordinates eagerly on construction', () => {
    const { coordinates } = airfoil.getState();
    expect(coordinates).toHaveLength(398);
    expect(coordinates[0][0]).toBeCloseTo(0, 12);
  });

  it('accepts overrides and names at construction', () => {
    const custom = createParsecAirfoil({ name: 'wing root', params: { upperZ: 0.09, numPoints: 60 } });
    const state = custom.getState();
    expect(state.name).toBe('wing root');
    expect(state.params.upperZ).toBe(0.09);
    expect(state.coordinates).toHaveLength(118);
    expect(state.activePreset).toBe('Custom');
  });

  it('rejects out-of-range construction parameters', () => {
    expect(() => createParsecAirfoil({ params: { leRadius: 2 } })).toThrow(ValidationError);
  });

  it('surfaces a singular construction as NumericalError', () => {
    expect(() => createParsecAirfoil({ params: { lowerX: 1.0 } })).toThrow(NumericalError);
  });

  // ── setParam ────────────────────────────────────────────────────────

  it('setParam on a crest value re-solves only that surface', () => {
    const before = airfoil.getState();
    airfoil.getState().setParam('upperZ', 0.09);
    const after = airfoil.getState();

    expect(after.params.upperZ).toBe(0.09);
    expect(after.upperCoefficients).not.toBe(before.upperCoefficients);
    expect(after.lowerCoefficients).toBe(before.lowerCoefficients);
    expect(after.coordinates).not.toBe(before.coordinates);
    expect(evaluateSurface(after.upperCoefficients, 0.4)).toBeCloseTo(0.09, 9);
    expect(after.activePreset).toBe('Custom');
  });

  it('setParam on numPoints keeps both coefficient sets and resamples', () => {
    const before = airfoil.getState();
    airfoil.getState().setParam('numPoints', 100);
    const after = airfoil.getState();

    expect(after.upperCoefficients).toBe(before.upperCoefficients);
    expect(after.lowerCoefficients).toBe(before.lowerCoefficients);
    expect(after.coordinates).toHaveLength(198);
  });

  it('setParam on a shared trailing edge value re-solves both surfaces', () => {
    const before = airfoil.getState();
    airfoil.getState().setParam('leRadius', 0.02);
    const after = airfoil.getState();

    expect(after.upperCoefficients).not.toBe(before.upperCoefficients);
    expect(after.lowerCoefficients).not.toBe(before.lowerCoefficients);
    expect(after.upperCoefficients[0]).toBeCloseTo(0.2, 12);
    expect(after.lowerCoefficients[0]).toBeCloseTo(-0.2, 12);
  });

  it('matches a freshly built airfoil after a series of writes', () => {
    const s = airfoil.getState();
    s.setParam('upperX', 0.35);
    s.setParam('lowerC', 0.2);
    s.setParam('teThickness', 0.3);
    s.setParam('numPoints', 80);

    const fresh = createParsecAirfoil({
      params: { upperX: 0.35, lowerC: 0.2, teThickness: 0.3, numPoints: 80 },
    }).getState();
    const state = airfoil.getState();
    expect(state.upperCoefficients).toEqual(fresh.upperCoefficients);
    expect(state.lowerCoefficients).toEqual(fresh.lowerCoefficients);
    expect(state.coordinates).toEqual(fresh.coordinates);
  });

  it('ignores a write of the current value', () => {
    const listener = vi.fn();
    airfoil.subscribe(listener);
    airfoil.getState().setParam('upperX', 0.4);
    expect(listener).not.toHaveBeenCalled();
  });

  it('rejects an out-of-range write and leaves state untouched', () => {
    const before = airfoil.getState();
    expect(() => airfoil.getState().setParam('upperX', 1.5)).toThrow(ValidationError);
    const after = airfoil.getState();
    expect(after.params).toBe(before.params);
    expect(after.coordinates).toBe(before.coordinates);
  });

  it('rejects a non-integer numPoints', () => {
    expect(() => airfoil.getState().setParam('numPoints', 120.5)).toThrow('numPoints must be an integer, got 120.5');
  });

  it('reports the violated bounds', () => {
    let caught: unknown;
    try {
      airfoil.getState().setParam('teThickness', -0.1);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ field: 'teThickness', value: -0.1, min: 0, max: 1 });
  });

  it('rolls back a write whose solve is singular', () => {
    const before = airfoil.getState();
    expect(() => airfoil.getState().setParam('upperX', 1.0)).toThrow(NumericalError);
    const after = airfoil.getState();
    expect(after.params.upperX).toBe(0.4);
    expect(after.upperCoefficients).toBe(before.upperCoefficients);
    expect(after.coordinates).toBe(before.coordinates);
  });

  it('publishes frozen parameters that only setParam can change', () => {
    const { params } = airfoil.getState();
    expect(Object.isFrozen(params)).toBe(true);
    expect(Reflect.set(params, 'upperZ', 0.2)).toBe(false);
    expect(airfoil.getState().params.upperZ).toBe(0.075);

    airfoil.getState().setParam('upperZ', 0.2);
    const state = airfoil.getState();
    expect(Object.isFrozen(state.params)).toBe(true);
    expect(evaluateSurface(state.upperCoefficients, 0.4)).toBeCloseTo(0.2, 9);
  });

  it('freezes parameters after loadPreset and reset', () => {
    airfoil.getState().loadPreset('Default');
    expect(Object.isFrozen(airfoil.getState().params)).toBe(true);
    airfoil.getState().reset();
    expect(Object.isFrozen(airfoil.getState().params)).toBe(true);
  });

  // ── setParams ───────────────────────────────────────────────────────

  it('setParams applies a batch in a single update', () => {
    const listener = vi.fn();
    airfoil.subscribe(listener);
    airfoil.getState().setParams({ upperZ: 0.08, lowerZ: -0.08, upperC: -0.3 });

    expect(listener).toHaveBeenCalledTimes(1);
    const { params, upperCoefficients, lowerCoefficients } = airfoil.getState();
    expect(params.upperZ).toBe(0.08);
    expect(params.lowerZ).toBe(-0.08);
    expect(surfaceCurvature(upperCoefficients, 0.4)).toBeCloseTo(-0.3, 8);
    expect(evaluateSurface(lowerCoefficients, 0.4)).toBeCloseTo(-0.08, 9);
  });

  it('setParams applies nothing when any entry is invalid', () => {
    const before = airfoil.getState();
    expect(() => airfoil.getState().setParams({ upperZ: 0.08, teZ: -1 })).toThrow(ValidationError);
    expect(airfoil.getState().params).toBe(before.params);
  });

  // ── Presets ─────────────────────────────────────────────────────────

  it('loadPreset replaces every parameter and recomputes', () => {
    airfoil.getState().setParam('numPoints', 60);
    airfoil.getState().loadPreset('Symmetric');
    const { params, activePreset, upperCoefficients, lowerCoefficients, coordinates } = airfoil.getState();

    expect(activePreset).toBe('Symmetric');
    expect(params.upperX).toBe(0.3);
    expect(params.numPoints).toBe(200);
    expect(coordinates).toHaveLength(398);
    upperCoefficients.forEach((k, i) => expect(lowerCoefficients[i]).toBeCloseTo(-k, 12));
  });

  it('reset restores defaults, name and description', () => {
    airfoil.getState().setName('renamed');
    airfoil.getState().setDescription('scratch');
    airfoil.getState().setParam('upperZ', 0.1);
    airfoil.getState().reset();

    const state = airfoil.getState();
    expect(state.name).toBe('PARSEC');
    expect(state.description).toBe('A PARametric SECtion (PARSEC) airfoil');
    expect(state.params.upperZ).toBe(0.075);
    expect(state.activePreset).toBe('Default');
  });

  // ── Undo / Redo ─────────────────────────────────────────────────────

  it('undo restores parameters together with their geometry', () => {
    const original = airfoil.getState().coordinates;
    airfoil.getState().setParam('upperZ', 0.1);

    airfoil.temporal.getState().undo();
    const state = airfoil.getState();
    expect(state.params.upperZ).toBe(0.075);
    expect(state.coordinates).toBe(original);
  });

  it('redo re-applies the undone write', () => {
    airfoil.getState().setParam('upperZ', 0.1);
    const edited = airfoil.getState().coordinates;
    airfoil.temporal.getState().undo();
    airfoil.temporal.getState().redo();

    expect(airfoil.getState().params.upperZ).toBe(0.1);
    expect(airfoil.getState().coordinates).toBe(edited);
  });

  it('does not record rejected writes', () => {
    expect(() => airfoil.getState().setParam('upperZ', 5)).toThrow(ValidationError);
    expect(airfoil.temporal.getState().pastStates).toHaveLength(0);
  });

  // ── Change notification ─────────────────────────────────────────────

  it('watchParam reports the old and new value of committed writes', () => {
    const listener = vi.fn();
    const unsubscribe = watchParam(airfoil, (s) => s.params.upperZ, listener);

    airfoil.getState().setParam('upperZ', 0.08);
    expect(listener).toHaveBeenCalledWith(0.08, 0.075);

    airfoil.getState().setParam('lowerZ', -0.08);
    expect(listener).toHaveBeenCalledTimes(1);

    unsubscribe();
    airfoil.getState().setParam('upperZ', 0.09);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('watchParam sees consistent coordinates inside the listener', () => {
    let seen = 0;
    watchParam(airfoil, (s) => s.params.numPoints, (next) => {
      seen = airfoil.getState().coordinates.length;
      expect(next).toBe(75);
    });
    airfoil.getState().setParam('numPoints', 75);
    expect(seen).toBe(148);
  });
});
