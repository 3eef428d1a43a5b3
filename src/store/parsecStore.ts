import { createStore } from 'zustand/vanilla';
import { temporal } from 'zundo';
import { freeze } from 'immer';
import type { ParsecParamKey, ParsecParams, PresetName } from '../types/airfoil';
import { applyParams, PARSEC_PARAM_SPECS, validateParam } from '../lib/parameters';
import { computeParsecDerived, recomputeParsec, type ParsecDerived } from '../lib/pipeline';
import {
  createParamsFromPreset,
  DEFAULT_PRESET,
  detectPreset,
  type BuiltinPresetName,
} from '../lib/presets';

export const DEFAULT_PARSEC_NAME = 'PARSEC';
export const DEFAULT_PARSEC_DESCRIPTION = 'A PARametric SECtion (PARSEC) airfoil';

/** Undo history depth. */
export const HISTORY_LIMIT = 50;

// ---------------------------------------------------------------------------
// Store Interface
// ---------------------------------------------------------------------------

export interface ParsecAirfoilState extends ParsecDerived {
  readonly kind: 'parsec';
  name: string;
  description: string;

  // ── Shape Parameters (undo/redo tracked) ───────────────────────
  params: Readonly<ParsecParams>;
  activePreset: PresetName;

  /** Validate, commit and recompute every stale derived value. */
  setParam: (key: ParsecParamKey, value: number) => void;
  /** Validate the whole batch first, then commit it as one write. */
  setParams: (changes: Partial<ParsecParams>) => void;
  loadPreset: (name: BuiltinPresetName) => void;
  setName: (name: string) => void;
  setDescription: (description: string) => void;
  /** Back to the default preset, name and description. */
  reset: () => void;
}

/** Subset of state tracked by Zundo for undo/redo. Derived values ride along so an undo never exposes stale geometry. */
export type UndoableParsecState = Omit<
  ParsecAirfoilState,
  'kind' | 'setParam' | 'setParams' | 'loadPreset' | 'setName' | 'setDescription' | 'reset'
>;

export interface ParsecAirfoilOptions {
  name?: string;
  description?: string;
  /** Starting point; individual `params` override it. */
  preset?: BuiltinPresetName;
  params?: Partial<ParsecParams>;
}

/** Derived slice of a state, for feeding back into the pipeline. */
export function pickParsecDerived(state: ParsecDerived): ParsecDerived {
  return {
    upperCoefficients: state.upperCoefficients,
    lowerCoefficients: state.lowerCoefficients,
    upperSurface: state.upperSurface,
    lowerSurface: state.lowerSurface,
    coordinates: state.coordinates,
  };
}

// ---------------------------------------------------------------------------
// Store Implementation
// ---------------------------------------------------------------------------

function initialParams(options: ParsecAirfoilOptions): ParsecParams {
  const base = createParamsFromPreset(options.preset ?? DEFAULT_PRESET);
  return applyParams(PARSEC_PARAM_SPECS, base, options.params ?? {}).next;
}

/**
 * Create a PARSEC airfoil. Parameters are validated and the geometry solved
 * before the store exists, so a bad construction throws and nothing is built.
 */
export const createParsecAirfoil = (options: ParsecAirfoilOptions = {}) => {
  const params = freeze(initialParams(options));
  const derived = freeze(computeParsecDerived(params), true);

  return createStore<ParsecAirfoilState>()(
    temporal(
      (set, get) => {
        const commit = (next: ParsecParams, changed: readonly ParsecParamKey[]) => {
          if (changed.length === 0) return;
          const updated = recomputeParsec({ kind: 'graph', changed }, next, pickParsecDerived(get()));
          set({ params: freeze(next), ...freeze(updated, true), activePreset: 'Custom' });
        };

        return {
          kind: 'parsec',
          name: options.name ?? DEFAULT_PARSEC_NAME,
          description: options.description ?? DEFAULT_PARSEC_DESCRIPTION,
          params,
          activePreset: options.params ? detectPreset(params) : options.preset ?? DEFAULT_PRESET,
          ...derived,

          setParam: (key, value) => {
            validateParam(PARSEC_PARAM_SPECS, key, value);
            const current = get().params;
            if (current[key] === value) return;
            commit({ ...current, [key]: value }, [key]);
          },

          setParams: (changes) => {
            const { next, changed } = applyParams(PARSEC_PARAM_SPECS, get().params, changes);
            commit(next, changed);
          },

          loadPreset: (name) => {
            const next = createParamsFromPreset(name);
            set({ params: freeze(next), ...freeze(computeParsecDerived(next), true), activePreset: name });
          },

          setName: (name) => set({ name }),
          setDescription: (description) => set({ description }),

          reset: () => {
            const next = createParamsFromPreset(DEFAULT_PRESET);
            set({
              name: DEFAULT_PARSEC_NAME,
              description: DEFAULT_PARSEC_DESCRIPTION,
              params: freeze(next),
              ...freeze(computeParsecDerived(next), true),
              activePreset: DEFAULT_PRESET,
            });
          },
        };
      },
      {
        partialize: (state): UndoableParsecState => ({
          name: state.name,
          description: state.description,
          params: state.params,
          activePreset: state.activePreset,
          ...pickParsecDerived(state),
        }),
        limit: HISTORY_LIMIT,
      },
    ),
  );
};

export type ParsecAirfoilStore = ReturnType<typeof createParsecAirfoil>;
