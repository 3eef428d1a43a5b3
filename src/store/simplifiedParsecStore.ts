// ============================================================================
// FOILGEN — Simplified PARSEC Airfoil Store
// ============================================================================
//
// Camber, crest position and thickness are the inputs; the four PARSEC crest
// parameters are derived from them. Every write takes the mapper path: map,
// validate the mapped values, solve both surfaces, resample, then publish
// the lot in a single set.
// ============================================================================

import { createStore } from 'zustand/vanilla';
import { temporal } from 'zundo';
import { freeze } from 'immer';
import type { ParsecParams, SimplifiedAirfoilParamKey, SimplifiedAirfoilParams } from '../types/airfoil';
import {
  applyParams,
  createDefaultSimplifiedParams,
  SIMPLIFIED_PARAM_SPECS,
  validateParam,
} from '../lib/parameters';
import { recomputeParsec, computeParsecDerived, type ParsecDerived } from '../lib/pipeline';
import { toParsecParams } from '../lib/simplified';
import { HISTORY_LIMIT, pickParsecDerived } from './parsecStore';

export const DEFAULT_SIMPLIFIED_NAME = 'Simplified PARSEC';
export const DEFAULT_SIMPLIFIED_DESCRIPTION =
  'A PARSEC airfoil driven by camber, crest location and thickness';

export interface SimplifiedParsecAirfoilState extends ParsecDerived {
  readonly kind: 'simplified-parsec';
  name: string;
  description: string;

  /** Inputs: camber / crestX / thickness plus the shared PARSEC parameters. */
  params: Readonly<SimplifiedAirfoilParams>;
  /** Full PARSEC parameter set the inputs map onto. Read-only view. */
  parsecParams: Readonly<ParsecParams>;

  setParam: (key: SimplifiedAirfoilParamKey, value: number) => void;
  setParams: (changes: Partial<SimplifiedAirfoilParams>) => void;
  setName: (name: string) => void;
  setDescription: (description: string) => void;
  reset: () => void;
}

export type UndoableSimplifiedState = Omit<
  SimplifiedParsecAirfoilState,
  'kind' | 'setParam' | 'setParams' | 'setName' | 'setDescription' | 'reset'
>;

export interface SimplifiedParsecAirfoilOptions {
  name?: string;
  description?: string;
  params?: Partial<SimplifiedAirfoilParams>;
}

export const createSimplifiedParsecAirfoil = (options: SimplifiedParsecAirfoilOptions = {}) => {
  const params = freeze(
    applyParams(SIMPLIFIED_PARAM_SPECS, createDefaultSimplifiedParams(), options.params ?? {}).next,
  );
  const parsecParams = freeze(toParsecParams(params));
  const derived = freeze(computeParsecDerived(parsecParams), true);

  return createStore<SimplifiedParsecAirfoilState>()(
    temporal(
      (set, get) => {
        const commit = (next: SimplifiedAirfoilParams, changed: readonly SimplifiedAirfoilParamKey[]) => {
          if (changed.length === 0) return;
          // Mapped crest values are bounds-checked here, before anything is solved
          const nextParsec = toParsecParams(next);
          const updated = recomputeParsec({ kind: 'mapper', changed }, nextParsec, pickParsecDerived(get()));
          set({ params: freeze(next), parsecParams: freeze(nextParsec), ...freeze(updated, true) });
        };

        return {
          kind: 'simplified-parsec',
          name: options.name ?? DEFAULT_SIMPLIFIED_NAME,
          description: options.description ?? DEFAULT_SIMPLIFIED_DESCRIPTION,
          params,
          parsecParams,
          ...derived,

          setParam: (key, value) => {
            validateParam(SIMPLIFIED_PARAM_SPECS, key, value);
            const current = get().params;
            if (current[key] === value) return;
            commit({ ...current, [key]: value }, [key]);
          },

          setParams: (changes) => {
            const { next, changed } = applyParams(SIMPLIFIED_PARAM_SPECS, get().params, changes);
            commit(next, changed);
          },

          setName: (name) => set({ name }),
          setDescription: (description) => set({ description }),

          reset: () => {
            const next = createDefaultSimplifiedParams();
            const nextParsec = toParsecParams(next);
            set({
              name: DEFAULT_SIMPLIFIED_NAME,
              description: DEFAULT_SIMPLIFIED_DESCRIPTION,
              params: freeze(next),
              parsecParams: freeze(nextParsec),
              ...freeze(computeParsecDerived(nextParsec), true),
            });
          },
        };
      },
      {
        partialize: (state): UndoableSimplifiedState => ({
          name: state.name,
          description: state.description,
          params: state.params,
          parsecParams: state.parsecParams,
          ...pickParsecDerived(state),
        }),
        limit: HISTORY_LIMIT,
      },
    ),
  );
};

export type SimplifiedParsecAirfoilStore = ReturnType<typeof createSimplifiedParsecAirfoil>;
