import { createStore } from 'zustand/vanilla';
import { temporal } from 'zundo';
import { freeze } from 'immer';
import { checkBounds, NACA_NUM_POINTS_SPEC } from '../lib/parameters';
import {
  computeNacaDerived,
  recomputeNaca,
  type NacaDerived,
  type NacaInputs,
  type NacaSourceKey,
} from '../lib/pipeline';
import { HISTORY_LIMIT } from './parsecStore';

export const DEFAULT_NACA_NAME = '0012';

// ---------------------------------------------------------------------------
// Store Interface
// ---------------------------------------------------------------------------

export interface NacaAirfoilState extends NacaDerived {
  readonly kind: 'naca';
  /** Four-digit designation, e.g. "2412". */
  name: string;
  numPoints: number;
  finiteTrailingEdge: boolean;

  /** @throws ValidationError for anything but four digits; state unchanged. */
  setName: (name: string) => void;
  setNumPoints: (numPoints: number) => void;
  setFiniteTrailingEdge: (finite: boolean) => void;
  reset: () => void;
}

export type UndoableNacaState = Omit<
  NacaAirfoilState,
  'kind' | 'setName' | 'setNumPoints' | 'setFiniteTrailingEdge' | 'reset'
>;

export interface NacaAirfoilOptions {
  name?: string;
  numPoints?: number;
  finiteTrailingEdge?: boolean;
}

function pickInputs(state: NacaInputs): NacaInputs {
  return { name: state.name, numPoints: state.numPoints, finiteTrailingEdge: state.finiteTrailingEdge };
}

function pickDerived(state: NacaDerived): NacaDerived {
  return {
    section: state.section,
    description: state.description,
    meanCamber: state.meanCamber,
    upperSurface: state.upperSurface,
    lowerSurface: state.lowerSurface,
    coordinates: state.coordinates,
  };
}

// ---------------------------------------------------------------------------
// Store Implementation
// ---------------------------------------------------------------------------

export const createNacaAirfoil = (options: NacaAirfoilOptions = {}) => {
  const inputs: NacaInputs = {
    name: options.name ?? DEFAULT_NACA_NAME,
    numPoints: checkBounds('numPoints', NACA_NUM_POINTS_SPEC, options.numPoints ?? NACA_NUM_POINTS_SPEC.default),
    finiteTrailingEdge: options.finiteTrailingEdge ?? false,
  };
  const derived = freeze(computeNacaDerived(inputs), true);

  return createStore<NacaAirfoilState>()(
    temporal(
      (set, get) => {
        const commit = (next: NacaInputs, changed: NacaSourceKey) => {
          const state = get();
          const updated = recomputeNaca([changed], next, pickDerived(state));
          set({ ...next, ...freeze(updated, true) });
        };

        return {
          kind: 'naca',
          ...inputs,
          ...derived,

          setName: (name) => {
            const current = pickInputs(get());
            if (current.name === name) return;
            commit({ ...current, name }, 'name');
          },

          setNumPoints: (numPoints) => {
            checkBounds('numPoints', NACA_NUM_POINTS_SPEC, numPoints);
            const current = pickInputs(get());
            if (current.numPoints === numPoints) return;
            commit({ ...current, numPoints }, 'numPoints');
          },

          setFiniteTrailingEdge: (finite) => {
            const current = pickInputs(get());
            if (current.finiteTrailingEdge === finite) return;
            commit({ ...current, finiteTrailingEdge: finite }, 'finiteTrailingEdge');
          },

          reset: () => {
            const next: NacaInputs = {
              name: DEFAULT_NACA_NAME,
              numPoints: NACA_NUM_POINTS_SPEC.default,
              finiteTrailingEdge: false,
            };
            set({ ...next, ...freeze(computeNacaDerived(next), true) });
          },
        };
      },
      {
        partialize: (state): UndoableNacaState => ({ ...pickInputs(state), ...pickDerived(state) }),
        limit: HISTORY_LIMIT,
      },
    ),
  );
};

export type NacaAirfoilStore = ReturnType<typeof createNacaAirfoil>;
