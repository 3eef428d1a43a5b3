import type { StoreApi } from 'zustand/vanilla';

/**
 * Call `listener(next, previous)` synchronously after every committed write
 * that changes the selected value. Rejected writes never notify.
 *
 * @returns Unsubscribe function.
 */
export function watchParam<T, U>(
  store: StoreApi<T>,
  selector: (state: T) => U,
  listener: (next: U, previous: U) => void,
): () => void {
  return store.subscribe((state, prevState) => {
    const next = selector(state);
    const previous = selector(prevState);
    if (!Object.is(next, previous)) listener(next, previous);
  });
}
