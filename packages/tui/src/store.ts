import type { SessionState } from "./state/session";

export type StoreListener = (state: SessionState) => void;

export interface SessionStore {
  get(): SessionState;
  update(fn: (state: SessionState) => SessionState): void;
  /** Returns an unsubscribe function */
  subscribe(listener: StoreListener): () => void;
}

/**
 * Holds the one SessionState. Listeners fire after every update so the
 * Ink tree can re-render.
 */
export function createStore(initial: SessionState): SessionStore {
  let state = initial;
  const listeners = new Set<StoreListener>();

  return {
    get: () => state,
    update(fn) {
      state = fn(state);
      for (const listener of listeners) listener(state);
    },
    subscribe(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    }
  };
}
