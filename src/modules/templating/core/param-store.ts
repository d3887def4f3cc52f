/**
 * Per-template parameter mapping. Writes merge key by key, last write wins.
 */

import type { ParamMap } from './types.js';

export interface ParamStore {
  get(name: string): unknown;
  set(params: ParamMap): void;
  names(): string[];
  /** Copy of the current mapping; later writes do not show through it */
  snapshot(): ParamMap;
  clear(): void;
}

export const makeParamStore = (): ParamStore => {
  const values = new Map<string, unknown>();

  return {
    get(name) {
      return values.get(name);
    },

    set(params) {
      for (const [name, value] of Object.entries(params)) {
        values.set(name, value);
      }
    },

    names() {
      return [...values.keys()];
    },

    snapshot() {
      return Object.fromEntries(values);
    },

    clear() {
      values.clear();
    },
  };
};
