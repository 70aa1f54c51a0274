/**
 * infiniview/core - Re-entrancy Guard
 * Depth counter that turns nested calls into no-ops.
 */

export interface ReentrancyGuard {
  /** Run fn unless another run() is in flight. Returns true if fn ran. */
  run(fn: () => void): boolean;

  /** True while a run() is in flight */
  isActive(): boolean;
}

export const createReentrancyGuard = (): ReentrancyGuard => {
  let depth = 0;

  return {
    run(fn: () => void): boolean {
      if (depth > 0) return false;
      depth++;
      try {
        fn();
      } finally {
        depth--;
      }
      return true;
    },
    isActive: () => depth > 0,
  };
};
