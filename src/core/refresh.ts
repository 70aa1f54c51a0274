/**
 * infiniview/core - Refresh Controller
 * One refresh at a time; each gesture reaches the handler exactly once.
 */

import type { RefreshHandler } from "../types";

export interface RefreshControllerConfig {
  onRefresh: RefreshHandler;
  onStart?: () => void;
  onEnd?: () => void;
}

export interface RefreshController {
  /** Start a refresh. Returns false if one is already in flight. */
  trigger(): boolean;

  isRefreshing(): boolean;

  /** Forget the in-flight refresh; its completion callback becomes a no-op */
  reset(): void;
}

export const createRefreshController = (
  config: RefreshControllerConfig,
): RefreshController => {
  const { onRefresh, onStart, onEnd } = config;
  let refreshing = false;
  let generation = 0;

  const trigger = (): boolean => {
    if (refreshing) return false;
    refreshing = true;
    const id = ++generation;

    const complete = (): void => {
      if (!refreshing || id !== generation) return;
      refreshing = false;
      onEnd?.();
    };

    onStart?.();
    try {
      onRefresh(complete);
    } catch (error) {
      // A throwing handler never gets to call complete: end it here
      if (refreshing && id === generation) {
        refreshing = false;
        onEnd?.();
      }
      throw error;
    }
    return true;
  };

  const reset = (): void => {
    generation++;
    refreshing = false;
  };

  return {
    trigger,
    isRefreshing: () => refreshing,
    reset,
  };
};
