/**
 * infiniview/core - Paged Navigator
 *
 * Keeps at most three pages materialized: the one on screen and its two
 * neighbors. Each page is identified by a token from the token registry;
 * the host refers to pages only by token, never by attaching keys to its
 * own view objects.
 */

import type {
  AnimationDecider,
  EventHandler,
  KeyEquivalence,
  KeyLike,
  KeyOracle,
  Page,
  PagerEvents,
  PageToken,
  PageTransition,
  Unsubscribe,
} from "../types";
import { createEmitter } from "../events";
import { isBoundary, resolveAnimation, sameKey } from "./oracle";
import { createTokenRegistry } from "./tokens";

// =============================================================================
// Types
// =============================================================================

export interface PagerConfig<K extends KeyLike, V> extends KeyOracle<K> {
  /** Page shown first */
  initialKey: K;

  /** View Factory, called at most once per page token */
  createView: (key: K) => V;

  /**
   * Whether (and which way) to animate a programmatic key change.
   * Equivalent keys are never animated.
   */
  decideAnimation: AnimationDecider<K>;

  /** Key equivalence (default: Object.is) */
  areEquivalent?: KeyEquivalence<K>;
}

export interface Pager<K extends KeyLike, V> {
  getCurrentKey(): K;
  getCurrentPage(): Page<K>;

  /** Pages in navigation order: [previous?, current, next?] */
  getWindow(): ReadonlyArray<Page<K>>;

  /** Key of a live token */
  keyFor(token: PageToken): K | undefined;

  /** View of a live page, created on first request */
  viewFor(token: PageToken): V;

  /** Page before the given one in the window, or null */
  pageBefore(token: PageToken): Page<K> | null;

  /** Page after the given one in the window, or null */
  pageAfter(token: PageToken): Page<K> | null;

  /**
   * Programmatic key change. Returns the transition the host has to
   * perform, or null when key is equivalent to the current key.
   * Non-animated transitions are already complete when this returns.
   */
  setKey(key: K): PageTransition<K> | null;

  /**
   * Host signal: a transition to the page with this token finished.
   * Returns true when the current page changed.
   */
  completeTransition(token: PageToken, completed: boolean): boolean;

  /** Transition requested by setKey() and not completed yet */
  getPending(): PageTransition<K> | null;

  on<E extends keyof PagerEvents<K>>(
    event: E,
    handler: EventHandler<PagerEvents<K>[E]>,
  ): Unsubscribe;
  off<E extends keyof PagerEvents<K>>(
    event: E,
    handler: EventHandler<PagerEvents<K>[E]>,
  ): void;

  destroy(): void;
}

// =============================================================================
// Factory
// =============================================================================

export const createPager = <K extends KeyLike, V>(
  config: PagerConfig<K, V>,
): Pager<K, V> => {
  if (isBoundary(config.initialKey)) {
    throw new Error("[infiniview/pager] initialKey is required");
  }
  if (typeof config.next !== "function" || typeof config.prev !== "function") {
    throw new Error("[infiniview/pager] next and prev must be functions");
  }
  if (typeof config.createView !== "function") {
    throw new Error("[infiniview/pager] createView must be a function");
  }
  if (typeof config.decideAnimation !== "function") {
    throw new Error("[infiniview/pager] decideAnimation must be a function");
  }

  const { next, prev, createView, decideAnimation } = config;
  const areEquivalent: KeyEquivalence<K> = config.areEquivalent ?? sameKey;

  const emitter = createEmitter<PagerEvents<K>>();
  const tokens = createTokenRegistry<K>();
  const views = new Map<PageToken, V>();

  let current: Page<K> = { token: tokens.allocate(config.initialKey), key: config.initialKey };
  let pages: Page<K>[] = [current];
  let pending: PageTransition<K> | null = null;
  let synthesized = false;
  let isDestroyed = false;

  // ── Window maintenance ──────────────────────────────────────────

  const allocate = (key: K): Page<K> => ({ token: tokens.allocate(key), key });

  const indexOf = (token: PageToken): number =>
    pages.findIndex((page) => page.token === token);

  /** [prev(center)?, center, next(center)?], reusing equivalent pages */
  const buildAround = (center: Page<K>): Page<K>[] => {
    const used = new Set<PageToken>([center.token]);
    const reuse = (key: K): Page<K> => {
      const existing = pages.find(
        (page) => !used.has(page.token) && areEquivalent(page.key, key),
      );
      const page = existing ?? allocate(key);
      used.add(page.token);
      return page;
    };

    const result: Page<K>[] = [];
    const before = prev(center.key);
    if (!isBoundary(before)) result.push(reuse(before));
    result.push(center);
    const after = next(center.key);
    if (!isBoundary(after)) result.push(reuse(after));
    return result;
  };

  const commit = (nextPages: Page<K>[]): void => {
    const changed =
      nextPages.length !== pages.length ||
      nextPages.some((page, i) => page.token !== pages[i]?.token);

    pages = nextPages;
    const released = tokens.retain(new Set(pages.map((page) => page.token)));
    for (const token of released) views.delete(token);

    if (changed) {
      emitter.emit("window:change", { keys: pages.map((page) => page.key) });
    }
  };

  commit(buildAround(current));

  // ── Transitions ─────────────────────────────────────────────────

  const completeTransition = (token: PageToken, completed: boolean): boolean => {
    if (isDestroyed) return false;

    const target = pages[indexOf(token)];
    const request = pending;
    pending = null;

    if (!completed || !target) {
      if (synthesized) {
        synthesized = false;
        commit(buildAround(current));
      }
      const key = target?.key ?? request?.key;
      if (key !== undefined) {
        emitter.emit("transition:end", { key, completed: false });
      }
      return false;
    }

    synthesized = false;
    if (target.token === current.token) {
      emitter.emit("transition:end", { key: current.key, completed: true });
      return false;
    }

    const previous = current.key;
    current = target;
    // Neighbors are fetched only now, so a synthesized placeholder
    // never shows the wrong content mid-transition
    commit(buildAround(current));

    emitter.emit("key:change", { key: current.key, previous });
    emitter.emit("transition:end", { key: current.key, completed: true });
    return true;
  };

  const setKey = (key: K): PageTransition<K> | null => {
    if (isDestroyed) return null;
    if (isBoundary(key)) {
      throw new Error("[infiniview/pager] setKey() requires a key");
    }

    if (pending) completeTransition(pending.token, false);
    if (areEquivalent(key, current.key)) return null;

    const decision = resolveAnimation(
      decideAnimation,
      areEquivalent,
      current.key,
      key,
    );

    let target = pages.find(
      (page) => page.token !== current.token && areEquivalent(page.key, key),
    );
    if (!target) {
      target = allocate(key);
      commit(
        decision.direction === "forward" ? [current, target] : [target, current],
      );
      synthesized = true;
    }

    const transition: PageTransition<K> = {
      token: target.token,
      key: target.key,
      direction: decision.direction,
      animate: decision.animate,
    };
    pending = transition;
    emitter.emit("transition:start", {
      key: transition.key,
      direction: transition.direction,
      animate: transition.animate,
    });

    if (!transition.animate) completeTransition(transition.token, true);
    return transition;
  };

  // ── Data source ─────────────────────────────────────────────────

  const viewFor = (token: PageToken): V => {
    if (views.has(token)) {
      const cached = views.get(token);
      if (cached !== undefined) return cached;
    }
    const key = tokens.resolve(token);
    if (key === undefined) {
      throw new Error(`[infiniview/pager] Unknown or stale page token: ${token}`);
    }
    const view = createView(key);
    views.set(token, view);
    return view;
  };

  const pageBefore = (token: PageToken): Page<K> | null => {
    const index = indexOf(token);
    return index > 0 ? (pages[index - 1] ?? null) : null;
  };

  const pageAfter = (token: PageToken): Page<K> | null => {
    const index = indexOf(token);
    return index >= 0 ? (pages[index + 1] ?? null) : null;
  };

  const destroy = (): void => {
    if (isDestroyed) return;
    isDestroyed = true;
    pending = null;
    views.clear();
    tokens.retain(new Set());
    emitter.clear();
  };

  return {
    getCurrentKey: () => current.key,
    getCurrentPage: () => current,
    getWindow: () => pages.slice(),
    keyFor: (token) => tokens.resolve(token),
    viewFor,
    pageBefore,
    pageAfter,
    setKey,
    completeTransition,
    getPending: () => pending,
    on: <E extends keyof PagerEvents<K>>(
      event: E,
      handler: EventHandler<PagerEvents<K>[E]>,
    ): Unsubscribe => emitter.on(event, handler),
    off: <E extends keyof PagerEvents<K>>(
      event: E,
      handler: EventHandler<PagerEvents<K>[E]>,
    ): void => emitter.off(event, handler),
    destroy,
  };
};
