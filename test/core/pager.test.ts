/**
 * infiniview - Paged Navigator Tests
 */

import { describe, it, expect, vi } from "vitest";
import type {
  AnimationDecider,
  AnimationDecision,
  KeyOracle,
} from "../../src/types";
import { createPager, type Pager, type PagerConfig } from "../../src/core/pager";
import { createRangeOracle } from "../../src/core/oracle";

// =============================================================================
// Helpers
// =============================================================================

interface PageView {
  readonly label: string;
}

const byOrder: AnimationDecider<number> = (oldKey, newKey) => ({
  animate: true,
  direction: newKey > oldKey ? "forward" : "backward",
});

const setup = (overrides: Partial<PagerConfig<number, PageView>> = {}) => {
  const oracle: KeyOracle<number> = createRangeOracle({ min: 0, max: 9 });
  const createView = vi.fn((key: number): PageView => ({ label: `page ${key}` }));
  const pager = createPager<number, PageView>({
    initialKey: 5,
    next: oracle.next,
    prev: oracle.prev,
    createView,
    decideAnimation: byOrder,
    ...overrides,
  });
  return { pager, createView, oracle };
};

const windowKeys = (pager: Pager<number, PageView>): number[] =>
  pager.getWindow().map((page) => page.key);

const expectSettledWindow = (
  pager: Pager<number, PageView>,
  oracle: KeyOracle<number>,
): void => {
  const current = pager.getCurrentKey();
  const expected = [oracle.prev(current), current, oracle.next(current)].filter(
    (key): key is number => key !== null && key !== undefined,
  );
  expect(windowKeys(pager)).toEqual(expected);
};

// =============================================================================
// Window
// =============================================================================

describe("window", () => {
  it("should hold the current page and its neighbors", () => {
    const { pager } = setup();
    const current = pager.getCurrentPage();

    expect(pager.getCurrentKey()).toBe(5);
    expect(windowKeys(pager)).toEqual([4, 5, 6]);
    expect(pager.pageBefore(current.token)?.key).toBe(4);
    expect(pager.pageAfter(current.token)?.key).toBe(6);
  });

  it("should report nothing beyond the window", () => {
    const { pager } = setup();
    const [first, , last] = pager.getWindow();
    if (!first || !last) throw new Error("expected three pages");

    expect(pager.pageBefore(first.token)).toBeNull();
    expect(pager.pageAfter(last.token)).toBeNull();
    expect(pager.pageAfter("page-unknown")).toBeNull();
  });

  it("should omit neighbors at a boundary", () => {
    const { pager } = setup({ initialKey: 0 });

    expect(windowKeys(pager)).toEqual([0, 1]);
    expect(pager.pageBefore(pager.getCurrentPage().token)).toBeNull();
  });

  it("should hold only the current page without neighbors", () => {
    const { pager } = setup({ next: () => null, prev: () => undefined });
    expect(windowKeys(pager)).toEqual([5]);
  });

  it("should give every page its own token", () => {
    const { pager } = setup();
    const tokens = pager.getWindow().map((page) => page.token);

    expect(new Set(tokens).size).toBe(3);
    for (const page of pager.getWindow()) {
      expect(pager.keyFor(page.token)).toBe(page.key);
    }
  });
});

// =============================================================================
// Views
// =============================================================================

describe("viewFor", () => {
  it("should create views lazily and once per token", () => {
    const { pager, createView } = setup();
    const token = pager.getCurrentPage().token;
    expect(createView).not.toHaveBeenCalled();

    const view = pager.viewFor(token);

    expect(view).toEqual({ label: "page 5" });
    expect(pager.viewFor(token)).toBe(view);
    expect(createView).toHaveBeenCalledTimes(1);
  });

  it("should keep the views of pages that stay in the window", () => {
    const { pager } = setup();
    const after = pager.pageAfter(pager.getCurrentPage().token);
    if (!after) throw new Error("expected a next page");
    const view = pager.viewFor(after.token);

    pager.completeTransition(after.token, true);

    expect(pager.getCurrentPage().token).toBe(after.token);
    expect(pager.viewFor(pager.getCurrentPage().token)).toBe(view);
  });

  it("should reject tokens that left the window", () => {
    const { pager } = setup();
    const [first] = pager.getWindow();
    const after = pager.pageAfter(pager.getCurrentPage().token);
    if (!first || !after) throw new Error("expected pages");

    pager.completeTransition(after.token, true);

    expect(() => pager.viewFor(first.token)).toThrow(
      `[infiniview/pager] Unknown or stale page token: ${first.token}`,
    );
  });
});

// =============================================================================
// User-driven transitions
// =============================================================================

describe("user-driven transitions", () => {
  it("should move to the completed page and rebuild the window", () => {
    const { pager } = setup();
    const oldCurrent = pager.getCurrentPage();
    const after = pager.pageAfter(oldCurrent.token);
    if (!after) throw new Error("expected a next page");
    const onKey = vi.fn();
    const onEnd = vi.fn();
    const onWindow = vi.fn();
    pager.on("key:change", onKey);
    pager.on("transition:end", onEnd);
    pager.on("window:change", onWindow);

    expect(pager.completeTransition(after.token, true)).toBe(true);

    expect(pager.getCurrentKey()).toBe(6);
    expect(windowKeys(pager)).toEqual([5, 6, 7]);
    // The previous page keeps its token
    expect(pager.getWindow()[0]?.token).toBe(oldCurrent.token);
    expect(onKey).toHaveBeenCalledWith({ key: 6, previous: 5 });
    expect(onEnd).toHaveBeenCalledWith({ key: 6, completed: true });
    expect(onWindow).toHaveBeenCalledWith({ keys: [5, 6, 7] });
  });

  it("should leave everything in place when cancelled", () => {
    const { pager } = setup();
    const before = pager.getWindow();
    const prevPage = pager.pageBefore(pager.getCurrentPage().token);
    if (!prevPage) throw new Error("expected a previous page");
    const onEnd = vi.fn();
    const onWindow = vi.fn();
    pager.on("transition:end", onEnd);
    pager.on("window:change", onWindow);

    expect(pager.completeTransition(prevPage.token, false)).toBe(false);

    expect(pager.getCurrentKey()).toBe(5);
    expect(pager.getWindow()).toEqual(before);
    expect(onEnd).toHaveBeenCalledWith({ key: 4, completed: false });
    expect(onWindow).not.toHaveBeenCalled();
  });

  it("should be idempotent at the leading boundary", () => {
    const { pager } = setup({ initialKey: 0 });
    const current = pager.getCurrentPage();
    const before = pager.getWindow();

    expect(pager.pageBefore(current.token)).toBeNull();
    expect(pager.completeTransition(current.token, true)).toBe(false);
    expect(pager.completeTransition(current.token, true)).toBe(false);

    expect(pager.getCurrentKey()).toBe(0);
    expect(pager.getWindow()).toEqual(before);
  });

  it("should keep the window settled while paging through the sequence", () => {
    const { pager, oracle } = setup({ initialKey: 0 });

    for (let i = 0; i < 12; i++) {
      const after = pager.pageAfter(pager.getCurrentPage().token);
      if (after) pager.completeTransition(after.token, true);
      expect(pager.getWindow().length).toBeGreaterThanOrEqual(1);
      expect(pager.getWindow().length).toBeLessThanOrEqual(3);
      expectSettledWindow(pager, oracle);
    }
    expect(pager.getCurrentKey()).toBe(9);

    for (let i = 0; i < 12; i++) {
      const before = pager.pageBefore(pager.getCurrentPage().token);
      if (before) pager.completeTransition(before.token, true);
      expectSettledWindow(pager, oracle);
    }
    expect(pager.getCurrentKey()).toBe(0);
  });
});

// =============================================================================
// Programmatic transitions
// =============================================================================

describe("setKey", () => {
  it("should target the neighbor page when the key is adjacent", () => {
    const { pager } = setup();
    const after = pager.pageAfter(pager.getCurrentPage().token);
    const onStart = vi.fn();
    pager.on("transition:start", onStart);

    const transition = pager.setKey(6);

    expect(transition).toEqual({
      token: after?.token,
      key: 6,
      direction: "forward",
      animate: true,
    });
    expect(pager.getPending()).toEqual(transition);
    expect(pager.getCurrentKey()).toBe(5);
    expect(windowKeys(pager)).toEqual([4, 5, 6]);
    expect(onStart).toHaveBeenCalledWith({ key: 6, direction: "forward", animate: true });
  });

  it("should place a distant key next to the current page until it completes", () => {
    const { pager, oracle } = setup();

    const transition = pager.setKey(9);
    if (!transition) throw new Error("expected a transition");

    expect(windowKeys(pager)).toEqual([5, 9]);
    expect(pager.pageAfter(pager.getCurrentPage().token)?.token).toBe(transition.token);

    expect(pager.completeTransition(transition.token, true)).toBe(true);
    expect(pager.getCurrentKey()).toBe(9);
    expect(pager.getPending()).toBeNull();
    expectSettledWindow(pager, oracle);
  });

  it("should place a distant key before the current page when going backward", () => {
    const { pager } = setup();

    const transition = pager.setKey(1);

    expect(transition?.direction).toBe("backward");
    expect(windowKeys(pager)).toEqual([1, 5]);
  });

  it("should restore the window when a programmatic transition is cancelled", () => {
    const { pager, oracle } = setup();
    const onEnd = vi.fn();
    pager.on("transition:end", onEnd);

    const transition = pager.setKey(9);
    if (!transition) throw new Error("expected a transition");
    expect(pager.completeTransition(transition.token, false)).toBe(false);

    expect(pager.getCurrentKey()).toBe(5);
    expect(pager.getPending()).toBeNull();
    expectSettledWindow(pager, oracle);
    expect(onEnd).toHaveBeenCalledWith({ key: 9, completed: false });
  });

  it("should complete a non-animated change before returning", () => {
    const decideAnimation = vi.fn(
      (): AnimationDecision => ({ animate: false, direction: "forward" }),
    );
    const { pager, oracle } = setup({ decideAnimation });
    const onKey = vi.fn();
    pager.on("key:change", onKey);

    const transition = pager.setKey(9);

    expect(decideAnimation).toHaveBeenCalledWith(5, 9);
    expect(transition?.animate).toBe(false);
    expect(pager.getCurrentKey()).toBe(9);
    expect(pager.getPending()).toBeNull();
    expect(onKey).toHaveBeenCalledWith({ key: 9, previous: 5 });
    expectSettledWindow(pager, oracle);
  });

  it("should ignore a key equivalent to the current one", () => {
    const decideAnimation = vi.fn(byOrder);
    const { pager } = setup({
      decideAnimation,
      areEquivalent: (a, b) => a % 100 === b % 100,
    });
    const onStart = vi.fn();
    pager.on("transition:start", onStart);

    expect(pager.setKey(105)).toBeNull();
    expect(pager.setKey(5)).toBeNull();

    expect(pager.getCurrentKey()).toBe(5);
    expect(decideAnimation).not.toHaveBeenCalled();
    expect(onStart).not.toHaveBeenCalled();
  });

  it("should cancel a pending transition when a new key is set", () => {
    const { pager } = setup();
    const onEnd = vi.fn();
    pager.on("transition:end", onEnd);

    pager.setKey(9);
    const second = pager.setKey(2);

    expect(onEnd).toHaveBeenCalledTimes(1);
    expect(onEnd).toHaveBeenCalledWith({ key: 9, completed: false });
    expect(pager.getPending()).toEqual(second);
    expect(windowKeys(pager)).toEqual([2, 5]);
  });
});

// =============================================================================
// Lifecycle
// =============================================================================

describe("destroy", () => {
  it("should release every token and ignore later changes", () => {
    const { pager } = setup();
    const token = pager.getCurrentPage().token;

    pager.destroy();

    expect(() => pager.viewFor(token)).toThrow("Unknown or stale page token");
    expect(pager.setKey(9)).toBeNull();
    expect(pager.completeTransition(token, true)).toBe(false);
  });
});
