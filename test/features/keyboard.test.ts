/**
 * infiniview/keyboard - Keyboard Plugin Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { infiniteScroll } from "../../src/builder/core";
import type { BuiltInfiniteScroll } from "../../src/builder/types";
import { createRangeOracle } from "../../src/core/oracle";
import { withKeyboard } from "../../src/features/keyboard";
import { createContainer, stubResizeObserver } from "../helpers";

let container: HTMLElement;

beforeEach(() => {
  stubResizeObserver(200, 300);
  container = createContainer();
});

afterEach(() => {
  container.remove();
});

const build = (step?: number): BuiltInfiniteScroll<number> => {
  const oracle = createRangeOracle();
  return infiniteScroll({
    container,
    initialKey: 5,
    next: oracle.next,
    prev: oracle.prev,
    item: { size: 100, template: (key) => `Item ${key}` },
  })
    .use(withKeyboard({ step }))
    .build();
};

const press = (list: BuiltInfiniteScroll<number>, key: string): KeyboardEvent => {
  const event = new KeyboardEvent("keydown", { key, cancelable: true });
  list.element.dispatchEvent(event);
  return event;
};

const windowKeys = (list: BuiltInfiniteScroll<number>): number[] =>
  list.getWindow().map((entry) => entry.key);

describe("withKeyboard", () => {
  it("should reject a non-positive step", () => {
    expect(() => withKeyboard({ step: -5 })).toThrow(
      "[infiniview/keyboard] step must be a positive number",
    );
  });

  it("should scroll one step per arrow key", () => {
    const list = build();

    expect(press(list, "ArrowDown").defaultPrevented).toBe(true);
    expect(list.getState().offset).toBe(790);
    expect(windowKeys(list)).toEqual([5, 6, 7, 8]);

    press(list, "ArrowUp");
    press(list, "ArrowUp");
    expect(list.getState().offset).toBe(710);
    expect(windowKeys(list)).toEqual([4, 5, 6, 7]);
    list.destroy();
  });

  it("should use a custom step", () => {
    const list = build(100);

    press(list, "ArrowDown");

    expect(list.getState().offset).toBe(850);
    expect(list.getFrontKey()).toBe(6);
    list.destroy();
  });

  it("should scroll a viewport per page key", () => {
    const list = build();

    press(list, "ArrowDown");
    press(list, "PageDown");

    expect(list.getState().offset).toBe(1090);
    expect(windowKeys(list)).toEqual([8, 9, 10, 11]);
    list.destroy();
  });

  it("should return to the initial key on Home", () => {
    const list = build();

    press(list, "PageDown");
    press(list, "PageDown");
    expect(list.getFrontKey()).toBe(11);

    press(list, "Home");
    expect(list.getFrontKey()).toBe(5);
    list.destroy();
  });

  it("should leave other keys alone", () => {
    const list = build();

    expect(press(list, "Enter").defaultPrevented).toBe(false);
    expect(list.getState().offset).toBe(750);
    list.destroy();
  });
});
