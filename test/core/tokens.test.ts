/**
 * infiniview - Page Token Registry Tests
 */

import { describe, it, expect } from "vitest";
import { createTokenRegistry } from "../../src/core/tokens";

describe("createTokenRegistry", () => {
  it("should resolve allocated tokens to their keys", () => {
    const registry = createTokenRegistry<string>();
    const a = registry.allocate("a");
    const b = registry.allocate("b");

    expect(a).not.toBe(b);
    expect(registry.resolve(a)).toBe("a");
    expect(registry.resolve(b)).toBe("b");
  });

  it("should hand out a new token for a key allocated twice", () => {
    const registry = createTokenRegistry<number>();
    expect(registry.allocate(1)).not.toBe(registry.allocate(1));
  });

  it("should never reuse a released token", () => {
    const registry = createTokenRegistry<number>();
    const first = registry.allocate(1);
    registry.retain(new Set());
    const second = registry.allocate(1);

    expect(second).not.toBe(first);
    expect(registry.resolve(first)).toBeUndefined();
    expect(registry.resolve(second)).toBe(1);
  });

  it("should keep tokens of different registries apart", () => {
    const one = createTokenRegistry<number>();
    const two = createTokenRegistry<number>();
    const token = one.allocate(1);

    expect(two.allocate(1)).not.toBe(token);
    expect(two.resolve(token)).toBeUndefined();
  });

  it("should release everything not retained", () => {
    const registry = createTokenRegistry<number>();
    const a = registry.allocate(1);
    const b = registry.allocate(2);
    const c = registry.allocate(3);

    const released = registry.retain(new Set([b]));

    expect(released).toEqual([a, c]);
    expect(registry.resolve(a)).toBeUndefined();
    expect(registry.resolve(b)).toBe(2);
    expect(registry.resolve(c)).toBeUndefined();
  });

  it("should use the prefix", () => {
    const registry = createTokenRegistry<number>("slot");
    expect(registry.allocate(0).startsWith("slot-")).toBe(true);
  });
});
