// src/builder/pool.ts
/**
 * infiniview/builder - Element Pool
 * Recycling pool for item wrappers; evicted entries come back here.
 */

import { DEFAULT_POOL_SIZE } from "../constants";

export interface ElementPool {
  acquire(): HTMLElement;
  release(el: HTMLElement): void;
  clear(): void;
}

export const createElementPool = (maxSize = DEFAULT_POOL_SIZE): ElementPool => {
  const pool: HTMLElement[] = [];

  return {
    acquire: (): HTMLElement => {
      const el = pool.pop();
      if (el) return el;
      const newEl = document.createElement("div");
      newEl.setAttribute("role", "article");
      return newEl;
    },
    release: (el: HTMLElement): void => {
      if (pool.length < maxSize) {
        el.className = "";
        el.textContent = "";
        el.removeAttribute("style");
        el.removeAttribute("data-key");
        pool.push(el);
      }
    },
    clear: (): void => {
      pool.length = 0;
    },
  };
};
