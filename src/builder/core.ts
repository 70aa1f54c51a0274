/**
 * infiniview/builder - Core
 * infiniteScroll(config).use(plugin).build()
 *
 * Mounts the continuous scroller engine on a DOM scaffold. The builder owns
 * the DOM side: wrappers from the element pool, translateX/Y positioning,
 * and forwarding of scroll and resize notifications into layout(). The
 * engine owns the window.
 *
 * Plugins hook in through BuilderContext: keydownHandlers,
 * pointerdownHandlers, destroyHandlers and the methods map.
 */

import type { KeyLike, Rect } from "../types";
import type {
  BuilderContext,
  BuiltInfiniteScroll,
  InfiniteScrollBuilder,
  InfiniteScrollConfig,
  PluginMethod,
  ResolvedBuilderConfig,
  ScrollPlugin,
} from "./types";
import { DEFAULT_CLASS_PREFIX } from "../constants";
import { createScroller, type ScrollerHost } from "../core/scroller";
import { createDOMStructure, resolveContainer } from "./dom";
import { createElementPool } from "./pool";

// Names the built API defines itself
const CORE_METHODS: ReadonlySet<string> = new Set([
  "element",
  "getWindow",
  "getFrontKey",
  "getState",
  "jumpTo",
  "relayout",
  "refresh",
  "scrollBy",
  "on",
  "off",
  "destroy",
]);

// =============================================================================
// infiniteScroll() - the builder factory
// =============================================================================

export const infiniteScroll = <K extends KeyLike>(
  config: InfiniteScrollConfig<K>,
): InfiniteScrollBuilder<K> => {
  // ── Validate ────────────────────────────────────────────────────
  if (!config.container) {
    throw new Error("[infiniview/builder] container is required");
  }
  if (!config.item) {
    throw new Error("[infiniview/builder] item configuration is required");
  }
  const { size } = config.item;
  if (typeof size === "number") {
    if (!(size > 0)) {
      throw new Error("[infiniview/builder] item.size must be a positive number");
    }
  } else if (typeof size !== "function") {
    throw new Error(
      "[infiniview/builder] item.size must be a number or a function (key) => number",
    );
  }
  if (!config.item.template) {
    throw new Error("[infiniview/builder] item.template is required");
  }

  // ── Store plugins ───────────────────────────────────────────────
  const plugins: Map<string, ScrollPlugin<K>> = new Map();
  let built = false;

  const builder: InfiniteScrollBuilder<K> = {
    use(plugin: ScrollPlugin<K>): InfiniteScrollBuilder<K> {
      if (built) {
        throw new Error("[infiniview/builder] Cannot call .use() after .build()");
      }
      plugins.set(plugin.name, plugin);
      return builder;
    },

    build(): BuiltInfiniteScroll<K> {
      if (built) {
        throw new Error("[infiniview/builder] .build() can only be called once");
      }
      built = true;
      return materialize(config, plugins);
    },
  };

  return builder;
};

// =============================================================================
// Plugin validation
// =============================================================================

const sortPlugins = <K extends KeyLike>(
  plugins: Map<string, ScrollPlugin<K>>,
): ScrollPlugin<K>[] => {
  const sorted = Array.from(plugins.values()).sort(
    (a, b) => (a.priority ?? 50) - (b.priority ?? 50),
  );

  const names = new Set(sorted.map((p) => p.name));
  const owners = new Map<string, string>();

  for (const plugin of sorted) {
    for (const conflict of plugin.conflicts ?? []) {
      if (names.has(conflict)) {
        throw new Error(
          `[infiniview/builder] ${plugin.name} and ${conflict} cannot be combined`,
        );
      }
    }
    for (const method of plugin.methods ?? []) {
      if (CORE_METHODS.has(method)) {
        throw new Error(
          `[infiniview/builder] ${plugin.name} cannot override ${method}()`,
        );
      }
      const owner = owners.get(method);
      if (owner) {
        throw new Error(
          `[infiniview/builder] ${owner} and ${plugin.name} both define ${method}()`,
        );
      }
      owners.set(method, plugin.name);
    }
  }

  return sorted;
};

// =============================================================================
// materialize() - the actual build logic
// =============================================================================

function materialize<K extends KeyLike>(
  config: InfiniteScrollConfig<K>,
  plugins: Map<string, ScrollPlugin<K>>,
): BuiltInfiniteScroll<K> {
  // ── Resolve config ──────────────────────────────────────────────
  const {
    item: itemConfig,
    direction = "vertical",
    classPrefix = DEFAULT_CLASS_PREFIX,
    ariaLabel,
  } = config;

  const horizontal = direction === "horizontal";
  const itemSize = itemConfig.size;
  const sizeOf = (key: K): number =>
    typeof itemSize === "function" ? itemSize(key) : itemSize;

  const resolvedConfig: ResolvedBuilderConfig = {
    classPrefix,
    horizontal,
  };

  const sortedPlugins = sortPlugins(plugins);

  // ── Create DOM ──────────────────────────────────────────────────
  const containerElement = resolveContainer(config.container);
  const dom = createDOMStructure(
    containerElement,
    classPrefix,
    ariaLabel,
    horizontal,
  );
  const pool = createElementPool();

  let viewportSize = horizontal
    ? dom.viewport.clientWidth
    : dom.viewport.clientHeight;
  let crossSize = horizontal
    ? dom.viewport.clientHeight
    : dom.viewport.clientWidth;
  let isDestroyed = false;

  // ── Host (DOM side of the engine) ───────────────────────────────

  const positionElement = (el: HTMLElement, frame: Readonly<Rect>): void => {
    el.style.transform = horizontal
      ? `translateX(${frame.x}px)`
      : `translateY(${frame.y}px)`;
  };

  const getOffset = (): number =>
    horizontal ? dom.viewport.scrollLeft : dom.viewport.scrollTop;

  const setOffset = (offset: number): void => {
    if (horizontal) dom.viewport.scrollLeft = offset;
    else dom.viewport.scrollTop = offset;
  };

  const host: ScrollerHost<HTMLElement> = {
    getOffset,
    setOffset,
    getViewportSize: () => viewportSize,
    setContentSize: (size) => {
      if (horizontal) dom.content.style.width = `${size}px`;
      else dom.content.style.height = `${size}px`;
    },
    insertView: (el, frame) => {
      positionElement(el, frame);
      dom.items.appendChild(el);
    },
    moveView: positionElement,
    removeView: (el) => {
      el.remove();
      pool.release(el);
    },
  };

  const createView = (key: K): HTMLElement => {
    const el = pool.acquire();
    el.className = `${classPrefix}-item`;
    el.dataset.key = String(key);
    el.style.position = "absolute";
    el.style.top = "0";
    el.style.left = "0";
    const size = `${sizeOf(key)}px`;
    if (horizontal) {
      el.style.width = size;
      el.style.height = "100%";
    } else {
      el.style.height = size;
      el.style.width = "100%";
    }

    const content = itemConfig.template(key);
    if (typeof content === "string") el.innerHTML = content;
    else el.replaceChildren(content);
    return el;
  };

  const frameFor = (key: K): Rect => {
    const size = sizeOf(key);
    return horizontal
      ? { x: 0, y: 0, width: size, height: crossSize }
      : { x: 0, y: 0, width: crossSize, height: size };
  };

  // ── Engine ──────────────────────────────────────────────────────
  const scroller = createScroller<K, HTMLElement>(
    {
      initialKey: config.initialKey,
      next: config.next,
      prev: config.prev,
      createView,
      frameFor,
      orientation: direction,
      spacing: config.spacing,
      multiplier: config.multiplier,
      recenterThreshold: config.recenterThreshold,
      onRefresh: config.onRefresh,
    },
    host,
  );

  scroller.on("collapse", () => {
    dom.root.classList.add(`${classPrefix}--collapsed`);
  });
  scroller.on("expand", () => {
    dom.root.classList.remove(`${classPrefix}--collapsed`);
  });

  const scrollBy = (delta: number): void => {
    if (isDestroyed || delta === 0) return;
    setOffset(getOffset() + delta);
    scroller.layout();
  };

  // ── Scroll handling ─────────────────────────────────────────────

  const onScroll = (): void => {
    if (isDestroyed) return;
    scroller.layout();
  };
  dom.viewport.addEventListener("scroll", onScroll, { passive: true });

  // Convert vertical wheel to horizontal scroll
  let wheelHandler: ((e: WheelEvent) => void) | null = null;
  if (horizontal) {
    wheelHandler = (event: WheelEvent): void => {
      if (event.deltaX) return; // native horizontal scroll handles it
      event.preventDefault();
      scrollBy(event.deltaY);
    };
    dom.viewport.addEventListener("wheel", wheelHandler);
  }

  // ── Keydown & pointerdown handlers (delegate to plugins) ────────

  const keydownHandlers: Array<(event: KeyboardEvent) => void> = [];
  const pointerdownHandlers: Array<(event: PointerEvent) => void> = [];
  const destroyHandlers: Array<() => void> = [];
  const methods = new Map<string, PluginMethod>();

  const handleKeydown = (event: KeyboardEvent): void => {
    for (const handler of keydownHandlers) handler(event);
  };
  const handlePointerdown = (event: PointerEvent): void => {
    for (const handler of pointerdownHandlers) handler(event);
  };

  dom.root.addEventListener("keydown", handleKeydown);
  dom.viewport.addEventListener("pointerdown", handlePointerdown);

  // ── Plugins ─────────────────────────────────────────────────────

  const ctx: BuilderContext<K> = {
    dom,
    scroller,
    config: resolvedConfig,
    rawConfig: config,
    keydownHandlers,
    pointerdownHandlers,
    destroyHandlers,
    methods,
    getOffset,
    scrollBy,
  };

  for (const plugin of sortedPlugins) {
    plugin.setup(ctx);
  }

  // ── Initial layout, then follow the viewport size ───────────────
  scroller.layout();

  const resizeObserver = new ResizeObserver((entries) => {
    if (isDestroyed) return;

    for (const entry of entries) {
      const { width, height } = entry.contentRect;
      const main = horizontal ? width : height;
      const cross = horizontal ? height : width;

      if (cross !== crossSize) {
        // Frames carry the cross size: measure the window again
        crossSize = cross;
        viewportSize = main;
        scroller.relayout();
      } else if (main !== viewportSize) {
        viewportSize = main;
        scroller.layout();
      }
    }
  });
  resizeObserver.observe(dom.viewport);

  // ── Destroy ─────────────────────────────────────────────────────

  const destroy = (): void => {
    if (isDestroyed) return;
    isDestroyed = true;

    dom.root.removeEventListener("keydown", handleKeydown);
    dom.viewport.removeEventListener("pointerdown", handlePointerdown);
    dom.viewport.removeEventListener("scroll", onScroll);
    if (wheelHandler) {
      dom.viewport.removeEventListener("wheel", wheelHandler);
    }
    resizeObserver.disconnect();

    for (const handler of destroyHandlers) handler();
    for (const plugin of sortedPlugins) {
      if (plugin.destroy) plugin.destroy();
    }

    scroller.destroy();
    pool.clear();
    dom.root.remove();
  };

  // ── Assemble public API ─────────────────────────────────────────

  const api: BuiltInfiniteScroll<K> = {
    get element() {
      return dom.root;
    },
    getWindow: () => scroller.getWindow(),
    getFrontKey: () => scroller.getFrontKey(),
    getState: () => scroller.getState(),
    jumpTo: (key) => scroller.jumpTo(key),
    relayout: () => scroller.relayout(),
    refresh: () => scroller.refresh(),
    scrollBy,
    on: scroller.on,
    off: scroller.off,
    destroy,
  };

  // Merge plugin methods
  for (const [name, fn] of methods) {
    if (CORE_METHODS.has(name)) {
      destroy();
      throw new Error(`[infiniview/builder] Cannot override ${name}()`);
    }
    api[name] = fn;
  }

  return api;
}
