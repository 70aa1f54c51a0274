/**
 * infiniview/core - Continuous Scroller
 *
 * Keeps a small window of materialized entries over a conceptually unbounded
 * sequence produced lazily by the oracle. The content region is kept several
 * times larger than the viewport and the offset is periodically recentered:
 * entries and offset move by the same delta, so nothing moves on screen.
 *
 * The engine is purely reactive. The host calls layout() whenever the layout
 * is invalidated or the offset changes; everything else happens inside it.
 */

import type {
  Edge,
  KeyLike,
  KeyOracle,
  MaybeKey,
  Orientation,
  Rect,
  RefreshHandler,
  ScrollerEvents,
  ScrollerPhase,
  ViewportState,
  VisibleEntry,
  EventHandler,
  Unsubscribe,
} from "../types";
import {
  DEFAULT_MULTIPLIER,
  DEFAULT_RECENTER_THRESHOLD,
  DEFAULT_SPACING,
  MIN_SCROLL_SLACK,
} from "../constants";
import { createEmitter } from "../events";
import { getAxis } from "./axis";
import { createReentrancyGuard } from "./guard";
import { isBoundary } from "./oracle";
import { createRefreshController, type RefreshController } from "./refresh";

// =============================================================================
// Types
// =============================================================================

/**
 * What the scroller needs from its host container.
 * Offsets and frames are in content-region coordinates along the main axis.
 */
export interface ScrollerHost<V> {
  getOffset(): number;

  /** May synchronously trigger another layout(); that call is ignored */
  setOffset(offset: number): void;

  getViewportSize(): number;
  setContentSize(size: number): void;

  /** Add a freshly created view to the view hierarchy */
  insertView(view: V, frame: Readonly<Rect>): void;

  /** Reposition a view already in the hierarchy */
  moveView(view: V, frame: Readonly<Rect>): void;

  /** Remove an evicted view from the hierarchy */
  removeView(view: V): void;
}

export interface ScrollerConfig<K extends KeyLike, V> extends KeyOracle<K> {
  /** First key to display */
  initialKey: K;

  /** View Factory, called once per materialization */
  createView: (key: K) => V;

  /** Frame of the view for key; only the main-axis origin is overridden */
  frameFor: (key: K) => Rect;

  /** Scroll axis (default: 'vertical') */
  orientation?: Orientation;

  /** Gap between two entries in pixels (default: 0) */
  spacing?: number;

  /** Content region size as a multiple of the viewport (default: 6) */
  multiplier?: number;

  /** Recenter once the offset is this fraction of the region away from center (default: 0.25) */
  recenterThreshold?: number;

  /** Pull-to-refresh handler */
  onRefresh?: RefreshHandler;
}

/** Resolved configuration (after defaults are applied) */
export interface ResolvedScrollerConfig {
  readonly orientation: Orientation;
  readonly spacing: number;
  readonly multiplier: number;
  readonly recenterThreshold: number;
}

export interface Scroller<K extends KeyLike, V> {
  readonly config: ResolvedScrollerConfig;

  /** Host signal: layout invalidated or offset changed */
  layout(): void;

  /** Drop the window and lay it out again from the front key */
  relayout(): void;

  /** Programmatic key change: show key at the leading edge of the viewport */
  jumpTo(key: K): void;

  /** Read-only snapshot of the visible window, in ascending position */
  getWindow(): ReadonlyArray<VisibleEntry<K, V>>;

  /** Key of the first entry that reaches into the viewport */
  getFrontKey(): K;

  getState(): ViewportState;
  getPhase(): ScrollerPhase;

  /** True when the oracle reports no more content past the window on that edge */
  isAtBoundary(edge: Edge): boolean;

  /** Host signal: refresh gesture. Returns false if none ran. */
  refresh(): boolean;
  isRefreshing(): boolean;

  on<E extends keyof ScrollerEvents<K>>(
    event: E,
    handler: EventHandler<ScrollerEvents<K>[E]>,
  ): Unsubscribe;
  off<E extends keyof ScrollerEvents<K>>(
    event: E,
    handler: EventHandler<ScrollerEvents<K>[E]>,
  ): void;

  destroy(): void;
}

interface Entry<K extends KeyLike, V> {
  readonly key: K;
  readonly view: V;
  frame: Rect;
}

interface Edges<K extends KeyLike> {
  before: MaybeKey<K>;
  after: MaybeKey<K>;
}

// =============================================================================
// Config
// =============================================================================

export const resolveScrollerConfig = <K extends KeyLike, V>(
  config: ScrollerConfig<K, V>,
): ResolvedScrollerConfig => {
  const {
    orientation = "vertical",
    spacing = DEFAULT_SPACING,
    multiplier = DEFAULT_MULTIPLIER,
    recenterThreshold = DEFAULT_RECENTER_THRESHOLD,
  } = config;

  if (isBoundary(config.initialKey)) {
    throw new Error("[infiniview/scroller] initialKey is required");
  }
  if (typeof config.next !== "function" || typeof config.prev !== "function") {
    throw new Error("[infiniview/scroller] next and prev must be functions");
  }
  if (typeof config.createView !== "function") {
    throw new Error("[infiniview/scroller] createView must be a function");
  }
  if (typeof config.frameFor !== "function") {
    throw new Error("[infiniview/scroller] frameFor must be a function");
  }
  if (!(spacing >= 0)) {
    throw new Error("[infiniview/scroller] spacing cannot be negative");
  }
  if (!(multiplier > 1)) {
    throw new Error("[infiniview/scroller] multiplier must be greater than 1");
  }
  if (!(recenterThreshold > 0 && recenterThreshold < 0.5)) {
    throw new Error(
      "[infiniview/scroller] recenterThreshold must be between 0 and 0.5",
    );
  }

  return { orientation, spacing, multiplier, recenterThreshold };
};

// =============================================================================
// Factory
// =============================================================================

export const createScroller = <K extends KeyLike, V>(
  config: ScrollerConfig<K, V>,
  host: ScrollerHost<V>,
): Scroller<K, V> => {
  const resolved = resolveScrollerConfig(config);
  const { spacing, multiplier, recenterThreshold } = resolved;
  const { next, prev, createView, frameFor } = config;

  const axis = getAxis(resolved.orientation);
  const emitter = createEmitter<ScrollerEvents<K>>();
  const guard = createReentrancyGuard();
  const refreshController: RefreshController | null = config.onRefresh
    ? createRefreshController({
        onRefresh: config.onRefresh,
        onStart: () => emitter.emit("refresh:start", {}),
        onEnd: () => emitter.emit("refresh:end", {}),
      })
    : null;

  const entries: Entry<K, V>[] = [];

  // Key (and its on-screen position) used to seed an empty window
  let anchorKey: K = config.initialKey;
  let seedInset = 0;

  let phase: ScrollerPhase = "empty";
  let offset = 0;
  let viewportSize = -1;
  let contentSize = 0;
  let collapsed = false;
  let isDestroyed = false;

  // ── Offset & content region ─────────────────────────────────────

  const maxOffset = (): number => Math.max(0, contentSize - viewportSize);

  const clampOffset = (value: number): number =>
    Math.min(Math.max(value, 0), maxOffset());

  const writeContentSize = (size: number): void => {
    contentSize = size;
    host.setContentSize(size);
  };

  const writeOffset = (value: number): void => {
    offset = value;
    host.setOffset(value);
  };

  const syncViewport = (): void => {
    offset = host.getOffset();
    const size = Math.max(0, host.getViewportSize());
    if (size === viewportSize) return;
    viewportSize = size;
    if (!collapsed) writeContentSize(size * multiplier);
  };

  // ── Window helpers ──────────────────────────────────────────────

  const first = (): Entry<K, V> | undefined => entries[0];
  const last = (): Entry<K, V> | undefined => entries[entries.length - 1];

  const translateEntries = (delta: number): void => {
    if (delta === 0) return;
    for (const entry of entries) {
      entry.frame = axis.moveTo(entry.frame, axis.start(entry.frame) + delta);
      host.moveView(entry.view, entry.frame);
    }
  };

  const readEdges = (): Edges<K> => ({
    before: prev(first()?.key ?? anchorKey),
    after: next(last()?.key ?? anchorKey),
  });

  const frontEntry = (): Entry<K, V> | undefined =>
    entries.find((entry) => axis.end(entry.frame) > offset) ?? last();

  // ── Step 2: recenter / go-to-edge / collapse ────────────────────

  const recenterIfNeeded = (): void => {
    const center = (contentSize - viewportSize) / 2;
    if (Math.abs(offset - center) <= contentSize * recenterThreshold) return;

    const delta = center - offset;
    phase = "recentering";
    translateEntries(delta);
    writeOffset(center);
    emitter.emit("recenter", { delta });
  };

  const alignEdge = (edge: Edge): void => {
    const head = first();
    const tail = last();
    if (!head || !tail) {
      // Nothing to align yet; make the seed land at the content start
      if (edge === "leading" && offset !== 0) writeOffset(0);
      return;
    }

    const delta =
      edge === "leading"
        ? -axis.start(head.frame)
        : contentSize - axis.end(tail.frame);
    if (delta === 0) return;

    phase = "recentering";
    translateEntries(delta);
    const target = clampOffset(offset + delta);
    if (target !== offset) writeOffset(target);
    emitter.emit("edge:align", { edge, delta });
  };

  const collapseToContent = (): void => {
    const head = first();
    const tail = last();
    const extent = head && tail ? axis.end(tail.frame) - axis.start(head.frame) : 0;
    const size = Math.max(extent, viewportSize + MIN_SCROLL_SLACK);
    const delta = head ? -axis.start(head.frame) : 0;
    const changed = !collapsed || size !== contentSize || delta !== 0;

    collapsed = true;
    if (size !== contentSize) writeContentSize(size);
    translateEntries(delta);
    const target = clampOffset(offset + delta);
    if (target !== offset) writeOffset(target);

    if (changed) emitter.emit("collapse", { contentSize: size });
  };

  const expandRegion = (): void => {
    collapsed = false;
    writeContentSize(viewportSize * multiplier);
    emitter.emit("expand", { contentSize });
  };

  const reposition = (edges: Edges<K>): void => {
    const leading = isBoundary(edges.before);
    const trailing = isBoundary(edges.after);

    if (leading && trailing) {
      collapseToContent();
      return;
    }
    if (collapsed) expandRegion();

    if (leading) alignEdge("leading");
    else if (trailing) alignEdge("trailing");
    else recenterIfNeeded();
  };

  // ── Steps 3-5: growth & eviction ────────────────────────────────

  const measure = (key: K): Rect => {
    const frame = frameFor(key);
    if (!(axis.size(frame) > 0) && spacing === 0) {
      throw new Error(
        `[infiniview/scroller] frameFor(${String(key)}) must return a positive ${axis.horizontal ? "width" : "height"}`,
      );
    }
    return frame;
  };

  const materialize = (
    key: K,
    placeAt: (frame: Readonly<Rect>) => number,
  ): Entry<K, V> => {
    const view = createView(key);
    const measured = measure(key);
    const frame = axis.moveTo(measured, placeAt(measured));
    host.insertView(view, frame);
    return { key, view, frame };
  };

  const growTrailing = (): number => {
    let added = 0;

    if (entries.length === 0) {
      const start = offset + seedInset;
      entries.push(materialize(anchorKey, () => start));
      seedInset = 0;
      added++;
    }

    const limit = offset + viewportSize;
    let tail = last();
    while (tail && axis.end(tail.frame) + spacing < limit) {
      const key = next(tail.key);
      if (isBoundary(key)) break;
      const start = axis.end(tail.frame) + spacing;
      tail = materialize(key, () => start);
      entries.push(tail);
      added++;
    }
    return added;
  };

  const growLeading = (): number => {
    let added = 0;
    let head = first();
    while (head && axis.start(head.frame) - spacing > offset) {
      const key = prev(head.key);
      if (isBoundary(key)) break;
      const end = axis.start(head.frame) - spacing;
      head = materialize(key, (frame) => end - axis.size(frame));
      entries.unshift(head);
      added++;
    }
    return added;
  };

  const evict = (): number => {
    let removed = 0;
    const limit = offset + viewportSize;

    // Outermost first; the last remaining entry anchors the window
    let tail = last();
    while (entries.length > 1 && tail && axis.start(tail.frame) >= limit) {
      entries.pop();
      host.removeView(tail.view);
      removed++;
      tail = last();
    }

    let head = first();
    while (entries.length > 1 && head && axis.end(head.frame) <= offset) {
      entries.shift();
      host.removeView(head.view);
      removed++;
      head = first();
    }
    return removed;
  };

  const fill = (): number => {
    phase = "growing";
    const added = growTrailing() + growLeading();
    return added + evict();
  };

  // ── Layout pass ─────────────────────────────────────────────────

  const layout = (): void => {
    if (isDestroyed) return;

    guard.run(() => {
      syncViewport();

      const wasEmpty = entries.length === 0;
      const edges = readEdges();
      reposition(edges);
      let changes = fill();

      // A boundary reached (or left) while growing: settle against it now
      const settled = readEdges();
      const boundaryChanged =
        isBoundary(edges.before) !== isBoundary(settled.before) ||
        isBoundary(edges.after) !== isBoundary(settled.after);
      const fitsAll = isBoundary(settled.before) && isBoundary(settled.after);
      if (wasEmpty || boundaryChanged || fitsAll) {
        reposition(settled);
        changes += fill();
      }

      const front = frontEntry();
      if (front) anchorKey = front.key;
      phase = entries.length === 0 ? "empty" : "steady";

      if (changes > 0) {
        emitter.emit("window:change", { keys: entries.map((e) => e.key) });
      }
    });
  };

  const clearWindow = (): void => {
    for (const entry of entries) host.removeView(entry.view);
    entries.length = 0;
    phase = "empty";
  };

  const relayout = (): void => {
    if (isDestroyed || guard.isActive()) return;
    const front = frontEntry();
    if (front) {
      anchorKey = front.key;
      seedInset = axis.start(front.frame) - offset;
    }
    clearWindow();
    layout();
  };

  const jumpTo = (key: K): void => {
    if (isDestroyed || guard.isActive()) return;
    if (isBoundary(key)) {
      throw new Error("[infiniview/scroller] jumpTo() requires a key");
    }
    anchorKey = key;
    seedInset = 0;
    clearWindow();
    layout();
  };

  const isAtBoundary = (edge: Edge): boolean => {
    const edges = readEdges();
    return isBoundary(edge === "leading" ? edges.before : edges.after);
  };

  const destroy = (): void => {
    if (isDestroyed) return;
    isDestroyed = true;
    clearWindow();
    refreshController?.reset();
    emitter.clear();
  };

  return {
    config: resolved,
    layout,
    relayout,
    jumpTo,
    getWindow: () => entries.slice(),
    getFrontKey: () => frontEntry()?.key ?? anchorKey,
    getState: () => ({
      offset,
      viewportSize: Math.max(0, viewportSize),
      contentSize,
      multiplier,
      collapsed,
    }),
    getPhase: () => phase,
    isAtBoundary,
    refresh: () => (refreshController ? refreshController.trigger() : false),
    isRefreshing: () => refreshController?.isRefreshing() ?? false,
    on: <E extends keyof ScrollerEvents<K>>(
      event: E,
      handler: EventHandler<ScrollerEvents<K>[E]>,
    ): Unsubscribe => emitter.on(event, handler),
    off: <E extends keyof ScrollerEvents<K>>(
      event: E,
      handler: EventHandler<ScrollerEvents<K>[E]>,
    ): void => emitter.off(event, handler),
    destroy,
  };
};
