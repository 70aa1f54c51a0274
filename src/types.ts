/**
 * infiniview - Core Types
 * Shared contracts for the continuous scroller and the paged navigator
 */

// =============================================================================
// Event Map Base Type
// =============================================================================

/** Base event map with index signature */
export type EventMap = Record<string, unknown>;

/** Event handler type */
export type EventHandler<T> = (payload: T) => void;

/** Unsubscribe function */
export type Unsubscribe = () => void;

// =============================================================================
// Keys & Oracle
// =============================================================================

/**
 * Anything non-nullish can be a key.
 * `null` and `undefined` are reserved: an oracle returns them to signal
 * that there is no more content in that direction.
 */
export type KeyLike = NonNullable<unknown>;

/** A key, or the boundary signal */
export type MaybeKey<K extends KeyLike> = K | null | undefined;

/**
 * Key Navigation Oracle.
 *
 * Both functions must be pure: the engines may call them several times for
 * the same key and expect the same answer.
 *
 * @example
 * ```ts
 * const months: KeyOracle<Date> = {
 *   next: (d) => new Date(d.getFullYear(), d.getMonth() + 1, 1),
 *   prev: (d) => new Date(d.getFullYear(), d.getMonth() - 1, 1),
 * };
 * ```
 */
export interface KeyOracle<K extends KeyLike> {
  /** Key after `key`, or null/undefined at the trailing boundary */
  next: (key: K) => MaybeKey<K>;

  /** Key before `key`, or null/undefined at the leading boundary */
  prev: (key: K) => MaybeKey<K>;
}

/** Application-defined key equivalence (e.g. two dates in the same month) */
export type KeyEquivalence<K extends KeyLike> = (a: K, b: K) => boolean;

// =============================================================================
// Geometry
// =============================================================================

/** Layout axis */
export type Orientation = "vertical" | "horizontal";

/** One of the two ends of the window along the scroll axis */
export type Edge = "leading" | "trailing";

/** Frame of a view, in content-region coordinates */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// =============================================================================
// Paging
// =============================================================================

/** Navigation direction of a page transition */
export type Direction = "forward" | "backward";

/** Result of the application's animate-decision function */
export interface AnimationDecision {
  animate: boolean;
  direction: Direction;
}

/** Decides whether (and which way) to animate a change from oldKey to newKey */
export type AnimationDecider<K extends KeyLike> = (
  oldKey: K,
  newKey: K,
) => AnimationDecision;

/** Stable identifier of a materialized page slot */
export type PageToken = string;

/** A page of the paged navigator window */
export interface Page<K extends KeyLike> {
  readonly token: PageToken;
  readonly key: K;
}

/** A transition the host has to perform */
export interface PageTransition<K extends KeyLike> {
  /** Token of the page being transitioned to */
  readonly token: PageToken;
  readonly key: K;
  readonly direction: Direction;
  readonly animate: boolean;
}

// =============================================================================
// Refresh
// =============================================================================

/**
 * Pull-to-refresh handler.
 * Call `complete` exactly once when the refresh is done; later calls are ignored.
 */
export type RefreshHandler = (complete: () => void) => void;

// =============================================================================
// Continuous Scroller
// =============================================================================

/** A materialized entry of the continuous scroller window */
export interface VisibleEntry<K extends KeyLike, V> {
  readonly key: K;
  readonly view: V;
  /** Frame in content-region coordinates */
  readonly frame: Readonly<Rect>;
}

/** Scroller phase */
export type ScrollerPhase = "empty" | "growing" | "steady" | "recentering";

/** Viewport state */
export interface ViewportState {
  /** Current scroll offset along the main axis */
  offset: number;

  /** Viewport size along the main axis */
  viewportSize: number;

  /** Size of the scrollable content region along the main axis */
  contentSize: number;

  /** How much larger the content region is than the viewport */
  multiplier: number;

  /** True while the content region is shrunk to fit all content */
  collapsed: boolean;
}

/** Event types of the continuous scroller and their payloads */
export interface ScrollerEvents<K extends KeyLike> extends EventMap {
  /** Entries were added to or removed from the window */
  "window:change": { keys: K[] };

  /** Offset and entries were shifted back towards the center */
  recenter: { delta: number };

  /** Entries were moved flush against a boundary */
  "edge:align": { edge: Edge; delta: number };

  /** Content region was shrunk to fit all content */
  collapse: { contentSize: number };

  /** Content region was restored to a multiple of the viewport */
  expand: { contentSize: number };

  /** Refresh handler was invoked */
  "refresh:start": Record<string, never>;

  /** Refresh completion callback was invoked */
  "refresh:end": Record<string, never>;
}

// =============================================================================
// Paged Navigator
// =============================================================================

/** Event types of the paged navigator and their payloads */
export interface PagerEvents<K extends KeyLike> extends EventMap {
  /** Current key changed */
  "key:change": { key: K; previous: K };

  /** Pages were added to or removed from the window */
  "window:change": { keys: K[] };

  /** A transition was requested */
  "transition:start": { key: K; direction: Direction; animate: boolean };

  /** A transition completed or was cancelled */
  "transition:end": { key: K; completed: boolean };
}
