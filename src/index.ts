/**
 * infiniview - Infinite Scrolling Viewports
 * Endless scrolling and paging over keys produced on demand
 *
 * @packageDocumentation
 */

// Builders
export { infiniteScroll, pagedScroll } from "./builder";

// Feature plugins
export { withPullToRefresh } from "./features/refresh";
export { withKeyboard } from "./features/keyboard";

// Headless engines
export {
  createScroller,
  createPager,
  createRangeOracle,
  isBoundary,
  sameKey,
} from "./core";

// Builder types
export type {
  InfiniteScrollBuilder,
  BuiltInfiniteScroll,
  InfiniteScrollConfig,
  ItemConfig,
  ItemTemplate,
  ScrollPlugin,
  BuilderContext,
  PagedScrollConfig,
  PagedScroll,
} from "./builder";
export type { PullToRefreshConfig } from "./features/refresh";
export type { KeyboardPluginConfig } from "./features/keyboard";
export type {
  Scroller,
  ScrollerConfig,
  ScrollerHost,
  Pager,
  PagerConfig,
  RangeOracleOptions,
} from "./core";

// Core Types
export type {
  // Keys
  KeyLike,
  MaybeKey,
  KeyOracle,
  KeyEquivalence,

  // Geometry
  Orientation,
  Edge,
  Rect,

  // Paging
  Direction,
  AnimationDecision,
  AnimationDecider,
  PageToken,
  Page,
  PageTransition,

  // Scroller
  VisibleEntry,
  ScrollerPhase,
  ViewportState,
  RefreshHandler,

  // Events
  ScrollerEvents,
  PagerEvents,
  EventHandler,
  Unsubscribe,
} from "./types";
