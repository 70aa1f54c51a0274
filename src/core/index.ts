/**
 * infiniview/core - Headless Engines
 * DOM-free continuous scroller and paged navigator, for custom hosts.
 */

export { createScroller, resolveScrollerConfig } from "./scroller";
export type {
  Scroller,
  ScrollerConfig,
  ScrollerHost,
  ResolvedScrollerConfig,
} from "./scroller";

export { createPager } from "./pager";
export type { Pager, PagerConfig } from "./pager";

export { isBoundary, sameKey, resolveAnimation, createRangeOracle } from "./oracle";
export type { RangeOracleOptions } from "./oracle";

export { createRefreshController } from "./refresh";
export type { RefreshController, RefreshControllerConfig } from "./refresh";

export { createReentrancyGuard } from "./guard";
export type { ReentrancyGuard } from "./guard";

export { createTokenRegistry } from "./tokens";
export type { TokenRegistry } from "./tokens";

export { getAxis } from "./axis";
export type { Axis } from "./axis";
