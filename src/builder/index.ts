/**
 * infiniview/builder - Composable Infinite Scroller Builder
 * Pick only the features you need.
 *
 * @example
 * ```ts
 * import { infiniteScroll } from 'infiniview/builder'
 * import { withPullToRefresh } from 'infiniview/refresh'
 *
 * const feed = infiniteScroll({
 *   container: '#app',
 *   initialKey: 0,
 *   next: (n) => n + 1,
 *   prev: (n) => (n > 0 ? n - 1 : null),
 *   item: { size: 48, template: (n) => `<p>Row ${n}</p>` },
 *   onRefresh: (done) => reload().then(done),
 * })
 * .use(withPullToRefresh())
 * .build()
 * ```
 *
 * @packageDocumentation
 */

// Builder factories
export { infiniteScroll } from "./core";
export { pagedScroll } from "./pager";

// Types
export type {
  // Builder API
  InfiniteScrollBuilder,
  BuiltInfiniteScroll,
  InfiniteScrollConfig,
  ItemConfig,
  ItemTemplate,

  // Plugin system
  ScrollPlugin,
  BuilderContext,
  PluginMethod,

  // Internal (for plugin authors)
  ResolvedBuilderConfig,
} from "./types";
export type { PagedScrollConfig, PagedScroll } from "./pager";
export type { DOMStructure } from "./dom";
export type { ElementPool } from "./pool";
