/**
 * infiniview/builder - Types
 * Plugin interface, builder config, builder context, and return types
 */

import type {
  EventHandler,
  KeyLike,
  KeyOracle,
  Orientation,
  RefreshHandler,
  ScrollerEvents,
  Unsubscribe,
  ViewportState,
  VisibleEntry,
} from "../types";
import type { Scroller } from "../core/scroller";
import type { DOMStructure } from "./dom";

// =============================================================================
// Builder Configuration
// =============================================================================

/** Item template: returns an HTML string or an element */
export type ItemTemplate<K extends KeyLike> = (key: K) => string | HTMLElement;

/** Item configuration */
export interface ItemConfig<K extends KeyLike> {
  /** Size along the scroll axis in pixels: fixed, or per key */
  size: number | ((key: K) => number);

  /** Renders the content of one item */
  template: ItemTemplate<K>;
}

/** Configuration accepted by infiniteScroll() */
export interface InfiniteScrollConfig<K extends KeyLike> extends KeyOracle<K> {
  /** Container element or selector */
  container: HTMLElement | string;

  /** First key to display */
  initialKey: K;

  /** Item configuration (size and template) */
  item: ItemConfig<K>;

  /** Scroll direction (default: 'vertical') */
  direction?: Orientation;

  /** Gap between items in pixels (default: 0) */
  spacing?: number;

  /** Scrollable region size as a multiple of the viewport (default: 6) */
  multiplier?: number;

  /** Recenter distance as a fraction of the region (default: 0.25) */
  recenterThreshold?: number;

  /** Custom CSS class prefix (default: 'infiniview') */
  classPrefix?: string;

  /** Accessible label for the list */
  ariaLabel?: string;

  /** Refresh handler, invoked by refresh() and by withPullToRefresh */
  onRefresh?: RefreshHandler;
}

// =============================================================================
// Resolved internal config (after defaults are applied)
// =============================================================================

/** Resolved configuration stored inside BuilderContext */
export interface ResolvedBuilderConfig {
  readonly classPrefix: string;
  readonly horizontal: boolean;
}

// =============================================================================
// BuilderContext - the interface plugins receive during setup
// =============================================================================

/** Any method a plugin exposes on the built API */
export type PluginMethod = (...args: never[]) => unknown;

/**
 * BuilderContext - the internal interface that plugins receive during setup.
 *
 * Provides access to the DOM structure and the engine plus registration
 * points for handlers, methods, and cleanup callbacks.
 */
export interface BuilderContext<K extends KeyLike> {
  // ── Core components ───────────────────────────────────────────
  readonly dom: DOMStructure;
  readonly scroller: Scroller<K, HTMLElement>;
  readonly config: ResolvedBuilderConfig;

  /** The raw user-provided builder config */
  readonly rawConfig: InfiniteScrollConfig<K>;

  // ── Event handler slots ───────────────────────────────────────
  /** Attached to the root element during .build() */
  keydownHandlers: Array<(event: KeyboardEvent) => void>;
  pointerdownHandlers: Array<(event: PointerEvent) => void>;
  destroyHandlers: Array<() => void>;

  // ── Public method registration ────────────────────────────────
  /** Plugins register public methods by name. Exposed on the returned API. */
  methods: Map<string, PluginMethod>;

  // ── Helpers ───────────────────────────────────────────────────
  /** Current scroll offset along the main axis */
  getOffset(): number;

  /** Scroll by delta pixels along the main axis and lay out */
  scrollBy(delta: number): void;
}

// =============================================================================
// ScrollPlugin - the plugin interface
// =============================================================================

/**
 * ScrollPlugin - the interface for builder plugins.
 *
 * Each plugin:
 * - Has a unique name (used for deduplication and error messages)
 * - Optionally declares a priority (lower runs first, default: 50)
 * - Implements setup() which receives BuilderContext and wires in handlers/methods
 * - Optionally implements destroy() for cleanup
 * - Optionally declares methods it adds and plugins it conflicts with
 */
export interface ScrollPlugin<K extends KeyLike> {
  readonly name: string;
  readonly priority?: number;
  setup(ctx: BuilderContext<K>): void;
  destroy?(): void;
  readonly methods?: readonly string[];
  readonly conflicts?: readonly string[];
}

// =============================================================================
// Builder & built API
// =============================================================================

/** Chainable builder interface */
export interface InfiniteScrollBuilder<K extends KeyLike> {
  /** Register a feature plugin. Chainable. */
  use(plugin: ScrollPlugin<K>): InfiniteScrollBuilder<K>;

  /** Mount the scroller. Creates DOM, initializes plugins, returns API. */
  build(): BuiltInfiniteScroll<K>;
}

/** API returned by .build() */
export interface BuiltInfiniteScroll<K extends KeyLike> {
  /** The root DOM element */
  readonly element: HTMLElement;

  getWindow(): ReadonlyArray<VisibleEntry<K, HTMLElement>>;
  getFrontKey(): K;
  getState(): ViewportState;

  /** Show key at the leading edge of the viewport */
  jumpTo(key: K): void;

  /** Rebuild the window around the front key */
  relayout(): void;

  /** Run the refresh handler. Returns false if none ran. */
  refresh(): boolean;

  /** Scroll by delta pixels along the main axis */
  scrollBy(delta: number): void;

  on<E extends keyof ScrollerEvents<K>>(
    event: E,
    handler: EventHandler<ScrollerEvents<K>[E]>,
  ): Unsubscribe;
  off<E extends keyof ScrollerEvents<K>>(
    event: E,
    handler: EventHandler<ScrollerEvents<K>[E]>,
  ): void;

  destroy(): void;

  // ── Plugin methods (dynamically added) ────────────────────────
  // Refresh (added by withPullToRefresh)
  isRefreshing?: () => boolean;

  // Allow arbitrary plugin methods
  [key: string]: unknown;
}
