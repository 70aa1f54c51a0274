/**
 * infiniview/refresh - Builder Plugin
 * Pull-to-refresh for the composable builder.
 *
 * Priority: 40 (wires its pointer handler before plugins that scroll)
 *
 * What it wires:
 * - Pointer handler on the viewport: a pull that starts at offset 0 with no
 *   content before the window and travels at least `threshold` px runs the
 *   refresh handler
 * - Status element before the viewport, shown while refreshing
 * - `--<prefix>-pull` custom property and `--pulling` / `--refreshing`
 *   modifier classes on the root, for styling the gesture
 *
 * Added methods: isRefreshing
 */

import type { KeyLike } from "../../types";
import type { ScrollPlugin, BuilderContext } from "../../builder/types";
import { DEFAULT_PULL_THRESHOLD } from "../../constants";

// =============================================================================
// Plugin Config
// =============================================================================

/** Pull-to-refresh plugin configuration */
export interface PullToRefreshConfig {
  /** Pull distance in px that triggers a refresh (default: 64) */
  threshold?: number;
}

// =============================================================================
// Plugin Factory
// =============================================================================

/**
 * Create a pull-to-refresh plugin for the builder.
 * Requires `onRefresh` in the builder config.
 *
 * @example
 * ```ts
 * const feed = infiniteScroll({
 *   container: '#feed',
 *   initialKey: 0,
 *   next, prev,
 *   item: { size: 80, template: renderPost },
 *   onRefresh: (done) => { fetchLatest().finally(done) },
 * })
 * .use(withPullToRefresh({ threshold: 80 }))
 * .build()
 * ```
 */
export const withPullToRefresh = <K extends KeyLike>(
  options: PullToRefreshConfig = {},
): ScrollPlugin<K> => {
  const { threshold = DEFAULT_PULL_THRESHOLD } = options;
  if (!(threshold > 0)) {
    throw new Error("[infiniview/refresh] threshold must be a positive number");
  }

  let cleanup: (() => void) | null = null;

  return {
    name: "withPullToRefresh",
    priority: 40,
    methods: ["isRefreshing"],

    setup(ctx: BuilderContext<K>): void {
      const { dom, scroller, config } = ctx;
      const { classPrefix, horizontal } = config;

      if (!ctx.rawConfig.onRefresh) {
        throw new Error(
          "[infiniview/refresh] withPullToRefresh requires onRefresh in the config",
        );
      }

      // ── Indicator ──────────────────────────────────────────────
      const indicator = document.createElement("div");
      indicator.className = `${classPrefix}-refresh`;
      indicator.setAttribute("role", "status");
      indicator.hidden = true;
      dom.root.insertBefore(indicator, dom.viewport);

      const setRefreshing = (refreshing: boolean): void => {
        indicator.hidden = !refreshing;
        dom.root.classList.toggle(`${classPrefix}--refreshing`, refreshing);
        dom.root.setAttribute("aria-busy", String(refreshing));
      };

      const offStart = scroller.on("refresh:start", () => setRefreshing(true));
      const offEnd = scroller.on("refresh:end", () => setRefreshing(false));

      // ── Gesture ────────────────────────────────────────────────
      let start: number | null = null;
      let distance = 0;

      const coordinate = (event: MouseEvent): number =>
        horizontal ? event.clientX : event.clientY;

      const setPull = (px: number): void => {
        distance = px;
        dom.root.style.setProperty(`--${classPrefix}-pull`, `${px}px`);
        dom.root.classList.toggle(`${classPrefix}--pulling`, px > 0);
      };

      const onPointerMove = (event: PointerEvent): void => {
        if (start === null) return;
        setPull(Math.max(0, coordinate(event) - start));
      };

      const detach = (): void => {
        document.removeEventListener("pointermove", onPointerMove);
        document.removeEventListener("pointerup", onPointerUp);
        document.removeEventListener("pointercancel", onPointerCancel);
      };

      const release = (): number => {
        const pulled = distance;
        start = null;
        detach();
        setPull(0);
        return pulled;
      };

      function onPointerUp(): void {
        if (start === null) return;
        if (release() >= threshold) scroller.refresh();
      }

      function onPointerCancel(): void {
        if (start !== null) release();
      }

      ctx.pointerdownHandlers.push((event: PointerEvent): void => {
        if (start !== null || scroller.isRefreshing()) return;
        // Only from the start of the content, not a momentary offset of 0
        if (!scroller.isAtBoundary("leading") || ctx.getOffset() > 0) return;

        start = coordinate(event);
        distance = 0;
        document.addEventListener("pointermove", onPointerMove);
        document.addEventListener("pointerup", onPointerUp);
        document.addEventListener("pointercancel", onPointerCancel);
      });

      // ── Methods ────────────────────────────────────────────────
      ctx.methods.set("isRefreshing", (): boolean => scroller.isRefreshing());

      cleanup = () => {
        detach();
        offStart();
        offEnd();
        indicator.remove();
      };
      ctx.destroyHandlers.push(() => {
        cleanup?.();
        cleanup = null;
      });
    },

    destroy(): void {
      cleanup?.();
      cleanup = null;
    },
  };
};
