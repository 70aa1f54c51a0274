/**
 * infiniview/builder - Paged Scroll
 * pagedScroll(config)
 *
 * Mounts the paged navigator: a clipped root with a track holding at most
 * three page elements at -100% / 0 / +100%. Pages move by sliding the
 * track; the navigator learns about the end of a slide from transitionend.
 */

import type {
  AnimationDecider,
  EventHandler,
  KeyEquivalence,
  KeyLike,
  KeyOracle,
  Orientation,
  Page,
  PagerEvents,
  PageToken,
  Unsubscribe,
} from "../types";
import type { ItemTemplate } from "./types";
import {
  DEFAULT_CLASS_PREFIX,
  DEFAULT_PAGE_DURATION,
  DEFAULT_SWIPE_THRESHOLD,
} from "../constants";
import { createPager } from "../core/pager";
import { resolveContainer } from "./dom";

// Slack for browsers that drop transitionend (hidden tab, no-op transform)
const TRANSITION_END_GRACE = 50;

// =============================================================================
// Types
// =============================================================================

export interface PagedScrollConfig<K extends KeyLike> extends KeyOracle<K> {
  /** Container element or selector */
  container: HTMLElement | string;

  /** Page shown first */
  initialKey: K;

  /** Renders the content of one page */
  template: ItemTemplate<K>;

  /** Whether (and which way) goTo() animates */
  decideAnimation: AnimationDecider<K>;

  /** Key equivalence (default: Object.is) */
  areEquivalent?: KeyEquivalence<K>;

  /** Swipe axis (default: 'horizontal') */
  direction?: Orientation;

  /** Slide duration in ms; 0 switches pages synchronously (default: 300) */
  duration?: number;

  /** Fraction of the page size a swipe must travel (default: 0.2) */
  swipeThreshold?: number;

  /** Custom CSS class prefix (default: 'infiniview') */
  classPrefix?: string;

  /** Accessible label for the pager */
  ariaLabel?: string;
}

export interface PagedScroll<K extends KeyLike> {
  /** The root DOM element */
  readonly element: HTMLElement;

  getCurrentKey(): K;
  getWindow(): ReadonlyArray<Page<K>>;

  /** Programmatic key change */
  goTo(key: K): void;

  /** Slide to the next page. Returns false at the boundary or mid-slide. */
  next(): boolean;

  /** Slide to the previous page. Returns false at the boundary or mid-slide. */
  prev(): boolean;

  isAnimating(): boolean;

  on<E extends keyof PagerEvents<K>>(
    event: E,
    handler: EventHandler<PagerEvents<K>[E]>,
  ): Unsubscribe;
  off<E extends keyof PagerEvents<K>>(
    event: E,
    handler: EventHandler<PagerEvents<K>[E]>,
  ): void;

  destroy(): void;
}

interface Slide {
  readonly done: () => void;
  readonly timer: ReturnType<typeof setTimeout>;
}

// =============================================================================
// pagedScroll()
// =============================================================================

export const pagedScroll = <K extends KeyLike>(
  config: PagedScrollConfig<K>,
): PagedScroll<K> => {
  // ── Validate ────────────────────────────────────────────────────
  if (!config.container) {
    throw new Error("[infiniview/pager] container is required");
  }
  if (typeof config.template !== "function") {
    throw new Error("[infiniview/pager] template is required");
  }

  const {
    direction = "horizontal",
    duration = DEFAULT_PAGE_DURATION,
    swipeThreshold = DEFAULT_SWIPE_THRESHOLD,
    classPrefix = DEFAULT_CLASS_PREFIX,
    ariaLabel,
    template,
  } = config;

  if (!(duration >= 0)) {
    throw new Error("[infiniview/pager] duration cannot be negative");
  }
  if (!(swipeThreshold > 0 && swipeThreshold < 1)) {
    throw new Error("[infiniview/pager] swipeThreshold must be between 0 and 1");
  }

  const horizontal = direction === "horizontal";
  const axis = horizontal ? "X" : "Y";

  // ── Create DOM ──────────────────────────────────────────────────
  const container = resolveContainer(config.container);

  const root = document.createElement("div");
  root.className = `${classPrefix}-pager`;
  if (!horizontal) root.classList.add(`${classPrefix}-pager--vertical`);
  root.setAttribute("role", "region");
  root.setAttribute("aria-roledescription", "carousel");
  root.setAttribute("tabindex", "0");
  if (ariaLabel) root.setAttribute("aria-label", ariaLabel);
  root.style.position = "relative";
  root.style.overflow = "hidden";
  root.style.touchAction = horizontal ? "pan-y" : "pan-x";

  const track = document.createElement("div");
  track.className = `${classPrefix}-track`;
  track.style.position = "relative";
  track.style.width = "100%";
  track.style.height = "100%";

  root.appendChild(track);
  container.appendChild(root);

  const createPage = (key: K): HTMLElement => {
    const el = document.createElement("div");
    el.className = `${classPrefix}-page`;
    el.dataset.key = String(key);
    el.setAttribute("role", "group");
    el.setAttribute("aria-roledescription", "page");
    el.style.position = "absolute";
    el.style.top = "0";
    el.style.left = "0";
    el.style.width = "100%";
    el.style.height = "100%";

    const content = template(key);
    if (typeof content === "string") el.innerHTML = content;
    else el.replaceChildren(content);
    return el;
  };

  // ── Engine ──────────────────────────────────────────────────────
  const pager = createPager<K, HTMLElement>({
    initialKey: config.initialKey,
    next: config.next,
    prev: config.prev,
    createView: createPage,
    decideAnimation: config.decideAnimation,
    areEquivalent: config.areEquivalent,
  });

  let isDestroyed = false;

  // ── Rendering ───────────────────────────────────────────────────

  const mounted = new Map<PageToken, HTMLElement>();

  const positionOf = (token: PageToken): number => {
    const pages = pager.getWindow();
    const current = pager.getCurrentPage().token;
    return (
      pages.findIndex((p) => p.token === token) -
      pages.findIndex((p) => p.token === current)
    );
  };

  /** Mount the window's pages at -100% / 0 / +100% around the current one */
  const render = (): void => {
    const live = new Set<PageToken>();

    for (const page of pager.getWindow()) {
      live.add(page.token);
      let el = mounted.get(page.token);
      if (!el) {
        el = pager.viewFor(page.token);
        mounted.set(page.token, el);
        track.appendChild(el);
      }
      const position = positionOf(page.token);
      el.style.transform = `translate${axis}(${position * 100}%)`;
      el.setAttribute("aria-hidden", String(position !== 0));
    }

    for (const [token, el] of mounted) {
      if (live.has(token)) continue;
      el.remove();
      mounted.delete(token);
    }
  };

  render();

  // ── Sliding ─────────────────────────────────────────────────────

  let slide: Slide | null = null;

  const resetTrack = (): void => {
    track.style.transition = "";
    track.style.transform = "";
  };

  const stopSlide = (): void => {
    if (!slide) return;
    clearTimeout(slide.timer);
    slide = null;
    resetTrack();
  };

  const finishSlide = (): void => {
    if (!slide) return;
    const { done } = slide;
    stopSlide();
    done();
  };

  const onTransitionEnd = (event: Event): void => {
    if (event.target !== track) return;
    finishSlide();
  };
  track.addEventListener("transitionend", onTransitionEnd);

  /** Slide the track so the page at position (-1, 0, 1) is on screen */
  const slideTo = (position: number, done: () => void): void => {
    stopSlide();

    if (duration === 0) {
      done();
      return;
    }

    slide = {
      done,
      timer: setTimeout(finishSlide, duration + TRANSITION_END_GRACE),
    };
    track.style.transition = `transform ${duration}ms ease`;
    track.style.transform = `translate${axis}(${-position * 100}%)`;
  };

  const settle = (token: PageToken, completed: boolean) => (): void => {
    pager.completeTransition(token, completed);
    render();
  };

  // ── Navigation ──────────────────────────────────────────────────

  const goTo = (key: K): void => {
    if (isDestroyed) return;
    stopSlide();

    const transition = pager.setKey(key);
    render();
    if (!transition || !transition.animate) return;

    slideTo(positionOf(transition.token), settle(transition.token, true));
  };

  const step = (forward: boolean): boolean => {
    if (isDestroyed || slide || drag) return false;
    const current = pager.getCurrentPage().token;
    const target = forward ? pager.pageAfter(current) : pager.pageBefore(current);
    if (!target) return false;

    slideTo(forward ? 1 : -1, settle(target.token, true));
    return true;
  };

  // ── Swipe ───────────────────────────────────────────────────────

  let drag: { start: number; delta: number } | null = null;

  const coordinate = (event: MouseEvent): number =>
    horizontal ? event.clientX : event.clientY;

  const pageSize = (): number =>
    horizontal ? root.clientWidth : root.clientHeight;

  const onPointerMove = (event: PointerEvent): void => {
    if (!drag) return;
    const current = pager.getCurrentPage().token;
    let delta = coordinate(event) - drag.start;

    // Nothing to reveal past a boundary
    if (delta > 0 && !pager.pageBefore(current)) delta = 0;
    if (delta < 0 && !pager.pageAfter(current)) delta = 0;

    drag.delta = delta;
    track.style.transform = `translate${axis}(${delta}px)`;
  };

  const endDrag = (): number => {
    document.removeEventListener("pointermove", onPointerMove);
    document.removeEventListener("pointerup", onPointerUp);
    document.removeEventListener("pointercancel", onPointerCancel);
    const delta = drag?.delta ?? 0;
    drag = null;
    return delta;
  };

  const onPointerUp = (): void => {
    const delta = endDrag();
    const size = pageSize();
    const fraction = size > 0 ? delta / size : 0;
    const current = pager.getCurrentPage().token;
    const target = delta < 0 ? pager.pageAfter(current) : pager.pageBefore(current);

    if (target && Math.abs(fraction) >= swipeThreshold) {
      slideTo(delta < 0 ? 1 : -1, settle(target.token, true));
      return;
    }
    if (!target || delta === 0) {
      resetTrack();
      return;
    }
    slideTo(0, settle(target.token, false));
  };

  const onPointerCancel = (): void => {
    const delta = endDrag();
    const current = pager.getCurrentPage().token;
    const target = delta < 0 ? pager.pageAfter(current) : pager.pageBefore(current);
    if (target && delta !== 0) slideTo(0, settle(target.token, false));
    else resetTrack();
  };

  const onPointerDown = (event: PointerEvent): void => {
    if (isDestroyed || slide || drag) return;
    drag = { start: coordinate(event), delta: 0 };
    document.addEventListener("pointermove", onPointerMove);
    document.addEventListener("pointerup", onPointerUp);
    document.addEventListener("pointercancel", onPointerCancel);
  };
  root.addEventListener("pointerdown", onPointerDown);

  // ── Keyboard ────────────────────────────────────────────────────

  const onKeydown = (event: KeyboardEvent): void => {
    const forwardKey = horizontal ? "ArrowRight" : "ArrowDown";
    const backwardKey = horizontal ? "ArrowLeft" : "ArrowUp";
    if (event.key === forwardKey) {
      event.preventDefault();
      step(true);
    } else if (event.key === backwardKey) {
      event.preventDefault();
      step(false);
    }
  };
  root.addEventListener("keydown", onKeydown);

  // ── Destroy ─────────────────────────────────────────────────────

  const destroy = (): void => {
    if (isDestroyed) return;
    isDestroyed = true;

    stopSlide();
    endDrag();
    root.removeEventListener("pointerdown", onPointerDown);
    root.removeEventListener("keydown", onKeydown);
    track.removeEventListener("transitionend", onTransitionEnd);

    pager.destroy();
    mounted.clear();
    root.remove();
  };

  return {
    get element() {
      return root;
    },
    getCurrentKey: () => pager.getCurrentKey(),
    getWindow: () => pager.getWindow(),
    goTo,
    next: () => step(true),
    prev: () => step(false),
    isAnimating: () => slide !== null,
    on: pager.on,
    off: pager.off,
    destroy,
  };
};
