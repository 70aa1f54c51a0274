/**
 * infiniview - Constants
 * All default values and magic numbers in one place
 */

// =============================================================================
// Continuous Scroller
// =============================================================================

/** Default content region size, as a multiple of the viewport size */
export const DEFAULT_MULTIPLIER = 6;

/**
 * Default recenter threshold, as a fraction of the content region.
 * The offset is recentered once it is further than this from the center.
 */
export const DEFAULT_RECENTER_THRESHOLD = 0.25;

/** Default gap between two entries in pixels */
export const DEFAULT_SPACING = 0;

/**
 * Extra scroll range kept when all content fits in the viewport,
 * so the container stays scrollable (and pullable) by a minimal amount.
 */
export const MIN_SCROLL_SLACK = 1;

// =============================================================================
// Paged Navigator
// =============================================================================

/** Default page transition duration in milliseconds */
export const DEFAULT_PAGE_DURATION = 300;

/** Fraction of the page size a swipe has to travel to change page */
export const DEFAULT_SWIPE_THRESHOLD = 0.2;

/** Prefix for page tokens */
export const PAGE_TOKEN_PREFIX = "page";

// =============================================================================
// DOM
// =============================================================================

/** Default CSS class prefix */
export const DEFAULT_CLASS_PREFIX = "infiniview";

/** Maximum number of pooled wrapper elements */
export const DEFAULT_POOL_SIZE = 100;

/** Default pull distance (px) that triggers a refresh */
export const DEFAULT_PULL_THRESHOLD = 64;

/** Default keyboard scroll step in pixels */
export const DEFAULT_KEYBOARD_STEP = 40;
