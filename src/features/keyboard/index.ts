/**
 * infiniview/keyboard - Keyboard Scrolling Feature
 *
 * Entry point for the keyboard feature.
 */

export { withKeyboard } from "./plugin";
export type { KeyboardPluginConfig } from "./plugin";
