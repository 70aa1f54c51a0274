/**
 * infiniview/keyboard - Builder Plugin
 * Keyboard scrolling for the composable builder.
 *
 * Priority: 50
 *
 * Keys (on the focused root):
 * - ArrowDown / ArrowUp (ArrowRight / ArrowLeft when horizontal): one step
 * - PageDown / PageUp: one viewport
 * - Home: back to the initial key
 */

import type { KeyLike } from "../../types";
import type { ScrollPlugin, BuilderContext } from "../../builder/types";
import { DEFAULT_KEYBOARD_STEP } from "../../constants";

/** Keyboard plugin configuration */
export interface KeyboardPluginConfig {
  /** Arrow key scroll distance in px (default: 40) */
  step?: number;
}

export const withKeyboard = <K extends KeyLike>(
  options: KeyboardPluginConfig = {},
): ScrollPlugin<K> => {
  const { step = DEFAULT_KEYBOARD_STEP } = options;
  if (!(step > 0)) {
    throw new Error("[infiniview/keyboard] step must be a positive number");
  }

  return {
    name: "withKeyboard",

    setup(ctx: BuilderContext<K>): void {
      const { scroller, config, rawConfig } = ctx;
      const forwardKey = config.horizontal ? "ArrowRight" : "ArrowDown";
      const backwardKey = config.horizontal ? "ArrowLeft" : "ArrowUp";

      ctx.keydownHandlers.push((event: KeyboardEvent): void => {
        const page = scroller.getState().viewportSize;

        switch (event.key) {
          case forwardKey:
            ctx.scrollBy(step);
            break;
          case backwardKey:
            ctx.scrollBy(-step);
            break;
          case "PageDown":
            ctx.scrollBy(page);
            break;
          case "PageUp":
            ctx.scrollBy(-page);
            break;
          case "Home":
            scroller.jumpTo(rawConfig.initialKey);
            break;
          default:
            return;
        }
        event.preventDefault();
      });
    },
  };
};
