/**
 * infiniview/core - Axis Helpers
 * Main-axis accessors for frames, so the scroller is written once for both
 * orientations.
 */

import type { Orientation, Rect } from "../types";

export interface Axis {
  readonly horizontal: boolean;

  /** Leading coordinate of a frame along the main axis */
  start(frame: Readonly<Rect>): number;

  /** Size of a frame along the main axis */
  size(frame: Readonly<Rect>): number;

  /** Trailing coordinate of a frame along the main axis */
  end(frame: Readonly<Rect>): number;

  /** Copy of frame with its leading coordinate set to start */
  moveTo(frame: Readonly<Rect>, start: number): Rect;
}

const horizontalAxis: Axis = {
  horizontal: true,
  start: (f) => f.x,
  size: (f) => f.width,
  end: (f) => f.x + f.width,
  moveTo: (f, start) => ({ x: start, y: f.y, width: f.width, height: f.height }),
};

const verticalAxis: Axis = {
  horizontal: false,
  start: (f) => f.y,
  size: (f) => f.height,
  end: (f) => f.y + f.height,
  moveTo: (f, start) => ({ x: f.x, y: start, width: f.width, height: f.height }),
};

export const getAxis = (orientation: Orientation): Axis =>
  orientation === "horizontal" ? horizontalAxis : verticalAxis;
