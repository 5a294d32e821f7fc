/**
 * packages/core/src/layout/axis.ts — Orientation adapter.
 *
 * Why: The fixed and flex algorithms are written once against a "main" and
 * a "cross" axis. These accessors map that vocabulary onto physical fields
 * (x/width/left/right for horizontal, y/height/top/bottom for vertical).
 * Both accessor sets are built once at module load and frozen.
 */

import type { Geometry, GroupSize, Margin, Orientation, Size } from "./types.js";

export type AxisAccessors = Readonly<{
  orientation: Orientation;
  getMain(g: Geometry): number;
  getCross(g: Geometry): number;
  getMainSize(s: Size): number;
  getCrossSize(s: Size): number;
  compose(main: number, cross: number, mainSize: number, crossSize: number): Geometry;
  leadingMargin(m: Margin): number;
  trailingMargin(m: Margin): number;
  crossLeadingMargin(m: Margin): number;
  crossTrailingMargin(m: Margin): number;
  mainOf(size: GroupSize): number | undefined;
  crossOf(size: GroupSize): number | undefined;
  composeSize(main: number | undefined, cross: number | undefined): GroupSize;
}>;

/** Mutable working rectangle in axis terms. */
export type AxisRect = {
  main: number;
  cross: number;
  mainSize: number;
  crossSize: number;
};

function sizeOf(width: number | undefined, height: number | undefined): GroupSize {
  if (width === undefined) return height === undefined ? {} : { height };
  return height === undefined ? { width } : { width, height };
}

const HORIZONTAL: AxisAccessors = Object.freeze<AxisAccessors>({
  orientation: "horizontal",
  getMain: (g: Geometry) => g.x,
  getCross: (g: Geometry) => g.y,
  getMainSize: (s: Size) => s.width,
  getCrossSize: (s: Size) => s.height,
  compose: (main: number, cross: number, mainSize: number, crossSize: number): Geometry => ({
    x: main,
    y: cross,
    width: mainSize,
    height: crossSize,
  }),
  leadingMargin: (m: Margin) => m.left,
  trailingMargin: (m: Margin) => m.right,
  crossLeadingMargin: (m: Margin) => m.top,
  crossTrailingMargin: (m: Margin) => m.bottom,
  mainOf: (size: GroupSize) => size.width,
  crossOf: (size: GroupSize) => size.height,
  composeSize: (main: number | undefined, cross: number | undefined) => sizeOf(main, cross),
});

const VERTICAL: AxisAccessors = Object.freeze<AxisAccessors>({
  orientation: "vertical",
  getMain: (g: Geometry) => g.y,
  getCross: (g: Geometry) => g.x,
  getMainSize: (s: Size) => s.height,
  getCrossSize: (s: Size) => s.width,
  compose: (main: number, cross: number, mainSize: number, crossSize: number): Geometry => ({
    x: cross,
    y: main,
    width: crossSize,
    height: mainSize,
  }),
  leadingMargin: (m: Margin) => m.top,
  trailingMargin: (m: Margin) => m.bottom,
  crossLeadingMargin: (m: Margin) => m.left,
  crossTrailingMargin: (m: Margin) => m.right,
  mainOf: (size: GroupSize) => size.height,
  crossOf: (size: GroupSize) => size.width,
  composeSize: (main: number | undefined, cross: number | undefined) => sizeOf(cross, main),
});

export function axesFor(orientation: Orientation): AxisAccessors {
  return orientation === "vertical" ? VERTICAL : HORIZONTAL;
}

export function toAxisRect(axes: AxisAccessors, g: Geometry): AxisRect {
  return {
    main: axes.getMain(g),
    cross: axes.getCross(g),
    mainSize: axes.getMainSize(g),
    crossSize: axes.getCrossSize(g),
  };
}
