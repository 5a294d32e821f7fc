import type { AxisAccessors, AxisRect } from "../axis.js";
import type { Geometry, GroupNode, GroupSize, LayoutNode, Size, Widget } from "../types.js";
import { readGroupAttrs } from "../validateProps.js";
import { toPixel } from "./bounds.js";

/** Placeholder emitted for invisible leaves. */
export const ZERO_GEOMETRY: Geometry = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });

/** Margin lookup key: the widget for leaves, the node itself for groups. */
export function identityOf<C>(node: LayoutNode<C>): object {
  return node.kind === "leaf" ? node.widget : node;
}

/** Groups always take part in layout; leaves only while visible. */
export function takesSpace<C>(node: LayoutNode<C>): boolean {
  return node.kind === "group" || node.widget.visible;
}

export function readExtents<C>(widget: Widget<C>, context: C): Size {
  const raw = widget.extents(context);
  return { width: toPixel(raw.width), height: toPixel(raw.height) };
}

/**
 * Effective size handed to a nested group. `main` replaces the child's own
 * main-axis size when given; the cross size falls back to the enclosing
 * group's when the child sets none.
 */
export function nestedSize<C>(
  axes: AxisAccessors,
  child: GroupNode<C>,
  main: number | undefined,
  inheritedCross: number | undefined,
): GroupSize {
  const own = readGroupAttrs(child).size;
  return axes.composeSize(main ?? axes.mainOf(own), axes.crossOf(own) ?? inheritedCross);
}

/**
 * Shrink the working area to the group's effective size where that size is
 * smaller. Returns the fixed cross size, if any, clamped to the area.
 */
export function applyGroupSize(
  axes: AxisAccessors,
  area: AxisRect,
  size: GroupSize,
): number | undefined {
  const main = axes.mainOf(size);
  if (main !== undefined && main < area.mainSize) area.mainSize = main;
  const cross = axes.crossOf(size);
  if (cross === undefined) return undefined;
  if (cross < area.crossSize) area.crossSize = cross;
  return area.crossSize;
}
