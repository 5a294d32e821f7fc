/**
 * packages/core/src/layout/engine/flex.ts — Even main-axis distribution.
 *
 * Every child that takes space (visible leaves and all nested groups) gets
 * the same real-valued share of the main axis, minus gaps, capped by
 * `maxSize`. Cells are cut from a floating cursor: each cell spans
 * round(cursor after) - round(cursor before), so the rounding error of the
 * whole row stays within one pixel instead of growing with the child count.
 *
 * Invariant (sum law): for n cells and gap g over span W,
 *   sum(cells) + (n - 1) * g === round(W)   (±1)
 */

import { type AxisAccessors, toAxisRect } from "../axis.js";
import { resolveMargin } from "../margins.js";
import type { Geometry, GeometryResult, GroupNode, GroupSize, LayoutEnv } from "../types.js";
import { readGroupAttrs } from "../validateProps.js";
import { clampNonNegative, roundHalfUp } from "./bounds.js";
import {
  ZERO_GEOMETRY,
  applyGroupSize,
  identityOf,
  nestedSize,
  readExtents,
  takesSpace,
} from "./children.js";

/** Per-cell share for `count` cells; never negative. */
export function flexShare(span: number, count: number, gap: number, maxSize: number): number {
  if (count <= 0) return 0;
  const share = clampNonNegative((span - gap * (count - 1)) / count);
  return share > maxSize ? maxSize : share;
}

export function layoutFlex<C>(
  axes: AxisAccessors,
  bounds: Geometry,
  group: GroupNode<C>,
  size: GroupSize,
  env: LayoutEnv<C>,
): GeometryResult {
  const area = toAxisRect(axes, bounds);
  const fixedCross = applyGroupSize(axes, area, size);
  const { gap, maxSize } = readGroupAttrs(group);

  let count = 0;
  for (const child of group.children) {
    if (takesSpace(child)) count++;
  }
  const share = flexShare(area.mainSize, count, gap, maxSize);

  const geometries: Geometry[] = [];
  let maxCross = 0;
  let cursor = area.main;
  let end = area.main;

  for (const child of group.children) {
    if (child.kind === "leaf" && !child.widget.visible) {
      geometries.push(ZERO_GEOMETRY);
      continue;
    }

    const start = roundHalfUp(cursor);
    cursor += share;
    end = cursor;
    const assigned = roundHalfUp(cursor) - start;
    cursor += gap;

    const m = resolveMargin(env.margins, identityOf(child));
    const leading = axes.leadingMargin(m);
    const crossLeading = axes.crossLeadingMargin(m);
    const crossMargins = crossLeading + axes.crossTrailingMargin(m);
    const innerMain = clampNonNegative(assigned - leading - axes.trailingMargin(m));

    if (child.kind === "group") {
      const childBounds = axes.compose(
        start + leading,
        area.cross + crossLeading,
        innerMain,
        clampNonNegative(area.crossSize - crossMargins),
      );
      const res = env.layoutGroup(
        child,
        axes.orientation,
        childBounds,
        nestedSize(axes, child, innerMain, fixedCross),
      );
      for (const g of res.geometries) geometries.push(g);
      maxCross = Math.max(maxCross, axes.getCrossSize(res.total) + crossMargins);
      continue;
    }

    const natural = readExtents(child.widget, env.context);
    const naturalMain = axes.getMainSize(natural);
    let cross = axes.getCrossSize(natural);
    if (child.widget.resize === true && naturalMain > 0 && cross > 0) {
      cross = roundHalfUp(innerMain * (cross / naturalMain));
    }
    cross = Math.min(cross, clampNonNegative((fixedCross ?? area.crossSize) - crossMargins));

    geometries.push(axes.compose(start + leading, area.cross + crossLeading, innerMain, cross));
    maxCross = Math.max(maxCross, cross + crossMargins);
  }

  const consumed = count > 0 ? roundHalfUp(end) - roundHalfUp(area.main) : 0;
  return {
    geometries,
    total: axes.compose(
      area.main,
      area.cross,
      Math.min(consumed, area.mainSize),
      fixedCross ?? Math.min(maxCross, area.crossSize),
    ),
  };
}
