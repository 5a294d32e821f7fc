/**
 * packages/core/src/layout/engine/fixed.ts — Natural-size packing.
 *
 * Children are placed one after another along the main axis at their
 * natural size. Every placement eats into the remaining bounds, so a child
 * never extends past what its predecessors left over.
 *
 * Nested groups advance the origin only when their result starts flush at
 * the current origin. A nested layout that anchored its content to the
 * trailing edge still consumes its main-axis size, but the origin stays
 * put; when that leaves this group's own origin untouched, `total` is moved
 * forward so it covers the trailing region that was actually used.
 */

import { type AxisAccessors, toAxisRect } from "../axis.js";
import { resolveMargin } from "../margins.js";
import type { Geometry, GeometryResult, GroupNode, GroupSize, LayoutEnv } from "../types.js";
import { clampNonNegative, roundHalfUp } from "./bounds.js";
import {
  ZERO_GEOMETRY,
  applyGroupSize,
  identityOf,
  nestedSize,
  readExtents,
} from "./children.js";

export function layoutFixed<C>(
  axes: AxisAccessors,
  bounds: Geometry,
  group: GroupNode<C>,
  size: GroupSize,
  env: LayoutEnv<C>,
): GeometryResult {
  const area = toAxisRect(axes, bounds);
  const fixedCross = applyGroupSize(axes, area, size);

  const originMain = area.main;
  const originMainSize = area.mainSize;
  const geometries: Geometry[] = [];
  let maxCross = 0;

  for (const child of group.children) {
    if (child.kind === "leaf" && !child.widget.visible) {
      geometries.push(ZERO_GEOMETRY);
      continue;
    }

    const m = resolveMargin(env.margins, identityOf(child));
    const trailing = axes.trailingMargin(m);
    const crossLeading = axes.crossLeadingMargin(m);
    const crossMargins = crossLeading + axes.crossTrailingMargin(m);

    area.mainSize = clampNonNegative(area.mainSize - axes.leadingMargin(m) - trailing);
    area.main += axes.leadingMargin(m);

    if (child.kind === "group") {
      const childBounds = axes.compose(
        area.main,
        area.cross + crossLeading,
        area.mainSize,
        clampNonNegative(area.crossSize - crossMargins),
      );
      const res = env.layoutGroup(
        child,
        axes.orientation,
        childBounds,
        nestedSize(axes, child, undefined, fixedCross),
      );

      const used = axes.getMainSize(res.total);
      area.mainSize = clampNonNegative(area.mainSize - used);
      if (axes.getMain(res.total) === area.main) {
        area.main += used + trailing;
      }
      for (const g of res.geometries) geometries.push(g);
      maxCross = Math.max(maxCross, axes.getCrossSize(res.total) + crossMargins);
      continue;
    }

    const natural = readExtents(child.widget, env.context);
    const availableCross = clampNonNegative((fixedCross ?? area.crossSize) - crossMargins);
    let main = axes.getMainSize(natural);
    let cross = axes.getCrossSize(natural);

    // Degenerate extents keep their natural size; there is no ratio to keep.
    if (child.widget.resize === true && main > 0 && cross > 0) {
      main = roundHalfUp(availableCross * (main / cross));
      cross = availableCross;
    }

    main = Math.min(main, area.mainSize);
    cross = fixedCross !== undefined ? availableCross : Math.min(cross, availableCross);

    geometries.push(axes.compose(area.main, area.cross + crossLeading, main, cross));
    area.mainSize -= main;
    area.main += main + trailing;
    maxCross = Math.max(maxCross, cross + crossMargins);
  }

  const consumed = originMainSize - area.mainSize;
  let totalMain = originMain;
  if (consumed > 0 && totalMain === area.main) {
    totalMain += area.mainSize;
  }

  return {
    geometries,
    total: axes.compose(
      totalMain,
      area.cross,
      consumed,
      fixedCross ?? Math.min(maxCross, area.crossSize),
    ),
  };
}
