/**
 * packages/core/src/layout/engine/layoutEngine.ts — Layout entry point.
 *
 * Why: Binds the per-level algorithms into one recursive walk. Each group
 * picks its own algorithm (default fixed) and may switch orientation; the
 * enclosing algorithm passes the child's effective size by value, so input
 * nodes are never written to and repeated calls with stable extents return
 * identical results.
 *
 * Invariants:
 *   - result.geometries.length === countLeaves(root)
 *   - total fits inside bounds (flex rounding may add at most 1px)
 *   - errors thrown by widget.extents propagate unmodified
 *
 * Coordinates are integers. Non-integer bounds are rounded half-up on the
 * way in; non-finite or negative sizes become 0.
 */

import { emitLayoutAudit, isLayoutAuditActive } from "../../perf/layoutAudit.js";
import { type InstrumentationPhase, perfMarkEnd, perfMarkStart } from "../../perf/perf.js";
import { axesFor } from "../axis.js";
import { NO_MARGINS } from "../margins.js";
import type {
  Geometry,
  GeometryResult,
  GroupNode,
  GroupSize,
  LayoutAlgorithm,
  LayoutEnv,
  LayoutGroupFn,
  LayoutNode,
  LayoutSelector,
  MarginResolver,
  Orientation,
} from "../types.js";
import { type LayoutResult, ok, readGroupAttrs, validateLayoutTree } from "../validateProps.js";
import { roundHalfUp, toPixel } from "./bounds.js";
import { layoutFixed } from "./fixed.js";
import { layoutFlex } from "./flex.js";

export function resolveAlgorithm<C>(selector: LayoutSelector<C> | undefined): LayoutAlgorithm<C> {
  if (typeof selector === "function") return selector;
  return selector === "flex" ? layoutFlex : layoutFixed;
}

function phaseOf<C>(selector: LayoutSelector<C>): InstrumentationPhase | null {
  if (selector === "fixed") return "layout_fixed";
  if (selector === "flex") return "layout_flex";
  return null;
}

function sanitizeBounds(bounds: Geometry): Geometry {
  return {
    x: Number.isFinite(bounds.x) ? roundHalfUp(bounds.x) : 0,
    y: Number.isFinite(bounds.y) ? roundHalfUp(bounds.y) : 0,
    width: toPixel(bounds.width),
    height: toPixel(bounds.height),
  };
}

/** Number of leaves in the flattened tree, visible or not. */
export function countLeaves<C>(node: LayoutNode<C>): number {
  if (node.kind === "leaf") return 1;
  let n = 0;
  for (const child of node.children) n += countLeaves(child);
  return n;
}

function createEnv<C>(context: C, margins: MarginResolver): LayoutEnv<C> {
  const layoutGroup: LayoutGroupFn<C> = (group, inherited, bounds, size) => {
    const attrs = readGroupAttrs(group);
    const axes = axesFor(attrs.orientation ?? inherited);
    const algorithm = resolveAlgorithm(attrs.layout);
    const phase = phaseOf(attrs.layout);
    if (phase === null) return algorithm(axes, bounds, group, size, env);
    const token = perfMarkStart(phase);
    const res = algorithm(axes, bounds, group, size, env);
    perfMarkEnd(phase, token);
    return res;
  };
  const env: LayoutEnv<C> = Object.freeze({ context, margins, layoutGroup });
  return env;
}

/**
 * Compute leaf placements for `root` inside `bounds`.
 *
 * `context` is handed to every `widget.extents` call unchanged. `margins`
 * is consulted with the widget object for leaves and the node for groups.
 */
export function computeLayout<C>(
  orientation: Orientation,
  bounds: Geometry,
  root: GroupNode<C>,
  context: C,
  margins: MarginResolver = NO_MARGINS,
): GeometryResult {
  const token = perfMarkStart("layout");
  const env = createEnv(context, margins);
  const rootSize: GroupSize = readGroupAttrs(root).size;
  const res = env.layoutGroup(root, orientation, sanitizeBounds(bounds), rootSize);
  perfMarkEnd("layout", token);

  if (isLayoutAuditActive()) {
    emitLayoutAudit("layout", "done", {
      orientation,
      leaves: res.geometries.length,
      total: res.total,
    });
  }
  return res;
}

function isValidBounds(bounds: Geometry): boolean {
  return (
    Number.isFinite(bounds.x) &&
    Number.isFinite(bounds.y) &&
    Number.isFinite(bounds.width) &&
    Number.isFinite(bounds.height) &&
    bounds.width >= 0 &&
    bounds.height >= 0
  );
}

/**
 * Strict variant of computeLayout: rejects invalid bounds or group
 * attributes with a BARKIT_INVALID_PROPS fatal instead of degrading.
 * Errors thrown by widget.extents still propagate.
 */
export function computeLayoutChecked<C>(
  orientation: Orientation,
  bounds: Geometry,
  root: GroupNode<C>,
  context: C,
  margins: MarginResolver = NO_MARGINS,
): LayoutResult<GeometryResult> {
  if (!isValidBounds(bounds)) {
    return {
      ok: false,
      fatal: {
        code: "BARKIT_INVALID_PROPS",
        detail: `Invalid bounds: expected finite position and size >= 0, got ${JSON.stringify(bounds)}`,
      },
    };
  }
  const valid = validateLayoutTree(root);
  if (!valid.ok) return valid;
  return ok(computeLayout(orientation, bounds, root, context, margins));
}
