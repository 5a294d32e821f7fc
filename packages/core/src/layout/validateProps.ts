/**
 * packages/core/src/layout/validateProps.ts — Group attribute validation.
 *
 * Why: Two readers of the same attributes. The engine itself degrades
 * silently (`readGroupAttrs`): out-of-range values fall back to neutral
 * defaults so a redraw never fails on configuration. Callers that want to
 * reject bad configuration up front use `validateLayoutTree`, which returns
 * a structured fatal for the first offending attribute instead.
 *
 * Rules:
 *   - width/height: finite number >= 0, or unset
 *   - gap: finite number >= 0 (default 0)
 *   - maxSize: number > 0, Infinity allowed (default unbounded)
 *   - layout: "fixed" | "flex" | function (default "fixed")
 *   - orientation: "horizontal" | "vertical", or unset
 */

import type { GroupNode, GroupSize, LayoutNode, LayoutSelector, Orientation } from "./types.js";

/** Fatal error type for invalid group attributes. */
export type InvalidPropsFatal = Readonly<{ code: "BARKIT_INVALID_PROPS"; detail: string }>;

/** Success with value, or failure with a fatal error. */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: InvalidPropsFatal }>;

/** Group attributes with defaults applied. */
export type GroupAttrs<C> = Readonly<{
  size: GroupSize;
  gap: number;
  maxSize: number;
  layout: LayoutSelector<C>;
  orientation: Orientation | undefined;
}>;

export function ok<T>(value: T): LayoutResult<T> {
  return { ok: true, value };
}

function invalid(detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code: "BARKIT_INVALID_PROPS", detail } };
}

function describeReceivedType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

function invalidProp(path: string, name: string, expected: string, received: unknown) {
  return invalid(
    `Invalid attribute "${name}" on group ${path}: expected ${expected}, ` +
      `got ${describeReceivedType(received)} (${String(received)})`,
  );
}

function isSize(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v) && v >= 0;
}

function readSize(v: number | undefined): number | undefined {
  return isSize(v) ? v : undefined;
}

export function readGroupAttrs<C>(group: GroupNode<C>): GroupAttrs<C> {
  const width = readSize(group.width);
  const height = readSize(group.height);
  const size: GroupSize =
    width === undefined
      ? height === undefined
        ? {}
        : { height }
      : height === undefined
        ? { width }
        : { width, height };
  const maxSize = group.maxSize;
  return {
    size,
    gap: isSize(group.gap) ? group.gap : 0,
    maxSize: typeof maxSize === "number" && maxSize > 0 ? maxSize : Number.POSITIVE_INFINITY,
    layout: group.layout ?? "fixed",
    orientation:
      group.orientation === "horizontal" || group.orientation === "vertical"
        ? group.orientation
        : undefined,
  };
}

function validateGroupProps<C>(group: GroupNode<C>, path: string): LayoutResult<GroupNode<C>> {
  const width: unknown = group.width;
  if (width !== undefined && !isSize(width)) {
    return invalidProp(path, "width", "finite number >= 0", width);
  }
  const height: unknown = group.height;
  if (height !== undefined && !isSize(height)) {
    return invalidProp(path, "height", "finite number >= 0", height);
  }
  const gap: unknown = group.gap;
  if (gap !== undefined && !isSize(gap)) {
    return invalidProp(path, "gap", "finite number >= 0", gap);
  }
  const maxSize: unknown = group.maxSize;
  if (maxSize !== undefined && !(typeof maxSize === "number" && maxSize > 0)) {
    return invalidProp(path, "maxSize", "number > 0", maxSize);
  }
  const layout: unknown = group.layout;
  if (
    layout !== undefined &&
    layout !== "fixed" &&
    layout !== "flex" &&
    typeof layout !== "function"
  ) {
    return invalidProp(path, "layout", '"fixed" | "flex" | function', layout);
  }
  const orientation: unknown = group.orientation;
  if (orientation !== undefined && orientation !== "horizontal" && orientation !== "vertical") {
    return invalidProp(path, "orientation", '"horizontal" | "vertical"', orientation);
  }
  return ok(group);
}

function validateNode<C>(node: LayoutNode<C>, path: string): LayoutResult<true> {
  if (node.kind === "leaf") return ok(true);
  const self = validateGroupProps(node, path);
  if (!self.ok) return self;
  for (let i = 0; i < node.children.length; i++) {
    const child = node.children[i];
    if (child === undefined) continue;
    const res = validateNode(child, `${path}.${i}`);
    if (!res.ok) return res;
  }
  return ok(true);
}

/**
 * Check every group attribute in the tree. Paths in the detail message are
 * child indexes from the root, e.g. `root.2.0`.
 */
export function validateLayoutTree<C>(root: GroupNode<C>): LayoutResult<GroupNode<C>> {
  const res = validateNode(root, "root");
  return res.ok ? ok(root) : res;
}
