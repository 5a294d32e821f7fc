/**
 * packages/core/src/layout/types.ts — Layout primitive type definitions.
 *
 * Why: Defines the geometric types and the widget tree shape the layout
 * engine consumes. All coordinates are integer pixels at the boundaries
 * of the engine; only the flex cursor works with fractions internally.
 */

import type { AxisAccessors } from "./axis.js";

/** Rectangle with position (x,y) and dimensions in pixels. */
export type Geometry = Readonly<{ x: number; y: number; width: number; height: number }>;

/** Width and height in pixels. */
export type Size = Readonly<{ width: number; height: number }>;

/** Four-sided outer spacing. Sides are non-negative pixels. */
export type Margin = Readonly<{ left: number; right: number; top: number; bottom: number }>;

/** Axis a group arranges its children along. */
export type Orientation = "horizontal" | "vertical";

/**
 * Capability surface of a leaf widget.
 *
 * `extents` reports the natural size for the given context (typically the
 * screen a bar lives on). A Geometry is accepted as well; its position is
 * ignored. Errors thrown from `extents` propagate out of the layout call.
 */
export type Widget<C = unknown> = Readonly<{
  visible: boolean;
  /** Preserve aspect ratio when the constrained axis forces a size. */
  resize?: boolean;
  extents(context: C): Size;
}>;

/** Optional per-call size caps, in physical terms. */
export type GroupSize = Readonly<{ width?: number; height?: number }>;

export type LeafNode<C = unknown> = Readonly<{
  kind: "leaf";
  widget: Widget<C>;
}>;

export type GroupNode<C = unknown> = Readonly<{
  kind: "group";
  children: readonly LayoutNode<C>[];
  /** Caps the group's width for the call. */
  width?: number;
  /** Caps the group's height for the call. */
  height?: number;
  /** Algorithm for the direct children. Default "fixed". */
  layout?: LayoutSelector<C>;
  /** Flex only: spacing between visible children. */
  gap?: number;
  /** Flex only: upper bound for each child's share. */
  maxSize?: number;
  /** Overrides the enclosing orientation for this group and below. */
  orientation?: Orientation;
}>;

export type LayoutNode<C = unknown> = LeafNode<C> | GroupNode<C>;

/** Flattened leaf placements plus the space the pass consumed. */
export type GeometryResult = Readonly<{
  geometries: readonly Geometry[];
  total: Geometry;
}>;

/**
 * Lays out a nested group. Algorithms call it to recurse; it resolves the
 * child's own algorithm and orientation.
 */
export type LayoutGroupFn<C> = (
  group: GroupNode<C>,
  inherited: Orientation,
  bounds: Geometry,
  size: GroupSize,
) => GeometryResult;

export type LayoutEnv<C> = Readonly<{
  context: C;
  margins: MarginResolver;
  layoutGroup: LayoutGroupFn<C>;
}>;

/**
 * A layout discipline for one tree level.
 *
 * `size` is the group's effective width/height for this call (own
 * attributes merged with whatever the enclosing layout imposed). Group
 * attributes on the node itself must not be consulted for size.
 */
export type LayoutAlgorithm<C = unknown> = (
  axes: AxisAccessors,
  bounds: Geometry,
  group: GroupNode<C>,
  size: GroupSize,
  env: LayoutEnv<C>,
) => GeometryResult;

export type LayoutSelector<C = unknown> = "fixed" | "flex" | LayoutAlgorithm<C>;

/** Margin lookup keyed by widget or group identity. */
export interface MarginResolver {
  marginOf(identity: object): Partial<Margin> | undefined;
}
