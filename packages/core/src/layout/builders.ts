/**
 * packages/core/src/layout/builders.ts — Node constructors.
 *
 * Nodes come out frozen; the engine never writes to them, and a frozen tree
 * makes accidental mutation by callers fail loudly in strict mode.
 */

import type { GroupNode, LayoutNode, LeafNode, Widget } from "./types.js";

export type GroupAttributes<C> = Omit<GroupNode<C>, "kind" | "children">;

export function leaf<C>(widget: Widget<C>): LeafNode<C> {
  const node: LeafNode<C> = { kind: "leaf", widget };
  return Object.freeze(node);
}

export function group<C>(
  children: readonly LayoutNode<C>[],
  attrs: GroupAttributes<C> = {},
): GroupNode<C> {
  const node: GroupNode<C> = { ...attrs, kind: "group", children: Object.freeze([...children]) };
  return Object.freeze(node);
}
