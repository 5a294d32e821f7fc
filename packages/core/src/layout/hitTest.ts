/**
 * packages/core/src/layout/hitTest.ts — Widget lookup by pointer position.
 *
 * Why: Click routing on a bar needs the leaf under the pointer. Works on a
 * finished GeometryResult, so the index it returns lines up with the
 * flattened leaf order of the tree that produced it.
 *
 * Tie-break rule: when geometries overlap at a point, the LAST index wins.
 * Zero-area geometries (invisible placeholders) never match.
 */

import type { Geometry, GeometryResult } from "./types.js";

/** Check if point (x,y) is inside rect (exclusive of right/bottom edges). */
export function contains(rect: Geometry, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}

export function hitTestLeaf(result: GeometryResult, x: number, y: number): number | null {
  for (let i = result.geometries.length - 1; i >= 0; i--) {
    const g = result.geometries[i];
    if (g !== undefined && contains(g, x, y)) return i;
  }
  return null;
}
