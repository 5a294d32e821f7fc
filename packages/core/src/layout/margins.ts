/**
 * packages/core/src/layout/margins.ts — Margin lookup by widget/group identity.
 *
 * Lookups never fail: unknown identities, missing sides and out-of-range
 * values all resolve to 0. Registration through `createMarginRegistry` is
 * strict and rejects invalid sides up front.
 */

import { BarkitError } from "../errors.js";
import type { Margin, MarginResolver } from "./types.js";

export const ZERO_MARGIN: Margin = Object.freeze({ left: 0, right: 0, top: 0, bottom: 0 });

/** Resolver that knows no identity. */
export const NO_MARGINS: MarginResolver = Object.freeze({
  marginOf: () => undefined,
});

function side(raw: unknown): number {
  return typeof raw === "number" && Number.isFinite(raw) && raw > 0 ? raw : 0;
}

export function normalizeMargin(raw: Partial<Margin> | undefined): Margin {
  if (raw === undefined) return ZERO_MARGIN;
  const left = side(raw.left);
  const right = side(raw.right);
  const top = side(raw.top);
  const bottom = side(raw.bottom);
  if (left === 0 && right === 0 && top === 0 && bottom === 0) return ZERO_MARGIN;
  return { left, right, top, bottom };
}

export function resolveMargin(resolver: MarginResolver, identity: object): Margin {
  return normalizeMargin(resolver.marginOf(identity));
}

export type MarginRegistry = MarginResolver &
  Readonly<{
    set(identity: object, margin: Partial<Margin>): void;
    delete(identity: object): boolean;
  }>;

const SIDES = ["left", "right", "top", "bottom"] as const;

/**
 * WeakMap-backed resolver. Entries disappear with their widget or group.
 *
 * @throws BarkitError with code BARKIT_INVALID_MARGIN for a negative or
 * non-finite side.
 */
export function createMarginRegistry(): MarginRegistry {
  const entries = new WeakMap<object, Margin>();
  return Object.freeze({
    marginOf(identity: object): Margin | undefined {
      return entries.get(identity);
    },
    set(identity: object, margin: Partial<Margin>): void {
      for (const key of SIDES) {
        const v = margin[key];
        if (v === undefined) continue;
        if (!Number.isFinite(v) || v < 0) {
          throw new BarkitError(
            "BARKIT_INVALID_MARGIN",
            `margin.${key} must be a finite number >= 0, got ${String(v)}`,
          );
        }
      }
      entries.set(identity, normalizeMargin(margin));
    },
    delete(identity: object): boolean {
      return entries.delete(identity);
    },
  });
}
