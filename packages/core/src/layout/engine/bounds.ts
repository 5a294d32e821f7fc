export function clampNonNegative(v: number): number {
  return v > 0 ? v : 0;
}

/** Half-up rounding, applied wherever a real value becomes a pixel. */
export function roundHalfUp(v: number): number {
  return Math.floor(v + 0.5);
}

/** Non-finite and negative inputs collapse to 0; others round half-up. */
export function toPixel(v: number): number {
  return Number.isFinite(v) && v > 0 ? roundHalfUp(v) : 0;
}
