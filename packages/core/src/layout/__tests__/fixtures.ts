import type { Widget } from "../../index.js";

type WidgetOpts = Readonly<{ visible?: boolean; resize?: boolean }>;

/** Widget with a constant natural size. */
export function sized(width: number, height: number, opts: WidgetOpts = {}): Widget {
  return {
    visible: opts.visible ?? true,
    resize: opts.resize ?? false,
    extents: () => ({ width, height }),
  };
}

export function hidden(width = 10, height = 10): Widget {
  return sized(width, height, { visible: false });
}

export const BAR = Object.freeze({ x: 0, y: 0, width: 300, height: 20 });
export const ZERO = Object.freeze({ x: 0, y: 0, width: 0, height: 0 });
