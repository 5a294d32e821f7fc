/**
 * packages/core/src/index.ts — Public API of @barkit/core.
 */

// =============================================================================
// Types
// =============================================================================

export type {
  Geometry,
  GeometryResult,
  GroupNode,
  GroupSize,
  LayoutAlgorithm,
  LayoutEnv,
  LayoutGroupFn,
  LayoutNode,
  LayoutSelector,
  LeafNode,
  Margin,
  MarginResolver,
  Orientation,
  Size,
  Widget,
} from "./layout/types.js";

// =============================================================================
// Layout
// =============================================================================

export { type AxisAccessors, type AxisRect, axesFor, toAxisRect } from "./layout/axis.js";
export { type GroupAttributes, group, leaf } from "./layout/builders.js";
export { contains, hitTestLeaf } from "./layout/hitTest.js";
export {
  type MarginRegistry,
  NO_MARGINS,
  ZERO_MARGIN,
  createMarginRegistry,
  normalizeMargin,
  resolveMargin,
} from "./layout/margins.js";
export {
  type GroupAttrs,
  type InvalidPropsFatal,
  type LayoutResult,
  readGroupAttrs,
  validateLayoutTree,
} from "./layout/validateProps.js";
export { layoutFixed } from "./layout/engine/fixed.js";
export { flexShare, layoutFlex } from "./layout/engine/flex.js";
export {
  computeLayout,
  computeLayoutChecked,
  countLeaves,
  resolveAlgorithm,
} from "./layout/engine/layoutEngine.js";

// =============================================================================
// Errors and diagnostics
// =============================================================================

export { ZERO_GEOMETRY } from "./layout/engine/children.js";

export { BarkitError, type BarkitErrorCode } from "./errors.js";
export {
  type InstrumentationPhase,
  type PerfSnapshot,
  type PhaseStats,
  PERF_ENABLED,
  PerfAggregator,
  perfReset,
  perfSnapshot,
} from "./perf/perf.js";
export {
  type LayoutAuditSink,
  emitLayoutAudit,
  isLayoutAuditActive,
  setLayoutAuditSink,
} from "./perf/layoutAudit.js";
