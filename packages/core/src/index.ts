/**
 * @unigrid/core
 *
 * Uniform cell grid layout: one shared cell size, row-major placement,
 * row and column caps. Runtime-agnostic; no node:* imports.
 */

// =============================================================================
// Geometry and child capabilities
// =============================================================================

export type {
  CellPolicy,
  LayoutManager,
  Placeable,
  Rect,
  Size,
  Sizable,
  UniformGridChild,
  Visibility,
} from "./layout/types.js";
export { ZERO_SIZE } from "./layout/types.js";

// =============================================================================
// Layout passes
// =============================================================================

export { I32_MAX } from "./layout/engine/bounds.js";
export { columnCount, rowCount } from "./layout/engine/counts.js";
export {
  arrangeUniformGrid,
  measureUniformGrid,
  resolveCellSize,
  type UniformGridArrangeResult,
  type UniformGridConfig,
  type UniformGridPlan,
} from "./layout/kinds/uniformGrid.js";
export {
  createUniformGrid,
  type CreateUniformGridOptions,
  type UniformGrid,
} from "./layout/uniformGrid.js";

// =============================================================================
// Validation and errors
// =============================================================================

export {
  DEFAULT_UNIFORM_GRID_PROPS,
  validateUniformGridProps,
  type InvalidPropsFatal,
  type LayoutResult,
  type UniformGridProps,
  type ValidatedUniformGridProps,
} from "./layout/validateProps.js";
export { UniformGridError, type UniformGridErrorCode } from "./errors.js";
export { warnLayoutIssue, type WarnLayoutIssueContext } from "./layout/devWarnings.js";
