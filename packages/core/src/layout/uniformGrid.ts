/**
 * packages/core/src/layout/uniformGrid.ts — Uniform grid layout manager.
 *
 * Why: Hosts drive layout as measure-then-arrange on a single thread. This
 * wrapper owns the caps (read fresh every pass), remembers the last cell so
 * a pass with no visible children keeps the previous size, and notifies the
 * host when a cap changes so it can schedule a new pass.
 *
 * @example
 * ```ts
 * const grid = createUniformGrid({ children: () => host.children, maxColumns: 3 });
 * const desired = grid.measure(viewportW, Number.POSITIVE_INFINITY);
 * grid.arrangeChildren({ x: 0, y: 0, w: viewportW, h: desired.h });
 * ```
 */

import { UniformGridError } from "../errors.js";
import {
  DEV_MODE,
  type WarnLayoutIssueContext,
  consoleWarn,
  warnDegenerateCaps,
  warnNoVisibleChildren,
} from "./devWarnings.js";
import {
  type UniformGridArrangeResult,
  type UniformGridConfig,
  type UniformGridPlan,
  arrangeUniformGrid,
  measureUniformGrid,
} from "./kinds/uniformGrid.js";
import type { CellPolicy, LayoutManager, Rect, Size, UniformGridChild } from "./types.js";
import { ZERO_SIZE } from "./types.js";
import {
  type LayoutResult,
  type UniformGridProps,
  validateCap,
  validateCellPolicy,
  validateUniformGridProps,
} from "./validateProps.js";

export type CreateUniformGridOptions = UniformGridProps &
  Readonly<{
    /** Current ordered child list of the host. Read on every pass. */
    children: () => readonly UniformGridChild[];
    /** Called when a cap or the cell policy changes value. */
    onInvalidate?: () => void;
    /** Defaults to NODE_ENV !== "production". */
    devMode?: boolean;
    /** Dev warning sink. Defaults to console.warn. */
    warn?: (message: string) => void;
  }>;

export interface UniformGrid extends LayoutManager {
  maxRows: number;
  maxColumns: number;
  cellPolicy: CellPolicy;

  /** Cell size derived by the latest pass. */
  readonly cell: Size;

  /** Plan of the latest measure (also refreshed by arrange), or null before the first pass. */
  readonly lastPlan: UniformGridPlan | null;

  /** Like `arrangeChildren`, also reporting the plan and placement count. */
  arrange(bounds: Rect): UniformGridArrangeResult;
}

function unwrap<T>(res: LayoutResult<T>): T {
  if (!res.ok) throw new UniformGridError(res.fatal.code, res.fatal.detail);
  return res.value;
}

export function createUniformGrid(options: CreateUniformGridOptions): UniformGrid {
  const initial = unwrap(validateUniformGridProps(options));
  const readChildren = options.children;
  const onInvalidate = options.onInvalidate;
  const warnCtx: WarnLayoutIssueContext = {
    devMode: options.devMode ?? DEV_MODE,
    warnedLayoutIssues: new Set<string>(),
    warn: options.warn ?? consoleWarn,
  };

  let maxRows = initial.maxRows;
  let maxColumns = initial.maxColumns;
  let cellPolicy = initial.cellPolicy;
  let cell: Size = ZERO_SIZE;
  let lastPlan: UniformGridPlan | null = null;

  function invalidateIfChanged(prev: unknown, next: unknown): void {
    if (prev !== next) onInvalidate?.();
  }

  function currentConfig(): UniformGridConfig {
    warnDegenerateCaps(warnCtx, maxRows, maxColumns);
    return { maxRows, maxColumns, cellPolicy };
  }

  function commit(plan: UniformGridPlan): void {
    warnNoVisibleChildren(warnCtx, plan.childCount, plan.visibleCount);
    cell = plan.cell;
    lastPlan = plan;
  }

  function measure(maxW: number, maxH: number): Size {
    const plan = measureUniformGrid(readChildren(), maxW, maxH, currentConfig(), cell);
    commit(plan);
    return plan.size;
  }

  function arrange(bounds: Rect): UniformGridArrangeResult {
    const result = arrangeUniformGrid(readChildren(), bounds, currentConfig(), cell);
    commit(result.plan);
    return result;
  }

  return {
    get maxRows() {
      return maxRows;
    },
    set maxRows(value: number) {
      const next = unwrap(validateCap("maxRows", value));
      const prev = maxRows;
      maxRows = next;
      invalidateIfChanged(prev, next);
    },
    get maxColumns() {
      return maxColumns;
    },
    set maxColumns(value: number) {
      const next = unwrap(validateCap("maxColumns", value));
      const prev = maxColumns;
      maxColumns = next;
      invalidateIfChanged(prev, next);
    },
    get cellPolicy() {
      return cellPolicy;
    },
    set cellPolicy(value: CellPolicy) {
      const next = unwrap(validateCellPolicy(value));
      const prev = cellPolicy;
      cellPolicy = next;
      invalidateIfChanged(prev, next);
    },
    get cell() {
      return cell;
    },
    get lastPlan() {
      return lastPlan;
    },
    measure,
    arrange,
    arrangeChildren(bounds: Rect): Size {
      return arrange(bounds).size;
    },
  };
}
