/**
 * packages/core/src/layout/kinds/uniformGrid.ts — Uniform cell grid passes.
 *
 * Every child gets the same cell. Children fill the grid row-major, bounded by
 * maxRows/maxColumns. Measure produces an immutable plan; arrange re-measures
 * against the final bounds and places children from that plan.
 *
 * Counting asymmetry (kept for index alignment with the host tree):
 *   - cell sizing looks at visible children only
 *   - column/row counts and placement walk the full child list
 */

import { clampNonNegative } from "../engine/bounds.js";
import { columnCount, rowCount } from "../engine/counts.js";
import type { CellPolicy, Rect, Size, UniformGridChild } from "../types.js";
import { ZERO_SIZE } from "../types.js";

export type UniformGridConfig = Readonly<{
  maxRows: number;
  maxColumns: number;
  cellPolicy: CellPolicy;
}>;

/** Result of one measure pass. Threaded into arrange instead of instance state. */
export type UniformGridPlan = Readonly<{
  cell: Size;
  columns: number;
  rows: number;
  size: Size;
  childCount: number;
  visibleCount: number;
}>;

export type UniformGridArrangeResult = Readonly<{
  /** Size of one arranged cell. */
  size: Size;
  plan: UniformGridPlan;
  placed: number;
}>;

const UNBOUNDED = Number.POSITIVE_INFINITY;

/**
 * Shared cell size from the visible children.
 * Returns `previous` when nothing is visible.
 */
export function resolveCellSize(
  children: readonly UniformGridChild[],
  policy: CellPolicy,
  previous: Size,
): Readonly<{ cell: Size; visibleCount: number }> {
  let w = policy === "maxVisible" ? 0 : previous.w;
  let h = policy === "maxVisible" ? 0 : previous.h;
  let visibleCount = 0;

  for (const child of children) {
    if (child.visibility !== "visible") continue;
    const natural = child.measureNatural(UNBOUNDED, UNBOUNDED);
    if (policy === "maxVisible") {
      w = Math.max(w, natural.w);
      h = Math.max(h, natural.h);
    } else {
      w = natural.w;
      h = natural.h;
    }
    visibleCount++;
  }

  if (visibleCount === 0) return { cell: previous, visibleCount };
  return { cell: { w, h }, visibleCount };
}

/** count * cellSize, with an empty track count contributing 0 even for an infinite cell. */
function trackExtent(count: number, cellSize: number): number {
  if (count <= 0) return 0;
  return count * cellSize;
}

/** Finite, non-negative cell dimension; anything else collapses to 0. */
function finiteCellDimension(v: number): number {
  return Number.isFinite(v) ? clampNonNegative(v) : 0;
}

export function measureUniformGrid(
  children: readonly UniformGridChild[],
  maxW: number,
  _maxH: number,
  config: UniformGridConfig,
  previousCell: Size = ZERO_SIZE,
): UniformGridPlan {
  const { cell, visibleCount } = resolveCellSize(children, config.cellPolicy, previousCell);
  const childCount = children.length;
  const columns = columnCount(childCount, maxW, cell.w, config.maxColumns);
  const rows = rowCount(childCount, columns, config.maxRows);

  return {
    cell,
    columns,
    rows,
    size: { w: trackExtent(columns, cell.w), h: trackExtent(rows, cell.h) },
    childCount,
    visibleCount,
  };
}

function resolveCellWidth(boundsW: number, columns: number, cell: Size): number {
  if (columns <= 0) return 0;
  if (!Number.isFinite(boundsW)) return finiteCellDimension(cell.w);
  return clampNonNegative(boundsW / columns);
}

/**
 * Re-measures against `bounds` and assigns every child that fits a cell.
 * Non-visible children still consume their slot.
 */
export function arrangeUniformGrid(
  children: readonly UniformGridChild[],
  bounds: Rect,
  config: UniformGridConfig,
  previousCell: Size = ZERO_SIZE,
): UniformGridArrangeResult {
  const plan = measureUniformGrid(children, bounds.w, bounds.h, config, previousCell);
  const { columns, rows } = plan;
  const cellW = resolveCellWidth(bounds.w, columns, plan.cell);
  const cellH = finiteCellDimension(plan.cell.h);

  let placed = 0;
  for (let i = 0; i < rows && placed < children.length; i++) {
    for (let j = 0; j < columns && placed < children.length; j++) {
      const child = children[placed];
      if (!child) break;
      child.placeAt({ x: j * cellW, y: i * cellH, w: cellW, h: cellH });
      placed++;
    }
  }

  return { size: { w: cellW, h: cellH }, plan, placed };
}
