import { isUnbounded } from "./bounds.js";

/**
 * Number of columns for a uniform grid.
 *
 * - Unbounded width: one row holding every child.
 * - Otherwise as many whole cells as fit, never more than there are children.
 * - A non-positive or non-finite cell width yields 0 columns.
 * - The result is capped by `maxColumns` and never negative.
 */
export function columnCount(
  childCount: number,
  widthConstraint: number,
  maxChildWidth: number,
  maxColumns: number,
): number {
  let candidate: number;
  if (isUnbounded(widthConstraint)) {
    candidate = childCount;
  } else if (!(maxChildWidth > 0) || !Number.isFinite(maxChildWidth)) {
    candidate = 0;
  } else {
    const fit = Math.trunc(widthConstraint / maxChildWidth);
    candidate = Math.min(Number.isFinite(fit) ? fit : 0, childCount);
  }
  return Math.max(0, Math.min(candidate, maxColumns));
}

/**
 * Number of rows for a uniform grid: ceil(childCount / columns), capped by
 * `maxRows`. Zero columns means zero rows.
 */
export function rowCount(childCount: number, columns: number, maxRows: number): number {
  if (columns <= 0) return 0;
  return Math.max(0, Math.min(Math.ceil(childCount / columns), maxRows));
}
