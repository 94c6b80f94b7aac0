/**
 * packages/core/src/layout/validateProps.ts — Uniform grid props validation.
 *
 * Why: Host bindings hand the grid untyped values. Validation returns a
 * structured fatal instead of throwing so callers decide how to surface it.
 *
 * Validation rules:
 *   - maxRows / maxColumns must be int32 numbers; undefined means uncapped
 *   - values <= 0 are accepted and produce an empty layout
 *   - cellPolicy must be "lastVisible" or "maxVisible"; undefined means "lastVisible"
 */

import { I32_MAX, isI32 } from "./engine/bounds.js";
import { ok } from "./engine/result.js";
import type { CellPolicy } from "./types.js";

/** Fatal error type for invalid grid props. */
export type InvalidPropsFatal = Readonly<{ code: "UGRID_INVALID_PROPS"; detail: string }>;

/**
 * Layout operation result: success with value, or failure with fatal error.
 */
export type LayoutResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: InvalidPropsFatal }>;

export type UniformGridProps = Readonly<{
  maxRows?: number;
  maxColumns?: number;
  cellPolicy?: CellPolicy;
}>;

export type ValidatedUniformGridProps = Readonly<{
  maxRows: number;
  maxColumns: number;
  cellPolicy: CellPolicy;
}>;

export const DEFAULT_UNIFORM_GRID_PROPS: ValidatedUniformGridProps = Object.freeze({
  maxRows: I32_MAX,
  maxColumns: I32_MAX,
  cellPolicy: "lastVisible",
});

function invalid(detail: string): LayoutResult<never> {
  return { ok: false, fatal: { code: "UGRID_INVALID_PROPS", detail } };
}

export function validateCap(name: "maxRows" | "maxColumns", raw: unknown): LayoutResult<number> {
  if (raw === undefined) return ok(I32_MAX);
  if (typeof raw !== "number" || !isI32(raw)) {
    return invalid(`uniformGrid.${name} must be an int32, got ${String(raw)}`);
  }
  return ok(raw);
}

export function validateCellPolicy(raw: unknown): LayoutResult<CellPolicy> {
  if (raw === undefined) return ok(DEFAULT_UNIFORM_GRID_PROPS.cellPolicy);
  if (raw === "lastVisible" || raw === "maxVisible") return ok(raw);
  return invalid(
    `uniformGrid.cellPolicy must be "lastVisible" or "maxVisible", got ${JSON.stringify(raw)}`,
  );
}

export function validateUniformGridProps(raw: unknown): LayoutResult<ValidatedUniformGridProps> {
  if (raw === undefined || raw === null) return ok(DEFAULT_UNIFORM_GRID_PROPS);
  if (typeof raw !== "object") return invalid("uniformGrid props must be an object");

  const p = raw as { maxRows?: unknown; maxColumns?: unknown; cellPolicy?: unknown };

  const maxRowsRes = validateCap("maxRows", p.maxRows);
  if (!maxRowsRes.ok) return maxRowsRes;
  const maxColumnsRes = validateCap("maxColumns", p.maxColumns);
  if (!maxColumnsRes.ok) return maxColumnsRes;
  const policyRes = validateCellPolicy(p.cellPolicy);
  if (!policyRes.ok) return policyRes;

  return ok({
    maxRows: maxRowsRes.value,
    maxColumns: maxColumnsRes.value,
    cellPolicy: policyRes.value,
  });
}
