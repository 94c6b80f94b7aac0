/** Largest int32, used as the "uncapped" value for row and column limits. */
export const I32_MAX = 2147483647;

export function isI32(v: number): boolean {
  return Number.isInteger(v) && v >= -2147483648 && v <= I32_MAX;
}

export function clampNonNegative(v: number): number {
  if (Number.isNaN(v)) return 0;
  return v < 0 ? 0 : v;
}

export function isUnbounded(v: number): boolean {
  return v === Number.POSITIVE_INFINITY;
}
