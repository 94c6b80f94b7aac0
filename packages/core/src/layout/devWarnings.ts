const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEV_MODE = NODE_ENV !== "production";

export type WarnLayoutIssueContext = Readonly<{
  devMode: boolean;
  warnedLayoutIssues: Set<string>;
  warn: (message: string) => void;
}>;

export function consoleWarn(message: string): void {
  const c = (globalThis as { console?: { warn?: (msg: string) => void } }).console;
  c?.warn?.(message);
}

/** Emits `detail` once per `key` while dev mode is on. */
export function warnLayoutIssue(ctx: WarnLayoutIssueContext, key: string, detail: string): void {
  if (!ctx.devMode) return;
  if (ctx.warnedLayoutIssues.has(key)) return;
  ctx.warnedLayoutIssues.add(key);
  ctx.warn(`[unigrid][layout] ${detail}`);
}

export function warnDegenerateCaps(
  ctx: WarnLayoutIssueContext,
  maxRows: number,
  maxColumns: number,
): void {
  warnNonPositiveCap(ctx, "maxRows", maxRows);
  warnNonPositiveCap(ctx, "maxColumns", maxColumns);
}

/** One warning per cap while it stays non-positive; re-armed once it turns positive. */
function warnNonPositiveCap(
  ctx: WarnLayoutIssueContext,
  name: "maxRows" | "maxColumns",
  value: number,
): void {
  if (value > 0) {
    ctx.warnedLayoutIssues.delete(name);
    return;
  }
  warnLayoutIssue(
    ctx,
    name,
    `uniformGrid ${name}=${value} is not positive; the grid will place no children`,
  );
}

export function warnNoVisibleChildren(
  ctx: WarnLayoutIssueContext,
  childCount: number,
  visibleCount: number,
): void {
  if (childCount === 0 || visibleCount > 0) return;
  warnLayoutIssue(
    ctx,
    "noVisibleChildren",
    `uniformGrid has ${childCount} children but none visible; cell size is carried over from the previous pass`,
  );
}
