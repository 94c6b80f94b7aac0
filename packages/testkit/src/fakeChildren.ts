import type { Rect, Size, UniformGridChild, Visibility } from "@unigrid/core";

export type FakeChildOptions = Readonly<{
  w: number;
  h: number;
  visibility?: Visibility;
  id?: string;
}>;

/**
 * In-process stand-in for a host element. Records every measure query and
 * every placement so tests can assert on them.
 */
export interface FakeChild extends UniformGridChild {
  readonly id: string;
  visibility: Visibility;
  natural: Size;
  readonly measureCalls: Array<Readonly<{ maxW: number; maxH: number }>>;
  readonly placements: Rect[];
  /** Last assigned rect, or null when never placed. */
  readonly rect: Rect | null;
}

let nextId = 0;

export function createFakeChild(opts: FakeChildOptions): FakeChild {
  const measureCalls: Array<Readonly<{ maxW: number; maxH: number }>> = [];
  const placements: Rect[] = [];
  const child: FakeChild = {
    id: opts.id ?? `child-${nextId++}`,
    visibility: opts.visibility ?? "visible",
    natural: { w: opts.w, h: opts.h },
    measureCalls,
    placements,
    get rect() {
      return placements[placements.length - 1] ?? null;
    },
    measureNatural(maxW: number, maxH: number): Size {
      measureCalls.push({ maxW, maxH });
      return child.natural;
    },
    placeAt(rect: Rect): void {
      placements.push(rect);
    },
  };
  return child;
}

export function createFakeChildren(count: number, opts: FakeChildOptions): FakeChild[] {
  const out: FakeChild[] = [];
  for (let i = 0; i < count; i++) {
    out.push(createFakeChild({ ...opts, id: `${opts.id ?? "child"}-${i}` }));
  }
  return out;
}
