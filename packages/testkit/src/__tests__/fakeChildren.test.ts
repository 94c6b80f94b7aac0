import { assert, createFakeChild, createFakeChildren, describe, test } from "../index.js";

describe("fake children", () => {
  test("measureNatural records the query and returns the natural size", () => {
    const child = createFakeChild({ w: 4, h: 2 });
    const size = child.measureNatural(Number.POSITIVE_INFINITY, 10);
    assert.deepEqual(size, { w: 4, h: 2 });
    assert.deepEqual(child.measureCalls, [{ maxW: Number.POSITIVE_INFINITY, maxH: 10 }]);
  });

  test("placeAt keeps every rect and exposes the last one", () => {
    const child = createFakeChild({ w: 1, h: 1 });
    assert.equal(child.rect, null);
    child.placeAt({ x: 0, y: 0, w: 1, h: 1 });
    child.placeAt({ x: 2, y: 3, w: 1, h: 1 });
    assert.equal(child.placements.length, 2);
    assert.deepEqual(child.rect, { x: 2, y: 3, w: 1, h: 1 });
  });

  test("defaults to visible", () => {
    assert.equal(createFakeChild({ w: 1, h: 1 }).visibility, "visible");
    assert.equal(createFakeChild({ w: 1, h: 1, visibility: "collapsed" }).visibility, "collapsed");
  });

  test("createFakeChildren builds independent children with indexed ids", () => {
    const kids = createFakeChildren(3, { w: 5, h: 6, id: "cell" });
    assert.deepEqual(
      kids.map((k) => k.id),
      ["cell-0", "cell-1", "cell-2"],
    );
    kids[0]?.placeAt({ x: 0, y: 0, w: 5, h: 6 });
    assert.equal(kids[1]?.placements.length, 0);
  });
});
