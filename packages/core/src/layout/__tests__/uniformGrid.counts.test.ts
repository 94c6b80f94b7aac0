import { assert, describe, test } from "@unigrid/testkit";
import { I32_MAX } from "../engine/bounds.js";
import { columnCount, rowCount } from "../engine/counts.js";

const INF = Number.POSITIVE_INFINITY;

describe("columnCount", () => {
  test("fits whole cells into the width", () => {
    assert.equal(columnCount(5, 250, 100, I32_MAX), 2);
    assert.equal(columnCount(5, 99, 100, I32_MAX), 0);
  });

  test("never proposes more columns than children", () => {
    assert.equal(columnCount(2, 1000, 100, I32_MAX), 2);
  });

  test("unbounded width puts every child in one row", () => {
    assert.equal(columnCount(3, INF, 100, I32_MAX), 3);
    assert.equal(columnCount(0, INF, 0, I32_MAX), 0);
    assert.equal(columnCount(10, INF, 100, 4), 4);
  });

  test("zero, negative and NaN cell widths give zero columns", () => {
    assert.equal(columnCount(5, 250, 0, I32_MAX), 0);
    assert.equal(columnCount(5, 250, -3, I32_MAX), 0);
    assert.equal(columnCount(5, 250, Number.NaN, I32_MAX), 0);
    assert.equal(columnCount(5, 250, INF, I32_MAX), 0);
  });

  test("NaN or negative width constraints give zero columns", () => {
    assert.equal(columnCount(5, Number.NaN, 10, I32_MAX), 0);
    assert.equal(columnCount(5, -50, 10, I32_MAX), 0);
  });

  test("caps at maxColumns and never goes negative", () => {
    assert.equal(columnCount(5, 1000, 100, 3), 3);
    assert.equal(columnCount(5, 1000, 100, 0), 0);
    assert.equal(columnCount(5, 1000, 100, -2), 0);
  });
});

describe("rowCount", () => {
  test("rounds partial rows up", () => {
    assert.equal(rowCount(5, 2, I32_MAX), 3);
    assert.equal(rowCount(4, 2, I32_MAX), 2);
  });

  test("zero columns means zero rows", () => {
    assert.equal(rowCount(5, 0, I32_MAX), 0);
    assert.equal(rowCount(0, 0, I32_MAX), 0);
  });

  test("no children means zero rows", () => {
    assert.equal(rowCount(0, 3, I32_MAX), 0);
  });

  test("caps at maxRows and never goes negative", () => {
    assert.equal(rowCount(5, 1, 2), 2);
    assert.equal(rowCount(5, 2, 0), 0);
    assert.equal(rowCount(5, 2, -1), 0);
  });
});

describe("column/row invariants", () => {
  test("counts stay within caps across a sweep of inputs", () => {
    const widths = [0, 1, 49.5, 100, 250, 1000, INF];
    const cellWidths = [0, 1, 10, 33.3, 100];
    const caps = [-1, 0, 1, 2, 5, I32_MAX];
    for (let n = 0; n <= 12; n++) {
      for (const width of widths) {
        for (const cellW of cellWidths) {
          for (const maxColumns of caps) {
            for (const maxRows of caps) {
              const columns = columnCount(n, width, cellW, maxColumns);
              const rows = rowCount(n, columns, maxRows);
              assert.ok(columns >= 0 && columns <= Math.max(0, maxColumns));
              assert.ok(rows >= 0 && rows <= Math.max(0, maxRows));
              assert.ok(columns <= n);
              if (columns === 0) assert.equal(rows, 0);
              if (columns > 0 && rows < maxRows) assert.ok(columns * rows >= n);
            }
          }
        }
      }
    }
  });

  test("unbounded width with no caps yields n columns and one row", () => {
    for (let n = 1; n <= 20; n++) {
      const columns = columnCount(n, INF, 10, I32_MAX);
      assert.equal(columns, n);
      assert.equal(rowCount(n, columns, I32_MAX), 1);
    }
  });
});
