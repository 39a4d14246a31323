import { assert, assertClose, describe, test } from "@tessera/testkit";
import {
  computeFrames,
  masonryColumnWidth,
  measureMasonry,
  placeMasonry,
} from "../engine/masonry.js";
import { UNSPECIFIED, rect } from "../geometry.js";
import type {
  ConfigInput,
  Constraint,
  LayoutResult,
  MasonryConfig,
  Measurer,
  Rect,
  Size,
} from "../types.js";

/** Boxes fill the proposed column width and keep their own height. */
type Tile = Readonly<{ height: number }>;

const fillColumn: Measurer<Tile> = (tile, constraint) => ({
  width: constraint.width ?? 0,
  height: tile.height,
});

function tiles(...heights: number[]): Tile[] {
  return heights.map((height) => ({ height }));
}

function mustPlace(
  boxes: readonly Tile[],
  bounds: Rect,
  config?: ConfigInput<MasonryConfig>,
): LayoutResult {
  const res = placeMasonry(boxes, fillColumn, bounds, config);
  if (!res.ok) {
    assert.fail(`place failed: ${res.fatal.code}: ${res.fatal.detail}`);
  }
  return res.value;
}

function mustMeasure(
  boxes: readonly Tile[],
  available: Constraint,
  config?: ConfigInput<MasonryConfig>,
): Size {
  const res = measureMasonry(boxes, fillColumn, available, config);
  if (!res.ok) {
    assert.fail(`measure failed: ${res.fatal.code}: ${res.fatal.detail}`);
  }
  return res.value;
}

function withCapturedWarnings<T>(sink: string[], run: () => T): T {
  const original = console.warn;
  console.warn = (msg?: unknown) => {
    sink.push(String(msg));
  };
  try {
    return run();
  } finally {
    console.warn = original;
  }
}

function frames(result: LayoutResult): Rect[] {
  return result.placements.map((p) => p.frame);
}

describe("masonry column choice", () => {
  test("equal column heights go to the lowest column index", () => {
    const placed = mustPlace(tiles(10, 10, 10), rect(0, 0, 100, 100), { columns: 2, spacing: 0 });

    assert.deepEqual(frames(placed), [
      rect(0, 0, 50, 10),
      rect(50, 0, 50, 10),
      rect(0, 10, 50, 10),
    ]);
    assert.deepEqual(placed.totalSize, { width: 100, height: 20 });
  });

  test("each box drops into the currently shortest column", () => {
    const placed = mustPlace(tiles(30, 10, 20, 5, 40), rect(0, 0, 320, 500), {
      columns: 3,
      spacing: 10,
    });

    assert.deepEqual(frames(placed), [
      rect(0, 0, 100, 30),
      rect(110, 0, 100, 10),
      rect(220, 0, 100, 20),
      rect(110, 20, 100, 5),
      rect(220, 30, 100, 40),
    ]);
    assert.deepEqual(placed.totalSize, { width: 320, height: 70 });
  });

  test("frames are offset by the bounds origin; total height is not", () => {
    const placed = mustPlace(tiles(30, 10, 20, 5, 40), rect(5, 7, 320, 500), {
      columns: 3,
      spacing: 10,
    });
    assert.deepEqual(placed.placements[3]?.frame, rect(115, 27, 100, 5));
    assert.deepEqual(placed.totalSize, { width: 320, height: 70 });
  });

  test("repeated calls produce identical frames", () => {
    const boxes = tiles(13, 7, 29, 7, 7, 41, 3);
    const bounds = rect(0, 0, 300, 400);
    const cfg = { columns: 4, spacing: 6 };
    assert.deepEqual(mustPlace(boxes, bounds, cfg), mustPlace(boxes, bounds, cfg));
  });
});

describe("masonry sizing", () => {
  test("single column spans the full width", () => {
    assert.equal(masonryColumnWidth(80, 1, 10), 80);
    const placed = mustPlace(tiles(10, 20), rect(0, 0, 80, 100), { columns: 1, spacing: 10 });
    assert.deepEqual(frames(placed), [rect(0, 0, 80, 10), rect(0, 20, 80, 20)]);
    assert.deepEqual(placed.totalSize, { width: 80, height: 40 });
  });

  test("measure agrees with place for a bounded width", () => {
    const size = mustMeasure(tiles(30, 10, 20, 5, 40), { width: 320, height: null }, {
      columns: 3,
      spacing: 10,
    });
    assert.deepEqual(size, { width: 320, height: 70 });
  });

  test("unbounded width resolves to the unspecified dimension", () => {
    assert.deepEqual(mustMeasure(tiles(5), UNSPECIFIED, { columns: 1, spacing: 0 }), {
      width: 10,
      height: 5,
    });
  });

  test("zero boxes report zero height", () => {
    const placed = mustPlace([], rect(0, 0, 120, 90));
    assert.deepEqual(placed.totalSize, { width: 120, height: 0 });
    assert.equal(placed.placements.length, 0);
    assert.deepEqual(mustMeasure([], { width: 120, height: null }), { width: 120, height: 0 });
  });

  test("boxes are measured against the column width and proposed their frame size", () => {
    const seen: Constraint[] = [];
    const res = placeMasonry(
      tiles(30, 10),
      (tile, constraint) => {
        seen.push(constraint);
        return fillColumn(tile, constraint);
      },
      rect(0, 0, 320, 200),
      { columns: 3, spacing: 10 },
    );
    assert.ok(res.ok);
    if (!res.ok) return;
    assert.deepEqual(seen, [
      { width: 100, height: null },
      { width: 100, height: null },
    ]);
    assert.deepEqual(
      res.value.placements.map((p) => p.proposal),
      [
        { width: 100, height: 30 },
        { width: 100, height: 10 },
      ],
    );
    assert.equal(res.value.placements[0]?.anchor, "topLeading");
  });

  test("negative column width propagates into the frames", () => {
    const warnings: string[] = [];
    const result = withCapturedWarnings(warnings, () =>
      computeFrames(tiles(4, 4), fillColumn, 10, 3, 10),
    );

    assert.equal(result.length, 2);
    assertClose(result[0]?.size.width ?? Number.NaN, -10 / 3);
    assertClose(result[1]?.origin.x ?? Number.NaN, -10 / 3 + 10);
    assert.equal(result[1]?.origin.y, 0);
    assert.equal(warnings.length, process.env.NODE_ENV === "production" ? 0 : 1);
  });

  test("a negative column width warns once per width, columns and spacing", () => {
    const warnings: string[] = [];
    withCapturedWarnings(warnings, () => {
      computeFrames(tiles(4), fillColumn, 12, 3, 10);
      computeFrames(tiles(4), fillColumn, 12, 3, 10);
      computeFrames(tiles(4), fillColumn, 14, 3, 10);
    });

    if (process.env.NODE_ENV === "production") {
      assert.deepEqual(warnings, []);
      return;
    }
    assert.deepEqual(warnings, [
      "[tessera] masonry: column width is negative (-2.6666666666666665) for width 12, 3 columns and spacing 10",
      "[tessera] masonry: column width is negative (-2) for width 14, 3 columns and spacing 10",
    ]);
  });
});

describe("masonry config errors", () => {
  for (const columns of [0, -2, 2.5, Number.NaN]) {
    test(`columns=${String(columns)} is rejected without measuring`, () => {
      let calls = 0;
      const res = placeMasonry(
        tiles(10),
        (tile, constraint) => {
          calls++;
          return fillColumn(tile, constraint);
        },
        rect(0, 0, 100, 100),
        { columns },
      );
      assert.equal(calls, 0);
      assert.equal(res.ok, false);
      if (res.ok) return;
      assert.equal(res.fatal.code, "TESSERA_INVALID_CONFIG");
      assert.match(res.fatal.detail, /^masonry\.columns must be an integer >= 1/);
    });
  }

  test("infinite spacing is rejected", () => {
    const res = measureMasonry(tiles(10), fillColumn, { width: 100, height: null }, {
      spacing: Number.POSITIVE_INFINITY,
    });
    assert.deepEqual(res, {
      ok: false,
      fatal: {
        code: "TESSERA_INVALID_CONFIG",
        detail: "masonry.spacing must be a finite number >= 0, got number (Infinity)",
      },
    });
  });
});
