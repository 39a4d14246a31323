import { assert, describe, test } from "@tessera/testkit";
import { TesseraError } from "../../errors.js";
import {
  LAYOUT_ENGINE_KINDS,
  type LayoutEngineKind,
  getLayoutEngine,
  isLayoutEngineKind,
  masonryEngine,
  radialEngine,
  wrapFlowEngine,
} from "../engine/registry.js";
import { rect } from "../geometry.js";
import type { Size } from "../types.js";

const natural = (box: Size): Size => box;

describe("layout engine registry", () => {
  test("looks engines up by kind", () => {
    assert.equal(getLayoutEngine("wrapFlow"), wrapFlowEngine);
    assert.equal(getLayoutEngine("masonry"), masonryEngine);
    assert.equal(getLayoutEngine("radial"), radialEngine);
    assert.deepEqual(
      LAYOUT_ENGINE_KINDS.map((kind) => getLayoutEngine(kind).kind),
      ["wrapFlow", "masonry", "radial"],
    );
  });

  test("exposes frozen engines with their defaults", () => {
    assert.ok(Object.isFrozen(wrapFlowEngine));
    assert.ok(Object.isFrozen(masonryEngine));
    assert.ok(Object.isFrozen(radialEngine));
    assert.deepEqual(wrapFlowEngine.defaults, { alignment: "center", spacing: 10 });
    assert.deepEqual(masonryEngine.defaults, { columns: 3, spacing: 10 });
    assert.deepEqual(radialEngine.defaults, {});
  });

  test("unknown kinds throw a TesseraError", () => {
    assert.equal(isLayoutEngineKind("grid"), false);
    assert.throws(
      () => getLayoutEngine("grid" as unknown as LayoutEngineKind),
      (err: unknown) =>
        err instanceof TesseraError &&
        err.code === "TESSERA_INVALID_ARGUMENT" &&
        err.message === 'Unknown layout engine "grid". Expected one of: wrapFlow, masonry, radial',
    );
  });

  test("engines route to their layout functions", () => {
    const boxes = [
      { width: 30, height: 10 },
      { width: 30, height: 20 },
    ];
    const bounds = rect(0, 0, 100, 100);

    const wrap = getLayoutEngine("wrapFlow").place(boxes, natural, bounds, {
      alignment: "leading",
      spacing: 0,
    });
    assert.ok(wrap.ok);
    if (!wrap.ok) return;
    assert.deepEqual(
      wrap.value.placements.map((p) => p.frame),
      [rect(0, 0, 30, 10), rect(30, 0, 30, 20)],
    );

    const masonry = getLayoutEngine("masonry").measure(boxes, natural, { width: 100, height: null }, {
      columns: 1,
      spacing: 5,
    });
    assert.deepEqual(masonry, { ok: true, value: { width: 100, height: 35 } });
  });

  test("invalid config surfaces as a result, not a throw", () => {
    const res = getLayoutEngine("masonry").place([], natural, rect(0, 0, 10, 10), { columns: 0 });
    assert.equal(res.ok, false);
    if (res.ok) return;
    assert.equal(res.fatal.code, "TESSERA_INVALID_CONFIG");
  });
});
