import { assert, describe, test } from "@barkit/testkit";
import {
  type Geometry,
  type LayoutAlgorithm,
  computeLayout,
  createMarginRegistry,
  group,
  layoutFixed,
  leaf,
} from "../../index.js";
import { BAR, ZERO, hidden, sized } from "./fixtures.js";

/** Packs like fixed, then slides the content against the trailing edge (horizontal only). */
const alignEnd: LayoutAlgorithm = (axes, bounds, node, size, env) => {
  const packed = layoutFixed(axes, bounds, node, size, env);
  const shift = bounds.x + bounds.width - (packed.total.x + packed.total.width);
  const move = (g: Geometry): Geometry =>
    g.width === 0 && g.height === 0 ? g : { ...g, x: g.x + shift };
  return { geometries: packed.geometries.map(move), total: move(packed.total) };
};

describe("nested groups", () => {
  test("a nested group width caps the child's bounds", () => {
    const inner = group([leaf(sized(80, 20)), leaf(sized(80, 20))], { width: 100 });
    const res = computeLayout("horizontal", BAR, group([inner, leaf(sized(10, 20))]), null);
    assert.deepEqual(res.geometries, [
      { x: 0, y: 0, width: 80, height: 20 },
      { x: 80, y: 0, width: 20, height: 20 },
      { x: 100, y: 0, width: 10, height: 20 },
    ]);
    assert.deepEqual(res.total, { x: 0, y: 0, width: 110, height: 20 });
  });

  test("a nested group without a height inherits the enclosing one", () => {
    const inherits = group([leaf(sized(10, 20))]);
    const own = group([leaf(sized(10, 20))], { height: 8 });
    const res = computeLayout("horizontal", BAR, group([inherits, own], { height: 12 }), null);
    assert.deepEqual(res.geometries, [
      { x: 0, y: 0, width: 10, height: 12 },
      { x: 10, y: 0, width: 10, height: 8 },
    ]);
    assert.deepEqual(res.total, { x: 0, y: 0, width: 20, height: 12 });
  });

  test("flex cells hand their width to nested fixed groups", () => {
    const root = group([group([leaf(sized(50, 20))]), group([leaf(sized(500, 20))])], {
      layout: "flex",
    });
    const res = computeLayout("horizontal", BAR, root, null);
    assert.deepEqual(res.geometries, [
      { x: 0, y: 0, width: 50, height: 20 },
      { x: 150, y: 0, width: 150, height: 20 },
    ]);
    assert.deepEqual(res.total, { x: 0, y: 0, width: 300, height: 20 });
  });

  test("a flex group nested in fixed packing divides its own width", () => {
    const flex = group([leaf(sized(1, 20)), leaf(sized(1, 20))], { layout: "flex", width: 100 });
    const res = computeLayout("horizontal", BAR, group([flex, leaf(sized(10, 20))]), null);
    assert.deepEqual(res.geometries, [
      { x: 0, y: 0, width: 50, height: 20 },
      { x: 50, y: 0, width: 50, height: 20 },
      { x: 100, y: 0, width: 10, height: 20 },
    ]);
    assert.deepEqual(res.total, { x: 0, y: 0, width: 110, height: 20 });
  });

  test("group margins offset the nested layout and its successor", () => {
    const inner = group([leaf(sized(30, 20))]);
    const margins = createMarginRegistry();
    margins.set(inner, { left: 4, right: 6, top: 2, bottom: 3 });

    const root = group([leaf(sized(20, 20)), inner, leaf(sized(10, 20))]);
    const res = computeLayout("horizontal", BAR, root, null, margins);
    assert.deepEqual(res.geometries, [
      { x: 0, y: 0, width: 20, height: 20 },
      { x: 24, y: 2, width: 30, height: 15 },
      { x: 60, y: 0, width: 10, height: 20 },
    ]);
    assert.deepEqual(res.total, { x: 0, y: 0, width: 70, height: 20 });
  });

  test("group margins inset a nested group inside its flex cell", () => {
    const inner = group([leaf(sized(500, 20))]);
    const margins = createMarginRegistry();
    margins.set(inner, { left: 10, right: 10 });

    const bounds = { x: 0, y: 0, width: 200, height: 20 };
    const root = group([inner, leaf(sized(1, 20))], { layout: "flex" });
    const res = computeLayout("horizontal", bounds, root, null, margins);
    assert.deepEqual(res.geometries, [
      { x: 10, y: 0, width: 80, height: 20 },
      { x: 100, y: 0, width: 100, height: 20 },
    ]);
  });

  test("a vertical group inside a horizontal bar stacks its children", () => {
    const column = group([leaf(sized(30, 15)), leaf(sized(20, 15))], { orientation: "vertical" });
    const bounds = { x: 0, y: 0, width: 300, height: 40 };
    const res = computeLayout("horizontal", bounds, group([column, leaf(sized(10, 40))]), null);
    assert.deepEqual(res.geometries, [
      { x: 0, y: 0, width: 30, height: 15 },
      { x: 0, y: 15, width: 20, height: 15 },
      { x: 30, y: 0, width: 10, height: 40 },
    ]);
    assert.deepEqual(res.total, { x: 0, y: 0, width: 40, height: 40 });
  });

  test("leaf order is the pre-order traversal, with placeholders kept", () => {
    const root = group([
      leaf(sized(5, 5)),
      group([leaf(hidden()), group([leaf(sized(6, 5))]), leaf(sized(7, 5))]),
      leaf(hidden()),
    ]);
    const res = computeLayout("horizontal", BAR, root, null);
    assert.deepEqual(res.geometries, [
      { x: 0, y: 0, width: 5, height: 5 },
      ZERO,
      { x: 5, y: 0, width: 6, height: 5 },
      { x: 11, y: 0, width: 7, height: 5 },
      ZERO,
    ]);
  });
});

describe("trailing-aligned nested layouts", () => {
  test("a sole trailing-aligned child moves the total to the trailing edge", () => {
    const root = group([group([leaf(sized(30, 20))], { layout: alignEnd })]);
    const res = computeLayout("horizontal", BAR, root, null);
    assert.deepEqual(res.geometries, [{ x: 270, y: 0, width: 30, height: 20 }]);
    assert.deepEqual(res.total, { x: 270, y: 0, width: 30, height: 20 });
  });

  test("the origin does not advance past content that is not flush", () => {
    const root = group([group([leaf(sized(30, 20))], { layout: alignEnd }), leaf(sized(10, 20))]);
    const res = computeLayout("horizontal", BAR, root, null);
    assert.deepEqual(res.geometries, [
      { x: 270, y: 0, width: 30, height: 20 },
      { x: 0, y: 0, width: 10, height: 20 },
    ]);
    assert.deepEqual(res.total, { x: 0, y: 0, width: 40, height: 20 });
  });

  test("leading content anchors the total at the original origin", () => {
    const root = group([leaf(sized(20, 20)), group([leaf(sized(30, 20))], { layout: alignEnd })]);
    const res = computeLayout("horizontal", BAR, root, null);
    assert.deepEqual(res.geometries, [
      { x: 0, y: 0, width: 20, height: 20 },
      { x: 270, y: 0, width: 30, height: 20 },
    ]);
    assert.deepEqual(res.total, { x: 0, y: 0, width: 50, height: 20 });
  });
});
