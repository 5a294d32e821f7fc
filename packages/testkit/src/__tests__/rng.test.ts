import { assert, createRng, describe, test } from "../index.js";

describe("createRng", () => {
  test("same seed yields the same sequence", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 16; i++) {
      assert.equal(a.next(), b.next());
    }
  });

  test("next stays within [0, 1)", () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      assert.ok(v >= 0 && v < 1, `out of range: ${v}`);
    }
  });

  test("int is inclusive on both ends and accepts swapped bounds", () => {
    const rng = createRng(3);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = rng.int(5, 2);
      assert.ok(v >= 2 && v <= 5, `out of range: ${v}`);
      seen.add(v);
    }
    assert.deepEqual([...seen].sort(), [2, 3, 4, 5]);
  });

  test("chance(0) never fires and chance(1) always fires", () => {
    const rng = createRng(11);
    for (let i = 0; i < 100; i++) {
      assert.equal(rng.chance(0), false);
      assert.equal(rng.chance(1), true);
    }
  });
});
