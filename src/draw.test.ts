import { describe, it } from "node:test";
import assert from "node:assert";

import { createDrawSeed, createSeededRandom, selectWinners, shuffle } from "./draw";
import { sequenceRandom } from "./test-support";

const POOL = ["u1", "u2", "u3", "u4", "u5"];

describe("selectWinners", () => {
  it("returns empty when the pool is empty", () => {
    assert.deepStrictEqual(selectWinners([], 3), []);
  });

  it("returns empty for a non-positive place count", () => {
    assert.deepStrictEqual(selectWinners(POOL, 0), []);
    assert.deepStrictEqual(selectWinners(POOL, -2), []);
  });

  it("narrows requested places to the pool size", () => {
    const winners = selectWinners(["u1", "u2"], 5);
    assert.strictEqual(winners.length, 2);
    assert.deepStrictEqual(
      winners.map((winner) => winner.place),
      [1, 2],
    );
    assert.deepStrictEqual(
      winners.map((winner) => winner.participant).sort(),
      ["u1", "u2"],
    );
  });

  it("assigns dense places to distinct pool members", () => {
    for (let round = 0; round < 50; round++) {
      const winners = selectWinners(POOL, 3);
      assert.deepStrictEqual(
        winners.map((winner) => winner.place),
        [1, 2, 3],
      );
      const picked = winners.map((winner) => winner.participant);
      assert.strictEqual(new Set(picked).size, 3);
      assert.ok(picked.every((userId) => POOL.includes(userId)));
    }
  });

  it("draws in sample order from the injected random source", () => {
    const winners = selectWinners(["a", "b", "c", "d"], 2, sequenceRandom([0.5, 0]));
    assert.deepStrictEqual(winners, [
      { participant: "c", place: 1 },
      { participant: "b", place: 2 },
    ]);
  });

  it("clamps out-of-range random values", () => {
    const winners = selectWinners(["a", "b", "c"], 1, () => 1);
    assert.deepStrictEqual(winners, [{ participant: "c", place: 1 }]);
  });

  it("does not mutate the pool", () => {
    const pool = ["a", "b", "c"];
    selectWinners(pool, 3, sequenceRandom([0.9]));
    assert.deepStrictEqual(pool, ["a", "b", "c"]);
  });

  it("covers every member over many draws", () => {
    const seen = new Set<string>();
    for (let round = 0; round < 200; round++) {
      const [first] = selectWinners(POOL, 1);
      if (first) {
        seen.add(first.participant);
      }
    }
    assert.strictEqual(seen.size, POOL.length);
  });
});

describe("createSeededRandom", () => {
  it("replays the same sequence for the same seed", () => {
    const a = createSeededRandom("test-seed");
    const b = createSeededRandom("test-seed");
    const first = [a(), a(), a()];
    assert.deepStrictEqual(first, [b(), b(), b()]);
    assert.ok(first.every((value) => value >= 0 && value < 1));
  });

  it("diverges for different seeds", () => {
    const a = createSeededRandom("seed-a");
    const b = createSeededRandom("seed-b");
    assert.notStrictEqual(a(), b());
  });

  it("makes a seeded draw reproducible", () => {
    const seed = createDrawSeed();
    assert.match(seed, /^[0-9a-f]{32}$/);
    const first = selectWinners(POOL, 3, createSeededRandom(seed));
    const replay = selectWinners(POOL, 3, createSeededRandom(seed));
    assert.deepStrictEqual(first, replay);
  });
});

describe("shuffle", () => {
  it("permutes with the injected random source", () => {
    assert.deepStrictEqual(shuffle([1, 2, 3, 4], () => 0), [2, 3, 4, 1]);
  });

  it("keeps every element exactly once", () => {
    const result = shuffle(POOL);
    assert.deepStrictEqual([...result].sort(), [...POOL].sort());
  });
});
