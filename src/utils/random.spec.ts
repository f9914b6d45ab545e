import { suite, test } from "node:test";
import assert from "node:assert";
import { hashSeed, randomInt, rollRange, SeededRandom } from "./random.js";
import { ScriptedRandom } from "./scripted-random.js";
import { between } from "./assert.js";

suite("utils/random.ts", () => {
	suite("SeededRandom", () => {
		test("same seed gives the same sequence", () => {
			const a = new SeededRandom("cave-1");
			const b = new SeededRandom("cave-1");
			for (let i = 0; i < 20; i++) {
				assert.strictEqual(a.next(), b.next());
			}
		});

		test("different seeds give different sequences", () => {
			const a = new SeededRandom(1);
			const b = new SeededRandom(2);
			const first = [a.next(), a.next(), a.next()];
			const second = [b.next(), b.next(), b.next()];
			assert.notDeepStrictEqual(first, second);
		});

		test("restore rewinds to a saved state", () => {
			const rng = new SeededRandom("rewind");
			const saved = rng.state;
			const first = [rng.next(), rng.next()];
			rng.restore(saved);
			assert.strictEqual(rng.state, saved);
			assert.deepStrictEqual([rng.next(), rng.next()], first);
		});

		test("a zero seed is bumped to 1", () => {
			assert.strictEqual(new SeededRandom(0).state, 1);
		});

		test("fromState resumes the same stream", () => {
			const original = new SeededRandom(7);
			original.next();
			original.next();
			const saved = original.state;
			const expected = [original.next(), original.int(1, 100), original.next()];

			const resumed = SeededRandom.fromState(saved);
			assert.deepStrictEqual(
				[resumed.next(), resumed.int(1, 100), resumed.next()],
				expected
			);
		});

		test("next stays in [0, 1)", () => {
			const rng = new SeededRandom("bounds");
			for (let i = 0; i < 1000; i++) {
				const value = rng.next();
				assert.ok(value >= 0 && value < 1, `${value} out of range`);
			}
		});

		test("int covers both bounds", () => {
			const rng = new SeededRandom("dice");
			const seen = new Set<number>();
			for (let i = 0; i < 1000; i++) {
				const roll = rng.int(1, 6);
				between(roll, 1, 6);
				seen.add(roll);
			}
			assert.deepStrictEqual([...seen].sort(), [1, 2, 3, 4, 5, 6]);
		});

		test("chance at the extremes does not draw", () => {
			const rng = new SeededRandom(99);
			const before = rng.state;
			assert.strictEqual(rng.chance(0), false);
			assert.strictEqual(rng.chance(1), true);
			assert.strictEqual(rng.state, before);
		});

		test("pick from an empty list is undefined", () => {
			assert.strictEqual(new SeededRandom(3).pick([]), undefined);
		});
	});

	suite("hashSeed", () => {
		test("empty string hashes to the FNV offset basis", () => {
			assert.strictEqual(hashSeed(""), 2166136261);
		});

		test("is stable", () => {
			assert.strictEqual(hashSeed("undercroft"), hashSeed("undercroft"));
		});
	});

	suite("randomInt", () => {
		test("maps draws onto the inclusive range", () => {
			const rng = new ScriptedRandom([0, 0.5, 0.999]);
			assert.strictEqual(randomInt(rng, 2, 5), 2);
			assert.strictEqual(randomInt(rng, 2, 5), 4);
			assert.strictEqual(randomInt(rng, 2, 5), 5);
		});

		test("rejects inverted and fractional bounds", () => {
			const rng = new ScriptedRandom([], 0);
			assert.throws(() => randomInt(rng, 5, 1), RangeError);
			assert.throws(() => randomInt(rng, 1.5, 2), RangeError);
		});

		test("rollRange with a single value always returns it", () => {
			const rng = new SeededRandom("fixed");
			for (let i = 0; i < 10; i++) {
				assert.strictEqual(rollRange(rng, { min: 4, max: 4 }), 4);
			}
		});
	});
});
