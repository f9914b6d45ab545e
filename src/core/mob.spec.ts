import { suite, test } from "node:test";
import assert from "node:assert";
import { attackRangeFromStat, createMobSpec, instantiateMob, scaleMobSpec } from "./mob.js";
import { SpawnConfigError } from "./errors.js";
import { ScriptedRandom } from "../utils/scripted-random.js";

const RAT = createMobSpec({
	id: "rat",
	name: "Rat",
	maxHealth: { min: 10, max: 20 },
	attack: { min: 4, max: 4 },
	defense: { min: 0, max: 2 },
	gold: { min: 5, max: 5 },
	xp: { min: 1, max: 3 },
	loot: [{ item: "tail", numerator: 1, denominator: 4, quantity: { min: 1, max: 1 } }],
});

suite("core/mob.ts", () => {
	suite("createMobSpec", () => {
		test("fills defaults", () => {
			assert.strictEqual(RAT.quality, "normal");
			assert.deepStrictEqual(RAT.size, { width: 1, height: 1 });
			assert.strictEqual(RAT.loot.dropChancePercent("tail"), 25);
		});

		test("rejects a max health range starting at 0", () => {
			assert.throws(
				() =>
					createMobSpec({
						id: "rat",
						name: "Rat",
						maxHealth: { min: 0, max: 5 },
						attack: { min: 1, max: 1 },
						defense: { min: 0, max: 0 },
						gold: { min: 0, max: 0 },
						xp: { min: 0, max: 0 },
					}),
				(error: unknown) => {
					assert.ok(error instanceof SpawnConfigError);
					assert.strictEqual(
						error.message,
						"[rat] maxHealth must be an integer range starting at 1 or more, got 0..5"
					);
					return true;
				}
			);
		});

		test("rejects inverted ranges, bad sizes and blank names", () => {
			const base = {
				id: "rat",
				name: "Rat",
				maxHealth: { min: 1, max: 1 },
				attack: { min: 1, max: 1 },
				defense: { min: 0, max: 0 },
				gold: { min: 0, max: 0 },
				xp: { min: 0, max: 0 },
			};
			assert.throws(
				() => createMobSpec({ ...base, gold: { min: 5, max: 2 } }),
				/gold must be an integer range starting at 0 or more, got 5..2/
			);
			assert.throws(
				() => createMobSpec({ ...base, size: { width: 0, height: 1 } }),
				/\[rat\] Invalid size 0x1/
			);
			assert.throws(() => createMobSpec({ ...base, name: "  " }), /needs an id and a name/);
		});
	});

	suite("instantiateMob", () => {
		test("rolls health, attack, defense, gold and xp in order", () => {
			const rng = new ScriptedRandom([0.5, 0, 0.99, 0, 0]);
			const mob = instantiateMob(RAT, rng);
			assert.strictEqual(rng.draws, 5);
			assert.deepStrictEqual(mob.stats, {
				health: 15,
				maxHealth: 15,
				attack: { min: 3, max: 5 },
				defense: 2,
				goldFind: 0,
				magicFind: 0,
			});
			assert.strictEqual(mob.baseGold, 5);
			assert.strictEqual(mob.baseXp, 1);
			assert.strictEqual(mob.loot, RAT.loot);
			assert.strictEqual(mob.specId, "rat");
		});
	});

	suite("scaleMobSpec", () => {
		test("multiplies and rounds every stat range", () => {
			const scaled = scaleMobSpec(RAT, 1.5);
			assert.deepStrictEqual(
				{
					maxHealth: scaled.maxHealth,
					attack: scaled.attack,
					defense: scaled.defense,
					gold: scaled.gold,
					xp: scaled.xp,
				},
				{
					maxHealth: { min: 15, max: 30 },
					attack: { min: 6, max: 6 },
					defense: { min: 0, max: 3 },
					gold: { min: 8, max: 8 },
					xp: { min: 2, max: 5 },
				}
			);
			assert.strictEqual(scaled.loot, RAT.loot);
		});

		test("a multiplier of 1 returns the spec itself", () => {
			assert.strictEqual(scaleMobSpec(RAT, 1), RAT);
		});

		test("max health never scales below 1", () => {
			assert.deepStrictEqual(scaleMobSpec(RAT, 0.01).maxHealth, { min: 1, max: 1 });
		});
	});

	test("attackRangeFromStat", () => {
		assert.deepStrictEqual(attackRangeFromStat(8, 0.25), { min: 6, max: 10 });
		assert.deepStrictEqual(attackRangeFromStat(0, 0.25), { min: 1, max: 1 });
	});
});
