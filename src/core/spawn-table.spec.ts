import { suite, test } from "node:test";
import assert from "node:assert";
import { createSpawnTable, phaseOf } from "./spawn-table.js";
import { SpawnConfigError } from "./errors.js";

suite("core/spawn-table.ts", () => {
	suite("createSpawnTable", () => {
		test("derives categories from targets", () => {
			const table = createSpawnTable([
				{ type: "guaranteed", target: { kind: "stairs" }, count: 1 },
				{ type: "chance", target: { kind: "npc", mobId: "merchant" }, chance: 0.5 },
				{
					type: "ranged",
					count: { min: 1, max: 2 },
					pool: [{ target: { kind: "mob", mobId: "slime" }, weight: 1 }],
				},
			]);
			assert.deepStrictEqual(
				table.rules.map((rule) => (rule.type === "fixed" ? "fixed" : rule.category)),
				["obstacle", "npc", "mob"]
			);
		});

		test("rejects inverted and negative ranges", () => {
			assert.throws(
				() =>
					createSpawnTable(
						[
							{
								type: "ranged",
								count: { min: 3, max: 1 },
								pool: [{ target: { kind: "chest" }, weight: 1 }],
							},
						],
						"cave"
					),
				(error: unknown) => {
					assert.ok(error instanceof SpawnConfigError);
					assert.strictEqual(
						error.message,
						"[cave] rule 0 (ranged): inverted count range 3..1"
					);
					return true;
				}
			);
			assert.throws(
				() =>
					createSpawnTable([
						{
							type: "ranged",
							count: { min: -1, max: 2 },
							pool: [{ target: { kind: "chest" }, weight: 1 }],
						},
					]),
				/negative count range -1..2/
			);
			assert.throws(
				() => createSpawnTable([{ type: "guaranteed", target: { kind: "chest" }, count: -2 }]),
				/count must be a non-negative integer/
			);
		});

		test("rejects chances outside [0, 1]", () => {
			assert.throws(
				() => createSpawnTable([{ type: "chance", target: { kind: "stairs" }, chance: 1.5 }]),
				/chance must be within \[0, 1\]/
			);
		});

		test("rejects bad pools", () => {
			assert.throws(
				() => createSpawnTable([{ type: "ranged", count: { min: 1, max: 1 }, pool: [] }]),
				/empty pool/
			);
			assert.throws(
				() =>
					createSpawnTable([
						{
							type: "ranged",
							count: { min: 1, max: 1 },
							pool: [{ target: { kind: "chest" }, weight: 0 }],
						},
					]),
				/pool weights sum to zero/
			);
			assert.throws(
				() =>
					createSpawnTable([
						{
							type: "ranged",
							count: { min: 1, max: 1 },
							pool: [{ target: { kind: "chest" }, weight: -1 }],
						},
					]),
				/chest has a negative weight/
			);
			assert.throws(
				() =>
					createSpawnTable([
						{
							type: "ranged",
							count: { min: 1, max: 1 },
							pool: [
								{ target: { kind: "chest" }, weight: 1 },
								{ target: { kind: "mob", mobId: "slime" }, weight: 1 },
							],
						},
					]),
				/pool mixes categories obstacle, mob/
			);
		});

		test("rejects malformed targets", () => {
			assert.throws(
				() =>
					createSpawnTable([
						{ type: "guaranteed", target: { kind: "chest", variant: 4 }, count: 1 },
					]),
				/chest variant must be 0..3/
			);
			assert.throws(
				() =>
					createSpawnTable([{ type: "guaranteed", target: { kind: "mob", mobId: " " }, count: 1 }]),
				/mob needs a mob id/
			);
			assert.throws(
				() => createSpawnTable([{ type: "guaranteed", target: { kind: "door" }, count: 1 }]),
				/doors come from terrain or fixed rules/
			);
		});

		test("accepts doors in fixed rules", () => {
			const table = createSpawnTable([
				{ type: "fixed", position: { x: 0, y: 0 }, target: { kind: "door" } },
			]);
			assert.strictEqual(table.rules.length, 1);
		});
	});

	suite("ordered", () => {
		test("sorts by phase and keeps table order inside a phase", () => {
			const table = createSpawnTable([
				{ type: "chance", target: { kind: "mob", mobId: "goblin" }, chance: 0.5 },
				{ type: "guaranteed", target: { kind: "mob", mobId: "slime" }, count: 1 },
				{ type: "guaranteed", target: { kind: "npc", mobId: "merchant" }, count: 1 },
				{ type: "guaranteed", target: { kind: "chest" }, count: 1 },
				{ type: "fixed", position: { x: 1, y: 1 }, target: { kind: "stairs" } },
				{ type: "guaranteed", target: { kind: "rock" }, count: 1 },
			]);
			assert.deepStrictEqual(
				table.ordered().map(({ index }) => index),
				[4, 3, 5, 2, 1, 0]
			);
			assert.deepStrictEqual(
				table.ordered().map(({ rule }) => phaseOf(rule)),
				[0, 1, 1, 2, 3, 4]
			);
		});
	});
});
