import { suite, test } from "node:test";
import assert from "node:assert";
import { Floor, type FloorDefinition, type FloorOptions } from "./floor.js";
import { DIRECTION } from "./direction.js";
import { ENCOUNTER_STATE } from "./encounter.js";
import { SpawnConfigError } from "./errors.js";
import { createMobSpec } from "./mob.js";
import { createPlayer } from "./player.js";
import { CHEST_LOOT } from "./mining.js";
import { createSpawnTable, type SpawnRuleDefinition } from "./spawn-table.js";
import { between } from "../utils/assert.js";

const SLIME = createMobSpec({
	id: "slime",
	name: "Slime",
	maxHealth: { min: 1, max: 1 },
	attack: { min: 1, max: 1 },
	defense: { min: 0, max: 0 },
	gold: { min: 2, max: 2 },
	xp: { min: 1, max: 1 },
});

const options: FloorOptions = {
	bestiary: (mobId) => (mobId === "slime" ? SLIME : undefined),
};

function definition(extra: SpawnRuleDefinition[] = []): FloorDefinition {
	return {
		id: "test",
		name: "Test Floor",
		depth: 1,
		terrain: ["#####", "#S..D", "#...#", "#####"],
		spawnTable: createSpawnTable([
			{ type: "fixed", position: { x: 2, y: 1 }, target: { kind: "mob", mobId: "slime" } },
			{ type: "fixed", position: { x: 1, y: 2 }, target: { kind: "chest", variant: 0 } },
			{ type: "fixed", position: { x: 3, y: 2 }, target: { kind: "stairs" } },
			...extra,
		]),
		mobMultiplier: 1,
	};
}

suite("core/floor.ts", () => {
	suite("enter", () => {
		test("places the player on the entrance, then spawns", () => {
			const floor = Floor.enter({ definition: definition(), seed: 5, ...options });
			assert.deepStrictEqual(floor.playerPosition, { x: 1, y: 1 });
			assert.deepStrictEqual(
				floor.placements.map((placed) => placed.id),
				["door-1", "mob-2", "chest-3", "stairs-4"]
			);
			assert.strictEqual(floor.freeCount, 15);
			assert.deepStrictEqual(floor.spawnReport?.shortfalls, []);
			assert.deepStrictEqual(
				floor.adjacentToPlayer().map((placed) => placed.id),
				["chest-3", "mob-2"]
			);
			assert.strictEqual(floor.entityAt(1, 1), undefined);
			assert.strictEqual(floor.entityAt(2, 1)?.id, "mob-2");
		});

		test("an entrance on a wall is a config error", () => {
			const walled: FloorDefinition = {
				...definition(),
				terrain: ["###", "###", "###"],
				spawnTable: createSpawnTable([]),
			};
			assert.throws(
				() => Floor.enter({ definition: walled, seed: 1, ...options }),
				(error: unknown) => {
					assert.ok(error instanceof SpawnConfigError);
					assert.strictEqual(error.message, "[test] Entrance (1, 1) is not walkable");
					return true;
				}
			);
		});
	});

	suite("movePlayer", () => {
		test("reports what the player bumps into", () => {
			const floor = Floor.enter({ definition: definition(), seed: 5, ...options });

			const north = floor.movePlayer(DIRECTION.NORTH);
			assert.deepStrictEqual(north, { kind: "blocked", to: { x: 1, y: 0 } });

			const east = floor.movePlayer(DIRECTION.EAST);
			assert.strictEqual(east.kind, "combat");
			if (east.kind === "combat") assert.strictEqual(east.target.id, "mob-2");

			const south = floor.movePlayer(DIRECTION.SOUTH);
			assert.strictEqual(south.kind, "interact");
			if (south.kind === "interact") {
				assert.deepStrictEqual(south.target.entity, { kind: "chest", variant: 0 });
			}

			assert.deepStrictEqual(floor.playerPosition, { x: 1, y: 1 });
		});
	});

	suite("engage", () => {
		test("a defeated mob leaves the floor and the path opens", () => {
			const floor = Floor.enter({ definition: definition(), seed: 5, ...options });
			const fight = floor.engage("mob-2", createPlayer({ name: "Hero", maxHealth: 30, attack: 10 }));
			fight.begin();
			fight.attack();

			assert.strictEqual(fight.state, ENCOUNTER_STATE.VICTORY_PENDING);
			assert.deepStrictEqual(fight.rewards, { gold: 2, xp: 1, drops: [] });
			assert.strictEqual(floor.entityById("mob-2"), undefined);

			assert.deepStrictEqual(floor.movePlayer(DIRECTION.EAST), {
				kind: "moved",
				from: { x: 1, y: 1 },
				to: { x: 2, y: 1 },
			});
			assert.strictEqual(floor.movePlayer(DIRECTION.EAST).kind, "moved");
			assert.strictEqual(floor.movePlayer(DIRECTION.EAST).kind, "door");
			assert.strictEqual(floor.movePlayer(DIRECTION.SOUTH).kind, "stairs");
			assert.deepStrictEqual(floor.playerPosition, { x: 3, y: 1 });
		});

		test("only mobs can be engaged", () => {
			const floor = Floor.enter({ definition: definition(), seed: 5, ...options });
			assert.throws(
				() => floor.engage("chest-3", createPlayer({ maxHealth: 10, attack: 1 })),
				/No mob with id "chest-3" on floor test/
			);
		});

		test("an unknown mob spec is a config error", () => {
			const floor = Floor.enter({ definition: definition(), seed: 5, bestiary: () => undefined });
			assert.throws(
				() => floor.engage("mob-2", createPlayer({ maxHealth: 10, attack: 1 })),
				/\[test\] Unknown mob "slime"/
			);
		});
	});

	suite("open", () => {
		test("a chest pays out and leaves the floor", () => {
			const floor = Floor.enter({ definition: definition(), seed: 5, ...options });
			const before = floor.rngState;
			const hero = createPlayer({ name: "Hero", maxHealth: 10, attack: 1, magicFind: 50 });
			const { target, drops } = floor.open("chest-3", hero);

			assert.deepStrictEqual(target.entity, { kind: "chest", variant: 0 });
			assert.strictEqual(drops[0]?.item, "copper_coin");
			between(drops[0]?.quantity ?? 0, 2, 6);
			assert.ok(drops.every((drop) => CHEST_LOOT.has(drop.item)));
			assert.notStrictEqual(floor.rngState, before);
			assert.strictEqual(floor.entityById("chest-3"), undefined);
			assert.strictEqual(floor.freeCount, 16);
		});

		test("mining a rock yields its ore", () => {
			const floor = Floor.enter({
				definition: definition([
					{ type: "fixed", position: { x: 2, y: 2 }, target: { kind: "rock", rockType: "iron" } },
				]),
				seed: 5,
				...options,
			});
			const { target, drops } = floor.open("rock-5", createPlayer({ maxHealth: 10, attack: 1 }));

			assert.strictEqual(target.entity.kind, "rock");
			assert.strictEqual(drops[0]?.item, "iron_ore");
			between(drops[0]?.quantity ?? 0, 1, 3);
			assert.strictEqual(floor.entityAt(2, 2), undefined);
		});

		test("the same seed opens to the same drops", () => {
			const hero = createPlayer({ maxHealth: 10, attack: 1, magicFind: 150 });
			const first = Floor.enter({ definition: definition(), seed: 9, ...options });
			const second = Floor.enter({ definition: definition(), seed: 9, ...options });
			assert.deepStrictEqual(first.open("chest-3", hero).drops, second.open("chest-3", hero).drops);
		});

		test("only chests and rocks can be opened", () => {
			const floor = Floor.enter({ definition: definition(), seed: 5, ...options });
			const hero = createPlayer({ maxHealth: 10, attack: 1 });
			assert.throws(() => floor.open("mob-2", hero), /Nothing to open with id "mob-2" on floor test/);
			assert.throws(() => floor.open("stairs-4", hero), /Nothing to open with id "stairs-4"/);
			floor.open("chest-3", hero);
			assert.throws(() => floor.open("chest-3", hero), /Nothing to open with id "chest-3"/);
			assert.strictEqual(floor.entityById("mob-2")?.id, "mob-2");
		});
	});

	test("the player cannot be removed", () => {
		const floor = Floor.enter({ definition: definition(), seed: 5, ...options });
		assert.strictEqual(floor.removeEntity("player"), false);
		assert.strictEqual(floor.removeEntity("chest-3"), true);
		assert.strictEqual(floor.removeEntity("chest-3"), false);
	});

	suite("snapshot", () => {
		const extra: SpawnRuleDefinition[] = [
			{
				type: "ranged",
				count: { min: 1, max: 2 },
				pool: [{ target: { kind: "rock" }, weight: 1 }],
			},
		];

		test("restore rebuilds the floor and resumes the random stream", () => {
			const wide = createMobSpec({ ...SLIME, maxHealth: { min: 5, max: 50 }, loot: [] });
			const wideOptions: FloorOptions = { bestiary: (mobId) => (mobId === "slime" ? wide : undefined) };
			const original = Floor.enter({ definition: definition(extra), seed: 8, ...wideOptions });
			const saved = original.snapshot();
			const restored = Floor.restore(saved, definition(extra), wideOptions);

			assert.deepStrictEqual(restored.placements, original.placements);
			assert.strictEqual(restored.rngState, original.rngState);
			assert.deepStrictEqual(restored.snapshot(), saved);
			assert.strictEqual(restored.spawnReport, undefined);

			const hero = createPlayer({ maxHealth: 30, attack: 10 });
			assert.deepStrictEqual(
				restored.engage("mob-2", hero).mob.stats,
				original.engage("mob-2", hero).mob.stats
			);
		});

		test("editing a snapshot leaves the floor alone", () => {
			const floor = Floor.enter({ definition: definition(), seed: 5, ...options });
			const saved = floor.snapshot();
			const restored = Floor.restore(saved, definition(), options);
			for (const placed of [...saved.placements, ...floor.placements]) {
				if (placed.entity.kind === "mob") placed.entity.mobId = "goblin";
			}
			const listed = floor.entityAt(2, 1)?.entity;
			if (listed?.kind === "mob") listed.mobId = "goblin";

			assert.deepStrictEqual(floor.entityById("mob-2")?.entity, { kind: "mob", mobId: "slime" });
			assert.deepStrictEqual(restored.entityById("mob-2")?.entity, {
				kind: "mob",
				mobId: "slime",
			});
		});

		test("restore refuses another floor's snapshot", () => {
			const saved = Floor.enter({ definition: definition(), seed: 5, ...options }).snapshot();
			assert.throws(
				() => Floor.restore({ ...saved, floorId: "elsewhere" }, definition(), options),
				/\[test\] Snapshot is for floor "elsewhere"/
			);
			assert.throws(
				() => Floor.restore({ ...saved, width: 9 }, definition(), options),
				/Snapshot is 9x4, terrain is 5x4/
			);
		});
	});
});
