import { suite, test } from "node:test";
import assert from "node:assert";
import { GridOccupancy } from "./occupancy.js";
import { DIRECTION } from "./direction.js";
import { InvalidFootprint, OccupancyConflict } from "./errors.js";
import { footprintsOverlap, SINGLE_CELL } from "./grid.js";
import { SeededRandom } from "../utils/random.js";

suite("core/occupancy.ts", () => {
	suite("occupy", () => {
		test("maps every covered cell to the entity", () => {
			const grid = new GridOccupancy<string>(5, 5);
			grid.occupy({ x: 1, y: 2 }, { width: 2, height: 2 }, "ogre");
			for (const [x, y] of [
				[1, 2],
				[2, 2],
				[1, 3],
				[2, 3],
			]) {
				assert.strictEqual(grid.entityAt(x, y), "ogre");
			}
			assert.strictEqual(grid.entityAt(3, 2), undefined);
			assert.strictEqual(grid.occupiedCount, 4);
			assert.strictEqual(grid.freeCount, 21);
		});

		test("throws OccupancyConflict and writes nothing on overlap", () => {
			const grid = new GridOccupancy<string>(5, 5);
			grid.occupy({ x: 2, y: 2 }, SINGLE_CELL, "slime");
			assert.throws(
				() => grid.occupy({ x: 1, y: 1 }, { width: 2, height: 2 }, "ogre"),
				(error: unknown) => {
					assert.ok(error instanceof OccupancyConflict);
					assert.deepStrictEqual(error.cell, { x: 2, y: 2 });
					assert.strictEqual(error.occupant, "slime");
					return true;
				}
			);
			assert.strictEqual(grid.entityAt(1, 1), undefined);
			assert.strictEqual(grid.has("ogre"), false);
		});

		test("refuses to place the same entity twice", () => {
			const grid = new GridOccupancy<string>(3, 3);
			grid.occupy({ x: 0, y: 0 }, SINGLE_CELL, "chest");
			assert.throws(() => grid.occupy({ x: 2, y: 2 }, SINGLE_CELL, "chest"), OccupancyConflict);
		});

		test("throws InvalidFootprint outside the grid or below 1x1", () => {
			const grid = new GridOccupancy<string>(4, 4);
			assert.throws(
				() => grid.occupy({ x: 3, y: 3 }, { width: 2, height: 1 }, "wide"),
				InvalidFootprint
			);
			assert.throws(() => grid.occupy({ x: -1, y: 0 }, SINGLE_CELL, "left"), InvalidFootprint);
			assert.throws(
				() => grid.occupy({ x: 0, y: 0 }, { width: 0, height: 1 }, "flat"),
				InvalidFootprint
			);
			assert.strictEqual(grid.occupiedCount, 0);
		});
	});

	suite("point lookups", () => {
		test("out-of-bounds cells are free and empty", () => {
			const grid = new GridOccupancy<string>(2, 2);
			assert.strictEqual(grid.isOccupied(-1, 0), false);
			assert.strictEqual(grid.isOccupied(2, 0), false);
			assert.strictEqual(grid.entityAt(0, 5), undefined);
		});
	});

	suite("vacate", () => {
		test("occupy then vacate restores the grid", () => {
			const grid = new GridOccupancy<string>(4, 4);
			grid.occupy({ x: 1, y: 1 }, { width: 2, height: 2 }, "ogre");
			assert.deepStrictEqual(grid.vacate({ x: 1, y: 1 }, { width: 2, height: 2 }), ["ogre"]);
			assert.strictEqual(grid.occupiedCount, 0);
			assert.strictEqual(grid.has("ogre"), false);
		});

		test("vacating empty cells is a no-op", () => {
			const grid = new GridOccupancy<string>(3, 3);
			grid.occupy({ x: 0, y: 0 }, SINGLE_CELL, "rock");
			assert.deepStrictEqual(grid.vacate({ x: 1, y: 1 }, { width: 2, height: 2 }), []);
			assert.strictEqual(grid.entityAt(0, 0), "rock");
		});

		test("an entity partly inside the area is removed whole", () => {
			const grid = new GridOccupancy<string>(4, 4);
			grid.occupy({ x: 0, y: 0 }, { width: 2, height: 2 }, "ogre");
			grid.occupy({ x: 3, y: 3 }, SINGLE_CELL, "rat");
			assert.deepStrictEqual(grid.vacate({ x: 1, y: 1 }, { width: 3, height: 3 }), [
				"ogre",
				"rat",
			]);
			assert.strictEqual(grid.entityAt(0, 0), undefined);
			assert.strictEqual(grid.freeCount, 16);
		});
	});

	suite("move", () => {
		test("a footprint may overlap its own old cells", () => {
			const grid = new GridOccupancy<string>(4, 1);
			grid.occupy({ x: 0, y: 0 }, { width: 2, height: 1 }, "cart");
			grid.move("cart", { x: 1, y: 0 });
			assert.strictEqual(grid.entityAt(0, 0), undefined);
			assert.strictEqual(grid.entityAt(1, 0), "cart");
			assert.strictEqual(grid.entityAt(2, 0), "cart");
		});

		test("a blocked move changes nothing", () => {
			const grid = new GridOccupancy<string>(3, 1);
			grid.occupy({ x: 0, y: 0 }, SINGLE_CELL, "hero");
			grid.occupy({ x: 1, y: 0 }, SINGLE_CELL, "wall");
			assert.throws(() => grid.move("hero", { x: 1, y: 0 }), OccupancyConflict);
			assert.deepStrictEqual(grid.footprintOf("hero"), {
				position: { x: 0, y: 0 },
				size: { width: 1, height: 1 },
			});
		});

		test("moving an unplaced entity throws", () => {
			const grid = new GridOccupancy<string>(2, 2);
			assert.throws(() => grid.move("ghost", { x: 0, y: 0 }), /not on the grid/);
		});
	});

	suite("adjacentOccupants", () => {
		test("reports each neighbour once with its side", () => {
			const grid = new GridOccupancy<string>(5, 5);
			grid.occupy({ x: 2, y: 1 }, SINGLE_CELL, "chest");
			grid.occupy({ x: 3, y: 2 }, SINGLE_CELL, "npc");
			grid.occupy({ x: 0, y: 2 }, { width: 2, height: 2 }, "ogre");
			assert.deepStrictEqual(grid.adjacentOccupants({ x: 2, y: 2 }, SINGLE_CELL), [
				{ entity: "chest", direction: DIRECTION.NORTH, cell: { x: 2, y: 1 } },
				{ entity: "npc", direction: DIRECTION.EAST, cell: { x: 3, y: 2 } },
				{ entity: "ogre", direction: DIRECTION.WEST, cell: { x: 1, y: 2 } },
			]);
		});

		test("skips diagonal cells", () => {
			const grid = new GridOccupancy<string>(3, 3);
			grid.occupy({ x: 0, y: 0 }, SINGLE_CELL, "corner");
			assert.deepStrictEqual(grid.adjacentOccupants({ x: 1, y: 1 }, SINGLE_CELL), []);
		});
	});

	suite("snapshot", () => {
		test("fromSnapshot rebuilds an equivalent grid", () => {
			const grid = new GridOccupancy<string>(4, 3);
			grid.occupy({ x: 0, y: 0 }, { width: 2, height: 1 }, "cart");
			grid.occupy({ x: 3, y: 2 }, SINGLE_CELL, "rat");
			const copy = GridOccupancy.fromSnapshot(grid.snapshot());
			assert.deepStrictEqual(copy.entries(), grid.entries());
			assert.strictEqual(copy.entityAt(1, 0), "cart");
			assert.strictEqual(copy.freeCount, 9);
		});
	});

	test("random footprint sequences never overlap", () => {
		const rng = new SeededRandom("overlap");
		const grid = new GridOccupancy<number>(12, 12);
		for (let id = 0; id < 300; id++) {
			const size = { width: rng.int(1, 3), height: rng.int(1, 3) };
			const pos = { x: rng.int(0, 11), y: rng.int(0, 11) };
			try {
				grid.occupy(pos, size, id);
			} catch (error) {
				assert.ok(error instanceof OccupancyConflict || error instanceof InvalidFootprint);
			}
			if (rng.chance(0.2)) grid.remove(rng.int(0, id));
		}
		const entries = grid.entries();
		for (let i = 0; i < entries.length; i++) {
			for (let j = i + 1; j < entries.length; j++) {
				assert.strictEqual(
					footprintsOverlap(
						entries[i].position,
						entries[i].size,
						entries[j].position,
						entries[j].size
					),
					false
				);
			}
		}
		const covered = entries.reduce((sum, e) => sum + e.size.width * e.size.height, 0);
		assert.strictEqual(grid.occupiedCount, covered);
	});
});
