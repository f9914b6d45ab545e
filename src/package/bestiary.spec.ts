import { suite, test, beforeEach, after } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadBestiary, parseMobFile } from "./bestiary.js";
import { BESTIARY, clearBestiary, getMobSpec } from "../registry/bestiary.js";
import { SpawnConfigError } from "../core/errors.js";

const GOBLIN = `
mob:
  id: goblin
  name: Goblin
  maxHealth: [18, 24]
  attack: { min: 4, max: 6 }
  defense: 5
  loot:
    - { item: copper_coin, numerator: 1, denominator: 2, quantity: [1, 3] }
    - { item: dagger, numerator: 1, denominator: 20 }
`;

suite("package/bestiary.ts", () => {
	beforeEach(() => {
		clearBestiary();
	});

	after(() => {
		clearBestiary();
	});

	suite("parseMobFile", () => {
		test("reads ranges in every form and fills defaults", () => {
			const spec = parseMobFile(GOBLIN, "goblin.yaml");
			assert.strictEqual(spec.id, "goblin");
			assert.strictEqual(spec.quality, "normal");
			assert.deepStrictEqual(spec.maxHealth, { min: 18, max: 24 });
			assert.deepStrictEqual(spec.attack, { min: 4, max: 6 });
			assert.deepStrictEqual(spec.defense, { min: 5, max: 5 });
			assert.deepStrictEqual(spec.gold, { min: 0, max: 0 });
			assert.deepStrictEqual(spec.size, { width: 1, height: 1 });
			assert.deepStrictEqual(
				spec.loot.entries.map((entry) => [entry.item, entry.quantity]),
				[
					["copper_coin", { min: 1, max: 3 }],
					["dagger", { min: 1, max: 1 }],
				]
			);
		});

		test("requires the mob root", () => {
			assert.throws(
				() => parseMobFile("monster:\n  id: x\n", "bad.yaml"),
				(error: unknown) => {
					assert.ok(error instanceof SpawnConfigError);
					assert.strictEqual(error.message, "[bad.yaml] Missing 'mob' root");
					return true;
				}
			);
		});

		test("rejects an unknown quality", () => {
			assert.throws(
				() => parseMobFile(GOBLIN.replace("name: Goblin", "name: Goblin\n  quality: epic"), "g"),
				/\[goblin\] quality must be one of normal, boss/
			);
		});

		test("rejects a malformed range", () => {
			assert.throws(
				() => parseMobFile(GOBLIN.replace("defense: 5", "defense: high"), "g"),
				/\[goblin\] defense must be a number, a \[min, max\] pair or a \{ min, max \} mapping/
			);
		});
	});

	suite("loadBestiary", () => {
		test("loads the bundled mobs", async () => {
			const count = await loadBestiary(join(process.cwd(), "data", "mobs"));
			assert.strictEqual(count, 5);
			assert.strictEqual(BESTIARY.size, 5);
			const king = getMobSpec("dwarf_king");
			assert.strictEqual(king?.quality, "boss");
			assert.deepStrictEqual(king?.size, { width: 2, height: 2 });
			assert.ok(Object.isFrozen(king));
		});

		test("skips drafts and non-YAML files", async () => {
			const directory = await mkdtemp(join(tmpdir(), "undercroft-mobs-"));
			try {
				await writeFile(join(directory, "goblin.yaml"), GOBLIN, "utf-8");
				await writeFile(join(directory, "_draft.yaml"), GOBLIN, "utf-8");
				await writeFile(join(directory, "notes.txt"), "not a mob", "utf-8");
				assert.strictEqual(await loadBestiary(directory), 1);
				assert.deepStrictEqual([...BESTIARY.keys()], ["goblin"]);
			} finally {
				await rm(directory, { recursive: true, force: true });
			}
		});
	});
});
