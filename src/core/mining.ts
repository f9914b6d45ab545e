/**
 * Loot carried by chests and rocks.
 *
 * Every chest shares one table. Each rock type always yields its ore and
 * rarely an upgrade stone. `Floor.open` rolls these with the player's
 * magic find and takes the entity off the floor.
 *
 * @module core/mining
 */

import type { DungeonEntity, RockType } from "./entity.js";
import { createLootTable, type LootTable } from "./loot.js";

const UPGRADE_STONE = {
	item: "quality_upgrade_stone",
	numerator: 1,
	denominator: 100,
	quantity: { min: 1, max: 1 },
};

export const CHEST_LOOT: LootTable = createLootTable(
	[
		{ item: "copper_coin", numerator: 1, denominator: 1, quantity: { min: 2, max: 6 } },
		{ item: "health_potion", numerator: 1, denominator: 2, quantity: { min: 1, max: 1 } },
		{ ...UPGRADE_STONE, denominator: 10 },
	],
	"chest"
);

function rockLoot(rockType: RockType, ore: string, max: number): LootTable {
	return createLootTable(
		[{ item: ore, numerator: 1, denominator: 1, quantity: { min: 1, max } }, UPGRADE_STONE],
		`rock:${rockType}`
	);
}

export const ROCK_LOOT: Readonly<Record<RockType, LootTable>> = Object.freeze({
	coal: rockLoot("coal", "coal", 2),
	copper: rockLoot("copper", "copper_ore", 3),
	iron: rockLoot("iron", "iron_ore", 3),
	gold: rockLoot("gold", "gold_ore", 3),
});

/**
 * The table an entity yields when opened, or undefined for anything that
 * cannot be opened.
 */
export function lootTableOf(entity: DungeonEntity): LootTable | undefined {
	switch (entity.kind) {
		case "chest":
			return CHEST_LOOT;
		case "rock":
			return ROCK_LOOT[entity.rockType];
		default:
			return undefined;
	}
}
