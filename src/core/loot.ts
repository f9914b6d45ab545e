/**
 * Loot tables: independent-trial drop resolution.
 *
 * Each entry drops with probability `numerator / denominator`, decided by
 * an integer draw in `[1, denominator]`. Entries never influence each
 * other. A roll yields `(item, quantity)` pairs only; turning an item id
 * into an item is the caller's business.
 *
 * Magic find
 * - In `"bonus-rolls"` mode every full 100 points of magic find grants one
 *   extra roll per entry, and the remainder is a percent chance of one
 *   more. The extra-roll count is drawn once per `roll` call.
 * - An entry that hits on several rolls still drops once, keeping the
 *   larger quantity.
 * - `"none"` mode ignores magic find entirely.
 *
 * @example
 * ```typescript
 * const table = createLootTable([
 * 	{ item: "copper_ore", numerator: 1, denominator: 4, quantity: { min: 1, max: 3 } },
 * ]);
 * table.roll(150, rng); // e.g. [{ item: "copper_ore", quantity: 2 }]
 * ```
 *
 * @module core/loot
 */

import { SpawnConfigError } from "./errors.js";
import { CONFIG, type MagicFindMode } from "../registry/config.js";
import type { RandomSource } from "../utils/random.js";
import type { IntRange } from "../utils/types.js";

export interface LootEntry {
	item: string;
	numerator: number;
	denominator: number;
	quantity: IntRange;
}

export interface LootDrop {
	item: string;
	quantity: number;
}

export interface LootRollOptions {
	magicFindMode?: MagicFindMode;
}

/**
 * Extra rolls granted by magic find: `floor(mf / 100)` guaranteed plus one
 * more with `(mf mod 100)`% chance.
 */
export function bonusRolls(magicFind: number, rng: RandomSource): number {
	if (magicFind <= 0) return 0;
	const whole = Math.floor(magicFind);
	const guaranteed = Math.floor(whole / 100);
	const remainder = whole % 100;
	if (remainder > 0 && rng.int(1, 100) <= remainder) {
		return guaranteed + 1;
	}
	return guaranteed;
}

export class LootTable {
	private readonly _entries: ReadonlyArray<Readonly<LootEntry>>;

	/**
	 * Use `createLootTable` to build a validated table.
	 */
	constructor(entries: ReadonlyArray<LootEntry>) {
		this._entries = entries.map((entry) =>
			Object.freeze({
				item: entry.item,
				numerator: entry.numerator,
				denominator: entry.denominator,
				quantity: Object.freeze({ ...entry.quantity }),
			})
		);
	}

	get entries(): ReadonlyArray<Readonly<LootEntry>> {
		return this._entries;
	}

	get isEmpty(): boolean {
		return this._entries.length === 0;
	}

	has(item: string): boolean {
		return this._entries.some((entry) => entry.item === item);
	}

	/**
	 * Chance of a single roll dropping `item`, as a percentage.
	 */
	dropChancePercent(item: string): number | undefined {
		const entry = this._entries.find((e) => e.item === item);
		if (!entry) return undefined;
		return (entry.numerator / entry.denominator) * 100;
	}

	/**
	 * Rolls every entry independently.
	 *
	 * @param magicFind The looter's magic find bonus, in percent points
	 * @param rng Random source
	 */
	roll(
		magicFind: number,
		rng: RandomSource,
		options: LootRollOptions = {}
	): LootDrop[] {
		const mode = options.magicFindMode ?? CONFIG.loot.magicFindMode;
		const rolls = 1 + (mode === "bonus-rolls" ? bonusRolls(magicFind, rng) : 0);
		const drops: LootDrop[] = [];

		for (const entry of this._entries) {
			let best: LootDrop | undefined;
			for (let i = 0; i < rolls; i++) {
				if (rng.int(1, entry.denominator) > entry.numerator) continue;
				const quantity = rng.int(entry.quantity.min, entry.quantity.max);
				if (!best || quantity > best.quantity) {
					best = { item: entry.item, quantity };
				}
			}
			if (best) drops.push(best);
		}

		return drops;
	}
}

/**
 * Validates loot entries and builds a table.
 *
 * @param source Optional name used in error messages (e.g. a mob id)
 * @throws {SpawnConfigError} on a zero/negative denominator, a numerator
 * outside `[0, denominator]`, a bad quantity range or a repeated item
 */
export function createLootTable(
	entries: ReadonlyArray<LootEntry>,
	source?: string
): LootTable {
	const seen = new Set<string>();
	for (const entry of entries) {
		if (typeof entry.item !== "string" || entry.item.trim() === "") {
			throw new SpawnConfigError("Loot entry is missing an item id", source);
		}
		if (seen.has(entry.item)) {
			throw new SpawnConfigError(`Loot item "${entry.item}" is listed twice`, source);
		}
		seen.add(entry.item);
		if (!Number.isInteger(entry.denominator) || entry.denominator <= 0) {
			throw new SpawnConfigError(
				`Loot item "${entry.item}" needs a positive integer denominator`,
				source
			);
		}
		if (
			!Number.isInteger(entry.numerator) ||
			entry.numerator < 0 ||
			entry.numerator > entry.denominator
		) {
			throw new SpawnConfigError(
				`Loot item "${entry.item}" numerator must be between 0 and ${entry.denominator}`,
				source
			);
		}
		const { min, max } = entry.quantity;
		if (!Number.isInteger(min) || !Number.isInteger(max) || min < 0 || min > max) {
			throw new SpawnConfigError(
				`Loot item "${entry.item}" has an invalid quantity range ${min}..${max}`,
				source
			);
		}
	}
	return new LootTable(entries);
}

export const EMPTY_LOOT_TABLE = new LootTable([]);
