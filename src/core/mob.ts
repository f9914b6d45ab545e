/**
 * Mob specs and instances.
 *
 * A `MobSpec` is a bestiary record: ranges for every stat plus a loot
 * table. `instantiateMob` rolls one concrete `MobInstance` from it. Specs
 * are immutable and shared; instances belong to the mob on the floor and
 * live as long as it does.
 *
 * @module core/mob
 */

import type { CombatantStats } from "./combat.js";
import { SpawnConfigError } from "./errors.js";
import { isValidSize, SINGLE_CELL, type GridSize } from "./grid.js";
import { createLootTable, type LootEntry, type LootTable } from "./loot.js";
import { rollRange, type RandomSource } from "../utils/random.js";
import type { IntRange } from "../utils/types.js";

export type MobQuality = "normal" | "boss";
export const MOB_QUALITIES: ReadonlyArray<MobQuality> = ["normal", "boss"];

export interface MobSpec {
	readonly id: string;
	readonly name: string;
	readonly quality: MobQuality;
	readonly maxHealth: IntRange;
	/** Range the mob's attack stat is rolled from. */
	readonly attack: IntRange;
	readonly defense: IntRange;
	readonly gold: IntRange;
	readonly xp: IntRange;
	readonly loot: LootTable;
	readonly size: GridSize;
}

export interface MobInstance {
	readonly specId: string;
	readonly name: string;
	stats: CombatantStats;
	readonly baseGold: number;
	readonly baseXp: number;
	readonly loot: LootTable;
}

/**
 * Attack stat with a 25% spread each way, never below 1.
 * `attackRangeFromStat(8, 0.25)` → `{ min: 6, max: 10 }`.
 */
export function attackRangeFromStat(attack: number, variance: number): IntRange {
	const spread = Math.round(attack * variance);
	return {
		min: Math.max(1, attack - spread),
		max: Math.max(1, attack + spread),
	};
}

/**
 * Rolls a concrete mob from a spec. Draw order is fixed (health, attack,
 * defense, gold, xp) so a seeded source always produces the same mob.
 */
export function instantiateMob(
	spec: MobSpec,
	rng: RandomSource,
	attackVariance = 0.25
): MobInstance {
	const maxHealth = rollRange(rng, spec.maxHealth);
	const attack = rollRange(rng, spec.attack);
	const defense = rollRange(rng, spec.defense);
	const baseGold = rollRange(rng, spec.gold);
	const baseXp = rollRange(rng, spec.xp);
	return {
		specId: spec.id,
		name: spec.name,
		stats: {
			health: maxHealth,
			maxHealth,
			attack: attackRangeFromStat(attack, attackVariance),
			defense,
			goldFind: 0,
			magicFind: 0,
		},
		baseGold,
		baseXp,
		loot: spec.loot,
	};
}

function scaleRange(range: IntRange, multiplier: number): IntRange {
	return {
		min: Math.round(range.min * multiplier),
		max: Math.round(range.max * multiplier),
	};
}

/**
 * Scales every stat range of a spec (deeper floors use a multiplier
 * above 1). Loot and footprint are unchanged.
 */
export function scaleMobSpec(spec: MobSpec, multiplier: number): MobSpec {
	if (multiplier === 1) return spec;
	const maxHealth = scaleRange(spec.maxHealth, multiplier);
	return {
		...spec,
		maxHealth: { min: Math.max(1, maxHealth.min), max: Math.max(1, maxHealth.max) },
		attack: scaleRange(spec.attack, multiplier),
		defense: scaleRange(spec.defense, multiplier),
		gold: scaleRange(spec.gold, multiplier),
		xp: scaleRange(spec.xp, multiplier),
	};
}

export interface MobSpecDefinition {
	id: string;
	name: string;
	quality?: MobQuality;
	maxHealth: IntRange;
	attack: IntRange;
	defense: IntRange;
	gold: IntRange;
	xp: IntRange;
	loot?: ReadonlyArray<LootEntry>;
	size?: GridSize;
}

function checkRange(range: IntRange, field: string, floor: number, source: string): IntRange {
	const { min, max } = range;
	if (!Number.isInteger(min) || !Number.isInteger(max) || min < floor || min > max) {
		throw new SpawnConfigError(
			`${field} must be an integer range starting at ${floor} or more, got ${min}..${max}`,
			source
		);
	}
	return { min, max };
}

/**
 * Validates a bestiary record and builds its spec.
 *
 * @throws {SpawnConfigError} on an empty id or name, an invalid stat range
 * (max health starts at 1, everything else at 0), a footprint below 1x1 or
 * a malformed loot table
 */
export function createMobSpec(definition: MobSpecDefinition): MobSpec {
	const source = definition.id || "mob";
	if (definition.id.trim() === "" || definition.name.trim() === "") {
		throw new SpawnConfigError("Mob spec needs an id and a name", source);
	}
	const size = definition.size ?? SINGLE_CELL;
	if (!isValidSize(size)) {
		throw new SpawnConfigError(`Invalid size ${size.width}x${size.height}`, source);
	}
	return {
		id: definition.id,
		name: definition.name,
		quality: definition.quality ?? "normal",
		maxHealth: checkRange(definition.maxHealth, "maxHealth", 1, source),
		attack: checkRange(definition.attack, "attack", 0, source),
		defense: checkRange(definition.defense, "defense", 0, source),
		gold: checkRange(definition.gold, "gold", 0, source),
		xp: checkRange(definition.xp, "xp", 0, source),
		loot: createLootTable(definition.loot ?? [], source),
		size: { width: size.width, height: size.height },
	};
}
