/**
 * Spawn tables: what a floor asks the spawn resolver to place.
 *
 * Rule kinds
 * - `guaranteed`: place exactly `count` copies of one target
 * - `ranged`: sample a count from a range, fill each slot by weighted pick
 *   from a pool
 * - `chance`: one Bernoulli trial decides whether a single target spawns
 * - `fixed`: one target at a set position
 *
 * Every rule but `fixed` belongs to a category (`obstacle`, `npc`, `mob`)
 * that is derived from its targets. A ranged pool may not mix categories.
 *
 * @example
 * ```typescript
 * const table = createSpawnTable([
 * 	{ type: "guaranteed", target: { kind: "stairs" }, count: 1 },
 * 	{ type: "ranged", count: { min: 2, max: 4 }, pool: [
 * 		{ target: { kind: "mob", mobId: "slime" }, weight: 3 },
 * 		{ target: { kind: "mob", mobId: "goblin" }, weight: 1 },
 * 	] },
 * 	{ type: "chance", target: { kind: "npc", mobId: "merchant" }, chance: 0.25 },
 * ]);
 * ```
 *
 * @module core/spawn-table
 */

import {
	categoryOf,
	describeTarget,
	isCraftingStationType,
	isRockType,
	CHEST_VARIANTS,
	type SpawnCategory,
	type SpawnTarget,
} from "./entity.js";
import { SpawnConfigError } from "./errors.js";
import type { GridPosition } from "./grid.js";
import type { IntRange } from "../utils/types.js";

export interface WeightedTarget {
	target: SpawnTarget;
	weight: number;
}

export type SpawnRuleDefinition =
	| { type: "guaranteed"; target: SpawnTarget; count: number }
	| { type: "ranged"; count: IntRange; pool: WeightedTarget[] }
	| { type: "chance"; target: SpawnTarget; chance: number }
	| { type: "fixed"; position: GridPosition; target: SpawnTarget };

export type SpawnRule =
	| {
			readonly type: "guaranteed";
			readonly category: SpawnCategory;
			readonly target: SpawnTarget;
			readonly count: number;
	  }
	| {
			readonly type: "ranged";
			readonly category: SpawnCategory;
			readonly count: IntRange;
			readonly pool: ReadonlyArray<WeightedTarget>;
			readonly totalWeight: number;
	  }
	| {
			readonly type: "chance";
			readonly category: SpawnCategory;
			readonly target: SpawnTarget;
			readonly chance: number;
	  }
	| {
			readonly type: "fixed";
			readonly position: GridPosition;
			readonly target: SpawnTarget;
	  };

/**
 * Resolution phase of a rule. Lower phases run first; rules sharing a
 * phase keep table order.
 *
 * 0 fixed, 1 obstacles, 2 npcs, 3 guaranteed mobs, 4 ranged and chance mobs.
 */
export function phaseOf(rule: SpawnRule): number {
	if (rule.type === "fixed") return 0;
	switch (rule.category) {
		case "obstacle":
			return 1;
		case "npc":
			return 2;
		case "mob":
			return rule.type === "guaranteed" ? 3 : 4;
	}
}

export class SpawnTable {
	readonly rules: ReadonlyArray<SpawnRule>;

	/**
	 * Use `createSpawnTable` to build a validated table.
	 */
	constructor(rules: ReadonlyArray<SpawnRule>) {
		this.rules = Object.freeze([...rules]);
	}

	/**
	 * Rules with their table index, in resolution order.
	 */
	ordered(): Array<{ index: number; rule: SpawnRule }> {
		return this.rules
			.map((rule, index) => ({ index, rule }))
			.sort((a, b) => phaseOf(a.rule) - phaseOf(b.rule) || a.index - b.index);
	}
}

function validateTarget(target: SpawnTarget, where: string, source?: string): void {
	switch (target.kind) {
		case "chest":
			if (
				target.variant !== undefined &&
				(!Number.isInteger(target.variant) ||
					target.variant < 0 ||
					target.variant >= CHEST_VARIANTS)
			) {
				throw new SpawnConfigError(
					`${where}: chest variant must be 0..${CHEST_VARIANTS - 1}`,
					source
				);
			}
			return;
		case "rock":
			if (target.rockType !== undefined && !isRockType(target.rockType)) {
				throw new SpawnConfigError(`${where}: unknown rock type`, source);
			}
			return;
		case "craftingStation":
			if (!isCraftingStationType(target.stationType)) {
				throw new SpawnConfigError(`${where}: unknown crafting station`, source);
			}
			return;
		case "npc":
		case "mob":
			if (typeof target.mobId !== "string" || target.mobId.trim() === "") {
				throw new SpawnConfigError(`${where}: ${target.kind} needs a mob id`, source);
			}
			return;
		case "door":
		case "stairs":
			return;
	}
}

function validateCountRange(range: IntRange, where: string, source?: string): void {
	const { min, max } = range;
	if (!Number.isInteger(min) || !Number.isInteger(max)) {
		throw new SpawnConfigError(`${where}: count range must be integers`, source);
	}
	if (min < 0 || max < 0) {
		throw new SpawnConfigError(`${where}: negative count range ${min}..${max}`, source);
	}
	if (min > max) {
		throw new SpawnConfigError(`${where}: inverted count range ${min}..${max}`, source);
	}
}

function normalizeRule(
	definition: SpawnRuleDefinition,
	index: number,
	source?: string
): SpawnRule {
	const where = `rule ${index} (${definition.type})`;
	switch (definition.type) {
		case "guaranteed": {
			validateTarget(definition.target, where, source);
			if (definition.target.kind === "door") {
				throw new SpawnConfigError(
					`${where}: doors come from terrain or fixed rules`,
					source
				);
			}
			if (!Number.isInteger(definition.count) || definition.count < 0) {
				throw new SpawnConfigError(
					`${where}: count must be a non-negative integer`,
					source
				);
			}
			return {
				type: "guaranteed",
				category: categoryOf(definition.target),
				target: definition.target,
				count: definition.count,
			};
		}
		case "ranged": {
			validateCountRange(definition.count, where, source);
			if (definition.pool.length === 0) {
				throw new SpawnConfigError(`${where}: empty pool`, source);
			}
			let totalWeight = 0;
			const categories = new Set<SpawnCategory>();
			for (const entry of definition.pool) {
				validateTarget(entry.target, where, source);
				if (entry.target.kind === "door") {
					throw new SpawnConfigError(
						`${where}: doors come from terrain or fixed rules`,
						source
					);
				}
				if (!Number.isFinite(entry.weight) || entry.weight < 0) {
					throw new SpawnConfigError(
						`${where}: ${describeTarget(entry.target)} has a negative weight`,
						source
					);
				}
				totalWeight += entry.weight;
				categories.add(categoryOf(entry.target));
			}
			if (totalWeight <= 0) {
				throw new SpawnConfigError(`${where}: pool weights sum to zero`, source);
			}
			if (categories.size > 1) {
				throw new SpawnConfigError(
					`${where}: pool mixes categories ${[...categories].join(", ")}`,
					source
				);
			}
			const [category] = categories;
			return {
				type: "ranged",
				category,
				count: { min: definition.count.min, max: definition.count.max },
				pool: definition.pool.map((entry) => ({
					target: entry.target,
					weight: entry.weight,
				})),
				totalWeight,
			};
		}
		case "chance": {
			validateTarget(definition.target, where, source);
			if (definition.target.kind === "door") {
				throw new SpawnConfigError(
					`${where}: doors come from terrain or fixed rules`,
					source
				);
			}
			if (
				!Number.isFinite(definition.chance) ||
				definition.chance < 0 ||
				definition.chance > 1
			) {
				throw new SpawnConfigError(`${where}: chance must be within [0, 1]`, source);
			}
			return {
				type: "chance",
				category: categoryOf(definition.target),
				target: definition.target,
				chance: definition.chance,
			};
		}
		case "fixed": {
			validateTarget(definition.target, where, source);
			const { x, y } = definition.position;
			if (!Number.isInteger(x) || !Number.isInteger(y)) {
				throw new SpawnConfigError(`${where}: position must be integers`, source);
			}
			return {
				type: "fixed",
				position: { x, y },
				target: definition.target,
			};
		}
	}
}

/**
 * Validates rule definitions and builds a table.
 *
 * @param source Optional name used in error messages (e.g. a floor id)
 * @throws {SpawnConfigError} on negative or inverted count ranges, chances
 * outside [0, 1], negative or all-zero weights, empty pools, mixed-category
 * pools and malformed targets
 */
export function createSpawnTable(
	definitions: ReadonlyArray<SpawnRuleDefinition>,
	source?: string
): SpawnTable {
	return new SpawnTable(
		definitions.map((definition, index) => normalizeRule(definition, index, source))
	);
}
