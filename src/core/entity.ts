/**
 * Things that stand on a floor.
 *
 * `DungeonEntity` is the plain-data description of an occupant; the
 * rendering layer switches on `kind`. A `FloorEntity` gives it an id so the
 * occupancy grid can track it by reference, and `PlacedEntity` adds the
 * footprint for consumers that want everything at once.
 *
 * `SpawnTarget` is the template a spawn rule names. Rolled details
 * (chest variant, rock type, sprite variant) may be left open and are
 * filled in by `realizeTarget` when the entity is placed.
 *
 * @module core/entity
 */

import type { GridPosition, GridSize } from "./grid.js";
import type { RandomSource } from "../utils/random.js";

export type RockType = "coal" | "copper" | "iron" | "gold";
export const ROCK_TYPES: ReadonlyArray<RockType> = ["coal", "copper", "iron", "gold"];

export type CraftingStationType = "forge" | "anvil";
export const CRAFTING_STATION_TYPES: ReadonlyArray<CraftingStationType> = [
	"forge",
	"anvil",
];

/** Chest sprites are numbered 0..3. */
export const CHEST_VARIANTS = 4;
/** Each rock type has two sprites, 0 and 1. */
export const ROCK_SPRITE_VARIANTS = 2;

export type DungeonEntity =
	| { kind: "player" }
	| { kind: "door" }
	| { kind: "stairs" }
	| { kind: "chest"; variant: number }
	| { kind: "rock"; rockType: RockType; spriteVariant: number }
	| { kind: "craftingStation"; stationType: CraftingStationType }
	| { kind: "npc"; mobId: string }
	| { kind: "mob"; mobId: string };

export type EntityKind = DungeonEntity["kind"];

export interface FloorEntity {
	readonly id: string;
	readonly entity: DungeonEntity;
}

export interface PlacedEntity extends FloorEntity {
	readonly position: GridPosition;
	readonly size: GridSize;
}

export type SpawnTarget =
	| { kind: "door" }
	| { kind: "stairs" }
	| { kind: "chest"; variant?: number }
	| { kind: "rock"; rockType?: RockType }
	| { kind: "craftingStation"; stationType: CraftingStationType }
	| { kind: "npc"; mobId: string }
	| { kind: "mob"; mobId: string };

/**
 * Spawn categories, in the order the resolver fills them.
 */
export type SpawnCategory = "obstacle" | "npc" | "mob";

export function categoryOf(target: SpawnTarget): SpawnCategory {
	switch (target.kind) {
		case "npc":
			return "npc";
		case "mob":
			return "mob";
		default:
			return "obstacle";
	}
}

export function isRockType(value: unknown): value is RockType {
	return typeof value === "string" && ROCK_TYPES.some((type) => type === value);
}

export function isCraftingStationType(value: unknown): value is CraftingStationType {
	return (
		typeof value === "string" && CRAFTING_STATION_TYPES.some((type) => type === value)
	);
}

/**
 * Turns a spawn template into a concrete entity, rolling whatever the
 * template leaves open. Draw order: chest variant; rock type, then sprite
 * variant.
 */
export function realizeTarget(target: SpawnTarget, rng: RandomSource): DungeonEntity {
	switch (target.kind) {
		case "chest":
			return {
				kind: "chest",
				variant: target.variant ?? rng.int(0, CHEST_VARIANTS - 1),
			};
		case "rock": {
			const rockType = target.rockType ?? rng.pick(ROCK_TYPES) ?? "coal";
			return {
				kind: "rock",
				rockType,
				spriteVariant: rng.int(0, ROCK_SPRITE_VARIANTS - 1),
			};
		}
		case "craftingStation":
			return { kind: "craftingStation", stationType: target.stationType };
		case "npc":
			return { kind: "npc", mobId: target.mobId };
		case "mob":
			return { kind: "mob", mobId: target.mobId };
		case "door":
			return { kind: "door" };
		case "stairs":
			return { kind: "stairs" };
	}
}

/**
 * Short human-readable label, used in logs and reports.
 *
 * @example
 * ```typescript
 * describeTarget({ kind: "mob", mobId: "slime" }); // "mob:slime"
 * describeTarget({ kind: "chest" });               // "chest"
 * ```
 */
export function describeTarget(target: SpawnTarget | DungeonEntity): string {
	switch (target.kind) {
		case "npc":
		case "mob":
			return `${target.kind}:${target.mobId}`;
		case "craftingStation":
			return `${target.kind}:${target.stationType}`;
		case "rock":
			return target.rockType ? `rock:${target.rockType}` : "rock";
		default:
			return target.kind;
	}
}
