/**
 * Spawn resolution: fills a floor from its spawn table.
 *
 * Order
 * 1. Doors, read straight from terrain (not from the candidate pool)
 * 2. Fixed-position rules
 * 3. Obstacles (chests, stairs, rocks, crafting stations)
 * 4. NPCs
 * 5. Guaranteed mobs
 * 6. Ranged and chance mobs
 *
 * Steps 3-6 share one candidate pool (walkable, spawn-eligible, empty
 * cells) built after the fixed placements and shrunk as placements
 * commit, so later categories never take cells claimed by earlier ones.
 * Each rule makes at most its sampled count of attempts. Running out of
 * room is recorded as a shortfall; a footprint that cannot exist is
 * recorded as a rejection. Neither stops resolution.
 *
 * Random draws per rule, in order: the count (ranged) or the trial
 * (chance); then for each slot the weighted pick (ranged), the origin
 * cell, and any variants of the target.
 *
 * @module core/spawn
 */

import {
	describeTarget,
	realizeTarget,
	type DungeonEntity,
	type FloorEntity,
	type PlacedEntity,
	type SpawnCategory,
	type SpawnTarget,
} from "./entity.js";
import { InvalidFootprint, OccupancyConflict } from "./errors.js";
import {
	footprintCells,
	footprintInBounds,
	isValidSize,
	SINGLE_CELL,
	type GridPosition,
	type GridSize,
} from "./grid.js";
import { canOccupy, isCandidateCell } from "./movement.js";
import type { GridOccupancy } from "./occupancy.js";
import type { SpawnRule, SpawnTable, WeightedTarget } from "./spawn-table.js";
import type { TerrainOracle } from "./terrain.js";
import logger from "../utils/logger.js";
import type { RandomSource } from "../utils/random.js";

/**
 * A rule that could not place everything it asked for because no free
 * cell was left for the footprint.
 */
export interface InsufficientSpace {
	kind: "insufficient-space";
	/** Index of the rule in its table. */
	ruleIndex: number;
	category: SpawnCategory;
	requested: number;
	placed: number;
}

export type RejectionReason = "invalid-footprint" | "occupied" | "unwalkable";

export interface SpawnRejection {
	ruleIndex: number;
	target: string;
	position: GridPosition;
	size: GridSize;
	reason: RejectionReason;
	message: string;
}

export interface SpawnReport {
	/** Committed placements, in commit order. */
	placements: PlacedEntity[];
	shortfalls: InsufficientSpace[];
	rejected: SpawnRejection[];
}

export interface SpawnOptions {
	terrain: TerrainOracle;
	occupancy: GridOccupancy<FloorEntity>;
	table: SpawnTable;
	rng: RandomSource;
	/** Footprint of a mob or npc by mob id; unknown ids take one cell. */
	footprintOf?: (mobId: string) => GridSize | undefined;
	/** Id for a new entity; defaults to `<kind>-<n>`. */
	allocateId?: (entity: DungeonEntity) => string;
}

/** Door rejections use this in place of a rule index. */
export const TERRAIN_RULE_INDEX = -1;

function defaultAllocator(): (entity: DungeonEntity) => string {
	let next = 1;
	return (entity) => `${entity.kind}-${next++}`;
}

/**
 * Picks an entry with probability `weight / totalWeight`: one uniform draw
 * in `[0, totalWeight)` walked against the cumulative weights.
 */
export function pickWeighted(
	pool: ReadonlyArray<WeightedTarget>,
	totalWeight: number,
	rng: RandomSource
): SpawnTarget | undefined {
	if (pool.length === 0 || totalWeight <= 0) return undefined;
	const roll = rng.next() * totalWeight;
	let cumulative = 0;
	for (const entry of pool) {
		cumulative += entry.weight;
		if (roll < cumulative) return entry.target;
	}
	return pool[pool.length - 1].target;
}

class SpawnRun {
	readonly report: SpawnReport = { placements: [], shortfalls: [], rejected: [] };
	private pool: GridPosition[] = [];
	private readonly footprintOf: (mobId: string) => GridSize | undefined;
	private readonly allocateId: (entity: DungeonEntity) => string;

	constructor(private readonly options: SpawnOptions) {
		this.footprintOf = options.footprintOf ?? (() => undefined);
		this.allocateId = options.allocateId ?? defaultAllocator();
	}

	run(): SpawnReport {
		const ordered = this.options.table.ordered();
		this.placeDoors();
		for (const { index, rule } of ordered) {
			if (rule.type === "fixed") this.placeFixed(rule, index);
		}
		this.buildPool();
		for (const { index, rule } of ordered) {
			if (rule.type !== "fixed") this.placeRule(rule, index);
		}
		return this.report;
	}

	private sizeOf(target: SpawnTarget): GridSize {
		if (target.kind === "mob" || target.kind === "npc") {
			return this.footprintOf(target.mobId) ?? SINGLE_CELL;
		}
		return SINGLE_CELL;
	}

	private commit(entity: DungeonEntity, position: GridPosition, size: GridSize): void {
		const placed: FloorEntity = { id: this.allocateId(entity), entity };
		this.options.occupancy.occupy(position, size, placed);
		this.report.placements.push({
			id: placed.id,
			entity: { ...entity },
			position: { x: position.x, y: position.y },
			size: { width: size.width, height: size.height },
		});
		if (this.pool.length > 0) {
			const taken = new Set<string>();
			for (const cell of footprintCells(position, size)) taken.add(`${cell.x},${cell.y}`);
			this.pool = this.pool.filter((cell) => !taken.has(`${cell.x},${cell.y}`));
		}
		logger.debug(`Placed ${describeTarget(entity)} at (${position.x}, ${position.y})`, {
			id: placed.id,
		});
	}

	private reject(
		ruleIndex: number,
		target: SpawnTarget,
		position: GridPosition,
		size: GridSize,
		reason: RejectionReason,
		message: string
	): void {
		const rejection: SpawnRejection = {
			ruleIndex,
			target: describeTarget(target),
			position: { x: position.x, y: position.y },
			size: { width: size.width, height: size.height },
			reason,
			message,
		};
		this.report.rejected.push(rejection);
		logger.warn(`Rejected ${rejection.target}: ${message}`, { ruleIndex, reason });
	}

	private placeDoors(): void {
		const { terrain, occupancy } = this.options;
		for (let y = 0; y < terrain.height; y++) {
			for (let x = 0; x < terrain.width; x++) {
				if (!terrain.isDoor(x, y)) continue;
				const position = { x, y };
				if (!footprintInBounds(position, SINGLE_CELL, occupancy.width, occupancy.height)) {
					const error = new InvalidFootprint(position, SINGLE_CELL, "outside the floor");
					this.reject(
						TERRAIN_RULE_INDEX,
						{ kind: "door" },
						position,
						SINGLE_CELL,
						"invalid-footprint",
						error.message
					);
					continue;
				}
				const occupant = occupancy.entityAt(x, y);
				if (occupant !== undefined) {
					this.reject(
						TERRAIN_RULE_INDEX,
						{ kind: "door" },
						position,
						SINGLE_CELL,
						"occupied",
						`Cell (${x}, ${y}) already holds ${occupant.id}`
					);
					continue;
				}
				if (!canOccupy(terrain, occupancy, position, SINGLE_CELL)) {
					this.reject(
						TERRAIN_RULE_INDEX,
						{ kind: "door" },
						position,
						SINGLE_CELL,
						"unwalkable",
						`Door at (${x}, ${y}) is on a blocked cell`
					);
					continue;
				}
				this.commit({ kind: "door" }, position, SINGLE_CELL);
			}
		}
	}

	private placeFixed(rule: Extract<SpawnRule, { type: "fixed" }>, index: number): void {
		const { terrain, occupancy, rng } = this.options;
		const size = this.sizeOf(rule.target);
		const { position } = rule;
		if (
			!isValidSize(size) ||
			!footprintInBounds(position, size, occupancy.width, occupancy.height)
		) {
			const error = new InvalidFootprint(position, size, "outside the floor");
			this.reject(index, rule.target, position, size, "invalid-footprint", error.message);
			return;
		}
		if (!canOccupy(terrain, occupancy, position, size)) {
			for (const cell of footprintCells(position, size)) {
				const occupant = occupancy.entityAt(cell.x, cell.y);
				if (occupant !== undefined) {
					const error = new OccupancyConflict(cell, occupant);
					this.reject(index, rule.target, position, size, "occupied", error.message);
					return;
				}
			}
			this.reject(
				index,
				rule.target,
				position,
				size,
				"unwalkable",
				`Footprint at (${position.x}, ${position.y}) covers a blocked cell`
			);
			return;
		}
		this.commit(realizeTarget(rule.target, rng), position, size);
	}

	private buildPool(): void {
		const { terrain, occupancy } = this.options;
		const pool: GridPosition[] = [];
		for (let y = 0; y < occupancy.height; y++) {
			for (let x = 0; x < occupancy.width; x++) {
				if (isCandidateCell(terrain, occupancy, x, y)) pool.push({ x, y });
			}
		}
		this.pool = pool;
		logger.debug(`Spawn candidate pool has ${pool.length} cell(s)`);
	}

	/**
	 * Pool cells that can be the top-left corner of `size`: every covered
	 * cell must still be a candidate.
	 */
	private origins(size: GridSize): GridPosition[] {
		if (size.width === 1 && size.height === 1) return this.pool;
		const { terrain, occupancy } = this.options;
		return this.pool.filter((origin) => {
			for (const cell of footprintCells(origin, size)) {
				if (!isCandidateCell(terrain, occupancy, cell.x, cell.y)) return false;
			}
			return true;
		});
	}

	/**
	 * One placement attempt. Returns false when the footprint had nowhere
	 * to go.
	 */
	private attempt(target: SpawnTarget, index: number): boolean {
		const { rng } = this.options;
		const size = this.sizeOf(target);
		if (!isValidSize(size)) {
			const origin = { x: 0, y: 0 };
			const error = new InvalidFootprint(origin, size, "size must be at least 1x1");
			this.reject(index, target, origin, size, "invalid-footprint", error.message);
			return false;
		}
		const origins = this.origins(size);
		if (origins.length === 0) return false;
		const origin = origins[rng.int(0, origins.length - 1)];
		this.commit(realizeTarget(target, rng), origin, size);
		return true;
	}

	private placeRule(rule: Exclude<SpawnRule, { type: "fixed" }>, index: number): void {
		const { rng } = this.options;
		let requested = 0;
		let placed = 0;

		switch (rule.type) {
			case "guaranteed":
				requested = rule.count;
				for (let i = 0; i < requested; i++) {
					if (this.attempt(rule.target, index)) placed++;
				}
				break;
			case "ranged":
				requested = rng.int(rule.count.min, rule.count.max);
				for (let i = 0; i < requested; i++) {
					const target = pickWeighted(rule.pool, rule.totalWeight, rng);
					if (target && this.attempt(target, index)) placed++;
				}
				break;
			case "chance":
				requested = rng.chance(rule.chance) ? 1 : 0;
				if (requested === 1 && this.attempt(rule.target, index)) placed++;
				break;
		}

		if (placed < requested) {
			const shortfall: InsufficientSpace = {
				kind: "insufficient-space",
				ruleIndex: index,
				category: rule.category,
				requested,
				placed,
			};
			this.report.shortfalls.push(shortfall);
			logger.info(
				`Rule ${index} (${rule.category}) placed ${placed} of ${requested}: not enough space`
			);
		}
	}
}

/**
 * Populates `occupancy` from `table` and reports what happened.
 *
 * @example
 * ```typescript
 * const report = resolveSpawns({ terrain, occupancy, table, rng });
 * report.placements.length; // entities now on the floor
 * report.shortfalls;        // rules that ran out of room
 * ```
 */
export function resolveSpawns(options: SpawnOptions): SpawnReport {
	const report = new SpawnRun(options).run();
	logger.debug(
		`Spawn resolution placed ${report.placements.length} entit${
			report.placements.length === 1 ? "y" : "ies"
		}`,
		{ shortfalls: report.shortfalls.length, rejected: report.rejected.length }
	);
	return report;
}
