/**
 * A floor session: terrain, occupancy, the random stream and the player's
 * footprint for one dungeon floor.
 *
 * The floor is the only owner of its occupancy grid. Everything that
 * changes who stands where (spawning, player movement, removing a defeated
 * mob) goes through it.
 *
 * @example
 * ```typescript
 * const floor = Floor.enter({ definition: cave, seed: 42 });
 * const step = floor.movePlayer(DIRECTION.EAST);
 * if (step.kind === "combat") {
 * 	const fight = floor.engage(step.target.id, hero);
 * 	fight.begin();
 * }
 * const saved = floor.snapshot();
 * const resumed = Floor.restore(saved, cave);
 * ```
 *
 * @module core/floor
 */

import { DIRECTION } from "./direction.js";
import { CombatEncounter, ENCOUNTER_STATE } from "./encounter.js";
import {
	describeTarget,
	type DungeonEntity,
	type FloorEntity,
	type PlacedEntity,
} from "./entity.js";
import { SpawnConfigError } from "./errors.js";
import { canOccupy, tryStep } from "./movement.js";
import { SINGLE_CELL, type GridPosition, type GridSize } from "./grid.js";
import type { LootDrop } from "./loot.js";
import { lootTableOf } from "./mining.js";
import { instantiateMob, scaleMobSpec, type MobSpec } from "./mob.js";
import { GridOccupancy } from "./occupancy.js";
import type { PlayerState } from "./player.js";
import { resolveSpawns, type SpawnReport } from "./spawn.js";
import type { SpawnTable } from "./spawn-table.js";
import { TerrainMap } from "./terrain.js";
import { CONFIG } from "../registry/config.js";
import { getMobSpec } from "../registry/bestiary.js";
import logger from "../utils/logger.js";
import { SeededRandom } from "../utils/random.js";

export interface FloorDefinition {
	readonly id: string;
	readonly name: string;
	readonly depth: number;
	/** Terrain rows, top row first. */
	readonly terrain: ReadonlyArray<string>;
	readonly spawnTable: SpawnTable;
	/** Applied to every mob spec rolled on this floor. */
	readonly mobMultiplier: number;
}

export interface FloorOptions {
	/** Mob spec by id; defaults to the bestiary registry. */
	bestiary?: (mobId: string) => MobSpec | undefined;
	/** Mob footprint by id; defaults to the spec's size. */
	footprintOf?: (mobId: string) => GridSize | undefined;
}

export interface FloorEnterOptions extends FloorOptions {
	definition: FloorDefinition;
	/** Defaults to `generation.defaultSeed`. */
	seed?: string | number;
}

export type MoveOutcome =
	| { kind: "moved"; from: GridPosition; to: GridPosition }
	| { kind: "blocked"; to: GridPosition }
	| { kind: "combat"; target: PlacedEntity }
	| { kind: "interact"; target: PlacedEntity }
	| { kind: "door"; target: PlacedEntity }
	| { kind: "stairs"; target: PlacedEntity };

export interface OpenOutcome {
	target: PlacedEntity;
	drops: LootDrop[];
}

export interface FloorSnapshot {
	floorId: string;
	width: number;
	height: number;
	rngState: number;
	/** Next numeric suffix for entity ids. */
	nextId: number;
	player: GridPosition;
	/** Every placement except the player, in placement order. */
	placements: PlacedEntity[];
}

export const PLAYER_ID = "player";

function isPlacedEntity(entry: FloorEntity): boolean {
	return entry.entity.kind !== "player";
}

export class Floor {
	readonly definition: FloorDefinition;
	readonly terrain: TerrainMap;
	private readonly _occupancy: GridOccupancy<FloorEntity>;
	private readonly _rng: SeededRandom;
	private readonly _player: FloorEntity = { id: PLAYER_ID, entity: { kind: "player" } };
	private readonly _bestiary: (mobId: string) => MobSpec | undefined;
	private readonly _footprintOf: (mobId: string) => GridSize | undefined;
	private _nextId: number;
	private _report?: SpawnReport;

	private constructor(
		definition: FloorDefinition,
		rng: SeededRandom,
		nextId: number,
		options: FloorOptions
	) {
		this.definition = definition;
		this.terrain = TerrainMap.parse(definition.terrain, definition.id);
		this._occupancy = new GridOccupancy(this.terrain.width, this.terrain.height);
		this._rng = rng;
		this._nextId = nextId;
		this._bestiary = options.bestiary ?? getMobSpec;
		this._footprintOf =
			options.footprintOf ?? ((mobId) => this._bestiary(mobId)?.size);
	}

	/**
	 * Builds a fresh floor: places the player on the entrance, then runs
	 * spawn resolution.
	 *
	 * @throws {SpawnConfigError} when the terrain is malformed or the
	 * entrance cannot hold the player
	 */
	static enter(options: FloorEnterOptions): Floor {
		const seed = options.seed ?? CONFIG.generation.defaultSeed;
		const floor = new Floor(options.definition, new SeededRandom(seed), 1, options);
		const entrance = floor.terrain.entrance;
		if (!canOccupy(floor.terrain, floor._occupancy, entrance, SINGLE_CELL)) {
			throw new SpawnConfigError(
				`Entrance (${entrance.x}, ${entrance.y}) is not walkable`,
				options.definition.id
			);
		}
		floor._occupancy.occupy(entrance, SINGLE_CELL, floor._player);
		floor._report = resolveSpawns({
			terrain: floor.terrain,
			occupancy: floor._occupancy,
			table: options.definition.spawnTable,
			rng: floor._rng,
			footprintOf: floor._footprintOf,
			allocateId: (entity) => floor.allocateId(entity),
		});
		logger.info(`Entered floor ${options.definition.id}`, {
			seed,
			placements: floor._report.placements.length,
			shortfalls: floor._report.shortfalls.length,
		});
		return floor;
	}

	/**
	 * Rebuilds a floor from a snapshot and resumes its random stream.
	 *
	 * @throws {SpawnConfigError} when the snapshot does not belong to
	 * `definition`
	 * @throws {OccupancyConflict} when the saved placements overlap
	 */
	static restore(
		snapshot: FloorSnapshot,
		definition: FloorDefinition,
		options: FloorOptions = {}
	): Floor {
		if (snapshot.floorId !== definition.id) {
			throw new SpawnConfigError(
				`Snapshot is for floor "${snapshot.floorId}"`,
				definition.id
			);
		}
		const floor = new Floor(
			definition,
			SeededRandom.fromState(snapshot.rngState),
			snapshot.nextId,
			options
		);
		if (floor.terrain.width !== snapshot.width || floor.terrain.height !== snapshot.height) {
			throw new SpawnConfigError(
				`Snapshot is ${snapshot.width}x${snapshot.height}, terrain is ${floor.terrain.width}x${floor.terrain.height}`,
				definition.id
			);
		}
		floor._occupancy.occupy(snapshot.player, SINGLE_CELL, floor._player);
		for (const placed of snapshot.placements) {
			floor._occupancy.occupy(placed.position, placed.size, {
				id: placed.id,
				entity: { ...placed.entity },
			});
		}
		logger.debug(`Restored floor ${definition.id}`, {
			placements: snapshot.placements.length,
		});
		return floor;
	}

	get id(): string {
		return this.definition.id;
	}

	/**
	 * What spawn resolution did when the floor was entered; undefined on a
	 * restored floor.
	 */
	get spawnReport(): SpawnReport | undefined {
		return this._report;
	}

	get rngState(): number {
		return this._rng.state;
	}

	get playerPosition(): GridPosition {
		const footprint = this._occupancy.footprintOf(this._player);
		if (!footprint) throw new Error("Player is not on the floor");
		return footprint.position;
	}

	get freeCount(): number {
		return this._occupancy.freeCount;
	}

	/**
	 * Every entity on the floor except the player, in placement order.
	 * The entries are copies; editing them leaves the floor alone.
	 */
	get placements(): PlacedEntity[] {
		return this._occupancy
			.entries()
			.filter((entry) => isPlacedEntity(entry.entity))
			.map((entry) => ({
				id: entry.entity.id,
				entity: { ...entry.entity.entity },
				position: entry.position,
				size: entry.size,
			}));
	}

	entityById(id: string): PlacedEntity | undefined {
		return this.placements.find((placed) => placed.id === id);
	}

	entityAt(x: number, y: number): PlacedEntity | undefined {
		const found = this._occupancy.entityAt(x, y);
		if (!found || !isPlacedEntity(found)) return undefined;
		return this.toPlaced(found);
	}

	/**
	 * Entities touching the player on a cardinal side.
	 */
	adjacentToPlayer(): PlacedEntity[] {
		const footprint = this._occupancy.footprintOf(this._player);
		if (!footprint) return [];
		const result: PlacedEntity[] = [];
		for (const { entity } of this._occupancy.adjacentOccupants(
			footprint.position,
			footprint.size
		)) {
			const placed = this.toPlaced(entity);
			if (placed) result.push(placed);
		}
		return result;
	}

	/**
	 * Takes an entity off the floor. The player cannot be removed.
	 * @returns Whether anything was removed
	 */
	removeEntity(id: string): boolean {
		if (id === PLAYER_ID) return false;
		const found = this._occupancy
			.entries()
			.find((entry) => entry.entity.id === id);
		if (!found) return false;
		this._occupancy.remove(found.entity);
		logger.debug(`Removed ${id} from floor ${this.id}`);
		return true;
	}

	/**
	 * Moves the player one cell. Bumping into an occupant does not move
	 * the player; the outcome says what was bumped.
	 */
	movePlayer(direction: DIRECTION): MoveOutcome {
		const step = tryStep(this.terrain, this._occupancy, this._player, direction);
		switch (step.kind) {
			case "moved":
				return { kind: "moved", from: step.from, to: step.to };
			case "missing":
				throw new Error("Player is not on the floor");
			case "blocked": {
				const target = step.occupant ? this.toPlaced(step.occupant) : undefined;
				if (!target) return { kind: "blocked", to: step.to };
				return bumpOutcome(target);
			}
		}
	}

	/**
	 * Starts a fight with a mob on this floor. The mob is rolled from its
	 * spec scaled by the floor's multiplier, and is removed from the floor
	 * when the encounter ends in victory.
	 *
	 * @throws {Error} when `id` is not a mob on this floor
	 * @throws {SpawnConfigError} when the mob's spec is unknown
	 */
	engage(id: string, player: PlayerState): CombatEncounter {
		const target = this.entityById(id);
		if (!target || target.entity.kind !== "mob") {
			throw new Error(`No mob with id "${id}" on floor ${this.id}`);
		}
		const { mobId } = target.entity;
		const spec = this._bestiary(mobId);
		if (!spec) throw new SpawnConfigError(`Unknown mob "${mobId}"`, this.id);
		const mob = instantiateMob(
			scaleMobSpec(spec, this.definition.mobMultiplier),
			this._rng,
			CONFIG.combat.attackVariance
		);
		const encounter = new CombatEncounter({ player, mob, rng: this._rng });
		encounter.on("state", (_from: ENCOUNTER_STATE, to: ENCOUNTER_STATE) => {
			if (to === ENCOUNTER_STATE.VICTORY_PENDING) this.removeEntity(id);
		});
		return encounter;
	}

	/**
	 * Opens a chest or mines a rock: rolls its loot with the player's magic
	 * find and takes it off the floor.
	 *
	 * @throws {Error} when `id` is not a chest or rock on this floor
	 */
	open(id: string, player: PlayerState): OpenOutcome {
		const target = this.entityById(id);
		const table = target ? lootTableOf(target.entity) : undefined;
		if (!target || !table) {
			throw new Error(`Nothing to open with id "${id}" on floor ${this.id}`);
		}
		const drops = table.roll(player.stats.magicFind, this._rng);
		this.removeEntity(id);
		logger.info(`${player.name} opened ${describeTarget(target.entity)}`, {
			id,
			drops: drops.length,
		});
		return { target, drops };
	}

	snapshot(): FloorSnapshot {
		return {
			floorId: this.id,
			width: this.terrain.width,
			height: this.terrain.height,
			rngState: this._rng.state,
			nextId: this._nextId,
			player: this.playerPosition,
			placements: this.placements,
		};
	}

	private allocateId(entity: DungeonEntity): string {
		return `${entity.kind}-${this._nextId++}`;
	}

	private toPlaced(entity: FloorEntity): PlacedEntity | undefined {
		if (!isPlacedEntity(entity)) return undefined;
		const footprint = this._occupancy.footprintOf(entity);
		if (!footprint) return undefined;
		return {
			id: entity.id,
			entity: { ...entity.entity },
			position: footprint.position,
			size: footprint.size,
		};
	}
}

function bumpOutcome(target: PlacedEntity): MoveOutcome {
	switch (target.entity.kind) {
		case "mob":
			return { kind: "combat", target };
		case "door":
			return { kind: "door", target };
		case "stairs":
			return { kind: "stairs", target };
		default:
			return { kind: "interact", target };
	}
}
