/**
 * Error types raised by the placement and combat engine.
 *
 * Only two of these are expected to escape to callers in normal play:
 * `OccupancyConflict` (a caller skipped validation) and `SpawnConfigError`
 * (content on disk is malformed). `InvalidFootprint` is thrown by
 * `GridOccupancy` but caught and recorded by the spawn resolver.
 *
 * Shortfalls (`InsufficientSpace`) and attacks on a dead combatant are not
 * exceptions at all; see `InsufficientSpace` in `spawn.ts` and the `noop`
 * attack outcome in `combat.ts`.
 *
 * @module core/errors
 */

import type { GridPosition, GridSize } from "./grid.js";

/**
 * A cell the caller tried to claim already belongs to another entity.
 */
export class OccupancyConflict<E = unknown> extends Error {
	override readonly name = "OccupancyConflict";
	readonly cell: GridPosition;
	readonly occupant: E;

	constructor(cell: GridPosition, occupant: E, message?: string) {
		super(message ?? `Cell (${cell.x}, ${cell.y}) is already occupied`);
		this.cell = { x: cell.x, y: cell.y };
		this.occupant = occupant;
	}
}

/**
 * A footprint is degenerate or leaves the grid.
 */
export class InvalidFootprint extends Error {
	override readonly name = "InvalidFootprint";
	readonly position: GridPosition;
	readonly size: GridSize;

	constructor(position: GridPosition, size: GridSize, reason: string) {
		super(
			`Footprint ${size.width}x${size.height} at (${position.x}, ${position.y}) is invalid: ${reason}`
		);
		this.position = { x: position.x, y: position.y };
		this.size = { width: size.width, height: size.height };
	}
}

/**
 * Malformed content: a spawn table, loot table, mob spec or floor
 * definition that cannot be used. Always fatal at construction time.
 */
export class SpawnConfigError extends Error {
	override readonly name = "SpawnConfigError";
	readonly source?: string;

	constructor(message: string, source?: string) {
		super(source ? `[${source}] ${message}` : message);
		this.source = source;
	}
}

/**
 * An encounter method was called in a state that does not allow it.
 */
export class CombatStateError extends Error {
	override readonly name = "CombatStateError";

	constructor(action: string, state: string) {
		super(`Cannot ${action} while encounter is ${state}`);
	}
}
