/**
 * Movement validation: may a footprint stand at a position?
 *
 * The same rule backs live movement (`tryStep`) and the spawn resolver's
 * notion of a free cell (`isCandidateCell`).
 *
 * @module core/movement
 */

import { DIRECTION, dir2offset } from "./direction.js";
import { GridPosition, GridSize, footprintCells, isValidSize } from "./grid.js";
import type { GridOccupancy } from "./occupancy.js";
import type { TerrainOracle } from "./terrain.js";

/**
 * Whether `size` can stand with its origin at `pos`: every covered cell is
 * on the grid, walkable, and either empty or already held by `mover`.
 *
 * @example
 * ```typescript
 * canOccupy(terrain, grid, { x: 3, y: 2 }, SINGLE_CELL, player);
 * ```
 */
export function canOccupy<E>(
	terrain: TerrainOracle,
	occupancy: GridOccupancy<E>,
	pos: GridPosition,
	size: GridSize,
	mover?: E
): boolean {
	if (!isValidSize(size)) return false;
	for (const cell of footprintCells(pos, size)) {
		if (!occupancy.inBounds(cell.x, cell.y)) return false;
		if (!terrain.isWalkable(cell.x, cell.y)) return false;
		const occupant = occupancy.entityAt(cell.x, cell.y);
		if (occupant !== undefined && occupant !== mover) return false;
	}
	return true;
}

/**
 * A cell the spawn resolver may use: walkable, flagged spawn-eligible by
 * the terrain, and currently empty.
 */
export function isCandidateCell<E>(
	terrain: TerrainOracle,
	occupancy: GridOccupancy<E>,
	x: number,
	y: number
): boolean {
	return (
		occupancy.inBounds(x, y) &&
		terrain.isWalkable(x, y) &&
		terrain.canSpawnEntity(x, y) &&
		!occupancy.isOccupied(x, y)
	);
}

export function stepPosition(pos: GridPosition, direction: DIRECTION): GridPosition {
	const { dx, dy } = dir2offset(direction);
	return { x: pos.x + dx, y: pos.y + dy };
}

export type StepResult<E> =
	| { kind: "moved"; from: GridPosition; to: GridPosition }
	| { kind: "blocked"; to: GridPosition; occupant?: E }
	| { kind: "missing" };

/**
 * Moves a placed entity one cell in `direction` when the destination is
 * valid. When it is not, reports the first other occupant in the way (if
 * any) so the caller can turn a bump into an interaction.
 */
export function tryStep<E>(
	terrain: TerrainOracle,
	occupancy: GridOccupancy<E>,
	entity: E,
	direction: DIRECTION
): StepResult<E> {
	const footprint = occupancy.footprintOf(entity);
	if (!footprint) return { kind: "missing" };
	const to = stepPosition(footprint.position, direction);
	if (!canOccupy(terrain, occupancy, to, footprint.size, entity)) {
		let occupant: E | undefined;
		for (const cell of footprintCells(to, footprint.size)) {
			const found = occupancy.entityAt(cell.x, cell.y);
			if (found !== undefined && found !== entity) {
				occupant = found;
				break;
			}
		}
		return { kind: "blocked", to, occupant };
	}
	occupancy.move(entity, to);
	return { kind: "moved", from: footprint.position, to };
}
