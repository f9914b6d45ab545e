/**
 * Bounded map of which grid cells are held by which entity.
 *
 * `GridOccupancy` is created when a floor is entered, mutated only by that
 * floor, and dropped when the floor unloads. Each cell holds at most one
 * entity reference and every entity holds exactly the cells of its
 * footprint.
 *
 * Quick start
 * ```ts
 * const grid = new GridOccupancy<string>(5, 5);
 * grid.occupy({ x: 1, y: 1 }, { width: 2, height: 1 }, "table");
 * grid.entityAt(2, 1);      // "table"
 * grid.vacate({ x: 2, y: 1 }, SINGLE_CELL); // removes "table" whole
 * grid.isOccupied(1, 1);    // false
 * ```
 *
 * Notes
 * - `vacate` removes every entity touching the area as a unit, so a
 *   multi-cell entity is never left half-registered.
 * - Vacating empty cells is a no-op.
 *
 * @module core/occupancy
 */

import { DIRECTION } from "./direction.js";
import { InvalidFootprint, OccupancyConflict } from "./errors.js";
import {
	GridPosition,
	GridSize,
	footprintCells,
	footprintInBounds,
	isValidSize,
} from "./grid.js";

/**
 * Where an entity sits and how large it is.
 */
export interface Footprint {
	position: GridPosition;
	size: GridSize;
}

/**
 * An occupant found next to a footprint.
 */
export interface AdjacentOccupant<E> {
	entity: E;
	/** Side of the queried footprint the occupant touches. */
	direction: DIRECTION;
	/** First neighbouring cell where the occupant was found. */
	cell: GridPosition;
}

export interface OccupancyEntry<E> extends Footprint {
	entity: E;
}

/**
 * Plain-data form of a `GridOccupancy`, suitable for persistence once the
 * entity references are mapped to something serialisable.
 */
export interface OccupancySnapshot<E> {
	width: number;
	height: number;
	entries: OccupancyEntry<E>[];
}

export class GridOccupancy<E> {
	private readonly _width: number;
	private readonly _height: number;

	/**
	 * Row-major cell array; `undefined` marks a free cell.
	 */
	private readonly _cells: (E | undefined)[];

	/**
	 * Footprint of every placed entity, in placement order.
	 */
	private readonly _footprints: Map<E, Footprint> = new Map();

	/**
	 * Rebuilds an occupancy from a snapshot. Entries are replayed in order,
	 * so a snapshot with overlapping entries throws `OccupancyConflict`.
	 */
	static fromSnapshot<E>(snapshot: OccupancySnapshot<E>): GridOccupancy<E> {
		const grid = new GridOccupancy<E>(snapshot.width, snapshot.height);
		for (const entry of snapshot.entries) {
			grid.occupy(entry.position, entry.size, entry.entity);
		}
		return grid;
	}

	constructor(width: number, height: number) {
		if (!isValidSize({ width, height })) {
			throw new RangeError(`Invalid grid dimensions ${width}x${height}`);
		}
		this._width = width;
		this._height = height;
		this._cells = new Array<E | undefined>(width * height).fill(undefined);
	}

	get width(): number {
		return this._width;
	}

	get height(): number {
		return this._height;
	}

	/**
	 * Total number of cells in the grid.
	 */
	get capacity(): number {
		return this._width * this._height;
	}

	get occupiedCount(): number {
		let count = 0;
		for (const footprint of this._footprints.values()) {
			count += footprint.size.width * footprint.size.height;
		}
		return count;
	}

	get freeCount(): number {
		return this.capacity - this.occupiedCount;
	}

	inBounds(x: number, y: number): boolean {
		return (
			Number.isInteger(x) &&
			Number.isInteger(y) &&
			x >= 0 &&
			y >= 0 &&
			x < this._width &&
			y < this._height
		);
	}

	isOccupied(x: number, y: number): boolean {
		return this.entityAt(x, y) !== undefined;
	}

	entityAt(x: number, y: number): E | undefined {
		if (!this.inBounds(x, y)) return undefined;
		return this._cells[y * this._width + x];
	}

	has(entity: E): boolean {
		return this._footprints.has(entity);
	}

	/**
	 * Footprint of a placed entity, or undefined when it is not on the grid.
	 */
	footprintOf(entity: E): Footprint | undefined {
		const footprint = this._footprints.get(entity);
		if (!footprint) return undefined;
		return {
			position: { ...footprint.position },
			size: { ...footprint.size },
		};
	}

	/**
	 * Placed entities with their footprints, in placement order.
	 */
	entries(): OccupancyEntry<E>[] {
		const result: OccupancyEntry<E>[] = [];
		for (const [entity, footprint] of this._footprints) {
			result.push({
				entity,
				position: { ...footprint.position },
				size: { ...footprint.size },
			});
		}
		return result;
	}

	/**
	 * Claims every cell of the footprint for `entity`.
	 *
	 * Nothing is written unless every cell is free, so a failed call leaves
	 * the grid untouched.
	 *
	 * @throws {InvalidFootprint} when the size is below 1x1 or the footprint leaves the grid
	 * @throws {OccupancyConflict} when a covered cell is taken or `entity` is already placed
	 */
	occupy(pos: GridPosition, size: GridSize, entity: E): void {
		this.assertFootprint(pos, size);
		const existing = this._footprints.get(entity);
		if (existing) {
			throw new OccupancyConflict(
				pos,
				entity,
				`Entity is already placed at (${existing.position.x}, ${existing.position.y})`
			);
		}
		const cells = [...footprintCells(pos, size)];
		for (const cell of cells) {
			const occupant = this._cells[cell.y * this._width + cell.x];
			if (occupant !== undefined) {
				throw new OccupancyConflict(cell, occupant);
			}
		}
		for (const cell of cells) {
			this._cells[cell.y * this._width + cell.x] = entity;
		}
		this._footprints.set(entity, {
			position: { x: pos.x, y: pos.y },
			size: { width: size.width, height: size.height },
		});
	}

	/**
	 * Clears the footprint area. Every entity holding a cell in the area is
	 * removed whole; cells that are already empty are left alone.
	 *
	 * @returns The entities that were removed, in the order they were found
	 * @throws {InvalidFootprint} when the area is degenerate or leaves the grid
	 */
	vacate(pos: GridPosition, size: GridSize): E[] {
		this.assertFootprint(pos, size);
		const removed: E[] = [];
		for (const cell of footprintCells(pos, size)) {
			const occupant = this._cells[cell.y * this._width + cell.x];
			if (occupant === undefined || removed.includes(occupant)) continue;
			removed.push(occupant);
		}
		for (const entity of removed) this.remove(entity);
		return removed;
	}

	/**
	 * Takes an entity off the grid.
	 *
	 * @returns false when the entity was not placed
	 */
	remove(entity: E): boolean {
		const footprint = this._footprints.get(entity);
		if (!footprint) return false;
		for (const cell of footprintCells(footprint.position, footprint.size)) {
			this._cells[cell.y * this._width + cell.x] = undefined;
		}
		this._footprints.delete(entity);
		return true;
	}

	/**
	 * Moves a placed entity so its origin lands on `to`. Cells the entity
	 * already holds count as free. Either the move happens completely or the
	 * grid is unchanged.
	 *
	 * @throws {Error} when the entity is not placed
	 * @throws {InvalidFootprint} when the destination leaves the grid
	 * @throws {OccupancyConflict} when the destination overlaps another entity
	 */
	move(entity: E, to: GridPosition): void {
		const footprint = this._footprints.get(entity);
		if (!footprint) {
			throw new Error("Cannot move an entity that is not on the grid");
		}
		this.assertFootprint(to, footprint.size);
		for (const cell of footprintCells(to, footprint.size)) {
			const occupant = this._cells[cell.y * this._width + cell.x];
			if (occupant !== undefined && occupant !== entity) {
				throw new OccupancyConflict(cell, occupant);
			}
		}
		this.remove(entity);
		this.occupy(to, footprint.size, entity);
	}

	/**
	 * Distinct occupants of the cells bordering a footprint on its four
	 * cardinal sides. Cells inside the footprint itself are not inspected,
	 * and off-grid neighbours are skipped.
	 *
	 * @example
	 * ```typescript
	 * grid.occupy({ x: 2, y: 1 }, SINGLE_CELL, "chest");
	 * grid.adjacentOccupants({ x: 2, y: 2 }, SINGLE_CELL);
	 * // [{ entity: "chest", direction: DIRECTION.NORTH, cell: { x: 2, y: 1 } }]
	 * ```
	 */
	adjacentOccupants(pos: GridPosition, size: GridSize): AdjacentOccupant<E>[] {
		const found: AdjacentOccupant<E>[] = [];
		const seen = new Set<E>();
		const visit = (x: number, y: number, direction: DIRECTION) => {
			const entity = this.entityAt(x, y);
			if (entity === undefined || seen.has(entity)) return;
			seen.add(entity);
			found.push({ entity, direction, cell: { x, y } });
		};
		for (let dx = 0; dx < size.width; dx++) {
			visit(pos.x + dx, pos.y - 1, DIRECTION.NORTH);
		}
		for (let dx = 0; dx < size.width; dx++) {
			visit(pos.x + dx, pos.y + size.height, DIRECTION.SOUTH);
		}
		for (let dy = 0; dy < size.height; dy++) {
			visit(pos.x + size.width, pos.y + dy, DIRECTION.EAST);
		}
		for (let dy = 0; dy < size.height; dy++) {
			visit(pos.x - 1, pos.y + dy, DIRECTION.WEST);
		}
		return found;
	}

	snapshot(): OccupancySnapshot<E> {
		return {
			width: this._width,
			height: this._height,
			entries: this.entries(),
		};
	}

	private assertFootprint(pos: GridPosition, size: GridSize): void {
		if (!isValidSize(size)) {
			throw new InvalidFootprint(pos, size, "size must be at least 1x1");
		}
		if (!footprintInBounds(pos, size, this._width, this._height)) {
			throw new InvalidFootprint(
				pos,
				size,
				`outside ${this._width}x${this._height} grid`
			);
		}
	}
}
