/**
 * Cardinal directions on the floor grid.
 *
 * Coordinates follow screen order: increasing `x` is east, increasing `y`
 * is south.
 *
 * @module core/direction
 */

/**
 * Enum for handling directional movement on a floor.
 *
 * @example
 * ```typescript
 * import { DIRECTION } from "./direction.js";
 *
 * floor.movePlayer(DIRECTION.NORTH);
 * ```
 */
export enum DIRECTION {
	NORTH = 1 << 0,
	SOUTH = 1 << 1,
	EAST = 1 << 2,
	WEST = 1 << 3,
}

const DIR2OFFSET: ReadonlyMap<DIRECTION, { dx: number; dy: number }> = new Map([
	[DIRECTION.NORTH, { dx: 0, dy: -1 }],
	[DIRECTION.SOUTH, { dx: 0, dy: 1 }],
	[DIRECTION.EAST, { dx: 1, dy: 0 }],
	[DIRECTION.WEST, { dx: -1, dy: 0 }],
]);

/**
 * Unit offset of a direction, e.g. `{ dx: 0, dy: -1 }` for north.
 */
export function dir2offset(dir: DIRECTION): { dx: number; dy: number } {
	const offset = DIR2OFFSET.get(dir);
	if (!offset) throw new Error(`Unknown direction ${dir}`);
	return offset;
}
