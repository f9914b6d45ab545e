/**
 * Grid coordinates and footprints.
 *
 * A footprint is an origin (top-left cell) plus a size. Every entity on a
 * floor has one; in practice they are 1x1 but larger sizes are supported
 * throughout.
 *
 * @module core/grid
 */

export interface GridPosition {
	x: number;
	y: number;
}

export interface GridSize {
	width: number;
	height: number;
}

export const SINGLE_CELL: Readonly<GridSize> = Object.freeze({
	width: 1,
	height: 1,
});

/**
 * Whether a size is a usable footprint (integers, at least 1x1).
 */
export function isValidSize(size: GridSize): boolean {
	return (
		Number.isInteger(size.width) &&
		Number.isInteger(size.height) &&
		size.width >= 1 &&
		size.height >= 1
	);
}

/**
 * Whether the whole footprint lies inside a `width` x `height` grid.
 */
export function footprintInBounds(
	pos: GridPosition,
	size: GridSize,
	width: number,
	height: number
): boolean {
	return (
		Number.isInteger(pos.x) &&
		Number.isInteger(pos.y) &&
		pos.x >= 0 &&
		pos.y >= 0 &&
		pos.x + size.width <= width &&
		pos.y + size.height <= height
	);
}

/**
 * Yields every cell a footprint covers, row by row.
 *
 * @example
 * ```typescript
 * [...footprintCells({ x: 1, y: 1 }, { width: 2, height: 1 })];
 * // [{ x: 1, y: 1 }, { x: 2, y: 1 }]
 * ```
 */
export function* footprintCells(
	pos: GridPosition,
	size: GridSize
): Generator<GridPosition> {
	for (let dy = 0; dy < size.height; dy++) {
		for (let dx = 0; dx < size.width; dx++) {
			yield { x: pos.x + dx, y: pos.y + dy };
		}
	}
}

/**
 * Axis-aligned overlap test between two footprints.
 */
export function footprintsOverlap(
	p1: GridPosition,
	s1: GridSize,
	p2: GridPosition,
	s2: GridSize
): boolean {
	return (
		p1.x < p2.x + s2.width &&
		p1.x + s1.width > p2.x &&
		p1.y < p2.y + s2.height &&
		p1.y + s1.height > p2.y
	);
}
