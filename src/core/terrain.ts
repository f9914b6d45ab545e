/**
 * Terrain: the read-only oracle the placement engine asks about cells.
 *
 * `TerrainMap` is the stock oracle, built from text rows such as
 *
 * ```
 * #####D#####
 * #.........#
 * #..,,S,,..#
 * ###########
 * ```
 *
 * Glyphs
 * - `#` wall: blocked
 * - `.` floor: walkable, entities may spawn here
 * - `,` path: walkable, never used for spawning
 * - `D` door: walkable, never used for spawning; a door entity is placed
 *   on it during spawn resolution
 * - `S` entry: walkable, not spawnable; the player starts here
 * - ` ` void: outside the map, blocked
 *
 * @module core/terrain
 */

import { SpawnConfigError } from "./errors.js";
import type { GridPosition } from "./grid.js";

export interface TerrainOracle {
	readonly width: number;
	readonly height: number;
	isWalkable(x: number, y: number): boolean;
	canSpawnEntity(x: number, y: number): boolean;
	isDoor(x: number, y: number): boolean;
}

export enum TILE {
	VOID = " ",
	WALL = "#",
	FLOOR = ".",
	PATH = ",",
	DOOR = "D",
	ENTRY = "S",
}

const TILE_GLYPHS: ReadonlySet<string> = new Set<string>(Object.values(TILE));

function isTile(glyph: string): glyph is TILE {
	return TILE_GLYPHS.has(glyph);
}

export class TerrainMap implements TerrainOracle {
	private readonly _tiles: TILE[][];
	private readonly _width: number;
	private readonly _height: number;

	/**
	 * Parses text rows into a terrain map. Trailing spaces may be trimmed
	 * from rows by editors, so shorter rows are padded with void.
	 *
	 * @param rows Text rows, top row first
	 * @param source Optional name used in error messages
	 * @throws {SpawnConfigError} on empty input or unknown glyphs
	 */
	static parse(rows: ReadonlyArray<string>, source?: string): TerrainMap {
		if (rows.length === 0) {
			throw new SpawnConfigError("Terrain has no rows", source);
		}
		const width = Math.max(...rows.map((row) => row.length));
		if (width === 0) {
			throw new SpawnConfigError("Terrain rows are empty", source);
		}
		const tiles = rows.map((row, y) => {
			const line: TILE[] = [];
			for (let x = 0; x < width; x++) {
				const glyph = row[x] ?? TILE.VOID;
				if (!isTile(glyph)) {
					throw new SpawnConfigError(
						`Unknown terrain glyph "${glyph}" at (${x}, ${y})`,
						source
					);
				}
				line.push(glyph);
			}
			return line;
		});
		return new TerrainMap(tiles);
	}

	/**
	 * A fully walkable, spawnable `width` x `height` floor.
	 */
	static open(width: number, height: number): TerrainMap {
		return TerrainMap.parse(
			Array.from({ length: height }, () => TILE.FLOOR.repeat(width))
		);
	}

	private constructor(tiles: TILE[][]) {
		this._tiles = tiles;
		this._height = tiles.length;
		this._width = tiles[0].length;
	}

	get width(): number {
		return this._width;
	}

	get height(): number {
		return this._height;
	}

	tileAt(x: number, y: number): TILE | undefined {
		return this._tiles[y]?.[x];
	}

	isWalkable(x: number, y: number): boolean {
		const tile = this.tileAt(x, y);
		return tile !== undefined && tile !== TILE.WALL && tile !== TILE.VOID;
	}

	canSpawnEntity(x: number, y: number): boolean {
		return this.tileAt(x, y) === TILE.FLOOR;
	}

	isDoor(x: number, y: number): boolean {
		return this.tileAt(x, y) === TILE.DOOR;
	}

	/**
	 * Door cells in row-major order.
	 */
	doorCells(): GridPosition[] {
		return this.cellsMatching(TILE.DOOR);
	}

	/**
	 * Where the player enters: the first `S` cell, else the centre of the map.
	 */
	get entrance(): GridPosition {
		const entries = this.cellsMatching(TILE.ENTRY);
		if (entries.length > 0) return entries[0];
		return {
			x: Math.floor(this._width / 2),
			y: Math.floor(this._height / 2),
		};
	}

	/**
	 * Text rows, the inverse of `parse`.
	 */
	toRows(): string[] {
		return this._tiles.map((row) => row.join(""));
	}

	private cellsMatching(tile: TILE): GridPosition[] {
		const cells: GridPosition[] = [];
		for (let y = 0; y < this._height; y++) {
			for (let x = 0; x < this._width; x++) {
				if (this._tiles[y][x] === tile) cells.push({ x, y });
			}
		}
		return cells;
	}
}
