/**
 * Field readers shared by the YAML packages.
 *
 * Each reader takes the raw parsed value and either returns a typed value
 * or throws `SpawnConfigError` naming the file and field.
 *
 * @module package/fields
 */

import { extname } from "path";
import { SpawnConfigError } from "../core/errors.js";
import type { GridPosition, GridSize } from "../core/grid.js";
import type { IntRange } from "../utils/types.js";

export type RawRecord = Record<string, unknown>;

export const VALID_EXTENSIONS: ReadonlySet<string> = new Set([".yaml", ".yml"]);

/**
 * YAML files only; names starting with `_` are drafts and skipped.
 */
export function shouldProcessFile(fileName: string): boolean {
	if (!fileName) return false;
	if (fileName.startsWith("_")) return false;
	return VALID_EXTENSIONS.has(extname(fileName).toLowerCase());
}

export function isRecord(value: unknown): value is RawRecord {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readRecord(value: unknown, field: string, source: string): RawRecord {
	if (!isRecord(value)) throw new SpawnConfigError(`${field} must be a mapping`, source);
	return value;
}

export function readString(raw: RawRecord, key: string, source: string): string {
	const value = raw[key];
	if (typeof value !== "string" || value.trim() === "") {
		throw new SpawnConfigError(`${key} must be a non-empty string`, source);
	}
	return value.trim();
}

export function readNumber(
	raw: RawRecord,
	key: string,
	source: string,
	fallback?: number
): number {
	const value = raw[key];
	if (value === undefined && fallback !== undefined) return fallback;
	if (typeof value !== "number" || !Number.isFinite(value)) {
		throw new SpawnConfigError(`${key} must be a number`, source);
	}
	return value;
}

export function readInteger(
	raw: RawRecord,
	key: string,
	source: string,
	fallback?: number
): number {
	const value = readNumber(raw, key, source, fallback);
	if (!Number.isInteger(value)) {
		throw new SpawnConfigError(`${key} must be an integer`, source);
	}
	return value;
}

/**
 * Reads an inclusive range written as `5`, `[2, 8]` or `{ min: 2, max: 8 }`.
 * Bounds are checked by whoever consumes the range.
 */
export function readRange(value: unknown, field: string, source: string): IntRange {
	if (typeof value === "number") return { min: value, max: value };
	if (Array.isArray(value) && value.length === 2) {
		const [min, max] = value;
		if (typeof min === "number" && typeof max === "number") return { min, max };
	}
	if (isRecord(value) && typeof value.min === "number" && typeof value.max === "number") {
		return { min: value.min, max: value.max };
	}
	throw new SpawnConfigError(
		`${field} must be a number, a [min, max] pair or a { min, max } mapping`,
		source
	);
}

export function readSize(value: unknown, field: string, source: string): GridSize {
	const raw = readRecord(value, field, source);
	return {
		width: readInteger(raw, "width", source),
		height: readInteger(raw, "height", source),
	};
}

export function readPosition(value: unknown, field: string, source: string): GridPosition {
	const raw = readRecord(value, field, source);
	return { x: readInteger(raw, "x", source), y: readInteger(raw, "y", source) };
}

export function readList(value: unknown, field: string, source: string): unknown[] {
	if (value === undefined) return [];
	if (!Array.isArray(value)) throw new SpawnConfigError(`${field} must be a list`, source);
	return value;
}
