/**
 * Package: floors - YAML loader for floor definitions
 *
 * Reads every `data/floors/*.yaml` file, validates its terrain and spawn
 * table, checks that every mob and npc it names is in the bestiary, and
 * registers it.
 *
 * File format
 * ```yaml
 * floor:
 *   id: cave
 *   name: Damp Cave
 *   depth: 1
 *   mobMultiplier: 1
 *   terrain: |
 *     ####D####
 *     #.......#
 *     #...S...#
 *     #########
 *   spawns:
 *     - { type: guaranteed, target: { kind: stairs }, count: 1 }
 *     - type: ranged
 *       count: [1, 3]
 *       pool:
 *         - { target: { kind: mob, mobId: slime }, weight: 3 }
 *         - { target: { kind: mob, mobId: goblin }, weight: 1 }
 *     - { type: chance, target: { kind: npc, mobId: merchant }, chance: 0.25 }
 *     - { type: fixed, position: { x: 1, y: 1 }, target: { kind: craftingStation, stationType: forge } }
 * ```
 *
 * @module package/floors
 */

import { join, relative } from "path";
import { readdir, readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import type { Package } from "../utils/package.js";
import {
	isCraftingStationType,
	isRockType,
	type SpawnTarget,
} from "../core/entity.js";
import { SpawnConfigError } from "../core/errors.js";
import type { FloorDefinition } from "../core/floor.js";
import {
	createSpawnTable,
	type SpawnRuleDefinition,
	type WeightedTarget,
} from "../core/spawn-table.js";
import { TerrainMap } from "../core/terrain.js";
import { getMobSpec } from "../registry/bestiary.js";
import { getFloorCount, registerFloor } from "../registry/floors.js";
import bestiaryPkg from "./bestiary.js";
import {
	readInteger,
	readList,
	readNumber,
	readPosition,
	readRange,
	readRecord,
	readString,
	shouldProcessFile,
} from "./fields.js";

export const FLOORS_DIRECTORY_NAME = "floors";

function readTerrain(value: unknown, source: string): string[] {
	if (typeof value === "string") {
		const rows = value.split(/\r?\n/);
		while (rows.length > 0 && rows[rows.length - 1].trim() === "") rows.pop();
		return rows;
	}
	if (Array.isArray(value) && value.every((row) => typeof row === "string")) {
		return value.map((row) => String(row));
	}
	throw new SpawnConfigError("terrain must be a block string or a list of rows", source);
}

function readTarget(value: unknown, field: string, source: string): SpawnTarget {
	const raw = readRecord(value, field, source);
	const kind = readString(raw, "kind", source);
	switch (kind) {
		case "door":
		case "stairs":
			return { kind };
		case "chest":
			return raw.variant === undefined
				? { kind }
				: { kind, variant: readInteger(raw, "variant", source) };
		case "rock": {
			if (raw.rockType === undefined) return { kind };
			if (!isRockType(raw.rockType)) {
				throw new SpawnConfigError(`${field}: unknown rock type`, source);
			}
			return { kind, rockType: raw.rockType };
		}
		case "craftingStation": {
			if (!isCraftingStationType(raw.stationType)) {
				throw new SpawnConfigError(`${field}: unknown crafting station`, source);
			}
			return { kind, stationType: raw.stationType };
		}
		case "npc":
		case "mob":
			return { kind, mobId: readString(raw, "mobId", source) };
		default:
			throw new SpawnConfigError(`${field}: unknown target kind "${kind}"`, source);
	}
}

function readWeighted(value: unknown, field: string, source: string): WeightedTarget {
	const raw = readRecord(value, field, source);
	return {
		target: readTarget(raw.target, `${field}.target`, source),
		weight: readNumber(raw, "weight", source, 1),
	};
}

function readRule(value: unknown, index: number, source: string): SpawnRuleDefinition {
	const field = `spawns[${index}]`;
	const raw = readRecord(value, field, source);
	const type = readString(raw, "type", source);
	switch (type) {
		case "guaranteed":
			return {
				type,
				target: readTarget(raw.target, `${field}.target`, source),
				count: readInteger(raw, "count", source, 1),
			};
		case "ranged":
			return {
				type,
				count: readRange(raw.count, `${field}.count`, source),
				pool: readList(raw.pool, `${field}.pool`, source).map((entry, i) =>
					readWeighted(entry, `${field}.pool[${i}]`, source)
				),
			};
		case "chance":
			return {
				type,
				target: readTarget(raw.target, `${field}.target`, source),
				chance: readNumber(raw, "chance", source),
			};
		case "fixed":
			return {
				type,
				position: readPosition(raw.position, `${field}.position`, source),
				target: readTarget(raw.target, `${field}.target`, source),
			};
		default:
			throw new SpawnConfigError(`${field}: unknown rule type "${type}"`, source);
	}
}

function checkMobReferences(rules: SpawnRuleDefinition[], source: string): void {
	const targets: SpawnTarget[] = [];
	for (const rule of rules) {
		if (rule.type === "ranged") targets.push(...rule.pool.map((entry) => entry.target));
		else targets.push(rule.target);
	}
	for (const target of targets) {
		if ((target.kind === "mob" || target.kind === "npc") && !getMobSpec(target.mobId)) {
			throw new SpawnConfigError(`Unknown mob "${target.mobId}"`, source);
		}
	}
}

export interface ParseFloorOptions {
	/** Check mob and npc ids against the bestiary registry. Default true. */
	checkMobs?: boolean;
}

/**
 * Parses one floor file.
 *
 * @throws {SpawnConfigError} on invalid YAML, malformed terrain, a bad
 * spawn table or an unknown mob id
 */
export function parseFloorFile(
	raw: string,
	source: string,
	options: ParseFloorOptions = {}
): FloorDefinition {
	let document: unknown;
	try {
		document = YAML.load(raw);
	} catch (error) {
		throw new SpawnConfigError(`Invalid YAML: ${String(error)}`, source);
	}
	if (typeof document !== "object" || document === null || !("floor" in document)) {
		throw new SpawnConfigError("Missing 'floor' root", source);
	}
	const floor = readRecord(document.floor, "floor", source);
	const id = readString(floor, "id", source);
	const terrain = readTerrain(floor.terrain, id);
	// parse once to surface glyph errors at load time
	TerrainMap.parse(terrain, id);
	const rules = readList(floor.spawns, "spawns", id).map((rule, index) =>
		readRule(rule, index, id)
	);
	if (options.checkMobs ?? true) checkMobReferences(rules, id);
	const mobMultiplier = readNumber(floor, "mobMultiplier", id, 1);
	if (mobMultiplier <= 0) {
		throw new SpawnConfigError("mobMultiplier must be positive", id);
	}
	return {
		id,
		name: readString(floor, "name", id),
		depth: readInteger(floor, "depth", id, 1),
		terrain,
		spawnTable: createSpawnTable(rules, id),
		mobMultiplier,
	};
}

/**
 * Loads and registers every floor file in `directory`.
 * @returns Number of floors registered
 */
export async function loadFloors(
	directory: string = join(getDataDirectory(), FLOORS_DIRECTORY_NAME)
): Promise<number> {
	const root = getSafeRootDirectory();
	const entries = await readdir(directory, { withFileTypes: true });
	let count = 0;
	logger.debug(`Loading floors from ${relative(root, directory)}...`);

	for (const entry of entries) {
		if (!entry.isFile() || !shouldProcessFile(entry.name)) continue;
		const filePath = join(directory, entry.name);
		const raw = await readFile(filePath, "utf-8");
		const floor = registerFloor(parseFloorFile(raw, relative(root, filePath)));
		logger.debug(`Loaded floor: ${floor.id} (${floor.name})`, {
			depth: floor.depth,
			rules: floor.spawnTable.rules.length,
		});
		count++;
	}

	return count;
}

export default {
	name: "floors",
	dependencies: [bestiaryPkg],
	loader: async () => {
		await logger.block("floors", async () => {
			const count = await loadFloors();
			if (count === 0) {
				logger.warn("No floors found");
			}
		});
		logger.info(`Loaded ${getFloorCount()} floor(s).`);
	},
} satisfies Package;
