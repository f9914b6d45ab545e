/**
 * Package: bestiary - YAML loader for mob specs
 *
 * Reads every `data/mobs/*.yaml` file, validates it into a `MobSpec` and
 * registers it in the bestiary registry.
 *
 * File format
 * ```yaml
 * mob:
 *   id: goblin
 *   name: Goblin
 *   quality: normal        # or boss
 *   maxHealth: [18, 24]    # number, [min, max] or { min, max }
 *   attack: [4, 6]
 *   defense: 5
 *   gold: [3, 8]
 *   xp: 12
 *   size: { width: 1, height: 1 }
 *   loot:
 *     - { item: copper_coin, numerator: 1, denominator: 2, quantity: [1, 3] }
 * ```
 *
 * A malformed file is fatal: the loader throws `SpawnConfigError`.
 *
 * @module package/bestiary
 */

import { join, relative } from "path";
import { readdir, readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getDataDirectory, getSafeRootDirectory } from "../utils/path.js";
import type { Package } from "../utils/package.js";
import { SpawnConfigError } from "../core/errors.js";
import type { LootEntry } from "../core/loot.js";
import {
	createMobSpec,
	MOB_QUALITIES,
	type MobQuality,
	type MobSpec,
} from "../core/mob.js";
import { getMobCount, registerMobSpec } from "../registry/bestiary.js";
import {
	readInteger,
	readList,
	readRange,
	readRecord,
	readSize,
	readString,
	shouldProcessFile,
} from "./fields.js";

export const MOBS_DIRECTORY_NAME = "mobs";

function readQuality(value: unknown, source: string): MobQuality {
	if (value === undefined) return "normal";
	const quality = MOB_QUALITIES.find((candidate) => candidate === value);
	if (!quality) {
		throw new SpawnConfigError(`quality must be one of ${MOB_QUALITIES.join(", ")}`, source);
	}
	return quality;
}

function readLootEntry(value: unknown, index: number, source: string): LootEntry {
	const raw = readRecord(value, `loot[${index}]`, source);
	return {
		item: readString(raw, "item", source),
		numerator: readInteger(raw, "numerator", source),
		denominator: readInteger(raw, "denominator", source),
		quantity:
			raw.quantity === undefined
				? { min: 1, max: 1 }
				: readRange(raw.quantity, `loot[${index}].quantity`, source),
	};
}

/**
 * Parses one mob file.
 *
 * @param raw File contents
 * @param source Name used in error messages
 * @throws {SpawnConfigError} on invalid YAML or an invalid record
 */
export function parseMobFile(raw: string, source: string): MobSpec {
	let document: unknown;
	try {
		document = YAML.load(raw);
	} catch (error) {
		throw new SpawnConfigError(`Invalid YAML: ${String(error)}`, source);
	}
	if (typeof document !== "object" || document === null || !("mob" in document)) {
		throw new SpawnConfigError("Missing 'mob' root", source);
	}
	const mob = readRecord(document.mob, "mob", source);
	const id = readString(mob, "id", source);
	return createMobSpec({
		id,
		name: readString(mob, "name", source),
		quality: readQuality(mob.quality, id),
		maxHealth: readRange(mob.maxHealth, "maxHealth", id),
		attack: readRange(mob.attack, "attack", id),
		defense: readRange(mob.defense ?? 0, "defense", id),
		gold: readRange(mob.gold ?? 0, "gold", id),
		xp: readRange(mob.xp ?? 0, "xp", id),
		size: mob.size === undefined ? undefined : readSize(mob.size, "size", id),
		loot: readList(mob.loot, "loot", id).map((entry, index) =>
			readLootEntry(entry, index, id)
		),
	});
}

/**
 * Loads and registers every mob file in `directory`.
 * @returns Number of specs registered
 */
export async function loadBestiary(
	directory: string = join(getDataDirectory(), MOBS_DIRECTORY_NAME)
): Promise<number> {
	const root = getSafeRootDirectory();
	const entries = await readdir(directory, { withFileTypes: true });
	let count = 0;
	logger.debug(`Loading mobs from ${relative(root, directory)}...`);

	for (const entry of entries) {
		if (!entry.isFile() || !shouldProcessFile(entry.name)) continue;
		const filePath = join(directory, entry.name);
		const raw = await readFile(filePath, "utf-8");
		const spec = registerMobSpec(parseMobFile(raw, relative(root, filePath)));
		logger.debug(`Loaded mob: ${spec.id} (${spec.name})`, {
			quality: spec.quality,
			filePath: relative(root, filePath),
		});
		count++;
	}

	return count;
}

export default {
	name: "bestiary",
	loader: async () => {
		await logger.block("bestiary", async () => {
			const count = await loadBestiary();
			if (count === 0) {
				logger.warn("No mob specs found");
			}
		});
		logger.info(`Loaded ${getMobCount()} mob spec(s).`);
	},
} satisfies Package;
