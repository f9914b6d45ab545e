/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with the defaults if missing) and
 * merges it into the in-memory `CONFIG` object from the config registry.
 *
 * Behavior
 * - Reads YAML from `data/config.yaml`
 * - Merges only known keys from the file into `CONFIG` (unknown keys ignored)
 * - Values of the wrong type are ignored with a warning
 * - Values of the right type but outside their valid range throw
 *   `SpawnConfigError`
 * - If the file is absent, writes `CONFIG_DEFAULT` to disk
 *
 * @example
 * import configPkg from './package/config.js';
 * import { CONFIG } from '../registry/config.js';
 * await configPkg.loader();
 * console.log(CONFIG.combat.defenseConstant);
 *
 * @module package/config
 */
import { join } from "path";
import { readFile, writeFile, rename, unlink, mkdir } from "fs/promises";
import YAML from "js-yaml";
import logger from "../utils/logger.js";
import { getDataDirectory } from "../utils/path.js";
import type { Package } from "../utils/package.js";
import { SpawnConfigError } from "../core/errors.js";
import {
	CONFIG_DEFAULT,
	type CombatConfig,
	type Config,
	type GenerationConfig,
	type LootConfig,
	type MagicFindMode,
	setConfig,
} from "../registry/config.js";
import { isRecord, type RawRecord } from "./fields.js";

export const CONFIG_FILENAME = "config.yaml";

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function pickNumber(
	section: string,
	raw: RawRecord,
	key: string,
	fallback: number
): number {
	if (!(key in raw)) return fallback;
	const value = raw[key];
	if (typeof value !== "number" || Number.isNaN(value)) {
		logger.warn(`Ignoring ${section}.${key}: expected a number`, { value });
		return fallback;
	}
	if (value !== fallback) logger.debug(`Set ${section}.${key} = ${value}`);
	return value;
}

function pickSeed(raw: RawRecord, fallback: string | number): string | number {
	if (!("defaultSeed" in raw)) return fallback;
	const value = raw.defaultSeed;
	if (typeof value !== "number" && typeof value !== "string") {
		logger.warn("Ignoring generation.defaultSeed: expected a string or number", {
			value,
		});
		return fallback;
	}
	if (value !== fallback) logger.debug(`Set generation.defaultSeed = ${value}`);
	return value;
}

function pickMagicFindMode(raw: RawRecord, fallback: MagicFindMode): MagicFindMode {
	if (!("magicFindMode" in raw)) return fallback;
	const value = raw.magicFindMode;
	if (value === "bonus-rolls" || value === "none") {
		if (value !== fallback) logger.debug(`Set loot.magicFindMode = ${value}`);
		return value;
	}
	logger.warn('Ignoring loot.magicFindMode: expected "bonus-rolls" or "none"', {
		value,
	});
	return fallback;
}

function parseCombat(raw: unknown): CombatConfig {
	const section = isRecord(raw) ? raw : {};
	const base = CONFIG_DEFAULT.combat;
	const combat: CombatConfig = {
		defenseConstant: pickNumber("combat", section, "defenseConstant", base.defenseConstant),
		minimumDamage: pickNumber("combat", section, "minimumDamage", base.minimumDamage),
		defeatGoldPenaltyPercent: pickNumber(
			"combat",
			section,
			"defeatGoldPenaltyPercent",
			base.defeatGoldPenaltyPercent
		),
		attackVariance: pickNumber("combat", section, "attackVariance", base.attackVariance),
	};
	if (combat.defenseConstant <= 0) {
		throw new SpawnConfigError("combat.defenseConstant must be positive", CONFIG_FILENAME);
	}
	if (combat.minimumDamage < 0 || !Number.isInteger(combat.minimumDamage)) {
		throw new SpawnConfigError(
			"combat.minimumDamage must be a non-negative integer",
			CONFIG_FILENAME
		);
	}
	if (combat.defeatGoldPenaltyPercent < 0 || combat.defeatGoldPenaltyPercent > 100) {
		throw new SpawnConfigError(
			"combat.defeatGoldPenaltyPercent must be between 0 and 100",
			CONFIG_FILENAME
		);
	}
	if (combat.attackVariance < 0 || combat.attackVariance > 1) {
		throw new SpawnConfigError(
			"combat.attackVariance must be between 0 and 1",
			CONFIG_FILENAME
		);
	}
	return combat;
}

function parseLoot(raw: unknown): LootConfig {
	const section = isRecord(raw) ? raw : {};
	return {
		magicFindMode: pickMagicFindMode(section, CONFIG_DEFAULT.loot.magicFindMode),
	};
}

function parseGeneration(raw: unknown): GenerationConfig {
	const section = isRecord(raw) ? raw : {};
	return {
		defaultSeed: pickSeed(section, CONFIG_DEFAULT.generation.defaultSeed),
	};
}

/**
 * Turns parsed YAML into a full `Config`, starting from the defaults.
 */
export function parseConfig(document: unknown): Config {
	const raw = isRecord(document) ? document : {};
	return {
		combat: parseCombat(raw.combat),
		loot: parseLoot(raw.loot),
		generation: parseGeneration(raw.generation),
	};
}

async function writeDefaultConfig(path: string): Promise<void> {
	const defaultContent = YAML.dump(CONFIG_DEFAULT, {
		noRefs: true,
		lineWidth: 120,
	});
	const tempPath = `${path}.tmp`;
	try {
		// Write to temporary file first, then atomically rename
		await writeFile(tempPath, defaultContent, "utf-8");
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) => {
			logger.debug("Temp config cleanup skipped", {
				error: String(cleanupError),
			});
		});
		throw writeError;
	}
}

/**
 * Loads the config file in `dataDirectory` into `CONFIG`.
 *
 * @returns The config that is now active
 */
export async function loadConfig(
	dataDirectory: string = getDataDirectory()
): Promise<Config> {
	const path = join(dataDirectory, CONFIG_FILENAME);
	logger.debug(`Loading config from ${path}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (!isMissingFile(error)) throw error;
		logger.debug(`Config file not found, creating default at ${path}`);
		await mkdir(dataDirectory, { recursive: true });
		await writeDefaultConfig(path);
		const defaults = parseConfig(undefined);
		setConfig(defaults);
		return defaults;
	}

	let document: unknown;
	try {
		document = YAML.load(content);
	} catch (error) {
		logger.error(`Config file ${path} is not valid YAML`);
		throw new SpawnConfigError(
			`Invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
			CONFIG_FILENAME
		);
	}
	const config = parseConfig(document);
	setConfig(config);
	logger.info("Config loaded successfully");
	return config;
}

export default {
	name: "config",
	loader: async () => {
		await loadConfig();
	},
} satisfies Package;
