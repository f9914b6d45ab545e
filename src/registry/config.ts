/**
 * Registry: config - centralized configuration access
 *
 * Provides a centralized location for accessing the engine configuration.
 * The CONFIG object is loaded and updated by the config package.
 *
 * @module registry/config
 */

import { DeepReadonly } from "../utils/types.js";

export { READONLY_CONFIG as CONFIG };

export type MagicFindMode = "bonus-rolls" | "none";

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	combat: {
		defenseConstant: 50,
		minimumDamage: 0,
		defeatGoldPenaltyPercent: 5,
		attackVariance: 0.25,
	},
	loot: {
		magicFindMode: "bonus-rolls",
	},
	generation: {
		defaultSeed: "undercroft",
	},
} as const;

// make a copy of the default, don't reference it directly plz
const CONFIG: Config = {
	combat: { ...CONFIG_DEFAULT.combat },
	loot: { ...CONFIG_DEFAULT.loot },
	generation: { ...CONFIG_DEFAULT.generation },
};

// export a readonly version of the config
const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;

export type CombatConfig = {
	/** K in `defense / (defense + K)`. */
	defenseConstant: number;
	/** Smallest damage a positive raw hit can deal; 0 disables the floor. */
	minimumDamage: number;
	/** Share of gold lost when the player is defeated. */
	defeatGoldPenaltyPercent: number;
	/** Spread of the player's attack range around their attack stat. */
	attackVariance: number;
};

export type LootConfig = {
	magicFindMode: MagicFindMode;
};

export type GenerationConfig = {
	defaultSeed: string | number;
};

export type Config = {
	combat: CombatConfig;
	loot: LootConfig;
	generation: GenerationConfig;
};

/**
 * Set the config object.
 * @param config - The config object to set.
 */
export function setConfig(config: Config) {
	CONFIG.combat = config.combat;
	CONFIG.loot = config.loot;
	CONFIG.generation = config.generation;
}

/**
 * Restore every section to `CONFIG_DEFAULT`.
 */
export function resetConfig() {
	setConfig({
		combat: { ...CONFIG_DEFAULT.combat },
		loot: { ...CONFIG_DEFAULT.loot },
		generation: { ...CONFIG_DEFAULT.generation },
	});
}
