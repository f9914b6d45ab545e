/**
 * Registry: bestiary - mob specs by id
 *
 * Populated once at startup by the bestiary package and read by floors when
 * they size mob footprints and roll mobs for combat.
 *
 * @module registry/bestiary
 */

import logger from "../utils/logger.js";
import type { MobSpec } from "../core/mob.js";

export { READONLY_BESTIARY as BESTIARY };

const BESTIARY: Map<string, MobSpec> = new Map();
const READONLY_BESTIARY: ReadonlyMap<string, MobSpec> = BESTIARY;

/**
 * Register a mob spec. A spec registered twice replaces the first one.
 * @returns The frozen spec as stored
 */
export function registerMobSpec(spec: MobSpec): MobSpec {
	const frozen = Object.freeze({ ...spec });
	if (BESTIARY.has(frozen.id)) {
		logger.warn(`Overriding existing mob spec with id "${frozen.id}"`);
	}
	BESTIARY.set(frozen.id, frozen);
	logger.debug(`Registered mob: ${frozen.id} (${frozen.name})`);
	return frozen;
}

export function getMobSpec(id: string): MobSpec | undefined {
	return BESTIARY.get(id);
}

export function getMobCount(): number {
	return BESTIARY.size;
}

export function clearBestiary(): void {
	BESTIARY.clear();
}
