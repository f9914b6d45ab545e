/**
 * Registry: floors - floor definitions by id
 *
 * @module registry/floors
 */

import logger from "../utils/logger.js";
import type { FloorDefinition } from "../core/floor.js";

export { READONLY_FLOORS as FLOORS };

const FLOORS: Map<string, FloorDefinition> = new Map();
const READONLY_FLOORS: ReadonlyMap<string, FloorDefinition> = FLOORS;

export function registerFloor(definition: FloorDefinition): FloorDefinition {
	const frozen = Object.freeze({
		...definition,
		terrain: Object.freeze([...definition.terrain]),
	});
	if (FLOORS.has(frozen.id)) {
		logger.warn(`Overriding existing floor with id "${frozen.id}"`);
	}
	FLOORS.set(frozen.id, frozen);
	logger.debug(`Registered floor: ${frozen.id} (${frozen.name})`);
	return frozen;
}

export function getFloor(id: string): FloorDefinition | undefined {
	const floor = FLOORS.get(id);
	if (!floor) {
		logger.warn(`Requested floor '${id}' not found.`);
		return undefined;
	}
	return floor;
}

/**
 * Floors ordered by depth, shallowest first.
 */
export function getAllFloors(): ReadonlyArray<FloorDefinition> {
	return [...FLOORS.values()].sort((a, b) => a.depth - b.depth || a.id.localeCompare(b.id));
}

export function getFloorCount(): number {
	return FLOORS.size;
}

export function clearFloors(): void {
	FLOORS.clear();
}
