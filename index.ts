/**
 * Undercroft: dungeon-floor placement and combat engine.
 *
 * @example
 * ```typescript
 * import { loadAllPackages, getFloor, Floor, createPlayer, DIRECTION } from "undercroft";
 *
 * await loadAllPackages();
 * const cave = getFloor("cave");
 * if (cave) {
 * 	const floor = Floor.enter({ definition: cave, seed: "run-1" });
 * 	floor.movePlayer(DIRECTION.NORTH);
 * }
 * ```
 */

export { loadAllPackages, sortPackages, PACKAGES } from "./package.js";

export * from "./src/core/combat.js";
export * from "./src/core/direction.js";
export * from "./src/core/encounter.js";
export * from "./src/core/entity.js";
export * from "./src/core/errors.js";
export * from "./src/core/floor.js";
export * from "./src/core/grid.js";
export * from "./src/core/loot.js";
export * from "./src/core/mining.js";
export * from "./src/core/mob.js";
export * from "./src/core/movement.js";
export * from "./src/core/occupancy.js";
export * from "./src/core/player.js";
export * from "./src/core/spawn.js";
export * from "./src/core/spawn-table.js";
export * from "./src/core/terrain.js";

export * from "./src/registry/bestiary.js";
export * from "./src/registry/config.js";
export * from "./src/registry/floors.js";

export { loadConfig, parseConfig } from "./src/package/config.js";
export { loadBestiary, parseMobFile } from "./src/package/bestiary.js";
export { loadFloors, parseFloorFile } from "./src/package/floors.js";

export { SeededRandom, hashSeed, randomInt, type RandomSource } from "./src/utils/random.js";
export type { IntRange, DeepReadonly } from "./src/utils/types.js";
export type { Package } from "./src/utils/package.js";
export { default as logger } from "./src/utils/logger.js";
