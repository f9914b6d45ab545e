/**
 * Player state as seen by the combat engine.
 *
 * @module core/player
 */

import { playerAttackRange, type Combatant, type CombatantStats } from "./combat.js";

export interface PlayerState {
	name: string;
	gold: number;
	xp: number;
	stats: CombatantStats;
}

export interface PlayerOptions {
	name?: string;
	gold?: number;
	xp?: number;
	maxHealth: number;
	/** Attack stat; widened into a range by `combat.attackVariance`. */
	attack: number;
	defense?: number;
	goldFind?: number;
	magicFind?: number;
}

/**
 * Builds a full-health player.
 *
 * @example
 * ```typescript
 * const hero = createPlayer({ maxHealth: 100, attack: 12, defense: 5 });
 * hero.stats.attack; // { min: 9, max: 15 }
 * ```
 */
export function createPlayer(options: PlayerOptions): PlayerState {
	return {
		name: options.name ?? "Player",
		gold: options.gold ?? 0,
		xp: options.xp ?? 0,
		stats: {
			health: options.maxHealth,
			maxHealth: options.maxHealth,
			attack: playerAttackRange(options.attack),
			defense: options.defense ?? 0,
			goldFind: options.goldFind ?? 0,
			magicFind: options.magicFind ?? 0,
		},
	};
}

export function asCombatant(player: PlayerState): Combatant {
	return { name: player.name, stats: player.stats };
}
