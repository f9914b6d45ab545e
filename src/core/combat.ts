/**
 * Combat resolution: damage, mitigation, death, rewards.
 *
 * Everything here is a pure function over plain data. Callers own the
 * stats objects and commit the returned values; `CombatEncounter` in
 * `encounter.ts` is the stock caller.
 *
 * Formulas
 * - `mitigation = defense / (defense + K)` with K = 50 by default, so 50
 *   defense halves damage and 100 defense removes two thirds. Always in
 *   [0, 1).
 * - `final = round(raw * (1 - mitigation))`, optionally raised to
 *   `minimumDamage` for positive raw hits (off by default).
 * - Gold: `round(base * (1 + goldFind / 100))`. XP: `round(base)`.
 * - Player defeat: lose `floor(gold * 5%)`, health restored to max.
 *
 * @module core/combat
 */

import { CONFIG } from "../registry/config.js";
import type { LootDrop } from "./loot.js";
import { attackRangeFromStat, type MobInstance } from "./mob.js";
import type { PlayerState } from "./player.js";
import logger from "../utils/logger.js";
import { rollRange, type RandomSource } from "../utils/random.js";
import type { IntRange } from "../utils/types.js";

export interface CombatantStats {
	health: number;
	maxHealth: number;
	/** Inclusive raw damage range. */
	attack: IntRange;
	defense: number;
	/** Gold find bonus in percent points. */
	goldFind: number;
	/** Magic find bonus in percent points. */
	magicFind: number;
}

export interface Combatant {
	name: string;
	stats: CombatantStats;
}

export interface DamageOptions {
	defenseConstant?: number;
	minimumDamage?: number;
}

export type AttackResult =
	| {
			kind: "hit";
			attacker: string;
			defender: string;
			rawDamage: number;
			damage: number;
			healthBefore: number;
			healthAfter: number;
			died: boolean;
	  }
	| {
			kind: "noop";
			attacker: string;
			defender: string;
			reason: "defender-dead";
	  };

export interface AttackOutcome {
	result: AttackResult;
	/** The defender's stats after the attack; the input is not modified. */
	defender: CombatantStats;
}

export interface VictoryRewards {
	gold: number;
	xp: number;
	drops: LootDrop[];
}

/**
 * Fraction of incoming damage removed by `defense`. Negative defense
 * counts as 0.
 *
 * @example
 * ```typescript
 * mitigation(0);   // 0
 * mitigation(50);  // 0.5
 * mitigation(100); // 0.666...
 * ```
 */
export function mitigation(
	defense: number,
	defenseConstant: number = CONFIG.combat.defenseConstant
): number {
	const def = Math.max(0, defense);
	return def / (def + defenseConstant);
}

/**
 * Damage that gets through `defense`. Never exceeds `raw`.
 */
export function finalDamage(
	raw: number,
	defense: number,
	options: DamageOptions = {}
): number {
	const constant = options.defenseConstant ?? CONFIG.combat.defenseConstant;
	const minimum = options.minimumDamage ?? CONFIG.combat.minimumDamage;
	const incoming = Math.max(0, raw);
	const reduced = Math.round(incoming * (1 - mitigation(defense, constant)));
	if (incoming > 0 && minimum > 0) {
		return Math.max(reduced, Math.min(minimum, incoming));
	}
	return reduced;
}

/**
 * The player's damage range from a single attack stat.
 *
 * @example
 * ```typescript
 * playerAttackRange(12); // { min: 9, max: 15 }
 * playerAttackRange(1);  // { min: 1, max: 1 }
 * ```
 */
export function playerAttackRange(
	attack: number,
	variance: number = CONFIG.combat.attackVariance
): IntRange {
	return attackRangeFromStat(attack, variance);
}

export function rollDamage(attack: IntRange, rng: RandomSource): number {
	return rollRange(rng, attack);
}

export function isDefeated(stats: CombatantStats): boolean {
	return stats.health <= 0;
}

/**
 * One attack from `attacker` on `defender`. Raw damage is drawn from the
 * attacker's range, reduced by the defender's defense, and subtracted from
 * the defender's health (floored at 0).
 *
 * An attack on a defender already at 0 health is a no-op: nothing is
 * rolled and the defender is returned unchanged.
 */
export function resolveAttack(
	attacker: Combatant,
	defender: Combatant,
	rng: RandomSource,
	options: DamageOptions = {}
): AttackOutcome {
	if (isDefeated(defender.stats)) {
		logger.debug(`${attacker.name} attacked ${defender.name}, who is already defeated`);
		return {
			result: {
				kind: "noop",
				attacker: attacker.name,
				defender: defender.name,
				reason: "defender-dead",
			},
			defender: defender.stats,
		};
	}

	const rawDamage = rollDamage(attacker.stats.attack, rng);
	const damage = finalDamage(rawDamage, defender.stats.defense, options);
	const healthBefore = defender.stats.health;
	const healthAfter = Math.max(0, healthBefore - damage);
	logger.debug(`${attacker.name} hits ${defender.name} for ${damage}`, {
		rawDamage,
		healthAfter,
	});

	return {
		result: {
			kind: "hit",
			attacker: attacker.name,
			defender: defender.name,
			rawDamage,
			damage,
			healthBefore,
			healthAfter,
			died: healthAfter === 0,
		},
		defender: { ...defender.stats, health: healthAfter },
	};
}

/**
 * `applyGoldFind(100, 50)` → 150.
 */
export function applyGoldFind(baseGold: number, goldFind: number): number {
	return Math.round(baseGold * (1 + goldFind / 100));
}

/**
 * Gold, xp and loot for defeating `mob`, scaled by the looter's find
 * bonuses.
 */
export function computeVictoryRewards(
	mob: MobInstance,
	looter: CombatantStats,
	rng: RandomSource
): VictoryRewards {
	return {
		gold: applyGoldFind(mob.baseGold, looter.goldFind),
		xp: Math.round(mob.baseXp),
		drops: mob.loot.roll(looter.magicFind, rng),
	};
}

export function applyVictoryRewards(
	player: PlayerState,
	rewards: VictoryRewards
): PlayerState {
	return {
		...player,
		gold: player.gold + rewards.gold,
		xp: player.xp + rewards.xp,
	};
}

/**
 * The player loses a share of their gold (rounded down) and is healed to
 * full.
 *
 * @example
 * ```typescript
 * applyDefeatPenalty({ ...player, gold: 100 }).player.gold; // 95
 * ```
 */
export function applyDefeatPenalty(
	player: PlayerState,
	penaltyPercent: number = CONFIG.combat.defeatGoldPenaltyPercent
): { player: PlayerState; goldLost: number } {
	const goldLost = Math.floor((Math.max(0, player.gold) * penaltyPercent) / 100);
	return {
		player: {
			...player,
			gold: player.gold - goldLost,
			stats: { ...player.stats, health: player.stats.maxHealth },
		},
		goldLost,
	};
}
