/**
 * A single fight between the player and one mob.
 *
 * State machine
 * ```
 * Idle -> PlayerTurnPending -> Resolving -> Ongoing -> PlayerTurnPending ...
 *                   |                   \-> VictoryPending
 *                   |                   \-> DefeatPending
 *                   \-> Cancelled
 * ```
 *
 * `attack()` is indivisible: the player's hit, the mob's counter-attack,
 * and any death, reward or defeat penalty are computed on copies and
 * committed together, after which the resulting events are emitted. A
 * listener never sees half a round. A round that throws leaves the
 * encounter as it was; a `SeededRandom` is also rewound to where the round
 * began.
 *
 * Events
 * - `"combat"` with a `CombatEvent` for each thing that happened
 * - `"state"` with `(from, to)` for every state change, including the
 *   transient `Resolving` and `Ongoing`
 *
 * @example
 * ```typescript
 * const fight = new CombatEncounter({ player, mob, rng });
 * fight.on("combat", (event) => ui.push(event));
 * fight.begin();
 * while (fight.state === ENCOUNTER_STATE.PLAYER_TURN_PENDING) fight.attack();
 * if (fight.state === ENCOUNTER_STATE.VICTORY_PENDING) inventory.add(fight.rewards);
 * ```
 *
 * @module core/encounter
 */

import { EventEmitter } from "events";
import {
	applyDefeatPenalty,
	applyVictoryRewards,
	computeVictoryRewards,
	isDefeated,
	resolveAttack,
	type AttackResult,
	type DamageOptions,
	type VictoryRewards,
} from "./combat.js";
import { CombatStateError } from "./errors.js";
import type { MobInstance } from "./mob.js";
import { asCombatant, type PlayerState } from "./player.js";
import logger from "../utils/logger.js";
import { SeededRandom, type RandomSource } from "../utils/random.js";

export enum ENCOUNTER_STATE {
	IDLE = "idle",
	PLAYER_TURN_PENDING = "player-turn-pending",
	RESOLVING = "resolving",
	ONGOING = "ongoing",
	VICTORY_PENDING = "victory-pending",
	DEFEAT_PENDING = "defeat-pending",
	CANCELLED = "cancelled",
}

export type CombatEvent =
	| { type: "attack"; result: Extract<AttackResult, { kind: "hit" }> }
	| { type: "death"; side: "mob" | "player"; name: string }
	| { type: "victory"; rewards: VictoryRewards }
	| { type: "defeat"; goldLost: number }
	| { type: "cancelled" };

export interface CombatEncounterOptions {
	player: PlayerState;
	mob: MobInstance;
	rng: RandomSource;
	damage?: DamageOptions;
}

export class CombatEncounter extends EventEmitter {
	private _state: ENCOUNTER_STATE = ENCOUNTER_STATE.IDLE;
	private _player: PlayerState;
	private _mob: MobInstance;
	private _rewards?: VictoryRewards;
	private _round = 0;
	private readonly _rng: RandomSource;
	private readonly _damage: DamageOptions;

	constructor(options: CombatEncounterOptions) {
		super();
		this._player = options.player;
		this._mob = options.mob;
		this._rng = options.rng;
		this._damage = options.damage ?? {};
	}

	get state(): ENCOUNTER_STATE {
		return this._state;
	}

	get player(): PlayerState {
		return this._player;
	}

	get mob(): MobInstance {
		return this._mob;
	}

	/**
	 * Rewards granted on victory; undefined until the mob is defeated.
	 */
	get rewards(): VictoryRewards | undefined {
		return this._rewards;
	}

	/**
	 * Number of resolved attack rounds.
	 */
	get round(): number {
		return this._round;
	}

	get isOver(): boolean {
		return (
			this._state === ENCOUNTER_STATE.VICTORY_PENDING ||
			this._state === ENCOUNTER_STATE.DEFEAT_PENDING ||
			this._state === ENCOUNTER_STATE.CANCELLED
		);
	}

	begin(): void {
		if (this._state !== ENCOUNTER_STATE.IDLE) {
			throw new CombatStateError("begin", this._state);
		}
		this.transition(ENCOUNTER_STATE.PLAYER_TURN_PENDING);
	}

	/**
	 * Disengage before committing an attack.
	 */
	cancel(): CombatEvent[] {
		if (this._state !== ENCOUNTER_STATE.PLAYER_TURN_PENDING) {
			throw new CombatStateError("cancel", this._state);
		}
		this.transition(ENCOUNTER_STATE.CANCELLED);
		const events: CombatEvent[] = [{ type: "cancelled" }];
		this.publish(events);
		return events;
	}

	/**
	 * Resolve one round: the player's attack, then the mob's counter-attack
	 * if it survives.
	 *
	 * Attacking a mob that is already defeated does nothing and returns no
	 * events; late input from the UI can arrive after the fight ended.
	 *
	 * @throws {CombatStateError} in any other state than PlayerTurnPending
	 */
	attack(): CombatEvent[] {
		if (this._state === ENCOUNTER_STATE.VICTORY_PENDING || isDefeated(this._mob.stats)) {
			logger.debug(`Ignoring attack on defeated ${this._mob.name}`);
			return [];
		}
		if (this._state !== ENCOUNTER_STATE.PLAYER_TURN_PENDING) {
			throw new CombatStateError("attack", this._state);
		}

		this.transition(ENCOUNTER_STATE.RESOLVING);
		const checkpoint = this._rng instanceof SeededRandom ? this._rng.state : undefined;
		const events: CombatEvent[] = [];
		let player = this._player;
		let mobStats = this._mob.stats;
		let rewards: VictoryRewards | undefined;
		let next: ENCOUNTER_STATE;

		try {
			const strike = resolveAttack(
				asCombatant(player),
				{ name: this._mob.name, stats: mobStats },
				this._rng,
				this._damage
			);
			mobStats = strike.defender;
			if (strike.result.kind === "hit") events.push({ type: "attack", result: strike.result });

			if (isDefeated(mobStats)) {
				events.push({ type: "death", side: "mob", name: this._mob.name });
				rewards = computeVictoryRewards(this._mob, player.stats, this._rng);
				player = applyVictoryRewards(player, rewards);
				events.push({ type: "victory", rewards });
				next = ENCOUNTER_STATE.VICTORY_PENDING;
			} else {
				const counter = resolveAttack(
					{ name: this._mob.name, stats: mobStats },
					asCombatant(player),
					this._rng,
					this._damage
				);
				player = { ...player, stats: counter.defender };
				if (counter.result.kind === "hit") {
					events.push({ type: "attack", result: counter.result });
				}
				if (isDefeated(player.stats)) {
					events.push({ type: "death", side: "player", name: player.name });
					const penalty = applyDefeatPenalty(player);
					player = penalty.player;
					events.push({ type: "defeat", goldLost: penalty.goldLost });
					next = ENCOUNTER_STATE.DEFEAT_PENDING;
				} else {
					next = ENCOUNTER_STATE.ONGOING;
				}
			}
		} catch (error) {
			// nothing was committed; rewind the stream and hand the turn back
			if (this._rng instanceof SeededRandom && checkpoint !== undefined) {
				this._rng.restore(checkpoint);
			}
			this.transition(ENCOUNTER_STATE.PLAYER_TURN_PENDING);
			throw error;
		}

		this._player = player;
		this._mob = { ...this._mob, stats: mobStats };
		this._rewards = rewards;
		this._round++;
		this.transition(next);
		if (next === ENCOUNTER_STATE.VICTORY_PENDING) {
			logger.info(`${player.name} defeated ${this._mob.name}`, {
				gold: rewards?.gold,
				xp: rewards?.xp,
			});
		} else if (next === ENCOUNTER_STATE.DEFEAT_PENDING) {
			logger.info(`${player.name} was defeated by ${this._mob.name}`);
		} else {
			this.transition(ENCOUNTER_STATE.PLAYER_TURN_PENDING);
		}
		this.publish(events);
		return events;
	}

	private transition(to: ENCOUNTER_STATE): void {
		const from = this._state;
		this._state = to;
		this.emit("state", from, to);
	}

	private publish(events: CombatEvent[]): void {
		for (const event of events) this.emit("combat", event);
	}
}
