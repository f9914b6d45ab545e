/**
 * Seedable random source.
 *
 * Every random decision in the engine (spawn counts, cell picks, damage
 * rolls, loot rolls) goes through a `RandomSource`, so a fixed seed and a
 * fixed sequence of calls reproduce a floor and its fights exactly.
 *
 * `SeededRandom` is a Mulberry32 generator. Its whole state is one uint32,
 * which is what floor snapshots store to resume the stream.
 *
 * @example
 * ```typescript
 * const rng = new SeededRandom("cave-1");
 * rng.int(1, 6);          // 1..6 inclusive
 * rng.chance(0.25);       // true a quarter of the time
 * const saved = rng.state;
 * const resumed = SeededRandom.fromState(saved);
 * ```
 *
 * @module utils/random
 */

import type { IntRange } from "./types.js";

export interface RandomSource {
	/** Float in [0, 1). */
	next(): number;
	/** Integer in [min, max], both inclusive. */
	int(min: number, max: number): number;
	/** Bernoulli trial; `p <= 0` never passes and `p >= 1` always does. */
	chance(p: number): boolean;
	/** Uniform pick, or undefined for an empty list. */
	pick<T>(items: ReadonlyArray<T>): T | undefined;
}

/**
 * xfnv1a string hash, used to turn string seeds into a uint32.
 */
export function hashSeed(seed: string): number {
	let h = 2166136261 >>> 0;
	for (let i = 0; i < seed.length; i++) {
		h ^= seed.charCodeAt(i);
		h = Math.imul(h, 16777619) >>> 0;
	}
	return h >>> 0;
}

export class SeededRandom implements RandomSource {
	private _state: number;

	/**
	 * Resumes a generator from a previously saved `state`.
	 */
	static fromState(state: number): SeededRandom {
		const rng = new SeededRandom(0);
		rng.restore(state);
		return rng;
	}

	constructor(seed: string | number) {
		const numeric = typeof seed === "number" ? seed >>> 0 : hashSeed(seed);
		this._state = numeric || 1;
	}

	/**
	 * Current generator state; feed it to `fromState` to continue the
	 * same stream.
	 */
	get state(): number {
		return this._state;
	}

	/**
	 * Rewinds (or fast-forwards) this generator to a saved `state`.
	 */
	restore(state: number): void {
		this._state = state >>> 0;
	}

	next(): number {
		this._state = (this._state + 0x6d2b79f5) >>> 0;
		let t = this._state;
		t = Math.imul(t ^ (t >>> 15), t | 1) >>> 0;
		t ^= (t + Math.imul(t ^ (t >>> 7), t | 61)) >>> 0;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	}

	int(min: number, max: number): number {
		return randomInt(this, min, max);
	}

	chance(p: number): boolean {
		if (p <= 0) return false;
		if (p >= 1) return true;
		return this.next() < p;
	}

	pick<T>(items: ReadonlyArray<T>): T | undefined {
		if (items.length === 0) return undefined;
		return items[Math.floor(this.next() * items.length)];
	}
}

/**
 * Uniform integer in [min, max] drawn from any `next()`.
 *
 * @throws {RangeError} when the bounds are not integers or are inverted
 */
export function randomInt(
	source: Pick<RandomSource, "next">,
	min: number,
	max: number
): number {
	if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
		throw new RangeError(`Invalid integer range ${min}..${max}`);
	}
	return min + Math.floor(source.next() * (max - min + 1));
}

/**
 * Uniform draw from an inclusive `IntRange`.
 */
export function rollRange(rng: RandomSource, range: IntRange): number {
	return rng.int(range.min, range.max);
}
