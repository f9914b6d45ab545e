/**
 * A `RandomSource` that replays a fixed list of `next()` values, for tests
 * that need to know exactly what every draw returns.
 *
 * `int(min, max)` maps a value `v` to `min + floor(v * (max - min + 1))`,
 * so `0` is always `min` and `0.999` is always `max`.
 *
 * @module utils/scripted-random
 */

import { randomInt, type RandomSource } from "./random.js";

export class ScriptedRandom implements RandomSource {
	private readonly values: number[];
	private readonly fallback?: number;
	/** Number of `next()` calls made so far. */
	draws = 0;

	/**
	 * @param values Values returned by `next()`, in order
	 * @param fallback Returned once `values` runs out; without it an
	 * exhausted script throws
	 */
	constructor(values: ReadonlyArray<number>, fallback?: number) {
		this.values = [...values];
		this.fallback = fallback;
	}

	next(): number {
		this.draws++;
		const value = this.values.shift();
		if (value !== undefined) return value;
		if (this.fallback !== undefined) return this.fallback;
		throw new Error(`Scripted random exhausted after ${this.draws - 1} draw(s)`);
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
