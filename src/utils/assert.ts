/**
 * Comparison assertions for tests, reporting like `assert.equal`.
 *
 * @example
 * ```typescript
 * import { between, lessThanOrEqual } from "../utils/assert.js";
 *
 * between(damage, 9, 15);
 * lessThanOrEqual(report.placements.length, freeCells);
 * ```
 *
 * @module utils/assert
 */

import assert from "node:assert";

type Comparator = (actual: number, expected: number) => boolean;

function check(
	passes: Comparator,
	operator: string,
	wording: string,
	stackStartFn: Function
): (actual: number, expected: number, message?: string) => void {
	return (actual, expected, message) => {
		if (passes(actual, expected)) return;
		throw new assert.AssertionError({
			message: message || `${actual} is not ${wording} ${expected}`,
			actual,
			expected: `${operator} ${expected}`,
			operator,
			stackStartFn,
		});
	};
}

/**
 * `greaterThan(5, 10)` throws "5 is not greater than 10".
 */
export function greaterThan(actual: number, expected: number, message?: string): void {
	check((a, e) => a > e, ">", "greater than", greaterThan)(actual, expected, message);
}

export function greaterThanOrEqual(
	actual: number,
	expected: number,
	message?: string
): void {
	check((a, e) => a >= e, ">=", "greater than or equal to", greaterThanOrEqual)(
		actual,
		expected,
		message
	);
}

export function lessThan(actual: number, expected: number, message?: string): void {
	check((a, e) => a < e, "<", "less than", lessThan)(actual, expected, message);
}

export function lessThanOrEqual(actual: number, expected: number, message?: string): void {
	check((a, e) => a <= e, "<=", "less than or equal to", lessThanOrEqual)(
		actual,
		expected,
		message
	);
}

/**
 * Asserts `min <= actual <= max`.
 *
 * @example
 * ```typescript
 * between(7, 1, 10); // passes
 * between(0, 1, 10); // throws "0 is not between 1 and 10"
 * ```
 */
export function between(actual: number, min: number, max: number, message?: string): void {
	if (actual >= min && actual <= max) return;
	throw new assert.AssertionError({
		message: message || `${actual} is not between ${min} and ${max}`,
		actual,
		expected: `${min}..${max}`,
		operator: "between",
		stackStartFn: between,
	});
}
