/**
 * Deep readonly utility type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = {
	readonly [P in keyof T]: T[P] extends object ? DeepReadonly<T[P]> : T[P];
};

/**
 * Inclusive integer range, `{ min: 2, max: 5 }` covers 2, 3, 4 and 5.
 */
export interface IntRange {
	min: number;
	max: number;
}
