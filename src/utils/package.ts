/**
 * A loadable unit of game content. Packages read files from `data/`, fill
 * a registry, and may depend on other packages being loaded first.
 *
 * @example
 * ```typescript
 * export default {
 * 	name: "floors",
 * 	dependencies: [bestiaryPkg],
 * 	loader: async () => {
 * 		await loadFloors();
 * 	},
 * } satisfies Package;
 * ```
 *
 * @module utils/package
 */
export interface Package {
	name: string;
	dependencies?: Package[];
	loader: () => Promise<void>;
}
