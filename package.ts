/**
 * Loads every content package (config, bestiary, floors) in dependency
 * order.
 *
 * 1. Collects the packages and everything they depend on
 * 2. Sorts them topologically (dependencies first)
 * 3. Runs each loader inside a timed `logger.block`
 */

import logger from "./src/utils/logger.js";
import type { Package } from "./src/utils/package.js";
import configPkg from "./src/package/config.js";
import bestiaryPkg from "./src/package/bestiary.js";
import floorsPkg from "./src/package/floors.js";

export const PACKAGES: ReadonlyArray<Package> = [configPkg, bestiaryPkg, floorsPkg];

/**
 * Every package reachable from `roots`, keyed by name. A second package
 * object reusing a name is a configuration error.
 */
function collectPackages(roots: ReadonlyArray<Package>): Map<string, Package> {
	const byName = new Map<string, Package>();
	const pending = [...roots];
	for (let pkg = pending.shift(); pkg; pkg = pending.shift()) {
		const known = byName.get(pkg.name);
		if (known) {
			if (known !== pkg) throw new Error(`Two packages are named "${pkg.name}"`);
			continue;
		}
		byName.set(pkg.name, pkg);
		pending.push(...(pkg.dependencies ?? []));
	}
	return byName;
}

/**
 * Topological sort of packages based on dependencies.
 * Returns packages in order: dependencies first, dependents last. Packages
 * with no ordering constraint between them keep their input order.
 *
 * @throws {Error} on a dependency cycle
 */
export function sortPackages(roots: ReadonlyArray<Package>): Package[] {
	const packages = collectPackages(roots);
	const sorted: Package[] = [];
	const visited = new Set<string>();
	const visiting: string[] = [];

	function visit(pkg: Package): void {
		if (visiting.includes(pkg.name)) {
			const cycle = visiting.slice(visiting.indexOf(pkg.name)).concat(pkg.name);
			throw new Error(`Circular dependency detected: ${cycle.join(" -> ")}`);
		}
		if (visited.has(pkg.name)) return;

		visiting.push(pkg.name);
		for (const dep of pkg.dependencies ?? []) visit(dep);
		visiting.pop();

		visited.add(pkg.name);
		sorted.push(pkg);
	}

	for (const pkg of packages.values()) visit(pkg);
	return sorted;
}

/**
 * Load all packages in dependency order.
 */
export async function loadAllPackages(
	packages: ReadonlyArray<Package> = PACKAGES
): Promise<void> {
	const sorted = sortPackages(packages);
	logger.info(`Loading ${sorted.length} package(s) in dependency order...`);

	for (const pkg of sorted) {
		await logger.block(pkg.name, async () => {
			logger.debug(`Loading package: ${pkg.name}`);
			await pkg.loader();
		});
	}

	logger.info(`Successfully loaded ${sorted.length} package(s)`);
}
