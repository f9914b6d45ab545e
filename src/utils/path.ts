import { join } from "path";

/**
 * Returns the directory the engine resolves `data/` and `logs/` against.
 * Prefers the `UNDERCROFT_ROOT` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const configured = process.env.UNDERCROFT_ROOT;

	if (configured) {
		return configured;
	}

	return process.cwd();
}

/**
 * Directory holding `config.yaml`, `mobs/` and `floors/`.
 */
export function getDataDirectory(): string {
	return join(getSafeRootDirectory(), "data");
}
