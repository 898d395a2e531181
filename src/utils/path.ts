import { isAbsolute, join } from "path";

/**
 * Returns the root directory runtime files (config, status, logs) live under.
 * Prefers the `CARETAKERS_HOME` environment variable and falls back to
 * `process.cwd()` otherwise.
 */
export function getSafeRootDirectory(): string {
	const home = process.env.CARETAKERS_HOME;

	if (home) {
		return home;
	}

	return process.cwd();
}

/**
 * Resolve a configured path against the root directory.
 * Absolute paths are returned untouched.
 */
export function resolveRootPath(path: string): string {
	if (isAbsolute(path)) return path;
	return join(getSafeRootDirectory(), path);
}
