/**
 * Package: config - YAML configuration loader
 *
 * Loads `data/config.yaml` (creating it with defaults if missing), validates
 * every known key and merges the result into the in-memory `CONFIG` object
 * from the config registry.
 *
 * Behavior
 * - Reads YAML from `data/config.yaml` (or the path given to `loadConfig`)
 * - Merges only known keys from file into `CONFIG` (unknown keys ignored)
 * - Values of the wrong type fall back to their default with a warning
 * - Tick interval, start room, RNG seed and queue size are clamped here so
 *   the simulation never sees an out-of-range value
 * - If the file is absent, writes `CONFIG_DEFAULT` to disk
 *
 * @example
 * import configPkg from './package/config.js';
 * import { CONFIG } from '../registry/config.js';
 * await configPkg.loader();
 * console.log(CONFIG.simulation.tick_ms);
 *
 * @module package/config
 */
import { dirname, join, relative } from "path";
import { mkdir, readFile, rename, unlink, writeFile } from "fs/promises";
import YAML from "js-yaml";
import type { Package } from "package-loader";
import logger from "../logger.js";
import { getSafeRootDirectory } from "../utils/path.js";
import { ROOM_COUNT } from "../core/dungeon.js";
import {
	CONFIG_DEFAULT,
	MIN_OUTPUT_QUEUE_BYTES,
	clampTickInterval,
	copyDefaultConfig,
	setConfig,
	type Config,
} from "../registry/config.js";

const ROOT_DIRECTORY = getSafeRootDirectory();
export const CONFIG_PATH = join(ROOT_DIRECTORY, "data", "config.yaml");

type YAMLSection = Record<string, unknown>;

function isSection(value: unknown): value is YAMLSection {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(
	section: YAMLSection,
	path: string,
	key: string,
	fallback: number
): number {
	if (!(key in section)) return fallback;
	const value = section[key];
	if (typeof value === "number" && Number.isFinite(value)) {
		logger.debug(`Set ${path}.${key} = ${value}`);
		return value;
	}
	logger.warn(`Ignoring ${path}.${key}: expected a number, got ${String(value)}`);
	return fallback;
}

function readString(
	section: YAMLSection,
	path: string,
	key: string,
	fallback: string
): string {
	if (!(key in section)) return fallback;
	const value = section[key];
	if (typeof value === "string" && value.length > 0) {
		logger.debug(`Set ${path}.${key} = ${value}`);
		return value;
	}
	logger.warn(`Ignoring ${path}.${key}: expected a string, got ${String(value)}`);
	return fallback;
}

function readBoolean(
	section: YAMLSection,
	path: string,
	key: string,
	fallback: boolean
): boolean {
	if (!(key in section)) return fallback;
	const value = section[key];
	if (typeof value === "boolean") {
		logger.debug(`Set ${path}.${key} = ${value}`);
		return value;
	}
	logger.warn(`Ignoring ${path}.${key}: expected a boolean, got ${String(value)}`);
	return fallback;
}

function sectionOf(parsed: YAMLSection, key: string): YAMLSection {
	const value = parsed[key];
	return isSection(value) ? value : {};
}

/**
 * Validate and clamp a parsed YAML document into a complete `Config`.
 * Missing keys take their defaults; unknown keys are ignored.
 */
export function normalizeConfig(parsed: unknown): Config {
	const safe = copyDefaultConfig();
	if (!isSection(parsed)) return safe;

	const game = sectionOf(parsed, "game");
	safe.game.name = readString(game, "game", "name", safe.game.name);
	const maxPlayers = Math.floor(
		readNumber(game, "game", "max_players", safe.game.max_players)
	);
	if (maxPlayers < 1) {
		logger.warn(`game.max_players ${maxPlayers} is below 1, using 1`);
	}
	safe.game.max_players = Math.max(1, maxPlayers);

	const server = sectionOf(parsed, "server");
	safe.server.host = readString(server, "server", "host", safe.server.host);
	const port = Math.floor(readNumber(server, "server", "port", safe.server.port));
	if (port < 0 || port > 65535) {
		logger.warn(`server.port ${port} is out of range, using ${CONFIG_DEFAULT.server.port}`);
		safe.server.port = CONFIG_DEFAULT.server.port;
	} else {
		safe.server.port = port;
	}

	const simulation = sectionOf(parsed, "simulation");
	const tickMs = readNumber(simulation, "simulation", "tick_ms", safe.simulation.tick_ms);
	safe.simulation.tick_ms = clampTickInterval(tickMs);
	if (safe.simulation.tick_ms !== tickMs) {
		logger.warn(`simulation.tick_ms ${tickMs} clamped to ${safe.simulation.tick_ms}`);
	}

	const startRoom = readNumber(
		simulation,
		"simulation",
		"start_room",
		safe.simulation.start_room
	);
	if (!Number.isInteger(startRoom) || startRoom < 0 || startRoom >= ROOM_COUNT) {
		logger.warn(`simulation.start_room ${startRoom} is not a room, using the nursery`);
		safe.simulation.start_room = CONFIG_DEFAULT.simulation.start_room;
	} else {
		safe.simulation.start_room = startRoom;
	}

	const seed = readNumber(simulation, "simulation", "rng_seed", safe.simulation.rng_seed);
	if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
		logger.warn(`simulation.rng_seed ${seed} is not an unsigned 32-bit integer, using 0`);
		safe.simulation.rng_seed = 0;
	} else {
		safe.simulation.rng_seed = seed;
	}

	const queueBytes = Math.floor(
		readNumber(
			simulation,
			"simulation",
			"output_queue_bytes",
			safe.simulation.output_queue_bytes
		)
	);
	if (queueBytes < MIN_OUTPUT_QUEUE_BYTES) {
		logger.warn(
			`simulation.output_queue_bytes ${queueBytes} raised to ${MIN_OUTPUT_QUEUE_BYTES}`
		);
	}
	safe.simulation.output_queue_bytes = Math.max(MIN_OUTPUT_QUEUE_BYTES, queueBytes);

	const status = sectionOf(parsed, "status");
	safe.status.enabled = readBoolean(status, "status", "enabled", safe.status.enabled);
	safe.status.path = readString(status, "status", "path", safe.status.path);

	return safe;
}

async function writeDefaultConfig(path: string): Promise<void> {
	const defaultContent = YAML.dump(copyDefaultConfig(), {
		noRefs: true,
		lineWidth: 120,
	});
	const tempPath = `${path}.tmp`;
	await mkdir(dirname(path), { recursive: true });
	try {
		// Write to temporary file first
		await writeFile(tempPath, defaultContent, "utf-8");
		// Atomically rename temp file to final location
		await rename(tempPath, path);
		logger.debug("Default config file created");
	} catch (writeError) {
		await unlink(tempPath).catch((cleanupError: unknown) => {
			logger.debug(`Could not remove ${tempPath}: ${cleanupError}`);
		});
		throw writeError;
	}
}

function isMissingFile(error: unknown): boolean {
	return (
		typeof error === "object" &&
		error !== null &&
		"code" in error &&
		error.code === "ENOENT"
	);
}

/**
 * Load, validate and apply the configuration file.
 *
 * @param path - Config file location, `data/config.yaml` under the root by default
 * @returns The configuration that was applied
 */
export async function loadConfig(path: string = CONFIG_PATH): Promise<Config> {
	logger.debug(`Loading config from ${relative(ROOT_DIRECTORY, path)}`);
	let content: string;
	try {
		content = await readFile(path, "utf-8");
	} catch (error) {
		if (!isMissingFile(error)) throw error;
		logger.debug(`Config file not found, creating default at ${path}`);
		await writeDefaultConfig(path);
		const defaults = copyDefaultConfig();
		setConfig(defaults);
		return defaults;
	}

	let parsed: unknown;
	try {
		parsed = YAML.load(content);
	} catch (error) {
		logger.error(`Config file ${path} is not valid YAML, using defaults: ${error}`);
		parsed = undefined;
	}

	const safe = normalizeConfig(parsed);
	setConfig(safe);
	logger.info("Config loaded successfully");
	return safe;
}

export default {
	name: "config",
	loader: async () => {
		await loadConfig();
	},
} satisfies Package;
