/**
 * Registry: config - centralized configuration access
 *
 * Provides a centralized location for accessing the game configuration.
 * The CONFIG object is loaded and updated by the config package, which also
 * validates and clamps every value before it lands here.
 *
 * @module registry/config
 */

/**
 * Deep readonly utility type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = {
	readonly [P in keyof T]: T[P] extends object ? DeepReadonly<T[P]> : T[P];
};

export { READONLY_CONFIG as CONFIG };

/** Smallest non-zero tick interval the driver accepts. */
export const MIN_TICK_MS = 10;
/** Largest tick interval the driver accepts. */
export const MAX_TICK_MS = 60 * 1000;
/** Smallest per-session output queue. */
export const MIN_OUTPUT_QUEUE_BYTES = 512;

export type GameConfig = {
	name: string;
	max_players: number;
};

export type ServerConfig = {
	host: string;
	port: number;
};

export type SimulationConfig = {
	/** Tick interval in milliseconds, 0 = paused. */
	tick_ms: number;
	start_room: number;
	/** 0 = non-deterministic randomness. */
	rng_seed: number;
	output_queue_bytes: number;
};

export type StatusConfig = {
	enabled: boolean;
	path: string;
};

export type Config = {
	game: GameConfig;
	server: ServerConfig;
	simulation: SimulationConfig;
	status: StatusConfig;
};

export const CONFIG_DEFAULT: DeepReadonly<Config> = {
	game: {
		name: "Kernel Caretakers",
		max_players: 32,
	},
	server: {
		host: "127.0.0.1",
		port: 4040,
	},
	simulation: {
		tick_ms: 250,
		start_room: 0,
		rng_seed: 0,
		output_queue_bytes: 4096,
	},
	status: {
		enabled: true,
		path: "data/status.yaml",
	},
} as const;

/**
 * Make a fresh, mutable copy of the defaults.
 */
export function copyDefaultConfig(): Config {
	return {
		game: { ...CONFIG_DEFAULT.game },
		server: { ...CONFIG_DEFAULT.server },
		simulation: { ...CONFIG_DEFAULT.simulation },
		status: { ...CONFIG_DEFAULT.status },
	};
}

// make a copy of the default, don't reference it directly
const CONFIG: Config = copyDefaultConfig();

// export a readonly version of the config
const READONLY_CONFIG: DeepReadonly<Config> = CONFIG;

/**
 * Set the config object.
 * @param config - The config object to set.
 */
export function setConfig(config: Config) {
	CONFIG.game = config.game;
	CONFIG.server = config.server;
	CONFIG.simulation = config.simulation;
	CONFIG.status = config.status;
}

/**
 * Clamp a tick interval to what the driver supports.
 * 0 means paused and is kept; anything else lands in [MIN_TICK_MS, MAX_TICK_MS].
 *
 * @example
 * ```typescript
 * clampTickInterval(0);      // 0 (paused)
 * clampTickInterval(1);      // 10
 * clampTickInterval(90_000); // 60000
 * ```
 */
export function clampTickInterval(ms: number): number {
	if (!Number.isFinite(ms) || ms <= 0) return 0;
	const whole = Math.floor(ms);
	if (whole < MIN_TICK_MS) return MIN_TICK_MS;
	if (whole > MAX_TICK_MS) return MAX_TICK_MS;
	return whole;
}
