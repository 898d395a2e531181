/**
 * Game orchestration and server lifecycle.
 *
 * `Game` is the set of entry points the outside world drives: ticks,
 * input lines and session start/stop. Every one of them runs inside the
 * world lock. `startGame()` wires a `Game` to the TCP channel, the tick
 * driver and the status file; it expects the packages (config, commands,
 * status) to be loaded already.
 *
 * Connection flow
 * - accept: a `Session` is created and greeted
 * - data: the session splits raw bytes into lines; each line goes through
 *   `handleLine`
 * - output: a pump awaits the session queue and writes to the socket until
 *   the session closes, then closes the socket
 * - close: the session is stopped and its actor removed
 *
 * @example
 * ```ts
 * import { loadAllPackages } from "../package.js";
 * import { startGame } from "./game.js";
 * await loadAllPackages();
 * const stopGame = await startGame();
 * // ... later
 * await stopGame();
 * ```
 *
 * @module game
 */
import logger from "./logger.js";
import { CommandRegistry, GAME_EVENT } from "./core/command.js";
import { MudClient, MudServer } from "./core/io.js";
import { Session } from "./core/session.js";
import { snapshotStats, type GameStats } from "./core/system.js";
import { runTick } from "./core/tick.js";
import { World } from "./core/world.js";
import { loadCommands } from "./package/commands.js";
import { getStatusWriter } from "./package/status.js";
import { COMMAND_REGISTRY } from "./registry/command.js";
import { CONFIG, CONFIG_DEFAULT } from "./registry/config.js";
import { TickDriver } from "./tick-driver.js";

export const WELCOME_MESSAGE = "Welcome to /dev/monster.";
export const COMMAND_SUMMARY =
	"Commands: login <name>, look, go <dir>, grab <item>, analyze <slot>, feed <slot>, " +
	"clean <slot>, rescue, clear, pet, debug, sing, inventory, state, say <msg>, reset, quit";

export interface GameOptions {
	world?: World;
	/** Command set to dispatch to; the built-in commands when omitted. */
	registry?: CommandRegistry;
	/** Banner shown to new sessions. */
	name?: string;
	/** Output queue capacity of each new session. */
	queueBytes?: number;
}

export class Game {
	readonly world: World;
	readonly registry: CommandRegistry;
	readonly name: string;
	private readonly queueBytes: number;
	private nextSessionId = 1;

	constructor(options: GameOptions = {}) {
		this.world = options.world ?? new World();
		this.name = options.name ?? CONFIG_DEFAULT.game.name;
		this.queueBytes = options.queueBytes ?? CONFIG_DEFAULT.simulation.output_queue_bytes;
		if (options.registry) {
			this.registry = options.registry;
		} else {
			this.registry = new CommandRegistry();
			loadCommands(this.registry);
		}
	}

	/**
	 * Advance the simulation by one tick.
	 * @returns Whether the world is crashed
	 */
	tick(): boolean {
		return this.world.lock.run(() => runTick(this.world));
	}

	handleLine(session: Session, line: string): GAME_EVENT {
		return this.world.lock.run(() =>
			this.registry.execute(line, {
				world: this.world,
				session,
				actor: this.world.actorOf(session),
			})
		);
	}

	createSession(): Session {
		return new Session(this.nextSessionId++, this.queueBytes);
	}

	/** Register a session and greet it. */
	startSession(session: Session): void {
		this.world.lock.run(() => this.world.sessions.add(session));
		session.emit(`*** ${this.name} ***`);
		session.emit(WELCOME_MESSAGE);
		session.emit(COMMAND_SUMMARY);
		logger.debug(`Session ${session.id} started`);
	}

	/** Deregister a session, destroy its actor and close its queue. */
	stopSession(session: Session): void {
		const removed = this.world.lock.run(() => this.detach(session));
		session.close();
		if (removed) logger.debug(`Session ${session.id} stopped`);
	}

	/**
	 * Stop every session. `cleanup` runs for each one outside the world lock.
	 */
	shutdownSessions(cleanup?: (session: Session) => void): void {
		const sessions = this.world.lock.run(() => [...this.world.sessions]);
		logger.debug(`Shutting down ${sessions.length} session/s`);
		for (const session of sessions) {
			this.world.lock.run(() => this.detach(session));
			session.close();
			if (cleanup) cleanup(session);
		}
	}

	getStats(): GameStats {
		return this.world.lock.run(() => snapshotStats(this.world.state));
	}

	private detach(session: Session): boolean {
		if (!this.world.sessions.delete(session)) return false;
		if (session.actorId !== undefined) {
			this.world.removeActor(session.actorId);
			session.actorId = undefined;
		}
		return true;
	}
}

/**
 * Copy a session's queued output to its client until the session closes,
 * then close the client.
 */
export async function pumpOutput(session: Session, client: MudClient): Promise<void> {
	for (;;) {
		const chunk = await session.read();
		if (chunk.length === 0) break;
		client.send(chunk);
	}
	client.close();
}

/**
 * Hook a client up to a fresh session of `game`.
 * @param onEvent receives every non-NONE event a line produced
 */
export function attachClient(
	game: Game,
	client: MudClient,
	onEvent: (event: GAME_EVENT) => void = () => {}
): Session {
	const session = game.createSession();
	game.startSession(session);
	logger.info(`Session ${session.id} opened for ${client.getAddress()}`);

	pumpOutput(session, client).catch((error: unknown) => {
		logger.error(`Output pump for session ${session.id} failed: ${error}`);
		client.close();
	});

	client.on("data", (chunk: Buffer) => {
		for (const line of session.receive(chunk)) {
			if (session.closed) return;
			const event = game.handleLine(session, line);
			if (event !== GAME_EVENT.NONE) onEvent(event);
			if (event & GAME_EVENT.QUIT) {
				game.stopSession(session);
				return;
			}
		}
	});

	client.on("close", () => {
		game.stopSession(session);
		logger.info(`Session ${session.id} closed`);
	});

	return session;
}

/**
 * Start the game with graceful shutdown handling.
 *
 * @returns A function to stop the game server
 *
 * @example
 * ```ts
 * const stopGame = await startGame();
 * // ... application runs ...
 * await stopGame();
 * ```
 */
export async function startGame(): Promise<() => Promise<void>> {
	const world = new World({
		seed: CONFIG.simulation.rng_seed,
		startRoom: CONFIG.simulation.start_room,
		maxPlayers: CONFIG.game.max_players,
	});
	const game = new Game({
		world,
		registry: COMMAND_REGISTRY,
		name: CONFIG.game.name,
		queueBytes: CONFIG.simulation.output_queue_bytes,
	});

	const status = getStatusWriter();

	const driver = new TickDriver({
		intervalMs: CONFIG.simulation.tick_ms,
		tick: () => {
			const crashed = game.tick();
			if (status) {
				status.write(game.getStats()).catch((error: unknown) => {
					logger.error(`Status write failed: ${error}`);
				});
			}
			return crashed;
		},
	});

	const server = new MudServer();
	server.on("connection", (client: MudClient) => {
		attachClient(game, client, (event) => {
			if (event & GAME_EVENT.RESET) driver.rearm();
		});
	});

	let stopping: Promise<void> | undefined;
	const stop = (): Promise<void> => {
		if (!stopping) {
			stopping = (async () => {
				process.removeListener("SIGINT", onSigint);
				driver.stop();
				game.shutdownSessions();
				await server.stop();
				logger.info("Game stopped");
			})();
		}
		return stopping;
	};

	const onSigint = (): void => {
		logger.info("Shutting down gracefully...");
		stop().then(
			() => process.exit(0),
			(error: unknown) => {
				logger.error(`Shutdown failed: ${error}`);
				process.exit(1);
			}
		);
	};
	process.on("SIGINT", onSigint);

	try {
		await server.start(CONFIG.server.port, CONFIG.server.host);
	} catch (error) {
		process.removeListener("SIGINT", onSigint);
		throw error;
	}
	driver.start();
	logger.info(`${CONFIG.game.name} listening on ${CONFIG.server.host}:${CONFIG.server.port}`);
	return stop;
}
