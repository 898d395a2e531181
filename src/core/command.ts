/**
 * Pattern-based command dispatch.
 *
 * A command declares a pattern made of its name and at most one argument
 * placeholder, which captures the rest of the line:
 * - `<name:type>` required, `<name:type?>` optional
 * - types: `text` (raw remainder, spaces included) and `direction`
 *
 * `CommandRegistry.execute()` is the single entry point for a line. Checks
 * run in a fixed order and the first failure answers the session with one
 * line and stops:
 * 1. unknown command: the help line
 * 2. lifecycle gate: a tip naming the required and current stage
 * 3. login: `login first`
 * 4. argument parsing: the command's `onError()`, or its usage
 *
 * A handler that throws is logged and the session receives
 * `Something went wrong.`; nothing propagates to the caller.
 *
 * @example
 * ```ts
 * import { CommandRegistry, type CommandContext } from "./command.js";
 *
 * class Wave extends Command {
 *   constructor() { super({ pattern: "wave <target:text?>" }); }
 *   execute(ctx: CommandContext) { ctx.session.emit("You wave."); }
 * }
 * const registry = new CommandRegistry();
 * registry.register(new Wave());
 * registry.execute("wave", { world, session, actor });
 * ```
 *
 * @module core/command
 */
import { DIRECTION, text2dir } from "../direction.js";
import logger from "../logger.js";
import type { Actor } from "./actor.js";
import { findGate, gateTip } from "./lifecycle.js";
import type { Session } from "./session.js";
import type { World } from "./world.js";

/** Flags returned from line handling. */
export enum GAME_EVENT {
	NONE = 0,
	/** The world was reset; the tick driver should be re-armed. */
	RESET = 1 << 0,
	/** The player asked to leave; the channel should close the connection. */
	QUIT = 1 << 1,
}

export enum ARGUMENT_TYPE {
	TEXT = "text",
	DIRECTION = "direction",
}

export type ArgumentValue = string | DIRECTION;

export interface ArgumentConfig {
	name: string;
	type: ARGUMENT_TYPE;
	optional: boolean;
}

export interface CommandContext {
	world: World;
	session: Session;
	/** The session's actor, when logged in. */
	actor?: Actor;
}

export interface ParseResult {
	success: boolean;
	args: Map<string, ArgumentValue>;
	error?: string;
}

export interface CommandOptions {
	pattern: string;
	/** Defaults to true. */
	requiresLogin?: boolean;
}

export const UNKNOWN_COMMAND_MESSAGE =
	"Unknown command. Try: look/go/grab/analyze/feed/clean/rescue/clear/pet/debug/sing/reset/inventory/state/say/quit";
export const LOGIN_REQUIRED_MESSAGE = "login first";
export const COMMAND_FAILED_MESSAGE = "Something went wrong.";

const PLACEHOLDER = /^<(\w+):(\w+)(\?)?>$/;

function isArgumentType(value: string): value is ARGUMENT_TYPE {
	return value === ARGUMENT_TYPE.TEXT || value === ARGUMENT_TYPE.DIRECTION;
}

/**
 * Split a pattern into its command name and optional argument.
 *
 * @example
 * ```ts
 * parsePattern("go <direction:direction>");
 * // { name: "go", argument: { name: "direction", type: "direction", optional: false } }
 * ```
 */
export function parsePattern(pattern: string): { name: string; argument?: ArgumentConfig } {
	const [name, placeholder, ...extra] = pattern.trim().split(/\s+/);
	if (!name || extra.length > 0) {
		throw new Error(`Invalid command pattern "${pattern}"`);
	}
	if (placeholder === undefined) return { name };
	const match = PLACEHOLDER.exec(placeholder);
	if (!match || !isArgumentType(match[2])) {
		throw new Error(`Invalid argument placeholder "${placeholder}" in "${pattern}"`);
	}
	return {
		name,
		argument: { name: match[1], type: match[2], optional: match[3] === "?" },
	};
}

/**
 * The actor of a command that requires login. The registry checks login
 * before a handler runs, so a missing actor here is a registration mistake.
 */
export function requireActor(context: CommandContext): Actor {
	if (!context.actor) {
		throw new Error("command requires a logged-in actor");
	}
	return context.actor;
}

export function textArgument(
	args: Map<string, ArgumentValue>,
	name: string
): string | undefined {
	const value = args.get(name);
	return typeof value === "string" ? value : undefined;
}

export function directionArgument(
	args: Map<string, ArgumentValue>,
	name: string
): DIRECTION | undefined {
	const value = args.get(name);
	return typeof value === "number" ? value : undefined;
}

export abstract class Command {
	readonly name: string;
	readonly pattern: string;
	readonly argument?: ArgumentConfig;
	readonly requiresLogin: boolean;

	constructor(options: CommandOptions) {
		const parsed = parsePattern(options.pattern);
		this.pattern = options.pattern;
		this.name = parsed.name;
		this.argument = parsed.argument;
		this.requiresLogin = options.requiresLogin ?? true;
	}

	/**
	 * Parse the text after the command name. Extra text for a command that
	 * takes no argument is ignored.
	 */
	parse(rest: string | undefined): ParseResult {
		const args = new Map<string, ArgumentValue>();
		const argument = this.argument;
		if (!argument) return { success: true, args };

		if (rest === undefined || rest.length === 0) {
			if (argument.optional) return { success: true, args };
			return {
				success: false,
				args,
				error: `Missing required argument: ${argument.name}`,
			};
		}

		switch (argument.type) {
			case ARGUMENT_TYPE.TEXT:
				args.set(argument.name, rest);
				return { success: true, args };
			case ARGUMENT_TYPE.DIRECTION: {
				const dir = text2dir(rest);
				if (dir === undefined) {
					return { success: false, args, error: `Invalid direction: ${rest}` };
				}
				args.set(argument.name, dir);
				return { success: true, args };
			}
		}
	}

	abstract execute(
		context: CommandContext,
		args: Map<string, ArgumentValue>
	): GAME_EVENT | void;

	onError?(context: CommandContext, result: ParseResult): void;
}

export class CommandRegistry {
	private readonly commands = new Map<string, Command>();

	register(command: Command): void {
		if (this.commands.has(command.name)) {
			throw new Error(`Command "${command.name}" is already registered`);
		}
		this.commands.set(command.name, command);
	}

	unregister(command: Command): void {
		if (this.commands.get(command.name) === command) {
			this.commands.delete(command.name);
		}
	}

	get(name: string): Command | undefined {
		return this.commands.get(name);
	}

	getCommands(): Command[] {
		return [...this.commands.values()];
	}

	/**
	 * Dispatch one input line (without its newline).
	 * The caller holds the world lock.
	 */
	execute(line: string, context: CommandContext): GAME_EVENT {
		if (line.trim().length === 0) return GAME_EVENT.NONE;

		const space = line.indexOf(" ");
		const name = space < 0 ? line : line.slice(0, space);
		const rest = space < 0 ? undefined : line.slice(space + 1);
		const { session, world } = context;

		const command = this.commands.get(name);
		if (!command) {
			session.emit(UNKNOWN_COMMAND_MESSAGE);
			return GAME_EVENT.NONE;
		}

		const gate = findGate(command.name);
		if (gate && world.state.lifecycle < gate.stage) {
			session.emit(gateTip(gate, world.state.lifecycle));
			return GAME_EVENT.NONE;
		}

		if (command.requiresLogin && !context.actor) {
			session.emit(LOGIN_REQUIRED_MESSAGE);
			return GAME_EVENT.NONE;
		}

		try {
			const result = command.parse(rest);
			if (!result.success) {
				if (command.onError) {
					command.onError(context, result);
				} else {
					session.emit(`Usage: ${command.pattern}`);
				}
				return GAME_EVENT.NONE;
			}
			return command.execute(context, result.args) ?? GAME_EVENT.NONE;
		} catch (error) {
			logger.error(`Command "${command.name}" failed for session ${session.id}: ${error}`);
			session.emit(COMMAND_FAILED_MESSAGE);
			return GAME_EVENT.NONE;
		}
	}
}
