/**
 * Package: commands - built-in command loader
 *
 * Every file under `src/commands` default-exports a plain command object:
 * - `pattern: string` - the command pattern (see {@link Command})
 * - `requiresLogin?: boolean` - defaults to true
 * - `execute(context, args)` - handler, may return a {@link GAME_EVENT}
 * - `onError?(context, result)` - optional argument-error handler
 *
 * `loadCommands()` wraps each object in a {@link JavaScriptCommandAdapter}
 * and registers it. The package loader fills the shared
 * `COMMAND_REGISTRY`, replacing whatever it held.
 *
 * @example
 * ```ts
 * const registry = new CommandRegistry();
 * loadCommands(registry);
 * registry.execute("look", context);
 * ```
 *
 * @module package/commands
 */
import {
	Command,
	CommandRegistry,
	GAME_EVENT,
	type ArgumentValue,
	type CommandContext,
	type ParseResult,
} from "../core/command.js";
import type { Package } from "package-loader";
import logger from "../logger.js";
import { COMMAND_REGISTRY, clearCommands } from "../registry/command.js";
import analyze from "../commands/analyze.js";
import clean from "../commands/clean.js";
import clear from "../commands/clear.js";
import debug from "../commands/debug.js";
import feed from "../commands/feed.js";
import go from "../commands/go.js";
import grab from "../commands/grab.js";
import inventory from "../commands/inventory.js";
import login from "../commands/login.js";
import look from "../commands/look.js";
import pet from "../commands/pet.js";
import quit from "../commands/quit.js";
import rescue from "../commands/rescue.js";
import reset from "../commands/reset.js";
import say from "../commands/say.js";
import sing from "../commands/sing.js";
import state from "../commands/state.js";

export interface CommandObject {
	pattern: string;
	requiresLogin?: boolean;
	execute: (
		context: CommandContext,
		args: Map<string, ArgumentValue>
	) => GAME_EVENT | void;
	onError?: (context: CommandContext, result: ParseResult) => void;
}

export const BUILTIN_COMMANDS: ReadonlyArray<CommandObject> = [
	login,
	look,
	go,
	say,
	state,
	inventory,
	quit,
	grab,
	analyze,
	feed,
	clean,
	rescue,
	clear,
	pet,
	debug,
	sing,
	reset,
];

export class JavaScriptCommandAdapter extends Command {
	private executeFunction: CommandObject["execute"];

	constructor(commandObj: CommandObject) {
		super({ pattern: commandObj.pattern, requiresLogin: commandObj.requiresLogin });
		this.executeFunction = commandObj.execute;
		// without a handler the registry prints the usage line
		if (commandObj.onError) this.onError = commandObj.onError;
	}

	execute(context: CommandContext, args: Map<string, ArgumentValue>): GAME_EVENT | void {
		return this.executeFunction(context, args);
	}
}

/**
 * Register command objects with a registry.
 * @returns The adapters that were registered
 */
export function loadCommands(
	registry: CommandRegistry,
	commands: ReadonlyArray<CommandObject> = BUILTIN_COMMANDS
): Command[] {
	const loaded: Command[] = [];
	for (const commandObj of commands) {
		const command = new JavaScriptCommandAdapter(commandObj);
		registry.register(command);
		loaded.push(command);
		logger.debug(`Loaded command "${commandObj.pattern}"`);
	}
	logger.info(`Loaded ${loaded.length} commands`);
	return loaded;
}

export default {
	name: "commands",
	loader: async () => {
		clearCommands();
		loadCommands(COMMAND_REGISTRY);
	},
} satisfies Package;
