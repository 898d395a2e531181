/**
 * Login command.
 *
 * Spawns the session's helper thread (its actor) in the start room under the
 * given display name, then tells the player where the Monster's lifecycle
 * stands and shows the room.
 *
 * @example
 * ```
 * login ada
 * ```
 *
 * **Pattern:** `login <name:text?>`
 * @module commands/login
 */

import { textArgument, type ArgumentValue, type CommandContext } from "../core/command.js";
import { availableCommandsLine, goalLine } from "../core/lifecycle.js";
import { stageName } from "../core/system.js";
import logger from "../logger.js";
import type { CommandObject } from "../package/commands.js";
import { showRoom } from "./look.js";

export default {
	pattern: "login <name:text?>",
	requiresLogin: false,
	execute(context: CommandContext, args: Map<string, ArgumentValue>): void {
		const { world, session } = context;
		if (context.actor) {
			session.emit("Already logged in.");
			return;
		}

		const name = textArgument(args, "name")?.trim() ?? "";
		if (name.length === 0) {
			session.emit("Usage: login <name>");
			return;
		}

		const actor = world.createActor(name);
		if (!actor) {
			logger.warn(`Session ${session.id} could not log in as ${name}: roster full`);
			session.emit("Unable to spawn a helper thread right now.");
			return;
		}
		session.actorId = actor.id;
		logger.info(`Session ${session.id} logged in as ${actor.name}`);

		session.emit(`[PROC] Helper thread ${actor.name} spawned.`);
		session.emit(`[LIFECYCLE] Current stage: ${stageName(world.state.lifecycle)}.`);
		session.emit(availableCommandsLine(world.state.lifecycle));
		session.emit(goalLine(world.state.lifecycle));
		showRoom(world, session, actor);
	},
} satisfies CommandObject;
