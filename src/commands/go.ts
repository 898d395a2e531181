/**
 * Move through an exit of the current room.
 *
 * @example
 * ```
 * go east
 * go w
 * ```
 *
 * **Pattern:** `go <direction:direction>`
 * @module commands/go
 */

import {
	directionArgument,
	requireActor,
	type ArgumentValue,
	type CommandContext,
} from "../core/command.js";
import { getRoom, roomExit } from "../core/dungeon.js";
import type { CommandObject } from "../package/commands.js";
import { showRoom } from "./look.js";

const USAGE = "Usage: go n|e|s|w";

export default {
	pattern: "go <direction:direction>",
	execute(context: CommandContext, args: Map<string, ArgumentValue>): void {
		const { world, session } = context;
		const actor = requireActor(context);
		const direction = directionArgument(args, "direction");
		if (direction === undefined) {
			session.emit(USAGE);
			return;
		}

		const destination = roomExit(actor.roomId, direction);
		if (destination === undefined) {
			session.emit("No exit that way.");
			return;
		}

		world.placeActor(actor, destination);
		session.emit(`You move to ${getRoom(destination).name}.`);
		showRoom(world, session, actor);
	},

	onError(context: CommandContext): void {
		context.session.emit(USAGE);
	},
} satisfies CommandObject;
