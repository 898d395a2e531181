/**
 * Quit command.
 *
 * Says goodbye and asks the channel to close the connection once the reply
 * has been flushed. The session's actor is removed when the session stops.
 *
 * **Pattern:** `quit`
 * @module commands/quit
 */

import { GAME_EVENT, type CommandContext } from "../core/command.js";
import type { CommandObject } from "../package/commands.js";

export default {
	pattern: "quit",
	requiresLogin: false,
	execute(context: CommandContext): GAME_EVENT {
		context.session.emit("Goodbye.");
		return GAME_EVENT.QUIT;
	},
} satisfies CommandObject;
