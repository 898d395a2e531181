/**
 * Say command for room chat.
 *
 * Sends `<name> says: <message>` to every logged-in player in the speaker's
 * room, the speaker included.
 *
 * @example
 * ```
 * say the buffet is restocked
 * ```
 *
 * **Pattern:** `say <message:text?>`
 * @module commands/say
 */

import {
	requireActor,
	textArgument,
	type ArgumentValue,
	type CommandContext,
} from "../core/command.js";
import type { CommandObject } from "../package/commands.js";

export default {
	pattern: "say <message:text?>",
	execute(context: CommandContext, args: Map<string, ArgumentValue>): void {
		const actor = requireActor(context);
		const message = textArgument(args, "message") ?? "";
		context.world.broadcastRoom(actor.roomId, `${actor.name} says: ${message}`);
	},
} satisfies CommandObject;
