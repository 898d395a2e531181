/**
 * Reset command.
 *
 * Restores the kernel after a crash: a fresh system state and RNG sequence,
 * empty rooms, and every helper back in the start room with empty pockets.
 * Returns {@link GAME_EVENT.RESET} so the tick driver is re-armed.
 *
 * **Pattern:** `reset`
 * @module commands/reset
 */

import { GAME_EVENT, requireActor, type CommandContext } from "../core/command.js";
import { availableCommandsLine, goalLine } from "../core/lifecycle.js";
import logger from "../logger.js";
import type { CommandObject } from "../package/commands.js";

export default {
	pattern: "reset",
	execute(context: CommandContext): GAME_EVENT {
		const { world, session } = context;
		const actor = requireActor(context);
		if (!world.state.crashed) {
			session.emit("System still running. No reset needed.");
			return GAME_EVENT.NONE;
		}

		world.reset();
		logger.info(`World reset by ${actor.name} (session ${session.id})`);
		world.broadcastAll(goalLine(world.state.lifecycle));
		world.broadcastAll(availableCommandsLine(world.state.lifecycle));
		world.broadcastAll(`[PROC] ${actor.name} restores the kernel. New shift begins!`);
		session.emit("System reset complete. Everyone wakes in /proc/nursery.");
		return GAME_EVENT.RESET;
	},
} satisfies CommandObject;
