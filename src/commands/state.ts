/**
 * Print the system stat line and the Monster's mood.
 *
 * **Pattern:** `state`
 * @module commands/state
 */

import type { CommandContext } from "../core/command.js";
import { monsterMoodName } from "../core/system.js";
import type { CommandObject } from "../package/commands.js";

export default {
	pattern: "state",
	execute(context: CommandContext): void {
		const { world, session } = context;
		const state = world.state;
		session.emit(
			`[STATE] stability=${state.stability} hunger=${state.hunger} mood=${state.mood} ` +
				`trust=${state.trust} tick=${state.tick} junk=${state.junkLoad} ` +
				`daemon_lost=${state.daemonLost ? "yes" : "no"}`
		);
		session.emit(`Monster: ${monsterMoodName(state.monsterMood)}`);
	},
} satisfies CommandObject;
