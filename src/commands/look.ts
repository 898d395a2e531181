/**
 * Look command for viewing the current room.
 *
 * Renders the room header and description, its exits, the system stat line,
 * active helpers, the Monster's condition (Nursery only), the numbered
 * objects lying around and the other players present.
 *
 * @example
 * ```
 * look
 * ```
 *
 * **Pattern:** `look`
 * @module commands/look
 */

import type { Actor } from "../core/actor.js";
import { requireActor, type CommandContext } from "../core/command.js";
import { ROOM_ID, getRoom } from "../core/dungeon.js";
import { ITEM_FLAG, ITEM_TYPE, hasFlag, itemName } from "../core/item.js";
import type { Session } from "../core/session.js";
import { helperNames, monsterMoodName, stageName } from "../core/system.js";
import type { World } from "../core/world.js";
import { DIRECTIONS, dir2text } from "../direction.js";
import type { CommandObject } from "../package/commands.js";

export function showRoom(world: World, session: Session, actor: Actor): void {
	const room = getRoom(actor.roomId);
	const state = world.state;

	session.emit("");
	session.emit(`== ${room.name} ==`);
	session.emit(room.description);

	const exits = DIRECTIONS.filter((dir) => room.exits[dir] !== undefined).map(dir2text);
	session.emit(`[EXITS] ${exits.join(" ")}`);

	session.emit(
		`[STATE] stability=${state.stability} hunger=${state.hunger} mood=${state.mood} ` +
			`trust=${state.trust} tick=${state.tick} junk=${state.junkLoad}` +
			(state.daemonLost ? " daemon-lost" : "")
	);

	const helpers = helperNames(state.helper.helpers);
	if (helpers.length > 0) session.emit(`[HELPERS] ${helpers.join(" ")}`);

	if (actor.roomId === ROOM_ID.NURSERY) {
		session.emit(`[MONSTER] The Friendly Monster is ${monsterMoodName(state.monsterMood)}.`);
		session.emit(`[LIFECYCLE] Stage ${stageName(state.lifecycle)}.`);
	}

	session.emit("Objects here:");
	let shown = 0;
	world
		.objects(actor.roomId)
		.entries()
		.forEach((object, index) => {
			if (object.type === ITEM_TYPE.NONE) return;
			shown++;
			const id = hasFlag(object, ITEM_FLAG.IDENTIFIED) ? " [id]" : "";
			const weird = hasFlag(object, ITEM_FLAG.MUTATED) ? " [weird]" : "";
			session.emit(
				`  ${index + 1}) ${itemName(object.type)}${id} (ttl ${object.ttl || 1})${weird}`
			);
		});
	if (shown === 0) session.emit("  (nothing interesting)");

	session.emit("Players present:");
	const others = world.occupantsOf(actor.roomId).filter((other) => other !== actor);
	if (others.length === 0) session.emit("  (just you)");
	for (const other of others) session.emit(`  ${other.name}`);
}

export default {
	pattern: "look",
	execute(context: CommandContext): void {
		showRoom(context.world, context.session, requireActor(context));
	},
} satisfies CommandObject;
