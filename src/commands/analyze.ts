/**
 * Analyze command.
 *
 * Identifies a held item. Mutated resources are revealed as plain junk data.
 *
 * @example
 * ```
 * analyze
 * analyze 2
 * analyze sel
 * ```
 *
 * **Pattern:** `analyze <slot:text?>`
 * @module commands/analyze
 */

import { requireActor, type ArgumentValue, type CommandContext } from "../core/command.js";
import { ITEM_FLAG, ITEM_TYPE, hasFlag, isJunk, itemName } from "../core/item.js";
import type { CommandObject } from "../package/commands.js";
import { requireHeldSlot } from "./_care.js";

export default {
	pattern: "analyze <slot:text?>",
	execute(context: CommandContext, args: Map<string, ArgumentValue>): void {
		const { session } = context;
		const actor = requireActor(context);
		const held = requireHeldSlot(context, actor, args, "Usage: analyze <slot#>");
		if (!held) return;

		const item = held.item;
		item.flags |= ITEM_FLAG.IDENTIFIED;
		if (hasFlag(item, ITEM_FLAG.MUTATED)) {
			item.type = ITEM_TYPE.JUNK_DATA;
			item.flags &= ~ITEM_FLAG.MUTATED;
			session.emit("Analysis complete: corrupted -> junk data.");
			return;
		}
		if (isJunk(item.type)) {
			session.emit(`Analysis: ${itemName(item.type)} is junk. Handle carefully.`);
			return;
		}
		session.emit(`Analysis: ${itemName(item.type)} looks tasty for the Monster.`);
	},
} satisfies CommandObject;
