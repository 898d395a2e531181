/**
 * Inventory command.
 *
 * Lists every inventory slot, empty ones included, so slot numbers line up
 * with what `analyze`, `feed` and `clean` expect.
 *
 * @example
 * ```
 * inventory
 * ```
 *
 * **Pattern:** `inventory`
 * @module commands/inventory
 */

import { INVENTORY_SLOTS } from "../core/actor.js";
import { requireActor, type CommandContext } from "../core/command.js";
import { ITEM_FLAG, ITEM_TYPE, hasFlag, itemName } from "../core/item.js";
import type { CommandObject } from "../package/commands.js";

export default {
	pattern: "inventory",
	execute(context: CommandContext): void {
		const { session } = context;
		const actor = requireActor(context);
		session.emit(`Inventory (slots ${INVENTORY_SLOTS}):`);
		actor.inventory.forEach((item, index) => {
			if (item.type === ITEM_TYPE.NONE) {
				session.emit(`  ${index + 1}) -- empty --`);
				return;
			}
			const id = hasFlag(item, ITEM_FLAG.IDENTIFIED) ? " [id]" : "";
			session.emit(`  ${index + 1}) ${itemName(item.type)}${id}`);
		});
	},
} satisfies CommandObject;
