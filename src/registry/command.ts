/**
 * Registry: command - the game's command set
 *
 * Holds the process-wide {@link CommandRegistry} the commands package fills
 * at boot and `startGame()` dispatches through.
 *
 * @module registry/command
 */
import { CommandRegistry } from "../core/command.js";

export const COMMAND_REGISTRY = new CommandRegistry();

/** Drop every registered command. */
export function clearCommands(): void {
	for (const command of COMMAND_REGISTRY.getCommands()) {
		COMMAND_REGISTRY.unregister(command);
	}
}
