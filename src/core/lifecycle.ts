/**
 * Lifecycle stages, their thresholds and the commands each stage unlocks.
 *
 * Stages advance in order during the lifecycle phase of a tick. Each rule
 * needs both a minimum tick and a minimum stability; evaluation stops at the
 * first rule that is not met, so a later stage is never reached ahead of an
 * earlier one.
 *
 * @module core/lifecycle
 */
import { STAGE, stageName, type SystemState } from "./system.js";

export interface StageRule {
	stage: STAGE;
	minTick: number;
	minStability: number;
}

export interface CommandGate {
	command: string;
	/** How the command is shown in tips and command lists. */
	display: string;
	stage: STAGE;
}

export const STAGE_RULES: ReadonlyArray<StageRule> = [
	{ stage: STAGE.GROWING, minTick: 120, minStability: 40 },
	{ stage: STAGE.MATURE, minTick: 280, minStability: 55 },
	{ stage: STAGE.ELDER, minTick: 480, minStability: 65 },
	{ stage: STAGE.RETIRED, minTick: 720, minStability: 75 },
];

export const COMMAND_GATES: ReadonlyArray<CommandGate> = [
	{ command: "grab", display: "grab <item>", stage: STAGE.GROWING },
	{ command: "analyze", display: "analyze <slot>", stage: STAGE.GROWING },
	{ command: "feed", display: "feed <slot>", stage: STAGE.GROWING },
	{ command: "clean", display: "clean <slot>", stage: STAGE.MATURE },
	{ command: "rescue", display: "rescue", stage: STAGE.MATURE },
	{ command: "clear", display: "clear", stage: STAGE.MATURE },
	{ command: "pet", display: "pet", stage: STAGE.ELDER },
	{ command: "debug", display: "debug", stage: STAGE.ELDER },
	{ command: "sing", display: "sing", stage: STAGE.ELDER },
	{ command: "reset", display: "reset", stage: STAGE.RETIRED },
];

/** Commands that are never gated. */
export const BASE_COMMANDS = "look, go <dir>, state, inventory, say <msg>, quit";

export function findGate(command: string): CommandGate | undefined {
	return COMMAND_GATES.find((gate) => gate.command === command);
}

/** The first rule above `stage`, or undefined once retired. */
export function nextStageRule(stage: STAGE): StageRule | undefined {
	return STAGE_RULES.find((rule) => rule.stage > stage);
}

/**
 * Advance `state.lifecycle` through every rule that is met, in order.
 * @returns The stages entered, in the order they were entered
 */
export function advanceLifecycle(state: SystemState): STAGE[] {
	const entered: STAGE[] = [];
	for (const rule of STAGE_RULES) {
		if (rule.stage <= state.lifecycle) continue;
		if (state.tick < rule.minTick) break;
		if (state.stability < rule.minStability) break;
		state.lifecycle = rule.stage;
		entered.push(rule.stage);
	}
	return entered;
}

export function formatAvailableCommands(stage: STAGE): string {
	const unlocked = COMMAND_GATES.filter((gate) => stage >= gate.stage).map(
		(gate) => gate.display
	);
	return [BASE_COMMANDS, ...unlocked].join(", ");
}

export function availableCommandsLine(stage: STAGE): string {
	return `[TIP] Commands available: ${formatAvailableCommands(stage)}`;
}

/** Announcement for the commands `stage` itself unlocks, if any. */
export function unlockLine(stage: STAGE): string | undefined {
	const gates = COMMAND_GATES.filter((gate) => gate.stage === stage);
	if (gates.length === 0) return undefined;
	return `[TIP] Commands unlocked at ${stageName(stage)}: ${gates
		.map((gate) => gate.display)
		.join(", ")}`;
}

export function goalLine(stage: STAGE): string {
	const next = nextStageRule(stage);
	if (!next) return "[QUEST] The Friendly Monster is retired. Enjoy free play!";
	return `[QUEST] Goal: reach ${stageName(next.stage)} (tick ${next.minTick}+, stability ${next.minStability}+).`;
}

export function gateTip(gate: CommandGate, current: STAGE): string {
	return `[TIP] '${gate.display}' unlocks at stage ${stageName(gate.stage)} (current: ${stageName(current)}).`;
}
