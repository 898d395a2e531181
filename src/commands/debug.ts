/**
 * Patch the Monster's threads: junk -1, mood +1, stability +1, and one more
 * mood point when it is glitching.
 *
 * **Pattern:** `debug`
 * @module commands/debug
 */

import { MONSTER_MOOD } from "../core/system.js";
import { ritual } from "./_ritual.js";

export default ritual({
	pattern: "debug",
	refusal: "Debug rituals happen near the Monster.",
	effect: (state) => ({
		junk: -1,
		mood: state.monsterMood === MONSTER_MOOD.GLITCHING ? 2 : 1,
		stability: 1,
	}),
	announce: (name) => `[SYSLOG] ${name} patches the Monster's threads. Glitches fade.`,
});
