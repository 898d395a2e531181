/**
 * Pet the Monster: mood +2, trust +1.
 *
 * **Pattern:** `pet`
 * @module commands/pet
 */

import { ritual } from "./_ritual.js";

export default ritual({
	pattern: "pet",
	refusal: "Petting works best in the nursery.",
	effect: () => ({ mood: 2, trust: 1 }),
	announce: (name) => `[MONSTER] ${name} gives gentle pats. Warm chimes play.`,
});
