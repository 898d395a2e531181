/**
 * Sing a lullaby: mood +3, trust +1, stability +1.
 *
 * **Pattern:** `sing`
 * @module commands/sing
 */

import { ritual } from "./_ritual.js";

export default ritual({
	pattern: "sing",
	refusal: "Echo your song in the nursery.",
	effect: () => ({ mood: 3, trust: 1, stability: 1 }),
	announce: (name) => `[PROC] ${name} sings a lullaby. The Monster hums along.`,
});
