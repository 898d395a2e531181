import { describe, it } from "node:test";
import assert from "node:assert";
import { ROOM_ID } from "./dungeon.js";
import { ITEM_FLAG, ITEM_TYPE } from "./item.js";
import { SeededRng, SequenceRng } from "./rng.js";
import { Session } from "./session.js";
import {
	HELPER,
	MONSTER_MOOD,
	STAGE,
	hasHelper,
	initialSystemState,
} from "./system.js";
import {
	cleanupPhase,
	crashReason,
	helperPhase,
	lifecyclePhase,
	runTick,
	spawnPhase,
	updatePhase,
} from "./tick.js";
import { World } from "./world.js";

function scriptedWorld(draws: number[]): World {
	return new World({ rng: new SequenceRng(draws) });
}

function listen(world: World): Session {
	const actor = world.createActor("watcher");
	assert.ok(actor);
	const session = new Session(1, 8192);
	session.actorId = actor.id;
	world.sessions.add(session);
	return session;
}

describe("core/tick.ts", () => {
	describe("runTick", () => {
		it("applies the update formula on the first tick", () => {
			// every roll is 99: no spawns, event pick 99 % 40 -> mood swing, 99 -> -2
			const world = scriptedWorld([99]);
			const crashed = runTick(world);
			assert.strictEqual(crashed, false);
			assert.strictEqual(world.state.tick, 1);
			assert.strictEqual(world.state.hunger, 4);
			assert.strictEqual(world.state.stability, 100);
			assert.strictEqual(world.state.mood, -2);
			assert.strictEqual(world.state.monsterMood, MONSTER_MOOD.CONTENT);
			assert.strictEqual(world.state.helper.happyStreak, 1);
			assert.strictEqual(world.state.helper.survivedTicks, 1);
		});

		it("crashes on hunger overflow and then stays put", () => {
			const world = scriptedWorld([99]);
			const session = listen(world);
			world.state.hunger = 9;

			assert.strictEqual(runTick(world), true);
			assert.strictEqual(world.state.crashed, true);
			assert.strictEqual(
				session.drain(),
				"[EVENT] Monster frets over idle cycles. mood -2\n" +
					"[CRASH] Kernel Caretakers collapse: hunger overflow after 1 ticks. stability=97 hunger=10 mood=-3 trust=3 junk=0\n" +
					"[CRASH] Friendly Monster dumps core. Thanks for playing!\n"
			);

			const before = structuredClone(world.state);
			assert.strictEqual(runTick(world), true);
			assert.deepStrictEqual(world.state, before);
			assert.strictEqual(session.drain(), "");
		});

		it("keeps every stat in range and the stage monotonic", () => {
			const world = new World({ rng: new SeededRng(2024) });
			let stage = world.state.lifecycle;
			for (let i = 0; i < 1500; i++) {
				const crashed = runTick(world);
				const s = world.state;
				assert.ok(s.stability >= 0 && s.stability <= 100);
				assert.ok(s.hunger >= 0 && s.hunger <= 10);
				assert.ok(s.mood >= -10 && s.mood <= 10);
				assert.ok(s.trust >= 0 && s.trust <= 10);
				assert.ok(s.junkLoad >= 0 && s.junkLoad <= 50);
				assert.ok(s.lifecycle >= stage);
				stage = s.lifecycle;
				if (crashed) {
					const tick = s.tick;
					assert.strictEqual(runTick(world), true);
					assert.strictEqual(world.state.tick, tick);
					break;
				}
			}
		});
	});

	describe("spawnPhase", () => {
		it("spawns a resource and a daemon", () => {
			const world = scriptedWorld([0, 0, 0, 0, 5]);
			const session = listen(world);
			spawnPhase(world);
			const buffet = world.objects(ROOM_ID.BUFFET);
			assert.strictEqual(buffet.get(0)?.type, ITEM_TYPE.RAM_CHUNK);
			assert.strictEqual(buffet.get(0)?.ttl, 3);
			const fields = world.objects(ROOM_ID.FIELDS);
			assert.strictEqual(fields.get(0)?.type, ITEM_TYPE.BABY_DAEMON);
			// 4 + 5 % 3
			assert.strictEqual(fields.get(0)?.ttl, 6);
			assert.strictEqual(world.state.daemonLost, true);
			assert.strictEqual(
				session.drain(),
				"[SPAWN] RAM chunk appears in /tmp/buffet.\n" +
					"[ALERT] A baby daemon wanders into /dev/null/fields!\n"
			);
		});

		it("can spawn mutated junk", () => {
			// roll 0, type 95 -> junk, ttl 3 + 0, mutated roll 10, daemon roll 99
			const world = scriptedWorld([0, 95, 0, 10, 99]);
			spawnPhase(world);
			const junk = world.objects(ROOM_ID.BUFFET).get(0);
			assert.strictEqual(junk?.type, ITEM_TYPE.JUNK_DATA);
			assert.strictEqual(junk?.flags, ITEM_FLAG.MUTATED);
			assert.strictEqual(world.objects(ROOM_ID.FIELDS).count(), 0);
		});

		it("uses the rates of the current stage", () => {
			// 50 misses at Hatchling (40%) but hits at Growing (55%)
			const hatchling = scriptedWorld([50, 99]);
			spawnPhase(hatchling);
			assert.strictEqual(hatchling.objects(ROOM_ID.BUFFET).count(), 0);

			const growing = scriptedWorld([50, 30, 0, 99]);
			growing.state.lifecycle = STAGE.GROWING;
			spawnPhase(growing);
			assert.strictEqual(growing.objects(ROOM_ID.BUFFET).get(0)?.type, ITEM_TYPE.RAM_CHUNK);
		});
	});

	describe("updatePhase", () => {
		it("raises hunger by one without drawing", () => {
			const rng = new SequenceRng([0]);
			const world = new World({ rng });
			updatePhase(world);
			assert.strictEqual(world.state.hunger, 4);
			assert.strictEqual(world.state.stability, 100);
			assert.strictEqual(world.state.mood, 0);
			assert.strictEqual(rng.draws, 0);
		});

		it("punishes high hunger and junk load", () => {
			const world = scriptedWorld([99]);
			world.state.hunger = 7;
			world.state.junkLoad = 8;
			updatePhase(world);
			// hunger 8: -3 stability, -1 mood; junk: -5 stability
			assert.strictEqual(world.state.hunger, 8);
			assert.strictEqual(world.state.stability, 92);
			assert.strictEqual(world.state.mood, -1);
		});

		it("rewards high trust", () => {
			const world = scriptedWorld([99]);
			world.state.trust = 7;
			world.state.stability = 50;
			updatePhase(world);
			assert.strictEqual(world.state.stability, 51);
		});

		it("holds hunger steady under the scheduler blessing", () => {
			const world = scriptedWorld([99]);
			world.state.helper.helpers = HELPER.SCHED_BLESSING;
			updatePhase(world);
			assert.strictEqual(world.state.hunger, 3);
		});

		it("lets an overfed monster sneeze junk", () => {
			// hunger 0 -> 1 with mood 0 is overfed; roll 10 < 35, ttl 2 + 10 % 3
			const world = scriptedWorld([10]);
			const session = listen(world);
			world.state.hunger = 0;
			updatePhase(world);
			assert.strictEqual(world.state.monsterMood, MONSTER_MOOD.OVERFED);
			assert.strictEqual(world.state.junkLoad, 2);
			const junk = world.objects(ROOM_ID.BUFFET).get(0);
			assert.strictEqual(junk?.type, ITEM_TYPE.JUNK_DATA);
			assert.strictEqual(junk?.ttl, 3);
			assert.strictEqual(session.drain(), "[MONSTER] The Monster sneezes junk into /tmp!\n");
		});

		it("lets a content, cheerful monster fork a helper", () => {
			const world = scriptedWorld([29]);
			const session = listen(world);
			world.state.mood = 5;
			world.state.stability = 90;
			updatePhase(world);
			assert.strictEqual(world.state.monsterMood, MONSTER_MOOD.CONTENT);
			assert.strictEqual(world.state.stability, 92);
			assert.strictEqual(
				session.drain(),
				"[PROC] The Monster forks a helper daemon to tidy things up.\n"
			);
		});
	});

	describe("helperPhase", () => {
		it("unlocks the memory sprite after 20 ticks and drains junk", () => {
			const world = scriptedWorld([0]);
			const session = listen(world);
			world.state.helper.survivedTicks = 19;
			world.state.junkLoad = 3;
			helperPhase(world);
			assert.strictEqual(hasHelper(world.state, HELPER.MEMORY_SPRITE), true);
			assert.strictEqual(world.state.junkLoad, 2);
			assert.strictEqual(
				session.drain(),
				"[HELPER] Memory Sprite joins you, whisking junk away!\n" +
					"[HELPER] Memory Sprite sweeps away lingering junk.\n"
			);
		});

		it("grants the scheduler blessing after a happy streak of 10", () => {
			const world = scriptedWorld([0]);
			world.state.helper.happyStreak = 9;
			helperPhase(world);
			assert.strictEqual(world.state.helper.happyStreak, 10);
			assert.strictEqual(hasHelper(world.state, HELPER.SCHED_BLESSING), true);
		});

		it("breaks the streak when the monster is unhappy", () => {
			const world = scriptedWorld([0]);
			world.state.helper.happyStreak = 9;
			world.state.monsterMood = MONSTER_MOOD.HUNGRY;
			helperPhase(world);
			assert.strictEqual(world.state.helper.happyStreak, 0);
		});

		it("caps the happy streak", () => {
			const world = scriptedWorld([0]);
			world.state.helper.happyStreak = 60;
			helperPhase(world);
			assert.strictEqual(world.state.helper.happyStreak, 60);
		});

		it("sends the IO pixie after three rescues", () => {
			const world = scriptedWorld([0]);
			const session = listen(world);
			world.state.helper.rescueCounter = 3;
			world.state.daemonLost = true;
			world.state.stability = 80;
			world.objects(ROOM_ID.FIELDS).add(ITEM_TYPE.BABY_DAEMON, 5);
			helperPhase(world);
			assert.strictEqual(world.objects(ROOM_ID.FIELDS).count(), 0);
			assert.strictEqual(world.state.daemonLost, false);
			assert.strictEqual(world.state.trust, 4);
			assert.strictEqual(world.state.stability, 81);
			assert.strictEqual(
				session.drain(),
				"[HELPER] IO Pixie flits in to rescue strays!\n" +
					"[HELPER] IO Pixie swoops a daemon back to safety!\n"
			);
		});
	});

	it("decays objects in every room", () => {
		const world = scriptedWorld([0]);
		world.objects(ROOM_ID.BUFFET).add(ITEM_TYPE.RAM_CHUNK, 1);
		world.objects(ROOM_ID.FIELDS).add(ITEM_TYPE.BABY_DAEMON, 2);
		world.objects(ROOM_ID.NURSERY).add(ITEM_TYPE.IO_TOKEN, 0);
		cleanupPhase(world);
		assert.strictEqual(world.objects(ROOM_ID.BUFFET).count(), 0);
		assert.strictEqual(world.objects(ROOM_ID.FIELDS).get(0)?.ttl, 1);
		assert.strictEqual(world.objects(ROOM_ID.NURSERY).count(), 1);
	});

	it("announces a stage advance", () => {
		const world = scriptedWorld([0]);
		const session = listen(world);
		world.state.tick = 120;
		lifecyclePhase(world);
		assert.strictEqual(world.state.lifecycle, STAGE.GROWING);
		assert.strictEqual(
			session.drain(),
			"[LIFECYCLE] Stage advanced to Growing!\n" +
				"[TIP] Commands unlocked at Growing: grab <item>, analyze <slot>, feed <slot>\n" +
				"[TIP] Commands available: look, go <dir>, state, inventory, say <msg>, quit, grab <item>, analyze <slot>, feed <slot>\n" +
				"[QUEST] Goal: reach Mature (tick 280+, stability 55+).\n"
		);
	});

	it("checks crash conditions in priority order", () => {
		const state = initialSystemState();
		assert.strictEqual(crashReason(state), undefined);
		state.junkLoad = 25;
		assert.strictEqual(crashReason(state), "junk backpressure");
		state.hunger = 10;
		assert.strictEqual(crashReason(state), "hunger overflow");
		state.trust = 0;
		assert.strictEqual(crashReason(state), "trust drained");
		state.mood = -10;
		assert.strictEqual(crashReason(state), "mood meltdown");
		state.stability = 0;
		assert.strictEqual(crashReason(state), "stability exhausted");
	});
});
