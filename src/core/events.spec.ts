import { describe, it } from "node:test";
import assert from "node:assert";
import { ROOM_ID } from "./dungeon.js";
import {
	EVENT_TABLE,
	applyEvent,
	eligibleEvents,
	pickEvent,
	runRandomEvent,
	type WeightedEvent,
} from "./events.js";
import { ITEM_FLAG, ITEM_TYPE } from "./item.js";
import { SequenceRng } from "./rng.js";
import { Session } from "./session.js";
import { STAGE } from "./system.js";
import { World } from "./world.js";

function scriptedWorld(draws: number[]): World {
	return new World({ rng: new SequenceRng(draws) });
}

function listen(world: World): Session {
	const actor = world.createActor("watcher");
	assert.ok(actor);
	const session = new Session(1, 4096);
	session.actorId = actor.id;
	world.sessions.add(session);
	return session;
}

describe("core/events.ts", () => {
	describe("pickEvent", () => {
		it("only offers events whose stage has been reached", () => {
			assert.deepStrictEqual(
				eligibleEvents(STAGE.HATCHLING).map((e) => e.name),
				["Mood swing", "Lucky sync"]
			);
			assert.strictEqual(eligibleEvents(STAGE.ELDER).length, EVENT_TABLE.length);
		});

		it("walks cumulative weights at Hatchling", () => {
			const rng = new SequenceRng([19, 20, 39, 40]);
			assert.strictEqual(pickEvent(STAGE.HATCHLING, rng)?.name, "Mood swing");
			assert.strictEqual(pickEvent(STAGE.HATCHLING, rng)?.name, "Lucky sync");
			assert.strictEqual(pickEvent(STAGE.HATCHLING, rng)?.name, "Lucky sync");
			// 40 % 40 wraps to the first bucket
			assert.strictEqual(pickEvent(STAGE.HATCHLING, rng)?.name, "Mood swing");
		});

		it("covers the full table at Elder", () => {
			const rng = new SequenceRng([0, 20, 40, 55, 70, 89]);
			const names = Array.from({ length: 6 }, () => pickEvent(STAGE.ELDER, rng)?.name);
			assert.deepStrictEqual(names, [
				"Resource mutation",
				"Mood swing",
				"Lost process",
				"Glitch storm",
				"Lucky sync",
				"Lucky sync",
			]);
		});

		it("skips ineligible events when accumulating", () => {
			// Growing: mutation 0-19, mood swing 20-39, lucky sync 40-59
			const rng = new SequenceRng([45]);
			assert.strictEqual(pickEvent(STAGE.GROWING, rng)?.name, "Lucky sync");
		});

		it("is a no-op without eligible events", () => {
			const table: WeightedEvent[] = [
				{ name: "Late", weight: 5, minStage: STAGE.RETIRED, event: { kind: "lost-process" } },
			];
			const rng = new SequenceRng([3]);
			assert.strictEqual(pickEvent(STAGE.HATCHLING, rng, table), undefined);
			assert.strictEqual(rng.draws, 0);
		});
	});

	describe("applyEvent", () => {
		it("mutates the first feed object in the buffet", () => {
			const world = scriptedWorld([0]);
			const buffet = world.objects(ROOM_ID.BUFFET);
			buffet.add(ITEM_TYPE.JUNK_DATA, 3);
			buffet.add(ITEM_TYPE.CPU_SLICE, 4);
			const message = applyEvent(world, { kind: "resource-mutation", junk: 2 });
			assert.strictEqual(message, "[EVENT] A CPU slice mutates into junk data!");
			assert.strictEqual(buffet.get(1)?.type, ITEM_TYPE.JUNK_DATA);
			assert.strictEqual(buffet.get(1)?.flags, ITEM_FLAG.MUTATED);
			assert.strictEqual(buffet.get(1)?.ttl, 4);
			assert.strictEqual(world.state.junkLoad, 2);
		});

		it("leaves the world alone when nothing can mutate", () => {
			const world = scriptedWorld([0]);
			world.objects(ROOM_ID.BUFFET).add(ITEM_TYPE.JUNK_DATA, 3);
			assert.strictEqual(applyEvent(world, { kind: "resource-mutation", junk: 2 }), undefined);
			assert.strictEqual(world.state.junkLoad, 0);
		});

		it("swings mood either way", () => {
			const world = scriptedWorld([10, 50]);
			assert.strictEqual(
				applyEvent(world, { kind: "mood-swing", delta: 2 }),
				"[EVENT] Monster gets lonely then delighted when you wave. mood +2"
			);
			assert.strictEqual(world.state.mood, 2);
			assert.strictEqual(
				applyEvent(world, { kind: "mood-swing", delta: 2 }),
				"[EVENT] Monster frets over idle cycles. mood -2"
			);
			assert.strictEqual(world.state.mood, 0);
		});

		it("loses a process only once at a time", () => {
			const world = scriptedWorld([1]);
			assert.strictEqual(
				applyEvent(world, { kind: "lost-process" }),
				"[ALERT] A baby daemon wanders into /dev/null/fields!"
			);
			const fields = world.objects(ROOM_ID.FIELDS);
			assert.strictEqual(fields.get(0)?.type, ITEM_TYPE.BABY_DAEMON);
			// 4 + 1 % 3
			assert.strictEqual(fields.get(0)?.ttl, 5);
			assert.strictEqual(world.state.daemonLost, true);
			assert.strictEqual(applyEvent(world, { kind: "lost-process" }), undefined);
			assert.strictEqual(fields.count(), 1);
		});

		it("sprays as much junk as the buffet can hold", () => {
			const world = scriptedWorld([0]);
			const buffet = world.objects(ROOM_ID.BUFFET);
			buffet.add(ITEM_TYPE.RAM_CHUNK, 3);
			buffet.add(ITEM_TYPE.RAM_CHUNK, 3);
			buffet.add(ITEM_TYPE.RAM_CHUNK, 3);
			const message = applyEvent(world, { kind: "glitch-storm", attempts: 2, junkPerPile: 2 });
			assert.strictEqual(message, "[EVENT] Glitch storm sprays 1 junk piles across /tmp!");
			assert.strictEqual(buffet.get(3)?.type, ITEM_TYPE.JUNK_DATA);
			assert.strictEqual(buffet.get(3)?.ttl, 2);
			assert.strictEqual(world.state.junkLoad, 2);
		});

		it("brings a lucky sync", () => {
			const world = scriptedWorld([0]);
			world.state.stability = 90;
			const message = applyEvent(world, {
				kind: "lucky-sync",
				hungerRelief: 1,
				stabilityBoost: 2,
			});
			assert.strictEqual(message, "[SPAWN] RAM chunk appears in /tmp/buffet.");
			assert.strictEqual(world.state.hunger, 2);
			assert.strictEqual(world.state.stability, 92);
			assert.strictEqual(world.objects(ROOM_ID.BUFFET).get(0)?.ttl, 3);
		});

		it("announces a lucky sync even when the buffet is full", () => {
			const world = scriptedWorld([0]);
			for (let i = 0; i < 4; i++) world.objects(ROOM_ID.BUFFET).add(ITEM_TYPE.IO_TOKEN, 3);
			assert.strictEqual(
				applyEvent(world, { kind: "lucky-sync", hungerRelief: 1, stabilityBoost: 2 }),
				"[EVENT] Lucky sync! Hunger eases and resources sparkle."
			);
		});
	});

	it("broadcasts the chosen event to logged-in sessions", () => {
		// pick 19 -> mood swing, roll 99 -> -2
		const world = scriptedWorld([19, 99]);
		const session = listen(world);
		const stranger = new Session(2, 4096);
		world.sessions.add(stranger);
		assert.strictEqual(runRandomEvent(world)?.name, "Mood swing");
		assert.strictEqual(session.drain(), "[EVENT] Monster frets over idle cycles. mood -2\n");
		assert.strictEqual(stranger.drain(), "");
	});
});
