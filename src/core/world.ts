/**
 * The world aggregate.
 *
 * Everything the simulation mutates lives in one `World`: the system state,
 * the per-room object tables, the actor arena, room membership and the
 * session roster. It is passed explicitly to every tick phase and command,
 * and every read or write of it happens inside `world.lock.run()`.
 *
 * Fan-out
 * - `send()` one session
 * - `broadcastRoom()` logged-in sessions whose actor is in a room
 * - `broadcastAll()` every logged-in session
 *
 * @module core/world
 */
import { Actor } from "./actor.js";
import { ROOM_COUNT, ROOM_ID, RoomObjectTable } from "./dungeon.js";
import { Lock } from "./lock.js";
import { createRng, type Rng } from "./rng.js";
import type { Session } from "./session.js";
import { initialSystemState, resetSystemState, type SystemState } from "./system.js";

export interface WorldOptions {
	/** Configured seed; 0 means non-deterministic. */
	seed?: number;
	/** Random source to use instead of one built from `seed`. */
	rng?: Rng;
	startRoom?: ROOM_ID;
	maxPlayers?: number;
}

export class World {
	readonly lock = new Lock("world");
	readonly state: SystemState = initialSystemState();
	readonly startRoom: ROOM_ID;
	readonly maxPlayers: number;
	readonly sessions = new Set<Session>();
	readonly actors = new Map<number, Actor>();
	rng: Rng;

	private readonly seed: number;
	private readonly objectTables: RoomObjectTable[];
	private readonly occupants: Set<number>[];
	private nextActorId = 1;

	constructor(options: WorldOptions = {}) {
		this.seed = options.seed ?? 0;
		this.rng = options.rng ?? createRng(this.seed);
		this.startRoom = options.startRoom ?? ROOM_ID.NURSERY;
		this.maxPlayers = options.maxPlayers ?? Number.POSITIVE_INFINITY;
		this.objectTables = Array.from({ length: ROOM_COUNT }, () => new RoomObjectTable());
		this.occupants = Array.from({ length: ROOM_COUNT }, () => new Set<number>());
	}

	objects(room: ROOM_ID): RoomObjectTable {
		return this.objectTables[room];
	}

	clearAllObjects(): void {
		for (const table of this.objectTables) table.clearAll();
	}

	/**
	 * Start the seeded sequence over. A non-deterministic source is kept.
	 */
	reseed(): void {
		if (this.seed !== 0) this.rng = createRng(this.seed);
	}

	/**
	 * Start a new epoch: fresh state and RNG sequence, empty rooms, and
	 * every actor back in the start room with an empty inventory.
	 */
	reset(): void {
		this.reseed();
		resetSystemState(this.state);
		this.clearAllObjects();
		for (const actor of this.actors.values()) {
			actor.clearInventory();
			this.placeActor(actor, this.startRoom);
		}
	}

	/** Actors in a room, in the order they entered. */
	occupantsOf(room: ROOM_ID): Actor[] {
		const result: Actor[] = [];
		for (const id of this.occupants[room]) {
			const actor = this.actors.get(id);
			if (actor) result.push(actor);
		}
		return result;
	}

	actorOf(session: Session): Actor | undefined {
		if (session.actorId === undefined) return undefined;
		return this.actors.get(session.actorId);
	}

	/**
	 * Create an actor in the start room.
	 * @returns undefined when the roster is full
	 */
	createActor(name: string): Actor | undefined {
		if (this.actors.size >= this.maxPlayers) return undefined;
		const actor = new Actor({ id: this.nextActorId++, name, roomId: this.startRoom });
		this.actors.set(actor.id, actor);
		this.occupants[actor.roomId].add(actor.id);
		return actor;
	}

	removeActor(id: number): void {
		const actor = this.actors.get(id);
		if (!actor) return;
		this.occupants[actor.roomId].delete(id);
		this.actors.delete(id);
	}

	placeActor(actor: Actor, room: ROOM_ID): void {
		this.occupants[actor.roomId].delete(actor.id);
		actor.roomId = room;
		this.occupants[room].add(actor.id);
	}

	send(session: Session, text: string): void {
		session.emit(text);
	}

	broadcastRoom(room: ROOM_ID, text: string): void {
		for (const session of this.sessions) {
			const actor = this.actorOf(session);
			if (!actor || actor.roomId !== room) continue;
			session.emit(text);
		}
	}

	broadcastAll(text: string): void {
		for (const session of this.sessions) {
			if (!session.loggedIn) continue;
			session.emit(text);
		}
	}
}
