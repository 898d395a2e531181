/**
 * Per-connection session state.
 *
 * A session owns a bounded output queue, an optional actor (by id) and the
 * bytes of a line the client has not finished sending. It is created when
 * the channel accepts a connection and destroyed when that connection ends.
 *
 * Output
 * - `emit()` appends one newline-terminated message under the session's own
 *   lock (the inner lock; the world lock, when held, is always taken first)
 * - A message that does not fit in the remaining capacity is dropped whole
 *   and a warning is logged
 * - `read()` resolves as soon as bytes are queued, or with an empty buffer
 *   once the session is closed
 *
 * Input
 * - `receive()` buffers raw bytes and returns every completed line; at most
 *   `MAX_PENDING_INPUT` bytes of an unfinished line are kept
 *
 * @example
 * ```ts
 * const session = new Session(1, 4096);
 * session.emit("Welcome.");
 * const bytes = await session.read();
 * for (const line of session.receive(Buffer.from("look\n"))) handle(line);
 * ```
 *
 * @module core/session
 */
import logger from "../logger.js";
import { Lock } from "./lock.js";

export const MAX_PENDING_INPUT = 255;

interface PendingRead {
	maxBytes: number;
	resolve: (data: Buffer) => void;
}

/**
 * Bounded FIFO of output bytes with waiting readers.
 */
export class OutputQueue {
	private chunks: Buffer[] = [];
	private size = 0;
	private readers: PendingRead[] = [];
	private closed = false;

	constructor(readonly capacity: number) {}

	get length(): number {
		return this.size;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Append `data` if it fits entirely.
	 * @returns false when the message was dropped
	 */
	push(data: Buffer): boolean {
		if (this.closed) return false;
		if (this.size + data.length > this.capacity) return false;
		this.chunks.push(data);
		this.size += data.length;
		this.wake();
		return true;
	}

	/** Remove and return up to `maxBytes` queued bytes. */
	take(maxBytes: number = Number.POSITIVE_INFINITY): Buffer {
		const all = Buffer.concat(this.chunks, this.size);
		const count = Math.min(all.length, maxBytes);
		const head = all.subarray(0, count);
		const rest = all.subarray(count);
		this.chunks = rest.length > 0 ? [rest] : [];
		this.size = rest.length;
		return head;
	}

	read(maxBytes: number = Number.POSITIVE_INFINITY): Promise<Buffer> {
		if (this.size > 0) return Promise.resolve(this.take(maxBytes));
		if (this.closed) return Promise.resolve(Buffer.alloc(0));
		return new Promise((resolve) => {
			this.readers.push({ maxBytes, resolve });
		});
	}

	/** Wake every waiting reader with an empty buffer; later pushes are ignored. */
	close(): void {
		if (this.closed) return;
		this.closed = true;
		const readers = this.readers;
		this.readers = [];
		for (const reader of readers) reader.resolve(Buffer.alloc(0));
	}

	private wake(): void {
		while (this.size > 0) {
			const reader = this.readers.shift();
			if (!reader) return;
			reader.resolve(this.take(reader.maxBytes));
		}
	}
}

export class Session {
	readonly output: OutputQueue;
	readonly lock: Lock;
	/** Id of the actor this session controls once logged in. */
	actorId?: number;
	private pending: Buffer = Buffer.alloc(0);
	private overflowed = false;
	/** Set once a line was cut short; the rest of it is dropped. */
	private full = false;
	private closedFlag = false;

	constructor(readonly id: number, queueBytes: number) {
		this.output = new OutputQueue(queueBytes);
		this.lock = new Lock(`session ${id}`);
	}

	get loggedIn(): boolean {
		return this.actorId !== undefined;
	}

	get closed(): boolean {
		return this.closedFlag;
	}

	/**
	 * Queue one message followed by a newline.
	 * @returns false when the session is closed or the queue is full
	 */
	emit(text: string): boolean {
		if (this.closedFlag) return false;
		const data = Buffer.from(`${text}\n`, "utf8");
		const queued = this.lock.run(() => this.output.push(data));
		if (!queued) {
			logger.warn(
				`Output queue full for session ${this.id}, dropped ${data.length} bytes`
			);
		}
		return queued;
	}

	read(maxBytes?: number): Promise<Buffer> {
		return this.output.read(maxBytes);
	}

	/** Take everything queued so far as text. */
	drain(): string {
		return this.lock.run(() => this.output.take()).toString("utf8");
	}

	/**
	 * Buffer raw client bytes and split off complete lines.
	 * A line ends at `\n`; anything from the first `\r` on is cut off.
	 * Bytes past `MAX_PENDING_INPUT` in one line are discarded.
	 */
	receive(chunk: Buffer | string): string[] {
		const data = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
		const lines: string[] = [];
		let start = 0;
		for (;;) {
			const newline = data.indexOf(0x0a, start);
			this.append(data.subarray(start, newline < 0 ? data.length : newline));
			if (newline < 0) break;
			lines.push(this.flushLine());
			start = newline + 1;
		}
		return lines;
	}

	private append(segment: Buffer): void {
		const room = MAX_PENDING_INPUT - this.pending.length;
		if (segment.length > room && !this.overflowed) {
			this.overflowed = true;
			logger.debug(`Session ${this.id} input line over ${MAX_PENDING_INPUT} bytes, truncating`);
		}
		if (room <= 0 || this.full || segment.length === 0) return;
		if (segment.length <= room) {
			this.pending = Buffer.concat([this.pending, segment]);
			return;
		}
		// back off to the start of a UTF-8 character
		let cut = room;
		while (cut > 0 && (segment[cut] & 0xc0) === 0x80) cut--;
		this.pending = Buffer.concat([this.pending, segment.subarray(0, cut)]);
		this.full = true;
	}

	private flushLine(): string {
		const line = this.pending.toString("utf8");
		this.pending = Buffer.alloc(0);
		this.overflowed = false;
		this.full = false;
		const cr = line.indexOf("\r");
		return cr >= 0 ? line.slice(0, cr) : line;
	}

	close(): void {
		if (this.closedFlag) return;
		this.closedFlag = true;
		this.output.close();
	}
}
