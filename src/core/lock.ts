/**
 * Exclusive section guard.
 *
 * The world and every session queue own a `Lock`. A section passed to
 * `run()` executes synchronously from start to finish, so nothing else can
 * observe the guarded state half-updated. Entering a lock that is already
 * held means a section tried to re-acquire its own lock (or the lock order
 * was broken), which is a programming error and throws `LockError`.
 *
 * Sections must not await: the lock is released as soon as `fn` returns.
 *
 * @module core/lock
 */

export class LockError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "LockError";
	}
}

export class Lock {
	private locked = false;

	constructor(readonly name: string) {}

	get held(): boolean {
		return this.locked;
	}

	run<T>(fn: () => T): T {
		if (this.locked) {
			throw new LockError(`${this.name} lock is already held`);
		}
		this.locked = true;
		try {
			return fn();
		} finally {
			this.locked = false;
		}
	}
}
