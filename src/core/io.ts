/**
 * IO module - networking primitives for the game
 *
 * A small wrapper around Node's TCP sockets. It exposes two primitives:
 *
 * - `MudClient`: an EventEmitter around one client stream. It forwards raw
 *   `data` chunks untouched (line splitting belongs to the `Session`), and
 *   emits `close` once and `error` on stream errors.
 * - `MudServer`: a TCP server that accepts connections and emits
 *   `connection`, `disconnection`, `listening`, `error` and `close`. It
 *   tracks connected clients and provides start/stop helpers.
 *
 * Typical usage
 * ```ts
 * const server = new MudServer();
 * server.on("connection", (client: MudClient) => {
 *   client.on("data", (chunk: Buffer) => client.send(chunk));
 * });
 * await server.start(4040, "127.0.0.1");
 * ```
 *
 * No telnet negotiation happens here; bytes go through as they are.
 *
 * @module core/io
 */

import { EventEmitter } from "events";
import { createServer, Server, Socket } from "net";
import type { Duplex } from "stream";
import logger from "../logger.js";

/**
 * One connected client.
 *
 * Events
 * - `data` (chunk: Buffer) raw bytes from the peer
 * - `close` the stream has closed; emitted once
 * - `error` (err: Error) a stream error; `close` follows
 */
export class MudClient extends EventEmitter {
	private closed = false;

	constructor(private readonly stream: Duplex, private readonly address: string) {
		super();
		this.stream.on("data", (chunk: Buffer | string) => {
			this.emit("data", typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
		});
		this.stream.on("close", () => this.handleClose());
		this.stream.on("end", () => this.handleClose());
		this.stream.on("error", (error: Error) => {
			logger.error(`Client error (${this.address}): ${error.message}`);
			this.emit("error", error);
		});
	}

	static fromSocket(socket: Socket): MudClient {
		return new MudClient(socket, `${socket.remoteAddress ?? "unknown"}:${socket.remotePort ?? 0}`);
	}

	/**
	 * Write to the peer.
	 * @returns false when the stream is no longer writable
	 */
	send(data: Buffer | string): boolean {
		if (!this.isConnected()) return false;
		this.stream.write(data);
		return true;
	}

	/** End the stream after pending writes, then release it. */
	close(): void {
		if (this.closed) return;
		this.stream.end(() => this.stream.destroy());
		this.handleClose();
	}

	isConnected(): boolean {
		return !this.closed && this.stream.writable;
	}

	getAddress(): string {
		return this.address;
	}

	private handleClose(): void {
		if (this.closed) return;
		this.closed = true;
		logger.debug(`Client disconnected: ${this.address}`);
		this.emit("close");
	}
}

/**
 * TCP server handing out `MudClient`s.
 *
 * Example
 * ```ts
 * const server = new MudServer();
 * server.on("connection", (client: MudClient) => client.send("hello\n"));
 * await server.start(4040);
 * ```
 */
export class MudServer extends EventEmitter {
	private server: Server;
	private clients: Set<MudClient> = new Set();
	private port?: number;
	private isListening: boolean = false;

	constructor() {
		super();
		this.server = createServer((socket: Socket) => {
			this.accept(MudClient.fromSocket(socket));
		});
		this.setupServerHandlers();
	}

	private setupServerHandlers(): void {
		this.server.on("listening", () => {
			this.isListening = true;
			logger.info(`Server listening on port ${this.port}`);
			this.emit("listening");
		});

		this.server.on("error", (error: Error) => {
			logger.error(`Server error: ${error.message}`);
			this.emit("error", error);
		});

		this.server.on("close", () => {
			this.isListening = false;
			logger.info("Server closed");
			this.emit("close");
		});
	}

	/**
	 * Track a client and announce it. Sockets from the listener come through
	 * here; tests hand in clients over in-memory streams.
	 */
	accept(client: MudClient): void {
		this.clients.add(client);
		logger.info(`Client connected: ${client.getAddress()} (${this.clients.size} total)`);

		client.on("close", () => {
			this.clients.delete(client);
			logger.info(
				`Client disconnected: ${client.getAddress()} (${this.clients.size} remaining)`
			);
			this.emit("disconnection", client);
		});

		// keep an unhandled "error" from crashing the process
		client.on("error", (error: Error) => {
			logger.debug(`Client ${client.getAddress()} reported: ${error.message}`);
		});

		this.emit("connection", client);
	}

	/**
	 * Start the server on the specified port
	 * @param port The port number to listen on
	 * @param host Optional host to bind to (all interfaces when omitted)
	 */
	public start(port: number, host?: string): Promise<void> {
		return new Promise((resolve, reject) => {
			if (this.isListening) {
				reject(new Error("Server is already listening"));
				return;
			}

			this.port = port;
			this.server.once("error", reject);
			this.server.listen(port, host, () => {
				this.server.removeListener("error", reject);
				resolve();
			});
		});
	}

	/**
	 * Stop the server and disconnect all clients
	 */
	public stop(): Promise<void> {
		return new Promise((resolve, reject) => {
			for (const client of Array.from(this.clients)) client.close();
			if (!this.isListening) {
				resolve();
				return;
			}
			this.server.close((err) => {
				if (err) reject(err);
				else resolve();
			});
		});
	}

	public getClients(): MudClient[] {
		return Array.from(this.clients);
	}

	public getClientCount(): number {
		return this.clients.size;
	}

	/**
	 * Get the port the server is listening on
	 * @returns undefined if the server hasn't been started yet
	 */
	public getPort(): number | undefined {
		return this.port;
	}

	public isRunning(): boolean {
		return this.isListening;
	}
}
