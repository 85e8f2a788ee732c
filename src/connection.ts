import { EventEmitter } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";
import WebSocket, { type RawData } from "ws";
import { DEFAULT_CONNECT } from "./config.js";
import {
    AlreadyConnectedError,
    ConnectionFailedError,
    NotConnectedError,
    TransportClosedError,
    toError,
} from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";

export interface ConnectionManagerOptions {
    /** WebSocket URL of the endpoint. */
    url: string;
    /** Connection attempts before giving up. Default: 10. */
    attempts?: number;
    /** Time allowed for one attempt, in ms. Default: 2000. */
    attemptTimeoutMs?: number;
    /** Pause between attempts, in ms. Default: 500. */
    retryDelayMs?: number;
    /** Time allowed for a clean close before the socket is terminated, in ms. Default: 1000. */
    closeTimeoutMs?: number;
    /** Inbound frames kept for `tryReceive()`; the oldest is dropped beyond this. Default: 16. */
    maxQueue?: number;
    /** Largest inbound frame accepted, in bytes. Default: 1 MiB. */
    maxPayload?: number;
    logger?: Logger;
}

export interface ConnectCallOptions {
    /** Abandon the retry loop when aborted. */
    signal?: AbortSignal;
}

/** One live transport, from a successful connect until close or failure. */
interface ConnectionHandle {
    readonly socket: WebSocket;
    readonly inbox: RawData[];
    /** The transport reported closure. */
    closed: boolean;
    /** Closed by `disconnect()` rather than by the peer. */
    released: boolean;
}

/**
 * Owns the WebSocket to the endpoint.
 *
 * `connect()` retries a fixed number of times so either side may start
 * first. `send()` and `tryReceive()` are synchronous and never wait on I/O:
 * inbound frames are queued as they arrive and polled without blocking.
 *
 * Events:
 * - "connect" — a connection was established
 * - "disconnect" — the transport closed without `disconnect()` being called
 * - "attempt-failed" (attempt: number, err: Error) — one connect attempt failed
 * - "error" (err: Error) — transport error on a live connection (only emitted
 *   when a listener is attached)
 */
export class ConnectionManager extends EventEmitter {
    private readonly endpoint: string;
    private readonly attempts: number;
    private readonly attemptTimeoutMs: number;
    private readonly retryDelayMs: number;
    private readonly closeTimeoutMs: number;
    private readonly maxQueue: number;
    private readonly maxPayload: number;
    private readonly logger: Logger;

    private handle: ConnectionHandle | null = null;
    private connecting = false;
    private _droppedFrames = 0;

    constructor(options: ConnectionManagerOptions) {
        super();
        this.endpoint = options.url;
        this.attempts = options.attempts ?? DEFAULT_CONNECT.attempts;
        this.attemptTimeoutMs = options.attemptTimeoutMs ?? DEFAULT_CONNECT.attemptTimeoutMs;
        this.retryDelayMs = options.retryDelayMs ?? DEFAULT_CONNECT.retryDelayMs;
        this.closeTimeoutMs = options.closeTimeoutMs ?? 1000;
        this.maxQueue = Math.max(1, options.maxQueue ?? 16);
        this.maxPayload = options.maxPayload ?? 2 ** 20;
        this.logger = options.logger ?? silentLogger;
    }

    /** The endpoint URL. */
    get url(): string {
        return this.endpoint;
    }

    /** Whether a live, open transport is held. */
    get connected(): boolean {
        const handle = this.handle;
        return handle !== null && !handle.closed && handle.socket.readyState === WebSocket.OPEN;
    }

    /** Inbound frames waiting to be received. */
    get pending(): number {
        return this.handle?.inbox.length ?? 0;
    }

    /** Inbound frames discarded because the queue was full. */
    get droppedFrames(): number {
        return this._droppedFrames;
    }

    /**
     * Connect, retrying up to the configured budget.
     *
     * @throws AlreadyConnectedError if a live connection exists or a connect is in progress
     * @throws ConnectionFailedError once every attempt has failed
     */
    async connect(options: ConnectCallOptions = {}): Promise<void> {
        this.reapClosed();
        if (this.handle || this.connecting) {
            throw new AlreadyConnectedError(this.endpoint);
        }

        const { signal } = options;
        this.connecting = true;
        let lastError: Error | undefined;
        try {
            for (let attempt = 1; attempt <= this.attempts; attempt++) {
                if (signal?.aborted) {
                    throw new ConnectionFailedError(this.endpoint, attempt - 1, signal.reason);
                }
                try {
                    const socket = await this.open(signal);
                    this.adopt(socket);
                    this.logger.info(`connected to ${this.endpoint}`);
                    this.emit("connect");
                    return;
                } catch (err) {
                    lastError = toError(err);
                    this.logger.warn(`connect failed (${attempt}/${this.attempts}): ${lastError.message}`);
                    this.emit("attempt-failed", attempt, lastError);
                }
                if (attempt < this.attempts) {
                    try {
                        await sleep(this.retryDelayMs, undefined, { signal });
                    } catch {
                        throw new ConnectionFailedError(this.endpoint, attempt, signal?.reason);
                    }
                }
            }
        } finally {
            this.connecting = false;
        }

        throw new ConnectionFailedError(this.endpoint, this.attempts, lastError);
    }

    /**
     * Close the connection. The handle is cleared even if closing fails.
     *
     * @throws NotConnectedError if there is no connection
     */
    async disconnect(): Promise<void> {
        const handle = this.handle;
        if (!handle) {
            throw new NotConnectedError();
        }

        handle.released = true;
        try {
            await closeSocket(handle.socket, this.closeTimeoutMs);
        } catch (err) {
            this.logger.debug(`close failed: ${toError(err).message}`);
        } finally {
            this.release(handle);
            this.logger.info("disconnected");
        }
    }

    /**
     * Send one text frame without waiting for it to be written.
     *
     * @throws NotConnectedError if there is no connection
     * @throws TransportClosedError if the transport has closed; the handle is
     *   cleared and `connect()` is required before sending again
     */
    send(data: string): void {
        const handle = this.handle;
        if (!handle) {
            throw new NotConnectedError();
        }
        if (handle.closed || handle.socket.readyState !== WebSocket.OPEN) {
            this.release(handle);
            throw new TransportClosedError();
        }

        handle.socket.send(data, (err) => {
            if (!err) return;
            this.logger.warn(`send failed: ${err.message}`);
            handle.closed = true;
            this.release(handle);
        });
    }

    /**
     * Take the oldest queued inbound frame, or null if none is waiting.
     * Never waits and never throws: a closed transport clears the handle
     * once its queue is drained, and reads as "nothing available".
     */
    tryReceive(): RawData | null {
        const handle = this.handle;
        if (!handle) return null;

        const next = handle.inbox.shift();
        if (next !== undefined) return next;

        if (handle.closed || handle.socket.readyState !== WebSocket.OPEN) {
            this.release(handle);
        }
        return null;
    }

    private open(signal?: AbortSignal): Promise<WebSocket> {
        return new Promise<WebSocket>((resolve, reject) => {
            let settled = false;
            const socket = new WebSocket(this.endpoint, {
                perMessageDeflate: false,
                maxPayload: this.maxPayload,
            });

            const fail = (err: Error) => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                signal?.removeEventListener("abort", onAbort);
                socket.terminate();
                reject(err);
            };
            const onAbort = () => fail(toError(signal?.reason));
            const timer = setTimeout(
                () => fail(new Error(`timed out after ${this.attemptTimeoutMs}ms`)),
                this.attemptTimeoutMs,
            );

            signal?.addEventListener("abort", onAbort, { once: true });

            socket.once("open", () => {
                if (settled) return;
                settled = true;
                clearTimeout(timer);
                signal?.removeEventListener("abort", onAbort);
                resolve(socket);
            });

            // Stays attached for the socket's lifetime: ws emits "error" after
            // terminate() on a socket that never opened.
            socket.on("error", fail);
        });
    }

    private adopt(socket: WebSocket): void {
        const handle: ConnectionHandle = { socket, inbox: [], closed: false, released: false };
        this.handle = handle;

        socket.on("message", (data: RawData) => {
            if (handle.inbox.length >= this.maxQueue) {
                handle.inbox.shift();
                this._droppedFrames++;
            }
            handle.inbox.push(data);
        });

        socket.on("close", () => {
            handle.closed = true;
            // A handle replaced by a newer connection no longer speaks for it
            if (!handle.released && (this.handle === null || this.handle === handle)) {
                this.logger.warn("transport closed by peer");
                this.emit("disconnect");
            }
        });

        socket.on("error", (err: Error) => {
            this.logger.warn(`transport error: ${err.message}`);
            if (this.listenerCount("error") > 0) this.emit("error", err);
        });
    }

    /** Drop a handle whose transport already closed. */
    private reapClosed(): void {
        const handle = this.handle;
        if (handle && (handle.closed || handle.socket.readyState !== WebSocket.OPEN)) {
            this.release(handle);
        }
    }

    private release(handle: ConnectionHandle): void {
        if (this.handle === handle) {
            this.handle = null;
        }
    }
}

function closeSocket(socket: WebSocket, timeoutMs: number): Promise<void> {
    if (socket.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
            socket.terminate();
            resolve();
        }, timeoutMs);
        socket.once("close", () => {
            clearTimeout(timer);
            resolve();
        });
        socket.close();
    });
}
