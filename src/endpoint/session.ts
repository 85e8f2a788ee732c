import { EventEmitter, on } from "node:events";
import { setTimeout as sleep } from "node:timers/promises";
import WebSocket, { type RawData } from "ws";
import { MalformedFrameError, toError } from "../errors.js";
import { decode, encode } from "../framing.js";
import { type JointVector, wallClock, zeroVector } from "../joints.js";
import { type Logger, formatPositions, silentLogger } from "../logger.js";
import { stateFrame } from "../protocol.js";

export interface EndpointSessionOptions {
    /** Canonical joint order; commands must carry exactly this many targets. */
    jointNames: readonly string[];
    /** Time between state frames, in ms. Default: 1000 / 60. */
    publishIntervalMs?: number;
    /** Label used in logs and events. */
    id?: string;
    /** Clock in seconds. Default: wall clock. */
    now?: () => number;
    logger?: Logger;
}

export type RejectReason = "malformed" | "schema" | "not-command" | "target-length";

/**
 * One connected client, served by two concurrent tasks that share `q`:
 *
 * - ingest: applies each valid joint-position command by replacing `q`
 *   as a whole;
 * - publish: sends `q` as a state frame at a fixed rate, whether or not
 *   commands arrive.
 *
 * Closing the socket aborts both tasks. Bad frames are logged and skipped.
 *
 * Events:
 * - "command" (frame: CommandFrame) — a command was applied
 * - "reject" (reason: RejectReason, detail: string) — a frame was skipped
 * - "end" — both tasks finished
 */
export class EndpointSession extends EventEmitter {
    readonly id: string;

    private readonly socket: WebSocket;
    private readonly names: readonly string[];
    private readonly publishIntervalMs: number;
    private readonly now: () => number;
    private readonly logger: Logger;
    private readonly controller = new AbortController();

    private q: readonly number[];
    private running = false;
    private _commands = 0;
    private _published = 0;
    private _rejected = 0;

    constructor(socket: WebSocket, options: EndpointSessionOptions) {
        super();
        this.socket = socket;
        this.names = Object.freeze([...options.jointNames]);
        this.publishIntervalMs = options.publishIntervalMs ?? 1000 / 60;
        this.id = options.id ?? "session";
        this.now = options.now ?? wallClock;
        this.logger = options.logger ?? silentLogger;
        this.q = Object.freeze(zeroVector(this.names).positions);

        socket.on("error", (err: Error) => {
            this.logger.debug(`${this.id}: transport error: ${err.message}`);
        });
    }

    /** Copy of the authoritative joint state. */
    get state(): JointVector {
        return { names: [...this.names], positions: [...this.q] };
    }

    get commandsApplied(): number {
        return this._commands;
    }

    get framesPublished(): number {
        return this._published;
    }

    get framesRejected(): number {
        return this._rejected;
    }

    /** Whether the session has ended or is ending. */
    get closed(): boolean {
        return this.controller.signal.aborted;
    }

    /**
     * Serve the connection until it closes. Resolves once both tasks have
     * stopped; the socket is closed by then.
     */
    async run(): Promise<void> {
        if (this.running) {
            throw new Error("Session already running");
        }
        this.running = true;

        const { signal } = this.controller;
        const end = () => this.controller.abort();
        this.socket.once("close", end);
        if (this.socket.readyState !== WebSocket.OPEN) end();

        this.logger.info(`${this.id}: client connected`);
        try {
            await Promise.all([
                this.ingest(signal).finally(end),
                this.publish(signal).finally(end),
            ]);
        } finally {
            this.socket.off("close", end);
            this.close();
            this.logger.info(`${this.id}: client disconnected`);
            this.emit("end");
        }
    }

    /** End the session and close its socket. */
    close(code?: number): void {
        this.controller.abort();
        const state = this.socket.readyState;
        if (state === WebSocket.OPEN || state === WebSocket.CONNECTING) {
            this.socket.close(code);
        }
    }

    private async ingest(signal: AbortSignal): Promise<void> {
        try {
            for await (const args of on(this.socket, "message", { signal })) {
                const data: unknown = Array.isArray(args) ? args[0] : undefined;
                this.handleFrame(data);
            }
        } catch (err) {
            if (!signal.aborted) {
                this.logger.warn(`${this.id}: receive failed: ${toError(err).message}`);
            }
        }
    }

    private handleFrame(data: unknown): void {
        if (!isRawData(data)) {
            this.reject("malformed", "unreadable message payload");
            return;
        }

        const result = decode(data);
        if (!result.ok) {
            const reason = result.error instanceof MalformedFrameError ? "malformed" : "schema";
            this.reject(reason, result.error.message);
            return;
        }

        const frame = result.frame;
        if (frame.type !== "cmd") {
            this.reject("not-command", `non-cmd message: ${frame.type}`);
            return;
        }
        if (frame.target.length !== this.names.length) {
            this.reject(
                "target-length",
                `bad target length: ${frame.target.length}, expected ${this.names.length}`,
            );
            return;
        }

        this.q = Object.freeze([...frame.target]);
        this._commands++;
        this.logger.debug(`${this.id}: <-cmd #${frame.seq} ${formatPositions(this.q, 6)}`);
        this.emit("command", frame);
    }

    private reject(reason: RejectReason, detail: string): void {
        this._rejected++;
        this.logger.warn(`${this.id}: ${detail}`);
        this.emit("reject", reason, detail);
    }

    private async publish(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            if (!this.sendState()) return;
            try {
                await sleep(this.publishIntervalMs, undefined, { signal });
            } catch {
                return;
            }
        }
    }

    /** Send the current state. False once the transport has closed. */
    private sendState(): boolean {
        if (this.socket.readyState !== WebSocket.OPEN) return false;

        const frame = stateFrame({ names: this.names, positions: this.q }, this.now());
        this.socket.send(encode(frame), (err) => {
            if (!err) return;
            this.logger.debug(`${this.id}: publish failed: ${err.message}`);
            this.controller.abort();
        });
        this._published++;
        return true;
    }
}

function isRawData(value: unknown): value is RawData | string {
    return (
        typeof value === "string" ||
        Buffer.isBuffer(value) ||
        value instanceof ArrayBuffer ||
        (Array.isArray(value) && value.every((part) => Buffer.isBuffer(part)))
    );
}
