import { EventEmitter } from "node:events";
import type { AddressInfo } from "node:net";
import { type WebSocket, WebSocketServer } from "ws";
import { type EndpointConfig, type EndpointConfigInput, resolveEndpointConfig } from "../config.js";
import { toError } from "../errors.js";
import { type Logger, createLogger } from "../logger.js";
import { EndpointSession } from "./session.js";

export interface EndpointServerOptions extends EndpointConfigInput {
    /** Largest inbound frame accepted, in bytes. Default: 1 MiB. */
    maxPayload?: number;
    /** Clock in seconds, passed to every session. */
    now?: () => number;
    logger?: Logger;
}

/**
 * Reference endpoint: accepts WebSocket clients and serves each with its own
 * `EndpointSession`. Sessions share no state; a session ending leaves the
 * server listening for the next client.
 *
 * Events:
 * - "session-start" (id: string, session: EndpointSession)
 * - "session-end" (id: string)
 * - "error" (err: Error) — listener error after startup
 */
export class EndpointServer extends EventEmitter {
    readonly config: EndpointConfig;

    private readonly maxPayload: number;
    private readonly now: (() => number) | undefined;
    private readonly logger: Logger;

    private wss: WebSocketServer | null = null;
    private sessions: Map<string, { session: EndpointSession; done: Promise<void> }> = new Map();
    private nextSessionId = 0;

    constructor(options: EndpointServerOptions = {}) {
        super();
        this.config = resolveEndpointConfig({
            host: options.host,
            port: options.port,
            jointNames: options.jointNames,
            publishHz: options.publishHz,
        });
        this.maxPayload = options.maxPayload ?? 2 ** 20;
        this.now = options.now;
        this.logger = options.logger ?? createLogger("jointlink:endpoint");
    }

    /** Start listening. */
    async start(): Promise<void> {
        if (this.wss) {
            throw new Error("Endpoint already running");
        }

        await new Promise<void>((resolve, reject) => {
            const wss = new WebSocketServer({
                host: this.config.host,
                port: this.config.port,
                perMessageDeflate: false,
                maxPayload: this.maxPayload,
            });

            const onError = (err: Error) => {
                wss.close();
                reject(err);
            };
            wss.once("error", onError);

            wss.once("listening", () => {
                wss.removeListener("error", onError);
                wss.on("error", (err) => {
                    this.logger.error(`server error: ${err.message}`);
                    if (this.listenerCount("error") > 0) this.emit("error", err);
                });
                wss.on("connection", (socket) => this.handleConnection(socket));
                this.wss = wss;
                resolve();
            });
        });

        this.logger.info(`listening on ${this.url}`);
    }

    /** Close every session, then the listener. */
    async stop(): Promise<void> {
        const wss = this.wss;
        this.wss = null;

        const pending = [...this.sessions.values()];
        for (const { session } of pending) {
            session.close(1001);
        }
        await Promise.all(pending.map(({ done }) => done));

        if (wss) {
            await new Promise<void>((resolve) => {
                wss.close(() => resolve());
            });
        }
    }

    /** The address the server is listening on. */
    get address(): AddressInfo | null {
        const addr = this.wss?.address();
        return addr && typeof addr === "object" ? addr : null;
    }

    /** `ws://host:port` of the listener, once started. */
    get url(): string | null {
        const addr = this.address;
        return addr ? `ws://${this.config.host}:${addr.port}` : null;
    }

    get sessionCount(): number {
        return this.sessions.size;
    }

    /** A live session by id. */
    session(id: string): EndpointSession | undefined {
        return this.sessions.get(id)?.session;
    }

    private handleConnection(socket: WebSocket): void {
        const id = `session-${this.nextSessionId++}`;
        const session = new EndpointSession(socket, {
            id,
            jointNames: this.config.jointNames,
            publishIntervalMs: 1000 / this.config.publishHz,
            now: this.now,
            logger: this.logger,
        });

        const done = session.run().then(
            () => this.endSession(id),
            (err) => {
                this.logger.error(`${id}: handler failed: ${toError(err).message}`);
                this.endSession(id);
            },
        );
        this.sessions.set(id, { session, done });
        this.emit("session-start", id, session);
    }

    private endSession(id: string): void {
        if (this.sessions.delete(id)) {
            this.emit("session-end", id);
        }
    }
}
