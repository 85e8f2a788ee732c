import { EventEmitter } from "node:events";
import type { ActResult, Bridge, BridgeStatus } from "./bridge.js";
import { ObservationCache } from "./cache.js";
import {
    type BridgeConfig,
    type BridgeConfigInput,
    resolveBridgeConfig,
    resolveSafetyLimits,
} from "./config.js";
import { ConnectionManager, type ConnectionManagerOptions } from "./connection.js";
import {
    type DeviceCapabilities,
    type DeviceVariant,
    capabilitiesOf,
    prepareDevice,
} from "./device.js";
import {
    AlreadyConnectedError,
    NotConnectedError,
    TransportClosedError,
    toError,
} from "./errors.js";
import {
    type FeatureType,
    actionFeatures,
    observationFeatures,
    observationFromSnapshot,
    positionKey,
    targetFromAction,
} from "./features.js";
import { decodeState, encode } from "./framing.js";
import { type JointPositions, type ObservationSnapshot, wallClock } from "./joints.js";
import { type Logger, createLogger, formatPositions } from "./logger.js";
import { commandFrame } from "./protocol.js";
import { type SafetyLimits, shape } from "./shaper.js";

export interface JointBridgeOptions extends BridgeConfigInput {
    /** What is at the far end. Default: a simulated endpoint (no device hooks). */
    variant?: DeviceVariant;
    /** Reconnect in the background after the transport drops. Default: false. */
    reconnect?: boolean;
    /** First reconnect delay in ms. Default: 500. */
    reconnectDelayMs?: number;
    /** Largest reconnect delay in ms. Default: 30000. */
    maxReconnectDelayMs?: number;
    /** Transport tuning passed to the connection manager. */
    transport?: Pick<ConnectionManagerOptions, "closeTimeoutMs" | "maxQueue" | "maxPayload">;
    /** Clock in seconds. Default: wall clock. */
    now?: () => number;
    logger?: Logger;
}

/** Commands logged unconditionally before send logging drops to once per second. */
const EARLY_SEND_LOGS = 4;

/**
 * Client side of the channel: streams joint commands to an endpoint and
 * caches the telemetry it publishes.
 *
 * After a failed send the cache still takes the shaped goal as the assumed
 * state, so the loop keeps moving from where it asked to be. `confirmed()`
 * gives the telemetry-only view when that distinction matters.
 *
 * Events:
 * - "connect" / "disconnect" — transport up / dropped by the peer
 * - "reconnecting" (attempt: number, delay: number) — about to reconnect
 * - "send-error" (err: NotConnectedError | TransportClosedError)
 * - "frame-dropped" (err: MalformedFrameError | SchemaMismatchError)
 * - "warning" (message: string) — empty or partly unknown target
 */
export class JointBridge extends EventEmitter implements Bridge {
    readonly config: BridgeConfig;
    readonly limits: SafetyLimits;

    private readonly connection: ConnectionManager;
    private readonly cache: ObservationCache;
    private readonly capabilities: DeviceCapabilities;
    private readonly now: () => number;
    private readonly logger: Logger;
    private readonly shouldReconnect: boolean;
    private readonly initialDelay: number;
    private readonly maxDelay: number;

    private seq = 0;
    private lastSendLog = Number.NEGATIVE_INFINITY;
    private stopping = false;
    private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
    private reconnectAttempt = 0;
    private pendingReconnect: AbortController | null = null;

    constructor(options: JointBridgeOptions = {}) {
        super();
        this.config = resolveBridgeConfig({
            url: options.url,
            jointNames: options.jointNames,
            maxRelativeTarget: options.maxRelativeTarget,
            jointMin: options.jointMin,
            jointMax: options.jointMax,
            connect: options.connect,
        });
        this.limits = resolveSafetyLimits(this.config);
        this.now = options.now ?? wallClock;
        this.logger = options.logger ?? createLogger("jointlink:bridge");
        this.capabilities = capabilitiesOf(options.variant ?? { kind: "simulated-endpoint" });
        this.shouldReconnect = options.reconnect ?? false;
        this.initialDelay = options.reconnectDelayMs ?? 500;
        this.maxDelay = options.maxReconnectDelayMs ?? 30000;

        this.cache = new ObservationCache(this.config.jointNames, this.now);
        this.connection = new ConnectionManager({
            ...options.transport,
            ...this.config.connect,
            url: this.config.url,
            logger: this.logger,
        });

        this.connection.on("connect", () => this.emit("connect"));
        this.connection.on("disconnect", () => {
            this.emit("disconnect");
            this.scheduleReconnect();
        });
    }

    get status(): BridgeStatus {
        if (this.connection.connected) return "connected";
        if (this.reconnectTimer || this.pendingReconnect) return "reconnecting";
        return "disconnected";
    }

    get connected(): boolean {
        return this.connection.connected;
    }

    /** Action schema: `<joint>.pos` for each configured joint. */
    get actionFeatures(): Record<string, FeatureType> {
        return actionFeatures(this.config.jointNames);
    }

    /** Observation schema: `<joint>.pos` for each joint plus `timestamp`. */
    get observationFeatures(): Record<string, FeatureType> {
        return observationFeatures(this.config.jointNames);
    }

    /**
     * Connect to the endpoint, then configure (and optionally calibrate) the
     * device.
     *
     * @throws AlreadyConnectedError if already connected
     * @throws ConnectionFailedError when the retry budget runs out; the
     *   bridge is unusable and the caller should fail its own startup
     * @throws whatever a device hook throws, after the connection is closed
     */
    async connect(options: { calibrate?: boolean } = {}): Promise<void> {
        this.stopping = false;
        await this.connection.connect();
        try {
            await prepareDevice(this.capabilities, options);
        } catch (err) {
            this.logger.error(`device preparation failed: ${toError(err).message}`);
            try {
                await this.connection.disconnect();
            } catch (closeErr) {
                if (!(closeErr instanceof NotConnectedError)) throw closeErr;
            }
            throw err;
        }
    }

    /**
     * Stop reconnecting and close the connection.
     *
     * @throws NotConnectedError if there is no connection
     */
    async disconnect(): Promise<void> {
        this.stopping = true;
        if (this.reconnectTimer) {
            clearTimeout(this.reconnectTimer);
            this.reconnectTimer = null;
        }
        this.pendingReconnect?.abort(new Error("Bridge disconnected"));
        await this.connection.disconnect();
    }

    observe(): ObservationSnapshot {
        const raw = this.connection.tryReceive();
        if (raw !== null) {
            const result = decodeState(raw);
            if (result.ok) {
                this.cache.update(result.frame);
            } else {
                this.logger.debug(`dropped frame: ${result.error.message}`);
                this.emit("frame-dropped", result.error);
            }
        }
        return this.cache.snapshot();
    }

    /** The last state reported by telemetry, ignoring assumed commands. */
    confirmed(): ObservationSnapshot {
        return this.cache.confirmed();
    }

    act(target: Readonly<JointPositions>): ActResult {
        const shaped = shape(target, this.cache.snapshot(), this.limits);

        if (shaped.emptyTarget) {
            this.warn("outgoing target is empty, holding position (check that action keys end with '.pos')");
        }
        if (shaped.ignored.length > 0) {
            this.warn(`ignored target keys: ${shaped.ignored.join(", ")}`);
        }
        if (shaped.clamped.length > 0) {
            this.logger.debug(`clamped joints: ${shaped.clamped.join(", ")}`);
        }

        this.seq += 1;
        const timestamp = this.now();
        const frame = commandFrame(this.seq, shaped.goal, timestamp);
        this.logSend(frame.seq, frame.target, timestamp);

        let error: NotConnectedError | TransportClosedError | undefined;
        try {
            this.connection.send(encode(frame));
        } catch (err) {
            if (!(err instanceof NotConnectedError || err instanceof TransportClosedError)) {
                throw err;
            }
            error = err;
            this.logger.warn(`send failed: ${err.message}`);
            this.emit("send-error", err);
        }

        this.cache.assume(shaped.goal, timestamp);

        return {
            seq: frame.seq,
            goal: shaped.goal,
            sent: error === undefined,
            ...(error ? { error } : {}),
            emptyTarget: shaped.emptyTarget,
            clamped: shaped.clamped,
            ignored: shaped.ignored,
        };
    }

    /** `observe()` flattened to `<joint>.pos` keys plus `timestamp`. */
    getObservation(): Record<string, number> {
        return observationFromSnapshot(this.observe());
    }

    /** `act()` for a `<joint>.pos` keyed action; returns the action actually sent. */
    sendAction(action: Readonly<Record<string, unknown>>): Record<string, number> {
        const { goal } = this.act(targetFromAction(action));
        const sent: Record<string, number> = {};
        goal.names.forEach((name, i) => {
            sent[positionKey(name)] = goal.positions[i] ?? 0;
        });
        return sent;
    }

    private warn(message: string): void {
        this.logger.warn(message);
        this.emit("warning", message);
    }

    private logSend(seq: number, target: readonly number[], now: number): void {
        if (seq <= EARLY_SEND_LOGS || now - this.lastSendLog > 1) {
            this.logger.info(`->cmd #${seq} ${formatPositions(target)}`);
            this.lastSendLog = now;
        }
    }

    private scheduleReconnect(): void {
        if (!this.shouldReconnect || this.stopping || this.reconnectTimer) return;

        this.reconnectAttempt++;
        // Exponential backoff with ±25% jitter
        const base = this.initialDelay * Math.pow(2, this.reconnectAttempt - 1);
        const jitter = base * (0.75 + Math.random() * 0.5);
        const delay = Math.min(Math.round(jitter), this.maxDelay);

        this.emit("reconnecting", this.reconnectAttempt, delay);

        this.reconnectTimer = setTimeout(() => {
            this.reconnectTimer = null;
            void this.reconnect();
        }, delay);
    }

    private async reconnect(): Promise<void> {
        if (this.stopping) return;

        const controller = new AbortController();
        this.pendingReconnect = controller;
        try {
            await this.connection.connect({ signal: controller.signal });
            this.reconnectAttempt = 0;
        } catch (err) {
            // Someone else reconnected first
            if (err instanceof AlreadyConnectedError) return;
            this.logger.warn(`reconnect failed: ${toError(err).message}`);
            this.pendingReconnect = null;
            this.scheduleReconnect();
        } finally {
            if (this.pendingReconnect === controller) this.pendingReconnect = null;
        }
    }
}
