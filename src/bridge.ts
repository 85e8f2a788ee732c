import type { JointPositions, JointVector, ObservationSnapshot } from "./joints.js";
import type { NotConnectedError, TransportClosedError } from "./errors.js";

export type BridgeStatus = "connected" | "reconnecting" | "disconnected";

/** Outcome of one `act()` call. Delivery problems are reported, not thrown. */
export interface ActResult {
    /** Sequence number of the command built for this call. */
    seq: number;
    /** The shaped goal that was sent (or would have been). */
    goal: JointVector;
    /** The command was handed to an open transport. */
    sent: boolean;
    /** Why the command was not sent. */
    error?: NotConnectedError | TransportClosedError;
    /** The target was empty; the goal holds the previous position. */
    emptyTarget: boolean;
    /** Joints a safety limit changed. */
    clamped: string[];
    /** Target keys that matched no joint or carried no finite value. */
    ignored: string[];
}

/**
 * Bridge interface: the control loop's view of a remote joint endpoint.
 *
 * `observe()` and `act()` are synchronous and never wait on the network, so
 * they are safe to call from a fixed-rate loop. Connection lifecycle errors
 * are thrown from `connect()` / `disconnect()`; per-tick problems are not.
 */
export interface Bridge {
    /** Connect to the endpoint, then run device preparation hooks. */
    connect(options?: { calibrate?: boolean }): Promise<void>;

    /** Close the connection and stop any reconnection. */
    disconnect(): Promise<void>;

    /** Merge at most one pending telemetry frame and return the current state. */
    observe(): ObservationSnapshot;

    /** Shape `target` against the current state and send it. */
    act(target: Readonly<JointPositions>): ActResult;

    /** Current bridge status. */
    readonly status: BridgeStatus;
}
