import { type JointVector, type ObservationSnapshot, wallClock, zeroVector } from "./joints.js";
import type { StateFrame } from "./protocol.js";

interface Entry {
    positions: number[];
    timestamp: number;
}

/**
 * Last-known joint state for one canonical joint list.
 *
 * Holds two views:
 * - the current state, merged from telemetry and from locally assumed
 *   commands; `snapshot()` returns it and the control loop acts on it;
 * - the confirmed state, built only from received telemetry.
 *
 * Reads always return copies; nothing outside the cache can reach its arrays.
 */
export class ObservationCache {
    private readonly jointNames: readonly string[];
    private readonly index: Map<string, number>;
    private readonly now: () => number;
    private current: Entry;
    private observed: Entry;

    constructor(jointNames: readonly string[], now: () => number = wallClock) {
        this.jointNames = Object.freeze([...jointNames]);
        this.index = new Map(this.jointNames.map((name, i) => [name, i]));
        this.now = now;
        const start = now();
        this.current = { positions: [...zeroVector(this.jointNames).positions], timestamp: start };
        this.observed = { positions: [...this.current.positions], timestamp: start };
    }

    /** The canonical joint order. */
    get names(): readonly string[] {
        return this.jointNames;
    }

    /**
     * Merge a state frame. Named positions match by name, unnamed ones by
     * index; unknown names and extra positions are ignored. The timestamp
     * comes from the frame, or the local clock when the frame has none.
     */
    update(frame: StateFrame): void {
        const timestamp = frame.timestamp ?? this.now();
        for (const target of [this.current, this.observed]) {
            frame.joint_pos.forEach((value, i) => {
                const name = frame.names ? frame.names[i] : this.jointNames[i];
                const slot = name === undefined ? undefined : this.index.get(name);
                if (slot !== undefined) target.positions[slot] = value;
            });
            target.timestamp = timestamp;
        }
    }

    /**
     * Record a state that was commanded but not yet observed. Only the
     * current view changes; `confirmed()` keeps the last telemetry.
     */
    assume(vec: JointVector, timestamp: number = this.now()): void {
        vec.names.forEach((name, i) => {
            const slot = this.index.get(name);
            const value = vec.positions[i];
            if (slot !== undefined && value !== undefined) this.current.positions[slot] = value;
        });
        this.current.timestamp = timestamp;
    }

    /** Independent copy of the current state. */
    snapshot(): ObservationSnapshot {
        return copy(this.jointNames, this.current);
    }

    /** Independent copy of the state last reported by telemetry. */
    confirmed(): ObservationSnapshot {
        return copy(this.jointNames, this.observed);
    }
}

function copy(names: readonly string[], entry: Entry): ObservationSnapshot {
    return { names: [...names], positions: [...entry.positions], timestamp: entry.timestamp };
}
