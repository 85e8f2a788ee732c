/**
 * An ordered joint vector. `names` is the canonical schema shared by both
 * ends of the channel; `positions[i]` belongs to `names[i]`.
 */
export interface JointVector {
    readonly names: readonly string[];
    readonly positions: readonly number[];
}

/** A partial set of joint positions keyed by joint name. */
export type JointPositions = Record<string, number>;

/** A joint vector with the time (seconds since the epoch) it describes. */
export interface ObservationSnapshot extends JointVector {
    readonly timestamp: number;
}

/** Wall clock in seconds, the unit used on the wire. */
export function wallClock(): number {
    return Date.now() / 1000;
}

/** A vector of zeros over `names`. */
export function zeroVector(names: readonly string[]): JointVector {
    return { names: [...names], positions: names.map(() => 0) };
}
