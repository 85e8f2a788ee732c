import type { JointPositions, JointVector } from "./joints.js";

export interface JointBounds {
    readonly min: number;
    readonly max: number;
}

/**
 * Motion limits applied to every outgoing command.
 *
 * - `maxRelative`: largest step a joint may take from its previous position
 *   in one command. Joints without an entry are not step-limited.
 * - `bounds`: absolute range per joint. Joints without an entry are not
 *   range-limited.
 */
export interface SafetyLimits {
    readonly maxRelative?: Readonly<Record<string, number>>;
    readonly bounds?: Readonly<Record<string, JointBounds>>;
}

export interface ShapeResult {
    /** One entry per joint of `previous`, in the same order. */
    goal: JointVector;
    /** The target was empty, so `goal` equals `previous`. Callers should warn. */
    emptyTarget: boolean;
    /** Joints whose candidate value a limit changed. */
    clamped: string[];
    /** Target keys that are not configured joints or are not finite numbers. */
    ignored: string[];
}

/**
 * Turn a (possibly partial) target into a safe goal.
 *
 * For each joint of `previous`:
 * 1. take the target value, or hold the previous value if absent;
 * 2. clamp toward the previous value so the step is at most `maxRelative`;
 * 3. clamp into `bounds`.
 *
 * An empty target is a no-op: `goal` is `previous` unchanged, with no
 * limits applied, and `emptyTarget` is set.
 */
export function shape(
    target: Readonly<JointPositions>,
    previous: JointVector,
    limits: SafetyLimits = {},
): ShapeResult {
    if (Object.keys(target).length === 0) {
        return {
            goal: { names: [...previous.names], positions: [...previous.positions] },
            emptyTarget: true,
            clamped: [],
            ignored: [],
        };
    }

    const known = new Set(previous.names);
    const ignored = Object.keys(target).filter(
        (key) => !known.has(key) || !Number.isFinite(target[key]),
    );
    const clamped: string[] = [];

    const positions = previous.names.map((name, i) => {
        const prev = previous.positions[i] ?? 0;
        const wanted = target[name];
        const candidate = wanted !== undefined && Number.isFinite(wanted) ? wanted : prev;

        let value = candidate;
        const step = limits.maxRelative?.[name];
        if (step !== undefined) {
            value = clamp(value, prev - step, prev + step);
        }
        const range = limits.bounds?.[name];
        if (range !== undefined) {
            value = clamp(value, range.min, range.max);
        }

        if (value !== candidate) clamped.push(name);
        return value;
    });

    return {
        goal: { names: [...previous.names], positions },
        emptyTarget: false,
        clamped,
        ignored,
    };
}

export function clamp(value: number, lo: number, hi: number): number {
    return Math.min(Math.max(value, lo), hi);
}
