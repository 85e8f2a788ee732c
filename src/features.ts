import type { JointPositions, ObservationSnapshot } from "./joints.js";

/**
 * Teleoperation stacks address joints as `<joint>.pos`. These helpers map
 * between that key convention and joint names.
 */

export const POSITION_SUFFIX = ".pos";

export type FeatureType = "float";

export function positionKey(joint: string): string {
    return `${joint}${POSITION_SUFFIX}`;
}

/** Action schema: one float per joint. */
export function actionFeatures(jointNames: readonly string[]): Record<string, FeatureType> {
    return Object.fromEntries(jointNames.map((name) => [positionKey(name), "float" as const]));
}

/** Observation schema: one float per joint plus `timestamp`. */
export function observationFeatures(jointNames: readonly string[]): Record<string, FeatureType> {
    return { ...actionFeatures(jointNames), timestamp: "float" };
}

/**
 * Extract a joint target from an action. Numeric strings are converted;
 * keys without the `.pos` suffix and non-numeric values are skipped.
 */
export function targetFromAction(action: Readonly<Record<string, unknown>>): JointPositions {
    const target: JointPositions = {};
    for (const [key, value] of Object.entries(action)) {
        if (!key.endsWith(POSITION_SUFFIX)) continue;
        const num =
            typeof value === "number"
                ? value
                : typeof value === "string" && value.trim() !== ""
                    ? Number(value)
                    : NaN;
        if (Number.isNaN(num)) continue;
        target[key.slice(0, -POSITION_SUFFIX.length)] = num;
    }
    return target;
}

/** Flatten a snapshot into `<joint>.pos` keys plus `timestamp`. */
export function observationFromSnapshot(snapshot: ObservationSnapshot): Record<string, number> {
    const out: Record<string, number> = {};
    snapshot.names.forEach((name, i) => {
        out[positionKey(name)] = snapshot.positions[i] ?? 0;
    });
    out.timestamp = snapshot.timestamp;
    return out;
}
