import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { ConfigError } from "./errors.js";
import type { JointBounds, SafetyLimits } from "./shaper.js";

// ─── Defaults ───────────────────────────────────────────────────────

export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PORT = 8765;
export const DEFAULT_URL = `ws://${DEFAULT_HOST}:${DEFAULT_PORT}`;
export const DEFAULT_PUBLISH_HZ = 60;

export const DEFAULT_JOINT_NAMES: readonly string[] = [
    "shoulder_pan",
    "shoulder_lift",
    "elbow_flex",
    "wrist_flex",
    "wrist_roll",
    "gripper",
];

/** Retry budget for establishing the connection. */
export const DEFAULT_CONNECT = {
    attempts: 10,
    attemptTimeoutMs: 2000,
    retryDelayMs: 500,
} as const;

// ─── Schemas ────────────────────────────────────────────────────────

const JointNames = Type.Array(Type.String({ minLength: 1 }), { minItems: 1 });

export const ConnectOptionsSchema = Type.Object({
    attempts: Type.Integer({ minimum: 1 }),
    attemptTimeoutMs: Type.Number({ exclusiveMinimum: 0 }),
    retryDelayMs: Type.Number({ minimum: 0 }),
});

export const BridgeConfigSchema = Type.Object({
    url: Type.String({ minLength: 1 }),
    jointNames: JointNames,
    /** One step limit for every joint, or a per-joint map. */
    maxRelativeTarget: Type.Optional(
        Type.Union([
            Type.Number({ minimum: 0 }),
            Type.Record(Type.String(), Type.Number({ minimum: 0 })),
        ]),
    ),
    /** Lower bounds, aligned with `jointNames`. */
    jointMin: Type.Optional(Type.Array(Type.Number())),
    /** Upper bounds, aligned with `jointNames`. */
    jointMax: Type.Optional(Type.Array(Type.Number())),
    connect: ConnectOptionsSchema,
});

export const EndpointConfigSchema = Type.Object({
    host: Type.String({ minLength: 1 }),
    port: Type.Integer({ minimum: 0, maximum: 65535 }),
    jointNames: JointNames,
    publishHz: Type.Number({ exclusiveMinimum: 0 }),
});

export type ConnectOptions = Static<typeof ConnectOptionsSchema>;
export type BridgeConfig = Static<typeof BridgeConfigSchema>;
export type EndpointConfig = Static<typeof EndpointConfigSchema>;

export type BridgeConfigInput = Partial<Omit<BridgeConfig, "connect">> & {
    connect?: Partial<ConnectOptions>;
};
export type EndpointConfigInput = Partial<EndpointConfig>;

// ─── Resolution ─────────────────────────────────────────────────────

/**
 * Fill in defaults and validate a bridge configuration.
 *
 * Beyond the schema: joint names are unique, `jointMin` and `jointMax` come
 * together and align with `jointNames`, each min ≤ max, and a per-joint
 * step map names only configured joints.
 *
 * @throws ConfigError listing every problem found
 */
export function resolveBridgeConfig(input: BridgeConfigInput = {}): BridgeConfig {
    const candidate = {
        ...input,
        url: input.url ?? DEFAULT_URL,
        jointNames: input.jointNames ?? [...DEFAULT_JOINT_NAMES],
        connect: { ...DEFAULT_CONNECT, ...input.connect },
    };

    const config = validate(BridgeConfigSchema, candidate);
    const problems = uniqueNameProblems(config.jointNames);
    const { jointNames, jointMin, jointMax, maxRelativeTarget } = config;

    if ((jointMin === undefined) !== (jointMax === undefined)) {
        problems.push("jointMin and jointMax must be given together");
    }
    if (jointMin !== undefined && jointMin.length !== jointNames.length) {
        problems.push(`jointMin has ${jointMin.length} entries, expected ${jointNames.length}`);
    }
    if (jointMax !== undefined && jointMax.length !== jointNames.length) {
        problems.push(`jointMax has ${jointMax.length} entries, expected ${jointNames.length}`);
    }
    if (jointMin !== undefined && jointMax !== undefined) {
        jointNames.forEach((name, i) => {
            const lo = jointMin[i];
            const hi = jointMax[i];
            if (lo !== undefined && hi !== undefined && lo > hi) {
                problems.push(`${name}: min ${lo} exceeds max ${hi}`);
            }
        });
    }
    if (typeof maxRelativeTarget === "object") {
        for (const key of Object.keys(maxRelativeTarget)) {
            if (!jointNames.includes(key)) {
                problems.push(`maxRelativeTarget names unknown joint "${key}"`);
            }
        }
    }

    if (problems.length > 0) throw new ConfigError(problems);
    return config;
}

/** Fill in defaults and validate an endpoint configuration. */
export function resolveEndpointConfig(input: EndpointConfigInput = {}): EndpointConfig {
    const config = validate(EndpointConfigSchema, {
        host: input.host ?? DEFAULT_HOST,
        port: input.port ?? DEFAULT_PORT,
        jointNames: input.jointNames ?? [...DEFAULT_JOINT_NAMES],
        publishHz: input.publishHz ?? DEFAULT_PUBLISH_HZ,
    });
    const problems = uniqueNameProblems(config.jointNames);
    if (problems.length > 0) throw new ConfigError(problems);
    return config;
}

/** Per-joint safety limits described by a resolved bridge configuration. */
export function resolveSafetyLimits(
    config: Pick<BridgeConfig, "jointNames" | "maxRelativeTarget" | "jointMin" | "jointMax">,
): SafetyLimits {
    const { jointNames, maxRelativeTarget, jointMin, jointMax } = config;

    let maxRelative: Record<string, number> | undefined;
    if (typeof maxRelativeTarget === "number") {
        maxRelative = Object.fromEntries(jointNames.map((name) => [name, maxRelativeTarget]));
    } else if (maxRelativeTarget !== undefined) {
        maxRelative = { ...maxRelativeTarget };
    }

    let bounds: Record<string, JointBounds> | undefined;
    if (jointMin !== undefined && jointMax !== undefined) {
        bounds = {};
        jointNames.forEach((name, i) => {
            const min = jointMin[i];
            const max = jointMax[i];
            if (bounds && min !== undefined && max !== undefined) {
                bounds[name] = { min, max };
            }
        });
    }

    return Object.freeze({
        ...(maxRelative ? { maxRelative: Object.freeze(maxRelative) } : {}),
        ...(bounds ? { bounds: Object.freeze(bounds) } : {}),
    });
}

// ─── Environment ────────────────────────────────────────────────────

/**
 * Bridge settings from the environment:
 * `JOINTLINK_URL`, `JOINTLINK_JOINTS` (comma-separated),
 * `JOINTLINK_MAX_RELATIVE_TARGET` (one step limit for every joint).
 */
export function bridgeConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BridgeConfigInput {
    const input: BridgeConfigInput = {};
    if (env.JOINTLINK_URL) input.url = env.JOINTLINK_URL;
    const joints = parseList(env.JOINTLINK_JOINTS);
    if (joints) input.jointNames = joints;
    if (env.JOINTLINK_MAX_RELATIVE_TARGET) {
        input.maxRelativeTarget = Number(env.JOINTLINK_MAX_RELATIVE_TARGET);
    }
    return input;
}

/**
 * Endpoint settings from the environment:
 * `JOINTLINK_HOST`, `JOINTLINK_PORT`, `JOINTLINK_JOINTS`, `JOINTLINK_PUBLISH_HZ`.
 */
export function endpointConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EndpointConfigInput {
    const input: EndpointConfigInput = {};
    if (env.JOINTLINK_HOST) input.host = env.JOINTLINK_HOST;
    if (env.JOINTLINK_PORT) input.port = Number(env.JOINTLINK_PORT);
    const joints = parseList(env.JOINTLINK_JOINTS);
    if (joints) input.jointNames = joints;
    if (env.JOINTLINK_PUBLISH_HZ) input.publishHz = Number(env.JOINTLINK_PUBLISH_HZ);
    return input;
}

/** Split a comma-separated list, dropping blanks. Undefined if nothing is left. */
export function parseList(raw: string | undefined): string[] | undefined {
    if (!raw) return undefined;
    const items = raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
    return items.length > 0 ? items : undefined;
}

// ─── Helpers ────────────────────────────────────────────────────────

function validate<T extends TSchema>(schema: T, value: unknown): Static<T> {
    if (Value.Check(schema, value)) return value;
    const problems = [...Value.Errors(schema, value)].map(
        (e) => `${e.path || "/"}: ${e.message}`,
    );
    throw new ConfigError(problems);
}

function uniqueNameProblems(names: readonly string[]): string[] {
    const seen = new Set<string>();
    const problems: string[] = [];
    for (const name of names) {
        if (seen.has(name)) problems.push(`duplicate joint name "${name}"`);
        seen.add(name);
    }
    return problems;
}
