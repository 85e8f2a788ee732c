/**
 * Error taxonomy.
 *
 * Lifecycle errors (connect/disconnect/send misuse, retry exhaustion) are
 * thrown. Frame errors are returned as values by the codec and dropped by
 * whoever receives them.
 */

export type JointLinkErrorCode =
    | "ALREADY_CONNECTED"
    | "NOT_CONNECTED"
    | "CONNECTION_FAILED"
    | "TRANSPORT_CLOSED"
    | "MALFORMED_FRAME"
    | "SCHEMA_MISMATCH"
    | "CONFIG";

export class JointLinkError extends Error {
    readonly code: JointLinkErrorCode;

    constructor(code: JointLinkErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

export class AlreadyConnectedError extends JointLinkError {
    constructor(url: string) {
        super("ALREADY_CONNECTED", `Already connected to ${url}`);
    }
}

export class NotConnectedError extends JointLinkError {
    constructor() {
        super("NOT_CONNECTED", "Not connected");
    }
}

export class ConnectionFailedError extends JointLinkError {
    readonly attempts: number;

    constructor(url: string, attempts: number, cause?: unknown) {
        super("CONNECTION_FAILED", `Cannot connect to ${url} after ${attempts} attempts`, { cause });
        this.attempts = attempts;
    }
}

export class TransportClosedError extends JointLinkError {
    constructor(detail = "Transport closed") {
        super("TRANSPORT_CLOSED", detail);
    }
}

export class MalformedFrameError extends JointLinkError {
    constructor(detail: string) {
        super("MALFORMED_FRAME", detail);
    }
}

export class SchemaMismatchError extends JointLinkError {
    constructor(detail: string) {
        super("SCHEMA_MISMATCH", detail);
    }
}

export class ConfigError extends JointLinkError {
    readonly problems: string[];

    constructor(problems: string[]) {
        super("CONFIG", `Invalid configuration: ${problems.join("; ")}`);
        this.problems = problems;
    }
}

/** Normalize anything thrown into an Error. */
export function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(String(err));
}
