import { Value } from "@sinclair/typebox/value";
import type { Static, TSchema } from "@sinclair/typebox";
import type { RawData } from "ws";
import { MalformedFrameError, SchemaMismatchError } from "./errors.js";
import {
    type CommandFrame,
    type Frame,
    type StateFrame,
    CommandFrameSchema,
    StateFrameSchema,
    JOINT_POSITION_MODE,
} from "./protocol.js";

/**
 * Result of decoding one frame. Decoding never throws: a bad frame comes
 * back as `{ ok: false }` so a receive loop can log it and carry on.
 */
export type DecodeResult<T extends Frame = Frame> =
    | { ok: true; frame: T }
    | { ok: false; error: MalformedFrameError | SchemaMismatchError };

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Encode a frame as one UTF-8 JSON text message.
 *
 * Wire format: a WebSocket text frame holding exactly one JSON object.
 */
export function encode(frame: Frame): string {
    return JSON.stringify(frame);
}

/** Text of a received message, or null if it is not valid UTF-8. */
export function frameText(data: RawData | string): string | null {
    if (typeof data === "string") return data;
    const bytes = Array.isArray(data)
        ? Buffer.concat(data)
        : Buffer.isBuffer(data)
            ? data
            : new Uint8Array(data);
    try {
        return utf8.decode(bytes);
    } catch {
        return null;
    }
}

/**
 * Decode and validate one frame.
 *
 * Malformed: not UTF-8, not JSON, not an object, or no `type`.
 * Schema mismatch: unknown `type` or `mode`, mistyped fields, or
 * `names` out of step with `target` / `joint_pos`.
 */
export function decode(data: RawData | string): DecodeResult {
    const text = frameText(data);
    if (text === null) {
        return malformed("Frame is not valid UTF-8");
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch {
        return malformed(`Invalid JSON in frame: ${text.slice(0, 100)}`);
    }

    if (parsed === null || typeof parsed !== "object" || Array.isArray(parsed)) {
        return malformed("Frame is not a JSON object");
    }

    const type: unknown = Reflect.get(parsed, "type");
    if (typeof type !== "string") {
        return malformed("Frame has no type");
    }

    switch (type) {
        case "cmd": {
            const mode: unknown = Reflect.get(parsed, "mode");
            if (mode !== JOINT_POSITION_MODE) {
                return mismatch(`Unsupported mode: ${String(mode)}`);
            }
            const checked = check(CommandFrameSchema, parsed, "cmd");
            if (!checked.ok) return checked;
            const frame = checked.frame;
            if (frame.names.length !== frame.target.length) {
                return mismatch(
                    `names/target length mismatch: ${frame.names.length} != ${frame.target.length}`,
                );
            }
            return { ok: true, frame };
        }
        case "state": {
            const checked = check(StateFrameSchema, parsed, "state");
            if (!checked.ok) return checked;
            const frame = checked.frame;
            if (frame.names !== undefined && frame.names.length !== frame.joint_pos.length) {
                return mismatch(
                    `names/joint_pos length mismatch: ${frame.names.length} != ${frame.joint_pos.length}`,
                );
            }
            return { ok: true, frame };
        }
        default:
            return mismatch(`Unknown frame type: ${type}`);
    }
}

/** Decode, accepting only command frames. */
export function decodeCommand(data: RawData | string): DecodeResult<CommandFrame> {
    const result = decode(data);
    if (!result.ok) return result;
    if (result.frame.type !== "cmd") {
        return mismatch(`Expected cmd frame, got ${result.frame.type}`);
    }
    return { ok: true, frame: result.frame };
}

/** Decode, accepting only state frames. */
export function decodeState(data: RawData | string): DecodeResult<StateFrame> {
    const result = decode(data);
    if (!result.ok) return result;
    if (result.frame.type !== "state") {
        return mismatch(`Expected state frame, got ${result.frame.type}`);
    }
    return { ok: true, frame: result.frame };
}

function check<T extends TSchema>(
    schema: T,
    value: unknown,
    label: Frame["type"],
): { ok: true; frame: Static<T> } | { ok: false; error: SchemaMismatchError } {
    if (Value.Check(schema, value)) {
        return { ok: true, frame: value };
    }
    const first = Value.Errors(schema, value).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "root";
    return mismatch(`Invalid ${label} frame at ${where}`);
}

function malformed(detail: string): { ok: false; error: MalformedFrameError } {
    return { ok: false, error: new MalformedFrameError(detail) };
}

function mismatch(detail: string): { ok: false; error: SchemaMismatchError } {
    return { ok: false, error: new SchemaMismatchError(detail) };
}
