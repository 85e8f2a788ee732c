import { Type, type Static } from "@sinclair/typebox";
import type { JointVector } from "./joints.js";

/**
 * Wire schemas for the two frame types.
 *
 * - `cmd`, client → endpoint: a full joint-position target.
 * - `state`, endpoint → client: observed joint positions. `names` may be
 *   omitted, in which case positions follow the receiver's canonical order.
 *
 * Unknown extra fields are tolerated; missing or mistyped fields are not.
 */

export const JOINT_POSITION_MODE = "joint_position";

export const CommandFrameSchema = Type.Object({
    type: Type.Literal("cmd"),
    seq: Type.Integer({ minimum: 0 }),
    mode: Type.Literal(JOINT_POSITION_MODE),
    names: Type.Array(Type.String()),
    target: Type.Array(Type.Number()),
    timestamp: Type.Number(),
});

export const StateFrameSchema = Type.Object({
    type: Type.Literal("state"),
    names: Type.Optional(Type.Array(Type.String())),
    joint_pos: Type.Array(Type.Number()),
    timestamp: Type.Optional(Type.Number()),
});

export type CommandFrame = Static<typeof CommandFrameSchema>;
export type StateFrame = Static<typeof StateFrameSchema>;
export type Frame = CommandFrame | StateFrame;
export type FrameType = Frame["type"];

/** Build a joint-position command for `goal`. */
export function commandFrame(seq: number, goal: JointVector, timestamp: number): CommandFrame {
    return {
        type: "cmd",
        seq,
        mode: JOINT_POSITION_MODE,
        names: [...goal.names],
        target: [...goal.positions],
        timestamp,
    };
}

/** Build a named state frame for `vec`. */
export function stateFrame(vec: JointVector, timestamp: number): StateFrame {
    return {
        type: "state",
        names: [...vec.names],
        joint_pos: [...vec.positions],
        timestamp,
    };
}
