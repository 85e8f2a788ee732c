export {
    type JointVector,
    type JointPositions,
    type ObservationSnapshot,
    wallClock,
    zeroVector,
} from "./joints.js";
export {
    type CommandFrame,
    type StateFrame,
    type Frame,
    type FrameType,
    CommandFrameSchema,
    StateFrameSchema,
    JOINT_POSITION_MODE,
    commandFrame,
    stateFrame,
} from "./protocol.js";
export { type DecodeResult, encode, decode, decodeCommand, decodeState, frameText } from "./framing.js";
export { ObservationCache } from "./cache.js";
export { type SafetyLimits, type JointBounds, type ShapeResult, shape, clamp } from "./shaper.js";
export {
    ConnectionManager,
    type ConnectionManagerOptions,
    type ConnectCallOptions,
} from "./connection.js";
export { type Bridge, type BridgeStatus, type ActResult } from "./bridge.js";
export { JointBridge, type JointBridgeOptions } from "./follower.js";
export {
    EndpointSession,
    type EndpointSessionOptions,
    type RejectReason,
} from "./endpoint/session.js";
export { EndpointServer, type EndpointServerOptions } from "./endpoint/server.js";
export {
    type DeviceCapabilities,
    type DeviceVariant,
    noopCapabilities,
    capabilitiesOf,
    prepareDevice,
} from "./device.js";
export {
    POSITION_SUFFIX,
    positionKey,
    actionFeatures,
    observationFeatures,
    targetFromAction,
    observationFromSnapshot,
} from "./features.js";
export {
    DEFAULT_URL,
    DEFAULT_HOST,
    DEFAULT_PORT,
    DEFAULT_PUBLISH_HZ,
    DEFAULT_JOINT_NAMES,
    DEFAULT_CONNECT,
    type BridgeConfig,
    type BridgeConfigInput,
    type EndpointConfig,
    type EndpointConfigInput,
    type ConnectOptions,
    resolveBridgeConfig,
    resolveEndpointConfig,
    resolveSafetyLimits,
    bridgeConfigFromEnv,
    endpointConfigFromEnv,
} from "./config.js";
export {
    JointLinkError,
    type JointLinkErrorCode,
    AlreadyConnectedError,
    NotConnectedError,
    ConnectionFailedError,
    TransportClosedError,
    MalformedFrameError,
    SchemaMismatchError,
    ConfigError,
} from "./errors.js";
export { type Logger, type LogLevel, createLogger, silentLogger } from "./logger.js";
