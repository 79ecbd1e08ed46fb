export * from './types/index.js';
export * from './errors.js';

export { Box } from './geometry/Box.js';
export type { BoxBounds, BoxCorners, BoxOptions, Doorway } from './geometry/Box.js';
export { clipConvexPolygon, polygonArea, polygonCentroid } from './geometry/polygon.js';
export { bearing, normaliseAngle, toDegrees, toRadians } from './geometry/vector.js';

export { Corridor } from './corridor/Corridor.js';
export type { TargetBearing } from './corridor/Corridor.js';
export { DEFAULT_START_POSE, buildBox, buildCorridor, loadLayoutFile, startPoseFromLayout } from './corridor/layout.js';

export {
  LayoutSchema,
  MirrorPolicySchema,
  NavigatorConfigSchema,
  parseLayout,
  parseMirrorPolicy,
  parseNavigatorConfig,
} from './config/schema.js';
export type { Layout, MirrorPolicy, MirrorPolicyInput, NavigatorConfig, NavigatorConfigInput } from './config/schema.js';

export * from './navigator/index.js';

export { Simulation } from './simulation/Simulation.js';

export type { PoseBridge, PoseFrameMeta } from './bridge/PoseBridge.js';
export { WebSocketPoseBridge, captureFileName, connectWebSocket } from './bridge/WebSocketPoseBridge.js';
export type { BridgeSocket, BridgeSocketFactory, PoseMessage, RendererMessage, WebSocketPoseBridgeOptions } from './bridge/WebSocketPoseBridge.js';
export { withRetry, withTimeout } from './bridge/retry.js';
export type { RetryOptions } from './bridge/retry.js';
