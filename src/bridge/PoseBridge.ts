import type { ActionLabel, CaptureRef, Pose } from '../types/index.js';

export interface PoseFrameMeta {
  /**
   * 0 for the starting pose, then one per navigator step.
   */
  step: number;
  /**
   * Correct action for the mirrored pose, used to name captured images.
   */
  label?: ActionLabel;
}

/**
 * Mirrors the agent into an external renderer. Sending may block on I/O; receiving never does.
 */
export interface PoseBridge {
  sendPose(pose: Pose, meta: PoseFrameMeta): Promise<void>;
  tryReceiveCapture(): CaptureRef | undefined;
  close(): Promise<void>;
}
