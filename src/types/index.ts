export interface Vector2 {
  x: number;
  y: number;
}

export interface Pose {
  position: Vector2;
  /**
   * Radians, counter-clockwise from +x, normalised to (-PI, PI].
   */
  heading: number;
}

export type NavigatorKind = 'perfect' | 'wandering';

export type NavigatorStatus = 'running' | 'reached' | 'out-of-bounds' | 'action-limit-exceeded';

export type NavigatorPhase = 'aiming-at-doorway' | 'aiming-at-final-target' | 'done';

export type BoundaryPolicy = 'terminate' | 'block';

export type MotionAction =
  | { kind: 'rotate'; angle: number }
  | { kind: 'translate'; distance: number };

/**
 * Label attached to captured images when the run is used to build a dataset.
 */
export type ActionLabel = 'forward' | 'rotate-left' | 'rotate-right';

export interface NavigatorState {
  boxIndex: number;
  actionCount: number;
  status: NavigatorStatus;
}

export interface StepResult {
  pose: Pose;
  status: NavigatorStatus;
  /**
   * Null when the navigator had already terminated and the step was a no-op.
   */
  action: MotionAction | null;
  /**
   * What a perfect navigator would have done from the same pose.
   */
  correctAction: MotionAction | null;
  boxIndex: number;
  actionCount: number;
  /**
   * True when the boundary policy refused a translation that would have left the corridor.
   */
  blocked: boolean;
}

export interface Navigator {
  readonly kind: NavigatorKind;
  readonly phase: NavigatorPhase;
  getState(): NavigatorState;
  step(currentPose: Pose): StepResult;
}

export interface CaptureRef {
  step: number;
  ref: string;
}

export interface TrajectoryEntry {
  step: number;
  pose: Pose;
  action: MotionAction;
  correctAction: MotionAction;
  boxIndex: number;
  status: NavigatorStatus;
  blocked: boolean;
  captureRef?: string;
}

export interface SimulationResult {
  status: NavigatorStatus;
  actionCount: number;
  startPose: Pose;
  trajectory: TrajectoryEntry[];
  captures: CaptureRef[];
  cancelled: boolean;
}

export type SimulationEvent =
  | { type: 'step'; entry: TrajectoryEntry }
  | { type: 'finished'; result: SimulationResult };

export type SimulationEventType = SimulationEvent['type'];

export type SimulationEventListener<Event extends SimulationEventType> = (
  payload: Extract<SimulationEvent, { type: Event }>,
) => void;
