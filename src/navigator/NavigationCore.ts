/**
 * State and motion rules shared by every navigator variant.
 *
 * A navigator owns exactly one core. The core tracks which box the agent is in, how many
 * actions it has taken and the terminal status; the variants only differ in how they pick
 * the action applied each step.
 */

import { parseNavigatorConfig } from '../config/schema.js';
import type { NavigatorConfig, NavigatorConfigInput } from '../config/schema.js';
import type { Corridor } from '../corridor/Corridor.js';
import { InvalidPoseError } from '../errors.js';
import {
  GEOMETRY_EPSILON,
  addVectors,
  clamp,
  distance,
  headingVector,
  isFiniteVector,
  normaliseAngle,
  scaleVector,
} from '../geometry/vector.js';
import type {
  ActionLabel,
  MotionAction,
  NavigatorPhase,
  NavigatorState,
  NavigatorStatus,
  Pose,
  StepResult,
  Vector2,
} from '../types/index.js';
import { createLogger } from '../utils/debug.js';

const debug = createLogger('navigator');

export interface NavigationPlan {
  target: Vector2;
  distance: number;
  angleDelta: number;
}

export function actionLabel(action: MotionAction): ActionLabel {
  if (action.kind === 'translate') {
    return 'forward';
  }
  return action.angle > 0 ? 'rotate-left' : 'rotate-right';
}

export function assertValidPose(pose: Pose): void {
  if (!isFiniteVector(pose.position) || !Number.isFinite(pose.heading)) {
    throw new InvalidPoseError(
      `Pose must be finite, got (${pose.position.x}, ${pose.position.y}, ${pose.heading})`,
    );
  }
}

export class NavigationCore {
  private boxIndex = 0;
  private actionCount = 0;
  private status: NavigatorStatus = 'running';

  public readonly config: NavigatorConfig;

  /**
   * Throws `ConfigurationError` when a setting is out of range.
   */
  public constructor(
    public readonly corridor: Corridor,
    config: NavigatorConfigInput = {},
  ) {
    this.config = parseNavigatorConfig(config);
  }

  public getState(): NavigatorState {
    return { boxIndex: this.boxIndex, actionCount: this.actionCount, status: this.status };
  }

  public get phase(): NavigatorPhase {
    if (this.status !== 'running') {
      return 'done';
    }
    return this.boxIndex < this.corridor.lastIndex ? 'aiming-at-doorway' : 'aiming-at-final-target';
  }

  public isTerminal(): boolean {
    return this.status !== 'running';
  }

  public plan(pose: Pose): NavigationPlan {
    const target = this.corridor.targetFor(this.boxIndex);
    const { distance: remaining, angleDelta } = this.corridor.distanceAndHeadingTo(pose, target);
    return { target, distance: remaining, angleDelta };
  }

  /**
   * Turn toward the target while the heading is off by more than the tolerance, otherwise
   * drive forward without passing the target.
   */
  public decide(angleDelta: number, remainingDistance: number): MotionAction {
    const { headingTolerance, rotationLimit, stepDistance } = this.config;
    // A zero tolerance still has to absorb the rounding left after an exact turn.
    if (Math.abs(angleDelta) > Math.max(headingTolerance, GEOMETRY_EPSILON)) {
      return { kind: 'rotate', angle: clamp(angleDelta, -rotationLimit, rotationLimit) };
    }
    return { kind: 'translate', distance: Math.min(stepDistance, remainingDistance) };
  }

  /**
   * Result returned once the navigator has terminated: nothing moves and nothing is counted.
   */
  public noop(pose: Pose): StepResult {
    return {
      pose,
      status: this.status,
      action: null,
      correctAction: null,
      boxIndex: this.boxIndex,
      actionCount: this.actionCount,
      blocked: false,
    };
  }

  public execute(pose: Pose, action: MotionAction, correctAction: MotionAction): StepResult {
    const { pose: nextPose, blocked } = this.apply(pose, action);
    this.actionCount += 1;
    this.status = this.evaluate(nextPose.position);

    if (this.status !== 'running') {
      debug(`navigator finished with ${this.status} after ${this.actionCount} actions`);
    }

    return {
      pose: nextPose,
      status: this.status,
      action,
      correctAction,
      boxIndex: this.boxIndex,
      actionCount: this.actionCount,
      blocked,
    };
  }

  private apply(pose: Pose, action: MotionAction): { pose: Pose; blocked: boolean } {
    if (action.kind === 'rotate') {
      return {
        pose: { position: { ...pose.position }, heading: normaliseAngle(pose.heading + action.angle) },
        blocked: false,
      };
    }

    const position = addVectors(pose.position, scaleVector(headingVector(pose.heading), action.distance));
    if (this.config.boundaryPolicy === 'block' && this.corridor.locate(position, this.boxIndex) === undefined) {
      debug(`blocked move to (${position.x}, ${position.y})`);
      return { pose: { position: { ...pose.position }, heading: pose.heading }, blocked: true };
    }

    return { pose: { position, heading: pose.heading }, blocked: false };
  }

  /**
   * Advances at most one box, then checks bounds, arrival and the action limit in that order.
   */
  private evaluate(position: Vector2): NavigatorStatus {
    const { corridor } = this;
    if (this.boxIndex < corridor.lastIndex && corridor.box(this.boxIndex + 1).contains(position)) {
      this.boxIndex += 1;
      debug(`entered box ${this.boxIndex}`);
    }

    if (corridor.locate(position, this.boxIndex) === undefined) {
      return 'out-of-bounds';
    }

    if (
      this.boxIndex === corridor.lastIndex &&
      distance(position, corridor.finalTarget) < this.config.targetTolerance
    ) {
      return 'reached';
    }

    if (this.actionCount >= this.config.maxActions) {
      return 'action-limit-exceeded';
    }

    return 'running';
  }
}
