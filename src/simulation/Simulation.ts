import type { PoseBridge, PoseFrameMeta } from '../bridge/PoseBridge.js';
import { withRetry, withTimeout } from '../bridge/retry.js';
import { parseMirrorPolicy } from '../config/schema.js';
import type { MirrorPolicyInput } from '../config/schema.js';
import { BridgeTimeoutError } from '../errors.js';
import { actionLabel, assertValidPose } from '../navigator/NavigationCore.js';
import type {
  CaptureRef,
  Navigator,
  Pose,
  SimulationEvent,
  SimulationEventListener,
  SimulationEventType,
  SimulationResult,
  TrajectoryEntry,
} from '../types/index.js';
import { createLogger } from '../utils/debug.js';

const debug = createLogger('simulation');

type ListenerRegistry = {
  [Event in SimulationEventType]: Set<SimulationEventListener<Event>>;
};

/**
 * Drives a navigator from a start pose and records what it does.
 *
 * `run()` is synchronous. `runMirrored()` additionally mirrors every pose into a renderer
 * through a {@link PoseBridge}; that is the only place a run waits on I/O.
 */
export class Simulation {
  private readonly listeners: ListenerRegistry = { step: new Set(), finished: new Set() };
  private readonly trajectory: TrajectoryEntry[] = [];
  private readonly captures: CaptureRef[] = [];
  private pose: Pose;
  private stepCount = 0;
  private stopRequested = false;

  public constructor(
    private readonly navigator: Navigator,
    public readonly startPose: Pose,
  ) {
    assertValidPose(startPose);
    this.pose = startPose;
  }

  public get currentPose(): Pose {
    return this.pose;
  }

  public get isFinished(): boolean {
    return this.navigator.getState().status !== 'running';
  }

  public on<Event extends SimulationEventType>(event: Event, listener: SimulationEventListener<Event>): void {
    this.listeners[event].add(listener);
  }

  public off<Event extends SimulationEventType>(event: Event, listener: SimulationEventListener<Event>): void {
    this.listeners[event].delete(listener);
  }

  /**
   * Advances the navigator once. Returns `undefined` when the navigator has already finished.
   */
  public step(): TrajectoryEntry | undefined {
    const result = this.navigator.step(this.pose);
    if (result.action === null || result.correctAction === null) {
      return undefined;
    }

    this.stepCount += 1;
    this.pose = result.pose;

    const entry: TrajectoryEntry = {
      step: this.stepCount,
      pose: result.pose,
      action: result.action,
      correctAction: result.correctAction,
      boxIndex: result.boxIndex,
      status: result.status,
      blocked: result.blocked,
    };
    this.trajectory.push(entry);
    this.emit('step', { type: 'step', entry });
    return entry;
  }

  /**
   * Asks a running `run()` or `runMirrored()` to return before its next step.
   */
  public stop(): void {
    this.stopRequested = true;
  }

  public run(): SimulationResult {
    this.stopRequested = false;
    while (!this.stopRequested && !this.isFinished) {
      this.step();
    }
    return this.finish();
  }

  /**
   * Runs to completion while mirroring poses into a renderer.
   *
   * Each pose is sent once the navigator has acted on it, labelled with the action a perfect
   * navigator would have taken there; the final pose is sent unlabelled. Every send gets
   * `policy.timeoutMs` and up to `policy.retries` further attempts before the run rejects.
   * Aborting `signal`, even while a send or a backoff is pending, resolves with a cancelled result.
   * Captures reported by the bridge are attached to the trajectory entry with the same step.
   */
  public async runMirrored(
    bridge: PoseBridge,
    policy: MirrorPolicyInput = {},
    signal?: AbortSignal,
  ): Promise<SimulationResult> {
    const { timeoutMs, retries, retryDelayMs } = parseMirrorPolicy(policy);
    this.stopRequested = false;

    const mirror = (pose: Pose, meta: PoseFrameMeta): Promise<void> =>
      withRetry(
        () => withTimeout(bridge.sendPose(pose, meta), timeoutMs, () => new BridgeTimeoutError(meta.step, timeoutMs)),
        { retries, retryDelayMs, signal },
      );

    let previous = { step: this.stepCount, pose: this.pose };
    try {
      while (!this.stopRequested && !signal?.aborted && !this.isFinished) {
        const entry = this.step();
        if (!entry || signal?.aborted) {
          break;
        }
        await mirror(previous.pose, { step: previous.step, label: actionLabel(entry.correctAction) });
        this.drainCaptures(bridge);
        previous = { step: entry.step, pose: entry.pose };
      }

      if (!signal?.aborted) {
        await mirror(previous.pose, { step: previous.step });
      }
    } catch (error) {
      if (!signal?.aborted) {
        throw error;
      }
      debug(`mirroring aborted at step ${previous.step}:`, error);
    }
    this.drainCaptures(bridge);
    return this.finish();
  }

  private drainCaptures(bridge: PoseBridge): void {
    let capture = bridge.tryReceiveCapture();
    while (capture) {
      const { step, ref } = capture;
      this.captures.push({ step, ref });
      const entry = this.trajectory.find((candidate) => candidate.step === step);
      if (entry) {
        entry.captureRef = ref;
      } else {
        debug(`capture for step ${step} has no trajectory entry`);
      }
      capture = bridge.tryReceiveCapture();
    }
  }

  private finish(): SimulationResult {
    const { status, actionCount } = this.navigator.getState();
    const result: SimulationResult = {
      status,
      actionCount,
      startPose: this.startPose,
      trajectory: [...this.trajectory],
      captures: [...this.captures],
      cancelled: status === 'running',
    };
    debug(`run ended: ${status} after ${actionCount} actions${result.cancelled ? ' (cancelled)' : ''}`);
    this.emit('finished', { type: 'finished', result });
    return result;
  }

  private emit<Event extends SimulationEventType>(event: Event, payload: Extract<SimulationEvent, { type: Event }>): void {
    this.listeners[event].forEach((listener) => {
      listener(payload);
    });
  }
}
