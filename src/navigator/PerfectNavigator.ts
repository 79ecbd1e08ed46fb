import type { NavigatorConfigInput } from '../config/schema.js';
import type { Corridor } from '../corridor/Corridor.js';
import type { Navigator, NavigatorPhase, NavigatorState, Pose, StepResult } from '../types/index.js';
import { NavigationCore, assertValidPose } from './NavigationCore.js';

/**
 * Always takes the correct action: turn toward the next doorway (or the final target), then drive.
 * Deterministic for a fixed corridor and configuration.
 */
export class PerfectNavigator implements Navigator {
  public readonly kind = 'perfect' as const;
  private readonly core: NavigationCore;

  public constructor(corridor: Corridor, config: NavigatorConfigInput = {}) {
    this.core = new NavigationCore(corridor, config);
  }

  public get phase(): NavigatorPhase {
    return this.core.phase;
  }

  public getState(): NavigatorState {
    return this.core.getState();
  }

  public step(currentPose: Pose): StepResult {
    if (this.core.isTerminal()) {
      return this.core.noop(currentPose);
    }
    assertValidPose(currentPose);

    const plan = this.core.plan(currentPose);
    const action = this.core.decide(plan.angleDelta, plan.distance);
    return this.core.execute(currentPose, action, action);
  }
}
