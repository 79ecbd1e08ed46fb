import type { NavigatorConfigInput } from '../config/schema.js';
import type { Corridor } from '../corridor/Corridor.js';
import type { MotionAction, Navigator, NavigatorPhase, NavigatorState, Pose, StepResult } from '../types/index.js';
import { NavigationCore, assertValidPose } from './NavigationCore.js';
import type { NavigationPlan } from './NavigationCore.js';
import { createRandomSource } from './random.js';
import type { RandomSource } from './random.js';

export interface WanderingNavigatorOptions {
  /**
   * Overrides the generator seeded from `config.seed`.
   */
  random?: RandomSource;
}

/**
 * Random walk biased toward the correct doorway.
 *
 * Each step either takes a uniformly random action (probability `randomActionChance`) or
 * follows the perfect rule with the heading error perturbed by up to `maxDeviation`.
 * With both set to zero it is indistinguishable from {@link PerfectNavigator}.
 */
export class WanderingNavigator implements Navigator {
  public readonly kind = 'wandering' as const;
  private readonly core: NavigationCore;
  private readonly random: RandomSource;

  public constructor(corridor: Corridor, config: NavigatorConfigInput = {}, options: WanderingNavigatorOptions = {}) {
    this.core = new NavigationCore(corridor, config);
    this.random = options.random ?? createRandomSource(this.core.config.seed);
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
    const correctAction = this.core.decide(plan.angleDelta, plan.distance);
    return this.core.execute(currentPose, this.chooseAction(plan), correctAction);
  }

  private chooseAction(plan: NavigationPlan): MotionAction {
    const { randomActionChance, maxDeviation, stepDistance, rotationLimit } = this.core.config;

    if (this.random() < randomActionChance) {
      const choices: MotionAction[] = [
        { kind: 'translate', distance: stepDistance },
        { kind: 'rotate', angle: rotationLimit },
        { kind: 'rotate', angle: -rotationLimit },
      ];
      return choices[Math.min(choices.length - 1, Math.floor(this.random() * choices.length))];
    }

    const noise = (this.random() * 2 - 1) * maxDeviation;
    return this.core.decide(plan.angleDelta + noise, plan.distance);
  }
}
