import { parseNavigatorConfig } from '../config/schema.js';
import type { NavigatorConfigInput } from '../config/schema.js';
import type { Corridor } from '../corridor/Corridor.js';
import type { Navigator } from '../types/index.js';
import { PerfectNavigator } from './PerfectNavigator.js';
import { WanderingNavigator } from './WanderingNavigator.js';
import type { WanderingNavigatorOptions } from './WanderingNavigator.js';

export { NavigationCore, actionLabel, assertValidPose } from './NavigationCore.js';
export type { NavigationPlan } from './NavigationCore.js';
export { PerfectNavigator } from './PerfectNavigator.js';
export { WanderingNavigator } from './WanderingNavigator.js';
export type { WanderingNavigatorOptions } from './WanderingNavigator.js';
export { createRandomSource } from './random.js';
export type { RandomSource } from './random.js';

/**
 * Validates the configuration and builds the navigator named by `config.kind`.
 * Throws `ConfigurationError` before any step runs when a setting is out of range.
 */
export function createNavigator(
  corridor: Corridor,
  config: NavigatorConfigInput = {},
  options: WanderingNavigatorOptions = {},
): Navigator {
  const parsed = parseNavigatorConfig(config);
  switch (parsed.kind) {
    case 'perfect':
      return new PerfectNavigator(corridor, parsed);
    case 'wandering':
      return new WanderingNavigator(corridor, parsed, options);
  }
}
