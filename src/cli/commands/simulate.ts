import { fileURLToPath } from 'node:url';
import chalk, { Chalk } from 'chalk';
import type { ChalkInstance } from 'chalk';
import { Command } from 'commander';
import { z } from 'zod';

import type { PoseBridge } from '../../bridge/PoseBridge.js';
import { WebSocketPoseBridge } from '../../bridge/WebSocketPoseBridge.js';
import type { WebSocketPoseBridgeOptions } from '../../bridge/WebSocketPoseBridge.js';
import { BoundaryPolicySchema, NavigatorKindSchema, formatIssues } from '../../config/schema.js';
import { buildCorridor, loadLayoutFile, startPoseFromLayout } from '../../corridor/layout.js';
import { ConfigurationError } from '../../errors.js';
import { toDegrees, toRadians } from '../../geometry/vector.js';
import { createNavigator } from '../../navigator/index.js';
import { Simulation } from '../../simulation/Simulation.js';
import type { SimulationResult } from '../../types/index.js';

export const DEFAULT_LAYOUT_PATH = fileURLToPath(new URL('../../../layouts/fountain-route.json', import.meta.url));

// commander hands every value over as a string; angles on the command line are degrees
const SimulateOptionsSchema = z
  .object({
    navigator: NavigatorKindSchema,
    layout: z.string().default(DEFAULT_LAYOUT_PATH),
    maxActions: z.coerce.number().int().positive().default(50),
    seed: z.string().optional(),
    stepDistance: z.coerce.number().positive().optional(),
    rotationLimit: z.coerce.number().positive().max(180).optional(),
    headingTolerance: z.coerce.number().nonnegative().max(180).optional(),
    targetTolerance: z.coerce.number().positive().optional(),
    maxDeviation: z.coerce.number().nonnegative().max(180).optional(),
    randomActionChance: z.coerce.number().min(0).max(1).optional(),
    boundary: BoundaryPolicySchema.default('terminate'),
    bridge: z.string().url().optional(),
    saveImages: z.string().optional(),
    imageExt: z.string().regex(/^[A-Za-z0-9]+$/, 'must be a bare extension such as png').default('png'),
    trial: z.coerce.number().int().nonnegative().default(1),
    bridgeTimeout: z.coerce.number().int().positive().default(5000),
    bridgeRetries: z.coerce.number().int().nonnegative().default(2),
    json: z.boolean().default(false),
  })
  .refine((options) => options.saveImages === undefined || options.bridge !== undefined, {
    message: '--save-images requires --bridge',
    path: ['saveImages'],
  });

export type SimulateOptions = z.infer<typeof SimulateOptionsSchema>;

export function parseSimulateOptions(navigator: string, raw: Record<string, unknown>): SimulateOptions {
  const result = SimulateOptionsSchema.safeParse({ ...raw, navigator });
  if (!result.success) {
    throw new ConfigurationError('Invalid simulate options', formatIssues(result.error));
  }
  return result.data;
}

export interface ConnectablePoseBridge extends PoseBridge {
  connect(): Promise<void>;
}

export interface SimulateDependencies {
  createBridge?: (options: WebSocketPoseBridgeOptions) => ConnectablePoseBridge;
  signal?: AbortSignal;
  color?: boolean;
}

export interface SimulateOutcome {
  result: SimulationResult;
  output: string;
  exitCode: number;
}

export async function runSimulateCommand(
  options: SimulateOptions,
  dependencies: SimulateDependencies = {},
): Promise<SimulateOutcome> {
  const layout = await loadLayoutFile(options.layout);
  const corridor = buildCorridor(layout);
  const navigator = createNavigator(corridor, {
    kind: options.navigator,
    maxActions: options.maxActions,
    seed: options.seed,
    stepDistance: options.stepDistance,
    rotationLimit: options.rotationLimit === undefined ? undefined : toRadians(options.rotationLimit),
    headingTolerance: options.headingTolerance === undefined ? undefined : toRadians(options.headingTolerance),
    targetTolerance: options.targetTolerance,
    maxDeviation: options.maxDeviation === undefined ? undefined : toRadians(options.maxDeviation),
    randomActionChance: options.randomActionChance,
    boundaryPolicy: options.boundary,
  });
  const simulation = new Simulation(navigator, startPoseFromLayout(layout));

  let result: SimulationResult;
  if (options.bridge === undefined) {
    result = simulation.run();
  } else {
    const createBridge = dependencies.createBridge ?? ((bridgeOptions) => new WebSocketPoseBridge(bridgeOptions));
    const bridge = createBridge({
      url: options.bridge,
      ackTimeoutMs: options.bridgeTimeout,
      captureDirectory: options.saveImages,
      imageExtension: options.imageExt,
      trialNumber: options.trial,
    });
    await bridge.connect();
    try {
      result = await simulation.runMirrored(
        bridge,
        { timeoutMs: options.bridgeTimeout, retries: options.bridgeRetries },
        dependencies.signal,
      );
    } finally {
      await bridge.close();
    }
  }

  const paint = new Chalk({ level: dependencies.color === false ? 0 : chalk.level });
  const output = options.json
    ? JSON.stringify(toJsonReport(result, options), null, 2)
    : formatSummary(result, options, layout.name, paint);

  return { result, output, exitCode: result.status === 'reached' ? 0 : 1 };
}

function toJsonReport(result: SimulationResult, options: SimulateOptions) {
  return {
    navigator: options.navigator,
    status: result.status,
    actionCount: result.actionCount,
    cancelled: result.cancelled,
    startPose: result.startPose,
    trajectory: result.trajectory,
    captures: result.captures,
  };
}

export function formatSummary(
  result: SimulationResult,
  options: SimulateOptions,
  layoutName: string | undefined,
  paint: ChalkInstance,
): string {
  const last = result.trajectory[result.trajectory.length - 1];
  const finalPose = last ? last.pose : result.startPose;
  const status = result.status === 'reached' ? paint.green(result.status) : paint.red(result.status);

  const lines = [
    paint.bold(`boxsim: ${options.navigator} navigator on ${layoutName ?? options.layout}`),
    `Status: ${status}${result.cancelled ? paint.yellow(' (cancelled)') : ''}`,
    `Actions: ${result.actionCount}`,
    `Final pose: (${finalPose.position.x.toFixed(1)}, ${finalPose.position.y.toFixed(1)}) heading ${toDegrees(finalPose.heading).toFixed(1)}°`,
  ];

  const blocked = result.trajectory.filter((entry) => entry.blocked).length;
  if (blocked > 0) {
    lines.push(`Blocked moves: ${blocked}`);
  }
  if (result.captures.length > 0) {
    lines.push(`Captures: ${result.captures.length}`);
  }

  return lines.join('\n');
}

const simulate = new Command('simulate')
  .description('Run a navigator through a box corridor')
  .argument('<navigator>', 'Navigator to run (perfect|wandering)')
  .option('-l, --layout <path>', 'Corridor layout file (JSON or YAML)')
  .option('-n, --max-actions <n>', 'Maximum number of actions before giving up', '50')
  .option('--seed <seed>', 'Seed for the wandering navigator')
  .option('--step-distance <d>', 'Distance covered by one forward action')
  .option('--rotation-limit <deg>', 'Largest rotation per action, in degrees')
  .option('--heading-tolerance <deg>', 'Heading error under which the navigator drives forward, in degrees')
  .option('--target-tolerance <d>', 'Distance at which the final target counts as reached')
  .option('--max-deviation <deg>', 'Heading noise of the wandering navigator, in degrees')
  .option('--random-action-chance <p>', 'Probability of a random action for the wandering navigator')
  .option('--boundary <policy>', 'What happens on leaving the corridor (terminate|block)', 'terminate')
  .option('--bridge <url>', 'Mirror poses to a renderer listening on this WebSocket URL')
  .option('--save-images <dir>', 'Ask the renderer to save a screenshot per action in this directory')
  .option('--image-ext <ext>', 'Screenshot file extension', 'png')
  .option('--trial <n>', 'Trial number used in screenshot file names', '1')
  .option('--bridge-timeout <ms>', 'Time to wait for the renderer to acknowledge a pose', '5000')
  .option('--bridge-retries <n>', 'Extra attempts per pose after a failure or timeout', '2')
  .option('--json', 'Print the full result as JSON')
  .action(async (navigator: string, rawOptions: Record<string, unknown>) => {
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once('SIGINT', onInterrupt);

    try {
      const options = parseSimulateOptions(navigator, rawOptions);
      const { output, exitCode } = await runSimulateCommand(options, { signal: controller.signal });
      console.log(output);
      process.exitCode = exitCode;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(`simulate failed: ${message}`));
      process.exitCode = 2;
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  });

export default simulate;
