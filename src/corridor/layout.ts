import fs from 'node:fs/promises';
import path from 'node:path';
import * as yaml from 'js-yaml';

import { parseLayout } from '../config/schema.js';
import type { BoxSpec, Layout } from '../config/schema.js';
import { ConfigurationError } from '../errors.js';
import { Box } from '../geometry/Box.js';
import { addVectors, pointsApproxEqual, subtractVectors, toRadians } from '../geometry/vector.js';
import type { Pose } from '../types/index.js';
import { createLogger } from '../utils/debug.js';
import { Corridor } from './Corridor.js';

const debug = createLogger('layout');

export const DEFAULT_START_POSE: Pose = { position: { x: 0, y: 0 }, heading: 0 };

export function buildBox(spec: BoxSpec, index: number): Box {
  const rotation = toRadians(spec.rotation);

  if ('aligned' in spec) {
    return Box.aligned(spec.aligned, spec.target, rotation, { index });
  }

  const [a, b, c, d] = spec.corners;
  if (d) {
    const expected = addVectors(a, subtractVectors(c, b));
    if (!pointsApproxEqual(d, expected)) {
      throw new ConfigurationError('Invalid corridor layout', [
        `boxes.${index}.corners.3: fourth corner must be (${expected.x}, ${expected.y})`,
      ]);
    }
  }

  return Box.rotated({ a, b, c }, spec.target, rotation, { index });
}

export function buildCorridor(layout: Layout): Corridor {
  return new Corridor(layout.boxes.map((spec, index) => buildBox(spec, index)));
}

export function startPoseFromLayout(layout: Layout): Pose {
  if (!layout.start) {
    return DEFAULT_START_POSE;
  }
  return {
    position: layout.start.position,
    heading: toRadians(layout.start.headingDegrees),
  };
}

/**
 * Reads a corridor layout from a JSON or YAML file (chosen by extension).
 */
export async function loadLayoutFile(filePath: string): Promise<Layout> {
  const resolved = path.resolve(filePath);
  const raw = await fs.readFile(resolved, 'utf8');
  const extension = path.extname(resolved).toLowerCase();

  let data: unknown;
  try {
    data = extension === '.yaml' || extension === '.yml' ? yaml.load(raw) : JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not parse layout file ${resolved}`, [reason]);
  }

  const layout = parseLayout(data);
  debug(`loaded ${layout.boxes.length} boxes from ${resolved}`);
  return layout;
}
