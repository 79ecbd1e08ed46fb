import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../errors.js';
import { toRadians } from '../../geometry/vector.js';
import { buildCorridor, loadLayoutFile, startPoseFromLayout } from '../layout.js';

const fountainRoute = fileURLToPath(new URL('../../../layouts/fountain-route.json', import.meta.url));

const twoRoomsYaml = `
name: two-rooms
boxes:
  - aligned: { left: 0, right: 1, lower: 0, upper: 1 }
    target: [0.5, 0.5]
  - corners: [[0.5, 0], [0.5, 1], [1.5, 1], [1.5, 0]]
    target: [1.5, 0]
start:
  position: [0, 0]
`;

describe('layout files', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'boxsim-layout-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('loads the bundled fountain route', async () => {
    const layout = await loadLayoutFile(fountainRoute);
    const corridor = buildCorridor(layout);

    expect(layout.name).toBe('fountain-route');
    expect(corridor.length).toBe(3);
    expect(corridor.finalTarget).toEqual({ x: -820, y: 200 });

    const firstDoorway = corridor.doorway(0).centroid;
    expect(firstDoorway.x).toBeCloseTo(117.5);
    expect(firstDoorway.y).toBeCloseTo(612.5);

    const secondDoorway = corridor.doorway(1).centroid;
    expect(secondDoorway.x).toBeCloseTo(-830);
    expect(secondDoorway.y).toBeCloseTo(612.5);

    expect(startPoseFromLayout(layout)).toEqual({ position: { x: 0, y: 0 }, heading: toRadians(90) });
  });

  it('loads YAML layouts with aligned and four-corner boxes', async () => {
    const file = path.join(workDir, 'two-rooms.yaml');
    await fs.writeFile(file, twoRoomsYaml, 'utf8');

    const layout = await loadLayoutFile(file);
    const corridor = buildCorridor(layout);

    expect(layout.name).toBe('two-rooms');
    expect(corridor.length).toBe(2);
    expect(corridor.box(1).d).toEqual({ x: 1.5, y: 0 });
    expect(startPoseFromLayout(layout)).toEqual({ position: { x: 0, y: 0 }, heading: 0 });
  });

  it('rejects a fourth corner that does not close the rectangle', async () => {
    const file = path.join(workDir, 'skewed.yaml');
    await fs.writeFile(file, twoRoomsYaml.replace('[1.5, 1], [1.5, 0]]', '[1.5, 1], [1.4, 0]]'), 'utf8');

    const layout = await loadLayoutFile(file);

    expect(() => buildCorridor(layout)).toThrow(
      new ConfigurationError('Invalid corridor layout', ['boxes.1.corners.3: fourth corner must be (1.5, 0)']),
    );
  });

  it('wraps parse failures in a ConfigurationError', async () => {
    const file = path.join(workDir, 'broken.json');
    await fs.writeFile(file, '{ "boxes": [', 'utf8');

    await expect(loadLayoutFile(file)).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadLayoutFile(file)).rejects.toThrow(/^Could not parse layout file/);
  });

  it('rejects layouts without boxes', async () => {
    const file = path.join(workDir, 'empty.json');
    await fs.writeFile(file, JSON.stringify({ boxes: [] }), 'utf8');

    await expect(loadLayoutFile(file)).rejects.toThrow(ConfigurationError);
  });
});
