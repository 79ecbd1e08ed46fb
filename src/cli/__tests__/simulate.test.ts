import { describe, expect, it } from 'vitest';

import type { PoseFrameMeta } from '../../bridge/PoseBridge.js';
import type { WebSocketPoseBridgeOptions } from '../../bridge/WebSocketPoseBridge.js';
import { ConfigurationError } from '../../errors.js';
import type { CaptureRef, Pose } from '../../types/index.js';
import { DEFAULT_LAYOUT_PATH, parseSimulateOptions, runSimulateCommand } from '../commands/simulate.js';
import type { ConnectablePoseBridge } from '../commands/simulate.js';

class RecordingBridge implements ConnectablePoseBridge {
  public readonly frames: PoseFrameMeta[] = [];
  public connected = false;
  public closed = false;

  async connect(): Promise<void> {
    this.connected = true;
  }

  async sendPose(_pose: Pose, meta: PoseFrameMeta): Promise<void> {
    this.frames.push(meta);
  }

  tryReceiveCapture(): CaptureRef | undefined {
    return undefined;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe('parseSimulateOptions', () => {
  it('coerces command line strings and applies defaults', () => {
    const options = parseSimulateOptions('wandering', { maxActions: '25', maxDeviation: '12.5', seed: '42' });

    expect(options).toMatchObject({
      navigator: 'wandering',
      layout: DEFAULT_LAYOUT_PATH,
      maxActions: 25,
      maxDeviation: 12.5,
      seed: '42',
      boundary: 'terminate',
      imageExt: 'png',
      trial: 1,
      bridgeTimeout: 5000,
      bridgeRetries: 2,
      json: false,
    });
  });

  it('rejects unknown navigators', () => {
    expect(() => parseSimulateOptions('lazy', {})).toThrow(ConfigurationError);
  });

  it('requires a bridge when saving images', () => {
    expect(() => parseSimulateOptions('perfect', { saveImages: 'shots' })).toThrow(
      new ConfigurationError('Invalid simulate options', ['saveImages: --save-images requires --bridge']),
    );
  });

  it('rejects non-numeric values', () => {
    expect(() => parseSimulateOptions('perfect', { maxActions: 'many' })).toThrow(/^Invalid simulate options: maxActions: /);
  });
});

describe('runSimulateCommand', () => {
  it('reaches the end of the bundled route and reports JSON', async () => {
    const options = parseSimulateOptions('perfect', { maxActions: '500', json: true });

    const { result, output, exitCode } = await runSimulateCommand(options);
    const report: unknown = JSON.parse(output);

    expect(result.status).toBe('reached');
    expect(exitCode).toBe(0);
    expect(report).toMatchObject({ navigator: 'perfect', status: 'reached', actionCount: result.actionCount });
  });

  it('prints a plain summary and fails when the action budget runs out', async () => {
    const options = parseSimulateOptions('perfect', { maxActions: '5' });

    const { output, exitCode } = await runSimulateCommand(options, { color: false });
    const lines = output.split('\n');

    expect(exitCode).toBe(1);
    expect(lines[0]).toBe('boxsim: perfect navigator on fountain-route');
    expect(lines[1]).toBe('Status: action-limit-exceeded');
    expect(lines[2]).toBe('Actions: 5');
    expect(lines[3]).toMatch(/^Final pose: \(/);
  });

  it('mirrors the run through the bridge and closes it', async () => {
    const bridge = new RecordingBridge();
    const received: WebSocketPoseBridgeOptions[] = [];
    const options = parseSimulateOptions('perfect', {
      maxActions: '5',
      bridge: 'ws://localhost:9000',
      saveImages: 'shots',
      trial: '4',
    });

    const { result } = await runSimulateCommand(options, {
      color: false,
      createBridge: (bridgeOptions) => {
        received.push(bridgeOptions);
        return bridge;
      },
    });

    expect(received).toEqual([
      {
        url: 'ws://localhost:9000',
        ackTimeoutMs: 5000,
        captureDirectory: 'shots',
        imageExtension: 'png',
        trialNumber: 4,
      },
    ]);
    expect(bridge.connected).toBe(true);
    expect(bridge.closed).toBe(true);
    expect(bridge.frames.map((frame) => frame.step)).toEqual([0, 1, 2, 3, 4, 5]);
    expect(result.trajectory).toHaveLength(5);
  });
});
