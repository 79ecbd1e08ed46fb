import path from 'node:path';
import WebSocket from 'ws';
import { z } from 'zod';

import { formatIssues } from '../config/schema.js';
import { BridgeTimeoutError } from '../errors.js';
import { toDegrees } from '../geometry/vector.js';
import type { CaptureRef, Pose } from '../types/index.js';
import { createLogger } from '../utils/debug.js';
import type { PoseBridge, PoseFrameMeta } from './PoseBridge.js';

const debug = createLogger('bridge');

/**
 * Minimal socket surface the bridge needs. `connectWebSocket` adapts a `ws` client to it.
 */
export interface BridgeSocket {
  send(payload: string): Promise<void>;
  close(): void;
  onOpen(handler: () => void): void;
  onMessage(handler: (data: string) => void): void;
  onClose(handler: () => void): void;
  onError(handler: (error: Error) => void): void;
}

export type BridgeSocketFactory = (url: string) => BridgeSocket;

export const connectWebSocket: BridgeSocketFactory = (url) => {
  const socket = new WebSocket(url);
  return {
    send: (payload) =>
      new Promise<void>((resolve, reject) => {
        socket.send(payload, (error) => {
          if (error) reject(error);
          else resolve();
        });
      }),
    close: () => socket.close(),
    onOpen: (handler) => {
      socket.once('open', handler);
    },
    onMessage: (handler) => {
      socket.on('message', (data: WebSocket.RawData) => handler(data.toString()));
    },
    onClose: (handler) => {
      socket.on('close', () => handler());
    },
    onError: (handler) => {
      socket.on('error', handler);
    },
  };
};

export interface PoseMessage {
  type: 'pose';
  step: number;
  x: number;
  y: number;
  yawDegrees: number;
  capture?: { path: string };
}

const RendererMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ack'), step: z.number().int() }),
  z.object({ type: z.literal('capture'), step: z.number().int(), ref: z.string() }),
  z.object({ type: z.literal('error'), step: z.number().int().optional(), message: z.string() }),
]);
export type RendererMessage = z.infer<typeof RendererMessageSchema>;

export interface WebSocketPoseBridgeOptions {
  url: string;
  ackTimeoutMs?: number;
  /**
   * When set, every labelled pose asks the renderer to save a screenshot in this directory.
   */
  captureDirectory?: string;
  imageExtension?: string;
  trialNumber?: number;
  socketFactory?: BridgeSocketFactory;
}

interface PendingAck {
  resolve: () => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export function captureFileName(trialNumber: number, step: number, label: string, extension: string): string {
  const trial = String(trialNumber).padStart(3, '0');
  const index = String(step).padStart(6, '0');
  return `${trial}_${index}_${label}.${extension.toLowerCase()}`;
}

export class WebSocketPoseBridge implements PoseBridge {
  private socket?: BridgeSocket;
  private connected = false;
  private readonly pendingAcks = new Map<number, PendingAck>();
  private readonly captures: CaptureRef[] = [];
  private readonly ackTimeoutMs: number;
  private readonly socketFactory: BridgeSocketFactory;

  public constructor(private readonly options: WebSocketPoseBridgeOptions) {
    this.ackTimeoutMs = options.ackTimeoutMs ?? 5000;
    this.socketFactory = options.socketFactory ?? connectWebSocket;
  }

  public get isConnected(): boolean {
    return this.connected;
  }

  public async connect(): Promise<void> {
    if (this.socket) {
      return;
    }

    const socket = this.socketFactory(this.options.url);
    this.socket = socket;
    debug(`connecting to renderer at ${this.options.url}`);

    await new Promise<void>((resolve, reject) => {
      socket.onOpen(() => {
        this.connected = true;
        resolve();
      });
      socket.onError((error) => {
        if (!this.connected) {
          this.socket = undefined;
          reject(error);
          return;
        }
        debug('socket error:', error);
        this.failPending(error);
      });
    });

    socket.onMessage((data) => this.handleMessage(data));
    socket.onClose(() => {
      debug('renderer connection closed');
      this.connected = false;
      this.failPending(new Error('Renderer connection closed'));
    });
  }

  public async sendPose(pose: Pose, meta: PoseFrameMeta): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.connected) {
      throw new Error('Pose bridge is not connected');
    }

    const message = this.buildMessage(pose, meta);
    const acknowledged = this.waitForAck(meta.step);
    const sent = socket.send(JSON.stringify(message)).catch((error: unknown) => {
      const failure = error instanceof Error ? error : new Error(String(error));
      this.settle(meta.step, failure);
      throw failure;
    });

    await Promise.all([sent, acknowledged]);
  }

  public tryReceiveCapture(): CaptureRef | undefined {
    return this.captures.shift();
  }

  public async close(): Promise<void> {
    this.failPending(new Error('Pose bridge closed'));
    if (this.socket) {
      this.socket.close();
      this.socket = undefined;
    }
    this.connected = false;
  }

  private buildMessage(pose: Pose, meta: PoseFrameMeta): PoseMessage {
    const message: PoseMessage = {
      type: 'pose',
      step: meta.step,
      x: pose.position.x,
      y: pose.position.y,
      yawDegrees: toDegrees(pose.heading),
    };

    if (this.options.captureDirectory && meta.label) {
      const fileName = captureFileName(
        this.options.trialNumber ?? 1,
        meta.step,
        meta.label,
        this.options.imageExtension ?? 'png',
      );
      message.capture = { path: path.join(this.options.captureDirectory, fileName) };
    }

    return message;
  }

  private waitForAck(step: number): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.settle(step, new Error(`Pose for step ${step} was re-sent`));
      const timer = setTimeout(() => {
        this.pendingAcks.delete(step);
        reject(new BridgeTimeoutError(step, this.ackTimeoutMs));
      }, this.ackTimeoutMs);
      this.pendingAcks.set(step, { resolve, reject, timer });
    });
  }

  /**
   * Resolves (no error) or rejects the pending acknowledgement for `step`, if any.
   */
  private settle(step: number, error?: Error): void {
    const pending = this.pendingAcks.get(step);
    if (!pending) {
      return;
    }
    clearTimeout(pending.timer);
    this.pendingAcks.delete(step);
    if (error) {
      pending.reject(error);
    } else {
      pending.resolve();
    }
  }

  private failPending(error: Error): void {
    Array.from(this.pendingAcks.keys()).forEach((step) => this.settle(step, error));
  }

  private handleMessage(data: string): void {
    let payload: unknown;
    try {
      payload = JSON.parse(data);
    } catch {
      debug('ignoring non-JSON renderer message:', data);
      return;
    }

    const result = RendererMessageSchema.safeParse(payload);
    if (!result.success) {
      debug('ignoring malformed renderer message:', formatIssues(result.error));
      return;
    }

    const message = result.data;
    switch (message.type) {
      case 'ack':
        this.settle(message.step);
        break;
      case 'capture':
        this.captures.push({ step: message.step, ref: message.ref });
        break;
      case 'error':
        if (message.step === undefined) {
          debug('renderer error:', message.message);
        } else {
          this.settle(message.step, new Error(`Renderer rejected step ${message.step}: ${message.message}`));
        }
        break;
    }
  }
}
