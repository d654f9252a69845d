import { WebSocket, type WebSocketServer } from 'ws';
import { z } from 'zod';
import type {
  BroadcastEvent,
  BroadcastSink,
  ControlHandler,
} from '../types/control.js';
import { logError, logInfo, logWarn } from '../utils/logger/index.js';

const COMPONENT = 'Broadcaster';

const ControlFrameSchema = z.object({
  event: z.literal('control_action'),
  data: z.object({ action: z.string() }),
});

export interface BroadcastFrame {
  event: BroadcastEvent;
  data: unknown;
}

/**
 * Live viewers over WebSocket. Frames go out as `{ event, data }` JSON;
 * viewers send `control_action` frames back.
 */
export class WebSocketBroadcaster implements BroadcastSink {
  private controlHandler?: ControlHandler;

  constructor(private readonly wss: WebSocketServer) {
    this.wss.on('connection', (ws) => {
      logInfo(COMPONENT, 'Viewer connected', { viewers: this.wss.clients.size });

      ws.on('message', (data) => {
        this.handleFrame(data.toString());
      });

      ws.on('close', () => {
        logInfo(COMPONENT, 'Viewer disconnected');
      });

      ws.on('error', (error) => {
        logError(COMPONENT, 'Viewer socket error', error);
      });
    });
  }

  public attach(handler: ControlHandler): void {
    this.controlHandler = handler;
  }

  public emit(event: BroadcastEvent, payload: unknown): void {
    const frame: BroadcastFrame = { event, data: payload };
    const message = JSON.stringify(frame);
    for (const client of this.wss.clients) {
      if (client.readyState !== WebSocket.OPEN) continue;
      try {
        client.send(message);
      } catch (error) {
        logError(COMPONENT, `Failed to send ${event} to viewer`, error);
      }
    }
  }

  public handleFrame(raw: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      logWarn(COMPONENT, 'Ignoring non-JSON frame from viewer');
      return;
    }

    const frame = ControlFrameSchema.safeParse(parsed);
    if (!frame.success) {
      logWarn(COMPONENT, 'Ignoring unexpected frame from viewer', {
        issues: frame.error.issues,
      });
      return;
    }

    if (!this.controlHandler) {
      logWarn(COMPONENT, 'No control handler attached, dropping action');
      return;
    }
    this.controlHandler.handleControl(frame.data.data.action);
  }
}
