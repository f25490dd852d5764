import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'http';
import { ClientMessageSchema, ControlTypes, type ServerMessage } from './schemas.js';
import { toFrameMessage, toInferenceEvent, toTelemetryEvent } from './notifications.js';
import type { FrameRelay } from '../relay/frame_relay.js';
import type { ForwardedFrame } from '../relay/relay.types.js';
import type { ResultCache } from '../cache/result_cache.js';
import type { Logger } from '../logger.js';

export const FORWARD_HIGH_WATER_BYTES = 8 * 1024 * 1024;

export type WsHub = {
  broadcast: (message: ServerMessage) => void;
  /** Pushes the latest telemetry, and the latest inference result if it is new. */
  push: () => void;
  clientCount: () => number;
  close: () => Promise<void>;
};

export function createWsHub(params: {
  server: HttpServer;
  path: string;
  relay: FrameRelay;
  cache: ResultCache;
  pushIntervalMs: number;
  forwardHighWaterBytes?: number;
  logger: Logger;
}): WsHub {
  const log = params.logger.child({ component: 'ws' });
  const highWaterBytes = params.forwardHighWaterBytes ?? FORWARD_HIGH_WATER_BYTES;
  const wss = new WebSocketServer({ server: params.server, path: params.path });
  let inferenceVersion = 0;

  const send = (ws: WebSocket, message: ServerMessage) => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  };

  const broadcast = (message: ServerMessage) => {
    for (const client of wss.clients) {
      send(client, message);
    }
  };

  const push = () => {
    const snapshot = params.cache.snapshot();
    if (snapshot.versions.inference !== inferenceVersion) {
      inferenceVersion = snapshot.versions.inference;
      const event = toInferenceEvent(snapshot, params.relay.isBusy());
      if (event) broadcast(event);
    }
    const telemetry = toTelemetryEvent(snapshot);
    if (telemetry) broadcast(telemetry);
  };

  const pushTimer = setInterval(push, params.pushIntervalMs);

  wss.on('connection', (ws) => {
    log.info({ clients: wss.clients.size }, 'client connected');
    let droppedFrames = 0;

    // Settles once the frame is written out, so a slow reader holds the relay back.
    // Past the high-water mark the frame is dropped for this client instead.
    const forward = (frame: ForwardedFrame): Promise<void> => {
      if (ws.readyState !== WebSocket.OPEN) return Promise.resolve();
      if (ws.bufferedAmount > highWaterBytes) {
        droppedFrames += 1;
        if (droppedFrames === 1 || droppedFrames % 100 === 0) {
          log.warn({ seq: frame.seq, dropped: droppedFrames, buffered: ws.bufferedAmount }, 'client not reading, frame not forwarded');
        }
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => {
        ws.send(JSON.stringify(toFrameMessage(frame)), (error) => {
          if (error) {
            log.debug({ err: error, seq: frame.seq }, 'frame write failed');
          }
          resolve();
        });
      });
    };
    send(ws, {
      type: 'status',
      text: 'Connected to server',
      status: params.relay.isBusy() ? 'Processing...' : 'Ready',
      settings: params.relay.settings()
    });

    ws.on('message', async (data) => {
      let parsedMessage: unknown;
      try {
        parsedMessage = JSON.parse(data.toString());
      } catch {
        send(ws, { type: 'error', code: 'invalid_json', message: 'Invalid JSON.' });
        return;
      }

      const result = ClientMessageSchema.safeParse(parsedMessage);
      if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'message'}: ${issue.message}`);
        send(ws, {
          type: 'error',
          code: isControlMessage(parsedMessage) ? 'invalid_config' : 'invalid_message',
          message: 'Message failed validation.',
          issues
        });
        return;
      }

      const message = result.data;

      switch (message.type) {
        case 'frame': {
          try {
            await params.relay.submit(
              { data: Buffer.from(message.image_base64, 'base64'), mime: message.mime, ts_ms: message.t_ms },
              forward
            );
          } catch (error) {
            log.error({ err: error }, 'frame relay failed');
            send(ws, { type: 'error', code: 'frame_failed', message: 'Frame could not be relayed.' });
          }
          break;
        }
        case 'update_prompt':
        case 'update_model':
        case 'update_processing': {
          const { type: _type, ...update } = message;
          const outcome = params.relay.configure(update);
          if (outcome.ok) {
            send(ws, { type: 'config_ack', settings: outcome.settings, changed: outcome.changed });
          } else {
            send(ws, {
              type: 'error',
              code: 'invalid_config',
              message: 'Settings update rejected.',
              issues: outcome.issues
            });
          }
          break;
        }
      }
    });

    ws.on('close', () => {
      log.info({ clients: wss.clients.size }, 'client disconnected');
    });
  });

  wss.on('listening', () => {
    log.info({ path: params.path }, 'WebSocket server listening');
  });

  return {
    broadcast,
    push,
    clientCount: () => wss.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        clearInterval(pushTimer);
        for (const client of wss.clients) {
          client.close(1001, 'server shutting down');
        }
        wss.close((error) => (error ? reject(error) : resolve()));
      })
  };
}

function isControlMessage(value: unknown): boolean {
  if (typeof value !== 'object' || value === null || !('type' in value)) return false;
  return ControlTypes.some((type) => type === value.type);
}
