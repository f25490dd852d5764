import { once } from 'events';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import WebSocket from 'ws';
import { createWsHub, type WsHub } from '../hub.js';
import { FrameRelay } from '../../relay/frame_relay.js';
import { ResultCache } from '../../cache/result_cache.js';
import { MockInferenceClient } from '../../inference/mock.inference.js';
import { silentLogger } from '../../logger.js';
import type { InferenceResult, RelaySettings } from '../../relay/relay.types.js';

type Received = { type: string; [key: string]: unknown };

/** Buffers server messages so a test can wait for the next one of a given type. */
class Inbox {
  private readonly queue: Received[] = [];
  private readonly waiting: { type: string; resolve: (message: Received) => void }[] = [];

  constructor(ws: WebSocket) {
    ws.on('message', (data) => this.deliver(JSON.parse(data.toString())));
  }

  next(type: string): Promise<Received> {
    const index = this.queue.findIndex((message) => message.type === type);
    const [queued] = index >= 0 ? this.queue.splice(index, 1) : [];
    if (queued) return Promise.resolve(queued);
    return new Promise((resolve) => this.waiting.push({ type, resolve }));
  }

  count(type: string): number {
    return this.queue.filter((message) => message.type === type).length;
  }

  private deliver(message: Received) {
    const index = this.waiting.findIndex((waiter) => waiter.type === message.type);
    const [waiter] = index >= 0 ? this.waiting.splice(index, 1) : [];
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.queue.push(message);
    }
  }
}

const SETTINGS: RelaySettings = {
  process_every_n_frames: 30,
  prompt: 'Describe the scene.',
  model: 'model-a',
  max_tokens: 64
};

const result = (seq: number, latency: number): InferenceResult => ({
  status: 'ok',
  text: `caption ${seq}`,
  usage: { prompt_tokens: null, completion_tokens: 2, total_tokens: null },
  request_id: seq,
  frame_seq: seq,
  model: 'model-a',
  prompt: 'Describe the scene.',
  issued_at: 0,
  completed_at: latency,
  latency_ms: latency
});

describe('createWsHub', () => {
  let fastify: FastifyInstance;
  let hub: WsHub;
  let cache: ResultCache;
  let relay: FrameRelay;
  let url: string;
  const clients: WebSocket[] = [];

  beforeEach(async () => {
    cache = new ResultCache();
    relay = new FrameRelay({
      client: new MockInferenceClient(5),
      cache,
      settings: SETTINGS,
      timeoutMs: 1000,
      logger: silentLogger
    });
    fastify = Fastify();
    await fastify.listen({ port: 0, host: '127.0.0.1' });
    hub = createWsHub({
      server: fastify.server,
      path: '/ws',
      relay,
      cache,
      pushIntervalMs: 60_000,
      logger: silentLogger
    });
    const address = fastify.server.address();
    if (!address || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    url = `ws://127.0.0.1:${address.port}/ws`;
  });

  afterEach(async () => {
    for (const ws of clients.splice(0)) ws.close();
    await hub.close();
    await fastify.close();
  });

  async function connect() {
    const ws = new WebSocket(url);
    const inbox = new Inbox(ws);
    clients.push(ws);
    await once(ws, 'open');
    return { ws, inbox };
  }

  it('greets a new client with the current settings', async () => {
    const { inbox } = await connect();

    await expect(inbox.next('status')).resolves.toEqual({
      type: 'status',
      text: 'Connected to server',
      status: 'Ready',
      settings: SETTINGS
    });
    expect(hub.clientCount()).toBe(1);
  });

  it('sends a frame back with its overlay', async () => {
    const { ws, inbox } = await connect();

    ws.send(JSON.stringify({ type: 'frame', image_base64: 'aW1n', t_ms: 123 }));

    await expect(inbox.next('frame')).resolves.toEqual({
      type: 'frame',
      seq: 1,
      ts_ms: 123,
      image_base64: 'aW1n',
      mime: 'image/jpeg',
      overlay: {
        text: 'Waiting for first result...',
        status: 'Ready',
        lines: ['Waiting for first result...']
      }
    });
  });

  it('drops forwarded frames for a client whose send buffer is over the high-water mark', async () => {
    await hub.close();
    hub = createWsHub({
      server: fastify.server,
      path: '/ws',
      relay,
      cache,
      pushIntervalMs: 60_000,
      forwardHighWaterBytes: -1,
      logger: silentLogger
    });
    const { ws, inbox } = await connect();
    await inbox.next('status');

    ws.send(JSON.stringify({ type: 'frame', image_base64: 'aW1n' }));
    ws.send(JSON.stringify({ type: 'update_model', model: 'model-b' }));
    await inbox.next('config_ack');

    expect(inbox.count('frame')).toBe(0);
    expect(relay.stats()).toMatchObject({ frames_received: 1, frames_forwarded: 1 });
  });

  it('acknowledges a settings update', async () => {
    const { ws, inbox } = await connect();

    ws.send(JSON.stringify({ type: 'update_processing', process_every_n_frames: 5 }));

    await expect(inbox.next('config_ack')).resolves.toEqual({
      type: 'config_ack',
      settings: { ...SETTINGS, process_every_n_frames: 5 },
      changed: ['process_every_n_frames']
    });
    expect(relay.settings().process_every_n_frames).toBe(5);
  });

  it('rejects an invalid settings update and keeps the settings', async () => {
    const { ws, inbox } = await connect();

    ws.send(JSON.stringify({ type: 'update_processing', process_every_n_frames: 0 }));

    const error = await inbox.next('error');
    expect(error.code).toBe('invalid_config');
    expect(error.issues).toEqual(['process_every_n_frames: Number must be greater than 0']);
    expect(relay.settings()).toEqual(SETTINGS);
  });

  it('answers malformed JSON', async () => {
    const { ws, inbox } = await connect();

    ws.send('not json');

    await expect(inbox.next('error')).resolves.toEqual({
      type: 'error',
      code: 'invalid_json',
      message: 'Invalid JSON.'
    });
  });

  it('refuses frame data that is not base64', async () => {
    const { ws, inbox } = await connect();

    ws.send(JSON.stringify({ type: 'frame', image_base64: 'not base64!' }));

    const error = await inbox.next('error');
    expect(error.code).toBe('invalid_message');
    expect(relay.stats().frames_received).toBe(0);
  });

  it('pushes an inference result only when a new one exists', async () => {
    const { inbox } = await connect();
    await inbox.next('status');

    cache.updateInference(result(1, 100));
    hub.push();
    hub.push();
    cache.updateInference(result(2, 200));
    hub.push();

    const first = await inbox.next('inference');
    const second = await inbox.next('inference');
    expect(first.frame_seq).toBe(1);
    expect(second.frame_seq).toBe(2);
    expect(second.total_count).toBe(2);
    expect(second.mean_latency_ms).toBe(150);
  });
});
