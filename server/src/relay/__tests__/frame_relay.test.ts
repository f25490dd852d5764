import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FrameRelay } from '../frame_relay.js';
import { ResultCache } from '../../cache/result_cache.js';
import { EMPTY_USAGE, type InferenceClient, type InferenceReply } from '../../inference/inference_client.js';
import { silentLogger } from '../../logger.js';
import type { ForwardedFrame, IncomingFrame, InferenceRequest, RelaySettings, SubmitOutcome } from '../relay.types.js';

type Behaviour = (request: InferenceRequest, signal: AbortSignal) => Promise<InferenceReply>;

class TestClient implements InferenceClient {
  readonly provider = 'test';
  readonly requests: InferenceRequest[] = [];
  active = 0;
  maxActive = 0;

  constructor(private readonly behaviour: Behaviour) {}

  isReady() {
    return true;
  }

  async testConnection() {
    return { ok: true };
  }

  async infer(request: InferenceRequest, signal: AbortSignal): Promise<InferenceReply> {
    this.requests.push(request);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      return await this.behaviour(request, signal);
    } finally {
      this.active -= 1;
    }
  }
}

const delayed = (ms: number): Behaviour => (request) =>
  new Promise((resolve) => {
    setTimeout(() => resolve({ text: ` caption ${request.frame.seq} `, usage: EMPTY_USAGE }), ms);
  });

const hung: Behaviour = (_request, signal) =>
  new Promise((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });

const frame = (): IncomingFrame => ({ data: Buffer.from('jpeg-bytes'), mime: 'image/jpeg' });

const SETTINGS: RelaySettings = {
  process_every_n_frames: 10,
  prompt: 'Describe the scene.',
  model: 'model-a',
  max_tokens: 64
};

function createRelay(client: InferenceClient, overrides: Partial<RelaySettings> = {}, timeoutMs = 30_000) {
  const cache = new ResultCache();
  const forwarded: ForwardedFrame[] = [];
  const relay = new FrameRelay({
    client,
    cache,
    settings: { ...SETTINGS, ...overrides },
    timeoutMs,
    logger: silentLogger,
    sink: (item) => {
      forwarded.push(item);
    }
  });
  return { relay, cache, forwarded };
}

describe('FrameRelay', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('forwards every frame and samples every Nth one', async () => {
    const client = new TestClient(delayed(5));
    const { relay, cache, forwarded } = createRelay(client, { process_every_n_frames: 10 });

    for (let i = 0; i < 100; i++) {
      await relay.submit(frame());
      await vi.advanceTimersByTimeAsync(33);
    }
    await relay.drain();

    expect(forwarded.map((item) => item.seq)).toEqual(Array.from({ length: 100 }, (_, i) => i + 1));
    expect(client.requests.map((request) => request.frame.seq)).toEqual([10, 20, 30, 40, 50, 60, 70, 80, 90, 100]);
    expect(cache.latencyStats().count).toBe(10);
    expect(relay.stats()).toEqual({
      frames_received: 100,
      frames_forwarded: 100,
      inference_attempts: 10,
      busy_skips: 0,
      in_flight: false,
      consecutive_failures: 0
    });
  });

  it('skips eligible frames while an inference is in flight', async () => {
    const client = new TestClient(delayed(500));
    const { relay, cache } = createRelay(client, { process_every_n_frames: 1 });

    const outcomes: SubmitOutcome[] = [];
    for (let i = 0; i < 5; i++) {
      outcomes.push(await relay.submit(frame()));
      await vi.advanceTimersByTimeAsync(33);
    }

    expect(outcomes[0]).toEqual({ seq: 1, sampled: true, request_id: 1 });
    expect(outcomes.slice(1)).toEqual([
      { seq: 2, sampled: false, reason: 'busy' },
      { seq: 3, sampled: false, reason: 'busy' },
      { seq: 4, sampled: false, reason: 'busy' },
      { seq: 5, sampled: false, reason: 'busy' }
    ]);
    expect(client.requests).toHaveLength(1);
    expect(relay.stats().busy_skips).toBe(4);

    await vi.advanceTimersByTimeAsync(500);
    await relay.drain();
    expect(cache.latestInference()?.frame_seq).toBe(1);
    expect(relay.isBusy()).toBe(false);
  });

  it('never runs two inferences at once under a burst', async () => {
    const client = new TestClient(delayed(50));
    const { relay } = createRelay(client, { process_every_n_frames: 1 });

    for (let i = 0; i < 200; i++) {
      await relay.submit(frame());
      await vi.advanceTimersByTimeAsync(1);
    }
    await vi.advanceTimersByTimeAsync(50);
    await relay.drain();

    const stats = relay.stats();
    expect(client.maxActive).toBe(1);
    expect(stats.inference_attempts + stats.busy_skips).toBe(200);
    expect(stats.inference_attempts).toBe(client.requests.length);
  });

  it('keeps forwarding while the backend hangs', async () => {
    const client = new TestClient(hung);
    const { relay, forwarded } = createRelay(client, { process_every_n_frames: 1 });

    for (let i = 0; i < 10; i++) {
      await relay.submit(frame());
    }

    expect(forwarded).toHaveLength(10);
    expect(forwarded.every((item) => item.overlay.status === 'Processing...')).toBe(true);
    expect(client.requests).toHaveLength(1);

    await vi.advanceTimersByTimeAsync(30_000);
    await relay.drain();
  });

  it('overlays the latest resolved result rather than the current frame', async () => {
    const client = new TestClient(delayed(10));
    const { relay, forwarded } = createRelay(client, { process_every_n_frames: 1 });

    await relay.submit(frame());
    await vi.advanceTimersByTimeAsync(10);
    await relay.submit(frame());

    expect(forwarded[0]?.overlay).toEqual({
      text: 'Waiting for first result...',
      status: 'Processing...',
      lines: ['Waiting for first result...']
    });
    expect(forwarded[1]?.overlay.text).toBe('caption 1');
    expect(forwarded[1]?.overlay.status).toBe('Processing...');

    await vi.advanceTimersByTimeAsync(10);
    await relay.drain();
  });

  it('releases the slot when an inference times out', async () => {
    const client = new TestClient(hung);
    const { relay, cache, forwarded } = createRelay(client, { process_every_n_frames: 1 }, 100);

    await relay.submit(frame());
    await vi.advanceTimersByTimeAsync(100);
    await relay.drain();

    const result = cache.latestInference();
    expect(result?.status).toBe('error');
    if (result?.status === 'error') {
      expect(result.error).toEqual({ kind: 'timeout', message: 'inference timed out after 100ms' });
    }
    expect(relay.isBusy()).toBe(false);

    const next = await relay.submit(frame());
    expect(next).toEqual({ seq: 2, sampled: true, request_id: 2 });
    expect(forwarded[1]?.overlay.text).toBe('Error: inference timed out after 100ms');

    await vi.advanceTimersByTimeAsync(100);
    await relay.drain();
    expect(relay.stats().consecutive_failures).toBe(2);
  });

  it('tags a result with the settings its request was issued under', async () => {
    const client = new TestClient(delayed(100));
    const { relay, cache } = createRelay(client, { process_every_n_frames: 1 });

    await relay.submit(frame());
    expect(relay.configure({ model: 'model-b', prompt: 'What changed?' }).ok).toBe(true);
    await vi.advanceTimersByTimeAsync(100);
    await relay.drain();

    expect(cache.latestInference()?.model).toBe('model-a');
    expect(cache.latestInference()?.prompt).toBe('Describe the scene.');

    await relay.submit(frame());
    expect(client.requests[1]?.model).toBe('model-b');
    expect(client.requests[1]?.prompt).toBe('What changed?');

    await vi.advanceTimersByTimeAsync(100);
    await relay.drain();
  });

  it('rejects an invalid update and keeps the previous settings', () => {
    const { relay } = createRelay(new TestClient(delayed(5)));

    const result = relay.configure({ process_every_n_frames: 0 });

    expect(result).toEqual({ ok: false, issues: ['process_every_n_frames: Number must be greater than 0'] });
    expect(relay.settings()).toEqual(SETTINGS);
  });

  it('applies no part of a partly invalid update', () => {
    const { relay } = createRelay(new TestClient(delayed(5)));

    const result = relay.configure({ model: 'model-b', prompt: '   ' });

    expect(result.ok).toBe(false);
    expect(relay.settings().model).toBe('model-a');
  });

  it('reports which settings changed', () => {
    const { relay } = createRelay(new TestClient(delayed(5)));

    const result = relay.configure({ process_every_n_frames: 5, model: 'model-a' });

    expect(result).toEqual({
      ok: true,
      settings: { ...SETTINGS, process_every_n_frames: 5 },
      changed: ['process_every_n_frames']
    });
  });

  it('turns a client error into a failure result', async () => {
    const client = new TestClient(async () => {
      throw new Error('connect ECONNREFUSED 127.0.0.1:8000');
    });
    const { relay, cache } = createRelay(client, { process_every_n_frames: 1 });

    await relay.submit(frame());
    await relay.drain();

    const result = cache.latestInference();
    expect(result?.status).toBe('error');
    if (result?.status === 'error') {
      expect(result.error.kind).toBe('network');
    }
    expect(relay.stats().consecutive_failures).toBe(1);
    expect(relay.isBusy()).toBe(false);
  });

  it('requires a sink', async () => {
    const relay = new FrameRelay({
      client: new TestClient(delayed(5)),
      cache: new ResultCache(),
      settings: SETTINGS,
      timeoutMs: 1000,
      logger: silentLogger
    });

    await expect(relay.submit(frame())).rejects.toThrow('no output sink');
    expect(relay.stats().frames_received).toBe(0);
  });

  it('refuses invalid initial settings', () => {
    expect(
      () =>
        new FrameRelay({
          client: new TestClient(delayed(5)),
          cache: new ResultCache(),
          settings: { ...SETTINGS, max_tokens: 0 },
          timeoutMs: 1000,
          logger: silentLogger
        })
    ).toThrow('Invalid relay settings');
  });
});
