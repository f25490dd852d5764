import { InferenceSlot, type SlotLease } from './inference_slot.js';
import { buildOverlay } from './overlay.js';
import { applySettingsUpdate, type ConfigureResult } from './relay.settings.js';
import { InferenceError, toInferenceError, type InferenceClient } from '../inference/inference_client.js';
import type { ResultCache } from '../cache/result_cache.js';
import type { Logger } from '../logger.js';
import type {
  Frame,
  IncomingFrame,
  InferenceRequest,
  InferenceResult,
  OutputSink,
  RelaySettings,
  RelayStats,
  SubmitOutcome
} from './relay.types.js';

export const FAILURE_ALERT_THRESHOLD = 3;

export type FrameRelayOptions = {
  client: InferenceClient;
  cache: ResultCache;
  settings: RelaySettings;
  timeoutMs: number;
  logger: Logger;
  sink?: OutputSink;
};

/**
 * Forwards every frame to its sink and samples every Nth frame for inference.
 *
 * At most one inference runs at a time: the slot is a capacity-1 mailbox and an
 * eligible frame that finds it taken is skipped, never queued. The overlay on a
 * forwarded frame is the latest resolved result, not the result for that frame.
 */
export class FrameRelay {
  private settingsValue: RelaySettings;
  private readonly client: InferenceClient;
  private readonly cache: ResultCache;
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private readonly defaultSink: OutputSink | null;
  private readonly slot = new InferenceSlot();
  private inFlight: Promise<void> | null = null;
  private counter = 0;
  private forwarded = 0;
  private attempts = 0;
  private busySkips = 0;
  private consecutiveFailures = 0;

  constructor(options: FrameRelayOptions) {
    const initial = applySettingsUpdate(options.settings, options.settings);
    if (!initial.ok) {
      throw new Error(`Invalid relay settings: ${initial.issues.join('; ')}`);
    }
    this.settingsValue = initial.settings;
    this.client = options.client;
    this.cache = options.cache;
    this.timeoutMs = options.timeoutMs;
    this.log = options.logger.child({ component: 'relay' });
    this.defaultSink = options.sink ?? null;
  }

  async submit(incoming: IncomingFrame, sink: OutputSink | null = this.defaultSink): Promise<SubmitOutcome> {
    if (!sink) {
      throw new Error('FrameRelay has no output sink');
    }
    this.counter += 1;
    const frame: Frame = Object.freeze({
      seq: this.counter,
      ts_ms: incoming.ts_ms ?? Date.now(),
      data: incoming.data,
      mime: incoming.mime
    });
    if (frame.seq === 1) {
      this.log.info({ bytes: frame.data.length, mime: frame.mime }, 'first frame received');
    }

    const outcome = this.dispatch(frame);
    const overlay = buildOverlay(this.cache.latestInference(), this.slot.isBusy());
    await sink(Object.freeze({ ...frame, overlay }));
    this.forwarded += 1;
    return outcome;
  }

  configure(update: unknown): ConfigureResult {
    const result = applySettingsUpdate(this.settingsValue, update);
    if (!result.ok) {
      this.log.warn({ issues: result.issues }, 'relay settings rejected');
      return result;
    }
    if (result.changed.length > 0) {
      this.settingsValue = result.settings;
      this.log.info({ changed: result.changed, settings: redactPrompt(result.settings) }, 'relay settings updated');
    }
    return result;
  }

  settings(): RelaySettings {
    return this.settingsValue;
  }

  isBusy(): boolean {
    return this.slot.isBusy();
  }

  stats(): RelayStats {
    return {
      frames_received: this.counter,
      frames_forwarded: this.forwarded,
      inference_attempts: this.attempts,
      busy_skips: this.busySkips,
      in_flight: this.slot.isBusy(),
      consecutive_failures: this.consecutiveFailures
    };
  }

  /** Resolves once no inference is in flight. */
  async drain(): Promise<void> {
    while (this.inFlight) {
      await this.inFlight;
    }
  }

  private dispatch(frame: Frame): SubmitOutcome {
    const settings = this.settingsValue;
    if (frame.seq % settings.process_every_n_frames !== 0) {
      return { seq: frame.seq, sampled: false, reason: 'interval' };
    }

    const lease = this.slot.tryAcquire();
    if (!lease) {
      this.busySkips += 1;
      this.log.debug({ seq: frame.seq }, 'inference busy, frame not sampled');
      return { seq: frame.seq, sampled: false, reason: 'busy' };
    }

    const request: InferenceRequest = Object.freeze({
      id: lease.id,
      frame,
      prompt: settings.prompt,
      model: settings.model,
      max_tokens: settings.max_tokens,
      issued_at: Date.now()
    });
    this.attempts += 1;
    this.log.debug({ seq: frame.seq, request_id: request.id, model: request.model }, 'frame sent to VLM');
    this.inFlight = this.run(lease, request);
    return { seq: frame.seq, sampled: true, request_id: request.id };
  }

  // Never rejects. The lease is released on every exit path.
  private async run(lease: SlotLease, request: InferenceRequest): Promise<void> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let timedOut = false;
    let result: InferenceResult;

    try {
      const call = Promise.resolve().then(() => this.client.infer(request, controller.signal));
      void call.catch((error: unknown) => {
        if (timedOut) {
          this.log.debug({ err: error, request_id: request.id }, 'inference settled after timeout');
        }
      });
      const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          timedOut = true;
          controller.abort();
          reject(new InferenceError('timeout', `inference timed out after ${this.timeoutMs}ms`));
        }, this.timeoutMs);
      });

      const reply = await Promise.race([call, deadline]);
      const completedAt = Date.now();
      result = {
        status: 'ok',
        text: reply.text.trim(),
        usage: reply.usage,
        ...this.resultBase(request, completedAt)
      };
      this.consecutiveFailures = 0;
    } catch (error) {
      const failure = toInferenceError(error);
      const completedAt = Date.now();
      result = {
        status: 'error',
        error: { kind: failure.kind, message: failure.message },
        ...this.resultBase(request, completedAt)
      };
      this.consecutiveFailures += 1;
      this.log.warn(
        { err: failure, kind: failure.kind, request_id: request.id, consecutive: this.consecutiveFailures },
        'inference failed'
      );
      if (this.consecutiveFailures === FAILURE_ALERT_THRESHOLD) {
        this.log.error(
          { consecutive: this.consecutiveFailures, model: request.model },
          'inference failing repeatedly; requests will keep being issued'
        );
      }
    } finally {
      clearTimeout(timer);
      this.inFlight = null;
      lease.release();
    }

    this.cache.updateInference(result);
  }

  private resultBase(request: InferenceRequest, completedAt: number) {
    return {
      request_id: request.id,
      frame_seq: request.frame.seq,
      model: request.model,
      prompt: request.prompt,
      issued_at: request.issued_at,
      completed_at: completedAt,
      latency_ms: completedAt - request.issued_at
    };
  }
}

function redactPrompt(settings: RelaySettings) {
  return {
    ...settings,
    prompt: settings.prompt.length > 80 ? `${settings.prompt.slice(0, 77)}...` : settings.prompt
  };
}
