import { EventEmitter } from 'events';
import { FAILURE_THRESHOLD, INITIAL_CIRCUIT, isDisabled, recordFailure, recordSuccess, type CircuitState } from './circuit.js';
import type { ResultCache } from '../cache/result_cache.js';
import type { Logger } from '../logger.js';
import type { ProbeReading, TelemetryProbe, TelemetrySample, TelemetryStatus } from './telemetry.types.js';

export type TelemetrySamplerOptions = {
  probe: TelemetryProbe;
  cache: ResultCache;
  intervalMs: number;
  probeTimeoutMs: number;
  logger: Logger;
  failureThreshold?: number;
};

type Descriptors = Pick<ProbeReading, 'platform' | 'gpu_name' | 'cpu_model' | 'hostname'>;

/**
 * Polls the probe once per interval: probe, write, sleep, repeat.
 *
 * Consecutive failures drive the circuit; at the threshold the probe is never
 * called again for the life of the process, while `disabled` samples keep
 * flowing at the same cadence.
 */
export class TelemetrySampler extends EventEmitter {
  private readonly probe: TelemetryProbe;
  private readonly cache: ResultCache;
  private readonly intervalMs: number;
  private readonly probeTimeoutMs: number;
  private readonly threshold: number;
  private readonly log: Logger;
  private state: CircuitState = INITIAL_CIRCUIT;
  private running = false;
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<void> | null = null;
  private probeCalls = 0;
  private outstanding: Promise<ProbeReading> | null = null;
  private descriptors: Descriptors = { platform: 'unknown', gpu_name: null, cpu_model: null, hostname: null };

  constructor(options: TelemetrySamplerOptions) {
    super();
    this.probe = options.probe;
    this.cache = options.cache;
    this.intervalMs = options.intervalMs;
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.threshold = options.failureThreshold ?? FAILURE_THRESHOLD;
    this.log = options.logger.child({ component: 'telemetry' });
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.schedule(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current) {
      await this.current;
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  circuit(): CircuitState {
    return this.state;
  }

  /** Probe calls actually started; cycles skipped while a call is outstanding are not counted. */
  probeCallCount(): number {
    return this.probeCalls;
  }

  /** Runs one poll cycle and writes its sample. Never rejects on probe failure. */
  async tick(): Promise<TelemetrySample> {
    const sample = isDisabled(this.state) ? this.emptySample('disabled') : await this.poll();
    this.cache.updateTelemetry(sample);
    this.emit('sample', sample);
    return sample;
  }

  private async poll(): Promise<TelemetrySample> {
    try {
      const reading = await withTimeout(this.callProbe(), this.probeTimeoutMs);
      if (this.state.failures > 0) {
        this.log.info({ after_failures: this.state.failures }, 'telemetry probe recovered');
      }
      this.state = recordSuccess(this.state);
      this.descriptors = {
        platform: reading.platform,
        gpu_name: reading.gpu_name,
        cpu_model: reading.cpu_model,
        hostname: reading.hostname
      };
      return { ...reading, ts_ms: Date.now(), valid: true, status: 'ok' };
    } catch (error) {
      const previous = this.state;
      this.state = recordFailure(this.state, this.threshold);
      this.log.warn({ err: error, consecutive: this.state.failures }, 'telemetry probe failed');
      if (this.state.kind === 'disabled' && previous.kind === 'active') {
        this.log.error(
          { failures: this.state.failures },
          'telemetry disabled after consecutive probe failures; restart the process to re-enable'
        );
        this.emit('disabled', this.state);
        return this.emptySample('disabled');
      }
      return this.emptySample('unavailable');
    }
  }

  // A call that outlived its timeout is still outstanding; cycles fail until it settles.
  private callProbe(): Promise<ProbeReading> {
    if (this.outstanding) {
      return Promise.reject(new Error('previous telemetry probe call has not settled'));
    }
    this.probeCalls += 1;
    const call = Promise.resolve().then(() => this.probe());
    this.outstanding = call;
    const settle = () => {
      if (this.outstanding === call) this.outstanding = null;
    };
    void call.then(settle, settle);
    return call;
  }

  private emptySample(status: Exclude<TelemetryStatus, 'ok'>): TelemetrySample {
    return {
      ...this.descriptors,
      platform: `${this.descriptors.platform} (monitoring unavailable)`,
      gpu_percent: null,
      vram_used_gb: null,
      vram_total_gb: null,
      temp_c: null,
      power_w: null,
      cpu_percent: null,
      ram_used_gb: null,
      ram_total_gb: null,
      ts_ms: Date.now(),
      valid: false,
      status
    };
  }

  private schedule(delayMs: number) {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.current = this.runCycle();
    }, delayMs);
  }

  private async runCycle(): Promise<void> {
    if (!this.running) return;
    try {
      await this.tick();
    } catch (error) {
      this.log.error({ err: error }, 'telemetry cycle failed');
    } finally {
      this.current = null;
      if (this.running) {
        this.schedule(this.intervalMs);
      }
    }
  }
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`telemetry probe timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    void promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
