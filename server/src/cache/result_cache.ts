import { RollingHistory } from './rolling_history.js';
import type { InferenceResult } from '../relay/relay.types.js';
import type { TelemetrySample } from '../telemetry/telemetry.types.js';

export type LatencyStats = Readonly<{
  last_ms: number | null;
  mean_ms: number | null;
  count: number;
}>;

export type HistorySeries = 'gpu_util' | 'vram_used' | 'cpu_util' | 'ram_used' | 'inference_latency';

export type CacheSnapshot = Readonly<{
  inference: InferenceResult | null;
  telemetry: TelemetrySample | null;
  latency: LatencyStats;
  history: Readonly<Record<HistorySeries, readonly (number | null)[]>>;
  versions: Readonly<{ inference: number; telemetry: number }>;
}>;

/**
 * Latest-value store shared by the relay worker and the telemetry sampler.
 * The worker owns the inference fields, the sampler owns the telemetry fields.
 * Readers only ever see frozen copies from `snapshot()`.
 */
export class ResultCache {
  private inference: InferenceResult | null = null;
  private telemetry: TelemetrySample | null = null;
  private latency: LatencyStats = { last_ms: null, mean_ms: null, count: 0 };
  private inferenceVersion = 0;
  private telemetryVersion = 0;
  private readonly series: Record<HistorySeries, RollingHistory<number | null>>;

  constructor(historySize = 60) {
    this.series = {
      gpu_util: new RollingHistory(historySize),
      vram_used: new RollingHistory(historySize),
      cpu_util: new RollingHistory(historySize),
      ram_used: new RollingHistory(historySize),
      inference_latency: new RollingHistory(historySize)
    };
  }

  updateInference(result: InferenceResult) {
    const count = this.latency.count + 1;
    const previousMean = this.latency.mean_ms ?? 0;
    this.latency = {
      last_ms: result.latency_ms,
      mean_ms: previousMean + (result.latency_ms - previousMean) / count,
      count
    };
    this.inference =
      result.status === 'ok'
        ? Object.freeze({ ...result, usage: Object.freeze({ ...result.usage }) })
        : Object.freeze({ ...result, error: Object.freeze({ ...result.error }) });
    this.series.inference_latency.push(result.latency_ms);
    this.inferenceVersion += 1;
  }

  updateTelemetry(sample: TelemetrySample) {
    this.telemetry = Object.freeze({ ...sample });
    this.series.gpu_util.push(sample.gpu_percent);
    this.series.vram_used.push(sample.vram_used_gb);
    this.series.cpu_util.push(sample.cpu_percent);
    this.series.ram_used.push(sample.ram_used_gb);
    this.telemetryVersion += 1;
  }

  latestInference(): InferenceResult | null {
    return this.inference;
  }

  latencyStats(): LatencyStats {
    return this.latency;
  }

  snapshot(): CacheSnapshot {
    return Object.freeze({
      inference: this.inference,
      telemetry: this.telemetry,
      latency: Object.freeze({ ...this.latency }),
      history: Object.freeze({
        gpu_util: Object.freeze(this.series.gpu_util.toArray()),
        vram_used: Object.freeze(this.series.vram_used.toArray()),
        cpu_util: Object.freeze(this.series.cpu_util.toArray()),
        ram_used: Object.freeze(this.series.ram_used.toArray()),
        inference_latency: Object.freeze(this.series.inference_latency.toArray())
      }),
      versions: Object.freeze({ inference: this.inferenceVersion, telemetry: this.telemetryVersion })
    });
  }
}
