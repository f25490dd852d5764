import type { CacheSnapshot } from '../cache/result_cache.js';
import type { ForwardedFrame } from '../relay/relay.types.js';
import type { ForwardedFrameMessage, InferenceEvent, TelemetryEvent } from './schemas.js';

export function toInferenceEvent(snapshot: CacheSnapshot, processing: boolean): InferenceEvent | null {
  const result = snapshot.inference;
  if (!result) return null;
  const base = {
    type: 'inference' as const,
    model: result.model,
    prompt: result.prompt,
    frame_seq: result.frame_seq,
    latency_ms: result.latency_ms,
    mean_latency_ms: Math.round(snapshot.latency.mean_ms ?? result.latency_ms),
    total_count: snapshot.latency.count,
    processing
  };
  if (result.status === 'ok') {
    return { ...base, status: 'ok', text: result.text, usage: result.usage };
  }
  return { ...base, status: 'error', error: result.error };
}

export function toTelemetryEvent(snapshot: CacheSnapshot): TelemetryEvent | null {
  const sample = snapshot.telemetry;
  if (!sample) return null;
  return {
    type: 'telemetry',
    status: sample.status,
    valid: sample.valid,
    platform: sample.platform,
    gpu_name: sample.gpu_name,
    gpu_util_percent: sample.gpu_percent,
    vram_used_gb: sample.vram_used_gb,
    vram_total_gb: sample.vram_total_gb,
    temp_c: sample.temp_c,
    power_w: sample.power_w,
    cpu_percent: sample.cpu_percent,
    ram_used_gb: sample.ram_used_gb,
    ram_total_gb: sample.ram_total_gb,
    ts_ms: sample.ts_ms,
    history: {
      gpu_util: [...snapshot.history.gpu_util],
      vram_used: [...snapshot.history.vram_used],
      cpu_util: [...snapshot.history.cpu_util],
      ram_used: [...snapshot.history.ram_used]
    }
  };
}

export function toFrameMessage(frame: ForwardedFrame): ForwardedFrameMessage {
  return {
    type: 'frame',
    seq: frame.seq,
    ts_ms: frame.ts_ms,
    image_base64: frame.data.toString('base64'),
    mime: frame.mime,
    overlay: {
      text: frame.overlay.text,
      status: frame.overlay.status,
      lines: [...frame.overlay.lines]
    }
  };
}
