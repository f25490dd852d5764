export type TelemetryStatus = 'ok' | 'unavailable' | 'disabled';

/** One reading from a probe. Fields the platform cannot report are null. */
export type ProbeReading = {
  platform: string;
  gpu_name: string | null;
  gpu_percent: number | null;
  vram_used_gb: number | null;
  vram_total_gb: number | null;
  temp_c: number | null;
  power_w: number | null;
  cpu_percent: number | null;
  cpu_model: string | null;
  ram_used_gb: number | null;
  ram_total_gb: number | null;
  hostname: string | null;
};

export type TelemetryProbe = () => ProbeReading | Promise<ProbeReading>;

export type TelemetrySample = Readonly<
  ProbeReading & {
    ts_ms: number;
    valid: boolean;
    status: TelemetryStatus;
  }
>;

export type TelemetryPlatform = 'auto' | 'nvidia' | 'cpu';
