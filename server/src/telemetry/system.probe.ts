import os, { type CpuInfo } from 'os';
import { execFile } from 'child_process';
import { promisify } from 'util';
import type { ProbeReading, TelemetryPlatform, TelemetryProbe } from './telemetry.types.js';

const execFileAsync = promisify(execFile);

const BYTES_PER_GB = 1024 ** 3;
const MIB_PER_GB = 1024;

export const NVIDIA_SMI_QUERY = [
  '--query-gpu=utilization.gpu,memory.used,memory.total,temperature.gpu,power.draw,name',
  '--format=csv,noheader,nounits'
];

export type GpuReading = Pick<
  ProbeReading,
  'gpu_name' | 'gpu_percent' | 'vram_used_gb' | 'vram_total_gb' | 'temp_c' | 'power_w'
>;

export type CpuTimes = { idle: number; total: number };

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<string>;

export const runCommand: CommandRunner = async (file, args, timeoutMs) => {
  const { stdout } = await execFileAsync(file, args, { timeout: timeoutMs });
  return stdout;
};

export function readCpuTimes(cpus: CpuInfo[] = os.cpus()): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of cpus) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

export function cpuPercentBetween(previous: CpuTimes, next: CpuTimes): number | null {
  const total = next.total - previous.total;
  if (total <= 0) return null;
  const busy = total - (next.idle - previous.idle);
  return round(Math.min(100, Math.max(0, (busy / total) * 100)), 1);
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined) return null;
  const trimmed = value.trim();
  if (!trimmed || /N\/A|Not Supported|\[/.test(trimmed)) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/** Parses the first GPU line of `nvidia-smi` CSV output (no header, no units). */
export function parseNvidiaSmi(stdout: string): GpuReading {
  const line = stdout.split('\n').find((item) => item.trim().length > 0);
  if (!line) {
    throw new Error('nvidia-smi returned no GPU rows');
  }
  const [util, memUsed, memTotal, temp, power, ...nameParts] = line.split(',');
  const gpuPercent = parseNumber(util);
  const usedMib = parseNumber(memUsed);
  const totalMib = parseNumber(memTotal);
  if (gpuPercent === null && usedMib === null) {
    throw new Error(`nvidia-smi output not understood: ${line.trim()}`);
  }
  const name = nameParts.join(',').trim();
  return {
    gpu_name: name || null,
    gpu_percent: gpuPercent,
    vram_used_gb: usedMib === null ? null : round(usedMib / MIB_PER_GB, 2),
    vram_total_gb: totalMib === null ? null : round(totalMib / MIB_PER_GB, 2),
    temp_c: parseNumber(temp),
    power_w: parseNumber(power)
  };
}

export async function detectPlatform(
  requested: TelemetryPlatform,
  run: CommandRunner = runCommand
): Promise<Exclude<TelemetryPlatform, 'auto'>> {
  if (requested !== 'auto') return requested;
  try {
    parseNvidiaSmi(await run('nvidia-smi', NVIDIA_SMI_QUERY, 2000));
    return 'nvidia';
  } catch {
    return 'cpu';
  }
}

export type SystemProbeOptions = {
  platform: Exclude<TelemetryPlatform, 'auto'>;
  commandTimeoutMs?: number;
  run?: CommandRunner;
};

/**
 * CPU and RAM come from `os`; GPU counters come from `nvidia-smi` when the
 * platform is `nvidia`. Any GPU read failure fails the whole reading.
 */
export function createSystemProbe(options: SystemProbeOptions): TelemetryProbe {
  const run = options.run ?? runCommand;
  const commandTimeoutMs = options.commandTimeoutMs ?? 2000;
  const hostname = os.hostname();
  const cpuModel = os.cpus()[0]?.model.trim() || 'Unknown CPU';
  let lastCpu = readCpuTimes();

  return async () => {
    const gpu: GpuReading =
      options.platform === 'nvidia'
        ? parseNvidiaSmi(await run('nvidia-smi', NVIDIA_SMI_QUERY, commandTimeoutMs))
        : { gpu_name: null, gpu_percent: null, vram_used_gb: null, vram_total_gb: null, temp_c: null, power_w: null };

    const cpu = readCpuTimes();
    const cpuPercent = cpuPercentBetween(lastCpu, cpu);
    lastCpu = cpu;
    const totalMem = os.totalmem();

    return {
      platform: options.platform === 'nvidia' ? 'NVIDIA (nvidia-smi)' : 'CPU only',
      ...gpu,
      cpu_percent: cpuPercent,
      cpu_model: cpuModel,
      ram_used_gb: round((totalMem - os.freemem()) / BYTES_PER_GB, 2),
      ram_total_gb: round(totalMem / BYTES_PER_GB, 2),
      hostname
    };
  };
}

function round(value: number, digits: number): number {
  return Number(value.toFixed(digits));
}
