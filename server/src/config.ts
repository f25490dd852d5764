import { z } from 'zod';
import { DEFAULT_PROMPT } from './inference/vlm.prompt.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().default(8080),
  HOST: z.string().default('0.0.0.0'),
  WS_PATH: z.string().default('/ws'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  VLM_PROVIDER: z.enum(['mock', 'gemini', 'openai']).default('mock'),
  VLM_MODEL: z.string().min(1).default('gemini-1.5-flash'),
  VLM_API_BASE: z.string().url().default('http://localhost:8000/v1'),
  VLM_API_KEY: z.string().default('EMPTY'),
  GEMINI_API_KEY: z.string().optional().default(''),
  VLM_PROMPT: z.string().min(1).default(DEFAULT_PROMPT),
  VLM_MAX_TOKENS: z.coerce.number().int().positive().default(512),
  PROCESS_EVERY_N_FRAMES: z.coerce.number().int().positive().default(30),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  TELEMETRY_PLATFORM: z.enum(['auto', 'nvidia', 'cpu']).default('auto'),
  TELEMETRY_INTERVAL_MS: z.coerce.number().int().min(100).max(60000).default(1000),
  TELEMETRY_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  HISTORY_SIZE: z.coerce.number().int().positive().default(60),
  PUSH_INTERVAL_MS: z.coerce.number().int().min(50).default(500)
});

export type AppConfig = ReturnType<typeof toConfig>;

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error('Invalid environment variables', parsed.error.format());
    throw new Error('Invalid environment');
  }
  return toConfig(parsed.data);
}

function toConfig(env: z.infer<typeof envSchema>) {
  return {
    port: env.PORT,
    host: env.HOST,
    wsPath: env.WS_PATH,
    logLevel: env.LOG_LEVEL,
    vlm: {
      provider: env.VLM_PROVIDER,
      model: env.VLM_MODEL,
      apiBase: env.VLM_API_BASE,
      apiKey: env.VLM_API_KEY,
      geminiApiKey: env.GEMINI_API_KEY,
      prompt: env.VLM_PROMPT,
      maxTokens: env.VLM_MAX_TOKENS,
      timeoutMs: env.INFERENCE_TIMEOUT_MS
    },
    processEveryNFrames: env.PROCESS_EVERY_N_FRAMES,
    telemetry: {
      platform: env.TELEMETRY_PLATFORM,
      intervalMs: env.TELEMETRY_INTERVAL_MS,
      probeTimeoutMs: env.TELEMETRY_PROBE_TIMEOUT_MS
    },
    historySize: env.HISTORY_SIZE,
    pushIntervalMs: env.PUSH_INTERVAL_MS
  };
}
