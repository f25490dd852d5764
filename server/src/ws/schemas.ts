import { z } from 'zod';
import { MaxTokensField, ModelField, ProcessEveryField, PromptField } from '../relay/relay.settings.js';
import type { TokenUsage, InferenceErrorKind, RelaySettings } from '../relay/relay.types.js';
import type { TelemetryStatus } from '../telemetry/telemetry.types.js';

export const FrameMessageSchema = z.object({
  type: z.literal('frame'),
  image_base64: z.string().min(1).base64(),
  mime: z.enum(['image/jpeg', 'image/png']).default('image/jpeg'),
  t_ms: z.number().nonnegative().optional()
});

export const UpdatePromptSchema = z.object({
  type: z.literal('update_prompt'),
  prompt: PromptField,
  max_tokens: MaxTokensField
});

export const UpdateModelSchema = z.object({
  type: z.literal('update_model'),
  model: ModelField
});

export const UpdateProcessingSchema = z.object({
  type: z.literal('update_processing'),
  process_every_n_frames: ProcessEveryField
});

export const ClientMessageSchema = z.discriminatedUnion('type', [
  FrameMessageSchema,
  UpdatePromptSchema,
  UpdateModelSchema,
  UpdateProcessingSchema
]);

export const ControlTypes = ['update_prompt', 'update_model', 'update_processing'] as const;

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type ForwardedFrameMessage = {
  type: 'frame';
  seq: number;
  ts_ms: number;
  image_base64: string;
  mime: 'image/jpeg' | 'image/png';
  overlay: { text: string; status: string; lines: string[] };
};

export type InferenceEvent = {
  type: 'inference';
  status: 'ok' | 'error';
  model: string;
  prompt: string;
  frame_seq: number;
  text?: string;
  error?: { kind: InferenceErrorKind; message: string };
  usage?: TokenUsage;
  latency_ms: number;
  mean_latency_ms: number;
  total_count: number;
  processing: boolean;
};

export type TelemetryEvent = {
  type: 'telemetry';
  status: TelemetryStatus;
  valid: boolean;
  platform: string;
  gpu_name: string | null;
  gpu_util_percent: number | null;
  vram_used_gb: number | null;
  vram_total_gb: number | null;
  temp_c: number | null;
  power_w: number | null;
  cpu_percent: number | null;
  ram_used_gb: number | null;
  ram_total_gb: number | null;
  ts_ms: number;
  history: {
    gpu_util: (number | null)[];
    vram_used: (number | null)[];
    cpu_util: (number | null)[];
    ram_used: (number | null)[];
  };
};

export type StatusMessage = {
  type: 'status';
  text: string;
  status: 'Processing...' | 'Ready';
  settings: RelaySettings;
};

export type ConfigAck = {
  type: 'config_ack';
  settings: RelaySettings;
  changed: string[];
};

export type ErrorMessage = {
  type: 'error';
  code: 'invalid_json' | 'invalid_message' | 'invalid_config' | 'frame_failed';
  message: string;
  issues?: string[];
};

export type ServerMessage =
  | ForwardedFrameMessage
  | InferenceEvent
  | TelemetryEvent
  | StatusMessage
  | ConfigAck
  | ErrorMessage;
