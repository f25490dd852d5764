import { z } from 'zod';
import type { RelaySettings } from './relay.types.js';

export const ProcessEveryField = z.number().int().positive();
export const PromptField = z.string().trim().min(1);
export const ModelField = z.string().trim().min(1);
export const MaxTokensField = z.number().int().positive();

export const SettingsUpdateSchema = z.object({
  process_every_n_frames: ProcessEveryField.optional(),
  prompt: PromptField.optional(),
  model: ModelField.optional(),
  max_tokens: MaxTokensField.optional()
});

export type ConfigureResult =
  | { ok: true; settings: RelaySettings; changed: (keyof RelaySettings)[] }
  | { ok: false; issues: string[] };

/**
 * Validates the whole update before touching anything: one bad field rejects
 * the update and `current` is returned unchanged by the caller.
 */
export function applySettingsUpdate(current: RelaySettings, update: unknown): ConfigureResult {
  const parsed = SettingsUpdateSchema.safeParse(update);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'update'}: ${issue.message}`)
    };
  }

  const next: RelaySettings = {
    process_every_n_frames: parsed.data.process_every_n_frames ?? current.process_every_n_frames,
    prompt: parsed.data.prompt ?? current.prompt,
    model: parsed.data.model ?? current.model,
    max_tokens: parsed.data.max_tokens ?? current.max_tokens
  };
  const keys: (keyof RelaySettings)[] = ['process_every_n_frames', 'prompt', 'model', 'max_tokens'];
  const changed = keys.filter((key) => next[key] !== current[key]);
  return { ok: true, settings: Object.freeze(next), changed };
}
