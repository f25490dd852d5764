import type { InferenceErrorKind, InferenceRequest, TokenUsage } from '../relay/relay.types.js';

export type InferenceReply = {
  text: string;
  usage: TokenUsage;
};

export interface InferenceClient {
  readonly provider: string;
  isReady(): boolean;
  infer(request: InferenceRequest, signal: AbortSignal): Promise<InferenceReply>;
  testConnection(): Promise<{ ok: boolean; error?: string }>;
}

export class InferenceError extends Error {
  readonly kind: InferenceErrorKind;

  constructor(kind: InferenceErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InferenceError';
    this.kind = kind;
  }
}

export const EMPTY_USAGE: TokenUsage = {
  prompt_tokens: null,
  completion_tokens: null,
  total_tokens: null
};

export function toInferenceError(error: unknown): InferenceError {
  if (error instanceof InferenceError) return error;
  const message = error instanceof Error ? error.message : String(error);
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return new InferenceError('timeout', message || 'request aborted', { cause: error });
  }
  if (/\b(4\d\d|5\d\d)\b/.test(message) || message.includes('Too Many Requests')) {
    return new InferenceError('http', message, { cause: error });
  }
  if (/ECONNREFUSED|ENOTFOUND|ECONNRESET|ETIMEDOUT|fetch failed/i.test(message)) {
    return new InferenceError('network', message, { cause: error });
  }
  return new InferenceError('unknown', message || 'unknown_error', { cause: error });
}
