import type { InferenceRequest } from '../../relay/relay.types.js';

export function makeRequest(overrides: Partial<InferenceRequest> = {}): InferenceRequest {
  return {
    id: 1,
    frame: { seq: 7, ts_ms: 1000, data: Buffer.from('img'), mime: 'image/jpeg' },
    prompt: 'Describe the scene.',
    model: 'test-model',
    max_tokens: 64,
    issued_at: 1000,
    ...overrides
  };
}
