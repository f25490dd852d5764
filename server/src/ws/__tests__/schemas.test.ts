import { describe, expect, it } from 'vitest';
import { ClientMessageSchema } from '../schemas.js';

describe('ClientMessageSchema', () => {
  it('accepts a frame and defaults its mime type', () => {
    const parsed = ClientMessageSchema.parse({ type: 'frame', image_base64: 'aW1n' });

    expect(parsed).toEqual({ type: 'frame', image_base64: 'aW1n', mime: 'image/jpeg' });
  });

  it('rejects frame data that is not base64', () => {
    expect(ClientMessageSchema.safeParse({ type: 'frame', image_base64: 'not base64!' }).success).toBe(false);
    expect(ClientMessageSchema.safeParse({ type: 'frame', image_base64: '' }).success).toBe(false);
  });

  it('accepts each control message', () => {
    expect(ClientMessageSchema.safeParse({ type: 'update_prompt', prompt: 'What is here?', max_tokens: 100 }).success).toBe(true);
    expect(ClientMessageSchema.safeParse({ type: 'update_model', model: 'model-b' }).success).toBe(true);
    expect(ClientMessageSchema.safeParse({ type: 'update_processing', process_every_n_frames: 15 }).success).toBe(true);
  });

  it('rejects invalid control values', () => {
    expect(ClientMessageSchema.safeParse({ type: 'update_processing', process_every_n_frames: 0 }).success).toBe(false);
    expect(ClientMessageSchema.safeParse({ type: 'update_prompt', prompt: '', max_tokens: 100 }).success).toBe(false);
    expect(ClientMessageSchema.safeParse({ type: 'update_model', model: '  ' }).success).toBe(false);
  });

  it('rejects unknown message types', () => {
    expect(ClientMessageSchema.safeParse({ type: 'start_stream' }).success).toBe(false);
  });
});
