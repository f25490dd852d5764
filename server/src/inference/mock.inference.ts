import { EMPTY_USAGE, type InferenceClient, type InferenceReply } from './inference_client.js';
import type { InferenceRequest } from '../relay/relay.types.js';

const SCENES = ['a desk with a laptop', 'a person facing the camera', 'an empty office', 'a whiteboard with notes'];

export class MockInferenceClient implements InferenceClient {
  readonly provider = 'mock';
  private mockIndex = 0;

  constructor(private readonly delayMs = 150) {}

  isReady(): boolean {
    return true;
  }

  async testConnection(): Promise<{ ok: boolean; error?: string }> {
    return { ok: true, error: 'mock_mode' };
  }

  async infer(request: InferenceRequest, signal: AbortSignal): Promise<InferenceReply> {
    await sleep(this.delayMs, signal);
    const scene = SCENES[this.mockIndex % SCENES.length];
    this.mockIndex += 1;
    const text = `Frame ${request.frame.seq}: ${scene} (mock)`;
    return {
      text,
      usage: {
        ...EMPTY_USAGE,
        completion_tokens: text.split(/\s+/).length
      }
    };
  }
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
