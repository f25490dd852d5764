import { GeminiInferenceClient } from './gemini.inference.js';
import { MockInferenceClient } from './mock.inference.js';
import { OpenAiInferenceClient } from './openai.inference.js';
import type { InferenceClient } from './inference_client.js';
import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';

export function createInferenceClient(vlm: AppConfig['vlm'], logger: Logger): InferenceClient {
  switch (vlm.provider) {
    case 'gemini': {
      const gemini = new GeminiInferenceClient({
        apiKey: vlm.geminiApiKey,
        model: vlm.model,
        timeoutMs: vlm.timeoutMs
      });
      if (!gemini.isReady()) {
        logger.warn('GEMINI_API_KEY missing, switching to mock inference');
        return new MockInferenceClient();
      }
      return gemini;
    }
    case 'openai':
      return new OpenAiInferenceClient({ apiBase: vlm.apiBase, apiKey: vlm.apiKey, model: vlm.model });
    case 'mock':
      return new MockInferenceClient();
  }
}
