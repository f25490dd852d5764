import { GoogleGenerativeAI } from '@google/generative-ai';
import { InferenceError, toInferenceError, type InferenceClient, type InferenceReply } from './inference_client.js';
import { SYSTEM_HINT } from './vlm.prompt.js';
import type { InferenceRequest } from '../relay/relay.types.js';

type GeminiConfig = {
  apiKey: string;
  model: string;
  timeoutMs: number;
};

export class GeminiInferenceClient implements InferenceClient {
  readonly provider = 'gemini';
  private readonly client?: GoogleGenerativeAI;
  private readonly defaultModel: string;
  private readonly timeoutMs: number;

  constructor(config: GeminiConfig) {
    this.defaultModel = config.model;
    this.timeoutMs = config.timeoutMs;
    if (config.apiKey) {
      this.client = new GoogleGenerativeAI(config.apiKey);
    }
  }

  isReady(): boolean {
    return Boolean(this.client);
  }

  async testConnection(): Promise<{ ok: boolean; error?: string }> {
    if (!this.client) {
      return { ok: false, error: 'missing_api_key' };
    }
    try {
      const model = this.client.getGenerativeModel({ model: this.defaultModel });
      const result = await model.generateContent('Reply with the single word ok.');
      return result.response.text().trim().length > 0 ? { ok: true } : { ok: false, error: 'invalid_response' };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : 'unknown_error' };
    }
  }

  async infer(request: InferenceRequest, signal: AbortSignal): Promise<InferenceReply> {
    if (!this.client) {
      throw new InferenceError('unavailable', 'Gemini API key missing');
    }

    const model = this.client.getGenerativeModel(
      {
        model: request.model,
        systemInstruction: SYSTEM_HINT,
        generationConfig: { maxOutputTokens: request.max_tokens }
      },
      { timeout: this.timeoutMs }
    );

    let text: string;
    let usage: InferenceReply['usage'];
    try {
      const result = await model.generateContent(
        [
          { text: request.prompt },
          { inlineData: { data: request.frame.data.toString('base64'), mimeType: request.frame.mime } }
        ],
        { signal }
      );
      text = result.response.text();
      const metadata = result.response.usageMetadata;
      usage = {
        prompt_tokens: metadata?.promptTokenCount ?? null,
        completion_tokens: metadata?.candidatesTokenCount ?? null,
        total_tokens: metadata?.totalTokenCount ?? null
      };
    } catch (error) {
      throw toInferenceError(error);
    }

    if (!text.trim()) {
      throw new InferenceError('invalid_response', 'Gemini returned an empty response');
    }
    return { text, usage };
  }
}
