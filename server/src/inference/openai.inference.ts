import { z } from 'zod';
import { InferenceError, toInferenceError, type InferenceClient, type InferenceReply } from './inference_client.js';
import { SYSTEM_HINT } from './vlm.prompt.js';
import type { InferenceRequest } from '../relay/relay.types.js';

type OpenAiConfig = {
  apiBase: string;
  apiKey: string;
  model: string;
};

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable()
        })
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional()
    })
    .optional()
});

/**
 * Client for any OpenAI-compatible `/chat/completions` endpoint that accepts
 * image parts (vLLM, SGLang, Ollama, llama.cpp server).
 */
export class OpenAiInferenceClient implements InferenceClient {
  readonly provider = 'openai';
  private readonly endpoint: string;
  private readonly apiKey: string;
  private readonly defaultModel: string;

  constructor(config: OpenAiConfig) {
    this.endpoint = `${config.apiBase.replace(/\/+$/, '')}/chat/completions`;
    this.apiKey = config.apiKey;
    this.defaultModel = config.model;
  }

  isReady(): boolean {
    return this.endpoint.length > 0;
  }

  async testConnection(): Promise<{ ok: boolean; error?: string }> {
    try {
      const response = await fetch(this.endpoint.replace(/\/chat\/completions$/, '/models'), {
        headers: this.headers()
      });
      if (!response.ok) {
        return { ok: false, error: `status_${response.status}` };
      }
      return { ok: true };
    } catch (error) {
      return { ok: false, error: error instanceof Error ? error.message : 'unknown_error' };
    }
  }

  async infer(request: InferenceRequest, signal: AbortSignal): Promise<InferenceReply> {
    const imageUrl = `data:${request.frame.mime};base64,${request.frame.data.toString('base64')}`;
    const body = {
      model: request.model || this.defaultModel,
      max_tokens: request.max_tokens,
      messages: [
        { role: 'system', content: SYSTEM_HINT },
        {
          role: 'user',
          content: [
            { type: 'text', text: request.prompt },
            { type: 'image_url', image_url: { url: imageUrl } }
          ]
        }
      ]
    };

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(body),
        signal
      });
    } catch (error) {
      throw toInferenceError(error);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new InferenceError('http', `VLM request failed: ${response.status} ${text}`.trim());
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new InferenceError('invalid_response', 'VLM response was not JSON', { cause: error });
    }

    const parsed = ChatCompletionSchema.safeParse(payload);
    if (!parsed.success) {
      throw new InferenceError('invalid_response', 'VLM response did not match the chat completion shape');
    }

    const content = parsed.data.choices[0]?.message.content ?? '';
    if (!content.trim()) {
      throw new InferenceError('invalid_response', 'VLM returned an empty completion');
    }
    const usage = parsed.data.usage;
    return {
      text: content,
      usage: {
        prompt_tokens: usage?.prompt_tokens ?? null,
        completion_tokens: usage?.completion_tokens ?? null,
        total_tokens: usage?.total_tokens ?? null
      }
    };
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.apiKey && this.apiKey !== 'EMPTY') {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }
    return headers;
  }
}
