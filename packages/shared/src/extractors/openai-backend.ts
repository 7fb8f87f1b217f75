/**
 * OpenAI-compatible Structured Generation Backend
 *
 * Works against api.openai.com as well as OpenRouter, vLLM, Ollama and other
 * servers exposing /chat/completions with json_schema response formats.
 */

import OpenAI from 'openai';
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { GenerationSettings } from '../types';
import type {
  ChatMessage,
  GenerationRequest,
  GenerationResponse,
  StructuredGenerationBackend,
} from './generation';

/** Sampling fields outside the OpenAI request type; passed through in the body. */
type SamplingExtensions = Pick<GenerationSettings, 'top_k' | 'repetition_penalty' | 'min_p' | 'top_a'>;

export interface OpenAiBackendOptions {
  baseUrl: string;
  apiKey?: string;
  /** Request timeout in milliseconds */
  timeoutMs: number;
  /** SDK-level retries for connection errors, 429 and 5xx responses */
  maxRetries: number;
}

function toMessageParam(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
  }
}

export class OpenAiGenerationBackend implements StructuredGenerationBackend {
  readonly provider = 'openai-compatible';

  private readonly client: OpenAI;

  constructor(options: OpenAiBackendOptions) {
    this.client = new OpenAI({
      baseURL: options.baseUrl,
      // Local servers ignore the key, but the SDK refuses to start without one
      apiKey: options.apiKey || 'unused',
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries,
    });
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    const { settings } = request;

    const body: ChatCompletionCreateParamsNonStreaming & SamplingExtensions = {
      model: request.model,
      messages: request.messages.map(toMessageParam),
      response_format: {
        type: 'json_schema',
        json_schema: {
          name: request.responseSchema.name,
          schema: request.responseSchema.schema,
          // Optional fields are allowed, which strict mode rejects
          strict: false,
        },
      },
      temperature: settings.temperature,
      top_p: settings.top_p,
      frequency_penalty: settings.frequency_penalty,
      presence_penalty: settings.presence_penalty,
      max_tokens: settings.max_tokens,
      top_k: settings.top_k,
      repetition_penalty: settings.repetition_penalty,
      min_p: settings.min_p,
      top_a: settings.top_a,
    };

    const response = await this.client.chat.completions.create(body);

    return {
      content: response.choices[0]?.message?.content ?? null,
      requestId: response.id || `req_${Date.now()}`,
      model: response.model || request.model,
      usage: response.usage
        ? {
            promptTokens: response.usage.prompt_tokens,
            completionTokens: response.usage.completion_tokens,
            totalTokens: response.usage.total_tokens,
          }
        : undefined,
    };
  }
}
