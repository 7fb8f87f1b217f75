/**
 * Structured Generation Backend Types
 *
 * The dispatcher talks to the model through this interface so that the
 * OpenAI-compatible client can be swapped for an in-process stand-in.
 */

import type { JsonSchema } from '../schemas';
import type { GenerationSettings, TokenUsage } from '../types';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface GenerationRequest {
  model: string;
  messages: ChatMessage[];
  /** Output contract, sent as a json_schema response format */
  responseSchema: {
    name: string;
    schema: JsonSchema;
  };
  settings: GenerationSettings;
}

export interface GenerationResponse {
  /** Raw message content; expected to be a JSON document */
  content: string | null;
  requestId: string;
  model: string;
  usage?: TokenUsage;
}

export interface StructuredGenerationBackend {
  /** Provider label used in logs */
  readonly provider: string;

  /**
   * Run one chat completion. Transport and HTTP failures are thrown as-is.
   */
  generate(request: GenerationRequest): Promise<GenerationResponse>;
}
