/**
 * Structured Extraction Dispatcher
 *
 * Selects the report schema for a tag, asks the model for a record matching
 * it, validates the answer and re-asks with the validation errors until the
 * record validates or the attempt budget is spent.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_GENERATION_SETTINGS } from '../config';
import { ConfigurationError, ExtractionFailedError } from '../errors';
import { logger } from '../logger';
import {
  checkReport,
  getReportDefinition,
  getReportSchema,
  getReportTemplate,
  type ReportCheck,
} from '../reports/registry';
import type { JsonSchema } from '../schemas';
import { renderUserPrompt } from '../templates';
import type {
  ExtractionTarget,
  GenerationSettings,
  ModelConnection,
  ReportByTarget,
  TokenUsage,
} from '../types';
import type { ChatMessage, GenerationResponse, StructuredGenerationBackend } from './generation';
import { OpenAiGenerationBackend } from './openai-backend';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_BACKOFF_MS = 500;
const DEFAULT_TIMEOUT_MS = 120000;
const DEFAULT_HTTP_MAX_RETRIES = 2;

export interface StructuredExtractionOptions {
  /** Generation backend; an OpenAI-compatible client built from the connection if omitted */
  backend?: StructuredGenerationBackend;
  /** Overrides for individual sampling parameters */
  settings?: Partial<GenerationSettings>;
  /** Total model calls allowed before giving up on invalid output */
  maxAttempts?: number;
  /** Delay before retry n is n times this value */
  retryBackoffMs?: number;
  timeoutMs?: number;
  httpMaxRetries?: number;
  /** File name shown to the model and in logs */
  sourceFilename?: string;
  /** When set, prompts are written to this directory for inspection */
  debugPromptsDir?: string;
}

export interface StructuredExtractionResult<T extends ExtractionTarget> {
  report: ReportByTarget[T];
  reportType: T;
  model: string;
  requestId: string;
  attempts: number;
  durationMs: number;
  usage: TokenUsage;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function emptyUsage(): TokenUsage {
  return { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
}

export function addUsage(total: TokenUsage, usage: TokenUsage | undefined): TokenUsage {
  if (!usage) {
    return total;
  }
  return {
    promptTokens: total.promptTokens + usage.promptTokens,
    completionTokens: total.completionTokens + usage.completionTokens,
    totalTokens: total.totalTokens + usage.totalTokens,
  };
}

/**
 * Drop the document keywords ($schema, $id) that some OpenAI-compatible
 * servers refuse inside a response format.
 */
function toResponseSchema(schema: JsonSchema): JsonSchema {
  return Object.fromEntries(
    Object.entries(schema).filter(([key]) => key !== '$schema' && key !== '$id')
  );
}

/**
 * Models served without native json_schema support tend to wrap the
 * document in a markdown code fence.
 */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  const match = /^```(?:json)?\s*\n([\s\S]*?)\n?```$/.exec(trimmed);
  return match ? match[1] : trimmed;
}

function checkOutput<T extends ExtractionTarget>(reportType: T, content: string | null): ReportCheck<T> {
  if (!content || !content.trim()) {
    return { valid: false, errors: ['Response was empty'] };
  }

  let data: unknown;
  try {
    data = JSON.parse(stripCodeFence(content));
  } catch (error) {
    return {
      valid: false,
      errors: [`Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`],
    };
  }

  return checkReport(reportType, data);
}

function buildCorrectionPrompt(errors: string[]): string {
  return [
    'The previous response did not match the required schema:',
    ...errors.map((e) => `- ${e}`),
    'Fix these errors and return the complete JSON object again.',
  ].join('\n');
}

/**
 * Debug: Write LLM prompts to disk for inspection
 */
function debugWritePrompts(
  debugDir: string,
  sourceFilename: string,
  reportType: ExtractionTarget,
  systemPrompt: string,
  userPrompt: string
): void {
  try {
    fs.mkdirSync(debugDir, { recursive: true });

    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    const baseFilename = `${timestamp}_${path.parse(sourceFilename).name}_${reportType}`;

    fs.writeFileSync(path.join(debugDir, `${baseFilename}_system_prompt.txt`), systemPrompt);
    fs.writeFileSync(path.join(debugDir, `${baseFilename}_user_prompt.txt`), userPrompt);

    logger.info('Debug: wrote LLM prompts to disk', {
      debug_dir: debugDir,
      files: [`${baseFilename}_system_prompt.txt`, `${baseFilename}_user_prompt.txt`],
    });
  } catch (err) {
    logger.warn('Debug: failed to write LLM prompts', { error: String(err) });
  }
}

/**
 * Extract a structured lab report from document text.
 *
 * @param text - Document text; empty text is sent as is
 * @param reportType - Which report schema the output must satisfy
 * @param connection - Model endpoint; modelName and baseUrl must be non-empty
 * @throws ConfigurationError when the connection is incomplete
 * @throws UnknownReportTypeError when reportType is not a known tag
 * @throws ExtractionFailedError when the backend call fails or no attempt validates
 */
export async function extractStructured<T extends ExtractionTarget>(
  text: string,
  reportType: T,
  connection: ModelConnection,
  options: StructuredExtractionOptions = {}
): Promise<StructuredExtractionResult<T>> {
  if (!connection.modelName.trim()) {
    throw new ConfigurationError('Model name is required for structured extraction');
  }
  if (!connection.baseUrl.trim()) {
    throw new ConfigurationError('Base URL is required for structured extraction');
  }

  const definition = getReportDefinition(reportType);
  const template = getReportTemplate(reportType);
  const schema = toResponseSchema(getReportSchema(reportType));
  const settings: GenerationSettings = { ...DEFAULT_GENERATION_SETTINGS, ...options.settings };
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const retryBackoffMs = options.retryBackoffMs ?? DEFAULT_RETRY_BACKOFF_MS;
  const sourceFilename = options.sourceFilename ?? 'document';

  const backend =
    options.backend ??
    new OpenAiGenerationBackend({
      baseUrl: connection.baseUrl,
      apiKey: connection.apiKey,
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: options.httpMaxRetries ?? DEFAULT_HTTP_MAX_RETRIES,
    });

  const userPrompt = renderUserPrompt(template, { sourceFilename, documentText: text });

  if (options.debugPromptsDir) {
    debugWritePrompts(options.debugPromptsDir, sourceFilename, reportType, template.systemPrompt, userPrompt);
  }

  const messages: ChatMessage[] = [
    { role: 'system', content: template.systemPrompt },
    { role: 'user', content: userPrompt },
  ];

  logger.info('Extracting structured report', {
    provider: backend.provider,
    model: connection.modelName,
    report_type: reportType,
    template_description: template.description,
    text_length: text.length,
    max_attempts: maxAttempts,
  });

  const startTime = Date.now();
  let usage = emptyUsage();
  let lastErrors: string[] = [];

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    if (attempt > 1 && retryBackoffMs > 0) {
      await sleep(retryBackoffMs * (attempt - 1));
    }

    let response: GenerationResponse;
    try {
      response = await backend.generate({
        model: connection.modelName,
        messages,
        responseSchema: { name: definition.schemaName, schema },
        settings,
      });
    } catch (error) {
      logger.error('Structured generation request failed', error, {
        model: connection.modelName,
        report_type: reportType,
        attempt,
        duration_ms: Date.now() - startTime,
      });
      throw new ExtractionFailedError(
        `Structured generation request failed: ${error instanceof Error ? error.message : String(error)}`,
        { reportType, attempts: attempt, cause: error }
      );
    }

    usage = addUsage(usage, response.usage);
    const check = checkOutput(reportType, response.content);

    if (check.valid) {
      const durationMs = Date.now() - startTime;

      logger.info('Structured extraction complete', {
        model: response.model,
        request_id: response.requestId,
        report_type: reportType,
        attempts: attempt,
        duration_ms: durationMs,
        prompt_tokens: usage.promptTokens,
        completion_tokens: usage.completionTokens,
        total_tokens: usage.totalTokens,
      });

      return {
        report: check.report,
        reportType,
        model: response.model,
        requestId: response.requestId,
        attempts: attempt,
        durationMs,
        usage,
      };
    }

    lastErrors = check.errors;
    logger.warn('Model output did not match schema', {
      report_type: reportType,
      attempt,
      max_attempts: maxAttempts,
      error_count: check.errors.length,
      errors: check.errors.slice(0, 10),
    });

    messages.push(
      { role: 'assistant', content: response.content ?? '' },
      { role: 'user', content: buildCorrectionPrompt(check.errors) }
    );
  }

  throw new ExtractionFailedError(
    `Model output did not match the ${reportType} schema after ${maxAttempts} attempts`,
    { reportType, attempts: maxAttempts, validationErrors: lastErrors }
  );
}
