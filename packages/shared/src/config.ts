/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 * CLI flags override the model connection and policy values at run time.
 */

import { ConfigurationError } from './errors';
import { isLogLevel, type LogLevel } from './logger';
import { REPORT_TYPES, type GenerationSettings, type ReportType } from './types';

/**
 * What to do when a report type cannot be inferred from a filename:
 * - 'default': use the configured default report type and warn
 * - 'fail': treat the file as failed
 * - 'generic': extract into the generic sections-list report
 */
export type UnknownReportTypePolicy = 'default' | 'fail' | 'generic';

export const UNKNOWN_REPORT_TYPE_POLICIES: readonly UnknownReportTypePolicy[] = [
  'default',
  'fail',
  'generic',
];

export function isUnknownReportTypePolicy(value: string): value is UnknownReportTypePolicy {
  return (UNKNOWN_REPORT_TYPE_POLICIES as readonly string[]).includes(value);
}

export const DEFAULT_GENERATION_SETTINGS: GenerationSettings = {
  temperature: 0.1,
  top_p: 1.0,
  top_k: 0,
  frequency_penalty: 0.0,
  presence_penalty: 0.0,
  repetition_penalty: 1.1,
  min_p: 0.0,
  top_a: 0.0,
  max_tokens: 32000,
};

export interface Config {
  // LLM endpoint
  modelName?: string;
  baseUrl?: string;
  apiKey?: string;
  llmRequestTimeoutMs: number;
  llmHttpMaxRetries: number;

  // Structured extraction
  extractionMaxAttempts: number;
  extractionRetryBackoffMs: number;
  generation: GenerationSettings;

  // Report type detection
  defaultReportType: ReportType;
  unknownReportTypePolicy: UnknownReportTypePolicy;

  // Logging
  logLevel: LogLevel;
  debugLlmPrompts: boolean;
  debugLlmPromptsDir: string;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseNumber(env: Env, name: string, fallback: number): number {
  const raw = nonEmpty(env[name]);
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function parseInteger(env: Env, name: string, fallback: number, min: number): number {
  const value = parseNumber(env, name, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${name} must be an integer >= ${min}, got "${value}"`);
  }
  return value;
}

function parseReportType(env: Env): ReportType {
  const raw = (nonEmpty(env.DEFAULT_REPORT_TYPE) || 'IKC').toUpperCase();
  const match = REPORT_TYPES.find((type) => type === raw);
  if (!match) {
    throw new ConfigurationError(
      `DEFAULT_REPORT_TYPE must be one of ${REPORT_TYPES.join(', ')}, got "${raw}"`
    );
  }
  return match;
}

function parsePolicy(env: Env): UnknownReportTypePolicy {
  const raw = (nonEmpty(env.UNKNOWN_REPORT_TYPE_POLICY) || 'default').toLowerCase();
  if (!isUnknownReportTypePolicy(raw)) {
    throw new ConfigurationError(
      `UNKNOWN_REPORT_TYPE_POLICY must be one of ${UNKNOWN_REPORT_TYPE_POLICIES.join(', ')}, got "${raw}"`
    );
  }
  return raw;
}

function parseLogLevel(env: Env): LogLevel {
  const raw = (nonEmpty(env.LOG_LEVEL) || 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

/**
 * Build a Config from environment variables.
 *
 * @throws ConfigurationError on malformed numeric or enum values
 */
export function loadConfig(env: Env = process.env): Config {
  const defaults = DEFAULT_GENERATION_SETTINGS;

  return {
    // LLM endpoint
    modelName: nonEmpty(env.MODEL_NAME),
    baseUrl: nonEmpty(env.BASE_URL),
    apiKey: nonEmpty(env.API_KEY),
    llmRequestTimeoutMs: parseInteger(env, 'LLM_REQUEST_TIMEOUT_MS', 120000, 1),
    llmHttpMaxRetries: parseInteger(env, 'LLM_HTTP_MAX_RETRIES', 2, 0),

    // Structured extraction
    extractionMaxAttempts: parseInteger(env, 'EXTRACTION_MAX_ATTEMPTS', 3, 1),
    extractionRetryBackoffMs: parseInteger(env, 'EXTRACTION_RETRY_BACKOFF_MS', 500, 0),
    generation: {
      temperature: parseNumber(env, 'LLM_TEMPERATURE', defaults.temperature),
      top_p: parseNumber(env, 'LLM_TOP_P', defaults.top_p),
      top_k: parseInteger(env, 'LLM_TOP_K', defaults.top_k, 0),
      frequency_penalty: parseNumber(env, 'LLM_FREQUENCY_PENALTY', defaults.frequency_penalty),
      presence_penalty: parseNumber(env, 'LLM_PRESENCE_PENALTY', defaults.presence_penalty),
      repetition_penalty: parseNumber(env, 'LLM_REPETITION_PENALTY', defaults.repetition_penalty),
      min_p: parseNumber(env, 'LLM_MIN_P', defaults.min_p),
      top_a: parseNumber(env, 'LLM_TOP_A', defaults.top_a),
      max_tokens: parseInteger(env, 'LLM_MAX_TOKENS', defaults.max_tokens, 1),
    },

    // Report type detection
    defaultReportType: parseReportType(env),
    unknownReportTypePolicy: parsePolicy(env),

    // Logging
    logLevel: parseLogLevel(env),
    debugLlmPrompts: Boolean(nonEmpty(env.DEBUG_LLM_PROMPTS)),
    debugLlmPromptsDir: nonEmpty(env.DEBUG_LLM_PROMPTS_DIR) || '/tmp/labparse-llm-debug',
  };
}
