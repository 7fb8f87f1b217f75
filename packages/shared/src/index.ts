/**
 * Shared Package - Main Export
 */

// Context
export { getContext, getCorrelationId, runWithContextAsync, type RequestContext } from './context';

// Logger
export { logger, isLogLevel, LOG_LEVELS, type LogContext, type LogLevel } from './logger';

// Config
export {
  loadConfig,
  isUnknownReportTypePolicy,
  DEFAULT_GENERATION_SETTINGS,
  UNKNOWN_REPORT_TYPE_POLICIES,
  type Config,
  type UnknownReportTypePolicy,
} from './config';

// Errors
export { ConfigurationError, InputError, UnknownReportTypeError, ExtractionFailedError } from './errors';

// Types
export * from './types';

// Schemas
export {
  loadSchema,
  compileSchema,
  validateAgainstSchema,
  formatValidationErrors,
  type JsonSchema,
  type ValidationResult,
} from './schemas';

// Templates
export {
  getTemplateForReportType,
  renderUserPrompt,
  BASE_EXTRACTION_RULES,
  BASE_USER_PROMPT,
  IKC_TEMPLATE,
  AKH_TEMPLATE,
  GENERIC_TEMPLATE,
  type ExtractionTemplate,
} from './templates';

// Report schema registry
export {
  getReportDefinition,
  getReportSchema,
  getReportTemplate,
  getAvailableReportTypes,
  parseReportType,
  isReportType,
  isExtractionTarget,
  validateReport,
  checkReport,
  type ReportDefinition,
  type ReportCheck,
} from './reports/registry';

// Structured extraction
export {
  extractStructured,
  stripCodeFence,
  emptyUsage,
  addUsage,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_BACKOFF_MS,
  type StructuredExtractionOptions,
  type StructuredExtractionResult,
} from './extractors/structured-extraction';
export { OpenAiGenerationBackend, type OpenAiBackendOptions } from './extractors/openai-backend';
export type {
  ChatMessage,
  GenerationRequest,
  GenerationResponse,
  StructuredGenerationBackend,
} from './extractors/generation';
