/**
 * labparse CLI
 *
 * labparse parse <input> [options]
 *
 * Parses one lab-report PDF, or every PDF in a directory, into structured
 * JSON records.
 */

import fs from 'fs';
import path from 'path';
import chalk from 'chalk';
import {
  logger,
  loadConfig,
  parseReportType,
  isUnknownReportTypePolicy,
  UNKNOWN_REPORT_TYPE_POLICIES,
  InputError,
  type Config,
  type ExtractionTarget,
  type StructuredGenerationBackend,
  type UnknownReportTypePolicy,
} from '@labparse/shared';
import { runBatch, type BatchSummary } from './lib/batch';
import { assertReadablePdf, type DocumentTextExtractor } from './lib/document';
import { resolveInputFiles, type ResolvedInput } from './lib/input';
import type { ProcessFileOptions } from './lib/process-file';

export const HELP_TEXT = `Usage: labparse parse <input> [options]

Parse lab-report PDFs and extract structured data.
<input> is a PDF file or a directory of PDF files.

Options:
  -a, --report-type <type>   IKC, AKH or GENERIC. Detected from the filename when omitted.
  -o, --output-dir <dir>     Output directory. Defaults to the input's directory.
  -t, --save-txt             Also save the extracted text as <name>.txt
  -v, --verbose              Enable verbose logging and full error details
  -m, --model-name <name>    LLM model name. Falls back to MODEL_NAME.
  -u, --base-url <url>       Base URL of the LLM API. Falls back to BASE_URL.
  -k, --api-key <key>        API key for the LLM service. Falls back to API_KEY.
      --on-unknown <policy>  default, fail or generic: what to do when the filename
                             carries no report type. Falls back to UNKNOWN_REPORT_TYPE_POLICY.
      --max-attempts <n>     Model calls per file before giving up on invalid output.
                             Falls back to EXTRACTION_MAX_ATTEMPTS.
  -h, --help                 Show this help`;

export interface CliOptions {
  command: 'parse' | 'help';
  inputPath?: string;
  reportType?: ExtractionTarget;
  outputDir?: string;
  saveTxt: boolean;
  verbose: boolean;
  modelName?: string;
  baseUrl?: string;
  apiKey?: string;
  onUnknown?: UnknownReportTypePolicy;
  maxAttempts?: number;
}

export class UsageError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type ValueFlag =
  | 'reportType'
  | 'outputDir'
  | 'modelName'
  | 'baseUrl'
  | 'apiKey'
  | 'onUnknown'
  | 'maxAttempts';

const VALUE_FLAGS: Record<string, ValueFlag> = {
  '-a': 'reportType',
  '--report-type': 'reportType',
  '--analysis-type': 'reportType',
  '-o': 'outputDir',
  '--output-dir': 'outputDir',
  '-m': 'modelName',
  '--model-name': 'modelName',
  '-u': 'baseUrl',
  '--base-url': 'baseUrl',
  '-k': 'apiKey',
  '--api-key': 'apiKey',
  '--on-unknown': 'onUnknown',
  '--max-attempts': 'maxAttempts',
};

function applyValue(options: CliOptions, flag: ValueFlag, token: string, value: string): void {
  switch (flag) {
    case 'reportType':
      try {
        options.reportType = parseReportType(value);
      } catch (error) {
        throw new UsageError(error instanceof Error ? error.message : String(error));
      }
      return;

    case 'onUnknown': {
      const policy = value.toLowerCase();
      if (!isUnknownReportTypePolicy(policy)) {
        throw new UsageError(
          `Invalid value for ${token}: "${value}". Expected one of: ${UNKNOWN_REPORT_TYPE_POLICIES.join(', ')}`
        );
      }
      options.onUnknown = policy;
      return;
    }

    case 'maxAttempts': {
      const attempts = Number(value);
      if (!Number.isInteger(attempts) || attempts < 1) {
        throw new UsageError(`Invalid value for ${token}: "${value}". Expected an integer >= 1`);
      }
      options.maxAttempts = attempts;
      return;
    }

    default:
      options[flag] = value;
  }
}

/**
 * @throws UsageError on unknown flags, missing values or a missing input path
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const options: CliOptions = { command: 'parse', saveTxt: false, verbose: false };
  const positional: string[] = [];

  for (let index = 0; index < argv.length; index++) {
    const token = argv[index];

    if (token === '-h' || token === '--help') {
      return { ...options, command: 'help' };
    }
    if (token === '-t' || token === '--save-txt') {
      options.saveTxt = true;
      continue;
    }
    if (token === '-v' || token === '--verbose') {
      options.verbose = true;
      continue;
    }

    const [name, inlineValue] = token.startsWith('--') && token.includes('=')
      ? [token.slice(0, token.indexOf('=')), token.slice(token.indexOf('=') + 1)]
      : [token, undefined];
    const flag = VALUE_FLAGS[name];

    if (flag) {
      const value = inlineValue ?? argv[index + 1];
      if (value === undefined || value === '' || (inlineValue === undefined && value.startsWith('-'))) {
        throw new UsageError(`Missing value after ${name}`);
      }
      if (inlineValue === undefined) {
        index++;
      }
      applyValue(options, flag, name, value);
      continue;
    }

    if (token.startsWith('-') && token !== '-') {
      throw new UsageError(`Unknown option: ${token}`);
    }
    positional.push(token);
  }

  const [command, inputPath, ...rest] = positional;
  if (command !== 'parse') {
    throw new UsageError(command ? `Unknown command: ${command}` : 'Missing command: parse');
  }
  if (!inputPath) {
    throw new UsageError('Missing input path');
  }
  if (rest.length > 0) {
    throw new UsageError(`Unexpected argument: ${rest[0]}`);
  }

  return { ...options, inputPath };
}

export interface CliRuntime {
  /** Environment to read configuration from; process.env by default */
  env?: Record<string, string | undefined>;
  /** PDF-to-text converter; pdfjs-dist by default */
  textExtractor?: DocumentTextExtractor;
  /** Generation backend; an OpenAI-compatible client by default */
  backend?: StructuredGenerationBackend;
}

function fail(message: string): number {
  console.error(chalk.red(`✖ ${message}`));
  return 1;
}

function printSummary(summary: BatchSummary, outputDir: string, verbose: boolean): void {
  const failedText = `${summary.failed} failed`;

  console.log('');
  console.log(
    summary.failed === 0
      ? chalk.bold.green(`✨ Processing completed: ${summary.succeeded} succeeded, ${failedText}`)
      : chalk.bold.yellow(`Processing completed: ${summary.succeeded} succeeded, ${chalk.red(failedText)}`)
  );
  console.log(`📁 Output directory: ${outputDir}`);
  console.log(`🔢 Tokens used: ${summary.usage.totalTokens}`);

  for (const result of summary.results.filter((r) => !r.success)) {
    console.log(chalk.red(`  ✖ ${path.basename(result.file)}: ${result.error?.message ?? 'unknown error'}`));
  }

  if (summary.failed > 0 && !verbose) {
    console.log(chalk.dim('Run with --verbose for full error details.'));
  }
}

function buildProcessOptions(
  options: CliOptions,
  config: Config,
  connection: ProcessFileOptions['connection'],
  outputDir: string
): ProcessFileOptions {
  return {
    outputDir,
    saveTxt: options.saveTxt,
    reportType: options.reportType,
    detection: {
      policy: options.onUnknown ?? config.unknownReportTypePolicy,
      defaultReportType: config.defaultReportType,
    },
    connection,
    extraction: {
      settings: config.generation,
      maxAttempts: options.maxAttempts ?? config.extractionMaxAttempts,
      retryBackoffMs: config.extractionRetryBackoffMs,
      timeoutMs: config.llmRequestTimeoutMs,
      httpMaxRetries: config.llmHttpMaxRetries,
      debugPromptsDir: config.debugLlmPrompts ? config.debugLlmPromptsDir : undefined,
    },
  };
}

/**
 * Run the CLI and return the process exit code.
 *
 * Exit code 1 is reserved for setup errors; files that fail during a batch
 * are reported in the summary and still exit 0.
 */
export async function runCli(argv: string[], runtime: CliRuntime = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(HELP_TEXT);
    return fail(error instanceof Error ? error.message : String(error));
  }

  if (options.command === 'help' || !options.inputPath) {
    console.log(HELP_TEXT);
    return 0;
  }

  let config: Config;
  try {
    config = loadConfig(runtime.env ?? process.env);
  } catch (error) {
    return fail(error instanceof Error ? error.message : String(error));
  }

  logger.setLevel(options.verbose ? 'debug' : config.logLevel);
  logger.debug('Verbose logging enabled');

  // CLI flags win over environment variables
  const modelName = options.modelName || config.modelName;
  const baseUrl = options.baseUrl || config.baseUrl;
  const apiKey = options.apiKey || config.apiKey;

  if (!modelName) {
    return fail('Model name is required. Provide --model-name or set MODEL_NAME environment variable.');
  }
  if (!baseUrl) {
    return fail('Base URL is required. Provide --base-url or set BASE_URL environment variable.');
  }

  logger.debug('Using model', { model: modelName, base_url: baseUrl, api_key_provided: Boolean(apiKey) });

  let input: ResolvedInput;
  try {
    input = resolveInputFiles(options.inputPath);
    // A single named file that cannot be parsed is a usage error, not a batch failure
    if (!input.isDirectory) {
      assertReadablePdf(input.files[0]);
    }
  } catch (error) {
    if (error instanceof InputError) {
      return fail(error.message);
    }
    throw error;
  }

  const outputDir = options.outputDir ? path.resolve(options.outputDir) : input.baseDir;
  try {
    fs.mkdirSync(outputDir, { recursive: true });
  } catch (error) {
    return fail(`Cannot create output directory ${outputDir}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const textExtractor = runtime.textExtractor ?? (await import('./lib/pdf')).pdfTextExtractor;
  const processOptions = buildProcessOptions(options, config, { modelName, baseUrl, apiKey }, outputDir);

  console.log(chalk.bold(`Parsing ${input.files.length} PDF file(s) with ${modelName}`));

  const summary = await runBatch(
    input.files,
    processOptions,
    { textExtractor, backend: runtime.backend },
    (index, total, file) => {
      console.log(`${chalk.dim(`[${index}/${total}]`)} ${path.basename(file)}`);
    }
  );

  printSummary(summary, outputDir, options.verbose);
  return 0;
}
