/**
 * Error Types
 *
 * Failure conditions surfaced by configuration loading, input discovery,
 * the report schema registry and the extraction dispatcher.
 */

/**
 * Missing or malformed settings (model name, base URL, numeric tuning values).
 */
export class ConfigurationError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Input path problems: missing path, not a PDF, no PDFs in a directory.
 */
export class InputError extends Error {
  public readonly path: string;

  public constructor(message: string, path: string) {
    super(message);
    this.name = 'InputError';
    this.path = path;
  }
}

export class UnknownReportTypeError extends Error {
  public readonly reportType: string;

  public constructor(reportType: string, message?: string) {
    super(message ?? `Unknown report type: ${reportType}`);
    this.name = 'UnknownReportTypeError';
    this.reportType = reportType;
  }
}

/**
 * Structured extraction did not produce a schema-valid record, either because
 * the backend call failed or because every attempt returned invalid output.
 */
export class ExtractionFailedError extends Error {
  public readonly reportType: string;
  public readonly attempts: number;
  public readonly validationErrors: string[];

  public constructor(
    message: string,
    options: {
      reportType: string;
      attempts: number;
      validationErrors?: string[];
      cause?: unknown;
    }
  ) {
    super(message, { cause: options.cause });
    this.name = 'ExtractionFailedError';
    this.reportType = options.reportType;
    this.attempts = options.attempts;
    this.validationErrors = options.validationErrors ?? [];
  }
}
