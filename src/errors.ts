export interface FieldIssue {
  field: string;
  message: string;
}

/**
 * Base class for errors that map onto an HTTP error response.
 * `code` is stable and safe to show to clients; `message` must never carry
 * upstream URLs or credentials.
 */
export class AppError extends Error {
  readonly code: string;
  readonly status: number;
  readonly details?: unknown;

  constructor(code: string, message: string, status: number, details?: unknown, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.status = status;
    this.details = details;
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super('VALIDATION_ERROR', 'Invalid request data', 400, issues);
    this.issues = issues;
    this.name = 'ValidationError';
  }
}

export class InferenceUnavailableError extends AppError {
  constructor(options?: ErrorOptions) {
    super('INFERENCE_UNAVAILABLE', 'The inference service is currently unavailable', 502, undefined, options);
    this.name = 'InferenceUnavailableError';
  }
}

export class ConfigError extends Error {
  readonly fields: Partial<Record<string, string[]>>;

  constructor(fields: Partial<Record<string, string[]>>) {
    super(`Invalid environment configuration: ${Object.keys(fields).join(', ')}`);
    this.fields = fields;
    this.name = 'ConfigError';
  }
}
