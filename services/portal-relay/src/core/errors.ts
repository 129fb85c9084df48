export class RelayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'RelayError';
    Object.setPrototypeOf(this, RelayError.prototype);
  }

  attachDetails(details: Record<string, unknown>): this {
    this.details = { ...this.details, ...details };
    return this;
  }
}

/** Malformed caller input, rejected before any workspace is allocated. */
export class ValidationError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/** A caller-supplied URL could not be fetched. */
export class DownloadError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DOWNLOAD_FAILED', 400, details);
    this.name = 'DownloadError';
    Object.setPrototypeOf(this, DownloadError.prototype);
  }
}

export class AutomationError extends RelayError {
  constructor(message: string, code = 'AUTOMATION_FAILED', details?: Record<string, unknown>) {
    super(message, code, 500, details);
    this.name = 'AutomationError';
    Object.setPrototypeOf(this, AutomationError.prototype);
  }
}

export class AutomationTimeoutError extends AutomationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'AUTOMATION_TIMEOUT', details);
    this.name = 'AutomationTimeoutError';
    Object.setPrototypeOf(this, AutomationTimeoutError.prototype);
  }
}

export class ConversionError extends RelayError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONVERSION_FAILED', 500, details);
    this.name = 'ConversionError';
    Object.setPrototypeOf(this, ConversionError.prototype);
  }
}

export class NotFoundError extends RelayError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND') {
    super(message, code, 404);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ExpiredError extends RelayError {
  constructor(message = 'Resource has expired', code = 'EXPIRED') {
    super(message, code, 410);
    this.name = 'ExpiredError';
    Object.setPrototypeOf(this, ExpiredError.prototype);
  }
}

/** The filesystem refused to create a scratch directory. */
export class ResourceExhaustedError extends RelayError {
  constructor(message: string) {
    super(message, 'RESOURCE_EXHAUSTED', 500);
    this.name = 'ResourceExhaustedError';
    Object.setPrototypeOf(this, ResourceExhaustedError.prototype);
  }
}

export class DuplicateKeyError extends RelayError {
  constructor(key: string) {
    super(`Artifact already registered: ${key}`, 'DUPLICATE_KEY', 500);
    this.name = 'DuplicateKeyError';
    Object.setPrototypeOf(this, DuplicateKeyError.prototype);
  }
}

export class ConfigurationError extends RelayError {
  constructor(message: string) {
    super(message, 'NOT_CONFIGURED', 503);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

export function errorMessage(error: unknown, fallback = 'Unknown error'): string {
  return error instanceof Error ? error.message : fallback;
}
