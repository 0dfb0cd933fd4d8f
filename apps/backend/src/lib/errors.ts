export class HandheldError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'HandheldError';
  }
}

export class NotFoundError extends HandheldError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends HandheldError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends HandheldError {
  constructor(message = 'Invalid configuration', details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when no view path yields a template, fallback included.
 */
export class MissingTemplateError extends HandheldError {
  constructor(public readonly view: string, public readonly format: string) {
    super(`Missing template ${view} for format ${format}`, 'MISSING_TEMPLATE', { view, format });
    this.name = 'MissingTemplateError';
  }
}
