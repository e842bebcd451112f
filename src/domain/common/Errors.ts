/**
 * Base application error.
 */
export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: true,
      statusCode: this.statusCode,
      code: this.code,
      message: this.message,
      details: this.details
    };
  }
}

/**
 * Validation error (400).
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(400, 'VALIDATION_ERROR', message, details);
  }
}

/**
 * Workflow type missing from the template catalog (400).
 */
export class UnknownTemplateError extends AppError {
  constructor(public readonly workflowType: string) {
    super(400, 'UNKNOWN_TEMPLATE', `Unknown workflow type: ${workflowType}`);
  }
}

/**
 * Not found error (404).
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(404, 'NOT_FOUND', message);
  }
}

/**
 * Id collision on creation (409).
 */
export class ConflictError extends AppError {
  constructor(resource: string, id: string) {
    super(409, 'CONFLICT', `${resource} with id '${id}' already exists`);
  }
}

/**
 * Mutation that would move an entity backwards through its lifecycle (409).
 */
export class InvalidStateError extends AppError {
  constructor(message: string, details?: unknown) {
    super(409, 'INVALID_STATE', message, details);
  }
}

/**
 * Configuration error (500).
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(500, 'CONFIG_ERROR', message, details);
  }
}
