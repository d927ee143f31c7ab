/**
 * Custom Error Classes
 * ====================
 * Standardized error classes for the control plane and the inference gateway.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      stack: this.stack,
    };
  }
}

/**
 * Validation error - for input validation failures
 */
export class ValidationError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }
}

/**
 * Not found error - for missing resources
 */
export class NotFoundError extends AppError {
  constructor(resource: string, identifier?: string, context?: Record<string, unknown>) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, identifier, ...context });
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * Service unavailable error - for service unavailability
 */
export class ServiceUnavailableError extends AppError {
  constructor(serviceName: string, context?: Record<string, unknown>) {
    super(`Service '${serviceName}' is currently unavailable`, 'SERVICE_UNAVAILABLE', 503, {
      serviceName,
      ...context,
    });
  }
}

/**
 * Storage error - upload/download/exists failures reported by an object store.
 * Opaque to the registry: the message is shown to the operator as-is.
 */
export class StorageError extends AppError {
  public readonly provider: string;
  public readonly location?: string;

  constructor(
    message: string,
    provider: string,
    location?: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'STORAGE_ERROR', 502, { provider, location, ...context });
    this.provider = provider;
    this.location = location;
  }
}

// ---------------------------------------------------------------------------
// Registry errors
// ---------------------------------------------------------------------------

/**
 * The registry file does not exist yet. Storing a model creates it.
 */
export class NotInitializedError extends AppError {
  constructor(filePath: string) {
    super(
      `Model registry file (${filePath}) not found.\n` +
        'Action: run this command from the project root, or store a model first to create the registry.',
      'REGISTRY_NOT_INITIALIZED',
      404,
      { filePath }
    );
  }
}

export class UnknownModelError extends AppError {
  public readonly modelName: string;

  constructor(modelName: string) {
    super(`Model '${modelName}' not found in registry.`, 'UNKNOWN_MODEL', 404, { modelName });
    this.modelName = modelName;
  }
}

export class UnknownVersionError extends AppError {
  public readonly modelName?: string;
  public readonly commitHash: string;

  constructor(commitHash: string, modelName?: string) {
    super(
      modelName
        ? `Commit hash '${commitHash}' not found for model '${modelName}'.`
        : `Commit hash '${commitHash}' not found in registry.`,
      'UNKNOWN_VERSION',
      404,
      { commitHash, modelName }
    );
    this.modelName = modelName;
    this.commitHash = commitHash;
  }
}

/**
 * The registry file exists but cannot be parsed or violates its invariants.
 * Not operational: an operator has to repair the file.
 */
export class CorruptDataError extends AppError {
  constructor(message: string, filePath: string, context?: Record<string, unknown>) {
    super(message, 'CORRUPT_REGISTRY', 500, { filePath, ...context }, false);
  }
}

/**
 * Caller-side contract violation (e.g. "latest" selector without a model name).
 */
export class InvalidArgumentError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_ARGUMENT', 400, context);
  }
}

/**
 * Source-control working tree has uncommitted changes.
 */
export class DirtyRepositoryError extends AppError {
  public readonly uncommittedFiles: string[];

  constructor(uncommittedFiles: string[]) {
    super(
      'Repository has uncommitted changes.\n' +
        `Uncommitted files: ${uncommittedFiles.join(', ')}\n` +
        'Action: commit or stash your changes before storing a model artifact.',
      'DIRTY_REPOSITORY',
      409,
      { uncommittedFiles }
    );
    this.uncommittedFiles = uncommittedFiles;
  }
}
