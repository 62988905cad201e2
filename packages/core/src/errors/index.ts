/**
 * Custom Error Classes
 */

/**
 * Base error class for all pylayer errors
 */
export class PyLayerError extends Error {
  public readonly code: string;
  public readonly exitCode: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    exitCode: number = 1,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PyLayerError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs
 */
export class ValidationError extends PyLayerError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      1,
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Neither a library list nor a requirements file was supplied
 */
export class MissingInputError extends PyLayerError {
  constructor() {
    super(
      'No libraries or requirements file provided',
      'MISSING_INPUT',
      1
    );
    this.name = 'MissingInputError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends PyLayerError {
  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}: ${command}`,
      'COMMAND_EXECUTION_ERROR',
      1,
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
  }

  get stderr(): string {
    const stderr = this.details?.['stderr'];
    return typeof stderr === 'string' ? stderr : '';
  }
}

/**
 * Layer publish rejected by the provider
 */
export class UploadError extends PyLayerError {
  constructor(
    layerName: string,
    providerMessage: string,
    providerCode?: string,
    archivePath?: string
  ) {
    super(
      `Failed to publish layer ${layerName}: ${providerMessage}`,
      'UPLOAD_ERROR',
      1,
      { layerName, providerMessage, providerCode, archivePath }
    );
    this.name = 'UploadError';
  }
}

/**
 * Build interrupted (SIGINT/SIGTERM)
 */
export class BuildAbortedError extends PyLayerError {
  constructor(step?: string) {
    super(
      step ? `Build aborted during ${step}` : 'Build aborted',
      'BUILD_ABORTED',
      130,
      step ? { step } : undefined
    );
    this.name = 'BuildAbortedError';
  }
}
