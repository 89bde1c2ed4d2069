/**
 * Error definitions for specgen
 * Provides structured error hierarchy for all staging operations
 */

/** Base error class for all specgen errors */
export class SpecgenError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'SpecgenError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SpecgenError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when the packager identity or a template cannot be resolved */
export class ConfigurationError extends SpecgenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIGURATION_ERROR', context)
    this.name = 'ConfigurationError'
  }
}

/** Error thrown when a directory or file cannot be created */
export class FileSystemError extends SpecgenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'FILE_SYSTEM_ERROR', context)
    this.name = 'FileSystemError'
  }
}

/** Error thrown when an external tool exits non-zero */
export class ExternalToolError extends SpecgenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'EXTERNAL_TOOL_ERROR', context)
    this.name = 'ExternalToolError'
  }
}

/** Error thrown when the self-test output differs from the reference */
export class VerificationError extends SpecgenError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'VERIFICATION_ERROR', context)
    this.name = 'VerificationError'
  }
}
