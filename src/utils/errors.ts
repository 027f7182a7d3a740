import { HostDepsError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for every failure the engine can attach to a dependency,
 * plus the ambient ones used by the manifest, config and CLI layers.
 */

export class InvalidVersionFormatError extends HostDepsError {
  constructor(version: string, details?: Record<string, unknown>) {
    super(`Invalid version format: '${version}'`, ErrorCodes.INVALID_VERSION_FORMAT, { version, ...details });
    this.name = 'InvalidVersionFormatError';
  }
}

export class UnsupportedPlatformError extends HostDepsError {
  constructor(dependencyName: string, platform: string, reason?: string) {
    super(
      `Dependency '${dependencyName}' is not supported on ${platform}${reason ? `: ${reason}` : ''}`,
      ErrorCodes.UNSUPPORTED_PLATFORM,
      { dependency: dependencyName, platform }
    );
    this.name = 'UnsupportedPlatformError';
  }
}

export class TemplateError extends HostDepsError {
  constructor(token: string, template: string[]) {
    super(
      `Unresolved placeholder {${token}} in command: ${template.join(' ')}`,
      ErrorCodes.TEMPLATE_ERROR,
      { token, template }
    );
    this.name = 'TemplateError';
  }
}

export class CommandFailedError extends HostDepsError {
  readonly exitCode: number | null;
  readonly output: string;

  constructor(command: string[], exitCode: number | null, output: string) {
    const status = exitCode === null ? 'could not be started' : `exited with code ${exitCode}`;
    super(`Command '${command.join(' ')}' ${status}`, ErrorCodes.COMMAND_FAILED, { command, exitCode, output });
    this.name = 'CommandFailedError';
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class DownloadFailedError extends HostDepsError {
  readonly retryable: boolean;

  constructor(url: string, reason: string, retryable: boolean, details?: Record<string, unknown>) {
    super(`Download of ${url} failed: ${reason}`, ErrorCodes.DOWNLOAD_FAILED, { url, ...details });
    this.name = 'DownloadFailedError';
    this.retryable = retryable;
  }
}

export class ChecksumMismatchError extends HostDepsError {
  constructor(artifact: string, expected: string, actual: string) {
    super(`Checksum mismatch for ${artifact}: expected ${expected}, got ${actual}`, ErrorCodes.CHECKSUM_MISMATCH, {
      artifact,
      expected,
      actual
    });
    this.name = 'ChecksumMismatchError';
  }
}

export class VerificationFailedError extends HostDepsError {
  readonly exitCode: number | null;
  readonly output: string;

  constructor(dependencyName: string, exitCode: number | null, output: string) {
    super(`Verification of '${dependencyName}' failed after install`, ErrorCodes.VERIFICATION_FAILED, {
      dependency: dependencyName,
      exitCode,
      output
    });
    this.name = 'VerificationFailedError';
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class CyclicDependencyError extends HostDepsError {
  readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(' -> ')}`, ErrorCodes.CYCLIC_DEPENDENCY, { cycle });
    this.name = 'CyclicDependencyError';
    this.cycle = cycle;
  }
}

export class UnknownDependencyError extends HostDepsError {
  constructor(dependencyName: string, referencedBy: string) {
    super(
      `Dependency '${referencedBy}' requires '${dependencyName}', which is not defined in the manifest`,
      ErrorCodes.UNKNOWN_DEPENDENCY,
      { dependency: dependencyName, referencedBy }
    );
    this.name = 'UnknownDependencyError';
  }
}

export class PrerequisiteFailedError extends HostDepsError {
  readonly prerequisite: string;

  constructor(dependencyName: string, prerequisite: string) {
    super(
      `Skipped '${dependencyName}': prerequisite '${prerequisite}' did not complete`,
      ErrorCodes.PREREQUISITE_FAILED,
      { dependency: dependencyName, prerequisite }
    );
    this.name = 'PrerequisiteFailedError';
    this.prerequisite = prerequisite;
  }
}

export class TimeoutError extends HostDepsError {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, ErrorCodes.TIMEOUT, { operation, timeoutMs });
    this.name = 'TimeoutError';
  }
}

export class CancelledError extends HostDepsError {
  constructor(dependencyName: string) {
    super(`Run cancelled before '${dependencyName}' was processed`, ErrorCodes.CANCELLED, {
      dependency: dependencyName
    });
    this.name = 'CancelledError';
  }
}

export class FileSystemError extends HostDepsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends HostDepsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends HostDepsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof HostDepsError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
        return;
      }

      const result = handleError(error);
      console.error(`❌ ${result.error}`);
      process.exit(1);
    }
  };
}
