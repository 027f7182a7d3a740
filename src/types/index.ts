/**
 * Common types and interfaces for the hostdeps engine and CLI
 */

export * from './manifest.js';
export * from './status.js';

// Core application types
export interface HostDepsDirectories {
  config: string;
  data: string;
  runtime: string;
}

/**
 * Engine settings after defaults, config file and CLI flags are merged.
 */
export interface HostDepsSettings {
  /** Upper bound for every install/verify/uninstall subprocess */
  commandTimeoutMs: number;
  /** Upper bound for a single download attempt */
  downloadTimeoutMs: number;
  /** Extra download attempts after the first one fails */
  downloadRetries: number;
  /** Base delay for exponential backoff between download attempts */
  retryBackoffMs: number;
  /** Independent dependencies processed at the same time (1 = sequential) */
  concurrency: number;
  /** Parent of the default `{install_dir}` of every dependency */
  installRoot: string;
}

export type HostDepsConfig = Partial<HostDepsSettings>;

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class HostDepsError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'HostDepsError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  INVALID_VERSION_FORMAT = 'INVALID_VERSION_FORMAT',
  UNSUPPORTED_PLATFORM = 'UNSUPPORTED_PLATFORM',
  TEMPLATE_ERROR = 'TEMPLATE_ERROR',
  COMMAND_FAILED = 'COMMAND_FAILED',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  CHECKSUM_MISMATCH = 'CHECKSUM_MISMATCH',
  VERIFICATION_FAILED = 'VERIFICATION_FAILED',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  UNKNOWN_DEPENDENCY = 'UNKNOWN_DEPENDENCY',
  PREREQUISITE_FAILED = 'PREREQUISITE_FAILED',
  TIMEOUT = 'TIMEOUT',
  CANCELLED = 'CANCELLED',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
