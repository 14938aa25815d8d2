import { EspforgeError, ErrorCodes } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure taxonomy of the espforge CLI
 */

/**
 * Invalid or contradictory request. Raised before any I/O begins.
 */
export class ConfigurationError extends EspforgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, details);
    this.name = 'ConfigurationError';
  }
}

export class UnresolvableVersionError extends EspforgeError {
  constructor(component: string, requested: string, details?: { availableVersions?: string[] }) {
    const available = details?.availableVersions?.length
      ? `. Available: ${details.availableVersions.slice(0, 5).join(', ')}`
      : '';
    super(`No published ${component} version matches '${requested}'${available}`, ErrorCodes.UNRESOLVABLE_VERSION, {
      component,
      requested,
      ...details
    });
    this.name = 'UnresolvableVersionError';
  }
}

export class NotFoundError extends EspforgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.NOT_FOUND, details);
    this.name = 'NotFoundError';
  }
}

/**
 * The release index refused the request because of rate limiting. Retryable.
 */
export class RateLimitedError extends EspforgeError {
  /**
   * @param retryAfterMs - wait requested by the server through `retry-after`
   *   or `x-ratelimit-reset`, when it sent one
   */
  constructor(url: string, hasToken: boolean, readonly retryAfterMs?: number) {
    const hint = hasToken
      ? ''
      : ' Set GITHUB_TOKEN (or pass --github-token) to raise the rate limit.';
    super(`Release index rate limit exceeded for ${url}.${hint}`, ErrorCodes.RATE_LIMITED, { url, hasToken, retryAfterMs });
    this.name = 'RateLimitedError';
  }
}

/**
 * The release index could not be reached or answered with a server error. Retryable.
 */
export class IndexUnreachableError extends EspforgeError {
  constructor(url: string, cause?: unknown) {
    super(`Release index unreachable: ${url}${cause ? ` (${describeError(cause)})` : ''}`, ErrorCodes.INDEX_UNREACHABLE, {
      url,
      cause
    });
    this.name = 'IndexUnreachableError';
  }
}

export class DownloadFailedError extends EspforgeError {
  constructor(url: string, attempts: number, cause: unknown) {
    super(`Download failed after ${attempts} attempt(s): ${url}: ${describeError(cause)}`, ErrorCodes.DOWNLOAD_FAILED, {
      url,
      attempts
    });
    this.name = 'DownloadFailedError';
    this.cause = cause;
  }
}

export class ManifestCorruptError extends EspforgeError {
  constructor(path: string, reason: string) {
    super(
      `Installation manifest at ${path} cannot be read (${reason}). Reinstall required: run 'espforge uninstall' ` +
        `or delete the file, then run 'espforge install' again.`,
      ErrorCodes.MANIFEST_CORRUPT,
      { path, reason }
    );
    this.name = 'ManifestCorruptError';
  }
}

export class NotInstalledError extends EspforgeError {
  constructor(name: string) {
    super(`No installation named '${name}' was found`, ErrorCodes.NOT_INSTALLED, { name });
    this.name = 'NotInstalledError';
  }
}

export class ConcurrentInstallError extends EspforgeError {
  constructor(name: string, lockPath: string) {
    super(
      `Another espforge process is already working on installation '${name}' (lock: ${lockPath})`,
      ErrorCodes.CONCURRENT_INSTALL,
      { name, lockPath }
    );
    this.name = 'ConcurrentInstallError';
  }
}

export class PlanConflictError extends EspforgeError {
  constructor(destination: string, ids: string[]) {
    super(`Install operations ${ids.join(', ')} target the same destination: ${destination}`, ErrorCodes.PLAN_CONFLICT, {
      destination,
      ids
    });
    this.name = 'PlanConflictError';
  }
}

export class SdkInstallError extends EspforgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`SDK installer failed: ${message}`, ErrorCodes.SDK_INSTALL_FAILED, details);
    this.name = 'SdkInstallError';
  }
}

/**
 * A toolchain bundle installer script or a rustup command failed.
 */
export class ToolchainInstallError extends EspforgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.TOOLCHAIN_INSTALL_FAILED, details);
    this.name = 'ToolchainInstallError';
  }
}

export class FileSystemError extends EspforgeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Raised by commands whose operations were aggregated and at least one failed.
 * The report has already been printed.
 */
export class IncompleteOperationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IncompleteOperationError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isAbortError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  return error.name === 'AbortError' || getErrorCode(error) === 'ABORT_ERR';
}

/**
 * Message shown to the user for a failed command. The full error, with its
 * code and details, only reaches the debug log.
 */
export function userFacingMessage(error: unknown): string {
  if (error instanceof EspforgeError) {
    logger.debug(`${error.code}: ${error.message}`, error.details);
    return error.message;
  }
  logger.debug('Unexpected failure', error);
  return error instanceof Error ? error.message : 'An unknown error occurred';
}

/**
 * Wrap a Commander action so that failures end the process with a status:
 * 130 for a cancelled run, 1 for anything else. An IncompleteOperationError
 * has already printed its report, so it exits without another message.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        console.error(error.message);
        process.exit(130);
      }
      if (!(error instanceof IncompleteOperationError)) {
        console.error(`error: ${userFacingMessage(error)}`);
      }
      process.exit(1);
    }
  };
}
