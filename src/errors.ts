import { ErrorCode, type ErrorDetails, SSHConfigError } from './types.js';

/**
 * Creates a syntax error for a malformed line
 */
export function createSyntaxError(message: string, location: ErrorDetails = {}, hint?: string): SSHConfigError {
  let where = '';
  if (location.path) {
    where = `${location.path}:${location.line ?? 0}: `;
  } else if (location.line !== undefined) {
    where = `line ${location.line}: `;
  }
  return new SSHConfigError(ErrorCode.ESYNTAX, `${where}${message}`, hint, location);
}

/**
 * Creates an I/O error
 */
export function createIOError(message: string, details: ErrorDetails = {}, hint?: string): SSHConfigError {
  return new SSHConfigError(ErrorCode.EIO, message, hint, details);
}

/**
 * Creates an include depth error
 */
export function createIncludeDepthError(maxDepth: number, details: ErrorDetails = {}): SSHConfigError {
  return new SSHConfigError(
    ErrorCode.EINCLUDEDEPTH,
    `Include nested deeper than ${maxDepth} levels`,
    'Check for a file that includes itself directly or through another file',
    details
  );
}

/**
 * Creates a spawn error
 */
export function createSpawnError(message: string, details: ErrorDetails = {}, hint?: string): SSHConfigError {
  return new SSHConfigError(ErrorCode.ESPAWN, message, hint, details);
}

/**
 * Creates a host-not-found error
 */
export function createHostNotFoundError(host: string): SSHConfigError {
  return new SSHConfigError(
    ErrorCode.ENOHOST,
    `No Host or Match stanza applies to ${host}`,
    'Add a Host block for this alias or resolve without requireMatch'
  );
}

/**
 * Creates a bad request error
 */
export function createBadRequestError(message: string, hint?: string): SSHConfigError {
  return new SSHConfigError(ErrorCode.EBADREQ, message, hint);
}

/**
 * Creates a connection error
 */
export function createConnectionError(message: string, hint?: string, details: ErrorDetails = {}): SSHConfigError {
  return new SSHConfigError(ErrorCode.ECONN, message, hint, details);
}

/**
 * Wraps an unknown error into an SSHConfigError
 */
export function wrapError(error: unknown, code: ErrorCode, hint?: string, details: ErrorDetails = {}): SSHConfigError {
  if (error instanceof SSHConfigError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new SSHConfigError(code, message, hint, { ...details, cause: error });
}

/**
 * Reads the errno code off a Node system error
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
