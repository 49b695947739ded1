import { STATUS_CODES } from 'node:http';

export type MaasErrorCode =
  | 'TRANSPORT'
  | 'SERVER'
  | 'UNSUPPORTED_VERSION'
  | 'PERMISSION_DENIED'
  | 'BAD_REQUEST'
  | 'DESERIALIZATION'
  | 'UNEXPECTED'
  | 'INVALID_CREDENTIALS'
  | 'INVALID_VERSION'
  | 'CONFIG';

// Base class so callers can tell our errors from anything got or zod throws
export abstract class MaasError extends Error {
  abstract readonly code: MaasErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// No HTTP response was obtained: DNS, refused connection, invalid URL, timeout
export class TransportError extends MaasError {
  readonly code = 'TRANSPORT';

  constructor(cause: unknown) {
    super(cause instanceof Error ? cause.message : String(cause), { cause });
  }
}

/**
 * The server answered with a status >= 400.
 *
 * `body` holds the raw bytes of the response, `bodyMessage` the same bytes
 * decoded as UTF-8.
 */
export class ServerError extends MaasError {
  readonly code = 'SERVER';
  readonly statusCode: number;
  readonly body: Buffer;
  readonly bodyMessage: string;

  constructor(statusCode: number, body: Buffer) {
    const bodyMessage = body.toString('utf8');
    const statusText = STATUS_CODES[statusCode] ?? 'Unknown Status';
    super(`ServerError: ${statusCode} ${statusText} (${bodyMessage})`);
    this.statusCode = statusCode;
    this.body = body;
    this.bodyMessage = bodyMessage;
  }
}

export class UnsupportedVersionError extends MaasError {
  readonly code = 'UNSUPPORTED_VERSION';
}

// 401/403 on the credential probe or on an authenticated resource call
export class PermissionError extends MaasError {
  readonly code = 'PERMISSION_DENIED';
  readonly serverError: ServerError;

  constructor(serverError: ServerError) {
    super(serverError.bodyMessage, { cause: serverError });
    this.serverError = serverError;
  }
}

export class BadRequestError extends MaasError {
  readonly code = 'BAD_REQUEST';
  readonly serverError: ServerError;

  constructor(serverError: ServerError) {
    super(serverError.bodyMessage, { cause: serverError });
    this.serverError = serverError;
  }
}

export class DeserializationError extends MaasError {
  readonly code = 'DESERIALIZATION';
}

export class UnexpectedError extends MaasError {
  readonly code = 'UNEXPECTED';

  constructor(cause: TransportError | ServerError) {
    super(`unexpected: ${cause.message}`, { cause });
  }
}

export class InvalidCredentialsError extends MaasError {
  readonly code = 'INVALID_CREDENTIALS';

  // Takes the part count, never the key: the key carries the token secret
  constructor(partCount: number) {
    super(
      `invalid API key: expected 3 colon-separated parts ` +
        `"<consumer key>:<token key>:<token secret>", got ${partCount}`,
    );
  }
}

export class InvalidVersionError extends MaasError {
  readonly code = 'INVALID_VERSION';

  constructor(version: string) {
    super(`invalid API version "${version}"; expected the form "2.0"`);
  }
}

export class ConfigError extends MaasError {
  readonly code = 'CONFIG';
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Returns the ServerError behind an error, if there is one.
 *
 * PermissionError and BadRequestError carry theirs explicitly. Transport
 * errors and everything else yield undefined.
 */
export function getServerError(error: unknown): ServerError | undefined {
  if (error instanceof ServerError) return error;
  if (error instanceof PermissionError || error instanceof BadRequestError) {
    return error.serverError;
  }
  return undefined;
}

// Transport failures that fail the same way on every attempt
const PERMANENT_TRANSPORT_CODES: ReadonlySet<string> = new Set(['ERR_INVALID_URL']);

// got wraps the underlying error, so collect codes down the cause chain
function causeCodes(error: unknown): string[] {
  const codes: string[] = [];
  let current: unknown = error;
  for (let depth = 0; depth < 4 && typeof current === 'object' && current !== null; depth++) {
    if ('code' in current && typeof current.code === 'string') codes.push(current.code);
    current = 'cause' in current ? current.cause : undefined;
  }
  return codes;
}

export interface ErrorReport {
  code: MaasErrorCode;
  message: string;
  retryable: boolean;
}

/**
 * Maps any thrown value to a structured report.
 *
 * Network failures and 5xx answers are worth retrying later. A malformed
 * URL, a rejected request, a version mismatch or bad credentials are not.
 */
export function classifyError(error: unknown): ErrorReport {
  if (error instanceof TransportError) {
    const permanent = causeCodes(error.cause).some((code) => PERMANENT_TRANSPORT_CODES.has(code));
    return { code: error.code, message: error.message, retryable: !permanent };
  }
  if (error instanceof ServerError) {
    return { code: error.code, message: error.message, retryable: error.statusCode >= 500 };
  }
  if (error instanceof MaasError) {
    return { code: error.code, message: error.message, retryable: false };
  }
  return {
    code: 'UNEXPECTED',
    message: error instanceof Error ? error.message : String(error),
    retryable: false,
  };
}
