import { FailureKind } from './types';

export type ErrorCode =
  | 'UNSUPPORTED_ALGORITHM'
  | 'EXTERNAL_TOOL_FAILURE'
  | 'SIGNATURE_NOT_FOUND'
  | 'EMPTY_DATABASE'
  | 'DATABASE_NOT_FOUND'
  | 'MISMATCHED_PARAMETERS'
  | 'AUDIO_FORMAT';

export class NcdMatchError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedAlgorithmError extends NcdMatchError {
  constructor(readonly algorithm: string, supported: readonly string[]) {
    super(
      'UNSUPPORTED_ALGORITHM',
      `Unsupported compressor: ${algorithm} (expected one of ${supported.join(', ')})`
    );
  }
}

export class ExternalToolError extends NcdMatchError {
  constructor(
    readonly tool: string,
    message: string,
    readonly details: { exitCode?: number | null; stderr?: string; timedOut?: boolean } = {},
    options?: { cause?: unknown }
  ) {
    super('EXTERNAL_TOOL_FAILURE', `${tool}: ${message}`, options);
  }
}

export class SignatureNotFoundError extends NcdMatchError {
  constructor(readonly trackId: string, readonly signaturePath: string) {
    super('SIGNATURE_NOT_FOUND', `Signature for ${trackId} not found at ${signaturePath}`);
  }
}

export class EmptyDatabaseError extends NcdMatchError {
  constructor(message = 'No usable signatures in database') {
    super('EMPTY_DATABASE', message);
  }
}

export class DatabaseNotFoundError extends NcdMatchError {
  constructor(readonly indexPath: string, options?: { cause?: unknown }) {
    super(
      'DATABASE_NOT_FOUND',
      `Database index not found or unreadable at ${indexPath}. Build the database first.`,
      options
    );
  }
}

export class MismatchedParametersError extends NcdMatchError {
  constructor(readonly trackId: string, message: string) {
    super('MISMATCHED_PARAMETERS', `${trackId}: ${message}`);
  }
}

export class AudioFormatError extends NcdMatchError {
  constructor(readonly file: string, message: string, options?: { cause?: unknown }) {
    super('AUDIO_FORMAT', `${file}: ${message}`, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Classify an error raised inside an experiment cell.
 */
export function failureKind(error: unknown): FailureKind {
  if (error instanceof ExternalToolError) return 'external_tool';
  if (error instanceof AudioFormatError) return 'audio_format';
  if (error instanceof MismatchedParametersError) return 'mismatched_parameters';
  return 'unknown';
}
