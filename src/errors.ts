import type { Diagnostic } from './types.js';

/**
 * Base class for every failure the bridge reports to a tool caller. `kind` is a
 * stable snake_case tag that ends up in the tool result.
 */
export abstract class BridgeError extends Error {
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type TransportErrorKind = 'transport_closed' | 'malformed_frame';

export class TransportError extends BridgeError {
  constructor(
    readonly kind: TransportErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A frame whose header or body could not be decoded. */
export class MalformedFrameError extends TransportError {
  constructor(
    message: string,
    readonly raw: string,
    options?: { cause?: unknown }
  ) {
    super('malformed_frame', message, options);
  }
}

export type CorrelatorErrorKind = 'timeout' | 'session_closed' | 'remote';

export class CorrelatorError extends BridgeError {
  constructor(
    readonly kind: CorrelatorErrorKind,
    message: string,
    readonly method: string,
    readonly code?: number
  ) {
    super(message);
  }
}

export type SupervisorErrorKind = 'spawn_failed' | 'handshake_failed';

export class SupervisorError extends BridgeError {
  constructor(
    readonly kind: SupervisorErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type ResolveErrorKind =
  | 'snippet_not_found'
  | 'ambiguous_snippet'
  | 'occurrence_out_of_range'
  | 'invalid_position'
  | 'file_unreadable';

export class ResolveError extends BridgeError {
  constructor(
    readonly kind: ResolveErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type ValidationErrorKind = 'relative_path' | 'invalid_params' | 'unknown_tool';

export class ValidationError extends BridgeError {
  constructor(
    readonly kind: ValidationErrorKind,
    message: string
  ) {
    super(message);
  }
}

export type CheckErrorKind = 'timeout' | 'output_truncated' | 'spawn_failed';

export class CheckError extends BridgeError {
  constructor(
    readonly kind: CheckErrorKind,
    message: string,
    readonly diagnostics: Diagnostic[] = [],
    readonly skippedLines = 0,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type ToolErrorKind = 'rename_conflict' | 'not_found' | 'unsupported' | 'edit_failed';

export class ToolError extends BridgeError {
  constructor(
    readonly kind: ToolErrorKind,
    message: string
  ) {
    super(message);
  }
}

export function isSessionLoss(error: unknown): boolean {
  return (
    (error instanceof CorrelatorError && error.kind === 'session_closed') ||
    error instanceof TransportError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
