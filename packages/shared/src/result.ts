// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export type Result<T, E = EngineError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export function mapResult<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
  return result.ok ? ok(fn(result.value)) : result;
}

// ---------------------------------------------------------------------------
// Error kinds
// ---------------------------------------------------------------------------

export interface MissingArgumentError {
  kind: 'missing_argument';
  argument: string;
}

export interface InvalidArgumentFormatError {
  kind: 'invalid_argument_format';
  argument: string;
  detail: string;
}

export interface UnknownToolError {
  kind: 'unknown_tool';
  name: string;
}

/** Failure reported by the file-system or memory collaborator, passed through verbatim. */
export interface RepositoryFailure {
  kind: 'repository_failure';
  message: string;
}

export interface NetworkError {
  kind: 'network_error';
  /** HTTP status when the failure came from a response; absent for transport failures */
  status?: number;
  message: string;
}

export interface ParseError {
  kind: 'parse_error';
  message: string;
}

export type EngineError =
  | MissingArgumentError
  | InvalidArgumentFormatError
  | UnknownToolError
  | RepositoryFailure
  | NetworkError
  | ParseError;

export function repositoryFailure(message: string): RepositoryFailure {
  return { kind: 'repository_failure', message };
}

export function networkError(message: string, status?: number): NetworkError {
  return status === undefined
    ? { kind: 'network_error', message }
    : { kind: 'network_error', status, message };
}

export function parseError(message: string): ParseError {
  return { kind: 'parse_error', message };
}

/** User-facing text for an error kind. */
export function describeError(error: EngineError): string {
  switch (error.kind) {
    case 'missing_argument':
      return `Missing required argument: ${error.argument}`;
    case 'invalid_argument_format':
      return error.detail;
    case 'unknown_tool':
      return `Unknown tool: ${error.name}`;
    case 'repository_failure':
    case 'network_error':
      return error.message;
    case 'parse_error':
      return `Error executing tool: ${error.message}`;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
