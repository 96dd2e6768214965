import type { z } from 'zod';

export type PipelineErrorCode = 'resource_fetch' | 'structural_parse' | 'invalid_argument';

export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
}

/**
 * A listing or download could not be retrieved: a non-2xx response (`status` set)
 * or a transport failure (`status` null).
 */
export class ResourceFetchError extends PipelineError {
  readonly code = 'resource_fetch' as const;
  readonly uri: string;
  readonly status: number | null;

  constructor(options: { uri: string; status: number | null; message?: string; cause?: unknown }) {
    const message =
      options.message ??
      (options.status === null
        ? `Fetching resource ${options.uri} failed`
        : `Fetching resource ${options.uri} failed with status ${options.status}`);
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ResourceFetchError';
    this.uri = options.uri;
    this.status = options.status;
  }
}

export type StructuralParseLocation = {
  source: string;
  stationId?: string;
  parameter?: string;
};

/** A document broke an invariant the parser relies on; the whole unit is rejected. */
export class StructuralParseError extends PipelineError {
  readonly code = 'structural_parse' as const;
  readonly source: string;
  readonly stationId: string | null;
  readonly parameter: string | null;

  constructor(message: string, location: StructuralParseLocation) {
    const scope = [
      location.stationId ? `station ${location.stationId}` : null,
      location.parameter ? `parameter ${location.parameter}` : null
    ]
      .filter((entry): entry is string => entry !== null)
      .join(', ');
    super(scope ? `${location.source} (${scope}): ${message}` : `${location.source}: ${message}`);
    this.name = 'StructuralParseError';
    this.source = location.source;
    this.stationId = location.stationId ?? null;
    this.parameter = location.parameter ?? null;
  }
}

export class ArgumentValidationError extends PipelineError {
  readonly code = 'invalid_argument' as const;
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid request: ${issues.join('; ')}`);
    this.name = 'ArgumentValidationError';
    this.issues = issues;
  }

  static fromZod(error: z.ZodError): ArgumentValidationError {
    return new ArgumentValidationError(
      error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    );
  }
}

export type Result<T, E extends PipelineError = PipelineError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function isPipelineError(error: unknown): error is PipelineError {
  return error instanceof PipelineError;
}

/**
 * Runs an operation and captures pipeline failures as a `Result`. Anything that is not a
 * `PipelineError` is a defect and is rethrown.
 */
export async function settle<T>(operation: () => Promise<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (error) {
    if (isPipelineError(error)) {
      return { ok: false, error };
    }
    throw error;
  }
}
