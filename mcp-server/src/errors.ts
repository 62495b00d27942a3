/**
 * Error taxonomy for template filling.
 *
 * Every failure the engine or its I/O collaborators raise is a FillError
 * carrying one of the codes below, so the transport layer can map it to a
 * response without inspecting messages.
 */

export enum FillErrorCode {
  CORRUPT_ARCHIVE = 'CORRUPT_ARCHIVE',
  INVALID_IMAGE_PAYLOAD = 'INVALID_IMAGE_PAYLOAD',
  INVALID_ARGUMENTS = 'INVALID_ARGUMENTS',
  TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',
  OUTPUT_WRITE_FAILED = 'OUTPUT_WRITE_FAILED',
  FILL_FAILED = 'FILL_FAILED',
}

export class FillError extends Error {
  constructor(
    message: string,
    public readonly code: FillErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'FillError';
    Error.captureStackTrace?.(this, FillError);
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, message: this.message, code: this.code, context: this.context };
  }
}

export function isFillError(error: unknown, code?: FillErrorCode): error is FillError {
  return error instanceof FillError && (code === undefined || error.code === code);
}

/**
 * Run an operation, re-throwing FillErrors with extra context merged in and
 * wrapping anything else as FILL_FAILED.
 */
export async function withErrorContext<T>(
  operation: () => Promise<T>,
  context: Record<string, unknown>
): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw attachContext(error, context);
  }
}

/** Synchronous counterpart of withErrorContext. */
export function withErrorContextSync<T>(operation: () => T, context: Record<string, unknown>): T {
  try {
    return operation();
  } catch (error) {
    throw attachContext(error, context);
  }
}

function attachContext(error: unknown, context: Record<string, unknown>): FillError {
  if (error instanceof FillError) {
    return new FillError(error.message, error.code, { ...context, ...error.context });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new FillError(message, FillErrorCode.FILL_FAILED, {
    ...context,
    originalError: error instanceof Error ? error.stack : String(error),
  });
}
