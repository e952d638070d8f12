/**
 * Errors surfaced to the immediate caller. Provider failures never use these:
 * adapters turn them into failed outcomes instead.
 */

export class ValidationError extends Error {
  override readonly name = "ValidationError";
  readonly code = "VALIDATION_ERROR";

  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
