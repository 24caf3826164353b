/**
 * Raised for invalid user input (subnet prefix, host bounds, concurrency values).
 * The CLI maps it to exit code 2; no probe runs once one is thrown.
 */
export class UsageError extends Error {
  readonly exitCode = 2;

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}
