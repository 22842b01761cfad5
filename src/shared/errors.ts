/**
 * Error taxonomy
 * Recoverable conditions are absorbed near their source; these classes mark
 * the ones that cross a component boundary.
 */

export class RemoteExchangeError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'RemoteExchangeError';
  }
}

/** The audio input device could not be opened; fatal for the owning trigger loop only. */
export class CaptureUnavailableError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'CaptureUnavailableError';
  }
}

/**
 * True for DOM AbortError and the SDK user-abort errors.
 */
export function isAbortError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null || !('name' in error)) return false;
  return error.name === 'AbortError' || error.name === 'APIUserAbortError';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
