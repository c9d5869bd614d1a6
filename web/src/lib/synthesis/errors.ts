export class EmptyInputError extends Error {
  constructor(message = 'Paste some text first.') {
    super(message);
    this.name = 'EmptyInputError';
  }
}

/**
 * Raised when any segment of a synthesis run fails. The run produces no
 * audio at all in that case.
 */
export class SynthesisError extends Error {
  readonly segmentIndex: number;
  readonly segmentCount: number;

  constructor(segmentIndex: number, segmentCount: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Synthesis failed on segment ${segmentIndex + 1} of ${segmentCount}: ${reason}`, { cause });
    this.name = 'SynthesisError';
    this.segmentIndex = segmentIndex;
    this.segmentCount = segmentCount;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string' && error.trim()) {
    return error;
  }
  return 'Unknown error';
}
