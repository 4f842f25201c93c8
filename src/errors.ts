/**
 * Error types raised outside steady-state rendering. Rendering itself cannot
 * fail: degenerate geometry and short samples are ordinary outcomes.
 */

/** A session resource (sample buffer, drawing surface) could not be acquired. */
export class ResourceAcquisitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ResourceAcquisitionError';
  }
}

/** Session options failed validation. */
export class SessionOptionsError extends Error {
  constructor(
    message: string,
    readonly issues: readonly string[]
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'SessionOptionsError';
  }
}
