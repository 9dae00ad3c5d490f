/**
 * Run-level errors
 */

/** The run as a whole cannot proceed or its result cannot be saved */
export class RunError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "RunError";
  }
}
