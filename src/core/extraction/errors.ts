/**
 * Extraction errors
 */

/** Page body did not match the expected payload shape */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly pageType: string,
    public readonly url?: string,
  ) {
    super(message);
    this.name = "ExtractionError";
  }
}
