/** Aborts a whole run: bad file, missing sheet, or an unexpected failure mid-load. */
export class IngestionError extends Error {
  readonly name = 'IngestionError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
