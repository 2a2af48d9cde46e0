// ============================================================
// Deepsky Chart - Server Errors
// ============================================================

/** Invalid chart request body; mapped to HTTP 400 */
export class ChartRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChartRequestError';
  }
}

/** A catalog file is missing or malformed */
export class CatalogLoadError extends Error {
  constructor(
    readonly file: string,
    message: string,
  ) {
    super(`${file}: ${message}`);
    this.name = 'CatalogLoadError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
