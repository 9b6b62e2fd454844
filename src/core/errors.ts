export interface HarvesterErrorOptions {
  cause?: unknown;
}

export class HarvesterError extends Error {
  constructor(message: string, options?: HarvesterErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Required settings are missing or malformed. Raised before any network activity. */
export class ConfigError extends HarvesterError {}

/** Every login attempt failed. */
export class AuthError extends HarvesterError {}

/** The one-time-code step could not be completed. Logged, never fatal. */
export class TotpError extends HarvesterError {}

/** A listing page could not be loaded after retries. */
export class NavigationError extends HarvesterError {
  readonly pageIndex: number;

  constructor(message: string, pageIndex: number, options?: HarvesterErrorOptions) {
    super(message, options);
    this.pageIndex = pageIndex;
  }
}

export class PdfParseError extends HarvesterError {}

/** Any failure while downloading, extracting or storing a single row. */
export class ProcessError extends HarvesterError {
  readonly pdfUrl: string;

  constructor(message: string, pdfUrl: string, options?: HarvesterErrorOptions) {
    super(message, options);
    this.pdfUrl = pdfUrl;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
