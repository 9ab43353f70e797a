export type ErrorStatus = 400 | 404 | 502;

export class ScraperError extends Error {
  readonly status: ErrorStatus;

  constructor(message: string, status: ErrorStatus, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScraperError';
    this.status = status;
  }
}

/** Missing or malformed request parameters. */
export class InvalidInputError extends ScraperError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'InvalidInputError';
  }
}

export class NotFoundError extends ScraperError {
  constructor(message = 'GitHub user not found') {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/** GitHub answered with something other than the page we expect, or not at all. */
export class UpstreamError extends ScraperError {
  constructor(message = 'Failed to fetch GitHub data', options?: { cause?: unknown }) {
    super(message, 502, options);
    this.name = 'UpstreamError';
  }
}
