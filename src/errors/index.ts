export class CardScraperError extends Error {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.url = url;
  }
}

export class FetchError extends CardScraperError {
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null, cause?: unknown) {
    super(url, message, { cause });
    this.status = status;
  }
}

/** The only batch-terminating failure: no category marker matched the page. */
export class ClassificationError extends CardScraperError {
  constructor(url: string) {
    super(url, `Unable to determine card type for ${url}; stopping the run.`);
  }
}

export class ExtractionError extends CardScraperError {
  readonly field: string;

  constructor(url: string, field: string) {
    super(url, `Missing field "${field}" in ${url}`);
    this.field = field;
  }
}

export class SerializationError extends CardScraperError {
  constructor(url: string, message: string, cause?: unknown) {
    super(url, message, { cause });
  }
}

export class ImageDownloadError extends CardScraperError {
  constructor(url: string, message: string, cause?: unknown) {
    super(url, message, { cause });
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
