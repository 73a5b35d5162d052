/**
 * Non-200 response from a fetched page.
 */
export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
    message: string = `HTTP ${status} for ${url}`
  ) {
    super(message);
    this.name = "HttpError";
  }
}

/**
 * A category's listing page could not be fetched. Fatal for that category only.
 */
export class ListingFetchError extends Error {
  constructor(
    public readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not fetch listing page ${url}`, options);
    this.name = "ListingFetchError";
  }
}

/**
 * A category id outside the known set reached the pipeline.
 * This is a programming error and terminates the whole run.
 */
export class UnknownCategoryError extends Error {
  constructor(public readonly category: string) {
    super(`Unknown station category: ${category}`);
    this.name = "UnknownCategoryError";
  }
}

export class OutputWriteError extends Error {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Could not write ${path}`, options);
    this.name = "OutputWriteError";
  }
}
