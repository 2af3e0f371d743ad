/** Network failure or a non-200 response while fetching a page. */
export class FetchError extends Error {
  readonly name = "FetchError";

  constructor(
    readonly url: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The HTML of a page could not be turned into a document. */
export class ParseError extends Error {
  readonly name = "ParseError";

  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** The document store is unreachable or rejected a write. */
export class PersistenceError extends Error {
  readonly name = "PersistenceError";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidIdError extends Error {
  readonly name = "InvalidIdError";

  constructor(readonly id: string) {
    super(`Invalid id: ${id}`);
  }
}

/** An error that already knows the HTTP status it should be answered with. */
export class HttpError extends Error {
  readonly name = "HttpError";

  constructor(readonly status: number, message: string) {
    super(message);
  }
}
