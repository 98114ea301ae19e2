export type HttpRequestParseErrorCode =
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_REQUEST";

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "HttpRequestParseError";
  }
}

export type RouteErrorCode = "MISSING_USER_AGENT" | "DIRECTORY_NOT_CONFIGURED";

/** Handler failure that ends the connection without a response. */
export class RouteError extends Error {
  constructor(
    readonly code: RouteErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "RouteError";
  }
}

/** Raised by file systems when a named resource does not exist. */
export class ResourceNotFoundError extends Error {
  constructor(readonly path: string) {
    super(`Resource not found: ${path}`);
    this.name = "ResourceNotFoundError";
  }
}
