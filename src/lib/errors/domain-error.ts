// src/lib/errors/domain-error.ts

export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string,
  ) {
    super(message);
  }
}

export class RouteNotFoundError extends DomainError {
  constructor(public readonly method: string, public readonly path: string) {
    super(`No route for ${method} ${path}`, 404, "ROUTE_NOT_FOUND");
    this.name = "RouteNotFoundError";
  }
}

export class MalformedBodyError extends DomainError {
  constructor() {
    super("Malformed request body", 400, "MALFORMED_BODY");
    this.name = "MalformedBodyError";
  }
}

export class UnsupportedMediaTypeError extends DomainError {
  constructor(public readonly contentType: string) {
    super(
      `Unsupported content type ${contentType}; send JSON or form data`,
      415,
      "UNSUPPORTED_MEDIA_TYPE",
    );
    this.name = "UnsupportedMediaTypeError";
  }
}

export class XsrfTokenError extends DomainError {
  constructor() {
    super("XSRF token missing or invalid", 403, "XSRF_TOKEN_INVALID");
    this.name = "XsrfTokenError";
  }
}

export class PayloadTooLargeError extends DomainError {
  constructor(public readonly limit: string) {
    super(`Request body exceeds ${limit}`, 413, "PAYLOAD_TOO_LARGE");
    this.name = "PayloadTooLargeError";
  }
}

export class BadRequestError extends DomainError {
  constructor(message: string, status = 400) {
    super(message, status, "BAD_REQUEST");
    this.name = "BadRequestError";
  }
}
