// src/lib/http/body-errors.ts
// Maps the errors thrown by express.json / express.urlencoded onto domain errors.

import {
  BadRequestError,
  MalformedBodyError,
  PayloadTooLargeError,
  UnsupportedMediaTypeError,
} from "../errors/domain-error";

export const BODY_LIMIT = "1mb";

type BodyParserFailure = {
  type: string;
  status: number;
  message: string;
};

function isBodyParserFailure(err: unknown): err is BodyParserFailure {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number" &&
    "message" in err &&
    typeof err.message === "string" &&
    "expose" in err &&
    err.expose === true
  );
}

/**
 * Client-caused body failures become domain errors; anything else is
 * returned as-is for the 500 path.
 */
export function fromBodyParserError(
  err: unknown,
  contentType: string | undefined,
): unknown {
  if (!isBodyParserFailure(err)) return err;

  switch (err.type) {
    case "entity.parse.failed":
      return new MalformedBodyError();
    case "entity.too.large":
      return new PayloadTooLargeError(BODY_LIMIT);
    case "charset.unsupported":
    case "encoding.unsupported":
      return new UnsupportedMediaTypeError(contentType ?? "unknown");
  }

  if (err.status >= 400 && err.status < 500) {
    return new BadRequestError(err.message, err.status);
  }

  return err;
}
