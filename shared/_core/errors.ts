/**
 * Errors thrown by the HTTP layer. Each carries the status code the request
 * should be answered with, so middleware can translate without string matching.
 */
export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export const ForbiddenError = (msg: string) => new HttpError(403, msg);
