export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    readonly code: string,
    message = code
  ) {
    super(message);
    this.name = "HttpError";
  }
}
