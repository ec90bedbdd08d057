/** An error whose status and message are sent to the client as-is. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
    readonly details?: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}
