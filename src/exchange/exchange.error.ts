/** Failure talking to the venue: transport, HTTP status, malformed payload or a refused order. */
export class ExchangeError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ExchangeError';
  }
}
