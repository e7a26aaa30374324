import { errorMessage } from '../common/utils/error.util';

/** Venue refused or failed an order; the pending record has already been rolled back. */
export class OrderSubmissionError extends Error {
  constructor(
    readonly orderId: string,
    readonly venueError: unknown,
  ) {
    super(`Order ${orderId} submission failed: ${errorMessage(venueError)}`);
    this.name = 'OrderSubmissionError';
  }
}
