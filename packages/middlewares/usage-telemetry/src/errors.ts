/** A batch could not be delivered to the collector. Logged, never retried. */
export class CollectorDeliveryError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly responseBody?: string,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = "CollectorDeliveryError";
  }
}
