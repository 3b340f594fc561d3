/** Raw measurement output that matches none of the supported sample schemas. */
export class SchemaError extends Error {
  readonly name = "SchemaError";
}

/** Request payload the ingestion endpoint cannot turn into a record. */
export class MalformedPayloadError extends Error {
  readonly name = "MalformedPayloadError";
}

/** Field values that cannot make up a speed record. */
export class InvalidRecordError extends Error {
  readonly name = "InvalidRecordError";
}

/**
 * The single delivery attempt for a sample failed. The sample is not retried.
 * `status` is set when the endpoint answered with a non-success status.
 */
export class TransportFailure extends Error {
  readonly name = "TransportFailure";

  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}
