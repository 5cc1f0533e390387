export interface HttpError extends Error {
  status?: number;
  expose?: boolean;
  details?: unknown;
}

export abstract class AppError extends Error implements HttpError {
  abstract readonly status: number;
  readonly expose: boolean = false;
  readonly details?: unknown;

  constructor(message: string, options: { details?: unknown; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details;
  }
}

/** Malformed or out-of-range request input. The only kind clients get to see. */
export class ValidationError extends AppError {
  readonly status = 400;
  override readonly expose = true;
}

/** A required collaborator (store, channel) has no configuration. */
export class ConfigurationError extends AppError {
  readonly status = 503;
  override readonly expose = true;
}

/** Agent or media host failure. Recovered with an apology, never sent as a status. */
export class UpstreamError extends AppError {
  readonly status = 502;
}

export class MediaFetchError extends UpstreamError {
  constructor(
    message: string,
    readonly url: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, { details: { status: options.status }, cause: options.cause });
  }
}

/** Store read/write failure. Logged and swallowed by the callers. */
export class PersistenceError extends AppError {
  readonly status = 500;
}
