export type ErrorCode =
  | "INVALID_REQUEST"
  | "UNRESOLVED_INTENT"
  | "MISSING_PARAMETER"
  | "UPSTREAM_REQUEST_FAILED"
  | "UPSTREAM_FORMAT_INVALID";

export abstract class ServiceError extends Error {
  abstract readonly code: ErrorCode;

  constructor(
    message: string,
    public readonly statusCode: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnresolvedIntentError extends ServiceError {
  readonly code = "UNRESOLVED_INTENT";

  constructor(public readonly query: string) {
    super("Unable to interpret the requested intent.", 422);
  }
}

export class MissingParameterError extends ServiceError {
  readonly code = "MISSING_PARAMETER";

  constructor(
    public readonly parameter: string,
    message: string
  ) {
    super(message, 422);
  }
}

export type UpstreamFailure = {
  status?: number;
  body?: string;
  timedOut?: boolean;
  cause?: unknown;
};

/** Upstream answered with an error status, or could not be reached at all. */
export class UpstreamRequestError extends ServiceError {
  readonly code = "UPSTREAM_REQUEST_FAILED";
  readonly status?: number;
  readonly body?: string;
  readonly timedOut: boolean;

  constructor(message: string, failure: UpstreamFailure = {}) {
    super(message, failure.timedOut ? 504 : 502, { cause: failure.cause });
    this.status = failure.status;
    this.body = failure.body;
    this.timedOut = failure.timedOut ?? false;
  }

  get transient(): boolean {
    return this.status === undefined || this.status >= 500;
  }
}

export class UpstreamFormatError extends ServiceError {
  readonly code = "UPSTREAM_FORMAT_INVALID";

  constructor(
    message: string,
    public readonly body: string
  ) {
    super(message, 502);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
