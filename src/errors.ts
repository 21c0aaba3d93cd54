export type ParleyErrorCode =
  | "no_profile_configured"
  | "no_model_configured"
  | "profile_not_found"
  | "invalid_profile"
  | "transport_error"
  | "stream_error";

export class ParleyError extends Error {
  readonly code: ParleyErrorCode;

  constructor(code: ParleyErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParleyError";
    this.code = code;
  }
}

export class NoProfileConfiguredError extends ParleyError {
  constructor() {
    super("no_profile_configured", "no api profile configured");
    this.name = "NoProfileConfiguredError";
  }
}

export class NoModelConfiguredError extends ParleyError {
  readonly profileId: string;

  constructor(profileId: string) {
    super("no_model_configured", `api profile ${profileId} lists no models`);
    this.name = "NoModelConfiguredError";
    this.profileId = profileId;
  }
}

export class ProfileNotFoundError extends ParleyError {
  readonly profileId: string;

  constructor(profileId: string) {
    super("profile_not_found", `api profile not found: ${profileId}`);
    this.name = "ProfileNotFoundError";
    this.profileId = profileId;
  }
}

export class ProfileValidationError extends ParleyError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("invalid_profile", message);
    this.name = "ProfileValidationError";
    this.field = field;
  }
}

export type HttpFailure = {
  status?: number;
  body?: string;
};

export class TransportError extends ParleyError {
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(message: string, failure: HttpFailure = {}, options?: { cause?: unknown }) {
    super("transport_error", message, options);
    this.name = "TransportError";
    this.status = failure.status;
    this.body = failure.body;
  }
}

export class StreamError extends ParleyError {
  readonly status: number | undefined;
  readonly body: string | undefined;

  constructor(message: string, failure: HttpFailure = {}, options?: { cause?: unknown }) {
    super("stream_error", message, options);
    this.name = "StreamError";
    this.status = failure.status;
    this.body = failure.body;
  }
}

export function toTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  if (error instanceof StreamError) {
    return new TransportError(error.message, { status: error.status, body: error.body }, { cause: error });
  }
  return new TransportError(errorMessage(error), {}, { cause: error });
}

export function toStreamError(error: unknown): StreamError {
  if (error instanceof StreamError) {
    return error;
  }
  if (error instanceof TransportError) {
    return new StreamError(error.message, { status: error.status, body: error.body }, { cause: error });
  }
  return new StreamError(errorMessage(error), {}, { cause: error });
}

/** Text shown in place of (or after) the assistant reply when an exchange fails. */
export function describeExchangeFailure(error: TransportError | StreamError): string {
  const prefix = error instanceof StreamError ? "stream failed" : "request failed";
  if (typeof error.status === "number") {
    const body = error.body?.trim() || error.message;
    return `${prefix}: status ${error.status} - ${body}`;
  }
  return `${prefix}: ${error.message}`;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name;
  }
  return String(error);
}
