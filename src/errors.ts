/**
 * Error kinds raised by the owner API client.
 *
 * Callers can tell a transport failure (nothing reached the vehicle, or the
 * server answered with a non-2xx status) apart from a command the vehicle
 * rejected and from a parameter that never left the process.
 */

export class OwnerApiError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network, TLS, DNS or HTTP status failure, or a body outside the envelope. */
export class TransportError extends OwnerApiError {
  readonly status?: number;
  readonly body?: string;

  constructor(message: string, details: { status?: number; body?: string; cause?: unknown } = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.status = details.status;
    this.body = details.body;
  }
}

/** The API answered but reported `result: false`. */
export class CommandRejectedError extends OwnerApiError {
  readonly command: string;
  readonly reason: string;

  constructor(command: string, reason: string) {
    super(reason);
    this.command = command;
    this.reason = reason;
  }
}

export class ValidationError extends OwnerApiError {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.field = field;
  }
}
