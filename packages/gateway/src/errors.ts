export type GatewayErrorCode = 'AUTH' | 'TRANSIENT_NETWORK' | 'PROTOCOL' | 'SESSION_REJECTED';

export class GatewayError extends Error {
  public readonly code: GatewayErrorCode;
  public readonly cause?: unknown;
  public readonly metadata?: Record<string, unknown>;

  constructor(
    message: string,
    options: {
      code: GatewayErrorCode;
      cause?: unknown;
      metadata?: Record<string, unknown>;
    }
  ) {
    super(message);
    this.name = 'GatewayError';
    this.code = options.code;
    this.cause = options.cause;
    this.metadata = options.metadata;
  }
}

/** Long-lived application credential missing, empty or refused. Fatal for the process. */
export class AuthError extends GatewayError {
  constructor(message = 'application credential unavailable', metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: 'AUTH', metadata, cause });
    this.name = 'AuthError';
  }
}

export class TransientNetworkError extends GatewayError {
  constructor(message = 'gateway unreachable', metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: 'TRANSIENT_NETWORK', metadata, cause });
    this.name = 'TransientNetworkError';
  }
}

export class ProtocolError extends GatewayError {
  constructor(message = 'unexpected gateway response', metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, { code: 'PROTOCOL', metadata, cause });
    this.name = 'ProtocolError';
  }
}

export class SessionRejectedError extends GatewayError {
  constructor(message = 'session rejected by gateway', metadata?: Record<string, unknown>) {
    super(message, { code: 'SESSION_REJECTED', metadata });
    this.name = 'SessionRejectedError';
  }
}

export class InvalidMacError extends Error {
  public readonly code = 'INVALID_MAC';

  constructor(public readonly value: string) {
    super(`invalid MAC address: ${value}`);
    this.name = 'InvalidMacError';
  }
}
