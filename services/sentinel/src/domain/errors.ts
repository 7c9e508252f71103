export { InvalidMacError } from '@lanwarden/gateway';

export class SentinelError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata?: Record<string, unknown>,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'SentinelError';
  }
}

export type ScanFailureReason = 'timeout' | 'exec_failed' | 'malformed_output';

export class ScanFailure extends SentinelError {
  constructor(
    public readonly reason: ScanFailureReason,
    message: string,
    metadata?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, 'SCAN_FAILURE', { ...metadata, reason }, cause);
    this.name = 'ScanFailure';
  }
}

/** Registry and gateway disagree about a device. Informational; the loop corrects it. */
export class DriftError extends SentinelError {
  constructor(mac: string, intended: boolean, actual: boolean) {
    super(`access drift for ${mac}`, 'DRIFT', { mac, intended, actual });
    this.name = 'DriftError';
  }
}

export class RegistryError extends SentinelError {
  constructor(message: string, metadata?: Record<string, unknown>, cause?: unknown) {
    super(message, 'REGISTRY', metadata, cause);
    this.name = 'RegistryError';
  }
}

export class NotFoundError extends SentinelError {
  constructor(message = 'device not found') {
    super(message, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}
