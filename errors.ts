import type { SessionStatus } from './types.js';

export class GatewayTransientError extends Error {
  readonly kind = 'transient' as const;
  constructor(message: string, readonly retryable: boolean, readonly status?: number) {
    super(message);
    this.name = 'GatewayTransientError';
  }
}

export class GatewayParseError extends Error {
  readonly kind = 'parse' as const;
  constructor(message: string, readonly rawText?: string) {
    super(message);
    this.name = 'GatewayParseError';
  }
}

export class GatewayRefusalError extends Error {
  readonly kind = 'refusal' as const;
  constructor(readonly reason: string) {
    super(`Model refused to answer: ${reason}`);
    this.name = 'GatewayRefusalError';
  }
}

export type GatewayError = GatewayTransientError | GatewayParseError | GatewayRefusalError;

export class SessionAlreadyReportedError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} has already been reported`);
    this.name = 'SessionAlreadyReportedError';
  }
}

export class DispatchError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = 'DispatchError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(readonly from: SessionStatus, readonly to: SessionStatus) {
    super(`Illegal session transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
