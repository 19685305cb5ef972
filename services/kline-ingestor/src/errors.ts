export type IngestErrorCode =
  | 'MALFORMED_PAYLOAD'
  | 'INVARIANT_VIOLATION'
  | 'STORE_UNAVAILABLE'
  | 'CONSTRAINT_VIOLATION'
  | 'CONNECTION_LOST'
  | 'SUBSCRIPTION_TIMEOUT'
  | 'RATE_LIMITED'
  | 'BACKFILL_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'SUPERVISOR_FATAL';

export abstract class IngestError extends Error {
  abstract readonly code: IngestErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// single message / entry is unusable
export class MalformedPayload extends IngestError {
  readonly code = 'MALFORMED_PAYLOAD' as const;
}

export class InvariantViolation extends IngestError {
  readonly code = 'INVARIANT_VIOLATION' as const;
}

// transient persistence failure, retried by the caller
export class StoreUnavailable extends IngestError {
  readonly code = 'STORE_UNAVAILABLE' as const;
}

// fatal for a single candle
export class ConstraintViolation extends IngestError {
  readonly code = 'CONSTRAINT_VIOLATION' as const;
}

export class ConnectionLost extends IngestError {
  readonly code = 'CONNECTION_LOST' as const;
}

// no frame arrived within the read deadline
export class FrameTimeout extends ConnectionLost {}

export class SubscriptionTimeout extends IngestError {
  readonly code = 'SUBSCRIPTION_TIMEOUT' as const;
}

export class RateLimited extends IngestError {
  readonly code = 'RATE_LIMITED' as const;

  constructor(message: string, readonly retryAfterMs: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class BackfillFailed extends IngestError {
  readonly code = 'BACKFILL_FAILED' as const;
}

export class ConfigurationError extends IngestError {
  readonly code = 'CONFIGURATION_ERROR' as const;
}

export class SupervisorFatal extends IngestError {
  readonly code = 'SUPERVISOR_FATAL' as const;
}
