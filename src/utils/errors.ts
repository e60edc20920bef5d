/**
 * Error Utilities
 *
 * Error taxonomy for the decision cycle plus safe message extraction for
 * whatever a broker, feed or enrichment call throws.
 */

export type TraderErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'ENRICHMENT_TIMEOUT'
  | 'ORDER_REJECTED'
  | 'TRADABILITY_UNRESOLVED'
  | 'PERSISTENCE_CORRUPT'
  | 'CADENCE_VIOLATION'
  | 'BROKER_ERROR'
  | 'TIMEOUT';

/**
 * Base class. `context` holds the fields a log line needs to identify what
 * failed (ticker, source, store location).
 */
export class TraderError extends Error {
  readonly code: TraderErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: TraderErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }
}

/** One signal source failed; it is excluded and the merge continues. */
export class SourceUnavailableError extends TraderError {
  constructor(readonly source: string, reason: string) {
    super('SOURCE_UNAVAILABLE', `Source ${source} unavailable: ${reason}`, { source, reason });
  }
}

/** Per-candidate enrichment failed or timed out; the candidate gets an empty payload. */
export class EnrichmentTimeoutError extends TraderError {
  constructor(readonly ticker: string, reason: string) {
    super('ENRICHMENT_TIMEOUT', `Enrichment for ${ticker} failed: ${reason}`, { ticker, reason });
  }
}

export class OrderRejectedError extends TraderError {
  constructor(readonly ticker: string, reason: string) {
    super('ORDER_REJECTED', `Order for ${ticker} rejected: ${reason}`, { ticker, reason });
  }
}

export class TradabilityUnresolvedError extends TraderError {
  constructor(readonly ticker: string, reason: string) {
    super('TRADABILITY_UNRESOLVED', `Could not resolve ${ticker} on the venue: ${reason}`, { ticker, reason });
  }
}

/** The cooldown or run-marker store is unreadable; it resets to empty. */
export class PersistenceCorruptError extends TraderError {
  constructor(readonly location: string, reason: string) {
    super('PERSISTENCE_CORRUPT', `Store at ${location} is unreadable: ${reason}`, { location, reason });
  }
}

/** A cycle was refused by the cadence gate. Surfaces as a skipped status, not a failure. */
export class CadenceViolationError extends TraderError {
  constructor(reason: string) {
    super('CADENCE_VIOLATION', reason);
  }
}

/** Non-2xx answer from the execution venue. */
export class BrokerError extends TraderError {
  constructor(readonly statusCode: number, readonly venueMessage: string) {
    super('BROKER_ERROR', `Broker error ${statusCode}: ${venueMessage}`, { statusCode, venueMessage });
  }
}

export class TimeoutError extends TraderError {
  constructor(label: string, ms: number) {
    super('TIMEOUT', `${label} timed out after ${ms}ms`, { label, ms });
  }
}

/**
 * Safely extract an error message from any error type.
 * Handles: Error objects, strings, HTTP error payloads, and objects.
 */
export function getErrorMessage(error: unknown): string {
  // Standard Error object
  if (error instanceof Error) {
    return error.message || error.name || 'Unknown Error';
  }

  // String thrown directly
  if (typeof error === 'string') {
    return error;
  }

  if (error && typeof error === 'object') {
    const errObj = error as Record<string, unknown>;

    if ('message' in errObj && typeof errObj.message === 'string' && errObj.message) {
      return errObj.message;
    }

    // Nested error string
    if ('error' in errObj && typeof errObj.error === 'string' && errObj.error) {
      return errObj.error;
    }

    if ('code' in errObj) {
      return `Error code: ${String(errObj.code)}`;
    }

    try {
      const jsonStr = JSON.stringify(error);
      if (jsonStr && jsonStr !== '{}') {
        return jsonStr.length > 200 ? jsonStr.slice(0, 200) + '...' : jsonStr;
      }
    } catch {
      // Circular reference
    }

    return 'Unknown object error';
  }

  return 'Unknown error';
}
