import { describe, it, expect } from 'vitest';
import {
  BrokerError,
  CadenceViolationError,
  OrderRejectedError,
  SourceUnavailableError,
  TraderError,
  getErrorMessage,
} from './errors';

describe('TraderError', () => {
  it('carries a code and the fields that identify the failure', () => {
    const error = new SourceUnavailableError('screener', 'HTTP 503');

    expect(error).toBeInstanceOf(TraderError);
    expect(error.name).toBe('SourceUnavailableError');
    expect(error.code).toBe('SOURCE_UNAVAILABLE');
    expect(error.message).toBe('Source screener unavailable: HTTP 503');
    expect(error.context).toEqual({ source: 'screener', reason: 'HTTP 503' });
  });

  it('keeps venue details in the context', () => {
    expect(new OrderRejectedError('AAA.X', 'market closed').context).toEqual({
      ticker: 'AAA.X',
      reason: 'market closed',
    });
    expect(new BrokerError(502, 'bad gateway').context).toEqual({ statusCode: 502, venueMessage: 'bad gateway' });
    expect(new CadenceViolationError('2024-03-16 is not a trading day').context).toEqual({});
  });
});

describe('getErrorMessage', () => {
  it('reads errors, strings and error-shaped objects', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage({ message: 'from object' })).toBe('from object');
    expect(getErrorMessage({ error: 'nested' })).toBe('nested');
  });
});
