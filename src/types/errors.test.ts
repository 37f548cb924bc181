import { describe, it, expect } from 'vitest';
import {
  BackendError,
  CancellationError,
  ConnectionError,
  SkyhandError,
  ValidationError,
  toErrorMessage,
} from './errors.js';

describe('error hierarchy', () => {
  it('tags each error with its code and class name', () => {
    const err = new BackendError('takeoff rejected: DENIED');
    expect(err).toBeInstanceOf(SkyhandError);
    expect(err.code).toBe('backend');
    expect(err.name).toBe('BackendError');
    expect(err.message).toBe('takeoff rejected: DENIED');
  });

  it('joins validation issues into the message', () => {
    const err = new ValidationError(['unknown command "flip"', 'altitude: must be <= 50']);
    expect(err.code).toBe('validation');
    expect(err.issues).toHaveLength(2);
    expect(err.message).toBe('unknown command "flip"; altitude: must be <= 50');
  });

  it('keeps the cause', () => {
    const cause = new Error('ECONNREFUSED');
    const err = new ConnectionError('cannot reach bridge', { cause });
    expect(err.cause).toBe(cause);
  });

  it('defaults the cancellation message', () => {
    expect(new CancellationError().message).toBe('operation cancelled');
  });
});

describe('toErrorMessage', () => {
  it('normalises thrown values', () => {
    expect(toErrorMessage(new Error('boom'))).toBe('boom');
    expect(toErrorMessage('plain')).toBe('plain');
    expect(toErrorMessage({ status: 503 })).toBe('{"status":503}');
  });
});
