/**
 * @fileoverview Tests for error classes and serialization.
 */

import { describe, it, expect } from 'vitest';
import {
  WatchError,
  ProviderRequestError,
  ProviderResponseError,
  NotificationError,
  LedgerLockError,
  ConfigError,
  isWatchError,
  isProviderRequestError,
  isProviderResponseError,
  isNotificationError,
  isLedgerLockError,
  errorMessage,
} from '../src/errors.js';

describe('WatchError', () => {
  it('should create error with code and message', () => {
    const error = new WatchError('TEST_CODE', 'Test message');

    expect(error.name).toBe('WatchError');
    expect(error.code).toBe('TEST_CODE');
    expect(error.message).toBe('Test message');
    expect(error.stack).toBeDefined();
  });

  it('should include optional data', () => {
    const data = { code: '2330', attempt: 1 };
    const error = new WatchError('TEST_CODE', 'Test message', data);

    expect(error.data).toEqual(data);
  });

  it('should have valid ISO timestamp', () => {
    const error = new WatchError('TEST_CODE', 'Test message');

    expect(new Date(error.timestamp).toISOString()).toBe(error.timestamp);
  });

  it('should serialize to JSON correctly', () => {
    const error = new WatchError('TEST_CODE', 'Test message', { key: 'value' });
    const json = error.toJSON();

    expect(json).toEqual({
      name: 'WatchError',
      code: 'TEST_CODE',
      message: 'Test message',
      data: { key: 'value' },
      timestamp: error.timestamp,
    });
  });
});

describe('error subclasses', () => {
  it('should tag provider request failures', () => {
    const error = new ProviderRequestError('timeout of 10000ms exceeded', {
      provider: 'yahoo',
      url: '/2371.TW',
    });

    expect(error.name).toBe('ProviderRequestError');
    expect(error.code).toBe('PROVIDER_REQUEST_FAILED');
    expect(error.data).toEqual({ provider: 'yahoo', url: '/2371.TW' });
    expect(error).toBeInstanceOf(WatchError);
    expect(error).toBeInstanceOf(Error);
  });

  it('should tag invalid provider responses', () => {
    const error = new ProviderResponseError('No data found', { provider: 'yahoo', symbol: '9999.TW' });

    expect(error.code).toBe('PROVIDER_RESPONSE_INVALID');
    expect(error.name).toBe('ProviderResponseError');
  });

  it('should tag notification and lock failures', () => {
    expect(new NotificationError('socket hang up', { code: '2371', url: 'http://n/?num=2371' }).code)
      .toBe('NOTIFICATION_FAILED');
    expect(new LedgerLockError('locked', { lockPath: '/tmp/x.lock' }).code).toBe('LEDGER_LOCKED');
    expect(new ConfigError('bad', { issues: ['a: b'] }).code).toBe('CONFIG_INVALID');
  });
});

describe('type guards', () => {
  it('should narrow each subclass', () => {
    const request = new ProviderRequestError('x', { provider: 'yahoo' });
    const response = new ProviderResponseError('x', { provider: 'yahoo' });
    const notify = new NotificationError('x', { code: '1', url: 'u' });
    const lock = new LedgerLockError('x', { lockPath: 'p' });

    expect(isProviderRequestError(request)).toBe(true);
    expect(isProviderRequestError(response)).toBe(false);
    expect(isProviderResponseError(response)).toBe(true);
    expect(isNotificationError(notify)).toBe(true);
    expect(isLedgerLockError(lock)).toBe(true);
    expect(isWatchError(lock)).toBe(true);
  });

  it('should reject plain errors and non-errors', () => {
    expect(isWatchError(new Error('plain'))).toBe(false);
    expect(isWatchError('string')).toBe(false);
    expect(isWatchError(null)).toBe(false);
  });
});

describe('errorMessage', () => {
  it('should read Error messages and stringify anything else', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
