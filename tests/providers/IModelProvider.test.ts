import { describe, it, expect } from 'vitest';
import { isRecoverable, parseRetryAfter } from '../../src/providers/IModelProvider.js';

describe('parseRetryAfter', () => {
  const now = Date.parse('2026-01-01T00:00:00Z');

  it('should read delay seconds', () => {
    expect(parseRetryAfter('30', now)).toBe(30);
    expect(parseRetryAfter(' 0 ', now)).toBe(0);
  });

  it('should turn an HTTP date into seconds from now', () => {
    expect(parseRetryAfter('Thu, 01 Jan 2026 00:01:30 GMT', now)).toBe(90);
    expect(parseRetryAfter('Wed, 31 Dec 2025 23:59:00 GMT', now)).toBe(0);
  });

  it('should ignore missing or unreadable values', () => {
    expect(parseRetryAfter(undefined, now)).toBeUndefined();
    expect(parseRetryAfter(null, now)).toBeUndefined();
    expect(parseRetryAfter('', now)).toBeUndefined();
    expect(parseRetryAfter('soon', now)).toBeUndefined();
  });
});

describe('isRecoverable', () => {
  it('should recover only from parse and transient failures', () => {
    expect(isRecoverable('parse')).toBe(true);
    expect(isRecoverable('transient')).toBe(true);
    expect(isRecoverable('quota')).toBe(false);
    expect(isRecoverable('auth')).toBe(false);
    expect(isRecoverable('model_not_found')).toBe(false);
  });
});
