import { describe, it, expect } from 'vitest';
import { computeBackoff, normalizeRetry } from '../../src/concerns/backoff.js';

describe('computeBackoff', () => {
  it('should double the delay on every consecutive failure', () => {
    expect(computeBackoff(1, 100, 1000)).toBe(100);
    expect(computeBackoff(2, 100, 1000)).toBe(200);
    expect(computeBackoff(4, 100, 1000)).toBe(800);
  });

  it('should cap the delay', () => {
    expect(computeBackoff(5, 100, 1000)).toBe(1000);
    expect(computeBackoff(60, 100, 1000)).toBe(1000);
  });

  it('should return 0 when the base delay is 0', () => {
    expect(computeBackoff(3, 0, 1000)).toBe(0);
  });
});

describe('normalizeRetry', () => {
  it('should retry immediately by default', () => {
    expect(normalizeRetry()).toEqual({ retryBaseDelayMs: 0, retryMaxDelayMs: 30000 });
  });

  it('should never let the cap drop below the base delay', () => {
    expect(normalizeRetry({ baseDelayMs: 500, maxDelayMs: 100 })).toEqual({
      retryBaseDelayMs: 500,
      retryMaxDelayMs: 500
    });
  });

  it('should clamp a negative base delay to 0', () => {
    expect(normalizeRetry({ baseDelayMs: -10 })).toEqual({ retryBaseDelayMs: 0, retryMaxDelayMs: 30000 });
  });
});
