/**
 * Circuit Breaker Manager Tests
 */

import { CircuitBreaker, CircuitState } from '..';

describe('CircuitBreaker', () => {
  let breaker: CircuitBreaker<[boolean], string>;

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    breaker = new CircuitBreaker(
      async (succeed: boolean) => {
        if (!succeed) {
          throw new Error('upstream down');
        }
        return 'ok';
      },
      { name: 'Test', timeout: 1000, errorThresholdPercentage: 50, resetTimeout: 5000, minimumRequests: 2 }
    );
  });

  afterEach(() => {
    breaker.shutdown();
    jest.restoreAllMocks();
  });

  it('should pass calls through while closed', async () => {
    await expect(breaker.execute(true)).resolves.toBe('ok');

    expect(breaker.getStats()).toEqual({
      state: CircuitState.CLOSED,
      failures: 0,
      successes: 1,
      timeouts: 0,
      rejections: 0,
      totalRequests: 1,
      lastFailureTime: undefined,
      nextAttempt: undefined,
      errorRate: 0,
    });
  });

  it('should open after enough failures and refuse further calls', async () => {
    await expect(breaker.execute(false)).rejects.toThrow('upstream down');
    await expect(breaker.execute(false)).rejects.toThrow('upstream down');
    await expect(breaker.execute(true)).rejects.toThrow();

    const stats = breaker.getStats();
    expect(stats.state).toBe(CircuitState.OPEN);
    expect(stats.failures).toBe(2);
    expect(stats.rejections).toBe(1);
    expect(stats.errorRate).toBe(100);
    expect(stats.nextAttempt).toBe((stats.lastFailureTime ?? 0) + 5000);
    expect(console.warn).toHaveBeenCalledWith('[Test] Circuit opened');
  });

  it('should count timeouts as failures', async () => {
    const slow = new CircuitBreaker(
      () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 200)),
      { name: 'Slow', timeout: 20, minimumRequests: 5 }
    );

    try {
      await expect(slow.execute()).rejects.toThrow('Timed out after 20ms');
      expect(slow.getStats().timeouts).toBe(1);
      expect(slow.getStats().failures).toBe(1);
    } finally {
      slow.shutdown();
    }
  });
});
