/**
 * Circuit Breaker Manager Tests
 */

import { HostCircuitBreakers } from '../circuit-breaker.manager';
import { CircuitBreakerConfig, CircuitState } from '../circuit-breaker.types';
import { CancelledError, NetworkError } from '../../errors/crawl.errors';
import { createMemoryLogger, MemoryLogger } from '../../logging/crawl.logger';

describe('HostCircuitBreakers', () => {
  let logger: MemoryLogger;
  let breakers: HostCircuitBreakers<string>;

  const config: CircuitBreakerConfig = {
    enabled: true,
    errorThresholdPercentage: 50,
    resetTimeout: 30000,
    minimumRequests: 2,
  };

  const failing = () => Promise.reject(new NetworkError('connection refused', 'ECONNREFUSED'));

  beforeEach(() => {
    logger = createMemoryLogger();
    breakers = new HostCircuitBreakers<string>(config, logger);
  });

  afterEach(() => {
    breakers.shutdown();
  });

  it('should pass results through while closed', async () => {
    await expect(breakers.execute('example.com', async () => 'ok')).resolves.toBe('ok');
    expect(breakers.getState('example.com')).toBe(CircuitState.CLOSED);
  });

  it('should open after repeated failures and fail fast', async () => {
    await expect(breakers.execute('example.com', failing)).rejects.toThrow('connection refused');
    await expect(breakers.execute('example.com', failing)).rejects.toThrow('connection refused');

    expect(breakers.getState('example.com')).toBe(CircuitState.OPEN);

    const task = jest.fn().mockResolvedValue('never');
    const error = await breakers.execute('example.com', task).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: 'Circuit open for example.com', code: 'EOPENBREAKER' });
    expect(task).not.toHaveBeenCalled();
    expect(breakers.getStats()['example.com']).toMatchObject({
      state: CircuitState.OPEN,
      failures: 2,
      successes: 0,
      rejections: 1,
      totalRequests: 2,
      errorRate: 100,
    });
    expect(logger.lines).toContainEqual({
      level: 'warn',
      message: 'Circuit opened for example.com, failing fast for 30000ms',
    });
  });

  it('should keep hosts independent', async () => {
    await breakers.execute('bad.example.com', failing).catch(() => undefined);
    await breakers.execute('bad.example.com', failing).catch(() => undefined);

    await expect(breakers.execute('good.example.com', async () => 'fine')).resolves.toBe('fine');
    expect(breakers.getState('good.example.com')).toBe(CircuitState.CLOSED);
  });

  it('should not count cancellation as a host failure', async () => {
    const cancelled = () => Promise.reject(new CancelledError('https://example.com/'));

    await expect(breakers.execute('example.com', cancelled)).rejects.toBeInstanceOf(CancelledError);
    await expect(breakers.execute('example.com', cancelled)).rejects.toBeInstanceOf(CancelledError);

    expect(breakers.getState('example.com')).toBe(CircuitState.CLOSED);
    expect(breakers.getStats()['example.com'].failures).toBe(0);
  });

  it('should run tasks directly when disabled', async () => {
    const disabled = new HostCircuitBreakers<string>({ ...config, enabled: false }, logger);
    for (let i = 0; i < 5; i++) {
      await disabled.execute('example.com', failing).catch(() => undefined);
    }

    await expect(disabled.execute('example.com', async () => 'still')).resolves.toBe('still');
    expect(disabled.getStats()).toEqual({});
  });
});
