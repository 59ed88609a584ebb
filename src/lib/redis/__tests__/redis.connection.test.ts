/**
 * Redis Connection Tests
 */

import Redis from 'ioredis';
import { RedisConnection } from '../redis.connection';

jest.mock('ioredis');

describe('RedisConnection', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('when Redis is disabled', () => {
    const connection = new RedisConnection('redis://localhost:6379', false);

    it('should not create a client', () => {
      expect(connection.getClient()).toBeNull();
      expect(Redis).not.toHaveBeenCalled();
    });

    it('should report Redis as unavailable', async () => {
      expect(connection.isAvailable()).toBe(false);
      await expect(connection.healthCheck()).resolves.toBe(false);
    });

    it('should disconnect without a client', async () => {
      await expect(connection.disconnect()).resolves.toBeUndefined();
    });
  });

  describe('without a URL', () => {
    it('should not create a client', () => {
      const connection = new RedisConnection('', true);

      expect(connection.getClient()).toBeNull();
      expect(Redis).not.toHaveBeenCalled();
    });
  });
});
