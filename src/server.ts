/**
 * Server Entry Point
 * Initializes the link store, Express server and Socket.IO
 */

import { createServer } from 'http';
import { createApp } from './app';
import { initializeSocket } from './lib/socket';
import { disconnectDB } from './lib/mongo';
import { redisConnection } from './lib/redis/redis.connection';
import { rateLimitManager } from './lib/rate-limit';
import { initializeLinkStore } from './modules/links/links.store';
import { registerCrawlerSocketHandlers } from './modules/crawler/crawler.socket';
import { env } from './config/env';

const startServer = async (): Promise<void> => {
  // MongoDB, or in-memory storage when unreachable
  const store = await initializeLinkStore();

  console.log('📦 Initializing Redis connection...');
  if (redisConnection.getClient() === null && env.REDIS_ENABLED) {
    // Wait a moment for connection to establish
    await new Promise((resolve) => setTimeout(resolve, 500));
  }
  const redisHealthy = await redisConnection.healthCheck();
  if (!redisHealthy) {
    console.log('⚠️  Redis not available, API rate limiting uses in-memory fallback');
  }

  const app = createApp();
  const httpServer = createServer(app);
  const io = initializeSocket(httpServer);

  io.on('connection', (socket) => {
    console.log(`✅ Socket connected: ${socket.id}`);

    registerCrawlerSocketHandlers(socket);

    socket.on('disconnect', () => {
      console.log(`❌ Socket disconnected: ${socket.id}`);
    });
  });

  httpServer.listen(env.PORT, () => {
    const redisStatus = redisConnection.isAvailable() ? '✅ Connected' : '⚠️  In-Memory Fallback';

    console.log('');
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('🚀 Link crawler server is running');
    console.log(`🚀 Environment: ${env.NODE_ENV}`);
    console.log(`🚀 Port: ${env.PORT}`);
    console.log(`🚀 Link store: ${store.name}`);
    console.log(`🚀 Redis rate limiting: ${redisStatus}`);
    console.log(`🚀 API: http://localhost:${env.PORT}/health`);
    console.log(`🚀 Socket.IO: ws://localhost:${env.PORT}`);
    console.log('🚀 ═══════════════════════════════════════════════════════');
    console.log('');
  });

  const shutdown = (signal: string): void => {
    console.log(`${signal} signal received: closing HTTP server`);
    httpServer.close(() => {
      console.log('HTTP server closed');
      rateLimitManager.destroy();
      Promise.all([redisConnection.disconnect(), disconnectDB()])
        .then(() => {
          console.log('Redis and MongoDB disconnected');
          process.exit(0);
        })
        .catch((error: unknown) => {
          console.error('Error during shutdown:', error);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
};

startServer().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
