/**
 * Crawler Socket Handlers
 * Real-time WebSocket event handlers for crawl jobs
 */

import { Socket } from 'socket.io';
import { errorMessage } from '../../lib/crawling';
import { crawlerService, CrawlerService } from './crawler.service';

/**
 * Register crawler socket event handlers
 */
export const registerCrawlerSocketHandlers = (
  socket: Socket,
  service: CrawlerService = crawlerService
): void => {
  /**
   * Join a job room for real-time updates
   */
  socket.on('crawl:join', (jobId: string) => {
    void socket.join(`job:${jobId}`);
    console.log(`Socket ${socket.id} joined job room: ${jobId}`);
  });

  socket.on('crawl:leave', (jobId: string) => {
    void socket.leave(`job:${jobId}`);
    console.log(`Socket ${socket.id} left job room: ${jobId}`);
  });

  /**
   * Request current job status
   */
  socket.on('crawl:status', (jobId: string) => {
    const job = service.status(jobId);
    if (job) {
      socket.emit('crawl:status:response', { success: true, job });
    } else {
      socket.emit('crawl:status:response', { success: false, error: 'Job not found' });
    }
  });

  /**
   * Cancel a job via socket
   */
  socket.on('crawl:cancel', (jobId: string) => {
    try {
      const job = service.cancel(jobId);
      socket.emit('crawl:cancel:response', { success: true, job });
    } catch (error) {
      socket.emit('crawl:cancel:response', { success: false, error: errorMessage(error) });
    }
  });
};
