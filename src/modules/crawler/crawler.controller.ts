/**
 * Crawler Controller
 * HTTP request/response handling for crawl jobs
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { CrawlJobConfig } from '../../lib/crawling';
import { clampLimit, clampOffset } from '../links/links.query';
import { crawlerService, CrawlerService } from './crawler.service';
import { ICrawlJobResponse, ICrawlResultsResponse } from './crawler.types';
import { CrawlValidationError, validateCrawlRequest } from './crawler.validation';

function queryNumber(value: unknown): number | undefined {
  if (typeof value !== 'string' || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

export class CrawlerController {
  constructor(private readonly service: CrawlerService = crawlerService) {}

  /**
   * POST /api/crawl
   * Submit a crawl job; responds before the crawl starts
   */
  createJob = asyncHandler(async (req: Request, res: Response) => {
    let config: CrawlJobConfig;
    try {
      config = validateCrawlRequest(req.body ?? {});
    } catch (error) {
      if (error instanceof CrawlValidationError) {
        throw new ApiError(400, 'Invalid crawl request', error.errors);
      }
      throw error;
    }

    const job = this.service.submit(config);
    const response: ICrawlJobResponse = {
      success: true,
      jobId: job.id,
      job,
    };

    res.status(202).json(response);
  });

  /**
   * GET /api/crawl/:id
   */
  getJob = asyncHandler(async (req: Request, res: Response) => {
    const job = this.service.status(req.params.id);
    if (!job) {
      throw new ApiError(404, 'Crawl job not found');
    }

    const response: ICrawlJobResponse = {
      success: true,
      jobId: job.id,
      job,
    };

    res.json(response);
  });

  /**
   * GET /api/crawl
   */
  getJobs = asyncHandler(async (req: Request, res: Response) => {
    const jobs = this.service.listJobs();
    res.json({ success: true, jobs, total: jobs.length });
  });

  /**
   * GET /api/crawl/:id/results
   */
  getResults = asyncHandler(async (req: Request, res: Response) => {
    const limit = clampLimit(queryNumber(req.query.limit));
    const offset = clampOffset(queryNumber(req.query.offset));
    const { results, total } = this.service.getResults(req.params.id, { limit, offset });

    const response: ICrawlResultsResponse = {
      success: true,
      jobId: req.params.id,
      results,
      total,
      limit,
      offset,
    };

    res.json(response);
  });

  /**
   * POST /api/crawl/:id/cancel
   */
  cancelJob = asyncHandler(async (req: Request, res: Response) => {
    const job = this.service.cancel(req.params.id);
    const response: ICrawlJobResponse = {
      success: true,
      jobId: job.id,
      job,
    };

    res.json(response);
  });
}

export const crawlerController = new CrawlerController();
