/**
 * Crawler Router
 * Route definitions for crawl jobs
 */

import { Router } from 'express';
import { crawlerController } from './crawler.controller';

const router = Router();

/**
 * @route   POST /api/crawl
 * @desc    Submit a crawl job
 * @access  Public
 */
router.post('/', crawlerController.createJob);

/**
 * @route   GET /api/crawl
 * @desc    List crawl jobs of this process, newest first
 * @access  Public
 */
router.get('/', crawlerController.getJobs);

/**
 * @route   GET /api/crawl/:id
 * @desc    Get a crawl job's status and statistics
 * @access  Public
 */
router.get('/:id', crawlerController.getJob);

/**
 * @route   GET /api/crawl/:id/results
 * @desc    Ranked links of a finished crawl job
 * @access  Public
 */
router.get('/:id/results', crawlerController.getResults);

/**
 * @route   POST /api/crawl/:id/cancel
 * @desc    Cancel a crawl job
 * @access  Public
 */
router.post('/:id/cancel', crawlerController.cancelJob);

export default router;
