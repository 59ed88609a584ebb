/**
 * Links Router
 * Route definitions for stored link queries
 */

import { Router } from 'express';
import { linksController } from './links.controller';

const router = Router();

/**
 * @route   GET /api/links
 * @desc    Query stored links (domain, minScore, classification, sourceUrl, keyword, jobId, limit, offset)
 * @access  Public
 */
router.get('/', linksController.getLinks);

/**
 * @route   GET /api/links/count
 * @desc    Count stored links matching the same filters
 * @access  Public
 */
router.get('/count', linksController.getCount);

/**
 * @route   GET /api/links/domains
 * @desc    Link counts per domain, largest first
 * @access  Public
 */
router.get('/domains', linksController.getDomains);

export default router;
