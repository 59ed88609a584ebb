import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_KEYWORDS = 'ACFR,Budget,Finance,Contact,Director,Annual,Report';

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Database (in-memory link store is used when the connection fails)
  MONGODB_URI: process.env.MONGODB_URI || 'mongodb://localhost:27017/link-crawler',

  // Redis (API rate limiting state)
  REDIS_ENABLED: process.env.REDIS_ENABLED !== 'false',
  REDIS_URL: process.env.REDIS_URL || 'redis://localhost:6379',
  REDIS_PASSWORD: process.env.REDIS_PASSWORD,
  REDIS_DB: parseInt(process.env.REDIS_DB || '0', 10),

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Classification backends
  CLASSIFIER_PROVIDER: process.env.CLASSIFIER_PROVIDER || 'openai',
  OPENAI_API_KEY: process.env.OPENAI_API_KEY,
  OPENAI_MODEL: process.env.OPENAI_MODEL || 'gpt-4o-mini',
  GEMINI_API_KEY: process.env.GEMINI_API_KEY,
  GEMINI_MODEL: process.env.GEMINI_MODEL || 'gemini-1.5-flash',

  // Crawl defaults
  CRAWL_KEYWORDS: (process.env.CRAWL_KEYWORDS || DEFAULT_KEYWORDS)
    .split(',')
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0),
  CRAWL_MAX_DEPTH: parseInt(process.env.CRAWL_MAX_DEPTH || '2', 10),
  CRAWL_MIN_SCORE: parseFloat(process.env.CRAWL_MIN_SCORE || '0.5'),
  CRAWL_MAX_LINKS_PER_PAGE: parseInt(process.env.CRAWL_MAX_LINKS_PER_PAGE || '100', 10),
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '500', 10), // Visit bound per job
  CRAWL_MAX_RETAINED_JOBS: parseInt(process.env.CRAWL_MAX_RETAINED_JOBS || '100', 10), // Finished jobs kept in memory
  CRAWL_CONCURRENCY: parseInt(process.env.CRAWL_CONCURRENCY || '8', 10),
  CRAWL_PER_DOMAIN_CONCURRENCY: parseInt(process.env.CRAWL_PER_DOMAIN_CONCURRENCY || '4', 10),
  CRAWL_FETCH_TIMEOUT: parseInt(process.env.CRAWL_FETCH_TIMEOUT || '10000', 10), // 10s per page
  CRAWL_USER_AGENT: process.env.CRAWL_USER_AGENT || 'Mozilla/5.0 (compatible; LinkRelevanceCrawler/1.0)',

  // Semantic re-ranking
  RERANK_BAND_LOW: parseFloat(process.env.RERANK_BAND_LOW || '0.3'),
  RERANK_BAND_HIGH: parseFloat(process.env.RERANK_BAND_HIGH || '0.7'),
  RERANK_BATCH_SIZE: parseInt(process.env.RERANK_BATCH_SIZE || '30', 10),
  RERANK_MAX_BATCHES_PER_JOB: parseInt(process.env.RERANK_MAX_BATCHES_PER_JOB || '20', 10),
  RERANK_TIMEOUT: parseInt(process.env.RERANK_TIMEOUT || '20000', 10), // 20s per batch
  RERANK_RATE_PER_MINUTE: parseInt(process.env.RERANK_RATE_PER_MINUTE || '20', 10),
  RERANK_BURST: parseInt(process.env.RERANK_BURST || '3', 10),
  SCORE_MERGE_POLICY: process.env.SCORE_MERGE_POLICY || 'override',
  SCORE_BLEND_WEIGHT: parseFloat(process.env.SCORE_BLEND_WEIGHT || '0.7'),

  // Rate Limiting
  RATE_LIMIT_WINDOW_MS: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
  RATE_LIMIT_MAX_REQUESTS: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '100', 10),
  RATE_LIMIT_ENABLED: process.env.RATE_LIMIT_ENABLED !== 'false',

  // Circuit Breaker (classification backend)
  CIRCUIT_BREAKER_ERROR_THRESHOLD: parseInt(process.env.CIRCUIT_BREAKER_ERROR_THRESHOLD || '50', 10), // 50%
  CIRCUIT_BREAKER_RESET_TIMEOUT: parseInt(process.env.CIRCUIT_BREAKER_RESET_TIMEOUT || '30000', 10),
  CIRCUIT_BREAKER_MIN_REQUESTS: parseInt(process.env.CIRCUIT_BREAKER_MIN_REQUESTS || '5', 10),
} as const;

export default env;
