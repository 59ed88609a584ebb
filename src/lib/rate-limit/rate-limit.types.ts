/**
 * Rate Limit Types
 * Type definitions for the rate limiting system
 */

/**
 * Sliding-window limit applied to inbound API requests
 */
export interface RateLimitConfig {
  windowMs: number;                    // Time window in milliseconds
  maxRequests: number;                 // Maximum requests per window
  message?: string;                    // Custom error message
  standardHeaders?: boolean;           // Include standard rate limit headers
  legacyHeaders?: boolean;             // Include legacy X-RateLimit-* headers
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  resetTime: number;                   // Timestamp when limit resets
  totalRequests: number;               // Requests in current window
}

export interface RateLimitStats {
  totalRequests: number;
  blockedRequests: number;
  activeKeys: number;
  redisAvailable: boolean;
}

/**
 * Token bucket gating outbound calls to a metered backend
 */
export interface TokenBucketConfig {
  capacity: number;                    // Maximum burst
  refillPerSecond: number;             // Sustained rate
}

export interface TokenBucketStats {
  available: number;
  granted: number;
  waited: number;                      // Acquisitions that had to wait
}
