import rateLimit from 'express-rate-limit';

/**
 * Rate Limiting Middleware
 *
 * IP-based limits for the admin API. Values are easily adjustable - just
 * change the numbers.
 */

/**
 * Standard rate limit for admin API endpoints
 * 300 requests per minute per IP
 */
export const standardRateLimit = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: 300,
    message: { success: false, error: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later' } },
    standardHeaders: true,
    legacyHeaders: false,
});

/**
 * Rate limit for manual runs
 * 30 per minute per IP: each run makes outbound vendor requests
 */
export const runRateLimit = rateLimit({
    windowMs: 60 * 1000,
    limit: 30,
    message: { success: false, error: { code: 'RATE_LIMITED', message: 'Too many manual runs, please try again later' } },
    standardHeaders: true,
    legacyHeaders: false,
});
