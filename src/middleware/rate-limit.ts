import rateLimit from 'express-rate-limit';

// Global limiter, applied to all routes.
// Broad safety net: 100 requests per minute per IP.
export const globalLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 100,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Too many requests, please try again later.' },
});

// Strict limiter for POST /batches.
// Every batch fans out into paid image generations, so cap at 5 per minute per IP.
export const batchLimiter = rateLimit({
  windowMs: 60 * 1000,
  limit: 5,
  standardHeaders: 'draft-7',
  legacyHeaders: false,
  message: { error: 'Batch rate limit exceeded. Please wait before submitting another batch.' },
});
