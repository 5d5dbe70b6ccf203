/**
 * Resume Agent - Shared Services
 *
 * Building blocks for calling third-party LLM APIs from the resume agents
 * (parser, matcher, analyzer):
 * - Rate-limit aware retries with bounded exponential backoff
 * - Retry policy and API credential configuration
 * - Structured logging
 */

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

export const version = '0.1.0';
