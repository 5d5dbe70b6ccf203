/**
 * Utility functions for resume-agent-services
 */

export * from './retrying-caller/index.js';
