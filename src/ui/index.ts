/**
 * UI module exports
 */

export * from './logger.js';
