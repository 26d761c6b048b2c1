/**
 * Configuration Module
 */

export * from './env.js';
export * from './app-config.js';
