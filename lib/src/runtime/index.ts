/**
 * Runtime Module
 */

export * from './create-runtime.js';
