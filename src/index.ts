/**
 * @module index
 * @description Main package entry point
 * @status COMPLETE
 * @dependencies all modules
 */

// Type exports
export * from './types';

// Trace exports
export * from './trace';

// SQL structure exports
export * from './sql';

// Metadata exports
export * from './metadata';

// Analyzer exports
export * from './analyzer';

// Logging exports
export { createConsoleLogger, silentLogger, type LogLevel } from './logging/logger';

// Output exports
export * from './output';

// Constants
export * from './constants';
