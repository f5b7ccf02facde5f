/**
 * Utils index
 */

export * from './logger';
export * from './metrics';
export * from './production-metrics';
export * from './health';
export * from './time';
export * from './validation';
export * from './ring-buffer';
export * from './random';
