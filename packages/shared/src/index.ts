/**
 * @winline/shared
 * Types, schemas and utilities shared by the services
 */

export * from './types/events';
export * from './types/predictions';
export * from './types/api';
export * from './schemas/events';
export * from './constants';
export * from './utils';
