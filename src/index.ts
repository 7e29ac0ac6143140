/**
 * Graph Runbooks - throttle-aware Microsoft Graph batch jobs
 */

export * from './types';
export * from './core';
export * from './runbooks';
export * from './utils/constants';
export * from './utils/logger';
