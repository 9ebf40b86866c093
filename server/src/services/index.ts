/**
 * Main services barrel file.
 * Re-exports the monitoring pipeline modules.
 */

export * from './alerts';
export * from './audit';
export * from './monitor';
export * from './observation';
export * from './resolver';
export * from './tracking';
