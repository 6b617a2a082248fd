export * from './reconciler.js';
export * from './client-counts.js';
export * from './mesh-coordinator.js';
export * from './mesh-monitor.js';
