export * from './types/index.js';
export * from './config/index.js';
export * from './utils/index.js';
export * from './infra/index.js';
export * from './core/index.js';

import { MeshMonitor } from './core/mesh-monitor.js';

export default MeshMonitor;
