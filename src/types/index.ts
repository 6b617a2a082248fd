export * from './router.js';
export * from './mesh.js';
export * from './vendor.js';
