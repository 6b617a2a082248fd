export * from './vendor-transport.js';
export * from './http-transport.js';
export * from './session-client.js';
export * from './router-poller.js';
export * from './mapping-store.js';
export * from './router-control.js';
