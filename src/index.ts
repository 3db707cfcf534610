export * from './core/index.js';
export * from './services/tracker-service.js';
export { createApp, startServer, stopServer } from './server/index.js';
export type { CreateAppOptions, StartServerOptions } from './server/index.js';
