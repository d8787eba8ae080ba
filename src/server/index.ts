/**
 * HTTP server exports
 */

export { createApp, SINGLE_FIELD, BATCH_FIELD, type AppOptions } from './app.js';
export { startServer, type RunningServer } from './server.js';
