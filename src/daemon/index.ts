/**
 * PLTX daemon: JSON-RPC transport, streaming sessions and plugin config.
 */

export * from './config.js';
export * from './logger.js';
export * from './session.js';
export * from './server.js';
