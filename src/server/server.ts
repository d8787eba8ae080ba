/**
 * Node HTTP listener for the API application
 */

import type { Server } from 'net';
import { serve } from '@hono/node-server';
import type { Hono } from 'hono';
import type { Logger, ServerConfig } from '../types.js';

export interface RunningServer {
  /** Resolved listen URL */
  url: string;
  close(): Promise<void>;
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

/**
 * Start listening; resolves once the port is bound
 */
export function startServer(app: Hono, config: ServerConfig, logger: Logger): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server: Server = serve(
      {
        fetch: app.fetch,
        hostname: config.host,
        port: config.port,
      },
      info => {
        const url = `http://${info.address}:${info.port}`;
        logger.info(`Listening on ${url}`);
        resolve({ url, close: () => closeServer(server) });
      }
    );

    server.once('error', reject);
  });
}
