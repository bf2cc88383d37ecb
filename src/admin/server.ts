import { createServer, type Server } from 'node:http';
import { createAdminHandler } from './handler.js';
import type { AdminOperations } from '../types.js';

let server: Server | null = null;

/**
 * Start the administrative HTTP server. Resolves with the port it listens on.
 */
export function startAdminServer(ops: AdminOperations, port: number, host = '0.0.0.0'): Promise<number> {
  const handler = createAdminHandler(ops);

  return new Promise((resolve, reject) => {
    const instance = createServer((req, res) => {
      handler(req, res).catch((error: unknown) => {
        console.error('Admin request failed:', error);
        if (!res.headersSent) res.writeHead(500);
        res.end();
      });
    });

    instance.on('error', reject);
    instance.listen(port, host, () => {
      server = instance;
      const address = instance.address();
      const actual = typeof address === 'object' && address ? address.port : port;
      console.error(`Sync admin API: http://localhost:${actual}/sync/api/status`);
      resolve(actual);
    });
  });
}

/**
 * Stop the administrative server.
 */
export function stopAdminServer(): Promise<void> {
  return new Promise((resolve) => {
    if (server) {
      server.close(() => {
        server = null;
        resolve();
      });
    } else {
      resolve();
    }
  });
}
