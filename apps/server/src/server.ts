import type { Server } from 'node:http';
import type { TaskStore } from '@quadrant/core';
import { createApp } from './app.js';

export interface RunningServer {
  readonly url: string;
  readonly server: Server;
  /** Stop accepting connections and wait for open ones to finish */
  close(): Promise<void>;
}

export function startServer(store: TaskStore, opts: { port: number; host: string }): Promise<RunningServer> {
  const app = createApp(store);

  return new Promise((resolve, reject) => {
    const server = app.listen(opts.port, opts.host);
    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      const port = address !== null && typeof address === 'object' ? address.port : opts.port;
      resolve({
        url: `http://${opts.host}:${port}`,
        server,
        close: () => new Promise<void>((done, fail) => {
          server.close(err => (err ? fail(err) : done()));
          server.closeAllConnections();
        }),
      });
    });
  });
}
