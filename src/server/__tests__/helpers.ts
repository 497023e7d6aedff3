import http from 'node:http';
import type { AddressInfo } from 'node:net';
import type express from 'express';

export interface TestResponse {
  status: number;
  body: unknown;
}

/** Serves `app` on an ephemeral local port for a single request. */
export async function request(
  app: express.Express,
  method: string,
  path: string,
  options: { body?: Record<string, unknown>; token?: string } = {},
): Promise<TestResponse> {
  const server = http.createServer(app);

  return new Promise((resolve, reject) => {
    server.listen(0, '127.0.0.1', () => {
      const { port } = server.address() as AddressInfo;
      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (options.token) headers.Authorization = `Bearer ${options.token}`;

      const init: RequestInit = { method, headers };
      if (options.body) init.body = JSON.stringify(options.body);

      fetch(`http://127.0.0.1:${port}${path}`, init)
        .then(async (r) => {
          const body: unknown = await r.json();
          server.close();
          resolve({ status: r.status, body });
        })
        .catch((err: unknown) => {
          server.close();
          reject(err);
        });
    });
  });
}
