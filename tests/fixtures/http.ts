import http from 'node:http';
import type { AddressInfo } from 'node:net';
import type express from 'express';

export interface TestServer {
  baseUrl: string;
  close(): Promise<void>;
}

export function listen(app: express.Express): Promise<TestServer> {
  const server = http.createServer(app);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const { port }: AddressInfo = addressOf(server);
      resolve({
        baseUrl: `http://127.0.0.1:${port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            // SSE responses keep their sockets open.
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}

function addressOf(server: http.Server): AddressInfo {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address;
}

export interface JsonResponse {
  status: number;
  body: Record<string, unknown>;
}

export async function requestJson(
  baseUrl: string,
  method: string,
  path: string,
  opts: { token?: string; body?: unknown } = {},
): Promise<JsonResponse> {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (opts.token) headers.Authorization = `Bearer ${opts.token}`;
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
  });
  const text = await response.text();
  const parsed: unknown = text ? JSON.parse(text) : {};
  return { status: response.status, body: isRecord(parsed) ? parsed : { items: parsed } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Splits a finished SSE body into its JSON payloads. */
export function parseEventStream(text: string): Array<Record<string, unknown>> {
  return text
    .split('\n\n')
    .map((chunk) => chunk.trim())
    .filter((chunk) => chunk.startsWith('data: '))
    .map((chunk) => {
      const parsed: unknown = JSON.parse(chunk.slice('data: '.length));
      if (!isRecord(parsed)) throw new Error(`Unexpected event payload: ${chunk}`);
      return parsed;
    });
}
