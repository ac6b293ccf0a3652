/**
 * Shared test helpers: an in-process renderer stand-in and a tiny HTTP client
 * for an app bound to an ephemeral loopback port.
 */
import http from 'http';
import { Express } from 'express';
import { ServiceConfig } from '../src/config';
import { HtmlRenderer } from '../src/services/PdfRenderer';

export const TEST_API_KEY = 'test-secret';

export function testConfig(overrides: Partial<ServiceConfig> = {}): ServiceConfig {
  return {
    apiKey: TEST_API_KEY,
    allowedOrigins: ['*'],
    host: '127.0.0.1',
    port: 0,
    renderer: {
      executablePath: '/usr/bin/chromium',
      format: 'A4',
      margin: '10mm',
      printBackground: true
    },
    ...overrides
  };
}

/**
 * Records every HTML string it is asked to render and returns fake PDF bytes
 * (including non-ASCII bytes) derived from it.
 */
export class FakeRenderer implements HtmlRenderer {
  readonly calls: string[] = [];
  failure: Error | null = null;
  closed = false;

  async render(html: string): Promise<Buffer> {
    this.calls.push(html);
    if (this.failure) {
      throw this.failure;
    }
    return fakePdf(html);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function fakePdf(html: string): Buffer {
  return Buffer.concat([
    Buffer.from('%PDF-1.7\n'),
    Buffer.from([0xe2, 0xe3, 0xcf, 0xd3, 0x00, 0xff]),
    Buffer.from(html, 'utf8'),
    Buffer.from('\n%%EOF')
  ]);
}

export interface TestResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: Buffer;
}

export interface TestServer {
  readonly server: http.Server;
  request(method: string, path: string, options?: RequestOptions): Promise<TestResponse>;
  close(): Promise<void>;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  json?: unknown;
  rawBody?: string;
}

export async function startServer(app: Express): Promise<TestServer> {
  const server = await new Promise<http.Server>((resolve) => {
    const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
  });

  const address = server.address();
  if (typeof address !== 'object' || address === null) {
    throw new Error('Server is not listening on a TCP port');
  }
  const port = address.port;

  return {
    server,

    request(method, path, options = {}) {
      const headers: Record<string, string> = { ...options.headers };
      let payload: string | undefined = options.rawBody;
      if (options.json !== undefined) {
        payload = JSON.stringify(options.json);
        headers['Content-Type'] = 'application/json';
      }

      return new Promise<TestResponse>((resolve, reject) => {
        const req = http.request({ host: '127.0.0.1', port, method, path, headers, agent: false }, (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('end', () =>
            resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks) })
          );
          res.on('error', reject);
        });
        req.on('error', reject);
        if (payload !== undefined) {
          req.write(payload);
        }
        req.end();
      });
    },

    close() {
      return new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }
  };
}

export function parseJson(response: TestResponse): unknown {
  return JSON.parse(response.body.toString('utf8'));
}
