/**
 * Mock Task Service for Integration Tests
 *
 * A real HTTP server on localhost whose handlers are scripted per test.
 * Every request is recorded with its parsed URL, headers and body.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';

export interface ReceivedRequest {
  method: string;
  /** Path and query as sent on the wire */
  url: string;
  headers: IncomingMessage['headers'];
  body: string;
}

export interface HandlerReply {
  status: number;
  body?: unknown;
  /** Hold the reply back this long */
  delayMs?: number;
}

export type TaskServiceHandler = (request: ReceivedRequest) => HandlerReply;

const DEFAULT_HANDLER: TaskServiceHandler = () => ({
  status: 200,
  body: { code: 200, success: true, message: 'success', data: null },
});

export class MockTaskService {
  readonly received: ReceivedRequest[] = [];
  private server: Server | null = null;
  private handler: TaskServiceHandler = DEFAULT_HANDLER;
  private readonly timers = new Set<NodeJS.Timeout>();

  /**
   * Start listening on a free port and return it
   */
  async start(): Promise<number> {
    const server = createServer((req, res) => this.handle(req, res));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(0, '127.0.0.1', () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Mock task service has no TCP address'));
          return;
        }
        resolve(address.port);
      });
    });
  }

  async stop(): Promise<void> {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();

    const server = this.server;
    this.server = null;
    if (!server) {
      return;
    }
    server.closeAllConnections();
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  setHandler(handler: TaskServiceHandler): void {
    this.handler = handler;
  }

  reset(): void {
    this.received.length = 0;
    this.handler = DEFAULT_HANDLER;
  }

  private handle(req: IncomingMessage, res: ServerResponse): void {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const request: ReceivedRequest = {
        method: req.method ?? '',
        url: req.url ?? '',
        headers: req.headers,
        body: Buffer.concat(chunks).toString('utf8'),
      };
      this.received.push(request);

      const reply = this.handler(request);
      const send = (): void => {
        if (res.destroyed) {
          return;
        }
        const text =
          reply.body === undefined
            ? ''
            : typeof reply.body === 'string'
              ? reply.body
              : JSON.stringify(reply.body);
        res.writeHead(reply.status, { 'Content-Type': 'application/json' });
        res.end(text);
      };

      if (reply.delayMs) {
        const timer = setTimeout(() => {
          this.timers.delete(timer);
          send();
        }, reply.delayMs);
        this.timers.add(timer);
      } else {
        send();
      }
    });
  }
}

/**
 * Find a port nothing listens on by binding and releasing one
 */
export async function findClosedPort(): Promise<number> {
  const probe = new MockTaskService();
  const port = await probe.start();
  await probe.stop();
  return port;
}
