/**
 * Connection Pool
 *
 * Keep-alive agents shared by every call, plus a slot limiter that bounds
 * in-flight requests to `maxConnections`. A caller that cannot get a slot
 * within the pool timeout gives up instead of queueing forever.
 *
 * The pool also hands axios its node transport, which times the connect
 * and write phases of each request on the socket itself. The read phase is
 * left to the axios `timeout`.
 */

import http from 'http';
import https from 'https';

export interface ConnectionPoolOptions {
  /** Maximum concurrent connections (and in-flight requests) */
  maxConnections: number;
  /** Maximum idle keep-alive sockets kept per host */
  maxKeepAlive: number;
  /** Bound on the TCP handshake of a new socket, unbounded when absent */
  connectTimeoutMs?: number;
  /** Bound on flushing the request once the socket is connected */
  writeTimeoutMs?: number;
}

export type SocketPhase = 'connect' | 'write';

export type PhaseTimeouts = Pick<ConnectionPoolOptions, 'connectTimeoutMs' | 'writeTimeoutMs'>;

/**
 * Raised on the request when a socket phase overruns. Carries `ETIMEDOUT`
 * so the retry policy treats it like any other timeout.
 */
export class SocketPhaseTimeoutError extends Error {
  readonly code = 'ETIMEDOUT';

  constructor(
    readonly phase: SocketPhase,
    readonly timeoutMs: number
  ) {
    super(
      phase === 'connect'
        ? `Connection not established within ${timeoutMs}ms`
        : `Request not sent within ${timeoutMs}ms`
    );
    this.name = 'SocketPhaseTimeoutError';
  }
}

/** The parts of `net.Socket` the phase guard watches */
export interface PhaseSocket {
  readonly connecting: boolean;
  once(event: 'connect', listener: () => void): unknown;
}

/** The parts of `http.ClientRequest` the phase guard watches */
export interface PhaseRequest {
  readonly writableFinished: boolean;
  destroy(error?: Error): unknown;
  once(event: 'finish' | 'close', listener: () => void): unknown;
}

/**
 * Node transport axios calls in place of `http`/`https`
 */
export interface RequestTransport {
  request(
    options: http.RequestOptions,
    callback: (response: http.IncomingMessage) => void
  ): http.ClientRequest;
}

/**
 * Arm the connect and write timers for a request that just got its socket.
 *
 * A fresh socket gets `connectTimeoutMs` to connect, then the request gets
 * `writeTimeoutMs` to be flushed. A reused keep-alive socket skips straight
 * to the write phase. Every timer is cleared when the request closes.
 */
export function guardSocketPhases(
  request: PhaseRequest,
  socket: PhaseSocket,
  timeouts: PhaseTimeouts
): void {
  const timers = new Set<NodeJS.Timeout>();
  let written = false;

  const arm = (phase: SocketPhase, timeoutMs: number | undefined): NodeJS.Timeout | undefined => {
    if (timeoutMs === undefined || timeoutMs <= 0) {
      return undefined;
    }
    const timer = setTimeout(() => {
      timers.delete(timer);
      request.destroy(new SocketPhaseTimeoutError(phase, timeoutMs));
    }, timeoutMs);
    timers.add(timer);
    return timer;
  };
  const disarm = (timer: NodeJS.Timeout | undefined): void => {
    if (timer) {
      clearTimeout(timer);
      timers.delete(timer);
    }
  };

  let writeTimer: NodeJS.Timeout | undefined;
  const startWritePhase = (): void => {
    if (!written && !request.writableFinished) {
      writeTimer = arm('write', timeouts.writeTimeoutMs);
    }
  };

  request.once('finish', () => {
    written = true;
    disarm(writeTimer);
  });
  request.once('close', () => {
    for (const timer of timers) {
      clearTimeout(timer);
    }
    timers.clear();
  });

  if (socket.connecting) {
    const connectTimer = arm('connect', timeouts.connectTimeoutMs);
    socket.once('connect', () => {
      disarm(connectTimer);
      startWritePhase();
    });
  } else {
    startWritePhase();
  }
}

export interface ConnectionPoolStats {
  active: number;
  waiting: number;
  maxConnections: number;
  maxKeepAlive: number;
  closed: boolean;
}

interface Waiter {
  grant: (granted: boolean) => void;
  timer: NodeJS.Timeout;
}

export class ConnectionPool {
  readonly httpAgent: http.Agent;
  readonly httpsAgent: https.Agent;
  readonly transport: RequestTransport = {
    request: (options, callback) => {
      const request =
        options.protocol === 'https:'
          ? https.request(options, callback)
          : http.request(options, callback);
      request.on('socket', (socket) => guardSocketPhases(request, socket, this.options));
      return request;
    },
  };
  private active = 0;
  private waiters: Waiter[] = [];
  private closed = false;

  constructor(private readonly options: ConnectionPoolOptions) {
    const agentOptions = {
      keepAlive: true,
      keepAliveMsecs: 1000,
      maxSockets: options.maxConnections,
      maxFreeSockets: options.maxKeepAlive,
    };
    this.httpAgent = new http.Agent(agentOptions);
    this.httpsAgent = new https.Agent(agentOptions);
  }

  /**
   * Wait for a connection slot.
   *
   * @returns true once a slot is held, false if none freed up in time or the
   * pool is closed
   */
  acquire(timeoutMs: number): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }
    if (this.active < this.options.maxConnections) {
      this.active++;
      return Promise.resolve(true);
    }
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      const waiter: Waiter = {
        grant: resolve,
        timer: setTimeout(() => {
          this.waiters = this.waiters.filter((entry) => entry !== waiter);
          resolve(false);
        }, timeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Return a slot, handing it straight to the next waiter if there is one
   */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.grant(true);
      return;
    }
    if (this.active > 0) {
      this.active--;
    }
  }

  getStats(): ConnectionPoolStats {
    return {
      active: this.active,
      waiting: this.waiters.length,
      maxConnections: this.options.maxConnections,
      maxKeepAlive: this.options.maxKeepAlive,
      closed: this.closed,
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Fail pending waiters and destroy every socket
   */
  close(): void {
    this.closed = true;
    for (const waiter of this.waiters) {
      clearTimeout(waiter.timer);
      waiter.grant(false);
    }
    this.waiters = [];
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
