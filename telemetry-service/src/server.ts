import { createServer } from 'net';
import type { Server, Socket } from 'net';
import { SERVICE } from './config.js';
import { describePeer, handleConnection } from './connection.js';
import type { RecordSink, WireFormat } from './types.js';

export interface AcceptorOptions {
  host: string;
  port: number;
  /** Shutdown flag; once aborted no further connections are accepted. */
  signal: AbortSignal;
  /** Opens a store handle dedicated to one connection. */
  openSink: () => RecordSink;
  format: WireFormat;
  idleTimeoutMs: number;
  /** Force-close connections still open this long after shutdown began; 0 waits forever. */
  drainTimeoutMs?: number;
  logLines?: boolean;
}

export interface AcceptorStats {
  accepted: number;
  rejected: number;
  active: number;
}

export interface Acceptor {
  address(): { host: string; port: number };
  stats(): AcceptorStats;
  /** Stop accepting (if not already) and resolve once every handler has closed. */
  drain(): Promise<void>;
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (e: Error) => reject(e);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

/**
 * Bind the listening socket and spawn an independent handler per client.
 * Rejects when the socket cannot be bound.
 */
export async function startAcceptor(opts: AcceptorOptions): Promise<Acceptor> {
  const { host, port, signal, openSink, format, idleTimeoutMs, drainTimeoutMs = 0, logLines = false } = opts;
  const inFlight = new Map<Socket, Promise<void>>();
  const counters = { accepted: 0, rejected: 0 };
  const server = createServer();

  server.on('connection', (socket: Socket) => {
    const peer = describePeer(socket);
    if (signal.aborted) {
      counters.rejected++;
      socket.destroy();
      return;
    }
    let sink: RecordSink;
    try {
      sink = openSink();
    } catch (e) {
      counters.rejected++;
      console.error(`[${SERVICE}] failed to open store for ${peer}:`, e instanceof Error ? e.message : e);
      socket.destroy();
      return;
    }
    counters.accepted++;
    console.log(`[${SERVICE}] client connected: ${peer}`);
    const task = handleConnection(socket, { sink, format, idleTimeoutMs, logLines })
      .then(
        () => undefined,
        (e: unknown) => {
          console.error(`[${SERVICE}] handler for ${peer} crashed:`, e);
        }
      )
      .finally(() => {
        inFlight.delete(socket);
      });
    inFlight.set(socket, task);
  });

  await listen(server, port, host);

  // Accept failures after startup (e.g. EMFILE) are not fatal
  server.on('error', (e) => {
    console.error(`[${SERVICE}] accept error:`, e.message);
  });

  const info = server.address();
  const bound = typeof info === 'object' && info !== null ? { host: info.address, port: info.port } : { host, port };
  console.log(`[${SERVICE}] listening on ${bound.host}:${bound.port}`);

  let closed: Promise<void> | null = null;
  const stopAccepting = (): Promise<void> => {
    if (!closed) {
      console.log(`[${SERVICE}] no longer accepting connections (${inFlight.size} open)`);
      closed = new Promise((resolve) => {
        server.close(() => resolve());
      });
    }
    return closed;
  };
  if (signal.aborted) void stopAccepting();
  else signal.addEventListener('abort', () => void stopAccepting(), { once: true });

  return {
    address: () => bound,
    stats: () => ({ ...counters, active: inFlight.size }),
    async drain() {
      const serverClosed = stopAccepting();
      let deadline: NodeJS.Timeout | null = null;
      if (drainTimeoutMs > 0 && inFlight.size > 0) {
        deadline = setTimeout(() => {
          console.warn(`[${SERVICE}] drain deadline reached, closing ${inFlight.size} connection(s)`);
          for (const socket of inFlight.keys()) socket.destroy();
        }, drainTimeoutMs);
      }
      try {
        await Promise.all(inFlight.values());
      } finally {
        if (deadline) clearTimeout(deadline);
      }
      await serverClosed;
    },
  };
}
