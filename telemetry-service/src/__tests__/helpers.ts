import { once } from 'events';
import { connect } from 'net';
import type { Server, Socket } from 'net';
import type { AppendResult, RecordSink, SensorRecord } from '../types.js';

/** In-memory stand-in for a connection's store handle. */
export class MemorySink implements RecordSink {
  readonly records: SensorRecord[] = [];
  closed = false;
  /** Number of upcoming appends that fail. */
  failNext = 0;

  append(record: SensorRecord): AppendResult {
    if (this.closed) return { ok: false, error: new Error('sink closed') };
    if (this.failNext > 0) {
      this.failNext--;
      return { ok: false, error: new Error('disk I/O error') };
    }
    this.records.push(record);
    return { ok: true };
  }

  close(): void {
    this.closed = true;
  }
}

export function csvLine(sessionId: number | 'None', timestamp: string, latitude = 0): string {
  return `${sessionId},${timestamp},${latitude},0,0,0,0,0,0,0,0,0,0,0,0`;
}

export function portOf(server: Server): number {
  const info = server.address();
  if (typeof info !== 'object' || info === null) throw new Error('server is not listening');
  return info.port;
}

export async function connectClient(port: number): Promise<Socket> {
  const client = connect(port, '127.0.0.1');
  await once(client, 'connect');
  // Resets from a server-side close are expected in these tests
  client.on('error', () => {});
  return client;
}

/** Resolve once `socket` is fully closed. */
export async function closed(socket: Socket): Promise<void> {
  if (socket.closed) return;
  await once(socket, 'close');
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until `predicate` holds or `timeoutMs` elapses. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const started = Date.now();
  while (!predicate()) {
    if (Date.now() - started > timeoutMs) throw new Error('condition not met in time');
    await sleep(10);
  }
}
