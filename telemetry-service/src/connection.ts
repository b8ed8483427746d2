import type { Socket } from 'net';
import { createInterface } from 'readline';
import { SERVICE } from './config.js';
import { decodeLine } from './decoder.js';
import type { RecordSink, WireFormat } from './types.js';

export interface ConnectionOptions {
  /** Dedicated store handle; closed when the connection ends. */
  sink: RecordSink;
  format: WireFormat;
  idleTimeoutMs: number;
  logLines?: boolean;
}

export interface ConnectionSummary {
  peer: string;
  records: number;
  keepalives: number;
  malformed: number;
  storeFailures: number;
  /** Set when the connection ended on an I/O error rather than end-of-stream. */
  error: Error | null;
}

const MAX_LOGGED_LINE = 200;

export function describePeer(socket: Socket): string {
  return `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`;
}

function preview(line: string): string {
  return line.length > MAX_LOGGED_LINE ? `${line.slice(0, MAX_LOGGED_LINE)}...` : line;
}

/**
 * Drive one client's line stream until it disconnects or fails. Idle timeouts
 * are logged and reading continues; every decoded record is appended in
 * arrival order. Resolves once the socket and sink are released.
 */
export async function handleConnection(socket: Socket, opts: ConnectionOptions): Promise<ConnectionSummary> {
  const { sink, format, idleTimeoutMs, logLines = false } = opts;
  const summary: ConnectionSummary = {
    peer: describePeer(socket),
    records: 0,
    keepalives: 0,
    malformed: 0,
    storeFailures: 0,
    error: null,
  };
  const { peer } = summary;

  const onTimeout = () => {
    console.log(`[${SERVICE}] ${peer} idle for ${idleTimeoutMs}ms, still listening`);
  };
  const onError = (e: Error) => {
    summary.error = e;
  };
  if (idleTimeoutMs > 0) socket.setTimeout(idleTimeoutMs);
  socket.on('timeout', onTimeout);
  socket.on('error', onError);

  const rl = createInterface({ input: socket, crlfDelay: Infinity });
  // A destroyed socket never emits 'end'; make sure the line iterator finishes anyway
  const onClose = () => rl.close();
  socket.once('close', onClose);

  try {
    for await (const raw of rl) {
      const line = raw.trim();
      if (!line) continue;
      if (logLines) console.log(`[${SERVICE}] ${peer} <- ${line}`);

      const outcome = decodeLine(line, format);
      switch (outcome.kind) {
        case 'keepalive':
          summary.keepalives++;
          break;
        case 'malformed':
          summary.malformed++;
          console.warn(`[${SERVICE}] ${peer} malformed line (${outcome.reason}): ${preview(outcome.line)}`);
          break;
        case 'record': {
          const result = sink.append(outcome.record);
          if (result.ok) {
            summary.records++;
          } else {
            summary.storeFailures++;
            console.error(`[${SERVICE}] ${peer} failed to persist reading:`, result.error.message);
          }
          break;
        }
      }
    }
  } catch (e) {
    summary.error = e instanceof Error ? e : new Error(String(e));
  } finally {
    socket.off('timeout', onTimeout);
    socket.off('close', onClose);
    rl.close();
    socket.destroy();
    sink.close();
  }

  if (summary.error) {
    console.error(`[${SERVICE}] connection from ${peer} failed:`, summary.error.message);
  }
  console.log(
    `[${SERVICE}] connection from ${peer} ended: ${summary.records} stored, ` +
    `${summary.malformed} malformed, ${summary.keepalives} keepalive, ${summary.storeFailures} store errors`
  );
  return summary;
}
