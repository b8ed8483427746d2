/**
 * Telemetry Service
 * ---------------------------------------------
 * Purpose
 * - Ingest newline-delimited sensor readings from many concurrent TCP clients
 *   and record each valid reading in SQLite (`received_data.db`).
 *
 * Responsibilities
 * - Accept connections on TCP_HOST:TCP_PORT; one independent handler per client.
 * - Decode each line as a reading, a keepalive, or a malformed line.
 * - Append readings to `sensor_data`, one row per reading, in arrival order.
 *
 * Wire Contracts
 * - delimited: `sessionId,timestamp,latitude,longitude,altitude,accel_x,accel_y,accel_z,
 *   gyro_x,gyro_y,gyro_z,dac_1,dac_2,dac_3,dac_4` (sessionId `None` = no session).
 * - structured: one JSON object per line with the same keys; `{"type":"keepalive"}`
 *   is a keepalive.
 * - No acknowledgement is sent back to clients.
 *
 * Environment & Dependencies
 * - TCP_HOST, TCP_PORT: listener (default 0.0.0.0:9000).
 * - TELEMETRY_DB: path to SQLite database file.
 * - WIRE_FORMAT: delimited | structured | auto.
 * - IDLE_TIMEOUT_MS, DRAIN_TIMEOUT_MS, LOG_LINES: see src/config.ts.
 *
 * Operational Notes
 * - Idle clients are kept open; only end-of-stream or a socket error closes a handler.
 * - Malformed lines and failed writes are logged and skipped; nothing is retried.
 * - WAL mode plus a busy timeout lets per-connection handles write concurrently.
 * - Shutdown stops accepting and waits for open connections via `registerShutdown()`.
 *
 * Security Notes
 * - Clients are not authenticated; bind to a trusted network only.
 * - LOG_LINES echoes raw payloads; leave it off in production.
 */
import {
  SERVICE,
  DB_PATH,
  TCP_HOST,
  TCP_PORT,
  WIRE_FORMAT,
  IDLE_TIMEOUT_MS,
  DRAIN_TIMEOUT_MS,
  LOG_LINES,
} from './config.js';
import { initDb, openSink } from './db.js';
import { startAcceptor } from './server.js';
import { registerShutdown } from './shutdown.js';

async function main() {
  console.log(`[${SERVICE}] starting...`);
  console.log(`[${SERVICE}] db=${DB_PATH} format=${WIRE_FORMAT} idle_timeout=${IDLE_TIMEOUT_MS}ms`);
  // Schema is created once; each connection then opens its own handle
  const db = initDb(DB_PATH);
  db.close();

  const controller = new AbortController();
  const acceptor = await startAcceptor({
    host: TCP_HOST,
    port: TCP_PORT,
    signal: controller.signal,
    openSink: () => openSink(DB_PATH),
    format: WIRE_FORMAT,
    idleTimeoutMs: IDLE_TIMEOUT_MS,
    drainTimeoutMs: DRAIN_TIMEOUT_MS,
    logLines: LOG_LINES,
  });
  registerShutdown(controller, acceptor);
}

main().catch((e) => {
  console.error(`[${SERVICE}] startup failed:`, e);
  process.exitCode = 1;
});
