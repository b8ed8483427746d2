import { connect } from 'net';
import type { Socket } from 'net';
import { encodeKeepalive, encodeReading, generateReading, parseEncoding } from './readings.js';
import type { Encoding } from './readings.js';

// Simple virtual sensor node that:
// 1) Connects to the telemetry service over TCP
// 2) Streams one reading per TELEMETRY_PERIOD_MS in WIRE_FORMAT
// 3) Replaces every KEEPALIVE_EVERY-th reading with a keepalive
// 4) Reconnects after RECONNECT_MS when the connection drops

const HOST = process.env.TELEMETRY_HOST || '127.0.0.1';
const PORT = Number(process.env.TELEMETRY_PORT || 9000);
const WIRE_FORMAT: Encoding = parseEncoding(process.env.WIRE_FORMAT || 'delimited');
const TELEMETRY_PERIOD_MS = Number(process.env.TELEMETRY_PERIOD_MS || 1000);
const KEEPALIVE_EVERY = Number(process.env.KEEPALIVE_EVERY || 10);
const RECONNECT_MS = Number(process.env.RECONNECT_MS || 3000);
const SESSION_ID: number | null = process.env.SESSION_ID ? Number(process.env.SESSION_ID) : null;
const ORIGIN = {
  lat: Number(process.env.ORIGIN_LAT || 60.1699),
  lon: Number(process.env.ORIGIN_LON || 24.9384),
};

let socket: Socket | null = null;
let timer: NodeJS.Timeout | null = null;
let reconnectTimer: NodeJS.Timeout | null = null;
let stopping = false;
let seq = 0;

function stopStreaming() {
  if (timer) { clearInterval(timer); timer = null; }
}

function sendNext(s: Socket) {
  seq++;
  const line = KEEPALIVE_EVERY > 0 && seq % KEEPALIVE_EVERY === 0
    ? encodeKeepalive(WIRE_FORMAT)
    : encodeReading(generateReading(seq, { sessionId: SESSION_ID, origin: ORIGIN }), WIRE_FORMAT);
  s.write(`${line}\n`);
  if (seq % 10 === 0) console.log(`[virtual-sensor] sent ${seq} lines`);
}

function start() {
  console.log(`[virtual-sensor] connecting to ${HOST}:${PORT} (${WIRE_FORMAT})`);
  const s = connect(PORT, HOST);
  socket = s;

  s.on('connect', () => {
    console.log(`[virtual-sensor] connected, streaming every ${TELEMETRY_PERIOD_MS}ms`);
    timer = setInterval(() => sendNext(s), TELEMETRY_PERIOD_MS);
  });

  s.on('error', (err) => {
    console.error('[virtual-sensor] connection error', err.message);
  });

  s.on('close', () => {
    stopStreaming();
    socket = null;
    if (stopping) return;
    console.log(`[virtual-sensor] connection closed, retrying in ${RECONNECT_MS}ms`);
    reconnectTimer = setTimeout(start, RECONNECT_MS);
  });
}

function shutdown() {
  console.log('[virtual-sensor] shutting down...');
  stopping = true;
  stopStreaming();
  if (reconnectTimer) { clearTimeout(reconnectTimer); reconnectTimer = null; }
  if (socket) socket.end(() => process.exit(0));
  else process.exit(0);
}
process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

start();
