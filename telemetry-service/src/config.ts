import type { WireFormat } from './types.js';

export const SERVICE = 'telemetry-service';

// Node timers clamp anything longer than this to 1ms
export const MAX_TIMER_MS = 2 ** 31 - 1;

export function numberFromEnv(name: string, fallback: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  if (value > max) {
    throw new Error(`${name} must be at most ${max}, got "${raw}"`);
  }
  return value;
}

export function parseWireFormat(raw: string): WireFormat {
  const value = raw.trim().toLowerCase();
  if (value === 'delimited' || value === 'structured' || value === 'auto') return value;
  throw new Error(`WIRE_FORMAT must be one of delimited|structured|auto, got "${raw}"`);
}

// Listener
export const TCP_HOST: string = process.env.TCP_HOST || '0.0.0.0';
export const TCP_PORT: number = numberFromEnv('TCP_PORT', 9000, 65535);

// Persist readings under system data dir in production by default
const NODE_ENV = process.env.NODE_ENV || 'development';
export const DB_PATH: string = process.env.TELEMETRY_DB || (
  NODE_ENV === 'production'
    ? '/var/lib/telemetry/received_data.db'
    : new URL('../received_data.db', import.meta.url).pathname
);

// Encoding used by every connection; fixed per deployment
export const WIRE_FORMAT: WireFormat = parseWireFormat(process.env.WIRE_FORMAT || 'delimited');

// A connection idle for this long is logged but kept open
export const IDLE_TIMEOUT_MS: number = numberFromEnv('IDLE_TIMEOUT_MS', 5 * 60 * 1000, MAX_TIMER_MS);

// 0 waits for every connection to close on shutdown
export const DRAIN_TIMEOUT_MS: number = numberFromEnv('DRAIN_TIMEOUT_MS', 0, MAX_TIMER_MS);

// Echo every received line (noisy; debugging only)
export const LOG_LINES: boolean = (process.env.LOG_LINES || 'false').toLowerCase() === 'true';
