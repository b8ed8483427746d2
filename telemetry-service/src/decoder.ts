import { z } from 'zod';
import { SCALAR_FIELDS } from './types.js';
import type { DecodeOutcome, SensorRecord, WireFormat } from './types.js';

export const DELIMITER = ',';
export const MIN_FIELDS = 2 + SCALAR_FIELDS.length; // sessionId, timestamp, scalars
export const NO_SESSION_TOKEN = 'None';
export const KEEPALIVE_TOKEN = 'keepalive';

const KEEPALIVE_DISCRIMINATOR = /"type"\s*:\s*"keepalive"/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER = /^[+-]?\d+$/;
const SESSION_ID_MIN = -(2 ** 31);
const SESSION_ID_MAX = 2 ** 31 - 1;

const scalar = z.number().finite();

export const StructuredRecordSchema = z.object({
  type: z.enum(['sensor_data', 'keepalive']).optional(),
  sessionId: z.number().finite().int().min(SESSION_ID_MIN).max(SESSION_ID_MAX).nullable().optional(),
  timestamp: z.string(),
  latitude: scalar,
  longitude: scalar,
  altitude: scalar,
  accel_x: scalar,
  accel_y: scalar,
  accel_z: scalar,
  gyro_x: scalar,
  gyro_y: scalar,
  gyro_z: scalar,
  dac_1: scalar,
  dac_2: scalar,
  dac_3: scalar,
  dac_4: scalar,
});

function isKeepaliveTimestamp(timestamp: string): boolean {
  return timestamp.includes(KEEPALIVE_TOKEN);
}

/**
 * Lenient float: anything that is not a plain finite decimal becomes 0.
 * Fields are taken as-is, so padding around a number also yields 0.
 */
export function parseScalar(field: string | undefined): number {
  const s = field ?? '';
  if (!DECIMAL.test(s)) return 0;
  const n = Number(s);
  return Number.isFinite(n) ? n : 0;
}

/** Session ids are 32-bit signed; anything else means no session. */
export function parseSessionId(field: string | undefined): number | null {
  const s = field ?? '';
  if (s === NO_SESSION_TOKEN || !INTEGER.test(s)) return null;
  const n = Number(s);
  return n >= SESSION_ID_MIN && n <= SESSION_ID_MAX ? n : null;
}

export function decodeDelimited(line: string): DecodeOutcome {
  const fields = line.split(DELIMITER);
  const timestamp = fields[1];
  if (timestamp !== undefined && isKeepaliveTimestamp(timestamp)) {
    return { kind: 'keepalive' };
  }
  if (fields.length < MIN_FIELDS) {
    return { kind: 'malformed', line, reason: `too few fields (${fields.length} < ${MIN_FIELDS})` };
  }
  const at = (i: number): number => parseScalar(fields[i]);
  const record: SensorRecord = {
    sessionId: parseSessionId(fields[0]),
    timestamp: fields[1] ?? '',
    latitude: at(2),
    longitude: at(3),
    altitude: at(4),
    accel_x: at(5),
    accel_y: at(6),
    accel_z: at(7),
    gyro_x: at(8),
    gyro_y: at(9),
    gyro_z: at(10),
    dac_1: at(11),
    dac_2: at(12),
    dac_3: at(13),
    dac_4: at(14),
  };
  return { kind: 'record', record };
}

export function decodeStructured(line: string): DecodeOutcome {
  // Keepalives are cheap to spot and need not be valid records
  if (KEEPALIVE_DISCRIMINATOR.test(line)) return { kind: 'keepalive' };

  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (e) {
    return { kind: 'malformed', line, reason: `invalid JSON: ${e instanceof Error ? e.message : String(e)}` };
  }
  const parsed = StructuredRecordSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? issue.path.join('.') : 'object';
    return { kind: 'malformed', line, reason: `${where}: ${issue ? issue.message : 'invalid'}` };
  }
  const { type, sessionId, ...rest } = parsed.data;
  if (type === 'keepalive' || isKeepaliveTimestamp(rest.timestamp)) {
    return { kind: 'keepalive' };
  }
  return { kind: 'record', record: { sessionId: sessionId ?? null, ...rest } };
}

/**
 * Decode one trimmed, non-empty line. `auto` picks the structured decoder for
 * lines that open with `{`.
 */
export function decodeLine(line: string, format: WireFormat): DecodeOutcome {
  switch (format) {
    case 'delimited':
      return decodeDelimited(line);
    case 'structured':
      return decodeStructured(line);
    case 'auto':
      return line.startsWith('{') ? decodeStructured(line) : decodeDelimited(line);
  }
}
