export type Encoding = 'delimited' | 'structured';

export function parseEncoding(raw: string): Encoding {
  const value = raw.trim().toLowerCase();
  if (value === 'delimited' || value === 'structured') return value;
  throw new Error(`WIRE_FORMAT must be one of delimited|structured, got "${raw}"`);
}

export interface Reading {
  sessionId: number | null;
  timestamp: string;
  latitude: number;
  longitude: number;
  altitude: number;
  accel_x: number;
  accel_y: number;
  accel_z: number;
  gyro_x: number;
  gyro_y: number;
  gyro_z: number;
  dac_1: number;
  dac_2: number;
  dac_3: number;
  dac_4: number;
}

const FIELD_ORDER = [
  'latitude', 'longitude', 'altitude',
  'accel_x', 'accel_y', 'accel_z',
  'gyro_x', 'gyro_y', 'gyro_z',
  'dac_1', 'dac_2', 'dac_3', 'dac_4',
] as const;

const GRAVITY = 9.81;

function round(n: number, digits = 6): number {
  const f = 10 ** digits;
  return Math.round(n * f) / f;
}

/**
 * Synthetic reading for sample `seq`: a slow walk around `origin` with a
 * little sensor noise from `rand`.
 */
export function generateReading(
  seq: number,
  opts: { sessionId: number | null; origin: { lat: number; lon: number }; now?: Date; rand?: () => number }
): Reading {
  const rand = opts.rand ?? Math.random;
  const noise = () => (rand() - 0.5) * 0.02;
  const heading = seq / 60;
  return {
    sessionId: opts.sessionId,
    timestamp: (opts.now ?? new Date()).toISOString(),
    latitude: round(opts.origin.lat + Math.sin(heading) * 0.0005),
    longitude: round(opts.origin.lon + Math.cos(heading) * 0.0005),
    altitude: round(20 + noise() * 100, 3),
    accel_x: round(noise(), 4),
    accel_y: round(noise(), 4),
    accel_z: round(GRAVITY + noise(), 4),
    gyro_x: round(noise(), 4),
    gyro_y: round(noise(), 4),
    gyro_z: round(noise(), 4),
    dac_1: round(rand() * 3.3, 3),
    dac_2: round(rand() * 3.3, 3),
    dac_3: round(rand() * 3.3, 3),
    dac_4: round(rand() * 3.3, 3),
  };
}

export function encodeReading(reading: Reading, encoding: Encoding): string {
  if (encoding === 'structured') {
    return JSON.stringify({ type: 'sensor_data', ...reading });
  }
  const session = reading.sessionId === null ? 'None' : String(reading.sessionId);
  return [session, reading.timestamp, ...FIELD_ORDER.map((f) => String(reading[f]))].join(',');
}

export function encodeKeepalive(encoding: Encoding): string {
  return encoding === 'structured' ? JSON.stringify({ type: 'keepalive' }) : 'None,keepalive';
}
