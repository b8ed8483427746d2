export type WireFormat = 'delimited' | 'structured' | 'auto';

/** Scalar columns, in wire and storage order. */
export const SCALAR_FIELDS = [
  'latitude',
  'longitude',
  'altitude',
  'accel_x',
  'accel_y',
  'accel_z',
  'gyro_x',
  'gyro_y',
  'gyro_z',
  'dac_1',
  'dac_2',
  'dac_3',
  'dac_4',
] as const;

export type ScalarField = typeof SCALAR_FIELDS[number];

/** One fully populated sensor observation. */
export type SensorRecord = {
  sessionId: number | null;
  timestamp: string;
} & { [K in ScalarField]: number };

export type DecodeOutcome =
  | { kind: 'record'; record: SensorRecord }
  | { kind: 'keepalive' }
  | { kind: 'malformed'; line: string; reason: string };

export type AppendResult = { ok: true } | { ok: false; error: Error };

/** Store handle owned by exactly one connection. */
export interface RecordSink {
  append(record: SensorRecord): AppendResult;
  close(): void;
}
