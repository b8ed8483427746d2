import { describe, expect, it } from 'vitest';

import { decodeDelimited, decodeLine, decodeStructured, parseScalar, parseSessionId } from '../decoder.js';
import type { DecodeOutcome, SensorRecord } from '../types.js';

function recordOf(outcome: DecodeOutcome): SensorRecord {
  if (outcome.kind !== 'record') throw new Error(`expected record, got ${outcome.kind}`);
  return outcome.record;
}

const ZERO_TAIL = ',0,0,0,0,0,0,0,0,0,0';

function structured(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    sessionId: 12,
    timestamp: '2024-05-01T10:00:00Z',
    latitude: 60.1,
    longitude: 24.9,
    altitude: 15.5,
    accel_x: 0.01,
    accel_y: -0.02,
    accel_z: 9.81,
    gyro_x: 0.1,
    gyro_y: 0.2,
    gyro_z: 0.3,
    dac_1: 1,
    dac_2: 2,
    dac_3: 3,
    dac_4: 4,
    ...overrides,
  });
}

describe('field parsers', () => {
  it('parses plain decimals and falls back to zero otherwise', () => {
    expect(parseScalar('1.5')).toBe(1.5);
    expect(parseScalar('-2')).toBe(-2);
    expect(parseScalar('.25')).toBe(0.25);
    expect(parseScalar('1e3')).toBe(1000);
    expect(parseScalar(' 7.0 ')).toBe(0);
    expect(parseScalar('')).toBe(0);
    expect(parseScalar('abc')).toBe(0);
    expect(parseScalar('1.2.3')).toBe(0);
    expect(parseScalar('12abc')).toBe(0);
    expect(parseScalar('0x10')).toBe(0);
    expect(parseScalar('Infinity')).toBe(0);
    expect(parseScalar('NaN')).toBe(0);
    expect(parseScalar(undefined)).toBe(0);
  });

  it('maps None and unparseable session ids to null', () => {
    expect(parseSessionId('None')).toBeNull();
    expect(parseSessionId('none')).toBeNull();
    expect(parseSessionId('abc')).toBeNull();
    expect(parseSessionId('3.5')).toBeNull();
    expect(parseSessionId('')).toBeNull();
    expect(parseSessionId('42')).toBe(42);
    expect(parseSessionId('-7')).toBe(-7);
    expect(parseSessionId(' 42')).toBeNull();
  });

  it('limits session ids to the 32-bit signed range', () => {
    expect(parseSessionId('2147483647')).toBe(2147483647);
    expect(parseSessionId('-2147483648')).toBe(-2147483648);
    expect(parseSessionId('2147483648')).toBeNull();
    expect(parseSessionId('3000000000')).toBeNull();
    expect(parseSessionId('-2147483649')).toBeNull();
  });
});

describe('delimited decoding', () => {
  it('decodes a reading without a session', () => {
    const record = recordOf(decodeDelimited('None,2024-01-01T00:00:00Z,1.0,2.0,3.0,0,0,0,0,0,0,0,0,0,0'));
    expect(record).toEqual({
      sessionId: null,
      timestamp: '2024-01-01T00:00:00Z',
      latitude: 1,
      longitude: 2,
      altitude: 3,
      accel_x: 0,
      accel_y: 0,
      accel_z: 0,
      gyro_x: 0,
      gyro_y: 0,
      gyro_z: 0,
      dac_1: 0,
      dac_2: 0,
      dac_3: 0,
      dac_4: 0,
    });
  });

  it('keeps field order for every scalar', () => {
    const record = recordOf(decodeDelimited('5,t,1,2,3,4,5,6,7,8,9,10,11,12,13'));
    expect(record.sessionId).toBe(5);
    expect(record.timestamp).toBe('t');
    expect([
      record.latitude, record.longitude, record.altitude,
      record.accel_x, record.accel_y, record.accel_z,
      record.gyro_x, record.gyro_y, record.gyro_z,
      record.dac_1, record.dac_2, record.dac_3, record.dac_4,
    ]).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13]);
  });

  it('rejects lines with fewer than 15 fields', () => {
    const outcome = decodeDelimited('7,t,1,2');
    expect(outcome).toEqual({ kind: 'malformed', line: '7,t,1,2', reason: 'too few fields (4 < 15)' });
    expect(decodeDelimited('1,t,1,2,3,4,5,6,7,8,9,10,11,12').kind).toBe('malformed');
  });

  it('zeroes unparseable scalars without dropping the line', () => {
    const record = recordOf(decodeDelimited('x,t,oops,2,,4,5,6,7,8,9,10,11,12,bad'));
    expect(record.sessionId).toBeNull();
    expect(record.latitude).toBe(0);
    expect(record.longitude).toBe(2);
    expect(record.altitude).toBe(0);
    expect(record.dac_3).toBe(12);
    expect(record.dac_4).toBe(0);
  });

  it('does not trim padded fields', () => {
    const record = recordOf(decodeDelimited(' 42, t, 2.5,3' + ZERO_TAIL + ',4 '));
    expect(record.sessionId).toBeNull();
    expect(record.timestamp).toBe(' t');
    expect(record.latitude).toBe(0);
    expect(record.longitude).toBe(3);
    expect(record.dac_4).toBe(0);
  });

  it('ignores fields past the fifteenth', () => {
    const record = recordOf(decodeDelimited('1,t,1,2,3' + ZERO_TAIL + ',99,extra'));
    expect(record.dac_4).toBe(0);
    expect(Object.keys(record)).toHaveLength(15);
  });

  it('treats keepalive timestamps as keepalives', () => {
    expect(decodeDelimited('None,keepalive,0,0,0' + ZERO_TAIL)).toEqual({ kind: 'keepalive' });
    expect(decodeDelimited('3,keepalive-2024,0,0,0' + ZERO_TAIL)).toEqual({ kind: 'keepalive' });
    expect(decodeDelimited('None,keepalive')).toEqual({ kind: 'keepalive' });
  });
});

describe('structured decoding', () => {
  it('decodes a complete object', () => {
    const record = recordOf(decodeStructured(structured()));
    expect(record).toEqual({
      sessionId: 12,
      timestamp: '2024-05-01T10:00:00Z',
      latitude: 60.1,
      longitude: 24.9,
      altitude: 15.5,
      accel_x: 0.01,
      accel_y: -0.02,
      accel_z: 9.81,
      gyro_x: 0.1,
      gyro_y: 0.2,
      gyro_z: 0.3,
      dac_1: 1,
      dac_2: 2,
      dac_3: 3,
      dac_4: 4,
    });
  });

  it('accepts a sensor_data discriminator and a missing or null session', () => {
    expect(recordOf(decodeStructured(structured({ type: 'sensor_data' }))).sessionId).toBe(12);
    expect(recordOf(decodeStructured(structured({ sessionId: null }))).sessionId).toBeNull();
    expect(recordOf(decodeStructured(structured({ sessionId: undefined }))).sessionId).toBeNull();
  });

  it('drops unknown keys', () => {
    const record = recordOf(decodeStructured(structured({ firmware: '1.2.0' })));
    expect(record).not.toHaveProperty('firmware');
  });

  it('recognises keepalive control objects before parsing', () => {
    expect(decodeStructured('{"type":"keepalive"}')).toEqual({ kind: 'keepalive' });
    expect(decodeStructured('{ "type" : "keepalive", "seq": 3 }')).toEqual({ kind: 'keepalive' });
  });

  it('recognises keepalive timestamps after parsing', () => {
    expect(decodeStructured(structured({ timestamp: 'keepalive' }))).toEqual({ kind: 'keepalive' });
    expect(decodeStructured(structured({ timestamp: 'ping-keepalive' }))).toEqual({ kind: 'keepalive' });
  });

  it('rejects numbers that overflow to infinity', () => {
    const line = structured({ dac_4: 0 }).replace('"dac_4":0', '"dac_4":1e999');
    const outcome = decodeStructured(line);
    expect(outcome.kind).toBe('malformed');
    if (outcome.kind === 'malformed') expect(outcome.reason.startsWith('dac_4: ')).toBe(true);

    const session = structured().replace('"sessionId":12', '"sessionId":-1e999');
    expect(decodeStructured(session).kind).toBe('malformed');
  });

  it('rejects invalid syntax', () => {
    const outcome = decodeStructured('{"timestamp": "t",');
    expect(outcome.kind).toBe('malformed');
  });

  it('rejects missing keys and wrong types', () => {
    const missing = decodeStructured(structured({ dac_4: undefined }));
    expect(missing.kind).toBe('malformed');
    if (missing.kind === 'malformed') expect(missing.reason.startsWith('dac_4: ')).toBe(true);

    expect(decodeStructured(structured({ latitude: '60.1' })).kind).toBe('malformed');
    expect(decodeStructured(structured({ sessionId: 1.5 })).kind).toBe('malformed');
    expect(decodeStructured(structured({ timestamp: 5 })).kind).toBe('malformed');
    expect(decodeStructured(structured({ type: 'status' })).kind).toBe('malformed');
    expect(decodeStructured(structured({ sessionId: 3000000000 })).kind).toBe('malformed');
    expect(decodeStructured('[1,2,3]').kind).toBe('malformed');
    expect(decodeStructured('null').kind).toBe('malformed');
  });
});

describe('decodeLine', () => {
  const csv = '1,t,1,2,3' + ZERO_TAIL;

  it('uses the configured encoding only', () => {
    expect(decodeLine(csv, 'delimited').kind).toBe('record');
    expect(decodeLine(csv, 'structured').kind).toBe('malformed');
    expect(decodeLine(structured(), 'structured').kind).toBe('record');
    expect(decodeLine('{"type":"sensor_data","timestamp":"t"}', 'delimited').kind).toBe('malformed');
  });

  it('sniffs the encoding per line in auto mode', () => {
    expect(recordOf(decodeLine(csv, 'auto')).sessionId).toBe(1);
    expect(recordOf(decodeLine(structured(), 'auto')).sessionId).toBe(12);
    expect(decodeLine('{"type":"keepalive"}', 'auto')).toEqual({ kind: 'keepalive' });
  });
});
