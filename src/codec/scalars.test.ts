import { describe, expect, it } from 'vitest';
import {
  barcodeCodec,
  enumCodec,
  floatCodec,
  integerCodec,
  nonNegativeIntegerCodec,
  stringCodec,
  timestampCodec,
  UNKNOWN_BARCODE,
  zeroAsAbsentFloatCodec,
} from './scalars.js';
import { VendorTimestamp } from './VendorTimestamp.js';

describe('barcodeCodec', () => {
  it('reads the sentinel as no barcode', () => {
    expect(barcodeCodec.decode('UnknownBarCode')).toEqual({ ok: true, value: undefined });
  });

  it('keeps real barcodes', () => {
    expect(barcodeCodec.decode('PLT-000123')).toEqual({ ok: true, value: 'PLT-000123' });
    expect(barcodeCodec.encode('PLT-000123')).toBe('PLT-000123');
  });

  it('writes the sentinel for a missing barcode', () => {
    expect(barcodeCodec.encode(undefined)).toBe(UNKNOWN_BARCODE);
  });
});

describe('zeroAsAbsentFloatCodec', () => {
  it('reads zero as absent and writes absent as zero', () => {
    expect(zeroAsAbsentFloatCodec.decode('0')).toEqual({ ok: true, value: undefined });
    expect(zeroAsAbsentFloatCodec.decode('0.0')).toEqual({ ok: true, value: undefined });
    expect(zeroAsAbsentFloatCodec.encode(undefined)).toBe('0');
  });

  it('round-trips non-zero volumes', () => {
    for (const raw of ['30.5', '-1.25', '1e-7']) {
      const decoded = zeroAsAbsentFloatCodec.decode(raw);
      expect(decoded.ok).toBe(true);
      if (decoded.ok) {
        expect(zeroAsAbsentFloatCodec.encode(decoded.value)).toBe(String(Number(raw)));
      }
    }
    expect(zeroAsAbsentFloatCodec.encode(12.75)).toBe('12.75');
  });

  it('rejects text that is not a number', () => {
    expect(zeroAsAbsentFloatCodec.decode('n/a').ok).toBe(false);
  });
});

describe('numeric codecs', () => {
  it('parses floats and rejects non-finite values', () => {
    expect(floatCodec.decode(' 4.5 ')).toEqual({ ok: true, value: 4.5 });
    expect(floatCodec.decode('')).toEqual({ ok: false, message: 'expected a number, got an empty string' });
    expect(floatCodec.decode('Infinity').ok).toBe(false);
    expect(floatCodec.decode('NaN').ok).toBe(false);
  });

  it('parses integers strictly', () => {
    expect(integerCodec.decode('-3')).toEqual({ ok: true, value: -3 });
    expect(integerCodec.decode('3.5')).toEqual({ ok: false, message: 'expected an integer, got "3.5"' });
  });

  it('rejects negative counts', () => {
    expect(nonNegativeIntegerCodec.decode('16')).toEqual({ ok: true, value: 16 });
    expect(nonNegativeIntegerCodec.decode('-1')).toEqual({
      ok: false,
      message: 'expected a non-negative integer, got "-1"',
    });
    expect(nonNegativeIntegerCodec.value.safeParse(-1).success).toBe(false);
  });
});

describe('enumCodec', () => {
  const usage = enumCodec(['SRC', 'DEST']);

  it('accepts listed wire values only', () => {
    expect(usage.decode('DEST')).toEqual({ ok: true, value: 'DEST' });
    expect(usage.decode('dest')).toEqual({ ok: false, message: 'expected one of SRC, DEST, got "dest"' });
    expect(usage.value.safeParse('SRC').success).toBe(true);
    expect(usage.value.safeParse('OTHER').success).toBe(false);
  });
});

describe('stringCodec', () => {
  it('passes text through, including empty text', () => {
    expect(stringCodec.decode('')).toEqual({ ok: true, value: '' });
    expect(stringCodec.encode('DMSO')).toBe('DMSO');
  });
});

describe('timestampCodec', () => {
  it('writes a timestamp exactly as it was read', () => {
    for (const raw of [
      '2023-05-10 14:22:31.123',
      '2023-05-10T14:22:31',
      '2023-05-10T14:22:31.123456',
      '2023-05-10T14:22:31.5+02:00',
      '2023-05-10 14:22:31-0500',
      '2023-05-10T14:22:31Z',
    ]) {
      const decoded = timestampCodec.decode(raw);
      expect(decoded.ok).toBe(true);
      if (decoded.ok) expect(timestampCodec.encode(decoded.value)).toBe(raw);
    }
  });

  it('rejects malformed and impossible dates', () => {
    expect(timestampCodec.decode('10/05/2023 14:22').ok).toBe(false);
    expect(timestampCodec.decode('2023-02-30 10:00:00').ok).toBe(false);
    expect(timestampCodec.decode('2023-05-10 24:00:00').ok).toBe(false);
  });
});

describe('VendorTimestamp', () => {
  it('reads naive times as UTC', () => {
    const ts = VendorTimestamp.parse('2023-05-10 14:22:31.123');
    expect(ts?.toDate().getTime()).toBe(Date.UTC(2023, 4, 10, 14, 22, 31, 123));
  });

  it('applies written offsets', () => {
    expect(VendorTimestamp.parse('2023-05-10T14:22:31+02:00')?.toDate().toISOString()).toBe('2023-05-10T12:22:31.000Z');
    expect(VendorTimestamp.parse('2023-05-10T14:22:31-0530')?.toDate().toISOString()).toBe('2023-05-10T19:52:31.000Z');
  });

  it('truncates sub-millisecond fractions', () => {
    expect(VendorTimestamp.parse('2023-05-10T14:22:31.123987')?.toDate().getUTCMilliseconds()).toBe(123);
    expect(VendorTimestamp.parse('2023-05-10T14:22:31.5')?.toDate().getUTCMilliseconds()).toBe(500);
  });

  it('keeps two-digit years literal', () => {
    const ts = VendorTimestamp.parse('0004-02-29 12:00:00');
    expect(ts?.toString()).toBe('0004-02-29 12:00:00');
    expect(ts?.toDate().getUTCFullYear()).toBe(4);
    expect(ts?.toDate().getUTCDate()).toBe(29);
    expect(VendorTimestamp.parse('0100-02-29 12:00:00')).toBeNull();
  });

  it('builds from a Date in ISO form', () => {
    const ts = VendorTimestamp.fromDate(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 6)));
    expect(ts.toString()).toBe('2024-01-02T03:04:05.006Z');
    expect(ts.equals(VendorTimestamp.parse('2024-01-02T03:04:05.006Z') ?? ts)).toBe(true);
  });
});
