import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  envelopeSchema,
  errorEnvelope,
  successEnvelope,
  toWireEnvelope,
} from '../../../../src/shared/http/envelope';

const schema = envelopeSchema(z.object({ n: z.number() }));

describe('envelope', () => {
  it('builds tagged success and error envelopes', () => {
    const ok = successEnvelope({ n: 1 });
    const failed = errorEnvelope<{ n: number }>('nope');

    expect(ok).toMatchObject({ success: true, data: { n: 1 } });
    expect(ok.timestamp).toBeInstanceOf(Date);
    expect(failed).toMatchObject({ success: false, error: 'nope' });
  });

  it('shapes an envelope for the wire', () => {
    const envelope = { success: true as const, data: 2, timestamp: new Date('2026-02-02T00:00:00.000Z') };

    expect(toWireEnvelope(envelope, (n) => ({ n }))).toEqual({
      success: true,
      data: { n: 2 },
      timestamp: '2026-02-02T00:00:00.000Z',
    });
  });

  it('decodes a wire envelope, allowing success without data', () => {
    const parsed = schema.parse({ success: true, timestamp: '2026-02-02T00:00:00.000Z' });

    expect(parsed.success).toBe(true);
    expect(parsed.data).toBeUndefined();
    expect(parsed.timestamp).toEqual(new Date('2026-02-02T00:00:00.000Z'));
  });

  it('accepts explicit nulls and offsets', () => {
    const parsed = schema.parse({
      success: false,
      data: null,
      error: 'boom',
      timestamp: '2026-02-02T01:00:00+01:00',
    });

    expect(parsed.error).toBe('boom');
    expect(parsed.timestamp.toISOString()).toBe('2026-02-02T00:00:00.000Z');
  });

  it('rejects an envelope without a timestamp', () => {
    expect(schema.safeParse({ success: true, data: { n: 1 } }).success).toBe(false);
  });
});
