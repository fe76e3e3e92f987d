/**
 * src/shared/http/envelope.ts
 *
 * WHY:
 * - The remote service wraps every payload in { success, data?, error?, timestamp }.
 * - Decoding is schema-driven (Zod) so a malformed body never reaches a service.
 *
 * RULES:
 * - ResultEnvelope is the in-process shape: a tagged union on `success`.
 * - The wire shape is looser: `data` and `error` are both optional, so a success
 *   envelope without a payload still decodes. Callers decide what that means.
 * - Timestamps travel as ISO-8601 strings.
 */

import { z } from 'zod';

export type ResultEnvelope<T> =
  | { success: true; data: T; timestamp: Date }
  | { success: false; error: string; timestamp: Date };

export function successEnvelope<T>(data: T): ResultEnvelope<T> {
  return { success: true, data, timestamp: new Date() };
}

export function errorEnvelope<T = never>(message: string): ResultEnvelope<T> {
  return { success: false, error: message, timestamp: new Date() };
}

export const isoTimestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

export function envelopeSchema<T extends z.ZodTypeAny>(dataSchema: T) {
  return z.object({
    success: z.boolean(),
    data: dataSchema.nullish(),
    error: z.string().nullish(),
    timestamp: isoTimestampSchema,
  });
}

export type WireEnvelope<W> = {
  success: boolean;
  data?: W;
  error?: string;
  timestamp: string;
};

/**
 * Shape an envelope for the wire. `encode` maps the payload to its JSON form.
 */
export function toWireEnvelope<T, W>(
  envelope: ResultEnvelope<T>,
  encode: (data: T) => W,
): WireEnvelope<W> {
  const timestamp = envelope.timestamp.toISOString();
  if (envelope.success) {
    return { success: true, data: encode(envelope.data), timestamp };
  }
  return { success: false, error: envelope.error, timestamp };
}
