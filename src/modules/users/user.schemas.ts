/**
 * src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes wire-format validation for the Users module.
 * - Prevents malformed payloads (remote responses, imported JSON) from reaching
 *   the manager or callers.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Wire names are snake_case (`created_at`); mapping to domain types lives in user.codec.ts.
 * - Email format is NOT checked here: a parsed user is taken as-is, the same as a
 *   user whose fields were mutated after construction.
 */

import { z } from 'zod';
import { envelopeSchema } from '../../shared/http/envelope';
import { USER_STATUSES, type JsonValue, type UserMetadata } from './user.types';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

const metadataRecordSchema = z.record(jsonValueSchema);

// z.record validates a "__proto__" key but leaves it out of its output, so the
// checked input object is passed through as-is instead.
export const userMetadataSchema = z.custom<UserMetadata>(
  (value) => metadataRecordSchema.safeParse(value).success,
  { message: 'Expected an object of JSON values' },
);

export const userStatusSchema = z.enum(USER_STATUSES);

export const userJsonSchema = z.object({
  id: z.string(),
  name: z.string(),
  email: z.string(),
  status: userStatusSchema,
  created_at: z.string().datetime({ offset: true }),
  metadata: userMetadataSchema,
});

export type UserJson = z.infer<typeof userJsonSchema>;

export const userEnvelopeSchema = envelopeSchema(userJsonSchema);

export type UserEnvelope = z.infer<typeof userEnvelopeSchema>;
