import { z } from 'zod';

export const SessionRecordPayloadSchema = z.object({
  session_token: z.string(),
  session_expiration: z.string(),
  update_token: z.string(),
  id: z.number().int().safe(),
});

export const StrictSessionRecordPayloadSchema = SessionRecordPayloadSchema.strict();

export const SESSION_RECORD_FIELDS = SessionRecordPayloadSchema.keyof().options;
