// Zod schemas for the JSON envelopes

import { z } from 'zod';
import type { JsonObject, JsonValue } from './messages';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

export const backendMessageSchema = z.object({
  source: z.string(),
  message: z.string(),
  type: z.string(),
});

export const outboundContextSchema = z.object({
  correlationId: z.string().min(1),
  sessionId: z.string().default(''),
  userId: z.string().optional(),
  username: z.string().optional(),
  consumerId: z.string().optional(),
  generalContext: jsonObjectSchema.default({}),
});

export const inboundContextSchema = z.object({
  correlationId: z.string().min(1),
  sessionId: z.string().default(''),
  generalContext: jsonObjectSchema.default({}),
});

export const statusSchema = z.object({
  errorCode: z.string(),
  backendMessages: z.array(backendMessageSchema).default([]),
});

export const inboundBodySchema = z.object({
  inboundAdapterCallContext: inboundContextSchema,
  status: statusSchema,
  data: jsonObjectSchema.nullable().default(null),
});

/**
 * Render zod issues as `path: message` pairs
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
