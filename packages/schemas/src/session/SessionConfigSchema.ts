import { z } from 'zod';
import { LogLevelSchema } from './LogLevelSchema.js';

/** Largest delay setTimeout accepts before it fires immediately */
export const MAX_TIMEOUT_MS = 2147483647;

export const SessionConfigSchema = z.object({
  // Per-request timeout handed to the transport, in milliseconds
  timeout: z.number().int().positive().max(MAX_TIMEOUT_MS).default(30000),
  // Headers the transport applies to every request
  headers: z.record(z.string(), z.string()).default({}),
  logLevel: LogLevelSchema.optional(),
});

export type SessionConfigZod = z.infer<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;
