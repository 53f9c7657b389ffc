import { z } from 'zod';
import { SessionConfigSchema } from './session/index.js';

export * from './session/index.js';

export type SessionConfig = z.infer<typeof SessionConfigSchema>;
