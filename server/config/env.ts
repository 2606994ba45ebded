// server/config/env.ts
import 'dotenv/config';
import { z } from 'zod';

const schema = z.object({
  NODE_ENV: z.enum(['development','test','production']).default('development'),
  PORT: z.string().default('8080'),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z
    .enum(['fatal','error','warn','info','debug','trace','silent'])
    .default('info'),
  CLIENT_ORIGIN: z.string().optional(),
  RUN_STORE: z.enum(['file','memory']).default('file'),
  RUNS_DIR: z.string().default('runs'),
  OPENAI_API_KEY: z.string().optional(),
  REVIEW_MODEL: z.string().default('gpt-4o-mini'),
  REVIEW_BATCH_SIZE: z.coerce.number().int().min(1).max(64).default(8),
  UPLOAD_SIZE_LIMIT_MB: z.coerce.number().positive().default(10),
});

export type Env = z.infer<typeof schema>;

export const env: Env = schema.parse(process.env);
