import 'dotenv/config';
import { z } from 'zod';

const envSchema = z
  .object({
    PLANNER_STORE: z.enum(['memory', 'supabase']).default('memory'),
    SUPABASE_URL: z.string().url().optional(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
    PLANNER_SESSION_TTL: z.coerce.number().int().positive().default(86400),
    PLANNER_MAX_TOPICS: z.coerce.number().int().positive().default(400),
    ALLOCATOR_PASS_FACTOR: z.coerce.number().int().positive().default(3),
    ALLOCATOR_POLICY: z.enum(['proportional', 'round_robin']).default('proportional'),
    PLANNER_EXPORT_DIR: z.string().min(1).optional(),
  })
  .superRefine((value, ctx) => {
    if (value.PLANNER_STORE !== 'supabase') return;
    if (!value.SUPABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_URL'],
        message: 'SUPABASE_URL is required when PLANNER_STORE=supabase',
      });
    }
    if (!value.SUPABASE_SERVICE_ROLE_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_ROLE_KEY'],
        message: 'SUPABASE_SERVICE_ROLE_KEY is required when PLANNER_STORE=supabase',
      });
    }
  });

const env = envSchema.safeParse(process.env);
if (!env.success) {
  console.error('Invalid or missing environment variables:', env.error.flatten().fieldErrors);
  throw new Error('Invalid environment variables');
}

const parsedEnv = env.data;

export const PLANNER_STORE = parsedEnv.PLANNER_STORE;
export const SUPABASE_URL = parsedEnv.SUPABASE_URL ?? null;
export const SUPABASE_SERVICE_ROLE_KEY = parsedEnv.SUPABASE_SERVICE_ROLE_KEY ?? null;
export const PLANNER_SESSION_TTL = parsedEnv.PLANNER_SESSION_TTL;
export const PLANNER_MAX_TOPICS = parsedEnv.PLANNER_MAX_TOPICS;
export const ALLOCATOR_PASS_FACTOR = parsedEnv.ALLOCATOR_PASS_FACTOR;
export const ALLOCATOR_POLICY = parsedEnv.ALLOCATOR_POLICY;
export const PLANNER_EXPORT_DIR = parsedEnv.PLANNER_EXPORT_DIR ?? process.cwd();
