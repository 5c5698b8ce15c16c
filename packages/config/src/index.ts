import { z } from 'zod';

const csvList = z
  .string()
  .optional()
  .transform((value) =>
    value === undefined
      ? undefined
      : value
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
  );

export const EnvSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.enum(['info', 'warn', 'error']).default('info'),
    API_PORT: z.coerce.number().default(3000),
    JWT_SECRET: z.string().min(8),
    JWT_TTL_SECONDS: z.coerce.number().int().positive().default(28_800),
    DATA_DRIVER: z.enum(['postgres', 'memory']).default('postgres'),
    DATABASE_URL: z.string().min(1).optional(),
    TASK_WORKFLOW: z.enum(['task', 'deliverable']).default('task'),
    TASK_STATUSES: csvList,
    JOB_SEED_TASKS: csvList,
    PROFIT_SHARE_POLICY: z.enum(['permissive', 'strict']).default('permissive'),
    GIT_SHA: z.string().trim().min(1).optional(),
    BUILD_TIME: z.string().datetime().optional()
  })
  .superRefine((env, ctx) => {
    if (env.DATA_DRIVER === 'postgres' && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DATABASE_URL'],
        message: 'DATABASE_URL is required when DATA_DRIVER=postgres'
      });
    }
    if (env.TASK_STATUSES !== undefined && env.TASK_STATUSES.length < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TASK_STATUSES'],
        message: 'TASK_STATUSES needs at least an initial and a terminal status'
      });
    }
  });

export type AppEnv = z.infer<typeof EnvSchema>;

export const loadEnv = (input: Record<string, string | undefined> = process.env): AppEnv => {
  return EnvSchema.parse(input);
};
