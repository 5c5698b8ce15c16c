import { z } from 'zod';

export const UuidSchema = z.string().uuid();
// The regex alone lets through days such as 2025-02-31; the round trip through
// a UTC date rejects them before they reach a `date` column.
export const DateOnlySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/)
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, 'not a calendar date');
export const MonthSchema = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])$/);
const MoneySchema = z.number().finite();

export const LoginRequestSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1)
});

export const LoginResponseSchema = z.object({
  access_token: z.string(),
  token_type: z.literal('Bearer'),
  user: z.object({
    id: UuidSchema,
    username: z.string(),
    role: z.enum(['admin', 'contributor'])
  })
});

export const UserCreateSchema = z.object({
  username: z.string().min(3).max(80),
  password: z.string().min(8),
  role: z.enum(['admin', 'contributor']).default('contributor'),
  full_name: z.string().min(1),
  email: z.string().email()
});

export const ClientCreateSchema = z.object({
  name: z.string().min(1).max(100),
  industry: z.string().max(100).optional(),
  email: z.string().email().optional(),
  phone: z.string().max(20).optional()
});

export const ClientUpdateSchema = z.object({
  name: z.string().min(1).max(100).optional(),
  industry: z.string().max(100).nullable().optional(),
  email: z.string().email().nullable().optional(),
  phone: z.string().max(20).nullable().optional()
});

// Stage and status arrive as plain strings; the services reject unknown values
// with INVALID_STAGE / INVALID_STATUS so the caller learns which field failed.
export const DealCreateSchema = z.object({
  client_id: UuidSchema,
  title: z.string().min(1).max(200),
  value: MoneySchema.default(0),
  cost_internal: MoneySchema.default(0),
  cost_external: MoneySchema.default(0),
  stage: z.string().min(1).optional(),
  is_recurring: z.boolean().default(false),
  notes: z.string().optional()
});

export const DealUpdateSchema = z.object({
  title: z.string().min(1).max(200).optional(),
  value: MoneySchema.optional(),
  cost_internal: MoneySchema.optional(),
  cost_external: MoneySchema.optional(),
  is_recurring: z.boolean().optional(),
  notes: z.string().nullable().optional()
});

export const DealListQuerySchema = z.object({
  stage: z.string().min(1).optional(),
  client_id: UuidSchema.optional()
});

export const DealStageMoveSchema = z.object({
  stage: z.string().min(1)
});

export const ProfitShareEntrySchema = z
  .object({
    user_id: UuidSchema,
    percentage: z.number().min(0).max(100).nullable().optional(),
    flat_amount: z.number().nonnegative().nullable().optional()
  })
  .refine((entry) => entry.percentage != null || entry.flat_amount != null, {
    message: 'percentage or flat_amount is required',
    path: ['percentage']
  });

export const ProfitShareSetSchema = z.object({
  shares: z.array(ProfitShareEntrySchema)
});

export const JobCreateSchema = z.object({
  client_id: UuidSchema,
  title: z.string().min(1).max(200),
  origin_deal_id: UuidSchema.optional(),
  start_date: DateOnlySchema.optional(),
  is_retainer: z.boolean().default(false)
});

export const JobListQuerySchema = z.object({
  status: z.enum(['Active', 'Completed']).optional(),
  client_id: UuidSchema.optional(),
  search: z.string().min(1).optional()
});

export const JobAssigneeSetSchema = z.object({
  role: z.string().min(1).max(50)
});

export const TaskCreateSchema = z.object({
  title: z.string().min(1).max(200),
  description: z.string().optional(),
  assignee_user_id: UuidSchema.optional(),
  due_date: DateOnlySchema.optional()
});

export const TaskUpdateSchema = z.object({
  title: z.string().min(1).max(200).optional(),
  description: z.string().nullable().optional(),
  assignee_user_id: UuidSchema.nullable().optional(),
  due_date: DateOnlySchema.nullable().optional()
});

export const TaskStatusChangeSchema = z.object({
  status: z.string().min(1)
});

export const CalendarQuerySchema = z.object({
  month: MonthSchema,
  job_id: UuidSchema.optional()
});

export const WorkloadQuerySchema = z.object({
  include_done: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true')
});

export const DeleteResponseSchema = z.object({
  id: UuidSchema,
  deleted: z.literal(true)
});

export type LoginRequest = z.infer<typeof LoginRequestSchema>;
export type UserCreate = z.infer<typeof UserCreateSchema>;
export type ClientCreate = z.infer<typeof ClientCreateSchema>;
export type ClientUpdate = z.infer<typeof ClientUpdateSchema>;
export type DealCreate = z.infer<typeof DealCreateSchema>;
export type DealUpdate = z.infer<typeof DealUpdateSchema>;
export type DealListQuery = z.infer<typeof DealListQuerySchema>;
export type DealStageMove = z.infer<typeof DealStageMoveSchema>;
export type ProfitShareSet = z.infer<typeof ProfitShareSetSchema>;
export type JobCreate = z.infer<typeof JobCreateSchema>;
export type JobListQuery = z.infer<typeof JobListQuerySchema>;
export type JobAssigneeSet = z.infer<typeof JobAssigneeSetSchema>;
export type TaskCreate = z.infer<typeof TaskCreateSchema>;
export type TaskUpdate = z.infer<typeof TaskUpdateSchema>;
export type TaskStatusChange = z.infer<typeof TaskStatusChangeSchema>;
export type CalendarQuery = z.infer<typeof CalendarQuerySchema>;
export type WorkloadQuery = z.infer<typeof WorkloadQuerySchema>;
