import type { ClientRow, DealRow, JobAssignmentRow, JobRow, TaskRow, UserRow } from '@shootline/db';
import type { UserSummary } from '../types.js';
import { computeProfit } from '../ledger/profit.js';

export const summarizeUser = (user: UserRow): UserSummary => ({
  id: user.id,
  username: user.username,
  full_name: user.fullName,
  role: user.role
});

export const serializeUser = (user: UserRow) => ({
  ...summarizeUser(user),
  email: user.email,
  created_at: user.createdAt.toISOString()
});

export const serializeClient = (client: ClientRow) => ({
  id: client.id,
  name: client.name,
  industry: client.industry,
  email: client.email,
  phone: client.phone,
  created_at: client.createdAt.toISOString()
});

export const serializeDeal = (deal: DealRow, jobId?: string | null) => ({
  id: deal.id,
  client_id: deal.clientId,
  title: deal.title,
  value: deal.value,
  cost_internal: deal.costInternal,
  cost_external: deal.costExternal,
  profit: computeProfit(deal),
  stage: deal.stage,
  is_recurring: deal.isRecurring,
  notes: deal.notes,
  ...(jobId === undefined ? {} : { job_id: jobId }),
  created_at: deal.createdAt.toISOString(),
  updated_at: deal.updatedAt.toISOString()
});

export const serializeJob = (job: JobRow) => ({
  id: job.id,
  client_id: job.clientId,
  origin_deal_id: job.originDealId,
  title: job.title,
  status: job.status,
  start_date: job.startDate,
  is_retainer: job.isRetainer,
  completed_at: job.completedAt?.toISOString() ?? null,
  created_at: job.createdAt.toISOString()
});

const userRef = (users: ReadonlyMap<string, UserSummary> | undefined, userId: string | null) => {
  if (!userId) {
    return null;
  }
  const user = users?.get(userId);
  return { id: userId, full_name: user?.full_name ?? null };
};

export const serializeTask = (task: TaskRow, users?: ReadonlyMap<string, UserSummary>) => ({
  id: task.id,
  job_id: task.jobId,
  title: task.title,
  description: task.description,
  status: task.status,
  assignee_user_id: task.assigneeUserId,
  assignee: userRef(users, task.assigneeUserId),
  due_date: task.dueDate,
  created_at: task.createdAt.toISOString(),
  updated_at: task.updatedAt.toISOString()
});

export const serializeAssignment = (assignment: JobAssignmentRow, users?: ReadonlyMap<string, UserSummary>) => ({
  id: assignment.id,
  job_id: assignment.jobId,
  user_id: assignment.userId,
  role: assignment.role,
  user: userRef(users, assignment.userId),
  created_at: assignment.createdAt.toISOString()
});

export type SerializedTask = ReturnType<typeof serializeTask>;
