import type { DealStage, JobStatus } from '@shootline/common';
import type {
  ClientRow,
  DealRow,
  JobAssignmentRow,
  JobRow,
  NewClient,
  NewDeal,
  NewJob,
  NewTask,
  NewUser,
  ProfitShareRow,
  TaskRow,
  UserRow
} from './schema.js';

export type ClientPatch = Partial<Pick<ClientRow, 'name' | 'industry' | 'email' | 'phone'>>;
export type DealPatch = Partial<
  Pick<DealRow, 'title' | 'value' | 'costInternal' | 'costExternal' | 'stage' | 'isRecurring' | 'notes'>
>;
export type JobPatch = Partial<Pick<JobRow, 'status' | 'completedAt' | 'title'>>;
export type TaskPatch = Partial<Pick<TaskRow, 'title' | 'description' | 'status' | 'assigneeUserId' | 'dueDate'>>;

export interface ShareInput {
  userId: string;
  percentage: number | null;
  flatAmount: number | null;
}

export interface DealFilter {
  stage?: DealStage;
  clientId?: string;
}

export interface JobFilter {
  status?: JobStatus;
  clientId?: string;
  /** Case-insensitive substring of the client's name. */
  clientNameSearch?: string;
}

export interface TaskFilter {
  jobId?: string;
  assigneeUserId?: string;
  /** Inclusive lower bound on due_date (YYYY-MM-DD). */
  dueFrom?: string;
  /** Exclusive upper bound on due_date (YYYY-MM-DD). */
  dueBefore?: string;
  datedOnly?: boolean;
  excludeStatus?: string;
  limit?: number;
}

export interface AssignmentFilter {
  jobId?: string;
  userId?: string;
}

/**
 * Everything a request can do against persistent state, bound to one
 * transaction. Results are ordered as documented per method.
 */
export interface TxClient {
  findUserById(id: string): Promise<UserRow | null>;
  findUserByUsername(username: string): Promise<UserRow | null>;
  /** Ordered by username. */
  listUsers(): Promise<UserRow[]>;
  /** Returns null when the username is taken. */
  insertUser(data: NewUser): Promise<UserRow | null>;

  findClientById(id: string): Promise<ClientRow | null>;
  /** Ordered by name. */
  listClients(): Promise<ClientRow[]>;
  insertClient(data: NewClient): Promise<ClientRow>;
  updateClient(id: string, patch: ClientPatch): Promise<ClientRow | null>;
  deleteClient(id: string): Promise<boolean>;

  findDealById(id: string): Promise<DealRow | null>;
  /** Newest first. */
  listDeals(filter?: DealFilter, limit?: number): Promise<DealRow[]>;
  insertDeal(data: NewDeal): Promise<DealRow>;
  updateDeal(id: string, patch: DealPatch): Promise<DealRow | null>;
  deleteDeal(id: string): Promise<boolean>;
  countDeals(filter?: DealFilter): Promise<number>;
  sumDealValue(filter?: DealFilter): Promise<number>;

  /** Ordered by insertion. */
  listShares(dealId: string): Promise<ProfitShareRow[]>;
  replaceShares(dealId: string, shares: ShareInput[]): Promise<ProfitShareRow[]>;

  findJobById(id: string): Promise<JobRow | null>;
  findJobByOriginDeal(dealId: string): Promise<JobRow | null>;
  /** Newest first. */
  listJobs(filter?: JobFilter): Promise<JobRow[]>;
  /**
   * Returns null when `originDealId` already has a job: the unique constraint
   * on jobs.origin_deal_id decides, not a prior read.
   */
  insertJob(data: NewJob): Promise<JobRow | null>;
  updateJob(id: string, patch: JobPatch): Promise<JobRow | null>;
  countJobs(filter?: JobFilter): Promise<number>;

  /** Ordered by creation. */
  listAssignments(filter: AssignmentFilter): Promise<JobAssignmentRow[]>;
  upsertAssignment(jobId: string, userId: string, role: string): Promise<JobAssignmentRow>;
  deleteAssignment(jobId: string, userId: string): Promise<boolean>;

  findTaskById(id: string): Promise<TaskRow | null>;
  /** Ordered by due date (undated last), then creation. */
  listTasks(filter?: TaskFilter): Promise<TaskRow[]>;
  insertTask(data: NewTask): Promise<TaskRow>;
  updateTask(id: string, patch: TaskPatch): Promise<TaskRow | null>;
  deleteTask(id: string): Promise<boolean>;
  countTasks(filter?: TaskFilter): Promise<number>;
}

export interface Database {
  transaction<T>(fn: (tx: TxClient) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
