import { randomUUID } from 'node:crypto';
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
import type {
  AssignmentFilter,
  ClientPatch,
  Database,
  DealFilter,
  DealPatch,
  JobFilter,
  JobPatch,
  ShareInput,
  TaskFilter,
  TaskPatch,
  TxClient
} from './store.js';

interface MemoryState {
  users: UserRow[];
  clients: ClientRow[];
  deals: DealRow[];
  profitShares: ProfitShareRow[];
  jobs: JobRow[];
  jobAssignments: JobAssignmentRow[];
  tasks: TaskRow[];
}

const emptyState = (): MemoryState => ({
  users: [],
  clients: [],
  deals: [],
  profitShares: [],
  jobs: [],
  jobAssignments: [],
  tasks: []
});

const byCreatedDesc = <T extends { createdAt: Date }>(rows: T[]): T[] =>
  [...rows].reverse().sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());

const byDueDate = (a: TaskRow, b: TaskRow): number => {
  if (a.dueDate === b.dueDate) {
    return a.createdAt.getTime() - b.createdAt.getTime();
  }
  if (a.dueDate === null) return 1;
  if (b.dueDate === null) return -1;
  return a.dueDate < b.dueDate ? -1 : 1;
};

class MemoryTxClient implements TxClient {
  constructor(private readonly state: MemoryState) {}

  async findUserById(id: string): Promise<UserRow | null> {
    return this.state.users.find((user) => user.id === id) ?? null;
  }

  async findUserByUsername(username: string): Promise<UserRow | null> {
    return this.state.users.find((user) => user.username === username) ?? null;
  }

  async listUsers(): Promise<UserRow[]> {
    return [...this.state.users].sort((a, b) => a.username.localeCompare(b.username));
  }

  async insertUser(data: NewUser): Promise<UserRow | null> {
    if (this.state.users.some((user) => user.username === data.username)) {
      return null;
    }
    const row: UserRow = {
      id: data.id ?? randomUUID(),
      username: data.username,
      passwordHash: data.passwordHash,
      role: data.role ?? 'contributor',
      fullName: data.fullName,
      email: data.email,
      createdAt: data.createdAt ?? new Date()
    };
    this.state.users.push(row);
    return row;
  }

  async findClientById(id: string): Promise<ClientRow | null> {
    return this.state.clients.find((client) => client.id === id) ?? null;
  }

  async listClients(): Promise<ClientRow[]> {
    return [...this.state.clients].sort((a, b) => a.name.localeCompare(b.name));
  }

  async insertClient(data: NewClient): Promise<ClientRow> {
    const row: ClientRow = {
      id: data.id ?? randomUUID(),
      name: data.name,
      industry: data.industry ?? null,
      email: data.email ?? null,
      phone: data.phone ?? null,
      createdAt: data.createdAt ?? new Date()
    };
    this.state.clients.push(row);
    return row;
  }

  async updateClient(id: string, patch: ClientPatch): Promise<ClientRow | null> {
    const row = this.state.clients.find((client) => client.id === id);
    if (!row) {
      return null;
    }
    Object.assign(row, patch);
    return row;
  }

  async deleteClient(id: string): Promise<boolean> {
    const referenced =
      this.state.deals.some((deal) => deal.clientId === id) || this.state.jobs.some((job) => job.clientId === id);
    if (referenced) {
      throw new Error('clients row is still referenced (foreign key restrict)');
    }
    const before = this.state.clients.length;
    this.state.clients = this.state.clients.filter((client) => client.id !== id);
    return this.state.clients.length < before;
  }

  async findDealById(id: string): Promise<DealRow | null> {
    return this.state.deals.find((deal) => deal.id === id) ?? null;
  }

  async listDeals(filter?: DealFilter, limit?: number): Promise<DealRow[]> {
    const rows = byCreatedDesc(this.filterDeals(filter));
    return limit === undefined ? rows : rows.slice(0, limit);
  }

  async insertDeal(data: NewDeal): Promise<DealRow> {
    const now = new Date();
    const row: DealRow = {
      id: data.id ?? randomUUID(),
      clientId: data.clientId,
      title: data.title,
      value: data.value ?? 0,
      costInternal: data.costInternal ?? 0,
      costExternal: data.costExternal ?? 0,
      stage: data.stage ?? 'New',
      isRecurring: data.isRecurring ?? false,
      notes: data.notes ?? null,
      createdAt: data.createdAt ?? now,
      updatedAt: data.updatedAt ?? now
    };
    this.state.deals.push(row);
    return row;
  }

  async updateDeal(id: string, patch: DealPatch): Promise<DealRow | null> {
    const row = this.state.deals.find((deal) => deal.id === id);
    if (!row) {
      return null;
    }
    Object.assign(row, patch, { updatedAt: new Date() });
    return row;
  }

  async deleteDeal(id: string): Promise<boolean> {
    const before = this.state.deals.length;
    this.state.deals = this.state.deals.filter((deal) => deal.id !== id);
    if (this.state.deals.length === before) {
      return false;
    }
    this.state.profitShares = this.state.profitShares.filter((share) => share.dealId !== id);
    for (const job of this.state.jobs) {
      if (job.originDealId === id) {
        job.originDealId = null;
      }
    }
    return true;
  }

  async countDeals(filter?: DealFilter): Promise<number> {
    return this.filterDeals(filter).length;
  }

  async sumDealValue(filter?: DealFilter): Promise<number> {
    return this.filterDeals(filter).reduce((total, deal) => total + deal.value, 0);
  }

  async listShares(dealId: string): Promise<ProfitShareRow[]> {
    return this.state.profitShares
      .filter((share) => share.dealId === dealId)
      .sort((a, b) => a.position - b.position);
  }

  async replaceShares(dealId: string, shares: ShareInput[]): Promise<ProfitShareRow[]> {
    const seen = new Set<string>();
    for (const share of shares) {
      if (seen.has(share.userId)) {
        throw new Error('duplicate key value violates unique constraint "profit_shares_deal_id_user_id_key"');
      }
      seen.add(share.userId);
    }

    this.state.profitShares = this.state.profitShares.filter((share) => share.dealId !== dealId);
    const rows = shares.map<ProfitShareRow>((share, position) => ({
      id: randomUUID(),
      dealId,
      userId: share.userId,
      percentage: share.percentage,
      flatAmount: share.flatAmount,
      position
    }));
    this.state.profitShares.push(...rows);
    return rows;
  }

  async findJobById(id: string): Promise<JobRow | null> {
    return this.state.jobs.find((job) => job.id === id) ?? null;
  }

  async findJobByOriginDeal(dealId: string): Promise<JobRow | null> {
    return this.state.jobs.find((job) => job.originDealId === dealId) ?? null;
  }

  async listJobs(filter?: JobFilter): Promise<JobRow[]> {
    return byCreatedDesc(this.filterJobs(filter));
  }

  async insertJob(data: NewJob): Promise<JobRow | null> {
    const originDealId = data.originDealId ?? null;
    if (originDealId !== null && this.state.jobs.some((job) => job.originDealId === originDealId)) {
      return null;
    }
    const row: JobRow = {
      id: data.id ?? randomUUID(),
      clientId: data.clientId,
      originDealId,
      title: data.title,
      status: data.status ?? 'Active',
      startDate: data.startDate,
      isRetainer: data.isRetainer ?? false,
      completedAt: data.completedAt ?? null,
      createdAt: data.createdAt ?? new Date()
    };
    this.state.jobs.push(row);
    return row;
  }

  async updateJob(id: string, patch: JobPatch): Promise<JobRow | null> {
    const row = this.state.jobs.find((job) => job.id === id);
    if (!row) {
      return null;
    }
    Object.assign(row, patch);
    return row;
  }

  async countJobs(filter?: JobFilter): Promise<number> {
    return this.filterJobs(filter).length;
  }

  async listAssignments(filter: AssignmentFilter): Promise<JobAssignmentRow[]> {
    return this.state.jobAssignments.filter(
      (assignment) =>
        (filter.jobId === undefined || assignment.jobId === filter.jobId) &&
        (filter.userId === undefined || assignment.userId === filter.userId)
    );
  }

  async upsertAssignment(jobId: string, userId: string, role: string): Promise<JobAssignmentRow> {
    const existing = this.state.jobAssignments.find(
      (assignment) => assignment.jobId === jobId && assignment.userId === userId
    );
    if (existing) {
      existing.role = role;
      return existing;
    }
    const row: JobAssignmentRow = { id: randomUUID(), jobId, userId, role, createdAt: new Date() };
    this.state.jobAssignments.push(row);
    return row;
  }

  async deleteAssignment(jobId: string, userId: string): Promise<boolean> {
    const before = this.state.jobAssignments.length;
    this.state.jobAssignments = this.state.jobAssignments.filter(
      (assignment) => !(assignment.jobId === jobId && assignment.userId === userId)
    );
    return this.state.jobAssignments.length < before;
  }

  async findTaskById(id: string): Promise<TaskRow | null> {
    return this.state.tasks.find((task) => task.id === id) ?? null;
  }

  async listTasks(filter?: TaskFilter): Promise<TaskRow[]> {
    const rows = this.filterTasks(filter).sort(byDueDate);
    return filter?.limit === undefined ? rows : rows.slice(0, filter.limit);
  }

  async insertTask(data: NewTask): Promise<TaskRow> {
    const now = new Date();
    const row: TaskRow = {
      id: data.id ?? randomUUID(),
      jobId: data.jobId,
      title: data.title,
      description: data.description ?? null,
      status: data.status,
      assigneeUserId: data.assigneeUserId ?? null,
      dueDate: data.dueDate ?? null,
      createdAt: data.createdAt ?? now,
      updatedAt: data.updatedAt ?? now
    };
    this.state.tasks.push(row);
    return row;
  }

  async updateTask(id: string, patch: TaskPatch): Promise<TaskRow | null> {
    const row = this.state.tasks.find((task) => task.id === id);
    if (!row) {
      return null;
    }
    Object.assign(row, patch, { updatedAt: new Date() });
    return row;
  }

  async deleteTask(id: string): Promise<boolean> {
    const before = this.state.tasks.length;
    this.state.tasks = this.state.tasks.filter((task) => task.id !== id);
    return this.state.tasks.length < before;
  }

  async countTasks(filter?: TaskFilter): Promise<number> {
    return this.filterTasks(filter).length;
  }

  private filterDeals(filter: DealFilter = {}): DealRow[] {
    return this.state.deals.filter(
      (deal) =>
        (filter.stage === undefined || deal.stage === filter.stage) &&
        (filter.clientId === undefined || deal.clientId === filter.clientId)
    );
  }

  private filterJobs(filter: JobFilter = {}): JobRow[] {
    const search = filter.clientNameSearch?.toLowerCase();
    return this.state.jobs.filter((job) => {
      if (filter.status !== undefined && job.status !== filter.status) return false;
      if (filter.clientId !== undefined && job.clientId !== filter.clientId) return false;
      if (search !== undefined) {
        const client = this.state.clients.find((row) => row.id === job.clientId);
        if (!client || !client.name.toLowerCase().includes(search)) return false;
      }
      return true;
    });
  }

  private filterTasks(filter: TaskFilter = {}): TaskRow[] {
    return this.state.tasks.filter((task) => {
      if (filter.jobId !== undefined && task.jobId !== filter.jobId) return false;
      if (filter.assigneeUserId !== undefined && task.assigneeUserId !== filter.assigneeUserId) return false;
      if (filter.excludeStatus !== undefined && task.status === filter.excludeStatus) return false;
      if (filter.datedOnly && task.dueDate === null) return false;
      if (filter.dueFrom !== undefined && (task.dueDate === null || task.dueDate < filter.dueFrom)) return false;
      if (filter.dueBefore !== undefined && (task.dueDate === null || task.dueDate >= filter.dueBefore)) return false;
      return true;
    });
  }
}

/**
 * In-process store with the same contract as the Postgres one. Transactions run
 * one at a time against a copy of the state, which replaces the committed state
 * only when the callback resolves.
 */
export class MemoryDatabase implements Database {
  private state: MemoryState = emptyState();
  private queue: Promise<unknown> = Promise.resolve();

  async transaction<T>(fn: (tx: TxClient) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const working = structuredClone(this.state);
      const result = await fn(new MemoryTxClient(working));
      this.state = working;
      return result;
    };

    const next = this.queue.then(run, run);
    this.queue = next.catch(() => undefined);
    return next;
  }

  async close(): Promise<void> {
    await this.queue;
  }
}
