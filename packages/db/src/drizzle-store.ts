import { and, asc, count, desc, eq, gte, ilike, isNotNull, lt, ne, sql, type SQL } from 'drizzle-orm';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import pg from 'pg';
import * as schema from './schema.js';
import { clients, deals, jobAssignments, jobs, profitShares, tasks, users } from './schema.js';
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

export type DrizzleDb = NodePgDatabase<typeof schema>;
type DrizzleTx = Parameters<Parameters<DrizzleDb['transaction']>[0]>[0];

const escapeLike = (value: string): string => value.replace(/[\\%_]/g, (char) => `\\${char}`);

const dealConditions = (filter: DealFilter = {}): SQL | undefined => {
  const conditions: SQL[] = [];
  if (filter.stage) conditions.push(eq(deals.stage, filter.stage));
  if (filter.clientId) conditions.push(eq(deals.clientId, filter.clientId));
  return and(...conditions);
};

const jobConditions = (filter: JobFilter = {}): SQL | undefined => {
  const conditions: SQL[] = [];
  if (filter.status) conditions.push(eq(jobs.status, filter.status));
  if (filter.clientId) conditions.push(eq(jobs.clientId, filter.clientId));
  if (filter.clientNameSearch) conditions.push(ilike(clients.name, `%${escapeLike(filter.clientNameSearch)}%`));
  return and(...conditions);
};

const taskConditions = (filter: TaskFilter = {}): SQL | undefined => {
  const conditions: SQL[] = [];
  if (filter.jobId) conditions.push(eq(tasks.jobId, filter.jobId));
  if (filter.assigneeUserId) conditions.push(eq(tasks.assigneeUserId, filter.assigneeUserId));
  if (filter.dueFrom) conditions.push(gte(tasks.dueDate, filter.dueFrom));
  if (filter.dueBefore) conditions.push(lt(tasks.dueDate, filter.dueBefore));
  if (filter.datedOnly) conditions.push(isNotNull(tasks.dueDate));
  if (filter.excludeStatus) conditions.push(ne(tasks.status, filter.excludeStatus));
  return and(...conditions);
};

export class DrizzleTxClient implements TxClient {
  constructor(private readonly tx: DrizzleTx) {}

  async findUserById(id: string): Promise<UserRow | null> {
    const [row] = await this.tx.select().from(users).where(eq(users.id, id)).limit(1);
    return row ?? null;
  }

  async findUserByUsername(username: string): Promise<UserRow | null> {
    const [row] = await this.tx.select().from(users).where(eq(users.username, username)).limit(1);
    return row ?? null;
  }

  async listUsers(): Promise<UserRow[]> {
    return this.tx.select().from(users).orderBy(asc(users.username));
  }

  async insertUser(data: NewUser): Promise<UserRow | null> {
    const [row] = await this.tx.insert(users).values(data).onConflictDoNothing({ target: users.username }).returning();
    return row ?? null;
  }

  async findClientById(id: string): Promise<ClientRow | null> {
    const [row] = await this.tx.select().from(clients).where(eq(clients.id, id)).limit(1);
    return row ?? null;
  }

  async listClients(): Promise<ClientRow[]> {
    return this.tx.select().from(clients).orderBy(asc(clients.name));
  }

  async insertClient(data: NewClient): Promise<ClientRow> {
    const [row] = await this.tx.insert(clients).values(data).returning();
    if (!row) {
      throw new Error('client insert returned no row');
    }
    return row;
  }

  async updateClient(id: string, patch: ClientPatch): Promise<ClientRow | null> {
    const [row] = await this.tx.update(clients).set(patch).where(eq(clients.id, id)).returning();
    return row ?? null;
  }

  async deleteClient(id: string): Promise<boolean> {
    const removed = await this.tx.delete(clients).where(eq(clients.id, id)).returning({ id: clients.id });
    return removed.length > 0;
  }

  async findDealById(id: string): Promise<DealRow | null> {
    const [row] = await this.tx.select().from(deals).where(eq(deals.id, id)).limit(1);
    return row ?? null;
  }

  async listDeals(filter?: DealFilter, limit?: number): Promise<DealRow[]> {
    const query = this.tx.select().from(deals).where(dealConditions(filter)).orderBy(desc(deals.createdAt));
    return limit === undefined ? query : query.limit(limit);
  }

  async insertDeal(data: NewDeal): Promise<DealRow> {
    const [row] = await this.tx.insert(deals).values(data).returning();
    if (!row) {
      throw new Error('deal insert returned no row');
    }
    return row;
  }

  async updateDeal(id: string, patch: DealPatch): Promise<DealRow | null> {
    const [row] = await this.tx
      .update(deals)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(deals.id, id))
      .returning();
    return row ?? null;
  }

  async deleteDeal(id: string): Promise<boolean> {
    const removed = await this.tx.delete(deals).where(eq(deals.id, id)).returning({ id: deals.id });
    return removed.length > 0;
  }

  async countDeals(filter?: DealFilter): Promise<number> {
    const [row] = await this.tx.select({ value: count() }).from(deals).where(dealConditions(filter));
    return row?.value ?? 0;
  }

  async sumDealValue(filter?: DealFilter): Promise<number> {
    const [row] = await this.tx
      .select({ total: sql<number>`coalesce(sum(${deals.value}), 0)`.mapWith(Number) })
      .from(deals)
      .where(dealConditions(filter));
    return row?.total ?? 0;
  }

  async listShares(dealId: string): Promise<ProfitShareRow[]> {
    return this.tx
      .select()
      .from(profitShares)
      .where(eq(profitShares.dealId, dealId))
      .orderBy(asc(profitShares.position));
  }

  async replaceShares(dealId: string, shares: ShareInput[]): Promise<ProfitShareRow[]> {
    await this.tx.delete(profitShares).where(eq(profitShares.dealId, dealId));
    if (shares.length === 0) {
      return [];
    }

    await this.tx.insert(profitShares).values(
      shares.map((share, position) => ({
        dealId,
        userId: share.userId,
        percentage: share.percentage,
        flatAmount: share.flatAmount,
        position
      }))
    );
    return this.listShares(dealId);
  }

  async findJobById(id: string): Promise<JobRow | null> {
    const [row] = await this.tx.select().from(jobs).where(eq(jobs.id, id)).limit(1);
    return row ?? null;
  }

  async findJobByOriginDeal(dealId: string): Promise<JobRow | null> {
    const [row] = await this.tx.select().from(jobs).where(eq(jobs.originDealId, dealId)).limit(1);
    return row ?? null;
  }

  async listJobs(filter?: JobFilter): Promise<JobRow[]> {
    const rows = await this.tx
      .select({ job: jobs })
      .from(jobs)
      .innerJoin(clients, eq(jobs.clientId, clients.id))
      .where(jobConditions(filter))
      .orderBy(desc(jobs.createdAt));
    return rows.map((row) => row.job);
  }

  async insertJob(data: NewJob): Promise<JobRow | null> {
    const [row] = await this.tx.insert(jobs).values(data).onConflictDoNothing({ target: jobs.originDealId }).returning();
    return row ?? null;
  }

  async updateJob(id: string, patch: JobPatch): Promise<JobRow | null> {
    const [row] = await this.tx.update(jobs).set(patch).where(eq(jobs.id, id)).returning();
    return row ?? null;
  }

  async countJobs(filter?: JobFilter): Promise<number> {
    const [row] = await this.tx
      .select({ value: count() })
      .from(jobs)
      .innerJoin(clients, eq(jobs.clientId, clients.id))
      .where(jobConditions(filter));
    return row?.value ?? 0;
  }

  async listAssignments(filter: AssignmentFilter): Promise<JobAssignmentRow[]> {
    const conditions: SQL[] = [];
    if (filter.jobId) conditions.push(eq(jobAssignments.jobId, filter.jobId));
    if (filter.userId) conditions.push(eq(jobAssignments.userId, filter.userId));
    return this.tx
      .select()
      .from(jobAssignments)
      .where(and(...conditions))
      .orderBy(asc(jobAssignments.createdAt));
  }

  async upsertAssignment(jobId: string, userId: string, role: string): Promise<JobAssignmentRow> {
    const [row] = await this.tx
      .insert(jobAssignments)
      .values({ jobId, userId, role })
      .onConflictDoUpdate({ target: [jobAssignments.jobId, jobAssignments.userId], set: { role } })
      .returning();
    if (!row) {
      throw new Error('assignment upsert returned no row');
    }
    return row;
  }

  async deleteAssignment(jobId: string, userId: string): Promise<boolean> {
    const removed = await this.tx
      .delete(jobAssignments)
      .where(and(eq(jobAssignments.jobId, jobId), eq(jobAssignments.userId, userId)))
      .returning({ id: jobAssignments.id });
    return removed.length > 0;
  }

  async findTaskById(id: string): Promise<TaskRow | null> {
    const [row] = await this.tx.select().from(tasks).where(eq(tasks.id, id)).limit(1);
    return row ?? null;
  }

  async listTasks(filter?: TaskFilter): Promise<TaskRow[]> {
    const query = this.tx
      .select()
      .from(tasks)
      .where(taskConditions(filter))
      .orderBy(sql`${tasks.dueDate} asc nulls last`, asc(tasks.createdAt));
    return filter?.limit === undefined ? query : query.limit(filter.limit);
  }

  async insertTask(data: NewTask): Promise<TaskRow> {
    const [row] = await this.tx.insert(tasks).values(data).returning();
    if (!row) {
      throw new Error('task insert returned no row');
    }
    return row;
  }

  async updateTask(id: string, patch: TaskPatch): Promise<TaskRow | null> {
    const [row] = await this.tx
      .update(tasks)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(tasks.id, id))
      .returning();
    return row ?? null;
  }

  async deleteTask(id: string): Promise<boolean> {
    const removed = await this.tx.delete(tasks).where(eq(tasks.id, id)).returning({ id: tasks.id });
    return removed.length > 0;
  }

  async countTasks(filter?: TaskFilter): Promise<number> {
    const [row] = await this.tx.select({ value: count() }).from(tasks).where(taskConditions(filter));
    return row?.value ?? 0;
  }
}

export class PostgresDatabase implements Database {
  private readonly pool: pg.Pool;
  readonly db: DrizzleDb;

  constructor(url: string) {
    this.pool = new pg.Pool({ connectionString: url });
    this.db = drizzle(this.pool, { schema });
  }

  async transaction<T>(fn: (tx: TxClient) => Promise<T>): Promise<T> {
    return this.db.transaction(async (tx) => fn(new DrizzleTxClient(tx)));
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
