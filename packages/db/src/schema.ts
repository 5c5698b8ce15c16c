import { boolean, date, doublePrecision, integer, pgTable, text, timestamp, uniqueIndex, uuid, varchar } from 'drizzle-orm/pg-core';
import type { DealStage, JobStatus, UserRole } from '@shootline/common';

export const users = pgTable('users', {
  id: uuid('id').primaryKey().defaultRandom(),
  username: varchar('username', { length: 80 }).notNull().unique(),
  passwordHash: text('password_hash').notNull(),
  role: text('role').$type<UserRole>().notNull().default('contributor'),
  fullName: text('full_name').notNull(),
  email: text('email').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
});

export const clients = pgTable('clients', {
  id: uuid('id').primaryKey().defaultRandom(),
  name: varchar('name', { length: 100 }).notNull(),
  industry: varchar('industry', { length: 100 }),
  email: varchar('email', { length: 120 }),
  phone: varchar('phone', { length: 20 }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
});

export const deals = pgTable('deals', {
  id: uuid('id').primaryKey().defaultRandom(),
  clientId: uuid('client_id')
    .notNull()
    .references(() => clients.id, { onDelete: 'restrict' }),
  title: varchar('title', { length: 200 }).notNull(),
  value: doublePrecision('value').notNull().default(0),
  costInternal: doublePrecision('cost_internal').notNull().default(0),
  costExternal: doublePrecision('cost_external').notNull().default(0),
  stage: text('stage').$type<DealStage>().notNull().default('New'),
  isRecurring: boolean('is_recurring').notNull().default(false),
  notes: text('notes'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
});

export const profitShares = pgTable(
  'profit_shares',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    dealId: uuid('deal_id')
      .notNull()
      .references(() => deals.id, { onDelete: 'cascade' }),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'restrict' }),
    percentage: doublePrecision('percentage'),
    flatAmount: doublePrecision('flat_amount'),
    position: integer('position').notNull().default(0)
  },
  (table) => ({
    dealUserUnique: uniqueIndex('profit_shares_deal_id_user_id_key').on(table.dealId, table.userId)
  })
);

export const jobs = pgTable(
  'jobs',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    clientId: uuid('client_id')
      .notNull()
      .references(() => clients.id, { onDelete: 'restrict' }),
    // Weak back-reference: deleting the deal leaves the job in place.
    originDealId: uuid('origin_deal_id').references(() => deals.id, { onDelete: 'set null' }),
    title: varchar('title', { length: 200 }).notNull(),
    status: text('status').$type<JobStatus>().notNull().default('Active'),
    startDate: date('start_date', { mode: 'string' }).notNull(),
    isRetainer: boolean('is_retainer').notNull().default(false),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    originDealUnique: uniqueIndex('jobs_origin_deal_id_key').on(table.originDealId)
  })
);

export const jobAssignments = pgTable(
  'job_assignments',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    jobId: uuid('job_id')
      .notNull()
      .references(() => jobs.id, { onDelete: 'cascade' }),
    userId: uuid('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'restrict' }),
    role: varchar('role', { length: 50 }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow()
  },
  (table) => ({
    jobUserUnique: uniqueIndex('job_assignments_job_id_user_id_key').on(table.jobId, table.userId)
  })
);

export const tasks = pgTable('tasks', {
  id: uuid('id').primaryKey().defaultRandom(),
  jobId: uuid('job_id')
    .notNull()
    .references(() => jobs.id, { onDelete: 'cascade' }),
  title: varchar('title', { length: 200 }).notNull(),
  description: text('description'),
  status: varchar('status', { length: 40 }).notNull(),
  assigneeUserId: uuid('assignee_user_id').references(() => users.id, { onDelete: 'set null' }),
  dueDate: date('due_date', { mode: 'string' }),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow()
});

export type UserRow = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type ClientRow = typeof clients.$inferSelect;
export type NewClient = typeof clients.$inferInsert;
export type DealRow = typeof deals.$inferSelect;
export type NewDeal = typeof deals.$inferInsert;
export type ProfitShareRow = typeof profitShares.$inferSelect;
export type JobRow = typeof jobs.$inferSelect;
export type NewJob = typeof jobs.$inferInsert;
export type JobAssignmentRow = typeof jobAssignments.$inferSelect;
export type TaskRow = typeof tasks.$inferSelect;
export type NewTask = typeof tasks.$inferInsert;
