import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { hashPassword } from '@shootline/auth';
import { createJsonLogger, DEAL_STAGES, resolveVocabulary, toDateOnly } from '@shootline/common';
import { loadEnv } from '@shootline/config';
import { createDatabase, type TxClient } from '@shootline/db';

/**
 * Loads a small demo studio: users, clients, deals across the pipeline and one
 * job with dated tasks. Skips everything when users already exist.
 *
 * Usage: npm run db:seed
 */

const DemoSchema = z.object({
  users: z.array(
    z.object({
      username: z.string(),
      password: z.string(),
      role: z.enum(['admin', 'contributor']),
      full_name: z.string(),
      email: z.string()
    })
  ),
  clients: z.array(
    z.object({
      name: z.string(),
      industry: z.string().optional(),
      email: z.string().optional(),
      phone: z.string().optional()
    })
  ),
  deals: z.array(
    z.object({
      client: z.string(),
      title: z.string(),
      value: z.number(),
      cost_internal: z.number(),
      cost_external: z.number(),
      stage: z.enum(DEAL_STAGES),
      is_recurring: z.boolean()
    })
  ),
  tasks: z.array(
    z.object({
      deal: z.string(),
      title: z.string(),
      assignee: z.string(),
      due_in_days: z.number().int()
    })
  )
});

type Demo = z.infer<typeof DemoSchema>;

const logger = createJsonLogger();

const daysFromNow = (days: number): string => toDateOnly(new Date(Date.now() + days * 86_400_000));

const seed = async (tx: TxClient, demo: Demo, initialStatus: string) => {
  const userIds = new Map<string, string>();
  for (const user of demo.users) {
    const row = await tx.insertUser({
      username: user.username,
      passwordHash: hashPassword(user.password),
      role: user.role,
      fullName: user.full_name,
      email: user.email
    });
    if (row) {
      userIds.set(row.username, row.id);
    }
  }

  const clientIds = new Map<string, string>();
  for (const client of demo.clients) {
    const row = await tx.insertClient({
      name: client.name,
      industry: client.industry ?? null,
      email: client.email ?? null,
      phone: client.phone ?? null
    });
    clientIds.set(row.name, row.id);
  }

  const jobIds = new Map<string, string>();
  for (const deal of demo.deals) {
    const clientId = clientIds.get(deal.client);
    if (!clientId) {
      throw new Error(`demo deal ${deal.title} names unknown client ${deal.client}`);
    }
    const row = await tx.insertDeal({
      clientId,
      title: deal.title,
      value: deal.value,
      costInternal: deal.cost_internal,
      costExternal: deal.cost_external,
      stage: deal.stage,
      isRecurring: deal.is_recurring
    });
    if (row.stage === 'Won') {
      const job = await tx.insertJob({
        clientId,
        originDealId: row.id,
        title: row.title,
        startDate: toDateOnly(),
        isRetainer: row.isRecurring
      });
      if (job) {
        jobIds.set(row.title, job.id);
      }
    }
  }

  for (const task of demo.tasks) {
    const jobId = jobIds.get(task.deal);
    if (!jobId) {
      throw new Error(`demo task ${task.title} names a deal without a job: ${task.deal}`);
    }
    const assigneeUserId = userIds.get(task.assignee) ?? null;
    await tx.insertTask({
      jobId,
      title: task.title,
      status: initialStatus,
      assigneeUserId,
      dueDate: daysFromNow(task.due_in_days)
    });
    if (assigneeUserId) {
      await tx.upsertAssignment(jobId, assigneeUserId, 'Crew');
    }
  }

  return { users: userIds.size, clients: clientIds.size, deals: demo.deals.length, tasks: demo.tasks.length };
};

const main = async () => {
  const env = loadEnv(process.env);
  const raw = await readFile(new URL('./fixtures/demo-studio.json', import.meta.url), 'utf8');
  const demo = DemoSchema.parse(JSON.parse(raw));
  const vocabulary = resolveVocabulary(env.TASK_WORKFLOW, env.TASK_STATUSES);
  const database = createDatabase({ driver: env.DATA_DRIVER, url: env.DATABASE_URL });

  try {
    const result = await database.transaction(async (tx) => {
      if ((await tx.listUsers()).length > 0) {
        return null;
      }
      return seed(tx, demo, vocabulary.initial);
    });

    if (result) {
      logger.info('seed_completed', result);
    } else {
      logger.warn('seed_skipped', { reason: 'users already exist' });
    }
  } finally {
    await database.close();
  }
};

main().catch((error: unknown) => {
  logger.error('seed_failed', { error: error instanceof Error ? error.message : String(error) });
  process.exitCode = 1;
});
