import { readFile } from 'node:fs/promises';
import pg from 'pg';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { PostgresDatabase } from '../drizzle-store.js';

const url = process.env.TEST_DATABASE_URL;
const ready = Boolean(url);

const applySchema = async (connectionString: string) => {
  const sql = await readFile(new URL('../../sql/0001_init.sql', import.meta.url), 'utf8');
  const client = new pg.Client({ connectionString });
  await client.connect();
  try {
    await client.query(sql);
  } finally {
    await client.end();
  }
};

describe('PostgresDatabase integration', () => {
  let database: PostgresDatabase | undefined;

  beforeAll(async () => {
    if (!url) return;
    await applySchema(url);
    database = new PostgresDatabase(url);
  });

  afterAll(async () => {
    await database?.close();
  });

  it.skipIf(!ready)('keeps one job per origin deal through the unique index', async () => {
    if (!database) return;
    const results = await database.transaction(async (tx) => {
      const client = await tx.insertClient({ name: `Integration ${Date.now()}` });
      const deal = await tx.insertDeal({ clientId: client.id, title: 'Won deal', stage: 'Won' });
      const job = { clientId: client.id, originDealId: deal.id, title: 'Won deal', startDate: '2025-10-01' };
      return [await tx.insertJob(job), await tx.insertJob(job), await tx.findJobByOriginDeal(deal.id)];
    });

    expect(results[0]).not.toBeNull();
    expect(results[1]).toBeNull();
    expect(results[2]?.id).toBe(results[0]?.id);
  });

  it.skipIf(!ready)('rolls back every write when the callback throws', async () => {
    if (!database) return;
    const name = `Rollback ${Date.now()}`;

    await expect(
      database.transaction(async (tx) => {
        await tx.insertClient({ name });
        throw new Error('abort');
      })
    ).rejects.toThrowError('abort');

    const clients = await database.transaction((tx) => tx.listClients());
    expect(clients.some((client) => client.name === name)).toBe(false);
  });

  it.skipIf(!ready)('creates the unique indexes the upserts target', async () => {
    if (!url) return;
    const client = new pg.Client({ connectionString: url });
    await client.connect();
    try {
      const { rows } = await client.query<{ indexname: string }>(
        `SELECT indexname FROM pg_indexes
          WHERE schemaname = current_schema() AND indexdef LIKE 'CREATE UNIQUE INDEX%'
            AND indexname = ANY($1::text[])
          ORDER BY indexname`,
        [['job_assignments_job_id_user_id_key', 'jobs_origin_deal_id_key', 'profit_shares_deal_id_user_id_key']]
      );
      expect(rows.map((row) => row.indexname)).toEqual([
        'job_assignments_job_id_user_id_key',
        'jobs_origin_deal_id_key',
        'profit_shares_deal_id_user_id_key'
      ]);
    } finally {
      await client.end();
    }
  });
});
