import { BadRequestException, NotFoundException } from '@nestjs/common';
import { beforeEach, describe, expect, it } from 'vitest';
import { ProductionService } from '../production/production.service.js';
import { createLoggerStub, createStudio, workflowConfig, type Studio } from '../testing/fixtures.js';
import { DealsService } from './deals.service.js';

const createServices = (jobSeedTasks: string[] = []) => {
  const logger = createLoggerStub();
  const production = new ProductionService(workflowConfig({ jobSeedTasks }), logger);
  return { logger, production, deals: new DealsService(production, logger) };
};

describe('DealsService stage moves', () => {
  let studio: Studio;

  beforeEach(async () => {
    studio = await createStudio();
  });

  const createDeal = (deals: DealsService, stage?: string) =>
    studio.run(studio.adminClaims, (tx) =>
      deals.createDeal(tx, studio.adminClaims, {
        client_id: studio.client.id,
        title: 'Spring menu shoot',
        value: 1000,
        cost_internal: 200,
        cost_external: 100,
        is_recurring: false,
        stage
      })
    );

  it('creates exactly one job when a deal is moved to Won twice', async () => {
    const { deals } = createServices();
    const deal = await createDeal(deals);

    const first = await studio.run(studio.adminClaims, (tx) =>
      deals.moveStage(tx, studio.adminClaims, deal.id, { stage: 'Won' }, 'req-1')
    );
    const second = await studio.run(studio.adminClaims, (tx) =>
      deals.moveStage(tx, studio.adminClaims, deal.id, { stage: 'Won' }, 'req-2')
    );

    expect(first.job_created).toBe(true);
    expect(second.job_created).toBe(false);
    expect(second.job?.id).toBe(first.job?.id);

    const jobs = await studio.database.transaction((tx) => tx.listJobs());
    expect(jobs).toHaveLength(1);
    expect(jobs[0]).toMatchObject({
      originDealId: deal.id,
      clientId: studio.client.id,
      title: 'Spring menu shoot',
      status: 'Active'
    });
  });

  it('keeps the linked job when a won deal moves back to New', async () => {
    const { deals } = createServices();
    const deal = await createDeal(deals);
    const won = await studio.run(studio.adminClaims, (tx) =>
      deals.moveStage(tx, studio.adminClaims, deal.id, { stage: 'Won' }, 'req-1')
    );

    const reopened = await studio.run(studio.adminClaims, (tx) =>
      deals.moveStage(tx, studio.adminClaims, deal.id, { stage: 'New' }, 'req-2')
    );

    expect(reopened.deal.stage).toBe('New');
    expect(reopened.deal.job_id).toBe(won.job?.id);
    expect(reopened.job_created).toBe(false);
    expect(await studio.database.transaction((tx) => tx.countJobs())).toBe(1);
  });

  it('does not create a job for stages other than Won', async () => {
    const { deals } = createServices();
    const deal = await createDeal(deals);

    const result = await studio.run(studio.adminClaims, (tx) =>
      deals.moveStage(tx, studio.adminClaims, deal.id, { stage: 'Negotiation' }, 'req-1')
    );

    expect(result.job).toBeNull();
    expect(result.deal.stage).toBe('Negotiation');
    expect(await studio.database.transaction((tx) => tx.countJobs())).toBe(0);
  });

  it('rejects an unknown stage and leaves the deal unchanged', async () => {
    const { deals } = createServices();
    const deal = await createDeal(deals, 'Proposal');

    const attempt = studio.run(studio.adminClaims, (tx) =>
      deals.moveStage(tx, studio.adminClaims, deal.id, { stage: 'Closed' }, 'req-1')
    );

    await expect(attempt).rejects.toBeInstanceOf(BadRequestException);
    await expect(attempt).rejects.toMatchObject({
      response: { code: 'INVALID_STAGE', field: 'stage' }
    });
    const stored = await studio.database.transaction((tx) => tx.findDealById(deal.id));
    expect(stored?.stage).toBe('Proposal');
  });

  it('seeds the configured tasks on a job created from a won deal', async () => {
    const { deals } = createServices(['Pre-production call', 'Shot list']);
    const deal = await createDeal(deals);

    const result = await studio.run(studio.adminClaims, (tx) =>
      deals.moveStage(tx, studio.adminClaims, deal.id, { stage: 'Won' }, 'req-1')
    );

    const tasks = await studio.database.transaction((tx) => tx.listTasks({ jobId: result.job?.id }));
    expect(tasks.map((task) => [task.title, task.status])).toEqual([
      ['Pre-production call', 'To Do'],
      ['Shot list', 'To Do']
    ]);
  });

  it('logs the stage move with the request id', async () => {
    const { deals, logger } = createServices();
    const deal = await createDeal(deals);

    await studio.run(studio.adminClaims, (tx) =>
      deals.moveStage(tx, studio.adminClaims, deal.id, { stage: 'Proposal' }, 'req-42')
    );

    expect(logger.info).toHaveBeenCalledWith('deal_stage_moved', {
      request_id: 'req-42',
      deal_id: deal.id,
      from_stage: 'New',
      to_stage: 'Proposal',
      job_id: null,
      job_created: false,
      actor_user_id: studio.admin.id
    });
  });
});

describe('DealsService records', () => {
  let studio: Studio;

  beforeEach(async () => {
    studio = await createStudio();
  });

  it('creates a deal in New with its derived profit', async () => {
    const { deals } = createServices();

    const deal = await studio.run(studio.adminClaims, (tx) =>
      deals.createDeal(tx, studio.adminClaims, {
        client_id: studio.client.id,
        title: 'Brand film',
        value: 1000,
        cost_internal: 200,
        cost_external: 100,
        is_recurring: false
      })
    );

    expect(deal.stage).toBe('New');
    expect(deal.profit).toBe(700);
  });

  it('creates the job at once when a deal is created as Won', async () => {
    const { deals } = createServices();

    const deal = await studio.run(studio.adminClaims, (tx) =>
      deals.createDeal(tx, studio.adminClaims, {
        client_id: studio.client.id,
        title: 'Monthly socials',
        value: 500,
        cost_internal: 0,
        cost_external: 0,
        is_recurring: true,
        stage: 'Won'
      })
    );

    const job = await studio.database.transaction((tx) => tx.findJobByOriginDeal(deal.id));
    expect(deal.job_id).toBe(job?.id);
    expect(job?.isRetainer).toBe(true);
  });

  it('rejects a deal for an unknown client', async () => {
    const { deals } = createServices();

    const attempt = studio.run(studio.adminClaims, (tx) =>
      deals.createDeal(tx, studio.adminClaims, {
        client_id: '00000000-0000-0000-0000-000000000000',
        title: 'Orphan',
        value: 0,
        cost_internal: 0,
        cost_external: 0,
        is_recurring: false
      })
    );

    await expect(attempt).rejects.toBeInstanceOf(NotFoundException);
    expect(await studio.database.transaction((tx) => tx.countDeals())).toBe(0);
  });

  it('groups the board by stage in pipeline order', async () => {
    const { deals } = createServices();
    await studio.run(studio.adminClaims, async (tx) => {
      await deals.createDeal(tx, studio.adminClaims, {
        client_id: studio.client.id,
        title: 'Lookbook',
        value: 300,
        cost_internal: 0,
        cost_external: 0,
        is_recurring: false,
        stage: 'Proposal'
      });
      await deals.createDeal(tx, studio.adminClaims, {
        client_id: studio.client.id,
        title: 'Podcast',
        value: 450,
        cost_internal: 0,
        cost_external: 0,
        is_recurring: false,
        stage: 'Proposal'
      });
    });

    const board = await studio.run(studio.adminClaims, (tx) => deals.dealsBoard(tx));

    expect(board.stages.map((column) => column.stage)).toEqual(['New', 'Proposal', 'Negotiation', 'Won', 'Lost']);
    const proposal = board.stages[1];
    expect(proposal?.total_value).toBe(750);
    expect(proposal?.deals.map((deal) => deal.client_name)).toEqual(['Harbor Coffee', 'Harbor Coffee']);
  });

  it('keeps the job when its origin deal is deleted', async () => {
    const { deals } = createServices();
    const deal = await studio.run(studio.adminClaims, (tx) =>
      deals.createDeal(tx, studio.adminClaims, {
        client_id: studio.client.id,
        title: 'Catalogue',
        value: 800,
        cost_internal: 0,
        cost_external: 0,
        is_recurring: false,
        stage: 'Won'
      })
    );

    const removed = await studio.run(studio.adminClaims, (tx) => deals.deleteDeal(tx, studio.adminClaims, deal.id));

    expect(removed).toEqual({ id: deal.id, deleted: true });
    const jobs = await studio.database.transaction((tx) => tx.listJobs());
    expect(jobs).toHaveLength(1);
    expect(jobs[0]?.originDealId).toBeNull();
  });
});
