import { NotFoundException } from '@nestjs/common';
import { beforeEach, describe, expect, it } from 'vitest';
import { ProductionService } from '../production/production.service.js';
import { createLoggerStub, createStudio, workflowConfig, type Studio } from '../testing/fixtures.js';
import { ReportingService } from './reporting.service.js';

describe('ReportingService', () => {
  let studio: Studio;
  let production: ProductionService;
  let reporting: ReportingService;
  let jobId: string;

  beforeEach(async () => {
    studio = await createStudio();
    production = new ProductionService(workflowConfig(), createLoggerStub());
    reporting = new ReportingService(workflowConfig());
    const job = await studio.run(studio.adminClaims, (tx) =>
      production.createJob(tx, studio.adminClaims, {
        client_id: studio.client.id,
        title: 'Autumn campaign',
        is_retainer: false
      })
    );
    jobId = job.id;
  });

  it('puts a newly added task on its due date in the month view', async () => {
    const task = await studio.run(studio.adminClaims, (tx, view) =>
      production.addTask(tx, view, jobId, {
        title: 'Location scout',
        assignee_user_id: studio.contributor.id,
        due_date: '2025-10-15'
      })
    );

    const calendar = await studio.run(studio.adminClaims, (tx, view) =>
      reporting.tasksForMonth(tx, view, { month: '2025-10' })
    );

    expect(calendar.month).toBe('2025-10');
    expect(calendar.days).toHaveLength(1);
    expect(calendar.days[0]?.date).toBe('2025-10-15');
    expect(calendar.days[0]?.tasks).toHaveLength(1);
    expect(calendar.days[0]?.tasks[0]).toMatchObject({
      id: task.id,
      status: 'To Do',
      job_title: 'Autumn campaign',
      assignee: { id: studio.contributor.id, full_name: 'Alex Rivera' }
    });
  });

  it('leaves out undated tasks and tasks due in other months', async () => {
    await studio.run(studio.adminClaims, async (tx, view) => {
      await production.addTask(tx, view, jobId, { title: 'Undated' });
      await production.addTask(tx, view, jobId, { title: 'September', due_date: '2025-09-30' });
      await production.addTask(tx, view, jobId, { title: 'November', due_date: '2025-11-01' });
      await production.addTask(tx, view, jobId, { title: 'Late October', due_date: '2025-10-31' });
      await production.addTask(tx, view, jobId, { title: 'Early October', due_date: '2025-10-01' });
    });

    const calendar = await studio.run(studio.adminClaims, (tx, view) =>
      reporting.tasksForMonth(tx, view, { month: '2025-10' })
    );

    expect(calendar.days.map((day) => [day.date, day.tasks.map((task) => task.title)])).toEqual([
      ['2025-10-01', ['Early October']],
      ['2025-10-31', ['Late October']]
    ]);
  });

  it('summarizes a client across deals and jobs', async () => {
    await studio.database.transaction(async (tx) => {
      await tx.insertDeal({ clientId: studio.client.id, title: 'Won one', value: 1200, stage: 'Won' });
      await tx.insertDeal({ clientId: studio.client.id, title: 'Lost one', value: 300, stage: 'Lost' });
    });

    const summary = await studio.run(studio.adminClaims, (tx) => reporting.clientSummary(tx, studio.client.id));

    expect(summary).toEqual({
      client_id: studio.client.id,
      deal_count: 2,
      active_job_count: 1,
      total_value: 1500,
      won_value: 1200
    });
  });

  it('shows only open tasks in a workload unless done ones are asked for', async () => {
    await studio.run(studio.adminClaims, async (tx, view) => {
      await production.assignUser(tx, view, jobId, studio.contributor.id, { role: 'Photographer' });
      const done = await production.addTask(tx, view, jobId, {
        title: 'Delivered',
        assignee_user_id: studio.contributor.id,
        due_date: '2025-10-01'
      });
      await production.setTaskStatus(tx, view, done.id, { status: 'Done' });
      await production.addTask(tx, view, jobId, { title: 'Undated open', assignee_user_id: studio.contributor.id });
      await production.addTask(tx, view, jobId, {
        title: 'Dated open',
        assignee_user_id: studio.contributor.id,
        due_date: '2025-10-20'
      });
    });

    const open = await studio.run(studio.contributorClaims, (tx, view) =>
      reporting.userWorkload(tx, view, studio.contributor.id, { include_done: false })
    );
    const all = await studio.run(studio.contributorClaims, (tx, view) =>
      reporting.userWorkload(tx, view, studio.contributor.id, { include_done: true })
    );

    expect(open.tasks.map((task) => task.title)).toEqual(['Dated open', 'Undated open']);
    expect(all.tasks.map((task) => task.title)).toEqual(['Delivered', 'Dated open', 'Undated open']);
    expect(open.jobs).toEqual([{ job_id: jobId, title: 'Autumn campaign', status: 'Active', role: 'Photographer' }]);
  });

  it('returns NOT_FOUND for the workload of an unknown user', async () => {
    await expect(
      studio.run(studio.adminClaims, (tx, view) =>
        reporting.userWorkload(tx, view, '00000000-0000-0000-0000-000000000000', { include_done: false })
      )
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('counts open work on the dashboard', async () => {
    await studio.run(studio.adminClaims, async (tx, view) => {
      await tx.insertDeal({ clientId: studio.client.id, title: 'Won deal', value: 900, stage: 'Won' });
      const task = await production.addTask(tx, view, jobId, { title: 'Wrap', due_date: '2025-10-02' });
      await production.setTaskStatus(tx, view, task.id, { status: 'Done' });
      await production.addTask(tx, view, jobId, { title: 'Open', due_date: '2025-10-03' });
    });

    const dashboard = await studio.run(studio.adminClaims, (tx, view) => reporting.dashboard(tx, view));

    expect(dashboard).toMatchObject({ total_deals: 1, active_jobs: 1, pending_tasks: 1, won_value: 900 });
    expect(dashboard.upcoming_tasks.map((task) => task.title)).toEqual(['Open']);
  });
});
