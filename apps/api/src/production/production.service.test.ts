import { BadRequestException, ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';
import { resolveVocabulary } from '@shootline/common';
import { beforeEach, describe, expect, it } from 'vitest';
import { createLoggerStub, createStudio, workflowConfig, type Studio } from '../testing/fixtures.js';
import { ProductionService } from './production.service.js';

describe('ProductionService', () => {
  let studio: Studio;
  let service: ProductionService;
  let jobId: string;

  beforeEach(async () => {
    studio = await createStudio();
    service = new ProductionService(workflowConfig(), createLoggerStub());
    const job = await studio.run(studio.adminClaims, (tx) =>
      service.createJob(tx, studio.adminClaims, {
        client_id: studio.client.id,
        title: 'Harbor Coffee autumn campaign',
        start_date: '2025-09-01',
        is_retainer: false
      })
    );
    jobId = job.id;
  });

  it('adds tasks in the initial status with the assignee name resolved', async () => {
    const task = await studio.run(studio.adminClaims, (tx, view) =>
      service.addTask(tx, view, jobId, {
        title: 'Storyboard',
        assignee_user_id: studio.contributor.id,
        due_date: '2025-10-15'
      })
    );

    expect(task.status).toBe('To Do');
    expect(task.assignee).toEqual({ id: studio.contributor.id, full_name: 'Alex Rivera' });
  });

  it('rejects a status outside the vocabulary', async () => {
    const task = await studio.run(studio.adminClaims, (tx, view) =>
      service.addTask(tx, view, jobId, { title: 'Color grade' })
    );

    const attempt = studio.run(studio.adminClaims, (tx, view) =>
      service.setTaskStatus(tx, view, task.id, { status: 'Archived' })
    );

    await expect(attempt).rejects.toBeInstanceOf(BadRequestException);
    await expect(attempt).rejects.toMatchObject({ response: { code: 'INVALID_STATUS', field: 'status' } });
  });

  it('treats a repeated status change as a no-op', async () => {
    const task = await studio.run(studio.adminClaims, (tx, view) =>
      service.addTask(tx, view, jobId, { title: 'Edit' })
    );

    const first = await studio.run(studio.adminClaims, (tx, view) =>
      service.setTaskStatus(tx, view, task.id, { status: 'Review' })
    );
    const second = await studio.run(studio.adminClaims, (tx, view) =>
      service.setTaskStatus(tx, view, task.id, { status: 'Review' })
    );

    expect(first.status).toBe('Review');
    expect(second).toEqual(first);
  });

  it('lets contributors move only their own tasks', async () => {
    const { own, other } = await studio.run(studio.adminClaims, async (tx, view) => ({
      own: await service.addTask(tx, view, jobId, { title: 'Shoot', assignee_user_id: studio.contributor.id }),
      other: await service.addTask(tx, view, jobId, { title: 'Invoice', assignee_user_id: studio.admin.id })
    }));

    const moved = await studio.run(studio.contributorClaims, (tx, view) =>
      service.setTaskStatus(tx, view, own.id, { status: 'In Progress' })
    );
    expect(moved.status).toBe('In Progress');

    await expect(
      studio.run(studio.contributorClaims, (tx, view) =>
        service.setTaskStatus(tx, view, other.id, { status: 'Done' })
      )
    ).rejects.toBeInstanceOf(ForbiddenException);
  });

  it('follows the deliverable vocabulary when configured', async () => {
    const deliverables = new ProductionService(
      workflowConfig({ vocabulary: resolveVocabulary('deliverable') }),
      createLoggerStub()
    );
    const task = await studio.run(studio.adminClaims, (tx, view) =>
      deliverables.addTask(tx, view, jobId, { title: 'Hero video' })
    );

    const editing = await studio.run(studio.adminClaims, (tx, view) =>
      deliverables.setTaskStatus(tx, view, task.id, { status: 'Editing' })
    );

    expect(editing.status).toBe('Editing');
    expect(deliverables.workflowOptions().task_statuses).toEqual(['To Do', 'Shooting', 'Editing', 'Review', 'Done']);
  });

  it('completes a job once and keeps the first completion time', async () => {
    const first = await studio.run(studio.adminClaims, (tx) => service.completeJob(tx, studio.adminClaims, jobId));
    const second = await studio.run(studio.adminClaims, (tx) => service.completeJob(tx, studio.adminClaims, jobId));

    expect(first.status).toBe('Completed');
    expect(first.completed_at).not.toBeNull();
    expect(second.completed_at).toBe(first.completed_at);
  });

  it('upserts an assignment role for a user on a job', async () => {
    await studio.run(studio.adminClaims, (tx, view) =>
      service.assignUser(tx, view, jobId, studio.contributor.id, { role: 'Photographer' })
    );
    const updated = await studio.run(studio.adminClaims, (tx, view) =>
      service.assignUser(tx, view, jobId, studio.contributor.id, { role: 'Editor' })
    );

    expect(updated.role).toBe('Editor');
    expect(updated.user).toEqual({ id: studio.contributor.id, full_name: 'Alex Rivera' });
    const job = await studio.run(studio.adminClaims, (tx, view) => service.getJob(tx, view, jobId));
    expect(job.assignments).toHaveLength(1);
  });

  it('rejects assigning an unknown user', async () => {
    await expect(
      studio.run(studio.adminClaims, (tx, view) =>
        service.assignUser(tx, view, jobId, '00000000-0000-0000-0000-000000000000', { role: 'Editor' })
      )
    ).rejects.toBeInstanceOf(NotFoundException);
  });

  it('refuses a second job for the same origin deal', async () => {
    const deal = await studio.database.transaction((tx) =>
      tx.insertDeal({ clientId: studio.client.id, title: 'Retainer', stage: 'Won' })
    );
    const job = { client_id: studio.client.id, title: 'Retainer', origin_deal_id: deal.id, is_retainer: true };

    await studio.run(studio.adminClaims, (tx) => service.createJob(tx, studio.adminClaims, job));

    await expect(
      studio.run(studio.adminClaims, (tx) => service.createJob(tx, studio.adminClaims, job))
    ).rejects.toBeInstanceOf(ConflictException);
  });

  it('lists jobs with task progress and filters by client name', async () => {
    await studio.run(studio.adminClaims, async (tx, view) => {
      const task = await service.addTask(tx, view, jobId, { title: 'Shoot' });
      await service.addTask(tx, view, jobId, { title: 'Deliver' });
      await service.setTaskStatus(tx, view, task.id, { status: 'Done' });
    });

    const matching = await studio.run(studio.adminClaims, (tx, view) => service.listJobs(tx, view, { search: 'harbor' }));
    const none = await studio.run(studio.adminClaims, (tx, view) => service.listJobs(tx, view, { search: 'bakery' }));

    expect(matching).toHaveLength(1);
    expect(matching[0]).toMatchObject({ client_name: 'Harbor Coffee', task_total: 2, task_done: 1 });
    expect(none).toEqual([]);
  });
});
