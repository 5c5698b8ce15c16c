import { Inject, Injectable } from '@nestjs/common';
import type { JwtClaims } from '@shootline/auth';
import { DEAL_STAGES, isKnownStatus, toDateOnly, type Logger } from '@shootline/common';
import type { JobAssigneeSet, JobCreate, JobListQuery, TaskCreate, TaskStatusChange, TaskUpdate } from '@shootline/contracts';
import type { DealRow, JobRow, TaskPatch, TaskRow, TxClient } from '@shootline/db';
import { Capabilities, hasCapability } from '../auth/rbac.js';
import { constraintViolation, ErrorCodes, forbidden, invalidField, notFound } from '../common/errors.js';
import { serializeAssignment, serializeJob, serializeTask } from '../common/serializers.js';
import type { WorkflowConfig } from '../common/workflow-config.js';
import type { ViewContext } from '../types.js';

export interface JobFromDealResult {
  job: JobRow;
  created: boolean;
}

@Injectable()
export class ProductionService {
  constructor(
    @Inject('WORKFLOW_CONFIG') private readonly workflow: WorkflowConfig,
    @Inject('APP_LOGGER') private readonly logger: Logger
  ) {}

  workflowOptions() {
    const vocabulary = this.workflow.vocabulary;
    return {
      deal_stages: DEAL_STAGES,
      task_vocabulary: vocabulary.name,
      task_statuses: vocabulary.statuses,
      initial_status: vocabulary.initial,
      terminal_status: vocabulary.terminal
    };
  }

  async listJobs(tx: TxClient, view: ViewContext, query: JobListQuery = {}) {
    const jobs = await tx.listJobs({
      status: query.status,
      clientId: query.client_id,
      clientNameSearch: query.search
    });
    const clients = new Map((await tx.listClients()).map((client) => [client.id, client.name]));

    return Promise.all(
      jobs.map(async (job) => {
        const tasks = await tx.listTasks({ jobId: job.id });
        const assignments = await tx.listAssignments({ jobId: job.id });
        return {
          ...serializeJob(job),
          client_name: clients.get(job.clientId) ?? null,
          task_total: tasks.length,
          task_done: tasks.filter((task) => task.status === this.workflow.vocabulary.terminal).length,
          tasks: tasks.map((task) => serializeTask(task, view.users)),
          assignments: assignments.map((assignment) => serializeAssignment(assignment, view.users))
        };
      })
    );
  }

  async getJob(tx: TxClient, view: ViewContext, jobId: string) {
    const job = await this.getJobOrThrow(tx, jobId);
    const [tasks, assignments] = await Promise.all([
      tx.listTasks({ jobId }),
      tx.listAssignments({ jobId })
    ]);

    return {
      ...serializeJob(job),
      tasks: tasks.map((task) => serializeTask(task, view.users)),
      assignments: assignments.map((assignment) => serializeAssignment(assignment, view.users))
    };
  }

  async createJob(tx: TxClient, claims: JwtClaims, input: JobCreate) {
    const client = await tx.findClientById(input.client_id);
    if (!client) {
      throw notFound('client', input.client_id);
    }

    if (input.origin_deal_id) {
      const deal = await tx.findDealById(input.origin_deal_id);
      if (!deal) {
        throw notFound('deal', input.origin_deal_id);
      }
    }

    const job = await tx.insertJob({
      clientId: input.client_id,
      originDealId: input.origin_deal_id ?? null,
      title: input.title,
      status: 'Active',
      startDate: input.start_date ?? toDateOnly(),
      isRetainer: input.is_retainer
    });

    if (!job) {
      throw constraintViolation(`deal ${input.origin_deal_id ?? ''} already has a job`, 'origin_deal_id');
    }

    this.logger.info('job_created', { job_id: job.id, client_id: job.clientId, actor_user_id: claims.user_id });
    return serializeJob(job);
  }

  /**
   * Creates the job a Won deal owes, or returns the one it already has. The
   * insert defers to the unique index on origin_deal_id, so a replayed or
   * concurrent Won move ends with one job.
   */
  async createJobFromDeal(tx: TxClient, deal: DealRow): Promise<JobFromDealResult> {
    const inserted = await tx.insertJob({
      clientId: deal.clientId,
      originDealId: deal.id,
      title: deal.title,
      status: 'Active',
      startDate: toDateOnly(),
      isRetainer: deal.isRecurring
    });

    if (!inserted) {
      const existing = await tx.findJobByOriginDeal(deal.id);
      if (!existing) {
        throw constraintViolation(`job for deal ${deal.id} could not be created`, 'origin_deal_id');
      }
      return { job: existing, created: false };
    }

    for (const title of this.workflow.jobSeedTasks) {
      await tx.insertTask({ jobId: inserted.id, title, status: this.workflow.vocabulary.initial });
    }

    this.logger.info('job_created_from_deal', {
      job_id: inserted.id,
      deal_id: deal.id,
      seeded_tasks: this.workflow.jobSeedTasks.length
    });
    return { job: inserted, created: true };
  }

  async completeJob(tx: TxClient, claims: JwtClaims, jobId: string) {
    const job = await this.getJobOrThrow(tx, jobId);
    if (job.status === 'Completed') {
      return serializeJob(job);
    }

    const updated = await tx.updateJob(jobId, { status: 'Completed', completedAt: new Date() });
    if (!updated) {
      throw notFound('job', jobId);
    }

    this.logger.info('job_completed', { job_id: jobId, actor_user_id: claims.user_id });
    return serializeJob(updated);
  }

  async assignUser(tx: TxClient, view: ViewContext, jobId: string, userId: string, input: JobAssigneeSet) {
    await this.getJobOrThrow(tx, jobId);
    await this.assertUserExists(tx, userId);

    const assignment = await tx.upsertAssignment(jobId, userId, input.role);
    return serializeAssignment(assignment, view.users);
  }

  async unassignUser(tx: TxClient, jobId: string, userId: string) {
    await this.getJobOrThrow(tx, jobId);
    const removed = await tx.deleteAssignment(jobId, userId);
    if (!removed) {
      throw notFound('assignee', userId);
    }
    return { job_id: jobId, user_id: userId, removed: true };
  }

  async addTask(tx: TxClient, view: ViewContext, jobId: string, input: TaskCreate) {
    await this.getJobOrThrow(tx, jobId);
    if (input.assignee_user_id) {
      await this.assertUserExists(tx, input.assignee_user_id);
    }

    const task = await tx.insertTask({
      jobId,
      title: input.title,
      description: input.description ?? null,
      status: this.workflow.vocabulary.initial,
      assigneeUserId: input.assignee_user_id ?? null,
      dueDate: input.due_date ?? null
    });

    return serializeTask(task, view.users);
  }

  async updateTask(tx: TxClient, view: ViewContext, taskId: string, input: TaskUpdate) {
    await this.getTaskOrThrow(tx, taskId);
    if (input.assignee_user_id) {
      await this.assertUserExists(tx, input.assignee_user_id);
    }

    const patch: TaskPatch = {
      ...(input.title !== undefined ? { title: input.title } : {}),
      ...(input.description !== undefined ? { description: input.description } : {}),
      ...(input.assignee_user_id !== undefined ? { assigneeUserId: input.assignee_user_id } : {}),
      ...(input.due_date !== undefined ? { dueDate: input.due_date } : {})
    };

    const updated = await tx.updateTask(taskId, patch);
    if (!updated) {
      throw notFound('task', taskId);
    }
    return serializeTask(updated, view.users);
  }

  async setTaskStatus(tx: TxClient, view: ViewContext, taskId: string, input: TaskStatusChange) {
    if (!isKnownStatus(this.workflow.vocabulary, input.status)) {
      throw invalidField(
        ErrorCodes.invalidStatus,
        'status',
        `status must be one of: ${this.workflow.vocabulary.statuses.join(', ')}`
      );
    }

    const task = await this.getTaskOrThrow(tx, taskId);
    const actor = view.actor;
    if (!hasCapability(actor.capabilities, Capabilities.tasksWrite) && task.assigneeUserId !== actor.user_id) {
      throw forbidden('only the assignee may change this task');
    }

    if (task.status === input.status) {
      return serializeTask(task, view.users);
    }

    const updated = await tx.updateTask(taskId, { status: input.status });
    if (!updated) {
      throw notFound('task', taskId);
    }

    this.logger.info('task_status_changed', {
      task_id: taskId,
      from_status: task.status,
      to_status: input.status,
      actor_user_id: actor.user_id
    });
    return serializeTask(updated, view.users);
  }

  async deleteTask(tx: TxClient, taskId: string) {
    const removed = await tx.deleteTask(taskId);
    if (!removed) {
      throw notFound('task', taskId);
    }
    return { id: taskId, deleted: true as const };
  }

  async getJobOrThrow(tx: TxClient, jobId: string): Promise<JobRow> {
    const job = await tx.findJobById(jobId);
    if (!job) {
      throw notFound('job', jobId);
    }
    return job;
  }

  private async getTaskOrThrow(tx: TxClient, taskId: string): Promise<TaskRow> {
    const task = await tx.findTaskById(taskId);
    if (!task) {
      throw notFound('task', taskId);
    }
    return task;
  }

  private async assertUserExists(tx: TxClient, userId: string): Promise<void> {
    const user = await tx.findUserById(userId);
    if (!user) {
      throw notFound('user', userId);
    }
  }
}
