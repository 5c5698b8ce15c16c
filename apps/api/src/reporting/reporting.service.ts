import { Inject, Injectable } from '@nestjs/common';
import { monthRange } from '@shootline/common';
import type { CalendarQuery, WorkloadQuery } from '@shootline/contracts';
import type { TxClient } from '@shootline/db';
import { notFound } from '../common/errors.js';
import { serializeDeal, serializeTask, summarizeUser, type SerializedTask } from '../common/serializers.js';
import type { WorkflowConfig } from '../common/workflow-config.js';
import type { ViewContext } from '../types.js';

const DASHBOARD_RECENT_DEALS = 5;
const DASHBOARD_UPCOMING_TASKS = 5;

type CalendarTask = SerializedTask & { job_title: string | null };

@Injectable()
export class ReportingService {
  constructor(@Inject('WORKFLOW_CONFIG') private readonly workflow: WorkflowConfig) {}

  /** Dated tasks due inside the month, grouped by due date ascending. */
  async tasksForMonth(tx: TxClient, view: ViewContext, query: CalendarQuery) {
    const { start, end } = monthRange(query.month);
    const tasks = await tx.listTasks({
      jobId: query.job_id,
      dueFrom: start,
      dueBefore: end,
      datedOnly: true
    });
    const jobTitles = await this.jobTitles(tx);

    const days = new Map<string, CalendarTask[]>();
    for (const task of tasks) {
      if (!task.dueDate) {
        continue;
      }
      const bucket = days.get(task.dueDate) ?? [];
      bucket.push({ ...serializeTask(task, view.users), job_title: jobTitles.get(task.jobId) ?? null });
      days.set(task.dueDate, bucket);
    }

    return {
      month: query.month,
      days: [...days.keys()].sort().map((date) => ({ date, tasks: days.get(date) ?? [] }))
    };
  }

  async clientSummary(tx: TxClient, clientId: string) {
    const client = await tx.findClientById(clientId);
    if (!client) {
      throw notFound('client', clientId);
    }

    const [dealCount, activeJobCount, totalValue, wonValue] = await Promise.all([
      tx.countDeals({ clientId }),
      tx.countJobs({ clientId, status: 'Active' }),
      tx.sumDealValue({ clientId }),
      tx.sumDealValue({ clientId, stage: 'Won' })
    ]);

    return {
      client_id: clientId,
      deal_count: dealCount,
      active_job_count: activeJobCount,
      total_value: totalValue,
      won_value: wonValue
    };
  }

  async userWorkload(tx: TxClient, view: ViewContext, userId: string, query: WorkloadQuery) {
    const user = await tx.findUserById(userId);
    if (!user) {
      throw notFound('user', userId);
    }

    const tasks = await tx.listTasks({
      assigneeUserId: userId,
      excludeStatus: query.include_done ? undefined : this.workflow.vocabulary.terminal
    });
    const assignments = await tx.listAssignments({ userId });
    const jobTitles = await this.jobTitles(tx);

    const jobs = [];
    for (const assignment of assignments) {
      const job = await tx.findJobById(assignment.jobId);
      if (job) {
        jobs.push({ job_id: job.id, title: job.title, status: job.status, role: assignment.role });
      }
    }

    return {
      user: summarizeUser(user),
      tasks: tasks.map((task) => ({
        ...serializeTask(task, view.users),
        job_title: jobTitles.get(task.jobId) ?? null
      })),
      jobs
    };
  }

  async dashboard(tx: TxClient, view: ViewContext) {
    const terminal = this.workflow.vocabulary.terminal;
    const [totalDeals, activeJobs, pendingTasks, wonValue, recentDeals, upcomingTasks] = await Promise.all([
      tx.countDeals(),
      tx.countJobs({ status: 'Active' }),
      tx.countTasks({ excludeStatus: terminal }),
      tx.sumDealValue({ stage: 'Won' }),
      tx.listDeals({}, DASHBOARD_RECENT_DEALS),
      tx.listTasks({ excludeStatus: terminal, datedOnly: true, limit: DASHBOARD_UPCOMING_TASKS })
    ]);

    return {
      total_deals: totalDeals,
      active_jobs: activeJobs,
      pending_tasks: pendingTasks,
      won_value: wonValue,
      recent_deals: recentDeals.map((deal) => serializeDeal(deal)),
      upcoming_tasks: upcomingTasks.map((task) => serializeTask(task, view.users))
    };
  }

  private async jobTitles(tx: TxClient): Promise<Map<string, string>> {
    const jobs = await tx.listJobs();
    return new Map(jobs.map((job) => [job.id, job.title]));
  }
}
