import { Body, Controller, Delete, Get, HttpCode, Inject, Param, Post, Put, Query } from '@nestjs/common';
import { JobAssigneeSetSchema, JobCreateSchema, JobListQuerySchema, TaskCreateSchema } from '@shootline/contracts';
import type { JwtClaims } from '@shootline/auth';
import { Claims } from '../auth/claims.decorator.js';
import { RequireCapabilities } from '../auth/public.decorator.js';
import { Capabilities } from '../auth/rbac.js';
import { parseIdParam, parseOrThrow } from '../common/validation.js';
import { RequestContextService } from '../db/request-context.service.js';
import { ProductionService } from './production.service.js';

@Controller()
export class JobsController {
  constructor(
    @Inject(RequestContextService) private readonly requestContext: RequestContextService,
    @Inject(ProductionService) private readonly productionService: ProductionService
  ) {}

  @Get('workflow')
  @RequireCapabilities(Capabilities.jobsRead)
  getWorkflow() {
    return this.productionService.workflowOptions();
  }

  @Get('jobs')
  @RequireCapabilities(Capabilities.jobsRead)
  async listJobs(@Claims() claims: JwtClaims, @Query() query: unknown) {
    const filter = parseOrThrow(JobListQuerySchema, query);
    return this.requestContext.runWithView(claims, (tx, view) => this.productionService.listJobs(tx, view, filter));
  }

  @Post('jobs')
  @RequireCapabilities(Capabilities.jobsWrite)
  async createJob(@Claims() claims: JwtClaims, @Body() body: unknown) {
    const input = parseOrThrow(JobCreateSchema, body);
    return this.requestContext.runWithClaims(claims, (tx) => this.productionService.createJob(tx, claims, input));
  }

  @Get('jobs/:id')
  @RequireCapabilities(Capabilities.jobsRead)
  async getJob(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const jobId = parseIdParam('job', id);
    return this.requestContext.runWithView(claims, (tx, view) => this.productionService.getJob(tx, view, jobId));
  }

  @Post('jobs/:id/complete')
  @HttpCode(200)
  @RequireCapabilities(Capabilities.jobsWrite)
  async completeJob(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const jobId = parseIdParam('job', id);
    return this.requestContext.runWithClaims(claims, (tx) => this.productionService.completeJob(tx, claims, jobId));
  }

  @Post('jobs/:id/tasks')
  @RequireCapabilities(Capabilities.tasksWrite)
  async addTask(@Claims() claims: JwtClaims, @Param('id') id: string, @Body() body: unknown) {
    const jobId = parseIdParam('job', id);
    const input = parseOrThrow(TaskCreateSchema, body);
    return this.requestContext.runWithView(claims, (tx, view) =>
      this.productionService.addTask(tx, view, jobId, input)
    );
  }

  @Put('jobs/:id/assignees/:userId')
  @RequireCapabilities(Capabilities.jobsWrite)
  async assignUser(
    @Claims() claims: JwtClaims,
    @Param('id') id: string,
    @Param('userId') userIdParam: string,
    @Body() body: unknown
  ) {
    const jobId = parseIdParam('job', id);
    const userId = parseIdParam('user', userIdParam);
    const input = parseOrThrow(JobAssigneeSetSchema, body);
    return this.requestContext.runWithView(claims, (tx, view) =>
      this.productionService.assignUser(tx, view, jobId, userId, input)
    );
  }

  @Delete('jobs/:id/assignees/:userId')
  @RequireCapabilities(Capabilities.jobsWrite)
  async unassignUser(@Claims() claims: JwtClaims, @Param('id') id: string, @Param('userId') userIdParam: string) {
    const jobId = parseIdParam('job', id);
    const userId = parseIdParam('user', userIdParam);
    return this.requestContext.runWithClaims(claims, (tx) => this.productionService.unassignUser(tx, jobId, userId));
  }
}
