import { Body, Controller, Delete, HttpCode, Inject, Param, Patch, Post } from '@nestjs/common';
import { DeleteResponseSchema, TaskStatusChangeSchema, TaskUpdateSchema } from '@shootline/contracts';
import type { JwtClaims } from '@shootline/auth';
import { Claims } from '../auth/claims.decorator.js';
import { RequireCapabilities } from '../auth/public.decorator.js';
import { Capabilities } from '../auth/rbac.js';
import { parseIdParam, parseOrThrow } from '../common/validation.js';
import { RequestContextService } from '../db/request-context.service.js';
import { ProductionService } from './production.service.js';

@Controller('tasks')
export class TasksController {
  constructor(
    @Inject(RequestContextService) private readonly requestContext: RequestContextService,
    @Inject(ProductionService) private readonly productionService: ProductionService
  ) {}

  @Patch(':id')
  @RequireCapabilities(Capabilities.tasksWrite)
  async updateTask(@Claims() claims: JwtClaims, @Param('id') id: string, @Body() body: unknown) {
    const taskId = parseIdParam('task', id);
    const input = parseOrThrow(TaskUpdateSchema, body);
    return this.requestContext.runWithView(claims, (tx, view) =>
      this.productionService.updateTask(tx, view, taskId, input)
    );
  }

  // Contributors hold tasks.status; the service narrows them to their own tasks.
  @Post(':id/status')
  @HttpCode(200)
  @RequireCapabilities(Capabilities.tasksStatus)
  async setTaskStatus(@Claims() claims: JwtClaims, @Param('id') id: string, @Body() body: unknown) {
    const taskId = parseIdParam('task', id);
    const input = parseOrThrow(TaskStatusChangeSchema, body);
    return this.requestContext.runWithView(claims, (tx, view) =>
      this.productionService.setTaskStatus(tx, view, taskId, input)
    );
  }

  @Delete(':id')
  @RequireCapabilities(Capabilities.tasksWrite)
  async deleteTask(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const taskId = parseIdParam('task', id);
    const deleted = await this.requestContext.runWithClaims(claims, (tx) => this.productionService.deleteTask(tx, taskId));
    return DeleteResponseSchema.parse(deleted);
  }
}
