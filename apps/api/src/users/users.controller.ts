import { Body, Controller, Get, Inject, Param, Post, Query } from '@nestjs/common';
import { UserCreateSchema, WorkloadQuerySchema } from '@shootline/contracts';
import type { JwtClaims } from '@shootline/auth';
import { Claims } from '../auth/claims.decorator.js';
import { RequireCapabilities } from '../auth/public.decorator.js';
import { Capabilities } from '../auth/rbac.js';
import { parseIdParam, parseOrThrow } from '../common/validation.js';
import { RequestContextService } from '../db/request-context.service.js';
import { ReportingService } from '../reporting/reporting.service.js';
import { UsersService } from './users.service.js';

@Controller('users')
export class UsersController {
  constructor(
    @Inject(RequestContextService) private readonly requestContext: RequestContextService,
    @Inject(UsersService) private readonly usersService: UsersService,
    @Inject(ReportingService) private readonly reportingService: ReportingService
  ) {}

  @Get()
  @RequireCapabilities(Capabilities.usersRead)
  async listUsers(@Claims() claims: JwtClaims) {
    return this.requestContext.runWithClaims(claims, (tx) => this.usersService.listUsers(tx));
  }

  @Post()
  @RequireCapabilities(Capabilities.usersWrite)
  async createUser(@Claims() claims: JwtClaims, @Body() body: unknown) {
    const input = parseOrThrow(UserCreateSchema, body);
    return this.requestContext.runWithClaims(claims, (tx) => this.usersService.createUser(tx, input));
  }

  @Get(':id/workload')
  @RequireCapabilities(Capabilities.reportsRead)
  async workload(@Claims() claims: JwtClaims, @Param('id') id: string, @Query() query: unknown) {
    const userId = parseIdParam('user', id);
    const input = parseOrThrow(WorkloadQuerySchema, query);
    return this.requestContext.runWithView(claims, (tx, view) =>
      this.reportingService.userWorkload(tx, view, userId, input)
    );
  }
}
