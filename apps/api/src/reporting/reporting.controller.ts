import { Controller, Get, Inject, Query } from '@nestjs/common';
import { CalendarQuerySchema } from '@shootline/contracts';
import type { JwtClaims } from '@shootline/auth';
import { Claims } from '../auth/claims.decorator.js';
import { RequireCapabilities } from '../auth/public.decorator.js';
import { Capabilities } from '../auth/rbac.js';
import { parseOrThrow } from '../common/validation.js';
import { RequestContextService } from '../db/request-context.service.js';
import { ReportingService } from './reporting.service.js';

@Controller()
export class ReportingController {
  constructor(
    @Inject(RequestContextService) private readonly requestContext: RequestContextService,
    @Inject(ReportingService) private readonly reportingService: ReportingService
  ) {}

  @Get('calendar')
  @RequireCapabilities(Capabilities.reportsRead)
  async calendar(@Claims() claims: JwtClaims, @Query() query: unknown) {
    const input = parseOrThrow(CalendarQuerySchema, query);
    return this.requestContext.runWithView(claims, (tx, view) => this.reportingService.tasksForMonth(tx, view, input));
  }

  @Get('dashboard')
  @RequireCapabilities(Capabilities.reportsRead)
  async dashboard(@Claims() claims: JwtClaims) {
    return this.requestContext.runWithView(claims, (tx, view) => this.reportingService.dashboard(tx, view));
  }
}
