import { Body, Controller, Delete, Get, Inject, Param, Patch, Post, Put, Query, Req } from '@nestjs/common';
import {
  DealCreateSchema,
  DealListQuerySchema,
  DealStageMoveSchema,
  DealUpdateSchema,
  DeleteResponseSchema,
  ProfitShareSetSchema
} from '@shootline/contracts';
import type { JwtClaims } from '@shootline/auth';
import type { AuthenticatedRequest } from '../types.js';
import { Claims } from '../auth/claims.decorator.js';
import { RequireCapabilities } from '../auth/public.decorator.js';
import { Capabilities } from '../auth/rbac.js';
import { parseIdParam, parseOrThrow } from '../common/validation.js';
import { RequestContextService } from '../db/request-context.service.js';
import { ProfitShareService } from '../ledger/profit-share.service.js';
import { DealsService } from './deals.service.js';

@Controller('deals')
export class DealsController {
  constructor(
    @Inject(RequestContextService) private readonly requestContext: RequestContextService,
    @Inject(DealsService) private readonly dealsService: DealsService,
    @Inject(ProfitShareService) private readonly profitShareService: ProfitShareService
  ) {}

  @Get()
  @RequireCapabilities(Capabilities.dealsRead)
  async listDeals(@Claims() claims: JwtClaims, @Query() query: unknown) {
    const filter = parseOrThrow(DealListQuerySchema, query);
    return this.requestContext.runWithClaims(claims, (tx) => this.dealsService.listDeals(tx, filter));
  }

  @Get('board')
  @RequireCapabilities(Capabilities.dealsRead)
  async dealsBoard(@Claims() claims: JwtClaims) {
    return this.requestContext.runWithClaims(claims, (tx) => this.dealsService.dealsBoard(tx));
  }

  @Post()
  @RequireCapabilities(Capabilities.dealsWrite)
  async createDeal(@Claims() claims: JwtClaims, @Body() body: unknown) {
    const input = parseOrThrow(DealCreateSchema, body);
    return this.requestContext.runWithClaims(claims, (tx) => this.dealsService.createDeal(tx, claims, input));
  }

  @Get(':id')
  @RequireCapabilities(Capabilities.dealsRead)
  async getDeal(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const dealId = parseIdParam('deal', id);
    return this.requestContext.runWithClaims(claims, (tx) => this.dealsService.getDeal(tx, dealId));
  }

  @Patch(':id')
  @RequireCapabilities(Capabilities.dealsWrite)
  async updateDeal(@Claims() claims: JwtClaims, @Param('id') id: string, @Body() body: unknown) {
    const dealId = parseIdParam('deal', id);
    const input = parseOrThrow(DealUpdateSchema, body);
    return this.requestContext.runWithClaims(claims, (tx) => this.dealsService.updateDeal(tx, dealId, input));
  }

  @Delete(':id')
  @RequireCapabilities(Capabilities.dealsWrite)
  async deleteDeal(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const dealId = parseIdParam('deal', id);
    const deleted = await this.requestContext.runWithClaims(claims, (tx) =>
      this.dealsService.deleteDeal(tx, claims, dealId)
    );
    return DeleteResponseSchema.parse(deleted);
  }

  @Post(':id/stage')
  @RequireCapabilities(Capabilities.dealsWrite)
  async moveStage(
    @Claims() claims: JwtClaims,
    @Req() req: AuthenticatedRequest,
    @Param('id') id: string,
    @Body() body: unknown
  ) {
    const dealId = parseIdParam('deal', id);
    const input = parseOrThrow(DealStageMoveSchema, body);
    return this.requestContext.runWithClaims(claims, (tx) =>
      this.dealsService.moveStage(tx, claims, dealId, input, req.requestId)
    );
  }

  @Get(':id/shares')
  @RequireCapabilities(Capabilities.sharesRead)
  async getLedger(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const dealId = parseIdParam('deal', id);
    return this.requestContext.runWithClaims(claims, (tx) => this.profitShareService.getLedger(tx, dealId));
  }

  @Put(':id/shares')
  @RequireCapabilities(Capabilities.sharesWrite)
  async setShares(@Claims() claims: JwtClaims, @Param('id') id: string, @Body() body: unknown) {
    const dealId = parseIdParam('deal', id);
    const input = parseOrThrow(ProfitShareSetSchema, body);
    return this.requestContext.runWithClaims(claims, (tx) =>
      this.profitShareService.setShares(tx, claims, dealId, input)
    );
  }
}
