import { Body, Controller, Delete, Get, Inject, Param, Patch, Post } from '@nestjs/common';
import { ClientCreateSchema, ClientUpdateSchema, DeleteResponseSchema } from '@shootline/contracts';
import type { JwtClaims } from '@shootline/auth';
import { Claims } from '../auth/claims.decorator.js';
import { RequireCapabilities } from '../auth/public.decorator.js';
import { Capabilities } from '../auth/rbac.js';
import { parseIdParam, parseOrThrow } from '../common/validation.js';
import { RequestContextService } from '../db/request-context.service.js';
import { ReportingService } from '../reporting/reporting.service.js';
import { ClientsService } from './clients.service.js';

@Controller('clients')
export class ClientsController {
  constructor(
    @Inject(RequestContextService) private readonly requestContext: RequestContextService,
    @Inject(ClientsService) private readonly clientsService: ClientsService,
    @Inject(ReportingService) private readonly reportingService: ReportingService
  ) {}

  @Get()
  @RequireCapabilities(Capabilities.clientsRead)
  async listClients(@Claims() claims: JwtClaims) {
    return this.requestContext.runWithClaims(claims, (tx) => this.clientsService.listClients(tx));
  }

  @Post()
  @RequireCapabilities(Capabilities.clientsWrite)
  async createClient(@Claims() claims: JwtClaims, @Body() body: unknown) {
    const input = parseOrThrow(ClientCreateSchema, body);
    return this.requestContext.runWithClaims(claims, (tx) => this.clientsService.createClient(tx, input));
  }

  @Get(':id')
  @RequireCapabilities(Capabilities.clientsRead)
  async getClient(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const clientId = parseIdParam('client', id);
    return this.requestContext.runWithClaims(claims, (tx) => this.clientsService.getClient(tx, clientId));
  }

  @Patch(':id')
  @RequireCapabilities(Capabilities.clientsWrite)
  async updateClient(@Claims() claims: JwtClaims, @Param('id') id: string, @Body() body: unknown) {
    const clientId = parseIdParam('client', id);
    const input = parseOrThrow(ClientUpdateSchema, body);
    return this.requestContext.runWithClaims(claims, (tx) => this.clientsService.updateClient(tx, clientId, input));
  }

  @Delete(':id')
  @RequireCapabilities(Capabilities.clientsWrite)
  async deleteClient(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const clientId = parseIdParam('client', id);
    const deleted = await this.requestContext.runWithClaims(claims, (tx) =>
      this.clientsService.deleteClient(tx, claims, clientId)
    );
    return DeleteResponseSchema.parse(deleted);
  }

  @Get(':id/summary')
  @RequireCapabilities(Capabilities.reportsRead)
  async clientSummary(@Claims() claims: JwtClaims, @Param('id') id: string) {
    const clientId = parseIdParam('client', id);
    return this.requestContext.runWithClaims(claims, (tx) => this.reportingService.clientSummary(tx, clientId));
  }
}
