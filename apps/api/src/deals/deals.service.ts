import { Inject, Injectable } from '@nestjs/common';
import type { JwtClaims } from '@shootline/auth';
import { DEAL_STAGES, isDealStage, type DealStage, type Logger } from '@shootline/common';
import type { DealCreate, DealListQuery, DealStageMove, DealUpdate } from '@shootline/contracts';
import type { DealPatch, DealRow, JobRow, TxClient } from '@shootline/db';
import { ErrorCodes, invalidField, notFound } from '../common/errors.js';
import { serializeDeal, serializeJob } from '../common/serializers.js';
import { ProductionService } from '../production/production.service.js';

const parseStage = (value: string): DealStage => {
  if (!isDealStage(value)) {
    throw invalidField(ErrorCodes.invalidStage, 'stage', `stage must be one of: ${DEAL_STAGES.join(', ')}`);
  }
  return value;
};

@Injectable()
export class DealsService {
  constructor(
    @Inject(ProductionService) private readonly productionService: ProductionService,
    @Inject('APP_LOGGER') private readonly logger: Logger
  ) {}

  async listDeals(tx: TxClient, query: DealListQuery = {}) {
    const deals = await tx.listDeals({
      stage: query.stage === undefined ? undefined : parseStage(query.stage),
      clientId: query.client_id
    });
    return deals.map((deal) => serializeDeal(deal));
  }

  /** Kanban columns in pipeline order; every stage is present even when empty. */
  async dealsBoard(tx: TxClient) {
    const [deals, clients] = await Promise.all([tx.listDeals(), tx.listClients()]);
    const clientNames = new Map(clients.map((client) => [client.id, client.name]));

    return {
      stages: DEAL_STAGES.map((stage) => {
        const column = deals.filter((deal) => deal.stage === stage);
        return {
          stage,
          total_value: column.reduce((sum, deal) => sum + deal.value, 0),
          deals: column.map((deal) => ({
            ...serializeDeal(deal),
            client_name: clientNames.get(deal.clientId) ?? null
          }))
        };
      })
    };
  }

  async getDeal(tx: TxClient, dealId: string) {
    const deal = await this.getDealOrThrow(tx, dealId);
    const job = await tx.findJobByOriginDeal(dealId);
    return serializeDeal(deal, job?.id ?? null);
  }

  async createDeal(tx: TxClient, claims: JwtClaims, input: DealCreate) {
    const stage = input.stage === undefined ? 'New' : parseStage(input.stage);
    const client = await tx.findClientById(input.client_id);
    if (!client) {
      throw notFound('client', input.client_id);
    }

    const deal = await tx.insertDeal({
      clientId: input.client_id,
      title: input.title,
      value: input.value,
      costInternal: input.cost_internal,
      costExternal: input.cost_external,
      stage,
      isRecurring: input.is_recurring,
      notes: input.notes ?? null
    });

    this.logger.info('deal_created', { deal_id: deal.id, stage, actor_user_id: claims.user_id });

    const job = stage === 'Won' ? (await this.productionService.createJobFromDeal(tx, deal)).job : null;
    return serializeDeal(deal, job?.id ?? null);
  }

  async updateDeal(tx: TxClient, dealId: string, input: DealUpdate) {
    await this.getDealOrThrow(tx, dealId);

    const patch: DealPatch = {
      ...(input.title !== undefined ? { title: input.title } : {}),
      ...(input.value !== undefined ? { value: input.value } : {}),
      ...(input.cost_internal !== undefined ? { costInternal: input.cost_internal } : {}),
      ...(input.cost_external !== undefined ? { costExternal: input.cost_external } : {}),
      ...(input.is_recurring !== undefined ? { isRecurring: input.is_recurring } : {}),
      ...(input.notes !== undefined ? { notes: input.notes } : {})
    };

    const updated = await tx.updateDeal(dealId, patch);
    if (!updated) {
      throw notFound('deal', dealId);
    }
    return serializeDeal(updated);
  }

  /**
   * Any stage may follow any other. Reaching Won creates the deal's job unless
   * one is already linked; leaving Won never unlinks it.
   */
  async moveStage(tx: TxClient, claims: JwtClaims, dealId: string, input: DealStageMove, requestId: string) {
    const toStage = parseStage(input.stage);
    const deal = await this.getDealOrThrow(tx, dealId);
    const fromStage = deal.stage;

    let updated: DealRow = deal;
    if (fromStage !== toStage) {
      const row = await tx.updateDeal(dealId, { stage: toStage });
      if (!row) {
        throw notFound('deal', dealId);
      }
      updated = row;
    }

    let job: JobRow | null = await tx.findJobByOriginDeal(dealId);
    let jobCreated = false;
    if (toStage === 'Won' && !job) {
      const result = await this.productionService.createJobFromDeal(tx, updated);
      job = result.job;
      jobCreated = result.created;
    }

    this.logger.info('deal_stage_moved', {
      request_id: requestId,
      deal_id: dealId,
      from_stage: fromStage,
      to_stage: toStage,
      job_id: job?.id ?? null,
      job_created: jobCreated,
      actor_user_id: claims.user_id
    });

    return {
      deal: serializeDeal(updated, job?.id ?? null),
      job: job ? serializeJob(job) : null,
      job_created: jobCreated
    };
  }

  async deleteDeal(tx: TxClient, claims: JwtClaims, dealId: string) {
    const removed = await tx.deleteDeal(dealId);
    if (!removed) {
      throw notFound('deal', dealId);
    }
    this.logger.info('deal_deleted', { deal_id: dealId, actor_user_id: claims.user_id });
    return { id: dealId, deleted: true as const };
  }

  async getDealOrThrow(tx: TxClient, dealId: string): Promise<DealRow> {
    const deal = await tx.findDealById(dealId);
    if (!deal) {
      throw notFound('deal', dealId);
    }
    return deal;
  }
}
