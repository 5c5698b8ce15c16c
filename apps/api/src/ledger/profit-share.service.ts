import { Inject, Injectable } from '@nestjs/common';
import type { JwtClaims } from '@shootline/auth';
import type { Logger } from '@shootline/common';
import type { ProfitShareSet } from '@shootline/contracts';
import type { ShareInput, TxClient } from '@shootline/db';
import { ErrorCodes, invalidField, notFound } from '../common/errors.js';
import type { WorkflowConfig } from '../common/workflow-config.js';
import { allocationTotals, buildLedger, computeProfit } from './profit.js';

@Injectable()
export class ProfitShareService {
  constructor(
    @Inject('WORKFLOW_CONFIG') private readonly workflow: WorkflowConfig,
    @Inject('APP_LOGGER') private readonly logger: Logger
  ) {}

  async getLedger(tx: TxClient, dealId: string) {
    const deal = await tx.findDealById(dealId);
    if (!deal) {
      throw notFound('deal', dealId);
    }
    return buildLedger(deal, await tx.listShares(dealId));
  }

  /**
   * Replaces the deal's whole share set. Totals above 100 % or above the profit
   * are recorded as given unless the strict policy is configured.
   */
  async setShares(tx: TxClient, claims: JwtClaims, dealId: string, input: ProfitShareSet) {
    const deal = await tx.findDealById(dealId);
    if (!deal) {
      throw notFound('deal', dealId);
    }

    const seen = new Set<string>();
    const shares: ShareInput[] = [];
    for (const entry of input.shares) {
      if (seen.has(entry.user_id)) {
        throw invalidField(ErrorCodes.duplicateShareUser, 'shares', `user ${entry.user_id} appears more than once`);
      }
      seen.add(entry.user_id);

      const user = await tx.findUserById(entry.user_id);
      if (!user) {
        throw notFound('user', entry.user_id);
      }

      shares.push({
        userId: entry.user_id,
        percentage: entry.percentage ?? null,
        flatAmount: entry.flat_amount ?? null
      });
    }

    const profit = computeProfit(deal);
    const totals = allocationTotals(
      profit,
      shares.map((share) => ({ percentage: share.percentage, flatAmount: share.flatAmount }))
    );

    if (totals.overAllocated && this.workflow.profitSharePolicy === 'strict') {
      throw invalidField(
        ErrorCodes.shareOverAllocated,
        'shares',
        `shares allocate ${totals.percentageTotal}% and ${totals.flatTotal} flat against a profit of ${profit}`
      );
    }

    const rows = await tx.replaceShares(dealId, shares);
    this.logger.info('profit_shares_replaced', {
      deal_id: dealId,
      share_count: rows.length,
      over_allocated: totals.overAllocated,
      actor_user_id: claims.user_id
    });
    if (totals.overAllocated) {
      this.logger.warn('profit_shares_over_allocated', {
        deal_id: dealId,
        percentage_total: totals.percentageTotal,
        flat_total: totals.flatTotal,
        profit
      });
    }

    return buildLedger(deal, rows);
  }
}
