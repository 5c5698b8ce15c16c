import type { DealRow, ProfitShareRow } from '@shootline/db';

export const roundMoney = (value: number): number => Math.round(value * 100) / 100;

/** Never stored; may be negative when costs exceed the deal value. */
export const computeProfit = (deal: Pick<DealRow, 'value' | 'costInternal' | 'costExternal'>): number =>
  deal.value - deal.costInternal - deal.costExternal;

export interface LedgerLine {
  id: string;
  user_id: string;
  percentage: number | null;
  flat_amount: number | null;
  allocated_amount: number;
}

export interface Ledger {
  deal_id: string;
  profit: number;
  shares: LedgerLine[];
  percentage_total: number;
  flat_total: number;
  allocated_total: number;
  unallocated: number;
  over_allocated: boolean;
}

const allocatedAmount = (profit: number, share: Pick<ProfitShareRow, 'percentage' | 'flatAmount'>): number =>
  roundMoney((profit * (share.percentage ?? 0)) / 100 + (share.flatAmount ?? 0));

/** Over-allocated when percentages pass 100 or the combined allocation passes the profit. */
export const allocationTotals = (profit: number, shares: Pick<ProfitShareRow, 'percentage' | 'flatAmount'>[]) => {
  let percentageTotal = 0;
  let flatTotal = 0;
  let allocatedTotal = 0;
  for (const share of shares) {
    percentageTotal += share.percentage ?? 0;
    flatTotal += share.flatAmount ?? 0;
    allocatedTotal += allocatedAmount(profit, share);
  }
  allocatedTotal = roundMoney(allocatedTotal);
  return {
    percentageTotal,
    flatTotal,
    allocatedTotal,
    overAllocated: percentageTotal > 100 || (shares.length > 0 && allocatedTotal > profit)
  };
};

export const buildLedger = (deal: DealRow, shares: ProfitShareRow[]): Ledger => {
  const profit = computeProfit(deal);
  const lines = shares.map<LedgerLine>((share) => ({
    id: share.id,
    user_id: share.userId,
    percentage: share.percentage,
    flat_amount: share.flatAmount,
    allocated_amount: allocatedAmount(profit, share)
  }));
  const totals = allocationTotals(profit, shares);

  return {
    deal_id: deal.id,
    profit,
    shares: lines,
    percentage_total: totals.percentageTotal,
    flat_total: totals.flatTotal,
    allocated_total: totals.allocatedTotal,
    unallocated: roundMoney(profit - totals.allocatedTotal),
    over_allocated: totals.overAllocated
  };
};
