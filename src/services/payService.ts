import { PaySplit } from '../types';

export const roundCents = (amount: number): number => Math.round(amount * 100) / 100;

/**
 * Revenue credited for one deal. A null magnitude earns nothing.
 */
export const revenueFor = (magnitude: number | null, ratePerUnit: number): number =>
  roundCents((magnitude ?? 0) * ratePerUnit);

/**
 * Rep pay for a set of deals under the configured split
 */
export const payoutFor = (totals: { revenue: number; count: number }, split: PaySplit): number => {
  switch (split.mode) {
    case 'percent':
      return roundCents((totals.revenue * split.percent) / 100);
    case 'flat':
      return roundCents(totals.count * split.amountPerDeal);
  }
};

export const formatCurrency = (amount: number): string =>
  `$${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
