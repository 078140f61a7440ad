import {
  Actor,
  ActorRole,
  ActorSummary,
  CategoryStandings,
  Deal,
  Leaderboard,
  LOSS_REASON_CODES,
  LossReasonShare,
  LossSummary,
  PaySplit,
  PeriodBounds,
  PeriodKind,
  PeriodStats,
  Standing
} from '../types';
import { addDays, bounds, formatCivilDate, isWithin, toCivilDate } from './periodService';
import { payoutFor, revenueFor, roundCents } from './payService';

export interface AggregateOptions {
  ratePerUnit?: number;
}

export interface SummaryOptions extends AggregateOptions {
  paySplit?: PaySplit;
}

// Float sums are rounded so totals do not depend on input order
const roundMagnitude = (value: number): number => Math.round(value * 1e6) / 1e6;

/**
 * Grouping key for an actor. Name-only actors with the same folded name
 * share a key.
 */
export const actorKey = (actor: Actor): string =>
  actor.kind === 'identified' ? `id:${actor.id}` : `name:${actor.name.trim().toLowerCase()}`;

export const actorHasId = (actor: Actor | null, actorId: string): boolean =>
  actor !== null && actor.kind === 'identified' && actor.id === actorId;

const activityTime = (deal: Deal): number => Date.parse(deal.closedAt ?? deal.createdAt);

const isNewer = (a: Deal, b: Deal): boolean =>
  activityTime(a) > activityTime(b) || (activityTime(a) === activityTime(b) && a.id > b.id);

const sumMagnitude = (deals: Deal[]): number =>
  roundMagnitude(deals.reduce((total, deal) => total + (deal.magnitude ?? 0), 0));

const sumRevenue = (deals: Deal[], ratePerUnit: number): number =>
  roundCents(deals.reduce((total, deal) => total + revenueFor(deal.magnitude, ratePerUnit), 0));

/**
 * Group sold deals by the actor in the given role, ranked by deal count then
 * total kW
 */
export const aggregate = (deals: Deal[], role: ActorRole, options: AggregateOptions = {}): Standing[] => {
  const groups = new Map<string, { actor: Actor; latest: Deal; deals: Deal[] }>();

  for (const deal of deals) {
    if (deal.status !== 'sold') continue;
    const actor = deal[role];
    if (!actor || actor.name.trim() === '') continue;

    const key = actorKey(actor);
    const group = groups.get(key);
    if (!group) {
      groups.set(key, { actor, latest: deal, deals: [deal] });
    } else {
      group.deals.push(deal);
      if (isNewer(deal, group.latest)) {
        group.actor = actor;
        group.latest = deal;
      }
    }
  }

  const standings: Standing[] = [...groups.values()].map(group => {
    const standing: Standing = {
      actorId: group.actor.kind === 'identified' ? group.actor.id : null,
      actorName: group.actor.name,
      count: group.deals.length,
      totalMagnitude: sumMagnitude(group.deals)
    };
    if (options.ratePerUnit !== undefined) {
      standing.totalRevenue = sumRevenue(group.deals, options.ratePerUnit);
    }
    return standing;
  });

  return standings.sort(
    (a, b) =>
      b.count - a.count ||
      b.totalMagnitude - a.totalMagnitude ||
      a.actorName.localeCompare(b.actorName)
  );
};

/**
 * Zero kW marks an add-on-only (battery) sale; everything else is primary
 */
export const splitByCategory = (deals: Deal[]): { primary: Deal[]; secondary: Deal[] } => {
  const primary: Deal[] = [];
  const secondary: Deal[] = [];
  for (const deal of deals) {
    if (deal.magnitude === 0) {
      secondary.push(deal);
    } else {
      primary.push(deal);
    }
  }
  return { primary, secondary };
};

/**
 * Sold deals closed inside the period
 */
export const filterByPeriod = (deals: Deal[], period: PeriodBounds): Deal[] =>
  deals.filter(deal => deal.status === 'sold' && deal.closedAt !== null && isWithin(new Date(deal.closedAt), period));

export const buildLeaderboard = (
  deals: Deal[],
  period: PeriodBounds,
  options: AggregateOptions = {}
): Leaderboard => {
  const sold = filterByPeriod(deals, period);
  const { primary, secondary } = splitByCategory(sold);
  const categoryStandings = (categoryDeals: Deal[]): CategoryStandings => ({
    deals: categoryDeals.length,
    magnitude: sumMagnitude(categoryDeals),
    closers: aggregate(categoryDeals, 'closer', options),
    setters: aggregate(categoryDeals, 'setter', options)
  });

  const leaderboard: Leaderboard = {
    period,
    closers: aggregate(sold, 'closer', options),
    setters: aggregate(sold, 'setter', options),
    totals: {
      deals: sold.length,
      magnitude: sumMagnitude(sold)
    },
    categories: {
      primary: categoryStandings(primary),
      secondary: categoryStandings(secondary)
    }
  };
  if (options.ratePerUnit !== undefined) {
    leaderboard.totals.revenue = sumRevenue(sold, options.ratePerUnit);
  }
  return leaderboard;
};

/**
 * Consecutive local days with at least one sale closed by the actor. The
 * streak stays alive through today until the day ends without a sale.
 */
export const computeStreak = (deals: Deal[], actorId: string, timeZone: string, now: Date): number => {
  const saleDays = new Set(
    deals
      .filter(deal => deal.status === 'sold' && deal.closedAt !== null && actorHasId(deal.closer, actorId))
      .map(deal => formatCivilDate(toCivilDate(new Date(deal.closedAt ?? deal.createdAt), timeZone)))
  );

  let cursor = toCivilDate(now, timeZone);
  if (!saleDays.has(formatCivilDate(cursor))) {
    cursor = addDays(cursor, -1);
  }

  let streak = 0;
  while (saleDays.has(formatCivilDate(cursor))) {
    streak++;
    cursor = addDays(cursor, -1);
  }
  return streak;
};

const lossReasonOrder = (code: LossReasonShare['code']): number =>
  code === null ? LOSS_REASON_CODES.length : LOSS_REASON_CODES.indexOf(code);

/**
 * All-time outcome of the appointments an actor set, with no-sales broken
 * down by reason. Shares are fractions of all appointments set.
 */
export const summarizeLosses = (deals: Deal[], actorId: string): LossSummary => {
  const appointments = deals.filter(deal => actorHasId(deal.setter, actorId));
  const noSales = appointments.filter(deal => deal.status === 'no_sale');

  const counts = new Map<LossReasonShare['code'], number>();
  for (const deal of noSales) {
    const code = deal.lossReason?.code ?? null;
    counts.set(code, (counts.get(code) ?? 0) + 1);
  }

  const reasons: LossReasonShare[] = [...counts.entries()]
    .map(([code, count]) => ({ code, count, share: count / appointments.length }))
    .sort((a, b) => b.count - a.count || lossReasonOrder(a.code) - lossReasonOrder(b.code));

  return {
    appointments: appointments.length,
    closed: appointments.filter(deal => deal.status === 'sold').length,
    noSales: noSales.length,
    reasons
  };
};

/**
 * Personal numbers for the periods containing `now`
 */
export const summarizeActor = (
  deals: Deal[],
  actorId: string,
  kinds: PeriodKind[],
  timeZone: string,
  now: Date,
  options: SummaryOptions = {}
): ActorSummary => ({
  actorId,
  periods: kinds.map(kind => {
    const period = bounds(kind, now, timeZone);
    const inPeriod = filterByPeriod(deals, period);
    const closed = inPeriod.filter(deal => actorHasId(deal.closer, actorId));
    const set = inPeriod.filter(deal => actorHasId(deal.setter, actorId));

    const stats: PeriodStats = {
      period,
      closed: closed.length,
      set: set.length,
      magnitude: sumMagnitude(closed)
    };
    if (options.ratePerUnit !== undefined) {
      stats.revenue = sumRevenue(closed, options.ratePerUnit);
    }
    if (options.paySplit) {
      stats.payout = payoutFor({ revenue: stats.revenue ?? 0, count: closed.length }, options.paySplit);
    }
    return stats;
  }),
  streak: computeStreak(deals, actorId, timeZone, now),
  losses: summarizeLosses(deals, actorId)
});
