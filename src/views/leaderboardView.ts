import type { KnownBlock } from '@slack/bolt';
import {
  Actor,
  ActorSummary,
  CategoryStandings,
  CommandResult,
  Deal,
  DealCategory,
  DealStatus,
  Leaderboard,
  LedgerError,
  LOSS_REASON_CODES,
  LossReasonCode,
  LossSummary,
  ParseError,
  PeriodKind,
  PrivilegedAction,
  Standing
} from '../types';
import { formatPeriodLabel } from '../services/periodService';
import { formatCurrency } from '../services/payService';

export interface SlackMessage {
  text: string;
  blocks?: KnownBlock[];
}

const MEDALS = [':first_place_medal:', ':second_place_medal:', ':third_place_medal:'];

const MAX_STANDINGS = 10;

const PERIOD_NAMES: Record<PeriodKind, string> = {
  day: 'Daily',
  week: 'Weekly',
  month: 'Monthly'
};

export const PERIOD_TITLES: Record<PeriodKind, string> = {
  day: `${PERIOD_NAMES.day} Leaderboard`,
  week: `${PERIOD_NAMES.week} Leaderboard`,
  month: `${PERIOD_NAMES.month} Leaderboard`
};

const STATUS_LABELS: Record<DealStatus, string> = {
  pending: 'pending',
  sold: 'sold',
  no_sale: 'no sale',
  canceled: 'canceled'
};

export const LOSS_REASON_LABELS: Record<LossReasonCode, string> = {
  ghosted: 'Ghosted',
  one_legger: 'One-legger',
  needs_thought: 'Needs to think about it',
  disqualified: 'Disqualified',
  other: 'Other'
};

const CATEGORY_TITLES: Record<DealCategory, string> = {
  primary: 'Solar + Battery :sunny:',
  secondary: 'Battery Only :battery:'
};

const USAGE = new Map<string, string>([
  ['#set', '`#set Customer Name`'],
  ['#sold', '`#sold [@Setter] Customer Name kW`'],
  ['#soldfor', '`#soldfor @Closer @Setter Customer Name kW`'],
  ['#nosale', '`#nosale Customer Name`'],
  ['#no-sale', '`#nosale Customer Name`'],
  ['#cancel', '`#cancel Customer Name`'],
  ['#canceled', '`#cancel Customer Name`'],
  ['#cancelled', '`#cancel Customer Name`'],
  ['#delete', '`#delete Customer Name` or `#delete <deal id>`'],
  ['#clearleaderboard', '`#clearleaderboard`'],
  ['#clearall', '`#clearleaderboard`']
]);

const ACTION_TRIGGERS: Record<PrivilegedAction, string> = {
  record_sale_for: '#soldfor',
  delete: '#delete',
  clear_all: '#clearleaderboard',
  export_csv: '/deals export'
};

const pluralize = (count: number, noun: string): string => `${count} ${count === 1 ? noun : `${noun}s`}`;

const formatKw = (value: number | null): string => `${(value ?? 0).toFixed(1)} kW`;

const customerLabel = (deal: Deal): string => deal.customerName || 'Unnamed customer';

/**
 * Slack mention for identified actors, plain name otherwise
 */
export const formatActor = (actor: Actor | null): string => {
  if (!actor) return 'N/A';
  return actor.kind === 'identified' ? `<@${actor.id}>` : actor.name;
};

export const formatStandingLine = (standing: Standing, index: number): string => {
  const rank = index < MEDALS.length ? MEDALS[index] : `${index + 1}.`;
  const revenue = standing.totalRevenue !== undefined ? `, ${formatCurrency(standing.totalRevenue)}` : '';
  return `${rank} *${standing.actorName}* – ${pluralize(standing.count, 'deal')}, ${formatKw(standing.totalMagnitude)}${revenue}`;
};

const standingsLines = (title: string, standings: Standing[]): string[] =>
  standings.length > 0 ? [`*${title}*`, ...standings.slice(0, MAX_STANDINGS).map(formatStandingLine)] : [];

const categorySection = (category: DealCategory, standings: CategoryStandings): KnownBlock => ({
  type: 'section',
  text: {
    type: 'mrkdwn',
    text: [
      `*${CATEGORY_TITLES[category]}* (${pluralize(standings.deals, 'deal')}, ${formatKw(standings.magnitude)})`,
      ...standingsLines('Closers', standings.closers),
      ...standingsLines('Setters', standings.setters)
    ].join('\n')
  }
});

const CATEGORY_ORDER: DealCategory[] = ['primary', 'secondary'];

/**
 * Build the leaderboard message for one period
 */
export const buildLeaderboardMessage = (leaderboard: Leaderboard): SlackMessage => {
  const title = PERIOD_TITLES[leaderboard.period.kind];
  const label = formatPeriodLabel(leaderboard.period);

  const blocks: KnownBlock[] = [
    { type: 'header', text: { type: 'plain_text', text: `:trophy: ${title}`, emoji: true } },
    { type: 'context', elements: [{ type: 'mrkdwn', text: label }] },
    { type: 'divider' }
  ];

  if (leaderboard.totals.deals === 0) {
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: 'No deals yet. Be the first to log a sale with `#sold Customer Name kW`!' }
    });
    return { text: `${title} (${label})`, blocks };
  }

  for (const category of CATEGORY_ORDER) {
    if (leaderboard.categories[category].deals > 0) {
      blocks.push(categorySection(category, leaderboard.categories[category]));
    }
  }

  const revenue = leaderboard.totals.revenue !== undefined ? ` · ${formatCurrency(leaderboard.totals.revenue)}` : '';
  blocks.push(
    { type: 'divider' },
    {
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: `*Totals:* ${pluralize(leaderboard.totals.deals, 'deal')} · ${formatKw(leaderboard.totals.magnitude)}${revenue}\n` +
          `Solar + battery: ${leaderboard.categories.primary.deals} · Battery only: ${leaderboard.categories.secondary.deals}`
      }
    }
  );

  return { text: `${title} (${label})`, blocks };
};

const describeParseError = (error: ParseError): string => {
  const usage = error.trigger ? USAGE.get(error.trigger) : undefined;
  const hint = usage ? ` Use: ${usage}` : '';

  switch (error.kind) {
    case 'MissingName':
      return `:x: Add the customer name.${hint}`;
    case 'InvalidMagnitude':
      return `:x: The last word must be the system size in kW (0 for battery only).${hint}`;
    case 'TooFewTokens':
      return `:x: Not enough details.${hint}`;
    case 'MissingActors':
      return `:x: Mention the closer and then the setter.${hint}`;
    case 'MissingTarget':
      return `:x: Say which deal.${hint}`;
    case 'UnexpectedArguments':
      return `:x: This command takes no arguments.${hint}`;
    case 'NotACommand':
      return ':x: Unknown command.';
  }
};

/**
 * User-facing text for a ledger error
 */
export const describeError = (error: LedgerError): string => {
  switch (error.type) {
    case 'parse':
      return describeParseError(error.error);
    case 'not_found':
      return error.target.kind === 'id'
        ? `:x: No deal found with id ${error.target.id}.`
        : `:x: No deal found for customer \`${error.target.name}\`.`;
    case 'invalid_transition':
      return `:x: Deal #${error.dealId} is ${STATUS_LABELS[error.from]} and cannot be marked ${STATUS_LABELS[error.to]}.`;
    case 'already_in_state':
      return `:information_source: Deal #${error.dealId} is already ${STATUS_LABELS[error.status]}.`;
    case 'forbidden':
      return `:no_entry: Only admins can use \`${ACTION_TRIGGERS[error.action]}\`.`;
    case 'storage':
      return ':x: The deal could not be saved. Please try again.';
  }
};

const describeConfirmation = (action: Exclude<CommandResult, { kind: 'error' }>): string => {
  if (action.action === 'cleared') {
    return `:fire: Cleared ${pluralize(action.removedCount, 'deal')} for this workspace. Fresh start!`;
  }

  const { deal } = action;
  switch (action.action) {
    case 'appointment_set':
      return `:calendar: Appointment set for *${customerLabel(deal)}* by ${formatActor(deal.setter)} (deal #${deal.id}).`;
    case 'sold': {
      const category = deal.magnitude === 0 ? 'battery only' : formatKw(deal.magnitude);
      return `:tada: Deal sold! *${customerLabel(deal)}* – ${category}. ` +
        `Closer: ${formatActor(deal.closer)} · Setter: ${formatActor(deal.setter)} (deal #${deal.id}).`;
    }
    case 'no_sale':
      return `:x: *${customerLabel(deal)}* marked as no sale (deal #${deal.id}).`;
    case 'canceled':
      return `:warning: Deal #${deal.id} for *${customerLabel(deal)}* canceled after signing.`;
    case 'deleted':
      return `:wastebasket: Deleted deal #${deal.id} for *${customerLabel(deal)}* from stats.`;
    case 'loss_reason_recorded': {
      const reason = deal.lossReason ? LOSS_REASON_LABELS[deal.lossReason.code] : 'none';
      const detail = deal.lossReason?.detail ? ` (${deal.lossReason.detail})` : '';
      return `:memo: Reason recorded for deal #${deal.id}: ${reason}${detail}.`;
    }
  }
};

/**
 * Reply text for a handled command
 */
export const buildResultMessage = (result: CommandResult): SlackMessage => {
  if (result.kind === 'error') {
    return { text: describeError(result.error) };
  }
  return { text: describeConfirmation(result) };
};

export const buildLossReasonPrompt = (deal: Deal): SlackMessage => {
  const options = LOSS_REASON_CODES
    .map((code, index) => `${index + 1}. ${LOSS_REASON_LABELS[code]}`)
    .join('\n');
  return {
    text: `Why didn't *${customerLabel(deal)}* close? Reply with a number, optionally followed by details:\n${options}`
  };
};

const formatShare = (share: number): string => `${(share * 100).toFixed(1)}%`;

const lossLines = (losses: LossSummary): string[] => {
  const lines = [`• Appointments set: ${losses.appointments} · Closed: ${losses.closed} · No sale: ${losses.noSales}`];
  if (losses.reasons.length > 0) {
    const reasons = losses.reasons.map(reason => {
      const label = reason.code ? LOSS_REASON_LABELS[reason.code] : 'No reason given';
      return `${label} ${formatShare(reason.share)}`;
    });
    lines.push(`• No-sale reasons: ${reasons.join(', ')}`);
  }
  return lines;
};

/**
 * Personal stats for `/deals mystats`
 */
export const buildStatsMessage = (displayName: string, summary: ActorSummary): SlackMessage => {
  const lines = [`*Stats for ${displayName}*`];

  for (const stats of summary.periods) {
    let line = `• ${PERIOD_NAMES[stats.period.kind]} (${formatPeriodLabel(stats.period)}): ` +
      `${stats.closed} closed, ${stats.set} set, ${formatKw(stats.magnitude)}`;
    if (stats.revenue !== undefined) line += `, ${formatCurrency(stats.revenue)} revenue`;
    if (stats.payout !== undefined) line += `, ${formatCurrency(stats.payout)} est. pay`;
    lines.push(line);
  }
  lines.push(`• Current streak: ${pluralize(summary.streak, 'day')}`);
  lines.push(...lossLines(summary.losses));

  return {
    text: lines.join('\n'),
    blocks: [{ type: 'section', text: { type: 'mrkdwn', text: lines.join('\n') } }]
  };
};

export const buildExportMessage = (rowCount: number, label: string): SlackMessage => ({
  text: `:page_facing_up: Exported ${pluralize(rowCount, 'deal')} (${label}).`
});

export const HELP_TEXT = [
  '*Deal tracker commands*',
  '• `#set Customer Name` – log an appointment you set',
  '• `#sold [@Setter] Customer Name kW` – close a deal (use 0 kW for battery only; a setter outside Slack can be typed as `@Name`)',
  '• `#soldfor @Closer @Setter Customer Name kW` – log a sale for someone else (admins)',
  '• `#nosale Customer Name` – the appointment did not close',
  '• `#cancel Customer Name` – a signed deal canceled',
  '• `#delete Customer Name` or `#delete <deal id>` – remove a deal (admins)',
  '• `#clearleaderboard` – wipe all deals for this workspace (admins)',
  '• `/deals leaderboard [day|week|month] [YYYY-MM-DD]` – show a leaderboard',
  '• `/deals mystats` – your numbers, streak and no-sale reasons',
  '• `/deals export [all|day|week|month] [YYYY-MM-DD]` – CSV of deals (admins)'
].join('\n');
