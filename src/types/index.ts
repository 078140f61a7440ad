/**
 * Core types for the deal ledger bot
 */

export type Actor =
  | { kind: 'identified'; id: string; name: string }
  | { kind: 'name_only'; name: string };

export type DealStatus = 'pending' | 'sold' | 'no_sale' | 'canceled';

export const LOSS_REASON_CODES = [
  'ghosted',
  'one_legger',
  'needs_thought',
  'disqualified',
  'other'
] as const;

export type LossReasonCode = typeof LOSS_REASON_CODES[number];

export interface LossReason {
  code: LossReasonCode;
  detail: string | null;
}

export interface Deal {
  id: number;
  organizationId: string;
  customerName: string;
  setter: Actor | null;
  closer: Actor | null;
  magnitude: number | null;
  status: DealStatus;
  lossReason: LossReason | null;
  createdAt: string;
  closedAt: string | null;
  canceledAt: string | null;
}

export type DealDraft = Omit<Deal, 'id'>;

export interface LedgerState {
  nextId: number;
  deals: Deal[];
}

export interface MentionedActor {
  id: string;
  name: string;
}

export type DealTarget =
  | { kind: 'customer'; name: string }
  | { kind: 'id'; id: number };

export type Intent =
  | { type: 'set_appointment'; customerName: string }
  | { type: 'record_sale'; customerName: string; magnitude: number; setter: Actor | null }
  | { type: 'record_sale_for'; customerName: string; magnitude: number; closer: Actor; setter: Actor }
  | { type: 'mark_no_sale'; customerName: string }
  | { type: 'cancel'; customerName: string }
  | { type: 'delete'; target: DealTarget }
  | { type: 'clear_all' };

export type ParseErrorKind =
  | 'NotACommand'
  | 'MissingName'
  | 'InvalidMagnitude'
  | 'TooFewTokens'
  | 'MissingActors'
  | 'MissingTarget'
  | 'UnexpectedArguments';

export interface ParseError {
  kind: ParseErrorKind;
  trigger: string | null;
}

export type ParseResult =
  | { ok: true; intent: Intent }
  | { ok: false; error: ParseError };

export type LedgerError =
  | { type: 'parse'; error: ParseError }
  | { type: 'not_found'; target: DealTarget }
  | { type: 'invalid_transition'; dealId: number; from: DealStatus; to: DealStatus }
  | { type: 'already_in_state'; dealId: number; status: DealStatus }
  | { type: 'forbidden'; action: PrivilegedAction }
  | { type: 'storage'; message: string };

/**
 * Commands only admins may run. CSV export is a slash command, not an intent.
 */
export type PrivilegedAction = 'record_sale_for' | 'delete' | 'clear_all' | 'export_csv';

export type DealAction = 'appointment_set' | 'sold' | 'no_sale' | 'canceled' | 'deleted' | 'loss_reason_recorded';

export type CommandResult =
  | { kind: 'confirmation'; action: DealAction; deal: Deal }
  | { kind: 'confirmation'; action: 'cleared'; removedCount: number }
  | { kind: 'error'; error: LedgerError };

export type ExportResult =
  | { kind: 'export'; csv: string; rowCount: number }
  | { kind: 'error'; error: LedgerError };

export interface InboundEvent {
  actor: Actor;
  organizationId: string;
}

export type SaleWithoutAppointmentPolicy = 'create' | 'reject';

export type ActorRole = 'closer' | 'setter';

export type PeriodKind = 'day' | 'week' | 'month';

export interface CivilDate {
  year: number;
  month: number;
  day: number;
}

export interface PeriodBounds {
  kind: PeriodKind;
  start: Date;
  end: Date;
  startDate: CivilDate;
  endDate: CivilDate;
}

export interface Standing {
  actorId: string | null;
  actorName: string;
  count: number;
  totalMagnitude: number;
  totalRevenue?: number;
}

export type PaySplit =
  | { mode: 'percent'; percent: number }
  | { mode: 'flat'; amountPerDeal: number };

export type DealCategory = 'primary' | 'secondary';

/**
 * Standings restricted to one category: solar + battery (primary) or
 * battery only (secondary)
 */
export interface CategoryStandings {
  deals: number;
  magnitude: number;
  closers: Standing[];
  setters: Standing[];
}

export interface Leaderboard {
  period: PeriodBounds;
  closers: Standing[];
  setters: Standing[];
  totals: {
    deals: number;
    magnitude: number;
    revenue?: number;
  };
  categories: Record<DealCategory, CategoryStandings>;
}

export interface PeriodStats {
  period: PeriodBounds;
  closed: number;
  set: number;
  magnitude: number;
  revenue?: number;
  payout?: number;
}

export interface LossReasonShare {
  code: LossReasonCode | null;
  count: number;
  share: number;
}

/**
 * All-time outcome of the appointments an actor set
 */
export interface LossSummary {
  appointments: number;
  closed: number;
  noSales: number;
  reasons: LossReasonShare[];
}

export interface ActorSummary {
  actorId: string;
  periods: PeriodStats[];
  streak: number;
  losses: LossSummary;
}
