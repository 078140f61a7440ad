import pLimit from 'p-limit';
import { LedgerStore, StorageError } from './ledgerStore';
import { parseCommand } from './commandParser';
import { dealsForExport, exportDealsCsv } from './exportService';
import {
  Actor,
  CommandResult,
  Deal,
  DealAction,
  DealStatus,
  DealTarget,
  ExportResult,
  InboundEvent,
  Intent,
  LedgerError,
  LossReason,
  MentionedActor,
  PeriodBounds,
  PrivilegedAction,
  SaleWithoutAppointmentPolicy
} from '../types';

export interface LedgerServiceOptions {
  saleWithoutAppointment: SaleWithoutAppointmentPolicy;
  isPrivileged: (actorId: string) => boolean;
  now?: () => Date;
}

const PRIVILEGED_INTENTS: ReadonlySet<string> = new Set<PrivilegedAction>(['record_sale_for', 'delete', 'clear_all']);

const isPrivilegedIntent = (type: Intent['type']): type is Extract<Intent['type'], PrivilegedAction> =>
  PRIVILEGED_INTENTS.has(type);

const confirm = (action: DealAction, deal: Deal): CommandResult => ({ kind: 'confirmation', action, deal });

const reject = (error: LedgerError): CommandResult => ({ kind: 'error', error });

const customerTarget = (name: string): DealTarget => ({ kind: 'customer', name });

const invalidTransition = (deal: Deal, to: DealStatus): CommandResult =>
  reject({ type: 'invalid_transition', dealId: deal.id, from: deal.status, to });

/**
 * Applies parsed commands to the ledger through the deal state machine:
 * pending -> sold -> canceled, pending -> no_sale.
 */
export class LedgerService {
  private store: LedgerStore;
  private saleWithoutAppointment: SaleWithoutAppointmentPolicy;
  private isPrivileged: (actorId: string) => boolean;
  private now: () => Date;
  // Each command reads and writes the ledger before the next one starts
  private commandQueue = pLimit(1);

  constructor(store: LedgerStore, options: LedgerServiceOptions) {
    this.store = store;
    this.saleWithoutAppointment = options.saleWithoutAppointment;
    this.isPrivileged = options.isPrivileged;
    this.now = options.now ?? (() => new Date());
  }

  isAdmin(actor: Actor): boolean {
    return actor.kind === 'identified' && this.isPrivileged(actor.id);
  }

  /**
   * Parse and apply a chat message. Returns null when the text is not a
   * ledger command at all.
   */
  async handleText(event: InboundEvent, rawText: string, mentionedActors: MentionedActor[] = []): Promise<CommandResult | null> {
    const parsed = parseCommand(rawText, mentionedActors);
    if (!parsed.ok) {
      if (parsed.error.kind === 'NotACommand') return null;
      return reject({ type: 'parse', error: parsed.error });
    }
    return this.handle(event, parsed.intent);
  }

  async handle(event: InboundEvent, intent: Intent): Promise<CommandResult> {
    if (isPrivilegedIntent(intent.type) && !this.isAdmin(event.actor)) {
      return reject({ type: 'forbidden', action: intent.type });
    }

    return this.exclusive(() => {
      switch (intent.type) {
        case 'set_appointment':
          return this.setAppointment(event, intent.customerName);
        case 'record_sale':
          return this.recordSale(event, intent.customerName, intent.magnitude, event.actor, intent.setter, false);
        case 'record_sale_for':
          return this.recordSale(event, intent.customerName, intent.magnitude, intent.closer, intent.setter, true);
        case 'mark_no_sale':
          return this.markNoSale(event, intent.customerName);
        case 'cancel':
          return this.cancel(event, intent.customerName);
        case 'delete':
          return this.deleteDeal(event, intent.target);
        case 'clear_all':
          return this.clearAll(event);
      }
    });
  }

  /**
   * Attach the reason collected after a `#nosale`
   */
  async recordLossReason(organizationId: string, dealId: number, reason: LossReason): Promise<CommandResult> {
    return this.exclusive(async () => {
      const deal = this.store.findById(organizationId, dealId);
      if (!deal) return reject({ type: 'not_found', target: { kind: 'id', id: dealId } });
      if (deal.status !== 'no_sale') return invalidTransition(deal, 'no_sale');

      const updated: Deal = { ...deal, lossReason: reason };
      await this.store.update(updated);
      return confirm('loss_reason_recorded', updated);
    });
  }

  /**
   * Admin-only CSV of the organization's deals, optionally limited to a period
   */
  exportDeals(event: InboundEvent, period: PeriodBounds | null): ExportResult {
    if (!this.isAdmin(event.actor)) {
      return { kind: 'error', error: { type: 'forbidden', action: 'export_csv' } };
    }
    const deals = dealsForExport(this.store.load(event.organizationId), period);
    return { kind: 'export', csv: exportDealsCsv(deals), rowCount: deals.length };
  }

  private exclusive(operation: () => Promise<CommandResult>): Promise<CommandResult> {
    return this.commandQueue(() => this.guardStorage(operation));
  }

  private async guardStorage(operation: () => Promise<CommandResult>): Promise<CommandResult> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof StorageError) {
        return reject({ type: 'storage', message: error.message });
      }
      throw error;
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }

  private async setAppointment(event: InboundEvent, customerName: string): Promise<CommandResult> {
    const deal = await this.store.append({
      organizationId: event.organizationId,
      customerName,
      setter: event.actor,
      closer: null,
      magnitude: null,
      status: 'pending',
      lossReason: null,
      createdAt: this.timestamp(),
      closedAt: null,
      canceledAt: null
    });
    return confirm('appointment_set', deal);
  }

  private async recordSale(
    event: InboundEvent,
    customerName: string,
    magnitude: number,
    closer: Actor,
    setter: Actor | null,
    replaceSetter: boolean
  ): Promise<CommandResult> {
    const latest = customerName
      ? this.store.findLatestByCustomer(event.organizationId, customerName)
      : undefined;
    const closedAt = this.timestamp();

    if (latest && latest.status === 'pending') {
      const sold: Deal = {
        ...latest,
        status: 'sold',
        closer,
        magnitude,
        setter: replaceSetter ? setter : latest.setter ?? setter,
        closedAt
      };
      await this.store.update(sold);
      return confirm('sold', sold);
    }

    if (this.saleWithoutAppointment === 'reject') {
      return latest
        ? invalidTransition(latest, 'sold')
        : reject({ type: 'not_found', target: customerTarget(customerName) });
    }

    const deal = await this.store.append({
      organizationId: event.organizationId,
      customerName,
      setter,
      closer,
      magnitude,
      status: 'sold',
      lossReason: null,
      createdAt: closedAt,
      closedAt,
      canceledAt: null
    });
    return confirm('sold', deal);
  }

  private async markNoSale(event: InboundEvent, customerName: string): Promise<CommandResult> {
    const latest = this.store.findLatestByCustomer(event.organizationId, customerName);
    if (!latest) return reject({ type: 'not_found', target: customerTarget(customerName) });
    if (latest.status === 'no_sale') {
      return reject({ type: 'already_in_state', dealId: latest.id, status: latest.status });
    }
    if (latest.status !== 'pending') return invalidTransition(latest, 'no_sale');

    const updated: Deal = { ...latest, status: 'no_sale', lossReason: null };
    await this.store.update(updated);
    return confirm('no_sale', updated);
  }

  private async cancel(event: InboundEvent, customerName: string): Promise<CommandResult> {
    const latest = this.store.findLatestByCustomer(event.organizationId, customerName);
    if (!latest) return reject({ type: 'not_found', target: customerTarget(customerName) });
    if (latest.status === 'canceled') {
      return reject({ type: 'already_in_state', dealId: latest.id, status: latest.status });
    }
    if (latest.status !== 'sold') return invalidTransition(latest, 'canceled');

    const updated: Deal = { ...latest, status: 'canceled', canceledAt: this.timestamp() };
    await this.store.update(updated);
    return confirm('canceled', updated);
  }

  private async deleteDeal(event: InboundEvent, target: DealTarget): Promise<CommandResult> {
    const deal = target.kind === 'id'
      ? this.store.findById(event.organizationId, target.id)
      : this.store.findLatestByCustomer(event.organizationId, target.name);
    if (!deal) return reject({ type: 'not_found', target });

    await this.store.remove(deal.id);
    return confirm('deleted', deal);
  }

  private async clearAll(event: InboundEvent): Promise<CommandResult> {
    const removedCount = await this.store.removeOrganization(event.organizationId);
    return { kind: 'confirmation', action: 'cleared', removedCount };
  }
}

export const createLedgerService = (store: LedgerStore, options: LedgerServiceOptions): LedgerService => {
  return new LedgerService(store, options);
};
