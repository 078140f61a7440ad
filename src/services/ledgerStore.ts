import fs from 'fs';
import path from 'path';
import pLimit from 'p-limit';
import { z } from 'zod';
import { Actor, Deal, DealDraft, LedgerState, LOSS_REASON_CODES } from '../types';
import type { Logger } from '../logger';

export const LEDGER_VERSION = 1;

const WRITE_ATTEMPTS = 2;

/**
 * Raised when the ledger file cannot be written after retrying.
 */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

const storedActorSchema = z.object({
  id: z.string().min(1).optional(),
  name: z.string()
});

const storedDealSchema = z.object({
  id: z.number().int().positive(),
  organization_id: z.string().min(1),
  customer_name: z.string(),
  setter: storedActorSchema.nullable(),
  closer: storedActorSchema.nullable(),
  magnitude: z.number().nonnegative().nullable(),
  status: z.enum(['pending', 'sold', 'no_sale', 'canceled']),
  loss_reason: z
    .object({
      code: z.enum(LOSS_REASON_CODES),
      detail: z.string().nullable()
    })
    .nullable(),
  created_at: z.string().datetime({ offset: true }),
  closed_at: z.string().datetime({ offset: true }).nullable(),
  canceled_at: z.string().datetime({ offset: true }).nullable()
});

const storedLedgerSchema = z.object({
  version: z.literal(LEDGER_VERSION).default(LEDGER_VERSION),
  next_id: z.number().int().positive(),
  deals: z.array(storedDealSchema)
});

type StoredActor = z.infer<typeof storedActorSchema>;
type StoredDeal = z.infer<typeof storedDealSchema>;
export type StoredLedger = z.infer<typeof storedLedgerSchema>;

const decodeActor = (actor: StoredActor | null): Actor | null => {
  if (!actor) return null;
  return actor.id !== undefined
    ? { kind: 'identified', id: actor.id, name: actor.name }
    : { kind: 'name_only', name: actor.name };
};

const encodeActor = (actor: Actor | null): StoredActor | null => {
  if (!actor) return null;
  return actor.kind === 'identified' ? { id: actor.id, name: actor.name } : { name: actor.name };
};

const decodeDeal = (deal: StoredDeal): Deal => ({
  id: deal.id,
  organizationId: deal.organization_id,
  customerName: deal.customer_name,
  setter: decodeActor(deal.setter),
  closer: decodeActor(deal.closer),
  magnitude: deal.magnitude,
  status: deal.status,
  lossReason: deal.loss_reason,
  createdAt: deal.created_at,
  closedAt: deal.closed_at,
  canceledAt: deal.canceled_at
});

const encodeDeal = (deal: Deal): StoredDeal => ({
  id: deal.id,
  organization_id: deal.organizationId,
  customer_name: deal.customerName,
  setter: encodeActor(deal.setter),
  closer: encodeActor(deal.closer),
  magnitude: deal.magnitude,
  status: deal.status,
  loss_reason: deal.lossReason,
  created_at: deal.createdAt,
  closed_at: deal.closedAt,
  canceled_at: deal.canceledAt
});

/**
 * Parse the on-disk representation. Throws on anything that does not match
 * the schema.
 */
export const decodeLedger = (raw: unknown): LedgerState => {
  const stored = storedLedgerSchema.parse(raw);
  const deals = stored.deals.map(decodeDeal);
  const highestId = deals.reduce((max, deal) => Math.max(max, deal.id), 0);
  return {
    nextId: Math.max(stored.next_id, highestId + 1),
    deals
  };
};

export const encodeLedger = (state: LedgerState): StoredLedger => ({
  version: LEDGER_VERSION,
  next_id: state.nextId,
  deals: state.deals.map(encodeDeal)
});

/**
 * Case- and whitespace-folded customer key
 */
export const normalizeCustomerName = (name: string): string =>
  name.trim().replace(/\s+/g, ' ').toLowerCase();

const emptyState = (): LedgerState => ({ nextId: 1, deals: [] });

/**
 * Durable store of deals for every organization, backed by one JSON file.
 */
export class LedgerStore {
  private dataFilePath: string;
  private logger: Logger;
  private state: LedgerState;
  // One mutation at a time; each builds its next state from the latest one
  private writeQueue = pLimit(1);

  constructor(dataFilePath: string, logger: Logger) {
    this.dataFilePath = dataFilePath;
    this.logger = logger;
    this.state = this.loadInitialState();
  }

  /**
   * Load the ledger from disk. A missing file is an empty ledger; an
   * unreadable one is set aside and also starts empty.
   */
  private loadInitialState(): LedgerState {
    const dir = path.dirname(this.dataFilePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    if (!fs.existsSync(this.dataFilePath)) {
      return emptyState();
    }

    try {
      const data = fs.readFileSync(this.dataFilePath, 'utf8');
      return decodeLedger(JSON.parse(data));
    } catch (error) {
      const backupPath = `${this.dataFilePath}.corrupt-${Date.now()}`;
      this.logger.warn(
        `Ledger file ${this.dataFilePath} could not be read, starting with an empty ledger. Original kept at ${backupPath}.`,
        error
      );
      try {
        fs.copyFileSync(this.dataFilePath, backupPath);
      } catch (copyError) {
        this.logger.error(`Could not copy unreadable ledger to ${backupPath}:`, copyError);
      }
      return emptyState();
    }
  }

  /**
   * Write the next state to a temp file and rename it over the ledger. The
   * in-memory state only advances once the rename succeeded.
   */
  private async persist(next: LedgerState): Promise<void> {
    const payload = JSON.stringify(encodeLedger(next), null, 2);
    const tmpPath = `${this.dataFilePath}.tmp`;
    let lastError: unknown;

    for (let attempt = 1; attempt <= WRITE_ATTEMPTS; attempt++) {
      try {
        await fs.promises.writeFile(tmpPath, payload, 'utf8');
        await fs.promises.rename(tmpPath, this.dataFilePath);
        this.state = next;
        return;
      } catch (error) {
        lastError = error;
        this.logger.warn(`Ledger write attempt ${attempt}/${WRITE_ATTEMPTS} failed:`, error);
      }
    }

    this.logger.error('Error saving ledger:', lastError);
    throw new StorageError(`Failed to save ledger to ${this.dataFilePath}`, { cause: lastError });
  }

  /**
   * Deals of one organization, or of every organization when none is given
   */
  load(organizationId?: string): Deal[] {
    return this.state.deals
      .filter(deal => organizationId === undefined || deal.organizationId === organizationId)
      .map(deal => structuredClone(deal));
  }

  findById(organizationId: string, id: number): Deal | undefined {
    const deal = this.state.deals.find(d => d.id === id && d.organizationId === organizationId);
    return deal ? structuredClone(deal) : undefined;
  }

  /**
   * Most recent deal for a customer, newest `createdAt` first, then highest id
   */
  findLatestByCustomer(organizationId: string, customerName: string): Deal | undefined {
    const key = normalizeCustomerName(customerName);
    const [latest] = this.state.deals
      .filter(d => d.organizationId === organizationId && normalizeCustomerName(d.customerName) === key)
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt) || b.id - a.id);
    return latest ? structuredClone(latest) : undefined;
  }

  /**
   * Id the next appended deal will receive
   */
  nextId(): number {
    return this.state.nextId;
  }

  /**
   * Queue a change. `change` sees the state left by every earlier change and
   * returns the state to persist (or null to leave it untouched).
   */
  private mutate<T>(change: (state: LedgerState) => { next: LedgerState | null; result: T }): Promise<T> {
    return this.writeQueue(async () => {
      const { next, result } = change(this.state);
      if (next) {
        await this.persist(next);
      }
      return result;
    });
  }

  append(draft: DealDraft): Promise<Deal> {
    return this.mutate(state => {
      const deal: Deal = { id: state.nextId, ...structuredClone(draft) };
      return {
        next: { nextId: deal.id + 1, deals: [...state.deals, deal] },
        result: structuredClone(deal)
      };
    });
  }

  /**
   * Replace a stored deal by id. Returns false when no such deal exists.
   */
  update(deal: Deal): Promise<boolean> {
    const replacement = structuredClone(deal);
    return this.mutate(state => {
      if (!state.deals.some(d => d.id === deal.id)) return { next: null, result: false };
      return {
        next: { nextId: state.nextId, deals: state.deals.map(d => (d.id === deal.id ? replacement : d)) },
        result: true
      };
    });
  }

  remove(id: number): Promise<boolean> {
    return this.mutate(state => {
      const remaining = state.deals.filter(d => d.id !== id);
      if (remaining.length === state.deals.length) return { next: null, result: false };
      return { next: { nextId: state.nextId, deals: remaining }, result: true };
    });
  }

  /**
   * Remove every deal of an organization and return how many were dropped
   */
  removeOrganization(organizationId: string): Promise<number> {
    return this.mutate(state => {
      const remaining = state.deals.filter(d => d.organizationId !== organizationId);
      const removed = state.deals.length - remaining.length;
      return {
        next: removed > 0 ? { nextId: state.nextId, deals: remaining } : null,
        result: removed
      };
    });
  }

  snapshot(): LedgerState {
    return structuredClone(this.state);
  }

  /**
   * Save the current state to disk
   */
  save(): Promise<void> {
    return this.mutate(state => ({ next: structuredClone(state), result: undefined }));
  }
}

export const createLedgerStore = (dataFilePath: string, logger: Logger): LedgerStore => {
  return new LedgerStore(dataFilePath, logger);
};
