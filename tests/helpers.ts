import { Logger, LogLevel } from '../src/logger';
import { Actor, Deal } from '../src/types';

export const createTestLogger = (): Logger => ({
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  setLevel: jest.fn(),
  getLevel: jest.fn().mockReturnValue(LogLevel.INFO),
  setName: jest.fn()
});

export const identified = (id: string, name: string): Actor => ({ kind: 'identified', id, name });

export const nameOnly = (name: string): Actor => ({ kind: 'name_only', name });

let nextTestId = 1000;

/**
 * A sold deal closed at the given instant unless overridden
 */
export const makeDeal = (overrides: Partial<Deal> = {}): Deal => ({
  id: nextTestId++,
  organizationId: 'T1',
  customerName: 'Test Customer',
  setter: null,
  closer: identified('U1', 'Ana'),
  magnitude: 5,
  status: 'sold',
  lossReason: null,
  createdAt: '2026-02-10T15:00:00.000Z',
  closedAt: '2026-02-10T15:00:00.000Z',
  canceledAt: null,
  ...overrides
});
