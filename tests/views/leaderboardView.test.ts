import type { KnownBlock } from '@slack/bolt';
import {
  HELP_TEXT,
  buildExportMessage,
  buildLeaderboardMessage,
  buildLossReasonPrompt,
  buildResultMessage,
  buildStatsMessage,
  describeError,
  formatActor,
  formatStandingLine
} from '../../src/views/leaderboardView';
import { buildLeaderboard } from '../../src/services/aggregationService';
import { bounds } from '../../src/services/periodService';
import { identified, makeDeal, nameOnly } from '../helpers';

const CHICAGO = 'America/Chicago';
const NOW = new Date('2026-02-10T20:00:00Z');

const blockText = (block: KnownBlock): string => {
  if (block.type === 'section' || block.type === 'header') {
    return block.text?.text ?? '';
  }
  return '';
};

describe('Leaderboard View', () => {
  const ana = identified('U1', 'Ana');
  const ben = identified('U2', 'Ben');
  const cara = identified('U3', 'Cara');

  test('renders standings, totals and categories', () => {
    const leaderboard = buildLeaderboard(
      [
        makeDeal({ closer: ana, setter: ben, magnitude: 7.2 }),
        makeDeal({ closer: ana, magnitude: 0 }),
        makeDeal({ closer: cara, magnitude: 10 })
      ],
      bounds('day', NOW, CHICAGO)
    );

    const message = buildLeaderboardMessage(leaderboard);
    const blocks = message.blocks ?? [];

    expect(message.text).toBe('Daily Leaderboard (2026-02-10)');
    expect(blocks.map(block => block.type)).toEqual([
      'header',
      'context',
      'divider',
      'section',
      'section',
      'divider',
      'section'
    ]);
    expect(blockText(blocks[0])).toBe(':trophy: Daily Leaderboard');
    expect(blockText(blocks[3])).toBe(
      '*Solar + Battery :sunny:* (2 deals, 17.2 kW)\n' +
        '*Closers*\n' +
        ':first_place_medal: *Cara* – 1 deal, 10.0 kW\n' +
        ':second_place_medal: *Ana* – 1 deal, 7.2 kW\n' +
        '*Setters*\n' +
        ':first_place_medal: *Ben* – 1 deal, 7.2 kW'
    );
    expect(blockText(blocks[4])).toBe(
      '*Battery Only :battery:* (1 deal, 0.0 kW)\n*Closers*\n:first_place_medal: *Ana* – 1 deal, 0.0 kW'
    );
    expect(blockText(blocks[6])).toBe('*Totals:* 3 deals · 17.2 kW\nSolar + battery: 2 · Battery only: 1');
  });

  test('leaves out a category with no deals', () => {
    const leaderboard = buildLeaderboard([makeDeal({ closer: ana, magnitude: 0 })], bounds('day', NOW, CHICAGO));
    const blocks = buildLeaderboardMessage(leaderboard).blocks ?? [];

    expect(blocks.map(block => block.type)).toEqual(['header', 'context', 'divider', 'section', 'divider', 'section']);
    expect(blockText(blocks[3])).toBe(
      '*Battery Only :battery:* (1 deal, 0.0 kW)\n*Closers*\n:first_place_medal: *Ana* – 1 deal, 0.0 kW'
    );
  });

  test('shows a prompt when the period has no deals', () => {
    const message = buildLeaderboardMessage(buildLeaderboard([], bounds('week', NOW, CHICAGO)));
    const blocks = message.blocks ?? [];

    expect(message.text).toBe('Weekly Leaderboard (2026-02-09 → 2026-02-15)');
    expect(blocks).toHaveLength(4);
    expect(blockText(blocks[3])).toBe('No deals yet. Be the first to log a sale with `#sold Customer Name kW`!');
  });

  test('ranks past the podium with numbers and shows revenue when known', () => {
    expect(formatStandingLine({ actorId: 'U1', actorName: 'Ana', count: 1, totalMagnitude: 7.2, totalRevenue: 21600 }, 0))
      .toBe(':first_place_medal: *Ana* – 1 deal, 7.2 kW, $21,600.00');
    expect(formatStandingLine({ actorId: null, actorName: 'walk in', count: 3, totalMagnitude: 12.25 }, 3))
      .toBe('4. *walk in* – 3 deals, 12.3 kW');
  });

  test('formats actors as mentions when identified', () => {
    expect(formatActor(ana)).toBe('<@U1>');
    expect(formatActor(nameOnly('Walk In'))).toBe('Walk In');
    expect(formatActor(null)).toBe('N/A');
  });

  describe('results', () => {
    test('confirms a sale with closer and setter', () => {
      const deal = makeDeal({ id: 12, customerName: 'John Smith', closer: ana, setter: nameOnly('Walk In'), magnitude: 7.2 });

      expect(buildResultMessage({ kind: 'confirmation', action: 'sold', deal }).text).toBe(
        ':tada: Deal sold! *John Smith* – 7.2 kW. Closer: <@U1> · Setter: Walk In (deal #12).'
      );
    });

    test('calls out battery-only and unnamed sales', () => {
      const deal = makeDeal({ id: 13, customerName: '', closer: ana, setter: null, magnitude: 0 });

      expect(buildResultMessage({ kind: 'confirmation', action: 'sold', deal }).text).toBe(
        ':tada: Deal sold! *Unnamed customer* – battery only. Closer: <@U1> · Setter: N/A (deal #13).'
      );
    });

    test('confirms appointments, deletions and clears', () => {
      const deal = makeDeal({ id: 3, customerName: 'Mary Jones', setter: ben, status: 'pending' });

      expect(buildResultMessage({ kind: 'confirmation', action: 'appointment_set', deal }).text).toBe(
        ':calendar: Appointment set for *Mary Jones* by <@U2> (deal #3).'
      );
      expect(buildResultMessage({ kind: 'confirmation', action: 'deleted', deal }).text).toBe(
        ':wastebasket: Deleted deal #3 for *Mary Jones* from stats.'
      );
      expect(buildResultMessage({ kind: 'confirmation', action: 'cleared', removedCount: 1 }).text).toBe(
        ':fire: Cleared 1 deal for this workspace. Fresh start!'
      );
    });

    test('confirms a recorded loss reason', () => {
      const deal = makeDeal({
        id: 4,
        status: 'no_sale',
        lossReason: { code: 'one_legger', detail: 'spouse was not home' }
      });

      expect(buildResultMessage({ kind: 'confirmation', action: 'loss_reason_recorded', deal }).text).toBe(
        ':memo: Reason recorded for deal #4: One-legger (spouse was not home).'
      );
    });
  });

  describe('errors', () => {
    test('describes ledger errors', () => {
      expect(describeError({ type: 'not_found', target: { kind: 'id', id: 7 } })).toBe(':x: No deal found with id 7.');
      expect(describeError({ type: 'not_found', target: { kind: 'customer', name: 'John Smith' } })).toBe(
        ':x: No deal found for customer `John Smith`.'
      );
      expect(describeError({ type: 'invalid_transition', dealId: 5, from: 'no_sale', to: 'sold' })).toBe(
        ':x: Deal #5 is no sale and cannot be marked sold.'
      );
      expect(describeError({ type: 'already_in_state', dealId: 5, status: 'canceled' })).toBe(
        ':information_source: Deal #5 is already canceled.'
      );
      expect(describeError({ type: 'forbidden', action: 'clear_all' })).toBe(
        ':no_entry: Only admins can use `#clearleaderboard`.'
      );
      expect(describeError({ type: 'forbidden', action: 'export_csv' })).toBe(
        ':no_entry: Only admins can use `/deals export`.'
      );
      expect(describeError({ type: 'storage', message: 'disk full' })).toBe(
        ':x: The deal could not be saved. Please try again.'
      );
    });

    test('adds usage to parse errors', () => {
      expect(describeError({ type: 'parse', error: { kind: 'InvalidMagnitude', trigger: '#sold' } })).toBe(
        ':x: The last word must be the system size in kW (0 for battery only). Use: `#sold [@Setter] Customer Name kW`'
      );
      expect(describeError({ type: 'parse', error: { kind: 'MissingTarget', trigger: '#no-sale' } })).toBe(
        ':x: Say which deal. Use: `#nosale Customer Name`'
      );
    });
  });

  test('lists loss reasons in menu order', () => {
    const deal = makeDeal({ customerName: 'John Smith', status: 'no_sale' });

    expect(buildLossReasonPrompt(deal).text).toBe(
      "Why didn't *John Smith* close? Reply with a number, optionally followed by details:\n" +
        '1. Ghosted\n2. One-legger\n3. Needs to think about it\n4. Disqualified\n5. Other'
    );
  });

  test('renders personal stats with pay, streak and no-sale reasons', () => {
    const message = buildStatsMessage('Ana', {
      actorId: 'U1',
      periods: [
        { period: bounds('day', NOW, CHICAGO), closed: 1, set: 1, magnitude: 6, revenue: 6000, payout: 600 },
        { period: bounds('month', NOW, CHICAGO), closed: 2, set: 0, magnitude: 10 }
      ],
      streak: 1,
      losses: {
        appointments: 8,
        closed: 5,
        noSales: 3,
        reasons: [
          { code: 'ghosted', count: 2, share: 0.25 },
          { code: null, count: 1, share: 0.125 }
        ]
      }
    });

    expect(message.text).toBe(
      '*Stats for Ana*\n' +
        '• Daily (2026-02-10): 1 closed, 1 set, 6.0 kW, $6,000.00 revenue, $600.00 est. pay\n' +
        '• Monthly (2026-02): 2 closed, 0 set, 10.0 kW\n' +
        '• Current streak: 1 day\n' +
        '• Appointments set: 8 · Closed: 5 · No sale: 3\n' +
        '• No-sale reasons: Ghosted 25.0%, No reason given 12.5%'
    );
  });

  test('omits the reason line when there were no no-sales', () => {
    const message = buildStatsMessage('Ben', {
      actorId: 'U2',
      periods: [],
      streak: 0,
      losses: { appointments: 0, closed: 0, noSales: 0, reasons: [] }
    });

    expect(message.text).toBe('*Stats for Ben*\n• Current streak: 0 days\n• Appointments set: 0 · Closed: 0 · No sale: 0');
  });

  test('confirms an export', () => {
    expect(buildExportMessage(2, '2026-02')).toEqual({ text: ':page_facing_up: Exported 2 deals (2026-02).' });
  });

  test('help lists every command', () => {
    for (const trigger of ['#set', '#sold', '#soldfor', '#nosale', '#cancel', '#delete', '#clearleaderboard', '/deals']) {
      expect(HELP_TEXT).toContain(trigger);
    }
  });
});
