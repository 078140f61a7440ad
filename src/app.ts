import { App, SayFn } from '@slack/bolt';
import dotenv from 'dotenv';

import { loadConfig } from './config';
import { createLogger } from './logger';
import { createLedgerStore } from './services/ledgerStore';
import { createLedgerService } from './services/ledgerService';
import { isCommand, parseLossReason } from './services/commandParser';
import { ReplyWaiter } from './services/replyWaiter';
import { buildLeaderboard, summarizeActor } from './services/aggregationService';
import { bounds, boundsForDate, formatPeriodLabel, parseCivilDate, resolvePeriodKind } from './services/periodService';
import {
  buildExportMessage,
  buildLeaderboardMessage,
  buildLossReasonPrompt,
  buildResultMessage,
  buildStatsMessage,
  describeError,
  HELP_TEXT
} from './views/leaderboardView';
import { Actor, Deal, MentionedActor, PeriodBounds, PeriodKind } from './types';

dotenv.config();

const config = loadConfig();
const logger = createLogger('deal-ledger', config.logLevel);

const store = createLedgerStore(config.dataFilePath, logger);
const adminUsers = new Set(config.adminUsers);
const ledgerService = createLedgerService(store, {
  saleWithoutAppointment: config.saleWithoutAppointment,
  isPrivileged: actorId => adminUsers.has(actorId)
});
// A ledger command typed during a follow-up is handled as a command, not as the reply
const replyWaiter = new ReplyWaiter(text => !isCommand(text));
const leaderboardChannelIds = new Set(Object.values(config.leaderboardChannels));

const app = new App({
  token: config.slack.botToken,
  signingSecret: config.slack.signingSecret,
  socketMode: config.slack.socketMode,
  appToken: config.slack.appToken,
  logger,
  logLevel: config.logLevel
});

type SlackClient = App['client'];

const PERIOD_KINDS: PeriodKind[] = ['day', 'week', 'month'];

const MENTION_IDS = /<@([A-Z0-9]+)(?:\|[^>]*)?>/gi;

async function getAdminUsers(client: SlackClient): Promise<string[]> {
  const admins: string[] = [];
  try {
    let cursor: string | undefined;
    do {
      const result = await client.users.list({ limit: 200, cursor });
      if (!result.ok || !result.members) {
        logger.error('Failed to fetch users:', result.error);
        return admins;
      }

      for (const member of result.members) {
        if (member.id && !member.deleted && (member.is_admin || member.is_owner || member.is_primary_owner)) {
          admins.push(member.id);
        }
      }
      cursor = result.response_metadata?.next_cursor || undefined;
    } while (cursor);
  } catch (error) {
    logger.error('Error fetching admin users:', error);
  }
  return admins;
}

async function resolveActor(client: SlackClient, userId: string): Promise<Actor> {
  try {
    const result = await client.users.info({ user: userId });
    const user = result.user;
    const name = user?.profile?.display_name || user?.real_name || user?.name || userId;
    return { kind: 'identified', id: userId, name };
  } catch (error) {
    logger.warn(`Could not resolve display name for ${userId}:`, error);
    return { kind: 'identified', id: userId, name: userId };
  }
}

async function resolveMentions(client: SlackClient, text: string): Promise<MentionedActor[]> {
  const ids = [...new Set([...text.matchAll(MENTION_IDS)].map(match => match[1]))];
  const mentioned: MentionedActor[] = [];
  for (const id of ids) {
    const actor = await resolveActor(client, id);
    mentioned.push({ id, name: actor.name });
  }
  return mentioned;
}

function leaderboardFor(organizationId: string, period: PeriodBounds) {
  return buildLeaderboard(store.load(organizationId), period, { ratePerUnit: config.revenueRatePerKw });
}

/**
 * Refresh the day/week/month leaderboard channels after a change
 */
async function postLeaderboards(client: SlackClient, organizationId: string): Promise<void> {
  const now = new Date();
  for (const kind of PERIOD_KINDS) {
    const channel = config.leaderboardChannels[kind];
    if (!channel) continue;

    const message = buildLeaderboardMessage(leaderboardFor(organizationId, bounds(kind, now, config.timeZone)));
    try {
      await client.chat.postMessage({ channel, ...message });
    } catch (error) {
      logger.error(`Failed to post ${kind} leaderboard to ${channel}:`, error);
    }
  }
}

/**
 * Ask for the no-sale reason and wait for the rep's reply in the same channel
 */
async function collectLossReason(say: SayFn, userId: string, channelId: string, organizationId: string, deal: Deal) {
  await say(buildLossReasonPrompt(deal));

  const reply = await replyWaiter.waitFor(userId, channelId, config.noSaleReasonTimeoutMs);
  if (reply === null) {
    logger.info(`No loss reason received for deal ${deal.id}; leaving it without one`);
    return;
  }

  const reason = parseLossReason(reply);
  if (!reason) {
    await say(`Could not read that reason. Deal #${deal.id} stays marked as no sale without one.`);
    return;
  }

  const recorded = await ledgerService.recordLossReason(organizationId, deal.id, reason);
  await say(buildResultMessage(recorded));
}

app.message(async ({ message, say, client, context }) => {
  if (message.subtype !== undefined) return;
  if (!message.text || !message.user) return;

  const { text, user, channel } = message;
  if (replyWaiter.deliver(user, channel, text)) return;

  // Leaderboard channels are read-only
  if (leaderboardChannelIds.has(channel)) return;

  const organizationId = context.teamId ?? message.team;
  if (!organizationId) {
    logger.warn(`Ignoring message from ${user} without a workspace id`);
    return;
  }

  try {
    const actor = await resolveActor(client, user);
    const mentionedActors = await resolveMentions(client, text);
    const result = await ledgerService.handleText({ actor, organizationId }, text, mentionedActors);
    if (!result) return;

    await say(buildResultMessage(result));

    if (result.kind === 'confirmation') {
      await postLeaderboards(client, organizationId);
      if (result.action === 'no_sale') {
        await collectLossReason(say, user, channel, organizationId, result.deal);
      }
    }
  } catch (error) {
    logger.error('Error processing message:', error);
    await say(':x: Something went wrong while logging that. Please try again.');
  }
});

app.command('/deals', async ({ command, ack, respond, client }) => {
  await ack();

  const args = command.text.trim().split(/\s+/).filter(arg => arg.length > 0);
  const subCommand = args[0]?.toLowerCase() ?? 'help';
  const organizationId = command.team_id;

  switch (subCommand) {
    case 'leaderboard': {
      const kind = resolvePeriodKind(args[1] ?? 'day');
      if (!kind) {
        await respond({ text: ':x: Invalid period. Use one of: `day`, `week`, `month`.', response_type: 'ephemeral' });
        return;
      }

      let period = bounds(kind, new Date(), config.timeZone);
      if (args[2]) {
        const date = parseCivilDate(args[2]);
        if (!date) {
          await respond({ text: ':x: Invalid date. Use format `YYYY-MM-DD` (example: `2026-02-06`).', response_type: 'ephemeral' });
          return;
        }
        period = boundsForDate(kind, date, config.timeZone);
      }

      await respond({ ...buildLeaderboardMessage(leaderboardFor(organizationId, period)), response_type: 'in_channel' });
      return;
    }

    case 'mystats': {
      const actor = await resolveActor(client, command.user_id);
      const summary = summarizeActor(
        store.load(organizationId),
        command.user_id,
        PERIOD_KINDS,
        config.timeZone,
        new Date(),
        { ratePerUnit: config.revenueRatePerKw, paySplit: config.paySplit }
      );
      await respond({ ...buildStatsMessage(actor.name, summary), response_type: 'ephemeral' });
      return;
    }

    case 'export': {
      const scope = args[1]?.toLowerCase() ?? 'all';
      let period: PeriodBounds | null = null;
      if (scope !== 'all') {
        const kind = resolvePeriodKind(scope);
        if (!kind) {
          await respond({ text: ':x: Invalid period. Use one of: `all`, `day`, `week`, `month`.', response_type: 'ephemeral' });
          return;
        }
        const date = args[2] ? parseCivilDate(args[2]) : null;
        if (args[2] && !date) {
          await respond({ text: ':x: Invalid date. Use format `YYYY-MM-DD` (example: `2026-02-06`).', response_type: 'ephemeral' });
          return;
        }
        period = date ? boundsForDate(kind, date, config.timeZone) : bounds(kind, new Date(), config.timeZone);
      }

      const actor = await resolveActor(client, command.user_id);
      const result = ledgerService.exportDeals({ actor, organizationId }, period);
      if (result.kind === 'error') {
        await respond({ text: describeError(result.error), response_type: 'ephemeral' });
        return;
      }

      const label = period ? formatPeriodLabel(period) : 'all time';
      const filename = `deals-${period ? `${period.kind}-${formatPeriodLabel(period).replace(/\s.*$/, '')}` : 'all'}.csv`;
      try {
        await client.files.uploadV2({
          channel_id: command.channel_id,
          filename,
          title: filename,
          content: result.csv,
          initial_comment: buildExportMessage(result.rowCount, label).text
        });
      } catch (error) {
        logger.error('Failed to upload deal export:', error);
        await respond({ text: ':x: Could not upload the export. Please try again.', response_type: 'ephemeral' });
      }
      return;
    }

    default:
      await respond({ text: HELP_TEXT, response_type: 'ephemeral' });
  }
});

const shutdown = async (signal: string) => {
  logger.info(`Received ${signal}, shutting down`);
  replyWaiter.cancelAll();
  try {
    await app.stop();
  } catch (error) {
    logger.error('Error stopping app:', error);
  }
  process.exit(0);
};

process.on('SIGTERM', signal => {
  void shutdown(signal);
});
process.on('SIGINT', signal => {
  void shutdown(signal);
});

(async () => {
  for (const adminId of await getAdminUsers(app.client)) {
    adminUsers.add(adminId);
  }

  await app.start(config.slack.port);
  logger.info(`Deal ledger is running on port ${config.slack.port} (time zone ${config.timeZone})`);
})().catch(error => {
  logger.error('Failed to start app:', error);
  process.exit(1);
});
