import {
  Actor,
  Intent,
  LossReason,
  LossReasonCode,
  LOSS_REASON_CODES,
  MentionedActor,
  ParseErrorKind,
  ParseResult
} from '../types';

const MENTION_PATTERN = /^<@!?([A-Z0-9]+)(?:\|([^>]*))?>$/i;
// `@Name` typed without picking a workspace member
const PLAIN_NAME_PATTERN = /^@([^\s<>@]+)$/;
const MAGNITUDE_PATTERN = /^(?:\d+(?:\.\d*)?|\.\d+)$/;
const DEAL_ID_PATTERN = /^#?(\d+)$/;

interface CommandRule {
  triggers: string[];
  parse: (args: string[], trigger: string, mentions: MentionedActor[]) => ParseResult;
}

const fail = (kind: ParseErrorKind, trigger: string | null): ParseResult => ({
  ok: false,
  error: { kind, trigger }
});

const succeed = (intent: Intent): ParseResult => ({ ok: true, intent });

/**
 * Split raw chat text into whitespace-separated tokens
 */
export const tokenize = (text: string): string[] => text.trim().split(/\s+/).filter(token => token.length > 0);

/**
 * Resolve a `<@ID>` or `<@ID|label>` token. Returns null for anything else.
 */
export const resolveMention = (token: string, mentions: MentionedActor[]): Actor | null => {
  const match = token.match(MENTION_PATTERN);
  if (!match) return null;

  const [, id, label] = match;
  const known = mentions.find(m => m.id === id);
  if (known) return { kind: 'identified', id: known.id, name: known.name };
  return { kind: 'identified', id, name: label || id };
};

/**
 * A mention whose user was resolved by the caller. Unresolved ids return null.
 */
const resolveKnownMention = (token: string, mentions: MentionedActor[]): Actor | null => {
  const actor = resolveMention(token, mentions);
  if (!actor || actor.kind !== 'identified') return null;
  return mentions.some(m => m.id === actor.id) ? actor : null;
};

/**
 * Setter named in a `#sold`: a mention, or a plain `@Name` kept as a
 * name-only actor
 */
const resolveSetter = (token: string, mentions: MentionedActor[]): Actor | null => {
  const mentioned = resolveMention(token, mentions);
  if (mentioned) return mentioned;
  const plain = token.match(PLAIN_NAME_PATTERN);
  return plain ? { kind: 'name_only', name: plain[1] } : null;
};

/**
 * Parse a non-negative decimal. Returns null for anything else.
 */
export const parseMagnitude = (token: string): number | null => {
  if (!MAGNITUDE_PATTERN.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
};

const parseSetAppointment: CommandRule['parse'] = (args, trigger) => {
  if (args.length === 0) return fail('MissingName', trigger);
  return succeed({ type: 'set_appointment', customerName: args.join(' ') });
};

const parseRecordSale: CommandRule['parse'] = (args, trigger, mentions) => {
  if (args.length < 2) return fail('TooFewTokens', trigger);

  const magnitude = parseMagnitude(args[args.length - 1]);
  if (magnitude === null) return fail('InvalidMagnitude', trigger);

  const setter = resolveSetter(args[0], mentions);
  const nameTokens = args.slice(setter ? 1 : 0, -1);

  return succeed({
    type: 'record_sale',
    customerName: nameTokens.join(' '),
    magnitude,
    setter
  });
};

const parseRecordSaleFor: CommandRule['parse'] = (args, trigger, mentions) => {
  const closer = args.length > 0 ? resolveKnownMention(args[0], mentions) : null;
  const setter = args.length > 1 ? resolveKnownMention(args[1], mentions) : null;
  if (!closer || !setter) return fail('MissingActors', trigger);

  const rest = args.slice(2);
  if (rest.length === 0) return fail('TooFewTokens', trigger);

  const magnitude = parseMagnitude(rest[rest.length - 1]);
  if (magnitude === null) return fail('InvalidMagnitude', trigger);

  return succeed({
    type: 'record_sale_for',
    customerName: rest.slice(0, -1).join(' '),
    magnitude,
    closer,
    setter
  });
};

const parseMarkNoSale: CommandRule['parse'] = (args, trigger) => {
  if (args.length === 0) return fail('MissingTarget', trigger);
  return succeed({ type: 'mark_no_sale', customerName: args.join(' ') });
};

const parseCancel: CommandRule['parse'] = (args, trigger) => {
  if (args.length === 0) return fail('MissingTarget', trigger);
  return succeed({ type: 'cancel', customerName: args.join(' ') });
};

const parseDelete: CommandRule['parse'] = (args, trigger) => {
  if (args.length === 0) return fail('MissingTarget', trigger);

  const idMatch = args.length === 1 ? args[0].match(DEAL_ID_PATTERN) : null;
  if (idMatch) {
    return succeed({ type: 'delete', target: { kind: 'id', id: Number(idMatch[1]) } });
  }
  return succeed({ type: 'delete', target: { kind: 'customer', name: args.join(' ') } });
};

const parseClearAll: CommandRule['parse'] = (args, trigger) => {
  if (args.length > 0) return fail('UnexpectedArguments', trigger);
  return succeed({ type: 'clear_all' });
};

// Most specific trigger first
const RULES: CommandRule[] = [
  { triggers: ['#soldfor'], parse: parseRecordSaleFor },
  { triggers: ['#sold'], parse: parseRecordSale },
  { triggers: ['#set'], parse: parseSetAppointment },
  { triggers: ['#nosale', '#no-sale'], parse: parseMarkNoSale },
  { triggers: ['#canceled', '#cancelled', '#cancel'], parse: parseCancel },
  { triggers: ['#delete'], parse: parseDelete },
  { triggers: ['#clearleaderboard', '#clearall'], parse: parseClearAll }
];

/**
 * Interpret a chat message as a ledger command
 */
export const parseCommand = (rawText: string, mentionedActors: MentionedActor[] = []): ParseResult => {
  const [head, ...args] = tokenize(rawText);
  if (!head) return fail('NotACommand', null);

  const trigger = head.toLowerCase();
  const rule = RULES.find(r => r.triggers.includes(trigger));
  if (!rule) return fail('NotACommand', null);

  return rule.parse(args, trigger, mentionedActors);
};

const LOSS_REASON_KEYWORDS = new Map<string, LossReasonCode>([
  ['ghosted', 'ghosted'],
  ['ghost', 'ghosted'],
  ['one_legger', 'one_legger'],
  ['one-legger', 'one_legger'],
  ['onelegger', 'one_legger'],
  ['1legger', 'one_legger'],
  ['oneleg', 'one_legger'],
  ['needs_thought', 'needs_thought'],
  ['think', 'needs_thought'],
  ['thinking', 'needs_thought'],
  ['disqualified', 'disqualified'],
  ['dq', 'disqualified'],
  ['other', 'other']
]);

/**
 * Read a no-sale reason from a follow-up reply: a menu number (1-5) or a
 * keyword, optionally followed by free-text detail.
 */
export const parseLossReason = (text: string): LossReason | null => {
  const [head, ...rest] = tokenize(text);
  if (!head) return null;

  const key = head.toLowerCase().replace(/[.):]+$/, '');
  const menuIndex = /^[1-5]$/.test(key) ? Number(key) - 1 : -1;
  const code = menuIndex >= 0 ? LOSS_REASON_CODES[menuIndex] : LOSS_REASON_KEYWORDS.get(key);
  if (!code) return null;

  const detail = rest.join(' ');
  return { code, detail: detail.length > 0 ? detail : null };
};

/**
 * True when the text starts with a ledger trigger, well-formed or not
 */
export const isCommand = (rawText: string): boolean => {
  const result = parseCommand(rawText);
  return result.ok || result.error.kind !== 'NotACommand';
};
