import { commandSchema, type Command } from '@sundown/common';

type Verb = 'list' | 'start' | 'stop' | 'schedule' | 'unschedule' | 'status' | 'help';

const VERBS = new Map<string, Verb>([
  ['list', 'list'],
  ['ls', 'list'],
  ['show', 'list'],
  ['start', 'start'],
  ['boot', 'start'],
  ['stop', 'stop'],
  ['shutdown', 'stop'],
  ['halt', 'stop'],
  ['delete', 'schedule'],
  ['remove', 'schedule'],
  ['destroy', 'schedule'],
  ['schedule', 'schedule'],
  ['cancel', 'unschedule'],
  ['unschedule', 'unschedule'],
  ['keep', 'unschedule'],
  ['status', 'status'],
  ['health', 'status'],
  ['help', 'help'],
]);

const CONFIRM_WORDS = new Set(['confirm', 'yes']);
const REJECT_WORDS = new Set(['cancel', 'no']);
const SCHEDULED_WORDS = new Set(['scheduled', 'deletion', 'deletions', 'pending']);

/** Words around a resource id that carry no time information */
const FILLER_WORDS = new Set(['for', 'deletion', 'container', 'ct', 'lxc', 'please']);

const CONFIRMATION_ID = /^[0-9a-f]{8}$/;
const RESOURCE_ID = /^#?(\d+)[.,!?]?$/;

/**
 * Classify free text into a Command. Mentions are stripped and matching is
 * keyword based; the result passes through `commandSchema` like any other
 * classifier output. Returns null when the text is not a command.
 *
 * @example
 * parseCommand('<@U0BOT> delete 103 in 5 days')
 * // { type: 'schedule_deletion', resourceId: '103', when: 'in 5 days' }
 */
export function parseCommand(text: string): Command | null {
  const tokens = tokenize(stripMentions(text).toLowerCase());
  if (tokens.length === 0) {
    return { type: 'help' };
  }

  const candidate = classify(tokens);
  if (!candidate) return null;

  const parsed = commandSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

export function stripMentions(text: string): string {
  return text.replace(/<@[A-Z0-9]+(\|[^>]*)?>/g, ' ').trim();
}

function classify(tokens: string[]): Record<string, unknown> | null {
  const [first, second] = tokens;

  // "confirm 3fa9c2d1" / "no 3fa9c2d1"
  if (tokens.length === 2 && first && second && CONFIRMATION_ID.test(second)) {
    if (CONFIRM_WORDS.has(first)) {
      return { type: 'respond_confirmation', confirmationId: second, response: 'confirm' };
    }
    if (REJECT_WORDS.has(first)) {
      return { type: 'respond_confirmation', confirmationId: second, response: 'cancel' };
    }
  }

  const verbIndex = tokens.findIndex((token) => VERBS.has(token));
  const verb = VERBS.get(tokens[verbIndex] ?? '');
  if (!verb) return null;

  if (verb === 'help') {
    return { type: 'help' };
  }
  if (verb === 'status') {
    return { type: 'status' };
  }
  if (verb === 'list') {
    return tokens.some((token) => SCHEDULED_WORDS.has(token))
      ? { type: 'list_scheduled' }
      : { type: 'list_resources' };
  }

  const idIndex = tokens.findIndex((token, i) => i > verbIndex && RESOURCE_ID.test(token));
  const resourceId = tokens[idIndex]?.match(RESOURCE_ID)?.[1];
  if (!resourceId) return null;

  switch (verb) {
    case 'start':
      return { type: 'start_resource', resourceId };
    case 'stop':
      return { type: 'stop_resource', resourceId };
    case 'unschedule':
      return { type: 'cancel_deletion', resourceId };
    case 'schedule': {
      const when = tokens
        .slice(idIndex + 1)
        .filter((token) => !FILLER_WORDS.has(token))
        .join(' ');
      return when ? { type: 'schedule_deletion', resourceId, when } : { type: 'schedule_deletion', resourceId };
    }
  }
}

function tokenize(text: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inQuotes = false;
  let quoteChar = '';

  for (const ch of text) {
    if (inQuotes) {
      if (ch === quoteChar) {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else if (ch === '"' || ch === "'") {
      inQuotes = true;
      quoteChar = ch;
    } else if (/\s/.test(ch)) {
      if (current) {
        tokens.push(current);
        current = '';
      }
    } else {
      current += ch;
    }
  }

  if (current) {
    tokens.push(current);
  }

  return tokens;
}
