import { err, isToken, ok } from '@soulrelay/types';
import type { Result } from '@soulrelay/types';

import type { Command, ParseFailure } from './types';

interface SplitLine {
  verb: string;
  /** Everything after the verb, untouched. */
  rest: string;
  params: string[];
  /** Text after the first ` :`, if any. */
  trailing?: string;
}

/**
 * Split `VERB p1 p2 :trailing text`. Runs of spaces between parameters are
 * tolerated; the trailing part is kept verbatim.
 */
function splitLine(line: string): SplitLine {
  const space = line.indexOf(' ');
  const verb = (space === -1 ? line : line.slice(0, space)).toUpperCase();
  const rest = space === -1 ? '' : line.slice(space + 1);

  const params: string[] = [];
  let trailing: string | undefined;
  let cursor = rest;
  while (cursor.length > 0) {
    if (cursor.startsWith(':')) {
      trailing = cursor.slice(1);
      break;
    }
    const next = cursor.indexOf(' ');
    const token = next === -1 ? cursor : cursor.slice(0, next);
    if (token.length > 0) {
      params.push(token);
    }
    cursor = next === -1 ? '' : cursor.slice(next + 1);
  }
  return { verb, rest, params, trailing };
}

const syntax = (command: string): Result<never, ParseFailure> => err({ reason: 'syntax', command });

function isChannel(value: string | undefined): value is string {
  return isToken(value, 64) && value.startsWith('#');
}

/** Nicks are short tokens that cannot be mistaken for an annotation or a prefix. */
export function isValidNick(value: unknown): value is string {
  return isToken(value, 32) && !/[[\]:#,]/.test(value);
}

/**
 * Parse one inbound line into a {@link Command}.
 *
 * Verbs are case-insensitive. `SIGN` takes the rest of the line as its
 * payload (one leading `:` is dropped, so `SIGN :hello` and `SIGN hello`
 * sign the same text).
 */
export function parseCommand(rawLine: string): Result<Command, ParseFailure> {
  const line = rawLine.replace(/\r$/, '');
  const { verb, rest, params, trailing } = splitLine(line);

  switch (verb) {
    case 'SOUL': {
      const [soulId, signature] = params;
      if (trailing !== undefined || params.length < 1 || params.length > 2 || !isToken(soulId)) {
        return syntax('SOUL');
      }
      return ok(signature === undefined ? { kind: 'soul', soulId } : { kind: 'soul', soulId, signature });
    }

    case 'SIGN': {
      const payload = rest.startsWith(':') ? rest.slice(1) : rest;
      if (payload.length === 0) return syntax('SIGN');
      return ok({ kind: 'sign', payload });
    }

    case 'SERVICE':
      return parseService(params, trailing);

    case 'REPUTATION': {
      const [soulId] = params;
      if (trailing !== undefined || params.length > 1) return syntax('REPUTATION');
      if (soulId === undefined) return ok({ kind: 'reputation' });
      return isToken(soulId) ? ok({ kind: 'reputation', soulId }) : syntax('REPUTATION');
    }

    case 'NICK': {
      const nick = params[0] ?? trailing;
      if (!isValidNick(nick) || params.length > 1) return syntax('NICK');
      return ok({ kind: 'nick', nick });
    }

    case 'JOIN': {
      const [channel] = params;
      if (!isChannel(channel) || params.length > 1) return syntax('JOIN');
      return ok({ kind: 'join', channel });
    }

    case 'PART': {
      const [channel] = params;
      if (!isChannel(channel) || params.length > 1) return syntax('PART');
      return ok(trailing ? { kind: 'part', channel, reason: trailing } : { kind: 'part', channel });
    }

    case 'PRIVMSG': {
      const [target] = params;
      if (!isToken(target, 64) || params.length > 1 || !trailing) return syntax('PRIVMSG');
      return ok({ kind: 'privmsg', target, text: trailing });
    }

    case 'PING':
      return ok({ kind: 'ping', token: params[0] ?? trailing ?? '' });

    case 'PONG':
      return ok({ kind: 'pong' });

    case 'QUIT':
      return ok(trailing ? { kind: 'quit', reason: trailing } : { kind: 'quit' });

    default:
      return err({ reason: 'unknown', command: verb });
  }
}

function parseService(params: string[], trailing: string | undefined): Result<Command, ParseFailure> {
  const [action, ...args] = params;
  if (action === undefined || trailing !== undefined) {
    return syntax('SERVICE');
  }
  const sub = action.toUpperCase();
  const command = `SERVICE ${sub}`;

  switch (sub) {
    case 'LIST': {
      const [category] = args;
      if (args.length > 1) return syntax(command);
      return ok(category === undefined ? { kind: 'service.list' } : { kind: 'service.list', category });
    }
    case 'OFFER':
    case 'REQUEST': {
      const [category, price] = args;
      if (args.length !== 2 || category === undefined || price === undefined) return syntax(command);
      return ok({
        kind: 'service.place',
        listingKind: sub === 'OFFER' ? 'offer' : 'request',
        category,
        price,
      });
    }
    case 'CANCEL': {
      const [listingId] = args;
      if (args.length !== 1 || !isToken(listingId)) return syntax(command);
      return ok({ kind: 'service.cancel', listingId });
    }
    case 'ACCEPT': {
      const [tradeId, signature] = args;
      if (args.length < 1 || args.length > 2 || !isToken(tradeId)) return syntax(command);
      return ok(
        signature === undefined
          ? { kind: 'service.accept', tradeId }
          : { kind: 'service.accept', tradeId, signature },
      );
    }
    default:
      return err({ reason: 'unknown', command });
  }
}
