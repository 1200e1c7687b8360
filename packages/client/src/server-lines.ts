/**
 * Parsers for the reply and notice lines a relay sends.
 */

import type { ChatMessage, ListingSummary, TradeProposal } from './types';
import type { RelayedLine } from '@soulrelay/protocol';

const NUMBER = /^\d+(?:\.\d+)?$/;

/** `TRADE_PROPOSED <trade_id> <role> <category> <price> <counterparty> <deadline> <credit>` */
export function parseTradeProposed(line: string): TradeProposal | undefined {
  const [verb, tradeId, role, category, price, counterparty, deadline, credit, ...extra] = line.split(' ');
  if (
    verb !== 'TRADE_PROPOSED' ||
    extra.length > 0 ||
    !tradeId ||
    (role !== 'seeker' && role !== 'provider') ||
    !category ||
    !price ||
    !NUMBER.test(price) ||
    !counterparty ||
    !deadline ||
    !credit ||
    !/^\d+$/.test(credit)
  ) {
    return undefined;
  }
  return { tradeId, role, category, price: Number(price), counterparty, deadline, credit: Number(credit) };
}

/** `LISTING <id> <OFFER|REQUEST> <category> <price> <owner>` */
export function parseListing(line: string): ListingSummary | undefined {
  const [verb, id, kind, category, price, owner, ...extra] = line.split(' ');
  if (
    verb !== 'LISTING' ||
    extra.length > 0 ||
    !id ||
    (kind !== 'OFFER' && kind !== 'REQUEST') ||
    !category ||
    !price ||
    !NUMBER.test(price) ||
    !owner
  ) {
    return undefined;
  }
  return { id, kind: kind === 'OFFER' ? 'offer' : 'request', category, price: Number(price), owner };
}

/** The chat message carried by a relayed PRIVMSG. */
export function toChatMessage(relayed: RelayedLine): ChatMessage | undefined {
  if (relayed.command !== 'PRIVMSG' || relayed.target === undefined || relayed.text === undefined) {
    return undefined;
  }
  const { sender } = relayed;
  const message: ChatMessage = { target: relayed.target, nick: sender.nick, text: relayed.text };
  if (sender.soulId) message.soulId = sender.soulId;
  if (sender.paradigm) message.paradigm = sender.paradigm;
  if (sender.mode) message.mode = sender.mode;
  if (relayed.signature) message.signature = relayed.signature;
  return message;
}
