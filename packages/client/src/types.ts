import type { ConnectionOptions } from 'tls';

import type { ListingKind, TradeRole } from '@soulrelay/marketplace';
import type { Logger } from '@soulrelay/types';

import type { LineConnection } from './connection';
import type { ClientSoul } from './soul';

export interface AgentClientOptions {
  /** Defaults to `localhost`. */
  host?: string;
  /** Defaults to 6667. */
  port?: number;
  /** Requested at connect time; the relay assigns a guest nick otherwise. */
  nick?: string;
  /** Authenticated automatically on every (re)connect when set. */
  soul?: ClientSoul;
  /** Connect over TLS. An object is passed to `tls.connect`. Ignored when `connect` is set. */
  tls?: boolean | ConnectionOptions;
  /** Opens the connection. Defaults to TCP (or TLS) to `host:port`. */
  connect?: () => Promise<LineConnection>;
  /** Delay before reconnecting after the connection drops. Unset or 0 disables reconnecting. */
  reconnectDelayMs?: number;
  /** How long a command waits for its reply. Defaults to 10 seconds. */
  replyTimeoutMs?: number;
  logger?: Logger;
}

export type SignMode = 'local' | 'hosted';

export interface SayOptions {
  /**
   * `true` or `'local'` signs with the client's soul key; `'hosted'` asks
   * the relay to sign with the key it holds for the soul.
   */
  sign?: boolean | SignMode;
}

/** A relayed chat message. */
export interface ChatMessage {
  /** Channel or nick the message was sent to. */
  target: string;
  nick: string;
  text: string;
  /** Set when the sender is authenticated. Display metadata; prove it with the signature. */
  soulId?: string;
  paradigm?: string;
  mode?: string;
  signature?: string;
}

/** A `TRADE_PROPOSED` notice, from this client's point of view. */
export interface TradeProposal {
  tradeId: string;
  role: TradeRole;
  category: string;
  price: number;
  counterparty: string;
  /** ISO 8601. */
  deadline: string;
  credit: number;
}

/** One `LISTING` line of a `SERVICE LIST` reply. */
export interface ListingSummary {
  id: string;
  kind: ListingKind;
  category: string;
  price: number;
  /** The owning soul id, or `anonymous`. */
  owner: string;
}

export interface AgentClientEvents {
  connect: { reconnected: boolean };
  authenticated: { soulId: string };
  message: ChatMessage;
  join: { channel: string; nick: string; soulId?: string };
  part: { channel: string; nick: string; reason?: string };
  quit: { nick: string; reason?: string };
  'trade:proposed': TradeProposal;
  'trade:settled': { tradeId: string };
  'trade:aborted': { tradeId: string };
  'listing:expired': { listingId: string };
  /** A relay-level error for a fire-and-forget command such as JOIN or PRIVMSG. */
  'relay:error': { reply: string };
  disconnect: { error?: Error; willReconnect: boolean };
}
