import type { Session } from '@soulrelay/auth';
import type { ListingKind } from '@soulrelay/marketplace';

// ─── Sessions ───────────────────────────────────────────────────────────────────

/** A session the dispatcher can write reply lines to. */
export interface ClientSession extends Session {
  /** Queue one line (without terminator) to the peer. */
  send(line: string): void;
}

/** How `SERVICE LIST` shows listing owners. */
export type ListingVisibility = 'tagged' | 'anonymous';

// ─── Commands ───────────────────────────────────────────────────────────────────

/** A parsed inbound line. */
export type Command =
  | { kind: 'soul'; soulId: string; signature?: string }
  | { kind: 'sign'; payload: string }
  | { kind: 'service.list'; category?: string }
  | { kind: 'service.place'; listingKind: ListingKind; category: string; price: string }
  | { kind: 'service.cancel'; listingId: string }
  | { kind: 'service.accept'; tradeId: string; signature?: string }
  | { kind: 'reputation'; soulId?: string }
  | { kind: 'nick'; nick: string }
  | { kind: 'join'; channel: string }
  | { kind: 'part'; channel: string; reason?: string }
  | { kind: 'privmsg'; target: string; text: string }
  | { kind: 'ping'; token: string }
  | { kind: 'pong' }
  | { kind: 'quit'; reason?: string };

/** Why a line could not be parsed. `command` names what was attempted. */
export type ParseFailure =
  | { reason: 'syntax'; command: string }
  | { reason: 'unknown'; command: string };

// ─── Transport ──────────────────────────────────────────────────────────────────

/**
 * The base chat relay the dispatcher hands plain transport commands to.
 * Channel membership and delivery live behind this interface.
 */
export interface RelayTransport<S extends ClientSession = ClientSession> {
  setNick(session: S, nick: string): void;
  join(session: S, channel: string): void;
  part(session: S, channel: string, reason?: string): void;
  privmsg(session: S, target: string, text: string): void;
  quit(session: S, reason?: string): void;
}

// ─── Relayed lines ──────────────────────────────────────────────────────────────

/** Sender identity carried in front of a relayed line. */
export interface SenderAnnotation {
  nick: string;
  soulId?: string;
  paradigm?: string;
  mode?: string;
}

/** A relayed line as seen by a receiving client. */
export interface RelayedLine {
  sender: SenderAnnotation;
  /** PRIVMSG, JOIN, PART or QUIT. */
  command: string;
  /** Channel or nick; absent for QUIT. */
  target?: string;
  /** Message text (PRIVMSG) or reason (PART, QUIT), with any signature tag removed. */
  text?: string;
  /** Hex signature from a trailing `[Sig:<hex>]` tag. */
  signature?: string;
}
