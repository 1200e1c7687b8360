/**
 * The relay: live sessions, unique nicks and channel fan-out.
 *
 * Relayed lines carry the sender annotation built by
 * {@link formatRelayLine}. Channel messages reach every other member;
 * JOIN and PART are echoed to the sender as well, so a client sees its own
 * membership change.
 *
 * @packageDocumentation
 */

import { annotateSender, formatRelayLine } from '@soulrelay/protocol';
import type { RelayTransport } from '@soulrelay/protocol';
import { silentLogger } from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

import type { RelaySession } from './session';

export const ERR_NICK_IN_USE = 'ERR_NICK_IN_USE';
export const ERR_NO_SUCH_TARGET = 'ERR_NO_SUCH_TARGET';
export const ERR_NOT_ON_CHANNEL = 'ERR_NOT_ON_CHANNEL';

export interface SessionRegistryOptions {
  logger?: Logger;
}

export class SessionRegistry implements RelayTransport<RelaySession> {
  private readonly sessions = new Map<string, RelaySession>();
  private readonly byNick = new Map<string, RelaySession>();
  private readonly channels = new Map<string, Set<RelaySession>>();
  private readonly logger: Logger;

  constructor(options: SessionRegistryOptions = {}) {
    this.logger = (options.logger ?? silentLogger).child('relay');
  }

  /** Register a new connection, renaming it if its default nick is taken. */
  add(session: RelaySession): void {
    let nick = session.nick;
    for (let n = 2; this.byNick.has(nick); n++) {
      nick = `${session.nick}-${n}`;
    }
    session.nick = nick;
    this.sessions.set(session.id, session);
    this.byNick.set(nick, session);
    this.logger.debug('session added', { sessionId: session.id, nick });
  }

  /**
   * Forget a closed connection and tell its channels. Safe to call for a
   * session that already quit.
   */
  remove(session: RelaySession, reason?: string): void {
    if (!this.sessions.has(session.id)) return;
    this.broadcastToPeers(session, formatRelayLine(session, 'QUIT', undefined, reason));
    for (const channel of Array.from(session.channels)) {
      this.leave(session, channel);
    }
    this.sessions.delete(session.id);
    if (this.byNick.get(session.nick) === session) {
      this.byNick.delete(session.nick);
    }
    this.logger.debug('session removed', { sessionId: session.id });
  }

  get(sessionId: string): RelaySession | undefined {
    return this.sessions.get(sessionId);
  }

  findByNick(nick: string): RelaySession | undefined {
    return this.byNick.get(nick);
  }

  /** Members of `channel`, in join order. */
  members(channel: string): RelaySession[] {
    return Array.from(this.channels.get(channel) ?? []);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** All live sessions. */
  list(): RelaySession[] {
    return Array.from(this.sessions.values());
  }

  // ── RelayTransport ──────────────────────────────────────────────────────

  setNick(session: RelaySession, nick: string): void {
    if (nick === session.nick) return;
    const holder = this.byNick.get(nick);
    if (holder) {
      session.send(`${ERR_NICK_IN_USE} ${nick}`);
      return;
    }
    const line = `:${annotateSender(session)} NICK ${nick}`;
    this.byNick.delete(session.nick);
    this.byNick.set(nick, session);
    session.send(line);
    this.broadcastToPeers(session, line);
    session.nick = nick;
  }

  join(session: RelaySession, channel: string): void {
    if (session.channels.has(channel)) return;
    let members = this.channels.get(channel);
    if (!members) {
      members = new Set();
      this.channels.set(channel, members);
    }
    members.add(session);
    session.channels.add(channel);

    const line = formatRelayLine(session, 'JOIN', channel);
    for (const member of members) {
      member.send(line);
    }
  }

  part(session: RelaySession, channel: string, reason?: string): void {
    const members = this.channels.get(channel);
    if (!members?.has(session)) {
      session.send(`${ERR_NOT_ON_CHANNEL} ${channel}`);
      return;
    }
    const line = formatRelayLine(session, 'PART', channel, reason);
    for (const member of members) {
      member.send(line);
    }
    this.leave(session, channel);
  }

  privmsg(session: RelaySession, target: string, text: string): void {
    if (target.startsWith('#')) {
      const members = this.channels.get(target);
      if (!members?.has(session)) {
        session.send(`${ERR_NOT_ON_CHANNEL} ${target}`);
        return;
      }
      const line = formatRelayLine(session, 'PRIVMSG', target, text);
      for (const member of members) {
        if (member !== session) member.send(line);
      }
      return;
    }

    const recipient = this.byNick.get(target);
    if (!recipient) {
      session.send(`${ERR_NO_SUCH_TARGET} ${target}`);
      return;
    }
    recipient.send(formatRelayLine(session, 'PRIVMSG', target, text));
  }

  quit(session: RelaySession, reason?: string): void {
    this.remove(session, reason);
    session.close();
  }

  // ── Helpers ─────────────────────────────────────────────────────────────

  private leave(session: RelaySession, channel: string): void {
    session.channels.delete(channel);
    const members = this.channels.get(channel);
    if (!members) return;
    members.delete(session);
    if (members.size === 0) {
      this.channels.delete(channel);
    }
  }

  /** Send `line` once to every session sharing a channel with `session`. */
  private broadcastToPeers(session: RelaySession, line: string): void {
    const peers = new Set<RelaySession>();
    for (const channel of session.channels) {
      for (const member of this.channels.get(channel) ?? []) {
        if (member !== session) peers.add(member);
      }
    }
    for (const peer of peers) {
      peer.send(line);
    }
  }
}
