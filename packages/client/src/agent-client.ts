/**
 * The agent client: one connection to a relay, soul authentication, signed
 * chat and the marketplace commands.
 *
 * Commands that have a reply return a promise for it. The relay answers a
 * connection's commands in the order it sent them, so replies are matched
 * to requests first-in first-out. Notices, relayed chat and relay errors
 * arrive as events.
 *
 * @packageDocumentation
 */

import { authSigningString } from '@soulrelay/auth';
import { formatPrice, settlementPayload } from '@soulrelay/marketplace';
import type { TradeStatus } from '@soulrelay/marketplace';
import { parseRelayLine, withSignature } from '@soulrelay/protocol';
import { SoulRelayError, SoulRelayErrorCode, TypedEventEmitter, silentLogger } from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

import { connectTcp } from './connection';
import type { LineConnection, LineConnectionEvents } from './connection';
import { parseListing, parseTradeProposed, toChatMessage } from './server-lines';
import { signAs } from './soul';
import type { ClientSoul } from './soul';
import type {
  AgentClientEvents,
  AgentClientOptions,
  ListingSummary,
  SayOptions,
  TradeProposal,
} from './types';

export const DEFAULT_REPLY_TIMEOUT_MS = 10_000;

/** Errors that only the relay's chat commands produce. */
const RELAY_ERRORS = new Set(['ERR_NICK_IN_USE', 'ERR_NOT_ON_CHANNEL', 'ERR_NO_SUCH_TARGET', 'ERR_LINE_TOO_LONG']);
const RELAY_VERBS = new Set(['NICK', 'JOIN', 'PART', 'PRIVMSG', 'QUIT']);

type Progress = 'more' | 'done' | undefined;

interface PendingReply {
  command: string;
  progress: (line: string) => Progress;
  lines: string[];
  resolve: (lines: string[]) => void;
  reject: (error: SoulRelayError) => void;
  timer: ReturnType<typeof setTimeout>;
  /** Timed out: the reply is still consumed when it arrives, then dropped. */
  abandoned: boolean;
}

/** A reply made of exactly one line starting with `verb`. */
const single =
  (verb: string) =>
  (line: string): Progress =>
    line === verb || line.startsWith(`${verb} `) ? 'done' : undefined;

const listing = (line: string): Progress =>
  line.startsWith('LISTING ') ? 'more' : line.startsWith('END LIST') ? 'done' : undefined;

export class AgentClient extends TypedEventEmitter<AgentClientEvents> {
  readonly soul: ClientSoul | undefined;
  private nick: string | undefined;
  private readonly openConnection: () => Promise<LineConnection>;
  private readonly reconnectDelayMs: number;
  private readonly replyTimeoutMs: number;
  private readonly logger: Logger;

  private connection: LineConnection | undefined;
  private detach: (() => void) | undefined;
  private readonly pending: PendingReply[] = [];
  private readonly proposals = new Map<string, TradeProposal>();
  /** Channels to rejoin after a reconnect. */
  private readonly channels = new Set<string>();
  private authenticatedAs: string | undefined;
  private stopping = false;
  private everConnected = false;
  private reconnectTimer: ReturnType<typeof setTimeout> | undefined;

  constructor(options: AgentClientOptions = {}) {
    const logger = (options.logger ?? silentLogger).child('client');
    super((event, error) => logger.error('listener failed', { event: String(event), error: String(error) }));
    const host = options.host ?? 'localhost';
    const port = options.port ?? 6667;
    this.soul = options.soul;
    this.nick = options.nick;
    const tls = options.tls;
    this.openConnection =
      options.connect ?? (() => connectTcp(host, port, tls === undefined ? {} : { tls }));
    this.reconnectDelayMs = options.reconnectDelayMs ?? 0;
    this.replyTimeoutMs = options.replyTimeoutMs ?? DEFAULT_REPLY_TIMEOUT_MS;
    this.logger = logger;
  }

  get isConnected(): boolean {
    return this.connection !== undefined;
  }

  /** Soul id the connection is authenticated as, if any. */
  get authenticatedSoul(): string | undefined {
    return this.authenticatedAs;
  }

  /** Proposals seen and not yet settled or aborted. */
  openProposals(): TradeProposal[] {
    return Array.from(this.proposals.values());
  }

  // ── Connection ──────────────────────────────────────────────────────────

  /**
   * Connect, set the nick, authenticate the soul and rejoin channels.
   * Resolves once authentication has completed.
   */
  async connect(): Promise<void> {
    if (this.connection) return;
    this.stopping = false;
    const connection = await this.openConnection();
    this.attach(connection);

    if (this.nick) this.send(`NICK ${this.nick}`);
    if (this.soul) await this.authenticate();
    for (const channel of this.channels) {
      this.send(`JOIN ${channel}`);
    }

    const reconnected = this.everConnected;
    this.everConnected = true;
    this.logger.info('connected', { soulId: this.authenticatedAs, reconnected });
    this.emit('connect', { reconnected });
  }

  /** Run the two-step `SOUL` exchange, signing the challenge with the soul key. */
  async authenticate(): Promise<string> {
    const soul = this.requireSoul();
    const [challenge = ''] = await this.expect(`SOUL ${soul.id}`, single('CHALLENGE'));
    const nonce = challenge.split(' ')[2] ?? '';
    const proof = await signAs(soul, authSigningString(soul.id, nonce));
    await this.expect(`SOUL ${soul.id} ${proof}`, single('AUTH_OK'));
    this.authenticatedAs = soul.id;
    this.emit('authenticated', { soulId: soul.id });
    return soul.id;
  }

  /** Leave the relay. No reconnect follows. */
  quit(reason?: string): void {
    this.stopping = true;
    this.cancelReconnect();
    if (this.connection) {
      this.send(reason ? `QUIT :${reason}` : 'QUIT');
      this.connection.close();
    }
  }

  /** Drop the connection without a QUIT. No reconnect follows. */
  close(): void {
    this.stopping = true;
    this.cancelReconnect();
    this.connection?.close();
  }

  // ── Chat ────────────────────────────────────────────────────────────────

  setNick(nick: string): void {
    this.nick = nick;
    this.send(`NICK ${nick}`);
  }

  join(channel: string): void {
    this.channels.add(channel);
    this.send(`JOIN ${channel}`);
  }

  part(channel: string, reason?: string): void {
    this.channels.delete(channel);
    this.send(reason ? `PART ${channel} :${reason}` : `PART ${channel}`);
  }

  /**
   * Send a message to a channel or nick, optionally signed. A local
   * signature travels as a trailing `[Sig:<hex>]` tag; a hosted one is
   * attached by the relay.
   */
  async say(target: string, text: string, options: SayOptions = {}): Promise<void> {
    const mode = options.sign === true ? 'local' : options.sign || undefined;
    switch (mode) {
      case 'local': {
        const signature = await signAs(this.requireSoul(), text);
        this.send(`PRIVMSG ${target} :${withSignature(text, signature)}`);
        return;
      }
      case 'hosted':
        await this.expect(`SIGN :${text}`, single('SIGNATURE'));
        this.send(`PRIVMSG ${target} :${text}`);
        return;
      case undefined:
        this.send(`PRIVMSG ${target} :${text}`);
        return;
    }
  }

  /** Round trip to the relay. */
  async ping(token: string = String(Date.now())): Promise<void> {
    await this.expect(`PING ${token}`, single('PONG'));
  }

  // ── Marketplace ─────────────────────────────────────────────────────────

  /** Publish an offer. Resolves with the listing id. */
  offer(category: string, price: number | string): Promise<string> {
    return this.place('OFFER', category, price);
  }

  /** Publish a request. Resolves with the listing id. */
  request(category: string, price: number | string): Promise<string> {
    return this.place('REQUEST', category, price);
  }

  async list(category?: string): Promise<ListingSummary[]> {
    const lines = await this.expect(category ? `SERVICE LIST ${category}` : 'SERVICE LIST', listing);
    const listings: ListingSummary[] = [];
    for (const line of lines) {
      const parsed = parseListing(line);
      if (parsed) listings.push(parsed);
    }
    return listings;
  }

  async cancel(listingId: string): Promise<void> {
    await this.expect(`SERVICE CANCEL ${listingId}`, single('CANCELLED'));
  }

  /**
   * Accept a proposed trade. With a soul key the settlement endorsement is
   * signed locally from the `TRADE_PROPOSED` notice; with `hosted` the relay
   * signs with the key it holds. Resolves with the trade's new status.
   */
  async accept(tradeId: string, options: { hosted?: boolean } = {}): Promise<TradeStatus> {
    let line = `SERVICE ACCEPT ${tradeId}`;
    if (!options.hosted) {
      const soul = this.requireSoul();
      const proposal = this.proposals.get(tradeId);
      if (!proposal) {
        throw new SoulRelayError(SoulRelayErrorCode.TRADE_NOT_FOUND, `No proposal seen for trade ${tradeId}`, {
          hint: 'Accept trades after their TRADE_PROPOSED notice, or pass { hosted: true }.',
        });
      }
      const trade = {
        id: tradeId,
        credit: proposal.credit,
        seekerId: proposal.role === 'seeker' ? soul.id : proposal.counterparty,
        providerId: proposal.role === 'provider' ? soul.id : proposal.counterparty,
      };
      line += ` ${await signAs(soul, settlementPayload(trade, proposal.role))}`;
    }
    const [reply = ''] = await this.expect(line, single('ACCEPTED'));
    return toTradeStatus(reply.split(' ')[2]);
  }

  /** Score of `soulId`, or of the authenticated soul. */
  async reputation(soulId?: string): Promise<number> {
    const [reply = ''] = await this.expect(soulId ? `REPUTATION ${soulId}` : 'REPUTATION', single('SCORE'));
    return Number(reply.split(' ')[2]);
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private async place(kind: 'OFFER' | 'REQUEST', category: string, price: number | string): Promise<string> {
    const amount = typeof price === 'number' ? formatPrice(price) : price;
    const [reply = ''] = await this.expect(`SERVICE ${kind} ${category} ${amount}`, single('LISTED'));
    return reply.split(' ')[1] ?? '';
  }

  private expect(line: string, progress: (line: string) => Progress): Promise<string[]> {
    return new Promise<string[]>((resolve, reject) => {
      this.send(line);
      const entry: PendingReply = {
        command: line.split(' ').slice(0, line.startsWith('SERVICE ') ? 2 : 1).join(' '),
        progress,
        lines: [],
        resolve,
        reject,
        abandoned: false,
        timer: setTimeout(() => {
          entry.abandoned = true;
          reject(
            new SoulRelayError(SoulRelayErrorCode.REPLY_TIMEOUT, `No reply to ${entry.command} within ${this.replyTimeoutMs}ms`),
          );
        }, this.replyTimeoutMs),
      };
      entry.timer.unref();
      this.pending.push(entry);
    });
  }

  /**
   * @throws {SoulRelayError} NOT_CONNECTED without an open connection.
   */
  private send(line: string): void {
    if (!this.connection) {
      throw new SoulRelayError(SoulRelayErrorCode.NOT_CONNECTED, 'Not connected', {
        hint: 'Call connect() first.',
      });
    }
    this.connection.send(line);
  }

  private requireSoul(): ClientSoul {
    if (!this.soul) {
      throw new SoulRelayError(SoulRelayErrorCode.NOT_AUTHENTICATED, 'This client has no soul to sign with');
    }
    return this.soul;
  }

  private attach(connection: LineConnection): void {
    const onLine = (line: string): void => this.receive(line);
    const onClose = ({ error }: LineConnectionEvents['close']): void => this.dropped(error);
    connection.on('line', onLine);
    connection.on('close', onClose);
    this.connection = connection;
    this.detach = () => {
      connection.off('line', onLine);
      connection.off('close', onClose);
    };
  }

  private receive(line: string): void {
    if (line.startsWith(':')) {
      this.relayed(line);
      return;
    }

    const [verb = '', subject] = line.split(' ');
    switch (verb) {
      case 'PING':
        this.send(subject ? `PONG ${subject}` : 'PONG');
        return;
      case 'TRADE_PROPOSED': {
        // Notices are never replies, parsed or not.
        const proposal = parseTradeProposed(line);
        if (!proposal) {
          this.logger.warn('malformed notice', { line });
          return;
        }
        this.proposals.set(proposal.tradeId, proposal);
        this.emit('trade:proposed', proposal);
        return;
      }
      case 'TRADE_SETTLED':
      case 'TRADE_ABORTED':
        if (!subject) {
          this.logger.warn('malformed notice', { line });
          return;
        }
        this.proposals.delete(subject);
        this.emit(verb === 'TRADE_SETTLED' ? 'trade:settled' : 'trade:aborted', { tradeId: subject });
        return;
      case 'LISTING_EXPIRED':
        if (!subject) {
          this.logger.warn('malformed notice', { line });
          return;
        }
        this.emit('listing:expired', { listingId: subject });
        return;
    }

    if (RELAY_ERRORS.has(verb) || (verb.startsWith('ERR_') && subject !== undefined && RELAY_VERBS.has(subject))) {
      this.emit('relay:error', { reply: line });
      return;
    }
    this.reply(line);
  }

  private reply(line: string): void {
    const head = this.pending[0];
    if (!head) {
      this.logger.warn('unsolicited reply', { line });
      if (line.startsWith('ERR_')) this.emit('relay:error', { reply: line });
      return;
    }

    if (line.startsWith('ERR_')) {
      this.pending.shift();
      this.settle(head, () =>
        head.reject(
          new SoulRelayError(SoulRelayErrorCode.SERVER_REJECTED, `${head.command} failed: ${line}`, {
            context: { reply: line },
          }),
        ),
      );
      return;
    }

    const progress = head.progress(line);
    if (progress === undefined) {
      this.logger.warn('unexpected reply', { command: head.command, line });
      return;
    }
    head.lines.push(line);
    if (progress === 'done') {
      this.pending.shift();
      this.settle(head, () => head.resolve(head.lines));
    }
  }

  private settle(entry: PendingReply, outcome: () => void): void {
    clearTimeout(entry.timer);
    if (!entry.abandoned) outcome();
  }

  private relayed(line: string): void {
    const relayed = parseRelayLine(line);
    if (!relayed) return;
    const { sender } = relayed;
    switch (relayed.command) {
      case 'PRIVMSG': {
        const message = toChatMessage(relayed);
        if (message) this.emit('message', message);
        return;
      }
      case 'JOIN':
        this.emit('join', {
          channel: relayed.target ?? '',
          nick: sender.nick,
          ...(sender.soulId ? { soulId: sender.soulId } : {}),
        });
        return;
      case 'PART':
        this.emit('part', {
          channel: relayed.target ?? '',
          nick: sender.nick,
          ...(relayed.text ? { reason: relayed.text } : {}),
        });
        return;
      case 'QUIT':
        this.emit('quit', { nick: sender.nick, ...(relayed.text ? { reason: relayed.text } : {}) });
        return;
    }
  }

  private dropped(error: Error | undefined): void {
    this.detach?.();
    this.detach = undefined;
    this.connection = undefined;
    this.authenticatedAs = undefined;

    for (const entry of this.pending.splice(0)) {
      this.settle(entry, () =>
        entry.reject(new SoulRelayError(SoulRelayErrorCode.NOT_CONNECTED, `Connection closed before ${entry.command} was answered`)),
      );
    }

    const willReconnect = !this.stopping && this.reconnectDelayMs > 0;
    this.logger.info('disconnected', { error: error ? String(error) : undefined, willReconnect });
    this.emit('disconnect', error ? { error, willReconnect } : { willReconnect });
    if (willReconnect) this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    this.cancelReconnect();
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.connect().catch((error: unknown) => {
        this.logger.warn('reconnect failed', { error: String(error) });
        this.connection?.close();
        if (!this.connection && !this.stopping) this.scheduleReconnect();
      });
    }, this.reconnectDelayMs);
  }

  private cancelReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }
}

const TRADE_STATUSES: readonly TradeStatus[] = [
  'PROPOSED',
  'ACCEPTED_BY_SEEKER',
  'ACCEPTED_BY_PROVIDER',
  'SETTLED',
  'ABORTED',
];

function toTradeStatus(value: string | undefined): TradeStatus {
  const status = TRADE_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new SoulRelayError(SoulRelayErrorCode.SERVER_REJECTED, `Unrecognised trade status ${String(value)}`);
  }
  return status;
}
