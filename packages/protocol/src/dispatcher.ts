/**
 * The command dispatcher: the only component that knows wire syntax.
 *
 * Each inbound line is parsed, checked against the session's rate limit
 * and routed to the authenticator, the signer, the reputation ledger or
 * the marketplace. Plain chat commands go to the {@link RelayTransport}.
 * Lines from one session are handled strictly in arrival order, so its
 * replies come back in the order it sent commands. Every failure becomes
 * a reply line; nothing a peer sends can close its connection.
 *
 * @packageDocumentation
 */

import type { SoulAuthenticator } from '@soulrelay/auth';
import type { IdentityRegistry } from '@soulrelay/identity';
import {
  DEFAULT_MAX_PRICE,
  assertCategory,
  parsePrice,
  settlementPayload,
  soulForRole,
} from '@soulrelay/marketplace';
import type { Marketplace, MarketplaceEvents, ServiceListing, Trade, TradeRole } from '@soulrelay/marketplace';
import type { ReputationLedger } from '@soulrelay/reputation';
import type { SignatureService } from '@soulrelay/signing';
import { KeyedMutex } from '@soulrelay/store';
import { SoulRelayError, SoulRelayErrorCode, assertNever, isSoulRelayError, silentLogger } from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

import { parseCommand } from './parser';
import { SlidingWindowRateLimiter } from './rate-limiter';
import {
  ERR_INTERNAL,
  WIRE_ERRORS,
  acceptedReply,
  authOkReply,
  cancelledReply,
  challengeReply,
  endListReply,
  errorReply,
  listedReply,
  listingExpiredNotice,
  listingReply,
  pongReply,
  scoreReply,
  signatureReply,
  tradeAbortedNotice,
  tradeProposedNotice,
  tradeSettledNotice,
} from './replies';
import type { ClientSession, Command, ListingVisibility, RelayTransport } from './types';

export const DEFAULT_COMMANDS_PER_MINUTE = 120;

export interface DispatcherOptions<S extends ClientSession> {
  registry: IdentityRegistry;
  authenticator: SoulAuthenticator<S>;
  signatures: SignatureService;
  ledger: ReputationLedger;
  marketplace: Marketplace;
  /** Receives NICK, JOIN, PART, PRIVMSG and QUIT. Without one those verbs are unknown. */
  relay?: RelayTransport<S>;
  /** Defaults to `'tagged'`. */
  listingVisibility?: ListingVisibility;
  /** Per-session sliding one-minute window; 0 disables. */
  commandsPerMinute?: number;
  maxPrice?: number;
  logger?: Logger;
}

type Unsubscribe = () => void;

const ROLES: readonly TradeRole[] = ['seeker', 'provider'];

export class Dispatcher<S extends ClientSession = ClientSession> {
  private readonly registry: IdentityRegistry;
  private readonly authenticator: SoulAuthenticator<S>;
  private readonly signatures: SignatureService;
  private readonly ledger: ReputationLedger;
  private readonly marketplace: Marketplace;
  private readonly relay: RelayTransport<S> | undefined;
  private readonly visibility: ListingVisibility;
  private readonly maxPrice: number;
  private readonly limiter: SlidingWindowRateLimiter;
  private readonly logger: Logger;
  private readonly sessionLocks = new KeyedMutex();
  private readonly subscriptions: Unsubscribe[] = [];

  constructor(options: DispatcherOptions<S>) {
    this.registry = options.registry;
    this.authenticator = options.authenticator;
    this.signatures = options.signatures;
    this.ledger = options.ledger;
    this.marketplace = options.marketplace;
    this.relay = options.relay;
    this.visibility = options.listingVisibility ?? 'tagged';
    this.maxPrice = options.maxPrice ?? DEFAULT_MAX_PRICE;
    this.limiter = new SlidingWindowRateLimiter(options.commandsPerMinute ?? DEFAULT_COMMANDS_PER_MINUTE);
    this.logger = (options.logger ?? silentLogger).child('dispatcher');

    this.subscribe('trade:aborted', ({ trade }) => {
      this.notifyParties(trade, () => tradeAbortedNotice(trade));
    });
    this.subscribe('listing:closed', ({ listing, reason }) => {
      if (reason === 'expired') {
        this.notifyOwner(listing, listingExpiredNotice(listing));
      }
    });
  }

  /**
   * Handle one inbound line from `session`. Resolves once every reply
   * line has been sent.
   */
  async handle(session: S, line: string): Promise<void> {
    await this.sessionLocks.run(session.id, async () => {
      if (this.limiter.isLimited(session.id)) {
        this.logger.warn('command rate exceeded', { sessionId: session.id });
        session.send(errorReply(SoulRelayErrorCode.RATE_LIMITED));
        return;
      }

      const parsed = parseCommand(line);
      if (!parsed.ok) {
        const code =
          parsed.error.reason === 'syntax' ? SoulRelayErrorCode.SYNTAX_ERROR : SoulRelayErrorCode.UNKNOWN_COMMAND;
        session.send(errorReply(code, parsed.error.command));
        return;
      }

      try {
        await this.execute(session, parsed.value);
      } catch (error) {
        this.replyWithError(session, parsed.value, error);
      }
    });
  }

  /**
   * Forget a closed session: its challenge, its soul binding and its OPEN
   * listings. Trades it is party to run on to their deadline.
   */
  async disconnect(session: S): Promise<void> {
    this.authenticator.discard(session);
    this.limiter.forget(session.id);
    await this.marketplace.releaseSession(session.id);
  }

  /** Stop listening to marketplace events. */
  dispose(): void {
    for (const unsubscribe of this.subscriptions.splice(0)) {
      unsubscribe();
    }
  }

  // ── Routing ─────────────────────────────────────────────────────────────

  private async execute(session: S, command: Command): Promise<void> {
    switch (command.kind) {
      case 'soul':
        return this.soul(session, command.soulId, command.signature);
      case 'sign':
        return this.sign(session, command.payload);
      case 'service.list':
        return this.listListings(session, command.category);
      case 'service.place':
        return this.place(session, command);
      case 'service.cancel': {
        this.requireSoul(session);
        const listing = await this.marketplace.cancel(session, command.listingId);
        session.send(cancelledReply(listing));
        return;
      }
      case 'service.accept':
        return this.accept(session, command.tradeId, command.signature);
      case 'reputation': {
        const own = this.requireSoul(session);
        const soulId = command.soulId ?? own;
        this.registry.require(soulId);
        session.send(scoreReply(soulId, this.ledger.scoreOf(soulId)));
        return;
      }
      case 'ping':
        session.send(pongReply(command.token));
        return;
      case 'pong':
        return;
      case 'nick':
        this.requireRelay('NICK').setNick(session, command.nick);
        return;
      case 'join':
        this.requireRelay('JOIN').join(session, command.channel);
        return;
      case 'part':
        this.requireRelay('PART').part(session, command.channel, command.reason);
        return;
      case 'privmsg':
        this.requireRelay('PRIVMSG').privmsg(session, command.target, command.text);
        return;
      case 'quit':
        this.requireRelay('QUIT').quit(session, command.reason);
        return;
      default:
        return assertNever(command);
    }
  }

  // ── Handlers ────────────────────────────────────────────────────────────

  private async soul(session: S, soulId: string, signature: string | undefined): Promise<void> {
    if (signature === undefined) {
      const challenge = this.authenticator.beginAuth(session, soulId);
      session.send(challengeReply(challenge));
      return;
    }

    // The response answers the session's outstanding challenge, which must be for this soul.
    const pending = this.authenticator.pendingChallenge(session.id);
    if (!pending || pending.soulId !== soulId) {
      session.send(errorReply(SoulRelayErrorCode.CHALLENGE_EXPIRED));
      return;
    }

    const result = await this.authenticator.respond(session, pending.id, signature);
    switch (result.status) {
      case 'AUTHENTICATED':
        if (result.replaced) {
          await this.marketplace.releaseSession(session.id);
        }
        session.send(authOkReply(result.soul.id, result.replaced));
        return;
      case 'AUTH_FAILED':
        session.send(errorReply(SoulRelayErrorCode.AUTH_FAILED));
        return;
      case 'CHALLENGE_EXPIRED':
        session.send(errorReply(SoulRelayErrorCode.CHALLENGE_EXPIRED));
        return;
    }
  }

  private async sign(session: S, payload: string): Promise<void> {
    const soulId = this.requireSoul(session);
    const signature = await this.signatures.signHosted(soulId, payload);
    session.pendingSignature = signature;
    session.send(signatureReply(signature));
  }

  private listListings(session: S, category: string | undefined): void {
    this.requireSoul(session);
    if (category !== undefined) {
      assertCategory(category);
    }
    const listings = this.marketplace.openListings(category);
    for (const listing of listings) {
      session.send(listingReply(listing, this.visibility));
    }
    session.send(endListReply(listings.length));
  }

  private async place(session: S, command: Extract<Command, { kind: 'service.place' }>): Promise<void> {
    this.requireSoul(session);
    assertCategory(command.category);
    const price = parsePrice(command.price, this.maxPrice);
    const { listing, trade } = await this.marketplace.list(session, command.listingKind, command.category, price);
    session.send(listedReply(listing));
    if (trade) {
      this.notifyParties(trade, (role) => tradeProposedNotice(trade, role));
    }
  }

  private async accept(session: S, tradeId: string, signature: string | undefined): Promise<void> {
    const soulId = this.requireSoul(session);
    const proof = signature ?? (await this.hostedAcceptance(soulId, tradeId));
    const { trade } = await this.marketplace.accept(session, tradeId, proof);
    session.send(acceptedReply(trade));
    if (trade.status === 'SETTLED') {
      this.notifyParties(trade, () => tradeSettledNotice(trade));
    }
  }

  /** Sign a party's settlement endorsement with its hosted key. */
  private async hostedAcceptance(soulId: string, tradeId: string): Promise<string> {
    const trade = await this.marketplace.getTrade(tradeId);
    if (!trade) {
      throw new SoulRelayError(SoulRelayErrorCode.TRADE_NOT_FOUND, `Trade ${tradeId} does not exist`);
    }
    const role = ROLES.find((r) => soulForRole(trade, r) === soulId);
    if (!role) {
      throw new SoulRelayError(SoulRelayErrorCode.NOT_PARTY, `Soul ${soulId} is not a party to trade ${tradeId}`);
    }
    if (!(await this.signatures.hasHostedKey(soulId))) {
      throw new SoulRelayError(
        SoulRelayErrorCode.SIGNATURE_REQUIRED,
        `No signature supplied and no hosted key for ${soulId}`,
        { hint: 'Append your signature over the settlement endorsement.' },
      );
    }
    return this.signatures.signHosted(soulId, settlementPayload(trade, role));
  }

  // ── Helpers ─────────────────────────────────────────────────────────────

  private requireSoul(session: S): string {
    if (!session.soul) {
      throw new SoulRelayError(SoulRelayErrorCode.NOT_AUTHENTICATED, 'Session is not authenticated');
    }
    return session.soul.id;
  }

  private requireRelay(verb: string): RelayTransport<S> {
    if (!this.relay) {
      throw new SoulRelayError(SoulRelayErrorCode.UNKNOWN_COMMAND, `No relay handles ${verb}`, {
        context: { verb },
      });
    }
    return this.relay;
  }

  private replyWithError(session: S, command: Command, error: unknown): void {
    if (isSoulRelayError(error)) {
      const wire = WIRE_ERRORS[error.code];
      if (wire === ERR_INTERNAL) {
        this.logger.error('command failed', { sessionId: session.id, command: command.kind, error: error.toJSON() });
      } else {
        this.logger.debug('command rejected', { sessionId: session.id, command: command.kind, code: error.code });
      }
      const verb = error.context?.verb;
      session.send(errorReply(error.code, typeof verb === 'string' ? verb : undefined));
      return;
    }
    this.logger.error('command failed', { sessionId: session.id, command: command.kind, error: String(error) });
    session.send(ERR_INTERNAL);
  }

  private notifyParties(trade: Trade, line: (role: TradeRole) => string): void {
    for (const role of ROLES) {
      for (const target of this.authenticator.sessionsOf(soulForRole(trade, role))) {
        target.send(line(role));
      }
    }
  }

  private notifyOwner(listing: ServiceListing, line: string): void {
    for (const target of this.authenticator.sessionsOf(listing.soulId)) {
      if (target.id === listing.sessionId) {
        target.send(line);
      }
    }
  }

  private subscribe<K extends keyof MarketplaceEvents>(
    event: K,
    listener: (data: MarketplaceEvents[K]) => void,
  ): void {
    this.marketplace.on(event, listener);
    this.subscriptions.push(() => {
      this.marketplace.off(event, listener);
    });
  }
}
