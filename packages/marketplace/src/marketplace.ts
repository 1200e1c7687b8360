/**
 * The service marketplace: per-category order books, price-compatible
 * matching, and the two-party acceptance handshake that settles a trade.
 *
 * Matching for one category runs under that category's lock, so two new
 * listings can never both claim the same resting counterpart. Each trade
 * has its own lock for acceptances and its deadline. Listing TTLs and trade
 * deadlines are per-entry timers.
 *
 * @packageDocumentation
 */

import type { Session } from '@soulrelay/auth';
import { generateId, timestamp } from '@soulrelay/crypto';
import type { ReputationLedger, ReputationEvent } from '@soulrelay/reputation';
import type { SignatureService } from '@soulrelay/signing';
import { KeyedMutex, MemoryStore } from '@soulrelay/store';
import type { RecordStore } from '@soulrelay/store';
import { SoulRelayError, SoulRelayErrorCode, TypedEventEmitter, silentLogger } from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

import { priceTime } from './comparators';
import { OrderBook } from './order-book';
import { counterpartyRole, settlementEndorsement, settlementPayload, soulForRole } from './settlement';
import type {
  AcceptResult,
  Acceptance,
  ListResult,
  ListingCloseReason,
  ListingComparator,
  ListingKind,
  ListingStatus,
  MarketplaceEvents,
  SequenceRecord,
  ServiceListing,
  Trade,
  TradeRole,
} from './types';
import { DEFAULT_MAX_PRICE, assertCategory, assertPrice } from './validation';

export const DEFAULT_LISTING_TTL_MS = 60 * 60 * 1000;
export const DEFAULT_TRADE_DEADLINE_MS = 5 * 60 * 1000;
export const DEFAULT_MAX_OPEN_LISTINGS = 20;
export const DEFAULT_SETTLEMENT_CREDIT = 1;

export interface MarketplaceOptions {
  ledger: ReputationLedger;
  signatures: SignatureService;
  /** Whether the soul currently has a live authenticated session. */
  isAuthenticated: (soulId: string) => boolean;
  listings?: RecordStore<ServiceListing>;
  trades?: RecordStore<Trade>;
  sequences?: RecordStore<SequenceRecord>;
  /** Priority among compatible resting listings. Defaults to {@link priceTime}. */
  comparator?: ListingComparator;
  listingTtlMs?: number;
  tradeDeadlineMs?: number;
  maxOpenListingsPerSoul?: number;
  maxPrice?: number;
  settlementCredit?: number;
  logger?: Logger;
}

/** Counts from {@link Marketplace.load}. */
export interface MarketplaceLoadSummary {
  listings: number;
  trades: number;
  /** Listings cancelled because their sessions did not survive the restart. */
  cancelledListings: number;
  /** Trades aborted because their deadline passed while the relay was down. */
  abortedTrades: number;
  /** Unfinished trades restored with their remaining deadline. */
  restoredTrades: number;
}

function isTerminal(trade: Trade): boolean {
  return trade.status === 'SETTLED' || trade.status === 'ABORTED';
}

const categoryKey = (category: string): string => `category:${category}`;
const tradeKey = (tradeId: string): string => `trade:${tradeId}`;
const sequenceKey = (category: string): string => `sequence:${category}`;

export class Marketplace extends TypedEventEmitter<MarketplaceEvents> {
  private readonly ledger: ReputationLedger;
  private readonly signatures: SignatureService;
  private readonly isAuthenticated: (soulId: string) => boolean;
  private readonly listingStore: RecordStore<ServiceListing>;
  private readonly tradeStore: RecordStore<Trade>;
  private readonly sequenceStore: RecordStore<SequenceRecord>;
  private readonly comparator: ListingComparator;
  private readonly listingTtlMs: number;
  private readonly tradeDeadlineMs: number;
  private readonly maxOpenListings: number;
  private readonly maxPrice: number;
  private readonly settlementCredit: number;
  private readonly logger: Logger;
  private readonly locks = new KeyedMutex();

  private readonly books = new Map<string, OrderBook>();
  /** OPEN and MATCHED listings; terminal ones live only in the store. */
  private readonly live = new Map<string, ServiceListing>();
  /** Trades that are not yet terminal. */
  private readonly trades = new Map<string, Trade>();
  private readonly sequences = new Map<string, number>();
  private readonly openBySoul = new Map<string, number>();
  private readonly reservedBySoul = new Map<string, number>();
  /** sessionId → category → listings being placed */
  private readonly inflight = new Map<string, Map<string, number>>();
  private readonly listingTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly tradeTimers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(options: MarketplaceOptions) {
    const logger = (options.logger ?? silentLogger).child('marketplace');
    super((event, error) => logger.error('listener failed', { event: String(event), error: String(error) }));
    this.ledger = options.ledger;
    this.signatures = options.signatures;
    this.isAuthenticated = options.isAuthenticated;
    this.listingStore = options.listings ?? new MemoryStore<ServiceListing>();
    this.tradeStore = options.trades ?? new MemoryStore<Trade>();
    this.sequenceStore = options.sequences ?? new MemoryStore<SequenceRecord>();
    this.comparator = options.comparator ?? priceTime;
    this.listingTtlMs = options.listingTtlMs ?? DEFAULT_LISTING_TTL_MS;
    this.tradeDeadlineMs = options.tradeDeadlineMs ?? DEFAULT_TRADE_DEADLINE_MS;
    this.maxOpenListings = options.maxOpenListingsPerSoul ?? DEFAULT_MAX_OPEN_LISTINGS;
    this.maxPrice = options.maxPrice ?? DEFAULT_MAX_PRICE;
    this.settlementCredit = options.settlementCredit ?? DEFAULT_SETTLEMENT_CREDIT;
    this.logger = logger;
  }

  // ── Start-up ────────────────────────────────────────────────────────────

  /**
   * Restore sequence counters and trades still inside their deadline, with
   * their recorded acceptances and MATCHED listings. Sessions are gone, so
   * OPEN listings are cancelled; trades past their deadline are aborted.
   */
  async load(): Promise<MarketplaceLoadSummary> {
    for (const record of await this.sequenceStore.list()) {
      if (record.id.startsWith('sequence:')) {
        this.sequences.set(record.id.slice('sequence:'.length), record.value);
      }
    }

    const nowMs = Date.now();
    const now = new Date(nowMs).toISOString();
    const trades = await this.tradeStore.list();
    const restored: Trade[] = [];
    const expired = new Set<string>();
    for (const trade of trades) {
      if (isTerminal(trade)) continue;
      if (Date.parse(trade.deadline) > nowMs) {
        restored.push(trade);
      } else {
        await this.tradeStore.put({ ...trade, status: 'ABORTED' });
        expired.add(trade.id);
      }
    }
    const live = new Set(restored.map((trade) => trade.id));

    const listings = await this.listingStore.list();
    let cancelledListings = 0;
    for (const listing of listings) {
      if (listing.status === 'MATCHED' && listing.tradeId !== undefined && live.has(listing.tradeId)) {
        this.live.set(listing.id, listing);
        continue;
      }
      const stranded =
        listing.status === 'OPEN' ||
        (listing.status === 'MATCHED' && (listing.tradeId === undefined || expired.has(listing.tradeId)));
      if (stranded) {
        await this.listingStore.put({ ...listing, status: 'CANCELLED', closedAt: now });
        cancelledListings++;
      }
    }

    for (const trade of restored) {
      this.trades.set(trade.id, trade);
      this.startTradeTimer(trade, Date.parse(trade.deadline) - nowMs);
    }

    const summary = {
      listings: listings.length,
      trades: trades.length,
      cancelledListings,
      abortedTrades: expired.size,
      restoredTrades: restored.length,
    };
    this.logger.info('marketplace loaded', { ...summary });
    return summary;
  }

  // ── Listing ─────────────────────────────────────────────────────────────

  /**
   * Place an offer or request for the session's soul and match it against
   * the category's resting listings.
   *
   * @throws {SoulRelayError} NOT_AUTHENTICATED, INVALID_CATEGORY,
   *   INVALID_PRICE or LISTING_LIMIT.
   */
  async list(session: Session, kind: ListingKind, category: string, price: number): Promise<ListResult> {
    const soulId = this.requireSoul(session);
    assertCategory(category);
    assertPrice(price, this.maxPrice);
    this.reserveSlot(soulId);
    this.trackInflight(session.id, category, 1);
    try {
      return await this.locks.run(categoryKey(category), () =>
        this.place(session.id, soulId, kind, category, price),
      );
    } finally {
      this.adjust(this.reservedBySoul, soulId, -1);
      this.trackInflight(session.id, category, -1);
    }
  }

  /**
   * Withdraw an OPEN listing.
   *
   * @throws {SoulRelayError} LISTING_NOT_FOUND, NOT_OWNER or LISTING_NOT_OPEN.
   */
  async cancel(session: Session, listingId: string): Promise<ServiceListing> {
    const soulId = this.requireSoul(session);
    const listing = await this.findListing(listingId);
    if (!listing) {
      throw new SoulRelayError(SoulRelayErrorCode.LISTING_NOT_FOUND, `Listing ${listingId} does not exist`);
    }
    if (listing.soulId !== soulId) {
      throw new SoulRelayError(SoulRelayErrorCode.NOT_OWNER, `Listing ${listingId} belongs to another soul`);
    }
    return this.locks.run(categoryKey(listing.category), async () => {
      const current = this.live.get(listingId);
      if (!current || current.status !== 'OPEN') {
        throw new SoulRelayError(
          SoulRelayErrorCode.LISTING_NOT_OPEN,
          `Listing ${listingId} is ${current?.status ?? listing.status}`,
        );
      }
      return this.close(current, 'CANCELLED', 'cancelled');
    });
  }

  /**
   * Cancel every OPEN listing of a disconnected session, including any the
   * session was still placing. Returns the cancelled listings.
   */
  async releaseSession(sessionId: string): Promise<ServiceListing[]> {
    const categories = new Set<string>();
    for (const listing of this.live.values()) {
      if (listing.sessionId === sessionId && listing.status === 'OPEN') {
        categories.add(listing.category);
      }
    }
    for (const category of this.inflight.get(sessionId)?.keys() ?? []) {
      categories.add(category);
    }

    const closed: ServiceListing[] = [];
    for (const category of categories) {
      await this.locks.run(categoryKey(category), async () => {
        for (const listing of this.book(category).listings()) {
          if (listing.sessionId === sessionId) {
            closed.push(await this.close(listing, 'CANCELLED', 'released'));
          }
        }
      });
    }
    if (closed.length > 0) {
      this.logger.info('session listings released', { sessionId, cancelled: closed.length });
    }
    return closed;
  }

  // ── Trades ──────────────────────────────────────────────────────────────

  /**
   * Record the session's acceptance of a trade. `signature` is the party's
   * signature over its settlement endorsement ({@link settlementPayload}).
   * When both parties have accepted the trade settles and both
   * endorsements go to the reputation ledger.
   *
   * @throws {SoulRelayError} TRADE_NOT_FOUND, TRADE_CLOSED, NOT_PARTY,
   *   ALREADY_ACCEPTED, INVALID_SIGNATURE, COUNTERPARTY_OFFLINE or
   *   REPUTATION_INVALID_EVENT.
   */
  async accept(session: Session, tradeId: string, signature: string): Promise<AcceptResult> {
    const soulId = this.requireSoul(session);
    return this.locks.run(tradeKey(tradeId), async () => {
      const trade = this.trades.get(tradeId) ?? (await this.tradeStore.get(tradeId));
      if (!trade) {
        throw new SoulRelayError(SoulRelayErrorCode.TRADE_NOT_FOUND, `Trade ${tradeId} does not exist`);
      }
      if (isTerminal(trade)) {
        throw new SoulRelayError(SoulRelayErrorCode.TRADE_CLOSED, `Trade ${tradeId} is ${trade.status}`);
      }
      const role = this.roleOf(trade, soulId);
      if (!role) {
        throw new SoulRelayError(SoulRelayErrorCode.NOT_PARTY, `Soul ${soulId} is not a party to trade ${tradeId}`);
      }
      if (trade.acceptances[role]) {
        throw new SoulRelayError(SoulRelayErrorCode.ALREADY_ACCEPTED, `Trade ${tradeId} already accepted as ${role}`);
      }
      const valid = await this.signatures.verify(soulId, settlementPayload(trade, role), signature);
      if (!valid) {
        throw new SoulRelayError(
          SoulRelayErrorCode.INVALID_SIGNATURE,
          `Acceptance signature for trade ${tradeId} does not verify`,
          { hint: 'Sign the settlement endorsement for your role with your soul key.' },
        );
      }

      const acceptances = { ...trade.acceptances };
      acceptances[role] = { signature, acceptedAt: timestamp() };
      const other = counterpartyRole(role);

      if (!trade.acceptances[other]) {
        const accepted: Trade = {
          ...trade,
          status: role === 'seeker' ? 'ACCEPTED_BY_SEEKER' : 'ACCEPTED_BY_PROVIDER',
          acceptances,
        };
        await this.tradeStore.put(accepted);
        this.trades.set(tradeId, accepted);
        this.logger.info('trade accepted', { tradeId, role, soulId });
        this.emit('trade:accepted', { trade: accepted, role });
        return { trade: accepted, role };
      }

      const counterparty = soulForRole(trade, other);
      if (!this.isAuthenticated(counterparty)) {
        throw new SoulRelayError(
          SoulRelayErrorCode.COUNTERPARTY_OFFLINE,
          `Counterparty ${counterparty} is not connected; trade ${tradeId} cannot settle now`,
          { hint: 'Retry once the counterparty has re-authenticated, before the deadline.' },
        );
      }
      return { trade: await this.settle(trade, acceptances), role };
    });
  }

  /** A trade by id, whether live or archived. */
  async getTrade(tradeId: string): Promise<Trade | undefined> {
    return this.trades.get(tradeId) ?? this.tradeStore.get(tradeId);
  }

  /** A listing by id, whether live or archived. */
  async findListing(listingId: string): Promise<ServiceListing | undefined> {
    return this.live.get(listingId) ?? this.listingStore.get(listingId);
  }

  /** OPEN listings, by category then arrival order. */
  openListings(category?: string): ServiceListing[] {
    const categories = category !== undefined ? [category] : Array.from(this.books.keys()).sort();
    const out: ServiceListing[] = [];
    for (const c of categories) {
      const book = this.books.get(c);
      if (book) out.push(...book.listings());
    }
    return out;
  }

  /** Number of OPEN listings the soul holds. */
  openCountFor(soulId: string): number {
    return this.openBySoul.get(soulId) ?? 0;
  }

  /** Trades that have not settled or aborted. */
  activeTrades(): Trade[] {
    return Array.from(this.trades.values());
  }

  /** Cancel every timer. State is already persisted. */
  shutdown(): void {
    for (const timer of this.listingTimers.values()) clearTimeout(timer);
    for (const timer of this.tradeTimers.values()) clearTimeout(timer);
    this.listingTimers.clear();
    this.tradeTimers.clear();
  }

  // ── Internals ───────────────────────────────────────────────────────────

  private async place(
    sessionId: string,
    soulId: string,
    kind: ListingKind,
    category: string,
    price: number,
  ): Promise<ListResult> {
    const sequence = await this.nextSequence(category);
    const now = Date.now();
    const listing: ServiceListing = {
      id: generateId(),
      kind,
      category,
      price,
      soulId,
      sessionId,
      sequence,
      status: 'OPEN',
      createdAt: new Date(now).toISOString(),
      expiresAt: new Date(now + this.listingTtlMs).toISOString(),
    };
    const book = this.book(category);
    const resting = book.bestMatch(listing, this.comparator);

    if (!resting) {
      await this.listingStore.put(listing);
      book.add(listing);
      this.live.set(listing.id, listing);
      this.adjust(this.openBySoul, soulId, 1);
      this.startListingTimer(listing);
      this.logger.info('listing opened', { listingId: listing.id, kind, category, price, soulId, sequence });
      this.emit('listing:created', { listing });
      return { listing };
    }

    const tradeId = generateId();
    const closedAt = new Date(now).toISOString();
    const incoming: ServiceListing = { ...listing, status: 'MATCHED', tradeId, closedAt };
    const matched: ServiceListing = { ...resting, status: 'MATCHED', tradeId, closedAt };
    const offer = kind === 'offer' ? incoming : matched;
    const request = kind === 'offer' ? matched : incoming;
    const trade: Trade = {
      id: tradeId,
      offerId: offer.id,
      requestId: request.id,
      category,
      price: resting.price,
      providerId: offer.soulId,
      seekerId: request.soulId,
      status: 'PROPOSED',
      createdAt: closedAt,
      deadline: new Date(now + this.tradeDeadlineMs).toISOString(),
      credit: this.settlementCredit,
      acceptances: {},
    };

    await this.tradeStore.put(trade);
    await this.listingStore.putBatch([matched, incoming]);
    book.remove(resting);
    this.clearTimer(this.listingTimers, resting.id);
    this.adjust(this.openBySoul, resting.soulId, -1);
    this.live.set(matched.id, matched);
    this.live.set(incoming.id, incoming);
    this.trades.set(tradeId, trade);
    this.startTradeTimer(trade);

    this.logger.info('trade proposed', {
      tradeId,
      category,
      price: trade.price,
      offerId: offer.id,
      requestId: request.id,
      providerId: trade.providerId,
      seekerId: trade.seekerId,
    });
    this.emit('listing:created', { listing: incoming });
    this.emit('trade:proposed', { trade, offer, request });
    return { listing: incoming, trade };
  }

  /**
   * Both endorsements are admitted together before anything is persisted;
   * a rejected batch leaves the trade as it was.
   */
  private async settle(trade: Trade, acceptances: Partial<Record<TradeRole, Acceptance>>): Promise<Trade> {
    const events: ReputationEvent[] = [];
    for (const role of ['seeker', 'provider'] as const) {
      const acceptance = acceptances[role];
      if (acceptance) {
        events.push({ ...settlementEndorsement(trade, role), signature: acceptance.signature });
      }
    }

    const admitted = await this.ledger.submitAll(events);
    if (admitted.status === 'REJECTED') {
      const endorser = events.find((event) => event.id === admitted.eventId)?.endorser;
      this.logger.warn('settlement endorsements rejected', {
        tradeId: trade.id,
        eventId: admitted.eventId,
        reason: admitted.reason,
      });
      if (admitted.reason === 'ENDORSER_NOT_AUTHENTICATED') {
        throw new SoulRelayError(
          SoulRelayErrorCode.COUNTERPARTY_OFFLINE,
          `Endorser ${endorser ?? admitted.eventId} is not connected; trade ${trade.id} cannot settle now`,
          { hint: 'Retry once both parties are authenticated, before the deadline.' },
        );
      }
      throw new SoulRelayError(
        SoulRelayErrorCode.REPUTATION_INVALID_EVENT,
        `Settlement endorsement ${admitted.eventId} was rejected: ${admitted.reason}`,
        { context: { tradeId: trade.id, reason: admitted.reason } },
      );
    }

    const settled: Trade = { ...trade, status: 'SETTLED', acceptances };
    await this.tradeStore.put(settled);
    this.trades.delete(trade.id);
    this.clearTimer(this.tradeTimers, trade.id);
    await this.finishListings(settled, 'SETTLED', 'settled');

    this.logger.info('trade settled', { tradeId: trade.id, providerId: trade.providerId, seekerId: trade.seekerId });
    this.emit('trade:settled', { trade: settled });
    return settled;
  }

  private async abort(tradeId: string): Promise<void> {
    await this.locks.run(tradeKey(tradeId), async () => {
      const trade = this.trades.get(tradeId);
      this.tradeTimers.delete(tradeId);
      if (!trade) return;
      const aborted: Trade = { ...trade, status: 'ABORTED' };
      await this.tradeStore.put(aborted);
      this.trades.delete(tradeId);
      await this.finishListings(aborted, 'CANCELLED', 'aborted');
      this.logger.info('trade aborted at deadline', { tradeId, status: trade.status });
      this.emit('trade:aborted', { trade: aborted });
    });
  }

  private async expire(listingId: string): Promise<void> {
    this.listingTimers.delete(listingId);
    const listing = this.live.get(listingId);
    if (!listing) return;
    await this.locks.run(categoryKey(listing.category), async () => {
      const current = this.live.get(listingId);
      if (current && current.status === 'OPEN') {
        await this.close(current, 'EXPIRED', 'expired');
      }
    });
  }

  /** Move an OPEN listing to a terminal status. Caller holds the category lock. */
  private async close(
    listing: ServiceListing,
    status: ListingStatus,
    reason: ListingCloseReason,
  ): Promise<ServiceListing> {
    const closed: ServiceListing = { ...listing, status, closedAt: timestamp() };
    await this.listingStore.put(closed);
    this.book(listing.category).remove(listing);
    this.live.delete(listing.id);
    this.clearTimer(this.listingTimers, listing.id);
    this.adjust(this.openBySoul, listing.soulId, -1);
    this.logger.info('listing closed', { listingId: listing.id, status, reason });
    this.emit('listing:closed', { listing: closed, reason });
    return closed;
  }

  /** Move both MATCHED listings of a trade to their final status. */
  private async finishListings(
    trade: Trade,
    status: ListingStatus,
    reason: ListingCloseReason,
  ): Promise<void> {
    const closedAt = timestamp();
    for (const id of [trade.offerId, trade.requestId]) {
      const listing = this.live.get(id) ?? (await this.listingStore.get(id));
      if (!listing) continue;
      const closed: ServiceListing = { ...listing, status, closedAt };
      await this.listingStore.put(closed);
      this.live.delete(id);
      this.emit('listing:closed', { listing: closed, reason });
    }
  }

  private async nextSequence(category: string): Promise<number> {
    const value = (this.sequences.get(category) ?? 0) + 1;
    await this.sequenceStore.put({ id: sequenceKey(category), value });
    this.sequences.set(category, value);
    return value;
  }

  private startListingTimer(listing: ServiceListing): void {
    const timer = setTimeout(() => {
      this.expire(listing.id).catch((error: unknown) => {
        this.logger.error('listing expiry failed', { listingId: listing.id, error: String(error) });
      });
    }, this.listingTtlMs);
    timer.unref();
    this.listingTimers.set(listing.id, timer);
  }

  private startTradeTimer(trade: Trade, delayMs: number = this.tradeDeadlineMs): void {
    const timer = setTimeout(() => {
      this.abort(trade.id).catch((error: unknown) => {
        this.logger.error('trade abort failed', { tradeId: trade.id, error: String(error) });
      });
    }, delayMs);
    timer.unref();
    this.tradeTimers.set(trade.id, timer);
  }

  private clearTimer(timers: Map<string, ReturnType<typeof setTimeout>>, id: string): void {
    const timer = timers.get(id);
    if (timer !== undefined) {
      clearTimeout(timer);
      timers.delete(id);
    }
  }

  private book(category: string): OrderBook {
    let book = this.books.get(category);
    if (!book) {
      book = new OrderBook(category);
      this.books.set(category, book);
    }
    return book;
  }

  private roleOf(trade: Trade, soulId: string): TradeRole | undefined {
    if (soulId === trade.seekerId) return 'seeker';
    if (soulId === trade.providerId) return 'provider';
    return undefined;
  }

  private requireSoul(session: Session): string {
    if (!session.soul) {
      throw new SoulRelayError(
        SoulRelayErrorCode.NOT_AUTHENTICATED,
        'Only authenticated souls may use the marketplace',
        { hint: 'Complete the SOUL challenge first.' },
      );
    }
    return session.soul.id;
  }

  private reserveSlot(soulId: string): void {
    const used = (this.openBySoul.get(soulId) ?? 0) + (this.reservedBySoul.get(soulId) ?? 0);
    if (used >= this.maxOpenListings) {
      throw new SoulRelayError(
        SoulRelayErrorCode.LISTING_LIMIT,
        `Soul ${soulId} already has ${this.maxOpenListings} open listings`,
        { hint: 'Cancel a listing or wait for one to match or expire.' },
      );
    }
    this.adjust(this.reservedBySoul, soulId, 1);
  }

  private adjust(counts: Map<string, number>, key: string, by: number): void {
    const next = (counts.get(key) ?? 0) + by;
    if (next > 0) {
      counts.set(key, next);
    } else {
      counts.delete(key);
    }
  }

  private trackInflight(sessionId: string, category: string, by: number): void {
    let categories = this.inflight.get(sessionId);
    if (!categories) {
      categories = new Map();
      this.inflight.set(sessionId, categories);
    }
    this.adjust(categories, category, by);
    if (categories.size === 0) {
      this.inflight.delete(sessionId);
    }
  }
}
