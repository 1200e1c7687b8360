/**
 * Process wiring: builds every component from a {@link ServerConfig},
 * restores persisted state and runs the line transport.
 *
 * @packageDocumentation
 */

import type { AddressInfo } from 'net';
import { join, resolve } from 'path';

import { SoulAuthenticator } from '@soulrelay/auth';
import { IdentityRegistry, decodeSoul } from '@soulrelay/identity';
import type { Soul } from '@soulrelay/identity';
import {
  Marketplace,
  decodeListing,
  decodeSequence,
  decodeTrade,
  priceTime,
  reputationFirst,
} from '@soulrelay/marketplace';
import type { SequenceRecord, ServiceListing, Trade } from '@soulrelay/marketplace';
import { Dispatcher } from '@soulrelay/protocol';
import { ReputationLedger, decodeLedgerRecord } from '@soulrelay/reputation';
import type { LedgerRecord } from '@soulrelay/reputation';
import { FileKeyVault, SignatureService } from '@soulrelay/signing';
import type { KeyVault } from '@soulrelay/signing';
import { FileStore, MemoryStore } from '@soulrelay/store';
import type { RecordDecoder, RecordStore, StoredRecord } from '@soulrelay/store';
import { silentLogger } from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

import type { ServerConfig } from './config';
import { LineServer } from './line-server';
import type { RelaySession } from './session';
import { SessionRegistry } from './session-registry';

export interface RelayServerOptions {
  config: ServerConfig;
  logger?: Logger;
  /** Keep every collection in memory instead of under `config.dataDir`. */
  inMemory?: boolean;
  /** Overrides the vault built from `config.keyFile`. */
  keyVault?: KeyVault;
}

/** What {@link RelayServer.start} restored. */
export interface StartupSummary {
  souls: number;
  seeded: number;
  reputationEvents: number;
  listings: number;
  trades: number;
}

export class RelayServer {
  readonly config: ServerConfig;
  readonly registry: IdentityRegistry;
  readonly signatures: SignatureService;
  readonly authenticator: SoulAuthenticator<RelaySession>;
  readonly ledger: ReputationLedger;
  readonly marketplace: Marketplace;
  readonly sessions: SessionRegistry;
  readonly dispatcher: Dispatcher<RelaySession>;
  readonly transport: LineServer;
  private readonly logger: Logger;
  private started = false;

  constructor(options: RelayServerOptions) {
    const { config } = options;
    const logger = options.logger ?? silentLogger;
    const dataDir = resolve(config.dataDir);
    const collection = <T extends StoredRecord>(name: string, decode: RecordDecoder<T>): RecordStore<T> =>
      options.inMemory ? new MemoryStore<T>() : new FileStore<T>(join(dataDir, name), decode);

    this.config = config;
    this.logger = logger.child('server');

    this.registry = new IdentityRegistry({ store: collection<Soul>('souls', decodeSoul), logger });
    const vault = options.keyVault ?? (config.keyFile ? new FileKeyVault(config.keyFile) : undefined);
    this.signatures = new SignatureService(this.registry, vault);
    this.authenticator = new SoulAuthenticator<RelaySession>({
      registry: this.registry,
      signatures: this.signatures,
      challengeTtlMs: config.authChallengeTtlMs,
      logger,
    });
    const isAuthenticated = (soulId: string): boolean => this.authenticator.isAuthenticated(soulId);
    this.ledger = new ReputationLedger({
      registry: this.registry,
      signatures: this.signatures,
      isAuthenticated,
      store: collection<LedgerRecord>('reputation-events', decodeLedgerRecord),
      logger,
    });
    this.marketplace = new Marketplace({
      ledger: this.ledger,
      signatures: this.signatures,
      isAuthenticated,
      listings: collection<ServiceListing>('listings', decodeListing),
      trades: collection<Trade>('trades', decodeTrade),
      sequences: collection<SequenceRecord>('meta', decodeSequence),
      comparator: config.matchPriority === 'reputation-first' ? reputationFirst(this.ledger) : priceTime,
      listingTtlMs: config.listingTtlMs,
      tradeDeadlineMs: config.tradeDeadlineMs,
      maxOpenListingsPerSoul: config.maxOpenListingsPerSoul,
      maxPrice: config.maxPrice,
      settlementCredit: config.settlementCredit,
      logger,
    });
    this.sessions = new SessionRegistry({ logger });
    this.dispatcher = new Dispatcher<RelaySession>({
      registry: this.registry,
      authenticator: this.authenticator,
      signatures: this.signatures,
      ledger: this.ledger,
      marketplace: this.marketplace,
      relay: this.sessions,
      listingVisibility: config.listingVisibility,
      commandsPerMinute: config.commandsPerMinute,
      maxPrice: config.maxPrice,
      logger,
    });
    this.transport = new LineServer({ dispatcher: this.dispatcher, sessions: this.sessions, logger });
  }

  /**
   * Restore persisted state and register the configured souls. Must run
   * before the first connection is accepted.
   */
  async start(): Promise<StartupSummary> {
    if (this.started) {
      throw new Error('RelayServer already started');
    }
    this.started = true;

    const souls = await this.registry.load();
    let seeded = 0;
    for (const registration of this.config.souls) {
      const { created } = await this.registry.register(registration);
      if (created) seeded++;
    }
    const reputationEvents = await this.ledger.load();
    const { listings, trades } = await this.marketplace.load();

    const summary: StartupSummary = { souls, seeded, reputationEvents, listings, trades };
    this.logger.info('state restored', { ...summary });
    return summary;
  }

  /** {@link start}, then accept TCP connections on the configured address. */
  async listen(): Promise<AddressInfo> {
    await this.start();
    return this.transport.listen(this.config.port, this.config.host);
  }

  /** Close every connection and stop all timers. */
  async stop(): Promise<void> {
    await this.transport.close();
    this.dispatcher.dispose();
    this.marketplace.shutdown();
    this.authenticator.shutdown();
    this.logger.info('server stopped');
  }
}
