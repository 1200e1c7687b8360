import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SoulAuthenticator, authSigningString } from '@soulrelay/auth';
import { generateKeyPair, signString, toHex } from '@soulrelay/crypto';
import type { KeyPair } from '@soulrelay/crypto';
import { IdentityRegistry } from '@soulrelay/identity';
import type { Soul } from '@soulrelay/identity';
import { Marketplace, settlementPayload } from '@soulrelay/marketplace';
import type { MarketplaceOptions, TradeRole } from '@soulrelay/marketplace';
import { ReputationLedger } from '@soulrelay/reputation';
import { MemoryKeyVault, SignatureService } from '@soulrelay/signing';

import { Dispatcher } from './dispatcher';
import type { DispatcherOptions } from './dispatcher';
import type { ClientSession, RelayTransport } from './types';

// ---------------------------------------------------------------------------
// Fixture
// ---------------------------------------------------------------------------

class TestSession implements ClientSession {
  readonly connectedAt = '2026-01-01T00:00:00.000Z';
  soul?: Soul;
  pendingSignature?: string;
  private readonly lines: string[] = [];

  constructor(
    readonly id: string,
    public nick: string,
  ) {}

  send(line: string): void {
    this.lines.push(line);
  }

  /** Lines received since the last call. */
  take(): string[] {
    return this.lines.splice(0);
  }
}

class RecordingRelay implements RelayTransport<TestSession> {
  readonly calls: string[] = [];

  setNick(session: TestSession, nick: string): void {
    this.calls.push(`${session.id} NICK ${nick}`);
    session.nick = nick;
  }
  join(session: TestSession, channel: string): void {
    this.calls.push(`${session.id} JOIN ${channel}`);
  }
  part(session: TestSession, channel: string, reason?: string): void {
    this.calls.push(`${session.id} PART ${channel} ${reason ?? '-'}`);
  }
  privmsg(session: TestSession, target: string, text: string): void {
    this.calls.push(`${session.id} PRIVMSG ${target} ${text}`);
  }
  quit(session: TestSession, reason?: string): void {
    this.calls.push(`${session.id} QUIT ${reason ?? '-'}`);
  }
}

interface Fixture {
  registry: IdentityRegistry;
  authenticator: SoulAuthenticator<TestSession>;
  signatures: SignatureService;
  ledger: ReputationLedger;
  marketplace: Marketplace;
  relay: RecordingRelay;
  dispatcher: Dispatcher<TestSession>;
}

const keys: Record<string, KeyPair> = {};
let fx: Fixture;

function key(soulId: string): KeyPair {
  const pair = keys[soulId];
  if (!pair) throw new Error(`no key for ${soulId}`);
  return pair;
}

async function build(
  market: Partial<MarketplaceOptions> = {},
  dispatch: Partial<DispatcherOptions<TestSession>> = {},
): Promise<Fixture> {
  const registry = new IdentityRegistry();
  for (const name of ['alice', 'bob', 'carol']) {
    keys[name] ??= await generateKeyPair();
    await registry.register({ id: name, publicKey: key(name).publicKeyHex, paradigm: 'builder' });
  }
  // alice's key is hosted on the server; bob and carol sign locally.
  const signatures = new SignatureService(registry, new MemoryKeyVault({ alice: toHex(key('alice').privateKey) }));
  const authenticator = new SoulAuthenticator<TestSession>({ registry, signatures });
  const isAuthenticated = (soulId: string): boolean => authenticator.isAuthenticated(soulId);
  const ledger = new ReputationLedger({ registry, signatures, isAuthenticated });
  const marketplace = new Marketplace({ ledger, signatures, isAuthenticated, tradeDeadlineMs: 60_000, ...market });
  const relay = new RecordingRelay();
  const dispatcher = new Dispatcher<TestSession>({
    registry,
    authenticator,
    signatures,
    ledger,
    marketplace,
    relay,
    ...dispatch,
  });
  return { registry, authenticator, signatures, ledger, marketplace, relay, dispatcher };
}

async function login(session: TestSession, soulId: string): Promise<void> {
  await fx.dispatcher.handle(session, `SOUL ${soulId}`);
  const [challenge] = session.take();
  const nonce = challenge?.split(' ')[2] ?? '';
  const proof = toHex(await signString(authSigningString(soulId, nonce), key(soulId).privateKey));
  await fx.dispatcher.handle(session, `SOUL ${soulId} ${proof}`);
  expect(session.take()).toEqual([`AUTH_OK ${soulId}`]);
}

async function send(session: TestSession, line: string): Promise<string[]> {
  await fx.dispatcher.handle(session, line);
  return session.take();
}

interface ProposedNotice {
  tradeId: string;
  role: TradeRole;
  counterparty: string;
  credit: number;
}

function readProposed(line: string | undefined): ProposedNotice {
  const match = /^TRADE_PROPOSED (\S+) (seeker|provider) \S+ \S+ (\S+) \S+ (\d+)$/.exec(line ?? '');
  if (!match?.[1] || !match[3] || !match[4]) throw new Error(`not a TRADE_PROPOSED notice: ${line}`);
  return {
    tradeId: match[1],
    role: match[2] === 'seeker' ? 'seeker' : 'provider',
    counterparty: match[3],
    credit: Number(match[4]),
  };
}

/** Sign the settlement endorsement the way a client does from its notice. */
async function acceptance(soulId: string, notice: ProposedNotice): Promise<string> {
  const trade = {
    id: notice.tradeId,
    credit: notice.credit,
    seekerId: notice.role === 'seeker' ? soulId : notice.counterparty,
    providerId: notice.role === 'provider' ? soulId : notice.counterparty,
  };
  return toHex(await signString(settlementPayload(trade, notice.role), key(soulId).privateKey));
}

let alice: TestSession;
let bob: TestSession;
let carol: TestSession;

beforeEach(async () => {
  fx = await build();
  alice = new TestSession('s-alice', 'alice');
  bob = new TestSession('s-bob', 'bob');
  carol = new TestSession('s-carol', 'carol');
});

afterEach(() => {
  fx.dispatcher.dispose();
  fx.marketplace.shutdown();
  fx.authenticator.shutdown();
  vi.useRealTimers();
});

// ---------------------------------------------------------------------------
// SOUL
// ---------------------------------------------------------------------------
describe('SOUL', () => {
  it('issues a challenge for a registered soul', async () => {
    const [line] = await send(alice, 'SOUL alice');
    expect(line).toMatch(/^CHALLENGE [0-9a-f]{16} [0-9a-f]{64}$/);
  });

  it('answers ERR_UNKNOWN_SOUL for an unregistered soul', async () => {
    expect(await send(alice, 'SOUL mallory')).toEqual(['ERR_UNKNOWN_SOUL']);
  });

  it('authenticates with a valid proof and annotates the session', async () => {
    await login(alice, 'alice');
    expect(alice.soul?.id).toBe('alice');
    expect(fx.authenticator.isAuthenticated('alice')).toBe(true);
  });

  it('fails a bad proof and consumes the challenge', async () => {
    await send(alice, 'SOUL alice');
    const wrong = toHex(await signString('something else', key('alice').privateKey));
    expect(await send(alice, `SOUL alice ${wrong}`)).toEqual(['ERR_AUTH_FAILED']);
    expect(await send(alice, `SOUL alice ${wrong}`)).toEqual(['ERR_CHALLENGE_EXPIRED']);
    expect(alice.soul).toBeUndefined();
  });

  it('answers ERR_CHALLENGE_EXPIRED without an outstanding challenge', async () => {
    expect(await send(alice, `SOUL alice ${'00'.repeat(64)}`)).toEqual(['ERR_CHALLENGE_EXPIRED']);
  });

  it('answers ERR_CHALLENGE_EXPIRED when the response names another soul', async () => {
    await send(alice, 'SOUL alice');
    expect(await send(alice, `SOUL bob ${'00'.repeat(64)}`)).toEqual(['ERR_CHALLENGE_EXPIRED']);
  });

  it('does not accept a proof made by another soul', async () => {
    const [challenge] = await send(alice, 'SOUL alice');
    const nonce = challenge?.split(' ')[2] ?? '';
    const forged = toHex(await signString(authSigningString('alice', nonce), key('bob').privateKey));
    expect(await send(alice, `SOUL alice ${forged}`)).toEqual(['ERR_AUTH_FAILED']);
  });

  it('makes re-binding explicit and releases the old soul listings', async () => {
    await login(alice, 'alice');
    const [listed] = await send(alice, 'SERVICE OFFER translation 10');
    const listingId = listed?.split(' ')[1] ?? '';

    const [challenge] = await send(alice, 'SOUL bob');
    const nonce = challenge?.split(' ')[2] ?? '';
    const proof = toHex(await signString(authSigningString('bob', nonce), key('bob').privateKey));
    expect(await send(alice, `SOUL bob ${proof}`)).toEqual(['AUTH_OK bob REPLACED alice']);

    expect(alice.soul?.id).toBe('bob');
    expect(fx.authenticator.isAuthenticated('alice')).toBe(false);
    expect((await fx.marketplace.findListing(listingId))?.status).toBe('CANCELLED');
  });
});

// ---------------------------------------------------------------------------
// Authentication gate
// ---------------------------------------------------------------------------
describe('authentication gate', () => {
  it.each([
    'SIGN hello',
    'SERVICE LIST',
    'SERVICE OFFER translation 10',
    'SERVICE REQUEST translation 10',
    'SERVICE CANCEL l1',
    'SERVICE ACCEPT t1',
    'REPUTATION',
    'REPUTATION bob',
  ])('refuses %j from an anonymous session', async (line) => {
    expect(await send(carol, line)).toEqual(['ERR_NOT_AUTHENTICATED']);
  });

  it('lets anonymous sessions use the relay and PING', async () => {
    expect(await send(carol, 'PING 42')).toEqual(['PONG 42']);
    await send(carol, 'JOIN #lobby');
    await send(carol, 'PRIVMSG #lobby :hi all');
    expect(fx.relay.calls).toEqual(['s-carol JOIN #lobby', 's-carol PRIVMSG #lobby hi all']);
  });
});

// ---------------------------------------------------------------------------
// SIGN
// ---------------------------------------------------------------------------
describe('SIGN', () => {
  it('signs with a hosted key and keeps the signature for the next message', async () => {
    await login(alice, 'alice');
    const [reply] = await send(alice, 'SIGN ship it');
    const signature = reply?.replace(/^SIGNATURE /, '') ?? '';
    expect(signature).toMatch(/^[0-9a-f]{128}$/);
    expect(alice.pendingSignature).toBe(signature);
    expect(await fx.signatures.verify('alice', 'ship it', signature)).toBe(true);
  });

  it('answers ERR_NO_SIGNING_KEY when the key is not hosted', async () => {
    await login(bob, 'bob');
    expect(await send(bob, 'SIGN ship it')).toEqual(['ERR_NO_SIGNING_KEY']);
    expect(bob.pendingSignature).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// SERVICE
// ---------------------------------------------------------------------------
describe('SERVICE', () => {
  beforeEach(async () => {
    await login(alice, 'alice');
    await login(bob, 'bob');
    await login(carol, 'carol');
  });

  it('lists OPEN listings tagged with their owners', async () => {
    const [listed] = await send(bob, 'SERVICE REQUEST translation 100');
    const id = listed?.split(' ')[1] ?? '';
    expect(listed).toBe(`LISTED ${id}`);
    expect(await send(carol, 'SERVICE LIST')).toEqual([`LISTING ${id} REQUEST translation 100 bob`, 'END LIST 1']);
    expect(await send(carol, 'SERVICE LIST audit')).toEqual(['END LIST 0']);
  });

  it('hides owners when listings are anonymous', async () => {
    fx.dispatcher.dispose();
    fx = await build({}, { listingVisibility: 'anonymous' });
    await login(bob, 'bob');
    const [listed] = await send(bob, 'SERVICE OFFER audit 2.5');
    const id = listed?.split(' ')[1] ?? '';
    expect(await send(bob, 'SERVICE LIST')).toEqual([`LISTING ${id} OFFER audit 2.5 anonymous`, 'END LIST 1']);
  });

  it('proposes a trade to both parties and settles it', async () => {
    await send(bob, 'SERVICE REQUEST translation 100');
    const offerLines = await send(alice, 'SERVICE OFFER translation 90');
    expect(offerLines).toHaveLength(2);
    expect(offerLines[0]).toMatch(/^LISTED [0-9a-f]{32}$/);

    const forAlice = readProposed(offerLines[1]);
    const forBob = readProposed(bob.take()[0]);
    expect(forAlice).toMatchObject({ role: 'provider', counterparty: 'bob', credit: 1 });
    expect(forBob).toMatchObject({ tradeId: forAlice.tradeId, role: 'seeker', counterparty: 'alice' });
    expect(offerLines[1]).toContain(' translation 100 bob ');

    const bobSignature = await acceptance('bob', forBob);
    expect(await send(bob, `SERVICE ACCEPT ${forBob.tradeId} ${bobSignature}`)).toEqual([
      `ACCEPTED ${forBob.tradeId} ACCEPTED_BY_SEEKER`,
    ]);

    // alice's key is hosted, so she may accept without a signature.
    expect(await send(alice, `SERVICE ACCEPT ${forAlice.tradeId}`)).toEqual([
      `ACCEPTED ${forAlice.tradeId} SETTLED`,
      `TRADE_SETTLED ${forAlice.tradeId}`,
    ]);
    expect(bob.take()).toEqual([`TRADE_SETTLED ${forAlice.tradeId}`]);

    expect(await send(carol, 'REPUTATION alice')).toEqual(['SCORE alice 1']);
    expect(await send(bob, 'REPUTATION')).toEqual(['SCORE bob 1']);
    expect(await send(carol, 'REPUTATION')).toEqual(['SCORE carol 0']);
  });

  it('requires a signature from parties without a hosted key', async () => {
    await send(alice, 'SERVICE REQUEST translation 100');
    const [, notice] = await send(bob, 'SERVICE OFFER translation 100');
    const { tradeId } = readProposed(notice);
    expect(await send(bob, `SERVICE ACCEPT ${tradeId}`)).toEqual(['ERR_SIGNATURE_REQUIRED']);
    expect(await send(carol, `SERVICE ACCEPT ${tradeId}`)).toEqual(['ERR_NOT_PARTY']);
  });

  it('rejects a signature over the wrong endorsement', async () => {
    await send(alice, 'SERVICE REQUEST translation 100');
    const [, notice] = await send(bob, 'SERVICE OFFER translation 100');
    const proposed = readProposed(notice);
    const wrongRole = await acceptance('bob', { ...proposed, role: 'seeker' });
    expect(await send(bob, `SERVICE ACCEPT ${proposed.tradeId} ${wrongRole}`)).toEqual(['ERR_INVALID_SIGNATURE']);
  });

  it('answers ERR_ALREADY_ACCEPTED on a repeated acceptance', async () => {
    await send(alice, 'SERVICE REQUEST translation 100');
    const [, notice] = await send(bob, 'SERVICE OFFER translation 100');
    const proposed = readProposed(notice);
    const signature = await acceptance('bob', proposed);
    await send(bob, `SERVICE ACCEPT ${proposed.tradeId} ${signature}`);
    expect(await send(bob, `SERVICE ACCEPT ${proposed.tradeId} ${signature}`)).toEqual(['ERR_ALREADY_ACCEPTED']);
  });

  it('answers ERR_COUNTERPARTY_OFFLINE when the other side has gone', async () => {
    await send(bob, 'SERVICE REQUEST translation 100');
    const [, notice] = await send(alice, 'SERVICE OFFER translation 100');
    const forBob = readProposed(bob.take()[0]);
    await send(bob, `SERVICE ACCEPT ${forBob.tradeId} ${await acceptance('bob', forBob)}`);
    await fx.dispatcher.disconnect(bob);

    const { tradeId } = readProposed(notice);
    expect(await send(alice, `SERVICE ACCEPT ${tradeId}`)).toEqual(['ERR_COUNTERPARTY_OFFLINE']);
  });

  it('cancels a listing for its owner only', async () => {
    const [listed] = await send(bob, 'SERVICE REQUEST translation 100');
    const id = listed?.split(' ')[1] ?? '';
    expect(await send(carol, `SERVICE CANCEL ${id}`)).toEqual(['ERR_NOT_OWNER']);
    expect(await send(bob, `SERVICE CANCEL ${id}`)).toEqual([`CANCELLED ${id}`]);
    expect(await send(bob, `SERVICE CANCEL ${id}`)).toEqual(['ERR_LISTING_NOT_OPEN']);
    expect(await send(bob, 'SERVICE CANCEL nope')).toEqual(['ERR_LISTING_NOT_FOUND']);
  });

  it.each([
    ['SERVICE OFFER translation -1', 'ERR_INVALID_PRICE'],
    ['SERVICE OFFER translation 1e3', 'ERR_INVALID_PRICE'],
    ['SERVICE OFFER translation 0.000000001', 'ERR_INVALID_PRICE'],
    ['SERVICE OFFER a/b 1', 'ERR_INVALID_CATEGORY'],
    ['SERVICE LIST a/b', 'ERR_INVALID_CATEGORY'],
    ['SERVICE ACCEPT missing', 'ERR_TRADE_NOT_FOUND'],
    ['SERVICE ACCEPT missing abcd', 'ERR_TRADE_NOT_FOUND'],
    ['REPUTATION mallory', 'ERR_UNKNOWN_SOUL'],
    ['SERVICE OFFER translation', 'ERR_SYNTAX SERVICE OFFER'],
    ['SERVICE SELL x 1', 'ERR_UNKNOWN_COMMAND SERVICE SELL'],
    ['WHOIS alice', 'ERR_UNKNOWN_COMMAND WHOIS'],
  ])('%j answers %s', async (line, reply) => {
    expect(await send(carol, line)).toEqual([reply]);
  });

  it('answers ERR_LISTING_LIMIT past the per-soul limit', async () => {
    fx.dispatcher.dispose();
    fx = await build({ maxOpenListingsPerSoul: 1 });
    await login(bob, 'bob');
    await send(bob, 'SERVICE REQUEST a 1');
    expect(await send(bob, 'SERVICE REQUEST b 1')).toEqual(['ERR_LISTING_LIMIT']);
  });
});

// ---------------------------------------------------------------------------
// Notices from timers and disconnects
// ---------------------------------------------------------------------------
describe('timer notices', () => {
  it('tells both parties when a trade aborts at its deadline', async () => {
    vi.useFakeTimers();
    fx.dispatcher.dispose();
    fx = await build({ tradeDeadlineMs: 5_000 });
    await login(alice, 'alice');
    await login(bob, 'bob');
    await send(bob, 'SERVICE REQUEST translation 100');
    const [, notice] = await send(alice, 'SERVICE OFFER translation 100');
    bob.take();
    const { tradeId } = readProposed(notice);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(alice.take()).toEqual([`TRADE_ABORTED ${tradeId}`]);
    expect(bob.take()).toEqual([`TRADE_ABORTED ${tradeId}`]);
  });

  it('tells the owning session when its listing expires', async () => {
    vi.useFakeTimers();
    fx.dispatcher.dispose();
    fx = await build({ listingTtlMs: 1_000 });
    await login(bob, 'bob');
    const [listed] = await send(bob, 'SERVICE REQUEST translation 100');
    const id = listed?.split(' ')[1] ?? '';

    await vi.advanceTimersByTimeAsync(1_000);
    expect(bob.take()).toEqual([`LISTING_EXPIRED ${id}`]);
  });
});

describe('disconnect', () => {
  it('cancels the session listings and unbinds its soul', async () => {
    await login(bob, 'bob');
    await send(bob, 'SERVICE REQUEST translation 100');
    await send(bob, 'SERVICE REQUEST audit 100');
    await fx.dispatcher.disconnect(bob);
    expect(fx.marketplace.openListings()).toEqual([]);
    expect(fx.authenticator.isAuthenticated('bob')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Relay, rate limit and failures
// ---------------------------------------------------------------------------
describe('relay commands', () => {
  it('forwards NICK, PART and QUIT to the relay', async () => {
    await send(carol, 'NICK caroline');
    await send(carol, 'PART #lobby :bye');
    await send(carol, 'QUIT');
    expect(fx.relay.calls).toEqual(['s-carol NICK caroline', 's-carol PART #lobby bye', 's-carol QUIT -']);
    expect(carol.nick).toBe('caroline');
  });

  it('treats relay verbs as unknown without a relay', async () => {
    fx.dispatcher.dispose();
    fx = await build({}, { relay: undefined });
    expect(await send(carol, 'JOIN #lobby')).toEqual(['ERR_UNKNOWN_COMMAND JOIN']);
  });

  it('answers ERR_INTERNAL when the relay throws', async () => {
    fx.dispatcher.dispose();
    const broken = new RecordingRelay();
    broken.privmsg = () => {
      throw new Error('socket gone');
    };
    fx = await build({}, { relay: broken });
    expect(await send(carol, 'PRIVMSG #lobby :hi')).toEqual(['ERR_INTERNAL']);
    expect(await send(carol, 'PING x')).toEqual(['PONG x']);
  });
});

describe('rate limit', () => {
  it('answers ERR_RATE_LIMITED past the per-minute budget', async () => {
    fx.dispatcher.dispose();
    fx = await build({}, { commandsPerMinute: 2 });
    expect(await send(carol, 'PING 1')).toEqual(['PONG 1']);
    expect(await send(carol, 'PING 2')).toEqual(['PONG 2']);
    expect(await send(carol, 'PING 3')).toEqual(['ERR_RATE_LIMITED']);
    expect(await send(alice, 'PING 4')).toEqual(['PONG 4']);
  });
});

describe('ordering', () => {
  it('replies in command order when lines arrive together', async () => {
    await login(bob, 'bob');
    await Promise.all([
      fx.dispatcher.handle(bob, 'SERVICE REQUEST translation 100'),
      fx.dispatcher.handle(bob, 'PING a'),
      fx.dispatcher.handle(bob, 'SERVICE LIST'),
    ]);
    const lines = bob.take();
    expect(lines).toHaveLength(4);
    expect(lines[0]).toMatch(/^LISTED /);
    expect(lines.slice(1, 2)).toEqual(['PONG a']);
    expect(lines[2]).toMatch(/^LISTING .* REQUEST translation 100 bob$/);
    expect(lines[3]).toBe('END LIST 1');
  });
});
