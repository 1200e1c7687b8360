import { describe, it, expect, beforeEach } from 'vitest';
import type { Soul } from '@soulrelay/identity';

import { RelaySession } from './session';
import { SessionRegistry } from './session-registry';

class Peer {
  readonly lines: string[] = [];
  closed = false;
  readonly session: RelaySession;

  constructor(id: string, nick: string) {
    this.session = new RelaySession(
      {
        write: (line) => this.lines.push(line),
        close: () => {
          this.closed = true;
        },
      },
      id,
    );
    this.session.nick = nick;
  }

  take(): string[] {
    return this.lines.splice(0);
  }
}

const ALICE_SOUL: Soul = {
  id: 'alice',
  publicKey: 'ab'.repeat(32),
  paradigm: 'builder',
  mode: 'autonomous',
  createdAt: '2026-01-01T00:00:00.000Z',
};

let relay: SessionRegistry;
let alice: Peer;
let bob: Peer;
let carol: Peer;

beforeEach(() => {
  relay = new SessionRegistry();
  alice = new Peer('s1', 'alice');
  bob = new Peer('s2', 'bob');
  carol = new Peer('s3', 'carol');
  for (const peer of [alice, bob, carol]) relay.add(peer.session);
});

describe('nicks', () => {
  it('suffixes a default nick that is taken', () => {
    const dup = new Peer('s4', 'alice');
    relay.add(dup.session);
    expect(dup.session.nick).toBe('alice-2');
    expect(relay.findByNick('alice-2')).toBe(dup.session);
  });

  it('refuses a nick held by another session', () => {
    relay.setNick(bob.session, 'alice');
    expect(bob.take()).toEqual(['ERR_NICK_IN_USE alice']);
    expect(bob.session.nick).toBe('bob');
  });

  it('announces a nick change to the session and its channel peers', () => {
    relay.join(alice.session, '#lobby');
    relay.join(bob.session, '#lobby');
    alice.take();
    bob.take();

    relay.setNick(bob.session, 'robert');
    expect(bob.take()).toEqual([':bob NICK robert']);
    expect(alice.take()).toEqual([':bob NICK robert']);
    expect(carol.take()).toEqual([]);
    expect(relay.findByNick('robert')).toBe(bob.session);
    expect(relay.findByNick('bob')).toBeUndefined();
  });
});

describe('channels', () => {
  it('echoes JOIN to every member including the joiner', () => {
    relay.join(alice.session, '#lobby');
    expect(alice.take()).toEqual([':alice JOIN #lobby']);
    relay.join(bob.session, '#lobby');
    expect(alice.take()).toEqual([':bob JOIN #lobby']);
    expect(bob.take()).toEqual([':bob JOIN #lobby']);
    expect(relay.members('#lobby')).toEqual([alice.session, bob.session]);
  });

  it('ignores a repeated JOIN', () => {
    relay.join(alice.session, '#lobby');
    relay.join(alice.session, '#lobby');
    expect(alice.take()).toEqual([':alice JOIN #lobby']);
  });

  it('delivers channel messages to the other members only', () => {
    relay.join(alice.session, '#lobby');
    relay.join(bob.session, '#lobby');
    alice.take();
    bob.take();

    relay.privmsg(alice.session, '#lobby', 'hello');
    expect(bob.take()).toEqual([':alice PRIVMSG #lobby :hello']);
    expect(alice.take()).toEqual([]);
    expect(carol.take()).toEqual([]);
  });

  it('annotates authenticated senders and attaches the pending signature once', () => {
    alice.session.soul = ALICE_SOUL;
    alice.session.pendingSignature = 'cd'.repeat(64);
    relay.join(alice.session, '#lobby');
    relay.join(bob.session, '#lobby');
    bob.take();

    relay.privmsg(alice.session, '#lobby', 'signed');
    relay.privmsg(alice.session, '#lobby', 'plain');
    const sender = '[Soul:alice] [Paradigm:builder] [Mode:autonomous] alice';
    expect(bob.take()).toEqual([
      `:${sender} PRIVMSG #lobby :signed [Sig:${'cd'.repeat(64)}]`,
      `:${sender} PRIVMSG #lobby :plain`,
    ]);
    expect(alice.session.pendingSignature).toBeUndefined();
  });

  it('refuses messages to a channel the sender has not joined', () => {
    relay.join(bob.session, '#lobby');
    relay.privmsg(alice.session, '#lobby', 'hi');
    expect(alice.take()).toEqual(['ERR_NOT_ON_CHANNEL #lobby']);
  });

  it('echoes PART and drops empty channels', () => {
    relay.join(alice.session, '#lobby');
    relay.join(bob.session, '#lobby');
    alice.take();
    bob.take();

    relay.part(bob.session, '#lobby', 'later');
    expect(alice.take()).toEqual([':bob PART #lobby :later']);
    expect(bob.take()).toEqual([':bob PART #lobby :later']);
    relay.part(alice.session, '#lobby');
    expect(relay.members('#lobby')).toEqual([]);
    relay.part(alice.session, '#lobby');
    expect(alice.take()).toEqual([':alice PART #lobby', 'ERR_NOT_ON_CHANNEL #lobby']);
  });
});

describe('direct messages', () => {
  it('delivers to a nick', () => {
    relay.privmsg(alice.session, 'bob', 'psst');
    expect(bob.take()).toEqual([':alice PRIVMSG bob :psst']);
  });

  it('answers ERR_NO_SUCH_TARGET for an unknown nick', () => {
    relay.privmsg(alice.session, 'dave', 'psst');
    expect(alice.take()).toEqual(['ERR_NO_SUCH_TARGET dave']);
  });
});

describe('leaving', () => {
  it('QUIT tells each peer once and closes the session', () => {
    relay.join(alice.session, '#a');
    relay.join(alice.session, '#b');
    relay.join(bob.session, '#a');
    relay.join(bob.session, '#b');
    bob.take();

    relay.quit(alice.session, 'done');
    expect(bob.take()).toEqual([':alice QUIT :done']);
    expect(alice.closed).toBe(true);
    expect(relay.get('s1')).toBeUndefined();
    expect(relay.findByNick('alice')).toBeUndefined();
    expect(relay.members('#a')).toEqual([bob.session]);
  });

  it('remove is a no-op for a session that already left', () => {
    relay.join(alice.session, '#a');
    relay.join(bob.session, '#a');
    bob.take();
    relay.remove(alice.session);
    relay.remove(alice.session, 'again');
    expect(bob.take()).toEqual([':alice QUIT']);
    expect(relay.size).toBe(2);
  });

  it('drops lines sent to a closed session', () => {
    alice.session.close();
    alice.session.send('late');
    expect(alice.take()).toEqual([]);
    expect(alice.session.isOpen).toBe(false);
  });
});
