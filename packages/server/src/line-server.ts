/**
 * Newline-delimited text transport. Each accepted stream (a TCP socket from
 * {@link LineServer.listen}, or any `Duplex` handed to
 * {@link LineServer.accept}) becomes one {@link RelaySession}; every
 * complete line goes to the dispatcher.
 *
 * @packageDocumentation
 */

import { createServer } from 'net';
import type { AddressInfo, Server } from 'net';
import type { Duplex } from 'stream';

import type { Dispatcher } from '@soulrelay/protocol';
import { silentLogger } from '@soulrelay/types';
import type { Logger } from '@soulrelay/types';

import { RelaySession } from './session';
import type { SessionRegistry } from './session-registry';

export const DEFAULT_MAX_LINE_LENGTH = 8192;
export const ERR_LINE_TOO_LONG = 'ERR_LINE_TOO_LONG';

export interface LineServerOptions {
  dispatcher: Dispatcher<RelaySession>;
  sessions: SessionRegistry;
  /** Longest accepted line in characters, excluding the terminator. */
  maxLineLength?: number;
  logger?: Logger;
}

export class LineServer {
  private readonly dispatcher: Dispatcher<RelaySession>;
  private readonly sessions: SessionRegistry;
  private readonly maxLineLength: number;
  private readonly logger: Logger;
  private readonly streams = new Map<RelaySession, Duplex>();
  /** Latest dispatch per session; the dispatcher runs a session's lines in order. */
  private readonly inflight = new Map<RelaySession, Promise<void>>();
  private server: Server | undefined;

  constructor(options: LineServerOptions) {
    this.dispatcher = options.dispatcher;
    this.sessions = options.sessions;
    this.maxLineLength = options.maxLineLength ?? DEFAULT_MAX_LINE_LENGTH;
    this.logger = (options.logger ?? silentLogger).child('transport');
  }

  /** Start accepting TCP connections. Resolves with the bound address. */
  async listen(port: number, host: string): Promise<AddressInfo> {
    const server = createServer((socket) => {
      socket.setNoDelay(true);
      this.accept(socket);
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    server.on('error', (error) => {
      this.logger.error('listener error', { error: String(error) });
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error(`Unexpected listen address ${String(address)}`);
    }
    this.logger.info('listening', { host: address.address, port: address.port });
    return address;
  }

  /** Attach a connected stream and return its session. */
  accept(stream: Duplex): RelaySession {
    stream.setEncoding('utf8');
    const session = new RelaySession({
      write: (line) => {
        if (stream.writable) {
          stream.write(`${line}\n`);
        }
      },
      close: () => {
        stream.end();
      },
    });
    this.sessions.add(session);
    this.streams.set(session, stream);
    this.logger.info('connection opened', { sessionId: session.id });

    let buffer = '';
    // Set while the rest of an over-long line is being skipped.
    let discarding = false;

    stream.on('data', (chunk: string) => {
      buffer += chunk;
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline).replace(/\r$/, '');
        buffer = buffer.slice(newline + 1);
        if (discarding) {
          discarding = false;
        } else if (line.length > this.maxLineLength) {
          session.send(ERR_LINE_TOO_LONG);
        } else if (line.length > 0) {
          this.receive(session, line);
        }
        newline = buffer.indexOf('\n');
      }
      if (buffer.length > this.maxLineLength) {
        if (!discarding) session.send(ERR_LINE_TOO_LONG);
        buffer = '';
        discarding = true;
      }
    });

    let released = false;
    const release = (reason: string): void => {
      if (released) return;
      released = true;
      this.release(session, reason);
    };
    stream.on('end', () => release('connection closed'));
    stream.on('close', () => release('connection closed'));
    stream.on('error', (error) => {
      this.logger.debug('connection error', { sessionId: session.id, error: String(error) });
      release('connection error');
    });

    return session;
  }

  /** Stop listening and close every connection. */
  async close(): Promise<void> {
    for (const session of Array.from(this.streams.keys())) {
      session.close();
    }
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  /** Number of open connections. */
  get connectionCount(): number {
    return this.streams.size;
  }

  private receive(session: RelaySession, line: string): void {
    const handled = this.dispatcher.handle(session, line).catch((error: unknown) => {
      this.logger.error('dispatch failed', { sessionId: session.id, error: String(error) });
    });
    this.inflight.set(session, handled);
  }

  /** Lines already read are answered before the session is torn down. */
  private release(session: RelaySession, reason: string): void {
    const handled = this.inflight.get(session) ?? Promise.resolve();
    this.inflight.delete(session);
    handled
      .then(() => {
        const stream = this.streams.get(session);
        this.streams.delete(session);
        this.sessions.remove(session, reason);
        session.close();
        stream?.destroy();
        this.logger.info('connection closed', { sessionId: session.id, soulId: session.soul?.id });
        return this.dispatcher.disconnect(session);
      })
      .catch((error: unknown) => {
        this.logger.error('disconnect cleanup failed', { sessionId: session.id, error: String(error) });
      });
  }
}
