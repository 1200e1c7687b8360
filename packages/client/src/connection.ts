/**
 * Line-oriented connections for the agent client. A {@link LineConnection}
 * sends and receives whole lines; {@link StreamLineConnection} provides one
 * over any Node `Duplex`, such as a TCP or TLS socket from
 * {@link connectTcp} or one end of a {@link duplexPair}.
 *
 * @packageDocumentation
 */

import { Socket, connect, isIP } from 'net';
import { Duplex } from 'stream';
import { connect as connectTls } from 'tls';
import type { ConnectionOptions } from 'tls';

import { SoulRelayError, SoulRelayErrorCode, TypedEventEmitter } from '@soulrelay/types';
import type { Listener } from '@soulrelay/types';

export interface LineConnectionEvents {
  /** One inbound line without its terminator. */
  line: string;
  /** The connection is gone; `error` is set when it failed. */
  close: { error?: Error };
}

export interface LineConnection {
  send(line: string): void;
  close(): void;
  on<K extends keyof LineConnectionEvents>(event: K, listener: Listener<LineConnectionEvents[K]>): unknown;
  off<K extends keyof LineConnectionEvents>(event: K, listener: Listener<LineConnectionEvents[K]>): unknown;
}

/** {@link LineConnection} over a `Duplex`. Lines are `\n`-terminated; a trailing `\r` is dropped. */
export class StreamLineConnection extends TypedEventEmitter<LineConnectionEvents> implements LineConnection {
  private buffer = '';
  private closed = false;

  constructor(private readonly stream: Duplex) {
    super();
    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => this.receive(chunk));
    stream.on('end', () => this.finish());
    stream.on('close', () => this.finish());
    stream.on('error', (error) => this.finish(error));
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * @throws {SoulRelayError} NOT_CONNECTED once the connection has closed.
   */
  send(line: string): void {
    if (this.closed || !this.stream.writable) {
      throw new SoulRelayError(SoulRelayErrorCode.NOT_CONNECTED, 'Connection is closed');
    }
    this.stream.write(`${line}\n`);
  }

  close(): void {
    this.stream.end();
    this.finish();
  }

  private receive(chunk: string): void {
    this.buffer += chunk;
    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      if (line.length > 0) {
        this.emit('line', line);
      }
      newline = this.buffer.indexOf('\n');
    }
  }

  private finish(error?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.emit('close', error ? { error } : {});
  }
}

export interface DialOptions {
  host: string;
  port: number;
  /** Present when the connection is to be wrapped in TLS. */
  tls?: ConnectionOptions;
}

export interface ConnectTcpOptions {
  /** `true` for TLS with default options; an object is passed to `tls.connect`. */
  tls?: boolean | ConnectionOptions;
  /**
   * Opens the socket. Defaults to `net.connect`, or `tls.connect` when
   * `tls` is set. The returned stream must emit `connect` (`secureConnect`
   * for TLS) once usable.
   */
  dial?: (options: DialOptions) => Duplex;
}

function dialSocket({ host, port, tls }: DialOptions): Duplex {
  if (!tls) return connect({ host, port });
  return connectTls({ ...(isIP(host) === 0 ? { servername: host } : {}), ...tls, host, port });
}

/** Open a TCP connection to a relay, optionally over TLS. */
export function connectTcp(
  host: string,
  port: number,
  options: ConnectTcpOptions = {},
): Promise<StreamLineConnection> {
  const tls: ConnectionOptions | undefined = options.tls === true ? {} : options.tls || undefined;
  const dial = options.dial ?? dialSocket;
  return new Promise((resolve, reject) => {
    const socket = dial({ host, port, ...(tls ? { tls } : {}) });
    const onError = (error: Error): void => {
      reject(
        new SoulRelayError(
          SoulRelayErrorCode.NOT_CONNECTED,
          `Cannot connect to ${host}:${port}${tls ? ' over TLS' : ''}`,
          { cause: error },
        ),
      );
    };
    socket.once('error', onError);
    socket.once(tls ? 'secureConnect' : 'connect', () => {
      socket.off('error', onError);
      if (socket instanceof Socket) socket.setNoDelay(true);
      resolve(new StreamLineConnection(socket));
    });
  });
}

/**
 * Two connected in-memory `Duplex` ends: what is written to one is read
 * from the other. Ending one side ends the other's readable side.
 */
export function duplexPair(): [Duplex, Duplex] {
  let left: Duplex | undefined;
  let right: Duplex | undefined;
  const end = (peer: () => Duplex | undefined): Duplex =>
    new Duplex({
      read() {},
      write(chunk: Buffer | string, _encoding, callback) {
        peer()?.push(chunk);
        callback();
      },
      final(callback) {
        peer()?.push(null);
        callback();
      },
    });
  left = end(() => right);
  right = end(() => left);
  return [left, right];
}
