import { generateId, timestamp } from '@soulrelay/crypto';
import type { Soul } from '@soulrelay/identity';
import type { ClientSession } from '@soulrelay/protocol';

/** Where a session's outbound lines go. */
export interface LineSink {
  write(line: string): void;
  close(): void;
}

/** A live relay connection. */
export class RelaySession implements ClientSession {
  readonly id: string;
  readonly connectedAt: string;
  nick: string;
  soul?: Soul;
  pendingSignature?: string;
  readonly channels = new Set<string>();
  private open = true;

  constructor(
    private readonly sink: LineSink,
    id: string = generateId(8),
  ) {
    this.id = id;
    this.nick = `guest-${id.slice(0, 6)}`;
    this.connectedAt = timestamp();
  }

  get isOpen(): boolean {
    return this.open;
  }

  /** Queue one line. Lines sent after {@link close} are dropped. */
  send(line: string): void {
    if (this.open) {
      this.sink.write(line);
    }
  }

  close(): void {
    if (!this.open) return;
    this.open = false;
    this.sink.close();
  }
}
