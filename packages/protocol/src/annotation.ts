/**
 * Sender annotation on relayed lines.
 *
 * A relayed line starts with the sender: `[Soul:<id>] [Paradigm:<tag>]
 * [Mode:<mode>] <nick>` for an authenticated session (tags omitted when
 * unset), the bare nick otherwise. The annotation is display metadata and
 * proves nothing; only a `[Sig:<hex>]` tag verified against the soul's key
 * does.
 *
 * @packageDocumentation
 */

import type { Session } from '@soulrelay/auth';

import type { RelayedLine, SenderAnnotation } from './types';

const TAG = /^\[(Soul|Paradigm|Mode):([^\]\s]+)\] /;
const SIG_SUFFIX = / \[Sig:([0-9a-fA-F]+)\]$/;

export function annotateSender(session: Session): string {
  const soul = session.soul;
  if (!soul) return session.nick;
  const parts = [`[Soul:${soul.id}]`];
  if (soul.paradigm) parts.push(`[Paradigm:${soul.paradigm}]`);
  if (soul.mode) parts.push(`[Mode:${soul.mode}]`);
  parts.push(session.nick);
  return parts.join(' ');
}

/** Take the session's pending `SIGN` signature, leaving none behind. */
export function consumeSignature(session: Session): string | undefined {
  const signature = session.pendingSignature;
  session.pendingSignature = undefined;
  return signature;
}

/** Append a `[Sig:<hex>]` tag to message text. */
export function withSignature(text: string, signatureHex: string | undefined): string {
  return signatureHex ? `${text} [Sig:${signatureHex}]` : text;
}

/** Separate a trailing `[Sig:<hex>]` tag from message text. */
export function splitSignature(text: string): { text: string; signature?: string } {
  const match = SIG_SUFFIX.exec(text);
  if (!match?.[1]) return { text };
  return { text: text.slice(0, match.index), signature: match[1] };
}

/**
 * The line delivered to other sessions when `session` sends `command`.
 * For PRIVMSG the session's pending signature, if any, is attached and
 * consumed.
 */
export function formatRelayLine(
  session: Session,
  command: 'PRIVMSG' | 'JOIN' | 'PART' | 'QUIT',
  target?: string,
  text?: string,
): string {
  const head = `:${annotateSender(session)} ${command}`;
  switch (command) {
    case 'PRIVMSG':
      return `${head} ${target ?? ''} :${withSignature(text ?? '', consumeSignature(session))}`;
    case 'JOIN':
      return `${head} ${target ?? ''}`;
    case 'PART':
      return text ? `${head} ${target ?? ''} :${text}` : `${head} ${target ?? ''}`;
    case 'QUIT':
      return text ? `${head} :${text}` : head;
  }
}

/**
 * Parse a relayed line. Returns undefined for anything that is not a
 * relayed PRIVMSG, JOIN, PART or QUIT.
 */
export function parseRelayLine(line: string): RelayedLine | undefined {
  if (!line.startsWith(':')) return undefined;
  let rest = line.slice(1);

  const sender: Partial<SenderAnnotation> = {};
  for (let match = TAG.exec(rest); match; match = TAG.exec(rest)) {
    const [whole, key, value] = match;
    if (key === 'Soul') sender.soulId = value;
    else if (key === 'Paradigm') sender.paradigm = value;
    else sender.mode = value;
    rest = rest.slice(whole.length);
  }

  const [nick, command, ...params] = rest.split(' ');
  if (!nick || !command) return undefined;
  const annotation: SenderAnnotation = { ...sender, nick };

  const afterCommand = rest.slice(nick.length + command.length + 2);
  switch (command) {
    case 'PRIVMSG': {
      const target = params[0];
      const marker = afterCommand.indexOf(' :');
      if (!target || marker === -1) return undefined;
      const { text, signature } = splitSignature(afterCommand.slice(marker + 2));
      return signature
        ? { sender: annotation, command, target, text, signature }
        : { sender: annotation, command, target, text };
    }
    case 'JOIN':
    case 'PART': {
      const target = params[0];
      if (!target) return undefined;
      const marker = afterCommand.indexOf(' :');
      return marker === -1
        ? { sender: annotation, command, target }
        : { sender: annotation, command, target, text: afterCommand.slice(marker + 2) };
    }
    case 'QUIT':
      return afterCommand.startsWith(':')
        ? { sender: annotation, command, text: afterCommand.slice(1) }
        : { sender: annotation, command };
    default:
      return undefined;
  }
}
