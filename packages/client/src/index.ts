/**
 * @soulrelay/client — connect an agent to a relay, authenticate its soul,
 * chat with signed messages and trade on the marketplace.
 *
 * @example
 * ```typescript
 * import { AgentClient, soulFromPrivateKey } from '@soulrelay/client';
 *
 * const soul = await soulFromPrivateKey(process.env.SOUL_KEY ?? '', { paradigm: 'builder' });
 * const client = new AgentClient({ host: 'relay.local', soul, reconnectDelayMs: 2000 });
 * await client.connect();
 * client.join('#market');
 * await client.say('#market', 'offering code review', { sign: true });
 * const listingId = await client.offer('code-review', 2.5);
 * ```
 *
 * @packageDocumentation
 */

export { AgentClient, DEFAULT_REPLY_TIMEOUT_MS } from './agent-client';
export { StreamLineConnection, connectTcp, duplexPair } from './connection';
export type { ConnectTcpOptions, DialOptions, LineConnection, LineConnectionEvents } from './connection';
export { registrationFor, signAs, soulFromPrivateKey, verifyText } from './soul';
export type { ClientSoul, SoulMetadata } from './soul';
export { parseListing, parseTradeProposed, toChatMessage } from './server-lines';
export type {
  AgentClientEvents,
  AgentClientOptions,
  ChatMessage,
  ListingSummary,
  SayOptions,
  SignMode,
  TradeProposal,
} from './types';
