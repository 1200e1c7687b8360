/**
 * @soulrelay/protocol — the wire surface: command parsing, reply and
 * notice lines, sender annotation and the command dispatcher.
 *
 * @packageDocumentation
 */

export { Dispatcher, DEFAULT_COMMANDS_PER_MINUTE } from './dispatcher';
export type { DispatcherOptions } from './dispatcher';

export { parseCommand, isValidNick } from './parser';
export { SlidingWindowRateLimiter } from './rate-limiter';
export {
  annotateSender,
  consumeSignature,
  formatRelayLine,
  parseRelayLine,
  splitSignature,
  withSignature,
} from './annotation';
export {
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

export type {
  ClientSession,
  Command,
  ListingVisibility,
  ParseFailure,
  RelayTransport,
  RelayedLine,
  SenderAnnotation,
} from './types';
