import { endorsementPayload } from '@soulrelay/reputation';
import type { UnsignedReputationEvent } from '@soulrelay/reputation';

import type { Trade, TradeRole } from './types';

export const SETTLEMENT_REASON = 'trade_settled';

/** The other side of a trade. */
export function counterpartyRole(role: TradeRole): TradeRole {
  return role === 'seeker' ? 'provider' : 'seeker';
}

export function soulForRole(trade: Pick<Trade, 'seekerId' | 'providerId'>, role: TradeRole): string {
  return role === 'seeker' ? trade.seekerId : trade.providerId;
}

/**
 * The reputation event a party signs to accept a trade: it credits the
 * counterparty with the trade's credit. Its id, `<tradeId>:<role>`, makes
 * each party's endorsement unique per trade.
 */
export function settlementEndorsement(
  trade: Pick<Trade, 'id' | 'seekerId' | 'providerId' | 'credit'>,
  role: TradeRole,
): UnsignedReputationEvent {
  return {
    id: `${trade.id}:${role}`,
    subject: soulForRole(trade, counterpartyRole(role)),
    endorser: soulForRole(trade, role),
    delta: trade.credit,
    reason: SETTLEMENT_REASON,
  };
}

/** The exact string a party signs to accept `trade` in `role`. */
export function settlementPayload(
  trade: Pick<Trade, 'id' | 'seekerId' | 'providerId' | 'credit'>,
  role: TradeRole,
): string {
  return endorsementPayload(settlementEndorsement(trade, role));
}
