import Decimal from 'decimal.js';

// Net holding per instrument. Created on first fill, never deleted; quantity may return to zero.
export interface Position {
  instrument: string;
  quantity: Decimal;        // signed, positive = net long
  averagePrice: Decimal;    // volume-weighted entry price
  unrealizedPnl: Decimal;   // stored as-is, not recomputed on fills
}

// Exit levels implied by the risk limits for an open position.
export type ProtectiveLevels = {
  stopLoss: Decimal;
  takeProfit: Decimal;
};
