import Decimal from 'decimal.js';

export type OrderBookLevel = Readonly<{
  price: Decimal;
  quantity: Decimal;
}>;

// Full depth snapshot. Replaced wholesale on every fetch, never merged.
export type OrderBookSnapshot = Readonly<{
  instrument: string;
  bids: readonly OrderBookLevel[];   // best bid first
  asks: readonly OrderBookLevel[];   // best ask first
  observedAt: number;                // unix seconds
}>;
