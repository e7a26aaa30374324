import Decimal from 'decimal.js';

export enum OrderSide {
  BUY = 'buy',
  SELL = 'sell',
}

export enum OrderType {
  MARKET = 'market',
  LIMIT = 'limit',
}

// Order intent built by the orchestrator from a signal.
// id is unique for the process lifetime and is the only key used to drop it from the pending list.
export interface Order {
  readonly id: string;
  readonly instrument: string;
  readonly side: OrderSide;
  readonly type: OrderType;
  readonly quantity: Decimal;
  readonly limitPrice?: Decimal;   // LIMIT orders only
  readonly createdAt: number;      // unix seconds
}

/** Signed fill quantity: positive for buys, negative for sells */
export function signedQuantity(side: OrderSide, quantity: Decimal): Decimal {
  return side === OrderSide.BUY ? quantity : quantity.negated();
}
