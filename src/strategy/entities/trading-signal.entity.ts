import Decimal from 'decimal.js';
import { OrderSide } from '../../execution/entities/order.entity';

// A strategy's recommendation. Consumed by the decision loop in the same cycle, never stored.
export interface TradingSignal {
  instrument: string;
  action: OrderSide;
  confidence: number;     // 0..1
  targetPrice: Decimal;   // also used as the reference and fill price downstream
  quantity: Decimal;
}
