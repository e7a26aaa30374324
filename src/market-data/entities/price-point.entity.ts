import Decimal from 'decimal.js';

// One sampled price for an instrument. Never mutated after creation.
export type PricePoint = Readonly<{
  instrument: string;
  price: Decimal;
  observedAt: number;   // unix seconds
  volume: Decimal;      // traded volume reported with the sample
}>;
