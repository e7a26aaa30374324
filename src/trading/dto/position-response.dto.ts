// Position with unrealized P&L marked to the newest recorded price
export class PositionDto {
  instrument!: string;
  quantity!: number;
  averagePrice!: number;
  markPrice!: number | null;       // newest recorded price, null when none recorded
  unrealizedPnl!: number;          // (mark - average) * quantity, 0 without a mark
  stopLossPrice!: number | null;
  takeProfitPrice!: number | null;
}

// All positions plus totals
export class PositionsResponseDto {
  positions!: PositionDto[];
  totalUnrealizedPnl!: number;
  dailyPnl!: number;
}
