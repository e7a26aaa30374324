export class PendingOrderDto {
  id!: string;
  instrument!: string;
  side!: string;
  type!: string;
  quantity!: number;
  limitPrice!: number | null;
  createdAt!: number;   // unix seconds
}

export class PricePointDto {
  instrument!: string;
  price!: number;
  volume!: number;
  observedAt!: number;   // unix seconds
}
