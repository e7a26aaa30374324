import { ArrayNotEmpty, IsArray, IsNotEmpty, IsString } from 'class-validator';

// Instruments to collect and trade, e.g. ["BTCUSDT", "ETHUSDT"]
export class StartTradingDto {
  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  symbols!: string[];
}
