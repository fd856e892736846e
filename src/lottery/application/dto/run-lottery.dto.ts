import { Type } from 'class-transformer';
import { IsInt, IsOptional, Min } from 'class-validator';

export class RunLotteryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  count?: number;
}
