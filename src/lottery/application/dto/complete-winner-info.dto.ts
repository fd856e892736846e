import { Type } from 'class-transformer';
import { IsInt, IsNotEmpty, IsString, Max, MaxLength, Min } from 'class-validator';

export class CompleteWinnerInfoDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  fullName!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  nationalId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  receivedDate!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  selectedPeriod!: string;

  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(3)
  quantity!: number;
}
