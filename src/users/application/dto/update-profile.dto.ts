import { IsOptional, IsString, Matches } from 'class-validator';

export class UpdateProfileDto {
  @IsOptional()
  @IsString()
  @Matches(/^\d{10}$/, { message: 'National ID must be exactly 10 digits' })
  nationalId?: string;
}
