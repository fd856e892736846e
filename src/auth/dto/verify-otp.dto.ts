import { IsEnum, IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';
import { OtpPurpose } from '../../otp/domain/otp-code.entity';

export class VerifyOtpDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  phoneNumber!: string;

  @IsString()
  @Matches(/^\d{1,10}$/, { message: 'OTP code must contain only digits' })
  code!: string;

  @IsEnum(OtpPurpose)
  purpose!: OtpPurpose;
}
