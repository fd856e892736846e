import { IsEnum, IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { OtpPurpose } from '../../otp/domain/otp-code.entity';

export class RequestOtpDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  phoneNumber!: string;

  @IsEnum(OtpPurpose)
  purpose!: OtpPurpose;
}
