import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { OtpService } from './application/otp.service';
import { OTP_CODE_REPOSITORY } from './domain/otp-code.repository';
import { SECRET_HASHER } from './domain/secret-hasher';
import { BcryptSecretHasher } from './infrastructure/bcrypt-secret-hasher';
import { MongoOtpCodeRepository } from './infrastructure/repositories/mongo-otp-code.repository';
import { OtpCodeDocument, OtpCodeSchema } from './infrastructure/schemas/otp-code.schema';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: OtpCodeDocument.name, schema: OtpCodeSchema },
    ]),
  ],
  providers: [
    OtpService,
    {
      provide: OTP_CODE_REPOSITORY,
      useClass: MongoOtpCodeRepository,
    },
    {
      provide: SECRET_HASHER,
      useClass: BcryptSecretHasher,
    },
  ],
  exports: [OtpService],
})
export class OtpModule {}
