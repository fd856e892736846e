import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { DatabaseModule } from './database/database.module';
import { AuthModule } from './auth/auth.module';
import { UsersModule } from './users/users.module';
import { OtpModule } from './otp/otp.module';
import { SmsModule } from './sms/sms.module';
import { LotteryModule } from './lottery/lottery.module';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [
    RedisModule,
    DatabaseModule,
    AuthModule,
    UsersModule,
    OtpModule,
    SmsModule,
    LotteryModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
