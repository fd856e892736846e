import { Module } from '@nestjs/common';
import { MESSAGE_SENDER } from './domain/message-sender';
import { KavenegarMessageSender } from './infrastructure/kavenegar-message-sender';

@Module({
  providers: [
    {
      provide: MESSAGE_SENDER,
      useClass: KavenegarMessageSender,
    },
  ],
  exports: [MESSAGE_SENDER],
})
export class SmsModule {}
