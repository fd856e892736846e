import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { ScheduleModule } from '@nestjs/schedule';
import { TicketsService } from './application/tickets.service';
import { WinnerSelectionService } from './application/winner-selection.service';
import { LotteryJobsService } from './application/lottery-jobs.service';
import { LotteryController } from './presentation/lottery.controller';
import { LotteryAdminController } from './presentation/lottery-admin.controller';
import { TicketDocument, TicketSchema } from './infrastructure/schemas/ticket.schema';
import { MongoTicketRepository } from './infrastructure/repositories/mongo-ticket.repository';
import { TICKET_REPOSITORY } from './domain/ticket.repository';
import { UsersModule } from '../users/users.module';
import { SmsModule } from '../sms/sms.module';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: TicketDocument.name, schema: TicketSchema },
    ]),
    ScheduleModule.forRoot(),
    UsersModule,
    SmsModule,
  ],
  controllers: [LotteryController, LotteryAdminController],
  providers: [
    TicketsService,
    WinnerSelectionService,
    LotteryJobsService,
    {
      provide: TICKET_REPOSITORY,
      useClass: MongoTicketRepository,
    },
  ],
  exports: [LotteryJobsService],
})
export class LotteryModule {}
