import { Injectable, Logger } from '@nestjs/common';
import { Cron } from '@nestjs/schedule';
import { ConfigService } from '../../database/config.service';
import { LOTTERY_TIME_ZONE } from '../domain/lottery-calendar';
import { LotteryRunResultDto, SweepResultDto } from './dto/ticket-response.dto';
import { TicketsService } from './tickets.service';
import { WinnerSelectionService } from './winner-selection.service';

/**
 * Weekly jobs. The cron handlers and the admin endpoints share runLottery
 * and runSweep.
 */
@Injectable()
export class LotteryJobsService {
  private readonly logger = new Logger(LotteryJobsService.name);

  constructor(
    private readonly winnerSelectionService: WinnerSelectionService,
    private readonly ticketsService: TicketsService,
    private readonly configService: ConfigService,
  ) {}

  async runLottery(now: Date = new Date(), count?: number): Promise<LotteryRunResultDto> {
    const requested = count ?? this.configService.lotteryWinnersCount;
    const { poolSize, winners } = await this.winnerSelectionService.selectWinners(now, requested);
    const { sent, failed } = await this.winnerSelectionService.notifyWinners(winners);

    this.logger.log(
      `Lottery run: pool ${poolSize}, winners ${winners.length}, sent ${sent}, failed ${failed}`,
    );
    return { poolSize, winners: winners.length, sent, failed };
  }

  async runSweep(now: Date = new Date()): Promise<SweepResultDto> {
    const cancelled = await this.ticketsService.sweepIncompleteWinners(now);
    this.logger.log(`Winner info sweep cancelled ${cancelled} tickets`);
    return { cancelled };
  }

  // Wednesday 20:00
  @Cron('0 20 * * 3', { name: 'lottery-draw', timeZone: LOTTERY_TIME_ZONE })
  async handleLotteryDraw(): Promise<void> {
    if (!this.configService.lotterySchedulerEnabled) {
      this.logger.debug('Lottery scheduler disabled, skipping draw');
      return;
    }
    const now = new Date();
    try {
      await this.runLottery(now);
    } catch (error) {
      this.logger.error(`lottery-draw failed at ${now.toISOString()}:`, error);
    }
  }

  // Thursday 08:00
  @Cron('0 8 * * 4', { name: 'winner-info-sweep', timeZone: LOTTERY_TIME_ZONE })
  async handleWinnerInfoSweep(): Promise<void> {
    if (!this.configService.lotterySchedulerEnabled) {
      this.logger.debug('Lottery scheduler disabled, skipping sweep');
      return;
    }
    const now = new Date();
    try {
      await this.runSweep(now);
    } catch (error) {
      this.logger.error(`winner-info-sweep failed at ${now.toISOString()}:`, error);
    }
  }
}
