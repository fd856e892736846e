import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '../../database/config.service';
import { shuffle } from '../../common/utils/random';
import { MESSAGE_SENDER, MessageSender } from '../../sms/domain/message-sender';
import { UsersService } from '../../users/application/users.service';
import { formatInLotteryZone, registrationWeekStart } from '../domain/lottery-calendar';
import { Ticket, TicketStatus } from '../domain/ticket.entity';
import { ITicketRepository, TICKET_REPOSITORY, WinningUpdate } from '../domain/ticket.repository';
import { WeekWinnersResponseDto } from './dto/ticket-response.dto';

export const DEFAULT_RECEIVED_DATE = 'Thursday';
export const DEFAULT_SELECTED_PERIOD = 'Lunch';

export interface DrawResult {
  poolSize: number;
  winners: Ticket[];
}

export interface NotificationSummary {
  sent: number;
  failed: number;
}

@Injectable()
export class WinnerSelectionService {
  private readonly logger = new Logger(WinnerSelectionService.name);

  constructor(
    @Inject(TICKET_REPOSITORY)
    private readonly ticketRepository: ITicketRepository,
    @Inject(MESSAGE_SENDER)
    private readonly messageSender: MessageSender,
    private readonly usersService: UsersService,
    private readonly configService: ConfigService,
  ) {}

  async currentWeekPendingTickets(now: Date = new Date()): Promise<Ticket[]> {
    return this.ticketRepository.findByStatus(TicketStatus.PENDING, registrationWeekStart(now));
  }

  private async winningUpdateFor(ticket: Ticket, ticketId: string): Promise<WinningUpdate> {
    const update: WinningUpdate = {
      receivedDate: DEFAULT_RECEIVED_DATE,
      selectedPeriod: DEFAULT_SELECTED_PERIOD,
    };

    const previous = await this.ticketRepository.findLatestWithIdentity(ticket.userId, ticketId);
    if (previous?.fullName && previous.nationalId) {
      update.fullName = previous.fullName;
      update.nationalId = previous.nationalId;
    }
    return update;
  }

  /**
   * Draws up to `count` winners uniformly from this week's pending tickets.
   * Tickets already taken by a concurrent draw are skipped. `poolSize` is the
   * pool this draw actually sampled.
   */
  async selectWinners(now: Date, count: number): Promise<DrawResult> {
    const pool = await this.currentWeekPendingTickets(now);
    const take = Math.max(0, Math.min(count, pool.length));

    if (take === 0) {
      this.logger.warn(`No winners drawn (pool ${pool.length}, requested ${count})`);
      return { poolSize: pool.length, winners: [] };
    }

    const winners: Ticket[] = [];
    for (const ticket of shuffle(pool).slice(0, take)) {
      if (!ticket.id) continue;

      const won = await this.ticketRepository.markWon(
        ticket.id,
        await this.winningUpdateFor(ticket, ticket.id),
      );
      if (won) {
        winners.push(won);
      } else {
        this.logger.warn(`Ticket ${ticket.ticketNumber} is no longer pending, skipped`);
      }
    }

    this.logger.log(`Drew ${winners.length} winners from a pool of ${pool.length}`);
    return { poolSize: pool.length, winners };
  }

  async notifyWinners(winners: Ticket[]): Promise<NotificationSummary> {
    const summary: NotificationSummary = { sent: 0, failed: 0 };
    if (winners.length === 0) return summary;

    const userIds = [...new Set(winners.map((ticket) => ticket.userId))];
    const users = await this.usersService.findByIds(userIds);
    const phoneByUser = new Map(
      users.map((user): [string, string] => [user.id ?? '', user.phoneNumber]),
    );
    const template = this.configService.winnerSmsTemplate;

    for (const ticket of winners) {
      const phoneNumber = phoneByUser.get(ticket.userId);
      if (!phoneNumber) {
        summary.failed++;
        this.logger.warn(`Winner ${ticket.userId} has no phone number, notification skipped`);
        continue;
      }

      try {
        const result = await this.messageSender.send(phoneNumber, template, ticket.ticketNumber);
        if (result.ok) {
          summary.sent++;
        } else {
          summary.failed++;
          this.logger.error(`Winner SMS to ${phoneNumber} failed: ${result.reason}`);
        }
      } catch (error) {
        summary.failed++;
        this.logger.error(`Winner SMS to ${phoneNumber} failed:`, error);
      }
    }

    return summary;
  }

  async currentWeekWinners(now: Date = new Date()): Promise<WeekWinnersResponseDto> {
    const weekStart = registrationWeekStart(now);
    const winners = await this.ticketRepository.findByStatus(TicketStatus.WON, weekStart);

    return {
      weekStart: formatInLotteryZone(weekStart),
      count: winners.length,
      winners: winners.map((ticket) => ({
        ticketNumber: ticket.ticketNumber,
        participatedAt: formatInLotteryZone(ticket.createdAt),
      })),
    };
  }
}
