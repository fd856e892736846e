import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AlreadyParticipatedException,
  DeadlinePassedException,
  FieldErrors,
  NoWinningTicketException,
  RecentWinnerException,
  RegistrationClosedException,
  ValidationException,
} from '../../common/exceptions/domain.exceptions';
import { randomString } from '../../common/utils/random';
import {
  completionDeadline,
  isRegistrationOpen,
  registrationWeekStart,
} from '../domain/lottery-calendar';
import { Ticket, TicketStatus, WinnerInfo } from '../domain/ticket.entity';
import {
  ITicketRepository,
  TICKET_REPOSITORY,
  TicketNumberTakenError,
  WeeklyTicketExistsError,
} from '../domain/ticket.repository';
import {
  TicketListResponseDto,
  TicketResponseDto,
  WinnerTicketResponseDto,
} from './dto/ticket-response.dto';

export const TICKET_NUMBER_LENGTH = 10;
export const RECENT_WIN_DAYS = 180;
const MAX_TICKET_NUMBER_ATTEMPTS = 5;
const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class TicketsService {
  private readonly logger = new Logger(TicketsService.name);

  constructor(
    @Inject(TICKET_REPOSITORY)
    private readonly ticketRepository: ITicketRepository,
  ) {}

  toResponse(ticket: Ticket): TicketResponseDto {
    return {
      id: ticket.id ?? '',
      ticketNumber: ticket.ticketNumber,
      status: ticket.status,
      weekStart: ticket.weekStart.toISOString(),
      fullName: ticket.fullName,
      nationalId: ticket.nationalId,
      receivedDate: ticket.receivedDate,
      selectedPeriod: ticket.selectedPeriod,
      quantity: ticket.quantity,
      completionDeadline:
        ticket.status === TicketStatus.WON
          ? completionDeadline(ticket.createdAt).toISOString()
          : null,
      createdAt: ticket.createdAt.toISOString(),
      updatedAt: ticket.updatedAt.toISOString(),
    };
  }

  private async freshTicketNumber(): Promise<string> {
    for (let attempt = 0; attempt < MAX_TICKET_NUMBER_ATTEMPTS; attempt++) {
      const candidate = randomString(TICKET_NUMBER_LENGTH);
      if (!(await this.ticketRepository.existsByTicketNumber(candidate))) {
        return candidate;
      }
    }
    throw new Error('Could not allocate a unique ticket number');
  }

  async participate(userId: string, now: Date = new Date()): Promise<TicketResponseDto> {
    if (!isRegistrationOpen(now)) {
      throw new RegistrationClosedException();
    }

    const weekStart = registrationWeekStart(now);
    if (await this.ticketRepository.hasTicketSince(userId, weekStart)) {
      throw new AlreadyParticipatedException();
    }

    const recentWinSince = new Date(now.getTime() - RECENT_WIN_DAYS * DAY_MS);
    if (await this.ticketRepository.hasStatusSince(userId, TicketStatus.WON, recentWinSince)) {
      throw new RecentWinnerException();
    }

    for (let attempt = 0; attempt < MAX_TICKET_NUMBER_ATTEMPTS; attempt++) {
      const ticketNumber = await this.freshTicketNumber();
      try {
        const created = await this.ticketRepository.create(
          Ticket.create(userId, ticketNumber, weekStart, now),
        );
        this.logger.log(`User ${userId} joined the lottery with ticket ${ticketNumber}`);
        return this.toResponse(created);
      } catch (error) {
        if (error instanceof WeeklyTicketExistsError) {
          throw new AlreadyParticipatedException();
        }
        if (!(error instanceof TicketNumberTakenError)) {
          throw error;
        }
        this.logger.warn(`Ticket number ${ticketNumber} was taken concurrently, retrying`);
      }
    }

    throw new Error('Could not allocate a unique ticket number');
  }

  private validateWinnerInfo(input: WinnerInfo): WinnerInfo {
    const errors: FieldErrors = {};
    const fullName = input.fullName.trim();
    const nationalId = input.nationalId.replace(/\D/g, '');
    const receivedDate = input.receivedDate.trim();
    const selectedPeriod = input.selectedPeriod.trim();

    if (!fullName) errors.fullName = ['Full name is required'];
    if (nationalId.length !== 10) errors.nationalId = ['National ID must be exactly 10 digits'];
    if (!receivedDate) errors.receivedDate = ['Received date is required'];
    if (!selectedPeriod) errors.selectedPeriod = ['Selected period is required'];
    if (!Number.isInteger(input.quantity) || input.quantity < 1 || input.quantity > 3) {
      errors.quantity = ['Quantity must be an integer between 1 and 3'];
    }

    if (Object.keys(errors).length > 0) {
      throw new ValidationException(errors);
    }
    return { fullName, nationalId, receivedDate, selectedPeriod, quantity: input.quantity };
  }

  /**
   * Writes delivery details onto the user's most recent winning ticket.
   * Allowed until the Thursday 08:00 following the ticket's creation.
   */
  async completeWinnerInfo(
    userId: string,
    input: WinnerInfo,
    now: Date = new Date(),
  ): Promise<TicketResponseDto> {
    const ticket = await this.ticketRepository.findLatestByUserAndStatus(userId, TicketStatus.WON);
    if (!ticket || !ticket.id) {
      throw new NoWinningTicketException();
    }
    if (now.getTime() >= completionDeadline(ticket.createdAt).getTime()) {
      throw new DeadlinePassedException();
    }

    const info = this.validateWinnerInfo(input);
    const saved = await this.ticketRepository.saveWinnerInfo(ticket.id, info);
    if (!saved) {
      // cancelled by the sweep between read and write
      throw new NoWinningTicketException();
    }

    this.logger.log(`Winner info completed for ticket ${saved.ticketNumber}`);
    return this.toResponse(saved);
  }

  async sweepIncompleteWinners(now: Date = new Date()): Promise<number> {
    const incomplete = await this.ticketRepository.findIncompleteWinners();
    let cancelled = 0;

    for (const ticket of incomplete) {
      if (!ticket.id) continue;
      if (now.getTime() < completionDeadline(ticket.createdAt).getTime()) continue;

      if (await this.ticketRepository.cancelIfIncomplete(ticket.id)) {
        cancelled++;
        this.logger.log(`Cancelled ticket ${ticket.ticketNumber}: winner info not completed`);
      }
    }

    return cancelled;
  }

  async getWinnerTicket(userId: string): Promise<WinnerTicketResponseDto> {
    const ticket = await this.ticketRepository.findLatestByUserAndStatus(userId, TicketStatus.WON);
    if (!ticket) {
      throw new NoWinningTicketException();
    }
    return { ticket: this.toResponse(ticket), hasPreviousInfo: ticket.hasIdentityInfo() };
  }

  async listUserTickets(userId: string): Promise<TicketListResponseDto> {
    const tickets = await this.ticketRepository.findByUser(userId);
    return { count: tickets.length, results: tickets.map((ticket) => this.toResponse(ticket)) };
  }
}
