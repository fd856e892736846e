import { Ticket, TicketStatus, WinnerInfo } from './ticket.entity';

export interface WinningUpdate {
  receivedDate: string;
  selectedPeriod: string;
  fullName?: string;
  nationalId?: string;
}

/** The ticket number is already taken; the caller should draw another. */
export class TicketNumberTakenError extends Error {
  constructor(readonly ticketNumber: string) {
    super(`Ticket number ${ticketNumber} already exists`);
    this.name = 'TicketNumberTakenError';
  }
}

/** The user already holds a ticket for this registration week. */
export class WeeklyTicketExistsError extends Error {
  constructor(readonly userId: string) {
    super(`User ${userId} already has a ticket this week`);
    this.name = 'WeeklyTicketExistsError';
  }
}

export interface ITicketRepository {
  /** Throws TicketNumberTakenError or WeeklyTicketExistsError on unique-key conflicts. */
  create(ticket: Ticket): Promise<Ticket>;
  existsByTicketNumber(ticketNumber: string): Promise<boolean>;
  hasTicketSince(userId: string, since: Date): Promise<boolean>;
  hasStatusSince(userId: string, status: TicketStatus, since: Date): Promise<boolean>;
  findLatestByUserAndStatus(userId: string, status: TicketStatus): Promise<Ticket | null>;
  findByUser(userId: string): Promise<Ticket[]>;
  findByStatus(status: TicketStatus, createdSince?: Date): Promise<Ticket[]>;
  /** `won` tickets with at least one delivery field still missing. */
  findIncompleteWinners(): Promise<Ticket[]>;
  /** Most recent non-cancelled ticket other than `excludeId` with name and national id. */
  findLatestWithIdentity(userId: string, excludeId: string): Promise<Ticket | null>;
  /** pending → won; null when the ticket is no longer pending. */
  markWon(id: string, update: WinningUpdate): Promise<Ticket | null>;
  /** Overwrites delivery info while the ticket is still won. */
  saveWinnerInfo(id: string, info: WinnerInfo): Promise<Ticket | null>;
  /** won → cancelled, only while some delivery field is still missing. */
  cancelIfIncomplete(id: string): Promise<boolean>;
}

export const TICKET_REPOSITORY = 'TICKET_REPOSITORY';
