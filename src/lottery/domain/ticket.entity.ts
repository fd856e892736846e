export enum TicketStatus {
  PENDING = 'pending',
  // `active` and `expired` are reserved; no flow produces or consumes them.
  ACTIVE = 'active',
  WON = 'won',
  EXPIRED = 'expired',
  CANCELLED = 'cancelled',
}

export interface WinnerInfo {
  fullName: string;
  nationalId: string;
  receivedDate: string;
  selectedPeriod: string;
  quantity: number;
}

export interface ITicket {
  id?: string;
  userId: string;
  ticketNumber: string;
  weekStart: Date; // registration week the ticket was created in
  status: TicketStatus;
  fullName: string | null;
  nationalId: string | null;
  receivedDate: string | null;
  selectedPeriod: string | null;
  quantity: number | null;
  createdAt: Date; // authoritative for every window and deadline
  updatedAt: Date;
}

export class Ticket implements ITicket {
  id?: string;
  userId: string;
  ticketNumber: string;
  weekStart: Date;
  status: TicketStatus;
  fullName: string | null;
  nationalId: string | null;
  receivedDate: string | null;
  selectedPeriod: string | null;
  quantity: number | null;
  createdAt: Date;
  updatedAt: Date;

  constructor(partial: Partial<ITicket>) {
    this.id = partial.id;
    this.userId = partial.userId || '';
    this.ticketNumber = partial.ticketNumber || '';
    this.status = partial.status || TicketStatus.PENDING;
    this.fullName = partial.fullName ?? null;
    this.nationalId = partial.nationalId ?? null;
    this.receivedDate = partial.receivedDate ?? null;
    this.selectedPeriod = partial.selectedPeriod ?? null;
    this.quantity = partial.quantity ?? null;
    this.createdAt = partial.createdAt || new Date();
    this.updatedAt = partial.updatedAt || this.createdAt;
    this.weekStart = partial.weekStart || this.createdAt;
  }

  static create(userId: string, ticketNumber: string, weekStart: Date, now: Date): Ticket {
    return new Ticket({
      userId,
      ticketNumber,
      weekStart,
      status: TicketStatus.PENDING,
      createdAt: now,
      updatedAt: now,
    });
  }

  /** All five delivery fields present. */
  hasCompleteInfo(): boolean {
    return (
      !!this.fullName &&
      !!this.nationalId &&
      !!this.receivedDate &&
      !!this.selectedPeriod &&
      this.quantity !== null
    );
  }

  /** Name and national id present, the two fields carried to a later win. */
  hasIdentityInfo(): boolean {
    return !!this.fullName && !!this.nationalId;
  }
}
