import { TicketStatus } from '../../domain/ticket.entity';

export interface TicketResponseDto {
  id: string;
  ticketNumber: string;
  status: TicketStatus;
  weekStart: string;
  fullName: string | null;
  nationalId: string | null;
  receivedDate: string | null;
  selectedPeriod: string | null;
  quantity: number | null;
  // only set on won tickets
  completionDeadline: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface TicketListResponseDto {
  count: number;
  results: TicketResponseDto[];
}

export interface WinnerTicketResponseDto {
  ticket: TicketResponseDto;
  hasPreviousInfo: boolean;
}

export interface WeekWinnersResponseDto {
  weekStart: string;
  count: number;
  winners: { ticketNumber: string; participatedAt: string }[];
}

export interface LotteryRunResultDto {
  poolSize: number;
  winners: number;
  sent: number;
  failed: number;
}

export interface SweepResultDto {
  cancelled: number;
}
