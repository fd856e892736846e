import { Body, Controller, Get, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { CurrentUser } from '../../auth/decorators/current-user.decorator';
import { AuthenticatedUser } from '../../auth/strategies/jwt.strategy';
import { TicketsService } from '../application/tickets.service';
import { WinnerSelectionService } from '../application/winner-selection.service';
import { CompleteWinnerInfoDto } from '../application/dto/complete-winner-info.dto';
import {
  TicketListResponseDto,
  TicketResponseDto,
  WeekWinnersResponseDto,
  WinnerTicketResponseDto,
} from '../application/dto/ticket-response.dto';

@Controller('lottery')
@UseGuards(AuthGuard('jwt'))
export class LotteryController {
  constructor(
    private readonly ticketsService: TicketsService,
    private readonly winnerSelectionService: WinnerSelectionService,
  ) {}

  @Post('participate')
  async participate(@CurrentUser() user: AuthenticatedUser): Promise<TicketResponseDto> {
    return this.ticketsService.participate(user.userId);
  }

  @Get('winner-info')
  async getWinnerInfo(@CurrentUser() user: AuthenticatedUser): Promise<WinnerTicketResponseDto> {
    return this.ticketsService.getWinnerTicket(user.userId);
  }

  @Post('winner-info')
  @HttpCode(HttpStatus.OK)
  async completeWinnerInfo(
    @CurrentUser() user: AuthenticatedUser,
    @Body() dto: CompleteWinnerInfoDto,
  ): Promise<TicketResponseDto> {
    return this.ticketsService.completeWinnerInfo(user.userId, dto);
  }

  @Get('my-tickets')
  async myTickets(@CurrentUser() user: AuthenticatedUser): Promise<TicketListResponseDto> {
    return this.ticketsService.listUserTickets(user.userId);
  }

  @Get('current-week-winners')
  async currentWeekWinners(): Promise<WeekWinnersResponseDto> {
    return this.winnerSelectionService.currentWeekWinners();
  }
}
