import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Roles } from '../../auth/decorators/roles.decorator';
import { RolesGuard } from '../../auth/guards/roles.guard';
import { UserRole } from '../../users/domain/user.entity';
import { LotteryJobsService } from '../application/lottery-jobs.service';
import { RunLotteryDto } from '../application/dto/run-lottery.dto';
import { LotteryRunResultDto, SweepResultDto } from '../application/dto/ticket-response.dto';

@Controller('lottery/admin')
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles(UserRole.ADMIN)
export class LotteryAdminController {
  constructor(private readonly lotteryJobsService: LotteryJobsService) {}

  @Post('run')
  @HttpCode(HttpStatus.OK)
  async run(@Body() dto: RunLotteryDto): Promise<LotteryRunResultDto> {
    return this.lotteryJobsService.runLottery(new Date(), dto.count);
  }

  @Post('sweep')
  @HttpCode(HttpStatus.OK)
  async sweep(): Promise<SweepResultDto> {
    return this.lotteryJobsService.runSweep();
  }
}
