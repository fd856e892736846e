/**
 * One-off lottery run outside the HTTP server, for operators.
 *
 * Usage:
 *   npm run lottery:run              draw winners for the current week
 *   npm run lottery:run -- 5         draw 5 winners
 *   npm run lottery:sweep            cancel incomplete winners past their deadline
 */
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../src/app.module';
import { LotteryJobsService } from '../src/lottery/application/lottery-jobs.service';

async function main(): Promise<void> {
  const logger = new Logger('LotteryScript');
  const args = process.argv.slice(2);
  const app = await NestFactory.createApplicationContext(AppModule);

  try {
    const jobs = app.get(LotteryJobsService);

    if (args.includes('--sweep')) {
      const result = await jobs.runSweep();
      logger.log(`Sweep finished: ${JSON.stringify(result)}`);
      return;
    }

    const countArg = args.find((arg) => /^\d+$/.test(arg));
    const result = await jobs.runLottery(new Date(), countArg ? parseInt(countArg, 10) : undefined);
    logger.log(`Lottery finished: ${JSON.stringify(result)}`);
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  new Logger('LotteryScript').error('Lottery script failed', error);
  process.exit(1);
});
