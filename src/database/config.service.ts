import { Injectable } from '@nestjs/common';
import * as dotenv from 'dotenv';

dotenv.config();

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function readList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map((item) => item.replace(/\D/g, ''))
    .filter((item) => item.length > 0);
}

@Injectable()
export class ConfigService {
  get mongoUri(): string {
    return process.env.MONGODB_URI || 'mongodb://localhost:27017/lottery';
  }

  get redisUrl(): string | undefined {
    return process.env.REDIS_URL;
  }

  get port(): number {
    return readInt(process.env.PORT, 3000);
  }

  get nodeEnv(): string {
    return process.env.NODE_ENV || 'development';
  }

  get jwtSecret(): string {
    return process.env.JWT_SECRET || 'change-me';
  }

  get jwtAccessExpiresIn(): string {
    return process.env.JWT_ACCESS_EXPIRES_IN || '1h';
  }

  get jwtRefreshExpiresIn(): string {
    return process.env.JWT_REFRESH_EXPIRES_IN || '7d';
  }

  get otpCodeLength(): number {
    return readInt(process.env.OTP_CODE_LENGTH, 6);
  }

  get otpExpiryMinutes(): number {
    return readInt(process.env.OTP_EXPIRY_MINUTES, 5);
  }

  get otpRateLimitCount(): number {
    return readInt(process.env.OTP_RATE_LIMIT_COUNT, 3);
  }

  get otpRateLimitMinutes(): number {
    return readInt(process.env.OTP_RATE_LIMIT_MINUTES, 10);
  }

  get smsApiUrl(): string {
    return (process.env.SMS_API_URL || 'https://api.kavenegar.com/v1').replace(/\/+$/, '');
  }

  get smsApiKey(): string {
    return process.env.SMS_API_KEY || '';
  }

  get smsOtpTemplate(): string {
    return process.env.SMS_OTP_TEMPLATE || 'otp';
  }

  get smsTimeoutMs(): number {
    return readInt(process.env.SMS_TIMEOUT_MS, 10000);
  }

  get winnerSmsTemplate(): string {
    return process.env.LOTTERY_WINNER_SMS_TEMPLATE || '';
  }

  get lotteryWinnersCount(): number {
    return readInt(process.env.LOTTERY_WINNERS_COUNT, 8);
  }

  get lotterySchedulerEnabled(): boolean {
    return process.env.ENABLE_LOTTERY_SCHEDULER === 'true';
  }

  // Comma-separated, e.g. "09120000001,09120000002"
  get adminPhoneNumbers(): string[] {
    return readList(process.env.ADMIN_PHONE_NUMBERS);
  }
}
