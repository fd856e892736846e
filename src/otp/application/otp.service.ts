import { Inject, Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { randomInt } from 'crypto';
import { ConfigService } from '../../database/config.service';
import {
  OtpExpiredException,
  OtpMismatchException,
  OtpNotFoundException,
  RateLimitedException,
} from '../../common/exceptions/domain.exceptions';
import { OtpCode, OtpPurpose } from '../domain/otp-code.entity';
import { IOtpCodeRepository, OTP_CODE_REPOSITORY } from '../domain/otp-code.repository';
import { SECRET_HASHER, SecretHasher } from '../domain/secret-hasher';

export interface IssuedCode {
  code: string;
  expiresAt: Date;
}

@Injectable()
export class OtpService {
  private readonly logger = new Logger(OtpService.name);

  constructor(
    @Inject(OTP_CODE_REPOSITORY)
    private readonly otpRepository: IOtpCodeRepository,
    @Inject(SECRET_HASHER)
    private readonly hasher: SecretHasher,
    private readonly configService: ConfigService,
  ) {}

  private generateCode(): string {
    let code = '';
    for (let i = 0; i < this.configService.otpCodeLength; i++) {
      code += randomInt(0, 10).toString();
    }
    return code;
  }

  /**
   * Issue a new code. The plaintext is returned for out-of-band delivery and
   * only its hash is stored.
   */
  async requestCode(
    phoneNumber: string,
    purpose: OtpPurpose,
    now: Date = new Date(),
  ): Promise<IssuedCode> {
    const windowStart = new Date(
      now.getTime() - this.configService.otpRateLimitMinutes * 60 * 1000,
    );
    const recent = await this.otpRepository.countCreatedSince(phoneNumber, windowStart);

    if (recent >= this.configService.otpRateLimitCount) {
      this.logger.warn(`OTP rate limit hit for ${phoneNumber} (${recent} recent codes)`);
      throw new RateLimitedException();
    }

    const code = this.generateCode();
    const codeHash = await this.hasher.hash(code);
    const stored = await this.otpRepository.create(
      OtpCode.issue(phoneNumber, codeHash, purpose, now, this.configService.otpExpiryMinutes),
    );

    this.logger.log(`Issued ${purpose} OTP for ${phoneNumber}`);
    return { code, expiresAt: stored.expiresAt };
  }

  /**
   * Only the newest unused code for (phone, purpose) is ever considered.
   */
  async verifyCode(
    phoneNumber: string,
    code: string,
    purpose: OtpPurpose,
    now: Date = new Date(),
  ): Promise<OtpCode> {
    const latest = await this.otpRepository.findLatestUnused(phoneNumber, purpose);

    if (!latest || !latest.id) {
      throw new OtpNotFoundException();
    }
    if (latest.isExpired(now)) {
      throw new OtpExpiredException();
    }

    const matches = await this.hasher.verify(code, latest.codeHash);
    if (!matches) {
      throw new OtpMismatchException();
    }

    // Lost a race with a concurrent verification of the same code.
    const consumed = await this.otpRepository.markUsed(latest.id);
    if (!consumed) {
      throw new OtpNotFoundException();
    }

    latest.used = true;
    return latest;
  }

  async cleanupExpired(now: Date = new Date()): Promise<number> {
    const removed = await this.otpRepository.deleteExpired(now);
    if (removed > 0) {
      this.logger.log(`Removed ${removed} expired OTP codes`);
    }
    return removed;
  }

  @Cron(CronExpression.EVERY_HOUR, { name: 'otp-cleanup' })
  async handleCleanup(): Promise<void> {
    try {
      await this.cleanupExpired();
    } catch (error) {
      this.logger.error('Error cleaning up expired OTP codes:', error);
    }
  }
}
