import { OtpCode, OtpPurpose } from './otp-code.entity';

export interface IOtpCodeRepository {
  create(code: OtpCode): Promise<OtpCode>;
  /** Codes of any purpose issued to the phone at or after `since`. */
  countCreatedSince(phoneNumber: string, since: Date): Promise<number>;
  findLatestUnused(phoneNumber: string, purpose: OtpPurpose): Promise<OtpCode | null>;
  /** Flips `used` only while it is still false; true when this call flipped it. */
  markUsed(id: string): Promise<boolean>;
  deleteExpired(now: Date): Promise<number>;
}

export const OTP_CODE_REPOSITORY = 'OTP_CODE_REPOSITORY';
