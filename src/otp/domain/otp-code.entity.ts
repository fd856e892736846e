export enum OtpPurpose {
  REGISTER = 'register',
  LOGIN = 'login',
}

export interface IOtpCode {
  id?: string;
  phoneNumber: string;
  codeHash: string; // never the plaintext code
  purpose: OtpPurpose;
  createdAt: Date;
  expiresAt: Date;
  used: boolean;
}

export class OtpCode implements IOtpCode {
  id?: string;
  phoneNumber: string;
  codeHash: string;
  purpose: OtpPurpose;
  createdAt: Date;
  expiresAt: Date;
  used: boolean;

  constructor(partial: Partial<IOtpCode>) {
    this.id = partial.id;
    this.phoneNumber = partial.phoneNumber || '';
    this.codeHash = partial.codeHash || '';
    this.purpose = partial.purpose || OtpPurpose.LOGIN;
    this.createdAt = partial.createdAt || new Date();
    this.expiresAt = partial.expiresAt || this.createdAt;
    this.used = partial.used ?? false;
  }

  static issue(
    phoneNumber: string,
    codeHash: string,
    purpose: OtpPurpose,
    now: Date,
    ttlMinutes: number,
  ): OtpCode {
    return new OtpCode({
      phoneNumber,
      codeHash,
      purpose,
      createdAt: now,
      expiresAt: new Date(now.getTime() + ttlMinutes * 60 * 1000),
      used: false,
    });
  }

  isExpired(now: Date): boolean {
    return now.getTime() > this.expiresAt.getTime();
  }
}
